import * as z from "zod";

export const categoryNameSchema = z.string().trim().min(1).max(16);

export const createCategorySchema = z.object({
  name: categoryNameSchema,
});

export type CreateCategoryInput = z.input<typeof createCategorySchema>;
