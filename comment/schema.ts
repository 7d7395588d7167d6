import * as z from "zod";

export const addCommentSchema = z.object({
  text: z.string().trim().min(1).max(512),
});

export type AddCommentInput = z.input<typeof addCommentSchema>;
