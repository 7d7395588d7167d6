import * as z from "zod";
import { MeasurementUnits } from "./type";
import { categoryNameSchema } from "../category/schema";

export const MIN_INGREDIENT_AMOUNT = 0.0001;

/**
 * Amounts are stored as numeric(10, 2): at most 8 digits before the point
 * and 2 after. Kept as a decimal string so no float rounding sneaks in.
 */
export const ingredientAmountSchema = z
  .union([z.number(), z.string().trim()])
  .transform((value) => String(value))
  .pipe(
    z
      .string()
      .regex(
        /^\d{1,8}(\.\d{1,2})?$/,
        "Enter a number with at most 8 digits before and 2 after the decimal point",
      ),
  )
  .refine(
    (value) => Number(value) >= MIN_INGREDIENT_AMOUNT,
    `Ensure this value is greater than or equal to ${MIN_INGREDIENT_AMOUNT}`,
  );

export const ingredientInputSchema = z.object({
  amount: ingredientAmountSchema,
  unit: z.enum(MeasurementUnits).default("Whole"),
  description: z.string().trim().min(1).max(64),
});

const titleSchema = z.string().trim().min(1).max(64);
const descriptionSchema = z.string().trim().min(1).max(512);
const directionsSchema = z.string().trim().min(1).max(65536);
/** `minutes_to_make` is a Postgres `integer` column. */
export const MAX_MINUTES_TO_MAKE = 2_147_483_647;

const minutesToMakeSchema = z.number().int().min(1).max(MAX_MINUTES_TO_MAKE);

export const createRecipeSchema = z.object({
  title: titleSchema,
  description: descriptionSchema,
  directions: directionsSchema,
  minutesToMake: minutesToMakeSchema,
  picture: z.string().min(1).nullable().default(null),
  categories: z
    .array(categoryNameSchema)
    .default([])
    .transform((names) => [...new Set(names)]),
  ingredients: z
    .array(ingredientInputSchema)
    .min(1, "At least one ingredient is required"),
});

/** Author, categories and publication date are not editable. */
export const editRecipeSchema = z.object({
  title: titleSchema,
  description: descriptionSchema,
  directions: directionsSchema,
  minutesToMake: minutesToMakeSchema,
  picture: z.string().nullable(),
});

/** A blank category (e.g. an empty `?category=`) means no filter. */
export const listRecipesSchema = z.object({
  category: z
    .string()
    .trim()
    .optional()
    .transform((name) => (name === "" ? undefined : name)),
});

export type IngredientInput = z.input<typeof ingredientInputSchema>;
export type CreateRecipeInput = z.input<typeof createRecipeSchema>;
export type EditRecipeInput = z.input<typeof editRecipeSchema>;
export type ListRecipesInput = z.input<typeof listRecipesSchema>;
