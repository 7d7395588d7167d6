import type { InferSelectModel } from "drizzle-orm";
import type {
  ingredient_schema,
  recipe_schema,
} from "../db/schema";
import type { Category } from "../category/type";

/** Display values of the measurement units, stored verbatim. */
export const MeasurementUnits = [
  "Whole",
  "Fluid Ounce",
  "Tea Spoon",
  "Ounce",
  "Cup",
  "Gram",
  "Milliliter",
] as const;

export type MeasurementUnit = (typeof MeasurementUnits)[number];

export type Recipe = InferSelectModel<typeof recipe_schema>;

export type Ingredient = InferSelectModel<typeof ingredient_schema>;

export type RecipeWithRating = Recipe & {
  /** Mean of the recipe's ratings, null when it has none. */
  avgRating: number | null;
};

export type RecipeView = {
  recipe: Recipe;
  ingredients: Ingredient[];
  rating: number | null;
  categories: Category[];
};

export type RecipeCreated = {
  recipe: Recipe;
  ingredients: Ingredient[];
  categories: Category[];
  seedRatingId: number;
};

/** Rating every new recipe receives from its own author. */
export const SEED_RATING_VALUE = 5;
