import { avg, eq } from "drizzle-orm";
import type { Database } from "../db";
import { rating_schema, recipe_schema } from "../db/schema";
import type { AppLogger } from "../logger";
import {
  InvalidValue,
  NotFound,
  translateDriverError,
  validateInput,
} from "../errors";
import { ensureDefined } from "../utils";
import { getUserById } from "../user/service";
import { updateRatingSchema } from "./schema";
import type { Rating } from "./type";

/**
 * Returns `rating` with its score replaced by `newRate`. Pure: the caller
 * decides when the result reaches storage, through `saveRating`.
 */
export function updateRating(rating: Rating, newRate: number): Rating {
  const parsed = updateRatingSchema.safeParse({ value: newRate });
  if (!parsed.success) throw new InvalidValue(parsed.error);

  return { ...rating, value: parsed.data.value };
}

/** Writes the rating's current score. Concurrent writers: last one wins. */
export async function saveRating(rating: Rating, db: Database): Promise<Rating> {
  const [saved] = await db
    .update(rating_schema)
    .set({ value: rating.value })
    .where(eq(rating_schema.id, rating.id))
    .returning();
  if (!saved) throw new NotFound("rating", rating.id);

  return saved;
}

export async function getRating(id: number, db: Database): Promise<Rating> {
  const [rating] = await db
    .select()
    .from(rating_schema)
    .where(eq(rating_schema.id, id));
  if (!rating) throw new NotFound("rating", id);

  return rating;
}

/**
 * Records `authorId`'s score for a recipe. An author holds at most one
 * rating per recipe: a repeat vote replaces the earlier score in place, and
 * of two concurrent votes the last one written wins.
 */
export async function rateRecipe(
  params: { authorId: number; recipeId: number; value: number },
  db: Database,
  logger: AppLogger,
): Promise<Rating> {
  const { authorId, recipeId } = params;
  const scopedLogger = logger.child({
    scope: "rating-service",
    recipeId,
    authorId,
  });
  const { value } = validateInput(
    updateRatingSchema,
    { value: params.value },
    scopedLogger,
    "Rating validation failed",
  );

  const [recipe] = await db
    .select({ id: recipe_schema.id })
    .from(recipe_schema)
    .where(eq(recipe_schema.id, recipeId));
  if (!recipe) throw new NotFound("recipe", recipeId);
  await getUserById(authorId, db);

  const [rating] = await db
    .insert(rating_schema)
    .values({ author_id: authorId, recipe_id: recipeId, value })
    .onConflictDoUpdate({
      target: [rating_schema.author_id, rating_schema.recipe_id],
      set: { value },
    })
    .returning()
    .catch((error) => {
      throw translateDriverError(error);
    });
  ensureDefined(rating, "Failed to persist rating");

  scopedLogger.info({ ratingId: rating.id, value }, "Rating recorded");
  return rating;
}

/** Mean score of a recipe's ratings, null when nobody rated it. */
export async function averageRatingOf(
  recipeId: number,
  db: Database,
): Promise<number | null> {
  const [row] = await db
    .select({ value: avg(rating_schema.value) })
    .from(rating_schema)
    .where(eq(rating_schema.recipe_id, recipeId));

  return toAverage(row?.value);
}

/** `avg()` comes back from Postgres as a numeric string, or null over no rows. */
export function toAverage(value: string | null | undefined): number | null {
  return value === null || value === undefined ? null : Number(value);
}
