import * as z from "zod";

export const MIN_RATING = 1;
export const MAX_RATING = 5;

export const ratingValueSchema = z.number().int().min(MIN_RATING).max(MAX_RATING);

export const updateRatingSchema = z.object({
  value: ratingValueSchema,
});
