import {
  and,
  asc,
  avg,
  eq,
  getTableColumns,
  inArray,
  ne,
  sql,
} from "drizzle-orm";
import type { Database } from "../db";
import {
  category_schema,
  ingredient_schema,
  rating_schema,
  recipe_category_schema,
  recipe_schema,
  user_schema,
} from "../db/schema";
import type { AppLogger } from "../logger";
import {
  ConstraintViolation,
  NotFound,
  translateDriverError,
  validateInput,
} from "../errors";
import { ensureDefined } from "../utils";
import * as CategoryService from "../category/service";
import * as RatingService from "../rating/service";
import {
  createRecipeSchema,
  editRecipeSchema,
  listRecipesSchema,
  type CreateRecipeInput,
  type EditRecipeInput,
  type ListRecipesInput,
} from "./schema";
import {
  SEED_RATING_VALUE,
  type Recipe,
  type RecipeCreated,
  type RecipeView,
  type RecipeWithRating,
} from "./type";

const TITLE_UNIQUE_CONSTRAINT = "recipes_title_unique";

/**
 * Publishes a recipe together with its ingredients, its category links and
 * the author's seed rating, all in one transaction.
 *
 * The whole input is validated before the transaction opens, so a bad
 * ingredient leaves nothing behind. Inside the transaction the title is
 * checked up front to report a readable ConstraintViolation; the unique
 * index on `recipes.title` still has the final word when two submissions
 * race, and its rejection is mapped to the same error.
 *
 * NOTE: the 5-star seed rating keeps every listed recipe's average
 * non-null. It inflates new recipes' scores and may not be wanted as
 * product behavior, but callers rely on it.
 */
export async function createRecipe(
  authorId: number,
  input: CreateRecipeInput,
  db: Database,
  logger: AppLogger,
): Promise<RecipeCreated> {
  const scopedLogger = logger.child({ scope: "recipe-service", authorId });
  const data = validateInput(
    createRecipeSchema,
    input,
    scopedLogger,
    "Recipe input validation failed",
  );

  const created = await db
    .transaction(async (txn) => {
      const [author] = await txn
        .select({ id: user_schema.id })
        .from(user_schema)
        .where(eq(user_schema.id, authorId));
      if (!author) throw new NotFound("user", authorId);

      const [duplicate] = await txn
        .select({ id: recipe_schema.id })
        .from(recipe_schema)
        .where(eq(recipe_schema.title, data.title));
      if (duplicate) {
        throw new ConstraintViolation(TITLE_UNIQUE_CONSTRAINT, {
          message: `A recipe titled "${data.title}" already exists`,
        });
      }

      const categories =
        data.categories.length > 0
          ? await txn
              .select()
              .from(category_schema)
              .where(inArray(category_schema.name, data.categories))
              .orderBy(asc(category_schema.name))
          : [];
      const unknownCategory = data.categories.find(
        (name) => !categories.some((category) => category.name === name),
      );
      if (unknownCategory !== undefined) {
        throw new NotFound("category", unknownCategory);
      }

      const [recipe] = await txn
        .insert(recipe_schema)
        .values({
          title: data.title,
          author_id: authorId,
          description: data.description,
          directions: data.directions,
          minutes_to_make: data.minutesToMake,
          picture: data.picture,
        })
        .returning();
      ensureDefined(recipe, "Failed to persist recipe");

      if (categories.length > 0) {
        await txn.insert(recipe_category_schema).values(
          categories.map((category) => ({
            recipe_id: recipe.id,
            category_id: category.id,
          })),
        );
      }

      const ingredients = await txn
        .insert(ingredient_schema)
        .values(
          data.ingredients.map((ingredient) => ({
            recipe_id: recipe.id,
            amount: ingredient.amount,
            unit: ingredient.unit,
            description: ingredient.description,
          })),
        )
        .returning();

      const [seedRating] = await txn
        .insert(rating_schema)
        .values({
          author_id: authorId,
          recipe_id: recipe.id,
          value: SEED_RATING_VALUE,
        })
        .returning({ id: rating_schema.id });
      ensureDefined(seedRating, "Failed to persist seed rating");

      return {
        recipe,
        ingredients: ingredients.sort((a, b) => a.id - b.id),
        categories,
        seedRatingId: seedRating.id,
      };
    })
    .catch((error) => {
      throw translateDriverError(error);
    });

  scopedLogger.info(
    {
      recipeId: created.recipe.id,
      ingredients: created.ingredients.length,
      categories: created.categories.length,
    },
    "Recipe created",
  );
  return created;
}

/**
 * Replaces the editable fields of a recipe. Every field is validated before
 * the single UPDATE runs, so a rejected edit changes nothing. The picture
 * reference is taken as given.
 */
export async function editRecipe(
  recipeId: number,
  input: EditRecipeInput,
  db: Database,
  logger: AppLogger,
): Promise<Recipe> {
  const scopedLogger = logger.child({ scope: "recipe-service", recipeId });
  const changes = validateInput(
    editRecipeSchema,
    input,
    scopedLogger,
    "Recipe edit validation failed",
  );

  const [duplicate] = await db
    .select({ id: recipe_schema.id })
    .from(recipe_schema)
    .where(
      and(eq(recipe_schema.title, changes.title), ne(recipe_schema.id, recipeId)),
    );
  if (duplicate) {
    throw new ConstraintViolation(TITLE_UNIQUE_CONSTRAINT, {
      message: `A recipe titled "${changes.title}" already exists`,
    });
  }

  const [recipe] = await db
    .update(recipe_schema)
    .set({
      title: changes.title,
      description: changes.description,
      directions: changes.directions,
      minutes_to_make: changes.minutesToMake,
      picture: changes.picture,
    })
    .where(eq(recipe_schema.id, recipeId))
    .returning()
    .catch((error) => {
      throw translateDriverError(error);
    });
  if (!recipe) throw new NotFound("recipe", recipeId);

  scopedLogger.info("Recipe edited");
  return recipe;
}

/**
 * Recipes with their mean rating, best first. Recipes nobody rated sort
 * last; equal averages fall back to publication order (ascending id).
 *
 * An unknown `category` raises NotFound so the caller can fall back to the
 * unfiltered listing.
 */
export async function listRecipes(
  input: ListRecipesInput,
  db: Database,
  logger: AppLogger,
): Promise<RecipeWithRating[]> {
  const scopedLogger = logger.child({ scope: "recipe-service" });
  const { category: categoryName } = validateInput(
    listRecipesSchema,
    input,
    scopedLogger,
    "Recipe listing filter rejected",
  );

  let recipeIds: number[] | undefined;
  if (categoryName !== undefined) {
    const category = await CategoryService.getCategoryByName(categoryName, db);
    const tagged = await CategoryService.recipesByCategory(category, db);
    recipeIds = tagged.map((recipe) => recipe.id);
    if (recipeIds.length === 0) return [];
  }

  const avgRating = avg(rating_schema.value);
  const rows = await db
    .select({ recipe: getTableColumns(recipe_schema), avgRating })
    .from(recipe_schema)
    .leftJoin(rating_schema, eq(rating_schema.recipe_id, recipe_schema.id))
    .where(recipeIds ? inArray(recipe_schema.id, recipeIds) : undefined)
    .groupBy(recipe_schema.id)
    .orderBy(sql`${avgRating} DESC NULLS LAST`, asc(recipe_schema.id));

  scopedLogger.debug(
    { category: categoryName, count: rows.length },
    "Listed recipes",
  );
  return rows.map(({ recipe, avgRating }) => ({
    ...recipe,
    avgRating: RatingService.toAverage(avgRating),
  }));
}

export async function getRecipeById(
  recipeId: number,
  db: Database,
): Promise<Recipe> {
  const [recipe] = await db
    .select()
    .from(recipe_schema)
    .where(eq(recipe_schema.id, recipeId));
  if (!recipe) throw new NotFound("recipe", recipeId);

  return recipe;
}

/** Everything the detail page shows: ingredients in entry order, categories by name. */
export async function getRecipeView(
  recipeId: number,
  db: Database,
): Promise<RecipeView> {
  const recipe = await getRecipeById(recipeId, db);
  const ingredients = await db
    .select()
    .from(ingredient_schema)
    .where(eq(ingredient_schema.recipe_id, recipeId))
    .orderBy(asc(ingredient_schema.id));
  const rating = await RatingService.averageRatingOf(recipeId, db);
  const categories = await CategoryService.categoriesOfRecipe(recipeId, db);

  return { recipe, ingredients, rating, categories };
}

/** Deletes a recipe; ingredients, comments, ratings and category links go with it. */
export async function deleteRecipe(
  recipeId: number,
  db: Database,
  logger: AppLogger,
): Promise<void> {
  const [deleted] = await db
    .delete(recipe_schema)
    .where(eq(recipe_schema.id, recipeId))
    .returning({ id: recipe_schema.id });
  if (!deleted) throw new NotFound("recipe", recipeId);

  logger.child({ scope: "recipe-service", recipeId }).info("Recipe deleted");
}
