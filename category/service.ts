import { asc, eq, getTableColumns } from "drizzle-orm";
import type { Database } from "../db";
import {
  category_schema,
  recipe_category_schema,
  recipe_schema,
} from "../db/schema";
import type { AppLogger } from "../logger";
import {
  ConstraintViolation,
  NotFound,
  translateDriverError,
  validateInput,
} from "../errors";
import { ensureDefined } from "../utils";
import type { Recipe } from "../recipe/type";
import { createCategorySchema, type CreateCategoryInput } from "./schema";
import type { Category } from "./type";

export async function createCategory(
  input: CreateCategoryInput,
  db: Database,
  logger: AppLogger,
): Promise<Category> {
  const scopedLogger = logger.child({ scope: "category-service" });
  const { name } = validateInput(
    createCategorySchema,
    input,
    scopedLogger,
    "Category input validation failed",
  );

  const existing = await findCategoryByName(name, db);
  if (existing) {
    throw new ConstraintViolation("categories_name_unique", {
      message: `Category "${name}" already exists`,
    });
  }

  const [category] = await db
    .insert(category_schema)
    .values({ name })
    .returning()
    .catch((error) => {
      throw translateDriverError(error);
    });
  ensureDefined(category, "Failed to persist category");

  scopedLogger.info({ categoryId: category.id, name }, "Category created");
  return category;
}

export async function findCategoryByName(
  name: string,
  db: Database,
): Promise<Category | null> {
  const [category] = await db
    .select()
    .from(category_schema)
    .where(eq(category_schema.name, name));

  return category ?? null;
}

export async function getCategoryByName(
  name: string,
  db: Database,
): Promise<Category> {
  const category = await findCategoryByName(name, db);
  if (!category) throw new NotFound("category", name);

  return category;
}

export async function listCategories(db: Database): Promise<Category[]> {
  return await db
    .select()
    .from(category_schema)
    .orderBy(asc(category_schema.name));
}

/** Recipes tagged with `category`, oldest first. Read-only. */
export async function recipesByCategory(
  category: Category,
  db: Database,
): Promise<Recipe[]> {
  return await db
    .select(getTableColumns(recipe_schema))
    .from(recipe_schema)
    .innerJoin(
      recipe_category_schema,
      eq(recipe_category_schema.recipe_id, recipe_schema.id),
    )
    .where(eq(recipe_category_schema.category_id, category.id))
    .orderBy(asc(recipe_schema.id));
}

/** Categories of one recipe, by name. */
export async function categoriesOfRecipe(
  recipeId: number,
  db: Database,
): Promise<Category[]> {
  return await db
    .select({ id: category_schema.id, name: category_schema.name })
    .from(category_schema)
    .innerJoin(
      recipe_category_schema,
      eq(recipe_category_schema.category_id, category_schema.id),
    )
    .where(eq(recipe_category_schema.recipe_id, recipeId))
    .orderBy(asc(category_schema.name));
}
