import { asc, eq } from "drizzle-orm";
import type { Database } from "../db";
import { comment_schema, recipe_schema } from "../db/schema";
import type { AppLogger } from "../logger";
import { NotFound, translateDriverError, validateInput } from "../errors";
import { ensureDefined } from "../utils";
import { getUserById } from "../user/service";
import { addCommentSchema, type AddCommentInput } from "./schema";
import type { Comment } from "./type";

export async function addComment(
  params: { authorId: number; recipeId: number },
  input: AddCommentInput,
  db: Database,
  logger: AppLogger,
): Promise<Comment> {
  const { authorId, recipeId } = params;
  const scopedLogger = logger.child({
    scope: "comment-service",
    recipeId,
    authorId,
  });
  const { text } = validateInput(
    addCommentSchema,
    input,
    scopedLogger,
    "Comment validation failed",
  );

  const [recipe] = await db
    .select({ id: recipe_schema.id })
    .from(recipe_schema)
    .where(eq(recipe_schema.id, recipeId));
  if (!recipe) throw new NotFound("recipe", recipeId);
  await getUserById(authorId, db);

  const [comment] = await db
    .insert(comment_schema)
    .values({ author_id: authorId, recipe_id: recipeId, text })
    .returning()
    .catch((error) => {
      throw translateDriverError(error);
    });
  ensureDefined(comment, "Failed to persist comment");

  scopedLogger.info({ commentId: comment.id }, "Comment added");
  return comment;
}

/** Comments on a recipe, oldest first. */
export async function listComments(
  recipeId: number,
  db: Database,
): Promise<Comment[]> {
  return await db
    .select()
    .from(comment_schema)
    .where(eq(comment_schema.recipe_id, recipeId))
    .orderBy(asc(comment_schema.publication_date), asc(comment_schema.id));
}
