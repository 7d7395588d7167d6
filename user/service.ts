import { eq } from "drizzle-orm";
import type { Database } from "../db";
import { user_schema } from "../db/schema";
import type { AppLogger } from "../logger";
import { NotFound, translateDriverError, validateInput } from "../errors";
import { ensureDefined } from "../utils";
import { createUserSchema, type CreateUserInput } from "./schema";
import type { User } from "./type";

/**
 * Registers an author. Credentials and sessions belong to the auth layer;
 * this only reserves the username so content can reference it.
 */
export async function createUser(
  input: CreateUserInput,
  db: Database,
  logger: AppLogger,
): Promise<User> {
  const scopedLogger = logger.child({ scope: "user-service" });
  const { username } = validateInput(
    createUserSchema,
    input,
    scopedLogger,
    "User input validation failed",
  );

  const [user] = await db
    .insert(user_schema)
    .values({ username })
    .returning()
    .catch((error) => {
      throw translateDriverError(error);
    });
  ensureDefined(user, "Failed to persist user");

  scopedLogger.info({ userId: user.id }, "User created");
  return user;
}

export async function getUserById(id: number, db: Database): Promise<User> {
  const [user] = await db
    .select()
    .from(user_schema)
    .where(eq(user_schema.id, id));
  if (!user) throw new NotFound("user", id);

  return user;
}
