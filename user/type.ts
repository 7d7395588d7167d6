import type { InferSelectModel } from "drizzle-orm";
import type { user_schema } from "../db/schema";

export type User = InferSelectModel<typeof user_schema>;
