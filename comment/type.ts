import type { InferSelectModel } from "drizzle-orm";
import type { comment_schema } from "../db/schema";

export type Comment = InferSelectModel<typeof comment_schema>;
