import type { InferSelectModel } from "drizzle-orm";
import type { category_schema } from "../db/schema";

export type Category = InferSelectModel<typeof category_schema>;
