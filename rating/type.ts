import type { InferSelectModel } from "drizzle-orm";
import type { rating_schema } from "../db/schema";

export type Rating = InferSelectModel<typeof rating_schema>;
