import { sql } from "drizzle-orm";
import {
  pgTable,
  serial,
  text,
  varchar,
  integer,
  numeric,
  date,
  timestamp,
  unique,
  primaryKey,
  check,
} from "drizzle-orm/pg-core";
import { MeasurementUnits } from "../recipe/type";

export const user_schema = pgTable("users", {
  id: serial("id").primaryKey(),
  username: varchar("username", { length: 150 }).notNull().unique(),
  created_at: timestamp("created_at")
    .notNull()
    .default(sql`now()`),
});

export const category_schema = pgTable("categories", {
  id: serial("id").primaryKey(),
  name: varchar("name", { length: 16 }).notNull().unique(),
});

export const recipe_schema = pgTable(
  "recipes",
  {
    id: serial("id").primaryKey(),
    title: varchar("title", { length: 64 }).notNull().unique(),
    author_id: integer("author_id")
      .references(() => user_schema.id, { onDelete: "cascade" })
      .notNull(),
    description: varchar("description", { length: 512 }).notNull(),
    directions: varchar("directions", { length: 65536 }).notNull(),
    publication_date: date("publication_date", { mode: "string" })
      .notNull()
      .default(sql`CURRENT_DATE`),
    minutes_to_make: integer("minutes_to_make").notNull(),
    /** Opaque reference to the uploaded picture; storage lives elsewhere. */
    picture: text("picture"),
  },
  (table) => ({
    minutesToMakePositive: check(
      "recipes_minutes_to_make_check",
      sql`${table.minutes_to_make} >= 1`,
    ),
  }),
);

export const recipe_category_schema = pgTable(
  "recipe_categories",
  {
    recipe_id: integer("recipe_id")
      .references(() => recipe_schema.id, { onDelete: "cascade" })
      .notNull(),
    category_id: integer("category_id")
      .references(() => category_schema.id, { onDelete: "cascade" })
      .notNull(),
  },
  (table) => ({
    pk: primaryKey({ columns: [table.recipe_id, table.category_id] }),
  }),
);

export const ingredient_schema = pgTable(
  "ingredients",
  {
    id: serial("id").primaryKey(),
    recipe_id: integer("recipe_id")
      .references(() => recipe_schema.id, { onDelete: "cascade" })
      .notNull(),
    amount: numeric("amount", { precision: 10, scale: 2 }).notNull(),
    unit: varchar("unit", { length: 11, enum: MeasurementUnits })
      .notNull()
      .default("Whole"),
    description: varchar("description", { length: 64 }).notNull(),
  },
  (table) => ({
    amountPositive: check(
      "ingredients_amount_check",
      sql`${table.amount} >= 0.0001`,
    ),
  }),
);

export const comment_schema = pgTable("comments", {
  id: serial("id").primaryKey(),
  author_id: integer("author_id")
    .references(() => user_schema.id, { onDelete: "cascade" })
    .notNull(),
  recipe_id: integer("recipe_id")
    .references(() => recipe_schema.id, { onDelete: "cascade" })
    .notNull(),
  publication_date: date("publication_date", { mode: "string" })
    .notNull()
    .default(sql`CURRENT_DATE`),
  text: varchar("text", { length: 512 }).notNull(),
});

export const rating_schema = pgTable(
  "ratings",
  {
    id: serial("id").primaryKey(),
    author_id: integer("author_id")
      .references(() => user_schema.id, { onDelete: "cascade" })
      .notNull(),
    recipe_id: integer("recipe_id")
      .references(() => recipe_schema.id, { onDelete: "cascade" })
      .notNull(),
    value: integer("value").notNull(),
  },
  (table) => ({
    oneRatingPerAuthor: unique("ratings_author_id_recipe_id_unique").on(
      table.author_id,
      table.recipe_id,
    ),
    valueInRange: check(
      "ratings_value_check",
      sql`${table.value} BETWEEN 1 AND 5`,
    ),
  }),
);
