import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { eq } from "drizzle-orm";
import { rating_schema } from "../../../db/schema";
import { NotFound } from "../../../errors";
import { createCategory } from "../../../category/service";
import { rateRecipe } from "../../../rating/service";
import { createRecipe, listRecipes } from "../../../recipe/service";
import { createUser } from "../../../user/service";
import type { User } from "../../../user/type";
import {
  createTestDatabase,
  makeRecipeInput,
  silentLogger,
  type TestDatabase,
} from "../../helpers/db";

describe("listRecipes", () => {
  let testDb: TestDatabase;
  let alice: User;
  let bob: User;

  beforeEach(async () => {
    testDb = await createTestDatabase();
    alice = await createUser({ username: "alice" }, testDb.db, silentLogger);
    bob = await createUser({ username: "bob" }, testDb.db, silentLogger);
  });

  afterEach(async () => {
    await testDb.close();
  });

  async function publish(title: string, author: User, categories: string[] = []) {
    const { recipe } = await createRecipe(
      author.id,
      makeRecipeInput({ title, categories }),
      testDb.db,
      silentLogger,
    );
    return recipe;
  }

  it("orders recipes by descending mean rating", async () => {
    const waffles = await publish("Waffles", bob);
    const pancakes = await publish("Pancakes", alice);
    // Pancakes: seed 5 + bob's 4. Waffles: bob's seed replaced by 3.
    await rateRecipe(
      { authorId: bob.id, recipeId: pancakes.id, value: 4 },
      testDb.db,
      silentLogger,
    );
    await rateRecipe(
      { authorId: bob.id, recipeId: waffles.id, value: 3 },
      testDb.db,
      silentLogger,
    );

    const listed = await listRecipes({}, testDb.db, silentLogger);

    expect(listed.map(({ title, avgRating }) => ({ title, avgRating }))).toEqual([
      { title: "Pancakes", avgRating: 4.5 },
      { title: "Waffles", avgRating: 3 },
    ]);
  });

  it("breaks ties by publication order", async () => {
    const first = await publish("Shakshuka", alice);
    const second = await publish("Risotto", bob);

    const listed = await listRecipes({}, testDb.db, silentLogger);

    expect(listed.map((recipe) => recipe.id)).toEqual([first.id, second.id]);
    expect(listed.map((recipe) => recipe.avgRating)).toEqual([5, 5]);
  });

  it("puts recipes without ratings last", async () => {
    const unrated = await publish("Porridge", alice);
    await testDb.db
      .delete(rating_schema)
      .where(eq(rating_schema.recipe_id, unrated.id));
    const rated = await publish("Granola", bob);
    await rateRecipe(
      { authorId: bob.id, recipeId: rated.id, value: 1 },
      testDb.db,
      silentLogger,
    );

    const listed = await listRecipes({}, testDb.db, silentLogger);

    expect(listed.map(({ title, avgRating }) => ({ title, avgRating }))).toEqual([
      { title: "Granola", avgRating: 1 },
      { title: "Porridge", avgRating: null },
    ]);
  });

  it("never places a lower mean before a higher one", async () => {
    const titles = ["Soup", "Salad", "Stew", "Curry"];
    const scores = [2, 4, 1, 3];
    for (const [index, title] of titles.entries()) {
      const recipe = await publish(title, alice);
      await rateRecipe(
        { authorId: alice.id, recipeId: recipe.id, value: scores[index] ?? 5 },
        testDb.db,
        silentLogger,
      );
    }

    const means = (await listRecipes({}, testDb.db, silentLogger)).map(
      (recipe) => recipe.avgRating ?? 0,
    );

    expect(means).toEqual([4, 3, 2, 1]);
  });

  it("restricts the listing to one category", async () => {
    await createCategory({ name: "breakfast" }, testDb.db, silentLogger);
    await createCategory({ name: "dinner" }, testDb.db, silentLogger);
    const pancakes = await publish("Pancakes", alice, ["breakfast"]);
    await publish("Lasagne", alice, ["dinner"]);
    const omelette = await publish("Omelette", bob, ["breakfast", "dinner"]);
    await rateRecipe(
      { authorId: bob.id, recipeId: pancakes.id, value: 1 },
      testDb.db,
      silentLogger,
    );

    const listed = await listRecipes(
      { category: "breakfast" },
      testDb.db,
      silentLogger,
    );

    expect(listed.map(({ id, avgRating }) => ({ id, avgRating }))).toEqual([
      { id: omelette.id, avgRating: 5 },
      { id: pancakes.id, avgRating: 3 },
    ]);
  });

  it("returns nothing for a category no recipe carries", async () => {
    await createCategory({ name: "dessert" }, testDb.db, silentLogger);
    await publish("Pancakes", alice);

    expect(
      await listRecipes({ category: "dessert" }, testDb.db, silentLogger),
    ).toEqual([]);
  });

  it.each(["", "   "])("lists every recipe for the blank category %j", async (category) => {
    await createCategory({ name: "dinner" }, testDb.db, silentLogger);
    const pancakes = await publish("Pancakes", alice);
    const lasagne = await publish("Lasagne", bob, ["dinner"]);

    const listed = await listRecipes({ category }, testDb.db, silentLogger);

    expect(listed.map((recipe) => recipe.id)).toEqual([pancakes.id, lasagne.id]);
  });

  it("signals an unknown category with NotFound", async () => {
    await publish("Pancakes", alice);

    const error = await listRecipes(
      { category: "brunch" },
      testDb.db,
      silentLogger,
    ).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(NotFound);
    expect(error instanceof NotFound && [error.entity, error.key]).toEqual([
      "category",
      "brunch",
    ]);
  });
});
