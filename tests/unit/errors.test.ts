import { describe, expect, it } from "vitest";
import * as z from "zod";
import {
  ConstraintViolation,
  InvalidValue,
  NotFound,
  toProblemDetails,
  translateDriverError,
} from "../../errors";
import { createRecipeSchema } from "../../recipe/schema";
import { findDriverError } from "../../utils";

function invalidRecipe(): InvalidValue {
  const parsed = createRecipeSchema.safeParse({
    title: "Pancakes",
    description: "Fluffy",
    directions: "Fry",
    minutesToMake: 10,
    ingredients: [{ amount: "1.234", description: "milk" }],
  });
  if (parsed.success) throw new Error("expected the recipe to be rejected");

  return new InvalidValue(parsed.error);
}

describe("InvalidValue", () => {
  it("keys one message per violated field by its dotted path", () => {
    expect(invalidRecipe().fields).toEqual({
      "ingredients.0.amount":
        "Enter a number with at most 8 digits before and 2 after the decimal point",
    });
  });

  it("uses 'input' for issues on the value itself", () => {
    const parsed = z.object({ name: z.string() }).safeParse(null);
    if (parsed.success) throw new Error("expected null to be rejected");

    expect(Object.keys(new InvalidValue(parsed.error).fields)).toEqual(["input"]);
  });
});

describe("toProblemDetails", () => {
  it("maps InvalidValue to 422 with the field messages", () => {
    expect(toProblemDetails(invalidRecipe(), "/recipes").toResponse()).toEqual({
      type: "https://potluck.dev/problems/invalid-value",
      title: "Invalid value",
      status: 422,
      instance: "/recipes",
      issues: {
        "ingredients.0.amount":
          "Enter a number with at most 8 digits before and 2 after the decimal point",
      },
    });
  });

  it("maps NotFound to 404", () => {
    expect(toProblemDetails(new NotFound("recipe", 12)).toResponse()).toEqual({
      type: "https://potluck.dev/problems/not-found",
      title: "Not found",
      status: 404,
      detail: "No recipe matches 12",
      entity: "recipe",
    });
  });

  it("maps ConstraintViolation to 409", () => {
    const error = new ConstraintViolation("recipes_title_unique", {
      message: 'A recipe titled "Pancakes" already exists',
    });

    expect(toProblemDetails(error).toResponse()).toEqual({
      type: "https://potluck.dev/problems/constraint-violation",
      title: "Conflict",
      status: 409,
      detail: 'A recipe titled "Pancakes" already exists',
      constraint: "recipes_title_unique",
    });
  });

  it("hides unexpected errors behind a 500", () => {
    expect(
      toProblemDetails(new Error("connection reset"), "/recipes/1").toResponse(),
    ).toEqual({
      type: "about:blank",
      title: "Internal server error",
      status: 500,
      instance: "/recipes/1",
    });
  });
});

describe("translateDriverError", () => {
  const uniqueViolation = Object.assign(new Error("duplicate key value"), {
    code: "23505",
    constraint: "recipes_title_unique",
    detail: "Key (title)=(Pancakes) already exists.",
  });

  it("finds the driver error behind a query wrapper", () => {
    const wrapped = new Error("Failed query: insert into recipes", {
      cause: uniqueViolation,
    });

    expect(findDriverError(wrapped)).toBe(uniqueViolation);
    const translated = translateDriverError(wrapped);
    expect(translated).toBeInstanceOf(ConstraintViolation);
    expect(translated instanceof ConstraintViolation && translated.constraint).toBe(
      "recipes_title_unique",
    );
    expect(translated instanceof Error && translated.message).toBe(
      "Key (title)=(Pancakes) already exists.",
    );
  });

  it("treats foreign key rejections as constraint violations", () => {
    const fkViolation = Object.assign(new Error("violates foreign key"), {
      code: "23503",
    });

    const translated = translateDriverError(fkViolation);
    expect(translated instanceof ConstraintViolation && translated.constraint).toBe(
      "23503",
    );
  });

  it("passes other errors through untouched", () => {
    const checkViolation = Object.assign(new Error("violates check"), {
      code: "23514",
    });
    const notFound = new NotFound("category", "brunch");

    expect(translateDriverError(checkViolation)).toBe(checkViolation);
    expect(translateDriverError(notFound)).toBe(notFound);
  });
});
