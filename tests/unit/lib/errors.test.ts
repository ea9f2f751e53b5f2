import { describe, it, expect } from "vitest";
import { z } from "zod";
import { AppError, fromZodError, parseWith } from "../../../src/lib/errors";

const schema = z.object({
  name: z.string().trim().min(1),
  cooking_time: z.number(),
  tags: z.array(z.string()).min(1),
});

const failure = (value: unknown) => {
  const parsed = schema.safeParse(value);
  if (parsed.success) throw new Error("expected a parse failure");
  return fromZodError(parsed.error);
};

describe("fromZodError", () => {
  it("reports an absent field as missing", () => {
    const error = failure({ cooking_time: 5, tags: ["1"] });
    expect(error.kind).toBe("MissingField");
    expect(error.field).toBe("name");
    expect(error.message).toBe("name: this field is required.");
  });

  it("reports blank strings and empty lists as missing", () => {
    expect(failure({ name: "   ", cooking_time: 5, tags: ["1"] }).kind).toBe("MissingField");
    expect(failure({ name: "Soup", cooking_time: 5, tags: [] }).kind).toBe("MissingField");
  });

  it("reports a wrong type as invalid", () => {
    const error = failure({ name: "Soup", cooking_time: "soon", tags: ["1"] });
    expect(error.kind).toBe("InvalidField");
    expect(error.field).toBe("cooking_time");
  });
});

describe("AppError", () => {
  it("maps kinds to HTTP statuses", () => {
    expect(new AppError("DuplicateReference", "x").status).toBe(400);
    expect(new AppError("Unauthenticated", "x").status).toBe(401);
    expect(new AppError("Forbidden", "x").status).toBe(403);
    expect(new AppError("NotFound", "x").status).toBe(404);
  });

  it("serializes the field only when set", () => {
    expect(new AppError("InvalidField", "tags: bad", "tags").toJSON()).toEqual({
      error: "tags: bad",
      code: "InvalidField",
      field: "tags",
    });
    expect(new AppError("NotFound", "Recipe not found.").toJSON()).toEqual({
      error: "Recipe not found.",
      code: "NotFound",
    });
  });
});

describe("parseWith", () => {
  it("returns the parsed value", () => {
    expect(parseWith(schema, { name: " Soup ", cooking_time: 5, tags: ["1"] })).toEqual({
      name: "Soup",
      cooking_time: 5,
      tags: ["1"],
    });
  });
});
