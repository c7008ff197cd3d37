import express from "express";
import request from "supertest";
import { describe, expect, it } from "vitest";
import { z } from "zod";
import { errorHandler, notFound } from "../src/middleware/error.js";
import { isUniqueViolation } from "../src/utils/db-errors.js";
import { DuplicateError, NotFoundError, PermissionError, ValidationError } from "../src/utils/errors.js";

const buildApp = (error: unknown) => {
  const app = express();
  app.get("/boom", (_req, _res, next) => next(error));
  app.use(notFound);
  app.use(errorHandler);
  return app;
};

describe("error handler", () => {
  it("scopes validation errors to their field", async () => {
    const response = await request(buildApp(new ValidationError("cookingTime", "Too long."))).get("/boom");

    expect(response.status).toBe(400);
    expect(response.body).toEqual({
      message: "Too long.",
      field: "cookingTime",
      errors: { cookingTime: ["Too long."] },
    });
  });

  it("maps domain errors to their status", async () => {
    const duplicate = await request(buildApp(new DuplicateError("Already there."))).get("/boom");
    const missing = await request(buildApp(new NotFoundError("Recipe not found."))).get("/boom");
    const denied = await request(buildApp(new PermissionError("No."))).get("/boom");

    expect(duplicate.status).toBe(400);
    expect(duplicate.body).toEqual({ message: "Already there." });
    expect(missing.status).toBe(404);
    expect(denied.status).toBe(403);
  });

  it("reports zod failures as validation failures", async () => {
    const parsed = z.object({ name: z.string() }).safeParse({});
    const error = parsed.success ? new Error("unreachable") : parsed.error;

    const response = await request(buildApp(error)).get("/boom");

    expect(response.status).toBe(400);
    expect(response.body.message).toBe("Validation failed.");
    expect(response.body.issues[0].path).toEqual(["name"]);
  });

  it("answers unknown routes with 404", async () => {
    const response = await request(buildApp(new Error("unused"))).get("/nowhere");

    expect(response.status).toBe(404);
    expect(response.body).toEqual({ message: "Resource not found." });
  });
});

describe("isUniqueViolation", () => {
  it("matches the constraint on the error or its cause", () => {
    const driverError = { code: "23505", constraint: "recipes_short_link_unique" };
    const wrapped = new Error("Failed query", { cause: driverError });

    expect(isUniqueViolation(driverError)).toBe(true);
    expect(isUniqueViolation(wrapped, "recipes_short_link_unique")).toBe(true);
    expect(isUniqueViolation(wrapped, "users_email_unique")).toBe(false);
  });

  it("ignores other database errors", () => {
    expect(isUniqueViolation({ code: "23514", constraint: "recipes_cooking_time_range" })).toBe(false);
    expect(isUniqueViolation(new Error("connection lost"))).toBe(false);
  });
});
