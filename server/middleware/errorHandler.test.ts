import assert from "node:assert/strict";
import test from "node:test";
import { z } from "zod";
import {
  AppError,
  notFound,
  offendingColumn,
  toProblemDetail,
  translateIntegrityError,
} from "./errorHandler.js";

const brandMessages = {
  unique: { name: "Brand with name Oatly already exists" },
  foreignKey: { parent_id: "Brand with id 9 does not exist" },
};

test("AppError renders as thrown, including extra members", () => {
  const problem = toProblemDetail(
    new AppError(422, "Unprocessable", "Bad shape", "about:blank", { field: "name" }),
    "/api/v1/brands",
  );
  assert.deepEqual(problem, {
    type: "about:blank",
    title: "Unprocessable",
    status: 422,
    detail: "Bad shape",
    instance: "/api/v1/brands",
    field: "name",
  });
});

test("factory helpers set status and title", () => {
  const problem = toProblemDetail(notFound("Brand with id 3 not found"), "/api/v1/brands/3");
  assert.equal(problem.status, 404);
  assert.equal(problem.title, "Not Found");
  assert.equal(problem.detail, "Brand with id 3 not found");
});

test("zod errors become validation problems", () => {
  const result = z.object({ name: z.string() }).safeParse({});
  assert.equal(result.success, false);
  if (result.success) return;

  const problem = toProblemDetail(result.error, "/api/v1/brands");
  assert.equal(problem.status, 400);
  assert.equal(problem.title, "Validation Error");
  assert.deepEqual(problem.errors, result.error.issues);
});

test("untranslated postgres errors map by code", () => {
  assert.equal(toProblemDetail({ code: "23505" }, "/x").status, 409);
  assert.equal(toProblemDetail({ code: "23503" }, "/x").status, 400);
});

test("errors carrying an http status keep it", () => {
  const parseError = Object.assign(new Error("Unexpected token } in JSON"), { status: 400 });
  const problem = toProblemDetail(parseError, "/api/v1/products");
  assert.equal(problem.status, 400);
  assert.equal(problem.title, "Bad Request");
  assert.equal(problem.detail, "Unexpected token } in JSON");
});

test("anything else is an internal error without leaking details", () => {
  const problem = toProblemDetail(new Error("password authentication failed"), "/x");
  assert.equal(problem.status, 500);
  assert.equal(problem.detail, "An unexpected error occurred");
});

test("offendingColumn reads the key from the error detail", () => {
  assert.equal(
    offendingColumn({ code: "23503", detail: 'Key (brand_id)=(12) is not present in table "brands".' }),
    "brand_id",
  );
  assert.equal(offendingColumn({ code: "23503" }), undefined);
});

test("translateIntegrityError uses resource messages for unique violations", () => {
  const translated = translateIntegrityError(
    { code: "23505", detail: "Key (name)=(Oatly) already exists." },
    brandMessages,
  );
  assert.ok(translated instanceof AppError);
  assert.equal(translated.status, 409);
  assert.equal(translated.detail, "Brand with name Oatly already exists");
});

test("translateIntegrityError uses resource messages for foreign keys", () => {
  const translated = translateIntegrityError(
    { code: "23503", detail: 'Key (parent_id)=(9) is not present in table "brands".' },
    brandMessages,
  );
  assert.ok(translated instanceof AppError);
  assert.equal(translated.status, 400);
  assert.equal(translated.detail, "Brand with id 9 does not exist");
});

test("translateIntegrityError falls back to generic details", () => {
  const translated = translateIntegrityError(
    { code: "23503", detail: 'Key (user_id)=(4) is not present in table "users".' },
    brandMessages,
  );
  assert.ok(translated instanceof AppError);
  assert.equal(
    translated.detail,
    'Data integrity error: Key (user_id)=(4) is not present in table "users".',
  );
});

test("translateIntegrityError leaves other errors alone", () => {
  const original = new Error("boom");
  assert.equal(translateIntegrityError(original, brandMessages), original);
  const deadlock = { code: "40P01" };
  assert.equal(translateIntegrityError(deadlock, brandMessages), deadlock);
});
