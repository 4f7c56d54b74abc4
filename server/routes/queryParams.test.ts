import assert from "node:assert/strict";
import test from "node:test";
import { z, ZodError } from "zod";
import {
  bool,
  date,
  int,
  intList,
  numRange,
  oneOf,
  pageRequestSchema,
  parseId,
  parseListQuery,
  text,
  textList,
} from "./queryParams.js";

const productFilters = z.object({
  name__contains: text(),
  status: oneOf(["VEGAN", "NON_VEGAN", "MAYBE_VEGAN", "NOT_FOUND"]),
  state__in: textList(),
  brand_id: int(),
  biodynamic: bool(),
  created_at__gt: date(),
});

test("paging defaults to the first page of five", () => {
  assert.deepEqual(pageRequestSchema.parse({}), {
    page: 1,
    size: 5,
    sortBy: undefined,
    descending: false,
  });
});

test("paging reads page, page_size, sortby and direction", () => {
  assert.deepEqual(pageRequestSchema.parse({ page: "3", page_size: "20", sortby: "name", direction: "DESC" }), {
    page: 3,
    size: 20,
    sortBy: "name",
    descending: true,
  });
  assert.equal(pageRequestSchema.parse({ direction: "asc" }).descending, false);
  assert.equal(pageRequestSchema.parse({ direction: "sideways" }).descending, false);
});

test("paging rejects out of range values", () => {
  assert.throws(() => pageRequestSchema.parse({ page: "0" }), ZodError);
  assert.throws(() => pageRequestSchema.parse({ page_size: "101" }), ZodError);
  assert.throws(() => pageRequestSchema.parse({ page_size: "abc" }), ZodError);
});

test("filters are coerced and unknown keys dropped", () => {
  const { page, filters } = parseListQuery(
    {
      page: "2",
      name__contains: "oat",
      status: "VEGAN",
      brand_id: "7",
      biodynamic: "1",
      created_at__gt: "2024-01-15",
      something_else: "ignored",
    },
    productFilters,
  );

  assert.equal(page.page, 2);
  assert.deepEqual(filters, {
    name__contains: "oat",
    status: "VEGAN",
    brand_id: 7,
    biodynamic: true,
    created_at__gt: new Date("2024-01-15"),
  });
});

test("list filters accept repeated and comma separated values", () => {
  assert.deepEqual(productFilters.parse({ state__in: ["CREATED", "PUBLISHED"] }).state__in, ["CREATED", "PUBLISHED"]);
  assert.deepEqual(productFilters.parse({ state__in: "CREATED, PUBLISHED" }).state__in, ["CREATED", "PUBLISHED"]);
  assert.deepEqual(z.object({ ids: intList() }).parse({ ids: ["1,2", "3"] }).ids, [1, 2, 3]);
});

test("boolean filters understand true, false, 1 and 0", () => {
  const schema = z.object({ flag: bool() });
  assert.equal(schema.parse({ flag: "true" }).flag, true);
  assert.equal(schema.parse({ flag: "FALSE" }).flag, false);
  assert.equal(schema.parse({ flag: "0" }).flag, false);
  assert.throws(() => schema.parse({ flag: "maybe" }), ZodError);
});

test("enum filters reject unknown values", () => {
  assert.throws(() => productFilters.parse({ status: "ALMOST_VEGAN" }), ZodError);
});

test("repeated scalar filters keep the first value", () => {
  assert.equal(productFilters.parse({ name__contains: ["oat", "soy"] }).name__contains, "oat");
});

test("ranges need exactly two numbers", () => {
  const schema = z.object({ score__between: numRange() });
  assert.deepEqual(schema.parse({ score__between: "1,4" }).score__between, [1, 4]);
  assert.throws(() => schema.parse({ score__between: "1" }), ZodError);
});

test("parseId accepts positive integers only", () => {
  assert.equal(parseId("12"), 12);
  assert.throws(() => parseId("abc"), ZodError);
  assert.throws(() => parseId("-1"), ZodError);
});
