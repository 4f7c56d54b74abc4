import assert from "node:assert/strict";
import test from "node:test";
import { getTableColumns, sql, type SQL } from "drizzle-orm";
import { PgDialect } from "drizzle-orm/pg-core";
import { brands, checkings, errorReports, products, scanEvents } from "../../shared/schema.js";
import { buildFilterCondition, buildOrderBy, parseFilterKey } from "./filterUtils.js";
import {
  brandTarget,
  checkingTarget,
  errorReportTarget,
  productTarget,
  scanEventTarget,
} from "./filterTargets.js";

const dialect = new PgDialect();

function render(condition: SQL | undefined) {
  assert.ok(condition);
  return dialect.sqlToQuery(condition);
}

const productColumns = getTableColumns(products);
const brandColumns = getTableColumns(brands);

test("parseFilterKey reads plain fields as exact matches", () => {
  assert.deepEqual(parseFilterKey("ean"), { relations: [], field: "ean", operator: "exact" });
});

test("parseFilterKey splits field and operator", () => {
  assert.deepEqual(parseFilterKey("name__contains"), { relations: [], field: "name", operator: "contains" });
  assert.deepEqual(parseFilterKey("created_at__year_ge"), {
    relations: [],
    field: "created_at",
    operator: "year_ge",
  });
});

test("parseFilterKey follows relation chains", () => {
  assert.deepEqual(parseFilterKey("brand___name__lookalike"), {
    relations: ["brand"],
    field: "name",
    operator: "lookalike",
  });
  assert.deepEqual(parseFilterKey("parent___parent___name"), {
    relations: ["parent", "parent"],
    field: "name",
    operator: "exact",
  });
});

test("parseFilterKey rejects unknown operators and empty segments", () => {
  assert.equal(parseFilterKey("name__bogus"), null);
  assert.equal(parseFilterKey("___name"), null);
  assert.equal(parseFilterKey("name__"), null);
});

test("contains renders a case-insensitive wildcard match", () => {
  const query = render(buildFilterCondition(productTarget, productColumns, { name__contains: "oat" }));
  assert.equal(query.sql, '"products"."name" ilike $1');
  assert.deepEqual(query.params, ["%oat%"]);
});

test("several filters are combined with and", () => {
  const query = render(
    buildFilterCondition(productTarget, productColumns, { status: "VEGAN", name__ilike: "%oat%" }),
  );
  assert.equal(query.sql, '("products"."status" = $1 and "products"."name" ilike $2)');
  assert.deepEqual(query.params, ["VEGAN", "%oat%"]);
});

test("unknown fields and operators are skipped", () => {
  const condition = buildFilterCondition(productTarget, productColumns, {
    unknown_field: "x",
    name__nope: "y",
    brand___nothing: "z",
  });
  assert.equal(condition, undefined);
});

test("undefined values are ignored", () => {
  const condition = buildFilterCondition(productTarget, productColumns, { name: undefined });
  assert.equal(condition, undefined);
});

test("exact match against null renders is null", () => {
  const query = render(buildFilterCondition(brandTarget, brandColumns, { parent_id: null }));
  assert.equal(query.sql, '"brands"."parent_id" is null');
});

test("isnull switches between is null and is not null", () => {
  assert.equal(
    render(buildFilterCondition(brandTarget, brandColumns, { parent_id__isnull: true })).sql,
    '"brands"."parent_id" is null',
  );
  assert.equal(
    render(buildFilterCondition(brandTarget, brandColumns, { parent_id__isnull: false })).sql,
    '"brands"."parent_id" is not null',
  );
});

test("in renders a parameter list", () => {
  const query = render(
    buildFilterCondition(productTarget, productColumns, { state__in: ["CREATED", "PUBLISHED"] }),
  );
  assert.equal(query.sql, '"products"."state" in ($1, $2)');
  assert.deepEqual(query.params, ["CREATED", "PUBLISHED"]);
});

test("iin lowercases both sides", () => {
  const query = render(buildFilterCondition(brandTarget, brandColumns, { name__iin: ["Oatly", "ALPRO"] }));
  assert.equal(query.sql, 'lower("brands"."name") in ($1, $2)');
  assert.deepEqual(query.params, ["oatly", "alpro"]);
});

test("between needs exactly two values", () => {
  const query = render(buildFilterCondition(productTarget, productColumns, { id__between: [1, 3] }));
  assert.equal(query.sql, '"products"."id" between $1 and $2');
  assert.deepEqual(query.params, [1, 3]);

  assert.equal(buildFilterCondition(productTarget, productColumns, { id__between: [1] }), undefined);
});

test("lookalike compares levenshtein distance on lowercased values", () => {
  const query = render(buildFilterCondition(brandTarget, brandColumns, { name__lookalike: "Alpr" }));
  assert.equal(query.sql, 'levenshtein(lower("brands"."name"), lower($1)) <= $2');
  assert.deepEqual(query.params, ["Alpr", 2]);
});

test("date part operators extract from the column", () => {
  const query = render(buildFilterCondition(productTarget, productColumns, { created_at__year_ge: 2024 }));
  assert.equal(query.sql, 'extract(year from "products"."created_at") >= $1');
  assert.deepEqual(query.params, [2024]);

  const month = render(buildFilterCondition(productTarget, productColumns, { created_at__month: 5 }));
  assert.equal(month.sql, 'extract(month from "products"."created_at") = $1');
});

test("relation filters compile into an exists subquery", () => {
  const query = render(
    buildFilterCondition(productTarget, productColumns, { brand___name__contains: "oat" }),
  );
  assert.equal(
    query.sql,
    'exists (select 1 from "brands" "f_brand" where "products"."brand_id" = "f_brand"."id" and "f_brand"."name" ilike $1)',
  );
  assert.deepEqual(query.params, ["%oat%"]);
});

test("self relations chain through distinct aliases", () => {
  const query = render(buildFilterCondition(brandTarget, brandColumns, { parent___parent___name: "Acme" }));
  assert.equal(
    query.sql,
    'exists (select 1 from "brands" "f_parent" where "brands"."parent_id" = "f_parent"."id" and ' +
      'exists (select 1 from "brands" "f_parent_parent" where "f_parent"."parent_id" = "f_parent_parent"."id" and "f_parent_parent"."name" = $1))',
  );
  assert.deepEqual(query.params, ["Acme"]);
});

test("relations may join on non-key columns", () => {
  const query = render(
    buildFilterCondition(errorReportTarget, getTableColumns(errorReports), { product___status: "VEGAN" }),
  );
  assert.equal(
    query.sql,
    'exists (select 1 from "products" "f_product" where "error_reports"."ean" = "f_product"."ean" and "f_product"."status" = $1)',
  );
});

test("checking filters reach the product by id", () => {
  const query = render(
    buildFilterCondition(checkingTarget, getTableColumns(checkings), { product___ean: "3017620422003" }),
  );
  assert.equal(
    query.sql,
    'exists (select 1 from "products" "f_product" where "checkings"."product_id" = "f_product"."id" and "f_product"."ean" = $1)',
  );
});

test("computed fields are filterable", () => {
  const query = render(buildFilterCondition(brandTarget, brandColumns, { score__ge: 3 }));
  assert.ok(query.sql.startsWith("(select round(avg(per_category.category_average)::numeric, 2)::float8"));
  assert.ok(query.sql.includes('where "bs_score"."brand_id" = "brands"."id"'));
  assert.ok(query.sql.endsWith(") >= $1"));
  assert.deepEqual(query.params, [3]);
});

test("buildOrderBy sorts by the requested field with an id tie-breaker", () => {
  const order = buildOrderBy(brandTarget, brandColumns, { sortBy: "name", descending: true });
  const query = dialect.sqlToQuery(sql.join(order, sql`, `));
  assert.equal(query.sql, '"brands"."name" desc, "brands"."id" desc');
});

test("buildOrderBy falls back to the default sort for unknown fields", () => {
  const order = buildOrderBy(brandTarget, brandColumns, { sortBy: "nope", descending: false });
  assert.equal(dialect.sqlToQuery(sql.join(order, sql`, `)).sql, '"brands"."created_at" asc, "brands"."id" asc');

  const scans = buildOrderBy(scanEventTarget, getTableColumns(scanEvents), { descending: false });
  assert.equal(
    dialect.sqlToQuery(sql.join(scans, sql`, `)).sql,
    '"scan_events"."date_created" asc, "scan_events"."id" asc',
  );
});

test("date values are sent as ISO strings", () => {
  const query = render(
    buildFilterCondition(productTarget, productColumns, { created_at__gt: new Date("2024-01-01T00:00:00Z") }),
  );
  assert.equal(query.sql, '"products"."created_at" > $1');
  assert.deepEqual(query.params, ["2024-01-01T00:00:00.000Z"]);
});
