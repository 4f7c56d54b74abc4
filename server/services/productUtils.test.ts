import assert from "node:assert/strict";
import test from "node:test";
import { getTableColumns } from "drizzle-orm";
import { PgDialect } from "drizzle-orm/pg-core";
import { products } from "../../shared/schema.js";
import { decodeRequestedOn, lastRequestedBySql, lastRequestedOnSql, summarizeLastRequest } from "./productUtils.js";

const dialect = new PgDialect();

test("summarizeLastRequest keeps the latest request", () => {
  const summary = summarizeLastRequest([
    { requestedOn: new Date("2024-03-01T10:00:00Z"), user: { nickname: "early" } },
    { requestedOn: new Date("2024-05-12T08:30:00Z"), user: { nickname: "late" } },
    { requestedOn: new Date("2024-04-20T00:00:00Z"), user: null },
  ]);
  assert.deepEqual(summary, {
    lastRequestedOn: new Date("2024-05-12T08:30:00Z"),
    lastRequestedBy: "late",
  });
});

test("summarizeLastRequest is empty without requests", () => {
  assert.deepEqual(summarizeLastRequest([]), { lastRequestedOn: null, lastRequestedBy: null });
});

test("lastRequestedOnSql selects the newest request date for the product", () => {
  const query = dialect.sqlToQuery(lastRequestedOnSql(getTableColumns(products)));
  assert.equal(
    query.sql,
    '(select max("lr_checking"."requested_on") from "checkings" "lr_checking" where "lr_checking"."product_id" = "products"."id")',
  );
});

test("lastRequestedBySql joins the requesting user", () => {
  const query = dialect.sqlToQuery(lastRequestedBySql(getTableColumns(products)));
  assert.equal(
    query.sql,
    '(select "lr_user"."nickname" from "checkings" "lr_checking" join "users" "lr_user" on "lr_user"."id" = "lr_checking"."user_id" ' +
      'where "lr_checking"."product_id" = "products"."id" order by "lr_checking"."requested_on" desc limit 1)',
  );
});

test("decodeRequestedOn reads the driver's timestamp text as UTC", () => {
  assert.deepEqual(decodeRequestedOn("2024-05-12 08:30:00"), new Date("2024-05-12T08:30:00Z"));
  assert.equal(decodeRequestedOn(null), null);
});
