import { sql, type SQL } from "drizzle-orm";
import { interestingProducts } from "../../shared/schema.js";
import { aliasedColumns, aliasedFrom, columnSql, type ColumnMap } from "./filterUtils.js";

/** Interesting products filed under the category, correlated on its id column. */
export function interestingCountSql(columns: ColumnMap): SQL<number> {
  const product = aliasedColumns(interestingProducts, "ip_count");
  return sql<number>`(select count(*)::int from ${aliasedFrom(interestingProducts, "ip_count")} where ${columnSql(product, "category_id")} = ${columnSql(columns, "id")})`;
}
