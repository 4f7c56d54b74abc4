import { sql, type SQL } from "drizzle-orm";
import { checkings, users } from "../../shared/schema.js";
import { aliasedColumns, aliasedFrom, columnSql, type ColumnMap } from "./filterUtils.js";

export interface CheckingRequest {
  requestedOn: Date;
  user: { nickname: string } | null;
}

export interface LastRequest {
  lastRequestedOn: Date | null;
  lastRequestedBy: string | null;
}

/** Latest checking request on a product, mirrored by {@link lastRequestedBySql} and {@link lastRequestedOnSql}. */
export function summarizeLastRequest(requests: readonly CheckingRequest[]): LastRequest {
  let latest: CheckingRequest | undefined;
  for (const request of requests) {
    if (!latest || request.requestedOn.getTime() > latest.requestedOn.getTime()) latest = request;
  }
  return {
    lastRequestedOn: latest?.requestedOn ?? null,
    lastRequestedBy: latest?.user?.nickname ?? null,
  };
}

/** Raw driver text: relational `extras` drop any `mapWith` decoder, see {@link decodeRequestedOn}. */
export function lastRequestedOnSql(columns: ColumnMap): SQL<string | null> {
  const checking = aliasedColumns(checkings, "lr_checking");
  return sql<string | null>`(select max(${columnSql(checking, "requested_on")}) from ${aliasedFrom(checkings, "lr_checking")} where ${columnSql(checking, "product_id")} = ${columnSql(columns, "id")})`;
}

export function decodeRequestedOn(value: string | null): Date | null {
  return value === null ? null : checkings.requestedOn.mapFromDriverValue(value);
}

export function lastRequestedBySql(columns: ColumnMap): SQL<string | null> {
  const checking = aliasedColumns(checkings, "lr_checking");
  const user = aliasedColumns(users, "lr_user");
  return sql<string | null>`(select ${columnSql(user, "nickname")} from ${aliasedFrom(checkings, "lr_checking")} join ${aliasedFrom(users, "lr_user")} on ${columnSql(user, "id")} = ${columnSql(checking, "user_id")} where ${columnSql(checking, "product_id")} = ${columnSql(columns, "id")} order by ${columnSql(checking, "requested_on")} desc limit 1)`;
}
