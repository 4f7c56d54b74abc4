import { count, getTableColumns, type SQL } from "drizzle-orm";
import type { PgTable } from "drizzle-orm/pg-core";
import { db } from "../config/database.js";
import { FOREIGN_KEY_VIOLATION, conflict, isDatabaseError } from "../middleware/errorHandler.js";
import { buildFilterCondition, type FilterTarget, type Filters } from "./filterUtils.js";

export async function countRows(table: PgTable, where?: SQL): Promise<number> {
  const [row] = await db.select({ total: count() }).from(table).where(where);
  return row?.total ?? 0;
}

/** Number of rows of the target's table matching the filters. */
export async function countMatching(target: FilterTarget, filters: Filters): Promise<number> {
  return countRows(target.table, buildFilterCondition(target, getTableColumns(target.table), filters));
}

/**
 * Runs a delete, turning a restricting foreign key into a 409 with the
 * given detail.
 */
export async function deleteOrConflict<T>(run: () => Promise<T>, referencedDetail: string): Promise<T> {
  try {
    return await run();
  } catch (error) {
    if (isDatabaseError(error) && error.code === FOREIGN_KEY_VIOLATION) {
      throw conflict(referencedDetail);
    }
    throw error;
  }
}

/** drizzle refuses an update without values; PATCH bodies may be empty. */
export function hasChanges(data: object): boolean {
  return Object.values(data).some((value) => value !== undefined);
}
