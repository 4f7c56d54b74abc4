import { asc, eq } from "drizzle-orm";
import { db } from "../config/database.js";
import { additives, type Additive, type InsertAdditive } from "../../shared/schema.js";
import { notFound, translateIntegrityError } from "../middleware/errorHandler.js";
import { buildFilterCondition, buildOrderBy, type Filters } from "./filterUtils.js";
import { additiveTarget } from "./filterTargets.js";
import { offsetOf, toPage, type Page, type PageRequest } from "./paginationUtils.js";
import { countMatching, hasChanges } from "./repository.js";

function integrityMessages(data: Partial<InsertAdditive>) {
  return {
    unique: { e_number: `Additive with E number ${data.eNumber} already exists` },
  };
}

export async function listAdditives(): Promise<Additive[]> {
  return db.query.additives.findMany({ orderBy: asc(additives.id) });
}

export async function countAdditives(filters: Filters): Promise<number> {
  return countMatching(additiveTarget, filters);
}

export async function searchAdditives(page: PageRequest, filters: Filters): Promise<Page<Additive>> {
  const [items, total] = await Promise.all([
    db.query.additives.findMany({
      where: (fields) => buildFilterCondition(additiveTarget, fields, filters),
      orderBy: (fields) => buildOrderBy(additiveTarget, fields, page),
      limit: page.size,
      offset: offsetOf(page),
    }),
    countMatching(additiveTarget, filters),
  ]);
  return toPage(items, total, page);
}

export async function getAdditiveById(id: number): Promise<Additive> {
  const additive = await db.query.additives.findFirst({ where: eq(additives.id, id) });
  if (!additive) throw notFound(`Additive with id ${id} not found`);
  return additive;
}

export async function createAdditive(data: InsertAdditive): Promise<Additive> {
  try {
    const [additive] = await db.insert(additives).values(data).returning();
    return additive;
  } catch (error) {
    throw translateIntegrityError(error, integrityMessages(data));
  }
}

export async function updateAdditive(id: number, data: Partial<InsertAdditive>): Promise<Additive> {
  const existing = await getAdditiveById(id);
  if (!hasChanges(data)) return existing;

  try {
    const [additive] = await db.update(additives).set(data).where(eq(additives.id, id)).returning();
    return additive;
  } catch (error) {
    throw translateIntegrityError(error, integrityMessages(data));
  }
}

export async function deleteAdditive(id: number): Promise<void> {
  const deleted = await db.delete(additives).where(eq(additives.id, id)).returning({ id: additives.id });
  if (deleted.length === 0) throw notFound(`Additive with id ${id} not found. Cannot delete.`);
}
