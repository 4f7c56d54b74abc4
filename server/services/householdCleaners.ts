import { asc, eq } from "drizzle-orm";
import { db } from "../config/database.js";
import { householdCleaners, type HouseholdCleaner, type InsertHouseholdCleaner } from "../../shared/schema.js";
import { notFound, translateIntegrityError } from "../middleware/errorHandler.js";
import { buildFilterCondition, buildOrderBy, type Filters } from "./filterUtils.js";
import { householdCleanerTarget } from "./filterTargets.js";
import { offsetOf, toPage, type Page, type PageRequest } from "./paginationUtils.js";
import { countMatching, hasChanges } from "./repository.js";

function integrityMessages(data: Partial<InsertHouseholdCleaner>) {
  return {
    unique: { brand_name: `Household cleaner with brand name ${data.brandName} already exists` },
  };
}

export async function listHouseholdCleaners(): Promise<HouseholdCleaner[]> {
  return db.query.householdCleaners.findMany({ orderBy: asc(householdCleaners.id) });
}

export async function searchHouseholdCleaners(page: PageRequest, filters: Filters): Promise<Page<HouseholdCleaner>> {
  const [items, total] = await Promise.all([
    db.query.householdCleaners.findMany({
      where: (fields) => buildFilterCondition(householdCleanerTarget, fields, filters),
      orderBy: (fields) => buildOrderBy(householdCleanerTarget, fields, page),
      limit: page.size,
      offset: offsetOf(page),
    }),
    countMatching(householdCleanerTarget, filters),
  ]);
  return toPage(items, total, page);
}

export async function getHouseholdCleanerById(id: number): Promise<HouseholdCleaner> {
  const householdCleaner = await db.query.householdCleaners.findFirst({ where: eq(householdCleaners.id, id) });
  if (!householdCleaner) throw notFound(`Household cleaner with id ${id} not found`);
  return householdCleaner;
}

export async function createHouseholdCleaner(data: InsertHouseholdCleaner): Promise<HouseholdCleaner> {
  try {
    const [householdCleaner] = await db.insert(householdCleaners).values(data).returning();
    return householdCleaner;
  } catch (error) {
    throw translateIntegrityError(error, integrityMessages(data));
  }
}

export async function updateHouseholdCleaner(id: number, data: Partial<InsertHouseholdCleaner>): Promise<HouseholdCleaner> {
  const existing = await getHouseholdCleanerById(id);
  if (!hasChanges(data)) return existing;

  try {
    const [householdCleaner] = await db.update(householdCleaners).set(data).where(eq(householdCleaners.id, id)).returning();
    return householdCleaner;
  } catch (error) {
    throw translateIntegrityError(error, integrityMessages(data));
  }
}

export async function deleteHouseholdCleaner(id: number): Promise<void> {
  const deleted = await db.delete(householdCleaners).where(eq(householdCleaners.id, id)).returning({ id: householdCleaners.id });
  if (deleted.length === 0) throw notFound(`Household cleaner with id ${id} not found. Cannot delete.`);
}
