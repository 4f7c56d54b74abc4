import { asc, eq } from "drizzle-orm";
import { db } from "../config/database.js";
import { cosmetics, type Cosmetic, type InsertCosmetic } from "../../shared/schema.js";
import { notFound, translateIntegrityError } from "../middleware/errorHandler.js";
import { buildFilterCondition, buildOrderBy, type Filters } from "./filterUtils.js";
import { cosmeticTarget } from "./filterTargets.js";
import { offsetOf, toPage, type Page, type PageRequest } from "./paginationUtils.js";
import { countMatching, hasChanges } from "./repository.js";

function integrityMessages(data: Partial<InsertCosmetic>) {
  return {
    unique: { brand_name: `Cosmetic with brand name ${data.brandName} already exists` },
  };
}

export async function listCosmetics(): Promise<Cosmetic[]> {
  return db.query.cosmetics.findMany({ orderBy: asc(cosmetics.id) });
}

export async function searchCosmetics(page: PageRequest, filters: Filters): Promise<Page<Cosmetic>> {
  const [items, total] = await Promise.all([
    db.query.cosmetics.findMany({
      where: (fields) => buildFilterCondition(cosmeticTarget, fields, filters),
      orderBy: (fields) => buildOrderBy(cosmeticTarget, fields, page),
      limit: page.size,
      offset: offsetOf(page),
    }),
    countMatching(cosmeticTarget, filters),
  ]);
  return toPage(items, total, page);
}

export async function getCosmeticById(id: number): Promise<Cosmetic> {
  const cosmetic = await db.query.cosmetics.findFirst({ where: eq(cosmetics.id, id) });
  if (!cosmetic) throw notFound(`Cosmetic with id ${id} not found`);
  return cosmetic;
}

export async function createCosmetic(data: InsertCosmetic): Promise<Cosmetic> {
  try {
    const [cosmetic] = await db.insert(cosmetics).values(data).returning();
    return cosmetic;
  } catch (error) {
    throw translateIntegrityError(error, integrityMessages(data));
  }
}

export async function updateCosmetic(id: number, data: Partial<InsertCosmetic>): Promise<Cosmetic> {
  const existing = await getCosmeticById(id);
  if (!hasChanges(data)) return existing;

  try {
    const [cosmetic] = await db.update(cosmetics).set(data).where(eq(cosmetics.id, id)).returning();
    return cosmetic;
  } catch (error) {
    throw translateIntegrityError(error, integrityMessages(data));
  }
}

export async function deleteCosmetic(id: number): Promise<void> {
  const deleted = await db.delete(cosmetics).where(eq(cosmetics.id, id)).returning({ id: cosmetics.id });
  if (deleted.length === 0) throw notFound(`Cosmetic with id ${id} not found. Cannot delete.`);
}
