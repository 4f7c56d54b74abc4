import { asc, eq } from "drizzle-orm";
import { db } from "../config/database.js";
import { checkings, type Checking, type InsertChecking } from "../../shared/schema.js";
import { notFound, translateIntegrityError } from "../middleware/errorHandler.js";
import { buildFilterCondition, buildOrderBy, type Filters } from "./filterUtils.js";
import { checkingTarget } from "./filterTargets.js";
import { offsetOf, toPage, type PageRequest } from "./paginationUtils.js";
import { countMatching, hasChanges } from "./repository.js";

const withParties = {
  user: { columns: { id: true, nickname: true } },
  product: { columns: { id: true, ean: true, name: true, status: true } },
} as const;

function integrityMessages(data: { productId?: number; userId?: number }) {
  return {
    foreignKey: {
      product_id: `Product with id ${data.productId} does not exist`,
      user_id: `User with id ${data.userId} does not exist`,
    },
  };
}

export async function listCheckings() {
  return db.query.checkings.findMany({ with: withParties, orderBy: asc(checkings.id) });
}

export async function countCheckings(filters: Filters): Promise<number> {
  return countMatching(checkingTarget, filters);
}

export async function searchCheckings(page: PageRequest, filters: Filters) {
  const [items, total] = await Promise.all([
    db.query.checkings.findMany({
      where: (fields) => buildFilterCondition(checkingTarget, fields, filters),
      orderBy: (fields) => buildOrderBy(checkingTarget, fields, page),
      limit: page.size,
      offset: offsetOf(page),
      with: withParties,
    }),
    countMatching(checkingTarget, filters),
  ]);
  return toPage(items, total, page);
}

export async function getCheckingById(id: number) {
  const checking = await db.query.checkings.findFirst({ where: eq(checkings.id, id), with: withParties });
  if (!checking) throw notFound(`Checking with id ${id} not found`);
  return checking;
}

export async function createChecking(data: InsertChecking, userId: number): Promise<Checking> {
  try {
    const [checking] = await db.insert(checkings).values({ ...data, userId }).returning();
    return checking;
  } catch (error) {
    throw translateIntegrityError(error, integrityMessages({ ...data, userId }));
  }
}

export async function updateChecking(id: number, data: Partial<InsertChecking>): Promise<Checking> {
  const existing = await db.query.checkings.findFirst({ where: eq(checkings.id, id) });
  if (!existing) throw notFound(`Checking with id ${id} not found`);
  if (!hasChanges(data)) return existing;

  try {
    const [checking] = await db.update(checkings).set(data).where(eq(checkings.id, id)).returning();
    return checking;
  } catch (error) {
    throw translateIntegrityError(error, integrityMessages(data));
  }
}

export async function deleteChecking(id: number): Promise<void> {
  const deleted = await db.delete(checkings).where(eq(checkings.id, id)).returning({ id: checkings.id });
  if (deleted.length === 0) throw notFound(`Checking with id ${id} not found. Cannot delete.`);
}
