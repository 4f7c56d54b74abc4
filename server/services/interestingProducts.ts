import { asc, eq } from "drizzle-orm";
import { db } from "../config/database.js";
import {
  interestingProducts,
  type InsertInterestingProduct,
  type InterestingProduct,
} from "../../shared/schema.js";
import { notFound, translateIntegrityError } from "../middleware/errorHandler.js";
import { buildFilterCondition, buildOrderBy, type Filters } from "./filterUtils.js";
import { interestingProductTarget } from "./filterTargets.js";
import { offsetOf, toPage, type Page, type PageRequest } from "./paginationUtils.js";
import { countMatching, hasChanges } from "./repository.js";

export type InterestingProductOut = InterestingProduct & {
  categoryName: string | null;
  brandName: string | null;
};

const withNames = {
  category: { columns: { name: true } },
  brand: { columns: { name: true } },
} as const;

type LoadedInterestingProduct = InterestingProduct & {
  category: { name: string } | null;
  brand: { name: string } | null;
};

function toOut({ category, brand, ...product }: LoadedInterestingProduct): InterestingProductOut {
  return { ...product, categoryName: category?.name ?? null, brandName: brand?.name ?? null };
}

function integrityMessages(data: Partial<InsertInterestingProduct>) {
  return {
    foreignKey: {
      category_id: `Product category with id ${data.categoryId} does not exist`,
      brand_id: `Brand with id ${data.brandId} does not exist`,
    },
  };
}

export async function listInterestingProducts(): Promise<InterestingProductOut[]> {
  const items = await db.query.interestingProducts.findMany({
    with: withNames,
    orderBy: asc(interestingProducts.id),
  });
  return items.map(toOut);
}

export async function searchInterestingProducts(
  page: PageRequest,
  filters: Filters
): Promise<Page<InterestingProductOut>> {
  const [items, total] = await Promise.all([
    db.query.interestingProducts.findMany({
      where: (fields) => buildFilterCondition(interestingProductTarget, fields, filters),
      orderBy: (fields) => buildOrderBy(interestingProductTarget, fields, page),
      limit: page.size,
      offset: offsetOf(page),
      with: withNames,
    }),
    countMatching(interestingProductTarget, filters),
  ]);
  return toPage(items.map(toOut), total, page);
}

export async function getInterestingProductById(id: number): Promise<InterestingProductOut> {
  const item = await db.query.interestingProducts.findFirst({
    where: eq(interestingProducts.id, id),
    with: withNames,
  });
  if (!item) throw notFound(`Interesting product with id ${id} not found`);
  return toOut(item);
}

export async function getInterestingProductByEan(ean: string): Promise<InterestingProductOut> {
  const item = await db.query.interestingProducts.findFirst({
    where: eq(interestingProducts.ean, ean),
    with: withNames,
  });
  if (!item) throw notFound(`Interesting product with EAN ${ean} not found`);
  return toOut(item);
}

export async function createInterestingProduct(data: InsertInterestingProduct): Promise<InterestingProduct> {
  try {
    const [item] = await db.insert(interestingProducts).values(data).returning();
    return item;
  } catch (error) {
    throw translateIntegrityError(error, integrityMessages(data));
  }
}

export async function updateInterestingProduct(
  id: number,
  data: Partial<InsertInterestingProduct>
): Promise<InterestingProduct> {
  const existing = await db.query.interestingProducts.findFirst({ where: eq(interestingProducts.id, id) });
  if (!existing) throw notFound(`Interesting product with id ${id} not found`);
  if (!hasChanges(data)) return existing;

  try {
    const [item] = await db
      .update(interestingProducts)
      .set(data)
      .where(eq(interestingProducts.id, id))
      .returning();
    return item;
  } catch (error) {
    throw translateIntegrityError(error, integrityMessages(data));
  }
}

export async function deleteInterestingProduct(id: number): Promise<void> {
  const deleted = await db
    .delete(interestingProducts)
    .where(eq(interestingProducts.id, id))
    .returning({ id: interestingProducts.id });
  if (deleted.length === 0) throw notFound(`Interesting product with id ${id} not found. Cannot delete.`);
}
