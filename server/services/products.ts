import { asc, eq } from "drizzle-orm";
import { db } from "../config/database.js";
import { products, type InsertProduct, type Product } from "../../shared/schema.js";
import { notFound, translateIntegrityError } from "../middleware/errorHandler.js";
import { buildFilterCondition, buildOrderBy, type ColumnMap, type Filters } from "./filterUtils.js";
import { productTarget } from "./filterTargets.js";
import { offsetOf, toPage, type Page, type PageRequest } from "./paginationUtils.js";
import { decodeRequestedOn, lastRequestedBySql, lastRequestedOnSql, summarizeLastRequest } from "./productUtils.js";
import { countMatching, hasChanges } from "./repository.js";
import { incrementProductsSent } from "./users.js";

function integrityMessages(data: Partial<InsertProduct> & { lastModifiedBy?: number | null }) {
  return {
    unique: { ean: `Product with EAN ${data.ean} already exists` },
    foreignKey: {
      brand_id: `Brand with id ${data.brandId} does not exist`,
      last_modified_by: `User with id ${data.lastModifiedBy} does not exist`,
    },
  };
}

const lastRequestExtras = (fields: ColumnMap) => ({
  lastRequestedOn: lastRequestedOnSql(fields).as("last_requested_on"),
  lastRequestedBy: lastRequestedBySql(fields).as("last_requested_by"),
});

function withLastRequestDate<T extends { lastRequestedOn: string | null }>({ lastRequestedOn, ...row }: T) {
  return { ...row, lastRequestedOn: decodeRequestedOn(lastRequestedOn) };
}

export async function listProducts() {
  const rows = await db.query.products.findMany({
    with: { brand: { columns: { id: true, name: true } } },
    extras: lastRequestExtras,
    orderBy: asc(products.id),
  });
  return rows.map(withLastRequestDate);
}

export async function countProducts(filters: Filters): Promise<number> {
  return countMatching(productTarget, filters);
}

export async function searchProducts(page: PageRequest, filters: Filters) {
  const [items, total] = await Promise.all([
    db.query.products.findMany({
      where: (fields) => buildFilterCondition(productTarget, fields, filters),
      orderBy: (fields) => buildOrderBy(productTarget, fields, page),
      limit: page.size,
      offset: offsetOf(page),
      with: { brand: { columns: { id: true, name: true } } },
      extras: lastRequestExtras,
    }),
    countMatching(productTarget, filters),
  ]);
  return toPage(items.map(withLastRequestDate), total, page);
}

export type ProductListPage = Awaited<ReturnType<typeof searchProducts>>;

async function findProductDetail(where: { id: number } | { ean: string }) {
  const product = await db.query.products.findFirst({
    where: "id" in where ? eq(products.id, where.id) : eq(products.ean, where.ean),
    with: {
      brand: { columns: { id: true, name: true } },
      lastModifier: { columns: { id: true, nickname: true } },
      checkings: {
        with: { user: { columns: { id: true, nickname: true } } },
        orderBy: (checking, { desc }) => [desc(checking.requestedOn)],
      },
    },
  });
  if (!product) return undefined;
  return { ...product, ...summarizeLastRequest(product.checkings) };
}

export type ProductDetail = NonNullable<Awaited<ReturnType<typeof findProductDetail>>>;

export async function getProductById(id: number): Promise<ProductDetail> {
  const product = await findProductDetail({ id });
  if (!product) throw notFound(`Product with id ${id} not found`);
  return product;
}

export async function getProductByEan(ean: string): Promise<ProductDetail> {
  const product = await findProductDetail({ ean });
  if (!product) throw notFound(`Product with EAN ${ean} not found`);
  return product;
}

/**
 * Stores a product sent by a user or an API client. A known sender becomes
 * the last modifier and gets credited in the same transaction.
 */
export async function createProduct(data: InsertProduct, senderId: number | null): Promise<Product> {
  try {
    const product = await db.transaction(async (tx) => {
      const [created] = await tx
        .insert(products)
        .values({ ...data, lastModifiedBy: senderId })
        .returning();
      if (senderId !== null) {
        await incrementProductsSent(senderId, tx);
      }
      return created;
    });
    console.log(`[products] created product ${product.id} (${product.ean})`);
    return product;
  } catch (error) {
    throw translateIntegrityError(error, integrityMessages({ ...data, lastModifiedBy: senderId }));
  }
}

export async function updateProduct(id: number, data: Partial<InsertProduct>, modifierId: number): Promise<Product> {
  const existing = await db.query.products.findFirst({ where: eq(products.id, id) });
  if (!existing) throw notFound(`Product with id ${id} not found`);
  if (!hasChanges(data)) return existing;

  try {
    const [product] = await db
      .update(products)
      .set({ ...data, lastModifiedBy: modifierId })
      .where(eq(products.id, id))
      .returning();
    return product;
  } catch (error) {
    throw translateIntegrityError(error, integrityMessages({ ...data, lastModifiedBy: modifierId }));
  }
}

export async function deleteProduct(id: number): Promise<void> {
  const deleted = await db.delete(products).where(eq(products.id, id)).returning({ id: products.id });
  if (deleted.length === 0) throw notFound(`Product with id ${id} not found. Cannot delete.`);
}
