import { asc, eq, isNull } from "drizzle-orm";
import { db } from "../config/database.js";
import {
  productCategories,
  type InsertProductCategory,
  type ProductCategory,
} from "../../shared/schema.js";
import { badRequest, conflict, isDatabaseError, notFound, UNIQUE_VIOLATION } from "../middleware/errorHandler.js";
import { buildFilterCondition, buildOrderBy, type ColumnMap, type Filters } from "./filterUtils.js";
import { productCategoryTarget } from "./filterTargets.js";
import { indexById, pathFromRoot, wouldCreateCycle, type TreeNode } from "./hierarchyUtils.js";
import { interestingCountSql } from "./productCategoryUtils.js";
import { offsetOf, toPage, type Page, type PageRequest } from "./paginationUtils.js";
import { countMatching, deleteOrConflict, hasChanges } from "./repository.js";

export type ProductCategoryOut = ProductCategory & {
  parentCategoryName: string | null;
  categoryTree: string[];
  nbInterestingProducts: number;
};

const countExtras = (fields: ColumnMap) => ({
  nbInterestingProducts: interestingCountSql(fields).as("nb_interesting_products"),
});

async function loadTree(): Promise<Map<number, TreeNode>> {
  const nodes = await db
    .select({ id: productCategories.id, name: productCategories.name, parentId: productCategories.parentCategoryId })
    .from(productCategories);
  return indexById(nodes);
}

function decorate(
  category: ProductCategory & { nbInterestingProducts: number },
  tree: ReadonlyMap<number, TreeNode>
): ProductCategoryOut {
  const parent = category.parentCategoryId === null ? undefined : tree.get(category.parentCategoryId);
  return {
    ...category,
    parentCategoryName: parent?.name ?? null,
    categoryTree: pathFromRoot(category.id, tree),
  };
}

async function decorateAll(
  categories: Array<ProductCategory & { nbInterestingProducts: number }>
): Promise<ProductCategoryOut[]> {
  if (categories.length === 0) return [];
  const tree = await loadTree();
  return categories.map((category) => decorate(category, tree));
}

export async function listProductCategories(): Promise<ProductCategoryOut[]> {
  const categories = await db.query.productCategories.findMany({
    extras: countExtras,
    orderBy: asc(productCategories.id),
  });
  return decorateAll(categories);
}

export async function searchProductCategories(
  page: PageRequest,
  filters: Filters
): Promise<Page<ProductCategoryOut>> {
  const [categories, total] = await Promise.all([
    db.query.productCategories.findMany({
      where: (fields) => buildFilterCondition(productCategoryTarget, fields, filters),
      orderBy: (fields) => buildOrderBy(productCategoryTarget, fields, page),
      limit: page.size,
      offset: offsetOf(page),
      extras: countExtras,
    }),
    countMatching(productCategoryTarget, filters),
  ]);
  return toPage(await decorateAll(categories), total, page);
}

export async function listRootCategories(): Promise<ProductCategoryOut[]> {
  const categories = await db.query.productCategories.findMany({
    where: isNull(productCategories.parentCategoryId),
    extras: countExtras,
    orderBy: asc(productCategories.name),
  });
  return decorateAll(categories);
}

export async function getProductCategoryById(id: number): Promise<ProductCategoryOut> {
  const category = await db.query.productCategories.findFirst({
    where: eq(productCategories.id, id),
    extras: countExtras,
  });
  if (!category) throw notFound(`Product category with id ${id} not found`);
  const [decorated] = await decorateAll([category]);
  return decorated;
}

export async function listChildCategories(id: number): Promise<ProductCategoryOut[]> {
  await getProductCategoryById(id);
  const categories = await db.query.productCategories.findMany({
    where: eq(productCategories.parentCategoryId, id),
    extras: countExtras,
    orderBy: asc(productCategories.name),
  });
  return decorateAll(categories);
}

function assertValidParent(id: number | null, parentId: number | null | undefined, tree: ReadonlyMap<number, TreeNode>) {
  if (parentId === null || parentId === undefined) return;
  if (!tree.has(parentId)) throw badRequest(`Parent category with id ${parentId} does not exist`);
  if (id === null) return;
  if (id === parentId) throw badRequest("A category cannot be its own parent");
  if (wouldCreateCycle(id, parentId, tree)) {
    throw badRequest("A category cannot have one of its descendants as parent");
  }
}

export async function createProductCategory(data: InsertProductCategory): Promise<ProductCategory> {
  assertValidParent(null, data.parentCategoryId, await loadTree());
  try {
    const [category] = await db.insert(productCategories).values(data).returning();
    return category;
  } catch (error) {
    if (isDatabaseError(error) && error.code === UNIQUE_VIOLATION) {
      throw conflict(`Product category with name ${data.name} already exists`);
    }
    throw error;
  }
}

export async function updateProductCategory(
  id: number,
  data: Partial<InsertProductCategory>
): Promise<ProductCategory> {
  const existing = await db.query.productCategories.findFirst({ where: eq(productCategories.id, id) });
  if (!existing) throw notFound(`Product category with id ${id} not found`);
  if (!hasChanges(data)) return existing;

  assertValidParent(id, data.parentCategoryId, await loadTree());
  try {
    const [category] = await db
      .update(productCategories)
      .set(data)
      .where(eq(productCategories.id, id))
      .returning();
    return category;
  } catch (error) {
    if (isDatabaseError(error) && error.code === UNIQUE_VIOLATION) {
      throw badRequest(`Product category with name ${data.name} already exists`);
    }
    throw error;
  }
}

export async function deleteProductCategory(id: number): Promise<void> {
  const existing = await db.query.productCategories.findFirst({
    where: eq(productCategories.id, id),
    columns: { id: true },
  });
  if (!existing) throw notFound(`Product category with id ${id} not found. Cannot delete.`);

  await deleteOrConflict(
    () =>
      db.transaction(async (tx) => {
        await tx
          .update(productCategories)
          .set({ parentCategoryId: null })
          .where(eq(productCategories.parentCategoryId, id));
        await tx.delete(productCategories).where(eq(productCategories.id, id));
      }),
    `Product category with id ${id} is used by interesting products`
  );
}
