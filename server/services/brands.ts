import { asc, eq, sql } from "drizzle-orm";
import { db } from "../config/database.js";
import { brands, type Brand, type InsertBrand } from "../../shared/schema.js";
import { badRequest, notFound, translateIntegrityError } from "../middleware/errorHandler.js";
import { buildFilterCondition, buildOrderBy, buildPredicate, type Filters } from "./filterUtils.js";
import { brandTarget } from "./filterTargets.js";
import { offsetOf, toPage, type Page, type PageRequest } from "./paginationUtils.js";
import { countMatching, deleteOrConflict, hasChanges } from "./repository.js";
import { brandScoreSql } from "./scoringUtils.js";

// Deeper parent chains are treated as corrupt and cut off.
const MAX_BRAND_DEPTH = 32;

export type BrandSummary = Pick<Brand, "id" | "name">;

export type BrandListItem = Brand & {
  parent: BrandSummary | null;
  score: number | null;
};

export type BrandDetail = BrandListItem & {
  parentNameTree: string[];
};

const withParent = { parent: { columns: { id: true, name: true } } } as const;

function integrityMessages(data: Partial<InsertBrand>) {
  return {
    unique: { name: `Brand with name ${data.name} already exists` },
  };
}

export async function listBrands(): Promise<BrandListItem[]> {
  return db.query.brands.findMany({
    with: withParent,
    extras: (fields) => ({ score: brandScoreSql(fields).as("score") }),
    orderBy: asc(brands.id),
  });
}

export async function searchBrands(page: PageRequest, filters: Filters): Promise<Page<BrandListItem>> {
  const [items, total] = await Promise.all([
    db.query.brands.findMany({
      where: (fields) => buildFilterCondition(brandTarget, fields, filters),
      orderBy: (fields) => buildOrderBy(brandTarget, fields, page),
      limit: page.size,
      offset: offsetOf(page),
      with: withParent,
      extras: (fields) => ({ score: brandScoreSql(fields).as("score") }),
    }),
    countMatching(brandTarget, filters),
  ]);
  return toPage(items, total, page);
}

/** Closest brand name within the lookalike distance, best match first. */
export async function findLookalikeBrand(name: string): Promise<BrandListItem> {
  const brand = await db.query.brands.findFirst({
    where: (fields) => buildPredicate(sql`${fields.name}`, "lookalike", name),
    orderBy: (fields) => [sql`levenshtein(lower(${fields.name}), lower(${name}))`, asc(fields.id)],
    with: withParent,
    extras: (fields) => ({ score: brandScoreSql(fields).as("score") }),
  });
  if (!brand) throw notFound(`Brand with name ${name} not found`);
  return brand;
}

/**
 * The brand followed by its ancestors, nearest first, read with a recursive
 * CTE bounded by {@link MAX_BRAND_DEPTH}.
 */
export async function brandAncestry(id: number): Promise<BrandSummary[]> {
  const rows = await db.execute<{ id: number; name: string }>(sql`
    with recursive chain as (
      select id, name, parent_id, 0 as depth from brands where id = ${id}
      union all
      select b.id, b.name, b.parent_id, chain.depth + 1
      from brands b join chain on b.id = chain.parent_id
      where chain.depth < ${MAX_BRAND_DEPTH}
    )
    select id, name from chain order by depth
  `);
  return rows.map((row) => ({ id: row.id, name: row.name }));
}

export async function getBrandById(id: number): Promise<BrandDetail> {
  const brand = await db.query.brands.findFirst({
    where: eq(brands.id, id),
    with: withParent,
    extras: (fields) => ({ score: brandScoreSql(fields).as("score") }),
  });
  if (!brand) throw notFound(`Brand with id ${id} not found`);

  const ancestry = await brandAncestry(id);
  return { ...brand, parentNameTree: ancestry.map((entry) => entry.name) };
}

async function assertValidParent(id: number | null, parentId: number | null | undefined): Promise<void> {
  if (parentId === null || parentId === undefined) return;

  const parent = await db.query.brands.findFirst({ where: eq(brands.id, parentId), columns: { id: true } });
  if (!parent) throw badRequest(`Brand with id ${parentId} does not exist`);
  if (id === null) return;

  const ancestry = await brandAncestry(parentId);
  if (ancestry.some((entry) => entry.id === id)) {
    throw badRequest("A brand cannot be its own parent or the parent of one of its ancestors");
  }
}

export async function createBrand(data: InsertBrand): Promise<Brand> {
  await assertValidParent(null, data.parentId);
  try {
    const [brand] = await db.insert(brands).values(data).returning();
    console.log(`[brands] created brand ${brand.id} (${brand.name})`);
    return brand;
  } catch (error) {
    throw translateIntegrityError(error, integrityMessages(data));
  }
}

export async function updateBrand(id: number, data: Partial<InsertBrand>): Promise<Brand> {
  const existing = await db.query.brands.findFirst({ where: eq(brands.id, id) });
  if (!existing) throw notFound(`Brand with id ${id} not found`);
  if (!hasChanges(data)) return existing;

  await assertValidParent(id, data.parentId);
  try {
    const [brand] = await db.update(brands).set(data).where(eq(brands.id, id)).returning();
    return brand;
  } catch (error) {
    throw translateIntegrityError(error, integrityMessages(data));
  }
}

export async function deleteBrand(id: number): Promise<void> {
  const existing = await db.query.brands.findFirst({ where: eq(brands.id, id), columns: { id: true } });
  if (!existing) throw notFound(`Brand with id ${id} not found. Cannot delete.`);

  await deleteOrConflict(
    () =>
      db.transaction(async (tx) => {
        // children become top level brands
        await tx.update(brands).set({ parentId: null }).where(eq(brands.parentId, id));
        await tx.delete(brands).where(eq(brands.id, id));
      }),
    `Brand with id ${id} is still referenced by products`
  );
}
