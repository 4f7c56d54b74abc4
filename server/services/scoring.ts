import { and, asc, count, eq, ne } from "drizzle-orm";
import { db } from "../config/database.js";
import {
  brandCriterionScores,
  brands,
  scoringCategories,
  scoringCriteria,
  type BrandCriterionScore,
  type InsertBrandCriterionScore,
  type InsertScoringCategory,
  type InsertScoringCriterion,
  type ScoringCategory,
  type ScoringCriterion,
} from "../../shared/schema.js";
import { conflict, notFound, translateIntegrityError } from "../middleware/errorHandler.js";
import { brandAncestry } from "./brands.js";
import { buildFilterCondition, buildOrderBy, type Filters } from "./filterUtils.js";
import { scoringCategoryTarget, scoringCriterionTarget } from "./filterTargets.js";
import { offsetOf, toPage, type Page, type PageRequest } from "./paginationUtils.js";
import { countMatching, hasChanges } from "./repository.js";
import {
  brandScoreConflictSet,
  buildBrandScoringReport,
  type BrandScoringReport,
  type ScoreDetail,
} from "./scoringUtils.js";

export type ScoringCategoryOut = ScoringCategory & { criteria: ScoringCriterion[] };

const withCriteria = { criteria: true } as const;

// Categories

function categoryIntegrityMessages(data: Partial<InsertScoringCategory>) {
  return { unique: { name: `Scoring category with name ${data.name} already exists` } };
}

export async function listScoringCategories(): Promise<ScoringCategoryOut[]> {
  return db.query.scoringCategories.findMany({ with: withCriteria, orderBy: asc(scoringCategories.id) });
}

export async function searchScoringCategories(
  page: PageRequest,
  filters: Filters
): Promise<Page<ScoringCategoryOut>> {
  const [items, total] = await Promise.all([
    db.query.scoringCategories.findMany({
      where: (fields) => buildFilterCondition(scoringCategoryTarget, fields, filters),
      orderBy: (fields) => buildOrderBy(scoringCategoryTarget, fields, page),
      limit: page.size,
      offset: offsetOf(page),
      with: withCriteria,
    }),
    countMatching(scoringCategoryTarget, filters),
  ]);
  return toPage(items, total, page);
}

export async function getScoringCategoryById(id: number): Promise<ScoringCategoryOut> {
  const category = await db.query.scoringCategories.findFirst({
    where: eq(scoringCategories.id, id),
    with: withCriteria,
  });
  if (!category) throw notFound(`Scoring category with id ${id} not found`);
  return category;
}

export async function createScoringCategory(data: InsertScoringCategory): Promise<ScoringCategory> {
  try {
    const [category] = await db.insert(scoringCategories).values(data).returning();
    return category;
  } catch (error) {
    throw translateIntegrityError(error, categoryIntegrityMessages(data));
  }
}

export async function updateScoringCategory(
  id: number,
  data: Partial<InsertScoringCategory>
): Promise<ScoringCategory> {
  const existing = await db.query.scoringCategories.findFirst({ where: eq(scoringCategories.id, id) });
  if (!existing) throw notFound(`Scoring category with id ${id} not found`);
  if (!hasChanges(data)) return existing;

  try {
    const [category] = await db
      .update(scoringCategories)
      .set(data)
      .where(eq(scoringCategories.id, id))
      .returning();
    return category;
  } catch (error) {
    throw translateIntegrityError(error, categoryIntegrityMessages(data));
  }
}

/** Criteria and their brand scores go with the category. */
export async function deleteScoringCategory(id: number): Promise<void> {
  const deleted = await db
    .delete(scoringCategories)
    .where(eq(scoringCategories.id, id))
    .returning({ id: scoringCategories.id });
  if (deleted.length === 0) throw notFound(`Scoring category with id ${id} not found. Cannot delete.`);
}

// Criteria

async function assertCategoryExists(categoryId: number): Promise<void> {
  const category = await db.query.scoringCategories.findFirst({
    where: eq(scoringCategories.id, categoryId),
    columns: { id: true },
  });
  if (!category) throw notFound(`Scoring category with id ${categoryId} not found`);
}

// Criterion names are unique per category only, so this is checked here rather than by a constraint.
async function assertUniqueCriterionName(categoryId: number, name: string, exceptId?: number): Promise<void> {
  const clash = await db.query.scoringCriteria.findFirst({
    where: and(
      eq(scoringCriteria.categoryId, categoryId),
      eq(scoringCriteria.name, name),
      exceptId === undefined ? undefined : ne(scoringCriteria.id, exceptId)
    ),
    columns: { id: true },
  });
  if (clash) throw conflict(`Scoring criterion with name ${name} already exists in category ${categoryId}`);
}

export async function listScoringCriteria(categoryId?: number): Promise<ScoringCriterion[]> {
  return db.query.scoringCriteria.findMany({
    where: categoryId === undefined ? undefined : eq(scoringCriteria.categoryId, categoryId),
    orderBy: asc(scoringCriteria.id),
  });
}

export async function searchScoringCriteria(page: PageRequest, filters: Filters): Promise<Page<ScoringCriterion>> {
  const [items, total] = await Promise.all([
    db.query.scoringCriteria.findMany({
      where: (fields) => buildFilterCondition(scoringCriterionTarget, fields, filters),
      orderBy: (fields) => buildOrderBy(scoringCriterionTarget, fields, page),
      limit: page.size,
      offset: offsetOf(page),
    }),
    countMatching(scoringCriterionTarget, filters),
  ]);
  return toPage(items, total, page);
}

export async function getScoringCriterionById(id: number): Promise<ScoringCriterion> {
  const criterion = await db.query.scoringCriteria.findFirst({ where: eq(scoringCriteria.id, id) });
  if (!criterion) throw notFound(`Scoring criterion with id ${id} not found`);
  return criterion;
}

export async function createScoringCriterion(data: InsertScoringCriterion): Promise<ScoringCriterion> {
  await assertCategoryExists(data.categoryId);
  await assertUniqueCriterionName(data.categoryId, data.name);

  const [criterion] = await db.insert(scoringCriteria).values(data).returning();
  return criterion;
}

export async function updateScoringCriterion(
  id: number,
  data: Partial<InsertScoringCriterion>
): Promise<ScoringCriterion> {
  const existing = await getScoringCriterionById(id);
  if (!hasChanges(data)) return existing;

  const categoryId = data.categoryId ?? existing.categoryId;
  if (data.categoryId !== undefined) await assertCategoryExists(data.categoryId);
  await assertUniqueCriterionName(categoryId, data.name ?? existing.name, id);

  const [criterion] = await db.update(scoringCriteria).set(data).where(eq(scoringCriteria.id, id)).returning();
  return criterion;
}

export async function deleteScoringCriterion(id: number): Promise<void> {
  const deleted = await db
    .delete(scoringCriteria)
    .where(eq(scoringCriteria.id, id))
    .returning({ id: scoringCriteria.id });
  if (deleted.length === 0) throw notFound(`Scoring criterion with id ${id} not found. Cannot delete.`);
}

// Brand scores

async function assertBrandExists(brandId: number) {
  const brand = await db.query.brands.findFirst({
    where: eq(brands.id, brandId),
    columns: { id: true, name: true, logoPath: true },
  });
  if (!brand) throw notFound(`Brand with id ${brandId} not found`);
  return brand;
}

async function scoreDetails(brandId: number, criterionId?: number) {
  const rows = await db.query.brandCriterionScores.findMany({
    where: and(
      eq(brandCriterionScores.brandId, brandId),
      criterionId === undefined ? undefined : eq(brandCriterionScores.criterionId, criterionId)
    ),
    with: { criterion: { columns: { name: true, categoryId: true } } },
    orderBy: asc(brandCriterionScores.criterionId),
  });

  return rows.map(
    (row): ScoreDetail & { categoryId: number } => ({
      id: row.id,
      brandId: row.brandId,
      criterionId: row.criterionId,
      criterionName: row.criterion.name,
      score: row.score,
      description: row.description,
      categoryId: row.criterion.categoryId,
    })
  );
}

export async function listBrandScores(brandId: number): Promise<ScoreDetail[]> {
  await assertBrandExists(brandId);
  const details = await scoreDetails(brandId);
  return details.map(({ categoryId: _categoryId, ...detail }) => detail);
}

export async function getBrandScore(brandId: number, criterionId: number): Promise<ScoreDetail> {
  const [detail] = await scoreDetails(brandId, criterionId);
  if (!detail) throw notFound(`Score for brand ${brandId} and criterion ${criterionId} not found`);
  const { categoryId: _categoryId, ...score } = detail;
  return score;
}

/** Creates the brand's score for a criterion, or updates the existing one. */
export async function upsertBrandScore(brandId: number, data: InsertBrandCriterionScore): Promise<BrandCriterionScore> {
  await assertBrandExists(brandId);
  await getScoringCriterionById(data.criterionId);

  const [score] = await db
    .insert(brandCriterionScores)
    .values({ ...data, brandId })
    .onConflictDoUpdate({
      target: [brandCriterionScores.brandId, brandCriterionScores.criterionId],
      set: brandScoreConflictSet(data),
    })
    .returning();
  return score;
}

export async function updateBrandScore(
  brandId: number,
  criterionId: number,
  data: Partial<Pick<InsertBrandCriterionScore, "score" | "description">>
): Promise<BrandCriterionScore> {
  const match = and(eq(brandCriterionScores.brandId, brandId), eq(brandCriterionScores.criterionId, criterionId));
  const existing = await db.query.brandCriterionScores.findFirst({ where: match });
  if (!existing) throw notFound(`Score for brand ${brandId} and criterion ${criterionId} not found`);
  if (!hasChanges(data)) return existing;

  const [score] = await db.update(brandCriterionScores).set(data).where(match).returning();
  return score;
}

export async function deleteBrandScore(brandId: number, criterionId: number): Promise<void> {
  const deleted = await db
    .delete(brandCriterionScores)
    .where(and(eq(brandCriterionScores.brandId, brandId), eq(brandCriterionScores.criterionId, criterionId)))
    .returning({ id: brandCriterionScores.id });
  if (deleted.length === 0) {
    throw notFound(`Score for brand ${brandId} and criterion ${criterionId} not found. Cannot delete.`);
  }
}

export async function getBrandScoringReport(brandId: number): Promise<BrandScoringReport> {
  const brand = await assertBrandExists(brandId);

  const [ancestry, categories, scores] = await Promise.all([
    brandAncestry(brandId),
    db
      .select({ id: scoringCategories.id, name: scoringCategories.name, criteriaCount: count(scoringCriteria.id) })
      .from(scoringCategories)
      .leftJoin(scoringCriteria, eq(scoringCriteria.categoryId, scoringCategories.id))
      .groupBy(scoringCategories.id)
      .orderBy(asc(scoringCategories.id)),
    scoreDetails(brandId),
  ]);

  return buildBrandScoringReport({
    brand,
    // the chain starts with the brand itself
    parentBrands: ancestry.slice(1).map((entry) => entry.name),
    categories,
    scores,
  });
}
