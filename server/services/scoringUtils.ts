import { sql, type SQL } from "drizzle-orm";
import { brandCriterionScores, scoringCriteria } from "../../shared/schema.js";
import { aliasedColumns, aliasedFrom, columnSql, type ColumnMap } from "./filterUtils.js";

export interface CategorizedScore {
  score: number;
  categoryId: number;
}

export interface ScoreDetail {
  id: number;
  brandId: number;
  criterionId: number;
  criterionName: string;
  score: number;
  description: string | null;
}

export interface ScoringCategoryInput {
  id: number;
  name: string;
  criteriaCount: number;
}

export interface CategoryScore {
  categoryId: number;
  categoryName: string;
  averageScore: number | null;
  scores: ScoreDetail[];
}

export interface BrandScoringReport {
  brandId: number;
  brandName: string;
  brandLogoPath: string | null;
  parentBrands: string[];
  globalScore: number | null;
  categoryScores: CategoryScore[];
  totalScoresCount: number;
  totalCriteriaCount: number;
}

export function round2(value: number): number {
  return Math.round((value + Number.EPSILON) * 100) / 100;
}

export function average(values: readonly number[]): number | null {
  if (values.length === 0) return null;
  return values.reduce((sum, value) => sum + value, 0) / values.length;
}

function categoryAverages(scores: readonly CategorizedScore[]): Map<number, number> {
  const byCategory = new Map<number, number[]>();
  for (const entry of scores) {
    const bucket = byCategory.get(entry.categoryId) ?? [];
    bucket.push(entry.score);
    byCategory.set(entry.categoryId, bucket);
  }

  const averages = new Map<number, number>();
  for (const [categoryId, values] of byCategory) {
    const avg = average(values);
    if (avg !== null) averages.set(categoryId, avg);
  }
  return averages;
}

/**
 * Global brand score: the mean of the per-category means, so a category
 * with many criteria weighs as much as one with a single criterion.
 * Same value as {@link brandScoreSql}.
 */
export function computeBrandScore(scores: readonly CategorizedScore[]): number | null {
  const global = average([...categoryAverages(scores).values()]);
  return global === null ? null : round2(global);
}

/**
 * SQL form of {@link computeBrandScore}, correlated on the brand's id column.
 * Usable as a select extra, a filter operand and a sort key.
 */
export function brandScoreSql(columns: ColumnMap): SQL<number | null> {
  const score = aliasedColumns(brandCriterionScores, "bs_score");
  const criterion = aliasedColumns(scoringCriteria, "bs_criterion");

  return sql<number | null>`(select round(avg(per_category.category_average)::numeric, 2)::float8 from (select avg(${columnSql(score, "score")}) as category_average from ${aliasedFrom(brandCriterionScores, "bs_score")} join ${aliasedFrom(scoringCriteria, "bs_criterion")} on ${columnSql(criterion, "id")} = ${columnSql(score, "criterion_id")} where ${columnSql(score, "brand_id")} = ${columnSql(columns, "id")} group by ${columnSql(criterion, "category_id")}) per_category)`;
}

/**
 * Columns a repeated score post overwrites. An absent description keeps the
 * stored one.
 */
export function brandScoreConflictSet(data: { score: number; description?: string | null }): {
  score: number;
  description?: string;
} {
  return data.description === undefined || data.description === null
    ? { score: data.score }
    : { score: data.score, description: data.description };
}

export function buildBrandScoringReport(input: {
  brand: { id: number; name: string; logoPath: string | null };
  parentBrands: string[];
  categories: ScoringCategoryInput[];
  scores: Array<ScoreDetail & { categoryId: number }>;
}): BrandScoringReport {
  const categoryScores: CategoryScore[] = [];
  const averages: number[] = [];
  let totalScoresCount = 0;
  let totalCriteriaCount = 0;

  for (const category of input.categories) {
    const scores = input.scores.filter((s) => s.categoryId === category.id);
    const categoryAverage = average(scores.map((s) => s.score));
    totalCriteriaCount += category.criteriaCount;

    if (categoryAverage !== null) {
      averages.push(categoryAverage);
      totalScoresCount += scores.length;
    }

    categoryScores.push({
      categoryId: category.id,
      categoryName: category.name,
      averageScore: categoryAverage === null ? null : round2(categoryAverage),
      scores: scores.map(({ categoryId: _categoryId, ...detail }) => detail),
    });
  }

  const global = average(averages);

  return {
    brandId: input.brand.id,
    brandName: input.brand.name,
    brandLogoPath: input.brand.logoPath,
    parentBrands: input.parentBrands,
    globalScore: global === null ? null : round2(global),
    categoryScores,
    totalScoresCount,
    totalCriteriaCount,
  };
}
