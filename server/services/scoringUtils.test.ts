import assert from "node:assert/strict";
import test from "node:test";
import { getTableColumns } from "drizzle-orm";
import { PgDialect } from "drizzle-orm/pg-core";
import { brands } from "../../shared/schema.js";
import {
  average,
  brandScoreConflictSet,
  brandScoreSql,
  buildBrandScoringReport,
  computeBrandScore,
  round2,
} from "./scoringUtils.js";

test("round2 keeps two decimals", () => {
  assert.equal(round2(3.14159), 3.14);
  assert.equal(round2(1.005), 1.01);
  assert.equal(round2(2), 2);
});

test("average of nothing is null", () => {
  assert.equal(average([]), null);
  assert.equal(average([1, 2, 3]), 2);
});

test("computeBrandScore averages category averages", () => {
  const score = computeBrandScore([
    { score: 4, categoryId: 1 },
    { score: 2, categoryId: 1 },
    { score: 5, categoryId: 2 },
  ]);
  // (3 + 5) / 2, not (4 + 2 + 5) / 3
  assert.equal(score, 4);
});

test("computeBrandScore rounds the result", () => {
  const score = computeBrandScore([
    { score: 1, categoryId: 1 },
    { score: 1, categoryId: 2 },
    { score: 2, categoryId: 3 },
  ]);
  assert.equal(score, 1.33);
});

test("computeBrandScore is null without scores", () => {
  assert.equal(computeBrandScore([]), null);
});

test("brandScoreSql correlates on the brand id", () => {
  const query = new PgDialect().sqlToQuery(brandScoreSql(getTableColumns(brands)));
  assert.equal(
    query.sql,
    '(select round(avg(per_category.category_average)::numeric, 2)::float8 from (select avg("bs_score"."score") as category_average ' +
      'from "brand_criterion_scores" "bs_score" join "scoring_criteria" "bs_criterion" on "bs_criterion"."id" = "bs_score"."criterion_id" ' +
      'where "bs_score"."brand_id" = "brands"."id" group by "bs_criterion"."category_id") per_category)',
  );
  assert.deepEqual(query.params, []);
});

test("re-scoring without a description keeps the stored one", () => {
  assert.deepEqual(brandScoreConflictSet({ score: 4 }), { score: 4 });
  assert.deepEqual(brandScoreConflictSet({ score: 4, description: null }), { score: 4 });
});

test("re-scoring with a description replaces it", () => {
  assert.deepEqual(brandScoreConflictSet({ score: 3, description: "x" }), { score: 3, description: "x" });
});

test("buildBrandScoringReport groups scores by category", () => {
  const detail = (id: number, criterionId: number, score: number, categoryId: number) => ({
    id,
    brandId: 7,
    criterionId,
    criterionName: `criterion ${criterionId}`,
    score,
    description: null,
    categoryId,
  });

  const report = buildBrandScoringReport({
    brand: { id: 7, name: "Green Fields", logoPath: "/logos/green.png" },
    parentBrands: ["Holding"],
    categories: [
      { id: 1, name: "Animal welfare", criteriaCount: 2 },
      { id: 2, name: "Environment", criteriaCount: 3 },
      { id: 3, name: "Social", criteriaCount: 1 },
    ],
    scores: [detail(1, 10, 4, 1), detail(2, 11, 3, 1), detail(3, 20, 5, 2)],
  });

  assert.equal(report.brandId, 7);
  assert.equal(report.brandName, "Green Fields");
  assert.equal(report.brandLogoPath, "/logos/green.png");
  assert.deepEqual(report.parentBrands, ["Holding"]);
  assert.equal(report.globalScore, 4.25);
  assert.equal(report.totalScoresCount, 3);
  assert.equal(report.totalCriteriaCount, 6);
  assert.deepEqual(
    report.categoryScores.map((c) => [c.categoryName, c.averageScore, c.scores.length]),
    [
      ["Animal welfare", 3.5, 2],
      ["Environment", 5, 1],
      ["Social", null, 0],
    ],
  );
  assert.deepEqual(report.categoryScores[0]?.scores[0], {
    id: 1,
    brandId: 7,
    criterionId: 10,
    criterionName: "criterion 10",
    score: 4,
    description: null,
  });
});

test("buildBrandScoringReport has no global score without any scores", () => {
  const report = buildBrandScoringReport({
    brand: { id: 1, name: "Empty", logoPath: null },
    parentBrands: [],
    categories: [{ id: 1, name: "Animal welfare", criteriaCount: 4 }],
    scores: [],
  });
  assert.equal(report.globalScore, null);
  assert.equal(report.totalScoresCount, 0);
  assert.equal(report.totalCriteriaCount, 4);
});
