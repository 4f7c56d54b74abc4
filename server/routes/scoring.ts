import { Router } from "express";
import type { Request, Response, NextFunction } from "express";
import { z } from "zod";
import {
  insertBrandCriterionScoreSchema,
  insertScoringCategorySchema,
  insertScoringCriterionSchema,
  updateBrandCriterionScoreSchema,
} from "../../shared/schema.js";
import { requireAdmin, requireContributor, requireUser, requireUserOrClient } from "../middleware/auth.js";
import {
  createScoringCategory,
  createScoringCriterion,
  deleteBrandScore,
  deleteScoringCategory,
  deleteScoringCriterion,
  getBrandScore,
  getBrandScoringReport,
  getScoringCategoryById,
  getScoringCriterionById,
  listBrandScores,
  listScoringCategories,
  listScoringCriteria,
  searchScoringCategories,
  searchScoringCriteria,
  updateBrandScore,
  updateScoringCategory,
  updateScoringCriterion,
  upsertBrandScore,
} from "../services/scoring.js";
import { int, parseId, parseListQuery, text } from "./queryParams.js";

const router = Router();

const categoryFilters = z.object({
  name: text(),
  name__ilike: text(),
  name__contains: text(),
  name__lookalike: text(),
});

const criterionFilters = categoryFilters.extend({
  category_id: int(),
  category___name__contains: text(),
  category___name__lookalike: text(),
});

const criteriaListQuerySchema = z.object({ category_id: int() });

// ── Categories ──────────────────────────────────────────────────────────────

// POST /api/v1/scoring/categories
router.post("/categories", requireContributor, async (req: Request, res: Response, next: NextFunction) => {
  try {
    const data = insertScoringCategorySchema.parse(req.body);
    res.status(201).json(await createScoringCategory(data));
  } catch (err) {
    next(err);
  }
});

// GET /api/v1/scoring/categories/search
router.get("/categories/search", requireContributor, async (req: Request, res: Response, next: NextFunction) => {
  try {
    const { page, filters } = parseListQuery(req.query, categoryFilters);
    res.json(await searchScoringCategories(page, filters));
  } catch (err) {
    next(err);
  }
});

// GET /api/v1/scoring/categories
router.get("/categories", requireContributor, async (_req: Request, res: Response, next: NextFunction) => {
  try {
    res.json(await listScoringCategories());
  } catch (err) {
    next(err);
  }
});

// GET /api/v1/scoring/categories/:id
router.get("/categories/:id", requireContributor, async (req: Request, res: Response, next: NextFunction) => {
  try {
    res.json(await getScoringCategoryById(parseId(req.params.id)));
  } catch (err) {
    next(err);
  }
});

// PUT /api/v1/scoring/categories/:id
router.put("/categories/:id", requireContributor, async (req: Request, res: Response, next: NextFunction) => {
  try {
    const id = parseId(req.params.id);
    const data = insertScoringCategorySchema.partial().parse(req.body);
    res.json(await updateScoringCategory(id, data));
  } catch (err) {
    next(err);
  }
});

// DELETE /api/v1/scoring/categories/:id
router.delete("/categories/:id", requireAdmin, async (req: Request, res: Response, next: NextFunction) => {
  try {
    await deleteScoringCategory(parseId(req.params.id));
    res.status(204).end();
  } catch (err) {
    next(err);
  }
});

// ── Criteria ────────────────────────────────────────────────────────────────

// POST /api/v1/scoring/criteria
router.post("/criteria", requireContributor, async (req: Request, res: Response, next: NextFunction) => {
  try {
    const data = insertScoringCriterionSchema.parse(req.body);
    res.status(201).json(await createScoringCriterion(data));
  } catch (err) {
    next(err);
  }
});

// GET /api/v1/scoring/criteria/search
router.get("/criteria/search", requireContributor, async (req: Request, res: Response, next: NextFunction) => {
  try {
    const { page, filters } = parseListQuery(req.query, criterionFilters);
    res.json(await searchScoringCriteria(page, filters));
  } catch (err) {
    next(err);
  }
});

// GET /api/v1/scoring/criteria?category_id=
router.get("/criteria", requireContributor, async (req: Request, res: Response, next: NextFunction) => {
  try {
    const { category_id } = criteriaListQuerySchema.parse(req.query);
    res.json(await listScoringCriteria(category_id));
  } catch (err) {
    next(err);
  }
});

// GET /api/v1/scoring/criteria/:id
router.get("/criteria/:id", requireContributor, async (req: Request, res: Response, next: NextFunction) => {
  try {
    res.json(await getScoringCriterionById(parseId(req.params.id)));
  } catch (err) {
    next(err);
  }
});

// PUT /api/v1/scoring/criteria/:id
router.put("/criteria/:id", requireContributor, async (req: Request, res: Response, next: NextFunction) => {
  try {
    const id = parseId(req.params.id);
    const data = insertScoringCriterionSchema.partial().parse(req.body);
    res.json(await updateScoringCriterion(id, data));
  } catch (err) {
    next(err);
  }
});

// DELETE /api/v1/scoring/criteria/:id
router.delete("/criteria/:id", requireAdmin, async (req: Request, res: Response, next: NextFunction) => {
  try {
    await deleteScoringCriterion(parseId(req.params.id));
    res.status(204).end();
  } catch (err) {
    next(err);
  }
});

// ── Brand scores ────────────────────────────────────────────────────────────

// POST /api/v1/scoring/brands/:brandId/scores
router.post("/brands/:brandId/scores", requireContributor, async (req: Request, res: Response, next: NextFunction) => {
  try {
    const brandId = parseId(req.params.brandId);
    const data = insertBrandCriterionScoreSchema.parse(req.body);
    res.status(201).json(await upsertBrandScore(brandId, data));
  } catch (err) {
    next(err);
  }
});

// GET /api/v1/scoring/brands/:brandId/scores
router.get("/brands/:brandId/scores", requireUser, async (req: Request, res: Response, next: NextFunction) => {
  try {
    res.json(await listBrandScores(parseId(req.params.brandId)));
  } catch (err) {
    next(err);
  }
});

// GET /api/v1/scoring/brands/:brandId/scoring-report
router.get(
  "/brands/:brandId/scoring-report",
  requireUserOrClient,
  async (req: Request, res: Response, next: NextFunction) => {
    try {
      res.json(await getBrandScoringReport(parseId(req.params.brandId)));
    } catch (err) {
      next(err);
    }
  }
);

// GET /api/v1/scoring/brands/:brandId/scores/:criterionId
router.get(
  "/brands/:brandId/scores/:criterionId",
  requireUser,
  async (req: Request, res: Response, next: NextFunction) => {
    try {
      res.json(await getBrandScore(parseId(req.params.brandId), parseId(req.params.criterionId)));
    } catch (err) {
      next(err);
    }
  }
);

// PUT /api/v1/scoring/brands/:brandId/scores/:criterionId
router.put(
  "/brands/:brandId/scores/:criterionId",
  requireContributor,
  async (req: Request, res: Response, next: NextFunction) => {
    try {
      const data = updateBrandCriterionScoreSchema.parse(req.body);
      res.json(await updateBrandScore(parseId(req.params.brandId), parseId(req.params.criterionId), data));
    } catch (err) {
      next(err);
    }
  }
);

// DELETE /api/v1/scoring/brands/:brandId/scores/:criterionId
router.delete(
  "/brands/:brandId/scores/:criterionId",
  requireContributor,
  async (req: Request, res: Response, next: NextFunction) => {
    try {
      await deleteBrandScore(parseId(req.params.brandId), parseId(req.params.criterionId));
      res.status(204).end();
    } catch (err) {
      next(err);
    }
  }
);

export default router;
