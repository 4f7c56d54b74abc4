import { Router } from "express";
import type { Request, Response, NextFunction } from "express";
import { z } from "zod";
import { insertPartnerCategorySchema } from "../../shared/schema.js";
import { requireAdmin, requireUserOrClient } from "../middleware/auth.js";
import {
  createPartnerCategory,
  deletePartnerCategory,
  getPartnerCategoryById,
  listPartnerCategories,
  searchPartnerCategories,
  updatePartnerCategory,
} from "../services/partners.js";
import { parseId, parseListQuery, text } from "./queryParams.js";

const router = Router();

const partnerCategoryFilters = z.object({
  name: text(),
  name__ilike: text(),
  name__contains: text(),
});

// GET /api/v1/partner-categories
router.get("/", requireUserOrClient, async (_req: Request, res: Response, next: NextFunction) => {
  try {
    res.json(await listPartnerCategories());
  } catch (err) {
    next(err);
  }
});

// GET /api/v1/partner-categories/search
router.get("/search", requireUserOrClient, async (req: Request, res: Response, next: NextFunction) => {
  try {
    const { page, filters } = parseListQuery(req.query, partnerCategoryFilters);
    res.json(await searchPartnerCategories(page, filters));
  } catch (err) {
    next(err);
  }
});

// GET /api/v1/partner-categories/:id
router.get("/:id", requireUserOrClient, async (req: Request, res: Response, next: NextFunction) => {
  try {
    res.json(await getPartnerCategoryById(parseId(req.params.id)));
  } catch (err) {
    next(err);
  }
});

// POST /api/v1/partner-categories
router.post("/", requireAdmin, async (req: Request, res: Response, next: NextFunction) => {
  try {
    const data = insertPartnerCategorySchema.parse(req.body);
    res.status(201).json(await createPartnerCategory(data));
  } catch (err) {
    next(err);
  }
});

// PUT /api/v1/partner-categories/:id
router.put("/:id", requireAdmin, async (req: Request, res: Response, next: NextFunction) => {
  try {
    const id = parseId(req.params.id);
    const data = insertPartnerCategorySchema.partial().parse(req.body);
    res.json(await updatePartnerCategory(id, data));
  } catch (err) {
    next(err);
  }
});

// DELETE /api/v1/partner-categories/:id
router.delete("/:id", requireAdmin, async (req: Request, res: Response, next: NextFunction) => {
  try {
    await deletePartnerCategory(parseId(req.params.id));
    res.status(204).end();
  } catch (err) {
    next(err);
  }
});

export default router;
