import { Router } from "express";
import type { Request, Response, NextFunction } from "express";
import { z } from "zod";
import { insertPartnerSchema } from "../../shared/schema.js";
import { requireAdmin, requireUserOrClient } from "../middleware/auth.js";
import {
  createPartner,
  deletePartner,
  getPartnerById,
  listPartners,
  searchPartners,
  updatePartner,
} from "../services/partners.js";
import { bool, int, parseId, parseListQuery, text } from "./queryParams.js";

const router = Router();

const partnerFilters = z.object({
  name: text(),
  name__ilike: text(),
  name__contains: text(),
  is_affiliate: bool(),
  show_code_in_website: bool(),
  is_active: bool(),
  category_id: int(),
});

// GET /api/v1/partners
router.get("/", requireUserOrClient, async (_req: Request, res: Response, next: NextFunction) => {
  try {
    res.json(await listPartners());
  } catch (err) {
    next(err);
  }
});

// GET /api/v1/partners/search
router.get("/search", requireUserOrClient, async (req: Request, res: Response, next: NextFunction) => {
  try {
    const { page, filters } = parseListQuery(req.query, partnerFilters);
    res.json(await searchPartners(page, filters));
  } catch (err) {
    next(err);
  }
});

// GET /api/v1/partners/:id
router.get("/:id", requireUserOrClient, async (req: Request, res: Response, next: NextFunction) => {
  try {
    res.json(await getPartnerById(parseId(req.params.id)));
  } catch (err) {
    next(err);
  }
});

// POST /api/v1/partners
router.post("/", requireAdmin, async (req: Request, res: Response, next: NextFunction) => {
  try {
    const data = insertPartnerSchema.parse(req.body);
    res.status(201).json(await createPartner(data));
  } catch (err) {
    next(err);
  }
});

// PUT /api/v1/partners/:id
router.put("/:id", requireAdmin, async (req: Request, res: Response, next: NextFunction) => {
  try {
    const id = parseId(req.params.id);
    const data = insertPartnerSchema.partial().parse(req.body);
    res.json(await updatePartner(id, data));
  } catch (err) {
    next(err);
  }
});

// DELETE /api/v1/partners/:id
router.delete("/:id", requireAdmin, async (req: Request, res: Response, next: NextFunction) => {
  try {
    await deletePartner(parseId(req.params.id));
    res.status(204).end();
  } catch (err) {
    next(err);
  }
});

export default router;
