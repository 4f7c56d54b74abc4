import { Router } from "express";
import type { Request, Response, NextFunction } from "express";
import { z } from "zod";
import { insertHouseholdCleanerSchema } from "../../shared/schema.js";
import { requireContributor, requireUser } from "../middleware/auth.js";
import {
  createHouseholdCleaner,
  deleteHouseholdCleaner,
  getHouseholdCleanerById,
  listHouseholdCleaners,
  searchHouseholdCleaners,
  updateHouseholdCleaner,
} from "../services/householdCleaners.js";
import { bool, parseId, parseListQuery, text } from "./queryParams.js";

const router = Router();
router.use(requireUser);

const householdCleanerFilters = z.object({
  brand_name: text(),
  brand_name__ilike: text(),
  brand_name__contains: text(),
  is_vegan: bool(),
  is_cruelty_free: bool(),
});

// GET /api/v1/household-cleaners
router.get("/", async (_req: Request, res: Response, next: NextFunction) => {
  try {
    res.json(await listHouseholdCleaners());
  } catch (err) {
    next(err);
  }
});

// GET /api/v1/household-cleaners/search
router.get("/search", async (req: Request, res: Response, next: NextFunction) => {
  try {
    const { page, filters } = parseListQuery(req.query, householdCleanerFilters);
    res.json(await searchHouseholdCleaners(page, filters));
  } catch (err) {
    next(err);
  }
});

// GET /api/v1/household-cleaners/:id
router.get("/:id", async (req: Request, res: Response, next: NextFunction) => {
  try {
    res.json(await getHouseholdCleanerById(parseId(req.params.id)));
  } catch (err) {
    next(err);
  }
});

// POST /api/v1/household-cleaners
router.post("/", async (req: Request, res: Response, next: NextFunction) => {
  try {
    const data = insertHouseholdCleanerSchema.parse(req.body);
    res.status(201).json(await createHouseholdCleaner(data));
  } catch (err) {
    next(err);
  }
});

// PUT /api/v1/household-cleaners/:id
router.put("/:id", async (req: Request, res: Response, next: NextFunction) => {
  try {
    const id = parseId(req.params.id);
    const data = insertHouseholdCleanerSchema.partial().parse(req.body);
    res.json(await updateHouseholdCleaner(id, data));
  } catch (err) {
    next(err);
  }
});

// DELETE /api/v1/household-cleaners/:id
router.delete("/:id", requireContributor, async (req: Request, res: Response, next: NextFunction) => {
  try {
    await deleteHouseholdCleaner(parseId(req.params.id));
    res.status(204).end();
  } catch (err) {
    next(err);
  }
});

export default router;
