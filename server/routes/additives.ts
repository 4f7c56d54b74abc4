import { Router } from "express";
import type { Request, Response, NextFunction } from "express";
import { z } from "zod";
import { additiveStatusEnum, insertAdditiveSchema } from "../../shared/schema.js";
import { requireContributor, requireUser } from "../middleware/auth.js";
import {
  countAdditives,
  createAdditive,
  deleteAdditive,
  getAdditiveById,
  listAdditives,
  searchAdditives,
  updateAdditive,
} from "../services/additives.js";
import { date, oneOf, parseId, parseListQuery, text } from "./queryParams.js";

const router = Router();
router.use(requireUser);

const additiveFilters = z.object({
  e_number: text(),
  e_number__ilike: text(),
  e_number__contains: text(),
  name: text(),
  name__ilike: text(),
  name__contains: text(),
  status: oneOf(additiveStatusEnum.enumValues),
  created_at: date(),
  created_at__gt: date(),
});

// GET /api/v1/additives
router.get("/", async (_req: Request, res: Response, next: NextFunction) => {
  try {
    res.json(await listAdditives());
  } catch (err) {
    next(err);
  }
});

// GET /api/v1/additives/count
router.get("/count", async (req: Request, res: Response, next: NextFunction) => {
  try {
    res.json({ total: await countAdditives(additiveFilters.parse(req.query)) });
  } catch (err) {
    next(err);
  }
});

// GET /api/v1/additives/search
router.get("/search", async (req: Request, res: Response, next: NextFunction) => {
  try {
    const { page, filters } = parseListQuery(req.query, additiveFilters);
    res.json(await searchAdditives(page, filters));
  } catch (err) {
    next(err);
  }
});

// GET /api/v1/additives/:id
router.get("/:id", async (req: Request, res: Response, next: NextFunction) => {
  try {
    res.json(await getAdditiveById(parseId(req.params.id)));
  } catch (err) {
    next(err);
  }
});

// POST /api/v1/additives
router.post("/", async (req: Request, res: Response, next: NextFunction) => {
  try {
    const data = insertAdditiveSchema.parse(req.body);
    res.status(201).json(await createAdditive(data));
  } catch (err) {
    next(err);
  }
});

// PUT /api/v1/additives/:id
router.put("/:id", async (req: Request, res: Response, next: NextFunction) => {
  try {
    const id = parseId(req.params.id);
    const data = insertAdditiveSchema.partial().parse(req.body);
    res.json(await updateAdditive(id, data));
  } catch (err) {
    next(err);
  }
});

// DELETE /api/v1/additives/:id
router.delete("/:id", requireContributor, async (req: Request, res: Response, next: NextFunction) => {
  try {
    await deleteAdditive(parseId(req.params.id));
    res.status(204).end();
  } catch (err) {
    next(err);
  }
});

export default router;
