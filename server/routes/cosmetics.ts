import { Router } from "express";
import type { Request, Response, NextFunction } from "express";
import { z } from "zod";
import { insertCosmeticSchema } from "../../shared/schema.js";
import { requireContributor, requireUser } from "../middleware/auth.js";
import {
  createCosmetic,
  deleteCosmetic,
  getCosmeticById,
  listCosmetics,
  searchCosmetics,
  updateCosmetic,
} from "../services/cosmetics.js";
import { bool, parseId, parseListQuery, text } from "./queryParams.js";

const router = Router();
router.use(requireUser);

const cosmeticFilters = z.object({
  brand_name: text(),
  brand_name__ilike: text(),
  brand_name__contains: text(),
  is_vegan: bool(),
  is_cruelty_free: bool(),
});

// GET /api/v1/cosmetics
router.get("/", async (_req: Request, res: Response, next: NextFunction) => {
  try {
    res.json(await listCosmetics());
  } catch (err) {
    next(err);
  }
});

// GET /api/v1/cosmetics/search
router.get("/search", async (req: Request, res: Response, next: NextFunction) => {
  try {
    const { page, filters } = parseListQuery(req.query, cosmeticFilters);
    res.json(await searchCosmetics(page, filters));
  } catch (err) {
    next(err);
  }
});

// GET /api/v1/cosmetics/:id
router.get("/:id", async (req: Request, res: Response, next: NextFunction) => {
  try {
    res.json(await getCosmeticById(parseId(req.params.id)));
  } catch (err) {
    next(err);
  }
});

// POST /api/v1/cosmetics
router.post("/", async (req: Request, res: Response, next: NextFunction) => {
  try {
    const data = insertCosmeticSchema.parse(req.body);
    res.status(201).json(await createCosmetic(data));
  } catch (err) {
    next(err);
  }
});

// PUT /api/v1/cosmetics/:id
router.put("/:id", async (req: Request, res: Response, next: NextFunction) => {
  try {
    const id = parseId(req.params.id);
    const data = insertCosmeticSchema.partial().parse(req.body);
    res.json(await updateCosmetic(id, data));
  } catch (err) {
    next(err);
  }
});

// DELETE /api/v1/cosmetics/:id
router.delete("/:id", requireContributor, async (req: Request, res: Response, next: NextFunction) => {
  try {
    await deleteCosmetic(parseId(req.params.id));
    res.status(204).end();
  } catch (err) {
    next(err);
  }
});

export default router;
