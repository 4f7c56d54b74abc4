import { Router } from "express";
import type { Request, Response, NextFunction } from "express";
import { z } from "zod";
import { insertBrandSchema } from "../../shared/schema.js";
import { requireContributor, requireUser } from "../middleware/auth.js";
import {
  createBrand,
  deleteBrand,
  findLookalikeBrand,
  getBrandById,
  listBrands,
  searchBrands,
  updateBrand,
} from "../services/brands.js";
import { int, num, parseId, parseListQuery, text, textList } from "./queryParams.js";

const router = Router();
router.use(requireUser);

const brandFilters = z.object({
  name: text(),
  name__ilike: text(),
  name__contains: text(),
  name__lookalike: text(),
  name__in: textList(),
  name__iin: textList(),
  parent_id: int(),
  parent___name__contains: text(),
  parent___name__lookalike: text(),
  score__ge: num(),
  score__le: num(),
});

const lookalikeQuerySchema = z.object({ name: z.string().min(1) });

// GET /api/v1/brands
router.get("/", async (_req: Request, res: Response, next: NextFunction) => {
  try {
    res.json(await listBrands());
  } catch (err) {
    next(err);
  }
});

// GET /api/v1/brands/search
router.get("/search", async (req: Request, res: Response, next: NextFunction) => {
  try {
    const { page, filters } = parseListQuery(req.query, brandFilters);
    res.json(await searchBrands(page, filters));
  } catch (err) {
    next(err);
  }
});

// GET /api/v1/brands/lookalike?name=
router.get("/lookalike", async (req: Request, res: Response, next: NextFunction) => {
  try {
    const { name } = lookalikeQuerySchema.parse(req.query);
    res.json(await findLookalikeBrand(name));
  } catch (err) {
    next(err);
  }
});

// GET /api/v1/brands/:id
router.get("/:id", async (req: Request, res: Response, next: NextFunction) => {
  try {
    res.json(await getBrandById(parseId(req.params.id)));
  } catch (err) {
    next(err);
  }
});

// POST /api/v1/brands
router.post("/", requireContributor, async (req: Request, res: Response, next: NextFunction) => {
  try {
    const data = insertBrandSchema.parse(req.body);
    res.status(201).json(await createBrand(data));
  } catch (err) {
    next(err);
  }
});

// PUT /api/v1/brands/:id
router.put("/:id", requireContributor, async (req: Request, res: Response, next: NextFunction) => {
  try {
    const id = parseId(req.params.id);
    const data = insertBrandSchema.partial().parse(req.body);
    res.json(await updateBrand(id, data));
  } catch (err) {
    next(err);
  }
});

// DELETE /api/v1/brands/:id
router.delete("/:id", requireContributor, async (req: Request, res: Response, next: NextFunction) => {
  try {
    await deleteBrand(parseId(req.params.id));
    res.status(204).end();
  } catch (err) {
    next(err);
  }
});

export default router;
