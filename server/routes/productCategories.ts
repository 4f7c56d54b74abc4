import { Router } from "express";
import type { Request, Response, NextFunction } from "express";
import { z } from "zod";
import { insertProductCategorySchema } from "../../shared/schema.js";
import { requireContributor, requireUser } from "../middleware/auth.js";
import {
  createProductCategory,
  deleteProductCategory,
  getProductCategoryById,
  listChildCategories,
  listProductCategories,
  listRootCategories,
  searchProductCategories,
  updateProductCategory,
} from "../services/productCategories.js";
import { int, parseId, parseListQuery, text, textList } from "./queryParams.js";

const router = Router();
router.use(requireUser);

const productCategoryFilters = z.object({
  name: text(),
  name__ilike: text(),
  name__contains: text(),
  name__lookalike: text(),
  name__in: textList(),
  name__iin: textList(),
  parent_category_id: int(),
  parent___name__contains: text(),
  parent___name__lookalike: text(),
});

// GET /api/v1/product-categories
router.get("/", async (_req: Request, res: Response, next: NextFunction) => {
  try {
    res.json(await listProductCategories());
  } catch (err) {
    next(err);
  }
});

// GET /api/v1/product-categories/search
router.get("/search", async (req: Request, res: Response, next: NextFunction) => {
  try {
    const { page, filters } = parseListQuery(req.query, productCategoryFilters);
    res.json(await searchProductCategories(page, filters));
  } catch (err) {
    next(err);
  }
});

// GET /api/v1/product-categories/root
router.get("/root", async (_req: Request, res: Response, next: NextFunction) => {
  try {
    res.json(await listRootCategories());
  } catch (err) {
    next(err);
  }
});

// GET /api/v1/product-categories/:id
router.get("/:id", async (req: Request, res: Response, next: NextFunction) => {
  try {
    res.json(await getProductCategoryById(parseId(req.params.id)));
  } catch (err) {
    next(err);
  }
});

// GET /api/v1/product-categories/:id/children
router.get("/:id/children", async (req: Request, res: Response, next: NextFunction) => {
  try {
    res.json(await listChildCategories(parseId(req.params.id)));
  } catch (err) {
    next(err);
  }
});

// POST /api/v1/product-categories
router.post("/", requireContributor, async (req: Request, res: Response, next: NextFunction) => {
  try {
    const data = insertProductCategorySchema.parse(req.body);
    res.status(201).json(await createProductCategory(data));
  } catch (err) {
    next(err);
  }
});

// PUT /api/v1/product-categories/:id
router.put("/:id", requireContributor, async (req: Request, res: Response, next: NextFunction) => {
  try {
    const id = parseId(req.params.id);
    const data = insertProductCategorySchema.partial().parse(req.body);
    res.json(await updateProductCategory(id, data));
  } catch (err) {
    next(err);
  }
});

// DELETE /api/v1/product-categories/:id
router.delete("/:id", requireContributor, async (req: Request, res: Response, next: NextFunction) => {
  try {
    await deleteProductCategory(parseId(req.params.id));
    res.status(204).end();
  } catch (err) {
    next(err);
  }
});

export default router;
