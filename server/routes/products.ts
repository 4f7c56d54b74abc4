import { Router } from "express";
import type { Request, Response, NextFunction } from "express";
import { z } from "zod";
import { insertProductSchema, productStateEnum, productStatusEnum } from "../../shared/schema.js";
import { currentUser, requireContributor, requireUser, requireUserOrClient } from "../middleware/auth.js";
import {
  countProducts,
  createProduct,
  deleteProduct,
  getProductByEan,
  getProductById,
  listProducts,
  searchProducts,
  updateProduct,
} from "../services/products.js";
import { date, int, oneOf, oneOfList, parseId, parseListQuery, text } from "./queryParams.js";

const router = Router();

const productFilters = z.object({
  ean: text(),
  name: text(),
  name__ilike: text(),
  name__contains: text(),
  brand_id: int(),
  brand_name__contains: text(),
  brand___name__contains: text(),
  brand___name__lookalike: text(),
  status: oneOf(productStatusEnum.enumValues),
  state: oneOf(productStateEnum.enumValues),
  state__in: oneOfList(productStateEnum.enumValues),
  created_at: date(),
  created_at__gt: date(),
  last_requested_by__contains: text(),
});

// GET /api/v1/products
router.get("/", requireUser, async (_req: Request, res: Response, next: NextFunction) => {
  try {
    res.json(await listProducts());
  } catch (err) {
    next(err);
  }
});

// GET /api/v1/products/count
router.get("/count", requireUser, async (req: Request, res: Response, next: NextFunction) => {
  try {
    const filters = productFilters.parse(req.query);
    res.json({ total: await countProducts(filters) });
  } catch (err) {
    next(err);
  }
});

// GET /api/v1/products/search
router.get("/search", requireUser, async (req: Request, res: Response, next: NextFunction) => {
  try {
    const { page, filters } = parseListQuery(req.query, productFilters);
    res.json(await searchProducts(page, filters));
  } catch (err) {
    next(err);
  }
});

// GET /api/v1/products/ean/:ean
router.get("/ean/:ean", requireUser, async (req: Request, res: Response, next: NextFunction) => {
  try {
    res.json(await getProductByEan(req.params.ean));
  } catch (err) {
    next(err);
  }
});

// GET /api/v1/products/:id
router.get("/:id", requireUser, async (req: Request, res: Response, next: NextFunction) => {
  try {
    res.json(await getProductById(parseId(req.params.id)));
  } catch (err) {
    next(err);
  }
});

// POST /api/v1/products
router.post("/", requireUserOrClient, async (req: Request, res: Response, next: NextFunction) => {
  try {
    const data = insertProductSchema.parse(req.body);
    res.status(201).json(await createProduct(data, req.user?.id ?? null));
  } catch (err) {
    next(err);
  }
});

// PUT /api/v1/products/:id
router.put("/:id", requireContributor, async (req: Request, res: Response, next: NextFunction) => {
  try {
    const id = parseId(req.params.id);
    const data = insertProductSchema.partial().parse(req.body);
    res.json(await updateProduct(id, data, currentUser(req).id));
  } catch (err) {
    next(err);
  }
});

// DELETE /api/v1/products/:id
router.delete("/:id", requireContributor, async (req: Request, res: Response, next: NextFunction) => {
  try {
    await deleteProduct(parseId(req.params.id));
    res.status(204).end();
  } catch (err) {
    next(err);
  }
});

export default router;
