import { Router } from "express";
import type { Request, Response, NextFunction } from "express";
import { z } from "zod";
import { insertInterestingProductSchema, interestingProductTypeEnum } from "../../shared/schema.js";
import { requireContributor, requireUserOrClient } from "../middleware/auth.js";
import {
  createInterestingProduct,
  deleteInterestingProduct,
  getInterestingProductByEan,
  getInterestingProductById,
  listInterestingProducts,
  searchInterestingProducts,
  updateInterestingProduct,
} from "../services/interestingProducts.js";
import { int, oneOf, parseId, parseListQuery, text } from "./queryParams.js";

const router = Router();

const interestingProductFilters = z.object({
  ean: text(),
  type: oneOf(interestingProductTypeEnum.enumValues),
  category_id: int(),
});

// GET /api/v1/interesting-products
router.get("/", requireUserOrClient, async (_req: Request, res: Response, next: NextFunction) => {
  try {
    res.json(await listInterestingProducts());
  } catch (err) {
    next(err);
  }
});

// GET /api/v1/interesting-products/search
router.get("/search", requireUserOrClient, async (req: Request, res: Response, next: NextFunction) => {
  try {
    const { page, filters } = parseListQuery(req.query, interestingProductFilters);
    res.json(await searchInterestingProducts(page, filters));
  } catch (err) {
    next(err);
  }
});

// GET /api/v1/interesting-products/ean/:ean
router.get("/ean/:ean", requireUserOrClient, async (req: Request, res: Response, next: NextFunction) => {
  try {
    res.json(await getInterestingProductByEan(req.params.ean));
  } catch (err) {
    next(err);
  }
});

// GET /api/v1/interesting-products/:id
router.get("/:id", requireUserOrClient, async (req: Request, res: Response, next: NextFunction) => {
  try {
    res.json(await getInterestingProductById(parseId(req.params.id)));
  } catch (err) {
    next(err);
  }
});

// POST /api/v1/interesting-products
router.post("/", requireContributor, async (req: Request, res: Response, next: NextFunction) => {
  try {
    const data = insertInterestingProductSchema.parse(req.body);
    res.status(201).json(await createInterestingProduct(data));
  } catch (err) {
    next(err);
  }
});

// PUT /api/v1/interesting-products/:id
router.put("/:id", requireContributor, async (req: Request, res: Response, next: NextFunction) => {
  try {
    const id = parseId(req.params.id);
    const data = insertInterestingProductSchema.partial().parse(req.body);
    res.json(await updateInterestingProduct(id, data));
  } catch (err) {
    next(err);
  }
});

// DELETE /api/v1/interesting-products/:id
router.delete("/:id", requireContributor, async (req: Request, res: Response, next: NextFunction) => {
  try {
    await deleteInterestingProduct(parseId(req.params.id));
    res.status(204).end();
  } catch (err) {
    next(err);
  }
});

export default router;
