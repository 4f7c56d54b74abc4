import { Router } from "express";
import type { Request, Response, NextFunction } from "express";
import { z } from "zod";
import { insertShopSchema } from "../../shared/schema.js";
import { requireAdmin, requireContributor, requireUser } from "../middleware/auth.js";
import {
  createShop,
  DEFAULT_NEARBY_RADIUS_METERS,
  deleteShop,
  getNearbyShop,
  getShopById,
  listShops,
  MAX_NEARBY_RADIUS_METERS,
  searchShops,
  updateShop,
} from "../services/shops.js";
import { parseId, parseListQuery, text, textList } from "./queryParams.js";

const router = Router();
router.use(requireUser);

const shopFilters = z.object({
  name: text(),
  name__ilike: text(),
  city: text(),
  country: text(),
  shop_type: text(),
  scan_events___ean__in: textList(),
});

const nearbyQuerySchema = z.object({
  latitude: z.coerce.number().min(-90).max(90),
  longitude: z.coerce.number().min(-180).max(180),
  radius: z.coerce.number().positive().max(MAX_NEARBY_RADIUS_METERS).default(DEFAULT_NEARBY_RADIUS_METERS),
});

// GET /api/v1/shops
router.get("/", async (_req: Request, res: Response, next: NextFunction) => {
  try {
    res.json(await listShops());
  } catch (err) {
    next(err);
  }
});

// GET /api/v1/shops/search
router.get("/search", async (req: Request, res: Response, next: NextFunction) => {
  try {
    const { page, filters } = parseListQuery(req.query, shopFilters);
    res.json(await searchShops(page, filters));
  } catch (err) {
    next(err);
  }
});

// GET /api/v1/shops/nearby?latitude=&longitude=&radius=
router.get("/nearby", async (req: Request, res: Response, next: NextFunction) => {
  try {
    const { latitude, longitude, radius } = nearbyQuerySchema.parse(req.query);
    res.json(await getNearbyShop({ latitude, longitude }, radius));
  } catch (err) {
    next(err);
  }
});

// GET /api/v1/shops/:id
router.get("/:id", async (req: Request, res: Response, next: NextFunction) => {
  try {
    res.json(await getShopById(parseId(req.params.id)));
  } catch (err) {
    next(err);
  }
});

// POST /api/v1/shops
router.post("/", requireContributor, async (req: Request, res: Response, next: NextFunction) => {
  try {
    const data = insertShopSchema.parse(req.body);
    res.status(201).json(await createShop(data));
  } catch (err) {
    next(err);
  }
});

// PUT /api/v1/shops/:id
router.put("/:id", requireContributor, async (req: Request, res: Response, next: NextFunction) => {
  try {
    const id = parseId(req.params.id);
    const data = insertShopSchema.partial().parse(req.body);
    res.json(await updateShop(id, data));
  } catch (err) {
    next(err);
  }
});

// DELETE /api/v1/shops/:id
router.delete("/:id", requireAdmin, async (req: Request, res: Response, next: NextFunction) => {
  try {
    await deleteShop(parseId(req.params.id));
    res.status(204).end();
  } catch (err) {
    next(err);
  }
});

export default router;
