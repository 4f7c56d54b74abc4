import { Router } from "express";
import type { Request, Response, NextFunction } from "express";
import { z } from "zod";
import { insertScanEventSchema } from "../../shared/schema.js";
import { requireAdmin, requireContributor, requireUser, requireUserOrClient } from "../middleware/auth.js";
import {
  createScanEvent,
  DEFAULT_SCANS_BY_EAN_LIMIT,
  deleteScanEvent,
  getScanEventById,
  listScanEvents,
  listScanEventsByEan,
  MAX_SCANS_BY_EAN_LIMIT,
  searchScanEvents,
  updateScanEvent,
  userScanSummary,
} from "../services/scanEvents.js";
import { date, int, parseId, parseListQuery, text, textList } from "./queryParams.js";

const router = Router();

const scanEventFilters = z.object({
  ean: text(),
  ean__in: textList(),
  shop_id: int(),
  user_id: int(),
  date_created__gt: date(),
  date_created__lt: date(),
});

const byEanQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(MAX_SCANS_BY_EAN_LIMIT).default(DEFAULT_SCANS_BY_EAN_LIMIT),
});

// GET /api/v1/scan-events
router.get("/", requireUser, async (_req: Request, res: Response, next: NextFunction) => {
  try {
    res.json(await listScanEvents());
  } catch (err) {
    next(err);
  }
});

// GET /api/v1/scan-events/search
router.get("/search", requireUser, async (req: Request, res: Response, next: NextFunction) => {
  try {
    const { page, filters } = parseListQuery(req.query, scanEventFilters);
    res.json(await searchScanEvents(page, filters));
  } catch (err) {
    next(err);
  }
});

// GET /api/v1/scan-events/by-ean/:ean?limit=
router.get("/by-ean/:ean", requireUser, async (req: Request, res: Response, next: NextFunction) => {
  try {
    const { limit } = byEanQuerySchema.parse(req.query);
    res.json(await listScanEventsByEan(req.params.ean, limit));
  } catch (err) {
    next(err);
  }
});

// GET /api/v1/scan-events/users/:userId/summary
router.get("/users/:userId/summary", requireUser, async (req: Request, res: Response, next: NextFunction) => {
  try {
    res.json(await userScanSummary(parseId(req.params.userId)));
  } catch (err) {
    next(err);
  }
});

// GET /api/v1/scan-events/:id
router.get("/:id", requireUser, async (req: Request, res: Response, next: NextFunction) => {
  try {
    res.json(await getScanEventById(parseId(req.params.id)));
  } catch (err) {
    next(err);
  }
});

// POST /api/v1/scan-events
router.post("/", requireUserOrClient, async (req: Request, res: Response, next: NextFunction) => {
  try {
    const data = insertScanEventSchema.parse(req.body);
    res.status(201).json(await createScanEvent(data, req.user?.id ?? null));
  } catch (err) {
    next(err);
  }
});

// PUT /api/v1/scan-events/:id
router.put("/:id", requireContributor, async (req: Request, res: Response, next: NextFunction) => {
  try {
    const id = parseId(req.params.id);
    const data = insertScanEventSchema.partial().parse(req.body);
    res.json(await updateScanEvent(id, data));
  } catch (err) {
    next(err);
  }
});

// DELETE /api/v1/scan-events/:id
router.delete("/:id", requireAdmin, async (req: Request, res: Response, next: NextFunction) => {
  try {
    await deleteScanEvent(parseId(req.params.id));
    res.status(204).end();
  } catch (err) {
    next(err);
  }
});

export default router;
