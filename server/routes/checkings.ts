import { Router } from "express";
import type { Request, Response, NextFunction } from "express";
import { z } from "zod";
import { checkingStatusEnum, insertCheckingSchema } from "../../shared/schema.js";
import { currentUser, requireContributor, requireUser } from "../middleware/auth.js";
import {
  countCheckings,
  createChecking,
  deleteChecking,
  getCheckingById,
  listCheckings,
  searchCheckings,
  updateChecking,
} from "../services/checkings.js";
import { date, int, oneOf, parseId, parseListQuery, text } from "./queryParams.js";

const router = Router();
router.use(requireUser);

const checkingFilters = z.object({
  status: oneOf(checkingStatusEnum.enumValues),
  requested_on: date(),
  requested_on__gt: date(),
  responded_on: date(),
  responded_on__gt: date(),
  user___nickname__ilike: text(),
  product___ean: text(),
  product_id: int(),
});

// GET /api/v1/checkings
router.get("/", async (_req: Request, res: Response, next: NextFunction) => {
  try {
    res.json(await listCheckings());
  } catch (err) {
    next(err);
  }
});

// GET /api/v1/checkings/count
router.get("/count", async (req: Request, res: Response, next: NextFunction) => {
  try {
    res.json({ total: await countCheckings(checkingFilters.parse(req.query)) });
  } catch (err) {
    next(err);
  }
});

// GET /api/v1/checkings/search
router.get("/search", async (req: Request, res: Response, next: NextFunction) => {
  try {
    const { page, filters } = parseListQuery(req.query, checkingFilters);
    res.json(await searchCheckings(page, filters));
  } catch (err) {
    next(err);
  }
});

// GET /api/v1/checkings/:id
router.get("/:id", async (req: Request, res: Response, next: NextFunction) => {
  try {
    res.json(await getCheckingById(parseId(req.params.id)));
  } catch (err) {
    next(err);
  }
});

// POST /api/v1/checkings
router.post("/", async (req: Request, res: Response, next: NextFunction) => {
  try {
    const data = insertCheckingSchema.parse(req.body);
    res.status(201).json(await createChecking(data, currentUser(req).id));
  } catch (err) {
    next(err);
  }
});

// PUT /api/v1/checkings/:id
router.put("/:id", requireContributor, async (req: Request, res: Response, next: NextFunction) => {
  try {
    const id = parseId(req.params.id);
    const data = insertCheckingSchema.partial().parse(req.body);
    res.json(await updateChecking(id, data));
  } catch (err) {
    next(err);
  }
});

// DELETE /api/v1/checkings/:id
router.delete("/:id", requireContributor, async (req: Request, res: Response, next: NextFunction) => {
  try {
    await deleteChecking(parseId(req.params.id));
    res.status(204).end();
  } catch (err) {
    next(err);
  }
});

export default router;
