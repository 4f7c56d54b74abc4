import { Router } from "express";
import type { Request, Response, NextFunction } from "express";
import { z } from "zod";
import { insertErrorReportSchema } from "../../shared/schema.js";
import { requireContributor, requireUser, requireUserOrClient } from "../middleware/auth.js";
import {
  countErrorReports,
  createErrorReport,
  deleteErrorReport,
  getErrorReportById,
  listErrorReports,
  searchErrorReports,
  updateErrorReport,
} from "../services/errorReports.js";
import { bool, date, parseId, parseListQuery, text } from "./queryParams.js";

const router = Router();

const errorReportFilters = z.object({
  ean: text(),
  ean__ilike: text(),
  ean__contains: text(),
  comment__contains: text(),
  contact: text(),
  contact__contains: text(),
  handled: bool(),
  created_at: date(),
  created_at__gt: date(),
});

// GET /api/v1/error-reports
router.get("/", requireUser, async (_req: Request, res: Response, next: NextFunction) => {
  try {
    res.json(await listErrorReports());
  } catch (err) {
    next(err);
  }
});

// GET /api/v1/error-reports/count
router.get("/count", requireUser, async (req: Request, res: Response, next: NextFunction) => {
  try {
    res.json({ total: await countErrorReports(errorReportFilters.parse(req.query)) });
  } catch (err) {
    next(err);
  }
});

// GET /api/v1/error-reports/search
router.get("/search", requireUser, async (req: Request, res: Response, next: NextFunction) => {
  try {
    const { page, filters } = parseListQuery(req.query, errorReportFilters);
    res.json(await searchErrorReports(page, filters));
  } catch (err) {
    next(err);
  }
});

// GET /api/v1/error-reports/:id
router.get("/:id", requireUser, async (req: Request, res: Response, next: NextFunction) => {
  try {
    res.json(await getErrorReportById(parseId(req.params.id)));
  } catch (err) {
    next(err);
  }
});

// POST /api/v1/error-reports
router.post("/", requireUserOrClient, async (req: Request, res: Response, next: NextFunction) => {
  try {
    const data = insertErrorReportSchema.parse(req.body);
    const createdBy = data.createdBy ?? req.user?.id ?? null;
    res.status(201).json(await createErrorReport({ ...data, createdBy }));
  } catch (err) {
    next(err);
  }
});

// PUT /api/v1/error-reports/:id
router.put("/:id", requireContributor, async (req: Request, res: Response, next: NextFunction) => {
  try {
    const id = parseId(req.params.id);
    const data = insertErrorReportSchema.partial().parse(req.body);
    res.json(await updateErrorReport(id, data));
  } catch (err) {
    next(err);
  }
});

// DELETE /api/v1/error-reports/:id
router.delete("/:id", requireContributor, async (req: Request, res: Response, next: NextFunction) => {
  try {
    await deleteErrorReport(parseId(req.params.id));
    res.status(204).end();
  } catch (err) {
    next(err);
  }
});

export default router;
