import { Router } from "express";
import type { Request, Response, NextFunction } from "express";
import { z } from "zod";
import { insertApiClientSchema } from "../../shared/schema.js";
import { requireAdmin } from "../middleware/auth.js";
import {
  createApiClient,
  deleteApiClient,
  getApiClientById,
  listApiClients,
  searchApiClients,
  updateApiClient,
} from "../services/apiClients.js";
import { bool, parseId, parseListQuery, text } from "./queryParams.js";

const router = Router();
router.use(requireAdmin);

const apiClientFilters = z.object({
  name: text(),
  name__ilike: text(),
  name__contains: text(),
  api_key: text(),
  is_active: bool(),
});

// A key is generated when the body leaves it out.
const createApiClientSchema = insertApiClientSchema.partial({ apiKey: true });

// GET /api/v1/api-clients
router.get("/", async (_req: Request, res: Response, next: NextFunction) => {
  try {
    res.json(await listApiClients());
  } catch (err) {
    next(err);
  }
});

// GET /api/v1/api-clients/search
router.get("/search", async (req: Request, res: Response, next: NextFunction) => {
  try {
    const { page, filters } = parseListQuery(req.query, apiClientFilters);
    res.json(await searchApiClients(page, filters));
  } catch (err) {
    next(err);
  }
});

// GET /api/v1/api-clients/:id
router.get("/:id", async (req: Request, res: Response, next: NextFunction) => {
  try {
    res.json(await getApiClientById(parseId(req.params.id)));
  } catch (err) {
    next(err);
  }
});

// POST /api/v1/api-clients
router.post("/", async (req: Request, res: Response, next: NextFunction) => {
  try {
    const data = createApiClientSchema.parse(req.body);
    res.status(201).json(await createApiClient(data));
  } catch (err) {
    next(err);
  }
});

// PUT /api/v1/api-clients/:id
router.put("/:id", async (req: Request, res: Response, next: NextFunction) => {
  try {
    const id = parseId(req.params.id);
    const data = insertApiClientSchema.partial().parse(req.body);
    res.json(await updateApiClient(id, data));
  } catch (err) {
    next(err);
  }
});

// DELETE /api/v1/api-clients/:id
router.delete("/:id", async (req: Request, res: Response, next: NextFunction) => {
  try {
    await deleteApiClient(parseId(req.params.id));
    res.status(204).end();
  } catch (err) {
    next(err);
  }
});

export default router;
