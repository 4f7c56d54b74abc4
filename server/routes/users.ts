import { Router } from "express";
import type { Request, Response, NextFunction } from "express";
import { z } from "zod";
import { insertUserSchema, userRoleEnum } from "../../shared/schema.js";
import { requireAdmin, requireAdminOrClient } from "../middleware/auth.js";
import {
  createUser,
  deleteUser,
  getUserByEmail,
  getUserById,
  listUsers,
  searchUsers,
  updateUser,
} from "../services/users.js";
import { bool, oneOf, parseId, parseListQuery, text } from "./queryParams.js";

const router = Router();

const userFilters = z.object({
  nickname: text(),
  nickname__contains: text(),
  email: text(),
  email__contains: text(),
  role: oneOf(userRoleEnum.enumValues),
  is_active: bool(),
});

// GET /api/v1/users
router.get("/", requireAdmin, async (_req: Request, res: Response, next: NextFunction) => {
  try {
    res.json(await listUsers());
  } catch (err) {
    next(err);
  }
});

// GET /api/v1/users/search
router.get("/search", requireAdmin, async (req: Request, res: Response, next: NextFunction) => {
  try {
    const { page, filters } = parseListQuery(req.query, userFilters);
    res.json(await searchUsers(page, filters));
  } catch (err) {
    next(err);
  }
});

// GET /api/v1/users/email/:email
router.get("/email/:email", requireAdmin, async (req: Request, res: Response, next: NextFunction) => {
  try {
    res.json(await getUserByEmail(req.params.email));
  } catch (err) {
    next(err);
  }
});

// GET /api/v1/users/:id
router.get("/:id", requireAdmin, async (req: Request, res: Response, next: NextFunction) => {
  try {
    res.json(await getUserById(parseId(req.params.id)));
  } catch (err) {
    next(err);
  }
});

// POST /api/v1/users
router.post("/", requireAdminOrClient, async (req: Request, res: Response, next: NextFunction) => {
  try {
    const data = insertUserSchema.parse(req.body);
    res.status(201).json(await createUser(data));
  } catch (err) {
    next(err);
  }
});

// PUT /api/v1/users/:id
router.put("/:id", requireAdmin, async (req: Request, res: Response, next: NextFunction) => {
  try {
    const id = parseId(req.params.id);
    const data = insertUserSchema.parse(req.body);
    res.json(await updateUser(id, data));
  } catch (err) {
    next(err);
  }
});

// PATCH /api/v1/users/:id
router.patch("/:id", requireAdmin, async (req: Request, res: Response, next: NextFunction) => {
  try {
    const id = parseId(req.params.id);
    const data = insertUserSchema.partial().parse(req.body);
    res.json(await updateUser(id, data));
  } catch (err) {
    next(err);
  }
});

// DELETE /api/v1/users/:id
router.delete("/:id", requireAdmin, async (req: Request, res: Response, next: NextFunction) => {
  try {
    await deleteUser(parseId(req.params.id));
    res.status(204).end();
  } catch (err) {
    next(err);
  }
});

export default router;
