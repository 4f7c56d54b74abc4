import { Router } from "express";
import type { Request, Response, NextFunction } from "express";
import { checkDatabaseHealth } from "../config/database.js";

const router = Router();

// GET /healthcheck
router.get("/healthcheck", async (_req: Request, res: Response, next: NextFunction) => {
  try {
    if (await checkDatabaseHealth()) {
      res.json({ status: "ok", database: "connected" });
    } else {
      res.status(503).json({ status: "error", database: "disconnected" });
    }
  } catch (err) {
    next(err);
  }
});

export default router;
