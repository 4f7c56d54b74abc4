import { Router } from "express";
import type { Request, Response, NextFunction } from "express";
import { insertProductSchema } from "../../shared/schema.js";
import { requireClient } from "../middleware/auth.js";
import { createProduct } from "../services/products.js";

// Endpoints for partner applications holding an API key.
const router = Router();
router.use(requireClient);

// POST /api/v1/external/products
router.post("/products", async (req: Request, res: Response, next: NextFunction) => {
  try {
    const data = insertProductSchema.parse(req.body);
    res.status(201).json(await createProduct(data, null));
  } catch (err) {
    next(err);
  }
});

export default router;
