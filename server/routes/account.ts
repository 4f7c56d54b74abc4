import { Router } from "express";
import type { Request, Response, NextFunction } from "express";
import { updateOwnAccountSchema } from "../../shared/schema.js";
import { currentUser, requireUser } from "../middleware/auth.js";
import { updateUser } from "../services/users.js";

const router = Router();
router.use(requireUser);

// GET /api/v1/account
router.get("/", (req: Request, res: Response, next: NextFunction) => {
  try {
    res.json(currentUser(req));
  } catch (err) {
    next(err);
  }
});

// PUT /api/v1/account
router.put("/", async (req: Request, res: Response, next: NextFunction) => {
  try {
    const user = currentUser(req);
    const data = updateOwnAccountSchema.parse(req.body);
    res.json(await updateUser(user.id, data));
  } catch (err) {
    next(err);
  }
});

export default router;
