import type { Request } from "express";
import type { User } from "../../shared/schema.js";
import { env } from "../config/env.js";
import { createAuthGuards } from "../auth/guards.js";
import { findApiClientByKey } from "../services/apiClients.js";
import { findUserById } from "../services/users.js";
import { unauthorized } from "./errorHandler.js";

export const guards = createAuthGuards({
  secret: env.SECRET_KEY,
  algorithm: env.JWT_ALGORITHM,
  lookup: { findUserById, findApiClientByKey },
});

export const { requireUser, requireRoles, requireUserOrClient, requireAdminOrClient, requireClient } = guards;

export const requireContributor = requireRoles(["contributor", "admin"]);
export const requireAdmin = requireRoles(["admin"]);

/** The user resolved by a user guard earlier in the chain. */
export function currentUser(req: Request): User {
  if (!req.user) throw unauthorized("Not authenticated");
  return req.user;
}
