import type { Request, RequestHandler } from "express";
import type { ApiClient, User, UserRole } from "../../shared/schema.js";
import { AppError, forbidden, notFound, unauthorized } from "../middleware/errorHandler.js";
import {
  extractApiKey,
  extractBearerToken,
  InvalidTokenError,
  verifyAccessToken,
  type TokenVerifierOptions,
} from "./jwt.js";

declare global {
  // eslint-disable-next-line @typescript-eslint/no-namespace
  namespace Express {
    interface Request {
      user?: User;
      apiClient?: ApiClient;
    }
  }
}

export interface AuthLookup {
  findUserById(id: number): Promise<User | undefined>;
  findApiClientByKey(apiKey: string): Promise<ApiClient | undefined>;
}

export interface AuthGuardOptions extends TokenVerifierOptions {
  lookup: AuthLookup;
}

export const INSUFFICIENT_PRIVILEGES = "The user does not have enough privileges";

export function hasRole(user: Pick<User, "role">, roles: readonly UserRole[]): boolean {
  return roles.includes(user.role);
}

/** The parts of a request the guards read and fill in. */
export type AuthContext = Pick<Request, "headers" | "user" | "apiClient">;

export type AccessPolicy = (ctx: AuthContext) => Promise<void>;

function guard(policy: AccessPolicy): RequestHandler {
  return async (req, _res, next) => {
    try {
      await policy(req);
      next();
    } catch (error) {
      next(error);
    }
  };
}

/**
 * Builds the express guards used by the routers. Each guard resolves the
 * caller once per request and stores it on `req.user` or `req.apiClient`.
 */
export function createAuthGuards(options: AuthGuardOptions) {
  const { lookup } = options;

  async function resolveActiveUser(ctx: AuthContext): Promise<User> {
    if (ctx.user) return ctx.user;

    const token = extractBearerToken(ctx.headers);
    if (!token) {
      throw unauthorized("Not authenticated");
    }

    let userId: number;
    try {
      userId = verifyAccessToken(token, options).sub;
    } catch (error) {
      if (error instanceof InvalidTokenError) throw unauthorized(error.message);
      throw error;
    }

    const user = await lookup.findUserById(userId);
    if (!user) throw notFound("User not found");
    if (!user.isActive) throw new AppError(400, "Bad Request", "Inactive user");

    ctx.user = user;
    return user;
  }

  async function resolveClient(ctx: AuthContext): Promise<ApiClient | undefined> {
    if (ctx.apiClient) return ctx.apiClient;

    const apiKey = extractApiKey(ctx.headers);
    if (!apiKey) return undefined;

    const client = await lookup.findApiClientByKey(apiKey);
    if (!client || !client.isActive) throw unauthorized("Invalid API key");

    ctx.apiClient = client;
    return client;
  }

  const authorize = {
    user: async (ctx: AuthContext) => {
      await resolveActiveUser(ctx);
    },
    roles:
      (roles: readonly UserRole[]): AccessPolicy =>
      async (ctx) => {
        const user = await resolveActiveUser(ctx);
        if (!hasRole(user, roles)) throw forbidden(INSUFFICIENT_PRIVILEGES);
      },
    userOrClient: async (ctx: AuthContext) => {
      const client = await resolveClient(ctx);
      if (!client) await resolveActiveUser(ctx);
    },
    adminOrClient: async (ctx: AuthContext) => {
      const client = await resolveClient(ctx);
      if (client) return;
      const user = await resolveActiveUser(ctx);
      if (!hasRole(user, ["admin"])) throw forbidden(INSUFFICIENT_PRIVILEGES);
    },
    client: async (ctx: AuthContext) => {
      const client = await resolveClient(ctx);
      if (!client) throw unauthorized("API key required");
    },
  } satisfies Record<string, AccessPolicy | ((roles: readonly UserRole[]) => AccessPolicy)>;

  return {
    authorize,
    requireUser: guard(authorize.user),
    requireRoles: (roles: readonly UserRole[]) => guard(authorize.roles(roles)),
    requireUserOrClient: guard(authorize.userOrClient),
    requireAdminOrClient: guard(authorize.adminOrClient),
    requireClient: guard(authorize.client),
  };
}

export type AuthGuards = ReturnType<typeof createAuthGuards>;
