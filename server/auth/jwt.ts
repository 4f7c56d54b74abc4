import type { IncomingHttpHeaders } from "node:http";
import jwt, { type Algorithm, type JwtPayload } from "jsonwebtoken";
import { z } from "zod";

const tokenPayloadSchema = z.object({
  sub: z.coerce.number().int().positive(),
});

export type TokenPayload = z.infer<typeof tokenPayloadSchema>;

export interface TokenVerifierOptions {
  secret: string;
  algorithm: Algorithm;
}

export class InvalidTokenError extends Error {
  constructor(message = "Could not validate credentials") {
    super(message);
    this.name = "InvalidTokenError";
  }
}

export function extractBearerToken(headers: IncomingHttpHeaders): string | null {
  const header = headers.authorization;
  if (!header) return null;
  const [scheme, token] = header.split(" ");
  if (scheme?.toLowerCase() !== "bearer" || !token) return null;
  return token.trim() || null;
}

export function extractApiKey(headers: IncomingHttpHeaders): string | null {
  const value = headers["x-api-key"];
  const key = Array.isArray(value) ? value[0] : value;
  return key?.trim() || null;
}

/**
 * Verifies a bearer token issued by the auth service and returns its payload.
 * Only the configured algorithm is accepted.
 */
export function verifyAccessToken(token: string, options: TokenVerifierOptions): TokenPayload {
  let decoded: string | JwtPayload;
  try {
    decoded = jwt.verify(token, options.secret, { algorithms: [options.algorithm] });
  } catch {
    throw new InvalidTokenError();
  }
  if (typeof decoded === "string") {
    throw new InvalidTokenError();
  }

  const payload = tokenPayloadSchema.safeParse(decoded);
  if (!payload.success) {
    throw new InvalidTokenError();
  }
  return payload.data;
}
