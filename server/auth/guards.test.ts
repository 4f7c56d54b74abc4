import assert from "node:assert/strict";
import test from "node:test";
import jwt from "jsonwebtoken";
import type { ApiClient, User, UserRole } from "../../shared/schema.js";
import { AppError } from "../middleware/errorHandler.js";
import { createAuthGuards, hasRole, type AuthContext } from "./guards.js";

const SECRET = "test-secret";
const created = new Date("2024-01-01T00:00:00Z");

function makeUser(id: number, role: UserRole, isActive = true): User {
  return {
    id,
    createdAt: created,
    updatedAt: created,
    role,
    nickname: `user${id}`,
    email: `user${id}@example.test`,
    isActive,
    avatar: null,
    nbProductsSent: 0,
  };
}

const client: ApiClient = {
  id: 1,
  createdAt: created,
  updatedAt: created,
  name: "scanner-app",
  apiKey: "test-api-key",
  isActive: true,
};

const usersById = new Map<number, User>([
  [1, makeUser(1, "admin")],
  [2, makeUser(2, "contributor")],
  [3, makeUser(3, "user")],
  [4, makeUser(4, "user", false)],
]);

const { authorize } = createAuthGuards({
  secret: SECRET,
  algorithm: "HS256",
  lookup: {
    findUserById: async (id) => usersById.get(id),
    findApiClientByKey: async (apiKey) =>
      apiKey === client.apiKey ? client : apiKey === "disabled-key" ? { ...client, isActive: false } : undefined,
  },
});

function bearer(sub: string, secret = SECRET): AuthContext {
  return { headers: { authorization: `Bearer ${jwt.sign({ sub }, secret, { algorithm: "HS256" })}` } };
}

async function rejectsWith(promise: Promise<unknown>, status: number, detail: string) {
  await assert.rejects(promise, (error: unknown) => {
    assert.ok(error instanceof AppError);
    assert.equal(error.status, status);
    assert.equal(error.detail, detail);
    return true;
  });
}

test("hasRole checks membership", () => {
  assert.equal(hasRole({ role: "contributor" }, ["contributor", "admin"]), true);
  assert.equal(hasRole({ role: "user" }, ["contributor", "admin"]), false);
});

test("a valid token resolves the active user onto the context", async () => {
  const ctx = bearer("3");
  await authorize.user(ctx);
  assert.equal(ctx.user?.id, 3);
});

test("missing tokens are rejected", async () => {
  await rejectsWith(authorize.user({ headers: {} }), 401, "Not authenticated");
});

test("tokens signed with another secret are rejected", async () => {
  await rejectsWith(authorize.user(bearer("3", "other-secret")), 401, "Could not validate credentials");
});

test("expired tokens are rejected", async () => {
  const token = jwt.sign({ sub: "3", exp: Math.floor(Date.now() / 1000) - 60 }, SECRET, { algorithm: "HS256" });
  await rejectsWith(
    authorize.user({ headers: { authorization: `Bearer ${token}` } }),
    401,
    "Could not validate credentials",
  );
});

test("unknown and inactive users are rejected", async () => {
  await rejectsWith(authorize.user(bearer("99")), 404, "User not found");
  await rejectsWith(authorize.user(bearer("4")), 400, "Inactive user");
});

test("role policies reject users without the role", async () => {
  const contributorOrAdmin = authorize.roles(["contributor", "admin"]);
  await contributorOrAdmin(bearer("2"));
  await rejectsWith(contributorOrAdmin(bearer("3")), 403, "The user does not have enough privileges");
});

test("userOrClient accepts an API key without a token", async () => {
  const ctx: AuthContext = { headers: { "x-api-key": "test-api-key" } };
  await authorize.userOrClient(ctx);
  assert.equal(ctx.apiClient?.name, "scanner-app");
  assert.equal(ctx.user, undefined);
});

test("userOrClient falls back to the bearer token", async () => {
  const ctx = bearer("3");
  await authorize.userOrClient(ctx);
  assert.equal(ctx.user?.id, 3);
});

test("unknown or inactive API keys are rejected", async () => {
  await rejectsWith(authorize.userOrClient({ headers: { "x-api-key": "nope" } }), 401, "Invalid API key");
  await rejectsWith(authorize.userOrClient({ headers: { "x-api-key": "disabled-key" } }), 401, "Invalid API key");
});

test("adminOrClient lets admins and clients through only", async () => {
  await authorize.adminOrClient(bearer("1"));
  await authorize.adminOrClient({ headers: { "x-api-key": "test-api-key" } });
  await rejectsWith(authorize.adminOrClient(bearer("2")), 403, "The user does not have enough privileges");
});

test("client policy requires an API key", async () => {
  await rejectsWith(authorize.client(bearer("1")), 401, "API key required");
});
