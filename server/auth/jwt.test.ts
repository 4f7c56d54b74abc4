import assert from "node:assert/strict";
import test from "node:test";
import jwt from "jsonwebtoken";
import { extractApiKey, extractBearerToken, InvalidTokenError, verifyAccessToken } from "./jwt.js";

const options = { secret: "test-secret", algorithm: "HS256" } as const;

test("extractBearerToken reads the authorization header", () => {
  assert.equal(extractBearerToken({ authorization: "Bearer abc.def.ghi" }), "abc.def.ghi");
  assert.equal(extractBearerToken({ authorization: "bearer abc" }), "abc");
  assert.equal(extractBearerToken({ authorization: "Basic abc" }), null);
  assert.equal(extractBearerToken({}), null);
});

test("extractApiKey reads x-api-key", () => {
  assert.equal(extractApiKey({ "x-api-key": " key-1 " }), "key-1");
  assert.equal(extractApiKey({ "x-api-key": "" }), null);
  assert.equal(extractApiKey({}), null);
});

test("verifyAccessToken returns the numeric subject", () => {
  const token = jwt.sign({ sub: "42" }, "test-secret", { algorithm: "HS256" });
  assert.deepEqual(verifyAccessToken(token, options), { sub: 42 });
});

test("verifyAccessToken rejects other algorithms", () => {
  const token = jwt.sign({ sub: "42" }, "test-secret", { algorithm: "HS512" });
  assert.throws(() => verifyAccessToken(token, options), InvalidTokenError);
});

test("verifyAccessToken rejects tokens without a usable subject", () => {
  const token = jwt.sign({ scope: "read" }, "test-secret", { algorithm: "HS256" });
  assert.throws(() => verifyAccessToken(token, options), InvalidTokenError);

  const named = jwt.sign({ sub: "alice" }, "test-secret", { algorithm: "HS256" });
  assert.throws(() => verifyAccessToken(named, options), InvalidTokenError);
});

test("verifyAccessToken rejects garbage", () => {
  assert.throws(() => verifyAccessToken("not-a-token", options), /Could not validate credentials/);
});
