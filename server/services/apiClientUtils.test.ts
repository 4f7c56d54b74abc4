import assert from "node:assert/strict";
import test from "node:test";
import { API_KEY_LENGTH, generateApiKey } from "./apiClientUtils.js";

test("generateApiKey produces 32 alphanumeric characters", () => {
  const key = generateApiKey();
  assert.equal(key.length, API_KEY_LENGTH);
  assert.match(key, /^[A-Za-z0-9]{32}$/);
});

test("generateApiKey honours a custom length", () => {
  assert.match(generateApiKey(8), /^[A-Za-z0-9]{8}$/);
});

test("generateApiKey does not repeat keys", () => {
  const keys = new Set(Array.from({ length: 50 }, () => generateApiKey()));
  assert.equal(keys.size, 50);
});
