import assert from "node:assert/strict";
import test from "node:test";
import { offsetOf, pageCount, toPage } from "./paginationUtils.js";

test("offsetOf skips whole pages before the requested one", () => {
  assert.equal(offsetOf({ page: 1, size: 5 }), 0);
  assert.equal(offsetOf({ page: 3, size: 20 }), 40);
});

test("pageCount rounds partial pages up", () => {
  assert.equal(pageCount(0, 5), 0);
  assert.equal(pageCount(5, 5), 1);
  assert.equal(pageCount(6, 5), 2);
  assert.equal(pageCount(10, 0), 0);
});

test("toPage wraps items with paging metadata", () => {
  const page = toPage(["a", "b"], 7, { page: 2, size: 5 });
  assert.deepEqual(page, { items: ["a", "b"], total: 7, page: 2, size: 5, pages: 2 });
});
