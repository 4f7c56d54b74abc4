import assert from "node:assert/strict";
import test from "node:test";
import { ancestorChain, indexById, pathFromRoot, wouldCreateCycle } from "./hierarchyUtils.js";

const categories = indexById([
  { id: 1, name: "Food", parentId: null },
  { id: 2, name: "Dairy alternatives", parentId: 1 },
  { id: 3, name: "Oat drinks", parentId: 2 },
  { id: 4, name: "Cosmetics", parentId: null },
]);

test("ancestorChain starts at the node and climbs to the root", () => {
  assert.deepEqual(
    ancestorChain(3, categories).map((node) => node.id),
    [3, 2, 1],
  );
  assert.deepEqual(ancestorChain(99, categories), []);
});

test("pathFromRoot lists names top down", () => {
  assert.deepEqual(pathFromRoot(3, categories), ["Food", "Dairy alternatives", "Oat drinks"]);
  assert.deepEqual(pathFromRoot(4, categories), ["Cosmetics"]);
});

test("ancestorChain stops on existing cycles", () => {
  const looped = indexById([
    { id: 1, name: "A", parentId: 2 },
    { id: 2, name: "B", parentId: 1 },
  ]);
  assert.deepEqual(
    ancestorChain(1, looped).map((node) => node.id),
    [1, 2],
  );
});

test("wouldCreateCycle detects self and descendant parents", () => {
  assert.equal(wouldCreateCycle(1, 1, categories), true);
  assert.equal(wouldCreateCycle(1, 3, categories), true);
  assert.equal(wouldCreateCycle(3, 4, categories), false);
  assert.equal(wouldCreateCycle(4, 3, categories), false);
});
