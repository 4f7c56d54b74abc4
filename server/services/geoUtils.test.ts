import assert from "node:assert/strict";
import test from "node:test";
import { boundingBox, haversineDistance, nearestWithin } from "./geoUtils.js";

test("haversineDistance measures one degree of longitude at the equator", () => {
  const distance = haversineDistance({ latitude: 0, longitude: 0 }, { latitude: 0, longitude: 1 });
  assert.ok(Math.abs(distance - 111_194.93) < 0.01);
});

test("haversineDistance is zero for the same point", () => {
  const point = { latitude: 48.8566, longitude: 2.3522 };
  assert.equal(haversineDistance(point, point), 0);
});

test("boundingBox spans one degree per 111320 meters at the equator", () => {
  const box = boundingBox({ latitude: 0, longitude: 0 }, 111_320);
  assert.equal(box.minLatitude, -1);
  assert.equal(box.maxLatitude, 1);
  assert.ok(Math.abs(box.minLongitude + 1) < 1e-9);
  assert.ok(Math.abs(box.maxLongitude - 1) < 1e-9);
});

test("boundingBox widens in longitude away from the equator", () => {
  const box = boundingBox({ latitude: 60, longitude: 10 }, 1_000);
  const latSpan = box.maxLatitude - box.minLatitude;
  const lonSpan = box.maxLongitude - box.minLongitude;
  assert.ok(Math.abs(lonSpan / latSpan - 2) < 1e-9);
});

test("nearestWithin picks the closest candidate inside the radius", () => {
  const origin = { latitude: 0, longitude: 0 };
  const far = { id: 1, latitude: 0, longitude: 0.0008 };
  const near = { id: 2, latitude: 0, longitude: 0.0003 };
  const outside = { id: 3, latitude: 0, longitude: 0.01 };

  assert.equal(nearestWithin(origin, [far, outside, near], 100)?.id, 2);
  assert.equal(nearestWithin(origin, [outside], 100), undefined);
});
