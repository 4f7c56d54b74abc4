import assert from "node:assert/strict";
import test from "node:test";
import { buildOverpassQuery, createOverpassClient, parseOverpassShop } from "./openstreetmap.js";

const center = { latitude: 48.8566, longitude: 2.3522 };

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}

test("buildOverpassQuery searches nodes and ways around the point", () => {
  assert.equal(
    buildOverpassQuery(center, 100, 20),
    '[out:json][timeout:20];(node(around:100,48.8566,2.3522)["shop"~"^(supermarket|convenience|greengrocer|food)$"];' +
      'way(around:100,48.8566,2.3522)["shop"~"^(supermarket|convenience|greengrocer|food)$"];);out center;',
  );
});

test("parseOverpassShop maps node tags onto shop fields", () => {
  const shop = parseOverpassShop({
    type: "node",
    id: 123456,
    lat: 48.85,
    lon: 2.35,
    tags: {
      name: "Green Grocer",
      shop: "greengrocer",
      "addr:housenumber": "12",
      "addr:street": "Rue des Lilas",
      "addr:city": "Paris",
      "addr:country": "FR",
    },
  });

  assert.deepEqual(shop, {
    name: "Green Grocer",
    latitude: 48.85,
    longitude: 2.35,
    address: "12 Rue des Lilas",
    city: "Paris",
    country: "FR",
    osmId: "123456",
    osmType: "node",
    shopType: "greengrocer",
  });
});

test("parseOverpassShop reads way positions from center and applies defaults", () => {
  const shop = parseOverpassShop({
    type: "way",
    id: 42,
    center: { lat: 45.1, lon: 5.7 },
    tags: { brand: "Corner Market", "addr:street": "Main Street" },
  });

  assert.equal(shop?.name, "Corner Market");
  assert.equal(shop?.latitude, 45.1);
  assert.equal(shop?.longitude, 5.7);
  assert.equal(shop?.address, "Main Street");
  assert.equal(shop?.shopType, "supermarket");
  assert.equal(shop?.city, null);
});

test("parseOverpassShop falls back to a placeholder name", () => {
  const shop = parseOverpassShop({ type: "node", id: 1, lat: 1, lon: 1 });
  assert.equal(shop?.name, "Unknown shop");
  assert.equal(shop?.address, null);
});

test("parseOverpassShop drops elements without coordinates", () => {
  assert.equal(parseOverpassShop({ type: "way", id: 7, tags: { name: "Nowhere" } }), null);
});

test("findNearbyShop posts the query form-encoded and returns the nearest shop", async () => {
  let captured: RequestInit | undefined;
  const client = createOverpassClient({
    url: "http://overpass.test/api/interpreter",
    timeoutMs: 5000,
    userAgent: "vegan-catalog-api/test",
    fetchImpl: async (_input, init) => {
      captured = init;
      return jsonResponse({
        elements: [
          { type: "node", id: 1, lat: 48.8572, lon: 2.3522, tags: { name: "Farther" } },
          { type: "way", id: 2, tags: { name: "No position" } },
          { type: "node", id: 3, lat: 48.8567, lon: 2.3522, tags: { name: "Closer" } },
        ],
      });
    },
  });

  const shop = await client.findNearbyShop(center, 100);

  assert.equal(shop?.name, "Closer");
  assert.equal(shop?.osmId, "3");
  assert.equal(captured?.method, "POST");
  const body = captured?.body;
  assert.ok(body instanceof URLSearchParams);
  assert.equal(body.get("data"), buildOverpassQuery(center, 100, 5));
});

test("findNearbyShop returns null when nothing is found", async () => {
  const client = createOverpassClient({
    url: "http://overpass.test/api/interpreter",
    timeoutMs: 5000,
    userAgent: "vegan-catalog-api/test",
    fetchImpl: async () => jsonResponse({ elements: [] }),
  });
  assert.equal(await client.findNearbyShop(center, 100), null);
});

test("findNearbyShop returns null on HTTP errors", async () => {
  const client = createOverpassClient({
    url: "http://overpass.test/api/interpreter",
    timeoutMs: 5000,
    userAgent: "vegan-catalog-api/test",
    fetchImpl: async () => jsonResponse({ error: "busy" }, 504),
  });
  assert.equal(await client.findNearbyShop(center, 100), null);
});

test("findNearbyShop returns null when the request throws", async () => {
  const client = createOverpassClient({
    url: "http://overpass.test/api/interpreter",
    timeoutMs: 5000,
    userAgent: "vegan-catalog-api/test",
    fetchImpl: async () => {
      throw new TypeError("fetch failed");
    },
  });
  assert.equal(await client.findNearbyShop(center, 100), null);
});

test("findNearbyShop returns null on malformed payloads", async () => {
  const client = createOverpassClient({
    url: "http://overpass.test/api/interpreter",
    timeoutMs: 5000,
    userAgent: "vegan-catalog-api/test",
    fetchImpl: async () => jsonResponse({ elements: [{ id: "missing type" }] }),
  });
  assert.equal(await client.findNearbyShop(center, 100), null);
});
