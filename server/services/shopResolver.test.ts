import assert from "node:assert/strict";
import test from "node:test";
import type { InsertShop, Shop } from "../../shared/schema.js";
import type { Coordinates } from "./geoUtils.js";
import type { OsmShop, ShopLocator } from "./openstreetmap.js";
import { resolveShopForScan, type ShopStore } from "./shopResolver.js";

const center = { latitude: 43.6, longitude: 1.44 };

const osmShop: OsmShop = {
  name: "Organic Corner",
  latitude: 43.6001,
  longitude: 1.4401,
  address: null,
  city: "Toulouse",
  country: null,
  osmId: "987",
  osmType: "node",
  shopType: "supermarket",
};

function shopRow(id: number, input: InsertShop): Shop {
  const now = new Date("2024-01-01T00:00:00Z");
  return {
    id,
    createdAt: now,
    updatedAt: now,
    name: input.name,
    latitude: input.latitude,
    longitude: input.longitude,
    address: input.address ?? null,
    city: input.city ?? null,
    country: input.country ?? null,
    osmId: input.osmId ?? null,
    osmType: input.osmType ?? null,
    shopType: input.shopType ?? null,
  };
}

class FakeShopStore implements ShopStore {
  nearbyCalls: Array<{ center: Coordinates; radiusMeters: number }> = [];
  created: InsertShop[] = [];
  failCreateWith?: unknown;

  constructor(
    private nearby: Shop | undefined,
    private byOsmId: Map<string, Shop> = new Map(),
  ) {}

  async findNearby(center: Coordinates, radiusMeters: number) {
    this.nearbyCalls.push({ center, radiusMeters });
    return this.nearby;
  }

  async findByOsmId(osmId: string) {
    return this.byOsmId.get(osmId);
  }

  async create(input: InsertShop) {
    if (this.failCreateWith) {
      const error = this.failCreateWith;
      // the competing insert lands before ours fails
      this.byOsmId.set(osmShop.osmId, shopRow(77, osmShop));
      throw error;
    }
    this.created.push(input);
    return shopRow(50, input);
  }
}

function locatorReturning(result: OsmShop | null | Error): ShopLocator & { calls: number } {
  return {
    calls: 0,
    async findNearbyShop() {
      this.calls += 1;
      if (result instanceof Error) throw result;
      return result;
    },
  };
}

test("a known shop nearby wins without asking OpenStreetMap", async () => {
  const store = new FakeShopStore(shopRow(5, osmShop));
  const locator = locatorReturning(osmShop);

  assert.equal(await resolveShopForScan(center, { store, locator }), 5);
  assert.equal(locator.calls, 0);
  assert.deepEqual(store.nearbyCalls, [{ center, radiusMeters: 100 }]);
});

test("a shop found on OpenStreetMap is created", async () => {
  const store = new FakeShopStore(undefined);

  assert.equal(await resolveShopForScan(center, { store, locator: locatorReturning(osmShop) }), 50);
  assert.deepEqual(store.created, [osmShop]);
});

test("a shop already stored under the same osm id is reused", async () => {
  const store = new FakeShopStore(undefined, new Map([["987", shopRow(12, osmShop)]]));

  assert.equal(await resolveShopForScan(center, { store, locator: locatorReturning(osmShop) }), 12);
  assert.deepEqual(store.created, []);
});

test("losing a creation race re-reads the shop by osm id", async () => {
  const store = new FakeShopStore(undefined);
  store.failCreateWith = { code: "23505", detail: "Key (osm_id)=(987) already exists." };

  assert.equal(await resolveShopForScan(center, { store, locator: locatorReturning(osmShop) }), 77);
});

test("other creation errors propagate", async () => {
  const store = new FakeShopStore(undefined);
  store.failCreateWith = new Error("connection reset");

  await assert.rejects(
    resolveShopForScan(center, { store, locator: locatorReturning(osmShop) }),
    /connection reset/,
  );
});

test("no shop is attached when OpenStreetMap finds nothing or fails", async () => {
  const store = new FakeShopStore(undefined);

  assert.equal(await resolveShopForScan(center, { store, locator: locatorReturning(null) }), null);
  assert.equal(
    await resolveShopForScan(center, { store, locator: locatorReturning(new Error("overpass down")) }),
    null,
  );
});

test("the search radius can be overridden", async () => {
  const store = new FakeShopStore(undefined);
  await resolveShopForScan(center, { store, locator: locatorReturning(null), radiusMeters: 250 });
  assert.equal(store.nearbyCalls[0]?.radiusMeters, 250);
});
