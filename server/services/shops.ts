import { and, asc, between, eq } from "drizzle-orm";
import { db } from "../config/database.js";
import { shops, type InsertShop, type Shop } from "../../shared/schema.js";
import { notFound, translateIntegrityError } from "../middleware/errorHandler.js";
import { buildFilterCondition, buildOrderBy, type Filters } from "./filterUtils.js";
import { shopTarget } from "./filterTargets.js";
import { boundingBox, nearestWithin, type Coordinates } from "./geoUtils.js";
import { offsetOf, toPage, type Page, type PageRequest } from "./paginationUtils.js";
import { countMatching, hasChanges } from "./repository.js";
import type { ShopStore } from "./shopResolver.js";

export const DEFAULT_NEARBY_RADIUS_METERS = 20;
export const MAX_NEARBY_RADIUS_METERS = 5000;

function integrityMessages(data: Partial<InsertShop>) {
  return {
    unique: { osm_id: `Shop with OSM id ${data.osmId} already exists` },
  };
}

export async function listShops(): Promise<Shop[]> {
  return db.query.shops.findMany({ orderBy: asc(shops.id) });
}

export async function searchShops(page: PageRequest, filters: Filters): Promise<Page<Shop>> {
  const [items, total] = await Promise.all([
    db.query.shops.findMany({
      where: (fields) => buildFilterCondition(shopTarget, fields, filters),
      orderBy: (fields) => buildOrderBy(shopTarget, fields, page),
      limit: page.size,
      offset: offsetOf(page),
    }),
    countMatching(shopTarget, filters),
  ]);
  return toPage(items, total, page);
}

/** Nearest stored shop within the radius: bounding box in SQL, exact distance here. */
export async function findNearbyShop(center: Coordinates, radiusMeters: number): Promise<Shop | undefined> {
  const box = boundingBox(center, radiusMeters);
  const candidates = await db.query.shops.findMany({
    where: and(
      between(shops.latitude, box.minLatitude, box.maxLatitude),
      between(shops.longitude, box.minLongitude, box.maxLongitude)
    ),
  });
  return nearestWithin(center, candidates, radiusMeters);
}

export async function getNearbyShop(center: Coordinates, radiusMeters: number): Promise<Shop> {
  const shop = await findNearbyShop(center, radiusMeters);
  if (!shop) throw notFound(`No shop found within ${radiusMeters}m`);
  return shop;
}

export async function findShopByOsmId(osmId: string): Promise<Shop | undefined> {
  return db.query.shops.findFirst({ where: eq(shops.osmId, osmId) });
}

export async function getShopById(id: number): Promise<Shop> {
  const shop = await db.query.shops.findFirst({ where: eq(shops.id, id) });
  if (!shop) throw notFound(`Shop with id ${id} not found`);
  return shop;
}

export async function createShop(data: InsertShop): Promise<Shop> {
  try {
    const [shop] = await db.insert(shops).values(data).returning();
    return shop;
  } catch (error) {
    throw translateIntegrityError(error, integrityMessages(data));
  }
}

export async function updateShop(id: number, data: Partial<InsertShop>): Promise<Shop> {
  const existing = await getShopById(id);
  if (!hasChanges(data)) return existing;

  try {
    const [shop] = await db.update(shops).set(data).where(eq(shops.id, id)).returning();
    return shop;
  } catch (error) {
    throw translateIntegrityError(error, integrityMessages(data));
  }
}

export async function deleteShop(id: number): Promise<void> {
  const deleted = await db.delete(shops).where(eq(shops.id, id)).returning({ id: shops.id });
  if (deleted.length === 0) throw notFound(`Shop with id ${id} not found. Cannot delete.`);
}

// Raw inserts: the resolver needs the unique violation itself to detect a concurrent insert.
export const shopStore: ShopStore = {
  findNearby: findNearbyShop,
  findByOsmId: findShopByOsmId,
  async create(input) {
    const [shop] = await db.insert(shops).values(input).returning();
    return shop;
  },
};
