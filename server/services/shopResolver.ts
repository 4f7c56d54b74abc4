import type { InsertShop, Shop } from "../../shared/schema.js";
import { UNIQUE_VIOLATION, isDatabaseError } from "../middleware/errorHandler.js";
import type { Coordinates } from "./geoUtils.js";
import type { ShopLocator } from "./openstreetmap.js";

export const SCAN_SHOP_RADIUS_METERS = 100;

/** Shop persistence needed to attach a scan to a shop. */
export interface ShopStore {
  findNearby(center: Coordinates, radiusMeters: number): Promise<Shop | undefined>;
  findByOsmId(osmId: string): Promise<Shop | undefined>;
  create(input: InsertShop): Promise<Shop>;
}

export interface ShopResolverDeps {
  store: ShopStore;
  locator: ShopLocator;
  radiusMeters?: number;
}

async function locate(locator: ShopLocator, center: Coordinates, radiusMeters: number) {
  try {
    return await locator.findNearbyShop(center, radiusMeters);
  } catch (error) {
    console.warn("[scan-events] shop lookup failed, continuing without shop:", error);
    return null;
  }
}

/**
 * Finds the shop a scan happened in: a known shop nearby first, then
 * OpenStreetMap. Shops found on OpenStreetMap are stored once per osm id.
 * Returns null when no shop can be found.
 */
export async function resolveShopForScan(center: Coordinates, deps: ShopResolverDeps): Promise<number | null> {
  const radiusMeters = deps.radiusMeters ?? SCAN_SHOP_RADIUS_METERS;

  const known = await deps.store.findNearby(center, radiusMeters);
  if (known) return known.id;

  const found = await locate(deps.locator, center, radiusMeters);
  if (!found) return null;

  const existing = await deps.store.findByOsmId(found.osmId);
  if (existing) return existing.id;

  try {
    const created = await deps.store.create(found);
    console.log(`[scan-events] created shop ${created.id} from osm ${found.osmType}/${found.osmId}`);
    return created.id;
  } catch (error) {
    if (!isDatabaseError(error) || error.code !== UNIQUE_VIOLATION) throw error;
    // another request stored the same osm shop first
    const winner = await deps.store.findByOsmId(found.osmId);
    return winner?.id ?? null;
  }
}
