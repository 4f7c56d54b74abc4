// server/services/openstreetmap.ts
// Overpass API client used to locate the shop a product was scanned in

import { z } from "zod";
import { nearestWithin, type Coordinates } from "./geoUtils.js";

const overpassElementSchema = z.object({
    type: z.string(),
    id: z.union([z.number(), z.string()]),
    lat: z.number().optional(),
    lon: z.number().optional(),
    center: z.object({ lat: z.number(), lon: z.number() }).optional(),
    tags: z.record(z.string()).optional(),
});

const overpassResponseSchema = z.object({
    elements: z.array(overpassElementSchema).default([]),
});

export type OverpassElement = z.infer<typeof overpassElementSchema>;

export interface OsmShop {
    name: string;
    latitude: number;
    longitude: number;
    address: string | null;
    city: string | null;
    country: string | null;
    osmId: string;
    osmType: string;
    shopType: string;
}

export interface ShopLocator {
    /** Resolves to null when nothing is found or the lookup fails. */
    findNearbyShop(center: Coordinates, radiusMeters: number): Promise<OsmShop | null>;
}

export interface OverpassClientOptions {
    url: string;
    timeoutMs: number;
    userAgent: string;
    fetchImpl?: typeof fetch;
}

export const SHOP_TAG_PATTERN = "^(supermarket|convenience|greengrocer|food)$";
export const UNKNOWN_SHOP_NAME = "Unknown shop";
const DEFAULT_SHOP_TYPE = "supermarket";

export function buildOverpassQuery(center: Coordinates, radiusMeters: number, timeoutSeconds = 25): string {
    const around = `around:${radiusMeters},${center.latitude},${center.longitude}`;
    const shopFilter = `["shop"~"${SHOP_TAG_PATTERN}"]`;
    return `[out:json][timeout:${timeoutSeconds}];(node(${around})${shopFilter};way(${around})${shopFilter};);out center;`;
}

/**
 * Map an Overpass element onto shop fields. Ways carry their position in
 * `center`; elements with no position at all are dropped.
 */
export function parseOverpassShop(element: OverpassElement): OsmShop | null {
    const tags = element.tags ?? {};
    const latitude = element.lat ?? element.center?.lat;
    const longitude = element.lon ?? element.center?.lon;
    if (latitude === undefined || longitude === undefined) {
        return null;
    }

    const addressParts = [tags["addr:housenumber"], tags["addr:street"]].filter(
        (part): part is string => Boolean(part)
    );

    return {
        name: tags.name || tags.brand || UNKNOWN_SHOP_NAME,
        latitude,
        longitude,
        address: addressParts.length > 0 ? addressParts.join(" ") : null,
        city: tags["addr:city"] ?? null,
        country: tags["addr:country"] ?? null,
        osmId: String(element.id),
        osmType: element.type,
        shopType: tags.shop || DEFAULT_SHOP_TYPE,
    };
}

export function createOverpassClient(options: OverpassClientOptions): ShopLocator {
    const fetchImpl = options.fetchImpl ?? fetch;

    return {
        async findNearbyShop(center, radiusMeters) {
            const controller = new AbortController();
            const timeout = setTimeout(() => controller.abort(), options.timeoutMs);
            const query = buildOverpassQuery(center, radiusMeters, Math.ceil(options.timeoutMs / 1000));

            try {
                const response = await fetchImpl(options.url, {
                    method: "POST",
                    headers: {
                        "User-Agent": options.userAgent,
                        Accept: "application/json",
                    },
                    body: new URLSearchParams({ data: query }),
                    signal: controller.signal,
                });

                if (!response.ok) {
                    console.warn(`[osm] HTTP ${response.status} from Overpass`);
                    return null;
                }

                const parsed = overpassResponseSchema.safeParse(await response.json());
                if (!parsed.success) {
                    console.warn("[osm] Unexpected Overpass payload", parsed.error.issues);
                    return null;
                }

                const shops = parsed.data.elements
                    .map(parseOverpassShop)
                    .filter((shop): shop is OsmShop => shop !== null);

                return nearestWithin(center, shops, Number.POSITIVE_INFINITY) ?? null;
            } catch (error: unknown) {
                if (error instanceof Error && error.name === "AbortError") {
                    console.warn(`[osm] Overpass timed out after ${options.timeoutMs}ms`);
                } else {
                    console.warn("[osm] Overpass lookup failed:", error);
                }
                return null;
            } finally {
                clearTimeout(timeout);
            }
        },
    };
}
