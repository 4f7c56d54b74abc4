import { asc, count, desc, eq } from "drizzle-orm";
import { env } from "../config/env.js";
import { db } from "../config/database.js";
import { scanEvents, type InsertScanEvent, type ScanEvent } from "../../shared/schema.js";
import { notFound, translateIntegrityError } from "../middleware/errorHandler.js";
import { buildFilterCondition, buildOrderBy, type Filters } from "./filterUtils.js";
import { scanEventTarget } from "./filterTargets.js";
import { createOverpassClient } from "./openstreetmap.js";
import { offsetOf, toPage, type Page, type PageRequest } from "./paginationUtils.js";
import { countMatching, hasChanges } from "./repository.js";
import { resolveShopForScan, type ShopResolverDeps } from "./shopResolver.js";
import { shopStore } from "./shops.js";

export const DEFAULT_SCANS_BY_EAN_LIMIT = 100;
export const MAX_SCANS_BY_EAN_LIMIT = 1000;

export type ScanEventOut = ScanEvent & {
  shopName: string | null;
  userNickname: string | null;
};

export interface EanScanCount {
  ean: string;
  scanCount: number;
}

const withNames = {
  shop: { columns: { name: true } },
  user: { columns: { nickname: true } },
} as const;

const defaultResolver: ShopResolverDeps = {
  store: shopStore,
  locator: createOverpassClient({
    url: env.OVERPASS_API_URL,
    timeoutMs: env.OVERPASS_TIMEOUT_MS,
    userAgent: env.OVERPASS_USER_AGENT,
  }),
};

function toOut({
  shop,
  user,
  ...event
}: ScanEvent & { shop: { name: string } | null; user: { nickname: string } | null }): ScanEventOut {
  return { ...event, shopName: shop?.name ?? null, userNickname: user?.nickname ?? null };
}

function integrityMessages(data: Partial<InsertScanEvent>) {
  return {
    foreignKey: {
      user_id: `User with id ${data.userId} does not exist`,
      shop_id: `Shop with id ${data.shopId} does not exist`,
    },
  };
}

export async function listScanEvents(): Promise<ScanEventOut[]> {
  const events = await db.query.scanEvents.findMany({ with: withNames, orderBy: asc(scanEvents.id) });
  return events.map(toOut);
}

export async function searchScanEvents(page: PageRequest, filters: Filters): Promise<Page<ScanEventOut>> {
  const [items, total] = await Promise.all([
    db.query.scanEvents.findMany({
      where: (fields) => buildFilterCondition(scanEventTarget, fields, filters),
      orderBy: (fields) => buildOrderBy(scanEventTarget, fields, page),
      limit: page.size,
      offset: offsetOf(page),
      with: withNames,
    }),
    countMatching(scanEventTarget, filters),
  ]);
  return toPage(items.map(toOut), total, page);
}

export async function listScanEventsByEan(ean: string, limit = DEFAULT_SCANS_BY_EAN_LIMIT): Promise<ScanEventOut[]> {
  const events = await db.query.scanEvents.findMany({
    where: eq(scanEvents.ean, ean),
    with: withNames,
    orderBy: [desc(scanEvents.dateCreated), desc(scanEvents.id)],
    limit,
  });
  return events.map(toOut);
}

/** Scans per EAN for one user, most scanned first. */
export async function userScanSummary(userId: number): Promise<EanScanCount[]> {
  const scanCount = count(scanEvents.id);
  return db
    .select({ ean: scanEvents.ean, scanCount })
    .from(scanEvents)
    .where(eq(scanEvents.userId, userId))
    .groupBy(scanEvents.ean)
    .orderBy(desc(scanCount), asc(scanEvents.ean));
}

export async function getScanEventById(id: number): Promise<ScanEventOut> {
  const event = await db.query.scanEvents.findFirst({ where: eq(scanEvents.id, id), with: withNames });
  if (!event) throw notFound(`Scan event with id ${id} not found`);
  return toOut(event);
}

/**
 * Records a scan. A scan with coordinates and no shop is attached to the
 * nearest known or OpenStreetMap shop when one can be found.
 */
export async function createScanEvent(
  data: InsertScanEvent,
  callerId: number | null,
  resolver: ShopResolverDeps = defaultResolver
): Promise<ScanEvent> {
  const values: InsertScanEvent = { ...data, userId: data.userId ?? callerId };

  if (values.shopId == null && values.latitude != null && values.longitude != null) {
    values.shopId = await resolveShopForScan({ latitude: values.latitude, longitude: values.longitude }, resolver);
  }

  try {
    const [event] = await db.insert(scanEvents).values(values).returning();
    return event;
  } catch (error) {
    throw translateIntegrityError(error, integrityMessages(values));
  }
}

export async function updateScanEvent(id: number, data: Partial<InsertScanEvent>): Promise<ScanEvent> {
  const existing = await db.query.scanEvents.findFirst({ where: eq(scanEvents.id, id) });
  if (!existing) throw notFound(`Scan event with id ${id} not found`);
  if (!hasChanges(data)) return existing;

  try {
    const [event] = await db.update(scanEvents).set(data).where(eq(scanEvents.id, id)).returning();
    return event;
  } catch (error) {
    throw translateIntegrityError(error, integrityMessages(data));
  }
}

export async function deleteScanEvent(id: number): Promise<void> {
  const deleted = await db.delete(scanEvents).where(eq(scanEvents.id, id)).returning({ id: scanEvents.id });
  if (deleted.length === 0) throw notFound(`Scan event with id ${id} not found. Cannot delete.`);
}
