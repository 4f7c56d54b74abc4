import { asc, eq } from "drizzle-orm";
import { db } from "../config/database.js";
import { apiClients, type ApiClient, type InsertApiClient } from "../../shared/schema.js";
import { notFound, translateIntegrityError } from "../middleware/errorHandler.js";
import { generateApiKey } from "./apiClientUtils.js";
import { buildFilterCondition, buildOrderBy, type Filters } from "./filterUtils.js";
import { apiClientTarget } from "./filterTargets.js";
import { offsetOf, toPage, type Page, type PageRequest } from "./paginationUtils.js";
import { countMatching, hasChanges } from "./repository.js";

export type NewApiClient = Omit<InsertApiClient, "apiKey"> & { apiKey?: string };

function integrityMessages(data: Partial<InsertApiClient>) {
  return {
    unique: {
      name: `API client with name ${data.name} already exists`,
      api_key: "API client with this key already exists",
    },
  };
}

export async function listApiClients(): Promise<ApiClient[]> {
  return db.query.apiClients.findMany({ orderBy: asc(apiClients.id) });
}

export async function searchApiClients(page: PageRequest, filters: Filters): Promise<Page<ApiClient>> {
  const [items, total] = await Promise.all([
    db.query.apiClients.findMany({
      where: (fields) => buildFilterCondition(apiClientTarget, fields, filters),
      orderBy: (fields) => buildOrderBy(apiClientTarget, fields, page),
      limit: page.size,
      offset: offsetOf(page),
    }),
    countMatching(apiClientTarget, filters),
  ]);
  return toPage(items, total, page);
}

export async function findApiClientByKey(apiKey: string): Promise<ApiClient | undefined> {
  return db.query.apiClients.findFirst({ where: eq(apiClients.apiKey, apiKey) });
}

export async function getApiClientById(id: number): Promise<ApiClient> {
  const client = await db.query.apiClients.findFirst({ where: eq(apiClients.id, id) });
  if (!client) throw notFound(`API client with id ${id} not found`);
  return client;
}

export async function createApiClient(data: NewApiClient): Promise<ApiClient> {
  const values: InsertApiClient = { ...data, apiKey: data.apiKey ?? generateApiKey() };
  try {
    const [client] = await db.insert(apiClients).values(values).returning();
    console.log(`[api-clients] created client ${client.id} (${client.name})`);
    return client;
  } catch (error) {
    throw translateIntegrityError(error, integrityMessages(values));
  }
}

export async function updateApiClient(id: number, data: Partial<InsertApiClient>): Promise<ApiClient> {
  const existing = await getApiClientById(id);
  if (!hasChanges(data)) return existing;
  try {
    const [client] = await db.update(apiClients).set(data).where(eq(apiClients.id, id)).returning();
    return client;
  } catch (error) {
    throw translateIntegrityError(error, integrityMessages(data));
  }
}

export async function deleteApiClient(id: number): Promise<void> {
  const deleted = await db.delete(apiClients).where(eq(apiClients.id, id)).returning({ id: apiClients.id });
  if (deleted.length === 0) throw notFound(`API client with id ${id} not found. Cannot delete.`);
}
