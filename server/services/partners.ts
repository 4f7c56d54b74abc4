import { asc, eq } from "drizzle-orm";
import { db } from "../config/database.js";
import {
  partnerCategories,
  partners,
  type InsertPartner,
  type InsertPartnerCategory,
  type Partner,
  type PartnerCategory,
} from "../../shared/schema.js";
import { notFound, translateIntegrityError } from "../middleware/errorHandler.js";
import { buildFilterCondition, buildOrderBy, type Filters } from "./filterUtils.js";
import { partnerCategoryTarget, partnerTarget } from "./filterTargets.js";
import { offsetOf, toPage, type Page, type PageRequest } from "./paginationUtils.js";
import { countMatching, hasChanges } from "./repository.js";

export type PartnerCategoryOut = PartnerCategory & { partners: Partner[] };

const withPartners = { partners: true } as const;

// Partner categories

export async function listPartnerCategories(): Promise<PartnerCategoryOut[]> {
  return db.query.partnerCategories.findMany({ with: withPartners, orderBy: asc(partnerCategories.id) });
}

export async function searchPartnerCategories(
  page: PageRequest,
  filters: Filters
): Promise<Page<PartnerCategoryOut>> {
  const [items, total] = await Promise.all([
    db.query.partnerCategories.findMany({
      where: (fields) => buildFilterCondition(partnerCategoryTarget, fields, filters),
      orderBy: (fields) => buildOrderBy(partnerCategoryTarget, fields, page),
      limit: page.size,
      offset: offsetOf(page),
      with: withPartners,
    }),
    countMatching(partnerCategoryTarget, filters),
  ]);
  return toPage(items, total, page);
}

export async function getPartnerCategoryById(id: number): Promise<PartnerCategoryOut> {
  const category = await db.query.partnerCategories.findFirst({
    where: eq(partnerCategories.id, id),
    with: withPartners,
  });
  if (!category) throw notFound(`Partner category with id ${id} not found`);
  return category;
}

export async function createPartnerCategory(data: InsertPartnerCategory): Promise<PartnerCategory> {
  try {
    const [category] = await db.insert(partnerCategories).values(data).returning();
    return category;
  } catch (error) {
    throw translateIntegrityError(error, {
      unique: { name: `Partner category with name ${data.name} already exists` },
    });
  }
}

export async function updatePartnerCategory(
  id: number,
  data: Partial<InsertPartnerCategory>
): Promise<PartnerCategory> {
  const existing = await db.query.partnerCategories.findFirst({ where: eq(partnerCategories.id, id) });
  if (!existing) throw notFound(`Partner category with id ${id} not found`);
  if (!hasChanges(data)) return existing;

  try {
    const [category] = await db
      .update(partnerCategories)
      .set(data)
      .where(eq(partnerCategories.id, id))
      .returning();
    return category;
  } catch (error) {
    throw translateIntegrityError(error, {
      unique: { name: `Partner category with name ${data.name} already exists` },
    });
  }
}

export async function deletePartnerCategory(id: number): Promise<void> {
  const deleted = await db
    .delete(partnerCategories)
    .where(eq(partnerCategories.id, id))
    .returning({ id: partnerCategories.id });
  if (deleted.length === 0) throw notFound(`Partner category with id ${id} not found. Cannot delete.`);
}

// Partners

function partnerIntegrityMessages(data: Partial<InsertPartner>) {
  return {
    unique: { name: `Partner with name ${data.name} already exists` },
    foreignKey: { category_id: `Partner category with id ${data.categoryId} does not exist` },
  };
}

export async function listPartners(): Promise<Partner[]> {
  return db.query.partners.findMany({ orderBy: asc(partners.id) });
}

export async function searchPartners(page: PageRequest, filters: Filters): Promise<Page<Partner>> {
  const [items, total] = await Promise.all([
    db.query.partners.findMany({
      where: (fields) => buildFilterCondition(partnerTarget, fields, filters),
      orderBy: (fields) => buildOrderBy(partnerTarget, fields, page),
      limit: page.size,
      offset: offsetOf(page),
    }),
    countMatching(partnerTarget, filters),
  ]);
  return toPage(items, total, page);
}

export async function getPartnerById(id: number): Promise<Partner> {
  const partner = await db.query.partners.findFirst({ where: eq(partners.id, id) });
  if (!partner) throw notFound(`Partner with id ${id} not found`);
  return partner;
}

export async function createPartner(data: InsertPartner): Promise<Partner> {
  try {
    const [partner] = await db.insert(partners).values(data).returning();
    return partner;
  } catch (error) {
    throw translateIntegrityError(error, partnerIntegrityMessages(data));
  }
}

export async function updatePartner(id: number, data: Partial<InsertPartner>): Promise<Partner> {
  const existing = await getPartnerById(id);
  if (!hasChanges(data)) return existing;

  try {
    const [partner] = await db.update(partners).set(data).where(eq(partners.id, id)).returning();
    return partner;
  } catch (error) {
    throw translateIntegrityError(error, partnerIntegrityMessages(data));
  }
}

export async function deletePartner(id: number): Promise<void> {
  const deleted = await db.delete(partners).where(eq(partners.id, id)).returning({ id: partners.id });
  if (deleted.length === 0) throw notFound(`Partner with id ${id} not found. Cannot delete.`);
}
