import { asc, eq } from "drizzle-orm";
import { db } from "../config/database.js";
import { errorReports, type ErrorReport, type InsertErrorReport, type Product } from "../../shared/schema.js";
import { notFound, translateIntegrityError } from "../middleware/errorHandler.js";
import { buildFilterCondition, buildOrderBy, type Filters } from "./filterUtils.js";
import { errorReportTarget } from "./filterTargets.js";
import { offsetOf, toPage, type Page, type PageRequest } from "./paginationUtils.js";
import { countMatching, hasChanges } from "./repository.js";

type ReportedProduct = Pick<Product, "id" | "ean" | "name" | "brandName" | "status" | "state">;

export type ErrorReportOut = ErrorReport & {
  // the report is keyed by EAN, which may not match any product yet
  product: ReportedProduct | null;
};

const withProduct = {
  product: { columns: { id: true, ean: true, name: true, brandName: true, status: true, state: true } },
} as const;

function toOut(report: ErrorReport & { product?: ReportedProduct | null }): ErrorReportOut {
  return { ...report, product: report.product ?? null };
}

function integrityMessages(data: Partial<InsertErrorReport>) {
  return {
    foreignKey: { created_by: `User with id ${data.createdBy} does not exist` },
  };
}

export async function listErrorReports(): Promise<ErrorReportOut[]> {
  const reports = await db.query.errorReports.findMany({ with: withProduct, orderBy: asc(errorReports.id) });
  return reports.map(toOut);
}

export async function countErrorReports(filters: Filters): Promise<number> {
  return countMatching(errorReportTarget, filters);
}

export async function searchErrorReports(page: PageRequest, filters: Filters): Promise<Page<ErrorReportOut>> {
  const [items, total] = await Promise.all([
    db.query.errorReports.findMany({
      where: (fields) => buildFilterCondition(errorReportTarget, fields, filters),
      orderBy: (fields) => buildOrderBy(errorReportTarget, fields, page),
      limit: page.size,
      offset: offsetOf(page),
      with: withProduct,
    }),
    countMatching(errorReportTarget, filters),
  ]);
  return toPage(items.map(toOut), total, page);
}

export async function getErrorReportById(id: number): Promise<ErrorReportOut> {
  const report = await db.query.errorReports.findFirst({ where: eq(errorReports.id, id), with: withProduct });
  if (!report) throw notFound(`Error report with id ${id} not found`);
  return toOut(report);
}

export async function createErrorReport(data: InsertErrorReport): Promise<ErrorReport> {
  try {
    const [report] = await db.insert(errorReports).values(data).returning();
    return report;
  } catch (error) {
    throw translateIntegrityError(error, integrityMessages(data));
  }
}

export async function updateErrorReport(id: number, data: Partial<InsertErrorReport>): Promise<ErrorReport> {
  const existing = await db.query.errorReports.findFirst({ where: eq(errorReports.id, id) });
  if (!existing) throw notFound(`Error report with id ${id} not found`);
  if (!hasChanges(data)) return existing;

  try {
    const [report] = await db.update(errorReports).set(data).where(eq(errorReports.id, id)).returning();
    return report;
  } catch (error) {
    throw translateIntegrityError(error, integrityMessages(data));
  }
}

export async function deleteErrorReport(id: number): Promise<void> {
  const deleted = await db.delete(errorReports).where(eq(errorReports.id, id)).returning({ id: errorReports.id });
  if (deleted.length === 0) throw notFound(`Error report with id ${id} not found. Cannot delete.`);
}
