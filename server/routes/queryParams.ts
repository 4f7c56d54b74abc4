import { z } from "zod";
import type { Filters } from "../services/filterUtils.js";
import { DEFAULT_PAGE_SIZE, MAX_PAGE_SIZE, type PageRequest } from "../services/paginationUtils.js";

// Repeated query keys arrive as arrays; scalar filters keep the first value.
function firstValue(value: unknown): unknown {
  return Array.isArray(value) ? value[0] : value;
}

function toList(value: unknown): unknown {
  if (value === undefined) return undefined;
  const values = Array.isArray(value) ? value : [value];
  return values.flatMap((entry) =>
    typeof entry === "string"
      ? entry
          .split(",")
          .map((part) => part.trim())
          .filter((part) => part.length > 0)
      : [entry]
  );
}

function toBoolean(value: unknown): unknown {
  const raw = firstValue(value);
  if (typeof raw !== "string") return raw;
  const normalized = raw.trim().toLowerCase();
  if (normalized === "true" || normalized === "1") return true;
  if (normalized === "false" || normalized === "0") return false;
  return raw;
}

export const text = () => z.preprocess(firstValue, z.string().min(1)).optional();
export const bool = () => z.preprocess(toBoolean, z.boolean()).optional();
export const int = () => z.preprocess(firstValue, z.coerce.number().int()).optional();
export const num = () => z.preprocess(firstValue, z.coerce.number()).optional();
export const date = () => z.preprocess(firstValue, z.coerce.date()).optional();
export const oneOf = <T extends [string, ...string[]]>(values: T) =>
  z.preprocess(firstValue, z.enum(values)).optional();

export const textList = () => z.preprocess(toList, z.array(z.string())).optional();
export const intList = () => z.preprocess(toList, z.array(z.coerce.number().int())).optional();
export const oneOfList = <T extends [string, ...string[]]>(values: T) =>
  z.preprocess(toList, z.array(z.enum(values))).optional();

/** `between` takes exactly two comma separated or repeated values. */
export const numRange = () => z.preprocess(toList, z.array(z.coerce.number()).length(2)).optional();

export const pageRequestSchema = z
  .object({
    page: z.preprocess(firstValue, z.coerce.number().int().min(1)).default(1),
    page_size: z
      .preprocess(firstValue, z.coerce.number().int().min(1).max(MAX_PAGE_SIZE))
      .default(DEFAULT_PAGE_SIZE),
    sortby: z.preprocess(firstValue, z.string()).optional(),
    direction: z.preprocess(firstValue, z.string()).optional(),
  })
  .transform(
    (query): PageRequest => ({
      page: query.page,
      size: query.page_size,
      sortBy: query.sortby || undefined,
      descending: query.direction?.toLowerCase() === "desc",
    })
  );

export type FilterSchema = z.ZodType<Filters, z.ZodTypeDef, unknown>;

export interface ListQuery {
  page: PageRequest;
  filters: Filters;
}

/** Splits a search query string into paging and whitelisted filters. */
export function parseListQuery(query: unknown, filterSchema: FilterSchema): ListQuery {
  return {
    page: pageRequestSchema.parse(query),
    filters: filterSchema.parse(query),
  };
}

const idSchema = z.coerce.number().int().positive();

/** Path ids are positive integers; anything else is a validation error. */
export function parseId(value: unknown): number {
  return idSchema.parse(value);
}
