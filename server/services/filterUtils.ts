import {
  and,
  asc,
  between,
  desc,
  eq,
  getTableColumns,
  getTableName,
  gt,
  gte,
  ilike,
  inArray,
  isNotNull,
  isNull,
  like,
  lt,
  lte,
  ne,
  notInArray,
  sql,
  type AnyColumn,
  type SQL,
} from "drizzle-orm";
import type { PgTable } from "drizzle-orm/pg-core";

export const RELATION_SPLITTER = "___";
export const OPERATOR_SPLITTER = "__";
export const LOOKALIKE_MAX_DISTANCE = 2;
export const DEFAULT_SORT_FIELD = "created_at";

export const FILTER_OPERATORS = [
  "exact",
  "isnull",
  "ne",
  "gt",
  "ge",
  "lt",
  "le",
  "in",
  "notin",
  "iin",
  "between",
  "like",
  "ilike",
  "startswith",
  "istartswith",
  "endswith",
  "iendswith",
  "contains",
  "lookalike",
  "year",
  "year_ne",
  "year_gt",
  "year_ge",
  "year_lt",
  "year_le",
  "month",
  "month_ne",
  "month_gt",
  "month_ge",
  "month_lt",
  "month_le",
  "day",
  "day_ne",
  "day_gt",
  "day_ge",
  "day_lt",
  "day_le",
] as const;

export type FilterOperator = (typeof FILTER_OPERATORS)[number];

export type Scalar = string | number | boolean | Date;
export type FilterValue = Scalar | Scalar[] | null;
export type Filters = Record<string, FilterValue | undefined>;

/**
 * A column reached through a hand-written table alias. Rendered as plain
 * identifiers, since the relational query builder re-points every drizzle
 * column in a `where`, `orderBy` or `extras` at the root table.
 */
export interface AliasedColumn {
  name: string;
  ref: SQL;
}

export type ColumnLike = AnyColumn | AliasedColumn;

/** Columns keyed by their property name, as drizzle hands them to query callbacks. */
export type ColumnMap = Record<string, ColumnLike>;

export interface FilterRelation {
  target: () => FilterTarget;
  /** db column on the owning side of the join */
  localKey: string;
  /** db column on the related side of the join */
  foreignKey: string;
}

/**
 * Describes what can be filtered and sorted on a table. Fields are addressed
 * by their db column name; computed fields are SQL expressions built from the
 * columns of the row being filtered.
 */
export interface FilterTarget {
  table: PgTable;
  relations?: Record<string, FilterRelation>;
  computed?: Record<string, (columns: ColumnMap) => SQL>;
  defaultSort?: string;
}

export interface ParsedFilterKey {
  relations: string[];
  field: string;
  operator: FilterOperator;
}

export interface SortRequest {
  sortBy?: string;
  descending: boolean;
}

const OPERATOR_SET: ReadonlySet<string> = new Set(FILTER_OPERATORS);

function isFilterOperator(value: string): value is FilterOperator {
  return OPERATOR_SET.has(value);
}

/**
 * Splits `rel1___rel2___field__op` into its parts. Returns null when the key
 * is malformed or names an unknown operator.
 */
export function parseFilterKey(key: string): ParsedFilterKey | null {
  const segments = key.split(RELATION_SPLITTER);
  const fieldPart = segments.pop();
  if (!fieldPart || segments.some((segment) => segment.length === 0)) return null;

  const operatorAt = fieldPart.indexOf(OPERATOR_SPLITTER);
  const field = operatorAt === -1 ? fieldPart : fieldPart.slice(0, operatorAt);
  const operator = operatorAt === -1 ? "exact" : fieldPart.slice(operatorAt + OPERATOR_SPLITTER.length);

  if (!field || !isFilterOperator(operator)) return null;
  return { relations: segments, field, operator };
}

export function findColumn(columns: ColumnMap, name: string): ColumnLike | undefined {
  return Object.values(columns).find((column) => column.name === name);
}

export function columnRef(column: ColumnLike): SQL {
  return "ref" in column ? column.ref : sql`${column}`;
}

export function columnSql(columns: ColumnMap, name: string): SQL {
  const column = findColumn(columns, name);
  if (!column) {
    throw new Error(`Unknown column ${name}`);
  }
  return columnRef(column);
}

/** Renders `"table" "alias"` for use in hand-written subqueries. */
export function aliasedFrom(table: PgTable, aliasName: string): SQL {
  return sql`${sql.identifier(getTableName(table))} ${sql.identifier(aliasName)}`;
}

export function aliasedColumns(table: PgTable, aliasName: string): Record<string, AliasedColumn> {
  return Object.fromEntries(
    Object.entries(getTableColumns(table)).map(([key, column]) => [
      key,
      { name: column.name, ref: sql`${sql.identifier(aliasName)}.${sql.identifier(column.name)}` },
    ])
  );
}

export function resolveOperand(target: FilterTarget, columns: ColumnMap, field: string): SQL | undefined {
  const computed = target.computed?.[field];
  if (computed) return computed(columns);
  const column = findColumn(columns, field);
  return column ? columnRef(column) : undefined;
}

type Param = string | number | boolean;

// Operands are plain SQL, so nothing encodes dates on the way to the driver.
function toParam(value: Scalar): Param {
  return value instanceof Date ? value.toISOString() : value;
}

function toList(value: FilterValue): Param[] {
  if (value === null) return [];
  return (Array.isArray(value) ? value : [value]).map(toParam);
}

function firstOf(value: FilterValue): Param | null {
  const first = Array.isArray(value) ? value[0] : value;
  return first === undefined || first === null ? null : toParam(first);
}

function isTruthy(value: Param | null): boolean {
  return value === true || value === 1 || value === "true" || value === "1";
}

const COMPARATORS = {
  "": "=",
  ne: "<>",
  gt: ">",
  ge: ">=",
  lt: "<",
  le: "<=",
} as const;

function isComparator(suffix: string): suffix is keyof typeof COMPARATORS {
  return suffix in COMPARATORS;
}

function datePartCondition(operand: SQL, operator: string, value: Param): SQL | undefined {
  const [part, suffix = ""] = operator.split("_");
  if (part !== "year" && part !== "month" && part !== "day") return undefined;
  if (!isComparator(suffix)) return undefined;
  return sql`extract(${sql.raw(part)} from ${operand}) ${sql.raw(COMPARATORS[suffix])} ${Number(value)}`;
}

/** Applies a single operator to an operand. Unusable values yield no condition. */
export function buildPredicate(operand: SQL, operator: FilterOperator, value: FilterValue): SQL | undefined {
  const scalar = firstOf(value);

  switch (operator) {
    case "exact":
      return scalar === null ? isNull(operand) : eq(operand, scalar);
    case "isnull":
      return isTruthy(scalar) ? isNull(operand) : isNotNull(operand);
    case "ne":
      return scalar === null ? isNotNull(operand) : ne(operand, scalar);
    case "in":
    case "notin": {
      const values = toList(value);
      if (values.length === 0) return undefined;
      return operator === "in" ? inArray(operand, values) : notInArray(operand, values);
    }
    case "iin": {
      const values = toList(value).map((v) => String(v).toLowerCase());
      if (values.length === 0) return undefined;
      return inArray(sql`lower(${operand})`, values);
    }
    case "between": {
      const values = toList(value);
      if (values.length !== 2) return undefined;
      return between(operand, values[0], values[1]);
    }
  }

  if (scalar === null) return undefined;

  switch (operator) {
    case "gt":
      return gt(operand, scalar);
    case "ge":
      return gte(operand, scalar);
    case "lt":
      return lt(operand, scalar);
    case "le":
      return lte(operand, scalar);
    case "like":
      return like(operand, String(scalar));
    case "ilike":
      return ilike(operand, String(scalar));
    case "startswith":
      return like(operand, `${String(scalar)}%`);
    case "istartswith":
      return ilike(operand, `${String(scalar)}%`);
    case "endswith":
      return like(operand, `%${String(scalar)}`);
    case "iendswith":
      return ilike(operand, `%${String(scalar)}`);
    case "contains":
      return ilike(operand, `%${String(scalar)}%`);
    case "lookalike":
      return sql`levenshtein(lower(${operand}), lower(${String(scalar)})) <= ${LOOKALIKE_MAX_DISTANCE}`;
    default:
      return datePartCondition(operand, operator, scalar);
  }
}

function buildFieldCondition(
  target: FilterTarget,
  columns: ColumnMap,
  field: string,
  operator: FilterOperator,
  value: FilterValue,
): SQL | undefined {
  const operand = resolveOperand(target, columns, field);
  return operand ? buildPredicate(operand, operator, value) : undefined;
}

function buildRelationCondition(
  target: FilterTarget,
  columns: ColumnMap,
  path: string[],
  parsed: ParsedFilterKey,
  value: FilterValue,
): SQL | undefined {
  const relationName = parsed.relations[path.length];
  const relation = relationName ? target.relations?.[relationName] : undefined;
  if (!relationName || !relation) return undefined;

  const related = relation.target();
  const relationPath = [...path, relationName];
  const aliasName = `f_${relationPath.join("_")}`;
  const relatedColumns = aliasedColumns(related.table, aliasName);

  const local = findColumn(columns, relation.localKey);
  const foreign = findColumn(relatedColumns, relation.foreignKey);
  if (!local || !foreign) return undefined;

  const inner =
    relationPath.length < parsed.relations.length
      ? buildRelationCondition(related, relatedColumns, relationPath, parsed, value)
      : buildFieldCondition(related, relatedColumns, parsed.field, parsed.operator, value);
  if (!inner) return undefined;

  return sql`exists (select 1 from ${aliasedFrom(related.table, aliasName)} where ${eq(columnRef(local), columnRef(foreign))} and ${inner})`;
}

/**
 * Compiles a filter object into a single AND-ed condition over `columns`.
 * Keys that do not resolve to a field, relation or operator are skipped.
 */
export function buildFilterCondition(target: FilterTarget, columns: ColumnMap, filters: Filters): SQL | undefined {
  const conditions: SQL[] = [];

  for (const [key, value] of Object.entries(filters)) {
    if (value === undefined) continue;
    const parsed = parseFilterKey(key);
    if (!parsed) continue;

    const condition =
      parsed.relations.length > 0
        ? buildRelationCondition(target, columns, [], parsed, value)
        : buildFieldCondition(target, columns, parsed.field, parsed.operator, value);
    if (condition) conditions.push(condition);
  }

  return and(...conditions);
}

/**
 * Order by the requested field, falling back to the target's default sort
 * when the field is unknown. Ties are broken by id so pages stay stable.
 */
export function buildOrderBy(target: FilterTarget, columns: ColumnMap, sort: SortRequest): SQL[] {
  const requested = sort.sortBy ? resolveOperand(target, columns, sort.sortBy) : undefined;
  const operand = requested ?? resolveOperand(target, columns, target.defaultSort ?? DEFAULT_SORT_FIELD);
  const id = findColumn(columns, "id");

  const order: SQL[] = [];
  if (operand) order.push(sort.descending ? desc(operand) : asc(operand));
  if (id) order.push(sort.descending ? desc(columnRef(id)) : asc(columnRef(id)));
  return order;
}
