import { z } from "zod";
import { QueryValidationError, issuesFromZod } from "./errors.js";

export const KNOWN_LEVELS = [
  "TRACE",
  "DEBUG",
  "INFO",
  "WARN",
  "WARNING",
  "ERROR",
  "CRITICAL",
  "FATAL",
  "UNKNOWN",
] as const;

export const MAX_PAGE_SIZE = 10_000;

const CATEGORY_PATTERN = /^[^.\s]+(\.[^.\s]+)*$/;

/**
 * Ids arrive as numbers from code and as strings from query strings.
 */
const entryId = z.union([
  z.number().int().min(0),
  z
    .string()
    .trim()
    .regex(/^\d+$/, "must be a non-negative integer")
    .transform((value) => Number(value)),
]);

/**
 * A reader's last seen id; -1 stands for "before the first entry".
 */
const cursorId = z.union([
  z.number().int().min(-1),
  z
    .string()
    .trim()
    .regex(/^-?\d+$/, "must be an integer")
    .transform((value) => Number(value))
    .pipe(z.number().int().min(-1)),
]);

const pageSize = z.union([
  z.number().int().min(1).max(MAX_PAGE_SIZE),
  z
    .string()
    .trim()
    .regex(/^\d+$/, "must be a positive integer")
    .transform((value) => Number(value))
    .pipe(z.number().int().min(1).max(MAX_PAGE_SIZE)),
]);

const stringList = z
  .union([z.string(), z.array(z.string())])
  .transform((value) => (Array.isArray(value) ? value : [value]));

const levelList = stringList
  .transform((values) => values.map((value) => value.trim().toUpperCase()))
  .pipe(z.array(z.enum(KNOWN_LEVELS)));

const categoryList = stringList
  .transform((values) => values.map((value) => value.trim()))
  .pipe(z.array(z.string().regex(CATEGORY_PATTERN, "must be a dotted category path")));

const FilterSchema = z.object({
  level: levelList.optional(),
  category: categoryList.optional(),
});

const LogQuerySchema = FilterSchema.extend({
  startId: entryId.optional(),
  count: pageSize.optional(),
});

const CursorQuerySchema = z.object({
  lastKnownId: cursorId,
});

const StreamQuerySchema = z.object({
  lastKnownId: entryId.optional(),
  batchSize: pageSize.optional(),
  backlog: z.number().int().min(0).max(MAX_PAGE_SIZE).optional(),
});

export type KnownLevel = (typeof KNOWN_LEVELS)[number];

/**
 * Raw filter parameters as a request layer hands them over.
 */
export type FilterParams = {
  level?: string | string[];
  category?: string | string[];
};

export type LogQueryParams = FilterParams & {
  startId?: number | string;
  count?: number | string;
};

export type StreamQueryParams = {
  lastKnownId?: number | string;
  batchSize?: number | string;
  backlog?: number;
};

export type EntryFilter = {
  levels: Set<string>;
  categories: Set<string>;
};

export type ParsedLogQuery = {
  startId?: number;
  count?: number;
  filter: EntryFilter;
};

export type ParsedStreamQuery = {
  lastKnownId?: number;
  batchSize?: number;
  backlog: number;
};

function parseOrThrow<T extends z.ZodTypeAny>(schema: T, input: unknown): z.output<T> {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw new QueryValidationError(issuesFromZod(result.error.issues));
  }
  return result.data;
}

function toFilter(parsed: { level?: string[]; category?: string[] }): EntryFilter {
  return {
    levels: new Set(parsed.level ?? []),
    categories: new Set(parsed.category ?? []),
  };
}

export function parseFilter(params: FilterParams = {}): EntryFilter {
  return toFilter(parseOrThrow(FilterSchema, params));
}

export function parseLogQuery(params: LogQueryParams = {}): ParsedLogQuery {
  const parsed = parseOrThrow(LogQuerySchema, params);
  return { startId: parsed.startId, count: parsed.count, filter: toFilter(parsed) };
}

export function parseStreamQuery(params: StreamQueryParams = {}): ParsedStreamQuery {
  const parsed = parseOrThrow(StreamQuerySchema, params);
  return {
    lastKnownId: parsed.lastKnownId,
    batchSize: parsed.batchSize,
    backlog: parsed.backlog ?? 0,
  };
}

/**
 * Validates a last-known id handed to `changesSince` or `openCursor`.
 */
export function parseCursorId(lastKnownId: number | string): number {
  return parseOrThrow(CursorQuerySchema, { lastKnownId }).lastKnownId;
}
