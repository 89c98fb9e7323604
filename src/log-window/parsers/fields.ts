import type { JsonValue, LogEntryView, LogRecord } from "./index.js";

/**
 * Looks up a field on either record shape. Raw records expose `raw` and
 * `ingested_at`.
 */
export function fieldOf(record: LogRecord, name: string): JsonValue | undefined {
  if (record.kind === "raw") {
    if (name === "raw") {
      return record.raw;
    }
    if (name === "ingested_at") {
      return record.ingestedAt;
    }
    return undefined;
  }
  return Object.hasOwn(record.fields, name) ? record.fields[name] : undefined;
}

function stringField(record: LogRecord, name: string): string | undefined {
  const value = fieldOf(record, name);
  return typeof value === "string" && value.trim() ? value.trim() : undefined;
}

/**
 * Upper-cased level name, from `levelname` or `level`. Defaults to "UNKNOWN".
 */
export function levelOf(record: LogRecord): string {
  const level = stringField(record, "levelname") ?? stringField(record, "level");
  return level ? level.toUpperCase() : "UNKNOWN";
}

/**
 * Dotted category path built from `module` and `name`, e.g. "auth.login".
 */
export function categoryOf(record: LogRecord): string | undefined {
  const segments = [stringField(record, "module"), stringField(record, "name")]
    .filter((part): part is string => part !== undefined)
    .flatMap((part) => part.split("."))
    .filter((segment) => segment.length > 0);
  return segments.length > 0 ? segments.join(".") : undefined;
}

export function toEntryView(id: number, record: LogRecord): LogEntryView {
  if (record.kind === "raw") {
    return { raw: record.raw, ingested_at: record.ingestedAt, _id: id };
  }
  return { ...record.fields, _id: id };
}
