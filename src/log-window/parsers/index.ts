export { decodeLine, isJsonObject } from "./json-line.js";
export { categoryOf, fieldOf, levelOf, toEntryView } from "./fields.js";

export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

/**
 * A line that decoded as a JSON object.
 */
export type StructuredRecord = {
  kind: "structured";
  fields: JsonObject;
};

/**
 * A line that did not decode as a JSON object, kept as trimmed text.
 */
export type RawRecord = {
  kind: "raw";
  raw: string;
  /** Epoch milliseconds at decode time */
  ingestedAt: number;
};

export type LogRecord = StructuredRecord | RawRecord;

/**
 * Wire shape of a cached record: its fields plus `_id`.
 */
export type LogEntryView = { _id: number } & { [key: string]: JsonValue };

import { decodeLine } from "./json-line.js";

/**
 * Decodes a batch of lines, skipping blank ones.
 * Malformed lines become raw records, never dropped.
 */
export function decodeLines(lines: string[], now: number = Date.now()): LogRecord[] {
  const records: LogRecord[] = [];
  for (const line of lines) {
    if (!line.trim()) {
      continue;
    }
    records.push(decodeLine(line, now));
  }
  return records;
}
