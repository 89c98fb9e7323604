import type { JsonObject, LogRecord } from "./index.js";

export function isJsonObject(value: unknown): value is JsonObject {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

/**
 * Decodes one line. JSON objects become structured records; anything else,
 * including valid JSON that is not an object, becomes a raw record.
 */
export function decodeLine(line: string, now: number = Date.now()): LogRecord {
  const trimmed = line.trim();
  if (trimmed.startsWith("{")) {
    try {
      const parsed: unknown = JSON.parse(trimmed);
      if (isJsonObject(parsed)) {
        return { kind: "structured", fields: parsed };
      }
    } catch {
      // fall through to raw
    }
  }
  return { kind: "raw", raw: trimmed, ingestedAt: now };
}
