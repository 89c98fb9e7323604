import { z } from "zod";
import { ConfigError, issuesFromZod } from "../log-window/errors.js";

const positiveMs = z.number().int().positive();

const LogWindowConfigSchema = z
  .object({
    filePath: z.string().min(1, "filePath is required"),
    capacity: z.coerce.number().int().min(0).default(10_000),
    minPollMs: positiveMs.default(100),
    maxPollMs: positiveMs.default(10_000),
    backoffFactor: z.number().min(1).default(1.5),
    missingFileRetryMs: positiveMs.default(5_000),
    errorCooldownMs: positiveMs.default(5_000),
    stopTimeoutMs: positiveMs.default(5_000),
    streamIntervalMs: positiveMs.default(500),
    heartbeatIntervalMs: positiveMs.default(15_000),
    defaultPageSize: z.number().int().min(1).max(10_000).default(100),
    watch: z.boolean().default(true),
  })
  .refine((cfg) => cfg.maxPollMs >= cfg.minPollMs, {
    message: "maxPollMs must be >= minPollMs",
    path: ["maxPollMs"],
  });

/**
 * Fully resolved engine configuration.
 */
export type LogWindowConfig = Readonly<z.infer<typeof LogWindowConfigSchema>>;

/**
 * Caller-supplied configuration. Only the file path is required, and it may
 * come from LOG_WINDOW_FILE instead.
 */
export type LogWindowConfigInput = Partial<z.input<typeof LogWindowConfigSchema>>;

/**
 * Validates configuration, filling defaults. Explicit input wins over
 * LOG_WINDOW_FILE and LOG_WINDOW_CAPACITY.
 */
export function resolveLogWindowConfig(
  input: LogWindowConfigInput = {},
  env: NodeJS.ProcessEnv = process.env,
): LogWindowConfig {
  const merged: Record<string, unknown> = { ...input };
  if (merged.filePath === undefined && env.LOG_WINDOW_FILE) {
    merged.filePath = env.LOG_WINDOW_FILE;
  }
  if (merged.capacity === undefined && env.LOG_WINDOW_CAPACITY) {
    merged.capacity = env.LOG_WINDOW_CAPACITY;
  }
  if (merged.filePath === undefined) {
    merged.filePath = "";
  }

  const result = LogWindowConfigSchema.safeParse(merged);
  if (!result.success) {
    throw new ConfigError(issuesFromZod(result.error.issues));
  }
  return Object.freeze(result.data);
}
