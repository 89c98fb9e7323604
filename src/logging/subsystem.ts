import { Logger, type ILogObj } from "tslog";

export type LogLevelName = "silly" | "trace" | "debug" | "info" | "warn" | "error" | "fatal";

export type SubsystemLogger = Logger<ILogObj>;

const LEVEL_IDS: Record<LogLevelName, number> = {
  silly: 0,
  trace: 1,
  debug: 2,
  info: 3,
  warn: 4,
  error: 5,
  fatal: 6,
};

export function isLogLevelName(value: string): value is LogLevelName {
  return Object.hasOwn(LEVEL_IDS, value);
}

function resolveEnvLevel(): number {
  const raw = process.env.LOG_WINDOW_LOG_LEVEL?.trim().toLowerCase();
  if (raw && isLogLevelName(raw)) {
    return LEVEL_IDS[raw];
  }
  return LEVEL_IDS.info;
}

function resolveEnvFormat(): "pretty" | "json" {
  return process.env.LOG_WINDOW_LOG_FORMAT?.trim().toLowerCase() === "json" ? "json" : "pretty";
}

const rootLogger: SubsystemLogger = new Logger<ILogObj>({
  name: "log-window",
  type: resolveEnvFormat(),
  minLevel: resolveEnvLevel(),
});

// Sub-loggers copy settings when created, so level changes are fanned out by hand.
const subsystemLoggers = new Map<string, SubsystemLogger>();

/**
 * Returns the logger for a subsystem such as "log-window/tailer".
 * Loggers are cached per subsystem name.
 */
export function createSubsystemLogger(subsystem: string): SubsystemLogger {
  const existing = subsystemLoggers.get(subsystem);
  if (existing) {
    return existing;
  }
  const logger = rootLogger.getSubLogger({ name: subsystem });
  subsystemLoggers.set(subsystem, logger);
  return logger;
}

/**
 * Changes the minimum level of the root logger and every subsystem logger.
 */
export function setLogLevel(level: LogLevelName): void {
  const id = LEVEL_IDS[level];
  rootLogger.settings.minLevel = id;
  for (const logger of subsystemLoggers.values()) {
    logger.settings.minLevel = id;
  }
}
