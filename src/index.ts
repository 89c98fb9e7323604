export * from "./log-window/index.js";
export {
  resolveLogWindowConfig,
  type LogWindowConfig,
  type LogWindowConfigInput,
} from "./config/log-window-config.js";
export { createSubsystemLogger, setLogLevel, type LogLevelName } from "./logging/subsystem.js";
