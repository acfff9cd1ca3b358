// biome-ignore lint/performance/noBarrelFile: Public API entry point for logging module
export { createLogger, type FormGateLogger } from "./create-log";
export {
  createPinoLogger,
  type Log,
  type LoggerConfig,
  type LogLevel,
  writeLog,
} from "./logger";
