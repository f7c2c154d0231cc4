export { Faultline } from "~/app/faultline.ts";
export {
  ConfigError,
  configFromEnv,
  DEFAULT_SETTINGS,
  FaultlineConfigSchema,
  resolveSettings,
  validateSettings,
} from "~/app/config.ts";
export { createLogger, LOG_LEVEL_NAMES } from "~/app/logger.ts";
export type {
  ExceptionOptions,
  FaultlineConfig,
  FaultlineSettings,
  LogFields,
  Logger,
  LoggerConfig,
  LogLevel,
  LogStream,
  RouteOptions,
} from "~/app/types.ts";
