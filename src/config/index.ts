export * from "./constants";
export { LogLevel, getLoggingConfig, parseLogLevel } from "./logging";
export type { LoggingConfig } from "./logging";
export { loadAppConfig, describeRequiredEnv } from "./env";
export type { AppConfig, AppConfigResult } from "./env";
