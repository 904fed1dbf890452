export { createLogger, setLogLevel, isLogLevel, LOG_LEVELS } from "./logger/index.js";
export type { Logger, LogLevel, LogContext } from "./logger/index.js";

export { generateSessionId } from "./utils/session-id.js";
export { validateInput, formatZodError } from "./utils/validation.js";
export type { ValidationResult } from "./utils/validation.js";

export { ShellConfigSchema, LogLevelSchema } from "./utils/config-schema.js";
export type { ShellConfig } from "./utils/config-schema.js";
