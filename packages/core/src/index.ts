// Registry
export { createCommandRegistry, normalizeCommandName } from "./infrastructure/command-registry.js";
export type { CommandRegistry } from "./infrastructure/command-registry.js";

// Script mode
export { ScriptModeController } from "./script/script-mode.js";
export type { ScriptModeOptions } from "./script/script-mode.js";
export {
  StreamLineSource,
  createEmptyLineSource,
  createFileLineSource,
  createStdinLineSource,
} from "./script/line-source.js";

// Dispatch
export { tokenize } from "./execution/tokenize.js";
export { createDispatcher, DEFAULT_MESSAGES } from "./execution/dispatcher.js";
export type {
  Dispatcher,
  DispatcherDeps,
  DispatcherMessages,
  LineResult,
  RunOptions,
  SessionEndReason,
  SessionSummary,
} from "./execution/dispatcher.js";
