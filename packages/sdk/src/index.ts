// Types
export type {
  CommandErrorKind,
  CommandError,
  ArgumentError,
  ScriptError,
  ConnectionFailure,
  Ok,
  Err,
  Result,
} from "./types/result.js";
export { ok, err, commandError, formatCommandError, DEFAULT_ERROR_MESSAGES } from "./types/result.js";

export type { CommandOutcome } from "./types/outcome.js";
export { NO_OUTPUT, TERMINATE, textOutcome } from "./types/outcome.js";

export type {
  CommandKind,
  CommandContext,
  LocalCommand,
  RemoteCommand,
  LocalCommandDescriptor,
  RemoteCommandDescriptor,
  CommandDescriptor,
} from "./types/command.js";

export type { LineSource } from "./types/source.js";
export type { DisplaySink } from "./types/display.js";
export type { RemoteRequest, RemoteCallBoundary } from "./types/remote.js";
export type { ScriptFrame, ScriptMode } from "./types/script.js";

// Errors
export {
  CairnError,
  TransportError,
  RpcError,
  ConfigError,
  RegistrationError,
  ScriptStackError,
} from "./errors/base.js";
export { ErrorCode } from "./errors/codes.js";
