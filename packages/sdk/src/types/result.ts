/**
 * Result values - recoverable failures travel as data, not exceptions.
 */

/**
 * Classified user-level failures. Everything except "ConnectionFailure" is
 * reported and the session continues with the next line.
 */
export type CommandErrorKind =
  | "NoCommand"
  | "UnknownCommand"
  | "ArgumentCountMismatch"
  | "ArgumentTypeMismatch"
  | "ScriptNotFound"
  | "RecursiveScript"
  | "ConnectionFailure";

export interface CommandError<K extends CommandErrorKind = CommandErrorKind> {
  kind: K;

  /** Category message shown to the user */
  message: string;

  /** Offending input (command name, script path, usage hint) */
  detail?: string;
}

export type ArgumentError = CommandError<"ArgumentCountMismatch" | "ArgumentTypeMismatch">;
export type ScriptError = CommandError<"ScriptNotFound" | "RecursiveScript">;
export type ConnectionFailure = CommandError<"ConnectionFailure">;

export type Ok<T> = { ok: true; value: T };
export type Err<E> = { ok: false; error: E };
export type Result<T, E = CommandError> = Ok<T> | Err<E>;

export function ok<T>(value: T): Ok<T> {
  return { ok: true, value };
}

export function err<E>(error: E): Err<E> {
  return { ok: false, error };
}

export const DEFAULT_ERROR_MESSAGES: Readonly<Record<CommandErrorKind, string>> = {
  NoCommand: "No command, try again.",
  UnknownCommand: "No such command, try again.",
  ArgumentCountMismatch: "Wrong arguments, try again.",
  ArgumentTypeMismatch: "Wrong arguments, try again.",
  ScriptNotFound: "This script doesn't exist or can't be accessed.",
  RecursiveScript: "Recursion detected: the script is already running.",
  ConnectionFailure: "Couldn't connect to the server. The application will be closed.",
};

export function commandError<K extends CommandErrorKind>(kind: K, detail?: string): CommandError<K> {
  const error: CommandError<K> = { kind, message: DEFAULT_ERROR_MESSAGES[kind] };
  if (detail !== undefined && detail !== "") {
    error.detail = detail;
  }
  return error;
}

/** Render an error for the display sink: message, then detail in parentheses. */
export function formatCommandError(error: CommandError): string {
  return error.detail ? `${error.message} (${error.detail})` : error.message;
}
