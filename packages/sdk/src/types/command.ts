/**
 * Command contract - descriptors validate raw argument tokens into runnable
 * command instances. The capability tag (`kind`) is fixed when the
 * descriptor is written, never discovered at run time.
 */

import type { CommandOutcome } from "./outcome.js";
import type { RemoteRequest } from "./remote.js";
import type { ArgumentError, CommandError, Result } from "./result.js";
import type { ScriptMode } from "./script.js";

export type CommandKind = "local" | "remote";

/** What local commands can reach while running. */
export interface CommandContext {
  script: ScriptMode;

  /** Registered descriptors, in registration order. */
  commands(): readonly CommandDescriptor[];
}

export interface LocalCommand {
  run(ctx: CommandContext): Promise<Result<CommandOutcome, CommandError>>;
}

export interface RemoteCommand {
  serialize(): RemoteRequest;
}

interface DescriptorBase {
  /** Unique, matched case-insensitively */
  readonly name: string;

  /** One-line summary for help output */
  readonly description: string;

  /** Argument synopsis, e.g. "<id>" */
  readonly usage: string;
}

export interface LocalCommandDescriptor extends DescriptorBase {
  readonly kind: "local";
  /** `args` are the tokens after the command name. */
  validate(args: readonly string[]): Result<LocalCommand, ArgumentError>;
}

export interface RemoteCommandDescriptor extends DescriptorBase {
  readonly kind: "remote";
  validate(args: readonly string[]): Result<RemoteCommand, ArgumentError>;
}

export type CommandDescriptor = LocalCommandDescriptor | RemoteCommandDescriptor;
