/**
 * CommandRegistry - maps command names to descriptors.
 *
 * Names are normalized (trimmed, lower-cased) on both registration and
 * lookup, so "ADD ", "add" and " Add" all reach the same descriptor.
 * The registry is filled once at startup and only read afterwards.
 */

import type { CommandDescriptor, CommandError, Result } from "@cairn/sdk";
import { RegistrationError, commandError, err, ok } from "@cairn/sdk";
import { createLogger } from "@cairn/shared";

const logger = createLogger("CommandRegistry");

export interface CommandRegistry {
  /** Throws RegistrationError on an empty or duplicate name. */
  register(descriptor: CommandDescriptor): void;
  /** Resolve the descriptor named by the first token. */
  resolve(tokens: readonly string[]): Result<CommandDescriptor, CommandError<"NoCommand" | "UnknownCommand">>;
  get(name: string): CommandDescriptor | undefined;
  /** Descriptors in registration order. */
  list(): CommandDescriptor[];
}

export function normalizeCommandName(name: string): string {
  return name.trim().toLowerCase();
}

export function createCommandRegistry(): CommandRegistry {
  const commands = new Map<string, CommandDescriptor>();

  return {
    register(descriptor: CommandDescriptor): void {
      const key = normalizeCommandName(descriptor.name);
      if (key === "") {
        throw new RegistrationError(descriptor.name, "name is empty");
      }
      if (commands.has(key)) {
        throw new RegistrationError(descriptor.name, "name is already registered");
      }
      logger.debug(`Registering command: ${key}`, { kind: descriptor.kind });
      commands.set(key, Object.freeze(descriptor));
    },

    resolve(tokens) {
      if (tokens.length === 0) {
        return err(commandError("NoCommand"));
      }
      const key = normalizeCommandName(tokens[0]);
      if (key === "") {
        return err(commandError("NoCommand"));
      }
      const descriptor = commands.get(key);
      if (!descriptor) {
        return err(commandError("UnknownCommand", key));
      }
      return ok(descriptor);
    },

    get(name: string): CommandDescriptor | undefined {
      return commands.get(normalizeCommandName(name));
    },

    list(): CommandDescriptor[] {
      return [...commands.values()];
    },
  };
}
