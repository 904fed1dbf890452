import type { CommandDescriptor } from "@cairn/sdk";
import type { CommandRegistry } from "@cairn/core";
import { executeCommand, exitCommand, helpCommand } from "./local.js";
import { REMOTE_COMMANDS } from "./remote.js";

/** Every built-in command, in the order help lists them. */
export function createCommandCatalog(): CommandDescriptor[] {
  return [helpCommand, ...REMOTE_COMMANDS, executeCommand, exitCommand];
}

export function registerCommands(registry: CommandRegistry, commands = createCommandCatalog()): void {
  for (const command of commands) {
    registry.register(command);
  }
}

export { helpCommand, exitCommand, executeCommand, formatHelp, HELP_HEADER } from "./local.js";
export { REMOTE_COMMANDS, defineRemoteCommand } from "./remote.js";
export type { RemoteCommandDefinition } from "./remote.js";
