/**
 * Local commands - run entirely inside the shell, never touch the peer.
 */

import type { CommandContext, CommandDescriptor, LocalCommandDescriptor } from "@cairn/sdk";
import { NO_OUTPUT, TERMINATE, ok, textOutcome } from "@cairn/sdk";
import { countMismatch, synopsis } from "./arguments.js";

export const HELP_HEADER = "Available commands:";

/** One line per command, descriptions aligned in a column. */
export function formatHelp(commands: readonly CommandDescriptor[]): string {
  const rows = commands.map((command) => ({
    synopsis: synopsis(command.name, command.usage),
    description: command.description,
  }));
  const width = Math.max(0, ...rows.map((row) => row.synopsis.length));
  const lines = rows.map((row) => `  ${row.synopsis.padEnd(width)}  ${row.description}`);
  return [HELP_HEADER, ...lines].join("\n");
}

export const helpCommand: LocalCommandDescriptor = {
  kind: "local",
  name: "help",
  description: "show available commands",
  usage: "",
  validate(args) {
    if (args.length !== 0) return countMismatch("help", "");
    return ok({
      run: async (ctx: CommandContext) => ok(textOutcome(formatHelp(ctx.commands()))),
    });
  },
};

export const exitCommand: LocalCommandDescriptor = {
  kind: "local",
  name: "exit",
  description: "close the application",
  usage: "",
  validate(args) {
    if (args.length !== 0) return countMismatch("exit", "");
    return ok({ run: async () => ok(TERMINATE) });
  },
};

export const executeCommand: LocalCommandDescriptor = {
  kind: "local",
  name: "execute",
  description: "read and run commands from a script file",
  usage: "<path>",
  validate(args) {
    if (args.length !== 1) return countMismatch("execute", "<path>");
    const [path] = args;
    return ok({
      run: async (ctx: CommandContext) => {
        const entered = await ctx.script.enterScript(path);
        return entered.ok ? ok(NO_OUTPUT) : entered;
      },
    });
  },
};
