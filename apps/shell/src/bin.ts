#!/usr/bin/env npx tsx
/**
 * cairn CLI entry point.
 *
 * Usage:
 *   npm start -- [--config <file>] [--socket <path>] [--timeout <ms>] [--verbose] [script]
 *   npx tsx apps/shell/src/bin.ts [options] [script]
 */

import { CairnError, ConfigError } from "@cairn/sdk";
import { createEmptyLineSource } from "@cairn/core";
import { setLogLevel } from "@cairn/shared";
import { loadShellConfig } from "./config.js";
import type { ResolvedShellConfig } from "./config.js";
import { createShell } from "./shell.js";
import { parseArgs, stringFlag } from "./utils/args.js";

const USAGE = `Usage: cairn [options] [script]

Interactive shell for the collection server. With a script, runs it and exits.

Options:
  --config <file>   Config file (default: ~/.cairn/config.json)
  --socket <path>   Server socket (env: CAIRN_SOCKET)
  --timeout <ms>    Remote call timeout, 0 for none (env: CAIRN_TIMEOUT_MS)
  --verbose         Debug logging on stderr
  --help, -h        Show this help`;

async function main(): Promise<number> {
  const args = parseArgs(process.argv.slice(2));

  if (args.flags.help === true || args.flags.h === true) {
    console.log(USAGE);
    return 0;
  }

  let config: ResolvedShellConfig;
  try {
    config = await loadShellConfig({
      configPath: stringFlag(args, "config"),
      overrides: {
        socketPath: stringFlag(args, "socket"),
        timeoutMs: stringFlag(args, "timeout"),
      },
    });
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error(`Error: ${error.message}`);
      return 1;
    }
    throw error;
  }

  setLogLevel(args.flags.verbose === true ? "debug" : config.logLevel);

  const script = args.positional[0];
  const shell =
    script === undefined
      ? createShell({ config })
      : createShell({ config: { ...config, greeting: false }, input: createEmptyLineSource("batch") });

  await shell.run({ script });
  return 0;
}

main().then(
  (code) => process.exit(code),
  (error: unknown) => {
    if (error instanceof CairnError) {
      console.error(`Fatal error [${error.code}]: ${error.message}`);
    } else {
      console.error("Fatal error:", error);
    }
    process.exit(1);
  },
);
