/**
 * CLI argument parser.
 *
 * Hand-rolled minimal parser - no external CLI framework needed.
 */

export interface ParsedArgs {
  /** Named flags (e.g., { config: "./config.json", verbose: true }) */
  flags: Record<string, string | boolean>;

  /** Positional arguments (e.g., ["./setup.script"]) */
  positional: string[];
}

/** Flags that never take a value, so the next argument stays positional. */
export const BOOLEAN_FLAGS: ReadonlySet<string> = new Set(["verbose", "help", "h", "v"]);

/**
 * Parse CLI arguments into structured ParsedArgs.
 *
 * Supported formats:
 *   - Long flag with value: --socket /tmp/peer.sock, --socket=/tmp/peer.sock
 *   - Boolean flag: --verbose
 *   - Short flag: -h (treated as boolean)
 *   - Positional: every non-flag argument
 *
 * Examples:
 *   parseArgs(["--socket", "/tmp/p.sock"]) → { flags: { socket: "/tmp/p.sock" }, positional: [] }
 *   parseArgs(["--verbose", "setup.script"]) → { flags: { verbose: true }, positional: ["setup.script"] }
 */
export function parseArgs(argv: string[], booleanFlags: ReadonlySet<string> = BOOLEAN_FLAGS): ParsedArgs {
  const flags: Record<string, string | boolean> = {};
  const positional: string[] = [];

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];

    // Everything after "--" is positional
    if (arg === "--") {
      positional.push(...argv.slice(i + 1));
      break;
    }

    if (arg.startsWith("--")) {
      const body = arg.slice(2);
      const eq = body.indexOf("=");
      if (eq > 0) {
        flags[body.slice(0, eq)] = body.slice(eq + 1);
        continue;
      }

      const next = argv[i + 1];
      if (!booleanFlags.has(body) && next !== undefined && !next.startsWith("-")) {
        flags[body] = next;
        i++; // Skip value
        continue;
      }

      flags[body] = true;
      continue;
    }

    // Short flag: -h
    if (arg.startsWith("-") && arg.length === 2) {
      flags[arg.slice(1)] = true;
      continue;
    }

    positional.push(arg);
  }

  return { flags, positional };
}

/** String value of a flag, or undefined when absent or given without a value. */
export function stringFlag(args: ParsedArgs, name: string): string | undefined {
  const value = args.flags[name];
  return typeof value === "string" ? value : undefined;
}
