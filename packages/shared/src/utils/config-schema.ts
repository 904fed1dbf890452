/**
 * Zod schema for the shell configuration file (~/.cairn/config.json).
 *
 * Every field is optional in the file; defaults are applied here so the
 * rest of the shell sees a complete config.
 */

import { z } from "zod";
import { LOG_LEVELS } from "../logger/index.js";

export const LogLevelSchema = z.enum(LOG_LEVELS);

export const ShellConfigSchema = z.object({
  /** Socket (or named pipe) of the collection peer */
  socketPath: z.string().min(1, "socketPath must not be empty").optional(),
  /** Remote call timeout in ms; 0 disables it */
  timeoutMs: z.number().int().nonnegative().default(0),
  logLevel: LogLevelSchema.default("warn"),
  /** Print the usage hint when an interactive session starts */
  greeting: z.boolean().default(true),
}).strict();

export type ShellConfig = z.infer<typeof ShellConfigSchema>;
