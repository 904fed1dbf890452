/**
 * Argument-count helpers shared by the command catalog.
 */

import type { ArgumentError, Err } from "@cairn/sdk";
import { commandError, err } from "@cairn/sdk";

/** "name usage", or just the name when the command takes no arguments. */
export function synopsis(name: string, usage: string): string {
  return usage === "" ? name : `${name} ${usage}`;
}

export function countMismatch(name: string, usage: string): Err<ArgumentError> {
  return err(commandError("ArgumentCountMismatch", `usage: ${synopsis(name, usage)}`));
}
