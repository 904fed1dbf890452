/**
 * Platform utilities for the peer socket.
 *
 * On Windows, Unix domain sockets are not supported.
 * Named pipes (\\.\pipe\name) are used instead.
 */

import { join } from "node:path";
import { createHash } from "node:crypto";

export const isWindows = process.platform === "win32";

function simpleHash(input: string): string {
  return createHash("md5").update(input).digest("hex").slice(0, 8);
}

export function getDefaultSocketPath(statePath: string, windows = isWindows): string {
  if (windows) {
    return `\\\\.\\pipe\\cairn-collection-${simpleHash(statePath)}`;
  }
  return join(statePath, "sockets", "collection.sock");
}
