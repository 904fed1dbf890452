/**
 * Line sources over Node streams: the terminal and script files.
 */

import { createReadStream } from "node:fs";
import { createInterface } from "node:readline";
import type { Interface } from "node:readline";
import type { LineSource } from "@cairn/sdk";
import { createLogger } from "@cairn/shared";

const logger = createLogger("LineSource");

/**
 * Reads one line at a time from a readable stream. The stream is consumed
 * lazily, so a terminal blocks only while a line is awaited.
 */
export class StreamLineSource implements LineSource {
  private readonly rl: Interface;
  private readonly lines: AsyncIterator<string>;
  private closed = false;

  constructor(
    readonly name: string,
    input: NodeJS.ReadableStream,
  ) {
    this.rl = createInterface({ input, crlfDelay: Infinity, terminal: false });
    // Created eagerly so lines emitted before the first read are buffered.
    this.lines = this.rl[Symbol.asyncIterator]();
  }

  async readLine(): Promise<string | null> {
    if (this.closed) return null;
    try {
      const next = await this.lines.next();
      if (next.done) {
        this.close();
        return null;
      }
      return next.value;
    } catch (err) {
      // A broken stream ends the source; the caller sees end-of-input.
      logger.warn(`Input stream failed: ${this.name}`, {
        error: err instanceof Error ? err.message : String(err),
      });
      this.close();
      return null;
    }
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.rl.close();
  }
}

export function createFileLineSource(path: string): LineSource {
  return new StreamLineSource(path, createReadStream(path, { encoding: "utf-8" }));
}

export function createStdinLineSource(): LineSource {
  return new StreamLineSource("stdin", process.stdin);
}

/** A source that is already exhausted. Used as the base when a script runs non-interactively. */
export function createEmptyLineSource(name = "empty"): LineSource {
  return {
    name,
    readLine: async () => null,
    close: () => {},
  };
}
