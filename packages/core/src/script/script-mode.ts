/**
 * ScriptModeController - stack of nested scripts.
 *
 * State machine:
 *   Interactive (no frames) ──enterScript──▶ Scripted(1) ──enterScript──▶ Scripted(n+1)
 *   Scripted(n+1) ──exitScript──▶ Scripted(n) … Scripted(1) ──exitScript──▶ Interactive
 *   any ──reset──▶ Interactive
 *
 * `scripted`, `activePaths` and `currentSource` are all derived from the
 * frame stack, which only enterScript/exitScript/reset mutate. A canonical
 * path is never on the stack twice.
 */

import { constants } from "node:fs";
import { access, realpath, stat } from "node:fs/promises";
import { resolve } from "node:path";
import type { LineSource, Result, ScriptError, ScriptFrame, ScriptMode } from "@cairn/sdk";
import { ScriptStackError, commandError, err, ok } from "@cairn/sdk";
import { createLogger } from "@cairn/shared";
import { createFileLineSource } from "./line-source.js";

const logger = createLogger("ScriptMode");

export interface ScriptModeOptions {
  /** Interactive source used whenever no script is active */
  baseSource: LineSource;

  /** Opens a script by canonical path. Default: file line source */
  openSource?: (canonicalPath: string) => LineSource;

  /** Directory relative script paths resolve against. Default: process.cwd() */
  cwd?: () => string;
}

export class ScriptModeController implements ScriptMode {
  private readonly frames: ScriptFrame[] = [];
  private readonly baseSource: LineSource;
  private readonly openSource: (canonicalPath: string) => LineSource;
  private readonly cwd: () => string;

  constructor(options: ScriptModeOptions) {
    this.baseSource = options.baseSource;
    this.openSource = options.openSource ?? createFileLineSource;
    this.cwd = options.cwd ?? (() => process.cwd());
  }

  get scripted(): boolean {
    return this.frames.length > 0;
  }

  get depth(): number {
    return this.frames.length;
  }

  get activePaths(): readonly string[] {
    return this.frames.map((frame) => frame.path);
  }

  get currentSource(): LineSource {
    const top = this.frames[this.frames.length - 1];
    return top ? top.source : this.baseSource;
  }

  async enterScript(path: string): Promise<Result<void, ScriptError>> {
    const canonical = await this.canonicalize(path);
    if (canonical === null) {
      return err(commandError("ScriptNotFound", path));
    }
    if (this.frames.some((frame) => frame.path === canonical)) {
      logger.debug("Recursive script rejected", { path: canonical, depth: this.depth });
      return err(commandError("RecursiveScript", path));
    }

    this.frames.push({ path: canonical, source: this.openSource(canonical) });
    logger.debug("Entered script", { path: canonical, depth: this.depth });
    return ok(undefined);
  }

  /** Called when the current script's source is exhausted. */
  exitScript(): void {
    const frame = this.frames.pop();
    if (!frame) {
      throw new ScriptStackError("exitScript() called with no active script");
    }
    frame.source.close();
    logger.debug("Exited script", { path: frame.path, depth: this.depth });
  }

  /** Drop every frame and return to the interactive source. */
  reset(): void {
    if (this.frames.length > 0) {
      logger.debug("Unwinding script stack", { depth: this.depth });
    }
    for (let frame = this.frames.pop(); frame; frame = this.frames.pop()) {
      frame.source.close();
    }
  }

  /** End of session: drop every frame and close the interactive source too. */
  dispose(): void {
    this.reset();
    this.baseSource.close();
  }

  /**
   * Canonical, comparison-stable path of a readable regular file,
   * or null when there is no such file.
   */
  private async canonicalize(path: string): Promise<string | null> {
    if (path.trim() === "") return null;
    try {
      const canonical = await realpath(resolve(this.cwd(), path));
      const info = await stat(canonical);
      if (!info.isFile()) return null;
      await access(canonical, constants.R_OK);
      return canonical;
    } catch (error) {
      logger.debug("Script not accessible", {
        path,
        error: error instanceof Error ? error.message : String(error),
      });
      return null;
    }
  }
}
