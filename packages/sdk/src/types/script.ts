/**
 * Script mode - the view of the nesting stack that commands may use.
 */

import type { Result, ScriptError } from "./result.js";
import type { LineSource } from "./source.js";

export interface ScriptFrame {
  /** Canonical path of the script file */
  readonly path: string;

  /** Line source reading the file */
  readonly source: LineSource;
}

export interface ScriptMode {
  /** True iff at least one script frame is active. */
  readonly scripted: boolean;

  /** Number of active frames. */
  readonly depth: number;

  /** Canonical paths of active frames, outermost first. */
  readonly activePaths: readonly string[];

  /** Source the next line is read from. */
  readonly currentSource: LineSource;

  /** Push a frame for `path`; fails without touching the stack. */
  enterScript(path: string): Promise<Result<void, ScriptError>>;
}
