/**
 * Display sink - where prompts, results and errors go.
 *
 * The sink knows whether the session is scripted and drops text flagged
 * `suppressWhenScripted` while it is.
 */
export interface DisplaySink {
  show(text: string, suppressWhenScripted: boolean, isError: boolean): void;

  /** Write the input prompt (no line terminator). Never shown while scripted. */
  prompt(text: string): void;
}
