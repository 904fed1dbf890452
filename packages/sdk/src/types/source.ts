/**
 * Line-oriented input source: the terminal, a script file, or a test double.
 */
export interface LineSource {
  /** Display name (script path, "stdin", ...) */
  readonly name: string;

  /** Next line without its terminator, or null once the source is exhausted. */
  readLine(): Promise<string | null>;

  /** Release the underlying stream. Idempotent. */
  close(): void;
}
