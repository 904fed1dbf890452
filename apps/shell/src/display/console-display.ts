/**
 * ConsoleDisplay - DisplaySink over stdout/stderr.
 *
 * Prompts and suppressible messages are dropped while a script is running.
 */

import type { DisplaySink } from "@cairn/sdk";

export interface ConsoleDisplayOptions {
  isScripted: () => boolean;
  stdout?: NodeJS.WritableStream;
  stderr?: NodeJS.WritableStream;
}

export class ConsoleDisplay implements DisplaySink {
  private readonly isScripted: () => boolean;
  private readonly stdout: NodeJS.WritableStream;
  private readonly stderr: NodeJS.WritableStream;

  constructor(options: ConsoleDisplayOptions) {
    this.isScripted = options.isScripted;
    this.stdout = options.stdout ?? process.stdout;
    this.stderr = options.stderr ?? process.stderr;
  }

  show(text: string, suppressWhenScripted: boolean, isError: boolean): void {
    if (suppressWhenScripted && this.isScripted()) return;
    (isError ? this.stderr : this.stdout).write(`${text}\n`);
  }

  prompt(text: string): void {
    if (this.isScripted()) return;
    this.stdout.write(text);
  }
}
