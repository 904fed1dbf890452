/**
 * Dispatcher - the read → resolve → validate → execute loop.
 *
 * Per line:
 *   READ ── null + scripted ──▶ exitScript, READ
 *        ── null + interactive ──▶ shutdown notice, END(end-of-input)
 *   TOKENIZE → RESOLVE → VALIDATE → EXECUTE (local run | remote send) → DISPLAY
 *
 * Classified errors are reported and the loop reads the next line from the
 * same source. A connection failure unwinds every script frame and ends the
 * session. The remote boundary is started and closed here and nowhere else.
 */

import type {
  CommandContext,
  CommandDescriptor,
  CommandError,
  CommandOutcome,
  ConnectionFailure,
  DisplaySink,
  RemoteCallBoundary,
} from "@cairn/sdk";
import { formatCommandError, textOutcome } from "@cairn/sdk";
import { createLogger, generateSessionId } from "@cairn/shared";
import type { CommandRegistry } from "../infrastructure/command-registry.js";
import type { ScriptModeController } from "../script/script-mode.js";
import { tokenize } from "./tokenize.js";

export interface DispatcherMessages {
  greeting: string;
  prompt: string;
  /** Shown when the terminal reaches end-of-input */
  shutdown: string;
}

export const DEFAULT_MESSAGES: Readonly<DispatcherMessages> = {
  greeting: 'Enter "help" to see available commands. Enter "exit" or CTRL + D to close the application',
  prompt: "$ ",
  shutdown: "The application will be closed.",
};

export interface DispatcherDeps {
  registry: CommandRegistry;
  script: ScriptModeController;
  remote: RemoteCallBoundary;
  display: DisplaySink;
  /** Show the usage hint before the first prompt (default: true). */
  greeting?: boolean;
  messages?: Partial<DispatcherMessages>;
}

export type LineResult =
  | { status: "executed"; outcome: CommandOutcome }
  | { status: "rejected"; error: CommandError }
  | { status: "connection-failure"; error: ConnectionFailure };

export type SessionEndReason = "exit" | "end-of-input" | "connection-failure";

export interface SessionSummary {
  reason: SessionEndReason;
  /** Commands that ran to completion (exit included) */
  executed: number;
}

export interface RunOptions {
  /** Script to enter before the first read. */
  script?: string;
}

export interface Dispatcher {
  /** Run the session until exit, end-of-input or a connection failure. */
  run(options?: RunOptions): Promise<SessionSummary>;
  /** Resolve, validate, execute and report a single line. */
  dispatchLine(line: string): Promise<LineResult>;
}

function isConnectionFailure(error: CommandError): error is ConnectionFailure {
  return error.kind === "ConnectionFailure";
}

export function createDispatcher(deps: DispatcherDeps): Dispatcher {
  const { registry, script, remote, display } = deps;
  const messages: DispatcherMessages = { ...DEFAULT_MESSAGES, ...deps.messages };
  const context: CommandContext = { script, commands: () => registry.list() };
  const logger = createLogger("Dispatcher");
  logger.setContext({ sessionId: generateSessionId() });
  let executed = 0;

  function reject(error: CommandError): LineResult {
    logger.debug(`Rejected: ${error.kind}`, { detail: error.detail, depth: script.depth });
    // Blank lines are silent while scripted.
    display.show(formatCommandError(error), error.kind === "NoCommand", true);
    return { status: "rejected", error };
  }

  function connectionLost(error: ConnectionFailure): LineResult {
    logger.warn("Remote peer unreachable", { detail: error.detail, depth: script.depth });
    script.reset();
    display.show(error.message, false, true);
    return { status: "connection-failure", error };
  }

  function present(outcome: CommandOutcome): LineResult {
    executed++;
    if (outcome.type === "text" && outcome.text !== "") {
      display.show(outcome.text, false, false);
    }
    return { status: "executed", outcome };
  }

  async function execute(descriptor: CommandDescriptor, args: string[]): Promise<LineResult> {
    if (descriptor.kind === "local") {
      const validated = descriptor.validate(args);
      if (!validated.ok) return reject(validated.error);

      const result = await validated.value.run(context);
      if (!result.ok) {
        return isConnectionFailure(result.error) ? connectionLost(result.error) : reject(result.error);
      }
      return present(result.value);
    }

    const validated = descriptor.validate(args);
    if (!validated.ok) return reject(validated.error);

    const sent = await remote.send(validated.value.serialize(), script.scripted);
    if (!sent.ok) return connectionLost(sent.error);
    return present(textOutcome(sent.value));
  }

  async function dispatchLine(line: string): Promise<LineResult> {
    const tokens = tokenize(line);
    const resolved = registry.resolve(tokens);
    if (!resolved.ok) return reject(resolved.error);

    const descriptor = resolved.value;
    logger.debug(`Dispatching ${descriptor.name}`, { kind: descriptor.kind, depth: script.depth });
    return execute(descriptor, tokens.slice(1));
  }

  async function finish(reason: SessionEndReason): Promise<SessionSummary> {
    script.dispose();
    await remote.close();
    logger.debug("Session ended", { reason, executed });
    return { reason, executed };
  }

  async function run(options: RunOptions = {}): Promise<SessionSummary> {
    const started = await remote.start();
    if (!started.ok) {
      connectionLost(started.error);
      return finish("connection-failure");
    }

    if (deps.greeting ?? true) {
      display.show(messages.greeting, true, false);
    }

    if (options.script !== undefined) {
      const entered = await script.enterScript(options.script);
      if (!entered.ok) reject(entered.error);
    }

    for (;;) {
      display.prompt(messages.prompt);
      const line = await script.currentSource.readLine();

      if (line === null) {
        if (script.scripted) {
          script.exitScript();
          continue;
        }
        display.show(messages.shutdown, false, false);
        return finish("end-of-input");
      }

      const result = await dispatchLine(line);
      if (result.status === "connection-failure") {
        return finish("connection-failure");
      }
      if (result.status === "executed" && result.outcome.type === "terminate") {
        return finish("exit");
      }
    }
  }

  return { run, dispatchLine };
}
