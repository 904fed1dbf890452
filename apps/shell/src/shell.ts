/**
 * Shell assembly - registry, script stack, display and remote boundary
 * wired into one dispatcher.
 */

import type { DisplaySink, LineSource, RemoteCallBoundary } from "@cairn/sdk";
import {
  ScriptModeController,
  createCommandRegistry,
  createDispatcher,
  createStdinLineSource,
} from "@cairn/core";
import type { CommandRegistry, Dispatcher, RunOptions, SessionSummary } from "@cairn/core";
import { registerCommands } from "./commands/index.js";
import type { ResolvedShellConfig } from "./config.js";
import { ConsoleDisplay } from "./display/console-display.js";
import { IpcRemoteBoundary } from "./remote/ipc-remote.js";

export interface ShellOptions {
  config: ResolvedShellConfig;

  /** Interactive source. Default: stdin */
  input?: LineSource;

  /** Builds the display; it is handed the scripted-mode probe. Default: console */
  createDisplay?: (isScripted: () => boolean) => DisplaySink;

  /** Default: IPC boundary on config.socketPath */
  remote?: RemoteCallBoundary;

  /** Directory relative script paths resolve against */
  cwd?: () => string;
}

export interface Shell {
  readonly registry: CommandRegistry;
  readonly script: ScriptModeController;
  readonly dispatcher: Dispatcher;
  run(options?: RunOptions): Promise<SessionSummary>;
}

export function createShell(options: ShellOptions): Shell {
  const { config } = options;

  const registry = createCommandRegistry();
  registerCommands(registry);

  const script = new ScriptModeController({
    baseSource: options.input ?? createStdinLineSource(),
    cwd: options.cwd,
  });

  const isScripted = (): boolean => script.scripted;
  const display = options.createDisplay ? options.createDisplay(isScripted) : new ConsoleDisplay({ isScripted });

  const remote =
    options.remote ?? new IpcRemoteBoundary({ socketPath: config.socketPath, timeoutMs: config.timeoutMs });

  const dispatcher = createDispatcher({
    registry,
    script,
    remote,
    display,
    greeting: config.greeting,
  });

  return {
    registry,
    script,
    dispatcher,
    run: (runOptions) => dispatcher.run(runOptions),
  };
}

export { loadShellConfig, getCairnHome, getDefaultConfigPath } from "./config.js";
export type { ResolvedShellConfig, LoadConfigOptions, ConfigOverrides } from "./config.js";
export { createCommandCatalog, registerCommands } from "./commands/index.js";
