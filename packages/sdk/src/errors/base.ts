/**
 * Error hierarchy for faults that are not user-level command errors.
 *
 * User mistakes (unknown command, bad arguments, missing script) are
 * CommandError values; these classes cover transport, configuration and
 * internal-consistency faults.
 */

import { ErrorCode } from "./codes.js";

export class CairnError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    options?: { cause?: Error },
  ) {
    super(message, options);
    this.name = "CairnError";
  }
}

export class TransportError extends CairnError {
  constructor(
    public readonly transport: string,
    message: string,
    options?: { cause?: Error; code?: string },
  ) {
    super(`Transport "${transport}" error: ${message}`, options?.code ?? ErrorCode.TRANSPORT_ERROR, options);
    this.name = "TransportError";
  }
}

/**
 * The peer received the request and answered with an error.
 * The connection itself is still usable.
 */
export class RpcError extends CairnError {
  constructor(
    public readonly rpcCode: number,
    message: string,
  ) {
    super(message, ErrorCode.RPC_ERROR);
    this.name = "RpcError";
  }
}

export class ConfigError extends CairnError {
  constructor(
    message: string,
    options?: { cause?: Error; code?: string },
  ) {
    super(message, options?.code ?? ErrorCode.CONFIG_ERROR, options);
    this.name = "ConfigError";
  }
}

/**
 * Thrown at startup when a command descriptor cannot be registered.
 */
export class RegistrationError extends CairnError {
  constructor(
    public readonly commandName: string,
    message: string,
  ) {
    super(`Cannot register command "${commandName}": ${message}`, ErrorCode.REGISTRATION_ERROR);
    this.name = "RegistrationError";
  }
}

/**
 * Script stack used out of contract (e.g. popping an empty stack).
 * Never a user error; the session aborts with a diagnostic.
 */
export class ScriptStackError extends CairnError {
  constructor(message: string) {
    super(message, ErrorCode.SCRIPT_STACK_ERROR);
    this.name = "ScriptStackError";
  }
}
