/**
 * Error codes carried by CairnError and its subclasses.
 */
export const ErrorCode = {
  TRANSPORT_ERROR: "TRANSPORT_ERROR",
  TRANSPORT_CLOSED: "TRANSPORT_CLOSED",
  TRANSPORT_TIMEOUT: "TRANSPORT_TIMEOUT",
  RPC_ERROR: "RPC_ERROR",
  CONFIG_ERROR: "CONFIG_ERROR",
  CONFIG_NOT_FOUND: "CONFIG_NOT_FOUND",
  REGISTRATION_ERROR: "REGISTRATION_ERROR",
  SCRIPT_STACK_ERROR: "SCRIPT_STACK_ERROR",
} as const;
