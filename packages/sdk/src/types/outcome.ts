/**
 * What a successfully executed command leaves behind.
 */

export type CommandOutcome =
  | { type: "text"; text: string }
  | { type: "none" }
  | { type: "terminate" };

export const NO_OUTPUT: CommandOutcome = Object.freeze({ type: "none" });

export const TERMINATE: CommandOutcome = Object.freeze({ type: "terminate" });

export function textOutcome(text: string): CommandOutcome {
  return { type: "text", text };
}
