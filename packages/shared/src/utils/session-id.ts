import { randomUUID } from "node:crypto";

/** Identifier for one shell session; tags every log line the session writes. */
export function generateSessionId(): string {
  return randomUUID();
}
