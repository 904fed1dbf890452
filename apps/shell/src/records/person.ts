/**
 * Person records - field tokens (`name=value`) validated with zod before
 * they are forwarded to the peer.
 */

import { z } from "zod";
import type { ArgumentError, Result } from "@cairn/sdk";
import { commandError, err, ok } from "@cairn/sdk";
import { validateInput } from "@cairn/shared";

const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;

function isCalendarDate(value: string): boolean {
  const date = new Date(`${value}T00:00:00Z`);
  return !Number.isNaN(date.getTime()) && date.toISOString().startsWith(value);
}

export const IsoDateSchema = z.string().superRefine((value, ctx) => {
  if (!ISO_DATE.test(value)) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: "must be a date in YYYY-MM-DD form" });
  } else if (!isCalendarDate(value)) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: "is not a calendar date" });
  }
});

export const PersonSchema = z
  .object({
    name: z.string().trim().min(1, "must not be empty"),
    height: z.coerce.number().finite().positive("must be positive"),
    birthday: IsoDateSchema,
  })
  .strict();

export const PersonPatchSchema = PersonSchema.partial().strict();

export type Person = z.infer<typeof PersonSchema>;
export type PersonPatch = z.infer<typeof PersonPatchSchema>;

export const RecordIdSchema = z.coerce
  .number()
  .int("must be a whole number")
  .positive("must be positive")
  .max(Number.MAX_SAFE_INTEGER);

function typeMismatch(detail: string): Result<never, ArgumentError> {
  return err(commandError("ArgumentTypeMismatch", detail));
}

/** Split `field=value` tokens. Each field may appear once. */
export function parseFieldTokens(tokens: readonly string[]): Result<Record<string, string>, ArgumentError> {
  const fields: Record<string, string> = {};
  for (const token of tokens) {
    const eq = token.indexOf("=");
    if (eq <= 0) {
      return typeMismatch(`expected field=value, got "${token}"`);
    }
    const field = token.slice(0, eq).toLowerCase();
    if (Object.hasOwn(fields, field)) {
      return typeMismatch(`field "${field}" given twice`);
    }
    fields[field] = token.slice(eq + 1);
  }
  return ok(fields);
}

function validated<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, input: unknown): Result<T, ArgumentError> {
  const result = validateInput(schema, input);
  return result.success ? ok(result.data) : typeMismatch(result.error);
}

/** A complete person: every field is required. */
export function parsePerson(tokens: readonly string[]): Result<Person, ArgumentError> {
  const fields = parseFieldTokens(tokens);
  if (!fields.ok) return fields;
  return validated(PersonSchema, fields.value);
}

/** A partial update: only the given fields. */
export function parsePersonPatch(tokens: readonly string[]): Result<PersonPatch, ArgumentError> {
  const fields = parseFieldTokens(tokens);
  if (!fields.ok) return fields;
  return validated(PersonPatchSchema, fields.value);
}

export function parseRecordId(token: string): Result<number, ArgumentError> {
  if (!/^\d+$/.test(token)) {
    return typeMismatch(`id: expected a positive integer, got "${token}"`);
  }
  return validated(RecordIdSchema, token);
}

export function parseIsoDate(token: string): Result<string, ArgumentError> {
  return validated(IsoDateSchema, token);
}
