/**
 * Remote commands - validated here, executed by the collection peer.
 */

import type { ArgumentError, RemoteCommandDescriptor, RemoteRequest, Result } from "@cairn/sdk";
import { ok } from "@cairn/sdk";
import { parseIsoDate, parsePerson, parsePersonPatch, parseRecordId } from "../records/person.js";
import { countMismatch } from "./arguments.js";

export interface RemoteCommandDefinition {
  name: string;
  description: string;
  usage: string;
  /** Turn the argument tokens into the request's `args`. */
  parse(args: readonly string[]): Result<Record<string, unknown>, ArgumentError>;
}

export function defineRemoteCommand(definition: RemoteCommandDefinition): RemoteCommandDescriptor {
  const command = definition.name.trim().toLowerCase();
  return {
    kind: "remote",
    name: definition.name,
    description: definition.description,
    usage: definition.usage,
    validate(args) {
      const parsed = definition.parse(args);
      if (!parsed.ok) return parsed;
      const request: RemoteRequest = { command, args: parsed.value };
      return ok({ serialize: () => request });
    },
  };
}

const PERSON_USAGE = "name=<text> height=<number> birthday=<YYYY-MM-DD>";

function withoutArguments(name: string, description: string): RemoteCommandDescriptor {
  return defineRemoteCommand({
    name,
    description,
    usage: "",
    parse: (args) => (args.length === 0 ? ok({}) : countMismatch(name, "")),
  });
}

function addingPerson(name: string, description: string): RemoteCommandDescriptor {
  return defineRemoteCommand({
    name,
    description,
    usage: PERSON_USAGE,
    parse(args) {
      if (args.length === 0) return countMismatch(name, PERSON_USAGE);
      const person = parsePerson(args);
      return person.ok ? ok({ person: person.value }) : person;
    },
  });
}

export const REMOTE_COMMANDS: readonly RemoteCommandDescriptor[] = [
  withoutArguments("info", "print information about the collection"),
  withoutArguments("show", "print every element of the collection"),
  addingPerson("add", "add a new element"),
  defineRemoteCommand({
    name: "update",
    description: "update the element with the given id",
    usage: "<id> field=value...",
    parse(args) {
      if (args.length < 2) return countMismatch("update", "<id> field=value...");
      const id = parseRecordId(args[0]);
      if (!id.ok) return id;
      const fields = parsePersonPatch(args.slice(1));
      return fields.ok ? ok({ id: id.value, fields: fields.value }) : fields;
    },
  }),
  defineRemoteCommand({
    name: "remove",
    description: "remove the element with the given id",
    usage: "<id>",
    parse(args) {
      if (args.length !== 1) return countMismatch("remove", "<id>");
      const id = parseRecordId(args[0]);
      return id.ok ? ok({ id: id.value }) : id;
    },
  }),
  withoutArguments("clear", "remove every element you own"),
  addingPerson("add_if_max", "add an element if it is greater than the largest one"),
  addingPerson("add_if_min", "add an element if it is smaller than the smallest one"),
  withoutArguments("shuffle", "shuffle the collection"),
  withoutArguments("group", "count elements grouped by height"),
  defineRemoteCommand({
    name: "count_by_birthday",
    description: "count elements with the given birthday",
    usage: "<YYYY-MM-DD>",
    parse(args) {
      if (args.length !== 1) return countMismatch("count_by_birthday", "<YYYY-MM-DD>");
      const birthday = parseIsoDate(args[0]);
      return birthday.ok ? ok({ birthday: birthday.value }) : birthday;
    },
  }),
  withoutArguments("print_birthdays", "print every birthday in descending order"),
];
