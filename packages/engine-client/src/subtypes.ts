/**
 * Polymorphic class table.
 *
 * Some engine classes are bases whose concrete kind is selected by an
 * integer discriminator attribute (a part's PARTTYPE, for instance).
 */

import { readFileSync } from "node:fs";
import { PreconditionError } from "./errors.ts";

export interface SubtypeEntry {
  /** Name of the discriminator attribute */
  readonly attribute: string;
  /** Discriminator value → concrete class name */
  readonly classes: ReadonlyMap<number, string>;
}

export type SubtypeTable = ReadonlyMap<string, SubtypeEntry>;

export interface SubtypeDefinition {
  attribute: string;
  classes: Record<string, string>;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Build a table from its JSON shape, validating every entry.
 */
export function createSubtypeTable(definitions: unknown): SubtypeTable {
  if (!isRecord(definitions)) {
    throw new PreconditionError("Subtype table must be an object");
  }

  const table = new Map<string, SubtypeEntry>();
  for (const [baseClass, definition] of Object.entries(definitions)) {
    if (
      !isRecord(definition) ||
      typeof definition.attribute !== "string" ||
      !isRecord(definition.classes)
    ) {
      throw new PreconditionError(`Invalid subtype entry for ${baseClass}`);
    }

    const classes = new Map<number, string>();
    for (const [key, className] of Object.entries(definition.classes)) {
      const value = Number(key);
      if (!Number.isInteger(value) || typeof className !== "string") {
        throw new PreconditionError(
          `Invalid subtype ${baseClass}[${key}]`
        );
      }
      classes.set(value, className);
    }

    table.set(baseClass, Object.freeze({ attribute: definition.attribute, classes }));
  }
  return table;
}

/**
 * Resolve the concrete class for a discriminator value, falling back to the
 * base class when the value is unknown or the class is not polymorphic.
 */
export function resolveSubtype(
  table: SubtypeTable,
  baseClass: string,
  value: unknown
): string {
  if (typeof value !== "number") {
    return baseClass;
  }
  return table.get(baseClass)?.classes.get(value) ?? baseClass;
}

/** Table shipped with the client. */
export const DEFAULT_SUBTYPES: SubtypeTable = createSubtypeTable(
  JSON.parse(readFileSync(new URL("./subtypes.json", import.meta.url), "utf8"))
);
