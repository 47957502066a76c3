import { GameCommandInputError } from "../errors/GameCommandInputError.js";

const WHITESPACE_PATTERN = /\s/;

export function isValidIdentifier(id: unknown): id is string {
  return typeof id === "string" && id.length > 0 && !WHITESPACE_PATTERN.test(id);
}

/** Throws when any of the named fields is not a non-empty identifier without whitespace. */
export function requireIdentifiers(fields: Readonly<Record<string, unknown>>): void {
  const issues = Object.entries(fields)
    .filter(([, value]) => !isValidIdentifier(value))
    .map(([name]) => `${name} must be a non-empty string without whitespace`);

  if (issues.length > 0) {
    throw GameCommandInputError.because(issues);
  }
}
