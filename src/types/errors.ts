/**
 * A label-definitions or metadata document that does not parse or lacks the
 * fields the organizer needs. Fatal for the label dictionary; scoped to one
 * email for a metadata document.
 */
export class MalformedInputError extends Error {
  /** File path or document label the problem was found in. */
  readonly source: string;

  constructor(source: string, message: string) {
    super(`${source}: ${message}`);
    this.name = "MalformedInputError";
    this.source = source;
  }
}

/** Run-level failure: the organizer cannot start or continue at all. */
export class OrganizeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "OrganizeError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
