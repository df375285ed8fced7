/**
 * Failure taxonomy shared by the dialogue engine, the category registry
 * and the record store. Handlers map each class to a reply; anything else
 * is treated as an unexpected failure.
 */

/** Bad user input. The dialogue stays on the same step. */
export class ValidationError extends Error {
  readonly name = "ValidationError";
}

/** A commit step ran without a matching live session. */
export class SessionExpiredError extends Error {
  readonly name = "SessionExpiredError";

  constructor(readonly flow: string) {
    super(`No active ${flow} session`);
  }
}

export class AlreadyExistsError extends Error {
  readonly name = "AlreadyExistsError";

  constructor(readonly value: string) {
    super(`"${value}" already exists`);
  }
}

/** The persistence layer failed. Session state is left untouched. */
export class StoreUnavailableError extends Error {
  readonly name = "StoreUnavailableError";

  constructor(readonly operation: string, options?: { cause?: unknown }) {
    super(`Store operation failed: ${operation}`, options);
  }
}
