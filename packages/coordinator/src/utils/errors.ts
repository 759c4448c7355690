/**
 * Error taxonomy for the coordinator plus message extraction helpers.
 *
 * Every rejection the coordinator raises on purpose is a CoordinatorError with
 * a stable `code`. Unknown ids in remove/status/selection calls are not errors
 * and never reach this module.
 */

export type CoordinatorErrorCode =
  | "DUPLICATE_IDENTIFIER"
  | "ACTION_NOT_PERMITTED"
  | "UNKNOWN_OWNER";

export class CoordinatorError extends Error {
  constructor(message: string, public readonly code: CoordinatorErrorCode) {
    super(message);
    this.name = "CoordinatorError";
  }
}

/** `add` of a server (or image) whose id is already known. */
export class DuplicateIdentifierError extends CoordinatorError {
  constructor(public readonly identifier: string, kind: "server" | "image" = "server") {
    super(`Duplicate ${kind} identifier "${identifier}"`, "DUPLICATE_IDENTIFIER");
    this.name = "DuplicateIdentifierError";
  }
}

/** `invoke` of an action that is currently disabled. */
export class ActionNotPermittedError extends CoordinatorError {
  constructor(public readonly action: string, public readonly reason: string) {
    super(`Action "${action}" is not permitted: ${reason}`, "ACTION_NOT_PERMITTED");
    this.name = "ActionNotPermittedError";
  }
}

/** Strict mode only: an image whose owner is not in the fleet. */
export class UnknownOwnerError extends CoordinatorError {
  constructor(public readonly imageId: string, public readonly ownerId: string) {
    super(`Image "${imageId}" refers to unknown server "${ownerId}"`, "UNKNOWN_OWNER");
    this.name = "UnknownOwnerError";
  }
}

/** Malformed address, range or list, or an address outside the configured network. */
export class AddressSyntaxError extends Error {
  constructor(message: string, public readonly input: string) {
    super(message);
    this.name = "AddressSyntaxError";
  }
}

/**
 * Check whether an unknown value is one of the coordinator's own rejections.
 */
export function isCoordinatorError(error: unknown): error is CoordinatorError {
  return error instanceof CoordinatorError;
}

/**
 * Extract a human-readable error message from an unknown error.
 * Handles Error objects, strings, and other thrown values.
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === "string") {
    return error;
  }
  return String(error);
}
