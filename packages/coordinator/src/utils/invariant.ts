/**
 * Internal consistency assertions.
 *
 * A failed invariant is a defect in the coordinator, never a runtime error
 * path: nothing catches InvariantViolation.
 */

export class InvariantViolation extends Error {
  constructor(message: string) {
    super(`Invariant violated: ${message}`);
    this.name = "InvariantViolation";
  }
}

export function invariant(condition: unknown, message: string): asserts condition {
  if (!condition) {
    throw new InvariantViolation(message);
  }
}
