/**
 * Raised when a pipeline stage is invoked without the state it depends on.
 * This is an orchestration bug, not a problem in user source, so it is never
 * turned into a diagnostic.
 */
export class InvalidStateError extends Error {
  readonly precondition: string;
  readonly actual?: string;

  constructor(precondition: string, actual?: string) {
    super(
      actual
        ? `invalid pipeline state: ${precondition} (current state: ${actual})`
        : `invalid pipeline state: ${precondition}`
    );
    this.name = "InvalidStateError";
    this.precondition = precondition;
    this.actual = actual;
  }
}
