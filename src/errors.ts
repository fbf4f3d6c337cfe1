/**
 * errors.ts - Error taxonomy for gcp-reconcile
 *
 * Every failure the CLI reports on purpose is a ReconcileError. The CLI entry
 * point prints the message and exits with `exitCode`; anything else that
 * escapes is treated as an unexpected crash (also exit 1).
 *
 * - ParseError: the operator's input could not be turned into an identity.
 *   Raised before any external call.
 * - StateFetchError: a read-only CLI call failed. An explicit "not found"
 *   answer is NOT an error - the state provider returns it as absence.
 * - ValidationError: the desired value breaks a rule (shrinking a disk,
 *   min > max, cloning onto an existing pool). Raised before a plan exists.
 * - ActionExecutionError: one action failed in execute mode. Carries how far
 *   the plan got so the operator can resume by hand.
 */

export class ReconcileError extends Error {
  readonly exitCode: number = 1;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class ParseError extends ReconcileError {}

/**
 * The locator produced an identity with one or more empty fields.
 */
export class MissingIdentityFieldError extends ParseError {
  constructor(readonly missing: readonly string[], detail?: string) {
    super(
      `Missing required identity field(s): ${missing.join(", ")}` +
        (detail ? `. ${detail}` : "")
    );
  }
}

export class StateFetchError extends ReconcileError {
  constructor(
    message: string,
    /** CLI output that accompanied the failure, if any */
    readonly output?: string
  ) {
    super(output ? `${message}: ${output.trim()}` : message);
  }
}

export class ValidationError extends ReconcileError {}

/**
 * A grow-only field (disk size) was asked to stay the same, shrink, or take
 * a non-numeric value.
 */
export class InvalidResizeError extends ValidationError {
  constructor(
    readonly field: string,
    readonly current: string | number | undefined,
    readonly desired: string | number
  ) {
    super(
      typeof desired === "number" || /^\d+$/.test(desired)
        ? `Invalid resize of ${field}: new value ${desired} must be larger than current value ${current ?? "(unknown)"}`
        : `Invalid resize of ${field}: "${desired}" is not a whole number`
    );
  }
}

export class ActionExecutionError extends ReconcileError {
  constructor(
    /** Description of the action that failed */
    readonly action: string,
    /** Error output of the failed command */
    readonly output: string,
    /** Number of actions that completed before the failure */
    readonly succeeded: number,
    /** Number of actions left un-attempted after the failure */
    readonly notAttempted: number
  ) {
    super(
      `Action failed: ${action} (${succeeded} succeeded before it, ${notAttempted} not attempted)\n${output.trim()}`
    );
  }
}
