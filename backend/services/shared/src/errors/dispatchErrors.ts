// backend/services/shared/src/errors/dispatchErrors.ts
/**
 * Purpose:
 * - Error taxonomy for the reactive dispatch rails.
 *
 *   DispatchError
 *   ├─ UpstreamFailure        (data collaborator failed; carries cause)
 *   │   └─ ValidationFailure  (structured field errors; recoverable)
 *   ├─ EmptyResult            (no value where one was required)
 *   ├─ DispatchTimeout        (producer did not terminate in time)
 *   └─ ProtocolViolation      (dispatcher invariant broken; a programming defect)
 *       └─ AlreadyConsumed    (one-shot producer subscribed twice)
 *
 * Notes:
 * - ProtocolViolation must never be recovered by controller code.
 */

import type { ZodError } from "zod";

export type FieldIssue = {
  path: string;
  code: string;
  message: string;
};

/** Structured validation errors; same shape as Problem+JSON `issues`. */
export type FieldErrorSet = {
  entity?: string;
  issues: ReadonlyArray<FieldIssue>;
};

export abstract class DispatchError extends Error {
  public abstract readonly code: string;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class UpstreamFailure extends DispatchError {
  public readonly code: string = "UPSTREAM_FAILURE";

  constructor(message: string, cause?: unknown) {
    super(message, { cause });
  }
}

export class ValidationFailure extends UpstreamFailure {
  public override readonly code = "VALIDATION_FAILED";
  public readonly errors: FieldErrorSet;

  constructor(errors: FieldErrorSet, message?: string) {
    super(
      message ??
        `Validation failed${errors.entity ? ` for ${errors.entity}` : ""} (${
          errors.issues.length
        } issue${errors.issues.length === 1 ? "" : "s"})`
    );
    this.errors = Object.freeze({
      ...errors,
      issues: Object.freeze(errors.issues.map((i) => Object.freeze({ ...i }))),
    });
  }

  public static fromZod(error: ZodError, entity?: string): ValidationFailure {
    return new ValidationFailure({
      entity,
      issues: error.issues.map((i) => ({
        path: i.path.join("."),
        code: i.code,
        message: i.message,
      })),
    });
  }
}

export class EmptyResult extends DispatchError {
  public readonly code = "EMPTY_RESULT";

  constructor(message = "No value was produced") {
    super(message);
  }
}

export class DispatchTimeout extends DispatchError {
  public readonly code = "DISPATCH_TIMEOUT";

  constructor(public readonly timeoutMs: number) {
    super(`Producer did not terminate within ${timeoutMs}ms`);
  }
}

export class ProtocolViolation extends DispatchError {
  public readonly code: string = "PROTOCOL_VIOLATION";
}

export class AlreadyConsumed extends ProtocolViolation {
  public override readonly code = "ALREADY_CONSUMED";

  constructor() {
    super("One-shot ResultProducer was already subscribed");
  }
}
