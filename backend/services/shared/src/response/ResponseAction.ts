// backend/services/shared/src/response/ResponseAction.ts
/**
 * Purpose:
 * - Immutable descriptions of the effect to apply to an HTTP exchange.
 *   Controllers build them; the dispatcher applies exactly one per request;
 *   a ResponseApplier performs the actual write.
 *
 * Invariants:
 * - Every action is frozen on construction. Models, payloads and error sets
 *   are copied first; the caller's objects are never frozen.
 * - No I/O here.
 */

import type { FieldErrorSet } from "../errors/dispatchErrors";
import type { ProblemJson } from "../base/controller/controllerTypes";

export type ViewModel = Readonly<Record<string, unknown>>;

export type RenderAction = {
  readonly kind: "render";
  readonly view: string;
  readonly model: ViewModel;
  readonly status: number;
};

export type RespondAction = {
  readonly kind: "respond";
  readonly payload: unknown;
  readonly status: number;
  readonly contentType?: string;
  readonly headers?: Readonly<Record<string, string>>;
};

export type RespondErrorsAction = {
  readonly kind: "respondErrors";
  readonly errors: FieldErrorSet;
  /** HTML view re-rendered with the errors; JSON clients get Problem+JSON. */
  readonly view?: string;
  readonly model: ViewModel;
  readonly status: number;
};

export type ResponseAction = RenderAction | RespondAction | RespondErrorsAction;

export const PROBLEM_JSON = "application/problem+json";

/**
 * Response helper handed to controller actions.
 * Constructible and injectable; nothing here is global.
 */
export class ResponseActions {
  public render(view: string, model: ViewModel = {}, status = 200): RenderAction {
    assertStatus(status);
    return Object.freeze({
      kind: "render",
      view,
      model: Object.freeze({ ...model }),
      status,
    });
  }

  public respond(
    payload: unknown,
    status = 200,
    opts: { contentType?: string; headers?: Record<string, string> } = {}
  ): RespondAction {
    assertStatus(status);
    return Object.freeze({
      kind: "respond",
      payload: frozenCopy(payload),
      status,
      contentType: opts.contentType,
      headers: opts.headers ? Object.freeze({ ...opts.headers }) : undefined,
    });
  }

  public respondErrors(
    errors: FieldErrorSet,
    view?: string,
    model: ViewModel = {},
    status = 422
  ): RespondErrorsAction {
    assertStatus(status);
    return Object.freeze({
      kind: "respondErrors",
      errors: Object.freeze({
        ...errors,
        issues: Object.freeze(errors.issues.map((i) => Object.freeze({ ...i }))),
      }),
      view,
      model: Object.freeze({ ...model }),
      status,
    });
  }

  public notFound(): RespondAction {
    return this.respond(null, 404);
  }

  public noContent(): RespondAction {
    return this.respond(null, 204);
  }

  public problem(
    status: number,
    title: string,
    opts: { detail?: string; code?: string; requestId?: string } = {}
  ): RespondAction {
    const body: ProblemJson = { type: "about:blank", title, status };
    if (opts.detail) body.detail = opts.detail;
    if (opts.code) body.code = opts.code;
    if (opts.requestId) body.requestId = opts.requestId;
    return this.respond(body, status, { contentType: PROBLEM_JSON });
  }
}

function assertStatus(status: number): void {
  if (!Number.isInteger(status) || status < 100 || status > 599) {
    throw new RangeError(`Invalid HTTP status: ${status}`);
  }
}

/** Plain objects and arrays are copied before freezing; anything else passes as is. */
function frozenCopy(value: unknown): unknown {
  if (Array.isArray(value)) return Object.freeze([...value]);
  if (isPlainObject(value)) return Object.freeze({ ...value });
  return value;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (value === null || typeof value !== "object") return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}
