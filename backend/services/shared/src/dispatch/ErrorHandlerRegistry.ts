// backend/services/shared/src/dispatch/ErrorHandlerRegistry.ts
/**
 * Purpose:
 * - Maps failure categories (error classes) to ResponseActions.
 *
 * Lookup:
 * - Walks the error's prototype chain; the most specific registered class
 *   wins (ValidationFailure before UpstreamFailure before Error).
 * - Non-Error failures never match; the dispatcher treats them as unhandled.
 */

import type { ExchangeContext } from "../exchange/ExchangeContext";
import {
  DispatchTimeout,
  EmptyResult,
  ValidationFailure,
} from "../errors/dispatchErrors";
import type { ErrorClass } from "../reactive/ResultProducer";
import type {
  ResponseAction,
  ResponseActions,
} from "../response/ResponseAction";

export type FailureHandler<E extends Error> = (
  error: E,
  ctx: ExchangeContext,
  actions: ResponseActions
) => ResponseAction;

type BoundHandler = (
  error: Error,
  ctx: ExchangeContext,
  actions: ResponseActions
) => ResponseAction | undefined;

export class ErrorHandlerRegistry {
  #byPrototype = new Map<object, BoundHandler>();

  /** Registry preloaded with the standard failure categories. */
  public static withDefaults(): ErrorHandlerRegistry {
    return new ErrorHandlerRegistry()
      .register(ValidationFailure, (err, _ctx, rx) => rx.respondErrors(err.errors))
      .register(EmptyResult, (_err, _ctx, rx) => rx.notFound())
      .register(DispatchTimeout, (err, ctx, rx) =>
        rx.problem(503, "Service Unavailable", {
          detail: err.message,
          code: err.code,
          requestId: ctx.requestId,
        })
      );
  }

  /** Registering the same class again replaces its handler. */
  public register<E extends Error>(
    type: ErrorClass<E>,
    handler: FailureHandler<E>
  ): this {
    this.#byPrototype.set(type.prototype, (error, ctx, actions) =>
      error instanceof type ? handler(error, ctx, actions) : undefined
    );
    return this;
  }

  public has(type: ErrorClass): boolean {
    return this.#byPrototype.has(type.prototype);
  }

  /** @returns the action for `error`, or undefined when no category matches. */
  public resolve(
    error: unknown,
    ctx: ExchangeContext,
    actions: ResponseActions
  ): ResponseAction | undefined {
    if (!(error instanceof Error)) return undefined;

    let proto: object | null = Object.getPrototypeOf(error);
    while (proto !== null) {
      const handler = this.#byPrototype.get(proto);
      if (handler) return handler(error, ctx, actions);
      proto = Object.getPrototypeOf(proto);
    }
    return undefined;
  }
}
