// backend/services/shared/src/dispatch/ControllerDispatcher.ts
/**
 * Purpose:
 * - Binds a controller action's ResultProducer<ResponseAction> to its HTTP
 *   exchange: subscribes, turns the terminal event into exactly one
 *   ResponseAction, and applies it.
 *
 * Flow:
 *   value    → apply(value)
 *   empty    → apply(onEmpty ?? defaultEmptyAction)      (404 by default)
 *   failure  → apply(registered handler ?? generic 500)  (unhandled: ERROR log)
 *   timeout  → DispatchTimeout through the failure path
 *   abort    → unsubscribe; late events are no-ops
 *
 * Invariants:
 * - Subscription is scheduled (subscribeOn), never run on the request
 *   handler's synchronous stack.
 * - At most one apply() per exchange. A ProtocolViolation, raised by apply()
 *   or surfaced by the producer (e.g. AlreadyConsumed), rejects the dispatch
 *   promise without applying anything and is logged at ERROR.
 */

import {
  asyncScheduler,
  subscribeOn,
  throwError,
  timeout,
  type SchedulerLike,
  type Subscription,
} from "rxjs";
import { DispatchTimeout, ProtocolViolation } from "../errors/dispatchErrors";
import type { ExchangeContext } from "../exchange/ExchangeContext";
import type { HttpExchange } from "../exchange/HttpExchange";
import type { IBoundLogger } from "../logger/Logger";
import type { ResultProducer } from "../reactive/ResultProducer";
import {
  ResponseActions,
  type ResponseAction,
} from "../response/ResponseAction";
import { ErrorHandlerRegistry } from "./ErrorHandlerRegistry";

export type DispatchOutcome =
  | "value"
  | "empty"
  | "failure"
  | "timeout"
  | "cancelled";

export type DispatchOptions = {
  /** Action applied when the producer completes empty. */
  onEmpty?: ResponseAction;
  /** Per-action timeout in ms; 0 disables. */
  timeoutMs?: number;
  /** Label for logs (e.g. "BookController.show"). */
  action?: string;
};

export type ControllerDispatcherOptions = {
  log: IBoundLogger;
  actions?: ResponseActions;
  errorHandlers?: ErrorHandlerRegistry;
  defaultEmptyAction?: ResponseAction;
  timeoutMs?: number;
  scheduler?: SchedulerLike;
};

export const DEFAULT_DISPATCH_TIMEOUT_MS = 30_000;

export class ControllerDispatcher {
  private readonly log: IBoundLogger;
  private readonly actions: ResponseActions;
  private readonly errorHandlers: ErrorHandlerRegistry;
  private readonly defaultEmptyAction: ResponseAction;
  private readonly timeoutMs: number;
  private readonly scheduler: SchedulerLike;

  constructor(opts: ControllerDispatcherOptions) {
    this.log = opts.log.bind({ component: "ControllerDispatcher" });
    this.actions = opts.actions ?? new ResponseActions();
    this.errorHandlers =
      opts.errorHandlers ?? ErrorHandlerRegistry.withDefaults();
    this.defaultEmptyAction =
      opts.defaultEmptyAction ?? this.actions.notFound();
    this.timeoutMs = opts.timeoutMs ?? DEFAULT_DISPATCH_TIMEOUT_MS;
    this.scheduler = opts.scheduler ?? asyncScheduler;

    if (!Number.isFinite(this.timeoutMs) || this.timeoutMs < 0) {
      throw new RangeError(`Invalid dispatch timeout: ${this.timeoutMs}`);
    }
  }

  public dispatch(
    exchange: HttpExchange,
    producer: ResultProducer<ResponseAction>,
    options: DispatchOptions = {}
  ): Promise<DispatchOutcome> {
    const ctx = exchange.context;
    const log = this.log.bind({
      requestId: ctx.requestId,
      action: options.action,
    });

    if (exchange.aborted) {
      log.info({ event: "dispatch_skipped_aborted" }, "Exchange aborted before dispatch");
      return Promise.resolve("cancelled");
    }

    const timeoutMs = options.timeoutMs ?? this.timeoutMs;

    return new Promise<DispatchOutcome>((resolve, reject) => {
      let settled = false;
      let subscription: Subscription | undefined;
      let unregisterAbort: () => void = () => {};

      const finish = (): void => {
        settled = true;
        unregisterAbort();
        subscription?.unsubscribe();
      };

      const failFast = (
        err: unknown,
        fields: Record<string, unknown>,
        msg: string
      ): void => {
        if (settled) return;
        finish();
        log.error({ ...fields, error: log.serializeError(err) }, msg);
        reject(err);
      };

      const deliver = (
        outcome: Exclude<DispatchOutcome, "cancelled">,
        resolveAction: () => ResponseAction
      ): void => {
        if (settled || exchange.aborted) {
          log.debug({ event: "late_event", outcome }, "Ignoring event after dispatch settled");
          return;
        }
        try {
          exchange.apply(resolveAction());
        } catch (err) {
          failFast(
            err,
            { event: "apply_failed", outcome },
            "ControllerDispatcher could not apply ResponseAction"
          );
          return;
        }
        finish();
        log.debug({ event: "dispatch_applied", outcome }, "ResponseAction applied");
        resolve(outcome);
      };

      unregisterAbort = exchange.onAbort(() => {
        if (settled) return;
        finish();
        log.info({ event: "dispatch_cancelled" }, "Client went away; unsubscribed");
        resolve("cancelled");
      });

      let source = producer.toObservable().pipe(subscribeOn(this.scheduler));
      if (timeoutMs > 0) {
        source = source.pipe(
          timeout({
            first: timeoutMs,
            with: () => throwError(() => new DispatchTimeout(timeoutMs)),
            scheduler: this.scheduler,
          })
        );
      }

      let produced = false;
      subscription = source.subscribe({
        next: (action) => {
          produced = true;
          deliver("value", () => action);
        },
        error: (error: unknown) => {
          if (error instanceof ProtocolViolation) {
            failFast(
              error,
              { event: "protocol_violation" },
              "Producer broke the dispatch protocol"
            );
            return;
          }
          deliver(error instanceof DispatchTimeout ? "timeout" : "failure", () =>
            this.failureAction(error, ctx, log)
          );
        },
        complete: () => {
          if (!produced) {
            deliver("empty", () => options.onEmpty ?? this.defaultEmptyAction);
          }
        },
      });
    });
  }

  private failureAction(
    error: unknown,
    ctx: ExchangeContext,
    log: IBoundLogger
  ): ResponseAction {
    let handled: ResponseAction | undefined;
    try {
      handled = this.errorHandlers.resolve(error, ctx, this.actions);
    } catch (handlerErr) {
      log.error(
        {
          event: "failure_handler_threw",
          error: log.serializeError(error),
          handlerError: log.serializeError(handlerErr),
        },
        "Failure handler threw; falling back to 500"
      );
      return this.internalError(ctx);
    }

    if (handled) {
      log.warn(
        { event: "failure_handled", error: log.serializeError(error) },
        "Producer failed; mapped by registered handler"
      );
      return handled;
    }

    log.error(
      { event: "failure_unhandled", error: log.serializeError(error) },
      "Producer failed with an unrecognized error"
    );
    return this.internalError(ctx);
  }

  private internalError(ctx: ExchangeContext): ResponseAction {
    return this.actions.problem(500, "Internal Server Error", {
      detail: "Unexpected failure while producing the response",
      code: "INTERNAL_ERROR",
      requestId: ctx.requestId,
    });
  }
}
