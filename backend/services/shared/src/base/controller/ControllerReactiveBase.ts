// backend/services/shared/src/base/controller/ControllerReactiveBase.ts
/**
 * Purpose:
 * - Express controller base for actions that return ResultProducers.
 * - handle() adapts an action into an Express RequestHandler:
 *     snapshot ctx → open exchange → action(ctx, rx) → dispatcher.dispatch()
 *
 * Invariants:
 * - Actions see only the ExchangeContext snapshot and the ResponseActions
 *   helper; the live req/res stays inside the exchange.
 * - A synchronous throw while building the producer is a failed producer,
 *   not an Express error.
 * - Dependencies arrive through the constructor; nothing is mixed in.
 */

import type { NextFunction, Request, RequestHandler, Response } from "express";
import type {
  ControllerDispatcher,
  DispatchOptions,
} from "../../dispatch/ControllerDispatcher";
import type { ExchangeContext } from "../../exchange/ExchangeContext";
import { ExpressExchange } from "../../exchange/ExpressExchange";
import type { IBoundLogger } from "../../logger/Logger";
import { CombinationHelper } from "../../reactive/combine";
import { ResultProducer } from "../../reactive/ResultProducer";
import type {
  ResponseAction,
  ResponseActions,
} from "../../response/ResponseAction";
import type { ResponseApplier } from "../../response/ResponseApplier";
import type { ControllerAction } from "./controllerTypes";

export type ControllerDeps = {
  dispatcher: ControllerDispatcher;
  applier: ResponseApplier<Response>;
  actions: ResponseActions;
  log: IBoundLogger;
};

export abstract class ControllerReactiveBase {
  protected readonly log: IBoundLogger;
  protected readonly rx: ResponseActions;
  protected readonly combine: CombinationHelper;

  constructor(private readonly deps: ControllerDeps) {
    this.log = deps.log.bind({ component: this.constructor.name });
    this.rx = deps.actions;
    this.combine = new CombinationHelper(deps.actions);
  }

  /** Express handler for one action. */
  public handle(
    actionName: string,
    action: ControllerAction,
    options: DispatchOptions = {}
  ): RequestHandler {
    const label = `${this.constructor.name}.${actionName}`;

    return (req: Request, res: Response, next: NextFunction): void => {
      const exchange = ExpressExchange.open(req, res, this.deps.applier);
      const producer = this.invoke(label, action, exchange.context);

      this.deps.dispatcher
        .dispatch(exchange, producer, { ...options, action: label })
        .then((outcome) => {
          this.log.debug(
            {
              event: "action_dispatched",
              action: label,
              requestId: exchange.context.requestId,
              outcome,
            },
            "Controller action settled"
          );
        })
        .catch(next);
    };
  }

  private invoke(
    label: string,
    action: ControllerAction,
    ctx: ExchangeContext
  ): ResultProducer<ResponseAction> {
    try {
      return action(ctx, this.rx);
    } catch (err) {
      this.log.warn(
        {
          event: "action_threw",
          action: label,
          requestId: ctx.requestId,
          error: this.log.serializeError(err),
        },
        "Controller action threw before returning a producer"
      );
      return ResultProducer.fail(err);
    }
  }
}
