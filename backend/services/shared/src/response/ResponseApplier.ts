// backend/services/shared/src/response/ResponseApplier.ts

import type { ExchangeContext } from "../exchange/ExchangeContext";
import type { ResponseAction } from "./ResponseAction";

/**
 * Performs the actual HTTP write for a ResponseAction.
 * The dispatch core never writes bytes itself.
 */
export interface ResponseApplier<TTarget> {
  apply(target: TTarget, action: ResponseAction, ctx: ExchangeContext): void;
}
