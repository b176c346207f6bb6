// backend/services/shared/src/base/controller/controllerTypes.ts
/**
 * Purpose:
 * - Common controller-related types shared by the dispatch rails.
 */

import type { ExchangeContext } from "../../exchange/ExchangeContext";
import type { ResultProducer } from "../../reactive/ResultProducer";
import type {
  ResponseAction,
  ResponseActions,
} from "../../response/ResponseAction";

/** Problem+JSON envelope used by error responses. */
export type ProblemJson = {
  type: string;
  title: string;
  detail?: string;
  status?: number;
  code?: string;
  issues?: Array<{ path: string; code: string; message: string }>;
  requestId?: string;
};

/**
 * A controller action.
 * Receives the request snapshot and the response helper; never the live
 * Express req/res.
 */
export type ControllerAction = (
  ctx: ExchangeContext,
  rx: ResponseActions
) => ResultProducer<ResponseAction>;
