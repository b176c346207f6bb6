// backend/services/shared/src/exchange/ExpressExchange.ts
/**
 * Purpose:
 * - HttpExchange over an Express req/res pair.
 * - Snapshots the request into an ExchangeContext at open() time.
 * - Marks the exchange aborted when the connection closes before the
 *   response finished (client disconnect).
 */

import type { Request, Response } from "express";
import type { ResponseAction } from "../response/ResponseAction";
import type { ResponseApplier } from "../response/ResponseApplier";
import {
  snapshotExchange,
  type ExchangeContext,
  type ExchangeFormat,
} from "./ExchangeContext";
import { ExchangeBase } from "./HttpExchange";

export class ExpressExchange extends ExchangeBase {
  private constructor(
    context: ExchangeContext,
    private readonly res: Response,
    private readonly applier: ResponseApplier<Response>
  ) {
    super(context);
    res.on("close", () => {
      if (!res.writableFinished) this.markAborted();
    });
  }

  public static open(
    req: Request,
    res: Response,
    applier: ResponseApplier<Response>
  ): ExpressExchange {
    return new ExpressExchange(snapshotRequest(req, res), res, applier);
  }

  protected write(action: ResponseAction): void {
    this.applier.apply(this.res, action, this.context);
  }
}

export function snapshotRequest(req: Request, res: Response): ExchangeContext {
  return snapshotExchange({
    requestId: requestIdOf(req, res),
    method: req.method,
    path: req.baseUrl + req.path,
    params: { ...req.params },
    query: { ...req.query },
    body: req.body,
    format: negotiateFormat(req),
  });
}

/** Explicit ?format= wins; otherwise Accept negotiation (JSON on a tie). */
export function negotiateFormat(req: Request): ExchangeFormat {
  const explicit = req.query.format;
  if (explicit === "json" || explicit === "html") return explicit;
  return req.accepts(["json", "html"]) === "html" ? "html" : "json";
}

function requestIdOf(req: Request, res: Response): string {
  const fromLocals: unknown = res.locals.requestId;
  if (typeof fromLocals === "string" && fromLocals) return fromLocals;
  const hdr = req.get("x-request-id");
  return hdr && hdr.trim() ? hdr.trim() : "unknown";
}
