// backend/services/shared/src/middleware/requestId.ts
/**
 * Purpose:
 * - Every inbound request carries one correlation id, minted once.
 *
 * Order:
 * - Mount before the http logger, so pino-http reuses the same id.
 *
 * Notes:
 * - Headers honored: `x-request-id`, `x-correlation-id`, `x-amzn-trace-id`.
 *   The id is echoed as `x-request-id` and kept in res.locals.requestId,
 *   which is where ExchangeContext snapshots read it from.
 */

import type { RequestHandler } from "express";
import { randomUUID } from "node:crypto";

const ID_HEADERS = ["x-request-id", "x-correlation-id", "x-amzn-trace-id"];

export function requestIdMiddleware(): RequestHandler {
  return (req, res, next) => {
    let id: string | undefined;
    for (const h of ID_HEADERS) {
      const v = req.get(h);
      if (v && v.trim()) {
        id = v.trim();
        break;
      }
    }
    const requestId = id ?? randomUUID();

    res.locals.requestId = requestId;
    res.setHeader("x-request-id", requestId);
    next();
  };
}
