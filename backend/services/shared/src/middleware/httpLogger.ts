// backend/services/shared/src/middleware/httpLogger.ts
/**
 * Purpose:
 * - Structured access logs via pino-http, one line per request.
 *
 * Notes:
 * - Severity by outcome: 2xx/3xx=info, 4xx=warn, 5xx/error=error.
 * - Reuses the id minted by requestIdMiddleware (echoed header); only mints
 *   when mounted without it.
 * - Health probes are not logged.
 */

import { randomUUID } from "node:crypto";
import type { IncomingMessage, ServerResponse } from "node:http";
import type { RequestHandler } from "express";
import pinoHttp from "pino-http";
import { getRootPino } from "../logger/Logger";

const QUIET_PATHS = new Set(["/health", "/health/live", "/health/ready", "/favicon.ico"]);

export function makeHttpLogger(serviceName: string): RequestHandler {
  return pinoHttp({
    logger: getRootPino().child({ service: serviceName, component: "http" }),

    genReqId: (_req: IncomingMessage, res: ServerResponse) => {
      const existing = res.getHeader("x-request-id");
      if (typeof existing === "string" && existing) return existing;
      const id = randomUUID();
      res.setHeader("x-request-id", id);
      return id;
    },

    customLogLevel: (_req: IncomingMessage, res: ServerResponse, err?: Error) => {
      if (err || res.statusCode >= 500) return "error";
      if (res.statusCode >= 400) return "warn";
      return "info";
    },

    autoLogging: {
      ignore: (req: IncomingMessage) => QUIET_PATHS.has(req.url ?? ""),
    },

    serializers: {
      req(req: { id?: unknown; method?: string; url?: string }) {
        return { id: req.id, method: req.method, url: req.url };
      },
      res(res: { statusCode?: number }) {
        return { statusCode: res.statusCode };
      },
      err(err: Error) {
        return { type: err.name, msg: err.message };
      },
    },
  });
}
