// backend/services/shared/src/middleware/problemJson.ts
/**
 * Purpose:
 * - Tail middleware for requests that never reach a dispatcher: unknown
 *   routes and thrown/next(err) errors (body-parser failures, protocol
 *   violations). Both answer RFC 7807 Problem+JSON.
 *
 * Notes:
 * - 404s only become Problem+JSON under known prefixes; everything else gets
 *   a bare 404.
 * - If a response is already on the wire, the error is logged and the
 *   connection is left to Express.
 */

import type { ErrorRequestHandler, RequestHandler } from "express";
import type { ProblemJson } from "../base/controller/controllerTypes";
import type { IBoundLogger } from "../logger/Logger";
import { PROBLEM_JSON } from "../response/ResponseAction";

function requestIdOf(locals: Record<string, unknown>): string | undefined {
  const id = locals.requestId;
  return typeof id === "string" ? id : undefined;
}

export function notFoundProblemJson(validPrefixes: string[]): RequestHandler {
  return (req, res) => {
    if (validPrefixes.some((p) => req.path.startsWith(p))) {
      const body: ProblemJson = {
        type: "about:blank",
        title: "Not Found",
        status: 404,
        detail: "Route not found",
        requestId: requestIdOf(res.locals),
      };
      res.status(404).type(PROBLEM_JSON).json(body);
      return;
    }
    res.status(404).end();
  };
}

export function errorProblemJson(log: IBoundLogger): ErrorRequestHandler {
  const elog = log.bind({ component: "errorProblemJson" });

  return (err: unknown, req, res, next) => {
    const requestId = requestIdOf(res.locals);
    const status = statusOf(err);

    if (status >= 500) {
      elog.error(
        {
          event: "request_error",
          requestId,
          status,
          path: req.originalUrl,
          error: elog.serializeError(err),
        },
        "Unhandled request error"
      );
    } else {
      elog.warn(
        { event: "request_client_error", requestId, status, path: req.originalUrl },
        "Request rejected"
      );
    }

    if (res.headersSent) {
      next(err);
      return;
    }

    const body: ProblemJson = {
      type: "about:blank",
      title: status >= 500 ? "Internal Server Error" : "Bad Request",
      status,
      detail: status >= 500 ? "Unexpected error" : messageOf(err),
      requestId,
    };
    res.status(status).type(PROBLEM_JSON).json(body);
  };
}

/** Honors 4xx statuses set by Express/body-parser; everything else is 500. */
function statusOf(err: unknown): number {
  if (err && typeof err === "object") {
    const s =
      "status" in err && typeof err.status === "number"
        ? err.status
        : "statusCode" in err && typeof err.statusCode === "number"
          ? err.statusCode
          : undefined;
    if (s !== undefined && s >= 400 && s < 600) return s;
  }
  return 500;
}

function messageOf(err: unknown): string {
  return err instanceof Error && err.message ? err.message : "Request error";
}
