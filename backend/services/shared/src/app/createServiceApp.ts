// backend/services/shared/src/app/createServiceApp.ts
/**
 * Purpose:
 * - Assembles the standard service stack:
 *   requestId → http logger → health → json/urlencoded parsers →
 *   routes (under apiPrefix) → 404 → error formatter.
 *
 * Notes:
 * - Routes are mounted by the service; controllers own their dispatch.
 * - The error formatter only sees failures that never reached a dispatcher
 *   (parsers, unknown routes, protocol violations).
 */

import express, { type Express, type Router } from "express";
import { createHealthRouter, type ReadinessFn } from "../health";
import type { IBoundLogger } from "../logger/Logger";
import { makeHttpLogger } from "../middleware/httpLogger";
import {
  errorProblemJson,
  notFoundProblemJson,
} from "../middleware/problemJson";
import { requestIdMiddleware } from "../middleware/requestId";

export type CreateServiceAppOptions = {
  /** Service slug (e.g., "book"). Used in logs. */
  serviceName: string;
  /** API base path (e.g., "/api"). */
  apiPrefix: string;
  /** Mounts the service's routes onto the API router. */
  mountRoutes: (router: Router) => void;
  log: IBoundLogger;
  env?: string;
  readiness?: ReadinessFn;
};

export function createServiceApp(opts: CreateServiceAppOptions): Express {
  const { serviceName, apiPrefix, mountRoutes, log, env, readiness } = opts;

  const app = express();
  app.disable("x-powered-by");

  // ── Transport & Telemetry ───────────────────────────────────────────────────
  app.use(requestIdMiddleware());
  app.use(makeHttpLogger(serviceName));

  // ── Health (public) ─────────────────────────────────────────────────────────
  app.use(createHealthRouter({ service: serviceName, env, readiness }));

  // ── Body parsers ────────────────────────────────────────────────────────────
  app.use(express.json({ limit: "1mb" }));
  app.use(express.urlencoded({ extended: false }));

  // ── Routes ──────────────────────────────────────────────────────────────────
  const api = express.Router();
  mountRoutes(api);
  app.use(apiPrefix, api);

  // ── Tails: 404 + error formatter ────────────────────────────────────────────
  app.use(notFoundProblemJson([apiPrefix, "/health"]));
  app.use(errorProblemJson(log));

  return app;
}
