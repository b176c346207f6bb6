// backend/services/shared/src/health.ts
/**
 * Purpose:
 * - Predictable liveness/readiness endpoints for every service.
 *
 * Exposes:
 *   GET /health         -> liveness
 *   GET /health/live    -> liveness
 *   GET /health/ready   -> readiness (503 when the hook throws)
 *
 * Notes:
 * - Liveness never calls out. Readiness runs the optional hook only.
 */

import express, { type Request, type Response, type Router } from "express";

export type ReadinessDetails = Record<string, unknown>;
export type ReadinessFn = () => Promise<ReadinessDetails> | ReadinessDetails;

type Options = {
  service: string;
  env?: string;
  version?: string;
  readiness?: ReadinessFn;
};

export function createHealthRouter(opts: Options): Router {
  const router = express.Router();

  const base = {
    service: opts.service,
    env: opts.env,
    version: opts.version,
  };

  const requestIdOf = (res: Response): unknown => res.locals.requestId;

  const liveness = (_req: Request, res: Response) => {
    res.json({ ...base, ok: true, requestId: requestIdOf(res) });
  };

  const readiness = async (_req: Request, res: Response) => {
    try {
      const details = opts.readiness ? await opts.readiness() : {};
      res.json({ ...base, ok: true, requestId: requestIdOf(res), ...details });
    } catch (err) {
      res.status(503).json({
        ...base,
        ok: false,
        requestId: requestIdOf(res),
        error: err instanceof Error ? err.message : String(err),
      });
    }
  };

  router.get("/health", liveness);
  router.get("/health/live", liveness);
  router.get("/health/ready", (req, res, next) => {
    readiness(req, res).catch(next);
  });

  return router;
}
