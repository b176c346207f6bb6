// backend/services/book/src/app.ts
/**
 * Purpose:
 * - Wires the book service: repo → controller → routes, on the shared
 *   service stack.
 */

import type { Express } from "express";
import type { SchedulerLike } from "rxjs";
import { createServiceApp } from "@rxdispatch/shared/app/createServiceApp";
import { ControllerDispatcher } from "@rxdispatch/shared/dispatch/ControllerDispatcher";
import type { ErrorHandlerRegistry } from "@rxdispatch/shared/dispatch/ErrorHandlerRegistry";
import type { ServiceConfig } from "@rxdispatch/shared/env/serviceConfig";
import { getLogger, type IBoundLogger } from "@rxdispatch/shared/logger/Logger";
import { ExpressResponseApplier } from "@rxdispatch/shared/response/ExpressResponseApplier";
import { ResponseActions } from "@rxdispatch/shared/response/ResponseAction";
import { ViewRegistry } from "@rxdispatch/shared/response/ViewRegistry";
import { BookController } from "./controllers/BookController";
import type { BookRepo } from "./repo/BookRepo";
import { InMemoryBookRepo } from "./repo/InMemoryBookRepo";
import { mountBookRoutes } from "./routes/bookRoutes";
import { booksPath, registerBookViews } from "./views/bookViews";

export type BookAppOptions = {
  config: ServiceConfig;
  log?: IBoundLogger;
  repo?: BookRepo;
  errorHandlers?: ErrorHandlerRegistry;
  scheduler?: SchedulerLike;
};

export function createBookApp(opts: BookAppOptions): Express {
  const { config } = opts;
  const log = opts.log ?? getLogger({ service: config.serviceName });
  const repo = opts.repo ?? new InMemoryBookRepo();

  const actions = new ResponseActions();
  const dispatcher = new ControllerDispatcher({
    log,
    actions,
    errorHandlers: opts.errorHandlers,
    timeoutMs: config.dispatchTimeoutMs,
    scheduler: opts.scheduler,
  });
  const applier = new ExpressResponseApplier(
    registerBookViews(new ViewRegistry(), {
      basePath: booksPath(config.apiPrefix),
    }),
    log
  );
  const controller = new BookController(
    { dispatcher, applier, actions, log },
    repo
  );

  return createServiceApp({
    serviceName: config.serviceName,
    apiPrefix: config.apiPrefix,
    env: config.nodeEnv,
    log,
    mountRoutes: (router) => mountBookRoutes(router, controller),
    readiness: async () => {
      const counted = await repo.count().toPromise();
      return { books: counted.kind === "value" ? counted.value : 0 };
    },
  });
}
