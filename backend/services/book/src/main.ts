// backend/services/book/src/main.ts
/**
 * Purpose:
 * - Book service entrypoint: env cascade → config → logger → listen.
 *
 * Env files (service root), later wins:
 *   .env, .env.<NODE_ENV>
 */

import path from "node:path";
import { fileURLToPath } from "node:url";
import {
  ConfigError,
  loadEnvFiles,
  loadServiceConfig,
} from "@rxdispatch/shared/env/serviceConfig";
import { initLogger } from "@rxdispatch/shared/logger/Logger";
import { createBookApp } from "./app";
import { InMemoryBookRepo } from "./repo/InMemoryBookRepo";

const SERVICE_ROOT = path.resolve(
  path.dirname(fileURLToPath(import.meta.url)),
  ".."
);

function boot(): void {
  const nodeEnv = process.env.NODE_ENV ?? "development";
  const loaded = loadEnvFiles([
    path.join(SERVICE_ROOT, ".env"),
    path.join(SERVICE_ROOT, `.env.${nodeEnv}`),
  ]);

  const config = loadServiceConfig();
  const log = initLogger({ service: config.serviceName, level: config.logLevel });
  log.info({ event: "env_loaded", files: loaded }, "Environment loaded");

  const app = createBookApp({ config, log, repo: InMemoryBookRepo.seeded() });
  const server = app.listen(config.port, () => {
    log.info(
      { event: "listening", port: config.port, apiPrefix: config.apiPrefix },
      `${config.serviceName} listening`
    );
  });

  const shutdown = (signal: string) => {
    log.info({ event: "shutdown", signal }, "Shutting down");
    server.close((err) => {
      if (err) {
        log.error({ event: "shutdown_failed", error: log.serializeError(err) }, "Close failed");
        process.exit(1);
      }
      process.exit(0);
    });
  };
  process.once("SIGTERM", () => shutdown("SIGTERM"));
  process.once("SIGINT", () => shutdown("SIGINT"));
}

try {
  boot();
} catch (err) {
  // Logger may not be initialised yet.
  const message = err instanceof ConfigError ? err.message : String(err);
  process.stderr.write(`book: failed to start\n${message}\n`);
  process.exit(1);
}
