// backend/services/shared/src/logger/Logger.ts
/**
 * Purpose:
 * - Single shared logging API for all services with contextual .bind().
 * - Overloaded methods allow:
 *     log.info("msg")            OR  log.info({ctx}, "msg")
 *     log.info("msg", {meta})    OR  log.info({meta}, "msg")
 * - Backed by one pino root per process; bound loggers are pino children.
 *
 * Runtime Controls:
 * - Level and service name come from initLogger() (fed by ServiceConfig).
 *   No process.env reads here.
 *
 * Notes:
 * - Bound loggers resolve the root lazily, so handles created before
 *   initLogger() pick up the service root once it exists.
 */

import pino, {
  type DestinationStream,
  type LevelWithSilent,
  type Logger as PinoLogger,
  type LoggerOptions,
} from "pino";

type Json = Record<string, unknown>;

export type LogLevel = LevelWithSilent;

export const LOG_LEVELS: readonly LogLevel[] = [
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
  "silent",
];

/** Public interface for bound logger handles (no private members). */
export interface IBoundLogger {
  bind(ctx: Json): IBoundLogger;

  debug(msg: string, meta?: Json): void;
  debug(obj: Json, msg?: string): void;

  info(msg: string, meta?: Json): void;
  info(obj: Json, msg?: string): void;

  warn(msg: string, meta?: Json): void;
  warn(obj: Json, msg?: string): void;

  error(msg: string, meta?: Json): void;
  error(obj: Json, msg?: string): void;

  serializeError(err: unknown): {
    name?: string;
    message: string;
    code?: string;
    stack?: string;
  };
}

// ────────────────────────────────────────────────────────────────────────────
// Root logger
// ────────────────────────────────────────────────────────────────────────────

const baseOptions: LoggerOptions = {
  level: "info",
  base: {},
  timestamp: pino.stdTimeFunctions.isoTime,
  redact: {
    remove: true,
    paths: ["req.headers.authorization", "req.headers.cookie"],
  },
};

let ROOT: PinoLogger = pino(baseOptions);

/** Call once at bootstrap, after ServiceConfig is resolved. */
export function initLogger(opts: {
  service: string;
  level: LogLevel;
  destination?: DestinationStream;
}): IBoundLogger {
  const service = opts.service.trim();
  if (!service) throw new Error("initLogger requires a service name");
  if (!LOG_LEVELS.includes(opts.level)) {
    throw new Error(`Invalid log level: "${opts.level}"`);
  }

  const options: LoggerOptions = {
    ...baseOptions,
    level: opts.level,
    base: { service },
  };
  ROOT = opts.destination ? pino(options, opts.destination) : pino(options);
  return getLogger();
}

/** Raw pino root, for integrations that need the pino API (pino-http). */
export function getRootPino(): PinoLogger {
  return ROOT;
}

export function setLogLevel(level: LogLevel): void {
  if (!LOG_LEVELS.includes(level)) {
    throw new Error(`Invalid log level: "${level}"`);
  }
  ROOT.level = level;
}

export function getLogger(initialCtx: Json = {}): IBoundLogger {
  return new BoundLogger(initialCtx);
}

// ────────────────────────────────────────────────────────────────────────────
// Bound logger
// ────────────────────────────────────────────────────────────────────────────

class BoundLogger implements IBoundLogger {
  #root: PinoLogger | undefined;
  #child: PinoLogger | undefined;

  constructor(private readonly ctx: Json) {}

  public bind(ctx: Json): IBoundLogger {
    return new BoundLogger({ ...this.ctx, ...ctx });
  }

  public debug(arg1: string | Json, arg2?: string | Json): void {
    const [obj, msg] = normalize(arg1, arg2);
    this.pino().debug(obj, msg);
  }

  public info(arg1: string | Json, arg2?: string | Json): void {
    const [obj, msg] = normalize(arg1, arg2);
    this.pino().info(obj, msg);
  }

  public warn(arg1: string | Json, arg2?: string | Json): void {
    const [obj, msg] = normalize(arg1, arg2);
    this.pino().warn(obj, msg);
  }

  public error(arg1: string | Json, arg2?: string | Json): void {
    const [obj, msg] = normalize(arg1, arg2);
    this.pino().error(obj, msg);
  }

  public serializeError(err: unknown) {
    return serializeError(err);
  }

  private pino(): PinoLogger {
    if (this.#root !== ROOT || !this.#child) {
      this.#root = ROOT;
      this.#child = ROOT.child(this.ctx);
    }
    return this.#child;
  }
}

// ────────────────────────────────────────────────────────────────────────────
// Helpers
// ────────────────────────────────────────────────────────────────────────────

function normalize(
  arg1: string | Json,
  arg2?: string | Json
): [Json, string | undefined] {
  if (typeof arg1 === "string") {
    return [typeof arg2 === "object" ? { ...arg2 } : {}, arg1];
  }
  return [{ ...arg1 }, typeof arg2 === "string" ? arg2 : undefined];
}

export function serializeError(err: unknown): {
  name?: string;
  message: string;
  code?: string;
  stack?: string;
} {
  if (err instanceof Error) {
    const code =
      "code" in err && typeof err.code === "string" ? err.code : undefined;
    return { name: err.name, message: err.message, code, stack: err.stack };
  }
  return { message: String(err) };
}
