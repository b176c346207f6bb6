// backend/services/shared/src/env/serviceConfig.ts
/**
 * Purpose:
 * - Env file cascade (dotenv + dotenv-expand) and the typed, validated
 *   service configuration every service boots from.
 *
 * Policy:
 * - Files load in order; later files override earlier ones.
 * - Variables already present in the real environment always win.
 * - Missing files are skipped; invalid values fail fast with every issue
 *   listed (ConfigError).
 */

import fs from "node:fs";
import path from "node:path";
import { parse } from "dotenv";
import { expand } from "dotenv-expand";
import { z } from "zod";
import { LOG_LEVELS, type LogLevel } from "../logger/Logger";

export type EnvSource = Record<string, string | undefined>;

/**
 * Load env files into `target` (process.env by default).
 * @returns absolute paths of the files that were found and applied.
 */
export function loadEnvFiles(
  files: string[],
  target: EnvSource = process.env
): string[] {
  const merged: Record<string, string> = {};
  const loaded: string[] = [];

  for (const f of files) {
    const abs = path.resolve(f);
    if (!fs.existsSync(abs)) continue;
    Object.assign(merged, parse(fs.readFileSync(abs, "utf8")));
    loaded.push(abs);
  }

  const existing: Record<string, string> = {};
  for (const [k, v] of Object.entries(target)) {
    if (v !== undefined) existing[k] = v;
  }

  const { parsed, error } = expand({ parsed: merged, processEnv: existing });
  if (error) throw error;

  for (const [k, v] of Object.entries(parsed ?? {})) {
    if (target[k] === undefined) target[k] = v;
  }
  return loaded;
}

// ────────────────────────────────────────────────────────────────────────────
// Service config
// ────────────────────────────────────────────────────────────────────────────

const zLogLevel = z.custom<LogLevel>(
  (v) => typeof v === "string" && LOG_LEVELS.some((l) => l === v),
  { message: `Expected one of ${LOG_LEVELS.join("|")}` }
);

const zServiceEnv = z.object({
  SERVICE_NAME: z.string().trim().min(1),
  PORT: z.coerce.number().int().min(0).max(65535).default(4020),
  LOG_LEVEL: zLogLevel.default("info"),
  DISPATCH_TIMEOUT_MS: z.coerce.number().int().min(0).default(30_000),
  API_PREFIX: z
    .string()
    .regex(/^\/[A-Za-z0-9_\-/]*$/, "Must start with / and contain no spaces")
    .default("/api"),
  NODE_ENV: z.string().default("development"),
});

export type ServiceConfig = {
  serviceName: string;
  port: number;
  logLevel: LogLevel;
  dispatchTimeoutMs: number;
  apiPrefix: string;
  nodeEnv: string;
};

export class ConfigError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid service configuration:\n  - ${issues.join("\n  - ")}`);
    this.name = "ConfigError";
  }
}

/** Validate env into ServiceConfig. Blank values count as unset. */
export function loadServiceConfig(env: EnvSource = process.env): ServiceConfig {
  const present: Record<string, string> = {};
  for (const [k, v] of Object.entries(env)) {
    if (v !== undefined && v.trim() !== "") present[k] = v;
  }

  const parsed = zServiceEnv.safeParse(present);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`)
    );
  }

  const e = parsed.data;
  return {
    serviceName: e.SERVICE_NAME,
    port: e.PORT,
    logLevel: e.LOG_LEVEL,
    dispatchTimeoutMs: e.DISPATCH_TIMEOUT_MS,
    apiPrefix: e.API_PREFIX.length > 1 ? e.API_PREFIX.replace(/\/+$/, "") : e.API_PREFIX,
    nodeEnv: e.NODE_ENV,
  };
}
