// backend/services/shared/src/exchange/ExchangeContext.ts
/**
 * Purpose:
 * - Immutable snapshot of request-derived data, captured synchronously when
 *   the request arrives and before any asynchronous stage runs.
 *
 * Invariants:
 * - Deep-frozen. Stages running after subscription read only this snapshot,
 *   never the live Express request.
 */

export type ExchangeFormat = "html" | "json";

export type ExchangeContext = {
  readonly requestId: string;
  readonly method: string;
  readonly path: string;
  readonly params: Readonly<Record<string, string>>;
  readonly query: Readonly<Record<string, unknown>>;
  readonly body: unknown;
  readonly format: ExchangeFormat;
  readonly receivedAt: string;
};

export type ExchangeContextInput = {
  requestId: string;
  method: string;
  path: string;
  params?: Record<string, string>;
  query?: Record<string, unknown>;
  body?: unknown;
  format?: ExchangeFormat;
  receivedAt?: Date;
};

export function snapshotExchange(input: ExchangeContextInput): ExchangeContext {
  return deepFreeze({
    requestId: input.requestId,
    method: input.method.toUpperCase(),
    path: input.path,
    params: structuredClone(input.params ?? {}),
    query: structuredClone(input.query ?? {}),
    body: input.body === undefined ? undefined : structuredClone(input.body),
    format: input.format ?? "json",
    receivedAt: (input.receivedAt ?? new Date()).toISOString(),
  });
}

function deepFreeze<T>(value: T): T {
  if (value === null || typeof value !== "object" || Object.isFrozen(value)) {
    return value;
  }
  for (const child of Object.values(value)) deepFreeze(child);
  Object.freeze(value);
  return value;
}
