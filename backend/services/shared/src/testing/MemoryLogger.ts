// backend/services/shared/src/testing/MemoryLogger.ts
/**
 * Purpose:
 * - IBoundLogger that keeps entries in memory so tests can assert on logs.
 * - Bound children share the parent's entry list.
 */

import { serializeError, type IBoundLogger } from "../logger/Logger";

type Json = Record<string, unknown>;

export type MemoryLogLevel = "debug" | "info" | "warn" | "error";

export type MemoryLogEntry = {
  level: MemoryLogLevel;
  obj: Json;
  msg?: string;
};

export class MemoryLogger implements IBoundLogger {
  constructor(
    public readonly entries: MemoryLogEntry[] = [],
    private readonly ctx: Json = {}
  ) {}

  public bind(ctx: Json): IBoundLogger {
    return new MemoryLogger(this.entries, { ...this.ctx, ...ctx });
  }

  public debug(arg1: string | Json, arg2?: string | Json): void {
    this.record("debug", arg1, arg2);
  }

  public info(arg1: string | Json, arg2?: string | Json): void {
    this.record("info", arg1, arg2);
  }

  public warn(arg1: string | Json, arg2?: string | Json): void {
    this.record("warn", arg1, arg2);
  }

  public error(arg1: string | Json, arg2?: string | Json): void {
    this.record("error", arg1, arg2);
  }

  public serializeError(err: unknown) {
    return serializeError(err);
  }

  /** Entries at `level`, optionally filtered by `event`. */
  public at(level: MemoryLogLevel, event?: string): MemoryLogEntry[] {
    return this.entries.filter(
      (e) => e.level === level && (event === undefined || e.obj.event === event)
    );
  }

  private record(
    level: MemoryLogLevel,
    arg1: string | Json,
    arg2?: string | Json
  ): void {
    if (typeof arg1 === "string") {
      this.entries.push({
        level,
        obj: { ...this.ctx, ...(typeof arg2 === "object" ? arg2 : {}) },
        msg: arg1,
      });
      return;
    }
    this.entries.push({
      level,
      obj: { ...this.ctx, ...arg1 },
      msg: typeof arg2 === "string" ? arg2 : undefined,
    });
  }
}
