// backend/services/shared/src/exchange/HttpExchange.ts
/**
 * Purpose:
 * - The one shared mutable resource of a dispatch: the HTTP exchange.
 * - Access is serialized through a completion flag so exactly one
 *   ResponseAction is ever applied.
 *
 * Invariants:
 * - apply() flips `completed` BEFORE writing.
 * - A second apply(), or an apply() after abort, throws ProtocolViolation.
 * - Abort listeners fire at most once, and never after completion.
 */

import { ProtocolViolation } from "../errors/dispatchErrors";
import type { ResponseAction } from "../response/ResponseAction";
import type { ExchangeContext } from "./ExchangeContext";

export interface HttpExchange {
  readonly context: ExchangeContext;
  readonly completed: boolean;
  readonly aborted: boolean;
  apply(action: ResponseAction): void;
  /** Returns an unregister function. Fires immediately if already aborted. */
  onAbort(listener: () => void): () => void;
}

export abstract class ExchangeBase implements HttpExchange {
  #completed = false;
  #aborted = false;
  #abortListeners = new Set<() => void>();

  constructor(public readonly context: ExchangeContext) {}

  public get completed(): boolean {
    return this.#completed;
  }

  public get aborted(): boolean {
    return this.#aborted;
  }

  public apply(action: ResponseAction): void {
    if (this.#aborted) {
      throw new ProtocolViolation(
        `Exchange ${this.context.requestId} was aborted; refusing to apply "${action.kind}"`
      );
    }
    if (this.#completed) {
      throw new ProtocolViolation(
        `Exchange ${this.context.requestId} already has a response; refusing second "${action.kind}"`
      );
    }
    this.#completed = true;
    this.write(action);
  }

  public onAbort(listener: () => void): () => void {
    if (this.#aborted) {
      listener();
      return () => {};
    }
    this.#abortListeners.add(listener);
    return () => {
      this.#abortListeners.delete(listener);
    };
  }

  /** Called by the transport when the client goes away before a response. */
  protected markAborted(): void {
    if (this.#completed || this.#aborted) return;
    this.#aborted = true;
    const listeners = [...this.#abortListeners];
    this.#abortListeners.clear();
    for (const l of listeners) l();
  }

  protected abstract write(action: ResponseAction): void;
}
