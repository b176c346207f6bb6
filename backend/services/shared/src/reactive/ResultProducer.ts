// backend/services/shared/src/reactive/ResultProducer.ts
/**
 * Purpose:
 * - Zero-or-one asynchronous result, built on an rxjs Observable.
 *   Only the first value is ever taken; the producer then terminates.
 *
 * Lifecycle (per subscription run):
 *   pending ──subscribe──▶ active ──▶ terminated(value | empty | failure)
 *
 * Invariants:
 * - terminated is absorbing: no event is delivered after it.
 * - Restartable producers (of/empty/fail/defer, cold observables) start an
 *   independent run on every subscription.
 * - One-shot producers (fromPromise, fromObservable with restartable:false)
 *   throw AlreadyConsumed on a second subscription. Derived producers inherit
 *   restartability from their upstream.
 * - A factory/promise result of `undefined` means "empty".
 */

import {
  EMPTY,
  Observable,
  catchError,
  defer as rxDefer,
  filter,
  from,
  map as rxMap,
  of,
  switchMap as rxSwitchMap,
  take,
  tap as rxTap,
  throwError,
  throwIfEmpty,
  type ObservableInput,
  type Subscription,
} from "rxjs";
import { AlreadyConsumed, EmptyResult } from "../errors/dispatchErrors";

export type ProducerState = "pending" | "active" | "terminated";

export type ProducerOutcome<T> =
  | { readonly kind: "value"; readonly value: T }
  | { readonly kind: "empty" }
  | { readonly kind: "failure"; readonly error: unknown };

export type ProducerObserver<T> = {
  value?: (value: T) => void;
  empty?: () => void;
  failure?: (error: unknown) => void;
};

/** Error class usable with instanceof (abstract classes included). */
export type ErrorClass<E extends Error = Error> = (abstract new (
  ...args: never[]
) => E) & { readonly prototype: E };

export type ProducerFactory<T> = () =>
  | ObservableInput<T | undefined>
  | ResultProducer<T>;

export class ResultProducer<T> {
  readonly #source: Observable<T>;
  readonly #restartable: boolean;
  #claimed = false;
  #state: ProducerState = "pending";
  #outcome: ProducerOutcome<T> | undefined;

  private constructor(source: Observable<T>, restartable: boolean) {
    this.#source = source.pipe(take(1));
    this.#restartable = restartable;
  }

  // ───────────────────────────────────────────
  // Factories
  // ───────────────────────────────────────────

  public static of<T>(value: T): ResultProducer<T> {
    return new ResultProducer(of(value), true);
  }

  public static empty<T = never>(): ResultProducer<T> {
    return new ResultProducer<T>(EMPTY, true);
  }

  public static fail<T = never>(error: unknown): ResultProducer<T> {
    return new ResultProducer<T>(
      throwError(() => error),
      true
    );
  }

  /** Runs `factory` once per subscription. */
  public static defer<T>(factory: ProducerFactory<T>): ResultProducer<T> {
    return new ResultProducer<T>(
      rxDefer(() => {
        const out = factory();
        return out instanceof ResultProducer
          ? out.toObservable()
          : from(out).pipe(filter((v): v is T => v !== undefined));
      }),
      true
    );
  }

  /** One-shot: the promise is already running, so it cannot be restarted. */
  public static fromPromise<T>(
    promise: PromiseLike<T | undefined>
  ): ResultProducer<T> {
    return new ResultProducer<T>(
      from(promise).pipe(filter((v): v is T => v !== undefined)),
      false
    );
  }

  public static fromObservable<T>(
    source: Observable<T>,
    opts: { restartable?: boolean } = {}
  ): ResultProducer<T> {
    return new ResultProducer(source, opts.restartable ?? true);
  }

  // ───────────────────────────────────────────
  // State
  // ───────────────────────────────────────────

  public get restartable(): boolean {
    return this.#restartable;
  }

  /** State of the most recent subscription run. */
  public get state(): ProducerState {
    return this.#state;
  }

  public get outcome(): ProducerOutcome<T> | undefined {
    return this.#outcome;
  }

  // ───────────────────────────────────────────
  // Operators
  // ───────────────────────────────────────────

  /** Transforms the value if present; empty/failure pass through. */
  public map<U>(fn: (value: T) => U): ResultProducer<U> {
    return this.derive(this.toObservable().pipe(rxMap(fn)));
  }

  /** Continues with the producer returned for the value. */
  public switchMap<U>(fn: (value: T) => ResultProducer<U>): ResultProducer<U> {
    return this.derive(
      this.toObservable().pipe(rxSwitchMap((value) => fn(value).toObservable()))
    );
  }

  /** Subscribes to `fallback` only when this producer completes empty. */
  public switchIfEmpty(fallback: ResultProducer<T>): ResultProducer<T> {
    const upstream = this.toObservable();
    return this.derive(
      new Observable<T>((subscriber) => {
        let emitted = false;
        let fallbackSub: Subscription | undefined;
        const upstreamSub = upstream.subscribe({
          next: (value) => {
            emitted = true;
            subscriber.next(value);
          },
          error: (err: unknown) => subscriber.error(err),
          complete: () => {
            if (emitted) {
              subscriber.complete();
              return;
            }
            fallbackSub = fallback.toObservable().subscribe(subscriber);
          },
        });
        return () => {
          upstreamSub.unsubscribe();
          fallbackSub?.unsubscribe();
        };
      })
    );
  }

  /**
   * Replaces a failure with a substitute value.
   * With an error class, only failures of that class are recovered.
   */
  public onErrorReturn(handler: (error: unknown) => T): ResultProducer<T>;
  public onErrorReturn<E extends Error>(
    type: ErrorClass<E>,
    handler: (error: E) => T
  ): ResultProducer<T>;
  public onErrorReturn<E extends Error>(
    ...args:
      | [handler: (error: unknown) => T]
      | [type: ErrorClass<E>, handler: (error: E) => T]
  ): ResultProducer<T> {
    if (args.length === 1) {
      const [handler] = args;
      return this.derive(
        this.toObservable().pipe(catchError((err: unknown) => of(handler(err))))
      );
    }
    const [type, handler] = args;
    return this.derive(
      this.toObservable().pipe(
        catchError((err: unknown) =>
          err instanceof type ? of(handler(err)) : throwError(() => err)
        )
      )
    );
  }

  /** Turns empty completion into a failure (EmptyResult by default). */
  public failIfEmpty(
    errorFactory: () => Error = () => new EmptyResult()
  ): ResultProducer<T> {
    return this.derive(this.toObservable().pipe(throwIfEmpty(errorFactory)));
  }

  /** Side effect on the value; the value passes through unchanged. */
  public tap(fn: (value: T) => void): ResultProducer<T> {
    return this.derive(this.toObservable().pipe(rxTap(fn)));
  }

  // ───────────────────────────────────────────
  // Subscription
  // ───────────────────────────────────────────

  /**
   * Starts a run. Exactly one of value/empty/failure is called.
   * @throws AlreadyConsumed for a one-shot producer subscribed twice.
   */
  public subscribe(observer: ProducerObserver<T> = {}): Subscription {
    if (this.#claimed && !this.#restartable) throw new AlreadyConsumed();
    this.#claimed = true;
    this.#state = "active";
    this.#outcome = undefined;

    let terminated = false;
    const terminate = (outcome: ProducerOutcome<T>): boolean => {
      if (terminated) return false;
      terminated = true;
      this.#state = "terminated";
      this.#outcome = outcome;
      return true;
    };

    return this.#source.subscribe({
      next: (value) => {
        if (terminate({ kind: "value", value })) observer.value?.(value);
      },
      error: (error: unknown) => {
        if (terminate({ kind: "failure", error })) observer.failure?.(error);
      },
      complete: () => {
        if (terminate({ kind: "empty" })) observer.empty?.();
      },
    });
  }

  /** rxjs bridge; each subscription to the observable is a subscribe() run. */
  public toObservable(): Observable<T> {
    return new Observable<T>((subscriber) =>
      this.subscribe({
        value: (value) => {
          subscriber.next(value);
          subscriber.complete();
        },
        empty: () => subscriber.complete(),
        failure: (error) => subscriber.error(error),
      })
    );
  }

  /** Resolves with the terminal outcome; rejects with the failure. */
  public toPromise(): Promise<
    { kind: "value"; value: T } | { kind: "empty" }
  > {
    return new Promise((resolve, reject) => {
      this.subscribe({
        value: (value) => resolve({ kind: "value", value }),
        empty: () => resolve({ kind: "empty" }),
        failure: reject,
      });
    });
  }

  private derive<U>(source: Observable<U>): ResultProducer<U> {
    return new ResultProducer(source, this.#restartable);
  }
}
