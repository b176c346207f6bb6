// backend/services/shared/src/reactive/combine.ts
/**
 * Purpose:
 * - Join several producers into one terminal value.
 *
 * Semantics:
 * - Inputs are subscribed together; no ordering between them.
 * - Failure short-circuits: the first failure wins and the remaining inputs
 *   are unsubscribed.
 * - Empty does NOT short-circuit: the join waits for every input, so a later
 *   failure still surfaces. No failure + any empty → empty.
 * - The combiner runs exactly once, and only when every input has a value.
 */

import {
  EMPTY,
  defaultIfEmpty,
  forkJoin,
  map,
  of,
  switchMap,
  type Observable,
} from "rxjs";
import type {
  RenderAction,
  ResponseActions,
} from "../response/ResponseAction";
import { ResultProducer } from "./ResultProducer";

type Slot<T> =
  | { readonly present: true; readonly value: T }
  | { readonly present: false };

function slot<T>(producer: ResultProducer<T>): Observable<Slot<T>> {
  return producer.toObservable().pipe(
    map((value): Slot<T> => ({ present: true, value })),
    defaultIfEmpty<Slot<T>, Slot<T>>({ present: false })
  );
}

export function zip<A, B, R>(
  a: ResultProducer<A>,
  b: ResultProducer<B>,
  combiner: (a: A, b: B) => R
): ResultProducer<R> {
  return ResultProducer.fromObservable(
    forkJoin([slot(a), slot(b)]).pipe(
      switchMap(([sa, sb]) =>
        sa.present && sb.present ? of(combiner(sa.value, sb.value)) : EMPTY
      )
    ),
    { restartable: a.restartable && b.restartable }
  );
}

export function zip3<A, B, C, R>(
  a: ResultProducer<A>,
  b: ResultProducer<B>,
  c: ResultProducer<C>,
  combiner: (a: A, b: B, c: C) => R
): ResultProducer<R> {
  return ResultProducer.fromObservable(
    forkJoin([slot(a), slot(b), slot(c)]).pipe(
      switchMap(([sa, sb, sc]) =>
        sa.present && sb.present && sc.present
          ? of(combiner(sa.value, sb.value, sc.value))
          : EMPTY
      )
    ),
    { restartable: a.restartable && b.restartable && c.restartable }
  );
}

/** Joins same-typed producers into an array, in input order. */
export function zipAll<T>(
  producers: ReadonlyArray<ResultProducer<T>>
): ResultProducer<T[]> {
  if (producers.length === 0) return ResultProducer.of<T[]>([]);
  return ResultProducer.fromObservable(
    forkJoin(producers.map(slot)).pipe(
      switchMap((slots) => {
        const values: T[] = [];
        for (const s of slots) {
          if (!s.present) return EMPTY;
          values.push(s.value);
        }
        return of(values);
      })
    ),
    { restartable: producers.every((p) => p.restartable) }
  );
}

// ───────────────────────────────────────────
// Collection + count helper
// ───────────────────────────────────────────

export type ListWithCount<T> = {
  readonly items: readonly T[];
  readonly count: number;
};

/** The common paged-list case: a page of items plus the total count. */
export class CombinationHelper {
  constructor(private readonly actions: ResponseActions) {}

  public listWithCount<T>(
    list: ResultProducer<readonly T[]>,
    count: ResultProducer<number>
  ): ResultProducer<ListWithCount<T>> {
    return zip(list, count, (items, total) => ({ items, count: total }));
  }

  /** `name` "book" → Render(view, { bookList, bookCount }). */
  public renderList<T>(
    name: string,
    list: ResultProducer<readonly T[]>,
    count: ResultProducer<number>,
    view = "index"
  ): ResultProducer<RenderAction> {
    return this.listWithCount(list, count).map(({ items, count: total }) =>
      this.actions.render(view, {
        [`${name}List`]: items,
        [`${name}Count`]: total,
      })
    );
  }
}
