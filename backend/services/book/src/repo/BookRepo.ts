// backend/services/book/src/repo/BookRepo.ts
/**
 * Purpose:
 * - Book persistence port. Every operation returns a ResultProducer so
 *   controllers compose instead of awaiting.
 *
 * Semantics:
 * - get/update/remove complete empty when the id is unknown.
 * - save/update fail with ValidationFailure on invalid input.
 */

import type { ResultProducer } from "@rxdispatch/shared/reactive/ResultProducer";
import type { Book, ListQuery } from "../dto/book.dto";

export interface BookRepo {
  list(page: ListQuery): ResultProducer<Book[]>;
  count(): ResultProducer<number>;
  get(id: string): ResultProducer<Book>;
  save(input: unknown): ResultProducer<Book>;
  update(id: string, patch: unknown): ResultProducer<Book>;
  remove(id: string): ResultProducer<Book>;
}
