// backend/services/book/src/repo/InMemoryBookRepo.ts
/**
 * Purpose:
 * - BookRepo kept in process memory (demo service, tests).
 *
 * Notes:
 * - Every operation is deferred: work runs per subscription, after an
 *   async boundary, like a real driver call would.
 * - Ids are sequential strings; records are stored frozen.
 */

import { ValidationFailure } from "@rxdispatch/shared/errors/dispatchErrors";
import { ResultProducer } from "@rxdispatch/shared/reactive/ResultProducer";
import {
  zBookInput,
  zBookPatch,
  type Book,
  type BookInput,
  type ListQuery,
} from "../dto/book.dto";
import type { BookRepo } from "./BookRepo";

export class InMemoryBookRepo implements BookRepo {
  #books = new Map<string, Book>();
  #nextId = 1;

  constructor(seed: BookInput[] = []) {
    for (const input of seed) this.insert(input);
  }

  public static seeded(): InMemoryBookRepo {
    return new InMemoryBookRepo([
      { title: "The Left Hand of Darkness", author: "Ursula K. Le Guin", pages: 304 },
      { title: "Kindred", author: "Octavia E. Butler", pages: 264 },
      { title: "Solaris", author: "Stanisław Lem", pages: 204 },
    ]);
  }

  public list(page: ListQuery): ResultProducer<Book[]> {
    return ResultProducer.defer<Book[]>(async () =>
      [...this.#books.values()].slice(page.offset, page.offset + page.max)
    );
  }

  public count(): ResultProducer<number> {
    return ResultProducer.defer<number>(async () => this.#books.size);
  }

  public get(id: string): ResultProducer<Book> {
    return ResultProducer.defer<Book>(async () => this.#books.get(id));
  }

  public save(input: unknown): ResultProducer<Book> {
    return ResultProducer.defer<Book>(async () => {
      const parsed = zBookInput.safeParse(input);
      if (!parsed.success) throw ValidationFailure.fromZod(parsed.error, "book");
      return this.insert(parsed.data);
    });
  }

  public update(id: string, patch: unknown): ResultProducer<Book> {
    return ResultProducer.defer<Book>(async () => {
      const existing = this.#books.get(id);
      if (!existing) return undefined;

      const parsed = zBookPatch.safeParse(patch);
      if (!parsed.success) throw ValidationFailure.fromZod(parsed.error, "book");

      const updated: Book = Object.freeze({ ...existing, ...parsed.data, id });
      this.#books.set(id, updated);
      return updated;
    });
  }

  public remove(id: string): ResultProducer<Book> {
    return ResultProducer.defer<Book>(async () => {
      const existing = this.#books.get(id);
      if (existing) this.#books.delete(id);
      return existing;
    });
  }

  private insert(input: BookInput): Book {
    const book: Book = Object.freeze({ ...input, id: String(this.#nextId++) });
    this.#books.set(book.id, book);
    return book;
  }
}
