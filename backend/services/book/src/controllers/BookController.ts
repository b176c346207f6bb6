// backend/services/book/src/controllers/BookController.ts
/**
 * Purpose:
 * - Book catalog actions. Each action returns a ResultProducer<ResponseAction>;
 *   the dispatcher decides what reaches the wire.
 *
 * Notes:
 * - Unknown ids complete empty and fall through to the dispatcher's 404.
 * - Validation failures on create/edit re-render the form for HTML clients
 *   and answer Problem+JSON (422) for JSON clients.
 */

import type { ControllerDeps } from "@rxdispatch/shared/base/controller/ControllerReactiveBase";
import { ControllerReactiveBase } from "@rxdispatch/shared/base/controller/ControllerReactiveBase";
import type { ControllerAction } from "@rxdispatch/shared/base/controller/controllerTypes";
import { ValidationFailure } from "@rxdispatch/shared/errors/dispatchErrors";
import type { ExchangeContext } from "@rxdispatch/shared/exchange/ExchangeContext";
import { ResultProducer } from "@rxdispatch/shared/reactive/ResultProducer";
import type { ResponseAction } from "@rxdispatch/shared/response/ResponseAction";
import { zListQuery } from "../dto/book.dto";
import type { BookRepo } from "../repo/BookRepo";

export class BookController extends ControllerReactiveBase {
  constructor(
    deps: ControllerDeps,
    private readonly books: BookRepo
  ) {
    super(deps);
  }

  /** GET /books → Render("index", { bookList, bookCount }) */
  public readonly index: ControllerAction = (ctx) => {
    const page = zListQuery.safeParse(ctx.query);
    if (!page.success) {
      return ResultProducer.fail(ValidationFailure.fromZod(page.error, "query"));
    }
    return this.combine.renderList(
      "book",
      this.books.list(page.data),
      this.books.count()
    );
  };

  /** HTML clients get the "show" view; JSON clients the record itself. */
  public readonly show: ControllerAction = (ctx, rx) =>
    this.books
      .get(idOf(ctx))
      .map((book) =>
        ctx.format === "html" ? rx.render("show", { book }) : rx.respond(book)
      );

  /** Empty form for HTML clients. */
  public readonly create: ControllerAction = (_ctx, rx) =>
    ResultProducer.of(rx.render("create", { book: {} }));

  public readonly edit: ControllerAction = (ctx, rx) =>
    this.books.get(idOf(ctx)).map((book) => rx.render("edit", { book }));

  public readonly save: ControllerAction = (ctx, rx) =>
    this.books
      .save(ctx.body)
      .map(
        (book): ResponseAction =>
          rx.respond(book, 201, {
            headers: { Location: `${trimSlash(ctx.path)}/${book.id}` },
          })
      )
      .onErrorReturn(ValidationFailure, (err) =>
        rx.respondErrors(err.errors, "create", { book: asRecord(ctx.body) })
      );

  /** Load, then update; an unknown id stays empty (404). */
  public readonly update: ControllerAction = (ctx, rx) => {
    const id = idOf(ctx);
    return this.books
      .get(id)
      .switchMap((existing) => this.books.update(existing.id, ctx.body))
      .map((book): ResponseAction => rx.respond(book))
      .onErrorReturn(ValidationFailure, (err) =>
        rx.respondErrors(err.errors, "edit", { book: { ...asRecord(ctx.body), id } })
      );
  };

  public readonly delete: ControllerAction = (ctx, rx) =>
    this.books.remove(idOf(ctx)).map(() => rx.noContent());
}

function idOf(ctx: ExchangeContext): string {
  return ctx.params.id ?? "";
}

function trimSlash(path: string): string {
  return path.endsWith("/") ? path.slice(0, -1) : path;
}

function asRecord(value: unknown): Record<string, unknown> {
  return value !== null && typeof value === "object" ? { ...value } : {};
}
