// backend/services/book/src/views/bookViews.ts
/**
 * Purpose:
 * - HTML templates for the book views (index, show, create, edit).
 * - Each template validates its model; a model that does not parse throws,
 *   which the applier answers with a 500.
 * - Links and form actions are absolute, built from the mounted base path.
 *   Browsers cannot send PUT from a form, so the edit form posts to the
 *   item URL and the router maps that POST onto update.
 */

import { z } from "zod";
import {
  escapeHtml,
  type ViewRegistry,
} from "@rxdispatch/shared/response/ViewRegistry";
import { zBook } from "../dto/book.dto";

const zIssues = z.object({
  issues: z.array(z.object({ path: z.string(), message: z.string() })),
});

const zDraft = z
  .object({
    id: z.unknown(),
    title: z.unknown(),
    author: z.unknown(),
    pages: z.unknown(),
  })
  .partial();

const zIndexModel = z.object({
  bookList: z.array(zBook),
  bookCount: z.number().int().min(0),
});

const zFormModel = z.object({
  book: zDraft,
  errors: zIssues.optional(),
});

function layout(title: string, body: string): string {
  return [
    "<!doctype html>",
    '<html lang="en">',
    `<head><meta charset="utf-8"><title>${escapeHtml(title)}</title></head>`,
    `<body>${body}</body>`,
    "</html>",
  ].join("\n");
}

function errorList(errors: z.infer<typeof zIssues> | undefined): string {
  if (!errors || errors.issues.length === 0) return "";
  const items = errors.issues
    .map((i) => `<li data-field="${escapeHtml(i.path)}">${escapeHtml(i.message)}</li>`)
    .join("");
  return `<ul class="errors">${items}</ul>`;
}

function bookForm(
  action: string,
  method: string,
  book: z.infer<typeof zDraft>
): string {
  const field = (name: "title" | "author" | "pages") =>
    `<label>${name} <input name="${name}" value="${escapeHtml(book[name])}"></label>`;
  return [
    `<form action="${escapeHtml(action)}" method="post" data-method="${method}">`,
    field("title"),
    field("author"),
    field("pages"),
    "<button>Save</button>",
    "</form>",
  ].join("");
}

export type BookViewOptions = {
  /** Mounted path of the books collection, e.g. "/api/books". */
  basePath: string;
};

/** Collection path under an API prefix; "/" mounts at the root. */
export function booksPath(apiPrefix: string): string {
  const prefix = apiPrefix.endsWith("/") ? apiPrefix.slice(0, -1) : apiPrefix;
  return `${prefix}/books`;
}

export function registerBookViews(
  views: ViewRegistry,
  opts: BookViewOptions
): ViewRegistry {
  const { basePath } = opts;
  return views
    .register("index", (model) => {
      const { bookList, bookCount } = zIndexModel.parse(model);
      const rows = bookList
        .map(
          (b) =>
            `<tr><td><a href="${escapeHtml(`${basePath}/${b.id}`)}">${escapeHtml(b.title)}</a></td><td>${escapeHtml(b.author)}</td><td>${b.pages}</td></tr>`
        )
        .join("");
      return layout(
        "Books",
        `<h1>Books (${bookCount})</h1><table>${rows}</table>`
      );
    })
    .register("show", (model) => {
      const book = zBook.parse(model.book);
      return layout(
        book.title,
        `<h1>${escapeHtml(book.title)}</h1><p>${escapeHtml(book.author)}, ${book.pages} pages</p>`
      );
    })
    .register("create", (model) => {
      const { book, errors } = zFormModel.parse(model);
      return layout(
        "New book",
        `<h1>New book</h1>${errorList(errors)}${bookForm(basePath, "POST", book)}`
      );
    })
    .register("edit", (model) => {
      const { book, errors } = zFormModel.parse(model);
      const id = escapeHtml(book.id);
      return layout(
        "Edit book",
        `<h1>Edit book ${id}</h1>${errorList(errors)}${bookForm(`${basePath}/${String(book.id ?? "")}`, "PUT", book)}`
      );
    });
}
