// backend/services/book/src/routes/bookRoutes.ts
/**
 * Purpose:
 * - One-liner routes; all logic lives in BookController actions.
 */

import type { Router } from "express";
import type { BookController } from "../controllers/BookController";

export function mountBookRoutes(router: Router, c: BookController): void {
  router.get("/books", c.handle("index", c.index));
  router.get("/books/create", c.handle("create", c.create));
  router.get("/books/:id", c.handle("show", c.show));
  router.get("/books/:id/edit", c.handle("edit", c.edit));
  router.post("/books", c.handle("save", c.save));
  router.put("/books/:id", c.handle("update", c.update));
  // HTML forms can only POST; the edit form posts here.
  router.post("/books/:id", c.handle("update", c.update));
  router.delete("/books/:id", c.handle("delete", c.delete));
}
