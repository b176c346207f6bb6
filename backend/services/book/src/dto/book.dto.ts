// backend/services/book/src/dto/book.dto.ts
/**
 * Purpose:
 * - Wire/domain shapes for books, validated with zod.
 */

import { z } from "zod";

export const zBookInput = z.object({
  title: z.string().trim().min(1, "Title is required"),
  author: z.string().trim().min(1, "Author is required"),
  // Form posts arrive as strings.
  pages: z.coerce.number().int().positive(),
});

export const zBookPatch = zBookInput.partial();

export const zBook = zBookInput.extend({
  id: z.string().min(1),
});

export const zListQuery = z.object({
  max: z.coerce.number().int().min(1).max(100).default(10),
  offset: z.coerce.number().int().min(0).default(0),
});

export type Book = z.infer<typeof zBook>;
export type BookInput = z.infer<typeof zBookInput>;
export type ListQuery = z.infer<typeof zListQuery>;
