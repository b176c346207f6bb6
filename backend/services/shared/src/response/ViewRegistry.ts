// backend/services/shared/src/response/ViewRegistry.ts
/**
 * Purpose:
 * - Name → template lookup used when a Render/RespondErrors action is written
 *   for an HTML client. Templates are plain functions returning markup.
 */

import type { ViewModel } from "./ResponseAction";

export type ViewTemplate = (model: ViewModel) => string;

export class ViewRegistry {
  #views = new Map<string, ViewTemplate>();

  public register(name: string, template: ViewTemplate): this {
    if (!name.trim()) throw new Error("ViewRegistry: view name is required");
    if (this.#views.has(name)) {
      throw new Error(`ViewRegistry: view "${name}" is already registered`);
    }
    this.#views.set(name, template);
    return this;
  }

  public resolve(name: string): ViewTemplate | undefined {
    return this.#views.get(name);
  }

  public has(name: string): boolean {
    return this.#views.has(name);
  }
}

const HTML_ESCAPES: Record<string, string> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
  '"': "&quot;",
  "'": "&#39;",
};

export function escapeHtml(value: unknown): string {
  return String(value ?? "").replace(/[&<>"']/g, (c) => HTML_ESCAPES[c] ?? c);
}
