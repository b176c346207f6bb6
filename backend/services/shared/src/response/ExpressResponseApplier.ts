// backend/services/shared/src/response/ExpressResponseApplier.ts
/**
 * Purpose:
 * - Express wire-format writer for ResponseActions.
 *   - Respond        → JSON (or empty body for null payloads)
 *   - Render         → view model as JSON, or registered HTML view
 *   - RespondErrors  → Problem+JSON with issues, or HTML view with errors
 *
 * Invariants:
 * - Exactly one write per call; failures while rendering a view degrade to a
 *   500 Problem+JSON, never to an unanswered request.
 * - Error responses are always Problem+JSON, even for HTML controllers.
 */

import type { Response } from "express";
import type { ProblemJson } from "../base/controller/controllerTypes";
import type { ExchangeContext } from "../exchange/ExchangeContext";
import type { IBoundLogger } from "../logger/Logger";
import {
  PROBLEM_JSON,
  type RenderAction,
  type RespondAction,
  type RespondErrorsAction,
  type ResponseAction,
  type ViewModel,
} from "./ResponseAction";
import type { ResponseApplier } from "./ResponseApplier";
import type { ViewRegistry } from "./ViewRegistry";

export class ExpressResponseApplier implements ResponseApplier<Response> {
  private readonly log: IBoundLogger;

  constructor(
    private readonly views: ViewRegistry,
    log: IBoundLogger
  ) {
    this.log = log.bind({ component: "ExpressResponseApplier" });
  }

  public apply(res: Response, action: ResponseAction, ctx: ExchangeContext): void {
    switch (action.kind) {
      case "respond":
        this.respond(res, action);
        return;
      case "render":
        this.render(res, action, ctx);
        return;
      case "respondErrors":
        this.respondErrors(res, action, ctx);
        return;
    }
  }

  // ───────────────────────────────────────────
  // Respond
  // ───────────────────────────────────────────

  private respond(res: Response, action: RespondAction): void {
    if (action.headers) res.set(action.headers);
    res.status(action.status);

    if (action.payload === null || action.payload === undefined) {
      res.end();
      return;
    }
    if (action.contentType) res.type(action.contentType);
    res.json(action.payload);
  }

  // ───────────────────────────────────────────
  // Render
  // ───────────────────────────────────────────

  private render(res: Response, action: RenderAction, ctx: ExchangeContext): void {
    if (ctx.format === "json") {
      res.status(action.status).json(action.model);
      return;
    }
    this.writeView(res, action.view, action.model, action.status, ctx);
  }

  // ───────────────────────────────────────────
  // RespondErrors
  // ───────────────────────────────────────────

  private respondErrors(
    res: Response,
    action: RespondErrorsAction,
    ctx: ExchangeContext
  ): void {
    if (ctx.format === "html" && action.view) {
      this.writeView(
        res,
        action.view,
        { ...action.model, errors: action.errors },
        action.status,
        ctx
      );
      return;
    }

    const count = action.errors.issues.length;
    const body: ProblemJson = {
      type: "about:blank",
      title: "Validation Failed",
      status: action.status,
      code: "VALIDATION_FAILED",
      detail: `${count} field error${count === 1 ? "" : "s"}${
        action.errors.entity ? ` on ${action.errors.entity}` : ""
      }`,
      issues: action.errors.issues.map((i) => ({ ...i })),
      requestId: ctx.requestId,
    };
    res.status(action.status).type(PROBLEM_JSON).json(body);
  }

  // ───────────────────────────────────────────
  // Internal helpers
  // ───────────────────────────────────────────

  private writeView(
    res: Response,
    view: string,
    model: ViewModel,
    status: number,
    ctx: ExchangeContext
  ): void {
    const template = this.views.resolve(view);
    if (!template) {
      this.writeInternalError(res, ctx, "VIEW_NOT_FOUND", `View "${view}" is not registered`);
      return;
    }

    let html: string;
    try {
      html = template(model);
    } catch (err) {
      this.log.error(
        {
          event: "view_render_failed",
          requestId: ctx.requestId,
          view,
          error: this.log.serializeError(err),
        },
        "View template threw"
      );
      this.writeInternalError(res, ctx, "VIEW_RENDER_FAILED", `View "${view}" failed to render`);
      return;
    }

    res.status(status);
    res.setHeader("Content-Type", "text/html; charset=utf-8");
    res.send(html);
  }

  private writeInternalError(
    res: Response,
    ctx: ExchangeContext,
    code: string,
    detail: string
  ): void {
    const body: ProblemJson = {
      type: "about:blank",
      title: "Internal Server Error",
      status: 500,
      code,
      detail,
      requestId: ctx.requestId,
    };
    res.status(500).type(PROBLEM_JSON).json(body);

    this.log.error(
      { event: "apply_internal_error", requestId: ctx.requestId, code, detail },
      "ExpressResponseApplier could not apply action"
    );
  }
}
