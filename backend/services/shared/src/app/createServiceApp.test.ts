// backend/services/shared/src/app/createServiceApp.test.ts
import http from "node:http";
import type { AddressInfo } from "node:net";
import { Subject } from "rxjs";
import request from "supertest";
import { describe, expect, it } from "vitest";
import {
  ControllerReactiveBase,
  type ControllerDeps,
} from "../base/controller/ControllerReactiveBase";
import type { ControllerAction } from "../base/controller/controllerTypes";
import { ControllerDispatcher } from "../dispatch/ControllerDispatcher";
import { ResultProducer } from "../reactive/ResultProducer";
import { ExpressResponseApplier } from "../response/ExpressResponseApplier";
import { ResponseActions, type ResponseAction } from "../response/ResponseAction";
import { ViewRegistry } from "../response/ViewRegistry";
import { MemoryLogger } from "../testing/MemoryLogger";
import { createServiceApp } from "./createServiceApp";

class PingController extends ControllerReactiveBase {
  constructor(
    deps: ControllerDeps,
    private readonly pending: Subject<ResponseAction>
  ) {
    super(deps);
  }

  public readonly ping: ControllerAction = (ctx, rx) =>
    ResultProducer.of(rx.respond({ pong: ctx.query.name ?? "anon", requestId: ctx.requestId }));

  public readonly missing: ControllerAction = () => ResultProducer.empty<ResponseAction>();

  public readonly explode: ControllerAction = () => {
    throw new Error("wiring bug");
  };

  /** Never settles on its own; the test drives `pending`. */
  public readonly hang: ControllerAction = () => ResultProducer.fromObservable(this.pending);
}

async function until(check: () => boolean, timeoutMs = 2_000): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!check()) {
    if (Date.now() > deadline) throw new Error("condition not met in time");
    await new Promise((resolve) => setTimeout(resolve, 5));
  }
}

function build(readiness?: () => Promise<Record<string, unknown>>) {
  const log = new MemoryLogger();
  const actions = new ResponseActions();
  const pending = new Subject<ResponseAction>();
  const controller = new PingController(
    {
      dispatcher: new ControllerDispatcher({ log, actions }),
      applier: new ExpressResponseApplier(new ViewRegistry(), log),
      actions,
      log,
    },
    pending
  );

  const app = createServiceApp({
    serviceName: "ping",
    apiPrefix: "/api",
    env: "test",
    log,
    readiness,
    mountRoutes: (router) => {
      router.get("/ping", controller.handle("ping", controller.ping));
      router.get("/missing", controller.handle("missing", controller.missing));
      router.get("/explode", controller.handle("explode", controller.explode));
      router.get("/hang", controller.handle("hang", controller.hang));
      router.post("/echo", (req, res) => {
        res.json(req.body);
      });
    },
  });
  return { app, log, actions, pending };
}

describe("createServiceApp", () => {
  it("dispatches a controller action and echoes the request id", async () => {
    const { app } = build();
    const res = await request(app)
      .get("/api/ping?name=ada")
      .set("x-request-id", "req-ping")
      .expect(200);
    expect(res.headers["x-request-id"]).toBe("req-ping");
    expect(res.body).toEqual({ pong: "ada", requestId: "req-ping" });
  });

  it("mints a request id when none is sent", async () => {
    const { app } = build();
    const res = await request(app).get("/api/ping").expect(200);
    expect(res.headers["x-request-id"]).toMatch(/^[0-9a-f-]{36}$/);
    expect(res.body.requestId).toBe(res.headers["x-request-id"]);
  });

  it("an empty producer answers 404", async () => {
    const { app } = build();
    await request(app).get("/api/missing").expect(404);
  });

  it("an action that throws is a 500 and a WARN log", async () => {
    const { app, log } = build();
    const res = await request(app).get("/api/explode").expect(500);
    expect(res.body).toMatchObject({ code: "INTERNAL_ERROR" });
    expect(log.at("warn", "action_threw")).toHaveLength(1);
    expect(log.at("warn", "action_threw")[0]?.obj.action).toBe("PingController.explode");
  });

  it("unknown API routes are Problem+JSON 404s", async () => {
    const { app } = build();
    const res = await request(app).get("/api/nope").set("x-request-id", "req-404").expect(404);
    expect(res.body).toEqual({
      type: "about:blank",
      title: "Not Found",
      status: 404,
      detail: "Route not found",
      requestId: "req-404",
    });
  });

  it("paths outside the API get a bare 404", async () => {
    const { app } = build();
    const res = await request(app).get("/elsewhere").expect(404);
    expect(res.text).toBe("");
  });

  it("malformed JSON is a 400 Problem+JSON", async () => {
    const { app } = build();
    const res = await request(app)
      .post("/api/echo")
      .set("Content-Type", "application/json")
      .send("{not json")
      .expect(400);
    expect(res.body).toMatchObject({ type: "about:blank", title: "Bad Request", status: 400 });
  });

  it("serves liveness", async () => {
    const { app } = build();
    const res = await request(app).get("/health/live").expect(200);
    expect(res.body).toMatchObject({ service: "ping", env: "test", ok: true });
  });

  it("readiness merges the hook's details, and is 503 when it throws", async () => {
    const ok = build(async () => ({ books: 3 }));
    const ready = await request(ok.app).get("/health/ready").expect(200);
    expect(ready.body).toMatchObject({ ok: true, books: 3 });

    const down = build(async () => {
      throw new Error("store offline");
    });
    const notReady = await request(down.app).get("/health/ready").expect(503);
    expect(notReady.body).toMatchObject({ ok: false, error: "store offline" });
  });

  it("a client that disconnects mid-flight cancels the dispatch", async () => {
    const { app, log, actions, pending } = build();
    const server = http.createServer(app);
    await new Promise<void>((resolve) => server.listen(0, "127.0.0.1", resolve));
    const address = server.address();
    if (address === null || typeof address === "string") throw new Error("no TCP address");
    const { port }: AddressInfo = address;

    const req = http.get({ host: "127.0.0.1", port, path: "/api/hang" });
    // destroy() surfaces as "socket hang up" on the client side.
    req.on("error", () => undefined);

    try {
      await until(() => pending.observed);
      req.destroy();
      await until(() => !pending.observed);

      expect(log.at("info", "dispatch_cancelled")).toHaveLength(1);
      await until(() =>
        log.at("debug", "action_dispatched").some((e) => e.obj.outcome === "cancelled")
      );

      pending.next(actions.noContent());
      expect(log.at("error")).toHaveLength(0);
      expect(log.at("debug", "late_event")).toHaveLength(0);
    } finally {
      await new Promise<void>((resolve, reject) =>
        server.close((err) => (err ? reject(err) : resolve()))
      );
    }
  });
});
