// backend/services/shared/src/reactive/ResultProducer.test.ts
import { describe, expect, it, vi } from "vitest";
import { Subject, of } from "rxjs";
import {
  AlreadyConsumed,
  EmptyResult,
  UpstreamFailure,
  ValidationFailure,
} from "../errors/dispatchErrors";
import { ResultProducer } from "./ResultProducer";

const invalidTitle = () =>
  new ValidationFailure({
    entity: "book",
    issues: [{ path: "title", code: "too_small", message: "Title is required" }],
  });

describe("ResultProducer factories", () => {
  it("of → value", async () => {
    await expect(ResultProducer.of(42).toPromise()).resolves.toEqual({
      kind: "value",
      value: 42,
    });
  });

  it("empty → empty", async () => {
    await expect(ResultProducer.empty<number>().toPromise()).resolves.toEqual({
      kind: "empty",
    });
  });

  it("fail → rejects with the failure", async () => {
    const err = new Error("db down");
    await expect(ResultProducer.fail(err).toPromise()).rejects.toBe(err);
  });

  it("takes only the first value of a multi-value source", async () => {
    const p = ResultProducer.fromObservable(of(1, 2, 3));
    await expect(p.toPromise()).resolves.toEqual({ kind: "value", value: 1 });
  });

  it("fromPromise resolving undefined completes empty", async () => {
    const p = ResultProducer.fromPromise<string>(Promise.resolve(undefined));
    await expect(p.toPromise()).resolves.toEqual({ kind: "empty" });
  });

  it("defer runs the factory once per subscription", async () => {
    const factory = vi.fn(async () => "fresh");
    const p = ResultProducer.defer<string>(factory);

    expect(factory).not.toHaveBeenCalled();
    await p.toPromise();
    await p.toPromise();
    expect(factory).toHaveBeenCalledTimes(2);
  });
});

describe("ResultProducer operators", () => {
  it("map transforms a value and skips empty", async () => {
    const fn = vi.fn((n: number) => n * 2);

    await expect(ResultProducer.of(21).map(fn).toPromise()).resolves.toEqual({
      kind: "value",
      value: 42,
    });
    await expect(
      ResultProducer.empty<number>().map(fn).toPromise()
    ).resolves.toEqual({ kind: "empty" });
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it("switchMap continues with the next producer; an empty inner stays empty", async () => {
    const lookup = (id: string) =>
      id === "42" ? ResultProducer.of({ id, title: "Kindred" }) : ResultProducer.empty<{ id: string; title: string }>();

    await expect(
      ResultProducer.of("42").switchMap(lookup).map((b) => b.title).toPromise()
    ).resolves.toEqual({ kind: "value", value: "Kindred" });
    await expect(
      ResultProducer.of("7").switchMap(lookup).toPromise()
    ).resolves.toEqual({ kind: "empty" });
  });

  it("switchIfEmpty never subscribes to the fallback when a value arrives", async () => {
    let fallbackRuns = 0;
    const fallback = ResultProducer.defer<string>(() => {
      fallbackRuns++;
      return ResultProducer.of("fallback");
    });

    await expect(
      ResultProducer.of("primary").switchIfEmpty(fallback).toPromise()
    ).resolves.toEqual({ kind: "value", value: "primary" });
    expect(fallbackRuns).toBe(0);

    await expect(
      ResultProducer.empty<string>().switchIfEmpty(fallback).toPromise()
    ).resolves.toEqual({ kind: "value", value: "fallback" });
    expect(fallbackRuns).toBe(1);
  });

  it("switchIfEmpty passes failures through without the fallback", async () => {
    let fallbackRuns = 0;
    const fallback = ResultProducer.defer<string>(() => {
      fallbackRuns++;
      return ResultProducer.of("fallback");
    });
    const err = new Error("boom");

    await expect(
      ResultProducer.fail<string>(err).switchIfEmpty(fallback).toPromise()
    ).rejects.toBe(err);
    expect(fallbackRuns).toBe(0);
  });

  it("onErrorReturn(handler) recovers any failure", async () => {
    const p = ResultProducer.fail<string>(new Error("boom")).onErrorReturn(
      (err) => (err instanceof Error ? `recovered: ${err.message}` : "recovered")
    );
    await expect(p.toPromise()).resolves.toEqual({
      kind: "value",
      value: "recovered: boom",
    });
  });

  it("onErrorReturn(type, handler) recovers only that category", async () => {
    const recover = (p: ResultProducer<string>) =>
      p.onErrorReturn(ValidationFailure, (err) => `issues: ${err.errors.issues.length}`);

    await expect(
      recover(ResultProducer.fail<string>(invalidTitle())).toPromise()
    ).resolves.toEqual({ kind: "value", value: "issues: 1" });

    const upstream = new UpstreamFailure("db down");
    await expect(
      recover(ResultProducer.fail<string>(upstream)).toPromise()
    ).rejects.toBe(upstream);
  });

  it("failIfEmpty turns empty into EmptyResult", async () => {
    await expect(
      ResultProducer.empty<number>().failIfEmpty().toPromise()
    ).rejects.toBeInstanceOf(EmptyResult);
  });

  it("tap sees the value without changing it", async () => {
    const seen: number[] = [];
    await expect(
      ResultProducer.of(5).tap((n) => seen.push(n)).toPromise()
    ).resolves.toEqual({ kind: "value", value: 5 });
    expect(seen).toEqual([5]);
  });
});

describe("ResultProducer lifecycle", () => {
  it("moves pending → active → terminated, and terminated is absorbing", () => {
    const source = new Subject<number>();
    const p = ResultProducer.fromObservable(source.asObservable());
    const value = vi.fn();
    const empty = vi.fn();

    expect(p.state).toBe("pending");
    p.subscribe({ value, empty });
    expect(p.state).toBe("active");

    source.next(7);
    expect(p.state).toBe("terminated");
    expect(p.outcome).toEqual({ kind: "value", value: 7 });

    source.next(8);
    source.complete();
    expect(value).toHaveBeenCalledTimes(1);
    expect(value).toHaveBeenCalledWith(7);
    expect(empty).not.toHaveBeenCalled();
  });

  it("records a failure outcome", () => {
    const err = new Error("boom");
    const p = ResultProducer.fail<number>(err);
    const failure = vi.fn();

    p.subscribe({ failure });
    expect(p.outcome).toEqual({ kind: "failure", error: err });
    expect(failure).toHaveBeenCalledWith(err);
  });

  it("a one-shot producer refuses a second subscription", () => {
    const p = ResultProducer.fromPromise(Promise.resolve(1));
    expect(p.restartable).toBe(false);

    p.subscribe();
    expect(() => p.subscribe()).toThrow(AlreadyConsumed);
  });

  it("derived producers inherit restartability", () => {
    expect(ResultProducer.fromPromise(Promise.resolve(1)).map((n) => n + 1).restartable).toBe(false);
    expect(ResultProducer.of(1).map((n) => n + 1).restartable).toBe(true);
  });

  it("restartable producers run independently per subscription", async () => {
    let n = 0;
    const p = ResultProducer.defer<number>(() => Promise.resolve(++n));

    await expect(p.toPromise()).resolves.toEqual({ kind: "value", value: 1 });
    await expect(p.toPromise()).resolves.toEqual({ kind: "value", value: 2 });
  });
});
