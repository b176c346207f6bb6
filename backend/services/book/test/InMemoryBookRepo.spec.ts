// backend/services/book/test/InMemoryBookRepo.spec.ts
import { describe, expect, it } from "vitest";
import { ValidationFailure } from "@rxdispatch/shared/errors/dispatchErrors";
import { InMemoryBookRepo } from "../src/repo/InMemoryBookRepo";

const seed = [
  { title: "Kindred", author: "Octavia E. Butler", pages: 264 },
  { title: "Solaris", author: "Stanislaw Lem", pages: 204 },
  { title: "Dune", author: "Frank Herbert", pages: 412 },
];

describe("InMemoryBookRepo", () => {
  it("lists a page and counts everything", async () => {
    const repo = new InMemoryBookRepo(seed);

    const page = await repo.list({ max: 2, offset: 1 }).toPromise();
    expect(page).toEqual({
      kind: "value",
      value: [
        { id: "2", title: "Solaris", author: "Stanislaw Lem", pages: 204 },
        { id: "3", title: "Dune", author: "Frank Herbert", pages: 412 },
      ],
    });
    await expect(repo.count().toPromise()).resolves.toEqual({ kind: "value", value: 3 });
  });

  it("get completes empty for an unknown id", async () => {
    const repo = new InMemoryBookRepo(seed);
    await expect(repo.get("99").toPromise()).resolves.toEqual({ kind: "empty" });
  });

  it("does no work until subscribed", async () => {
    const repo = new InMemoryBookRepo();
    const pending = repo.save({ title: "Kindred", author: "Octavia E. Butler", pages: 264 });

    await expect(repo.count().toPromise()).resolves.toEqual({ kind: "value", value: 0 });
    await pending.toPromise();
    await expect(repo.count().toPromise()).resolves.toEqual({ kind: "value", value: 1 });
  });

  it("save assigns the next id and stores a frozen record", async () => {
    const repo = new InMemoryBookRepo(seed);
    const saved = await repo.save({ title: " Ubik ", author: "Philip K. Dick", pages: "202" }).toPromise();

    expect(saved).toEqual({
      kind: "value",
      value: { id: "4", title: "Ubik", author: "Philip K. Dick", pages: 202 },
    });
    const stored = await repo.get("4").toPromise();
    expect(stored.kind === "value" && Object.isFrozen(stored.value)).toBe(true);
  });

  it("save fails with field errors for invalid input", async () => {
    const repo = new InMemoryBookRepo();
    let caught: unknown;
    try {
      await repo.save({ title: "", pages: 0 }).toPromise();
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(ValidationFailure);
    const errors = caught instanceof ValidationFailure ? caught.errors : undefined;
    expect(errors?.entity).toBe("book");
    expect(errors?.issues.map((i) => i.path)).toEqual(["title", "author", "pages"]);
  });

  it("update merges a patch and keeps the id", async () => {
    const repo = new InMemoryBookRepo(seed);
    await expect(repo.update("1", { pages: 300, id: "ignored" }).toPromise()).resolves.toEqual({
      kind: "value",
      value: { id: "1", title: "Kindred", author: "Octavia E. Butler", pages: 300 },
    });
  });

  it("update and remove complete empty for an unknown id", async () => {
    const repo = new InMemoryBookRepo(seed);
    await expect(repo.update("99", { pages: 1 }).toPromise()).resolves.toEqual({ kind: "empty" });
    await expect(repo.remove("99").toPromise()).resolves.toEqual({ kind: "empty" });
  });

  it("remove returns the removed record", async () => {
    const repo = new InMemoryBookRepo(seed);
    const removed = await repo.remove("2").toPromise();

    expect(removed).toMatchObject({ kind: "value", value: { id: "2" } });
    await expect(repo.get("2").toPromise()).resolves.toEqual({ kind: "empty" });
    await expect(repo.count().toPromise()).resolves.toEqual({ kind: "value", value: 2 });
  });
});
