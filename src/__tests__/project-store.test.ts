import { describe, expect, it } from "vitest";

import { KeyedMutex } from "../keyed-mutex";
import { ProjectStateStore } from "../project-store";
import { deferred, flush, MemoryPersistence } from "./fakes";

describe("KeyedMutex", () => {
  it("runs callers for one key in arrival order", async () => {
    const mutex = new KeyedMutex();
    const order: string[] = [];
    const gate = deferred<void>();

    const first = mutex.runExclusive("a", async () => {
      order.push("first:start");
      await gate.promise;
      order.push("first:end");
    });
    const second = mutex.runExclusive("a", async () => {
      order.push("second");
    });

    await flush();
    expect(order).toEqual(["first:start"]);
    expect(mutex.isLocked("a")).toBe(true);

    gate.resolve();
    await Promise.all([first, second]);
    expect(order).toEqual(["first:start", "first:end", "second"]);
    expect(mutex.isLocked("a")).toBe(false);
  });

  it("does not block other keys", async () => {
    const mutex = new KeyedMutex();
    const gate = deferred<void>();
    const held = mutex.runExclusive("a", () => gate.promise);

    await expect(mutex.runExclusive("b", async () => "b done")).resolves.toBe("b done");

    gate.resolve();
    await held;
  });
});

describe("ProjectStateStore", () => {
  it("serializes concurrent read-modify-write commits", async () => {
    const persistence = new MemoryPersistence();
    const store = new ProjectStateStore(persistence);

    await Promise.all(
      Array.from({ length: 20 }, () =>
        store.withProjectLock("p1", async (state) => {
          const before = state.costs.totalUsd;
          await flush();
          state.costs.totalUsd = before + 1;
        }),
      ),
    );

    const state = await store.read("p1");
    expect(state.costs.totalUsd).toBe(20);
    expect(persistence.saves).toBe(20);
  });

  it("returns the value produced inside the lock", async () => {
    const store = new ProjectStateStore(new MemoryPersistence());
    const result = await store.withProjectLock("p1", (state) => {
      state.costs.totalUsd = 3;
      return state.projectId;
    });
    expect(result).toBe("p1");
  });

  it("saves nothing when the mutation throws", async () => {
    const persistence = new MemoryPersistence();
    const store = new ProjectStateStore(persistence);

    await expect(
      store.withProjectLock("p1", (state) => {
        state.costs.totalUsd = 99;
        throw new Error("bad mutation");
      }),
    ).rejects.toThrow("bad mutation");

    expect(persistence.saves).toBe(0);
    expect((await store.read("p1")).costs.totalUsd).toBe(0);
    expect(store.isLocked("p1")).toBe(false);
  });

  it("releases the lock and surfaces the error when saving fails", async () => {
    const persistence = new MemoryPersistence();
    const store = new ProjectStateStore(persistence);
    persistence.failNextSave = new Error("disk full");

    await expect(
      store.withProjectLock("p1", (state) => {
        state.costs.totalUsd = 5;
      }),
    ).rejects.toThrow("disk full");
    expect(store.isLocked("p1")).toBe(false);

    await store.withProjectLock("p1", (state) => {
      state.costs.totalUsd += 1;
    });
    expect((await store.read("p1")).costs.totalUsd).toBe(1);
  });

  it("keeps projects independent", async () => {
    const store = new ProjectStateStore(new MemoryPersistence());
    const gate = deferred<void>();
    const held = store.withProjectLock("p1", () => gate.promise);

    await store.withProjectLock("p2", (state) => {
      state.costs.totalUsd = 2;
    });
    expect(store.isLocked("p1")).toBe(true);
    expect((await store.read("p2")).costs.totalUsd).toBe(2);

    gate.resolve();
    await held;
  });
});
