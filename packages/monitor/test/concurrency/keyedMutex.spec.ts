import { describe, expect, it } from "vitest";
import { KeyedMutex, type Release } from "../../src/concurrency/keyedMutex";
import { flushMicrotasks } from "../helpers";

function track(order: string[], label: string, pending: Promise<Release>): Promise<Release> {
  return pending.then(release => {
    order.push(label);
    return release;
  });
}

describe("KeyedMutex", () => {
  it("hands a key to waiters in the order they asked", async () => {
    const mutex = new KeyedMutex();
    const order: string[] = [];
    const first = await mutex.acquire("api");
    const second = track(order, "second", mutex.acquire("api"));
    const third = track(order, "third", mutex.acquire("api"));

    await flushMicrotasks();
    expect(order).toEqual([]);

    first();
    await flushMicrotasks();
    expect(order).toEqual(["second"]);

    (await second)();
    await flushMicrotasks();
    expect(order).toEqual(["second", "third"]);
    (await third)();
  });

  it("never makes holders of different keys wait on each other", async () => {
    const mutex = new KeyedMutex();
    const api = await mutex.acquire("api");

    const worker = await mutex.acquire("worker");

    worker();
    api();
  });

  it("ignores a second release of the same hold", async () => {
    const mutex = new KeyedMutex();
    const order: string[] = [];
    const first = await mutex.acquire("api");
    const second = track(order, "second", mutex.acquire("api"));
    const third = track(order, "third", mutex.acquire("api"));

    first();
    first();
    await flushMicrotasks();

    expect(order).toEqual(["second"]);
    (await second)();
    await flushMicrotasks();
    expect(order).toEqual(["second", "third"]);
    (await third)();
  });

  it("waits for a single holder in acquireAll without deadlocking", async () => {
    const mutex = new KeyedMutex();
    const order: string[] = [];
    const single = await mutex.acquire("worker");
    const all = track(order, "all", mutex.acquireAll(["worker", "api", "api"]));
    const apiAfterAll = track(order, "api", mutex.acquire("api"));

    await flushMicrotasks();
    expect(order).toEqual([]);

    single();
    const releaseAll = await all;
    expect(order).toEqual(["all"]);

    releaseAll();
    (await apiAfterAll)();
    expect(order).toEqual(["all", "api"]);
  });

  it("serializes overlapping acquireAll calls whatever order the keys come in", async () => {
    const mutex = new KeyedMutex();
    const order: string[] = [];
    const first = track(order, "first", mutex.acquireAll(["worker", "api"]));
    const second = track(order, "second", mutex.acquireAll(["api", "worker"]));

    const releaseFirst = await first;
    await flushMicrotasks();
    expect(order).toEqual(["first"]);

    releaseFirst();
    (await second)();
    expect(order).toEqual(["first", "second"]);
  });
});
