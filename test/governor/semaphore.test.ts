import { describe, expect, it } from "vitest";
import { Semaphore } from "../../src/governor/semaphore.js";

describe("Semaphore", () => {
  it("hands out up to `limit` permits", () => {
    const sem = new Semaphore(2);
    expect(sem.tryAcquire()).toBe(true);
    expect(sem.tryAcquire()).toBe(true);
    expect(sem.tryAcquire()).toBe(false);
    expect(sem.active).toBe(2);
  });

  it("rejects a non-positive limit", () => {
    expect(() => new Semaphore(0)).toThrow(RangeError);
    expect(() => new Semaphore(1.5)).toThrow("Semaphore limit must be a positive integer, got 1.5");
  });

  it("passes a released permit to the oldest waiter", async () => {
    const sem = new Semaphore(1);
    await sem.acquire();
    const order: string[] = [];
    const first = sem.acquire().then((ok) => order.push(`first:${ok}`));
    const second = sem.acquire().then((ok) => order.push(`second:${ok}`));
    expect(sem.queued).toBe(2);

    sem.release();
    await first;
    expect(order).toEqual(["first:true"]);
    expect(sem.active).toBe(1);

    sem.release();
    await second;
    expect(order).toEqual(["first:true", "second:true"]);
  });

  it("times out a waiter and drops it from the queue", async () => {
    const sem = new Semaphore(1);
    sem.tryAcquire();
    expect(await sem.acquire(20)).toBe(false);
    expect(sem.queued).toBe(0);
    expect(sem.active).toBe(1);
  });

  it("fails immediately with a zero timeout when nothing is free", async () => {
    const sem = new Semaphore(1);
    sem.tryAcquire();
    expect(await sem.acquire(0)).toBe(false);
  });

  it("ignores a release when nothing is held", () => {
    const sem = new Semaphore(1);
    expect(sem.release()).toBe(false);
    expect(sem.active).toBe(0);
    expect(sem.tryAcquire()).toBe(true);
    expect(sem.tryAcquire()).toBe(false);
  });

  it("drain fails every waiter", async () => {
    const sem = new Semaphore(1);
    sem.tryAcquire();
    const waiting = sem.acquire();
    expect(sem.drain()).toBe(1);
    expect(await waiting).toBe(false);
    expect(sem.active).toBe(1);
  });
});
