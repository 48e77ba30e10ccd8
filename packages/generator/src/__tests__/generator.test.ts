import { describe, it, expect } from "vitest";
import { GeneratorHandle, bot, count, generator, prod, pure } from "../generator.js";
import { isSentinel, sentinel } from "../sentinel.js";

describe("primitive generators", () => {
  it("count() steps from its start", () => {
    expect(count(0, 2).pull(3)).toEqual([0, 2, 4]);
    expect(count().pull(3)).toEqual([0, 1, 2]);
    expect(count(10, -5).pull(3)).toEqual([10, 5, 0]);
  });

  it("prod() multiplies by its factor", () => {
    expect(prod(1, 2).pull(4)).toEqual([1, 2, 4, 8]);
  });

  it("count() and prod() accept bigints", () => {
    expect(count(5n, 5n).pull(3)).toEqual([5n, 10n, 15n]);
    expect(prod(3n, 3n).pull(3)).toEqual([3n, 9n, 27n]);
  });

  it("pure() repeats one value", () => {
    expect(pure(7).pull(2)).toEqual([7, 7]);
  });

  it("pure() with several values yields a fresh tuple per call", () => {
    const pair = pure(1, "a");
    const first = pair.next();
    const second = pair.next();

    expect(first).toEqual([1, "a"]);
    expect(second).toEqual([1, "a"]);
    expect(first).not.toBe(second);
    expect(pair.arity).toBe(2);
  });

  it("bot yields the sentinel", () => {
    const value = bot.next();
    expect(value).toBe(sentinel);
    expect(isSentinel(value)).toBe(true);
    expect(isSentinel({ kind: "sentinel" })).toBe(false);
  });

  it("generator() wraps a producer", () => {
    let calls = 0;
    const g = generator(() => ++calls);
    expect(g).toBeInstanceOf(GeneratorHandle);
    expect(g.pull(2)).toEqual([1, 2]);
  });
});

describe("GeneratorHandle", () => {
  it("call() hands the next value to a continuation", () => {
    const g = count(10);
    expect(g.call((v) => v + 1)).toBe(11);
    expect(g.next()).toBe(11);
  });

  it("map() shares the underlying producer", () => {
    const g = count();
    const tens = g.map((v) => v * 10);

    expect(g.next()).toBe(0);
    expect(tens.next()).toBe(10);
    expect(g.next()).toBe(2);
  });

  it("pull() rejects negative and fractional counts", () => {
    expect(() => count().pull(-1)).toThrow(
      new RangeError("pull() count must be a non-negative integer, got -1"),
    );
    expect(() => count().pull(1.5)).toThrow(RangeError);
    expect(count().pull(0)).toEqual([]);
  });

  it("swap() exchanges producers", () => {
    const a = count(0);
    const b = count(100);
    a.swap(b);
    expect(a.next()).toBe(100);
    expect(b.next()).toBe(0);
  });

  it("iterates until the caller stops", () => {
    const seen: number[] = [];
    for (const v of count(1)) {
      if (v > 3) break;
      seen.push(v);
    }
    expect(seen).toEqual([1, 2, 3]);
  });

  it("propagates errors thrown by the producer", () => {
    const failing = generator((): number => {
      throw new Error("producer failed");
    });
    expect(() => failing.map((v) => v + 1).next()).toThrow("producer failed");
  });
});
