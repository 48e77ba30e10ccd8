import { describe, it, expect, afterEach } from "vitest";
import { config, setLogWriter, Types } from "@altgen/core";
import { algebraic } from "@altgen/variant";
import { algebraicGenerator } from "../algebraic-generator.js";
import { bind, bound, braid, isExhausted, seq, tie } from "../combinators.js";
import { count, generator, pure } from "../generator.js";

describe("combinators", () => {
  afterEach(() => {
    setLogWriter();
    config.reset();
  });

  // ==========================================================================
  // braid / tie
  // ==========================================================================

  describe("braid", () => {
    it("pulls one value from each generator per call", () => {
      expect(braid(count(0, 1), count(10, 1)).pull(2)).toEqual([
        [0, 10],
        [1, 11],
      ]);
    });

    it("advances the inputs left to right", () => {
      const order: string[] = [];
      const a = generator(() => {
        order.push("a");
        return 1;
      });
      const b = generator(() => {
        order.push("b");
        return "b";
      });

      const pair = braid(a, b).next();

      expect(order).toEqual(["a", "b"]);
      expect(pair).toEqual([1, "b"]);
    });

    it("tie is braid", () => {
      expect(tie).toBe(braid);
      expect(tie(count(), pure("x")).arity).toBe(2);
    });
  });

  // ==========================================================================
  // bind
  // ==========================================================================

  describe("bind", () => {
    it("maps a unary function", () => {
      expect(bind((x) => x * 2, count()).pull(3)).toEqual([0, 2, 4]);
    });

    it("spreads tuple values into positional arguments", () => {
      const sums = bind((a, b) => a + b, braid(count(0), count(100)));
      expect(sums.pull(3)).toEqual([100, 102, 104]);
      expect(bind((a, b) => a * b, pure(2, 3)).next()).toBe(6);
    });

    it("braids several generators first", () => {
      const labels = bind((a, b, c) => `${a}${b}${c}`, count(1), pure("-"), count(7));
      expect(labels.pull(2)).toEqual(["1-7", "2-8"]);
    });
  });

  // ==========================================================================
  // seq
  // ==========================================================================

  describe("seq", () => {
    it("switches after the value that fires the branch", () => {
      const values = seq(count(1), count(100), (v) => v === 3).pull(5);

      expect(values.map((v) => v.typeIndex())).toEqual([0, 0, 0, 1, 1]);
      expect(values.map((v) => v.match([(t) => t, (u) => u]))).toEqual([1, 2, 3, 100, 101]);
    });

    it("does not touch the second generator before the switch", () => {
      const second = count(100);
      const s = seq(count(), second, () => false);
      s.pull(3);
      expect(second.next()).toBe(100);
    });

    it("owns its switch per returned handle", () => {
      const a = seq(count(), count(50), (v) => v === 0);
      const b = seq(count(), count(50), (v) => v === 0);

      expect(a.next().typeIndex()).toBe(0);
      expect(a.next().typeIndex()).toBe(1);
      expect(b.next().typeIndex()).toBe(0);
    });
  });

  // ==========================================================================
  // bound
  // ==========================================================================

  describe("bound", () => {
    it("yields n values then the sentinel forever", () => {
      const values = bound(count(0, 1), 3).pull(5);

      expect(values.map((v) => v.typeIndex())).toEqual([0, 0, 0, 1, 1]);
      expect(values.map(isExhausted)).toEqual([false, false, false, true, true]);
      expect(values.map((v) => v.match([(n) => n, () => -1]))).toEqual([0, 1, 2, -1, -1]);
    });

    it("reads values through the declaration's key", () => {
      const v = bound(count(5), 1).next();
      expect(v.value(v.declaration.type(0))).toBe(5);
    });

    it("stops pulling from the source once exhausted", () => {
      const source = count();
      bound(source, 0).pull(2);
      expect(source.next()).toBe(0);
    });

    it("does not count a pull whose producer throws", () => {
      let calls = 0;
      const flaky = generator(() => {
        calls++;
        if (calls === 1) throw new Error("not ready");
        return calls;
      });
      const limited = bound(flaky, 2);

      expect(() => limited.next()).toThrow("not ready");
      expect(limited.pull(3).map(isExhausted)).toEqual([false, false, true]);
    });

    it("renders the sentinel alternative", () => {
      expect(bound(count(), 0).next().toString()).toBe("Bounded.sentinel(⊥)");
      expect(bound(count(4), 1).next().toString()).toBe("Bounded.value(4)");
    });

    it("rejects limits that are not non-negative integers", () => {
      expect(() => bound(count(), -1)).toThrow(
        new RangeError("bound() limit must be a non-negative integer, got -1"),
      );
      expect(() => bound(count(), 1.5)).toThrow(RangeError);
    });

    it("logs exhaustion once when debug logging is on", () => {
      const lines: string[] = [];
      setLogWriter((line) => lines.push(line));
      config.set({ debug: true });

      bound(count(), 2).pull(4);

      expect(lines).toEqual(["[altgen:generator] AG2001: Bounded generator exhausted after 2 value(s)"]);
    });
  });

  // ==========================================================================
  // Variant generators
  // ==========================================================================

  describe("algebraicGenerator", () => {
    it("stores each payload under the first accepting alternative", () => {
      const Token = algebraic("Token", [Types.number, Types.string]);
      const payloads = [1, "two", 3];
      let i = 0;
      const tokens = algebraicGenerator(Token, () => payloads[i++ % payloads.length]);

      expect(tokens.pull(4).map((v) => v.toString())).toEqual([
        "Token.number(1)",
        'Token.string("two")',
        "Token.number(3)",
        "Token.number(1)",
      ]);
    });
  });
});
