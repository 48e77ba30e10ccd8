import { describe, it, expect, afterEach } from "vitest";
import { config, setLogWriter } from "@altgen/core";
import { RecursiveBox } from "../recursive.js";

interface Point {
  x: number;
}

describe("RecursiveBox", () => {
  afterEach(() => {
    setLogWriter();
    config.reset();
  });

  it("of() owns the given value", () => {
    const box = RecursiveBox.of(5);
    expect(box.value()).toBe(5);
    expect(box.isEmpty()).toBe(false);
  });

  it("clone() copies the pointee through the clone trait", () => {
    const box = RecursiveBox.of<Point>({ x: 1 }, { clone: (p) => ({ ...p }) });
    const copy = box.clone();

    expect(copy.value()).not.toBe(box.value());
    expect(copy.value()).toEqual({ x: 1 });
  });

  it("clone() without a trait shares the pointee", () => {
    const point = { x: 1 };
    expect(RecursiveBox.of(point).clone().value()).toBe(point);
  });

  it("move() hands the node over and empties the source", () => {
    const point = { x: 3 };
    const box = RecursiveBox.of(point);
    const moved = box.move();

    expect(moved.value()).toBe(point);
    expect(box.isEmpty()).toBe(true);
    expect(() => box.value()).toThrow("AG1003: Dereferenced an empty RecursiveBox");
    expect(() => box.move()).toThrow("AG1003: Dereferenced an empty RecursiveBox");
  });

  it("set() disposes the previous pointee", () => {
    const disposed: number[] = [];
    const box = RecursiveBox.of(1, { dispose: (n) => disposed.push(n) });

    box.set(2);

    expect(box.value()).toBe(2);
    expect(disposed).toEqual([1]);
  });

  it("swap() exchanges nodes, including an empty one", () => {
    const full = RecursiveBox.of("full");
    const empty = RecursiveBox.of("gone");
    empty.move();

    full.swap(empty);

    expect(full.isEmpty()).toBe(true);
    expect(empty.value()).toBe("full");
  });

  it("release() disposes once", () => {
    const disposed: string[] = [];
    const box = RecursiveBox.of("x", { dispose: (s) => disposed.push(s) });

    box.release();
    box.release();

    expect(box.isEmpty()).toBe(true);
    expect(disposed).toEqual(["x"]);
  });

  it("logs ownership transfer when debug logging is on", () => {
    const lines: string[] = [];
    setLogWriter((line) => lines.push(line));
    config.set({ debug: true });

    RecursiveBox.of(1).move();

    expect(lines).toEqual(["[altgen:box] ownership moved; source box is now empty"]);
  });
});
