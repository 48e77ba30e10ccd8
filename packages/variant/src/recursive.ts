/**
 * RecursiveBox: exclusive owner of one heap node.
 *
 * A sum type cannot hold itself inline. Declaring the recursive alternative
 * through a box gives it a fixed representation (one reference) whatever
 * the size of the value it owns.
 *
 * Ownership rules:
 * - `clone()` allocates a new node holding a copy of the pointee
 * - `move()` hands the node to a new box and leaves this one empty
 * - `release()` drops the pointee, running the `dispose` trait on it
 *
 * Dereferencing an empty box throws AG1003.
 *
 * @module
 */

import { AG1003, AltgenError, debugLog } from "@altgen/core";

/** How a box copies and destroys its pointee. */
export interface BoxTraits<T> {
  clone?: (value: T) => T;
  dispose?: (value: T) => void;
}

interface Node<T> {
  value: T;
}

export class RecursiveBox<T> {
  private node: Node<T> | null;
  private readonly traits: BoxTraits<T>;

  constructor(value: T, traits: BoxTraits<T> = {}) {
    this.node = { value };
    this.traits = traits;
  }

  static of<T>(value: T, traits: BoxTraits<T> = {}): RecursiveBox<T> {
    return new RecursiveBox(value, traits);
  }

  /** The owned value. */
  value(): T {
    if (this.node === null) {
      throw new AltgenError(AG1003);
    }
    return this.node.value;
  }

  /** Replace the owned value in place, disposing the previous one. */
  set(value: T): void {
    const previous = this.value();
    this.traits.dispose?.(previous);
    this.node = { value };
  }

  isEmpty(): boolean {
    return this.node === null;
  }

  /** Deep copy: a new node holding `clone(pointee)`. */
  clone(): RecursiveBox<T> {
    const value = this.value();
    const copy = this.traits.clone ? this.traits.clone(value) : value;
    return new RecursiveBox(copy, this.traits);
  }

  /** Transfer ownership to a new box; this box is left empty. */
  move(): RecursiveBox<T> {
    const moved = new RecursiveBox(this.value(), this.traits);
    this.node = null;
    debugLog("box", "ownership moved; source box is now empty");
    return moved;
  }

  /** Exchange owned nodes with another box. */
  swap(other: RecursiveBox<T>): void {
    const node = this.node;
    this.node = other.node;
    other.node = node;
  }

  /** Drop the owned value. Releasing an empty box does nothing. */
  release(): void {
    if (this.node === null) return;
    const { value } = this.node;
    this.node = null;
    this.traits.dispose?.(value);
  }
}
