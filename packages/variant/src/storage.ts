/**
 * Type-erased storage for one alternative of a sum type.
 *
 * The slot holds whatever stored value the owning variant put there. Reads
 * are reinterpretations: `value<U>()` trusts the caller that `U` is the
 * live type. Reading through any other type is a contract violation and
 * the result is undefined. The owning variant gates every access on its tag.
 *
 * @module
 */

/** A get/set reference to the storage slot. */
export interface StorageCell<U> {
  get(): U;
  set(value: U): void;
}

export class VariantStorage {
  private slot: unknown;
  private empty = false;

  constructor(stored: unknown) {
    this.slot = stored;
  }

  /** True once the stored value has been taken out. */
  get vacant(): boolean {
    return this.empty;
  }

  /**
   * Read the slot as `U`.
   *
   * **Unsafe**: no check that `U` is the live type.
   */
  value<U>(): U {
    return this.slot as U;
  }

  /** Overwrite the slot. The previous occupant is not disposed. */
  write<U>(value: U): void {
    this.slot = value;
    this.empty = false;
  }

  /** Move the value out, leaving the slot vacant. */
  take<U>(): U {
    const value = this.value<U>();
    this.slot = undefined;
    this.empty = true;
    return value;
  }

  /** A reference to the slot, typed as `U`. */
  cell<U>(): StorageCell<U> {
    return {
      get: () => this.value<U>(),
      set: (value: U) => this.write(value),
    };
  }
}
