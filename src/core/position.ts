/**
 * Positional tags for fragments.
 *
 * An {@link Index} maps `(dimension, operation)` keys to the fragment's
 * placement along that dimension. Instances are immutable; `with` returns a
 * modified copy.
 */

import { ConstructionError, IndexError } from "./errors.js";
import { CombineOp } from "./types.js";
import type { DimKey, DimVal } from "./types.js";

function keyString(key: DimKey): string {
  return `${key.operation}:${key.name}`;
}

function validateDimVal(key: DimKey, val: DimVal): DimVal {
  const where = `"${key.name}" (${key.operation})`;
  if (!Number.isInteger(val.position) || val.position < 0) {
    throw new IndexError(
      `Position of ${where} must be a non-negative integer, got ${val.position}`,
    );
  }
  const { start, stop } = val;
  if (start === undefined && stop === undefined) {
    return Object.freeze({ position: val.position });
  }
  if (start === undefined || stop === undefined) {
    throw new IndexError(`Range of ${where} needs both start and stop`);
  }
  if (
    !Number.isInteger(start) ||
    !Number.isInteger(stop) ||
    start < 0 ||
    stop <= start
  ) {
    throw new IndexError(`Invalid range [${start}, ${stop}) for ${where}`);
  }
  return Object.freeze({ position: val.position, start, stop });
}

export class Index implements Iterable<[DimKey, DimVal]> {
  private readonly entries: ReadonlyMap<string, readonly [DimKey, DimVal]>;

  constructor(entries: Iterable<readonly [DimKey, DimVal]> = []) {
    const map = new Map<string, readonly [DimKey, DimVal]>();
    for (const [key, val] of entries) {
      const id = keyString(key);
      if (map.has(id)) {
        throw new ConstructionError(`Duplicate index key ${id}`);
      }
      const frozenKey = Object.freeze({
        name: key.name,
        operation: key.operation,
      });
      map.set(id, [frozenKey, validateDimVal(key, val)]);
    }
    this.entries = map;
    Object.freeze(this);
  }

  get size(): number {
    return this.entries.size;
  }

  get(key: DimKey): DimVal | undefined {
    return this.entries.get(keyString(key))?.[1];
  }

  has(key: DimKey): boolean {
    return this.entries.has(keyString(key));
  }

  keys(): DimKey[] {
    return [...this.entries.values()].map(([key]) => key);
  }

  /**
   * The concat key for dimension `name`, if this index has one.
   */
  findConcatDim(name: string): DimKey | undefined {
    const id = keyString({ name, operation: CombineOp.CONCAT });
    return this.entries.get(id)?.[0];
  }

  /**
   * Copy of this index with `key` set to `val`. Existing keys keep their order.
   */
  with(key: DimKey, val: DimVal): Index {
    const id = keyString(key);
    const next: Array<readonly [DimKey, DimVal]> = [];
    let replaced = false;
    for (const [entryId, entry] of this.entries) {
      if (entryId === id) {
        next.push([key, val]);
        replaced = true;
      } else {
        next.push(entry);
      }
    }
    if (!replaced) next.push([key, val]);
    return new Index(next);
  }

  equals(other: Index): boolean {
    if (this.size !== other.size) return false;
    for (const [key, val] of this) {
      const otherVal = other.get(key);
      if (
        !otherVal ||
        otherVal.position !== val.position ||
        otherVal.start !== val.start ||
        otherVal.stop !== val.stop
      ) {
        return false;
      }
    }
    return true;
  }

  *[Symbol.iterator](): Iterator<[DimKey, DimVal]> {
    for (const [key, val] of this.entries.values()) {
      yield [key, val];
    }
  }

  toString(): string {
    const parts = [...this].map(([key, val]) => {
      const range = val.start === undefined ? "" : `, ${val.start}:${val.stop}`;
      return `${keyString(key)}=(${val.position}${range})`;
    });
    return `Index{${parts.join(", ")}}`;
  }
}
