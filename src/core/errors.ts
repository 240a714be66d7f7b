/**
 * Error classes raised by the rechunking core.
 *
 * Every failure is local and synchronous: the offending call throws and
 * nothing is retried.
 */

export class RechunkError extends Error {
  constructor(msg: string) {
    super(msg);
    this.name = "RechunkError";
  }
}

/** Index or slice outside the valid range, or a malformed slice. */
export class IndexError extends RechunkError {
  constructor(msg: string) {
    super(msg);
    this.name = "IndexError";
  }
}

/**
 * Mismatch between a key, mapping or fragment and the structure it
 * addresses.
 */
export class ShapeMismatchError extends RechunkError {
  constructor(msg: string) {
    super(msg);
    this.name = "ShapeMismatchError";
  }
}

/** Invalid arguments when building an axis, grid, pattern or index. */
export class ConstructionError extends RechunkError {
  constructor(msg: string) {
    super(msg);
    this.name = "ConstructionError";
  }
}

export function assertPositiveInteger(value: number, what: string): void {
  if (!Number.isInteger(value) || value <= 0) {
    throw new ConstructionError(
      `${what} must be a positive integer, got ${value}`,
    );
  }
}

/**
 * Whether `name` can key a per-dimension record without losing its place.
 *
 * Integer-like keys are listed before all others by every object, and
 * `__proto__` replaces the prototype instead of adding an entry.
 */
export function isDimensionName(name: string): boolean {
  return name !== "__proto__" && !/^(0|[1-9][0-9]*)$/.test(name);
}

export function assertDimensionName(name: string): void {
  if (!isDimensionName(name)) {
    throw new ConstructionError(
      `Invalid dimension name "${name}": names may not be integers or "__proto__"`,
    );
  }
}
