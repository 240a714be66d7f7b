/**
 * Small iteration helpers.
 */

export function* range(start: number, stop: number): Generator<number> {
  for (let i = start; i < stop; i++) {
    yield i;
  }
}

/**
 * Convert a linear ordinal into row-major coordinates (last axis fastest).
 */
export function unravelIndex(
  ordinal: number,
  shape: readonly number[],
): number[] {
  const coords = new Array<number>(shape.length);
  let rest = ordinal;
  for (let i = shape.length - 1; i >= 0; i--) {
    coords[i] = rest % shape[i];
    rest = Math.floor(rest / shape[i]);
  }
  return coords;
}

export function prod(values: readonly number[]): number {
  return values.reduce((a, b) => a * b, 1);
}

/** Row-major strides for a C-contiguous array of `shape`. */
export function getStrides(shape: readonly number[]): number[] {
  const strides = new Array<number>(shape.length);
  let step = 1;
  for (let i = shape.length - 1; i >= 0; i--) {
    strides[i] = step;
    step *= shape[i];
  }
  return strides;
}

/** A box origin within a strided layout. */
export interface StridedRegion {
  stride: readonly number[];
  offset: readonly number[];
}

/**
 * Flat `[from, to]` positions of every element of a `shape` box, read from
 * `src` and written to `dst`, in row-major order.
 */
export function* stridedPairs(
  shape: readonly number[],
  src: StridedRegion,
  dst: StridedRegion,
): Generator<[number, number]> {
  const total = prod(shape);
  for (let n = 0; n < total; n++) {
    const coords = unravelIndex(n, shape);
    let from = 0;
    let to = 0;
    for (let d = 0; d < coords.length; d++) {
      from += (coords[d] + src.offset[d]) * src.stride[d];
      to += (coords[d] + dst.offset[d]) * dst.stride[d];
    }
    yield [from, to];
  }
}

/**
 * Cartesian product of `lists`, last list varying fastest.
 *
 * Each combination is recomputed from its ordinal, so iterators are
 * independent of each other. An empty `lists` yields one empty combination.
 */
export function* product<T>(
  lists: ReadonlyArray<readonly T[]>,
): Generator<T[]> {
  const shape = lists.map((list) => list.length);
  const total = prod(shape);
  for (let ordinal = 0; ordinal < total; ordinal++) {
    const coords = unravelIndex(ordinal, shape);
    yield coords.map((c, i) => lists[i][c]);
  }
}

/** `record[key]` when `key` is the record's own property. */
export function ownValue<T>(
  record: Readonly<Record<string, T>>,
  key: string,
): T | undefined {
  return Object.hasOwn(record, key) ? record[key] : undefined;
}
