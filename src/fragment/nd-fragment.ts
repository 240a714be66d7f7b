/**
 * In-memory n-dimensional float64 fragment.
 *
 * Data is stored row-major in a zarrita `Chunk`, so a fragment can be handed
 * straight to `zarr.set`.
 */

import type { Chunk } from "zarrita";
import {
  IndexError,
  ShapeMismatchError,
  assertDimensionName,
} from "../core/errors.js";
import type { ArraySlice } from "../core/types.js";
import { getStrides, prod, stridedPairs, unravelIndex } from "../core/util.js";
import type {
  FragmentSelection,
  SliceableFragment,
} from "../rechunking/split.js";

function copyRegion(
  src: Chunk<"float64">,
  srcOffset: readonly number[],
  dst: Chunk<"float64">,
  dstOffset: readonly number[],
  shape: readonly number[],
): void {
  for (const [from, to] of stridedPairs(
    shape,
    { stride: src.stride, offset: srcOffset },
    { stride: dst.stride, offset: dstOffset },
  )) {
    dst.data[to] = src.data[from];
  }
}

export class NdFragment implements SliceableFragment<NdFragment> {
  readonly dims: readonly string[];
  readonly chunk: Chunk<"float64">;

  constructor(
    dims: readonly string[],
    data: Float64Array,
    shape: readonly number[],
  ) {
    if (dims.length !== shape.length) {
      throw new ShapeMismatchError(
        `Got ${dims.length} dimension names for a ${shape.length}-d shape`,
      );
    }
    if (new Set(dims).size !== dims.length) {
      throw new ShapeMismatchError(
        `Duplicate dimension names in [${dims.join(", ")}]`,
      );
    }
    dims.forEach(assertDimensionName);
    if (prod(shape) !== data.length) {
      throw new ShapeMismatchError(
        `Shape [${shape.join(", ")}] needs ${prod(shape)} values, got ${data.length}`,
      );
    }
    this.dims = Object.freeze([...dims]);
    this.chunk = { data, shape: [...shape], stride: getStrides(shape) };
  }

  /**
   * Build a fragment whose value at each position is `fn(coords)`.
   */
  static fromFunction(
    dims: readonly string[],
    shape: readonly number[],
    fn: (coords: number[]) => number,
  ): NdFragment {
    const data = new Float64Array(prod(shape));
    for (let n = 0; n < data.length; n++) {
      data[n] = fn(unravelIndex(n, shape));
    }
    return new NdFragment(dims, data, shape);
  }

  /**
   * Concatenate fragments along `dim`, in the order given.
   */
  static concat(fragments: readonly NdFragment[], dim: string): NdFragment {
    if (fragments.length === 0) {
      throw new ShapeMismatchError("Nothing to concatenate");
    }
    const [first] = fragments;
    const axis = first.axisOf(dim);
    for (const frag of fragments) {
      const sameLayout =
        frag.dims.length === first.dims.length &&
        frag.dims.every(
          (d, i) =>
            d === first.dims[i] &&
            (i === axis || frag.shape[i] === first.shape[i]),
        );
      if (!sameLayout) {
        throw new ShapeMismatchError(
          `Cannot concatenate [${frag.describe()}] with [${first.describe()}] along "${dim}"`,
        );
      }
    }

    const shape = [...first.shape];
    shape[axis] = fragments.reduce((n, frag) => n + frag.shape[axis], 0);
    const out = new NdFragment(
      first.dims,
      new Float64Array(prod(shape)),
      shape,
    );
    const offset = new Array<number>(shape.length).fill(0);
    const zeros = new Array<number>(shape.length).fill(0);
    for (const frag of fragments) {
      copyRegion(frag.chunk, zeros, out.chunk, offset, frag.shape);
      offset[axis] += frag.shape[axis];
    }
    return out;
  }

  get shape(): readonly number[] {
    return this.chunk.shape;
  }

  get sizes(): Record<string, number> {
    const sizes: Record<string, number> = {};
    this.dims.forEach((dim, i) => {
      sizes[dim] = this.shape[i];
    });
    return sizes;
  }

  /** Value at `coords`, one coordinate per dimension. */
  get(coords: readonly number[]): number {
    if (coords.length !== this.dims.length) {
      throw new ShapeMismatchError(
        `Expected ${this.dims.length} coordinates, got ${coords.length}`,
      );
    }
    let offset = 0;
    coords.forEach((c, i) => {
      if (!Number.isInteger(c) || c < 0 || c >= this.shape[i]) {
        throw new IndexError(
          `Coordinate ${c} out of bounds for "${this.dims[i]}"`,
        );
      }
      offset += c * this.chunk.stride[i];
    });
    return this.chunk.data[offset];
  }

  /**
   * Copy of the positions selected along each named dimension; dimensions
   * not named are kept whole.
   */
  isel(selection: FragmentSelection): NdFragment {
    const start = new Array<number>(this.dims.length).fill(0);
    const shape = [...this.shape];
    for (const [dim, slice] of Object.entries(selection)) {
      const axis = this.axisOf(dim);
      checkSlice(slice, this.shape[axis], dim);
      start[axis] = slice.start;
      shape[axis] = slice.stop - slice.start;
    }
    const out = new NdFragment(
      this.dims,
      new Float64Array(prod(shape)),
      shape,
    );
    const zeros = new Array<number>(shape.length).fill(0);
    copyRegion(this.chunk, start, out.chunk, zeros, shape);
    return out;
  }

  toArray(): number[] {
    return Array.from(this.chunk.data);
  }

  axisOf(dim: string): number {
    const axis = this.dims.indexOf(dim);
    if (axis === -1) {
      throw new ShapeMismatchError(
        `Fragment has no dimension "${dim}"; it has [${this.dims.join(", ")}]`,
      );
    }
    return axis;
  }

  private describe(): string {
    return this.dims.map((d, i) => `${d}: ${this.shape[i]}`).join(", ");
  }
}

function checkSlice(slice: ArraySlice, length: number, dim: string): void {
  if (slice.step !== undefined && slice.step !== 1) {
    throw new IndexError(
      `Only slices with step 1 are supported, got ${slice.step}`,
    );
  }
  if (
    !Number.isInteger(slice.start) ||
    !Number.isInteger(slice.stop) ||
    slice.start < 0 ||
    slice.stop > length ||
    slice.start >= slice.stop
  ) {
    throw new IndexError(
      `Invalid selection [${slice.start}, ${slice.stop}) for "${dim}" of length ${length}`,
    );
  }
}
