/**
 * Chunk boundaries along a single dimension.
 *
 * Translates between array-index space (positions along the dimension) and
 * chunk-index space (ordinals of chunks), and derives resized layouts that
 * keep existing chunk boundaries.
 */

import {
  ConstructionError,
  IndexError,
  assertPositiveInteger,
} from "./errors.js";
import type { ArraySlice } from "./types.js";

export class ChunkAxis {
  readonly chunks: readonly number[];
  /** First array index of each chunk, followed by the total length. */
  private readonly offsets: readonly number[];

  constructor(chunks: readonly number[]) {
    if (chunks.length === 0) {
      throw new ConstructionError("ChunkAxis needs at least one chunk");
    }
    const offsets = [0];
    for (const size of chunks) {
      assertPositiveInteger(size, "Chunk length");
      offsets.push(offsets[offsets.length - 1] + size);
    }
    this.chunks = Object.freeze([...chunks]);
    this.offsets = Object.freeze(offsets);
    Object.freeze(this);
  }

  /** Total number of array positions. */
  get length(): number {
    return this.offsets[this.offsets.length - 1];
  }

  get nchunks(): number {
    return this.chunks.length;
  }

  /**
   * Ordinal of the chunk containing array position `index`.
   */
  arrayIndexToChunkIndex(index: number): number {
    if (!Number.isInteger(index) || index < 0 || index >= this.length) {
      throw new IndexError(
        `Array index ${index} out of bounds for axis of length ${this.length}`,
      );
    }
    // Last offset <= index.
    let lo = 0;
    let hi = this.chunks.length - 1;
    while (lo < hi) {
      const mid = (lo + hi + 1) >> 1;
      if (this.offsets[mid] <= index) {
        lo = mid;
      } else {
        hi = mid - 1;
      }
    }
    return lo;
  }

  /**
   * Smallest chunk range `[c0, c1)` whose chunks cover `[start, stop)`.
   */
  arraySliceToChunkSlice(slice: ArraySlice): ArraySlice {
    const { start, stop, step } = slice;
    if (step !== undefined && step !== 1) {
      throw new IndexError(
        `Only slices with step 1 are supported, got ${step}`,
      );
    }
    if (!Number.isInteger(start) || !Number.isInteger(stop)) {
      throw new IndexError(
        `Slice bounds must be integers, got [${start}, ${stop})`,
      );
    }
    if (start < 0 || stop > this.length) {
      throw new IndexError(
        `Slice [${start}, ${stop}) out of bounds for axis of length ${this.length}`,
      );
    }
    if (start >= stop) {
      throw new IndexError(`Slice [${start}, ${stop}) is empty`);
    }
    return {
      start: this.arrayIndexToChunkIndex(start),
      stop: this.arrayIndexToChunkIndex(stop - 1) + 1,
    };
  }

  /**
   * Array range `[start, stop)` spanned by chunk `chunk`.
   */
  chunkIndexToArraySlice(chunk: number): ArraySlice {
    if (!Number.isInteger(chunk) || chunk < 0 || chunk >= this.nchunks) {
      throw new IndexError(
        `Chunk index ${chunk} out of bounds for axis with ${this.nchunks} chunks`,
      );
    }
    return { start: this.offsets[chunk], stop: this.offsets[chunk + 1] };
  }

  /**
   * Split every chunk into `factor` pieces.
   *
   * A chunk of length L becomes pieces of `floor(L / factor)` followed by
   * `L % factor` pieces of `floor(L / factor) + 1`, so `[3]` splits in two as
   * `[1, 2]`.
   */
  subset(factor: number): ChunkAxis {
    assertPositiveInteger(factor, "Subset factor");
    const pieces: number[] = [];
    for (const size of this.chunks) {
      pieces.push(...divideChunk(size, factor));
    }
    return new ChunkAxis(pieces);
  }

  /**
   * Merge runs of `factor` consecutive chunks; the last run may be shorter.
   */
  consolidate(factor: number): ChunkAxis {
    assertPositiveInteger(factor, "Consolidation factor");
    const merged: number[] = [];
    for (let i = 0; i < this.chunks.length; i += factor) {
      merged.push(
        this.chunks.slice(i, i + factor).reduce((a, b) => a + b, 0),
      );
    }
    return new ChunkAxis(merged);
  }

  equals(other: ChunkAxis): boolean {
    return (
      this.chunks.length === other.chunks.length &&
      this.chunks.every((size, i) => size === other.chunks[i])
    );
  }

  toString(): string {
    return `ChunkAxis(${this.chunks.join(", ")})`;
  }
}

/**
 * Divide `length` into `factor` near-equal positive pieces, larger pieces last.
 */
export function divideChunk(length: number, factor: number): number[] {
  if (factor > length) {
    throw new ConstructionError(
      `Cannot divide a chunk of length ${length} into ${factor} non-empty pieces`,
    );
  }
  const base = Math.floor(length / factor);
  const remainder = length % factor;
  const pieces: number[] = [];
  for (let i = 0; i < factor; i++) {
    pieces.push(i < factor - remainder ? base : base + 1);
  }
  return pieces;
}
