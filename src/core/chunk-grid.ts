/**
 * Named chunk axes, one per dimension.
 *
 * Dimensions are independent: every mapping operation applies the
 * per-axis translation to the dimensions present in its input only.
 */

import { ChunkAxis } from "./chunk-axis.js";
import {
  ShapeMismatchError,
  assertDimensionName,
  assertPositiveInteger,
} from "./errors.js";
import type { ArraySlice, TargetChunks } from "./types.js";
import { ownValue } from "./util.js";

export class ChunkGrid {
  private readonly axes: ReadonlyMap<string, ChunkAxis>;

  constructor(chunks: Readonly<Record<string, readonly number[]>>) {
    const axes = new Map<string, ChunkAxis>();
    for (const [dim, sizes] of Object.entries(chunks)) {
      assertDimensionName(dim);
      axes.set(dim, new ChunkAxis(sizes));
    }
    this.axes = axes;
    Object.freeze(this);
  }

  /**
   * Build a grid of `chunkSize`-long chunks per dimension, with a shorter
   * final chunk where `chunkSize` does not divide `totalLength`.
   */
  static fromUniformGrid(spec: TargetChunks): ChunkGrid {
    const chunks: Record<string, number[]> = {};
    for (const [dim, [chunkSize, totalLength]] of Object.entries(spec)) {
      assertDimensionName(dim);
      assertPositiveInteger(chunkSize, `Chunk size of "${dim}"`);
      assertPositiveInteger(totalLength, `Length of "${dim}"`);
      const full = Math.floor(totalLength / chunkSize);
      const sizes = new Array<number>(full).fill(chunkSize);
      const remainder = totalLength % chunkSize;
      if (remainder > 0) {
        sizes.push(remainder);
      }
      chunks[dim] = sizes;
    }
    return new ChunkGrid(chunks);
  }

  private static fromAxes(axes: Iterable<[string, ChunkAxis]>): ChunkGrid {
    const chunks: Record<string, readonly number[]> = {};
    for (const [dim, axis] of axes) {
      chunks[dim] = axis.chunks;
    }
    return new ChunkGrid(chunks);
  }

  get dims(): Set<string> {
    return new Set(this.axes.keys());
  }

  get ndim(): number {
    return this.axes.size;
  }

  /** Length of every dimension. */
  get shape(): Record<string, number> {
    return this.mapAxes((axis) => axis.length);
  }

  /** Number of chunks along every dimension. */
  get nchunks(): Record<string, number> {
    return this.mapAxes((axis) => axis.nchunks);
  }

  get chunks(): Record<string, readonly number[]> {
    return this.mapAxes((axis) => axis.chunks);
  }

  axis(dim: string): ChunkAxis {
    const axis = this.axes.get(dim);
    if (!axis) {
      const known = [...this.axes.keys()].join(", ");
      throw new ShapeMismatchError(
        `Unknown dimension "${dim}"; grid has [${known}]`,
      );
    }
    return axis;
  }

  arrayIndexToChunkIndex(
    index: Readonly<Record<string, number>>,
  ): Record<string, number> {
    return this.mapInput(index, (axis, i) => axis.arrayIndexToChunkIndex(i));
  }

  arraySliceToChunkSlice(
    slices: Readonly<Record<string, ArraySlice>>,
  ): Record<string, ArraySlice> {
    return this.mapInput(slices, (axis, s) => axis.arraySliceToChunkSlice(s));
  }

  chunkIndexToArraySlice(
    index: Readonly<Record<string, number>>,
  ): Record<string, ArraySlice> {
    return this.mapInput(index, (axis, c) => axis.chunkIndexToArraySlice(c));
  }

  /**
   * Subset the axes named in `factors`; other axes are kept as they are.
   */
  subset(factors: Readonly<Record<string, number>>): ChunkGrid {
    return this.resize(factors, (axis, factor) => axis.subset(factor));
  }

  /**
   * Consolidate the axes named in `factors`; other axes are kept as they are.
   */
  consolidate(factors: Readonly<Record<string, number>>): ChunkGrid {
    return this.resize(factors, (axis, factor) => axis.consolidate(factor));
  }

  equals(other: ChunkGrid): boolean {
    if (this.ndim !== other.ndim) return false;
    for (const [dim, axis] of this.axes) {
      const otherAxis = other.axes.get(dim);
      if (!otherAxis || !axis.equals(otherAxis)) return false;
    }
    return true;
  }

  toString(): string {
    const parts = [...this.axes].map(
      ([dim, axis]) => `${dim}: (${axis.chunks.join(", ")})`,
    );
    return `ChunkGrid({${parts.join(", ")}})`;
  }

  private mapAxes<T>(fn: (axis: ChunkAxis) => T): Record<string, T> {
    const out: Record<string, T> = {};
    for (const [dim, axis] of this.axes) {
      out[dim] = fn(axis);
    }
    return out;
  }

  private mapInput<In, Out>(
    input: Readonly<Record<string, In>>,
    fn: (axis: ChunkAxis, value: In) => Out,
  ): Record<string, Out> {
    const out: Record<string, Out> = {};
    for (const [dim, value] of Object.entries(input)) {
      out[dim] = fn(this.axis(dim), value);
    }
    return out;
  }

  private resize(
    factors: Readonly<Record<string, number>>,
    fn: (axis: ChunkAxis, factor: number) => ChunkAxis,
  ): ChunkGrid {
    for (const dim of Object.keys(factors)) {
      this.axis(dim);
    }
    return ChunkGrid.fromAxes(
      [...this.axes].map(([dim, axis]): [string, ChunkAxis] => {
        const factor = ownValue(factors, dim);
        return [dim, factor === undefined ? axis : fn(axis, factor)];
      }),
    );
  }
}
