/**
 * Cut fragments into pieces aligned with a target chunk grid.
 *
 * Each concat dimension of the fragment's index that also appears in the
 * target chunks is split independently; the per-dimension pieces are then
 * combined by Cartesian product in target-chunk order, last dimension
 * fastest. Every piece keeps its range in global array-index space, so the
 * pieces emitted for one destination chunk tile that chunk exactly no matter
 * which fragments they come from.
 */

import { ChunkGrid } from "../core/chunk-grid.js";
import {
  IndexError,
  ShapeMismatchError,
  assertDimensionName,
} from "../core/errors.js";
import type { Index } from "../core/position.js";
import type {
  ArraySlice,
  ChunkKey,
  DimKey,
  TargetChunks,
} from "../core/types.js";
import { ownValue, product, range } from "../core/util.js";

/** Local selection, relative to the fragment's own first position. */
export type FragmentSelection = Readonly<Record<string, ArraySlice>>;

/**
 * Anything that can be restricted to a local selection, such as an
 * in-memory dataset slice.
 */
export interface SliceableFragment<F> {
  readonly sizes: Readonly<Record<string, number>>;
  isel(selection: FragmentSelection): F;
}

export interface SplitPlan {
  /** Destination chunk, one `[dim, chunk]` pair per split dimension. */
  key: ChunkKey;
  /** Index of the piece: split concat dims narrowed to the overlap. */
  index: Index;
  /** Part of the fragment that belongs to `key`. */
  selection: FragmentSelection;
}

export interface SplitPiece<F> {
  key: ChunkKey;
  index: Index;
  fragment: F;
}

interface DimSplit {
  dim: string;
  dimKey: DimKey;
  chunk: number;
  start: number;
  stop: number;
  /** First global position of the whole fragment along `dim`. */
  origin: number;
}

/**
 * Fragment range along `dim`, checked against the target length.
 */
function fragmentRange(
  index: Index,
  dimKey: DimKey,
  totalLength: number,
): ArraySlice {
  const val = index.get(dimKey);
  const start = val?.start;
  const stop = val?.stop;
  if (start === undefined || stop === undefined) {
    throw new ShapeMismatchError(
      `Index entry for "${dimKey.name}" has no array range to split`,
    );
  }
  if (start < 0 || stop > totalLength) {
    throw new IndexError(
      `Fragment range [${start}, ${stop}) of "${dimKey.name}" outside [0, ${totalLength})`,
    );
  }
  return { start, stop };
}

/**
 * Work out the pieces a fragment at `index` splits into, without touching
 * data.
 */
export function* planSplit(
  index: Index,
  targetChunks: TargetChunks,
): Generator<SplitPlan> {
  const grid = ChunkGrid.fromUniformGrid(targetChunks);
  const perDim: DimSplit[][] = [];

  for (const [dim, [, totalLength]] of Object.entries(targetChunks)) {
    const dimKey = index.findConcatDim(dim);
    if (!dimKey) continue;

    const axis = grid.axis(dim);
    const frag = fragmentRange(index, dimKey, totalLength);
    const chunkSlice = axis.arraySliceToChunkSlice(frag);

    const splits: DimSplit[] = [];
    for (const chunk of range(chunkSlice.start, chunkSlice.stop)) {
      const bounds = axis.chunkIndexToArraySlice(chunk);
      splits.push({
        dim,
        dimKey,
        chunk,
        start: Math.max(bounds.start, frag.start),
        stop: Math.min(bounds.stop, frag.stop),
        origin: frag.start,
      });
    }
    perDim.push(splits);
  }

  for (const combo of product(perDim)) {
    let subIndex = index;
    const selection: Record<string, ArraySlice> = {};
    for (const split of combo) {
      subIndex = subIndex.with(split.dimKey, {
        position: split.chunk,
        start: split.start,
        stop: split.stop,
      });
      selection[split.dim] = {
        start: split.start - split.origin,
        stop: split.stop - split.origin,
      };
    }
    yield {
      key: combo.map((split) => [split.dim, split.chunk] as const),
      index: subIndex,
      selection,
    };
  }
}

/**
 * Split `fragment`, positioned at `index`, into pieces keyed by destination
 * chunk.
 */
export function* splitFragment<F extends SliceableFragment<F>>(
  index: Index,
  fragment: F,
  targetChunks: TargetChunks,
): Generator<SplitPiece<F>> {
  const target = Object.entries(targetChunks);
  for (const [dim] of target) {
    assertDimensionName(dim);
  }
  for (const [dim, [, totalLength]] of target) {
    const dimKey = index.findConcatDim(dim);
    if (!dimKey) continue;
    const { start, stop } = fragmentRange(index, dimKey, totalLength);
    const size = ownValue(fragment.sizes, dim);
    if (size === undefined) {
      throw new ShapeMismatchError(
        `Index places the fragment along "${dim}" but the fragment has no such dimension`,
      );
    }
    if (size !== stop - start) {
      throw new ShapeMismatchError(
        `Fragment has ${size} items along "${dim}" but its index spans [${start}, ${stop})`,
      );
    }
  }

  for (const plan of planSplit(index, targetChunks)) {
    yield {
      key: plan.key,
      index: plan.index,
      fragment: fragment.isel(plan.selection),
    };
  }
}

/** String form of a chunk key, usable as a Map key when grouping pieces. */
export function chunkKeyToString(key: ChunkKey): string {
  return key.map(([dim, chunk]) => `${dim}=${chunk}`).join(",");
}
