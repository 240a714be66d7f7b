/**
 * Reassemble the pieces that share a destination chunk.
 *
 * Pieces may arrive in any order. Each is placed by the range its index
 * gives, so the result is in array-index order; the pieces must cover the
 * union of their ranges exactly once.
 */

import { ShapeMismatchError } from "../core/errors.js";
import type { Index } from "../core/position.js";
import { CombineOp } from "../core/types.js";
import type { ArraySlice } from "../core/types.js";
import {
  getStrides,
  prod,
  stridedPairs,
  unravelIndex,
} from "../core/util.js";
import { NdFragment } from "../fragment/nd-fragment.js";

export interface IndexedFragment {
  index: Index;
  fragment: NdFragment;
}

/**
 * Global range of `piece` along every dimension of its fragment. Dimensions
 * without a concat range in the index span the whole fragment.
 */
export function globalRanges(piece: IndexedFragment): ArraySlice[] {
  const { index, fragment } = piece;
  return fragment.dims.map((dim, axis) => {
    const size = fragment.shape[axis];
    const key = index.findConcatDim(dim);
    const val = key ? index.get(key) : undefined;
    const start = val?.start;
    const stop = val?.stop;
    if (start === undefined || stop === undefined) {
      return { start: 0, stop: size };
    }
    if (stop - start !== size) {
      throw new ShapeMismatchError(
        `Fragment has ${size} items along "${dim}" but its index spans ` +
          `[${start}, ${stop})`,
      );
    }
    return { start, stop };
  });
}

function sameNonConcatEntries(a: Index, b: Index): boolean {
  const strip = (index: Index) =>
    [...index].filter(([key]) => key.operation !== CombineOp.CONCAT);
  const left = strip(a);
  const right = strip(b);
  return (
    left.length === right.length &&
    left.every(([key, val]) => b.get(key)?.position === val.position)
  );
}

export function combineFragments(
  pieces: readonly IndexedFragment[],
): IndexedFragment {
  if (pieces.length === 0) {
    throw new ShapeMismatchError("No fragments to combine");
  }
  const [first] = pieces;
  const dims = first.fragment.dims;
  for (const piece of pieces) {
    const { dims: other } = piece.fragment;
    if (
      other.length !== dims.length ||
      other.some((d, i) => d !== dims[i])
    ) {
      throw new ShapeMismatchError(
        `Cannot combine fragments with dims [${other.join(", ")}] ` +
          `and [${dims.join(", ")}]`,
      );
    }
    if (!sameNonConcatEntries(first.index, piece.index)) {
      const [a, b] = [piece.index.toString(), first.index.toString()];
      throw new ShapeMismatchError(`Cannot combine ${a} with ${b}`);
    }
  }

  const ranges = pieces.map(globalRanges);
  const boxStart = dims.map((_, d) =>
    Math.min(...ranges.map((r) => r[d].start)),
  );
  const boxStop = dims.map((_, d) =>
    Math.max(...ranges.map((r) => r[d].stop)),
  );
  const shape = dims.map((_, d) => boxStop[d] - boxStart[d]);

  const out = new NdFragment(dims, new Float64Array(prod(shape)), shape);
  const coverage = new Uint8Array(prod(shape));
  const outStride = getStrides(shape);

  const zeros = new Array<number>(shape.length).fill(0);
  pieces.forEach((piece, p) => {
    const { chunk } = piece.fragment;
    const offset = ranges[p].map((r, d) => r.start - boxStart[d]);
    for (const [from, to] of stridedPairs(
      chunk.shape,
      { stride: chunk.stride, offset: zeros },
      { stride: outStride, offset },
    )) {
      out.chunk.data[to] = chunk.data[from];
      coverage[to] += 1;
    }
  });

  const where = (flat: number) =>
    unravelIndex(flat, shape)
      .map((c, d) => c + boxStart[d])
      .join(", ");
  const gap = coverage.indexOf(0);
  if (gap !== -1) {
    throw new ShapeMismatchError(`Fragments leave a gap at [${where(gap)}]`);
  }
  const overlap = coverage.findIndex((count) => count > 1);
  if (overlap !== -1) {
    throw new ShapeMismatchError(`Fragments overlap at [${where(overlap)}]`);
  }

  let index = first.index;
  dims.forEach((dim, d) => {
    const key = index.findConcatDim(dim);
    const val = key ? index.get(key) : undefined;
    if (key && val?.start !== undefined) {
      index = index.with(key, {
        position: val.position,
        start: boxStart[d],
        stop: boxStop[d],
      });
    }
  });
  return { index, fragment: out };
}
