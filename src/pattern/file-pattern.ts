/**
 * File patterns: an n-dimensional matrix of source files.
 *
 * Each combine dimension adds one axis to the matrix. A key holds one
 * coordinate per combine dimension, in declaration order, and resolves to an
 * {@link OpenSpec} (which file, and which segment of it) and to a positional
 * {@link Index} (where the resulting fragment sits in the full dataset).
 */

import { ChunkAxis, divideChunk } from "../core/chunk-axis.js";
import {
  ConstructionError,
  IndexError,
  ShapeMismatchError,
  assertPositiveInteger,
} from "../core/errors.js";
import { Index } from "../core/position.js";
import { CombineOp } from "../core/types.js";
import type {
  ArraySlice,
  DimKey,
  DimVal,
  OpenSpec,
  PatternKey,
  SubsetSpec,
} from "../core/types.js";
import { prod, unravelIndex } from "../core/util.js";
import { concatDim } from "./combine-dims.js";
import type { CombineDim, ConcatDim, SubsetDim } from "./combine-dims.js";

/** Keys passed to a {@link FormatFunction}, one per non-subset dim. */
export type FormatKeys = Readonly<Record<string, PatternKey>>;

export type FormatFunction = (keys: FormatKeys) => string;

/** One coordinate per combine dimension. */
export type PatternIndex = readonly number[];

export function makeSubsetSpec(
  dimName: string,
  thisSegment: number,
  totalSegments: number,
): SubsetSpec {
  assertPositiveInteger(totalSegments, `Segment count of "${dimName}"`);
  if (
    !Number.isInteger(thisSegment) ||
    thisSegment < 0 ||
    thisSegment >= totalSegments
  ) {
    throw new IndexError(
      `Segment ${thisSegment} of "${dimName}" out of range [0, ${totalSegments})`,
    );
  }
  return { dimName, thisSegment, totalSegments };
}

/**
 * Local `[start, stop)` range that `spec` selects from a file holding
 * `length` items along the subset dimension.
 */
export function subsetRange(length: number, spec: SubsetSpec): ArraySlice {
  return new ChunkAxis([length])
    .subset(spec.totalSegments)
    .chunkIndexToArraySlice(spec.thisSegment);
}

/** The concat dim with a known length that `subset` divides, if any. */
function findSizedConcat(
  combineDims: readonly CombineDim[],
  subset: SubsetDim,
): ConcatDim | undefined {
  for (const cdim of combineDims) {
    if (
      cdim.type === "concat" &&
      cdim.name === subset.dim &&
      cdim.nitemsPerFile !== undefined
    ) {
      return cdim;
    }
  }
  return undefined;
}

export class FilePattern implements Iterable<PatternIndex> {
  readonly formatFunction: FormatFunction;
  readonly combineDims: readonly CombineDim[];

  constructor(formatFunction: FormatFunction, ...combineDims: CombineDim[]) {
    const seen = new Set<string>();
    for (const cdim of combineDims) {
      if (seen.has(cdim.name)) {
        throw new ConstructionError(
          `Duplicate combine dimension "${cdim.name}"`,
        );
      }
      seen.add(cdim.name);
    }
    for (const cdim of combineDims) {
      if (cdim.type !== "subset") continue;
      const nitems = findSizedConcat(combineDims, cdim)?.nitemsPerFile;
      if (nitems !== undefined && cdim.subsetFactor > nitems) {
        throw new ConstructionError(
          `Cannot subset "${cdim.dim}" ${cdim.subsetFactor} ways: files hold ${nitems} items`,
        );
      }
    }
    this.formatFunction = formatFunction;
    this.combineDims = Object.freeze([...combineDims]);
    Object.freeze(this);
  }

  /** Number of keys along each combine dimension, in declaration order. */
  get dims(): Record<string, number> {
    const dims: Record<string, number> = {};
    for (const cdim of this.combineDims) {
      dims[cdim.name] = cdim.keys.length;
    }
    return dims;
  }

  get shape(): number[] {
    return this.combineDims.map((cdim) => cdim.keys.length);
  }

  /** Total number of keys. */
  get size(): number {
    return prod(this.shape);
  }

  get mergeDims(): string[] {
    return this.namesOf("merge");
  }

  get concatDims(): string[] {
    return this.namesOf("concat");
  }

  get subsetDims(): string[] {
    return this.namesOf("subset");
  }

  /** Items per file along each concat dim, or `null` when files differ. */
  get nitemsPerInput(): Record<string, number | null> {
    const nitems: Record<string, number | null> = {};
    for (const cdim of this.combineDims) {
      if (cdim.type === "concat") {
        nitems[cdim.name] = cdim.nitemsPerFile ?? null;
      }
    }
    return nitems;
  }

  /** Full length of each concat dim, when `nitemsPerFile` is known. */
  get concatSequenceLens(): Record<string, number | null> {
    const lens: Record<string, number | null> = {};
    for (const cdim of this.combineDims) {
      if (cdim.type === "concat") {
        lens[cdim.name] =
          cdim.nitemsPerFile !== undefined
            ? cdim.nitemsPerFile * cdim.keys.length
            : null;
      }
    }
    return lens;
  }

  /**
   * Resolve a key to the file to open and the segments to take from it.
   */
  get(key: PatternIndex): OpenSpec {
    this.checkKey(key);
    const formatKeys: Record<string, PatternKey> = {};
    const subsets: SubsetSpec[] = [];
    this.combineDims.forEach((cdim, i) => {
      switch (cdim.type) {
        case "concat":
        case "merge":
          formatKeys[cdim.name] = cdim.keys[key[i]];
          break;
        case "subset":
          subsets.push(makeSubsetSpec(cdim.dim, key[i], cdim.subsetFactor));
          break;
      }
    });
    return { fname: this.formatFunction(formatKeys), subsets };
  }

  /**
   * Positional index of the fragment that `key` produces.
   *
   * Concat dims with a known `nitemsPerFile` carry their global range; a
   * subset dim over such a concat dim narrows that range to its segment
   * instead of adding an entry of its own.
   */
  index(key: PatternIndex): Index {
    this.checkKey(key);
    const entries: Array<[DimKey, DimVal]> = [];
    this.combineDims.forEach((cdim, i) => {
      switch (cdim.type) {
        case "merge":
          entries.push([
            { name: cdim.name, operation: CombineOp.MERGE },
            { position: key[i] },
          ]);
          break;
        case "concat":
          entries.push([
            { name: cdim.name, operation: CombineOp.CONCAT },
            this.concatVal(cdim, key),
          ]);
          break;
        case "subset":
          if (findSizedConcat(this.combineDims, cdim) === undefined) {
            entries.push([
              { name: cdim.dim, operation: CombineOp.SUBSET },
              { position: key[i] },
            ]);
          }
          break;
      }
    });
    return new Index(entries);
  }

  /**
   * All keys in row-major order (last dimension fastest).
   */
  *keys(): Generator<PatternIndex> {
    const shape = this.shape;
    const total = prod(shape);
    for (let ordinal = 0; ordinal < total; ordinal++) {
      yield unravelIndex(ordinal, shape);
    }
  }

  [Symbol.iterator](): Iterator<PatternIndex> {
    return this.keys();
  }

  /** All `[key, OpenSpec]` pairs in key order. */
  *items(): Generator<[PatternIndex, OpenSpec]> {
    for (const key of this.keys()) {
      yield [key, this.get(key)];
    }
  }

  toString(): string {
    return `<FilePattern ${JSON.stringify(this.dims)}>`;
  }

  private namesOf(type: CombineDim["type"]): string[] {
    return this.combineDims
      .filter((cdim) => cdim.type === type)
      .map((cdim) => cdim.name);
  }

  private checkKey(key: PatternIndex): void {
    if (key.length !== this.combineDims.length) {
      throw new ShapeMismatchError(
        `Expected ${this.combineDims.length} coordinates, got ${key.length}`,
      );
    }
    this.combineDims.forEach((cdim, i) => {
      const c = key[i];
      const n = cdim.keys.length;
      if (!Number.isInteger(c) || c < 0 || c >= n) {
        throw new IndexError(
          `Coordinate ${c} out of range for "${cdim.name}" with ${n} keys`,
        );
      }
    });
  }

  private concatVal(cdim: ConcatDim, key: PatternIndex): DimVal {
    const file = key[this.combineDims.indexOf(cdim)];
    const nitems = cdim.nitemsPerFile;
    if (nitems === undefined) {
      return { position: file };
    }
    const subsetPos = this.combineDims.findIndex(
      (d) => d.type === "subset" && d.dim === cdim.name,
    );
    const subset = subsetPos === -1 ? undefined : this.combineDims[subsetPos];
    if (subset === undefined || subset.type !== "subset") {
      return {
        position: file,
        start: file * nitems,
        stop: (file + 1) * nitems,
      };
    }
    const segment = key[subsetPos];
    const pieces = divideChunk(nitems, subset.subsetFactor);
    const offset = pieces.slice(0, segment).reduce((a, b) => a + b, 0);
    const start = file * nitems + offset;
    return {
      position: file * subset.subsetFactor + segment,
      start,
      stop: start + pieces[segment],
    };
  }
}

/**
 * Smaller pattern for quick trial runs: merge and subset dims are kept, each
 * concat dim keeps only its first `nkeep` keys.
 */
export function prunePattern(pattern: FilePattern, nkeep = 2): FilePattern {
  assertPositiveInteger(nkeep, "nkeep");
  const dims = pattern.combineDims.map((cdim): CombineDim =>
    cdim.type === "concat"
      ? concatDim(cdim.name, cdim.keys.slice(0, nkeep), cdim.nitemsPerFile)
      : cdim,
  );
  return new FilePattern(pattern.formatFunction, ...dims);
}

/**
 * Pattern over an explicit list of files concatenated along `dim`.
 */
export function patternFromFileSequence(
  files: readonly string[],
  dim: string,
  nitemsPerFile?: number,
): FilePattern {
  const keys = files.map((_, i) => i);
  return new FilePattern(
    (formatKeys) => files[Number(formatKeys[dim])],
    concatDim(dim, keys, nitemsPerFile),
  );
}
