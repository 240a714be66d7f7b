/**
 * rechunk-js - regroup dataset fragments onto a target chunk grid.
 *
 * Fragments are addressed by a file pattern, tagged with their position in
 * the full dataset, and split into pieces aligned with the target chunks.
 *
 * @packageDocumentation
 */

// Chunk grids
export { ChunkAxis } from "./core/chunk-axis.js";
export { ChunkGrid } from "./core/chunk-grid.js";

// Positional index
export { Index } from "./core/position.js";

// Core types
export { CombineOp } from "./core/types.js";
export type {
  ArraySlice,
  ChunkKey,
  DimKey,
  DimVal,
  OpenSpec,
  PatternKey,
  SubsetSpec,
  TargetChunks,
} from "./core/types.js";

// Errors
export {
  RechunkError,
  IndexError,
  ShapeMismatchError,
  ConstructionError,
  isDimensionName,
} from "./core/errors.js";

// File patterns
export { concatDim, mergeDim, subsetDim } from "./pattern/combine-dims.js";
export type {
  CombineDim,
  ConcatDim,
  MergeDim,
  SubsetDim,
} from "./pattern/combine-dims.js";
export {
  FilePattern,
  prunePattern,
  patternFromFileSequence,
  subsetRange,
  makeSubsetSpec,
} from "./pattern/file-pattern.js";
export type {
  FormatFunction,
  FormatKeys,
  PatternIndex,
} from "./pattern/file-pattern.js";

// Splitting and combining
export {
  planSplit,
  splitFragment,
  chunkKeyToString,
} from "./rechunking/split.js";
export type {
  FragmentSelection,
  SliceableFragment,
  SplitPiece,
  SplitPlan,
} from "./rechunking/split.js";
export { combineFragments, globalRanges } from "./rechunking/combine.js";
export type { IndexedFragment } from "./rechunking/combine.js";
export { NdFragment } from "./fragment/nd-fragment.js";

// Configuration
export {
  targetChunksSchema,
  parseTargetChunks,
  parseTargetChunksJson,
  resolveTargetChunks,
} from "./config/target-chunks.js";

// Zarr output
export { ZarrTarget } from "./store/zarr-target.js";
export type { ZarrTargetOptions } from "./store/zarr-target.js";
