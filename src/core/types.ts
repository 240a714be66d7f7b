/**
 * Core type definitions shared by the chunk grid, pattern and splitter.
 */

/** Half-open `[start, stop)` range. Only unit steps are supported. */
export interface ArraySlice {
  start: number;
  stop: number;
  step?: number;
}

/** Kind of combine operation a positional key refers to. */
export enum CombineOp {
  MERGE = "merge",
  CONCAT = "concat",
  SUBSET = "subset",
}

/** Key of one entry of an {@link Index}. */
export interface DimKey {
  name: string;
  operation: CombineOp;
}

/**
 * Placement of a fragment along one dimension.
 *
 * `start` / `stop` are global array indices along a concat dimension and are
 * absent until the fragment's extent is known.
 */
export interface DimVal {
  position: number;
  start?: number;
  stop?: number;
}

/** How to subset an opened file along one dimension. */
export interface SubsetSpec {
  dimName: string;
  thisSegment: number;
  totalSegments: number;
}

/** How to open one file of a pattern. */
export interface OpenSpec {
  fname: string;
  subsets: SubsetSpec[];
}

/** Opaque key of a merge or concat dimension. */
export type PatternKey = string | number;

/** Target chunking: `[chunkSize, totalLength]` per dimension. */
export type TargetChunks = Readonly<
  Record<string, readonly [chunkSize: number, totalLength: number]>
>;

/** Destination chunk coordinates, one `[dim, chunk]` pair per split dim. */
export type ChunkKey = ReadonlyArray<readonly [dim: string, chunk: number]>;
