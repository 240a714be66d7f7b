/**
 * Combine dimensions of a file pattern.
 *
 * - concat: files are concatenated along the dimension
 * - merge: files hold distinct variables
 * - subset: each addressed file is further divided into segments
 */

import {
  ConstructionError,
  assertDimensionName,
  assertPositiveInteger,
} from "../core/errors.js";
import type { PatternKey } from "../core/types.js";

export interface ConcatDim {
  type: "concat";
  /** Dimension name; should match the dimension name inside the files. */
  name: string;
  keys: readonly PatternKey[];
  /** Items per file along this dimension, when all files hold the same. */
  nitemsPerFile?: number;
}

export interface MergeDim {
  type: "merge";
  name: string;
  keys: readonly PatternKey[];
}

export interface SubsetDim {
  type: "subset";
  /** Always `${dim}_subset`. */
  name: string;
  /** Dimension being subset inside each file. */
  dim: string;
  subsetFactor: number;
  keys: readonly number[];
}

export type CombineDim = ConcatDim | MergeDim | SubsetDim;

function checkKeys(
  name: string,
  keys: readonly PatternKey[],
): readonly PatternKey[] {
  assertDimensionName(name);
  if (keys.length === 0) {
    throw new ConstructionError(`Combine dimension "${name}" has no keys`);
  }
  return Object.freeze([...keys]);
}

export function concatDim(
  name: string,
  keys: readonly PatternKey[],
  nitemsPerFile?: number,
): ConcatDim {
  if (nitemsPerFile !== undefined) {
    assertPositiveInteger(nitemsPerFile, `nitemsPerFile of "${name}"`);
  }
  const dim: ConcatDim = { type: "concat", name, keys: checkKeys(name, keys) };
  if (nitemsPerFile !== undefined) {
    dim.nitemsPerFile = nitemsPerFile;
  }
  return Object.freeze(dim);
}

export function mergeDim(name: string, keys: readonly PatternKey[]): MergeDim {
  const dim: MergeDim = { type: "merge", name, keys: checkKeys(name, keys) };
  return Object.freeze(dim);
}

export function subsetDim(dim: string, subsetFactor: number): SubsetDim {
  assertDimensionName(dim);
  assertPositiveInteger(subsetFactor, `Subset factor of "${dim}"`);
  const subset: SubsetDim = {
    type: "subset",
    name: `${dim}_subset`,
    dim,
    subsetFactor,
    keys: Object.freeze(Array.from({ length: subsetFactor }, (_, i) => i)),
  };
  return Object.freeze(subset);
}
