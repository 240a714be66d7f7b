/**
 * Target chunk configuration.
 *
 * Accepts `{ "<dim>": [chunkSize, totalLength] }`, e.g.
 * `{ "time": [10, 365], "lat": [90, 180] }`. Entry order is the order of the
 * dimensions in every chunk key, so dimension names may not be integers.
 */

import { z } from "zod";
import {
  ConstructionError,
  ShapeMismatchError,
  assertDimensionName,
  assertPositiveInteger,
  isDimensionName,
} from "../core/errors.js";
import type { TargetChunks } from "../core/types.js";
import { ownValue } from "../core/util.js";

const positiveInt = z.number().int().positive();

const dimensionName = z.string().refine(isDimensionName, {
  message: 'Dimension names may not be integers or "__proto__"',
});

export const targetChunksSchema = z.record(
  dimensionName,
  z.tuple([positiveInt, positiveInt]),
);

/**
 * Validate a target chunk object.
 */
export function parseTargetChunks(value: unknown): TargetChunks {
  const result = targetChunksSchema.safeParse(value);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`)
      .join("; ");
    throw new ConstructionError(`Invalid target chunks: ${issues}`);
  }
  return result.data;
}

/**
 * Parse target chunk JSON text.
 */
export function parseTargetChunksJson(text: string): TargetChunks {
  let obj: unknown;
  try {
    obj = JSON.parse(text);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ConstructionError(`Target chunks are not valid JSON: ${reason}`);
  }
  return parseTargetChunks(obj);
}

/**
 * Fill in a chunk request against a dataset shape. Dimensions the request
 * leaves out become a single chunk.
 */
export function resolveTargetChunks(
  requested: Readonly<Record<string, number>>,
  shape: Readonly<Record<string, number>>,
): TargetChunks {
  for (const dim of Object.keys(requested)) {
    if (!Object.hasOwn(shape, dim)) {
      const known = Object.keys(shape).join(", ");
      throw new ShapeMismatchError(
        `Chunk size requested for "${dim}", which is not in [${known}]`,
      );
    }
  }
  const resolved: Record<string, readonly [number, number]> = {};
  for (const [dim, length] of Object.entries(shape)) {
    assertDimensionName(dim);
    const chunkSize = ownValue(requested, dim) ?? length;
    assertPositiveInteger(chunkSize, `Chunk size of "${dim}"`);
    assertPositiveInteger(length, `Length of "${dim}"`);
    resolved[dim] = [chunkSize, length];
  }
  return resolved;
}
