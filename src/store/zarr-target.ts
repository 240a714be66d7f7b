/**
 * ZarrTarget - writes combined fragments into a Zarr v3 array.
 *
 * The array is laid out with the target chunk specification, so every
 * combined destination chunk lands on exactly one stored chunk.
 */

import * as zarr from "zarrita";
import type { Mutable } from "zarrita";
import { ShapeMismatchError, assertDimensionName } from "../core/errors.js";
import type { Index } from "../core/position.js";
import type { TargetChunks } from "../core/types.js";
import { ownValue } from "../core/util.js";
import { NdFragment } from "../fragment/nd-fragment.js";
import { globalRanges } from "../rechunking/combine.js";

/**
 * Options for creating a ZarrTarget.
 */
export interface ZarrTargetOptions {
  /** Value of unwritten positions (default: 0) */
  fillValue?: number;
  /** Extra array attributes */
  attributes?: Record<string, unknown>;
  /** Log every write to the console (default: false) */
  verbose?: boolean;
}

/**
 * @example
 * ```typescript
 * const target = await ZarrTarget.create(new Map(), "foo", ["time", "lat"], {
 *   time: [2, 10],
 *   lat: [9, 18],
 * });
 * for (const piece of pieces) {
 *   await target.write(piece.index, piece.fragment);
 * }
 * ```
 */
export class ZarrTarget {
  readonly dims: readonly string[];
  private readonly array: zarr.Array<"float64", Mutable>;
  private readonly verbose: boolean;

  private constructor(
    dims: readonly string[],
    array: zarr.Array<"float64", Mutable>,
    verbose: boolean,
  ) {
    this.dims = dims;
    this.array = array;
    this.verbose = verbose;
  }

  /**
   * Create the array at `path` in `store`, one dimension per entry of `dims`.
   */
  static async create(
    store: Mutable,
    path: string,
    dims: readonly string[],
    targetChunks: TargetChunks,
    options: ZarrTargetOptions = {},
  ): Promise<ZarrTarget> {
    const shape: number[] = [];
    const chunkShape: number[] = [];
    for (const dim of dims) {
      assertDimensionName(dim);
      const spec = ownValue(targetChunks, dim);
      if (spec === undefined) {
        throw new ShapeMismatchError(`No target chunks for dimension "${dim}"`);
      }
      chunkShape.push(spec[0]);
      shape.push(spec[1]);
    }

    const location = zarr.root(store).resolve(path);
    const array = await zarr.create(location, {
      shape,
      chunk_shape: chunkShape,
      data_type: "float64",
      fill_value: options.fillValue ?? 0,
      attributes: { ...options.attributes, _ARRAY_DIMENSIONS: [...dims] },
    });
    return new ZarrTarget(dims, array, options.verbose ?? false);
  }

  get shape(): readonly number[] {
    return this.array.shape;
  }

  get chunks(): readonly number[] {
    return this.array.chunks;
  }

  /**
   * Write `fragment` into the region its index describes.
   */
  async write(index: Index, fragment: NdFragment): Promise<void> {
    const dimsMatch =
      fragment.dims.length === this.dims.length &&
      fragment.dims.every((dim, i) => dim === this.dims[i]);
    if (!dimsMatch) {
      throw new ShapeMismatchError(
        `Fragment dims [${fragment.dims.join(", ")}] do not match ` +
          `target dims [${this.dims.join(", ")}]`,
      );
    }

    const ranges = globalRanges({ index, fragment });
    const selection = ranges.map((r) => zarr.slice(r.start, r.stop));
    if (this.verbose) {
      const region = ranges
        .map((r, i) => `${this.dims[i]}=${r.start}:${r.stop}`)
        .join(", ");
      console.log(`[ZarrTarget.write] ${this.array.path} [${region}]`);
    }
    await zarr.set(this.array, selection, fragment.chunk);
  }

  /**
   * Read the whole array back.
   */
  async read(): Promise<NdFragment> {
    const chunk = await zarr.get(this.array, null);
    const data = Float64Array.from(chunk.data);
    return new NdFragment(this.dims, data, chunk.shape);
  }
}
