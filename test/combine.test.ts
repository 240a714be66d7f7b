import { describe, it, expect } from "vitest";
import { ShapeMismatchError } from "../src/core/errors.js";
import { Index } from "../src/core/position.js";
import { CombineOp } from "../src/core/types.js";
import { NdFragment } from "../src/fragment/nd-fragment.js";
import { combineFragments } from "../src/rechunking/combine.js";
import type { IndexedFragment } from "../src/rechunking/combine.js";
import { chunkKeyToString, splitFragment } from "../src/rechunking/split.js";

const time = { name: "time", operation: CombineOp.CONCAT };
const lat = { name: "lat", operation: CombineOp.CONCAT };
const variable = { name: "variable", operation: CombineOp.MERGE };

const NT = 20;
const NLAT = 6;

const full = NdFragment.fromFunction(
  ["time", "lat"],
  [NT, NLAT],
  ([t, y]) => t * 10 + y,
);

/** Source fragments of uneven length along time, covering the full dataset. */
function sourceFragments(lengths: readonly number[]): IndexedFragment[] {
  const out: IndexedFragment[] = [];
  let start = 0;
  lengths.forEach((length, position) => {
    out.push({
      index: new Index([
        [variable, { position: 0 }],
        [time, { position, start, stop: start + length }],
      ]),
      fragment: full.isel({ time: { start, stop: start + length } }),
    });
    start += length;
  });
  return out;
}

function groupByChunk(
  fragments: readonly IndexedFragment[],
  targetChunks: Record<string, readonly [number, number]>,
): Map<string, IndexedFragment[]> {
  const groups = new Map<string, IndexedFragment[]>();
  for (const { index, fragment } of fragments) {
    for (const piece of splitFragment(index, fragment, targetChunks)) {
      const key = chunkKeyToString(piece.key);
      const group = groups.get(key) ?? [];
      group.push({ index: piece.index, fragment: piece.fragment });
      groups.set(key, group);
    }
  }
  return groups;
}

describe("combineFragments", () => {
  it("should rebuild every destination chunk in any arrival order", () => {
    const groups = groupByChunk(sourceFragments([3, 7, 4, 6]), {
      time: [5, NT],
    });
    expect([...groups.keys()].sort()).toEqual([
      "time=0",
      "time=1",
      "time=2",
      "time=3",
    ]);
    // [0, 5) gets [0, 3) and [3, 5)
    expect(groups.get("time=0")).toHaveLength(2);

    for (const [key, pieces] of groups) {
      const chunk = Number(key.split("=")[1]);
      const combined = combineFragments([...pieces].reverse());
      expect(combined.index.get(time)).toEqual({
        position: chunk,
        start: chunk * 5,
        stop: chunk * 5 + 5,
      });
      expect(combined.index.get(variable)).toEqual({ position: 0 });
      const expected = full.isel({
        time: { start: chunk * 5, stop: chunk * 5 + 5 },
      });
      expect(combined.fragment.toArray()).toEqual(expected.toArray());
    }
  });

  it("should reproduce the full dataset from the combined chunks", () => {
    const groups = groupByChunk(sourceFragments([2, 9, 1, 8]), {
      time: [3, NT],
      lat: [4, NLAT],
    });
    // time has 7 chunks; lat is not in the fragment indexes and is not split
    expect(groups.size).toBe(7);

    const startOf = (c: IndexedFragment) => c.index.get(time)?.start ?? 0;
    const chunks = [...groups.values()]
      .map((pieces) => combineFragments(pieces))
      .sort((a, b) => startOf(a) - startOf(b));
    const rebuilt = NdFragment.concat(
      chunks.map((c) => c.fragment),
      "time",
    );
    expect(rebuilt.shape).toEqual([NT, NLAT]);
    expect(rebuilt.toArray()).toEqual(full.toArray());
  });

  it("should combine pieces split along two dimensions", () => {
    const index = new Index([
      [time, { position: 0, start: 0, stop: NT }],
      [lat, { position: 0, start: 0, stop: NLAT }],
    ]);
    const pieces = [
      ...splitFragment(index, full, { time: [8, NT], lat: [4, NLAT] }),
    ];
    expect(pieces).toHaveLength(6);

    const combined = combineFragments(
      pieces.map(({ index, fragment }) => ({ index, fragment })),
    );
    expect(combined.index.get(time)).toEqual({
      position: 0,
      start: 0,
      stop: NT,
    });
    expect(combined.index.get(lat)).toEqual({
      position: 0,
      start: 0,
      stop: NLAT,
    });
    expect(combined.fragment.toArray()).toEqual(full.toArray());
  });

  it("should regroup sources tiled along two dimensions", () => {
    // time [0, 7) and [7, 20) crossed with lat [0, 4) and [4, 6)
    const timeCuts = [
      { start: 0, stop: 7 },
      { start: 7, stop: NT },
    ];
    const latCuts = [
      { start: 0, stop: 4 },
      { start: 4, stop: NLAT },
    ];
    const sources: IndexedFragment[] = [];
    timeCuts.forEach((t, i) => {
      latCuts.forEach((y, j) => {
        sources.push({
          index: new Index([
            [time, { position: i, ...t }],
            [lat, { position: j, ...y }],
          ]),
          fragment: full.isel({ time: t, lat: y }),
        });
      });
    });

    const groups = groupByChunk([...sources].reverse(), {
      time: [5, NT],
      lat: [3, NLAT],
    });
    expect(groups.size).toBe(8);
    // [5, 10) x [3, 6) takes a piece from every source
    expect(groups.get("time=1,lat=1")).toHaveLength(4);

    for (const pieces of groups.values()) {
      const combined = combineFragments([...pieces].reverse());
      const tc = combined.index.get(time)?.position ?? -1;
      const lc = combined.index.get(lat)?.position ?? -1;
      const tRange = { start: tc * 5, stop: tc * 5 + 5 };
      const yRange = { start: lc * 3, stop: lc * 3 + 3 };
      expect(combined.index.get(time)).toEqual({ position: tc, ...tRange });
      expect(combined.index.get(lat)).toEqual({ position: lc, ...yRange });
      expect(combined.fragment.toArray()).toEqual(
        full.isel({ time: tRange, lat: yRange }).toArray(),
      );
    }
  });

  it("should detect gaps", () => {
    const [a, , c] = sourceFragments([2, 2, 2]);
    expect(() => combineFragments([a, c])).toThrow(ShapeMismatchError);
  });

  it("should detect overlaps", () => {
    const [a] = sourceFragments([4]);
    const b: IndexedFragment = {
      index: new Index([
        [variable, { position: 0 }],
        [time, { position: 0, start: 2, stop: 6 }],
      ]),
      fragment: full.isel({ time: { start: 2, stop: 6 } }),
    };
    expect(() => combineFragments([a, b])).toThrow(ShapeMismatchError);
  });

  it("should refuse pieces from different merge positions", () => {
    const [a, b] = sourceFragments([2, 2]);
    const other: IndexedFragment = {
      index: b.index.with(variable, { position: 1 }),
      fragment: b.fragment,
    };
    expect(() => combineFragments([a, other])).toThrow(ShapeMismatchError);
  });

  it("should refuse an empty group", () => {
    expect(() => combineFragments([])).toThrow(ShapeMismatchError);
  });
});
