import { describe, it, expect } from "vitest";
import { ConstructionError, IndexError } from "../src/core/errors.js";
import { Index } from "../src/core/position.js";
import { CombineOp } from "../src/core/types.js";

const time = { name: "time", operation: CombineOp.CONCAT };
const variable = { name: "variable", operation: CombineOp.MERGE };

describe("Index", () => {
  const index = new Index([
    [variable, { position: 1 }],
    [time, { position: 0, start: 0, stop: 10 }],
  ]);

  it("should look up entries by key", () => {
    expect(index.size).toBe(2);
    expect(index.get(time)).toEqual({ position: 0, start: 0, stop: 10 });
    expect(index.get(variable)).toEqual({ position: 1 });
    expect(index.has({ name: "time", operation: CombineOp.MERGE })).toBe(false);
  });

  it("should find concat keys by dimension name", () => {
    expect(index.findConcatDim("time")).toEqual(time);
    expect(index.findConcatDim("variable")).toBeUndefined();
    expect(index.findConcatDim("lat")).toBeUndefined();
  });

  it("should iterate in insertion order", () => {
    expect(index.keys()).toEqual([variable, time]);
    expect([...index].map(([key]) => key.name)).toEqual(["variable", "time"]);
  });

  it("should return a modified copy from with()", () => {
    const next = index.with(time, { position: 2, start: 4, stop: 6 });
    expect(next.get(time)).toEqual({ position: 2, start: 4, stop: 6 });
    expect(next.keys()).toEqual([variable, time]);
    expect(index.get(time)).toEqual({ position: 0, start: 0, stop: 10 });

    const lat = { name: "lat", operation: CombineOp.CONCAT };
    expect(index.with(lat, { position: 0, start: 0, stop: 3 }).keys()).toEqual([
      variable,
      time,
      lat,
    ]);
  });

  it("should compare by content, not order", () => {
    const reordered = new Index([
      [time, { position: 0, start: 0, stop: 10 }],
      [variable, { position: 1 }],
    ]);
    expect(reordered.equals(index)).toBe(true);
    const shorter = index.with(time, { position: 0, start: 0, stop: 9 });
    expect(shorter.equals(index)).toBe(false);
  });

  it("should reject malformed values", () => {
    const bad = [
      { position: 0, start: 3 },
      { position: 0, start: 3, stop: 3 },
      { position: 0, start: -1, stop: 3 },
      { position: -1 },
    ];
    for (const val of bad) {
      expect(() => new Index([[time, val]])).toThrow(IndexError);
    }
  });

  it("should reject duplicate keys", () => {
    expect(
      () =>
        new Index([
          [time, { position: 0 }],
          [{ name: "time", operation: CombineOp.CONCAT }, { position: 1 }],
        ]),
    ).toThrow(ConstructionError);
  });

  it("should format readably", () => {
    expect(index.toString()).toBe(
      "Index{merge:variable=(1), concat:time=(0, 0:10)}",
    );
  });
});
