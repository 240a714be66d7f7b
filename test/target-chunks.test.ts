import { describe, it, expect } from "vitest";
import {
  parseTargetChunks,
  parseTargetChunksJson,
  resolveTargetChunks,
} from "../src/config/target-chunks.js";
import { ConstructionError, ShapeMismatchError } from "../src/core/errors.js";

describe("Target chunk configuration", () => {
  describe("parseTargetChunks", () => {
    it("should accept chunk size and length pairs", () => {
      expect(parseTargetChunks({ time: [10, 365], lat: [90, 180] })).toEqual({
        time: [10, 365],
        lat: [90, 180],
      });
    });

    it("should reject non-positive or fractional sizes", () => {
      for (const size of [0, 1.5]) {
        expect(() => parseTargetChunks({ time: [size, 365] })).toThrow(
          ConstructionError,
        );
      }
    });

    it("should reject malformed entries", () => {
      expect(() => parseTargetChunks({ time: 10 })).toThrow(ConstructionError);
      expect(() => parseTargetChunks({ time: [10] })).toThrow(
        ConstructionError,
      );
      expect(() => parseTargetChunks(null)).toThrow(ConstructionError);
    });

    it("should name the offending dimension", () => {
      expect(() => parseTargetChunks({ time: [10, -1] })).toThrow(/time\.1/);
    });

    it("should reject integer dimension names", () => {
      expect(() => parseTargetChunks({ time: [1, 2], "0": [1, 2] })).toThrow(
        ConstructionError,
      );
    });
  });

  describe("parseTargetChunksJson", () => {
    it("should parse JSON text", () => {
      expect(parseTargetChunksJson('{"time":[2,4]}')).toEqual({ time: [2, 4] });
    });

    it("should reject invalid JSON", () => {
      expect(() => parseTargetChunksJson("not json")).toThrow(
        ConstructionError,
      );
    });

    it("should reject a __proto__ entry", () => {
      expect(() => parseTargetChunksJson('{"__proto__":[1,2]}')).toThrow(
        ConstructionError,
      );
    });
  });

  describe("resolveTargetChunks", () => {
    it("should fill unrequested dimensions with a single chunk", () => {
      expect(resolveTargetChunks({ time: 5 }, { time: 20, lat: 18 })).toEqual({
        time: [5, 20],
        lat: [18, 18],
      });
    });

    it("should reject requests for unknown dimensions", () => {
      expect(() => resolveTargetChunks({ lon: 5 }, { time: 20 })).toThrow(
        ShapeMismatchError,
      );
      const inherited = { constructor: 2 };
      expect(() => resolveTargetChunks(inherited, { time: 4 })).toThrow(
        ShapeMismatchError,
      );
    });

    it("should reject integer dimension names in the shape", () => {
      expect(() => resolveTargetChunks({}, { "1": 4 })).toThrow(
        ConstructionError,
      );
    });

    it("should reject non-positive chunk sizes", () => {
      expect(() => resolveTargetChunks({ time: 0 }, { time: 20 })).toThrow(
        ConstructionError,
      );
    });
  });
});
