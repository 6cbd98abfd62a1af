// Unit tests for FlatL2Index

import { describe, it, expect } from "vitest";
import { FlatL2Index } from "./vector-index.js";

function sampleIndex(): FlatL2Index {
  const index = new FlatL2Index(2);
  index.add([
    [0, 0],
    [1, 0],
    [0, 1],
    [3, 3],
  ]);
  return index;
}

describe("FlatL2Index", () => {
  it("rejects a non-positive dimension", () => {
    expect(() => new FlatL2Index(0)).toThrow("Index dimension must be a positive integer, got 0");
  });

  it("returns nearest hits first with squared distances", () => {
    expect(sampleIndex().search([0, 0], 3)).toEqual([
      { index: 0, distance: 0 },
      { index: 1, distance: 1 },
      { index: 2, distance: 1 },
    ]);
  });

  it("keeps insertion order for equal distances", () => {
    const hits = sampleIndex().search([0.5, 0.5], 3);
    expect(hits.map((h) => h.index)).toEqual([0, 1, 2]);
  });

  it("caps k at the index size and floors fractional k", () => {
    const index = sampleIndex();
    expect(index.search([0, 0], 10)).toHaveLength(4);
    expect(index.search([0, 0], 2.7)).toHaveLength(2);
    expect(index.search([0, 0], 0)).toEqual([]);
  });

  it("returns nothing from an empty index", () => {
    expect(new FlatL2Index(3).search([1, 2, 3], 5)).toEqual([]);
  });

  it("rejects queries of the wrong dimension", () => {
    expect(() => sampleIndex().search([1], 1)).toThrow("Query has 1 dimensions, index expects 2");
  });

  it("adds nothing when any vector has the wrong dimension", () => {
    const index = sampleIndex();
    expect(() => index.add([[1, 1], [1]])).toThrow("Vector has 1 dimensions, index expects 2");
    expect(index.size).toBe(4);
  });

  it("copies vectors on insert", () => {
    const index = new FlatL2Index(1);
    const vector = [5];
    index.add([vector]);
    vector[0] = 0;
    expect(index.search([5], 1)).toEqual([{ index: 0, distance: 0 }]);
  });
});
