// Wellness Retention Engine - Flat L2 vector index
// Exact nearest-neighbour search by brute force. The catalog is a few hundred
// items at most, so a scan per query is all the index needs to be.

import { squaredL2Distance } from "./utils.js";

export interface SearchHit {
  /** Insertion position of the matched vector. */
  index: number;
  /** Squared Euclidean distance to the query. */
  distance: number;
}

export class FlatL2Index {
  readonly dimension: number;
  private readonly vectors: number[][] = [];

  constructor(dimension: number) {
    if (!Number.isInteger(dimension) || dimension < 1) {
      throw new Error(`Index dimension must be a positive integer, got ${dimension}`);
    }
    this.dimension = dimension;
  }

  get size(): number {
    return this.vectors.length;
  }

  /** Adds vectors atomically: nothing is added if any has the wrong dimension. */
  add(vectors: readonly (readonly number[])[]): void {
    for (const vector of vectors) {
      if (vector.length !== this.dimension) {
        throw new Error(`Vector has ${vector.length} dimensions, index expects ${this.dimension}`);
      }
    }
    for (const vector of vectors) {
      this.vectors.push([...vector]);
    }
  }

  /**
   * Returns up to k hits, nearest first. Equal distances keep insertion order.
   */
  search(query: readonly number[], k: number): SearchHit[] {
    if (query.length !== this.dimension) {
      throw new Error(`Query has ${query.length} dimensions, index expects ${this.dimension}`);
    }
    if (k <= 0 || this.vectors.length === 0) return [];

    const hits = this.vectors.map((vector, index) => ({
      index,
      distance: squaredL2Distance(query, vector),
    }));
    hits.sort((a, b) => a.distance - b.distance || a.index - b.index);
    return hits.slice(0, Math.min(Math.floor(k), hits.length));
  }
}
