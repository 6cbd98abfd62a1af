// Wellness Retention Engine - K-means
// Lloyd's algorithm with k-means++ seeding. Small, deterministic for a given
// seed, and persisted as plain centroids so that inference is a nearest-centroid
// lookup.

import type { KMeansArtifact } from "./types.js";
import { createSeededRandom, euclideanDistance, squaredL2Distance } from "./utils.js";

export interface KMeansFitOptions {
  k: number;
  seed?: number;
  maxIterations?: number;
  /** Convergence threshold on the summed squared centroid shift. */
  tolerance?: number;
  /** Independent restarts; the run with the lowest inertia wins. */
  nInit?: number;
}

interface RunResult {
  centers: number[][];
  inertia: number;
  iterations: number;
}

export class KMeans {
  readonly featureNames: readonly string[];
  readonly centers: readonly (readonly number[])[];
  readonly inertia: number | undefined;

  constructor(featureNames: readonly string[], centers: readonly (readonly number[])[], inertia?: number) {
    if (centers.length === 0) {
      throw new Error("KMeans requires at least one cluster center");
    }
    for (const center of centers) {
      if (center.length !== featureNames.length) {
        throw new Error(`Cluster center has ${center.length} dimensions, expected ${featureNames.length}`);
      }
    }
    this.featureNames = featureNames;
    this.centers = centers;
    this.inertia = inertia;
  }

  static fit(
    rows: readonly (readonly number[])[],
    featureNames: readonly string[],
    options: KMeansFitOptions,
  ): KMeans {
    const { k, seed = 42, maxIterations = 300, tolerance = 1e-4, nInit = 10 } = options;

    if (!Number.isInteger(k) || k < 1) {
      throw new Error(`k must be a positive integer, got ${k}`);
    }
    if (rows.length < k) {
      throw new Error(`Need at least ${k} rows to fit ${k} clusters, got ${rows.length}`);
    }
    for (const row of rows) {
      if (row.length !== featureNames.length) {
        throw new Error(`Expected ${featureNames.length} features per row, got ${row.length}`);
      }
    }

    const random = createSeededRandom(seed);
    let best: RunResult | null = null;
    for (let run = 0; run < Math.max(1, nInit); run++) {
      const result = runLloyd(rows, seedCenters(rows, k, random), maxIterations, tolerance);
      if (best === null || result.inertia < best.inertia) {
        best = result;
      }
    }

    // nInit >= 1 guarantees a result
    if (best === null) throw new Error("KMeans produced no result");
    // Cluster ids follow the sorted centers, not the order a restart happened to find them in.
    return new KMeans(featureNames, [...best.centers].sort(compareCenters), best.inertia);
  }

  static fromArtifact(artifact: KMeansArtifact): KMeans {
    return new KMeans(artifact.feature_names, artifact.cluster_centers, artifact.inertia);
  }

  get clusterCount(): number {
    return this.centers.length;
  }

  get dimension(): number {
    return this.featureNames.length;
  }

  /** Index of the nearest center; ties resolve to the lowest index. */
  predict(row: readonly number[]): number {
    return nearestCenter(row, this.centers).index;
  }

  /** Euclidean distance from the row to every center, in center order. */
  transform(row: readonly number[]): number[] {
    return this.centers.map((center) => euclideanDistance(row, center));
  }

  toArtifact(): KMeansArtifact {
    const artifact: KMeansArtifact = {
      n_clusters: this.clusterCount,
      feature_names: [...this.featureNames],
      cluster_centers: this.centers.map((c) => [...c]),
    };
    if (this.inertia !== undefined) {
      artifact.inertia = this.inertia;
    }
    return artifact;
  }
}

// ─── Internals ──────────────────────────────────────────────────────────────────

/** Lexicographic order over coordinates. */
function compareCenters(a: readonly number[], b: readonly number[]): number {
  for (let j = 0; j < a.length; j++) {
    if (a[j] !== b[j]) return a[j] - b[j];
  }
  return 0;
}

function nearestCenter(
  row: readonly number[],
  centers: readonly (readonly number[])[],
): { index: number; distance: number } {
  let index = 0;
  let distance = Infinity;
  for (let c = 0; c < centers.length; c++) {
    const d = squaredL2Distance(row, centers[c]);
    if (d < distance) {
      distance = d;
      index = c;
    }
  }
  return { index, distance };
}

/**
 * k-means++: each further center is drawn with probability proportional to
 * its squared distance from the centers chosen so far.
 */
function seedCenters(rows: readonly (readonly number[])[], k: number, random: () => number): number[][] {
  const centers: number[][] = [[...rows[Math.floor(random() * rows.length)]]];

  while (centers.length < k) {
    const weights = rows.map((row) => nearestCenter(row, centers).distance);
    const total = weights.reduce((sum, w) => sum + w, 0);

    let chosen = rows.length - 1;
    if (total === 0) {
      chosen = Math.floor(random() * rows.length);
    } else {
      let target = random() * total;
      for (let i = 0; i < rows.length; i++) {
        target -= weights[i];
        if (target < 0) {
          chosen = i;
          break;
        }
      }
    }
    centers.push([...rows[chosen]]);
  }

  return centers;
}

function runLloyd(
  rows: readonly (readonly number[])[],
  initial: number[][],
  maxIterations: number,
  tolerance: number,
): RunResult {
  const k = initial.length;
  const width = initial[0].length;
  let centers = initial;
  let iterations = 0;

  while (iterations < maxIterations) {
    iterations++;
    const assignments = rows.map((row) => nearestCenter(row, centers));

    const sums = Array.from({ length: k }, () => new Array<number>(width).fill(0));
    const counts = new Array<number>(k).fill(0);
    assignments.forEach(({ index }, i) => {
      counts[index]++;
      for (let j = 0; j < width; j++) sums[index][j] += rows[i][j];
    });

    // Empty clusters take the point currently worst served by its center.
    const spare = assignments.map((a) => a.distance);
    const next = sums.map((sum, c) => {
      if (counts[c] > 0) return sum.map((s) => s / counts[c]);
      let far = 0;
      for (let i = 1; i < spare.length; i++) {
        if (spare[i] > spare[far]) far = i;
      }
      spare[far] = -1;
      return [...rows[far]];
    });

    const shift = next.reduce((total, center, c) => total + squaredL2Distance(center, centers[c]), 0);
    centers = next;
    if (shift <= tolerance) break;
  }

  const inertia = rows.reduce((total, row) => total + nearestCenter(row, centers).distance, 0);
  return { centers, inertia, iterations };
}
