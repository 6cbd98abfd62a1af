// Wellness Retention Engine - Standard scaler
// Per-column standardization, (x - mean) / std, fitted on training rows and
// persisted next to the model that consumes it.

import type { ScalerArtifact } from "./types.js";

export class StandardScaler {
  readonly featureNames: readonly string[];
  readonly mean: readonly number[];
  readonly scale: readonly number[];

  constructor(featureNames: readonly string[], mean: readonly number[], scale: readonly number[]) {
    if (mean.length !== featureNames.length || scale.length !== featureNames.length) {
      throw new Error(
        `Scaler shape mismatch: ${featureNames.length} features, ${mean.length} means, ${scale.length} scales`,
      );
    }
    this.featureNames = featureNames;
    this.mean = mean;
    this.scale = scale;
  }

  /**
   * Fits column means and population standard deviations. Constant columns
   * get a scale of 1 so they transform to 0 instead of NaN.
   */
  static fit(rows: readonly (readonly number[])[], featureNames: readonly string[]): StandardScaler {
    if (rows.length === 0) {
      throw new Error("Cannot fit scaler on an empty dataset");
    }
    const width = featureNames.length;
    const mean = new Array<number>(width).fill(0);
    for (const row of rows) {
      if (row.length !== width) {
        throw new Error(`Expected ${width} features per row, got ${row.length}`);
      }
      for (let j = 0; j < width; j++) mean[j] += row[j];
    }
    for (let j = 0; j < width; j++) mean[j] /= rows.length;

    const variance = new Array<number>(width).fill(0);
    for (const row of rows) {
      for (let j = 0; j < width; j++) {
        const d = row[j] - mean[j];
        variance[j] += d * d;
      }
    }
    const scale = variance.map((v) => {
      const std = Math.sqrt(v / rows.length);
      return std === 0 ? 1 : std;
    });

    return new StandardScaler(featureNames, mean, scale);
  }

  static fromArtifact(artifact: ScalerArtifact): StandardScaler {
    return new StandardScaler(artifact.feature_names, artifact.mean, artifact.scale);
  }

  get dimension(): number {
    return this.featureNames.length;
  }

  transform(row: readonly number[]): number[] {
    if (row.length !== this.dimension) {
      throw new Error(`Scaler expects ${this.dimension} features, got ${row.length}`);
    }
    return row.map((x, j) => (x - this.mean[j]) / this.scale[j]);
  }

  toArtifact(): ScalerArtifact {
    return {
      feature_names: [...this.featureNames],
      mean: [...this.mean],
      scale: [...this.scale],
    };
  }
}
