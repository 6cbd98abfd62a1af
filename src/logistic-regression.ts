// Wellness Retention Engine - Logistic regression
// Binary classifier for churn risk. Trained with full-batch gradient descent
// on L2-regularized log-loss; inference is sigmoid(w·x + b).

import type { LogisticRegressionArtifact } from "./types.js";
import { dot, sigmoid } from "./utils.js";

export interface LogisticRegressionFitOptions {
  learningRate?: number;
  epochs?: number;
  /** L2 penalty on the weights (the intercept is not penalized). */
  l2?: number;
}

export class LogisticRegression {
  readonly featureNames: readonly string[];
  readonly coefficients: readonly number[];
  readonly intercept: number;

  constructor(featureNames: readonly string[], coefficients: readonly number[], intercept: number) {
    if (coefficients.length !== featureNames.length) {
      throw new Error(
        `Expected ${featureNames.length} coefficients, got ${coefficients.length}`,
      );
    }
    this.featureNames = featureNames;
    this.coefficients = coefficients;
    this.intercept = intercept;
  }

  static fit(
    rows: readonly (readonly number[])[],
    labels: readonly number[],
    featureNames: readonly string[],
    options: LogisticRegressionFitOptions = {},
  ): LogisticRegression {
    const { learningRate = 0.1, epochs = 2000, l2 = 0.01 } = options;

    if (rows.length === 0) {
      throw new Error("Cannot fit logistic regression on an empty dataset");
    }
    if (rows.length !== labels.length) {
      throw new Error(`Got ${rows.length} rows but ${labels.length} labels`);
    }
    if (labels.some((y) => y !== 0 && y !== 1)) {
      throw new Error("Labels must be 0 or 1");
    }
    if (!labels.includes(0) || !labels.includes(1)) {
      throw new Error("Training data must contain both classes");
    }

    const width = featureNames.length;
    const n = rows.length;
    const weights = new Array<number>(width).fill(0);
    let bias = 0;

    for (let epoch = 0; epoch < epochs; epoch++) {
      const gradW = new Array<number>(width).fill(0);
      let gradB = 0;
      for (let i = 0; i < n; i++) {
        const row = rows[i];
        if (row.length !== width) {
          throw new Error(`Expected ${width} features per row, got ${row.length}`);
        }
        const error = sigmoid(dot(weights, row) + bias) - labels[i];
        for (let j = 0; j < width; j++) gradW[j] += error * row[j];
        gradB += error;
      }
      for (let j = 0; j < width; j++) {
        weights[j] -= learningRate * (gradW[j] / n + l2 * weights[j]);
      }
      bias -= learningRate * (gradB / n);
    }

    return new LogisticRegression(featureNames, weights, bias);
  }

  static fromArtifact(artifact: LogisticRegressionArtifact): LogisticRegression {
    return new LogisticRegression(artifact.feature_names, artifact.coefficients, artifact.intercept);
  }

  get dimension(): number {
    return this.featureNames.length;
  }

  /** Probability of the positive class (1). */
  predictProba(row: readonly number[]): number {
    return sigmoid(dot(this.coefficients, row) + this.intercept);
  }

  predict(row: readonly number[], threshold = 0.5): 0 | 1 {
    return this.predictProba(row) >= threshold ? 1 : 0;
  }

  toArtifact(): LogisticRegressionArtifact {
    return {
      feature_names: [...this.featureNames],
      coefficients: [...this.coefficients],
      intercept: this.intercept,
    };
  }
}
