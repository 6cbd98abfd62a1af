// Wellness Retention Engine - Model training
//
// Fits the clustering and churn artifacts from a labelled set of user
// snapshots and writes them where UserClusterer / ChurnPredictor load them.

import {
  CLUSTER_INFO_FILE,
  CLUSTERING_DIR,
  CLUSTERING_SCALER_FILE,
  KMEANS_MODEL_FILE,
} from "./user-clusterer.js";
import { CHURN_DIR, CHURN_MODEL_FILE, CHURN_SCALER_FILE } from "./churn-predictor.js";
import {
  CHURN_FEATURES,
  CLUSTERING_FEATURES,
  prepareChurnFeatures,
  prepareClusteringFeatures,
} from "./feature-prep.js";
import { KMeans, type KMeansFitOptions } from "./kmeans.js";
import { LogisticRegression, type LogisticRegressionFitOptions } from "./logistic-regression.js";
import { isClusterInfo, isKMeansArtifact, type ModelLoader } from "./model-loader.js";
import { StandardScaler } from "./standard-scaler.js";
import type {
  ChurnPredictionRequest,
  ClusterInfo,
  KMeansArtifact,
  LogisticRegressionArtifact,
  ScalerArtifact,
  ServiceLogger,
  UserBehaviorData,
} from "./types.js";
import { roundTo } from "./utils.js";

/** One user snapshot: every clustering and churn feature plus the churn label. */
export type TrainingRecord = UserBehaviorData & Omit<ChurnPredictionRequest, "user_id"> & { churned: boolean };

export interface ClusteringTrainingResult {
  scaler: ScalerArtifact;
  model: KMeansArtifact;
  /** Number of records assigned to each cluster. */
  clusterSizes: number[];
}

export interface ChurnTrainingResult {
  scaler: ScalerArtifact;
  model: LogisticRegressionArtifact;
  /** Fraction of training records classified correctly at threshold 0.5. */
  trainingAccuracy: number;
}

export function trainClusteringModel(
  records: readonly TrainingRecord[],
  options: Partial<KMeansFitOptions> = {},
): ClusteringTrainingResult {
  const raw = records.map(prepareClusteringFeatures);
  const scaler = StandardScaler.fit(raw, CLUSTERING_FEATURES);
  const scaled = raw.map((row) => scaler.transform(row));
  const model = KMeans.fit(scaled, CLUSTERING_FEATURES, { k: 4, seed: 42, ...options });

  const clusterSizes = new Array<number>(model.clusterCount).fill(0);
  for (const row of scaled) clusterSizes[model.predict(row)]++;

  return { scaler: scaler.toArtifact(), model: model.toArtifact(), clusterSizes };
}

export function trainChurnModel(
  records: readonly TrainingRecord[],
  options: LogisticRegressionFitOptions = {},
): ChurnTrainingResult {
  const raw = records.map(prepareChurnFeatures);
  const labels = records.map((r) => (r.churned ? 1 : 0));
  const scaler = StandardScaler.fit(raw, CHURN_FEATURES);
  const scaled = raw.map((row) => scaler.transform(row));
  const model = LogisticRegression.fit(scaled, labels, CHURN_FEATURES, options);

  const correct = scaled.filter((row, i) => model.predict(row) === labels[i]).length;
  return {
    scaler: scaler.toArtifact(),
    model: model.toArtifact(),
    trainingAccuracy: roundTo(correct / scaled.length, 4),
  };
}

/** Placeholder descriptions for clusters nobody has named yet. */
export function defaultClusterInfo(clusterCount: number): ClusterInfo {
  const clusters: ClusterInfo["clusters"] = {};
  for (let i = 0; i < clusterCount; i++) {
    clusters[String(i)] = { name: `Cluster ${i}`, description: "Behavioral segment awaiting review" };
  }
  return { clusters };
}

/** Largest per-coordinate drift at which two centroid sets still count as the same clusters. */
export const CENTER_MATCH_TOLERANCE = 1e-6;

function sameCenters(previous: KMeansArtifact, next: KMeansArtifact): boolean {
  return (
    previous.cluster_centers.length === next.cluster_centers.length &&
    previous.cluster_centers.every(
      (center, c) =>
        center.length === next.cluster_centers[c].length &&
        center.every((value, j) => Math.abs(value - next.cluster_centers[c][j]) <= CENTER_MATCH_TOLERANCE),
    )
  );
}

/**
 * Writes all artifacts under the models root. cluster_info.json names are
 * curated by hand against specific centroids, so an existing file is kept
 * only when it covers every cluster and the previous k-means model has the
 * same centers as the new one. Otherwise it is replaced with placeholder names.
 */
export async function writeArtifacts(
  modelsRoot: ModelLoader,
  clustering: ClusteringTrainingResult,
  churn: ChurnTrainingResult,
  logger: ServiceLogger,
): Promise<void> {
  const clusteringLoader = modelsRoot.child(CLUSTERING_DIR);
  const churnLoader = modelsRoot.child(CHURN_DIR);

  const writes: Array<[ModelLoader, string, unknown]> = [
    [clusteringLoader, KMEANS_MODEL_FILE, clustering.model],
    [clusteringLoader, CLUSTERING_SCALER_FILE, clustering.scaler],
    [churnLoader, CHURN_MODEL_FILE, churn.model],
    [churnLoader, CHURN_SCALER_FILE, churn.scaler],
  ];

  const existingInfo = (await clusteringLoader.exists(CLUSTER_INFO_FILE))
    ? await clusteringLoader.loadJson(CLUSTER_INFO_FILE, isClusterInfo)
    : null;

  let keepNames = false;
  if (existingInfo !== null) {
    const previousModel = (await clusteringLoader.exists(KMEANS_MODEL_FILE))
      ? await clusteringLoader.loadJson(KMEANS_MODEL_FILE, isKMeansArtifact)
      : null;
    const coversAll = Array.from({ length: clustering.model.n_clusters }, (_, i) => String(i)).every(
      (id) => id in existingInfo.clusters,
    );
    if (!coversAll) {
      logger.warn(`${CLUSTER_INFO_FILE} does not name every cluster; writing placeholder names`);
    } else if (previousModel === null || !sameCenters(previousModel, clustering.model)) {
      logger.warn(`Cluster centers changed; writing placeholder names over ${CLUSTER_INFO_FILE}`);
    } else {
      keepNames = true;
    }
  }

  if (keepNames) {
    logger.info(`Keeping existing ${CLUSTER_INFO_FILE}`);
  } else {
    writes.push([clusteringLoader, CLUSTER_INFO_FILE, defaultClusterInfo(clustering.model.n_clusters)]);
  }

  for (const [loader, file, data] of writes) {
    if (!(await loader.saveJson(file, data))) {
      throw new Error(`Failed to write ${loader.resolve(file)}`);
    }
  }
}

/** Parses an integer command-line value, rejecting anything below `min`. */
export function parseIntegerOption(value: string, flag: string, min: number): number {
  const parsed = Number(value);
  if (value.trim() === "" || !Number.isInteger(parsed) || parsed < min) {
    throw new Error(`${flag} must be an integer >= ${min}, got "${value}"`);
  }
  return parsed;
}

// ─── Dataset parsing ────────────────────────────────────────────────────────────

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

const NUMERIC_FIELDS = [
  "session_count",
  "avg_session_duration",
  "streak_length",
  "content_engagement_rate",
  "days_since_signup",
  "total_sessions",
  "last_login_days_ago",
  "content_completion_rate",
  "notification_response_rate",
  "goal_progress_percentage",
] as const;

/**
 * Validates a parsed dataset file: an array of training records. Errors name
 * the offending record index.
 */
export function parseTrainingRecords(data: unknown): TrainingRecord[] {
  if (!Array.isArray(data)) {
    throw new Error("Training data must be a JSON array of user records");
  }
  return data.map((entry, index): TrainingRecord => {
    if (!isRecord(entry)) {
      throw new Error(`Record ${index} is not an object`);
    }
    const numbers: Record<(typeof NUMERIC_FIELDS)[number], number> = {
      session_count: 0,
      avg_session_duration: 0,
      streak_length: 0,
      content_engagement_rate: 0,
      days_since_signup: 0,
      total_sessions: 0,
      last_login_days_ago: 0,
      content_completion_rate: 0,
      notification_response_rate: 0,
      goal_progress_percentage: 0,
    };
    for (const field of NUMERIC_FIELDS) {
      const value = entry[field];
      if (typeof value !== "number" || !Number.isFinite(value)) {
        throw new Error(`Record ${index}: "${field}" must be a finite number`);
      }
      numbers[field] = value;
    }
    const { user_id, preferred_time_of_day, churned } = entry;
    if (typeof user_id !== "string") {
      throw new Error(`Record ${index}: "user_id" must be a string`);
    }
    if (preferred_time_of_day !== "morning" && preferred_time_of_day !== "afternoon" && preferred_time_of_day !== "evening") {
      throw new Error(`Record ${index}: "preferred_time_of_day" must be morning, afternoon or evening`);
    }
    if (typeof churned !== "boolean") {
      throw new Error(`Record ${index}: "churned" must be a boolean`);
    }
    return { ...numbers, user_id, preferred_time_of_day, churned };
  });
}
