// Wellness Retention Engine - Behavioral clustering
// Assigns a user to a persona bucket from early engagement features, using a
// pre-trained scaler + k-means model loaded from ml_models/clustering/.

import { CLUSTERING_FEATURES, assertFeatureNames, prepareClusteringFeatures } from "./feature-prep.js";
import { KMeans } from "./kmeans.js";
import type { ModelLoader } from "./model-loader.js";
import { isClusterInfo, isKMeansArtifact, isScalerArtifact } from "./model-loader.js";
import { StandardScaler } from "./standard-scaler.js";
import type { ClusterDescriptor, ClusterInfo, ClusterResponse, ServiceLogger, UserBehaviorData } from "./types.js";
import { createConsoleLogger, roundTo } from "./utils.js";

export const CLUSTERING_DIR = "clustering";
export const KMEANS_MODEL_FILE = "kmeans_model.json";
export const CLUSTERING_SCALER_FILE = "clustering_scaler.json";
export const CLUSTER_INFO_FILE = "cluster_info.json";

/**
 * Confidence that a point belongs to its nearest cluster: 1 - nearest / farthest
 * centroid distance. 0 when all centroids are equally far.
 */
export function clusterConfidence(distances: readonly number[]): number {
  if (distances.length === 0) return 0;
  const min = Math.min(...distances);
  const rawMax = Math.max(...distances);
  const max = rawMax > 0 ? rawMax : 1;
  return 1 - min / max;
}

export class UserClusterer {
  private readonly model: KMeans;
  private readonly scaler: StandardScaler;
  private readonly info: ClusterInfo;
  private readonly logger: ServiceLogger;

  constructor(model: KMeans, scaler: StandardScaler, info: ClusterInfo, logger: ServiceLogger) {
    assertFeatureNames(CLUSTERING_FEATURES, model.featureNames, "KMeans model");
    assertFeatureNames(CLUSTERING_FEATURES, scaler.featureNames, "Clustering scaler");
    this.model = model;
    this.scaler = scaler;
    this.info = info;
    this.logger = logger;
  }

  /** Loads the model, scaler and cluster descriptions. All three are required. */
  static async load(
    modelsRoot: ModelLoader,
    logger: ServiceLogger = createConsoleLogger("UserClusterer"),
  ): Promise<UserClusterer> {
    const loader = modelsRoot.child(CLUSTERING_DIR);
    const [model, scaler, info] = await Promise.all([
      loader.requireJson(KMEANS_MODEL_FILE, isKMeansArtifact, "KMeans model"),
      loader.requireJson(CLUSTERING_SCALER_FILE, isScalerArtifact, "Clustering scaler"),
      loader.requireJson(CLUSTER_INFO_FILE, isClusterInfo, "Cluster info"),
    ]);
    logger.info(`Loaded KMeans model (${model.n_clusters} clusters), scaler, and cluster info`);
    return new UserClusterer(KMeans.fromArtifact(model), StandardScaler.fromArtifact(scaler), info, logger);
  }

  describeCluster(clusterId: number): ClusterDescriptor {
    return (
      this.info.clusters[String(clusterId)] ?? {
        name: `Cluster ${clusterId}`,
        description: "Unknown cluster",
      }
    );
  }

  clusterUser(data: UserBehaviorData): ClusterResponse {
    const features = this.scaler.transform(prepareClusteringFeatures(data));
    const clusterId = this.model.predict(features);
    const confidence = clusterConfidence(this.model.transform(features));
    const descriptor = this.describeCluster(clusterId);

    this.logger.info(`User ${data.user_id} assigned to cluster ${clusterId} (${descriptor.name})`);
    return {
      user_id: data.user_id,
      cluster_id: clusterId,
      cluster_name: descriptor.name,
      cluster_description: descriptor.description,
      confidence_score: roundTo(confidence, 4),
    };
  }

  isReady(): boolean {
    return this.model.clusterCount > 0;
  }
}
