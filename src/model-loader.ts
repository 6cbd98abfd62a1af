// Wellness Retention Engine - Model Loader
// Reads and writes the JSON artifacts (trained models, scalers, cluster
// descriptions, content catalog) that the services load at startup.

import { access, mkdir, readFile, writeFile } from "node:fs/promises";
import { dirname, join } from "node:path";
import { ModelNotLoadedError } from "./errors.js";
import type {
  ClusterInfo,
  ContentCatalog,
  KMeansArtifact,
  LogisticRegressionArtifact,
  ScalerArtifact,
  ServiceLogger,
} from "./types.js";
import { createConsoleLogger, describeError } from "./utils.js";

export type Guard<T> = (value: unknown) => value is T;

export class ModelLoader {
  readonly basePath: string;
  private readonly logger: ServiceLogger;

  constructor(basePath: string, logger: ServiceLogger = createConsoleLogger("ModelLoader")) {
    this.basePath = basePath;
    this.logger = logger;
  }

  resolve(relativePath: string): string {
    return join(this.basePath, relativePath);
  }

  /** Returns a loader rooted at a subdirectory of this one. */
  child(subdirectory: string): ModelLoader {
    return new ModelLoader(this.resolve(subdirectory), this.logger);
  }

  async exists(relativePath: string): Promise<boolean> {
    try {
      await access(this.resolve(relativePath));
      return true;
    } catch {
      return false;
    }
  }

  /**
   * Loads and validates a JSON file. Returns null (and logs why) when the file
   * is missing, unreadable, not JSON, or does not pass the guard.
   */
  async loadJson<T>(relativePath: string, guard: Guard<T>): Promise<T | null> {
    const fullPath = this.resolve(relativePath);

    let raw: string;
    try {
      raw = await readFile(fullPath, "utf-8");
    } catch (err) {
      if (isNotFound(err)) {
        this.logger.warn(`Data file not found: ${fullPath}`);
      } else {
        this.logger.error(`Error reading ${fullPath}: ${describeError(err)}`);
      }
      return null;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (err) {
      this.logger.error(`Error parsing JSON in ${fullPath}: ${describeError(err)}`);
      return null;
    }

    if (!guard(parsed)) {
      this.logger.error(`Unexpected structure in ${fullPath}`);
      return null;
    }

    this.logger.info(`Loaded JSON data from ${fullPath}`);
    return parsed;
  }

  /**
   * Like loadJson, but a missing or invalid artifact is fatal for the caller.
   */
  async requireJson<T>(relativePath: string, guard: Guard<T>, description: string): Promise<T> {
    const value = await this.loadJson(relativePath, guard);
    if (value === null) {
      throw new ModelNotLoadedError(
        `${description} not found. Please ensure ${relativePath} exists in ${this.basePath}/ directory`,
      );
    }
    return value;
  }

  async saveJson(relativePath: string, data: unknown): Promise<boolean> {
    const fullPath = this.resolve(relativePath);
    try {
      await mkdir(dirname(fullPath), { recursive: true });
      await writeFile(fullPath, `${JSON.stringify(data, null, 2)}\n`, "utf-8");
      this.logger.info(`Saved JSON data to ${fullPath}`);
      return true;
    } catch (err) {
      this.logger.error(`Error saving JSON data ${fullPath}: ${describeError(err)}`);
      return false;
    }
  }
}

function isNotFound(err: unknown): boolean {
  return typeof err === "object" && err !== null && "code" in err && err.code === "ENOENT";
}

// ─── Type guards ────────────────────────────────────────────────────────────────

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function isFiniteNumberArray(value: unknown): value is number[] {
  return Array.isArray(value) && value.every((v) => typeof v === "number" && Number.isFinite(v));
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((v) => typeof v === "string");
}

export function isScalerArtifact(value: unknown): value is ScalerArtifact {
  if (!isRecord(value)) return false;
  const { feature_names, mean, scale } = value;
  return (
    isStringArray(feature_names) &&
    isFiniteNumberArray(mean) &&
    isFiniteNumberArray(scale) &&
    mean.length === feature_names.length &&
    scale.length === feature_names.length &&
    scale.every((s) => s !== 0)
  );
}

export function isKMeansArtifact(value: unknown): value is KMeansArtifact {
  if (!isRecord(value)) return false;
  const { n_clusters, feature_names, cluster_centers } = value;
  if (typeof n_clusters !== "number" || !Number.isInteger(n_clusters) || n_clusters < 1) return false;
  if (!isStringArray(feature_names)) return false;
  if (!Array.isArray(cluster_centers) || cluster_centers.length !== n_clusters) return false;
  return cluster_centers.every(
    (center) => isFiniteNumberArray(center) && center.length === feature_names.length,
  );
}

export function isLogisticRegressionArtifact(value: unknown): value is LogisticRegressionArtifact {
  if (!isRecord(value)) return false;
  const { feature_names, coefficients, intercept } = value;
  return (
    isStringArray(feature_names) &&
    isFiniteNumberArray(coefficients) &&
    coefficients.length === feature_names.length &&
    typeof intercept === "number" &&
    Number.isFinite(intercept)
  );
}

export function isClusterInfo(value: unknown): value is ClusterInfo {
  if (!isRecord(value) || !isRecord(value.clusters)) return false;
  return Object.values(value.clusters).every(
    (entry) => isRecord(entry) && typeof entry.name === "string" && typeof entry.description === "string",
  );
}

export function isContentCatalog(value: unknown): value is ContentCatalog {
  if (!isRecord(value) || !Array.isArray(value.content)) return false;
  return value.content.every(
    (item) =>
      isRecord(item) &&
      typeof item.id === "string" &&
      typeof item.title === "string" &&
      typeof item.description === "string" &&
      typeof item.category === "string" &&
      (item.tags === undefined || isStringArray(item.tags)),
  );
}
