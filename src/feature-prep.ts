// Wellness Retention Engine - Feature preparation
// Turns request payloads into the fixed-order numeric vectors the clustering
// and churn models were trained on. The column order here is the contract
// with the artifacts under ml_models/.

import type { ChurnPredictionRequest, TimeOfDay, UserBehaviorData } from "./types.js";

export const TIME_OF_DAY_ENCODING: Readonly<Record<TimeOfDay, number>> = {
  morning: 0,
  afternoon: 1,
  evening: 2,
};

export const CLUSTERING_FEATURES = [
  "session_count",
  "avg_session_duration",
  "streak_length",
  "preferred_time_of_day",
  "content_engagement_rate",
  "notification_response_rate",
] as const;

export const CHURN_FEATURES = [
  "days_since_signup",
  "total_sessions",
  "avg_session_duration",
  "streak_length",
  "last_login_days_ago",
  "content_completion_rate",
  "notification_response_rate",
  "goal_progress_percentage",
] as const;

export type ClusteringFeatureName = (typeof CLUSTERING_FEATURES)[number];
export type ChurnFeatureName = (typeof CHURN_FEATURES)[number];

function finiteOrZero(value: number): number {
  return Number.isFinite(value) ? value : 0;
}

export function isTimeOfDay(value: string): value is TimeOfDay {
  return value === "morning" || value === "afternoon" || value === "evening";
}

/** Unknown values encode as morning. */
export function encodeTimeOfDay(value: string): number {
  return isTimeOfDay(value) ? TIME_OF_DAY_ENCODING[value] : 0;
}

export function prepareClusteringFeatures(
  data: Omit<UserBehaviorData, "user_id" | "preferred_time_of_day"> & { preferred_time_of_day: string },
): number[] {
  return [
    finiteOrZero(data.session_count),
    finiteOrZero(data.avg_session_duration),
    finiteOrZero(data.streak_length),
    encodeTimeOfDay(data.preferred_time_of_day),
    finiteOrZero(data.content_engagement_rate),
    finiteOrZero(data.notification_response_rate),
  ];
}

export function prepareChurnFeatures(data: Omit<ChurnPredictionRequest, "user_id">): number[] {
  return CHURN_FEATURES.map((name) => finiteOrZero(data[name]));
}

/**
 * Throws when an artifact was trained on a different column set than the one
 * this module produces.
 */
export function assertFeatureNames(
  expected: readonly string[],
  actual: readonly string[],
  artifact: string,
): void {
  const same = expected.length === actual.length && expected.every((name, i) => actual[i] === name);
  if (!same) {
    throw new Error(
      `${artifact} was trained on features [${actual.join(", ")}], expected [${expected.join(", ")}]`,
    );
  }
}
