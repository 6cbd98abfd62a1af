// Wellness Retention Engine - Shared TypeScript interfaces and types
//
// Wire types mirror the JSON contract of the REST API and therefore keep
// snake_case field names. Model artifact types mirror the JSON files under
// ml_models/.

// ─── Logging ────────────────────────────────────────────────────────────────────

export interface ServiceLogger {
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

// ─── Content Catalog ────────────────────────────────────────────────────────────

export interface ContentItem {
  id: string;
  title: string;
  description: string;
  category: string;
  tags?: string[];
}

export interface ContentCatalog {
  content: ContentItem[];
}

// ─── Goal Matching ──────────────────────────────────────────────────────────────

export interface GoalMatchRequest {
  goal: string;
  limit: number;
}

export interface MatchedContent {
  id: string;
  title: string;
  description: string;
  category: string;
  similarity_score: number;
}

export interface GoalMatchResponse {
  user_goal: string;
  matched_content: MatchedContent[];
  total_results: number;
}

export interface ContentIndexStatus {
  content_items_loaded: number;
  embedding_model: string;
  embedding_dimension: number;
  embeddings_count: number;
  fully_ready: boolean;
}

// ─── Behavioral Clustering ──────────────────────────────────────────────────────

export type TimeOfDay = "morning" | "afternoon" | "evening";

export interface UserBehaviorData {
  user_id: string;
  /** Number of app sessions */
  session_count: number;
  /** Average session duration in minutes */
  avg_session_duration: number;
  /** Current streak in days */
  streak_length: number;
  preferred_time_of_day: TimeOfDay;
  /** Fraction of started content that was completed, 0..1 */
  content_engagement_rate: number;
  /** Fraction of notifications acted upon, 0..1 */
  notification_response_rate: number;
}

export interface ClusterResponse {
  user_id: string;
  cluster_id: number;
  cluster_name: string;
  cluster_description: string;
  confidence_score: number;
}

// ─── Churn Prediction ───────────────────────────────────────────────────────────

export interface ChurnPredictionRequest {
  user_id: string;
  days_since_signup: number;
  total_sessions: number;
  avg_session_duration: number;
  streak_length: number;
  last_login_days_ago: number;
  content_completion_rate: number;
  notification_response_rate: number;
  goal_progress_percentage: number;
}

export type RiskLevel = "low" | "medium" | "high";

export interface ChurnPredictionResponse {
  user_id: string;
  churn_probability: number;
  risk_level: RiskLevel;
  recommended_intervention: string;
  factors_contributing_to_risk: string[];
}

// ─── Micro-Coach ────────────────────────────────────────────────────────────────

export interface DailyPlanRequest {
  user_id: string;
  goal: string;
  current_streak: number;
  recent_activities: string[];
  available_time_minutes: number;
  preferred_time: string;
  mood?: string;
}

export interface DailyPlanItem {
  activity: string;
  duration_minutes: number;
  description: string;
  category: string;
}

export interface DailyPlanResponse {
  plan_id: string;
  user_id: string;
  plan_date: string;
  motivational_message: string;
  daily_items: DailyPlanItem[];
  estimated_total_time: number;
  follow_up_time: string;
}

/** A generated plan together with the request context it was built from. */
export interface StoredPlan {
  plan: DailyPlanResponse;
  goal: string;
  currentStreak: number;
  createdAt: Date;
}

export interface FollowUpRequest {
  completed_activities: string[];
  mood?: string;
}

export interface FollowUpResponse {
  plan_id: string;
  user_id: string;
  completed_activities: string[];
  missed_activities: string[];
  completion_rate: number;
  current_streak: number;
  message: string;
  next_step: string;
}

// ─── Health ─────────────────────────────────────────────────────────────────────

export type ServiceName = "content_matcher" | "user_clusterer" | "churn_predictor" | "micro_coach";

export interface ModelsHealth {
  status: "healthy" | "degraded";
  models: Record<ServiceName, boolean>;
}

// ─── Model Artifacts ────────────────────────────────────────────────────────────

export interface ScalerArtifact {
  feature_names: string[];
  mean: number[];
  scale: number[];
}

export interface KMeansArtifact {
  n_clusters: number;
  feature_names: string[];
  cluster_centers: number[][];
  inertia?: number;
}

export interface LogisticRegressionArtifact {
  feature_names: string[];
  coefficients: number[];
  intercept: number;
}

export interface ClusterDescriptor {
  name: string;
  description: string;
}

export interface ClusterInfo {
  clusters: Record<string, ClusterDescriptor>;
}
