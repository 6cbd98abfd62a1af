// Wellness Retention Engine - Churn risk prediction
//
// Probability comes from a pre-trained scaler + logistic regression loaded from
// ml_models/churn_classification/. The contributing factors and the suggested
// intervention are rule-based and read the unscaled features, so they stay
// explainable to the product team whatever the model weights are.

import { CHURN_FEATURES, assertFeatureNames, prepareChurnFeatures } from "./feature-prep.js";
import { LogisticRegression } from "./logistic-regression.js";
import type { ModelLoader } from "./model-loader.js";
import { isLogisticRegressionArtifact, isScalerArtifact } from "./model-loader.js";
import { StandardScaler } from "./standard-scaler.js";
import type { ChurnPredictionRequest, ChurnPredictionResponse, RiskLevel, ServiceLogger } from "./types.js";
import { createConsoleLogger, roundTo } from "./utils.js";

export const CHURN_DIR = "churn_classification";
export const CHURN_MODEL_FILE = "churn_model.json";
export const CHURN_SCALER_FILE = "churn_scaler.json";

export const HIGH_RISK_THRESHOLD = 0.7;
export const MEDIUM_RISK_THRESHOLD = 0.4;

export const RISK_FACTORS = {
  extendedAbsence: "Extended period without app usage",
  recentAbsence: "Several days since last login",
  lowSessionCount: "Low session count relative to signup time",
  lowCompletion: "Low content completion rate",
  poorNotificationEngagement: "Poor notification engagement",
  limitedGoalProgress: "Limited progress toward wellness goals",
  generalDecline: "General engagement decline patterns",
} as const;

export const INTERVENTIONS = {
  reEngagementCampaign: "Send personalized re-engagement campaign with wellness goal reminder",
  easierContent: "Offer shorter, easier content options with immediate rewards",
  personalCheckIn: "Provide one-on-one check-in with personalized motivation",
  notificationTuning: "Optimize notification timing and personalize message content",
  streakChallenges: "Introduce streak-building challenges with social elements",
  maintain: "Continue current engagement patterns with occasional check-ins",
} as const;

export function classifyRisk(probability: number): RiskLevel {
  if (probability >= HIGH_RISK_THRESHOLD) return "high";
  if (probability >= MEDIUM_RISK_THRESHOLD) return "medium";
  return "low";
}

export function identifyRiskFactors(data: Omit<ChurnPredictionRequest, "user_id">, probability: number): string[] {
  const factors: string[] = [];

  if (data.last_login_days_ago > 7) {
    factors.push(RISK_FACTORS.extendedAbsence);
  } else if (data.last_login_days_ago > 3) {
    factors.push(RISK_FACTORS.recentAbsence);
  }
  if (data.total_sessions < 3 && data.days_since_signup > 7) {
    factors.push(RISK_FACTORS.lowSessionCount);
  }
  if (data.content_completion_rate < 0.3) {
    factors.push(RISK_FACTORS.lowCompletion);
  }
  if (data.notification_response_rate < 0.2) {
    factors.push(RISK_FACTORS.poorNotificationEngagement);
  }
  if (data.goal_progress_percentage < 0.2) {
    factors.push(RISK_FACTORS.limitedGoalProgress);
  }
  if (factors.length === 0 && probability > 0.5) {
    factors.push(RISK_FACTORS.generalDecline);
  }

  return factors;
}

export function recommendIntervention(level: RiskLevel, factors: readonly string[]): string {
  switch (level) {
    case "high":
      if (factors.includes(RISK_FACTORS.extendedAbsence)) return INTERVENTIONS.reEngagementCampaign;
      if (factors.includes(RISK_FACTORS.lowCompletion)) return INTERVENTIONS.easierContent;
      return INTERVENTIONS.personalCheckIn;
    case "medium":
      if (factors.some((f) => f.toLowerCase().includes("notification engagement"))) {
        return INTERVENTIONS.notificationTuning;
      }
      return INTERVENTIONS.streakChallenges;
    case "low":
      return INTERVENTIONS.maintain;
    default: {
      const exhaustiveCheck: never = level;
      throw new Error(`Unknown risk level: ${String(exhaustiveCheck)}`);
    }
  }
}

export class ChurnPredictor {
  private readonly model: LogisticRegression;
  private readonly scaler: StandardScaler;
  private readonly logger: ServiceLogger;

  constructor(model: LogisticRegression, scaler: StandardScaler, logger: ServiceLogger) {
    assertFeatureNames(CHURN_FEATURES, model.featureNames, "Churn model");
    assertFeatureNames(CHURN_FEATURES, scaler.featureNames, "Churn scaler");
    this.model = model;
    this.scaler = scaler;
    this.logger = logger;
  }

  static async load(
    modelsRoot: ModelLoader,
    logger: ServiceLogger = createConsoleLogger("ChurnPredictor"),
  ): Promise<ChurnPredictor> {
    const loader = modelsRoot.child(CHURN_DIR);
    const [model, scaler] = await Promise.all([
      loader.requireJson(CHURN_MODEL_FILE, isLogisticRegressionArtifact, "Churn model"),
      loader.requireJson(CHURN_SCALER_FILE, isScalerArtifact, "Churn scaler"),
    ]);
    logger.info("Loaded churn prediction model and scaler");
    return new ChurnPredictor(LogisticRegression.fromArtifact(model), StandardScaler.fromArtifact(scaler), logger);
  }

  /** Unrounded churn probability for a user. */
  churnProbability(data: Omit<ChurnPredictionRequest, "user_id">): number {
    return this.model.predictProba(this.scaler.transform(prepareChurnFeatures(data)));
  }

  predictChurn(data: ChurnPredictionRequest): ChurnPredictionResponse {
    const probability = this.churnProbability(data);
    const riskLevel = classifyRisk(probability);
    const factors = identifyRiskFactors(data, probability);
    const intervention = recommendIntervention(riskLevel, factors);

    this.logger.info(`Churn risk for user ${data.user_id}: ${riskLevel} (${probability.toFixed(3)})`);
    return {
      user_id: data.user_id,
      churn_probability: roundTo(probability, 3),
      risk_level: riskLevel,
      recommended_intervention: intervention,
      factors_contributing_to_risk: factors,
    };
  }

  isReady(): boolean {
    return this.model.dimension === this.scaler.dimension;
  }
}
