// Unit tests for request schemas

import { describe, it, expect } from "vitest";
import {
  MAX_MATCH_LIMIT,
  churnPredictionRequestSchema,
  dailyPlanRequestSchema,
  followUpRequestSchema,
  goalMatchRequestSchema,
  toValidationIssues,
  userBehaviorDataSchema,
} from "./schemas.js";

describe("goalMatchRequestSchema", () => {
  it("trims the goal and defaults the limit", () => {
    expect(goalMatchRequestSchema.parse({ goal: "  reduce stress  " })).toEqual({ goal: "reduce stress", limit: 5 });
  });

  it("bounds the limit", () => {
    expect(goalMatchRequestSchema.safeParse({ goal: "x", limit: MAX_MATCH_LIMIT }).success).toBe(true);
    expect(goalMatchRequestSchema.safeParse({ goal: "x", limit: MAX_MATCH_LIMIT + 1 }).success).toBe(false);
    expect(goalMatchRequestSchema.safeParse({ goal: "x", limit: 2.5 }).success).toBe(false);
  });
});

describe("userBehaviorDataSchema", () => {
  const valid = {
    user_id: "u1",
    session_count: 4,
    avg_session_duration: 7.5,
    streak_length: 2,
    preferred_time_of_day: "afternoon",
    content_engagement_rate: 1,
    notification_response_rate: 0,
  };

  it("accepts rate bounds inclusively", () => {
    expect(userBehaviorDataSchema.safeParse(valid).success).toBe(true);
  });

  it("rejects fractional counts and blank user ids", () => {
    expect(userBehaviorDataSchema.safeParse({ ...valid, session_count: 1.5 }).success).toBe(false);
    expect(userBehaviorDataSchema.safeParse({ ...valid, user_id: " " }).success).toBe(false);
  });
});

describe("churnPredictionRequestSchema", () => {
  it("reports every invalid field with its location", () => {
    const result = churnPredictionRequestSchema.safeParse({
      user_id: "u1",
      days_since_signup: 10,
      total_sessions: -1,
      avg_session_duration: 3,
      streak_length: 1,
      last_login_days_ago: 0,
      content_completion_rate: 1.5,
      notification_response_rate: 0.2,
      goal_progress_percentage: 0.2,
    });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(toValidationIssues(result.error).map((issue) => issue.loc)).toEqual([
        ["body", "total_sessions"],
        ["body", "content_completion_rate"],
      ]);
    }
  });
});

describe("dailyPlanRequestSchema", () => {
  it("applies defaults for time and preferred time", () => {
    expect(
      dailyPlanRequestSchema.parse({ user_id: "u1", goal: "Move more", current_streak: 0, recent_activities: [] }),
    ).toEqual({
      user_id: "u1",
      goal: "Move more",
      current_streak: 0,
      recent_activities: [],
      available_time_minutes: 15,
      preferred_time: "morning",
    });
  });

  it("rejects more than a day of available time", () => {
    const result = dailyPlanRequestSchema.safeParse({
      user_id: "u1",
      goal: "Move more",
      current_streak: 0,
      recent_activities: [],
      available_time_minutes: 1441,
    });
    expect(result.success).toBe(false);
  });
});

describe("followUpRequestSchema", () => {
  it("trims reported activities", () => {
    expect(followUpRequestSchema.parse({ completed_activities: [" Walk "] })).toEqual({
      completed_activities: ["Walk"],
    });
  });

  it("requires a list", () => {
    expect(followUpRequestSchema.safeParse({}).success).toBe(false);
  });
});
