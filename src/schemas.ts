// Wellness Retention Engine - Request schemas
// zod schemas for every request body the API accepts. Parsing also applies
// the documented defaults (limit, available time, preferred time).

import * as z from "zod";

const userId = z.string().trim().min(1, "user_id must not be empty");
const count = z.number().int().min(0);
const duration = z.number().finite().min(0);
const rate = z.number().finite().min(0).max(1);

export const MAX_MATCH_LIMIT = 50;

export const goalMatchRequestSchema = z.object({
  goal: z.string().trim().min(1, "goal must not be empty").max(1000),
  limit: z.number().int().min(1).max(MAX_MATCH_LIMIT).default(5),
});

export const timeOfDaySchema = z.enum(["morning", "afternoon", "evening"]);

export const userBehaviorDataSchema = z.object({
  user_id: userId,
  session_count: count,
  avg_session_duration: duration,
  streak_length: count,
  preferred_time_of_day: timeOfDaySchema,
  content_engagement_rate: rate,
  notification_response_rate: rate,
});

export const churnPredictionRequestSchema = z.object({
  user_id: userId,
  days_since_signup: count,
  total_sessions: count,
  avg_session_duration: duration,
  streak_length: count,
  last_login_days_ago: count,
  content_completion_rate: rate,
  notification_response_rate: rate,
  goal_progress_percentage: rate,
});

export const dailyPlanRequestSchema = z.object({
  user_id: userId,
  goal: z.string().trim().min(1, "goal must not be empty").max(1000),
  current_streak: count,
  recent_activities: z.array(z.string().trim().min(1)).max(50),
  available_time_minutes: z.number().int().min(1).max(24 * 60).default(15),
  preferred_time: z.string().trim().min(1).default("morning"),
  mood: z.string().trim().min(1).max(200).optional(),
});

export const followUpRequestSchema = z.object({
  completed_activities: z.array(z.string().trim().min(1)).max(50),
  mood: z.string().trim().min(1).max(200).optional(),
});

export interface ValidationIssue {
  loc: (string | number)[];
  msg: string;
}

/** Flattens a ZodError into the `detail` list the API returns with 422. */
export function toValidationIssues(error: z.ZodError): ValidationIssue[] {
  return error.issues.map((issue) => ({
    loc: ["body", ...issue.path],
    msg: issue.message,
  }));
}
