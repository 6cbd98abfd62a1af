// Wellness Retention Engine - Micro-coach
//
// LLM-backed coach that proposes a small daily plan (one or two activities
// that fit the user's available time) and follows up once the user reports
// what they completed. The model answers in JSON mode; anything it leaves out
// falls back to a neutral default rather than failing the request.

import { v4 as uuidv4 } from "uuid";
import { CoachResponseError } from "./errors.js";
import type { ChatClient } from "./openai-clients.js";
import { DEFAULT_COACH_MODEL } from "./openai-clients.js";
import type {
  DailyPlanItem,
  DailyPlanRequest,
  DailyPlanResponse,
  FollowUpRequest,
  FollowUpResponse,
  ServiceLogger,
  StoredPlan,
} from "./types.js";
import { createConsoleLogger, formatLocalDate, roundTo } from "./utils.js";

// ─── Constants ──────────────────────────────────────────────────────────────────

export const PLAN_CATEGORIES = ["meditation", "exercise", "nutrition", "sleep", "mental_health"] as const;

export const DEFAULT_MOTIVATIONAL_MESSAGE = "Have a great wellness day!";
export const DEFAULT_FOLLOW_UP_TIME = "evening";
export const DEFAULT_FOLLOW_UP_MESSAGE = "Thanks for checking in!";
export const DEFAULT_NEXT_STEP = "Try one small activity tomorrow.";

const PLAN_TEMPERATURE = 0.7;
const PLAN_MAX_TOKENS = 500;
const FOLLOW_UP_MAX_TOKENS = 300;

// ─── Prompts ────────────────────────────────────────────────────────────────────

export function buildPlanSystemPrompt(): string {
  return `You are a supportive wellness micro-coach. You create personalized, achievable daily wellness plans that help users build sustainable habits.

Guidelines:
- Keep plans simple: 1-2 activities at most
- Focus on small wins and building momentum
- Be encouraging and supportive in tone
- Respect the user's available time and current streak
- Adapt to their recent activities
- Give specific, actionable items with time estimates
- Include a short motivational message

Respond ONLY with valid JSON in exactly this format:
{
  "motivational_message": "Brief, encouraging message",
  "daily_items": [
    {
      "activity": "Specific activity name",
      "duration_minutes": 10,
      "description": "Clear description of what to do",
      "category": "${PLAN_CATEGORIES.join("|")}"
    }
  ],
  "follow_up_time": "evening"
}`;
}

export function buildPlanUserPrompt(request: DailyPlanRequest): string {
  const recent = request.recent_activities.length > 0 ? request.recent_activities.join(", ") : "None";
  const lines = [
    "Create a personalized wellness plan for today.",
    "",
    "User context:",
    `- Goal: ${request.goal}`,
    `- Current streak: ${request.current_streak} days`,
    `- Recent activities: ${recent}`,
    `- Available time: ${request.available_time_minutes} minutes`,
    `- Preferred time: ${request.preferred_time}`,
  ];
  if (request.mood) {
    lines.push(`- Current mood: ${request.mood}`);
  }
  lines.push(
    "",
    "Create a plan that:",
    `- Fits within ${request.available_time_minutes} minutes`,
    `- Builds on their ${request.current_streak}-day streak`,
    `- Complements recent activities: ${recent}`,
    `- Aligns with their goal: ${request.goal}`,
  );
  return lines.join("\n");
}

export function buildFollowUpSystemPrompt(): string {
  return `You are a supportive wellness micro-coach following up on today's plan. Celebrate what the user completed, be gentle about what they missed, and suggest one small, concrete next step.

Respond ONLY with valid JSON in exactly this format:
{
  "message": "Two or three warm sentences reacting to today's progress",
  "next_step": "One small, specific action for tomorrow"
}`;
}

export function buildFollowUpUserPrompt(
  stored: StoredPlan,
  completed: readonly string[],
  missed: readonly string[],
  currentStreak: number,
  mood: string | undefined,
): string {
  const lines = [
    `Goal: ${stored.goal}`,
    `Completed today: ${completed.length > 0 ? completed.join(", ") : "None"}`,
    `Not completed: ${missed.length > 0 ? missed.join(", ") : "None"}`,
    `Streak after today: ${currentStreak} days`,
  ];
  if (mood) {
    lines.push(`Current mood: ${mood}`);
  }
  return lines.join("\n");
}

// ─── Parsing ────────────────────────────────────────────────────────────────────

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function parseJsonObject(raw: string | null): Record<string, unknown> {
  if (raw === null || raw.trim() === "") {
    throw new CoachResponseError("Coach model returned an empty response");
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw.trim());
  } catch {
    throw new CoachResponseError(`Invalid JSON response from coach model: ${raw.slice(0, 200)}`);
  }
  if (!isRecord(parsed)) {
    throw new CoachResponseError("Coach model response is not a JSON object");
  }
  return parsed;
}

function nonEmptyString(value: unknown): string | null {
  return typeof value === "string" && value.trim() !== "" ? value.trim() : null;
}

/**
 * Keeps items that name an activity; durations become non-negative whole
 * minutes, with 0 when missing.
 */
export function parsePlanItems(value: unknown): DailyPlanItem[] {
  if (!Array.isArray(value)) return [];
  const items: DailyPlanItem[] = [];
  for (const entry of value) {
    if (!isRecord(entry)) continue;
    const record = entry;
    const activity = nonEmptyString(record.activity);
    if (activity === null) continue;

    const rawDuration =
      typeof record.duration_minutes === "number"
        ? record.duration_minutes
        : typeof record.duration_minutes === "string"
          ? Number.parseFloat(record.duration_minutes)
          : 0;
    const duration = Number.isFinite(rawDuration) ? Math.max(0, Math.round(rawDuration)) : 0;

    items.push({
      activity,
      duration_minutes: duration,
      description: nonEmptyString(record.description) ?? "",
      category: nonEmptyString(record.category)?.toLowerCase() ?? "mental_health",
    });
  }
  return items;
}

function normalizeActivity(name: string): string {
  return name.trim().toLowerCase();
}

// ─── MicroCoach ─────────────────────────────────────────────────────────────────

export interface MicroCoachOptions {
  client: ChatClient;
  model?: string;
  logger?: ServiceLogger;
  /** Clock used for plan dates. */
  now?: () => Date;
  /** Plan id generator. */
  generateId?: () => string;
}

export class MicroCoach {
  private readonly client: ChatClient;
  private readonly model: string;
  private readonly logger: ServiceLogger;
  private readonly now: () => Date;
  private readonly generateId: () => string;

  constructor(options: MicroCoachOptions) {
    this.client = options.client;
    this.model = options.model ?? DEFAULT_COACH_MODEL;
    this.logger = options.logger ?? createConsoleLogger("MicroCoach");
    this.now = options.now ?? (() => new Date());
    this.generateId = options.generateId ?? uuidv4;
  }

  async generateDailyPlan(request: DailyPlanRequest): Promise<DailyPlanResponse> {
    const raw = await this.client.completeJson({
      model: this.model,
      system: buildPlanSystemPrompt(),
      user: buildPlanUserPrompt(request),
      temperature: PLAN_TEMPERATURE,
      maxTokens: PLAN_MAX_TOKENS,
    });

    let data: Record<string, unknown>;
    try {
      data = parseJsonObject(raw);
    } catch (err) {
      this.logger.error(`Failed to parse plan response for user ${request.user_id}: ${String(raw)}`);
      throw err;
    }

    const items = parsePlanItems(data.daily_items);
    const plan: DailyPlanResponse = {
      plan_id: this.generateId(),
      user_id: request.user_id,
      plan_date: formatLocalDate(this.now()),
      motivational_message: nonEmptyString(data.motivational_message) ?? DEFAULT_MOTIVATIONAL_MESSAGE,
      daily_items: items,
      estimated_total_time: items.reduce((sum, item) => sum + item.duration_minutes, 0),
      follow_up_time: nonEmptyString(data.follow_up_time) ?? DEFAULT_FOLLOW_UP_TIME,
    };

    if (plan.estimated_total_time > request.available_time_minutes) {
      this.logger.warn(
        `Plan ${plan.plan_id} takes ${plan.estimated_total_time} min, user has ${request.available_time_minutes} min`,
      );
    }
    this.logger.info(`Generated plan ${plan.plan_id} with ${items.length} item(s) for user ${request.user_id}`);
    return plan;
  }

  async generateFollowUp(stored: StoredPlan, request: FollowUpRequest): Promise<FollowUpResponse> {
    // Each report checks off at most one plan item.
    const reported = new Map<string, number>();
    for (const name of request.completed_activities) {
      const key = normalizeActivity(name);
      reported.set(key, (reported.get(key) ?? 0) + 1);
    }
    const planItems = stored.plan.daily_items.map((item) => item.activity);
    const completed: string[] = [];
    const missed: string[] = [];
    for (const activity of planItems) {
      const key = normalizeActivity(activity);
      const left = reported.get(key) ?? 0;
      if (left > 0) {
        reported.set(key, left - 1);
        completed.push(activity);
      } else {
        missed.push(activity);
      }
    }

    const completionRate = planItems.length > 0 ? roundTo(completed.length / planItems.length, 2) : 0;
    const currentStreak = completed.length > 0 ? stored.currentStreak + 1 : 0;

    const raw = await this.client.completeJson({
      model: this.model,
      system: buildFollowUpSystemPrompt(),
      user: buildFollowUpUserPrompt(stored, completed, missed, currentStreak, request.mood),
      temperature: PLAN_TEMPERATURE,
      maxTokens: FOLLOW_UP_MAX_TOKENS,
    });

    let data: Record<string, unknown>;
    try {
      data = parseJsonObject(raw);
    } catch (err) {
      this.logger.error(`Failed to parse follow-up response for plan ${stored.plan.plan_id}: ${String(raw)}`);
      throw err;
    }

    this.logger.info(
      `Follow-up for plan ${stored.plan.plan_id}: ${completed.length}/${planItems.length} completed`,
    );
    return {
      plan_id: stored.plan.plan_id,
      user_id: stored.plan.user_id,
      completed_activities: completed,
      missed_activities: missed,
      completion_rate: completionRate,
      current_streak: currentStreak,
      message: nonEmptyString(data.message) ?? DEFAULT_FOLLOW_UP_MESSAGE,
      next_step: nonEmptyString(data.next_step) ?? DEFAULT_NEXT_STEP,
    };
  }

  isReady(): boolean {
    return this.model.length > 0;
  }
}
