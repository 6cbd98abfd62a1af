// Wellness Retention Engine - Server Unit Tests
// Exercises the REST boundary over a real HTTP listener on an ephemeral port,
// with in-process fakes standing in for the embedding and chat models.

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { ChurnPredictor, INTERVENTIONS } from "./churn-predictor.js";
import { ContentMatcher } from "./content-matcher.js";
import { CHURN_FEATURES, CLUSTERING_FEATURES } from "./feature-prep.js";
import { KMeans } from "./kmeans.js";
import { LogisticRegression } from "./logistic-regression.js";
import { MicroCoach, buildFollowUpSystemPrompt } from "./micro-coach.js";
import type { ChatRequest, EmbeddingsClient } from "./openai-clients.js";
import { PlanStore } from "./plan-store.js";
import { APP_VERSION, ENDPOINTS, createAppServer, type AppServer } from "./server.js";
import { ServiceRegistry, type ServiceFactories } from "./service-registry.js";
import { StandardScaler } from "./standard-scaler.js";
import type { ContentItem } from "./types.js";
import { UserClusterer } from "./user-clusterer.js";

// ─── Test Helpers ───────────────────────────────────────────────────────────────

/** Silent logger for tests */
function createSilentLogger() {
  return {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  };
}

const CATALOG: ContentItem[] = [
  { id: "med-1", title: "Breathing basics", description: "Calm breathing", category: "meditation", tags: ["breath"] },
  { id: "ex-1", title: "Morning run", description: "Easy cardio", category: "exercise", tags: ["run"] },
  { id: "slp-1", title: "Sleep story", description: "Wind down", category: "sleep", tags: ["sleep"] },
];

const keywordEmbeddings: EmbeddingsClient = {
  embed: async (_model, input) =>
    input.map((text) => ["breath", "run", "sleep"].map((word) => (text.toLowerCase().includes(word) ? 1 : 0))),
};

const PLAN_REPLY = JSON.stringify({
  motivational_message: "Small steps count.",
  daily_items: [
    { activity: "Box breathing", duration_minutes: 5, description: "Four-count breaths", category: "meditation" },
    { activity: "Screen-free wind-down", duration_minutes: 10, description: "Phone away", category: "sleep" },
  ],
  follow_up_time: "evening",
});

const FOLLOW_UP_REPLY = JSON.stringify({ message: "Good start.", next_step: "Wind down tonight." });

function identityScaler(names: readonly string[]): StandardScaler {
  return new StandardScaler(names, new Array<number>(names.length).fill(0), new Array<number>(names.length).fill(1));
}

function createFactories(chatReply?: string) {
  const logger = createSilentLogger();
  const chat = {
    completeJson: vi.fn(async (request: ChatRequest) => {
      if (chatReply !== undefined) return chatReply;
      return request.system === buildFollowUpSystemPrompt() ? FOLLOW_UP_REPLY : PLAN_REPLY;
    }),
  };
  let planCount = 0;

  const factories: ServiceFactories = {
    contentMatcher: () => ContentMatcher.create({ client: keywordEmbeddings, catalog: CATALOG, logger }),
    userClusterer: async () =>
      new UserClusterer(
        new KMeans(CLUSTERING_FEATURES, [
          [0, 0, 0, 0, 0, 0],
          [3, 4, 0, 0, 0, 0],
        ]),
        identityScaler(CLUSTERING_FEATURES),
        { clusters: { "0": { name: "Quiet Starters", description: "Little activity so far" } } },
        logger,
      ),
    churnPredictor: async () =>
      new ChurnPredictor(
        new LogisticRegression(CHURN_FEATURES, new Array<number>(CHURN_FEATURES.length).fill(0), 0),
        identityScaler(CHURN_FEATURES),
        logger,
      ),
    microCoach: async () =>
      new MicroCoach({
        client: chat,
        model: "test-coach",
        logger,
        now: () => new Date(2026, 2, 14, 9, 30),
        generateId: () => `plan-${++planCount}`,
      }),
  };
  return { factories, chat };
}

const CLUSTER_BODY = {
  user_id: "user-1",
  session_count: 3,
  avg_session_duration: 0,
  streak_length: 0,
  preferred_time_of_day: "morning",
  content_engagement_rate: 0,
  notification_response_rate: 0,
};

const CHURN_BODY = {
  user_id: "user-1",
  days_since_signup: 30,
  total_sessions: 20,
  avg_session_duration: 10,
  streak_length: 5,
  last_login_days_ago: 1,
  content_completion_rate: 0.6,
  notification_response_rate: 0.5,
  goal_progress_percentage: 0.5,
};

const PLAN_BODY = {
  user_id: "user-1",
  goal: "Sleep better",
  current_streak: 3,
  recent_activities: [],
};

// ─── Tests ──────────────────────────────────────────────────────────────────────

describe("Express server", () => {
  let server: AppServer;
  let baseUrl: string;
  let logger: ReturnType<typeof createSilentLogger>;
  let chat: ReturnType<typeof createFactories>["chat"];

  async function start(factories: ServiceFactories): Promise<void> {
    logger = createSilentLogger();
    const registry = new ServiceRegistry(factories, new PlanStore(10), createSilentLogger());
    server = createAppServer({ registry, logger });
    const port = await server.listen(0, "127.0.0.1");
    baseUrl = `http://127.0.0.1:${port}`;
  }

  function post(path: string, body: unknown): Promise<Response> {
    return fetch(`${baseUrl}${path}`, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify(body),
    });
  }

  beforeEach(async () => {
    const setup = createFactories();
    chat = setup.chat;
    await start(setup.factories);
  });

  afterEach(async () => {
    await server.close();
  });

  describe("service info", () => {
    it("GET / describes the API", async () => {
      const res = await fetch(`${baseUrl}/`);
      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({
        message: "Wellness Retention Engine API is running",
        version: APP_VERSION,
        endpoints: [...ENDPOINTS],
      });
    });

    it("GET /health reports liveness", async () => {
      const res = await fetch(`${baseUrl}/health`);
      expect(res.status).toBe(200);
      expect(res.headers.get("access-control-allow-origin")).toBe("*");
      expect(await res.json()).toEqual({ status: "healthy", service: "retention-api" });
    });

    it("answers CORS preflight requests", async () => {
      const res = await fetch(`${baseUrl}/api/v1/match-goal`, { method: "OPTIONS" });
      expect(res.status).toBe(204);
      expect(res.headers.get("access-control-allow-methods")).toBe("GET,POST,OPTIONS");
      expect(res.headers.get("access-control-allow-headers")).toBe("Content-Type,Authorization");
    });

    it("returns 404 with a detail for unknown routes", async () => {
      const res = await fetch(`${baseUrl}/nope`);
      expect(res.status).toBe(404);
      expect(await res.json()).toEqual({ detail: "Not found: GET /nope" });
    });
  });

  describe("POST /api/v1/match-goal", () => {
    it("returns the closest catalog items", async () => {
      const res = await post("/api/v1/match-goal", { goal: "Sleep through the night", limit: 1 });
      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({
        user_goal: "Sleep through the night",
        matched_content: [
          { id: "slp-1", title: "Sleep story", description: "Wind down", category: "sleep", similarity_score: 1 },
        ],
        total_results: 1,
      });
    });

    it("defaults the limit and caps it at the catalog size", async () => {
      const res = await post("/api/v1/match-goal", { goal: "run" });
      expect(await res.json()).toMatchObject({ total_results: 3 });
    });

    it("rejects a blank goal with 422", async () => {
      const res = await post("/api/v1/match-goal", { goal: "   " });
      expect(res.status).toBe(422);
      expect(await res.json()).toEqual({ detail: [{ loc: ["body", "goal"], msg: "goal must not be empty" }] });
    });

    it("rejects an out-of-range limit with 422", async () => {
      const res = await post("/api/v1/match-goal", { goal: "run", limit: 0 });
      expect(res.status).toBe(422);
      expect(await res.json()).toMatchObject({ detail: [{ loc: ["body", "limit"] }] });
    });

    it("rejects a missing body with 422", async () => {
      const res = await fetch(`${baseUrl}/api/v1/match-goal`, { method: "POST" });
      expect(res.status).toBe(422);
      expect(await res.json()).toMatchObject({ detail: [{ loc: ["body", "goal"] }] });
    });

    it("rejects malformed JSON with 400", async () => {
      const res = await fetch(`${baseUrl}/api/v1/match-goal`, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: "{bad",
      });
      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({ detail: "Malformed JSON body" });
    });
  });

  describe("POST /api/v1/cluster-user", () => {
    it("returns the assigned cluster", async () => {
      const res = await post("/api/v1/cluster-user", CLUSTER_BODY);
      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({
        user_id: "user-1",
        cluster_id: 0,
        cluster_name: "Quiet Starters",
        cluster_description: "Little activity so far",
        confidence_score: 0.25,
      });
    });

    it("rejects an unknown time of day", async () => {
      const res = await post("/api/v1/cluster-user", { ...CLUSTER_BODY, preferred_time_of_day: "night" });
      expect(res.status).toBe(422);
      expect(await res.json()).toMatchObject({ detail: [{ loc: ["body", "preferred_time_of_day"] }] });
    });

    it("rejects rates above 1", async () => {
      const res = await post("/api/v1/cluster-user", { ...CLUSTER_BODY, content_engagement_rate: 45 });
      expect(res.status).toBe(422);
    });
  });

  describe("POST /api/v1/predict-churn", () => {
    it("returns probability, level and intervention", async () => {
      const res = await post("/api/v1/predict-churn", CHURN_BODY);
      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({
        user_id: "user-1",
        churn_probability: 0.5,
        risk_level: "medium",
        recommended_intervention: INTERVENTIONS.streakChallenges,
        factors_contributing_to_risk: [],
      });
    });

    it("rejects negative counts", async () => {
      const res = await post("/api/v1/predict-churn", { ...CHURN_BODY, total_sessions: -1 });
      expect(res.status).toBe(422);
    });
  });

  describe("daily plans and follow-ups", () => {
    it("generates a plan with defaults applied and stores it", async () => {
      const res = await post("/api/v1/daily-plan", PLAN_BODY);
      expect(res.status).toBe(200);
      const plan = await res.json();
      expect(plan).toEqual({
        plan_id: "plan-1",
        user_id: "user-1",
        plan_date: "2026-03-14",
        motivational_message: "Small steps count.",
        daily_items: [
          { activity: "Box breathing", duration_minutes: 5, description: "Four-count breaths", category: "meditation" },
          { activity: "Screen-free wind-down", duration_minutes: 10, description: "Phone away", category: "sleep" },
        ],
        estimated_total_time: 15,
        follow_up_time: "evening",
      });

      const [request] = chat.completeJson.mock.calls[0];
      expect(request.user).toContain("- Available time: 15 minutes");
      expect(request.user).toContain("- Preferred time: morning");

      const lookup = await fetch(`${baseUrl}/api/v1/plans/plan-1`);
      expect(lookup.status).toBe(200);
      expect(await lookup.json()).toEqual(plan);
    });

    it("follows up on a stored plan", async () => {
      await post("/api/v1/daily-plan", PLAN_BODY);
      const res = await post("/api/v1/plans/plan-1/follow-up", { completed_activities: ["box breathing"] });
      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({
        plan_id: "plan-1",
        user_id: "user-1",
        completed_activities: ["Box breathing"],
        missed_activities: ["Screen-free wind-down"],
        completion_rate: 0.5,
        current_streak: 4,
        message: "Good start.",
        next_step: "Wind down tonight.",
      });
    });

    it("returns 404 for an unknown plan", async () => {
      const lookup = await fetch(`${baseUrl}/api/v1/plans/nope`);
      expect(lookup.status).toBe(404);
      expect(await lookup.json()).toEqual({ detail: "Plan nope not found" });

      const followUp = await post("/api/v1/plans/nope/follow-up", { completed_activities: [] });
      expect(followUp.status).toBe(404);
      expect(await followUp.json()).toEqual({ detail: "Plan nope not found" });
    });

    it("validates the follow-up body", async () => {
      await post("/api/v1/daily-plan", PLAN_BODY);
      const res = await post("/api/v1/plans/plan-1/follow-up", { completed_activities: "Box breathing" });
      expect(res.status).toBe(422);
    });

    it("rejects an available time of zero", async () => {
      const res = await post("/api/v1/daily-plan", { ...PLAN_BODY, available_time_minutes: 0 });
      expect(res.status).toBe(422);
      expect(await res.json()).toMatchObject({ detail: [{ loc: ["body", "available_time_minutes"] }] });
    });
  });

  describe("introspection", () => {
    it("GET /api/v1/models/health reports every service", async () => {
      const res = await fetch(`${baseUrl}/api/v1/models/health`);
      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({
        status: "healthy",
        models: { content_matcher: true, user_clusterer: true, churn_predictor: true, micro_coach: true },
      });
    });

    it("GET /api/v1/content/index-status describes the index", async () => {
      const res = await fetch(`${baseUrl}/api/v1/content/index-status`);
      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({
        content_items_loaded: 3,
        embedding_model: "text-embedding-3-small",
        embedding_dimension: 3,
        embeddings_count: 3,
        fully_ready: true,
      });
    });
  });

  describe("operation failures", () => {
    it("reports a service that cannot be built as 500 with the operation name", async () => {
      await server.close();
      const { factories } = createFactories();
      await start({ ...factories, churnPredictor: () => Promise.reject(new Error("Churn model not found")) });

      const res = await post("/api/v1/predict-churn", CHURN_BODY);
      expect(res.status).toBe(500);
      expect(await res.json()).toEqual({ detail: "Churn prediction failed: Churn model not found" });
      expect(logger.error).toHaveBeenCalledWith("Error in churn prediction: Churn model not found");

      const health = await fetch(`${baseUrl}/api/v1/models/health`);
      expect(await health.json()).toMatchObject({ status: "degraded", models: { churn_predictor: false } });
    });

    it("reports an unusable coach reply as 500", async () => {
      await server.close();
      await start(createFactories("oops").factories);

      const res = await post("/api/v1/daily-plan", PLAN_BODY);
      expect(res.status).toBe(500);
      expect(await res.json()).toEqual({
        detail: "Daily plan generation failed: Invalid JSON response from coach model: oops",
      });
    });
  });
});
