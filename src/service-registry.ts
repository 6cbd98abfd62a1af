// Wellness Retention Engine - Service registry
//
// Services are built on first use: the content matcher needs a round of
// embedding calls and the models read their artifacts from disk, and neither
// should stop the HTTP server from coming up. A failed build is forgotten so
// the next request tries again (e.g. after the artifacts have been trained).

import type { AppConfig } from "./config.js";
import { loadContentCatalog } from "./content-catalog.js";
import { ContentMatcher } from "./content-matcher.js";
import { ChurnPredictor } from "./churn-predictor.js";
import { MicroCoach } from "./micro-coach.js";
import { ModelLoader } from "./model-loader.js";
import type { ChatClient, EmbeddingsClient } from "./openai-clients.js";
import { PlanStore } from "./plan-store.js";
import type { ModelsHealth, ServiceLogger, ServiceName } from "./types.js";
import { UserClusterer } from "./user-clusterer.js";
import { createConsoleLogger, describeError } from "./utils.js";

// ─── LazyService ────────────────────────────────────────────────────────────────

export class LazyService<T> {
  readonly name: string;
  private readonly factory: () => Promise<T>;
  private readonly logger: ServiceLogger;
  private pending: Promise<T> | null = null;

  constructor(name: string, factory: () => Promise<T>, logger: ServiceLogger) {
    this.name = name;
    this.factory = factory;
    this.logger = logger;
  }

  /** Concurrent callers share one build. */
  get(): Promise<T> {
    if (this.pending === null) {
      const attempt = Promise.resolve().then(this.factory);
      this.pending = attempt;
      this.logger.info(`Initializing ${this.name}...`);
      void attempt.then(
        () => this.logger.info(`${this.name} ready`),
        (err: unknown) => {
          if (this.pending === attempt) this.pending = null;
          this.logger.error(`Failed to initialize ${this.name}: ${describeError(err)}`);
        },
      );
    }
    return this.pending;
  }
}

// ─── ServiceRegistry ────────────────────────────────────────────────────────────

export interface ServiceFactories {
  contentMatcher: () => Promise<ContentMatcher>;
  userClusterer: () => Promise<UserClusterer>;
  churnPredictor: () => Promise<ChurnPredictor>;
  microCoach: () => Promise<MicroCoach>;
}

export class ServiceRegistry {
  readonly contentMatcher: LazyService<ContentMatcher>;
  readonly userClusterer: LazyService<UserClusterer>;
  readonly churnPredictor: LazyService<ChurnPredictor>;
  readonly microCoach: LazyService<MicroCoach>;
  readonly planStore: PlanStore;
  private readonly logger: ServiceLogger;

  constructor(
    factories: ServiceFactories,
    planStore: PlanStore = new PlanStore(),
    logger: ServiceLogger = createConsoleLogger("ServiceRegistry"),
  ) {
    this.contentMatcher = new LazyService("content matcher", factories.contentMatcher, logger);
    this.userClusterer = new LazyService("user clusterer", factories.userClusterer, logger);
    this.churnPredictor = new LazyService("churn predictor", factories.churnPredictor, logger);
    this.microCoach = new LazyService("micro-coach", factories.microCoach, logger);
    this.planStore = planStore;
    this.logger = logger;
  }

  /**
   * Builds (if needed) and probes every service. One failing service marks
   * only itself unhealthy.
   */
  async checkHealth(): Promise<ModelsHealth> {
    const probe = async (name: ServiceName, check: () => Promise<boolean>): Promise<[ServiceName, boolean]> => {
      try {
        return [name, await check()];
      } catch (err) {
        this.logger.error(`Health check for ${name} failed: ${describeError(err)}`);
        return [name, false];
      }
    };

    const results = await Promise.all([
      probe("content_matcher", async () => (await this.contentMatcher.get()).isReady()),
      probe("user_clusterer", async () => (await this.userClusterer.get()).isReady()),
      probe("churn_predictor", async () => (await this.churnPredictor.get()).isReady()),
      probe("micro_coach", async () => (await this.microCoach.get()).isReady()),
    ]);

    const models: Record<ServiceName, boolean> = {
      content_matcher: false,
      user_clusterer: false,
      churn_predictor: false,
      micro_coach: false,
    };
    for (const [name, healthy] of results) {
      models[name] = healthy;
    }

    return {
      status: results.every(([, healthy]) => healthy) ? "healthy" : "degraded",
      models,
    };
  }
}

// ─── Production wiring ──────────────────────────────────────────────────────────

export interface RegistryClients {
  embeddings: EmbeddingsClient;
  chat: ChatClient;
}

export function createServiceRegistry(
  config: AppConfig,
  clients: RegistryClients,
  logger: ServiceLogger = createConsoleLogger("ServiceRegistry"),
): ServiceRegistry {
  const dataLoader = new ModelLoader(config.dataDir, createConsoleLogger("ModelLoader"));
  const modelsLoader = new ModelLoader(config.modelsDir, createConsoleLogger("ModelLoader"));

  return new ServiceRegistry(
    {
      contentMatcher: async () =>
        ContentMatcher.create({
          client: clients.embeddings,
          catalog: await loadContentCatalog(dataLoader),
          model: config.embeddingModel,
          logger: createConsoleLogger("ContentMatcher"),
        }),
      userClusterer: () => UserClusterer.load(modelsLoader, createConsoleLogger("UserClusterer")),
      churnPredictor: () => ChurnPredictor.load(modelsLoader, createConsoleLogger("ChurnPredictor")),
      microCoach: async () =>
        new MicroCoach({
          client: clients.chat,
          model: config.coachModel,
          logger: createConsoleLogger("MicroCoach"),
        }),
    },
    new PlanStore(config.planStoreCapacity),
    logger,
  );
}
