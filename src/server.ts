// Wellness Retention Engine - Express server
//
// REST boundary for the four retention capabilities. Every operation parses its
// body with a zod schema (422 on failure), pulls its service from the registry
// (built on first use), and reports any other failure as
// 500 { detail: "<Operation> failed: <message>" }.

import express, { type Express, type NextFunction, type Request, type Response } from "express";
import { createServer, type Server as HttpServer } from "node:http";
import type * as z from "zod";
import {
  churnPredictionRequestSchema,
  dailyPlanRequestSchema,
  followUpRequestSchema,
  goalMatchRequestSchema,
  toValidationIssues,
  userBehaviorDataSchema,
} from "./schemas.js";
import type { ServiceRegistry } from "./service-registry.js";
import type { ServiceLogger } from "./types.js";
import { createConsoleLogger, describeError } from "./utils.js";

// ─── Constants ──────────────────────────────────────────────────────────────────

export const APP_NAME = "Wellness Retention Engine";
export const APP_VERSION = "1.0.0";
export const SERVICE_NAME = "retention-api";
export const API_PREFIX = "/api/v1";

export const ENDPOINTS = [
  `${API_PREFIX}/match-goal`,
  `${API_PREFIX}/cluster-user`,
  `${API_PREFIX}/predict-churn`,
  `${API_PREFIX}/daily-plan`,
  `${API_PREFIX}/plans/{plan_id}`,
  `${API_PREFIX}/plans/{plan_id}/follow-up`,
  `${API_PREFIX}/models/health`,
  `${API_PREFIX}/content/index-status`,
] as const;

const MAX_BODY_SIZE = "100kb";

// ─── Errors ─────────────────────────────────────────────────────────────────────

/** An error that already knows its HTTP status and response detail. */
export class HttpError extends Error {
  readonly status: number;
  readonly detail: unknown;

  constructor(status: number, detail: unknown) {
    super(typeof detail === "string" ? detail : `HTTP ${status}`);
    this.name = "HttpError";
    this.status = status;
    this.detail = detail;
  }
}

interface BodyParserError {
  status: number;
  type: string;
  message: string;
}

function isBodyParserError(err: unknown): err is BodyParserError {
  return (
    typeof err === "object" &&
    err !== null &&
    "status" in err &&
    typeof err.status === "number" &&
    "type" in err &&
    typeof err.type === "string" &&
    err instanceof Error
  );
}

export function parseBody<S extends z.ZodTypeAny>(schema: S, body: unknown): z.output<S> {
  const result = schema.safeParse(body ?? {});
  if (!result.success) {
    throw new HttpError(422, toValidationIssues(result.error));
  }
  return result.data;
}

// ─── Server Factory ─────────────────────────────────────────────────────────────

export interface CreateServerOptions {
  registry: ServiceRegistry;
  /** Custom logger. Defaults to console-based logger. */
  logger?: ServiceLogger;
}

export interface AppServer {
  app: Express;
  httpServer: HttpServer;
  registry: ServiceRegistry;
  /** Start listening. Resolves with the bound port (useful with port 0). */
  listen(port: number, host?: string): Promise<number>;
  /** Stop accepting connections and wait for open ones to finish. */
  close(): Promise<void>;
}

/**
 * Creates the Express app and HTTP server without listening, so tests can
 * bind an ephemeral port.
 */
export function createAppServer(options: CreateServerOptions): AppServer {
  const { registry, logger = createConsoleLogger("Server") } = options;

  const app = express();
  const httpServer = createServer(app);

  app.disable("x-powered-by");
  app.use(cors);
  app.use(express.json({ limit: MAX_BODY_SIZE }));

  /** Runs an async handler and maps its outcome onto the response. */
  const operation =
    (name: string, handler: (req: Request) => Promise<unknown>) =>
    (req: Request, res: Response): void => {
      void handler(req).then(
        (result) => {
          res.json(result);
        },
        (err: unknown) => sendOperationError(res, name, err, logger),
      );
    };

  // ── Service info ──────────────────────────────────────────────────────────

  app.get("/", (_req, res) => {
    res.json({
      message: `${APP_NAME} API is running`,
      version: APP_VERSION,
      endpoints: ENDPOINTS,
    });
  });

  app.get("/health", (_req, res) => {
    res.json({ status: "healthy", service: SERVICE_NAME });
  });

  // ── Retention operations ──────────────────────────────────────────────────

  app.post(
    `${API_PREFIX}/match-goal`,
    operation("Goal matching", async (req) => {
      const body = parseBody(goalMatchRequestSchema, req.body);
      logger.info(`Matching goal: ${body.goal}`);
      const matcher = await registry.contentMatcher.get();
      return matcher.matchGoal(body.goal, body.limit);
    }),
  );

  app.post(
    `${API_PREFIX}/cluster-user`,
    operation("User clustering", async (req) => {
      const body = parseBody(userBehaviorDataSchema, req.body);
      logger.info(`Clustering user: ${body.user_id}`);
      const clusterer = await registry.userClusterer.get();
      return clusterer.clusterUser(body);
    }),
  );

  app.post(
    `${API_PREFIX}/predict-churn`,
    operation("Churn prediction", async (req) => {
      const body = parseBody(churnPredictionRequestSchema, req.body);
      logger.info(`Predicting churn for user: ${body.user_id}`);
      const predictor = await registry.churnPredictor.get();
      return predictor.predictChurn(body);
    }),
  );

  app.post(
    `${API_PREFIX}/daily-plan`,
    operation("Daily plan generation", async (req) => {
      const body = parseBody(dailyPlanRequestSchema, req.body);
      logger.info(`Generating daily plan for user: ${body.user_id}`);
      const coach = await registry.microCoach.get();
      const plan = await coach.generateDailyPlan(body);
      registry.planStore.save(plan, body);
      return plan;
    }),
  );

  app.get(
    `${API_PREFIX}/plans/:planId`,
    operation("Plan lookup", async (req) => {
      const stored = registry.planStore.get(req.params.planId);
      if (!stored) {
        throw new HttpError(404, `Plan ${req.params.planId} not found`);
      }
      return stored.plan;
    }),
  );

  app.post(
    `${API_PREFIX}/plans/:planId/follow-up`,
    operation("Follow-up generation", async (req) => {
      const stored = registry.planStore.get(req.params.planId);
      if (!stored) {
        throw new HttpError(404, `Plan ${req.params.planId} not found`);
      }
      const body = parseBody(followUpRequestSchema, req.body);
      logger.info(`Following up on plan ${stored.plan.plan_id} for user: ${stored.plan.user_id}`);
      const coach = await registry.microCoach.get();
      return coach.generateFollowUp(stored, body);
    }),
  );

  // ── Introspection ─────────────────────────────────────────────────────────

  app.get(
    `${API_PREFIX}/models/health`,
    operation("Model health check", () => registry.checkHealth()),
  );

  app.get(
    `${API_PREFIX}/content/index-status`,
    operation("Index status", async () => (await registry.contentMatcher.get()).getIndexStatus()),
  );

  // ── Fallthrough ───────────────────────────────────────────────────────────

  app.use((req, res) => {
    res.status(404).json({ detail: `Not found: ${req.method} ${req.path}` });
  });

  // Four arguments mark this as Express error middleware; body-parser failures land here.
  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (isBodyParserError(err) && err.status >= 400 && err.status < 500) {
      const detail = err.type === "entity.parse.failed" ? "Malformed JSON body" : err.message;
      res.status(err.status).json({ detail });
      return;
    }
    logger.error(`Unhandled error: ${describeError(err)}`);
    res.status(500).json({ detail: "Internal server error" });
  });

  return {
    app,
    httpServer,
    registry,
    listen(port: number, host?: string): Promise<number> {
      return new Promise((resolve, reject) => {
        httpServer.once("error", reject);
        const onListening = () => {
          httpServer.off("error", reject);
          const address = httpServer.address();
          const boundPort = typeof address === "object" && address !== null ? address.port : port;
          logger.info(`Server listening on port ${boundPort}`);
          resolve(boundPort);
        };
        if (host === undefined) {
          httpServer.listen(port, onListening);
        } else {
          httpServer.listen(port, host, onListening);
        }
      });
    },
    close(): Promise<void> {
      return new Promise((resolve, reject) => {
        httpServer.close((err) => {
          if (err) reject(err);
          else resolve();
        });
        httpServer.closeAllConnections();
      });
    },
  };
}

// ─── Middleware & helpers ───────────────────────────────────────────────────────

function cors(req: Request, res: Response, next: NextFunction): void {
  res.setHeader("Access-Control-Allow-Origin", "*");
  if (req.method === "OPTIONS") {
    res.setHeader("Access-Control-Allow-Methods", "GET,POST,OPTIONS");
    res.setHeader("Access-Control-Allow-Headers", "Content-Type,Authorization");
    res.status(204).end();
    return;
  }
  next();
}

function sendOperationError(res: Response, operationName: string, err: unknown, logger: ServiceLogger): void {
  if (err instanceof HttpError) {
    res.status(err.status).json({ detail: err.detail });
    return;
  }
  const message = describeError(err);
  logger.error(`Error in ${operationName.toLowerCase()}: ${message}`);
  res.status(500).json({ detail: `${operationName} failed: ${message}` });
}
