import { Router, type NextFunction, type Request, type Response } from "express";
import { z } from "zod";

import type { ObservationEngine } from "../engine/engine.js";
import { transcriptSchema } from "../engine/transcript.js";
import {
  ConfigError,
  ObservationNotFoundError,
  ObservationStateError,
  describeError,
} from "../errors.js";
import type { Logger } from "../logging.js";
import { SEVERITIES, SOURCE_TYPES, VALID_STATUSES } from "../types/observation.js";
import type { DashboardWebSocketHub } from "./websocket.js";

function splitCsv(value: string): string[] {
  return value
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

const listQuerySchema = z.object({
  status: z.string().transform(splitCsv).pipe(z.array(z.enum(VALID_STATUSES))).optional(),
  severity: z.string().transform(splitCsv).pipe(z.array(z.enum(SEVERITIES))).optional(),
  observer: z.string().min(1).optional(),
  sort: z.enum(["severity", "createdAt"]).default("severity"),
  limit: z.coerce.number().int().positive().optional(),
});

const createSchema = z.object({
  observer: z.string().trim().min(1),
  content: z.string().trim().min(1).max(10_000),
  severity: z.enum(SEVERITIES),
  sourceType: z.enum(SOURCE_TYPES).optional(),
  sourceRef: z.string().max(500).optional(),
  category: z.string().max(200).optional(),
  suggestion: z.string().max(5000).optional(),
});

const resolveSchema = z.object({ note: z.string().trim().max(5000).optional() });

const triggerSchema = z.object({
  event: z.string().trim().min(1).default("dashboard"),
  transcript: transcriptSchema.optional(),
});

const CYCLE_ID_PATTERN = /^[A-Za-z0-9._-]+$/;

type AsyncHandler = (req: Request, res: Response) => Promise<void>;

function route(handler: AsyncHandler) {
  return (req: Request, res: Response, next: NextFunction): void => {
    handler(req, res).catch(next);
  };
}

function param(req: Request, name: string): string {
  const value = req.params[name];
  return typeof value === "string" ? value : "";
}

export function statusForError(error: unknown): number {
  if (error instanceof ObservationNotFoundError) return 404;
  if (error instanceof ObservationStateError) return 409;
  if (error instanceof ConfigError || error instanceof z.ZodError) return 400;
  return 500;
}

export function createDashboardApiRouter(
  engine: ObservationEngine,
  wsHub?: DashboardWebSocketHub,
  logger?: Logger,
): Router {
  const router = Router();
  const { store } = engine;

  function notifyUpdated(): void {
    wsHub?.broadcast({
      type: "observations-updated",
      sessionId: engine.sessionId,
      payload: { at: new Date().toISOString() },
    });
  }

  router.get(
    "/session",
    route(async (_req, res) => {
      res.json({
        sessionId: engine.sessionId,
        observers: engine.config.observers.map((observer) => ({
          name: observer.name,
          description: observer.description,
          enabled: observer.enabled,
          watch: observer.watch,
        })),
        open: await store.countBySeverity({ status: "open" }),
        acknowledged: await store.count({ status: "acknowledged" }),
      });
    }),
  );

  router.get(
    "/observations",
    route(async (req, res) => {
      const query = listQuerySchema.parse(req.query);
      const observations = await store.list({
        status: query.status,
        severity: query.severity,
        observerName: query.observer,
        sortBy: query.sort,
        limit: query.limit,
      });
      res.json({ count: observations.length, observations });
    }),
  );

  router.get(
    "/observations/:id",
    route(async (req, res) => {
      res.json(await store.get(param(req, "id")));
    }),
  );

  router.post(
    "/observations",
    route(async (req, res) => {
      const body = createSchema.parse(req.body);
      const observation = await store.create({
        observerName: body.observer,
        content: body.content,
        severity: body.severity,
        sourceType: body.sourceType,
        sourceRef: body.sourceRef,
        category: body.category,
        suggestion: body.suggestion,
      });
      notifyUpdated();
      res.status(201).json(observation);
    }),
  );

  router.post(
    "/observations/:id/acknowledge",
    route(async (req, res) => {
      const observation = await store.acknowledge(param(req, "id"));
      notifyUpdated();
      res.json(observation);
    }),
  );

  router.post(
    "/observations/:id/resolve",
    route(async (req, res) => {
      const body = resolveSchema.parse(req.body ?? {});
      const observation = await store.resolve(param(req, "id"), body.note || undefined);
      notifyUpdated();
      res.json(observation);
    }),
  );

  router.delete(
    "/observations/resolved",
    route(async (_req, res) => {
      const removed = await store.clearResolved();
      if (removed > 0) {
        notifyUpdated();
      }
      res.json({ removed });
    }),
  );

  router.get(
    "/cycles",
    route(async (_req, res) => {
      res.json({ cycles: await engine.cycleLog.listIds() });
    }),
  );

  router.get(
    "/cycles/latest",
    route(async (_req, res) => {
      const latest = await engine.cycleLog.latest();
      if (!latest) {
        res.status(404).json({ error: "No observation cycles recorded yet." });
        return;
      }
      res.json(latest);
    }),
  );

  router.get(
    "/cycles/:id",
    route(async (req, res) => {
      const cycleId = param(req, "id");
      const cycle = CYCLE_ID_PATTERN.test(cycleId) ? await engine.cycleLog.get(cycleId) : null;
      if (!cycle) {
        res.status(404).json({ error: `Cycle not found: ${cycleId}` });
        return;
      }
      res.json(cycle);
    }),
  );

  router.post(
    "/trigger",
    route(async (req, res) => {
      const body = triggerSchema.parse(req.body ?? {});
      const summary = await engine.runCycle({
        event: body.event,
        transcript: body.transcript,
      });
      res.json(summary);
    }),
  );

  router.use((error: unknown, _req: Request, res: Response, _next: NextFunction) => {
    const status = statusForError(error);
    if (status === 500) {
      logger?.error("Dashboard request failed", error);
    }
    const message =
      error instanceof z.ZodError
        ? error.issues.map((issue) => `${issue.path.join(".") || "body"}: ${issue.message}`).join("; ")
        : describeError(error);
    res.status(status).json({ error: message });
  });

  return router;
}
