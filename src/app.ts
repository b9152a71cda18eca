import cors from "cors";
import express from "express";
import { randomUUID } from "node:crypto";
import { ZodError, z } from "zod";
import { ExecutionEvent, formatSseFrame } from "./execution/events.js";
import { ExecutionRegistry } from "./execution/execution-registry.js";
import { ExecutionService } from "./execution/execution-service.js";
import { FixtureCache } from "./execution/fixture-cache.js";
import { MAX_RETRIES_LIMIT, RetryPolicy } from "./execution/retry-controller.js";
import { ExecutorTransportError, StepExecutor } from "./execution/step-executor.js";
import { ExecutionStore } from "./lib/execution-store.js";
import { logError, logInfo, logWarn, serializeError } from "./lib/logging.js";
import { FixtureCacheEntry, TestRun } from "./types.js";

export class HttpError extends Error {
  readonly status: number;
  readonly details?: unknown;

  constructor(status: number, message: string, details?: unknown) {
    super(message);
    this.status = status;
    this.details = details;
  }
}

const idSchema = z.string().uuid();

const retrySchema = z.object({
  maxRetries: z.number().int().min(0).max(MAX_RETRIES_LIMIT).default(0),
  retryMode: z.enum(["simple", "intelligent"]).default("simple")
});

const viewportSchema = z.object({
  width: z.number().int().min(200).max(7680),
  height: z.number().int().min(200).max(4320)
});

const runTestCaseSchema = z.object({
  browser: z.string().trim().min(1).max(100).nullish(),
  viewport: viewportSchema.nullish(),
  retry: retrySchema.nullish()
});

const runBatchSchema = z.object({
  testCaseIds: z.array(idSchema).min(1).max(500),
  browsers: z.array(z.string().trim().min(1).max(100)).max(10).optional(),
  parallel: z.number().int().min(1).max(5).default(1),
  viewport: viewportSchema.nullish(),
  retry: retrySchema.nullish()
});

const fixturePreviewSchema = z.object({
  browser: z.string().trim().min(1).max(100).nullish(),
  viewport: viewportSchema.nullish()
});

const listRunsQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(500).optional(),
  offset: z.coerce.number().int().min(0).optional()
});

const fixtureStateQuerySchema = z.object({
  browser: z.string().trim().min(1).max(100).optional()
});

export interface AppDependencies {
  store: ExecutionStore;
  executionService: ExecutionService;
  fixtureCache: FixtureCache;
  executor: StepExecutor;
  registry: ExecutionRegistry;
  intelligentRetryEnabled: boolean;
  corsAllowedOrigins: string[];
}

const requestIds = new WeakMap<express.Request, string>();

function getRequestId(req: express.Request): string {
  return requestIds.get(req) || "unknown";
}

function toRetryPolicy(input: z.infer<typeof retrySchema> | null | undefined): RetryPolicy {
  if (!input || input.maxRetries === 0) {
    return { maxRetries: 0, mode: "none" };
  }

  return { maxRetries: input.maxRetries, mode: input.retryMode };
}

function publicCacheEntry(entry: FixtureCacheEntry): Omit<FixtureCacheEntry, "encryptedState"> {
  return {
    id: entry.id,
    fixtureId: entry.fixtureId,
    projectId: entry.projectId,
    browser: entry.browser,
    url: entry.url,
    capturedAt: entry.capturedAt,
    expiresAt: entry.expiresAt
  };
}

/**
 * Writes an event stream as SSE frames. A disconnected client only stops
 * the writes; the execution behind the stream runs to completion.
 */
async function pipeEvents(req: express.Request, res: express.Response, events: AsyncIterable<ExecutionEvent>) {
  const requestId = getRequestId(req);
  let disconnected = false;

  res.status(200);
  res.setHeader("Content-Type", "text/event-stream");
  res.setHeader("Cache-Control", "no-cache");
  res.setHeader("Connection", "keep-alive");
  res.setHeader("X-Accel-Buffering", "no");
  res.flushHeaders();

  res.once("close", () => {
    if (!res.writableEnded) {
      disconnected = true;
      logWarn("http.stream_client_disconnected", { requestId, path: req.path });
    }
  });

  for await (const event of events) {
    if (disconnected) {
      break;
    }
    res.write(formatSseFrame(event));
  }

  if (!disconnected) {
    res.end();
  }
}

export function createApp(deps: AppDependencies): express.Express {
  const app = express();

  app.use(
    cors({
      origin(origin, callback) {
        if (!origin || deps.corsAllowedOrigins.includes(origin)) {
          callback(null, true);
          return;
        }

        callback(new Error("Origin not allowed by CORS."));
      },
      credentials: true
    })
  );

  app.use(express.json({ limit: "2mb" }));

  app.use((req, res, next) => {
    const requestIdHeader = req.headers["x-request-id"];
    const requestId = typeof requestIdHeader === "string" && requestIdHeader ? requestIdHeader : randomUUID();

    requestIds.set(req, requestId);
    res.setHeader("x-request-id", requestId);

    const startedAt = Date.now();

    logInfo("http.request", {
      requestId,
      method: req.method,
      path: req.path
    });

    res.on("finish", () => {
      logInfo("http.response", {
        requestId,
        method: req.method,
        path: req.path,
        statusCode: res.statusCode,
        durationMs: Date.now() - startedAt
      });
    });

    next();
  });

  async function requireRun(runId: string): Promise<TestRun> {
    const run = await deps.store.getTestRun(idSchema.parse(runId));
    if (!run) {
      throw new HttpError(404, "Test run not found.");
    }
    return run;
  }

  app.get("/api/health", async (_req, res, next) => {
    try {
      const executorAvailable = await deps.executor.healthCheck();
      res.json({
        ok: true,
        executorAvailable,
        activeExecutions: deps.registry.size,
        now: new Date().toISOString()
      });
    } catch (error) {
      next(error);
    }
  });

  app.get("/api/browsers", async (req, res, next) => {
    try {
      const list = await deps.executor.listBrowsers();
      res.json({ ...list, available: true });
    } catch (error) {
      if (error instanceof ExecutorTransportError) {
        logWarn("executor.browsers_unavailable", { requestId: getRequestId(req), ...serializeError(error) });
        res.json({ browsers: [], default: null, available: false });
        return;
      }
      next(error);
    }
  });

  app.post("/api/test-cases/:testCaseId/runs/stream", async (req, res, next) => {
    try {
      const testCaseId = idSchema.parse(req.params.testCaseId);
      const parsed = runTestCaseSchema.parse(req.body ?? {});

      if (parsed.retry?.retryMode === "intelligent" && !deps.intelligentRetryEnabled) {
        throw new HttpError(
          400,
          "Intelligent retry is not enabled on this deployment. Use retryMode 'simple' or contact your administrator."
        );
      }

      const events = deps.executionService.streamTestCase(testCaseId, {
        browser: parsed.browser ?? null,
        viewport: parsed.viewport ?? null,
        retry: toRetryPolicy(parsed.retry)
      });

      await pipeEvents(req, res, events);
    } catch (error) {
      next(error);
    }
  });

  app.post("/api/projects/:projectId/batches/stream", async (req, res, next) => {
    try {
      const projectId = idSchema.parse(req.params.projectId);
      const parsed = runBatchSchema.parse(req.body ?? {});

      if (parsed.retry?.retryMode === "intelligent" && !deps.intelligentRetryEnabled) {
        throw new HttpError(
          400,
          "Intelligent retry is not enabled on this deployment. Use retryMode 'simple' or contact your administrator."
        );
      }

      const events = deps.executionService.streamBatch(projectId, {
        testCaseIds: parsed.testCaseIds,
        browsers: parsed.browsers ?? [],
        parallel: parsed.parallel,
        retry: toRetryPolicy(parsed.retry),
        viewport: parsed.viewport ?? null
      });

      await pipeEvents(req, res, events);
    } catch (error) {
      next(error);
    }
  });

  app.get("/api/projects/:projectId/runs", async (req, res, next) => {
    try {
      const projectId = idSchema.parse(req.params.projectId);
      const query = listRunsQuerySchema.parse(req.query);
      const project = await deps.store.getProject(projectId);

      if (!project) {
        throw new HttpError(404, "Project not found.");
      }

      const runs = await deps.store.listTestRunsByProject(project.id, query);
      res.json({ runs });
    } catch (error) {
      next(error);
    }
  });

  app.get("/api/runs/:runId", async (req, res, next) => {
    try {
      const run = await requireRun(req.params.runId);
      res.json({ run });
    } catch (error) {
      next(error);
    }
  });

  app.get("/api/runs/:runId/steps", async (req, res, next) => {
    try {
      const run = await requireRun(req.params.runId);
      const steps = await deps.store.listTestRunSteps(run.id);
      res.json({ steps });
    } catch (error) {
      next(error);
    }
  });

  app.get("/api/runs/:runId/retry-chain", async (req, res, next) => {
    try {
      const run = await requireRun(req.params.runId);
      const originalRunId = run.originalRunId ?? run.id;
      const runs = await deps.store.listRetryChain(originalRunId);
      res.json({ originalRunId, runs });
    } catch (error) {
      next(error);
    }
  });

  app.get("/api/fixtures/:fixtureId/state", async (req, res, next) => {
    try {
      const fixtureId = idSchema.parse(req.params.fixtureId);
      const query = fixtureStateQuerySchema.parse(req.query);
      const fixture = await deps.store.getFixture(fixtureId);

      if (!fixture) {
        throw new HttpError(404, "Fixture not found.");
      }

      const entry = await deps.fixtureCache.getValidEntry(fixture.id, query.browser ?? null);
      res.json({ state: entry ? publicCacheEntry(entry) : null });
    } catch (error) {
      next(error);
    }
  });

  app.post("/api/fixtures/:fixtureId/preview/stream", async (req, res, next) => {
    try {
      const fixtureId = idSchema.parse(req.params.fixtureId);
      const parsed = fixturePreviewSchema.parse(req.body ?? {});

      const events = deps.executionService.streamFixturePreview(fixtureId, {
        browser: parsed.browser ?? null,
        viewport: parsed.viewport ?? null
      });

      await pipeEvents(req, res, events);
    } catch (error) {
      next(error);
    }
  });

  app.delete("/api/fixtures/:fixtureId/state", async (req, res, next) => {
    try {
      const fixtureId = idSchema.parse(req.params.fixtureId);
      const fixture = await deps.store.getFixture(fixtureId);

      if (!fixture) {
        throw new HttpError(404, "Fixture not found.");
      }

      const removed = await deps.fixtureCache.invalidate(fixture.id);
      res.json({ removed });
    } catch (error) {
      next(error);
    }
  });

  app.get("/api/executions", (_req, res) => {
    res.json({ executions: deps.registry.list() });
  });

  app.use((error: unknown, req: express.Request, res: express.Response, _next: express.NextFunction) => {
    const requestId = getRequestId(req);

    if (res.headersSent) {
      logError("http.error.after_headers", { requestId, ...serializeError(error) });
      res.end();
      return;
    }

    if (error instanceof ZodError) {
      logError("http.error.validation", {
        requestId,
        details: error.issues.map((issue) => issue.message)
      });

      res.status(400).json({
        error: "Invalid request payload.",
        details: error.issues.map((issue) => issue.message)
      });
      return;
    }

    if (error instanceof HttpError) {
      logError("http.error", {
        requestId,
        statusCode: error.status,
        details: error.details,
        ...serializeError(error)
      });

      res.status(error.status).json({
        error: error.message,
        ...(error.details !== undefined ? { details: error.details } : {})
      });
      return;
    }

    logError("http.error.unhandled", {
      requestId,
      ...serializeError(error)
    });

    res.status(500).json({ error: "Internal server error." });
  });

  return app;
}
