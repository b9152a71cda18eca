import { randomBytes } from "node:crypto";
import { errorMessage, logError, logInfo, serializeError } from "../lib/logging.js";
import { Project, TestCase, Viewport } from "../types.js";
import { annotateEvent, errorEvent, EventSink, TestOutcomeStatus } from "./events.js";
import { RetryController, RetryPolicy } from "./retry-controller.js";
import { AttemptContext } from "./run-orchestrator.js";
import { Semaphore } from "./semaphore.js";
import { buildTestPlan, TestPlanDependencies } from "./test-plan.js";

export const MAX_BATCH_PARALLEL = 5;

export interface BatchRequest {
  project: Project;
  testCases: TestCase[];
  browsers: Array<string | null>;
  parallel: number;
  retry: RetryPolicy;
  viewport: Viewport | null;
  batchId?: string;
}

export interface BatchResult {
  batchId: string;
  passed: number;
  failed: number;
  skipped: number;
  total: number;
  runIds: string[];
}

export interface BatchOrchestratorOptions extends TestPlanDependencies {
  retryController: RetryController;
  maxParallel?: number;
}

interface WorkItem {
  testCase: TestCase;
  browser: string | null;
  index: number;
}

interface WorkResult {
  status: TestOutcomeStatus;
  runIds: string[];
}

export function createBatchId(): string {
  return `batch-${randomBytes(4).toString("hex")}`;
}

/** Requested browsers without duplicates, or the executor default when none are named. */
export function effectiveBrowsers(requested: Array<string | null> | undefined): Array<string | null> {
  const unique = Array.from(new Set((requested ?? []).map((browser) => browser?.trim() || null)));
  return unique.length > 0 ? unique : [null];
}

export function clampParallel(value: number | undefined, max = MAX_BATCH_PARALLEL): number {
  const candidate = Math.floor(Number(value ?? 1));
  if (!Number.isFinite(candidate)) {
    return 1;
  }
  return Math.min(Math.max(1, max), Math.max(1, candidate));
}

/**
 * Fans a set of test cases out across browsers. Each browser gets its own
 * semaphore, so `parallel` bounds concurrency per browser, not globally.
 */
export class BatchOrchestrator {
  private readonly retryController: RetryController;
  private readonly planDeps: TestPlanDependencies;
  private readonly maxParallel: number;

  constructor(options: BatchOrchestratorOptions) {
    this.retryController = options.retryController;
    this.planDeps = {
      fixtureCache: options.fixtureCache,
      stepResolver: options.stepResolver
    };
    this.maxParallel = clampParallel(options.maxParallel ?? MAX_BATCH_PARALLEL);
  }

  async run(request: BatchRequest, context: AttemptContext): Promise<BatchResult> {
    const batchId = request.batchId ?? createBatchId();
    const browsers = effectiveBrowsers(request.browsers);
    const parallel = clampParallel(request.parallel, this.maxParallel);

    const items: WorkItem[] = [];
    for (const browser of browsers) {
      for (const testCase of request.testCases) {
        items.push({ testCase, browser, index: items.length + 1 });
      }
    }

    const semaphores = new Map<string | null, Semaphore>(browsers.map((browser) => [browser, new Semaphore(parallel)]));

    logInfo("batch.started", {
      batchId,
      projectId: request.project.id,
      totalTests: items.length,
      browsers,
      parallel
    });

    context.emit({
      type: "batch_started",
      batchId,
      totalTests: items.length,
      testCaseIds: request.testCases.map((testCase) => testCase.id),
      browsers,
      parallel
    });

    const results = await Promise.all(
      items.map((item) => {
        const semaphore = semaphores.get(item.browser) ?? new Semaphore(parallel);
        return semaphore.use(() => this.runWorker(request, batchId, item, items.length, context));
      })
    );

    const summary: BatchResult = {
      batchId,
      passed: results.filter((result) => result.status === "passed").length,
      failed: results.filter((result) => result.status === "failed").length,
      skipped: results.filter((result) => result.status === "skipped").length,
      total: items.length,
      runIds: results.flatMap((result) => result.runIds)
    };

    logInfo("batch.completed", { ...summary, runIds: summary.runIds.length });

    context.emit({
      type: "batch_completed",
      batchId,
      passed: summary.passed,
      failed: summary.failed,
      skipped: summary.skipped,
      total: summary.total,
      runIds: summary.runIds
    });

    return summary;
  }

  /** Never rejects: worker failures become a scoped `error` event and a failed result. */
  private async runWorker(
    request: BatchRequest,
    batchId: string,
    item: WorkItem,
    total: number,
    context: AttemptContext
  ): Promise<WorkResult> {
    const correlation = { testCaseId: item.testCase.id, browser: item.browser };
    const emit: EventSink = (event) => context.emit(annotateEvent(event, correlation));
    const runIds: string[] = [];

    emit({
      type: "test_started",
      testCaseId: item.testCase.id,
      name: item.testCase.name,
      browser: item.browser,
      index: item.index,
      total
    });

    if (item.testCase.steps.length === 0) {
      emit({
        type: "test_completed",
        testCaseId: item.testCase.id,
        browser: item.browser,
        runId: null,
        status: "skipped",
        passCount: 0,
        errorCount: 0,
        attempts: 0
      });
      return { status: "skipped", runIds };
    }

    try {
      const plan = await buildTestPlan(this.planDeps, item.testCase, item.browser);

      const chain = await this.retryController.run(
        {
          projectId: request.project.id,
          testCaseId: item.testCase.id,
          baseUrl: request.project.baseUrl,
          browser: item.browser,
          viewport: request.viewport,
          executableSteps: plan.executableSteps,
          displaySteps: plan.displaySteps,
          captureFixtures: plan.captureFixtures,
          threadId: batchId
        },
        request.retry,
        { executor: context.executor, emit }
      );

      runIds.push(...chain.runIds);

      emit({
        type: "test_completed",
        testCaseId: item.testCase.id,
        browser: item.browser,
        runId: chain.lastRunId,
        status: chain.finalStatus,
        passCount: chain.lastOutcome.passCount,
        errorCount: chain.lastOutcome.errorCount,
        attempts: chain.attempts
      });

      return { status: chain.finalStatus, runIds };
    } catch (error) {
      logError("batch.worker_failed", {
        batchId,
        testCaseId: item.testCase.id,
        browser: item.browser,
        error: serializeError(error)
      });

      context.emit(errorEvent(errorMessage(error), correlation));
      return { status: "failed", runIds };
    }
  }
}
