import { ExecutionStore } from "../lib/execution-store.js";
import { errorMessage, logDebug, logError, logWarn, serializeError } from "../lib/logging.js";
import { TestCase, Viewport } from "../types.js";
import { AsyncChannel } from "./async-channel.js";
import {
  BatchOrchestrator,
  BatchResult,
  clampParallel,
  createBatchId,
  effectiveBrowsers,
  MAX_BATCH_PARALLEL
} from "./batch-orchestrator.js";
import { EventSink, EXECUTOR_UNAVAILABLE_WARNING, ExecutionEvent } from "./events.js";
import { ExecutionKind, ExecutionRegistry } from "./execution-registry.js";
import { FixtureCache } from "./fixture-cache.js";
import { RetryChainResult, RetryController, RetryPolicy } from "./retry-controller.js";
import { SimulatedStepExecutor, StepExecutor } from "./step-executor.js";
import { StepResolver } from "./step-resolver.js";
import { buildFixturePreviewPlan, buildTestPlan } from "./test-plan.js";

export const EXECUTOR_UNAVAILABLE_MESSAGE = "Step executor unavailable, using simulation mode";

export interface TestCaseRunOptions {
  browser: string | null;
  viewport: Viewport | null;
  retry: RetryPolicy;
}

export interface FixturePreviewOptions {
  browser: string | null;
  viewport: Viewport | null;
}

export interface BatchRunOptions {
  testCaseIds: string[];
  browsers: Array<string | null>;
  parallel: number;
  retry: RetryPolicy;
  viewport: Viewport | null;
}

export interface ExecutionServiceOptions {
  store: ExecutionStore;
  executor: StepExecutor;
  fallbackExecutor?: StepExecutor;
  fixtureCache: FixtureCache;
  stepResolver: StepResolver;
  retryController: RetryController;
  batchOrchestrator: BatchOrchestrator;
  registry: ExecutionRegistry;
  maxParallel?: number;
}

/**
 * Entry point for streamed executions. Each call returns an event stream
 * that ends after the final event; failures surface as `error` events.
 */
export class ExecutionService {
  private readonly store: ExecutionStore;
  private readonly executor: StepExecutor;
  private readonly fallbackExecutor: StepExecutor;
  private readonly fixtureCache: FixtureCache;
  private readonly stepResolver: StepResolver;
  private readonly retryController: RetryController;
  private readonly batchOrchestrator: BatchOrchestrator;
  private readonly registry: ExecutionRegistry;
  private readonly maxParallel: number;

  constructor(options: ExecutionServiceOptions) {
    this.store = options.store;
    this.executor = options.executor;
    this.fallbackExecutor = options.fallbackExecutor ?? new SimulatedStepExecutor();
    this.fixtureCache = options.fixtureCache;
    this.stepResolver = options.stepResolver;
    this.retryController = options.retryController;
    this.batchOrchestrator = options.batchOrchestrator;
    this.registry = options.registry;
    this.maxParallel = clampParallel(options.maxParallel ?? MAX_BATCH_PARALLEL);
  }

  streamTestCase(testCaseId: string, options: TestCaseRunOptions): AsyncIterable<ExecutionEvent> {
    return this.stream("test_case", (emit) => this.runTestCase(testCaseId, options, emit));
  }

  streamBatch(projectId: string, options: BatchRunOptions): AsyncIterable<ExecutionEvent> {
    return this.stream("batch", (emit) => this.runBatch(projectId, options, emit));
  }

  streamFixturePreview(fixtureId: string, options: FixturePreviewOptions): AsyncIterable<ExecutionEvent> {
    return this.stream("fixture_preview", (emit) => this.runFixturePreview(fixtureId, options, emit));
  }

  async runTestCase(
    testCaseId: string,
    options: TestCaseRunOptions,
    emit: EventSink
  ): Promise<RetryChainResult | null> {
    const testCase = await this.store.getTestCase(testCaseId);
    if (!testCase) {
      emit({ type: "error", message: "Test case not found" });
      return null;
    }

    const project = await this.store.getProject(testCase.projectId);
    if (!project) {
      emit({ type: "error", message: "Project not found" });
      return null;
    }

    if (testCase.steps.length === 0) {
      emit({ type: "error", message: "No steps defined in test case" });
      return null;
    }

    const executor = await this.selectExecutor(emit);
    const handle = this.registry.register({
      kind: "test_case",
      projectId: project.id,
      testCaseIds: [testCase.id],
      browsers: [options.browser],
      batchId: null
    });

    try {
      const plan = await buildTestPlan(
        { fixtureCache: this.fixtureCache, stepResolver: this.stepResolver },
        testCase,
        options.browser
      );

      return await this.retryController.run(
        {
          projectId: project.id,
          testCaseId: testCase.id,
          baseUrl: project.baseUrl,
          browser: options.browser,
          viewport: options.viewport,
          executableSteps: plan.executableSteps,
          displaySteps: plan.displaySteps,
          captureFixtures: plan.captureFixtures,
          threadId: null
        },
        options.retry,
        { executor, emit }
      );
    } finally {
      this.registry.release(handle);
    }
  }

  /**
   * Runs a fixture's setup steps on their own as a single unretried run.
   * A passing capture step on a cache-scoped fixture stores its state.
   */
  async runFixturePreview(
    fixtureId: string,
    options: FixturePreviewOptions,
    emit: EventSink
  ): Promise<RetryChainResult | null> {
    const fixture = await this.store.getFixture(fixtureId);
    if (!fixture) {
      emit({ type: "error", message: "Fixture not found" });
      return null;
    }

    const project = await this.store.getProject(fixture.projectId);
    if (!project) {
      emit({ type: "error", message: "Project not found" });
      return null;
    }

    if (fixture.setupSteps.length === 0) {
      emit({ type: "error", message: "No setup steps defined in fixture" });
      return null;
    }

    const executor = await this.selectExecutor(emit);
    const handle = this.registry.register({
      kind: "fixture_preview",
      projectId: project.id,
      testCaseIds: [],
      browsers: [options.browser],
      batchId: null
    });

    try {
      const plan = await buildFixturePreviewPlan(this.stepResolver, fixture);

      return await this.retryController.run(
        {
          projectId: project.id,
          testCaseId: null,
          baseUrl: project.baseUrl,
          browser: options.browser,
          viewport: options.viewport,
          executableSteps: plan.executableSteps,
          displaySteps: plan.displaySteps,
          captureFixtures: plan.captureFixtures,
          threadId: null
        },
        { maxRetries: 0, mode: "none" },
        { executor, emit }
      );
    } finally {
      this.registry.release(handle);
    }
  }

  async runBatch(projectId: string, options: BatchRunOptions, emit: EventSink): Promise<BatchResult | null> {
    const project = await this.store.getProject(projectId);
    if (!project) {
      emit({ type: "error", message: "Project not found" });
      return null;
    }

    const testCases: TestCase[] = [];
    for (const testCaseId of Array.from(new Set(options.testCaseIds))) {
      const testCase = await this.store.getTestCase(testCaseId);
      if (testCase && testCase.projectId === project.id) {
        testCases.push(testCase);
      } else {
        logWarn("batch.test_case_ignored", { projectId, testCaseId });
      }
    }

    if (testCases.length === 0) {
      emit({ type: "error", message: "No valid test cases found" });
      return null;
    }

    const executor = await this.selectExecutor(emit);
    const batchId = createBatchId();
    const browsers = effectiveBrowsers(options.browsers);
    const handle = this.registry.register({
      kind: "batch",
      projectId: project.id,
      testCaseIds: testCases.map((testCase) => testCase.id),
      browsers,
      batchId
    });

    try {
      return await this.batchOrchestrator.run(
        {
          project,
          testCases,
          browsers,
          parallel: clampParallel(options.parallel, this.maxParallel),
          retry: options.retry,
          viewport: options.viewport,
          batchId
        },
        { executor, emit }
      );
    } finally {
      this.registry.release(handle);
    }
  }

  private async selectExecutor(emit: EventSink): Promise<StepExecutor> {
    if (await this.executor.healthCheck()) {
      return this.executor;
    }

    logWarn("executor.unavailable", { fallback: "simulation" });
    emit({
      type: "warning",
      code: EXECUTOR_UNAVAILABLE_WARNING,
      message: EXECUTOR_UNAVAILABLE_MESSAGE
    });
    return this.fallbackExecutor;
  }

  private stream(scope: ExecutionKind, task: (emit: EventSink) => Promise<unknown>): AsyncIterable<ExecutionEvent> {
    const channel = new AsyncChannel<ExecutionEvent>();
    const emit: EventSink = (event) => channel.push(event);

    const pump = async (): Promise<void> => {
      try {
        await task(emit);
      } catch (error) {
        logError(`${scope}.stream_failed`, { error: serializeError(error) });
        emit({ type: "error", message: errorMessage(error) });
      } finally {
        channel.close();
        logDebug("execution.stream_closed", { scope });
      }
    };

    void pump();
    return channel;
  }
}
