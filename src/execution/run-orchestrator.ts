import { ExecutionStore } from "../lib/execution-store.js";
import { errorMessage, logError, logInfo, logWarn, serializeError } from "../lib/logging.js";
import { CAPTURE_STATE_ACTION, Fixture, RetryMode, TestRun, TestStep, Viewport } from "../types.js";
import { EventSink } from "./events.js";
import { FixtureCache } from "./fixture-cache.js";
import { ExecutorEvent, StepCompletedSignal, StepExecutor } from "./step-executor.js";

export interface FailureSnapshot {
  action: string;
  target: string | null;
  value: string | null;
  error: string | null;
  screenshot: string | null;
}

export interface AttemptRequest {
  projectId: string;
  testCaseId: string | null;
  baseUrl: string;
  browser: string | null;
  viewport: Viewport | null;
  executableSteps: TestStep[];
  displaySteps: TestStep[];
  captureFixtures: Fixture[];
  retryAttempt: number;
  maxRetries: number;
  originalRunId: string | null;
  retryMode: RetryMode;
  retryReason: string | null;
  threadId: string | null;
}

interface StepTally {
  passCount: number;
  errorCount: number;
  failure: FailureSnapshot | null;
}

interface AttemptTally {
  passCount: number;
  errorCount: number;
  skippedCount: number;
  summary: string;
  failure: FailureSnapshot | null;
}

export type AttemptOutcome =
  | ({ kind: "completed"; run: TestRun; status: "passed" | "failed" } & AttemptTally)
  | ({ kind: "transport_error"; run: TestRun; status: "failed"; message: string } & AttemptTally);

export interface AttemptContext {
  executor: StepExecutor;
  emit: EventSink;
}

export interface RunOrchestratorOptions {
  store: ExecutionStore;
  fixtureCache: FixtureCache;
  now?: () => Date;
}

export function summarizeAttempt(total: number, passCount: number, errorCount: number): string {
  const executed = passCount + errorCount;
  const skipped = Math.max(0, total - executed);

  if (skipped > 0) {
    return `Executed ${executed} of ${total} steps: ${passCount} passed, ${errorCount} failed, ${skipped} skipped`;
  }

  return `Executed ${total} steps: ${passCount} passed, ${errorCount} failed`;
}

/** Runs one attempt of a test and owns its run and step records. */
export class RunOrchestrator {
  private readonly store: ExecutionStore;
  private readonly fixtureCache: FixtureCache;
  private readonly now: () => Date;

  constructor(options: RunOrchestratorOptions) {
    this.store = options.store;
    this.fixtureCache = options.fixtureCache;
    this.now = options.now ?? (() => new Date());
  }

  async runAttempt(request: AttemptRequest, context: AttemptContext): Promise<AttemptOutcome> {
    if (request.executableSteps.length !== request.displaySteps.length) {
      throw new Error("Executable and display steps must have the same length.");
    }

    const run = await this.store.createTestRun({
      projectId: request.projectId,
      testCaseId: request.testCaseId,
      browser: request.browser,
      retryAttempt: request.retryAttempt,
      maxRetries: request.maxRetries,
      originalRunId: request.originalRunId,
      retryMode: request.retryMode,
      retryReason: request.retryReason,
      threadId: request.threadId,
      startedAt: this.now().toISOString()
    });

    logInfo("run.created", {
      runId: run.id,
      testCaseId: request.testCaseId,
      browser: request.browser,
      retryAttempt: request.retryAttempt,
      totalSteps: request.executableSteps.length
    });

    context.emit({
      type: "run_started",
      runId: run.id,
      testCaseId: request.testCaseId,
      totalSteps: request.executableSteps.length,
      retryAttempt: request.retryAttempt,
      maxRetries: request.maxRetries,
      originalRunId: run.originalRunId,
      retryMode: request.retryMode
    });

    const tally: StepTally = {
      passCount: 0,
      errorCount: 0,
      failure: null
    };
    let transportError: string | null = null;

    try {
      transportError = await this.consume(run, request, context, tally);
    } catch (error) {
      logError("run.aborted", { runId: run.id, error: serializeError(error) });
      await this.finalize(run, request, tally, "failed").catch((finalizeError: unknown) => {
        logError("run.finalize_failed", { runId: run.id, error: serializeError(finalizeError) });
      });
      throw error;
    }

    const status = tally.errorCount === 0 && transportError === null ? "passed" : "failed";
    const completed = await this.finalize(run, request, tally, status);

    context.emit({
      type: "run_completed",
      runId: completed.run.id,
      status,
      passCount: tally.passCount,
      errorCount: tally.errorCount,
      skippedCount: completed.skippedCount,
      summary: completed.summary,
      retryAttempt: request.retryAttempt,
      maxRetries: request.maxRetries
    });

    const base = {
      run: completed.run,
      passCount: tally.passCount,
      errorCount: tally.errorCount,
      skippedCount: completed.skippedCount,
      summary: completed.summary,
      failure: tally.failure
    };

    if (transportError !== null) {
      return { kind: "transport_error", status: "failed", message: transportError, ...base };
    }

    return { kind: "completed", status, ...base };
  }

  /** Consumes executor events; resolves with the transport error message, if any. */
  private async consume(
    run: TestRun,
    request: AttemptRequest,
    context: AttemptContext,
    tally: StepTally
  ): Promise<string | null> {
    const events = context.executor.execute(request.baseUrl, request.executableSteps, {
      testId: request.testCaseId ?? run.id,
      browser: request.browser,
      viewport: request.viewport,
      screenshotOnFailure: true
    });

    const iterator = events[Symbol.asyncIterator]();

    try {
      while (true) {
        let next: IteratorResult<ExecutorEvent>;
        try {
          next = await iterator.next();
        } catch (error) {
          const message = `Executor stream failed: ${errorMessage(error)}`;
          logWarn("run.executor_stream_failed", { runId: run.id, error: serializeError(error) });
          context.emit({ type: "error", message });
          return message;
        }

        if (next.done) {
          return null;
        }

        const event = next.value;
        switch (event.type) {
          case "step_started": {
            const display = this.displayStep(request, event.stepNumber, event.action);
            context.emit({
              type: "step_started",
              runId: run.id,
              stepNumber: event.stepNumber,
              action: display.action,
              target: display.target ?? null,
              value: display.value ?? null,
              description: display.description ?? event.description,
              fixtureName: display.fixtureName ?? null,
              hidden: display.hidden ?? false
            });
            break;
          }
          case "step_retry": {
            const display = this.displayStep(request, event.stepNumber, null);
            context.emit({
              type: "step_retry",
              runId: run.id,
              stepNumber: event.stepNumber,
              attempt: event.attempt,
              maxAttempts: event.maxAttempts,
              error: event.error,
              target: display.target ?? null,
              value: display.value ?? null
            });
            break;
          }
          case "step_completed":
            await this.recordStep(run, request, event, context, tally);
            break;
          case "completed":
            break;
          case "error":
            logWarn("run.executor_error", { runId: run.id, message: event.message });
            context.emit({ type: "error", message: event.message });
            return event.message;
        }
      }
    } finally {
      await iterator.return?.();
    }
  }

  private displayStep(request: AttemptRequest, stepNumber: number, fallbackAction: string | null): TestStep {
    const display = request.displaySteps[stepNumber - 1];
    if (display) {
      return display;
    }
    return { action: fallbackAction ?? "unknown", target: null, value: null };
  }

  private async recordStep(
    run: TestRun,
    request: AttemptRequest,
    event: StepCompletedSignal,
    context: AttemptContext,
    tally: StepTally
  ): Promise<void> {
    const display = this.displayStep(request, event.stepNumber, event.action);
    const executable = request.executableSteps[event.stepNumber - 1];

    await this.store.createTestRunStep({
      runId: run.id,
      testCaseId: request.testCaseId,
      stepNumber: event.stepNumber,
      action: display.action,
      target: display.target ?? null,
      value: display.value ?? null,
      status: event.status,
      duration: event.duration,
      error: event.error,
      screenshot: event.screenshot,
      fixtureName: display.fixtureName ?? null
    });

    if (event.status === "passed") {
      tally.passCount += 1;
    } else {
      tally.errorCount += 1;
      tally.failure ??= {
        action: display.action,
        target: display.target ?? null,
        value: display.value ?? null,
        error: event.error,
        screenshot: event.screenshot
      };
    }

    if (
      executable?.action === CAPTURE_STATE_ACTION &&
      event.status === "passed" &&
      request.captureFixtures.length > 0
    ) {
      await this.persistCapturedState(run, request, event);
    }

    context.emit({
      type: "step_completed",
      runId: run.id,
      stepNumber: event.stepNumber,
      action: display.action,
      target: display.target ?? null,
      value: display.value ?? null,
      status: event.status,
      duration: event.duration,
      error: event.error,
      screenshot: event.screenshot,
      fixtureName: display.fixtureName ?? null,
      hidden: display.hidden ?? false
    });
  }

  // Cache writes are best effort: a failed save never fails the run.
  private async persistCapturedState(run: TestRun, request: AttemptRequest, event: StepCompletedSignal): Promise<void> {
    if (event.result === null || event.result === undefined) {
      logWarn("fixture_cache.capture_empty", { runId: run.id, stepNumber: event.stepNumber });
      return;
    }

    for (const fixture of request.captureFixtures) {
      try {
        await this.fixtureCache.save({
          fixtureId: fixture.id,
          projectId: fixture.projectId,
          browser: request.browser,
          url: event.url,
          state: event.result,
          ttlSeconds: fixture.cacheTtlSeconds
        });
      } catch (error) {
        logWarn("fixture_cache.save_failed", {
          runId: run.id,
          fixtureId: fixture.id,
          error: serializeError(error)
        });
      }
    }
  }

  private async finalize(
    run: TestRun,
    request: AttemptRequest,
    tally: StepTally,
    status: "passed" | "failed"
  ): Promise<{ run: TestRun; summary: string; skippedCount: number }> {
    const total = request.executableSteps.length;
    const skippedCount = Math.max(0, total - (tally.passCount + tally.errorCount));
    const summary = summarizeAttempt(total, tally.passCount, tally.errorCount);

    const completed = await this.store.completeTestRun(run.id, {
      status,
      passCount: tally.passCount,
      errorCount: tally.errorCount,
      summary,
      completedAt: this.now().toISOString()
    });

    logInfo("run.completed", {
      runId: run.id,
      status,
      passCount: tally.passCount,
      errorCount: tally.errorCount,
      skippedCount
    });

    return { run: completed, summary, skippedCount };
  }
}
