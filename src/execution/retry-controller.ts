import { logInfo } from "../lib/logging.js";
import { RetryMode } from "../types.js";
import { classifySafely, FailureClassifier } from "./failure-classifier.js";
import { AttemptContext, AttemptOutcome, AttemptRequest, RunOrchestrator } from "./run-orchestrator.js";

export const MAX_RETRIES_LIMIT = 5;
export const SIMPLE_RETRY_REASON = "simple retry mode";

export interface RetryPolicy {
  maxRetries: number;
  mode: RetryMode;
}

export type RetryableRequest = Omit<
  AttemptRequest,
  "retryAttempt" | "maxRetries" | "originalRunId" | "retryMode" | "retryReason"
>;

export interface RetryChainResult {
  finalStatus: "passed" | "failed";
  runIds: string[];
  attempts: number;
  lastRunId: string;
  lastOutcome: AttemptOutcome;
}

type RetryDecision = { retry: true; reason: string } | { retry: false };

export interface RetryControllerOptions {
  runOrchestrator: RunOrchestrator;
  classifier: FailureClassifier;
}

/** Normalizes a requested policy: mode `none` or zero retries disable retrying. */
export function normalizeRetryPolicy(policy: Partial<RetryPolicy> | undefined): RetryPolicy {
  const requested = Math.floor(Number(policy?.maxRetries ?? 0));
  const maxRetries = Number.isFinite(requested) ? Math.min(MAX_RETRIES_LIMIT, Math.max(0, requested)) : 0;
  const mode = policy?.mode ?? "none";

  if (mode === "none" || maxRetries === 0) {
    return { maxRetries: 0, mode: "none" };
  }

  return { maxRetries, mode };
}

/** Drives the sequential attempts of one logical test run. */
export class RetryController {
  private readonly runOrchestrator: RunOrchestrator;
  private readonly classifier: FailureClassifier;

  constructor(options: RetryControllerOptions) {
    this.runOrchestrator = options.runOrchestrator;
    this.classifier = options.classifier;
  }

  async run(request: RetryableRequest, requestedPolicy: RetryPolicy, context: AttemptContext): Promise<RetryChainResult> {
    const policy = normalizeRetryPolicy(requestedPolicy);
    const runIds: string[] = [];
    let originalRunId: string | null = null;
    let retryReason: string | null = null;
    let attempt = 0;

    while (true) {
      const outcome = await this.runOrchestrator.runAttempt(
        {
          ...request,
          retryAttempt: attempt,
          maxRetries: policy.maxRetries,
          originalRunId,
          retryMode: policy.mode,
          retryReason
        },
        context
      );

      runIds.push(outcome.run.id);
      originalRunId ??= outcome.run.originalRunId ?? outcome.run.id;

      if (outcome.status === "passed" || attempt >= policy.maxRetries) {
        return {
          finalStatus: outcome.status,
          runIds,
          attempts: attempt + 1,
          lastRunId: outcome.run.id,
          lastOutcome: outcome
        };
      }

      const decision = await this.decide(outcome, policy, context);
      if (!decision.retry) {
        return {
          finalStatus: outcome.status,
          runIds,
          attempts: attempt + 1,
          lastRunId: outcome.run.id,
          lastOutcome: outcome
        };
      }

      attempt += 1;
      retryReason = decision.reason;

      logInfo("run.retrying", {
        runId: outcome.run.id,
        attempt: attempt + 1,
        maxAttempts: policy.maxRetries + 1,
        reason: decision.reason
      });

      context.emit({
        type: "test_retry",
        runId: outcome.run.id,
        attempt: attempt + 1,
        maxAttempts: policy.maxRetries + 1,
        reason: decision.reason
      });
    }
  }

  private async decide(outcome: AttemptOutcome, policy: RetryPolicy, context: AttemptContext): Promise<RetryDecision> {
    if (policy.mode !== "intelligent") {
      return { retry: true, reason: SIMPLE_RETRY_REASON };
    }

    // Transport failures leave no failed step to classify.
    if (!outcome.failure) {
      return {
        retry: true,
        reason: outcome.kind === "transport_error" ? `transport error: ${outcome.message}` : SIMPLE_RETRY_REASON
      };
    }

    const verdict = await classifySafely(this.classifier, {
      action: outcome.failure.action,
      target: outcome.failure.target,
      value: outcome.failure.value,
      errorMessage: outcome.failure.error ?? "",
      screenshot: outcome.failure.screenshot
    });

    if (!verdict.isRetryable) {
      logInfo("run.retry_skipped", {
        runId: outcome.run.id,
        category: verdict.category,
        confidence: verdict.confidence
      });

      context.emit({
        type: "retry_skipped",
        runId: outcome.run.id,
        category: verdict.category,
        reason: `Non-retryable: ${verdict.category}`,
        details: verdict.reasoning,
        confidence: verdict.confidence
      });
      return { retry: false };
    }

    return { retry: true, reason: `${verdict.category}: ${verdict.reasoning}` };
  }
}
