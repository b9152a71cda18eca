import { RetryMode, RunStatus, StepStatus } from "../types.js";

/**
 * Fields a batch attaches to every event a worker produces so that consumers
 * can demultiplex the merged stream.
 */
export interface EventCorrelation {
  testCaseId?: string | null;
  browser?: string | null;
}

export interface RunStartedEvent extends EventCorrelation {
  type: "run_started";
  runId: string;
  testCaseId: string | null;
  totalSteps: number;
  retryAttempt: number;
  maxRetries: number;
  originalRunId: string | null;
  retryMode: RetryMode;
}

export interface StepStartedEvent extends EventCorrelation {
  type: "step_started";
  runId: string;
  stepNumber: number;
  action: string;
  target: string | null;
  value: string | null;
  description: string | null;
  fixtureName: string | null;
  hidden: boolean;
}

export interface StepRetryEvent extends EventCorrelation {
  type: "step_retry";
  runId: string;
  stepNumber: number;
  attempt: number | null;
  maxAttempts: number | null;
  error: string | null;
  target: string | null;
  value: string | null;
}

export interface StepCompletedEvent extends EventCorrelation {
  type: "step_completed";
  runId: string;
  stepNumber: number;
  action: string;
  target: string | null;
  value: string | null;
  status: StepStatus;
  duration: number;
  error: string | null;
  screenshot: string | null;
  fixtureName: string | null;
  hidden: boolean;
}

export interface RunCompletedEvent extends EventCorrelation {
  type: "run_completed";
  runId: string;
  status: RunStatus;
  passCount: number;
  errorCount: number;
  skippedCount: number;
  summary: string;
  retryAttempt: number;
  maxRetries: number;
}

export interface TestRetryEvent extends EventCorrelation {
  type: "test_retry";
  runId: string;
  attempt: number;
  maxAttempts: number;
  reason: string;
}

export interface RetrySkippedEvent extends EventCorrelation {
  type: "retry_skipped";
  runId: string;
  category: string;
  reason: string;
  details: string;
  confidence: number;
}

export interface BatchStartedEvent extends EventCorrelation {
  type: "batch_started";
  batchId: string;
  totalTests: number;
  testCaseIds: string[];
  browsers: Array<string | null>;
  parallel: number;
}

export interface TestStartedEvent extends EventCorrelation {
  type: "test_started";
  testCaseId: string;
  name: string;
  browser: string | null;
  index: number;
  total: number;
}

export type TestOutcomeStatus = "passed" | "failed" | "skipped";

export interface TestCompletedEvent extends EventCorrelation {
  type: "test_completed";
  testCaseId: string;
  browser: string | null;
  runId: string | null;
  status: TestOutcomeStatus;
  passCount: number;
  errorCount: number;
  attempts: number;
}

export interface BatchCompletedEvent extends EventCorrelation {
  type: "batch_completed";
  batchId: string;
  passed: number;
  failed: number;
  skipped: number;
  total: number;
  runIds: string[];
}

export interface WarningEvent extends EventCorrelation {
  type: "warning";
  code: string;
  message: string;
}

export interface ErrorEvent extends EventCorrelation {
  type: "error";
  message: string;
}

export type ExecutionEvent =
  | RunStartedEvent
  | StepStartedEvent
  | StepRetryEvent
  | StepCompletedEvent
  | RunCompletedEvent
  | TestRetryEvent
  | RetrySkippedEvent
  | BatchStartedEvent
  | TestStartedEvent
  | TestCompletedEvent
  | BatchCompletedEvent
  | WarningEvent
  | ErrorEvent;

export type EventSink = (event: ExecutionEvent) => void;

export const EXECUTOR_UNAVAILABLE_WARNING = "executor_unavailable";

export function annotateEvent<E extends ExecutionEvent>(event: E, correlation: Required<EventCorrelation>): E & Required<EventCorrelation> {
  return {
    ...event,
    testCaseId: correlation.testCaseId,
    browser: correlation.browser
  };
}

export function errorEvent(message: string, correlation: EventCorrelation = {}): ErrorEvent {
  return {
    type: "error",
    message,
    ...correlation
  };
}

export function formatSseFrame(event: ExecutionEvent): string {
  return `data: ${JSON.stringify(event)}\n\n`;
}
