import { z } from "zod";

export const runStatusSchema = z.enum(["pending", "running", "passed", "failed", "cancelled"]);
export type RunStatus = z.infer<typeof runStatusSchema>;

export const stepStatusSchema = z.enum(["pending", "running", "passed", "failed", "skipped"]);
export type StepStatus = z.infer<typeof stepStatusSchema>;

export const retryModeSchema = z.enum(["none", "simple", "intelligent"]);
export type RetryMode = z.infer<typeof retryModeSchema>;

export const fixtureScopeSchema = z.enum(["test", "cached"]);
export type FixtureScope = z.infer<typeof fixtureScopeSchema>;

export const CAPTURE_STATE_ACTION = "capture_state";
export const RESTORE_STATE_ACTION = "restore_state";

/**
 * A step as the external executor sees it. Everything except `action` is
 * opaque to the orchestration core.
 */
export interface TestStep {
  action: string;
  target?: string | null;
  value?: string | null;
  description?: string;
  fixtureName?: string | null;
  hidden?: boolean;
}

export const testStepSchema = z.object({
  action: z.string().min(1),
  target: z.string().nullable().optional(),
  value: z.string().nullable().optional(),
  description: z.string().optional(),
  fixtureName: z.string().nullable().optional(),
  hidden: z.boolean().optional()
});

export interface Viewport {
  width: number;
  height: number;
}

export interface Project {
  id: string;
  name: string;
  baseUrl: string;
  createdAt: string;
  updatedAt: string;
}

export interface TestCase {
  id: string;
  projectId: string;
  name: string;
  steps: TestStep[];
  fixtureIds: string[];
  createdAt: string;
  updatedAt: string;
}

export interface Fixture {
  id: string;
  projectId: string;
  name: string;
  setupSteps: TestStep[];
  scope: FixtureScope;
  cacheTtlSeconds: number;
  createdAt: string;
  updatedAt: string;
}

export interface TestRun {
  id: string;
  projectId: string;
  testCaseId: string | null;
  browser: string | null;
  status: RunStatus;
  startedAt: string | null;
  completedAt: string | null;
  passCount: number;
  errorCount: number;
  retryAttempt: number;
  maxRetries: number;
  originalRunId: string | null;
  retryMode: RetryMode;
  retryReason: string | null;
  threadId: string | null;
  summary: string | null;
  createdAt: string;
}

export interface TestRunStep {
  id: string;
  runId: string;
  testCaseId: string | null;
  stepNumber: number;
  action: string;
  target: string | null;
  value: string | null;
  status: StepStatus;
  duration: number | null;
  error: string | null;
  screenshot: string | null;
  fixtureName: string | null;
  createdAt: string;
}

export interface FixtureCacheEntry {
  id: string;
  fixtureId: string;
  projectId: string;
  browser: string | null;
  url: string | null;
  encryptedState: string;
  capturedAt: string;
  expiresAt: string;
}

export interface CreateTestRunInput {
  projectId: string;
  testCaseId: string | null;
  browser: string | null;
  retryAttempt: number;
  maxRetries: number;
  originalRunId: string | null;
  retryMode: RetryMode;
  retryReason: string | null;
  threadId: string | null;
  startedAt: string;
}

export interface CompleteTestRunInput {
  status: RunStatus;
  passCount: number;
  errorCount: number;
  summary: string;
  completedAt: string;
}

export interface CreateTestRunStepInput {
  runId: string;
  testCaseId: string | null;
  stepNumber: number;
  action: string;
  target: string | null;
  value: string | null;
  status: StepStatus;
  duration: number | null;
  error: string | null;
  screenshot: string | null;
  fixtureName: string | null;
}

export interface UpsertFixtureCacheEntryInput {
  fixtureId: string;
  projectId: string;
  browser: string | null;
  url: string | null;
  encryptedState: string;
  capturedAt: string;
  expiresAt: string;
}
