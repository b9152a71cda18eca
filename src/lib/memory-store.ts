import { randomUUID } from "node:crypto";
import { assertRunTransition } from "../execution/run-status.js";
import {
  CompleteTestRunInput,
  CreateTestRunInput,
  CreateTestRunStepInput,
  Fixture,
  FixtureCacheEntry,
  Project,
  TestCase,
  TestRun,
  TestRunStep,
  UpsertFixtureCacheEntryInput
} from "../types.js";
import {
  ExecutionStore,
  ListRunsOptions,
  normalizeListLimit,
  normalizeListOffset,
  toBrowserKey
} from "./execution-store.js";

function clone<T>(value: T): T {
  return structuredClone(value);
}

export type SeedProjectInput = Partial<Project> & Pick<Project, "name" | "baseUrl">;
export type SeedTestCaseInput = Partial<TestCase> & Pick<TestCase, "projectId" | "name">;
export type SeedFixtureInput = Partial<Fixture> & Pick<Fixture, "projectId" | "name">;

/**
 * Process-local store used by the test suite and by `EXECUTION_STORE=memory`.
 * Records are cloned on the way in and out so callers never share references.
 */
export class InMemoryExecutionStore implements ExecutionStore {
  private readonly projects = new Map<string, Project>();
  private readonly testCases = new Map<string, TestCase>();
  private readonly fixtures = new Map<string, Fixture>();
  private readonly runs = new Map<string, TestRun>();
  private readonly steps = new Map<string, TestRunStep[]>();
  private readonly cacheEntries = new Map<string, FixtureCacheEntry>();
  private runSequence = 0;

  async initialize(): Promise<void> {}

  async close(): Promise<void> {}

  seedProject(input: SeedProjectInput): Project {
    const now = new Date().toISOString();
    const project: Project = {
      id: input.id ?? randomUUID(),
      name: input.name,
      baseUrl: input.baseUrl,
      createdAt: input.createdAt ?? now,
      updatedAt: input.updatedAt ?? now
    };
    this.projects.set(project.id, project);
    return clone(project);
  }

  seedTestCase(input: SeedTestCaseInput): TestCase {
    const now = new Date().toISOString();
    const testCase: TestCase = {
      id: input.id ?? randomUUID(),
      projectId: input.projectId,
      name: input.name,
      steps: input.steps ?? [],
      fixtureIds: input.fixtureIds ?? [],
      createdAt: input.createdAt ?? now,
      updatedAt: input.updatedAt ?? now
    };
    this.testCases.set(testCase.id, clone(testCase));
    return clone(testCase);
  }

  seedFixture(input: SeedFixtureInput): Fixture {
    const now = new Date().toISOString();
    const fixture: Fixture = {
      id: input.id ?? randomUUID(),
      projectId: input.projectId,
      name: input.name,
      setupSteps: input.setupSteps ?? [],
      scope: input.scope ?? "cached",
      cacheTtlSeconds: input.cacheTtlSeconds ?? 3600,
      createdAt: input.createdAt ?? now,
      updatedAt: input.updatedAt ?? now
    };
    this.fixtures.set(fixture.id, clone(fixture));
    return clone(fixture);
  }

  async getProject(projectId: string): Promise<Project | undefined> {
    const project = this.projects.get(projectId);
    return project ? clone(project) : undefined;
  }

  async getTestCase(testCaseId: string): Promise<TestCase | undefined> {
    const testCase = this.testCases.get(testCaseId);
    return testCase ? clone(testCase) : undefined;
  }

  async getFixture(fixtureId: string): Promise<Fixture | undefined> {
    const fixture = this.fixtures.get(fixtureId);
    return fixture ? clone(fixture) : undefined;
  }

  async createTestRun(input: CreateTestRunInput): Promise<TestRun> {
    const id = randomUUID();
    const now = new Date().toISOString();
    this.runSequence += 1;

    const run: TestRun = {
      id,
      projectId: input.projectId,
      testCaseId: input.testCaseId,
      browser: input.browser,
      status: "running",
      startedAt: input.startedAt,
      completedAt: null,
      passCount: 0,
      errorCount: 0,
      retryAttempt: input.retryAttempt,
      maxRetries: input.maxRetries,
      originalRunId: input.originalRunId ?? id,
      retryMode: input.retryMode,
      retryReason: input.retryReason,
      threadId: input.threadId,
      summary: null,
      createdAt: now
    };

    this.runs.set(id, run);
    this.steps.set(id, []);
    return clone(run);
  }

  async completeTestRun(runId: string, input: CompleteTestRunInput): Promise<TestRun> {
    const current = this.runs.get(runId);
    if (!current) {
      throw new Error(`Test run not found: ${runId}`);
    }

    assertRunTransition(current.status, input.status);

    const updated: TestRun = {
      ...current,
      status: input.status,
      passCount: input.passCount,
      errorCount: input.errorCount,
      summary: input.summary,
      completedAt: input.completedAt
    };
    this.runs.set(runId, updated);
    return clone(updated);
  }

  async getTestRun(runId: string): Promise<TestRun | undefined> {
    const run = this.runs.get(runId);
    return run ? clone(run) : undefined;
  }

  async listTestRunsByProject(projectId: string, options: ListRunsOptions = {}): Promise<TestRun[]> {
    const limit = normalizeListLimit(options.limit);
    const offset = normalizeListOffset(options.offset);

    // Insertion order breaks ties between runs created in the same millisecond.
    return Array.from(this.runs.values())
      .filter((run) => run.projectId === projectId)
      .map((run, index) => ({ run, index }))
      .sort((a, b) => b.run.createdAt.localeCompare(a.run.createdAt) || b.index - a.index)
      .slice(offset, offset + limit)
      .map((entry) => clone(entry.run));
  }

  async listRetryChain(originalRunId: string): Promise<TestRun[]> {
    return Array.from(this.runs.values())
      .filter((run) => run.originalRunId === originalRunId)
      .sort((a, b) => a.retryAttempt - b.retryAttempt)
      .map((run) => clone(run));
  }

  async createTestRunStep(input: CreateTestRunStepInput): Promise<TestRunStep> {
    const bucket = this.steps.get(input.runId);
    if (!bucket) {
      throw new Error(`Test run not found: ${input.runId}`);
    }

    if (bucket.some((step) => step.stepNumber === input.stepNumber)) {
      throw new Error(`Duplicate step number ${input.stepNumber} for run ${input.runId}`);
    }

    const step: TestRunStep = {
      id: randomUUID(),
      ...input,
      createdAt: new Date().toISOString()
    };
    bucket.push(step);
    return clone(step);
  }

  async listTestRunSteps(runId: string): Promise<TestRunStep[]> {
    return (this.steps.get(runId) ?? [])
      .slice()
      .sort((a, b) => a.stepNumber - b.stepNumber)
      .map((step) => clone(step));
  }

  async upsertFixtureCacheEntry(input: UpsertFixtureCacheEntryInput): Promise<FixtureCacheEntry> {
    const entry: FixtureCacheEntry = {
      id: randomUUID(),
      ...input
    };
    this.cacheEntries.set(cacheKey(input.fixtureId, input.browser), entry);
    return clone(entry);
  }

  async findValidFixtureCacheEntries(
    fixtureId: string,
    browser: string | null,
    nowIso: string
  ): Promise<FixtureCacheEntry[]> {
    const now = Date.parse(nowIso);
    const browserKey = toBrowserKey(browser);

    return Array.from(this.cacheEntries.values())
      .filter((entry) => entry.fixtureId === fixtureId)
      .filter((entry) => Date.parse(entry.expiresAt) > now)
      .filter((entry) => entry.browser === null || toBrowserKey(entry.browser) === browserKey)
      .sort((a, b) => {
        const exactA = toBrowserKey(a.browser) === browserKey ? 1 : 0;
        const exactB = toBrowserKey(b.browser) === browserKey ? 1 : 0;
        return exactB - exactA || b.capturedAt.localeCompare(a.capturedAt);
      })
      .map((entry) => clone(entry));
  }

  async listFixtureCacheEntries(fixtureId: string): Promise<FixtureCacheEntry[]> {
    return Array.from(this.cacheEntries.values())
      .filter((entry) => entry.fixtureId === fixtureId)
      .sort((a, b) => b.capturedAt.localeCompare(a.capturedAt))
      .map((entry) => clone(entry));
  }

  async deleteFixtureCacheEntries(fixtureId: string): Promise<number> {
    let removed = 0;
    for (const [key, entry] of this.cacheEntries) {
      if (entry.fixtureId === fixtureId) {
        this.cacheEntries.delete(key);
        removed += 1;
      }
    }
    return removed;
  }

  /** Number of runs created so far; used by tests to assert attempt counts. */
  get runCount(): number {
    return this.runSequence;
  }
}

function cacheKey(fixtureId: string, browser: string | null): string {
  return `${fixtureId}::${toBrowserKey(browser)}`;
}
