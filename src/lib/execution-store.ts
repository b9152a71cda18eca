import { randomUUID } from "node:crypto";
import { Pool, PoolClient, QueryResultRow } from "pg";
import { assertRunTransition } from "../execution/run-status.js";
import {
  CompleteTestRunInput,
  CreateTestRunInput,
  CreateTestRunStepInput,
  Fixture,
  FixtureCacheEntry,
  FixtureScope,
  Project,
  RetryMode,
  RunStatus,
  StepStatus,
  TestCase,
  TestRun,
  TestRunStep,
  TestStep,
  UpsertFixtureCacheEntryInput,
  testStepSchema
} from "../types.js";

/**
 * Read side of the project / test case / fixture definitions. Authoring and
 * persistence of these records live outside the orchestration core.
 */
export interface TestCatalog {
  getProject(projectId: string): Promise<Project | undefined>;
  getTestCase(testCaseId: string): Promise<TestCase | undefined>;
  getFixture(fixtureId: string): Promise<Fixture | undefined>;
}

export interface ListRunsOptions {
  limit?: number;
  offset?: number;
}

export interface ExecutionStore extends TestCatalog {
  createTestRun(input: CreateTestRunInput): Promise<TestRun>;
  completeTestRun(runId: string, input: CompleteTestRunInput): Promise<TestRun>;
  getTestRun(runId: string): Promise<TestRun | undefined>;
  listTestRunsByProject(projectId: string, options?: ListRunsOptions): Promise<TestRun[]>;
  listRetryChain(originalRunId: string): Promise<TestRun[]>;
  createTestRunStep(input: CreateTestRunStepInput): Promise<TestRunStep>;
  listTestRunSteps(runId: string): Promise<TestRunStep[]>;
  upsertFixtureCacheEntry(input: UpsertFixtureCacheEntryInput): Promise<FixtureCacheEntry>;
  /** Entries for the fixture usable by `browser` that expire after `nowIso`, exact browser matches first. */
  findValidFixtureCacheEntries(fixtureId: string, browser: string | null, nowIso: string): Promise<FixtureCacheEntry[]>;
  listFixtureCacheEntries(fixtureId: string): Promise<FixtureCacheEntry[]>;
  deleteFixtureCacheEntries(fixtureId: string): Promise<number>;
  initialize(): Promise<void>;
  close(): Promise<void>;
}

export function normalizeListLimit(value: number | undefined, fallback = 100): number {
  const candidate = Number(value);
  if (!Number.isFinite(candidate)) {
    return fallback;
  }
  return Math.min(500, Math.max(1, Math.floor(candidate)));
}

export function normalizeListOffset(value: number | undefined): number {
  const candidate = Number(value);
  if (!Number.isFinite(candidate)) {
    return 0;
  }
  return Math.max(0, Math.floor(candidate));
}

/** Cache rows key a missing browser as the empty string so the unique index covers it. */
export function toBrowserKey(browser: string | null): string {
  return browser ?? "";
}

const schemaSql = `
CREATE TABLE IF NOT EXISTS projects (
  id UUID PRIMARY KEY,
  name TEXT NOT NULL,
  base_url TEXT NOT NULL,
  created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
  updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
);

CREATE TABLE IF NOT EXISTS test_cases (
  id UUID PRIMARY KEY,
  project_id UUID NOT NULL REFERENCES projects(id) ON DELETE CASCADE,
  name TEXT NOT NULL,
  steps JSONB NOT NULL DEFAULT '[]'::jsonb,
  fixture_ids JSONB NOT NULL DEFAULT '[]'::jsonb,
  created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
  updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
);

CREATE INDEX IF NOT EXISTS idx_test_cases_project_id ON test_cases (project_id);

CREATE TABLE IF NOT EXISTS fixtures (
  id UUID PRIMARY KEY,
  project_id UUID NOT NULL REFERENCES projects(id) ON DELETE CASCADE,
  name TEXT NOT NULL,
  setup_steps JSONB NOT NULL DEFAULT '[]'::jsonb,
  scope TEXT NOT NULL DEFAULT 'cached' CHECK (scope IN ('test', 'cached')),
  cache_ttl_seconds INTEGER NOT NULL DEFAULT 3600,
  created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
  updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
);

CREATE INDEX IF NOT EXISTS idx_fixtures_project_id ON fixtures (project_id);

CREATE TABLE IF NOT EXISTS test_runs (
  id UUID PRIMARY KEY,
  project_id UUID NOT NULL REFERENCES projects(id) ON DELETE CASCADE,
  test_case_id UUID REFERENCES test_cases(id) ON DELETE CASCADE,
  browser TEXT,
  status TEXT NOT NULL CHECK (status IN ('pending', 'running', 'passed', 'failed', 'cancelled')),
  started_at TIMESTAMPTZ,
  completed_at TIMESTAMPTZ,
  pass_count INTEGER NOT NULL DEFAULT 0,
  error_count INTEGER NOT NULL DEFAULT 0,
  retry_attempt INTEGER NOT NULL DEFAULT 0,
  max_retries INTEGER NOT NULL DEFAULT 0,
  original_run_id UUID REFERENCES test_runs(id),
  retry_mode TEXT NOT NULL DEFAULT 'none' CHECK (retry_mode IN ('none', 'simple', 'intelligent')),
  retry_reason TEXT,
  thread_id TEXT,
  summary TEXT,
  created_at TIMESTAMPTZ NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_test_runs_project_created_at ON test_runs (project_id, created_at DESC);
CREATE INDEX IF NOT EXISTS idx_test_runs_original_run_id ON test_runs (original_run_id);
CREATE INDEX IF NOT EXISTS idx_test_runs_thread_id ON test_runs (thread_id);

CREATE TABLE IF NOT EXISTS test_run_steps (
  id UUID PRIMARY KEY,
  run_id UUID NOT NULL REFERENCES test_runs(id) ON DELETE CASCADE,
  test_case_id UUID,
  step_number INTEGER NOT NULL,
  action TEXT NOT NULL,
  target TEXT,
  value TEXT,
  status TEXT NOT NULL CHECK (status IN ('pending', 'running', 'passed', 'failed', 'skipped')),
  duration INTEGER,
  error TEXT,
  screenshot TEXT,
  fixture_name TEXT,
  created_at TIMESTAMPTZ NOT NULL
);

CREATE UNIQUE INDEX IF NOT EXISTS idx_test_run_steps_run_step_number ON test_run_steps (run_id, step_number);

CREATE TABLE IF NOT EXISTS fixture_cache_entries (
  id UUID PRIMARY KEY,
  fixture_id UUID NOT NULL REFERENCES fixtures(id) ON DELETE CASCADE,
  project_id UUID NOT NULL REFERENCES projects(id) ON DELETE CASCADE,
  browser TEXT,
  browser_key TEXT NOT NULL,
  url TEXT,
  encrypted_state TEXT NOT NULL,
  captured_at TIMESTAMPTZ NOT NULL,
  expires_at TIMESTAMPTZ NOT NULL
);

CREATE UNIQUE INDEX IF NOT EXISTS idx_fixture_cache_entries_fixture_browser
  ON fixture_cache_entries (fixture_id, browser_key);
`;

interface DbProjectRow {
  id: string;
  name: string;
  base_url: string;
  created_at: Date | string;
  updated_at: Date | string;
}

interface DbTestCaseRow {
  id: string;
  project_id: string;
  name: string;
  steps: unknown;
  fixture_ids: unknown;
  created_at: Date | string;
  updated_at: Date | string;
}

interface DbFixtureRow {
  id: string;
  project_id: string;
  name: string;
  setup_steps: unknown;
  scope: FixtureScope;
  cache_ttl_seconds: number;
  created_at: Date | string;
  updated_at: Date | string;
}

interface DbTestRunRow {
  id: string;
  project_id: string;
  test_case_id: string | null;
  browser: string | null;
  status: RunStatus;
  started_at: Date | string | null;
  completed_at: Date | string | null;
  pass_count: number;
  error_count: number;
  retry_attempt: number;
  max_retries: number;
  original_run_id: string | null;
  retry_mode: RetryMode;
  retry_reason: string | null;
  thread_id: string | null;
  summary: string | null;
  created_at: Date | string;
}

interface DbTestRunStepRow {
  id: string;
  run_id: string;
  test_case_id: string | null;
  step_number: number;
  action: string;
  target: string | null;
  value: string | null;
  status: StepStatus;
  duration: number | null;
  error: string | null;
  screenshot: string | null;
  fixture_name: string | null;
  created_at: Date | string;
}

interface DbFixtureCacheEntryRow {
  id: string;
  fixture_id: string;
  project_id: string;
  browser: string | null;
  url: string | null;
  encrypted_state: string;
  captured_at: Date | string;
  expires_at: Date | string;
}

const testRunSelectColumns = `id, project_id, test_case_id, browser, status, started_at, completed_at,
  pass_count, error_count, retry_attempt, max_retries, original_run_id, retry_mode, retry_reason,
  thread_id, summary, created_at`;

const testRunStepSelectColumns = `id, run_id, test_case_id, step_number, action, target, value, status,
  duration, error, screenshot, fixture_name, created_at`;

const fixtureCacheEntrySelectColumns = `id, fixture_id, project_id, browser, url, encrypted_state, captured_at, expires_at`;

function toIso(value: Date | string): string {
  if (value instanceof Date) {
    return value.toISOString();
  }
  return new Date(value).toISOString();
}

function toIsoOrNull(value: Date | string | null): string | null {
  return value === null ? null : toIso(value);
}

function parseSteps(value: unknown): TestStep[] {
  const raw = typeof value === "string" ? JSON.parse(value) : value;
  return testStepSchema.array().parse(raw ?? []);
}

function parseIdList(value: unknown): string[] {
  const raw = typeof value === "string" ? JSON.parse(value) : value;
  if (!Array.isArray(raw)) {
    return [];
  }
  return raw.map((entry) => String(entry)).filter(Boolean);
}

function mapProject(row: DbProjectRow): Project {
  return {
    id: row.id,
    name: row.name,
    baseUrl: row.base_url,
    createdAt: toIso(row.created_at),
    updatedAt: toIso(row.updated_at)
  };
}

function mapTestCase(row: DbTestCaseRow): TestCase {
  return {
    id: row.id,
    projectId: row.project_id,
    name: row.name,
    steps: parseSteps(row.steps),
    fixtureIds: parseIdList(row.fixture_ids),
    createdAt: toIso(row.created_at),
    updatedAt: toIso(row.updated_at)
  };
}

function mapFixture(row: DbFixtureRow): Fixture {
  return {
    id: row.id,
    projectId: row.project_id,
    name: row.name,
    setupSteps: parseSteps(row.setup_steps),
    scope: row.scope,
    cacheTtlSeconds: Number(row.cache_ttl_seconds) || 3600,
    createdAt: toIso(row.created_at),
    updatedAt: toIso(row.updated_at)
  };
}

function mapTestRun(row: DbTestRunRow): TestRun {
  return {
    id: row.id,
    projectId: row.project_id,
    testCaseId: row.test_case_id,
    browser: row.browser,
    status: row.status,
    startedAt: toIsoOrNull(row.started_at),
    completedAt: toIsoOrNull(row.completed_at),
    passCount: Number(row.pass_count) || 0,
    errorCount: Number(row.error_count) || 0,
    retryAttempt: Number(row.retry_attempt) || 0,
    maxRetries: Number(row.max_retries) || 0,
    originalRunId: row.original_run_id,
    retryMode: row.retry_mode,
    retryReason: row.retry_reason,
    threadId: row.thread_id,
    summary: row.summary,
    createdAt: toIso(row.created_at)
  };
}

function mapTestRunStep(row: DbTestRunStepRow): TestRunStep {
  return {
    id: row.id,
    runId: row.run_id,
    testCaseId: row.test_case_id,
    stepNumber: Number(row.step_number) || 0,
    action: row.action,
    target: row.target,
    value: row.value,
    status: row.status,
    duration: row.duration === null ? null : Number(row.duration),
    error: row.error,
    screenshot: row.screenshot,
    fixtureName: row.fixture_name,
    createdAt: toIso(row.created_at)
  };
}

function mapFixtureCacheEntry(row: DbFixtureCacheEntryRow): FixtureCacheEntry {
  return {
    id: row.id,
    fixtureId: row.fixture_id,
    projectId: row.project_id,
    browser: row.browser,
    url: row.url,
    encryptedState: row.encrypted_state,
    capturedAt: toIso(row.captured_at),
    expiresAt: toIso(row.expires_at)
  };
}

export interface PostgresExecutionStoreOptions {
  databaseUrl: string;
  ssl?: boolean;
}

export class PostgresExecutionStore implements ExecutionStore {
  private readonly pool: Pool;

  constructor(options: PostgresExecutionStoreOptions) {
    this.pool = new Pool({
      connectionString: options.databaseUrl,
      ssl: options.ssl
        ? {
            rejectUnauthorized: process.env.DATABASE_SSL_REJECT_UNAUTHORIZED !== "false"
          }
        : undefined
    });
  }

  async initialize(): Promise<void> {
    const client = await this.pool.connect();

    try {
      await client.query(`SELECT pg_advisory_lock(51822704)`);
      await client.query(schemaSql);
    } finally {
      await client.query(`SELECT pg_advisory_unlock(51822704)`).catch(() => undefined);
      client.release();
    }
  }

  async close(): Promise<void> {
    await this.pool.end();
  }

  async withTransaction<T>(runner: (client: PoolClient) => Promise<T>): Promise<T> {
    const client = await this.pool.connect();

    try {
      await client.query("BEGIN");
      const result = await runner(client);
      await client.query("COMMIT");
      return result;
    } catch (error) {
      await client.query("ROLLBACK");
      throw error;
    } finally {
      client.release();
    }
  }

  private async runQuery<T extends QueryResultRow>(sql: string, values: unknown[] = [], client?: PoolClient) {
    if (client) {
      return client.query<T>(sql, values);
    }

    return this.pool.query<T>(sql, values);
  }

  async getProject(projectId: string): Promise<Project | undefined> {
    const result = await this.runQuery<DbProjectRow>(
      `SELECT id, name, base_url, created_at, updated_at
       FROM projects
       WHERE id = $1`,
      [projectId]
    );

    return result.rows[0] ? mapProject(result.rows[0]) : undefined;
  }

  async getTestCase(testCaseId: string): Promise<TestCase | undefined> {
    const result = await this.runQuery<DbTestCaseRow>(
      `SELECT id, project_id, name, steps, fixture_ids, created_at, updated_at
       FROM test_cases
       WHERE id = $1`,
      [testCaseId]
    );

    return result.rows[0] ? mapTestCase(result.rows[0]) : undefined;
  }

  async getFixture(fixtureId: string): Promise<Fixture | undefined> {
    const result = await this.runQuery<DbFixtureRow>(
      `SELECT id, project_id, name, setup_steps, scope, cache_ttl_seconds, created_at, updated_at
       FROM fixtures
       WHERE id = $1`,
      [fixtureId]
    );

    return result.rows[0] ? mapFixture(result.rows[0]) : undefined;
  }

  async createTestRun(input: CreateTestRunInput): Promise<TestRun> {
    const runId = randomUUID();
    const now = new Date().toISOString();

    // The first attempt of a chain is its own origin.
    const result = await this.runQuery<DbTestRunRow>(
      `INSERT INTO test_runs (
         id, project_id, test_case_id, browser, status, started_at, completed_at,
         pass_count, error_count, retry_attempt, max_retries, original_run_id,
         retry_mode, retry_reason, thread_id, summary, created_at
       )
       VALUES (
         $1, $2, $3, $4, 'running', $5::timestamptz, NULL,
         0, 0, $6, $7, COALESCE($8::uuid, $1::uuid),
         $9, $10, $11, NULL, $12::timestamptz
       )
       RETURNING ${testRunSelectColumns}`,
      [
        runId,
        input.projectId,
        input.testCaseId,
        input.browser,
        input.startedAt,
        input.retryAttempt,
        input.maxRetries,
        input.originalRunId,
        input.retryMode,
        input.retryReason,
        input.threadId,
        now
      ]
    );

    return mapTestRun(result.rows[0]);
  }

  async completeTestRun(runId: string, input: CompleteTestRunInput): Promise<TestRun> {
    return this.withTransaction(async (client) => {
      const locked = await this.runQuery<DbTestRunRow>(
        `SELECT ${testRunSelectColumns}
         FROM test_runs
         WHERE id = $1
         FOR UPDATE`,
        [runId],
        client
      );

      const current = locked.rows[0];
      if (!current) {
        throw new Error(`Test run not found: ${runId}`);
      }

      assertRunTransition(current.status, input.status);

      const result = await this.runQuery<DbTestRunRow>(
        `UPDATE test_runs
         SET status = $2, pass_count = $3, error_count = $4, summary = $5, completed_at = $6::timestamptz
         WHERE id = $1
         RETURNING ${testRunSelectColumns}`,
        [runId, input.status, input.passCount, input.errorCount, input.summary, input.completedAt],
        client
      );

      return mapTestRun(result.rows[0]);
    });
  }

  async getTestRun(runId: string): Promise<TestRun | undefined> {
    const result = await this.runQuery<DbTestRunRow>(
      `SELECT ${testRunSelectColumns}
       FROM test_runs
       WHERE id = $1`,
      [runId]
    );

    return result.rows[0] ? mapTestRun(result.rows[0]) : undefined;
  }

  async listTestRunsByProject(projectId: string, options: ListRunsOptions = {}): Promise<TestRun[]> {
    const result = await this.runQuery<DbTestRunRow>(
      `SELECT ${testRunSelectColumns}
       FROM test_runs
       WHERE project_id = $1
       ORDER BY created_at DESC
       LIMIT $2 OFFSET $3`,
      [projectId, normalizeListLimit(options.limit), normalizeListOffset(options.offset)]
    );

    return result.rows.map((row) => mapTestRun(row));
  }

  async listRetryChain(originalRunId: string): Promise<TestRun[]> {
    const result = await this.runQuery<DbTestRunRow>(
      `SELECT ${testRunSelectColumns}
       FROM test_runs
       WHERE original_run_id = $1
       ORDER BY retry_attempt ASC`,
      [originalRunId]
    );

    return result.rows.map((row) => mapTestRun(row));
  }

  async createTestRunStep(input: CreateTestRunStepInput): Promise<TestRunStep> {
    const result = await this.runQuery<DbTestRunStepRow>(
      `INSERT INTO test_run_steps (
         id, run_id, test_case_id, step_number, action, target, value, status,
         duration, error, screenshot, fixture_name, created_at
       )
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12, $13::timestamptz)
       RETURNING ${testRunStepSelectColumns}`,
      [
        randomUUID(),
        input.runId,
        input.testCaseId,
        input.stepNumber,
        input.action,
        input.target,
        input.value,
        input.status,
        input.duration,
        input.error,
        input.screenshot,
        input.fixtureName,
        new Date().toISOString()
      ]
    );

    return mapTestRunStep(result.rows[0]);
  }

  async listTestRunSteps(runId: string): Promise<TestRunStep[]> {
    const result = await this.runQuery<DbTestRunStepRow>(
      `SELECT ${testRunStepSelectColumns}
       FROM test_run_steps
       WHERE run_id = $1
       ORDER BY step_number ASC`,
      [runId]
    );

    return result.rows.map((row) => mapTestRunStep(row));
  }

  async upsertFixtureCacheEntry(input: UpsertFixtureCacheEntryInput): Promise<FixtureCacheEntry> {
    const result = await this.runQuery<DbFixtureCacheEntryRow>(
      `INSERT INTO fixture_cache_entries (
         id, fixture_id, project_id, browser, browser_key, url, encrypted_state, captured_at, expires_at
       )
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8::timestamptz, $9::timestamptz)
       ON CONFLICT (fixture_id, browser_key) DO UPDATE
       SET id = EXCLUDED.id,
           url = EXCLUDED.url,
           encrypted_state = EXCLUDED.encrypted_state,
           captured_at = EXCLUDED.captured_at,
           expires_at = EXCLUDED.expires_at
       RETURNING ${fixtureCacheEntrySelectColumns}`,
      [
        randomUUID(),
        input.fixtureId,
        input.projectId,
        input.browser,
        toBrowserKey(input.browser),
        input.url,
        input.encryptedState,
        input.capturedAt,
        input.expiresAt
      ]
    );

    return mapFixtureCacheEntry(result.rows[0]);
  }

  async findValidFixtureCacheEntries(
    fixtureId: string,
    browser: string | null,
    nowIso: string
  ): Promise<FixtureCacheEntry[]> {
    const result = await this.runQuery<DbFixtureCacheEntryRow>(
      `SELECT ${fixtureCacheEntrySelectColumns}
       FROM fixture_cache_entries
       WHERE fixture_id = $1
         AND expires_at > $3::timestamptz
         AND (browser_key = $2 OR browser IS NULL)
       ORDER BY (browser_key = $2) DESC, captured_at DESC`,
      [fixtureId, toBrowserKey(browser), nowIso]
    );

    return result.rows.map((row) => mapFixtureCacheEntry(row));
  }

  async listFixtureCacheEntries(fixtureId: string): Promise<FixtureCacheEntry[]> {
    const result = await this.runQuery<DbFixtureCacheEntryRow>(
      `SELECT ${fixtureCacheEntrySelectColumns}
       FROM fixture_cache_entries
       WHERE fixture_id = $1
       ORDER BY captured_at DESC`,
      [fixtureId]
    );

    return result.rows.map((row) => mapFixtureCacheEntry(row));
  }

  async deleteFixtureCacheEntries(fixtureId: string): Promise<number> {
    const result = await this.runQuery(`DELETE FROM fixture_cache_entries WHERE fixture_id = $1`, [fixtureId]);
    return result.rowCount ?? 0;
  }
}
