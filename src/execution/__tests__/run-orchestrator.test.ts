import assert from "node:assert/strict";
import test from "node:test";
import { StateCipher } from "../../lib/encryption.js";
import { InMemoryExecutionStore } from "../../lib/memory-store.js";
import {
  collectEvents,
  completedStep,
  eventsOfType,
  failAt,
  ManualClock,
  passAll,
  sampleSteps,
  ScriptedExecutor,
  seedProject,
  seedTestCase,
  TEST_ENCRYPTION_KEY
} from "../../__tests__/helpers/fakes.js";
import { Fixture, FixtureCacheEntry, TestStep, UpsertFixtureCacheEntryInput } from "../../types.js";
import { FixtureCache } from "../fixture-cache.js";
import { AttemptRequest, RunOrchestrator, summarizeAttempt } from "../run-orchestrator.js";
import { BrowserList, ExecutorEvent, StepExecutor } from "../step-executor.js";
import { MASKED_VALUE, maskSensitiveSteps, PassthroughStepResolver } from "../step-resolver.js";
import { buildTestPlan } from "../test-plan.js";

function setup(options: { store?: InMemoryExecutionStore; now?: () => Date } = {}) {
  const { store, project } = seedProject(options.store ?? new InMemoryExecutionStore());
  const fixtureCache = new FixtureCache({ store, cipher: new StateCipher(TEST_ENCRYPTION_KEY), now: options.now });
  const orchestrator = new RunOrchestrator({ store, fixtureCache, now: options.now });

  function request(steps: TestStep[], overrides: Partial<AttemptRequest> = {}): AttemptRequest {
    return {
      projectId: project.id,
      testCaseId: null,
      baseUrl: project.baseUrl,
      browser: "chromium",
      viewport: null,
      executableSteps: steps,
      displaySteps: maskSensitiveSteps(steps),
      captureFixtures: [],
      retryAttempt: 0,
      maxRetries: 0,
      originalRunId: null,
      retryMode: "none",
      retryReason: null,
      threadId: null,
      ...overrides
    };
  }

  return { store, project, fixtureCache, orchestrator, request };
}

test("summaries mention skipped steps only when the run stopped early", () => {
  assert.equal(summarizeAttempt(3, 3, 0), "Executed 3 steps: 3 passed, 0 failed");
  assert.equal(summarizeAttempt(4, 1, 1), "Executed 2 of 4 steps: 1 passed, 1 failed, 2 skipped");
});

test("a fully passing attempt persists every step and completes the run", async () => {
  const { store, orchestrator, request } = setup();
  const { events, emit } = collectEvents();

  const outcome = await orchestrator.runAttempt(request(sampleSteps), { executor: new ScriptedExecutor(passAll), emit });

  assert.equal(outcome.kind, "completed");
  assert.equal(outcome.status, "passed");
  assert.equal(outcome.run.status, "passed");
  assert.equal(outcome.passCount, 3);
  assert.equal(outcome.failure, null);

  const steps = await store.listTestRunSteps(outcome.run.id);
  assert.deepEqual(
    steps.map((step) => [step.stepNumber, step.action, step.status]),
    [
      [1, "navigate", "passed"],
      [2, "type", "passed"],
      [3, "click", "passed"]
    ]
  );

  assert.deepEqual(
    events.map((event) => event.type),
    [
      "run_started",
      "step_started",
      "step_completed",
      "step_started",
      "step_completed",
      "step_started",
      "step_completed",
      "run_completed"
    ]
  );
  const [started] = eventsOfType(events, "run_started");
  assert.equal(started?.totalSteps, 3);
  assert.equal(started?.originalRunId, outcome.run.id);
  const [completed] = eventsOfType(events, "run_completed");
  assert.equal(completed?.summary, "Executed 3 steps: 3 passed, 0 failed");
});

test("a failed step stops the attempt and records the first failure", async () => {
  const { store, orchestrator, request } = setup();
  const { events, emit } = collectEvents();

  const outcome = await orchestrator.runAttempt(request(sampleSteps), {
    executor: new ScriptedExecutor(failAt(1, "Element not found: Email input")),
    emit
  });

  assert.equal(outcome.status, "failed");
  assert.equal(outcome.passCount, 1);
  assert.equal(outcome.errorCount, 1);
  assert.equal(outcome.skippedCount, 1);
  assert.equal(outcome.summary, "Executed 2 of 3 steps: 1 passed, 1 failed, 1 skipped");
  assert.deepEqual(outcome.failure, {
    action: "type",
    target: "Email input",
    value: "user@example.test",
    error: "Element not found: Email input",
    screenshot: "c2NyZWVu"
  });

  const run = await store.getTestRun(outcome.run.id);
  assert.equal(run?.status, "failed");
  assert.equal(run?.errorCount, 1);

  const [completed] = eventsOfType(events, "run_completed");
  assert.equal(completed?.skippedCount, 1);
});

test("persisted and streamed steps carry masked values while the executor gets the real ones", async () => {
  const { store, orchestrator, request } = setup();
  const { events, emit } = collectEvents();
  const executor = new ScriptedExecutor(passAll);
  const steps: TestStep[] = [
    { action: "type", target: "Password input", value: "test-secret" },
    { action: "click", target: "Sign in", value: null }
  ];

  const outcome = await orchestrator.runAttempt(request(steps), { executor, emit });

  assert.equal(executor.calls[0]?.steps[0]?.value, "test-secret");

  const [persisted] = await store.listTestRunSteps(outcome.run.id);
  assert.equal(persisted?.value, MASKED_VALUE);

  for (const event of [...eventsOfType(events, "step_started"), ...eventsOfType(events, "step_completed")]) {
    assert.notEqual(event.value, "test-secret");
  }
  assert.equal(eventsOfType(events, "step_started")[0]?.value, MASKED_VALUE);
});

test("a passed capture step saves state for every captured fixture", async () => {
  const { store, project, fixtureCache, orchestrator, request } = setup();
  const fixture: Fixture = store.seedFixture({ projectId: project.id, name: "Signed in", cacheTtlSeconds: 600 });
  const steps: TestStep[] = [
    { action: "navigate", target: "/login", fixtureName: "Signed in" },
    { action: "capture_state", description: "Capture browser state for caching", fixtureName: "Signed in", hidden: true },
    { action: "click", target: "Orders" }
  ];
  const executor = new ScriptedExecutor((call) =>
    passAll(call).map((event) =>
      event.type === "step_completed" && event.stepNumber === 2
        ? { ...event, result: { cookies: [{ name: "sid", value: "abc" }] }, url: "https://shop.example.test/home" }
        : event
    )
  );
  const { events, emit } = collectEvents();

  const outcome = await orchestrator.runAttempt(request(steps, { captureFixtures: [fixture] }), { executor, emit });

  assert.equal(outcome.status, "passed");
  const entry = await fixtureCache.getValidEntry(fixture.id, "chromium");
  assert.equal(entry?.url, "https://shop.example.test/home");
  assert.equal(entry?.browser, "chromium");

  const capture = eventsOfType(events, "step_completed").find((event) => event.stepNumber === 2);
  assert.equal(capture?.hidden, true);
  assert.equal(capture?.fixtureName, "Signed in");
});

test("a capture step without state leaves the cache empty", async () => {
  const { store, project, fixtureCache, orchestrator, request } = setup();
  const fixture = store.seedFixture({ projectId: project.id, name: "Signed in" });
  const steps: TestStep[] = [{ action: "capture_state", hidden: true }];
  const { emit } = collectEvents();

  const outcome = await orchestrator.runAttempt(request(steps, { captureFixtures: [fixture] }), {
    executor: new ScriptedExecutor(passAll),
    emit
  });

  assert.equal(outcome.status, "passed");
  assert.equal(await fixtureCache.getValidEntry(fixture.id, "chromium"), null);
});

class FullCacheStore extends InMemoryExecutionStore {
  async upsertFixtureCacheEntry(_input: UpsertFixtureCacheEntryInput): Promise<FixtureCacheEntry> {
    throw new Error("cache table unavailable");
  }
}

function withCapturedState(url: string) {
  return new ScriptedExecutor((call) =>
    passAll(call).map((event) =>
      event.type === "step_completed" && event.action === "capture_state"
        ? { ...event, result: { cookies: [{ name: "sid", value: "abc" }] }, url }
        : event
    )
  );
}

test("a failed cache write does not fail the run", async () => {
  const { store, project, orchestrator, request } = setup({ store: new FullCacheStore() });
  const fixture = store.seedFixture({ projectId: project.id, name: "Signed in" });
  const steps: TestStep[] = [
    { action: "capture_state", fixtureName: "Signed in", hidden: true },
    { action: "click", target: "Orders" }
  ];
  const { events, emit } = collectEvents();

  const outcome = await orchestrator.runAttempt(request(steps, { captureFixtures: [fixture] }), {
    executor: withCapturedState("https://shop.example.test/home"),
    emit
  });

  assert.equal(outcome.status, "passed");
  assert.equal(outcome.run.status, "passed");
  assert.equal(outcome.passCount, 2);
  assert.deepEqual(await store.listFixtureCacheEntries(fixture.id), []);
  assert.deepEqual(
    eventsOfType(events, "step_completed").map((event) => [event.stepNumber, event.status]),
    [
      [1, "passed"],
      [2, "passed"]
    ]
  );
});

test("an expired cache entry is replaced by the next run's capture", async () => {
  const clock = new ManualClock();
  const { store, project, fixtureCache, orchestrator, request } = setup({ now: clock.now });
  const fixture = store.seedFixture({
    projectId: project.id,
    name: "Signed in",
    scope: "cached",
    cacheTtlSeconds: 60,
    setupSteps: [{ action: "navigate", target: "/login" }]
  });
  const testCase = seedTestCase(store, project, [{ action: "click", target: "Orders" }], { fixtures: [fixture] });

  await fixtureCache.save({
    fixtureId: fixture.id,
    projectId: project.id,
    browser: "a",
    url: "https://shop.example.test/old",
    state: { cookies: [] },
    ttlSeconds: 60
  });
  clock.advanceSeconds(61);

  const plan = await buildTestPlan(
    { fixtureCache, stepResolver: new PassthroughStepResolver() },
    testCase,
    "a"
  );
  assert.equal(plan.cacheHit, false);
  assert.deepEqual(
    plan.executableSteps.map((step) => step.action),
    ["navigate", "capture_state", "click"]
  );

  const { emit } = collectEvents();
  const outcome = await orchestrator.runAttempt(
    request(plan.executableSteps, {
      browser: "a",
      displaySteps: plan.displaySteps,
      captureFixtures: plan.captureFixtures
    }),
    { executor: withCapturedState("https://shop.example.test/home"), emit }
  );

  assert.equal(outcome.status, "passed");
  const entries = await store.listFixtureCacheEntries(fixture.id);
  assert.deepEqual(
    entries.map((entry) => [entry.browser, entry.url, entry.capturedAt, entry.expiresAt]),
    [["a", "https://shop.example.test/home", "2026-03-01T10:01:01.000Z", "2026-03-01T10:02:01.000Z"]]
  );
  assert.equal((await fixtureCache.getValidEntry(fixture.id, "a"))?.url, "https://shop.example.test/home");
});

test("run timestamps come from the injected clock", async () => {
  const clock = new ManualClock();
  const { orchestrator, request } = setup({ now: clock.now });
  const executor = new ScriptedExecutor((call) => {
    clock.advanceSeconds(5);
    return passAll(call);
  });
  const { emit } = collectEvents();

  const outcome = await orchestrator.runAttempt(request(sampleSteps), { executor, emit });

  assert.equal(outcome.run.startedAt, "2026-03-01T10:00:00.000Z");
  assert.equal(outcome.run.completedAt, "2026-03-01T10:00:05.000Z");
});

test("an executor error event fails the attempt as a transport error", async () => {
  const { orchestrator, request } = setup();
  const { events, emit } = collectEvents();
  const executor = new ScriptedExecutor(() => [
    { type: "step_started", stepNumber: 1, action: "navigate", description: null },
    completedStep(1, "navigate", "passed"),
    { type: "error", message: "Executor returned 502" }
  ]);

  const outcome = await orchestrator.runAttempt(request(sampleSteps), { executor, emit });

  assert.equal(outcome.kind, "transport_error");
  assert.equal(outcome.kind === "transport_error" ? outcome.message : null, "Executor returned 502");
  assert.equal(outcome.status, "failed");
  assert.equal(outcome.errorCount, 0);
  assert.equal(outcome.failure, null);
  assert.equal(outcome.run.status, "failed");
  assert.deepEqual(
    eventsOfType(events, "error").map((event) => event.message),
    ["Executor returned 502"]
  );
});

class BrokenStreamExecutor implements StepExecutor {
  async *execute(): AsyncGenerator<ExecutorEvent> {
    yield { type: "step_started", stepNumber: 1, action: "navigate", description: null };
    throw new Error("stream reset");
  }

  async healthCheck(): Promise<boolean> {
    return true;
  }

  async listBrowsers(): Promise<BrowserList> {
    return { browsers: [], default: null };
  }
}

test("a stream that throws mid-run is reported and the run is closed", async () => {
  const { orchestrator, request } = setup();
  const { events, emit } = collectEvents();

  const outcome = await orchestrator.runAttempt(request(sampleSteps), { executor: new BrokenStreamExecutor(), emit });

  assert.equal(outcome.kind, "transport_error");
  assert.equal(outcome.kind === "transport_error" ? outcome.message : null, "Executor stream failed: stream reset");
  assert.equal(outcome.run.status, "failed");
  assert.equal(events.at(-1)?.type, "run_completed");
});

test("rejects step lists of different lengths before creating a run", async () => {
  const { store, orchestrator, request } = setup();
  const { emit } = collectEvents();

  await assert.rejects(
    orchestrator.runAttempt(request(sampleSteps, { displaySteps: [] }), { executor: new ScriptedExecutor(), emit }),
    /same length/
  );
  assert.equal(store.runCount, 0);
});
