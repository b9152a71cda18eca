import assert from "node:assert/strict";
import test from "node:test";
import { StateCipher } from "../../lib/encryption.js";
import {
  collectEvents,
  eventsOfType,
  ExecutionScript,
  failAt,
  FakeClassifier,
  passAll,
  sampleSteps,
  ScriptedExecutor,
  seedProject,
  TEST_ENCRYPTION_KEY
} from "../../__tests__/helpers/fakes.js";
import { FailureClassification } from "../failure-classifier.js";
import { FixtureCache } from "../fixture-cache.js";
import { normalizeRetryPolicy, RetryableRequest, RetryController, RetryPolicy } from "../retry-controller.js";
import { RunOrchestrator } from "../run-orchestrator.js";
import { maskSensitiveSteps } from "../step-resolver.js";

const timingVerdict: FailureClassification = {
  isRetryable: true,
  category: "element_timing",
  confidence: 0.6,
  reasoning: "Element was not available yet"
};

const assertionVerdict: FailureClassification = {
  isRetryable: false,
  category: "assertion_failure",
  confidence: 0.9,
  reasoning: "Heading text differs from the expected value"
};

function setup(verdict: FailureClassification | Error = timingVerdict) {
  const { store, project } = seedProject();
  const fixtureCache = new FixtureCache({ store, cipher: new StateCipher(TEST_ENCRYPTION_KEY) });
  const classifier = new FakeClassifier(verdict);
  const controller = new RetryController({
    runOrchestrator: new RunOrchestrator({ store, fixtureCache }),
    classifier
  });
  const request: RetryableRequest = {
    projectId: project.id,
    testCaseId: null,
    baseUrl: project.baseUrl,
    browser: null,
    viewport: null,
    executableSteps: sampleSteps,
    displaySteps: maskSensitiveSteps(sampleSteps),
    captureFixtures: [],
    threadId: null
  };
  return { store, classifier, controller, request };
}

async function runWith(
  script: ExecutionScript,
  policy: RetryPolicy,
  verdict: FailureClassification | Error = timingVerdict
) {
  const context = setup(verdict);
  const { events, emit } = collectEvents();
  const result = await context.controller.run(context.request, policy, { executor: new ScriptedExecutor(script), emit });
  return { ...context, events, result };
}

const failSecondStep = failAt(1, "Element not found: Email input");

test("normalizes retry policies to the supported range", () => {
  assert.deepEqual(normalizeRetryPolicy({ maxRetries: 9, mode: "simple" }), { maxRetries: 5, mode: "simple" });
  assert.deepEqual(normalizeRetryPolicy({ maxRetries: -2, mode: "simple" }), { maxRetries: 0, mode: "none" });
  assert.deepEqual(normalizeRetryPolicy({ maxRetries: 3, mode: "none" }), { maxRetries: 0, mode: "none" });
  assert.deepEqual(normalizeRetryPolicy(undefined), { maxRetries: 0, mode: "none" });
});

test("simple mode retries every failure until the budget is spent", async () => {
  const { store, classifier, events, result } = await runWith(failSecondStep, { maxRetries: 2, mode: "simple" });

  assert.equal(result.finalStatus, "failed");
  assert.equal(result.attempts, 3);
  assert.equal(result.runIds.length, 3);
  assert.equal(classifier.inputs.length, 0);

  assert.deepEqual(
    eventsOfType(events, "test_retry").map((event) => [event.attempt, event.maxAttempts, event.reason]),
    [
      [2, 3, "simple retry mode"],
      [3, 3, "simple retry mode"]
    ]
  );
  assert.equal(eventsOfType(events, "retry_skipped").length, 0);

  const [firstRunId] = result.runIds;
  const chain = await store.listRetryChain(firstRunId ?? "");
  assert.deepEqual(
    chain.map((run) => [run.retryAttempt, run.maxRetries, run.retryMode, run.retryReason, run.originalRunId]),
    [
      [0, 2, "simple", null, firstRunId],
      [1, 2, "simple", "simple retry mode", firstRunId],
      [2, 2, "simple", "simple retry mode", firstRunId]
    ]
  );
});

test("stops retrying as soon as an attempt passes", async () => {
  const flaky: ExecutionScript = (call) => (call.index === 0 ? failSecondStep(call) : passAll(call));

  const { events, result } = await runWith(flaky, { maxRetries: 3, mode: "simple" });

  assert.equal(result.finalStatus, "passed");
  assert.equal(result.attempts, 2);
  assert.equal(result.lastRunId, result.runIds[1]);
  assert.equal(eventsOfType(events, "test_retry")[0]?.runId, result.runIds[0]);
  assert.deepEqual(
    eventsOfType(events, "run_completed").map((event) => event.status),
    ["failed", "passed"]
  );
});

test("zero retries runs exactly one attempt", async () => {
  const { events, result } = await runWith(failSecondStep, { maxRetries: 0, mode: "simple" });

  assert.equal(result.attempts, 1);
  assert.equal(eventsOfType(events, "run_started")[0]?.retryMode, "none");
  assert.equal(eventsOfType(events, "test_retry").length, 0);
});

test("intelligent mode skips retries for non-retryable failures", async () => {
  const { classifier, events, result } = await runWith(
    failSecondStep,
    { maxRetries: 3, mode: "intelligent" },
    assertionVerdict
  );

  assert.equal(result.attempts, 1);
  assert.equal(eventsOfType(events, "test_retry").length, 0);
  assert.deepEqual(eventsOfType(events, "retry_skipped"), [
    {
      type: "retry_skipped",
      runId: result.runIds[0],
      category: "assertion_failure",
      reason: "Non-retryable: assertion_failure",
      details: "Heading text differs from the expected value",
      confidence: 0.9
    }
  ]);
  assert.deepEqual(classifier.inputs, [
    {
      action: "type",
      target: "Email input",
      value: "user@example.test",
      errorMessage: "Element not found: Email input",
      screenshot: "c2NyZWVu"
    }
  ]);
});

test("intelligent mode retries retryable failures with the classifier's reasoning", async () => {
  const { store, events, result } = await runWith(failSecondStep, { maxRetries: 1, mode: "intelligent" });

  assert.equal(result.attempts, 2);
  assert.equal(eventsOfType(events, "test_retry")[0]?.reason, "element_timing: Element was not available yet");

  const retry = await store.getTestRun(result.runIds[1] ?? "");
  assert.equal(retry?.retryReason, "element_timing: Element was not available yet");
  assert.equal(retry?.retryMode, "intelligent");
});

test("a classifier failure is treated as non-retryable", async () => {
  const { events, result } = await runWith(
    failSecondStep,
    { maxRetries: 2, mode: "intelligent" },
    new Error("classifier offline")
  );

  assert.equal(result.attempts, 1);
  const [skipped] = eventsOfType(events, "retry_skipped");
  assert.equal(skipped?.category, "unknown");
  assert.equal(skipped?.reason, "Non-retryable: unknown");
  assert.equal(skipped?.details, "Classification failed: classifier offline");
});

test("intelligent mode retries transport errors without classifying", async () => {
  const brokenThenPassing: ExecutionScript = (call) =>
    call.index === 0 ? [{ type: "error", message: "Executor returned 502" }] : passAll(call);

  const { classifier, events, result } = await runWith(brokenThenPassing, { maxRetries: 1, mode: "intelligent" });

  assert.equal(result.finalStatus, "passed");
  assert.equal(classifier.inputs.length, 0);
  assert.equal(eventsOfType(events, "test_retry")[0]?.reason, "transport error: Executor returned 502");
});
