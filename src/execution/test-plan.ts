import { CAPTURE_STATE_ACTION, Fixture, TestCase, TestStep } from "../types.js";
import { FixtureCache } from "./fixture-cache.js";
import { StepResolver } from "./step-resolver.js";

export interface TestPlan {
  executableSteps: TestStep[];
  displaySteps: TestStep[];
  cacheHit: boolean;
  captureFixtures: Fixture[];
}

export interface TestPlanDependencies {
  fixtureCache: FixtureCache;
  stepResolver: StepResolver;
}

// Resolvers may rebuild step objects; fixture tags come from the source list.
function retag(resolved: TestStep[], source: TestStep[]): TestStep[] {
  return resolved.map((step, index) => {
    const origin = source[index];
    return {
      ...step,
      fixtureName: origin?.fixtureName ?? null,
      hidden: origin?.hidden ?? false
    };
  });
}

/**
 * Builds the step lists for one test on one browser: the fixture prefix
 * (restore step or setup steps plus capture step) followed by the test steps.
 */
export async function buildTestPlan(
  deps: TestPlanDependencies,
  testCase: TestCase,
  browser: string | null
): Promise<TestPlan> {
  const fixtures = await deps.fixtureCache.resolve(testCase.fixtureIds, browser);

  if (fixtures.cacheHit) {
    const resolved = await deps.stepResolver.resolve(testCase.projectId, testCase.steps);
    assertParallel(resolved.executable, resolved.display);

    return {
      executableSteps: [...fixtures.executableSteps, ...retag(resolved.executable, testCase.steps)],
      displaySteps: [...fixtures.displaySteps, ...retag(resolved.display, testCase.steps)],
      cacheHit: true,
      captureFixtures: []
    };
  }

  const source = [...fixtures.executableSteps, ...testCase.steps];
  const resolved = await deps.stepResolver.resolve(testCase.projectId, source);
  assertParallel(resolved.executable, resolved.display);

  return {
    executableSteps: retag(resolved.executable, source),
    displaySteps: retag(resolved.display, source),
    cacheHit: false,
    captureFixtures: fixtures.captureFixtures
  };
}

/**
 * Builds the step lists for running one fixture on its own. Cache-scoped
 * fixtures always end with a visible capture step, so a passing preview
 * refreshes the cached state even when a valid entry exists.
 */
export async function buildFixturePreviewPlan(stepResolver: StepResolver, fixture: Fixture): Promise<TestPlan> {
  const source: TestStep[] = fixture.setupSteps.map((step) => ({ ...step, fixtureName: fixture.name }));
  const resolved = await stepResolver.resolve(fixture.projectId, source);
  assertParallel(resolved.executable, resolved.display);

  const executableSteps = retag(resolved.executable, source);
  const displaySteps = retag(resolved.display, source);

  if (fixture.scope === "cached") {
    const capture: TestStep = {
      action: CAPTURE_STATE_ACTION,
      target: null,
      value: null,
      description: "Capture browser state for caching",
      fixtureName: fixture.name,
      hidden: false
    };
    executableSteps.push(capture);
    displaySteps.push({ ...capture });
  }

  return {
    executableSteps,
    displaySteps,
    cacheHit: false,
    captureFixtures: fixture.scope === "cached" ? [fixture] : []
  };
}

function assertParallel(executable: TestStep[], display: TestStep[]): void {
  if (executable.length !== display.length) {
    throw new Error(
      `Step resolver returned ${display.length} display steps for ${executable.length} executable steps.`
    );
  }
}
