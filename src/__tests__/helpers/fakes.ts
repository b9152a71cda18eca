import { setTimeout as delay } from "node:timers/promises";
import { ExecutionEvent, EventSink } from "../../execution/events.js";
import {
  ClassificationInput,
  FailureClassification,
  FailureClassifier
} from "../../execution/failure-classifier.js";
import { BrowserList, ExecuteOptions, ExecutorEvent, StepExecutor } from "../../execution/step-executor.js";
import { InMemoryExecutionStore } from "../../lib/memory-store.js";
import { Fixture, Project, TestCase, TestStep } from "../../types.js";

export const TEST_ENCRYPTION_KEY = "test-secret";

export interface ExecuteCall {
  baseUrl: string;
  steps: TestStep[];
  options: ExecuteOptions;
  index: number;
}

export type ExecutionScript = (call: ExecuteCall) => ExecutorEvent[];

export function passAll(call: ExecuteCall): ExecutorEvent[] {
  const events: ExecutorEvent[] = [];
  call.steps.forEach((step, index) => {
    events.push({ type: "step_started", stepNumber: index + 1, action: step.action, description: null });
    events.push(completedStep(index + 1, step.action, "passed"));
  });
  events.push({ type: "completed", status: "passed" });
  return events;
}

/** Fails the step at `failIndex` (0-based) and stops, as the executor does on a failed step. */
export function failAt(failIndex: number, error: string): ExecutionScript {
  return (call) => {
    const events: ExecutorEvent[] = [];
    for (const [index, step] of call.steps.entries()) {
      events.push({ type: "step_started", stepNumber: index + 1, action: step.action, description: null });
      if (index === failIndex) {
        events.push({ ...completedStep(index + 1, step.action, "failed"), error, screenshot: "c2NyZWVu" });
        break;
      }
      events.push(completedStep(index + 1, step.action, "passed"));
    }
    events.push({ type: "completed", status: "failed" });
    return events;
  };
}

export function completedStep(
  stepNumber: number,
  action: string,
  status: "passed" | "failed"
): Extract<ExecutorEvent, { type: "step_completed" }> {
  return {
    type: "step_completed",
    stepNumber,
    action,
    status,
    duration: 10,
    error: null,
    screenshot: null,
    result: null,
    url: null
  };
}

export interface ScriptedExecutorOptions {
  healthy?: boolean;
  /** Delay between yielded events; lets concurrent workers interleave. */
  eventDelayMs?: number;
  browsers?: BrowserList;
}

/** In-process executor that replays scripted events and records concurrency. */
export class ScriptedExecutor implements StepExecutor {
  readonly calls: ExecuteCall[] = [];
  private readonly activeByBrowser = new Map<string | null, number>();
  private readonly peakByBrowser = new Map<string | null, number>();
  private readonly healthy: boolean;
  private readonly eventDelayMs: number;
  private readonly browsers: BrowserList;

  constructor(
    private readonly script: ExecutionScript = passAll,
    options: ScriptedExecutorOptions = {}
  ) {
    this.healthy = options.healthy ?? true;
    this.eventDelayMs = options.eventDelayMs ?? 0;
    this.browsers = options.browsers ?? { browsers: ["chromium", "firefox"], default: "chromium" };
  }

  async *execute(baseUrl: string, steps: TestStep[], options: ExecuteOptions): AsyncGenerator<ExecutorEvent> {
    const call: ExecuteCall = { baseUrl, steps, options, index: this.calls.length };
    this.calls.push(call);

    const browser = options.browser;
    const active = (this.activeByBrowser.get(browser) ?? 0) + 1;
    this.activeByBrowser.set(browser, active);
    this.peakByBrowser.set(browser, Math.max(this.peakByBrowser.get(browser) ?? 0, active));

    try {
      for (const event of this.script(call)) {
        await delay(this.eventDelayMs);
        yield event;
      }
    } finally {
      this.activeByBrowser.set(browser, (this.activeByBrowser.get(browser) ?? 1) - 1);
    }
  }

  async healthCheck(): Promise<boolean> {
    return this.healthy;
  }

  async listBrowsers(): Promise<BrowserList> {
    return this.browsers;
  }

  peakConcurrency(browser: string | null): number {
    return this.peakByBrowser.get(browser) ?? 0;
  }
}

export class FakeClassifier implements FailureClassifier {
  readonly inputs: ClassificationInput[] = [];

  constructor(private readonly verdict: FailureClassification | Error) {}

  async classify(input: ClassificationInput): Promise<FailureClassification> {
    this.inputs.push(input);
    if (this.verdict instanceof Error) {
      throw this.verdict;
    }
    return this.verdict;
  }
}

export function collectEvents(): { events: ExecutionEvent[]; emit: EventSink } {
  const events: ExecutionEvent[] = [];
  return {
    events,
    emit: (event) => {
      events.push(event);
    }
  };
}

export function eventsOfType<T extends ExecutionEvent["type"]>(
  events: ExecutionEvent[],
  type: T
): Array<Extract<ExecutionEvent, { type: T }>> {
  return events.filter((event): event is Extract<ExecutionEvent, { type: T }> => event.type === type);
}

export async function drain<T>(iterable: AsyncIterable<T>): Promise<T[]> {
  const values: T[] = [];
  for await (const value of iterable) {
    values.push(value);
  }
  return values;
}

/** Mutable clock for TTL tests. */
export class ManualClock {
  private current: number;

  constructor(start = "2026-03-01T10:00:00.000Z") {
    this.current = Date.parse(start);
  }

  now = (): Date => new Date(this.current);

  advanceSeconds(seconds: number): void {
    this.current += seconds * 1000;
  }
}

export interface SeededProject {
  store: InMemoryExecutionStore;
  project: Project;
}

export function seedProject(store = new InMemoryExecutionStore()): SeededProject {
  const project = store.seedProject({ name: "Storefront", baseUrl: "https://shop.example.test" });
  return { store, project };
}

export function seedTestCase(
  store: InMemoryExecutionStore,
  project: Project,
  steps: TestStep[],
  options: { name?: string; fixtures?: Fixture[] } = {}
): TestCase {
  return store.seedTestCase({
    projectId: project.id,
    name: options.name ?? "Checkout flow",
    steps,
    fixtureIds: (options.fixtures ?? []).map((fixture) => fixture.id)
  });
}

export const sampleSteps: TestStep[] = [
  { action: "navigate", target: "/login", value: null },
  { action: "type", target: "Email input", value: "user@example.test" },
  { action: "click", target: "Sign in button", value: null }
];
