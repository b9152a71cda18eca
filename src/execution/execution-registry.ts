import { randomUUID } from "node:crypto";

export type ExecutionKind = "test_case" | "batch" | "fixture_preview";

export interface ActiveExecution {
  handle: string;
  kind: ExecutionKind;
  projectId: string;
  testCaseIds: string[];
  browsers: Array<string | null>;
  batchId: string | null;
  startedAt: string;
}

export type RegisterExecutionInput = Omit<ActiveExecution, "handle" | "startedAt">;

/** Tracks in-flight executions for this process. Owned by the app, not global. */
export class ExecutionRegistry {
  private readonly active = new Map<string, ActiveExecution>();

  constructor(private readonly now: () => Date = () => new Date()) {}

  register(input: RegisterExecutionInput): string {
    const handle = randomUUID();
    this.active.set(handle, {
      ...input,
      testCaseIds: [...input.testCaseIds],
      browsers: [...input.browsers],
      handle,
      startedAt: this.now().toISOString()
    });
    return handle;
  }

  release(handle: string): boolean {
    return this.active.delete(handle);
  }

  get(handle: string): ActiveExecution | undefined {
    const entry = this.active.get(handle);
    return entry ? { ...entry } : undefined;
  }

  list(): ActiveExecution[] {
    return Array.from(this.active.values())
      .map((entry) => ({ ...entry }))
      .sort((a, b) => a.startedAt.localeCompare(b.startedAt));
  }

  get size(): number {
    return this.active.size;
  }
}
