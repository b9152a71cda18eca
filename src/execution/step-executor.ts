import { setTimeout as delay } from "node:timers/promises";
import { z } from "zod";
import { logDebug, logWarn, serializeError } from "../lib/logging.js";
import { TestStep, Viewport } from "../types.js";

export interface ExecuteOptions {
  testId: string;
  browser: string | null;
  viewport: Viewport | null;
  screenshotOnFailure: boolean;
}

export interface StepStartedSignal {
  type: "step_started";
  stepNumber: number;
  action: string | null;
  description: string | null;
}

export interface StepRetrySignal {
  type: "step_retry";
  stepNumber: number;
  attempt: number | null;
  maxAttempts: number | null;
  error: string | null;
}

export interface StepCompletedSignal {
  type: "step_completed";
  stepNumber: number;
  action: string | null;
  status: "passed" | "failed";
  duration: number;
  error: string | null;
  screenshot: string | null;
  /** Payload returned by state-capturing actions. */
  result: unknown;
  url: string | null;
}

export interface CompletedSignal {
  type: "completed";
  status: string | null;
}

export interface TransportErrorSignal {
  type: "error";
  message: string;
}

export type ExecutorEvent =
  | StepStartedSignal
  | StepRetrySignal
  | StepCompletedSignal
  | CompletedSignal
  | TransportErrorSignal;

export interface BrowserList {
  browsers: string[];
  default: string | null;
}

export interface StepExecutor {
  execute(baseUrl: string, steps: TestStep[], options: ExecuteOptions): AsyncIterable<ExecutorEvent>;
  healthCheck(): Promise<boolean>;
  listBrowsers(): Promise<BrowserList>;
}

export class ExecutorTransportError extends Error {
  readonly status: number | null;

  constructor(message: string, status: number | null = null) {
    super(message);
    this.name = "ExecutorTransportError";
    this.status = status;
  }
}

const stepNumberSchema = z.coerce.number().int().min(0).catch(0);
const optionalText = z.string().nullish().transform((value) => value ?? null);
const optionalCount = z.coerce.number().int().nullish().catch(null).transform((value) => value ?? null);

const wireStepStartedSchema = z.object({
  step_number: stepNumberSchema,
  action: optionalText,
  description: optionalText
});

const wireStepRetrySchema = z.object({
  step_number: stepNumberSchema,
  attempt: optionalCount,
  max_attempts: optionalCount,
  error: optionalText
});

const wireStepCompletedSchema = z.object({
  step_number: stepNumberSchema,
  action: optionalText,
  status: z.string().nullish(),
  duration: z.coerce.number().min(0).catch(0).default(0),
  error: optionalText,
  screenshot: optionalText,
  result: z.unknown().optional(),
  url: optionalText
});

const wireCompletedSchema = z.object({
  status: optionalText
});

const wireErrorSchema = z.object({
  error: z.string().nullish(),
  message: z.string().nullish()
});

const browserListSchema = z.object({
  browsers: z.array(z.string()).default([]),
  default: z.string().nullish().transform((value) => value ?? null)
});

/**
 * Maps one decoded SSE payload from the executor to a typed signal. Unknown
 * event types yield null and are dropped by the caller.
 */
export function parseExecutorEvent(payload: unknown): ExecutorEvent | null {
  if (!payload || typeof payload !== "object" || !("type" in payload)) {
    return null;
  }

  switch (payload.type) {
    case "step_started": {
      const parsed = wireStepStartedSchema.parse(payload);
      return {
        type: "step_started",
        stepNumber: parsed.step_number,
        action: parsed.action,
        description: parsed.description
      };
    }
    case "step_retry": {
      const parsed = wireStepRetrySchema.parse(payload);
      return {
        type: "step_retry",
        stepNumber: parsed.step_number,
        attempt: parsed.attempt,
        maxAttempts: parsed.max_attempts,
        error: parsed.error
      };
    }
    case "step_completed": {
      const parsed = wireStepCompletedSchema.parse(payload);
      return {
        type: "step_completed",
        stepNumber: parsed.step_number,
        action: parsed.action,
        status: parsed.status === "passed" ? "passed" : "failed",
        duration: parsed.duration,
        error: parsed.error,
        screenshot: parsed.screenshot,
        result: parsed.result ?? null,
        url: parsed.url
      };
    }
    case "completed": {
      const parsed = wireCompletedSchema.parse(payload);
      return { type: "completed", status: parsed.status };
    }
    case "error": {
      const parsed = wireErrorSchema.parse(payload);
      return { type: "error", message: parsed.error || parsed.message || "Unknown executor error" };
    }
    default:
      return null;
  }
}

/** Splits a buffer of SSE text into complete frames plus the unfinished remainder. */
export function splitSseFrames(buffer: string): { frames: string[]; rest: string } {
  const normalized = buffer.replace(/\r\n/g, "\n");
  const parts = normalized.split("\n\n");
  const rest = parts.pop() ?? "";
  return { frames: parts, rest };
}

export function readSseData(frame: string): string | null {
  const lines = frame
    .split("\n")
    .filter((line) => line.startsWith("data:"))
    .map((line) => line.slice(5).replace(/^ /, ""));

  return lines.length > 0 ? lines.join("\n") : null;
}

function toWireStep(step: TestStep): Record<string, unknown> {
  return {
    action: step.action,
    target: step.target ?? null,
    value: step.value ?? null,
    description: step.description ?? null
  };
}

export interface HttpStepExecutorOptions {
  baseUrl: string;
  timeoutMs?: number;
  healthTimeoutMs?: number;
}

/** Client for the step-execution service (`POST /execute` streaming SSE). */
export class HttpStepExecutor implements StepExecutor {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly healthTimeoutMs: number;

  constructor(options: HttpStepExecutorOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
    this.timeoutMs = options.timeoutMs ?? 300_000;
    this.healthTimeoutMs = options.healthTimeoutMs ?? 5_000;
  }

  async *execute(baseUrl: string, steps: TestStep[], options: ExecuteOptions): AsyncGenerator<ExecutorEvent> {
    try {
      yield* this.streamExecution(baseUrl, steps, options);
    } catch (error) {
      logWarn("executor.transport_failed", {
        testId: options.testId,
        error: serializeError(error)
      });

      if (error instanceof ExecutorTransportError) {
        yield { type: "error", message: error.message };
        return;
      }

      yield {
        type: "error",
        message: `Executor request failed: ${error instanceof Error ? error.message : String(error)}`
      };
    }
  }

  private async *streamExecution(
    baseUrl: string,
    steps: TestStep[],
    options: ExecuteOptions
  ): AsyncGenerator<ExecutorEvent> {
    const response = await fetch(`${this.baseUrl}/execute`, {
      method: "POST",
      headers: {
        "Content-Type": "application/json",
        Accept: "text/event-stream"
      },
      body: JSON.stringify({
        test_id: options.testId,
        base_url: baseUrl,
        steps: steps.map((step) => toWireStep(step)),
        options: {
          screenshot_on_failure: options.screenshotOnFailure,
          browser: options.browser,
          viewport: options.viewport
        }
      }),
      signal: AbortSignal.timeout(this.timeoutMs)
    });

    if (response.status !== 200) {
      await response.body?.cancel().catch(() => undefined);
      throw new ExecutorTransportError(`Executor returned ${response.status}`, response.status);
    }

    if (!response.body) {
      throw new ExecutorTransportError("Executor returned an empty body", response.status);
    }

    const reader = response.body.getReader();
    const decoder = new TextDecoder();
    let buffer = "";

    try {
      while (true) {
        const { done, value } = await reader.read();
        if (done) {
          break;
        }

        buffer += decoder.decode(value, { stream: true });
        const { frames, rest } = splitSseFrames(buffer);
        buffer = rest;

        for (const frame of frames) {
          const event = decodeFrame(frame, options.testId);
          if (event) {
            yield event;
          }
        }
      }

      buffer += decoder.decode();
      const tail = buffer.trim() ? decodeFrame(buffer, options.testId) : null;
      if (tail) {
        yield tail;
      }
    } finally {
      // Closes the connection when the consumer stops reading early.
      await reader.cancel().catch(() => undefined);
    }
  }

  async healthCheck(): Promise<boolean> {
    try {
      const response = await fetch(`${this.baseUrl}/health`, {
        signal: AbortSignal.timeout(this.healthTimeoutMs)
      });

      if (!response.ok) {
        return false;
      }

      const payload: unknown = await response.json();
      return z.object({ status: z.literal("ok") }).safeParse(payload).success;
    } catch (error) {
      logDebug("executor.health_check_failed", { error: serializeError(error) });
      return false;
    }
  }

  async listBrowsers(): Promise<BrowserList> {
    let response: Response;
    try {
      response = await fetch(`${this.baseUrl}/browsers`, {
        signal: AbortSignal.timeout(this.healthTimeoutMs)
      });
    } catch (error) {
      throw new ExecutorTransportError(
        `Executor browser listing failed: ${error instanceof Error ? error.message : String(error)}`
      );
    }

    if (!response.ok) {
      throw new ExecutorTransportError(`Executor returned ${response.status}`, response.status);
    }

    return browserListSchema.parse(await response.json());
  }
}

function decodeFrame(frame: string, testId: string): ExecutorEvent | null {
  const data = readSseData(frame);
  if (data === null) {
    return null;
  }

  try {
    return parseExecutorEvent(JSON.parse(data));
  } catch (error) {
    logWarn("executor.frame_rejected", {
      testId,
      frame: data.slice(0, 200),
      error: serializeError(error)
    });
    return null;
  }
}

export interface SimulatedStepExecutorOptions {
  sleep?: (ms: number) => Promise<void>;
  baseDelayMs?: number;
  delayStepMs?: number;
  baseDurationMs?: number;
  durationStepMs?: number;
}

/**
 * Stand-in used when the executor service is unreachable. Every step passes
 * after a short, growing delay so clients still see a realistic stream.
 */
export class SimulatedStepExecutor implements StepExecutor {
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly baseDelayMs: number;
  private readonly delayStepMs: number;
  private readonly baseDurationMs: number;
  private readonly durationStepMs: number;

  constructor(options: SimulatedStepExecutorOptions = {}) {
    this.sleep = options.sleep ?? ((ms) => delay(ms));
    this.baseDelayMs = options.baseDelayMs ?? 300;
    this.delayStepMs = options.delayStepMs ?? 100;
    this.baseDurationMs = options.baseDurationMs ?? 100;
    this.durationStepMs = options.durationStepMs ?? 50;
  }

  async *execute(_baseUrl: string, steps: TestStep[]): AsyncGenerator<ExecutorEvent> {
    for (const [index, step] of steps.entries()) {
      const stepNumber = index + 1;

      yield {
        type: "step_started",
        stepNumber,
        action: step.action,
        description: step.description ?? null
      };

      await this.sleep(this.baseDelayMs + this.delayStepMs * index);

      yield {
        type: "step_completed",
        stepNumber,
        action: step.action,
        status: "passed",
        duration: this.baseDurationMs + this.durationStepMs * index,
        error: null,
        screenshot: null,
        result: null,
        url: null
      };
    }

    yield { type: "completed", status: "passed" };
  }

  async healthCheck(): Promise<boolean> {
    return true;
  }

  async listBrowsers(): Promise<BrowserList> {
    return { browsers: [], default: null };
  }
}
