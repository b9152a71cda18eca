import { TestStep } from "../types.js";

export const MASKED_VALUE = "••••••••";

export interface ResolvedSteps {
  /** Steps sent to the executor, with every reference substituted. */
  executable: TestStep[];
  /** Same length and order as `executable`; safe to persist and stream. */
  display: TestStep[];
}

/**
 * Substitutes template references (personas, pages, relative URLs) in step
 * payloads. Resolution rules are owned by the authoring side of the product.
 */
export interface StepResolver {
  resolve(projectId: string, steps: TestStep[]): Promise<ResolvedSteps>;
}

function maskFormValue(value: string): string {
  let parsed: unknown;
  try {
    parsed = JSON.parse(value);
  } catch {
    return value;
  }

  if (!parsed || typeof parsed !== "object" || Array.isArray(parsed)) {
    return value;
  }

  const masked: Record<string, unknown> = {};
  for (const [key, fieldValue] of Object.entries(parsed)) {
    masked[key] = key.toLowerCase().includes("password") ? MASKED_VALUE : fieldValue;
  }
  return JSON.stringify(masked);
}

/** Returns a copy of `steps` with password-bearing values replaced by the mask. */
export function maskSensitiveSteps(steps: TestStep[]): TestStep[] {
  return steps.map((step) => {
    const value = step.value;
    if (typeof value !== "string") {
      return { ...step };
    }

    if (step.action === "fill_form" && value.trimStart().startsWith("{")) {
      return { ...step, value: maskFormValue(value) };
    }

    if (step.action === "type" && (step.target ?? "").toLowerCase().includes("password")) {
      return { ...step, value: MASKED_VALUE };
    }

    return { ...step };
  });
}

/** Leaves steps untouched; display steps are the masked copy. */
export class PassthroughStepResolver implements StepResolver {
  async resolve(_projectId: string, steps: TestStep[]): Promise<ResolvedSteps> {
    const executable = steps.map((step) => ({ ...step }));
    return {
      executable,
      display: maskSensitiveSteps(executable)
    };
  }
}
