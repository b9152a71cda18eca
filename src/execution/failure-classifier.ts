import { z } from "zod";
import { errorMessage, logError, logInfo, serializeError } from "../lib/logging.js";

export const failureCategorySchema = z.enum([
  "network_error",
  "timeout",
  "element_timing",
  "authentication_failure",
  "assertion_failure",
  "validation_error",
  "application_error",
  "unknown"
]);
export type FailureCategory = z.infer<typeof failureCategorySchema>;

const retryableCategories = new Set<FailureCategory>(["network_error", "timeout", "element_timing"]);

export function isRetryableCategory(category: FailureCategory): boolean {
  return retryableCategories.has(category);
}

export interface ClassificationInput {
  action: string;
  target: string | null;
  value: string | null;
  errorMessage: string;
  screenshot?: string | null;
}

export interface FailureClassification {
  isRetryable: boolean;
  category: FailureCategory;
  confidence: number;
  reasoning: string;
}

export interface FailureClassifier {
  classify(input: ClassificationInput): Promise<FailureClassification>;
}

/**
 * Runs the classifier and converts any failure into a non-retryable
 * `unknown` verdict. Never throws.
 */
export async function classifySafely(
  classifier: FailureClassifier,
  input: ClassificationInput
): Promise<FailureClassification> {
  try {
    const verdict = await classifier.classify(input);
    logInfo("failure.classified", {
      action: input.action,
      category: verdict.category,
      retryable: verdict.isRetryable,
      confidence: verdict.confidence
    });
    return verdict;
  } catch (error) {
    logError("failure.classification_failed", {
      action: input.action,
      error: serializeError(error)
    });
    return {
      isRetryable: false,
      category: "unknown",
      confidence: 0,
      reasoning: `Classification failed: ${errorMessage(error)}`
    };
  }
}

const classificationResponseSchema = z.object({
  isRetryable: z.boolean(),
  category: failureCategorySchema.catch("unknown"),
  confidence: z.coerce.number().min(0).max(1),
  reasoning: z.string().default("")
});

export interface HttpFailureClassifierOptions {
  baseUrl: string;
  timeoutMs?: number;
}

/** Remote classifier reached at `POST {baseUrl}/classify`. */
export class HttpFailureClassifier implements FailureClassifier {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;

  constructor(options: HttpFailureClassifierOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
    this.timeoutMs = options.timeoutMs ?? 30_000;
  }

  async classify(input: ClassificationInput): Promise<FailureClassification> {
    const response = await fetch(`${this.baseUrl}/classify`, {
      method: "POST",
      headers: {
        "Content-Type": "application/json"
      },
      body: JSON.stringify({
        action: input.action,
        target: input.target,
        value: input.value,
        errorMessage: input.errorMessage,
        screenshot: input.screenshot ?? null
      }),
      signal: AbortSignal.timeout(this.timeoutMs)
    });

    if (!response.ok) {
      const details = await response.text();
      throw new Error(`Classifier request failed (${response.status}): ${details}`);
    }

    return classificationResponseSchema.parse(await response.json());
  }
}

interface HeuristicRule {
  category: FailureCategory;
  confidence: number;
  matches: (input: ClassificationInput, error: string) => boolean;
  reasoning: string;
}

function isAssertionAction(action: string): boolean {
  return /^(assert|verify|expect|check)/i.test(action);
}

const heuristicRules: HeuristicRule[] = [
  {
    category: "authentication_failure",
    confidence: 0.8,
    matches: (_input, error) =>
      /invalid credentials|login failed|incorrect password|unauthori[sz]ed|\b401\b|\b403\b|forbidden|session expired/i.test(
        error
      ),
    reasoning: "Error indicates rejected credentials or an expired session."
  },
  {
    category: "application_error",
    confidence: 0.7,
    matches: (_input, error) =>
      /internal server error|\bstatus[ =:]*5\d\d\b|\b50[0-4]\b|application error|uncaught exception|crash/i.test(error),
    reasoning: "Error indicates the application under test failed."
  },
  {
    category: "network_error",
    confidence: 0.8,
    matches: (_input, error) =>
      /econnrefused|econnreset|enotfound|err_connection|err_name_not_resolved|socket hang up|network|dns|connection (refused|reset|closed)/i.test(
        error
      ),
    reasoning: "Error indicates a transient network failure."
  },
  {
    category: "timeout",
    confidence: 0.75,
    matches: (_input, error) => /timed? ?out|timeout|deadline exceeded/i.test(error),
    reasoning: "Error indicates the page or element did not respond in time."
  },
  {
    category: "validation_error",
    confidence: 0.65,
    matches: (_input, error) => /validation|is required|required field|invalid (email|format|input|value)/i.test(error),
    reasoning: "Error indicates a form validation message shown to the user."
  },
  {
    category: "assertion_failure",
    confidence: 0.7,
    matches: (input, error) => isAssertionAction(input.action) || /expected .* (but|to)|assertion/i.test(error),
    reasoning: "An assertion about page content did not hold."
  },
  {
    category: "element_timing",
    confidence: 0.6,
    matches: (_input, error) =>
      /not found|unable to locate|no element|waiting for|not visible|not attached|detached|not interactable/i.test(error),
    reasoning: "Element was not available yet; likely a loading or timing issue."
  }
];

/** Keyword-based classifier used when no remote classifier is configured. */
export class HeuristicFailureClassifier implements FailureClassifier {
  async classify(input: ClassificationInput): Promise<FailureClassification> {
    const error = input.errorMessage.trim();

    for (const rule of heuristicRules) {
      if (rule.matches(input, error)) {
        return {
          isRetryable: isRetryableCategory(rule.category),
          category: rule.category,
          confidence: rule.confidence,
          reasoning: rule.reasoning
        };
      }
    }

    return {
      isRetryable: false,
      category: "unknown",
      confidence: 0.3,
      reasoning: "Failure did not match a known pattern."
    };
  }
}
