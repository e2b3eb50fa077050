import { BackendCallFailure, ValidationRejection } from "./errors.js";
import type { AcceptancePredicate } from "./output_checks.js";
import type { NoticeFn, TextGenerator } from "./tools/types.js";
import { randomSeed, throwIfAborted, toErrorMessage } from "./utils.js";

export const DEFAULT_MAX_RETRIES = 3;

export type GenerationResult = {
  payload: string;
  accepted: boolean;
  attempts: number;
  /** Why the last attempt was turned down, when the result is not accepted. */
  rejection?: ValidationRejection;
};

export type GenerateOptions = {
  acceptancePredicate?: AcceptancePredicate;
  maxRetries?: number;
  seed?: number;
  temperature?: number;
  signal?: AbortSignal;
};

/**
 * Wraps one text-generation capability with structural acceptance and bounded re-sampling.
 *
 * Terminal failure resolves with `accepted: false`; callers branch on it and supply their own
 * fallback. Only cancellation rejects.
 */
export class ValidatedGenerationClient {
  constructor(
    private readonly generator: TextGenerator,
    private readonly notify: NoticeFn,
    private readonly label = "generation"
  ) {}

  async generate(prompt: string, options: GenerateOptions = {}): Promise<GenerationResult> {
    const { acceptancePredicate, temperature, signal } = options;
    const maxRetries = Math.max(0, Math.floor(options.maxRetries ?? DEFAULT_MAX_RETRIES));
    // Without a predicate there is nothing to re-sample against.
    const maxAttempts = acceptancePredicate ? maxRetries + 1 : 1;

    let seed = options.seed;
    let payload = "";
    let rejection: ValidationRejection | undefined;

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      throwIfAborted(signal);
      if (attempt > 1) seed = randomSeed();

      let success: boolean;
      try {
        const out = await this.generator.call(prompt, { seed, temperature, signal });
        payload = out.text;
        success = out.success;
      } catch (err) {
        throwIfAborted(signal);
        const failure = err instanceof BackendCallFailure ? err : new BackendCallFailure(toErrorMessage(err), err);
        this.notify(`[backend-failure] ${this.label} attempt ${attempt}/${maxAttempts}: ${failure.message}`);
        payload = "";
        success = false;
      }

      if (!acceptancePredicate) {
        return { payload, accepted: success, attempts: attempt };
      }

      if (success && acceptancePredicate(payload)) {
        return { payload, accepted: true, attempts: attempt };
      }

      rejection = new ValidationRejection(
        success ? "payload failed structural validation" : "backend reported failure",
        attempt
      );
      this.notify(`[validation-rejected] ${this.label} attempt ${attempt}/${maxAttempts}: ${rejection.message}`);
    }

    return { payload, accepted: false, attempts: maxAttempts, rejection };
  }
}
