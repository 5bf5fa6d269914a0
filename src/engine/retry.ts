import { log } from "../utils/log";
import { describeError, FatalError, TransientError } from "./errors";
import { PacingController } from "./pacing";

export type RetryOutcome<T> =
  | { ok: true; value: T; attempts: number }
  | { ok: false; error: unknown; attempts: number };

export interface RetryOptions {
  label: string;
  /** Runs before each retry; may throw a FatalError to stop retrying. */
  onRetry?: (attempt: number, error: unknown) => Promise<void>;
}

/**
 * Runs `operation` until it succeeds or the attempt cap is reached. Only
 * TransientErrors are retried; FatalErrors propagate, anything else is
 * returned as a failed outcome on the spot.
 */
export async function withRetry<T>(
  pacing: PacingController,
  operation: (attempt: number) => Promise<T>,
  options: RetryOptions
): Promise<RetryOutcome<T>> {
  const maxAttempts = Math.max(1, pacing.policy.maxAttempts);

  for (let attempt = 1; ; attempt++) {
    try {
      const value = await operation(attempt);
      return { ok: true, value, attempts: attempt };
    } catch (error) {
      if (error instanceof FatalError) throw error;
      if (!(error instanceof TransientError) || attempt >= maxAttempts) {
        return { ok: false, error, attempts: attempt };
      }

      log.warn(
        `${options.label}: attempt ${attempt}/${maxAttempts} failed (${error.reason}: ${describeError(error).message}); retrying in ${pacing.onFailure(attempt)}ms`
      );
      if (options.onRetry) {
        await options.onRetry(attempt, error);
      }
      await pacing.backoff(attempt);
    }
  }
}
