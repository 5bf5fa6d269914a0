import { sleep as defaultSleep } from "../utils/time";

export interface PacingPolicy {
  /** Pause before every page or detail request. */
  requestDelayMs: number;
  /** Processed items between long pauses. */
  batchSize: number;
  batchPauseMs: number;
  backoffBaseMs: number;
  backoffCapMs: number;
  /** Attempts per unit of work, including the first. */
  maxAttempts: number;
}

export const DEFAULT_PACING_POLICY: PacingPolicy = {
  requestDelayMs: 1000,
  batchSize: 50,
  batchPauseMs: 10000,
  backoffBaseMs: 2000,
  backoffCapMs: 30000,
  maxAttempts: 3
};

export type SleepFn = (ms: number) => Promise<void>;

export class PacingController {
  constructor(
    readonly policy: PacingPolicy = DEFAULT_PACING_POLICY,
    private readonly sleep: SleepFn = defaultSleep
  ) {}

  async beforeRequest(): Promise<void> {
    await this.sleep(this.policy.requestDelayMs);
  }

  /** Pauses when `processed` lands on a batch boundary; returns whether it paused. */
  async onBatchBoundary(processed: number): Promise<boolean> {
    const { batchSize, batchPauseMs } = this.policy;
    if (batchSize <= 0 || processed <= 0 || processed % batchSize !== 0) return false;
    await this.sleep(batchPauseMs);
    return true;
  }

  /** Capped exponential backoff for the given failed attempt (1-based). */
  onFailure(attempt: number): number {
    const { backoffBaseMs, backoffCapMs } = this.policy;
    const exponent = Math.max(0, attempt - 1);
    return Math.min(backoffCapMs, backoffBaseMs * 2 ** exponent);
  }

  async backoff(attempt: number): Promise<number> {
    const waitMs = this.onFailure(attempt);
    await this.sleep(waitMs);
    return waitMs;
  }
}
