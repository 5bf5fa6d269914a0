import { CheckpointState, Counters, Cursor } from "../types/records";
import { CheckpointStore } from "./checkpointStore";

export type ProgressListener = (state: CheckpointState) => void;

/**
 * In-memory view of a phase's checkpoint. Traversals mutate it after a unit's
 * output is written and call flush() before moving to the next unit.
 *
 * Item failures are tracked by identity: `errored` is the size of the failed
 * set once fail() has been used, so an item that fails again on a later run
 * is not counted twice and one that later succeeds stops counting.
 */
export class PhaseProgress {
  private state: CheckpointState;
  private readonly completed: Set<string>;
  private readonly failed: Set<string>;

  constructor(
    private readonly store: CheckpointStore,
    initial: CheckpointState,
    private readonly listener?: ProgressListener
  ) {
    this.state = {
      ...initial,
      completedIdentities: [...initial.completedIdentities],
      failedIdentities: [...initial.failedIdentities],
      counters: { ...initial.counters }
    };
    this.completed = new Set(initial.completedIdentities);
    this.failed = new Set(initial.failedIdentities);
  }

  get snapshot(): CheckpointState {
    return {
      ...this.state,
      completedIdentities: [...this.state.completedIdentities],
      failedIdentities: [...this.state.failedIdentities],
      counters: { ...this.state.counters }
    };
  }

  isCompleted(identity: string): boolean {
    return this.completed.has(identity);
  }

  isFailed(identity: string): boolean {
    return this.failed.has(identity);
  }

  complete(identities: readonly string[]): void {
    for (const identity of identities) {
      if (this.failed.delete(identity)) this.syncFailures();
      if (this.completed.has(identity)) continue;
      this.completed.add(identity);
      this.state.completedIdentities.push(identity);
    }
  }

  fail(identity: string): void {
    if (this.failed.has(identity)) return;
    this.failed.add(identity);
    this.syncFailures();
  }

  advance(cursor: Cursor): void {
    this.state.cursor = cursor;
  }

  count(counter: Exclude<keyof Counters, "total">, by = 1): void {
    this.state.counters[counter] += by;
  }

  setTotal(total: number): void {
    this.state.counters.total = total;
  }

  markComplete(): void {
    this.state.status = "complete";
  }

  async flush(): Promise<void> {
    this.state = await this.store.save(this.state);
    this.listener?.(this.snapshot);
  }

  private syncFailures(): void {
    this.state.failedIdentities = [...this.failed];
    this.state.counters.errored = this.failed.size;
  }
}
