import { CheckpointState, CheckpointStateSchema, Identified } from "../types/records";
import { pathExists, readJson, writeJsonAtomic } from "../utils/fs";
import { log } from "../utils/log";
import { nowUtcIsoSeconds } from "../utils/time";
import { CheckpointWriteError, describeError } from "./errors";

export function emptyCheckpoint(phaseId: string): CheckpointState {
  return {
    phaseId,
    status: "running",
    cursor: null,
    completedIdentities: [],
    failedIdentities: [],
    counters: { processed: 0, errored: 0, partial: 0, total: 0 },
    timestamp: nowUtcIsoSeconds()
  };
}

/** Upsert by identity: an existing record is replaced in place, a new one appended. */
export function mergeRecord<T extends Identified>(existing: readonly T[], record: T): T[] {
  const index = existing.findIndex((item) => item.identity === record.identity);
  if (index === -1) return [...existing, record];
  const merged = existing.slice();
  merged[index] = record;
  return merged;
}

export class CheckpointStore {
  constructor(readonly filePath: string, readonly phaseId: string) {}

  async exists(): Promise<boolean> {
    return pathExists(this.filePath);
  }

  async load(): Promise<CheckpointState> {
    if (!(await this.exists())) return emptyCheckpoint(this.phaseId);

    let data: unknown;
    try {
      data = await readJson(this.filePath);
    } catch (error) {
      log.warn(`Ignoring unreadable checkpoint ${this.filePath}: ${describeError(error).message}`);
      return emptyCheckpoint(this.phaseId);
    }

    const parsed = CheckpointStateSchema.safeParse(data);
    if (!parsed.success) {
      log.warn(`Ignoring malformed checkpoint ${this.filePath}: ${parsed.error.issues[0]?.message}`);
      return emptyCheckpoint(this.phaseId);
    }
    if (parsed.data.phaseId !== this.phaseId) {
      log.warn(
        `Checkpoint ${this.filePath} belongs to ${parsed.data.phaseId}, not ${this.phaseId}; starting empty`
      );
      return emptyCheckpoint(this.phaseId);
    }
    return parsed.data;
  }

  /** Returns the state as written, stamped with the flush time. */
  async save(state: CheckpointState): Promise<CheckpointState> {
    const stamped: CheckpointState = { ...state, timestamp: nowUtcIsoSeconds() };
    try {
      await writeJsonAtomic(this.filePath, stamped);
    } catch (error) {
      throw new CheckpointWriteError(this.filePath, error);
    }
    return stamped;
  }
}
