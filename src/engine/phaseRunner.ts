import { PageFetcher, PartitionRef, Session, Store } from "../types/collaborators";
import {
  CheckpointState,
  Counters,
  DetailRecord,
  ErrorReason,
  FieldMap,
  SummaryRecord
} from "../types/records";
import { log } from "../utils/log";
import { CheckpointStore, emptyCheckpoint } from "./checkpointStore";
import { Deduplicator } from "./dedup";
import { DetailTraversal } from "./detailTraversal";
import { describeError, ErrorDetail, FatalError } from "./errors";
import { ErrorLedger } from "./errorLedger";
import { ListLimits, ListTraversal } from "./listTraversal";
import { PacingController } from "./pacing";
import { PhaseProgress, ProgressListener } from "./progress";
import { assertSessionValid } from "./session";

/**
 * resume: continue from the checkpoint (fresh when there is none).
 * fresh: new checkpoint and new output; old output survives until the first write.
 * rescrape: details only; new checkpoint, existing records replaced one by one.
 */
export type RunMode = "resume" | "fresh" | "rescrape";

export type PhaseStatus = "init" | "resuming" | "fresh" | "running" | "complete" | "fatal";

interface PhaseContextBase {
  phaseId: string;
  mode: RunMode;
  session: Session;
  pacing: PacingController;
  checkpoints: CheckpointStore;
  ledger: ErrorLedger;
  onProgress?: ProgressListener;
  onTransition?: (status: PhaseStatus) => void;
}

export interface MetadataPhaseContext extends PhaseContextBase {
  stage: "metadata";
  fetcher: Pick<PageFetcher, "listPartitions" | "fetchListPage">;
  store: Pick<Store, "writeSummary">;
  toSummary: (row: FieldMap, partition: PartitionRef) => SummaryRecord | null;
  limits?: Partial<ListLimits>;
}

export interface DetailsPhaseContext extends PhaseContextBase {
  stage: "details";
  fetcher: Pick<PageFetcher, "fetchDetailPage">;
  store: Pick<Store, "writeDetail">;
  loadMasterList: () => Promise<SummaryRecord[]>;
  knownSections: readonly string[];
}

export type PhaseContext = MetadataPhaseContext | DetailsPhaseContext;

export interface PhaseTally {
  succeeded: number;
  partial: number;
  failed: number;
}

export interface PhaseReport {
  phaseId: string;
  stage: PhaseContext["stage"];
  status: "complete" | "fatal";
  startedFrom: "resuming" | "fresh";
  counters: Counters;
  tally: PhaseTally;
  ledger: Partial<Record<ErrorReason, number>>;
  error: ErrorDetail | null;
}

export function tallyOf(counters: Counters): PhaseTally {
  return {
    succeeded: counters.processed - counters.partial,
    partial: counters.partial,
    failed: counters.errored
  };
}

/**
 * Identities a resumed details run does not fetch: everything completed, and
 * items that failed at or before the cursor. Those wait for the retry pass
 * that a resume of the completed phase runs, so an interrupted run ends in
 * the same state as an uninterrupted one.
 */
export function resumeSkipSet(
  masterList: readonly SummaryRecord[],
  state: CheckpointState
): Set<string> {
  const skip = new Set(state.completedIdentities);
  const cursor = state.cursor?.kind === "detail" ? state.cursor : null;
  if (!cursor) return skip;

  const failed = new Set(state.failedIdentities);
  for (const [itemIndex, summary] of masterList.entries()) {
    if (itemIndex > cursor.itemIndex) break;
    if (failed.has(summary.identity)) skip.add(summary.identity);
  }
  return skip;
}

/**
 * INIT -> RESUMING | FRESH -> RUNNING -> COMPLETE, with FATAL reachable from
 * RUNNING. A fatal condition stops the phase without touching the checkpoint
 * again, so a later resume starts from the last durable unit.
 */
export class PhaseRunner {
  private currentStatus: PhaseStatus = "init";

  constructor(private readonly context: PhaseContext) {}

  get status(): PhaseStatus {
    return this.currentStatus;
  }

  async run(): Promise<PhaseReport> {
    this.transition("init");
    let initial = await this.initialState();
    const startedFrom = this.currentStatus === "resuming" ? "resuming" : "fresh";
    let progress = new PhaseProgress(this.context.checkpoints, initial, this.context.onProgress);

    try {
      if (startedFrom === "resuming" && initial.status === "complete") {
        const outstanding = await this.outstandingItems(initial);
        if (outstanding === 0) {
          log.info(`${this.context.phaseId} is already complete; nothing to resume`);
          this.transition("complete");
          return this.report(progress, startedFrom, null);
        }
        log.info(`${this.context.phaseId}: retrying ${outstanding} items not completed by the last pass`);
        initial = { ...initial, status: "running", cursor: null };
        progress = new PhaseProgress(this.context.checkpoints, initial, this.context.onProgress);
      }

      await assertSessionValid(this.context.session);
      this.transition("running");

      if (this.context.stage === "metadata") {
        await this.runMetadata(this.context, progress, initial);
      } else {
        await this.runDetails(this.context, progress, initial);
      }

      progress.markComplete();
      await progress.flush();
      this.transition("complete");
      return this.report(progress, startedFrom, null);
    } catch (error) {
      if (!(error instanceof FatalError)) throw error;
      this.transition("fatal");
      log.error(`${this.context.phaseId} stopped: ${error.message}`);
      return this.report(progress, startedFrom, describeError(error));
    }
  }

  /** Master-list entries a completed details pass left without a record. */
  private async outstandingItems(state: CheckpointState): Promise<number> {
    if (this.context.stage === "metadata") return 0;
    const completed = new Set(state.completedIdentities);
    const outstanding = new Set<string>();
    for (const summary of await this.context.loadMasterList()) {
      if (!completed.has(summary.identity)) outstanding.add(summary.identity);
    }
    return outstanding.size;
  }

  private async initialState(): Promise<CheckpointState> {
    const { checkpoints, mode, phaseId } = this.context;
    if (mode === "resume" && (await checkpoints.exists())) {
      const state = await checkpoints.load();
      if (state.cursor !== null || state.completedIdentities.length > 0 || state.status === "complete") {
        this.transition("resuming");
        log.info(
          `Resuming ${phaseId} from ${state.timestamp}: ${state.counters.processed} processed, ${state.counters.errored} errors`
        );
        return state;
      }
    }
    this.transition("fresh");
    return emptyCheckpoint(phaseId);
  }

  private async runMetadata(
    context: MetadataPhaseContext,
    progress: PhaseProgress,
    initial: CheckpointState
  ): Promise<void> {
    const partitions = await context.fetcher.listPartitions();
    if (partitions.length === 0) {
      log.warn(`${context.phaseId}: the portal listed no partitions`);
    }

    const traversal = new ListTraversal({
      phaseId: context.phaseId,
      fetcher: context.fetcher,
      store: context.store,
      session: context.session,
      progress,
      pacing: context.pacing,
      ledger: context.ledger,
      dedup: new Deduplicator<SummaryRecord>("keep-first", initial.completedIdentities),
      toSummary: context.toSummary,
      limits: context.limits
    });

    const cursor = initial.cursor?.kind === "list" ? initial.cursor : null;
    let harvested = 0;
    for await (const record of traversal.run(partitions, cursor)) {
      harvested++;
      log.debug(`harvested ${record.identity}`);
    }
    log.info(`${context.phaseId}: ${harvested} new summary records this run`);
  }

  private async runDetails(
    context: DetailsPhaseContext,
    progress: PhaseProgress,
    initial: CheckpointState
  ): Promise<void> {
    const masterList = await context.loadMasterList();
    const rescrape = context.mode === "rescrape";

    const traversal = new DetailTraversal({
      phaseId: context.phaseId,
      fetcher: context.fetcher,
      store: context.store,
      session: context.session,
      progress,
      pacing: context.pacing,
      ledger: context.ledger,
      dedup: new Deduplicator<DetailRecord>(
        rescrape ? "keep-latest" : "keep-first",
        initial.completedIdentities
      ),
      knownSections: context.knownSections
    });

    let scraped = 0;
    for await (const record of traversal.run(masterList, resumeSkipSet(masterList, initial))) {
      scraped++;
      log.debug(`scraped ${record.identity}`);
    }
    log.info(`${context.phaseId}: ${scraped} detail records this run`);
  }

  private report(
    progress: PhaseProgress,
    startedFrom: PhaseReport["startedFrom"],
    error: ErrorDetail | null
  ): PhaseReport {
    if (this.context.ledger.hasUnsavedEntries) {
      log.warn(`${this.context.phaseId}: some error ledger entries are not on disk yet`);
    }
    const { counters } = progress.snapshot;
    return {
      phaseId: this.context.phaseId,
      stage: this.context.stage,
      status: error ? "fatal" : "complete",
      startedFrom,
      counters,
      tally: tallyOf(counters),
      ledger: this.context.ledger.summary(),
      error
    };
  }

  private transition(status: PhaseStatus): void {
    this.currentStatus = status;
    this.context.onTransition?.(status);
  }
}
