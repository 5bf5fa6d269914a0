import { PageFetcher, PartitionRef, Session, Store } from "../types/collaborators";
import { FieldMap, ListCursor, SummaryRecord } from "../types/records";
import { log } from "../utils/log";
import { nowUtcIsoSeconds } from "../utils/time";
import { collapsePage, Deduplicator } from "./dedup";
import { describeError, reasonFor } from "./errors";
import { ErrorLedger } from "./errorLedger";
import { PacingController } from "./pacing";
import { PhaseProgress } from "./progress";
import { withRetry } from "./retry";
import { sessionGuard } from "./session";

export interface ListLimits {
  maxPagesPerPartition: number;
  maxConsecutivePageFailures: number;
}

export const DEFAULT_LIST_LIMITS: ListLimits = {
  maxPagesPerPartition: 50,
  maxConsecutivePageFailures: 3
};

export interface ListTraversalOptions {
  phaseId: string;
  fetcher: Pick<PageFetcher, "fetchListPage">;
  store: Pick<Store, "writeSummary">;
  session: Session;
  progress: PhaseProgress;
  pacing: PacingController;
  ledger: ErrorLedger;
  dedup: Deduplicator<SummaryRecord>;
  toSummary: (row: FieldMap, partition: PartitionRef) => SummaryRecord | null;
  limits?: Partial<ListLimits>;
}

interface StartPosition {
  partitionIndex: number;
  pageIndex: number;
}

/** Code-unit order, so cursor positions do not depend on the host locale. */
export function sortPartitions(partitions: readonly PartitionRef[]): PartitionRef[] {
  return [...partitions].sort((a, b) => (a.label < b.label ? -1 : a.label > b.label ? 1 : 0));
}

export function resolveStart(
  ordered: readonly PartitionRef[],
  cursor: ListCursor | null
): StartPosition {
  if (!cursor) return { partitionIndex: 0, pageIndex: 0 };

  let partitionIndex = ordered.findIndex((partition) => partition.label === cursor.partitionLabel);
  if (partitionIndex === -1) {
    log.warn(
      `Partition "${cursor.partitionLabel}" from the checkpoint is gone; resuming at position ${cursor.partitionIndex}`
    );
    partitionIndex = cursor.partitionIndex;
  }

  return cursor.partitionComplete
    ? { partitionIndex: partitionIndex + 1, pageIndex: 0 }
    : { partitionIndex, pageIndex: cursor.pageIndex + 1 };
}

/**
 * Harvests summary rows partition by partition, page by page. Each page's
 * new rows are written and the checkpoint flushed before the rows are
 * yielded and before the next page is requested.
 */
export class ListTraversal {
  private readonly limits: ListLimits;

  constructor(private readonly options: ListTraversalOptions) {
    this.limits = { ...DEFAULT_LIST_LIMITS, ...options.limits };
  }

  async *run(
    partitions: readonly PartitionRef[],
    resumeCursor: ListCursor | null = null
  ): AsyncGenerator<SummaryRecord> {
    const ordered = sortPartitions(partitions);
    const start = resolveStart(ordered, resumeCursor);
    this.options.progress.setTotal(ordered.length);

    for (let partitionIndex = start.partitionIndex; partitionIndex < ordered.length; partitionIndex++) {
      const firstPage = partitionIndex === start.partitionIndex ? start.pageIndex : 0;
      log.info(`[${partitionIndex + 1}/${ordered.length}] ${ordered[partitionIndex].label}`);
      yield* this.harvestPartition(ordered[partitionIndex], partitionIndex, firstPage);
    }
  }

  private async *harvestPartition(
    partition: PartitionRef,
    partitionIndex: number,
    firstPage: number
  ): AsyncGenerator<SummaryRecord> {
    const { fetcher, store, session, progress, pacing, ledger, dedup, phaseId } = this.options;
    // Pages before a resume point were harvested by an earlier run.
    let successfulPages = firstPage > 0 ? 1 : 0;
    let consecutiveFailures = 0;

    for (let pageIndex = firstPage; ; pageIndex++) {
      if (pageIndex >= this.limits.maxPagesPerPartition) {
        log.warn(`${partition.label}: stopping at the ${this.limits.maxPagesPerPartition}-page limit`);
        progress.advance(listCursor(partition, partitionIndex, Math.max(pageIndex - 1, 0), true));
        await progress.flush();
        return;
      }

      const label = `${partition.label} page ${pageIndex + 1}`;
      await pacing.beforeRequest();
      const outcome = await withRetry(pacing, () => fetcher.fetchListPage(partition, pageIndex), {
        label,
        onRetry: sessionGuard(session)
      });

      if (!outcome.ok) {
        consecutiveFailures++;
        const abandon = consecutiveFailures >= this.limits.maxConsecutivePageFailures;
        await ledger.record({
          identity: null,
          locator: label,
          phaseId,
          kind: "terminal-item",
          reason: reasonFor(outcome.error),
          section: null,
          message: describeError(outcome.error).message,
          timestamp: nowUtcIsoSeconds(),
          retryCount: outcome.attempts - 1
        });
        progress.count("errored");
        if (abandon) {
          const message = `abandoned after ${consecutiveFailures} failed pages in a row`;
          log.error(`${partition.label}: ${message}`);
          await ledger.record({
            identity: null,
            locator: partition.label,
            phaseId,
            kind: "terminal-item",
            reason: reasonFor(outcome.error),
            section: null,
            message: `Partition ${message}`,
            timestamp: nowUtcIsoSeconds(),
            retryCount: 0
          });
        }
        progress.advance(listCursor(partition, partitionIndex, pageIndex, abandon));
        await progress.flush();
        if (abandon) return;
        continue;
      }

      consecutiveFailures = 0;
      const page = outcome.value;
      const mapped = page.rows
        .map((row) => this.options.toSummary(row, partition))
        .filter((record): record is SummaryRecord => record !== null);
      if (mapped.length < page.rows.length) {
        log.debug(`${label}: dropped ${page.rows.length - mapped.length} unidentifiable rows`);
      }

      const admitted = collapsePage(mapped).filter(
        (record) => dedup.admit(record).status === "accepted"
      );
      const exhausted = !page.hasNextPage || (admitted.length === 0 && successfulPages > 0);

      if (admitted.length > 0) {
        await store.writeSummary(admitted);
      }
      progress.complete(admitted.map((record) => record.identity));
      progress.count("processed", admitted.length);
      progress.advance(listCursor(partition, partitionIndex, pageIndex, exhausted));
      await progress.flush();
      successfulPages++;

      log.info(`   ${label}: ${page.rows.length} rows, ${admitted.length} new`);
      yield* admitted;

      if (exhausted) return;
    }
  }
}

function listCursor(
  partition: PartitionRef,
  partitionIndex: number,
  pageIndex: number,
  partitionComplete: boolean
): ListCursor {
  return {
    kind: "list",
    partitionIndex,
    partitionLabel: partition.label,
    pageIndex,
    partitionComplete
  };
}
