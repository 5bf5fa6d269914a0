import { DetailPage, PageFetcher, RawSection, Session, Store } from "../types/collaborators";
import { DetailRecord, ErrorReason, SectionPayload, SummaryRecord } from "../types/records";
import { log } from "../utils/log";
import { nowUtcIsoSeconds } from "../utils/time";
import { Deduplicator } from "./dedup";
import { describeError, MissingPrerequisiteError, reasonFor } from "./errors";
import { ErrorLedger } from "./errorLedger";
import { PacingController } from "./pacing";
import { PhaseProgress } from "./progress";
import { withRetry } from "./retry";
import { sessionGuard } from "./session";

export interface SectionFailure {
  section: string;
  reason: Extract<ErrorReason, "section-failure" | "section-missing">;
  message: string;
}

export interface AssembledSections {
  sections: Record<string, SectionPayload>;
  failures: SectionFailure[];
}

export function toSectionPayload(raw: RawSection): SectionPayload {
  if (Array.isArray(raw)) {
    return { kind: "list", items: raw.map((item) => ({ ...item })) };
  }
  return { kind: "flat", fields: { ...raw } };
}

/**
 * Keeps every section that extracted cleanly. Failed sections, and known
 * sections the page did not render, come back as failures.
 */
export function assembleSections(
  page: DetailPage,
  knownSections: readonly string[]
): AssembledSections {
  const sections: Record<string, SectionPayload> = {};
  const failures: SectionFailure[] = [];

  for (const [name, result] of Object.entries(page)) {
    if (result.ok) {
      sections[name] = toSectionPayload(result.payload);
    } else {
      failures.push({ section: name, reason: "section-failure", message: result.error });
    }
  }

  for (const name of knownSections) {
    if (!(name in page)) {
      failures.push({
        section: name,
        reason: "section-missing",
        message: "Section not present on detail page"
      });
    }
  }

  return { sections, failures };
}

export interface DetailTraversalOptions {
  phaseId: string;
  fetcher: Pick<PageFetcher, "fetchDetailPage">;
  store: Pick<Store, "writeDetail">;
  session: Session;
  progress: PhaseProgress;
  pacing: PacingController;
  ledger: ErrorLedger;
  dedup: Deduplicator<DetailRecord>;
  knownSections: readonly string[];
}

/**
 * Visits the detail page of every master-list entry not yet completed. An
 * item's record (or its failure) is durable and checkpointed before the
 * next item is fetched.
 */
export class DetailTraversal {
  private readonly attempted = new Set<string>();
  private handled = 0;

  constructor(private readonly options: DetailTraversalOptions) {}

  async *run(
    masterList: readonly SummaryRecord[],
    resumeSet: ReadonlySet<string>
  ): AsyncGenerator<DetailRecord> {
    if (masterList.length === 0) {
      throw new MissingPrerequisiteError(
        `${this.options.phaseId}: master list is empty; run the metadata phase first`
      );
    }
    this.options.progress.setTotal(masterList.length);

    for (const [itemIndex, summary] of masterList.entries()) {
      if (resumeSet.has(summary.identity) || this.options.progress.isCompleted(summary.identity)) {
        continue;
      }
      // A repeated master-list row is fetched at most once per run.
      if (this.attempted.has(summary.identity)) continue;
      this.attempted.add(summary.identity);

      log.info(`[${itemIndex + 1}/${masterList.length}] ${summary.identity}`);
      const record = await this.processItem(summary, itemIndex);

      this.handled++;
      if (await this.options.pacing.onBatchBoundary(this.handled)) {
        log.info(`Paused after ${this.handled} items`);
      }
      if (record) yield record;
    }
  }

  private async processItem(summary: SummaryRecord, itemIndex: number): Promise<DetailRecord | null> {
    const { fetcher, store, session, progress, pacing, ledger, dedup, phaseId, knownSections } =
      this.options;

    if (!summary.detailUrl) {
      await ledger.record({
        identity: summary.identity,
        locator: null,
        phaseId,
        kind: "terminal-item",
        reason: "missing-locator",
        section: null,
        message: "Summary record has no detail URL",
        timestamp: nowUtcIsoSeconds(),
        retryCount: 0
      });
      progress.fail(summary.identity);
      progress.advance({ kind: "detail", itemIndex });
      await progress.flush();
      return null;
    }

    const url = summary.detailUrl;
    await pacing.beforeRequest();
    const outcome = await withRetry(pacing, () => fetcher.fetchDetailPage(url), {
      label: summary.identity,
      onRetry: sessionGuard(session)
    });

    if (!outcome.ok) {
      await ledger.record({
        identity: summary.identity,
        locator: url,
        phaseId,
        kind: "terminal-item",
        reason: reasonFor(outcome.error),
        section: null,
        message: describeError(outcome.error).message,
        timestamp: nowUtcIsoSeconds(),
        retryCount: outcome.attempts - 1
      });
      progress.fail(summary.identity);
      progress.advance({ kind: "detail", itemIndex });
      await progress.flush();
      return null;
    }

    const { sections, failures } = assembleSections(outcome.value, knownSections);
    const record: DetailRecord = {
      identity: summary.identity,
      meta: {
        phaseId,
        partition: summary.partition,
        sourceUrl: url,
        scrapedAt: nowUtcIsoSeconds(),
        fromList: { ...summary.fields }
      },
      sections
    };

    for (const failure of failures) {
      await ledger.record({
        identity: summary.identity,
        locator: url,
        phaseId,
        kind: "partial-item",
        reason: failure.reason,
        section: failure.section,
        message: failure.message,
        timestamp: nowUtcIsoSeconds(),
        retryCount: 0
      });
    }

    const admission = dedup.admit(record);
    if (admission.status === "skipped-duplicate") {
      log.debug(`${summary.identity}: already stored, keeping the first record`);
    } else {
      await store.writeDetail(record);
    }

    progress.complete([summary.identity]);
    progress.count("processed");
    if (failures.length > 0) progress.count("partial");
    progress.advance({ kind: "detail", itemIndex });
    await progress.flush();

    if (admission.status === "skipped-duplicate") return null;
    log.success(
      `${summary.identity}: ${Object.keys(sections).length} sections` +
        (failures.length > 0 ? `, ${failures.length} failed` : "")
    );
    return record;
  }
}
