import { promises as fs } from "fs";
import os from "os";
import path from "path";
import { mergeRecord } from "../../src/engine/checkpointStore";
import { PacingController, PacingPolicy } from "../../src/engine/pacing";
import {
  DetailPage,
  ListPage,
  PageFetcher,
  PartitionRef,
  Session,
  Store
} from "../../src/types/collaborators";
import { DetailRecord, FieldMap, SummaryRecord } from "../../src/types/records";

export const TEST_POLICY: PacingPolicy = {
  requestDelayMs: 10,
  batchSize: 50,
  batchPauseMs: 100,
  backoffBaseMs: 20,
  backoffCapMs: 1000,
  maxAttempts: 3
};

/** Records every requested pause instead of waiting. */
export class SleepRecorder {
  readonly calls: number[] = [];
  readonly sleep = async (ms: number): Promise<void> => {
    this.calls.push(ms);
  };
}

export function testPacing(policy: Partial<PacingPolicy> = {}): PacingController {
  return new PacingController({ ...TEST_POLICY, ...policy }, new SleepRecorder().sleep);
}

export type FailureRule = (key: string, attempt: number) => Error | null;

export interface FakeFetcherConfig {
  partitions?: PartitionRef[];
  /** Pages per partition label. A page past the end is empty. */
  pages?: Record<string, ListPage[]>;
  /** Detail pages by URL. */
  details?: Record<string, DetailPage>;
  /** Keys are "<label>#<pageIndex>" for list pages and the URL for detail pages. */
  fail?: FailureRule;
}

export class FakeFetcher implements PageFetcher {
  readonly listCalls: string[] = [];
  readonly detailCalls: string[] = [];
  private readonly attempts = new Map<string, number>();

  constructor(private readonly config: FakeFetcherConfig) {}

  async listPartitions(): Promise<PartitionRef[]> {
    return this.config.partitions ?? [];
  }

  async fetchListPage(partition: PartitionRef, pageIndex: number): Promise<ListPage> {
    const key = `${partition.label}#${pageIndex}`;
    this.listCalls.push(key);
    this.failIfConfigured(key);
    const page = this.config.pages?.[partition.label]?.[pageIndex];
    if (!page) return { rows: [], hasNextPage: false };
    return { rows: page.rows.map((row) => ({ ...row })), hasNextPage: page.hasNextPage };
  }

  async fetchDetailPage(url: string): Promise<DetailPage> {
    this.detailCalls.push(url);
    this.failIfConfigured(url);
    const page = this.config.details?.[url];
    if (!page) throw new Error(`No detail page for ${url}`);
    return page;
  }

  private failIfConfigured(key: string): void {
    const attempt = (this.attempts.get(key) ?? 0) + 1;
    this.attempts.set(key, attempt);
    const error = this.config.fail?.(key, attempt) ?? null;
    if (error) throw error;
  }
}

export class FakeSession implements Session {
  checks = 0;

  constructor(public valid = true) {}

  async isValid(): Promise<boolean> {
    this.checks++;
    return this.valid;
  }
}

export class MemoryStore implements Store {
  summaries: SummaryRecord[] = [];
  details: DetailRecord[] = [];
  summaryWrites = 0;
  detailWrites = 0;

  async writeSummary(records: readonly SummaryRecord[]): Promise<void> {
    this.summaryWrites++;
    for (const record of records) {
      this.summaries = mergeRecord(this.summaries, record);
    }
  }

  async writeDetail(record: DetailRecord): Promise<void> {
    this.detailWrites++;
    this.details = mergeRecord(this.details, record);
  }
}

export function listPage(rows: FieldMap[], hasNextPage: boolean): ListPage {
  return { rows, hasNextPage };
}

export function summary(identity: string, detailUrl: string | null, fields: FieldMap = {}): SummaryRecord {
  return {
    identity,
    phaseId: "experts-metadata",
    partition: "Inst-A",
    fields: { Expert_ID: identity, ...fields },
    detailUrl,
    harvestedAt: "2026-01-05T10:00:00Z"
  };
}

export async function makeTempDir(): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), "portal-harvest-"));
}

export async function removeTempDir(dir: string): Promise<void> {
  await fs.rm(dir, { recursive: true, force: true });
}

export async function readJsonFile(filePath: string): Promise<unknown> {
  return JSON.parse(await fs.readFile(filePath, "utf8"));
}
