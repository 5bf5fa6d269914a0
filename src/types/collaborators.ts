import { DetailRecord, FieldMap, SummaryRecord } from "./records";

/** One subdivision of a list harvest: an institution, or the single global table. */
export interface PartitionRef {
  label: string;
  global: boolean;
}

export interface ListPage {
  rows: FieldMap[];
  hasNextPage: boolean;
}

export type RawSection = FieldMap | FieldMap[];

export type SectionResult =
  | { ok: true; payload: RawSection }
  | { ok: false; error: string };

export type DetailPage = Record<string, SectionResult>;

export interface PageFetcher {
  listPartitions(): Promise<PartitionRef[]>;
  fetchListPage(partition: PartitionRef, pageIndex: number): Promise<ListPage>;
  fetchDetailPage(url: string): Promise<DetailPage>;
}

/** An authenticated handle established before the engine starts. */
export interface Session {
  isValid(): Promise<boolean>;
}

/** Durable output; both writes are idempotent upserts keyed by identity. */
export interface Store {
  writeSummary(records: readonly SummaryRecord[]): Promise<void>;
  writeDetail(record: DetailRecord): Promise<void>;
}
