import { sql } from "drizzle-orm";
import { PhaseConfig } from "../config/phaseRegistry";
import { loadRegistry, phasesInOrder } from "../config/registry";
import { loadSettings } from "../config/settings";
import { ErrorLedger } from "../engine/errorLedger";
import { closePool, getDb } from "../db/client";
import * as schema from "../db/schema";
import { phasePaths } from "../io/paths";
import { RecordDocument } from "../store/jsonStore";
import {
  DetailRecord,
  DetailRecordSchema,
  ErrorEntry,
  SummaryRecord,
  SummaryRecordSchema
} from "../types/records";
import { sha256 } from "../utils/hash";
import { log } from "../utils/log";

const CHUNK_SIZE = 500;

type Db = ReturnType<typeof getDb>;

export interface PersistOptions {
  registryPath?: string;
}

function toDate(value: string): Date {
  const date = new Date(value);
  return Number.isNaN(date.getTime()) ? new Date() : date;
}

export function chunk<T>(items: readonly T[], size: number = CHUNK_SIZE): T[][] {
  const chunks: T[][] = [];
  for (let index = 0; index < items.length; index += size) {
    chunks.push(items.slice(index, index + size));
  }
  return chunks;
}

export function toSummaryRow(record: SummaryRecord): typeof schema.summaryRecords.$inferInsert {
  return {
    phaseId: record.phaseId,
    identity: record.identity,
    partition: record.partition,
    detailUrl: record.detailUrl,
    fields: record.fields,
    harvestedAt: toDate(record.harvestedAt)
  };
}

export function toDetailRow(record: DetailRecord): typeof schema.detailRecords.$inferInsert {
  return {
    phaseId: record.meta.phaseId,
    identity: record.identity,
    partition: record.meta.partition,
    sourceUrl: record.meta.sourceUrl,
    fromList: record.meta.fromList,
    sections: record.sections,
    scrapedAt: toDate(record.meta.scrapedAt)
  };
}

/** Ledger entries have no key of their own; the hash makes re-persisting a ledger idempotent. */
export function errorEntryHash(entry: ErrorEntry): string {
  return sha256(
    JSON.stringify([
      entry.identity,
      entry.locator,
      entry.kind,
      entry.reason,
      entry.section,
      entry.message,
      entry.retryCount,
      entry.timestamp
    ])
  );
}

export function toErrorRow(entry: ErrorEntry): typeof schema.errorEntries.$inferInsert {
  return {
    phaseId: entry.phaseId,
    entryHash: errorEntryHash(entry),
    identity: entry.identity,
    locator: entry.locator,
    kind: entry.kind,
    reason: entry.reason,
    section: entry.section,
    message: entry.message,
    retryCount: entry.retryCount,
    occurredAt: toDate(entry.timestamp)
  };
}

async function insertSummaries(db: Db, records: readonly SummaryRecord[]): Promise<void> {
  for (const rows of chunk(records.map(toSummaryRow))) {
    await db
      .insert(schema.summaryRecords)
      .values(rows)
      .onConflictDoUpdate({
        target: [schema.summaryRecords.phaseId, schema.summaryRecords.identity],
        set: {
          partition: sql`excluded.partition`,
          detailUrl: sql`excluded.detail_url`,
          fields: sql`excluded.fields`,
          harvestedAt: sql`excluded.harvested_at`,
          updatedAt: sql`now()`
        }
      });
  }
}

async function insertDetails(db: Db, records: readonly DetailRecord[]): Promise<void> {
  for (const rows of chunk(records.map(toDetailRow))) {
    await db
      .insert(schema.detailRecords)
      .values(rows)
      .onConflictDoUpdate({
        target: [schema.detailRecords.phaseId, schema.detailRecords.identity],
        set: {
          partition: sql`excluded.partition`,
          sourceUrl: sql`excluded.source_url`,
          fromList: sql`excluded.from_list`,
          sections: sql`excluded.sections`,
          scrapedAt: sql`excluded.scraped_at`,
          updatedAt: sql`now()`
        }
      });
  }
}

async function insertErrors(db: Db, entries: readonly ErrorEntry[]): Promise<void> {
  for (const rows of chunk(entries.map(toErrorRow))) {
    await db
      .insert(schema.errorEntries)
      .values(rows)
      .onConflictDoNothing({
        target: [schema.errorEntries.phaseId, schema.errorEntries.entryHash]
      });
  }
}

async function persistPhase(db: Db, outDir: string, phase: PhaseConfig): Promise<void> {
  const paths = phasePaths(outDir, phase.id, phase.category);
  if (phase.stage === "metadata") {
    const summaries = await RecordDocument.open(paths.masterList, SummaryRecordSchema, { fresh: false });
    await insertSummaries(db, summaries.list());
    log.info(`${phase.id}: ${summaries.size} summary records`);
  } else {
    const details = await RecordDocument.open(paths.details, DetailRecordSchema, { fresh: false });
    await insertDetails(db, details.list());
    log.info(`${phase.id}: ${details.size} detail records`);
  }

  const ledger = await ErrorLedger.open(paths.errors, { fresh: false });
  await insertErrors(db, ledger.entries());
  if (ledger.size > 0) log.info(`${phase.id}: ${ledger.size} error entries`);
}

export async function runPersistCommand(options: PersistOptions): Promise<void> {
  const settings = loadSettings();
  const registry = await loadRegistry(options.registryPath);
  const db = getDb();

  try {
    await db.transaction(async (tx) => {
      for (const phase of phasesInOrder(registry)) {
        await persistPhase(tx, settings.outDir, phase);
      }
    });
    log.success(`Persisted ${settings.outDir} to the database.`);
  } finally {
    await closePool().catch((error: unknown) => {
      log.warn(`Closing the database pool failed: ${String(error)}`);
    });
  }
}
