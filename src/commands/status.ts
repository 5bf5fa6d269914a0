import { PhaseConfig } from "../config/phaseRegistry";
import { loadRegistry, phasesInOrder } from "../config/registry";
import { loadSettings } from "../config/settings";
import { CheckpointStore } from "../engine/checkpointStore";
import { describeError } from "../engine/errors";
import { ErrorLedger } from "../engine/errorLedger";
import { phasePaths } from "../io/paths";
import { RecordDocument } from "../store/jsonStore";
import {
  CheckpointState,
  DetailRecordSchema,
  SummaryRecordSchema
} from "../types/records";
import { log } from "../utils/log";

export type PhaseState = "pending" | "paused" | "partial" | "complete";

export interface PhaseStatusRow {
  phaseId: string;
  name: string;
  stage: PhaseConfig["stage"];
  state: PhaseState;
  processed: number;
  errored: number;
  partial: number;
  total: number;
  records: number | null;
  ledgerEntries: number;
  updatedAt: string | null;
}

export function phaseState(checkpoint: CheckpointState | null): PhaseState {
  if (!checkpoint) return "pending";
  if (checkpoint.status === "running") return "paused";
  const { errored, partial } = checkpoint.counters;
  return errored > 0 || partial > 0 ? "partial" : "complete";
}

export function describePhaseStatus(
  phase: PhaseConfig,
  checkpoint: CheckpointState | null,
  records: number | null,
  ledgerEntries: number
): PhaseStatusRow {
  const counters = checkpoint?.counters ?? { processed: 0, errored: 0, partial: 0, total: 0 };
  return {
    phaseId: phase.id,
    name: phase.name,
    stage: phase.stage,
    state: phaseState(checkpoint),
    ...counters,
    records,
    ledgerEntries,
    updatedAt: checkpoint?.timestamp ?? null
  };
}

async function countRecords(phase: PhaseConfig, filePath: string): Promise<number | null> {
  try {
    const document =
      phase.stage === "metadata"
        ? await RecordDocument.open(filePath, SummaryRecordSchema, { fresh: false })
        : await RecordDocument.open(filePath, DetailRecordSchema, { fresh: false });
    return document.size;
  } catch (error) {
    log.warn(describeError(error).message);
    return null;
  }
}

export async function collectStatus(outDir: string, phases: readonly PhaseConfig[]): Promise<PhaseStatusRow[]> {
  const rows: PhaseStatusRow[] = [];
  for (const phase of phases) {
    const paths = phasePaths(outDir, phase.id, phase.category);
    const store = new CheckpointStore(paths.checkpoint, phase.id);
    const checkpoint = (await store.exists()) ? await store.load() : null;
    const ledger = await ErrorLedger.open(paths.errors, { fresh: false });
    const records = await countRecords(phase, phase.stage === "metadata" ? paths.masterList : paths.details);
    rows.push(describePhaseStatus(phase, checkpoint, records, ledger.size));
  }
  return rows;
}

export function formatStatusRow(row: PhaseStatusRow): string {
  // Metadata totals count partitions, not records.
  const progress =
    row.stage === "details" && row.total > 0 ? `${row.processed}/${row.total}` : `${row.processed}`;
  return [
    row.phaseId.padEnd(24),
    row.state.padEnd(9),
    `processed ${progress}`.padEnd(20),
    `errors ${row.errored}`.padEnd(10),
    `partial ${row.partial}`.padEnd(11),
    `records ${row.records ?? "?"}`.padEnd(14),
    row.updatedAt ?? "-"
  ].join(" ");
}

export async function runStatusCommand(options: { registryPath?: string }): Promise<void> {
  const settings = loadSettings();
  const registry = await loadRegistry(options.registryPath);
  const rows = await collectStatus(settings.outDir, phasesInOrder(registry));
  log.info(`Output root: ${settings.outDir}`);
  for (const row of rows) {
    log.info(formatStatusRow(row));
  }
}
