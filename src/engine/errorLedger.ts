import { z } from "zod";
import { ErrorEntry, ErrorEntrySchema, ErrorReason } from "../types/records";
import { pathExists, readJson, writeJsonAtomic } from "../utils/fs";
import { log } from "../utils/log";
import { describeError } from "./errors";

const LedgerDocumentSchema = z.array(ErrorEntrySchema);

export interface LedgerOpenOptions {
  /** Start a new ledger; the old file is replaced on the first write. */
  fresh: boolean;
}

/**
 * Append-only record of failed units of work. Recording never throws: a
 * failed write is logged and retried with the next entry, since the whole
 * document is rewritten each time.
 */
export class ErrorLedger {
  private readonly items: ErrorEntry[];
  private unsaved = false;

  private constructor(readonly filePath: string, items: ErrorEntry[]) {
    this.items = items;
  }

  static async open(filePath: string, options: LedgerOpenOptions): Promise<ErrorLedger> {
    if (options.fresh || !(await pathExists(filePath))) {
      return new ErrorLedger(filePath, []);
    }

    try {
      const parsed = LedgerDocumentSchema.safeParse(await readJson(filePath));
      if (parsed.success) return new ErrorLedger(filePath, parsed.data);
      log.warn(`Error ledger ${filePath} is malformed; starting a new ledger`);
    } catch (error) {
      log.warn(`Error ledger ${filePath} is unreadable (${describeError(error).message}); starting a new ledger`);
    }
    return new ErrorLedger(filePath, []);
  }

  get size(): number {
    return this.items.length;
  }

  get hasUnsavedEntries(): boolean {
    return this.unsaved;
  }

  entries(): readonly ErrorEntry[] {
    return this.items;
  }

  async record(entry: ErrorEntry): Promise<void> {
    this.items.push(entry);
    const where = entry.identity ?? entry.locator ?? "unknown";
    const section = entry.section ? ` [${entry.section}]` : "";
    log.warn(`${entry.phaseId} ${entry.kind} ${where}${section}: ${entry.reason} (${entry.message})`);

    try {
      await writeJsonAtomic(this.filePath, this.items);
      this.unsaved = false;
    } catch (error) {
      this.unsaved = true;
      log.error(`Could not write error ledger ${this.filePath}: ${describeError(error).message}`);
    }
  }

  summary(): Partial<Record<ErrorReason, number>> {
    const counts: Partial<Record<ErrorReason, number>> = {};
    for (const entry of this.items) {
      counts[entry.reason] = (counts[entry.reason] ?? 0) + 1;
    }
    return counts;
  }
}
