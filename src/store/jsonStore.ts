import { z } from "zod";
import { mergeRecord } from "../engine/checkpointStore";
import { describeError, MissingPrerequisiteError, PersistenceError } from "../engine/errors";
import { Store } from "../types/collaborators";
import {
  DetailRecord,
  DetailRecordSchema,
  Identified,
  SummaryRecord,
  SummaryRecordSchema
} from "../types/records";
import { pathExists, readJson, writeJsonAtomic } from "../utils/fs";
import { log } from "../utils/log";

export interface DocumentOpenOptions {
  /** Start empty; the file on disk is left alone until the first write. */
  fresh: boolean;
}

/**
 * A JSON array of records keyed by identity, rewritten whole on every change.
 */
export class RecordDocument<T extends Identified> {
  private constructor(
    readonly filePath: string,
    private records: T[]
  ) {}

  static async open<T extends Identified>(
    filePath: string,
    schema: z.ZodType<T>,
    options: DocumentOpenOptions
  ): Promise<RecordDocument<T>> {
    if (options.fresh || !(await pathExists(filePath))) {
      return new RecordDocument<T>(filePath, []);
    }

    let data: unknown;
    try {
      data = await readJson(filePath);
    } catch (error) {
      throw new PersistenceError(filePath, error);
    }
    const parsed = z.array(schema).safeParse(data);
    if (!parsed.success) {
      throw new PersistenceError(filePath, parsed.error);
    }
    return new RecordDocument<T>(filePath, parsed.data);
  }

  get size(): number {
    return this.records.length;
  }

  list(): readonly T[] {
    return this.records;
  }

  has(identity: string): boolean {
    return this.records.some((record) => record.identity === identity);
  }

  async upsert(incoming: readonly T[]): Promise<void> {
    let next = this.records;
    for (const record of incoming) {
      next = mergeRecord(next, record);
    }
    try {
      await writeJsonAtomic(this.filePath, next);
    } catch (error) {
      throw new PersistenceError(this.filePath, error);
    }
    this.records = next;
  }
}

export interface StorePaths {
  masterList: string;
  details: string;
}

export interface StoreOpenOptions {
  freshSummaries: boolean;
  freshDetails: boolean;
}

export class JsonFileStore implements Store {
  private constructor(
    readonly summaries: RecordDocument<SummaryRecord>,
    readonly details: RecordDocument<DetailRecord>
  ) {}

  static async open(paths: StorePaths, options: StoreOpenOptions): Promise<JsonFileStore> {
    const [summaries, details] = await Promise.all([
      RecordDocument.open(paths.masterList, SummaryRecordSchema, { fresh: options.freshSummaries }),
      RecordDocument.open(paths.details, DetailRecordSchema, { fresh: options.freshDetails })
    ]);
    return new JsonFileStore(summaries, details);
  }

  async writeSummary(records: readonly SummaryRecord[]): Promise<void> {
    await this.summaries.upsert(records);
  }

  async writeDetail(record: DetailRecord): Promise<void> {
    await this.details.upsert([record]);
  }
}

export async function loadMasterList(filePath: string): Promise<SummaryRecord[]> {
  if (!(await pathExists(filePath))) {
    throw new MissingPrerequisiteError(`Master list not found: ${filePath}; run the metadata phase first`);
  }

  let data: unknown;
  try {
    data = await readJson(filePath);
  } catch (error) {
    throw new MissingPrerequisiteError(
      `Master list ${filePath} is unreadable: ${describeError(error).message}`
    );
  }

  const parsed = z.array(SummaryRecordSchema).safeParse(data);
  if (!parsed.success) {
    throw new MissingPrerequisiteError(
      `Master list ${filePath} is malformed: ${parsed.error.issues[0]?.message ?? "invalid"}`
    );
  }
  if (parsed.data.length === 0) {
    throw new MissingPrerequisiteError(`Master list ${filePath} is empty; run the metadata phase first`);
  }

  log.info(`Loaded ${parsed.data.length} summary records from ${filePath}`);
  return parsed.data;
}
