import { Identified } from "../types/records";

export type DedupPolicy = "keep-first" | "keep-latest";

export type AdmitResult =
  | { status: "accepted"; replaces: boolean }
  | { status: "skipped-duplicate" };

export class Deduplicator<T extends Identified> {
  private readonly seen: Set<string>;

  constructor(readonly policy: DedupPolicy, seed: Iterable<string> = []) {
    this.seen = new Set(seed);
  }

  has(identity: string): boolean {
    return this.seen.has(identity);
  }

  admit(record: T): AdmitResult {
    const duplicate = this.seen.has(record.identity);
    if (duplicate && this.policy === "keep-first") {
      return { status: "skipped-duplicate" };
    }
    this.seen.add(record.identity);
    return { status: "accepted", replaces: duplicate };
  }
}

/**
 * Collapses repeats inside one page (a grid re-rendered mid-read): the last
 * row seen wins, at the position where the identity first appeared.
 */
export function collapsePage<T extends Identified>(records: readonly T[]): T[] {
  const byIdentity = new Map<string, T>();
  for (const record of records) {
    byIdentity.set(record.identity, record);
  }
  return [...byIdentity.values()];
}
