import { describe, expect, it } from "vitest";
import { chunk, errorEntryHash, toDetailRow, toErrorRow, toSummaryRow } from "../src/commands/persist";
import { ErrorEntry } from "../src/types/records";
import { summary } from "./helpers/fakes";

const entry: ErrorEntry = {
  identity: "42",
  locator: "https://portal.test/Expert/Details/42",
  phaseId: "experts-details",
  kind: "partial-item",
  reason: "section-failure",
  section: "Web_Presence",
  message: "Web_Presence: no grid in panel 8",
  timestamp: "2026-01-05T10:00:00Z",
  retryCount: 0
};

describe("persist row mapping", () => {
  it("splits rows into fixed-size chunks", () => {
    expect(chunk([1, 2, 3, 4, 5], 2)).toEqual([[1, 2], [3, 4], [5]]);
    expect(chunk([], 2)).toEqual([]);
  });

  it("maps a summary record onto its table columns", () => {
    expect(toSummaryRow(summary("7", "https://portal.test/Expert/Details/7", { Name: "Ada" }))).toEqual({
      phaseId: "experts-metadata",
      identity: "7",
      partition: "Inst-A",
      detailUrl: "https://portal.test/Expert/Details/7",
      fields: { Expert_ID: "7", Name: "Ada" },
      harvestedAt: new Date("2026-01-05T10:00:00Z")
    });
  });

  it("maps a detail record onto its table columns", () => {
    const row = toDetailRow({
      identity: "7",
      meta: {
        phaseId: "experts-details",
        partition: null,
        sourceUrl: "https://portal.test/Expert/Details/7",
        scrapedAt: "2026-01-06T08:30:00Z",
        fromList: { Expert_ID: "7" }
      },
      sections: { Expertise: { kind: "list", items: [] } }
    });

    expect(row).toEqual({
      phaseId: "experts-details",
      identity: "7",
      partition: null,
      sourceUrl: "https://portal.test/Expert/Details/7",
      fromList: { Expert_ID: "7" },
      sections: { Expertise: { kind: "list", items: [] } },
      scrapedAt: new Date("2026-01-06T08:30:00Z")
    });
  });

  it("hashes the same ledger entry to the same key", () => {
    expect(errorEntryHash({ ...entry })).toBe(errorEntryHash(entry));
    expect(errorEntryHash({ ...entry, section: "Expertise" })).not.toBe(errorEntryHash(entry));
    expect(errorEntryHash(entry)).toMatch(/^[0-9a-f]{64}$/);
  });

  it("keeps two failures of one unit within the same second apart", () => {
    const timeout: ErrorEntry = {
      ...entry,
      kind: "terminal-item",
      reason: "timeout",
      section: null,
      message: "Timeout 30000ms exceeded",
      retryCount: 2
    };
    expect(errorEntryHash({ ...timeout, message: "Timeout 45000ms exceeded" })).not.toBe(errorEntryHash(timeout));
    expect(errorEntryHash({ ...timeout, retryCount: 0 })).not.toBe(errorEntryHash(timeout));
  });

  it("maps a ledger entry with its hash", () => {
    expect(toErrorRow(entry)).toMatchObject({
      phaseId: "experts-details",
      entryHash: errorEntryHash(entry),
      kind: "partial-item",
      reason: "section-failure",
      section: "Web_Presence",
      occurredAt: new Date("2026-01-05T10:00:00Z")
    });
  });
});
