import { afterEach, beforeEach, describe, expect, it } from "vitest";
import path from "path";
import { CheckpointStore, emptyCheckpoint } from "../src/engine/checkpointStore";
import { Deduplicator } from "../src/engine/dedup";
import { SessionExpiredError, TransientError } from "../src/engine/errors";
import { ErrorLedger } from "../src/engine/errorLedger";
import { buildSummaryRecord } from "../src/engine/identity";
import { ListLimits, ListTraversal, resolveStart, sortPartitions } from "../src/engine/listTraversal";
import { PhaseProgress } from "../src/engine/progress";
import { CheckpointState, FieldMap, ListCursor, SummaryRecord } from "../src/types/records";
import { pathExists } from "../src/utils/fs";
import {
  FakeFetcher,
  FakeFetcherConfig,
  FakeSession,
  listPage,
  makeTempDir,
  MemoryStore,
  removeTempDir,
  testPacing
} from "./helpers/fakes";

const PHASE = "experts-metadata";
const MAPPING = { idField: "Expert_ID", urlField: "Manage_URL", requiredField: "Name" };

function row(id: string): FieldMap {
  return { Expert_ID: id, Name: `Expert ${id}`, Manage_URL: `https://portal.test/Expert/Details/${id}` };
}

async function drain<T>(generator: AsyncGenerator<T>): Promise<T[]> {
  const items: T[] = [];
  for await (const item of generator) items.push(item);
  return items;
}

interface SetupOptions {
  initial?: CheckpointState;
  limits?: Partial<ListLimits>;
  session?: FakeSession;
}

async function setup(dir: string, config: FakeFetcherConfig, options: SetupOptions = {}) {
  const fetcher = new FakeFetcher(config);
  const store = new MemoryStore();
  const session = options.session ?? new FakeSession();
  const checkpointPath = path.join(dir, "checkpoints", `${PHASE}.checkpoint.json`);
  const checkpoints = new CheckpointStore(checkpointPath, PHASE);
  const initial = options.initial ?? emptyCheckpoint(PHASE);
  const progress = new PhaseProgress(checkpoints, initial);
  const ledger = await ErrorLedger.open(path.join(dir, "logs", `${PHASE}.errors.json`), { fresh: true });
  const traversal = new ListTraversal({
    phaseId: PHASE,
    fetcher,
    store,
    session,
    progress,
    pacing: testPacing(),
    ledger,
    dedup: new Deduplicator<SummaryRecord>("keep-first", initial.completedIdentities),
    toSummary: (fields, partition) => buildSummaryRecord(fields, partition, PHASE, MAPPING),
    limits: options.limits
  });
  return { fetcher, store, progress, ledger, traversal, checkpointPath };
}

const instA = { label: "Inst-A", global: false };

describe("ListTraversal", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  it("harvests a two-page partition in order and checkpoints its end", async () => {
    const { traversal, progress, ledger, store } = await setup(dir, {
      pages: { "Inst-A": [listPage([row("1"), row("2")], true), listPage([row("3")], false)] }
    });

    const records = await drain(traversal.run([instA]));

    expect(records.map((record) => record.identity)).toEqual(["1", "2", "3"]);
    expect(store.summaries.map((record) => record.identity)).toEqual(["1", "2", "3"]);
    expect(progress.snapshot.cursor).toEqual({
      kind: "list",
      partitionIndex: 0,
      partitionLabel: "Inst-A",
      pageIndex: 1,
      partitionComplete: true
    });
    expect(ledger.size).toBe(0);
  });

  it("stops when a page brings nothing new even though the pager claims more", async () => {
    const { traversal, fetcher } = await setup(dir, {
      pages: {
        "Inst-A": [
          listPage([row("1"), row("2")], true),
          listPage([row("3"), row("4")], true),
          listPage([row("5"), row("6")], true),
          listPage([row("5"), row("6")], true),
          listPage([row("7")], true)
        ]
      }
    });

    const records = await drain(traversal.run([instA]));

    expect(records).toHaveLength(6);
    expect(fetcher.listCalls).toEqual(["Inst-A#0", "Inst-A#1", "Inst-A#2", "Inst-A#3"]);
  });

  it("keeps the first summary when an identity repeats across pages", async () => {
    const { traversal, store } = await setup(dir, {
      pages: {
        "Inst-A": [
          listPage([row("1"), row("2")], true),
          listPage([{ ...row("2"), Name: "Renamed" }, row("3")], false)
        ]
      }
    });

    await drain(traversal.run([instA]));

    expect(store.summaries.map((record) => record.identity)).toEqual(["1", "2", "3"]);
    expect(store.summaries[1].fields.Name).toBe("Expert 2");
  });

  it("walks partitions in label order", async () => {
    const { traversal, fetcher, progress } = await setup(dir, {
      pages: {
        "Inst-A": [listPage([row("1")], false)],
        "Inst-B": [listPage([row("2")], false)]
      }
    });

    await drain(traversal.run([{ label: "Inst-B", global: false }, instA]));

    expect(fetcher.listCalls).toEqual(["Inst-A#0", "Inst-B#0"]);
    expect(progress.snapshot.counters).toMatchObject({ processed: 2, total: 2 });
  });

  it("retries a transient page failure without recording it", async () => {
    const { traversal, ledger, fetcher } = await setup(dir, {
      pages: { "Inst-A": [listPage([row("1")], true), listPage([row("2")], false)] },
      fail: (key, attempt) =>
        key === "Inst-A#1" && attempt === 1 ? new TransientError("timeout", "slow grid") : null
    });

    const records = await drain(traversal.run([instA]));

    expect(records.map((record) => record.identity)).toEqual(["1", "2"]);
    expect(fetcher.listCalls).toEqual(["Inst-A#0", "Inst-A#1", "Inst-A#1"]);
    expect(ledger.size).toBe(0);
  });

  it("records a page that keeps failing and moves on", async () => {
    const { traversal, ledger, progress } = await setup(dir, {
      pages: { "Inst-A": [listPage([row("1")], true), listPage([row("2")], false)] },
      fail: (key) => (key === "Inst-A#0" ? new TransientError("timeout", "slow grid") : null)
    });

    const records = await drain(traversal.run([instA]));

    expect(records.map((record) => record.identity)).toEqual(["2"]);
    expect(ledger.entries()).toHaveLength(1);
    expect(ledger.entries()[0]).toMatchObject({
      identity: null,
      locator: "Inst-A page 1",
      kind: "terminal-item",
      reason: "timeout",
      retryCount: 2
    });
    expect(progress.snapshot.counters.errored).toBe(1);
  });

  it("abandons a partition after too many failed pages in a row", async () => {
    const { traversal, fetcher, progress, ledger } = await setup(
      dir,
      {
        pages: {
          "Inst-A": [listPage([row("1")], true)],
          "Inst-B": [listPage([row("2")], false)]
        },
        fail: (key) => (key.startsWith("Inst-A#") && key !== "Inst-A#0" ? new Error("grid gone") : null)
      },
      { limits: { maxConsecutivePageFailures: 2 } }
    );

    const records = await drain(traversal.run([instA, { label: "Inst-B", global: false }]));

    expect(records.map((record) => record.identity)).toEqual(["1", "2"]);
    expect(fetcher.listCalls).toEqual(["Inst-A#0", "Inst-A#1", "Inst-A#2", "Inst-B#0"]);
    expect(progress.snapshot.counters.errored).toBe(2);
    expect(ledger.entries().map((entry) => [entry.locator, entry.reason])).toEqual([
      ["Inst-A page 2", "unexpected"],
      ["Inst-A page 3", "unexpected"],
      ["Inst-A", "unexpected"]
    ]);
    expect(ledger.entries()[2].message).toBe("Partition abandoned after 2 failed pages in a row");
  });

  it("resumes on the page after the checkpoint", async () => {
    const cursor: ListCursor = {
      kind: "list",
      partitionIndex: 0,
      partitionLabel: "Inst-A",
      pageIndex: 0,
      partitionComplete: false
    };
    const initial: CheckpointState = {
      ...emptyCheckpoint(PHASE),
      cursor,
      completedIdentities: ["1", "2"],
      counters: { processed: 2, errored: 0, partial: 0, total: 1 }
    };
    const { traversal, fetcher, store } = await setup(
      dir,
      { pages: { "Inst-A": [listPage([row("1"), row("2")], true), listPage([row("3")], false)] } },
      { initial }
    );

    const records = await drain(traversal.run([instA], cursor));

    expect(fetcher.listCalls).toEqual(["Inst-A#1"]);
    expect(records.map((record) => record.identity)).toEqual(["3"]);
    expect(store.summaries).toHaveLength(1);
  });

  it("stops with a fatal error when the session is gone before a retry", async () => {
    const session = new FakeSession(false);
    const { traversal, checkpointPath } = await setup(
      dir,
      {
        pages: { "Inst-A": [listPage([row("1")], false)] },
        fail: () => new TransientError("timeout", "slow grid")
      },
      { session }
    );

    await expect(drain(traversal.run([instA]))).rejects.toBeInstanceOf(SessionExpiredError);
    expect(await pathExists(checkpointPath)).toBe(false);
  });
});

describe("resolveStart", () => {
  const ordered = sortPartitions([
    { label: "b", global: false },
    { label: "a", global: false },
    { label: "C", global: false }
  ]);

  it("sorts labels by code unit", () => {
    expect(ordered.map((partition) => partition.label)).toEqual(["C", "a", "b"]);
  });

  it("moves to the next partition after a completed one", () => {
    expect(
      resolveStart(ordered, {
        kind: "list",
        partitionIndex: 1,
        partitionLabel: "a",
        pageIndex: 4,
        partitionComplete: true
      })
    ).toEqual({ partitionIndex: 2, pageIndex: 0 });
  });

  it("finds the partition by label when the list shifted", () => {
    expect(
      resolveStart(ordered, {
        kind: "list",
        partitionIndex: 0,
        partitionLabel: "b",
        pageIndex: 1,
        partitionComplete: false
      })
    ).toEqual({ partitionIndex: 2, pageIndex: 2 });
  });
});
