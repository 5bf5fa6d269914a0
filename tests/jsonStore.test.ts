import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { promises as fs } from "fs";
import path from "path";
import { MissingPrerequisiteError, PersistenceError } from "../src/engine/errors";
import { JsonFileStore, loadMasterList } from "../src/store/jsonStore";
import { DetailRecord } from "../src/types/records";
import { makeTempDir, readJsonFile, removeTempDir, summary } from "./helpers/fakes";

function detail(identity: string, name: string): DetailRecord {
  return {
    identity,
    meta: {
      phaseId: "experts-details",
      partition: "Inst-A",
      sourceUrl: `https://portal.test/Expert/Details/${identity}`,
      scrapedAt: "2026-01-05T10:00:00Z",
      fromList: { Expert_ID: identity }
    },
    sections: { General_Information: { kind: "flat", fields: { Name: name } } }
  };
}

describe("JsonFileStore", () => {
  let dir: string;
  let paths: { masterList: string; details: string };

  beforeEach(async () => {
    dir = await makeTempDir();
    paths = {
      masterList: path.join(dir, "output", "experts_master_list.json"),
      details: path.join(dir, "output", "experts_full_details.json")
    };
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  it("upserts summaries by identity and keeps file order", async () => {
    const store = await JsonFileStore.open(paths, { freshSummaries: false, freshDetails: false });

    await store.writeSummary([summary("1", "https://portal.test/1"), summary("2", null)]);
    await store.writeSummary([summary("1", "https://portal.test/1b")]);

    const written = await loadMasterList(paths.masterList);
    expect(written.map((record) => [record.identity, record.detailUrl])).toEqual([
      ["1", "https://portal.test/1b"],
      ["2", null]
    ]);
  });

  it("loads what a previous run wrote unless opened fresh", async () => {
    const first = await JsonFileStore.open(paths, { freshSummaries: false, freshDetails: false });
    await first.writeDetail(detail("1", "Ada"));

    const resumed = await JsonFileStore.open(paths, { freshSummaries: false, freshDetails: false });
    expect(resumed.details.has("1")).toBe(true);

    const restarted = await JsonFileStore.open(paths, { freshSummaries: false, freshDetails: true });
    expect(restarted.details.size).toBe(0);
    // The old file stays until the first write.
    expect(await readJsonFile(paths.details)).toEqual([detail("1", "Ada")]);

    await restarted.writeDetail(detail("2", "Grace"));
    expect(await readJsonFile(paths.details)).toEqual([detail("2", "Grace")]);
  });

  it("refuses to open a malformed output file", async () => {
    await fs.mkdir(path.dirname(paths.details), { recursive: true });
    await fs.writeFile(paths.details, JSON.stringify([{ identity: "" }]), "utf8");

    await expect(
      JsonFileStore.open(paths, { freshSummaries: false, freshDetails: false })
    ).rejects.toBeInstanceOf(PersistenceError);
  });

  it("wraps write failures as PersistenceError", async () => {
    const blocker = path.join(dir, "blocker");
    await fs.writeFile(blocker, "", "utf8");
    const store = await JsonFileStore.open(
      { masterList: path.join(blocker, "list.json"), details: path.join(blocker, "details.json") },
      { freshSummaries: true, freshDetails: true }
    );

    await expect(store.writeDetail(detail("1", "Ada"))).rejects.toBeInstanceOf(PersistenceError);
    expect(store.details.size).toBe(0);
  });
});

describe("loadMasterList", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  it("requires the file to exist", async () => {
    await expect(loadMasterList(path.join(dir, "missing.json"))).rejects.toThrow(
      `Master list not found: ${path.join(dir, "missing.json")}; run the metadata phase first`
    );
  });

  it("rejects an empty list", async () => {
    const filePath = path.join(dir, "list.json");
    await fs.writeFile(filePath, "[]", "utf8");

    await expect(loadMasterList(filePath)).rejects.toBeInstanceOf(MissingPrerequisiteError);
  });

  it("rejects a file that is not a summary list", async () => {
    const filePath = path.join(dir, "list.json");
    await fs.writeFile(filePath, JSON.stringify({ records: [] }), "utf8");

    await expect(loadMasterList(filePath)).rejects.toBeInstanceOf(MissingPrerequisiteError);
  });
});
