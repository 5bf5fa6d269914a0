import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { removeCheckpoints } from "../src/commands/clean";
import { CheckpointStore, emptyCheckpoint } from "../src/engine/checkpointStore";
import { checkpointPath } from "../src/io/paths";
import { pathExists } from "../src/utils/fs";
import { makeTempDir, removeTempDir } from "./helpers/fakes";

describe("removeCheckpoints", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
    for (const id of ["experts-metadata", "experts-details"]) {
      await new CheckpointStore(checkpointPath(dir, id), id).save(emptyCheckpoint(id));
    }
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  it("keeps everything unless the operator types DELETE", async () => {
    const removed = await removeCheckpoints(dir, ["experts-metadata"], false, async () => "delete");

    expect(removed).toEqual([]);
    expect(await pathExists(checkpointPath(dir, "experts-metadata"))).toBe(true);
  });

  it("removes the named checkpoints after confirmation", async () => {
    const questions: string[] = [];
    const removed = await removeCheckpoints(
      dir,
      ["experts-metadata", "experts-details", "facilities-metadata"],
      false,
      async (question) => {
        questions.push(question);
        return "DELETE";
      }
    );

    expect(questions).toEqual(["Type DELETE to remove 2 checkpoint(s): "]);
    expect(removed).toEqual([checkpointPath(dir, "experts-metadata"), checkpointPath(dir, "experts-details")]);
    expect(await pathExists(checkpointPath(dir, "experts-details"))).toBe(false);
  });

  it("skips the question when already confirmed", async () => {
    const removed = await removeCheckpoints(dir, ["experts-details"], true, async () => {
      throw new Error("prompted unexpectedly");
    });

    expect(removed).toEqual([checkpointPath(dir, "experts-details")]);
  });
});
