import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { promises as fs } from "fs";
import path from "path";
import { loadRegistry, phasesInOrder } from "../src/config/registry";
import { validateOutputs, validationTargets } from "../src/commands/validate";
import { masterListPath } from "../src/io/paths";
import { getSchemaValidator, assertValidSchema, SchemaValidationError } from "../src/validation/jsonSchema";
import { makeTempDir, removeTempDir, summary } from "./helpers/fakes";

const schemasDir = path.join(process.cwd(), "schemas");

describe("validationTargets", () => {
  it("lists each shared document once", async () => {
    const registry = await loadRegistry();

    const targets = validationTargets("/data", phasesInOrder(registry, "organizations"));

    expect(targets.map((target) => target.label)).toEqual([
      "organizations master list",
      "organizations-metadata checkpoint",
      "organizations-metadata error ledger",
      "organizations details",
      "organizations-details checkpoint",
      "organizations-details error ledger"
    ]);
  });
});

describe("validateOutputs", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  it("skips documents that were never written and reports broken ones", async () => {
    const registry = await loadRegistry();
    const listPath = masterListPath(dir, "experts");
    await fs.mkdir(path.dirname(listPath), { recursive: true });
    await fs.writeFile(
      listPath,
      JSON.stringify([summary("1", null), { ...summary("2", null), partition: 7 }]),
      "utf8"
    );

    const result = await validateOutputs(validationTargets(dir, phasesInOrder(registry)), schemasDir);

    expect(result.checked).toEqual([]);
    expect(result.failures).toEqual([
      "experts master list failed schema validation: /1/partition must be string,null"
    ]);
  });
});

describe("assertValidSchema", () => {
  it("keeps at most the given number of problems", async () => {
    const validator = await getSchemaValidator(path.join(schemasDir, "error-ledger.schema.json"));

    try {
      assertValidSchema(validator, [{}, {}, {}], "ledger", 2);
      expect.fail("expected a validation error");
    } catch (error) {
      expect(error).toBeInstanceOf(SchemaValidationError);
      expect(error instanceof SchemaValidationError ? error.problems : []).toHaveLength(2);
    }
  });
});
