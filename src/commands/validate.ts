import path from "path";
import { PhaseConfig } from "../config/phaseRegistry";
import { loadRegistry, phasesInOrder } from "../config/registry";
import { loadSettings } from "../config/settings";
import { describeError } from "../engine/errors";
import { phasePaths } from "../io/paths";
import { pathExists, readJson } from "../utils/fs";
import { log } from "../utils/log";
import { assertValidSchema, getSchemaValidator } from "../validation/jsonSchema";

export interface ValidateOptions {
  schemasDir: string;
  registryPath?: string;
}

export interface ValidationTarget {
  label: string;
  filePath: string;
  schema: string;
}

export interface ValidationResult {
  checked: string[];
  failures: string[];
}

/** Every document the phases write, paired with its schema; shared documents appear once. */
export function validationTargets(outDir: string, phases: readonly PhaseConfig[]): ValidationTarget[] {
  const targets = new Map<string, ValidationTarget>();
  const add = (label: string, filePath: string, schema: string) => {
    if (!targets.has(filePath)) targets.set(filePath, { label, filePath, schema });
  };

  for (const phase of phases) {
    const paths = phasePaths(outDir, phase.id, phase.category);
    if (phase.stage === "metadata") {
      add(`${phase.category} master list`, paths.masterList, "summary-list.schema.json");
    } else {
      add(`${phase.category} details`, paths.details, "detail-list.schema.json");
    }
    add(`${phase.id} checkpoint`, paths.checkpoint, "checkpoint.schema.json");
    add(`${phase.id} error ledger`, paths.errors, "error-ledger.schema.json");
  }
  return [...targets.values()];
}

export async function validateOutputs(
  targets: readonly ValidationTarget[],
  schemasDir: string
): Promise<ValidationResult> {
  const result: ValidationResult = { checked: [], failures: [] };

  for (const target of targets) {
    if (!(await pathExists(target.filePath))) continue;
    try {
      const validator = await getSchemaValidator(path.join(schemasDir, target.schema));
      assertValidSchema(validator, await readJson(target.filePath), target.label);
      result.checked.push(target.filePath);
    } catch (error) {
      result.failures.push(describeError(error).message);
    }
  }
  return result;
}

export async function runValidateCommand(options: ValidateOptions): Promise<void> {
  const settings = loadSettings();
  const registry = await loadRegistry(options.registryPath);
  const targets = validationTargets(settings.outDir, phasesInOrder(registry));
  const result = await validateOutputs(targets, path.resolve(options.schemasDir));

  for (const filePath of result.checked) log.success(filePath);
  for (const failure of result.failures) log.error(failure);

  if (result.failures.length > 0) {
    throw new Error(`${result.failures.length} document(s) failed validation`);
  }
  log.info(`Validated ${result.checked.length} document(s)`);
}
