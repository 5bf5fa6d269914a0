import { getPhaseById, loadRegistry, phasesInOrder } from "../config/registry";
import { loadSettings } from "../config/settings";
import { checkpointPath } from "../io/paths";
import { pathExists, removeFile } from "../utils/fs";
import { log } from "../utils/log";
import { askOnTerminal, Prompt } from "../utils/prompt";

export interface CleanOptions {
  phaseId?: string;
  yes: boolean;
  registryPath?: string;
}

/**
 * Deletes checkpoints on the operator's request. Output documents and error
 * ledgers are left in place; the next run of a cleaned phase starts fresh.
 */
export async function removeCheckpoints(
  outDir: string,
  phaseIds: readonly string[],
  confirmed: boolean,
  prompt: Prompt
): Promise<string[]> {
  const existing: string[] = [];
  for (const phaseId of phaseIds) {
    const filePath = checkpointPath(outDir, phaseId);
    if (await pathExists(filePath)) existing.push(filePath);
  }
  if (existing.length === 0) {
    log.info("No checkpoints to remove.");
    return [];
  }

  for (const filePath of existing) log.info(`  ${filePath}`);
  if (!confirmed) {
    const answer = await prompt(`Type DELETE to remove ${existing.length} checkpoint(s): `);
    if (answer !== "DELETE") {
      log.warn("Cancelled; no checkpoints were removed.");
      return [];
    }
  }

  const removed: string[] = [];
  for (const filePath of existing) {
    if (await removeFile(filePath)) removed.push(filePath);
  }
  log.success(`Removed ${removed.length} checkpoint(s)`);
  return removed;
}

export async function runCleanCommand(
  options: CleanOptions,
  prompt: Prompt = askOnTerminal
): Promise<void> {
  const settings = loadSettings();
  const registry = await loadRegistry(options.registryPath);

  let phaseIds = phasesInOrder(registry).map((phase) => phase.id);
  if (options.phaseId) {
    if (!getPhaseById(registry, options.phaseId)) {
      throw new Error(`Unknown phase ${options.phaseId}`);
    }
    phaseIds = [options.phaseId];
  }

  await removeCheckpoints(settings.outDir, phaseIds, options.yes, prompt);
}
