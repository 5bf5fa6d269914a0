import { Category, PhaseConfig, PhaseRegistry, PhaseRegistrySchema } from "./phaseRegistry";
import bundledRegistry from "../../config/portal.json";
import { readJson } from "../utils/fs";

/** Loads a registry file, or the bundled config/portal.json when no path is given. */
export async function loadRegistry(registryPath?: string): Promise<PhaseRegistry> {
  const data = registryPath ? await readJson(registryPath) : bundledRegistry;
  return PhaseRegistrySchema.parse(data);
}

export function getPhaseById(registry: PhaseRegistry, phaseId: string): PhaseConfig | undefined {
  return registry.phases.find((phase) => phase.id === phaseId);
}

/** Phases of a category (or all of them), in dependency order. */
export function phasesInOrder(registry: PhaseRegistry, category?: Category): PhaseConfig[] {
  return registry.phases
    .filter((phase) => !category || phase.category === category)
    .sort((a, b) => a.number - b.number);
}
