import path from "path";
import { Category } from "../config/phaseRegistry";

export interface PhasePaths {
  masterList: string;
  details: string;
  checkpoint: string;
  errors: string;
  report: string;
}

export function outputDir(outDir: string): string {
  return path.join(outDir, "output");
}

export function checkpointsDir(outDir: string): string {
  return path.join(outDir, "checkpoints");
}

export function logsDir(outDir: string): string {
  return path.join(outDir, "logs");
}

export function masterListPath(outDir: string, category: Category): string {
  return path.join(outputDir(outDir), `${category}_master_list.json`);
}

export function detailsPath(outDir: string, category: Category): string {
  return path.join(outputDir(outDir), `${category}_full_details.json`);
}

export function checkpointPath(outDir: string, phaseId: string): string {
  return path.join(checkpointsDir(outDir), `${phaseId}.checkpoint.json`);
}

export function errorLedgerPath(outDir: string, phaseId: string): string {
  return path.join(logsDir(outDir), `${phaseId}.errors.json`);
}

export function phaseReportPath(outDir: string, phaseId: string): string {
  return path.join(logsDir(outDir), `${phaseId}.report.json`);
}

export function phasePaths(outDir: string, phaseId: string, category: Category): PhasePaths {
  return {
    masterList: masterListPath(outDir, category),
    details: detailsPath(outDir, category),
    checkpoint: checkpointPath(outDir, phaseId),
    errors: errorLedgerPath(outDir, phaseId),
    report: phaseReportPath(outDir, phaseId)
  };
}
