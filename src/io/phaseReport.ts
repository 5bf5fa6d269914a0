import { PhaseReport, RunMode } from "../engine/phaseRunner";
import { writeJson } from "../utils/fs";
import { phaseReportPath } from "./paths";

export interface PhaseReportFile {
  schema_version: "1.0";
  phase_id: string;
  mode: RunMode;
  started_at: string;
  ended_at: string;
  report: PhaseReport;
}

export interface PhaseReportParams {
  mode: RunMode;
  startedAt: string;
  endedAt: string;
  report: PhaseReport;
}

export function buildPhaseReportFile(params: PhaseReportParams): PhaseReportFile {
  return {
    schema_version: "1.0",
    phase_id: params.report.phaseId,
    mode: params.mode,
    started_at: params.startedAt,
    ended_at: params.endedAt,
    report: params.report
  };
}

export async function writePhaseReport(outDir: string, file: PhaseReportFile): Promise<string> {
  const filePath = phaseReportPath(outDir, file.phase_id);
  await writeJson(filePath, file);
  return filePath;
}
