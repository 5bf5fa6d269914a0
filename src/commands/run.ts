import { Page } from "playwright";
import { PhaseConfig, PhaseRegistry } from "../config/phaseRegistry";
import { getPhaseById, loadRegistry, phasesInOrder } from "../config/registry";
import { loadSettings, Settings } from "../config/settings";
import { CheckpointStore } from "../engine/checkpointStore";
import { ErrorLedger } from "../engine/errorLedger";
import { buildSummaryRecord } from "../engine/identity";
import { PacingController, SleepFn } from "../engine/pacing";
import { PhaseContext, PhaseReport, PhaseRunner, RunMode } from "../engine/phaseRunner";
import { buildPhaseReportFile, writePhaseReport } from "../io/phaseReport";
import { phasePaths } from "../io/paths";
import { openPortalBrowser } from "../portal/browser";
import { layoutFor, sectionNames } from "../portal/categories";
import { PortalFetcher } from "../portal/fetcher";
import { PortalSession } from "../portal/session";
import { JsonFileStore, loadMasterList } from "../store/jsonStore";
import { PageFetcher, Session } from "../types/collaborators";
import { CheckpointState } from "../types/records";
import { pathExists } from "../utils/fs";
import { log } from "../utils/log";
import { askOnTerminal, confirm, Prompt } from "../utils/prompt";
import { nowUtcIsoSeconds } from "../utils/time";

export interface ModeFlags {
  resume?: boolean;
  fresh?: boolean;
  rescrape?: boolean;
  yes?: boolean;
}

export interface ExecutePhaseParams {
  phase: PhaseConfig;
  settings: Settings;
  mode: RunMode;
  fetcher: PageFetcher;
  session: Session;
  sleep?: SleepFn;
}

function explicitMode(flags: ModeFlags): RunMode | null {
  const chosen: RunMode[] = [];
  if (flags.resume) chosen.push("resume");
  if (flags.fresh) chosen.push("fresh");
  if (flags.rescrape) chosen.push("rescrape");
  if (chosen.length > 1) {
    throw new Error("Choose only one of --resume, --fresh and --rescrape");
  }
  return chosen[0] ?? null;
}

/**
 * Picks the run mode from the flags, or asks when a checkpoint exists and no
 * flag was given. Without a checkpoint the phase starts fresh.
 */
export async function resolveMode(
  phase: PhaseConfig,
  settings: Settings,
  flags: ModeFlags,
  prompt: Prompt = askOnTerminal
): Promise<RunMode> {
  const mode = explicitMode(flags);
  if (mode === "rescrape" && phase.stage !== "details") {
    throw new Error(`--rescrape applies to details phases only; ${phase.id} is a metadata phase`);
  }
  if (mode) return mode;

  const paths = phasePaths(settings.outDir, phase.id, phase.category);
  if (!(await pathExists(paths.checkpoint))) return "fresh";
  if (flags.yes) return "resume";

  const resume = await confirm(prompt, `${phase.id}: Resume from checkpoint?`);
  return resume ? "resume" : "fresh";
}

/** Runs one phase against the given portal adapter and writes its report. */
export async function executePhase(params: ExecutePhaseParams): Promise<PhaseReport> {
  const { phase, settings, mode, fetcher, session } = params;
  const paths = phasePaths(settings.outDir, phase.id, phase.category);
  const layout = layoutFor(phase.category);
  const startedAt = nowUtcIsoSeconds();
  const restart = mode !== "resume";

  const [ledger, store] = await Promise.all([
    ErrorLedger.open(paths.errors, { fresh: restart }),
    JsonFileStore.open(
      { masterList: paths.masterList, details: paths.details },
      {
        freshSummaries: phase.stage === "metadata" && restart,
        freshDetails: phase.stage === "details" && mode === "fresh"
      }
    )
  ]);

  const common = {
    phaseId: phase.id,
    mode,
    session,
    pacing: new PacingController(settings.pacing, params.sleep),
    checkpoints: new CheckpointStore(paths.checkpoint, phase.id),
    ledger,
    onTransition: (status: string) => log.debug(`${phase.id}: ${status}`),
    onProgress: (state: CheckpointState) => {
      const { processed, errored, total } = state.counters;
      log.debug(`${phase.id}: ${processed} processed, ${errored} errors of ${total}`);
    }
  };

  const context: PhaseContext =
    phase.stage === "metadata"
      ? {
          ...common,
          stage: "metadata",
          fetcher,
          store,
          toSummary: (row, partition) => buildSummaryRecord(row, partition, phase.id, layout.mapping),
          limits: {
            maxPagesPerPartition: settings.maxPagesPerPartition,
            maxConsecutivePageFailures: settings.maxConsecutivePageFailures
          }
        }
      : {
          ...common,
          stage: "details",
          fetcher,
          store,
          loadMasterList: () => loadMasterList(paths.masterList),
          knownSections: sectionNames(layout)
        };

  log.info(`=== Phase ${phase.number}: ${phase.name} (${mode}) ===`);
  const report = await new PhaseRunner(context).run();

  const reportPath = await writePhaseReport(
    settings.outDir,
    buildPhaseReportFile({ mode, startedAt, endedAt: nowUtcIsoSeconds(), report })
  );
  logReport(report);
  log.info(`Report written to ${reportPath}`);
  return report;
}

export function logReport(report: PhaseReport): void {
  const { tally, counters } = report;
  const summary =
    `${report.phaseId}: ${tally.succeeded} succeeded, ${tally.partial} partial, ${tally.failed} failed` +
    ` (${counters.total} ${report.stage === "metadata" ? "partitions" : "items"})`;
  if (report.status === "fatal") {
    log.error(`${summary}; stopped: ${report.error?.message ?? "fatal error"}`);
  } else {
    log.success(summary);
  }
  const reasons = Object.entries(report.ledger);
  if (reasons.length > 0) {
    log.info(`Ledger: ${reasons.map(([reason, count]) => `${reason}=${count}`).join(", ")}`);
  }
}

/** Fails before the browser opens when a details phase has nothing to read. */
async function checkPrerequisite(phase: PhaseConfig, settings: Settings): Promise<void> {
  if (phase.stage !== "details") return;
  await loadMasterList(phasePaths(settings.outDir, phase.id, phase.category).masterList);
}

interface PortalRun {
  page: Page;
  session: PortalSession;
  close(): Promise<void>;
}

async function openPortal(registry: PhaseRegistry, settings: Settings, prompt: Prompt): Promise<PortalRun> {
  const portal = await openPortalBrowser({
    headless: settings.headless,
    navigationTimeoutMs: settings.navigationTimeoutMs
  });
  const session = new PortalSession(portal.page, registry.login_url);
  try {
    if (!(await session.establish(prompt))) {
      throw new Error("Login was not confirmed; nothing was harvested");
    }
  } catch (error) {
    await portal.close();
    throw error;
  }
  return { page: portal.page, session, close: portal.close };
}

function portalFetcher(page: Page, phase: PhaseConfig, settings: Settings): PortalFetcher {
  return new PortalFetcher({
    page,
    layout: layoutFor(phase.category),
    listUrl: phase.list_url,
    partitioned: phase.partitioned,
    loadingTimeoutMs: settings.navigationTimeoutMs
  });
}

export interface RunCommandOptions extends ModeFlags {
  phaseId: string;
  registryPath?: string;
}

export async function runPhaseCommand(
  options: RunCommandOptions,
  prompt: Prompt = askOnTerminal
): Promise<PhaseReport> {
  const settings = loadSettings();
  const registry = await loadRegistry(options.registryPath);
  const phase = getPhaseById(registry, options.phaseId);
  if (!phase) {
    const known = registry.phases.map((entry) => entry.id).join(", ");
    throw new Error(`Unknown phase ${options.phaseId} (known: ${known})`);
  }

  const mode = await resolveMode(phase, settings, options, prompt);
  await checkPrerequisite(phase, settings);

  const portal = await openPortal(registry, settings, prompt);
  try {
    const report = await executePhase({
      phase,
      settings,
      mode,
      fetcher: portalFetcher(portal.page, phase, settings),
      session: portal.session
    });
    if (report.status === "fatal") process.exitCode = 1;
    return report;
  } finally {
    await portal.close();
  }
}

export interface PipelineCommandOptions extends ModeFlags {
  target: string;
  registryPath?: string;
}

/** Runs a category's phases (or every phase) in order in one browser session. */
export async function runPipelineCommand(
  options: PipelineCommandOptions,
  prompt: Prompt = askOnTerminal
): Promise<PhaseReport[]> {
  const settings = loadSettings();
  const registry = await loadRegistry(options.registryPath);
  const phases =
    options.target === "all"
      ? phasesInOrder(registry)
      : phasesInOrder(registry).filter((phase) => phase.category === options.target);
  if (phases.length === 0) {
    throw new Error(`Unknown category ${options.target} (expected experts, facilities, organizations or all)`);
  }

  const modes = new Map<string, RunMode>();
  for (const phase of phases) {
    // --rescrape re-visits detail pages; the lists they come from are resumed.
    const flags =
      phase.stage === "metadata" && options.rescrape
        ? { ...options, rescrape: false, resume: true }
        : options;
    modes.set(phase.id, await resolveMode(phase, settings, flags, prompt));
  }

  const portal = await openPortal(registry, settings, prompt);
  const reports: PhaseReport[] = [];
  try {
    for (const phase of phases) {
      const mode = modes.get(phase.id) ?? "resume";
      await checkPrerequisite(phase, settings);
      const report = await executePhase({
        phase,
        settings,
        mode,
        fetcher: portalFetcher(portal.page, phase, settings),
        session: portal.session
      });
      reports.push(report);
      if (report.status === "fatal") {
        process.exitCode = 1;
        log.error(`Pipeline stopped at ${phase.id}`);
        break;
      }
    }
  } finally {
    await portal.close();
  }
  return reports;
}
