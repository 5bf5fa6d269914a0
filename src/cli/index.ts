#!/usr/bin/env node
import path from "path";
import dotenv from "dotenv";
import { Command } from "commander";
import pkg from "../../package.json";
import { runCleanCommand } from "../commands/clean";
import { runPersistCommand } from "../commands/persist";
import { runPhaseCommand, runPipelineCommand } from "../commands/run";
import { runStatusCommand } from "../commands/status";
import { runValidateCommand } from "../commands/validate";
import { isLogLevel, setLogLevel } from "../utils/log";

function readArgValue(argv: string[], flag: string): string | undefined {
  const prefix = `${flag}=`;
  const inlineArg = argv.find((arg) => arg.startsWith(prefix));
  if (inlineArg) return inlineArg.slice(prefix.length);
  const index = argv.indexOf(flag);
  if (index >= 0) {
    return argv[index + 1];
  }
  return undefined;
}

function resolveEnvPath(argv: string[], fallback: string): string {
  const cliValue = readArgValue(argv, "--env-file");
  if (cliValue) return cliValue;
  return process.env.HARVEST_ENV_FILE ?? process.env.DOTENV_CONFIG_PATH ?? fallback;
}

const defaultEnvPath = path.resolve(process.cwd(), ".env");
const envPath = resolveEnvPath(process.argv.slice(2), defaultEnvPath);
dotenv.config({ path: envPath });

const logLevel = process.env.LOG_LEVEL?.toLowerCase();
if (logLevel && isLogLevel(logLevel)) setLogLevel(logLevel);

interface ModeOptions {
  resume?: boolean;
  fresh?: boolean;
  rescrape?: boolean;
  yes?: boolean;
}

const program = new Command();

program
  .name("portal-harvest")
  .description("Checkpointed, resumable harvester for session-gated portal listings and detail pages")
  .version(pkg.version);

program
  .option(
    "--env-file <path>",
    "Path to .env file (overrides HARVEST_ENV_FILE/DOTENV_CONFIG_PATH)",
    envPath
  )
  .option("--registry <path>", "Phase registry JSON (defaults to the bundled config/portal.json)");

function registryPath(): string | undefined {
  const value: unknown = program.opts().registry;
  return typeof value === "string" ? value : undefined;
}

function withModeOptions(command: Command): Command {
  return command
    .option("--resume", "Continue from the checkpoint")
    .option("--fresh", "Start over with a new checkpoint and new output")
    .option("--rescrape", "Details only: visit every item again and replace its record")
    .option("-y, --yes", "Do not prompt; resume when a checkpoint exists");
}

withModeOptions(
  program
    .command("run")
    .description("Run one phase (e.g. experts-metadata, experts-details)")
    .argument("<phase>", "Phase id")
).action(async (phaseId: string, opts: ModeOptions) => {
  await runPhaseCommand({ ...opts, phaseId, registryPath: registryPath() });
});

withModeOptions(
  program
    .command("pipeline")
    .description("Run a category's phases in order: experts, facilities, organizations or all")
    .argument("<target>", "Category or all")
).action(async (target: string, opts: ModeOptions) => {
  await runPipelineCommand({ ...opts, target, registryPath: registryPath() });
});

program
  .command("status")
  .description("Show progress, errors and record counts for every phase")
  .action(async () => {
    await runStatusCommand({ registryPath: registryPath() });
  });

program
  .command("clean-checkpoints")
  .description("Delete checkpoints so the next run starts fresh")
  .argument("[phase]", "Only this phase")
  .option("-y, --yes", "Do not ask for confirmation")
  .action(async (phaseId: string | undefined, opts: { yes?: boolean }) => {
    await runCleanCommand({ phaseId, yes: opts.yes === true, registryPath: registryPath() });
  });

program
  .command("validate")
  .description("Check output documents, checkpoints and ledgers against the JSON Schemas")
  .option("--schemas <dir>", "JSON Schema directory", "./schemas")
  .action(async (opts: { schemas: string }) => {
    await runValidateCommand({ schemasDir: opts.schemas, registryPath: registryPath() });
  });

program
  .command("persist")
  .description("Load master lists, details and error ledgers into PostgreSQL")
  .action(async () => {
    await runPersistCommand({ registryPath: registryPath() });
  });

program.parseAsync().catch((error) => {
  console.error(error instanceof Error ? error.message : error);
  process.exitCode = 1;
});
