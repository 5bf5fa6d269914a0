import path from "path";
import { z } from "zod";
import { DEFAULT_PACING_POLICY, PacingPolicy } from "../engine/pacing";
import { DEFAULT_LIST_LIMITS } from "../engine/listTraversal";

const intFromEnv = (fallback: number) =>
  z.coerce.number().int().nonnegative().default(fallback);

const boolFromEnv = (fallback: boolean) =>
  z
    .enum(["true", "false", "1", "0"])
    .default(fallback ? "true" : "false")
    .transform((value) => value === "true" || value === "1");

const EnvSchema = z.object({
  HARVEST_OUT_DIR: z.string().min(1).default("./data"),
  HARVEST_REQUEST_DELAY_MS: intFromEnv(DEFAULT_PACING_POLICY.requestDelayMs),
  HARVEST_BATCH_SIZE: intFromEnv(DEFAULT_PACING_POLICY.batchSize),
  HARVEST_BATCH_PAUSE_MS: intFromEnv(DEFAULT_PACING_POLICY.batchPauseMs),
  HARVEST_BACKOFF_BASE_MS: intFromEnv(DEFAULT_PACING_POLICY.backoffBaseMs),
  HARVEST_BACKOFF_CAP_MS: intFromEnv(DEFAULT_PACING_POLICY.backoffCapMs),
  HARVEST_MAX_ATTEMPTS: z.coerce.number().int().min(1).default(DEFAULT_PACING_POLICY.maxAttempts),
  HARVEST_MAX_PAGES: z.coerce.number().int().min(1).default(DEFAULT_LIST_LIMITS.maxPagesPerPartition),
  HARVEST_MAX_PAGE_FAILURES: z.coerce
    .number()
    .int()
    .min(1)
    .default(DEFAULT_LIST_LIMITS.maxConsecutivePageFailures),
  HARVEST_NAV_TIMEOUT_MS: intFromEnv(30000),
  HARVEST_HEADLESS: boolFromEnv(false)
});

export interface Settings {
  outDir: string;
  pacing: PacingPolicy;
  maxPagesPerPartition: number;
  maxConsecutivePageFailures: number;
  navigationTimeoutMs: number;
  headless: boolean;
}

/** Empty variables count as unset, so a blank line in .env keeps the default. */
function withoutBlanks(env: NodeJS.ProcessEnv): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== "") result[key] = value.trim();
  }
  return result;
}

export function loadSettings(env: NodeJS.ProcessEnv = process.env): Settings {
  const parsed = EnvSchema.safeParse(withoutBlanks(env));
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid configuration: ${issues}`);
  }

  const values = parsed.data;
  return {
    outDir: path.resolve(values.HARVEST_OUT_DIR),
    pacing: {
      requestDelayMs: values.HARVEST_REQUEST_DELAY_MS,
      batchSize: values.HARVEST_BATCH_SIZE,
      batchPauseMs: values.HARVEST_BATCH_PAUSE_MS,
      backoffBaseMs: values.HARVEST_BACKOFF_BASE_MS,
      backoffCapMs: values.HARVEST_BACKOFF_CAP_MS,
      maxAttempts: values.HARVEST_MAX_ATTEMPTS
    },
    maxPagesPerPartition: values.HARVEST_MAX_PAGES,
    maxConsecutivePageFailures: values.HARVEST_MAX_PAGE_FAILURES,
    navigationTimeoutMs: values.HARVEST_NAV_TIMEOUT_MS,
    headless: values.HARVEST_HEADLESS
  };
}
