import { ErrorReason } from "../types/records";

export interface ErrorDetail {
  message: string;
  stack?: string;
}

export function describeError(error: unknown): ErrorDetail {
  return {
    message: error instanceof Error ? error.message : String(error),
    stack: error instanceof Error ? error.stack : undefined
  };
}

export class PortalHarvestError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export type TransientReason = Extract<ErrorReason, "timeout" | "render-failure" | "rate-limited">;

/** A failure worth retrying after a pause: timeouts, render hiccups, throttling. */
export class TransientError extends PortalHarvestError {
  constructor(
    readonly reason: TransientReason,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

/** Stops the phase. The checkpoint is left at the last durable unit. */
export class FatalError extends PortalHarvestError {}

export class SessionExpiredError extends FatalError {
  constructor(message = "Portal session is no longer valid; log in again and resume the phase") {
    super(message);
  }
}

export class CheckpointWriteError extends FatalError {
  constructor(readonly filePath: string, cause: unknown) {
    super(`Failed to write checkpoint ${filePath}: ${describeError(cause).message}`, { cause });
  }
}

export class PersistenceError extends FatalError {
  constructor(readonly filePath: string, cause: unknown) {
    super(`Failed to write output ${filePath}: ${describeError(cause).message}`, { cause });
  }
}

export class MissingPrerequisiteError extends FatalError {}

export function reasonFor(error: unknown): ErrorReason {
  return error instanceof TransientError ? error.reason : "unexpected";
}
