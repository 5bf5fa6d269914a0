import { Session } from "../types/collaborators";
import { SessionExpiredError } from "./errors";

export async function assertSessionValid(session: Session): Promise<void> {
  if (!(await session.isValid())) {
    throw new SessionExpiredError();
  }
}

/** Retry hook: a failure caused by a lost login must not be retried. */
export function sessionGuard(session: Session): () => Promise<void> {
  return () => assertSessionValid(session);
}
