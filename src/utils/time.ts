import { setTimeout as delay } from "timers/promises";

export function nowUtcIsoSeconds(): string {
  const iso = new Date().toISOString();
  return iso.replace(/\.\d{3}Z$/, "Z");
}

export async function sleep(ms: number): Promise<void> {
  if (ms <= 0) return;
  await delay(ms);
}
