import { PartitionRef } from "../types/collaborators";
import { FieldMap, SummaryRecord } from "../types/records";
import { nowUtcIsoSeconds } from "../utils/time";

export interface SummaryMapping {
  /** Natural business identifier column, when the list exposes one. */
  idField: string | null;
  /** Column holding the detail page locator. */
  urlField: string;
  /** Rows with this column empty are dropped. */
  requiredField: string | null;
}

const MISSING_LOCATORS = new Set(["", "Not Found"]);

export function partitionValue(partition: PartitionRef): string | null {
  return partition.global ? null : partition.label;
}

export function summaryIdentity(
  partition: string | null,
  detailUrl: string | null,
  naturalId: string | null
): string | null {
  if (naturalId) return naturalId;
  if (detailUrl) return `${partition ?? "*"}::${detailUrl}`;
  return null;
}

export function buildSummaryRecord(
  row: FieldMap,
  partition: PartitionRef,
  phaseId: string,
  mapping: SummaryMapping,
  harvestedAt: string = nowUtcIsoSeconds()
): SummaryRecord | null {
  if (mapping.requiredField && !row[mapping.requiredField]?.trim()) return null;

  const rawUrl = row[mapping.urlField]?.trim() ?? "";
  const detailUrl = MISSING_LOCATORS.has(rawUrl) ? null : rawUrl;
  const naturalId = mapping.idField ? row[mapping.idField]?.trim() || null : null;
  const partitionLabel = partitionValue(partition);
  const identity = summaryIdentity(partitionLabel, detailUrl, naturalId);
  if (!identity) return null;

  return {
    identity,
    phaseId,
    partition: partitionLabel,
    fields: { ...row },
    detailUrl,
    harvestedAt
  };
}
