import { z } from "zod";

export const FieldMapSchema = z.record(z.string());

export const FlatSectionSchema = z.object({
  kind: z.literal("flat"),
  fields: FieldMapSchema
});

export const ListSectionSchema = z.object({
  kind: z.literal("list"),
  items: z.array(FieldMapSchema)
});

export const SectionPayloadSchema = z.discriminatedUnion("kind", [
  FlatSectionSchema,
  ListSectionSchema
]);

export const SummaryRecordSchema = z.object({
  identity: z.string().min(1),
  phaseId: z.string().min(1),
  partition: z.string().nullable(),
  fields: FieldMapSchema,
  detailUrl: z.string().nullable(),
  harvestedAt: z.string()
});

export const DetailMetaSchema = z.object({
  phaseId: z.string().min(1),
  partition: z.string().nullable(),
  sourceUrl: z.string(),
  scrapedAt: z.string(),
  fromList: FieldMapSchema
});

export const DetailRecordSchema = z.object({
  identity: z.string().min(1),
  meta: DetailMetaSchema,
  sections: z.record(SectionPayloadSchema)
});

export const ListCursorSchema = z.object({
  kind: z.literal("list"),
  partitionIndex: z.number().int().nonnegative(),
  partitionLabel: z.string(),
  pageIndex: z.number().int().nonnegative(),
  partitionComplete: z.boolean()
});

export const DetailCursorSchema = z.object({
  kind: z.literal("detail"),
  itemIndex: z.number().int().nonnegative()
});

export const CursorSchema = z.discriminatedUnion("kind", [ListCursorSchema, DetailCursorSchema]);

export const CountersSchema = z.object({
  processed: z.number().int().nonnegative(),
  errored: z.number().int().nonnegative(),
  partial: z.number().int().nonnegative(),
  total: z.number().int().nonnegative()
});

export const CheckpointStateSchema = z.object({
  phaseId: z.string().min(1),
  status: z.enum(["running", "complete"]),
  cursor: CursorSchema.nullable(),
  completedIdentities: z.array(z.string()),
  // Items whose last attempt failed outright; cleared when a later attempt succeeds.
  failedIdentities: z.array(z.string()).default([]),
  counters: CountersSchema,
  timestamp: z.string()
});

export const ErrorReasonSchema = z.enum([
  "timeout",
  "render-failure",
  "rate-limited",
  "missing-locator",
  "section-failure",
  "section-missing",
  "unexpected"
]);

export const ErrorEntrySchema = z.object({
  identity: z.string().nullable(),
  locator: z.string().nullable(),
  phaseId: z.string().min(1),
  kind: z.enum(["terminal-item", "partial-item"]),
  reason: ErrorReasonSchema,
  section: z.string().nullable(),
  message: z.string(),
  timestamp: z.string(),
  retryCount: z.number().int().nonnegative()
});

export type FieldMap = z.infer<typeof FieldMapSchema>;
export type SectionPayload = z.infer<typeof SectionPayloadSchema>;
export type SummaryRecord = z.infer<typeof SummaryRecordSchema>;
export type DetailRecord = z.infer<typeof DetailRecordSchema>;
export type ListCursor = z.infer<typeof ListCursorSchema>;
export type DetailCursor = z.infer<typeof DetailCursorSchema>;
export type Cursor = z.infer<typeof CursorSchema>;
export type Counters = z.infer<typeof CountersSchema>;
export type CheckpointState = z.infer<typeof CheckpointStateSchema>;
export type ErrorReason = z.infer<typeof ErrorReasonSchema>;
export type ErrorEntry = z.infer<typeof ErrorEntrySchema>;

export interface Identified {
  identity: string;
}
