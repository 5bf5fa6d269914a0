import {
  pgTable,
  text,
  timestamp,
  jsonb,
  integer,
  serial,
  index,
  uniqueIndex
} from "drizzle-orm/pg-core";
import { FieldMap, SectionPayload } from "../types/records";

export const summaryRecords = pgTable(
  "summary_records",
  {
    id: serial("id").primaryKey(),
    phaseId: text("phase_id").notNull(),
    identity: text("identity").notNull(),
    partition: text("partition"),
    detailUrl: text("detail_url"),
    fields: jsonb("fields").$type<FieldMap>().notNull(),
    harvestedAt: timestamp("harvested_at", { withTimezone: true }).notNull(),
    updatedAt: timestamp("updated_at", { withTimezone: true }).defaultNow().notNull()
  },
  (table) => ({
    summaryRecordsUnique: uniqueIndex("summary_records_phase_identity_idx").on(
      table.phaseId,
      table.identity
    ),
    summaryRecordsPartitionIdx: index("summary_records_partition_idx").on(
      table.phaseId,
      table.partition
    )
  })
);

export const detailRecords = pgTable(
  "detail_records",
  {
    id: serial("id").primaryKey(),
    phaseId: text("phase_id").notNull(),
    identity: text("identity").notNull(),
    partition: text("partition"),
    sourceUrl: text("source_url").notNull(),
    fromList: jsonb("from_list").$type<FieldMap>().notNull(),
    sections: jsonb("sections").$type<Record<string, SectionPayload>>().notNull(),
    scrapedAt: timestamp("scraped_at", { withTimezone: true }).notNull(),
    updatedAt: timestamp("updated_at", { withTimezone: true }).defaultNow().notNull()
  },
  (table) => ({
    detailRecordsUnique: uniqueIndex("detail_records_phase_identity_idx").on(
      table.phaseId,
      table.identity
    )
  })
);

export const errorEntries = pgTable(
  "error_entries",
  {
    id: serial("id").primaryKey(),
    phaseId: text("phase_id").notNull(),
    entryHash: text("entry_hash").notNull(),
    identity: text("identity"),
    locator: text("locator"),
    kind: text("kind").notNull(), // terminal-item | partial-item
    reason: text("reason").notNull(),
    section: text("section"),
    message: text("message").notNull(),
    retryCount: integer("retry_count").notNull(),
    occurredAt: timestamp("occurred_at", { withTimezone: true }).notNull()
  },
  (table) => ({
    errorEntriesUnique: uniqueIndex("error_entries_phase_hash_idx").on(
      table.phaseId,
      table.entryHash
    ),
    errorEntriesReasonIdx: index("error_entries_reason_idx").on(table.phaseId, table.reason)
  })
);
