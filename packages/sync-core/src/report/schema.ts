/**
 * Run Report Schema
 *
 * The persisted JSON document of one sync run. Field names and nesting are
 * a stable contract for log viewers, email bodies and the revert command;
 * additions must be optional and `REPORT_VERSION` bumps on any breaking
 * change.
 *
 * @module report/schema
 */

import { z } from "zod";

export const REPORT_VERSION = 1;

// ============================================================================
// Enumerations
// ============================================================================

export const REPORT_ENTRY_TYPES = [
  "update",
  "no_change",
  "not_found",
  "duplicate",
  "flagged",
  "error",
] as const;

export type ReportEntryType = (typeof REPORT_ENTRY_TYPES)[number];

/**
 * Error categories recorded on `error` entries.
 *
 * - `authentication`, `fetch`: supplier-level, the supplier was skipped
 * - `invalid_record`, `unmapped_status`: one record was excluded
 * - `catalog_write`: one update failed, later updates continued
 * - `catalog_snapshot`: the run was aborted
 */
export const REPORT_ERROR_TYPES = [
  "authentication",
  "fetch",
  "invalid_record",
  "unmapped_status",
  "catalog_write",
  "catalog_snapshot",
] as const;

export type ReportErrorType = (typeof REPORT_ERROR_TYPES)[number];

export const RUN_STATUSES = ["completed", "aborted"] as const;

export type RunStatus = (typeof RUN_STATUSES)[number];

// ============================================================================
// Entries
// ============================================================================

const IdentifierTypeSchema = z.enum(["ean", "sku"]);
const QuantitySchema = z.number().int();

const EntryBaseSchema = z.object({
  supplier: z.string(),
  ean: z.string().nullable(),
  sku: z.string().nullable(),
});

export const UpdateEntrySchema = EntryBaseSchema.extend({
  type: z.literal("update"),
  itemId: z.string(),
  locationId: z.string(),
  title: z.string().optional(),
  matchedBy: IdentifierTypeSchema,
  oldQty: QuantitySchema,
  newQty: QuantitySchema,
  change: QuantitySchema,
  /** false in preview mode */
  applied: z.boolean(),
});

export const NoChangeEntrySchema = EntryBaseSchema.extend({
  type: z.literal("no_change"),
  itemId: z.string(),
  title: z.string().optional(),
  matchedBy: IdentifierTypeSchema,
  oldQty: QuantitySchema,
});

export const NotFoundEntrySchema = EntryBaseSchema.extend({
  type: z.literal("not_found"),
  newQty: QuantitySchema,
  rawStatus: z.union([z.string(), z.number()]),
});

export const DuplicateEntrySchema = EntryBaseSchema.extend({
  type: z.literal("duplicate"),
  matchedBy: IdentifierTypeSchema,
  identifier: z.string(),
  candidateItemIds: z.array(z.string()),
  newQty: QuantitySchema,
  reason: z.string(),
});

export const FlaggedEntrySchema = EntryBaseSchema.extend({
  type: z.literal("flagged"),
  itemId: z.string(),
  locationId: z.string(),
  title: z.string().optional(),
  matchedBy: IdentifierTypeSchema,
  oldQty: QuantitySchema,
  newQty: QuantitySchema,
  change: QuantitySchema,
  reason: z.string(),
});

export const ErrorEntrySchema = EntryBaseSchema.extend({
  type: z.literal("error"),
  errorType: z.enum(REPORT_ERROR_TYPES),
  message: z.string(),
  itemId: z.string().optional(),
  locationId: z.string().optional(),
  oldQty: QuantitySchema.optional(),
  newQty: QuantitySchema.optional(),
  context: z.record(z.unknown()).optional(),
});

export const ReportEntrySchema = z.discriminatedUnion("type", [
  UpdateEntrySchema,
  NoChangeEntrySchema,
  NotFoundEntrySchema,
  DuplicateEntrySchema,
  FlaggedEntrySchema,
  ErrorEntrySchema,
]);

export type UpdateEntry = z.infer<typeof UpdateEntrySchema>;
export type NoChangeEntry = z.infer<typeof NoChangeEntrySchema>;
export type NotFoundEntry = z.infer<typeof NotFoundEntrySchema>;
export type DuplicateEntry = z.infer<typeof DuplicateEntrySchema>;
export type FlaggedEntry = z.infer<typeof FlaggedEntrySchema>;
export type ErrorEntry = z.infer<typeof ErrorEntrySchema>;
export type ReportEntry = z.infer<typeof ReportEntrySchema>;

// ============================================================================
// Report
// ============================================================================

export const ReportSummarySchema = z.object({
  totalSupplierRecords: z.number().int().nonnegative(),
  /** Records whose identifier resolved, uniquely or to several items */
  matched: z.number().int().nonnegative(),
  /** `update` entries: writes applied, or in preview the writes that would be */
  updated: z.number().int().nonnegative(),
  noChange: z.number().int().nonnegative(),
  notFound: z.number().int().nonnegative(),
  duplicates: z.number().int().nonnegative(),
  flagged: z.number().int().nonnegative(),
  errors: z.number().int().nonnegative(),
});

export type ReportSummary = z.infer<typeof ReportSummarySchema>;

export const CatalogSectionSchema = z.object({
  totalItems: z.number().int().nonnegative(),
  unreachableItems: z.array(
    z.object({
      itemId: z.string(),
      title: z.string().optional(),
    })
  ),
  duplicateIdentifiers: z.array(
    z.object({
      identifier: z.string(),
      type: IdentifierTypeSchema,
      itemIds: z.array(z.string()),
    })
  ),
});

export type CatalogSection = z.infer<typeof CatalogSectionSchema>;

export const SyncRunReportSchema = z.object({
  version: z.literal(REPORT_VERSION),
  runId: z.string(),
  startedAt: z.string().datetime(),
  finishedAt: z.string().datetime(),
  status: z.enum(RUN_STATUSES),
  mode: z.object({
    dryRun: z.boolean(),
    force: z.boolean(),
  }),
  suppliersProcessed: z.array(z.string()),
  summary: ReportSummarySchema,
  catalog: CatalogSectionSchema,
  entries: z.array(ReportEntrySchema),
});

export type SyncRunReport = z.infer<typeof SyncRunReportSchema>;
