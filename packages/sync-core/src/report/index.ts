export * from "./schema.js";
export {
  ReportBuilder,
  summarizeEntries,
  CATALOG_SOURCE,
  type ReportBuilderOptions,
  type ErrorEntryInput,
} from "./builder.js";
export {
  formatSummary,
  formatReportText,
  DEFAULT_DETAIL_LIMITS,
  type DetailLimits,
} from "./format.js";
export { FileReportStore, reportFileName, parseReport } from "./file-store.js";
