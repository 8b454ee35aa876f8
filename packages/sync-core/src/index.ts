/**
 * @stockrecon/sync-core
 *
 * Orchestration layer: collaborator contracts, the sync run, its report,
 * notification policy, configuration schemas, logging and errors.
 *
 * @example
 * ```typescript
 * import { SyncOrchestrator, FileReportStore, createScopedLogger } from "@stockrecon/sync-core";
 * ```
 */

export type { UnknownRecord } from "./types.js";

// Errors
export { SyncError, SyncErrorCodes, errorMessage, type SyncErrorCode } from "./errors.js";

// Logging
export * from "./logging/index.js";

// Collaborators
export type {
  CatalogClient,
  SupplierConnector,
  SupplierKind,
  SupplierQuery,
  RawSupplierRecord,
  Notifier,
  ReportStore,
} from "./collaborators.js";

// Report
export * from "./report/index.js";

// Notification
export {
  classifyReport,
  shouldNotify,
  DEFAULT_NOTIFICATION_POLICY,
  type NotificationPolicy,
  type ReportSeverity,
} from "./notification/policy.js";

// Configuration
export * from "./config/schemas.js";

// Orchestration
export {
  SyncOrchestrator,
  NOT_FOUND_ON_SUPPLIER,
  DEFAULT_FETCH_TIMEOUT_MS,
  type SyncOrchestratorConfig,
  type SyncRunOptions,
  type SyncOutcome,
} from "./orchestrator/SyncOrchestrator.js";
export { withTimeout } from "./orchestrator/timeout.js";

// Revert
export {
  revertReport,
  type RevertOptions,
  type RevertResult,
  type RevertStatus,
  type RevertSummary,
} from "./revert.js";
