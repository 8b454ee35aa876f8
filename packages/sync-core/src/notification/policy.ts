/**
 * Notification Policy
 *
 * Classifies a finished report and decides whether it is worth a message.
 */

import type { SyncRunReport } from "../report/schema.js";

/**
 * - `errors`: the run aborted or recorded at least one error entry
 * - `warnings`: no errors, but not-found, flagged or duplicate entries
 * - `success`: nothing needs attention
 */
export type ReportSeverity = "errors" | "warnings" | "success";

export interface NotificationPolicy {
  readonly sendOnErrors: boolean;
  readonly sendOnWarnings: boolean;
  readonly sendOnSuccess: boolean;
  /** Overrides the three switches above. */
  readonly alwaysSend: boolean;
}

export const DEFAULT_NOTIFICATION_POLICY: NotificationPolicy = {
  sendOnErrors: true,
  sendOnWarnings: true,
  sendOnSuccess: false,
  alwaysSend: false,
};

export function classifyReport(report: SyncRunReport): ReportSeverity {
  const { summary } = report;
  if (report.status === "aborted" || summary.errors > 0) {
    return "errors";
  }
  if (summary.notFound > 0 || summary.flagged > 0 || summary.duplicates > 0) {
    return "warnings";
  }
  return "success";
}

/**
 * @example
 * ```typescript
 * if (shouldNotify(report, policy)) await notifier.send(report);
 * ```
 */
export function shouldNotify(report: SyncRunReport, policy: NotificationPolicy): boolean {
  if (policy.alwaysSend) {
    return true;
  }
  switch (classifyReport(report)) {
    case "errors":
      return policy.sendOnErrors;
    case "warnings":
      return policy.sendOnWarnings;
    case "success":
      return policy.sendOnSuccess;
  }
}
