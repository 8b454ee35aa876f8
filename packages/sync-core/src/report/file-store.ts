/**
 * File Report Store
 *
 * One JSON document per run in the log directory, named after the run's
 * start time: `sync_YYYY-MM-DD_HH-mm-ss.json` (local time).
 *
 * @module report/file-store
 */

import { mkdir, readFile, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { format } from "date-fns";
import { errorMessage, SyncError, SyncErrorCodes } from "../errors.js";
import type { ReportStore } from "../collaborators.js";
import { SyncRunReportSchema, type SyncRunReport } from "./schema.js";

/**
 * File name for a report started at `startedAt`.
 *
 * @example
 * ```typescript
 * reportFileName(new Date(2026, 0, 15, 9, 5, 3)); // "sync_2026-01-15_09-05-03.json"
 * ```
 */
export function reportFileName(startedAt: Date): string {
  return format(startedAt, "'sync_'yyyy-MM-dd_HH-mm-ss'.json'");
}

/**
 * Validate a parsed JSON value as a run report.
 *
 * @throws SyncError REPORT_INVALID listing the failing paths
 */
export function parseReport(value: unknown, source = "report"): SyncRunReport {
  const result = SyncRunReportSchema.safeParse(value);
  if (!result.success) {
    const issues = result.error.issues.map(
      (issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`
    );
    throw new SyncError(SyncErrorCodes.REPORT_INVALID, `Invalid report in ${source}`, {
      issues,
    });
  }
  return result.data;
}

export class FileReportStore implements ReportStore {
  constructor(private readonly directory: string) {}

  async save(report: SyncRunReport): Promise<string> {
    await mkdir(this.directory, { recursive: true });
    const path = join(this.directory, reportFileName(new Date(report.startedAt)));
    await writeFile(path, `${JSON.stringify(report, null, 2)}\n`, "utf8");
    return path;
  }

  /**
   * Read and validate a persisted report.
   */
  static async load(path: string): Promise<SyncRunReport> {
    let text: string;
    try {
      text = await readFile(path, "utf8");
    } catch (error) {
      throw new SyncError(
        SyncErrorCodes.REPORT_INVALID,
        `Cannot read report ${path}: ${errorMessage(error)}`,
        { path },
        { cause: error }
      );
    }
    let parsed: unknown;
    try {
      parsed = JSON.parse(text);
    } catch (error) {
      throw new SyncError(
        SyncErrorCodes.REPORT_INVALID,
        `Report ${path} is not valid JSON`,
        { path },
        { cause: error }
      );
    }
    return parseReport(parsed, path);
  }
}
