/**
 * Email Notifier
 *
 * Sends the plain-text run report over SMTP. Whether a report is sent at
 * all is the orchestrator's call (`shouldNotify`); this class only formats
 * and delivers.
 *
 * @module email/EmailNotifier
 */

import nodemailer from "nodemailer";
import type { SendMailOptions } from "nodemailer";
import { format } from "date-fns";
import {
  SyncError,
  SyncErrorCodes,
  classifyReport,
  errorMessage,
  formatReportText,
} from "@stockrecon/sync-core";
import type {
  EmailConfig,
  NotificationPolicy,
  Notifier,
  ReportSeverity,
  SyncRunReport,
} from "@stockrecon/sync-core";

/**
 * The part of a nodemailer transporter the notifier uses.
 */
export interface MailTransport {
  sendMail(message: SendMailOptions): Promise<unknown>;
}

export interface EmailNotifierOptions {
  /** Defaults to an SMTP transport built from the config. */
  transport?: MailTransport | undefined;
  now?: (() => Date) | undefined;
}

const SEVERITY_LABEL: Record<ReportSeverity, string> = {
  errors: "ERRORS",
  warnings: "WARNINGS",
  success: "SUCCESS",
};

/**
 * `<prefix> <ERRORS|WARNINGS|SUCCESS> - <YYYY-MM-DD HH:mm>` in local time.
 */
export function emailSubject(report: SyncRunReport, prefix: string, at: Date): string {
  return `${prefix} ${SEVERITY_LABEL[classifyReport(report)]} - ${format(at, "yyyy-MM-dd HH:mm")}`;
}

export function notificationPolicyFromEmail(config: EmailConfig): NotificationPolicy {
  return {
    sendOnErrors: config.sendOnErrors,
    sendOnWarnings: config.sendOnWarnings,
    sendOnSuccess: config.sendOnSuccess,
    alwaysSend: config.alwaysSend,
  };
}

export function createSmtpTransport(config: EmailConfig): MailTransport {
  return nodemailer.createTransport({
    host: config.smtpHost,
    port: config.smtpPort,
    secure: config.secure,
    ...(config.username === undefined
      ? {}
      : { auth: { user: config.username, pass: config.password ?? "" } }),
  });
}

export class EmailNotifier implements Notifier {
  private readonly transport: MailTransport;
  private readonly now: () => Date;

  constructor(
    private readonly config: EmailConfig,
    options: EmailNotifierOptions = {}
  ) {
    this.transport = options.transport ?? createSmtpTransport(config);
    this.now = options.now ?? (() => new Date());
  }

  async send(report: SyncRunReport): Promise<void> {
    const message: SendMailOptions = {
      from: this.config.from,
      to: this.config.to.join(", "),
      subject: emailSubject(report, this.config.subjectPrefix, this.now()),
      text: formatReportText(report),
    };
    try {
      await this.transport.sendMail(message);
    } catch (error) {
      throw new SyncError(
        SyncErrorCodes.NOTIFICATION_FAILED,
        `Email delivery failed: ${errorMessage(error)}`,
        { runId: report.runId, host: this.config.smtpHost },
        { cause: error }
      );
    }
  }
}
