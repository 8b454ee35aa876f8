/**
 * `stockrecon sync`
 *
 * Wires the configured Shopify client, supplier connectors, report store
 * and email notifier into one orchestrated run.
 *
 * @module commands/sync
 */

import {
  ShopifyCatalogClient,
  EmailNotifier,
  createSupplierConnectors,
  notificationPolicyFromEmail,
} from "@stockrecon/connectors";
import {
  FileReportStore,
  SyncError,
  SyncErrorCodes,
  SyncOrchestrator,
  createChildLogger,
  createScopedLogger,
  formatReportText,
  type SyncRunOptions,
} from "@stockrecon/sync-core";
import type { SyncCommandOptions } from "../args.js";
import { loadAppConfig } from "../config/load-config.js";
import type { CommandContext } from "./context.js";

/**
 * @returns Process exit code
 */
export async function runSync(options: SyncCommandOptions, context: CommandContext): Promise<number> {
  const { logLevel } = options;
  const config = await loadAppConfig(options.configDir, context.env);

  const enabled = config.suppliers.suppliers.filter((entry) => entry.enabled);
  if (enabled.length === 0) {
    throw new SyncError(SyncErrorCodes.CONFIGURATION_INVALID, "No enabled suppliers in configuration");
  }
  const requested = new Set(options.suppliers.map((name) => name.toLowerCase()));
  if (requested.size > 0 && !enabled.some((entry) => requested.has(entry.name.toLowerCase()))) {
    throw new SyncError(
      SyncErrorCodes.CONFIGURATION_INVALID,
      `No enabled supplier matches ${options.suppliers.join(", ")}`,
      { enabled: enabled.map((entry) => entry.name) }
    );
  }

  const logger = createScopedLogger("Sync", logLevel);
  const catalog = new ShopifyCatalogClient(config.shopify, {
    fetch: context.fetch,
    sleep: context.sleep,
    logger: createChildLogger("Sync", "Shopify", logLevel),
  });
  const suppliers = createSupplierConnectors(enabled, {
    env: context.env,
    fetch: context.fetch,
    sleep: context.sleep,
    loggerFor: (name) => createChildLogger("Supplier", name, logLevel),
  });
  const email = config.email?.enabled === true ? config.email : null;

  const orchestrator = new SyncOrchestrator({
    catalog,
    suppliers,
    statusMapping: config.suppliers.statusMapping,
    safetyLimits: config.suppliers.safetyLimits,
    fetchTimeoutMs: config.suppliers.fetchTimeoutMs,
    reportStore: new FileReportStore(options.logDir),
    notifier:
      email === null ? undefined : new EmailNotifier(email, { transport: context.mailTransport }),
    notificationPolicy: email === null ? undefined : notificationPolicyFromEmail(email),
    logger,
    now: context.now,
  });

  const runOptions: SyncRunOptions = {
    dryRun: options.dryRun,
    force: options.force,
    suppliers: options.suppliers,
    eans: options.eans,
    ...(options.limit === undefined ? {} : { limit: options.limit }),
  };
  const outcome = await orchestrator.run(runOptions);

  context.print(formatReportText(outcome.report));
  if (outcome.reportLocation !== null) {
    context.print(`Report saved to ${outcome.reportLocation}`);
  }
  return outcome.exitCode;
}
