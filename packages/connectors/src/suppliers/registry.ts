/**
 * Supplier Registry
 *
 * Builds a connector for every configured supplier entry. Adding a
 * connector type means a new schema branch in `SupplierEntrySchema` and a
 * case here; the exhaustive switch keeps the two in step.
 *
 * @module suppliers/registry
 */

import { assertNever } from "@stockrecon/recon-decider";
import { createNoOpLogger } from "@stockrecon/sync-core";
import type { Logger, SupplierConnector, SupplierEntry } from "@stockrecon/sync-core";
import { HttpClient, type FetchLike } from "../http/HttpClient.js";
import type { BackoffOptions } from "../http/backoff.js";
import { RequestThrottle, type Sleep } from "../http/throttle.js";
import { credentialsFromEnv, type Environment } from "./credentials.js";
import { CsvFeedSupplier } from "./CsvFeedSupplier.js";
import { JsonApiSupplier } from "./JsonApiSupplier.js";
import { JsonLookupSupplier } from "./JsonLookupSupplier.js";

export interface SupplierFactoryOptions {
  /** Source of `<PREFIX>_USERNAME|PASSWORD|API_KEY`. */
  env: Environment;
  fetch?: FetchLike | undefined;
  sleep?: Sleep | undefined;
  now?: (() => number) | undefined;
  /** Logger for each supplier's requests, e.g. a child logger per name. */
  loggerFor?: ((supplierName: string) => Logger) | undefined;
  backoff?: Partial<BackoffOptions> | undefined;
}

export function createSupplierConnector(
  entry: SupplierEntry,
  options: SupplierFactoryOptions
): SupplierConnector {
  const logger = options.loggerFor?.(entry.name) ?? createNoOpLogger();
  const credentials = credentialsFromEnv(entry, options.env);
  const http = (throttle?: RequestThrottle) =>
    new HttpClient({
      fetch: options.fetch,
      sleep: options.sleep,
      logger,
      backoff: options.backoff,
      throttle,
    });

  switch (entry.type) {
    case "json_api":
      return new JsonApiSupplier(entry.name, entry.config, credentials, http());
    case "csv_feed":
      return new CsvFeedSupplier(entry.name, entry.config, credentials, http(), logger);
    case "json_lookup":
      return new JsonLookupSupplier(
        entry.name,
        entry.config,
        credentials,
        http(
          new RequestThrottle(entry.config.requestsPerSecond, {
            now: options.now,
            sleep: options.sleep,
          })
        ),
        logger
      );
    default:
      return assertNever(entry);
  }
}

/**
 * Connectors for the enabled entries, in configuration order.
 */
export function createSupplierConnectors(
  entries: readonly SupplierEntry[],
  options: SupplierFactoryOptions
): SupplierConnector[] {
  return entries
    .filter((entry) => entry.enabled)
    .map((entry) => createSupplierConnector(entry, options));
}
