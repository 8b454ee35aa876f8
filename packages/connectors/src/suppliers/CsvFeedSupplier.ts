/**
 * Feed connector for suppliers publishing a CSV stock file.
 *
 * Columns are named by the configured field map; the delimiter is sniffed
 * unless configured.
 *
 * @module suppliers/CsvFeedSupplier
 */

import Papa from "papaparse";
import { SyncError, SyncErrorCodes } from "@stockrecon/sync-core";
import type {
  CsvFeedConfig,
  Logger,
  RawSupplierRecord,
  SupplierConnector,
  SupplierQuery,
} from "@stockrecon/sync-core";
import type { HttpClient } from "../http/HttpClient.js";
import type { SupplierCredentials } from "./credentials.js";
import { toRawRecord } from "./fields.js";
import { SupplierSession } from "./SupplierSession.js";

/**
 * Parse CSV text into raw records.
 *
 * @throws SyncError FETCH_FAILED when no rows can be read, or when the
 * header lacks the status column or every identifier column
 */
export function parseCsvFeed(
  text: string,
  config: Pick<CsvFeedConfig, "delimiter" | "fields">,
  logger?: Logger
): RawSupplierRecord[] {
  const result = Papa.parse<Record<string, string>>(text, {
    header: true,
    skipEmptyLines: "greedy",
    transformHeader: (header) => header.trim(),
    ...(config.delimiter === undefined ? {} : { delimiter: config.delimiter }),
  });

  if (result.data.length === 0 && result.errors.length > 0) {
    throw new SyncError(SyncErrorCodes.FETCH_FAILED, "CSV feed could not be parsed", {
      errors: result.errors.slice(0, 5).map((error) => error.message),
    });
  }

  const columns = result.meta.fields ?? [];
  const identifierColumns = [config.fields.ean, config.fields.sku].filter(
    (field): field is string => field !== undefined
  );
  if (
    !columns.includes(config.fields.status) ||
    !identifierColumns.some((field) => columns.includes(field))
  ) {
    throw new SyncError(SyncErrorCodes.FETCH_FAILED, "CSV feed is missing configured columns", {
      status: config.fields.status,
      identifiers: identifierColumns,
      columns,
    });
  }

  for (const error of result.errors) {
    logger?.warn("Skipped malformed CSV row", { row: error.row, message: error.message });
  }

  return result.data.map((row) => toRawRecord(row, config.fields));
}

export class CsvFeedSupplier implements SupplierConnector {
  readonly kind = "feed";
  private readonly session: SupplierSession;

  constructor(
    readonly name: string,
    private readonly config: CsvFeedConfig,
    credentials: SupplierCredentials,
    http: HttpClient,
    private readonly logger?: Logger
  ) {
    this.session = new SupplierSession(name, config, credentials, http);
  }

  authenticate(): Promise<void> {
    return this.session.authenticate();
  }

  async fetchInventory(query: SupplierQuery): Promise<readonly RawSupplierRecord[]> {
    const response = await this.session.getOk(this.config.url, query.signal);
    return parseCsvFeed(await response.text(), this.config, this.logger);
  }
}
