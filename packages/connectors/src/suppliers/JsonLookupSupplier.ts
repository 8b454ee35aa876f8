/**
 * Lookup connector for suppliers answering one identifier at a time.
 *
 * Each catalog EAN is requested from `urlTemplate` in turn; a 404 (or a
 * response without a product object) means the supplier does not carry it.
 * The orchestrator treats identifiers missing from the result as out of
 * stock, so any other failure aborts the whole supplier instead of being
 * skipped.
 *
 * @module suppliers/JsonLookupSupplier
 */

import { SyncErrorCodes, createNoOpLogger } from "@stockrecon/sync-core";
import type {
  JsonLookupConfig,
  Logger,
  RawSupplierRecord,
  SupplierConnector,
  SupplierQuery,
} from "@stockrecon/sync-core";
import { expectOk, readJson, type HttpClient } from "../http/HttpClient.js";
import type { SupplierCredentials } from "./credentials.js";
import { getPath, isRecord, toRawRecord } from "./fields.js";
import { SupplierSession } from "./SupplierSession.js";

const PROGRESS_EVERY = 50;

export function lookupUrl(template: string, ean: string): string {
  return template.replaceAll("{ean}", encodeURIComponent(ean));
}

export class JsonLookupSupplier implements SupplierConnector {
  readonly kind = "lookup";
  private readonly session: SupplierSession;
  private readonly logger: Logger;

  constructor(
    readonly name: string,
    private readonly config: JsonLookupConfig,
    credentials: SupplierCredentials,
    http: HttpClient,
    logger?: Logger
  ) {
    this.session = new SupplierSession(name, config, credentials, http);
    this.logger = logger ?? createNoOpLogger();
  }

  authenticate(): Promise<void> {
    return this.session.authenticate();
  }

  async fetchInventory(query: SupplierQuery): Promise<readonly RawSupplierRecord[]> {
    const records: RawSupplierRecord[] = [];

    for (const [position, ean] of query.eans.entries()) {
      query.signal.throwIfAborted();
      const record = await this.lookup(ean, query.signal);
      if (record !== null) {
        records.push(record);
      }
      if ((position + 1) % PROGRESS_EVERY === 0) {
        this.logger.debug("Lookup progress", {
          supplier: this.name,
          done: position + 1,
          total: query.eans.length,
          found: records.length,
        });
      }
    }

    return records;
  }

  private async lookup(ean: string, signal: AbortSignal): Promise<RawSupplierRecord | null> {
    const url = lookupUrl(this.config.urlTemplate, ean);
    const response = await this.session.get(url, signal);
    if (response.status === 404) {
      await response.body?.cancel();
      return null;
    }
    await expectOk(response, url, SyncErrorCodes.FETCH_FAILED);

    const product = getPath(await readJson(response, url), this.config.recordPath);
    if (!isRecord(product)) {
      return null;
    }
    // The queried identifier is authoritative; the supplier may format it differently
    return { ...toRawRecord(product, this.config.fields), ean };
  }
}
