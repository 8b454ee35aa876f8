/**
 * Feed connector for suppliers exposing their inventory as one JSON document.
 *
 * @module suppliers/JsonApiSupplier
 */

import { SyncError, SyncErrorCodes } from "@stockrecon/sync-core";
import type {
  JsonApiConfig,
  RawSupplierRecord,
  SupplierConnector,
  SupplierQuery,
} from "@stockrecon/sync-core";
import { readJson, type HttpClient } from "../http/HttpClient.js";
import type { SupplierCredentials } from "./credentials.js";
import { getPath, isRecord, toRawRecord } from "./fields.js";
import { SupplierSession } from "./SupplierSession.js";

export class JsonApiSupplier implements SupplierConnector {
  readonly kind = "feed";
  private readonly session: SupplierSession;

  constructor(
    readonly name: string,
    private readonly config: JsonApiConfig,
    credentials: SupplierCredentials,
    http: HttpClient
  ) {
    this.session = new SupplierSession(name, config, credentials, http);
  }

  authenticate(): Promise<void> {
    return this.session.authenticate();
  }

  async fetchInventory(query: SupplierQuery): Promise<readonly RawSupplierRecord[]> {
    const { url, recordsPath, fields } = this.config;
    const response = await this.session.getOk(url, query.signal);
    const records = getPath(await readJson(response, url), recordsPath);

    if (!Array.isArray(records)) {
      throw new SyncError(
        SyncErrorCodes.FETCH_FAILED,
        recordsPath === ""
          ? "Response is not an array of records"
          : `Response has no record array at "${recordsPath}"`,
        { supplier: this.name, url }
      );
    }

    // Non-object entries carry no identifiers; they surface as invalid records
    return records.map((entry: unknown) =>
      isRecord(entry) ? toRawRecord(entry, fields) : { ean: null, sku: null, status: "" }
    );
  }
}
