/**
 * Collaborator Contracts
 *
 * The orchestrator is the only I/O site of a run; everything it talks to
 * sits behind one of these interfaces. Implementations signal failure by
 * throwing (preferably a `SyncError`).
 */

import type { CatalogItem } from "@stockrecon/recon-decider";
import type { SyncRunReport } from "./report/schema.js";

// =============================================================================
// Catalog
// =============================================================================

export interface CatalogClient {
  /**
   * Full catalog snapshot. Taken once per run.
   */
  listItems(): Promise<readonly CatalogItem[]>;

  /**
   * Set the absolute quantity of one item at one location.
   * Throttling and retries happen inside the client; a rejection is terminal.
   */
  updateQuantity(locationId: string, itemId: string, quantity: number): Promise<void>;
}

// =============================================================================
// Suppliers
// =============================================================================

/**
 * - `feed`: returns the supplier's whole inventory
 * - `lookup`: answers per catalog identifier; identifiers it does not
 *   return are treated as out of stock
 */
export type SupplierKind = "feed" | "lookup";

/**
 * A record as the connector reads it, before status resolution.
 */
export interface RawSupplierRecord {
  readonly ean?: string | null;
  readonly sku?: string | null;
  /** Quantity or status text ("På lager", "Out of stock"). */
  readonly status: string | number;
  readonly title?: string;
}

/**
 * What the orchestrator passes to `fetchInventory`.
 */
export interface SupplierQuery {
  /** Normalized catalog EANs to look up. Empty for feed connectors. */
  readonly eans: readonly string[];
  /** Aborted when the per-supplier fetch timeout elapses. */
  readonly signal: AbortSignal;
}

export interface SupplierConnector {
  readonly name: string;
  readonly kind: SupplierKind;

  authenticate(): Promise<void>;

  fetchInventory(query: SupplierQuery): Promise<readonly RawSupplierRecord[]>;

  /**
   * Release sessions or sockets. Called once after the supplier is processed.
   */
  close?(): Promise<void>;
}

// =============================================================================
// Report sinks
// =============================================================================

/**
 * Best-effort delivery of a finished report.
 */
export interface Notifier {
  send(report: SyncRunReport): Promise<void>;
}

export interface ReportStore {
  /**
   * Persist a finalized report.
   * @returns Where the report was written (a file path for the file store).
   */
  save(report: SyncRunReport): Promise<string>;
}
