/**
 * @stockrecon/connectors
 *
 * I/O adapters behind the sync-core collaborator contracts: the Shopify
 * catalog client, HTTP supplier connectors and the email notifier.
 *
 * @example
 * ```typescript
 * import { ShopifyCatalogClient, createSupplierConnectors } from "@stockrecon/connectors";
 *
 * const catalog = new ShopifyCatalogClient(shopifyConfig, { logger });
 * const suppliers = createSupplierConnectors(suppliersFile.suppliers, { env: process.env });
 * ```
 */

// HTTP
export * from "./http/index.js";

// Shopify
export {
  ShopifyCatalogClient,
  adminApiBaseUrl,
  selectPrimaryLocation,
  variantToCatalogItem,
  PRODUCTS_PAGE_SIZE,
  type ShopifyCatalogClientOptions,
} from "./shopify/ShopifyCatalogClient.js";
export { nextPageUrl } from "./shopify/link-header.js";

// Suppliers
export {
  credentialsFromEnv,
  credentialPrefix,
  type SupplierCredentials,
  type Environment,
} from "./suppliers/credentials.js";
export { getPath, toRawRecord } from "./suppliers/fields.js";
export { SupplierSession, type HttpSourceConfig } from "./suppliers/SupplierSession.js";
export { JsonApiSupplier } from "./suppliers/JsonApiSupplier.js";
export { CsvFeedSupplier, parseCsvFeed } from "./suppliers/CsvFeedSupplier.js";
export { JsonLookupSupplier, lookupUrl } from "./suppliers/JsonLookupSupplier.js";
export {
  createSupplierConnector,
  createSupplierConnectors,
  type SupplierFactoryOptions,
} from "./suppliers/registry.js";

// Email
export {
  EmailNotifier,
  createSmtpTransport,
  emailSubject,
  notificationPolicyFromEmail,
  type EmailNotifierOptions,
  type MailTransport,
} from "./email/EmailNotifier.js";
