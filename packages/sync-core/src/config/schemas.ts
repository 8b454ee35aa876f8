/**
 * Configuration Schemas
 *
 * Shapes of `config/suppliers.json`, `config/shopify.json` and
 * `config/email.json` after environment overrides are merged in.
 * Connectors take the inferred types directly.
 *
 * @module config/schemas
 */

import { z } from "zod";

// ============================================================================
// Supplier connectors
// ============================================================================

/**
 * How a connector authenticates its requests. Credentials come from the
 * environment (`<PREFIX>_USERNAME`, `<PREFIX>_PASSWORD`, `<PREFIX>_API_KEY`).
 *
 * - `none`: anonymous
 * - `basic`: HTTP basic with username and password
 * - `api_key`: API key in `apiKeyHeader`
 * - `token`: POST username/password as JSON to `tokenUrl`, then send the
 *   returned token as a bearer token
 */
export const SupplierAuthSchema = z.enum(["none", "basic", "api_key", "token"]);

export type SupplierAuth = z.infer<typeof SupplierAuthSchema>;

const HttpSourceSchema = z.object({
  auth: SupplierAuthSchema.default("none"),
  apiKeyHeader: z.string().min(1).default("X-API-Key"),
  /** Required when `auth` is `token` */
  tokenUrl: z.string().url().optional(),
  /** Property of the token response holding the token */
  tokenField: z.string().min(1).default("token"),
  headers: z.record(z.string()).default({}),
});

/**
 * Names of the fields (JSON) or columns (CSV) holding each value.
 */
export const FieldMapSchema = z.object({
  ean: z.string().min(1).optional(),
  sku: z.string().min(1).optional(),
  status: z.string().min(1).default("stock"),
  title: z.string().min(1).optional(),
});

export type FieldMap = z.infer<typeof FieldMapSchema>;

const DEFAULT_FIELDS = { ean: "ean", sku: "sku", status: "stock" };

export const JsonApiConfigSchema = HttpSourceSchema.extend({
  url: z.string().url(),
  /** Dot path to the record array in the response; empty for a top-level array */
  recordsPath: z.string().default(""),
  fields: FieldMapSchema.default(DEFAULT_FIELDS),
});

export type JsonApiConfig = z.infer<typeof JsonApiConfigSchema>;

export const CsvFeedConfigSchema = HttpSourceSchema.extend({
  url: z.string().url(),
  delimiter: z.string().min(1).max(1).optional(),
  fields: FieldMapSchema.default(DEFAULT_FIELDS),
});

export type CsvFeedConfig = z.infer<typeof CsvFeedConfigSchema>;

export const JsonLookupConfigSchema = HttpSourceSchema.extend({
  /** URL with an `{ean}` placeholder */
  urlTemplate: z.string().includes("{ean}"),
  /** Dot path to the product object in the response; empty for the root */
  recordPath: z.string().default(""),
  fields: FieldMapSchema.default({ status: "stock" }),
  requestsPerSecond: z.number().positive().default(2),
});

export type JsonLookupConfig = z.infer<typeof JsonLookupConfigSchema>;

const SupplierBaseSchema = z.object({
  name: z.string().min(1),
  enabled: z.boolean().default(true),
  /** Environment variable prefix for credentials; defaults to the upper-cased name */
  envPrefix: z.string().min(1).optional(),
});

export const SupplierEntrySchema = z.discriminatedUnion("type", [
  SupplierBaseSchema.extend({ type: z.literal("json_api"), config: JsonApiConfigSchema }),
  SupplierBaseSchema.extend({ type: z.literal("csv_feed"), config: CsvFeedConfigSchema }),
  SupplierBaseSchema.extend({ type: z.literal("json_lookup"), config: JsonLookupConfigSchema }),
]);

export type SupplierEntry = z.infer<typeof SupplierEntrySchema>;
export type SupplierType = SupplierEntry["type"];

// ============================================================================
// suppliers.json
// ============================================================================

export const SafetyLimitsSchema = z.object({
  maxQuantityDropPercent: z.number().min(0).max(100).default(80),
  minQuantityForZeroCheck: z.number().int().nonnegative().default(50),
});

export const SuppliersFileSchema = z
  .object({
    suppliers: z.array(SupplierEntrySchema),
    /** Status text (any case) to quantity */
    statusMapping: z.record(z.number().int().nonnegative()).default({}),
    safetyLimits: SafetyLimitsSchema.default({}),
    fetchTimeoutMs: z.number().int().positive().default(120_000),
  })
  .superRefine((file, ctx) => {
    const seen = new Set<string>();
    file.suppliers.forEach((supplier, index) => {
      const key = supplier.name.toLowerCase();
      if (seen.has(key)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["suppliers", index, "name"],
          message: `Duplicate supplier name "${supplier.name}"`,
        });
      }
      seen.add(key);
      if (supplier.config.auth === "token" && supplier.config.tokenUrl === undefined) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["suppliers", index, "config", "tokenUrl"],
          message: "tokenUrl is required for token authentication",
        });
      }
    });
  });

export type SuppliersFile = z.infer<typeof SuppliersFileSchema>;

// ============================================================================
// shopify.json
// ============================================================================

export const ShopifyConfigSchema = z.object({
  /** Shop domain, with or without scheme (e.g. "example.myshopify.com") */
  shopUrl: z.string().min(1),
  accessToken: z.string().min(1),
  apiVersion: z.string().min(1).default("2024-01"),
  /** Defaults to the shop's primary location */
  locationId: z.string().min(1).optional(),
  requestsPerSecond: z.number().positive().default(2),
  maxRetries: z.number().int().nonnegative().default(3),
});

export type ShopifyConfig = z.infer<typeof ShopifyConfigSchema>;

// ============================================================================
// email.json
// ============================================================================

export const EmailConfigSchema = z.object({
  enabled: z.boolean().default(false),
  smtpHost: z.string().min(1),
  smtpPort: z.number().int().positive().default(587),
  /** TLS from the first byte (port 465); otherwise STARTTLS when offered */
  secure: z.boolean().default(false),
  username: z.string().optional(),
  password: z.string().optional(),
  from: z.string().min(1),
  to: z.array(z.string().min(1)).min(1),
  subjectPrefix: z.string().default("[Stock Sync]"),
  sendOnSuccess: z.boolean().default(false),
  sendOnWarnings: z.boolean().default(true),
  sendOnErrors: z.boolean().default(true),
  alwaysSend: z.boolean().default(false),
});

export type EmailConfig = z.infer<typeof EmailConfigSchema>;
