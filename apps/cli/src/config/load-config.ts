/**
 * Configuration Loading
 *
 * Reads `suppliers.json`, `shopify.json` and `email.json` from the
 * configuration directory, layers environment overrides on top, and
 * validates the result with the sync-core schemas. Every failure is a
 * `SyncError` with code CONFIGURATION_INVALID, raised before a run starts.
 *
 * | Variable | Overrides |
 * |----------|-----------|
 * | `SHOPIFY_SHOP_URL`, `SHOPIFY_ACCESS_TOKEN`, `SHOPIFY_API_VERSION`, `SHOPIFY_LOCATION_ID` | `shopify.json` |
 * | `EMAIL_SMTP_HOST`, `EMAIL_SMTP_PORT`, `EMAIL_USERNAME`, `EMAIL_PASSWORD`, `EMAIL_FROM` | `email.json` |
 * | `EMAIL_TO` (comma separated) | `email.json` `to` |
 * | `EMAIL_SEND_ON_SUCCESS`, `EMAIL_SEND_ON_WARNINGS`, `EMAIL_SEND_ON_ERRORS` (`true`/`false`) | `email.json` flags |
 *
 * @module config/load-config
 */

import { readFile } from "node:fs/promises";
import { join } from "node:path";
import type { z } from "zod";
import {
  EmailConfigSchema,
  ShopifyConfigSchema,
  SuppliersFileSchema,
  SyncError,
  SyncErrorCodes,
  type EmailConfig,
  type ShopifyConfig,
  type SuppliersFile,
} from "@stockrecon/sync-core";
import type { Environment } from "@stockrecon/connectors";

export interface AppConfig {
  suppliers: SuppliersFile;
  shopify: ShopifyConfig;
  /** Null when neither `email.json` nor `EMAIL_SMTP_HOST` is present */
  email: EmailConfig | null;
}

type JsonObject = Record<string, unknown>;

function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function invalid(message: string, context?: Record<string, unknown>): SyncError {
  return new SyncError(SyncErrorCodes.CONFIGURATION_INVALID, message, context);
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

/**
 * Parsed JSON object from `<dir>/<name>.json`; undefined when the file does
 * not exist.
 */
export async function readConfigFile(dir: string, name: string): Promise<JsonObject | undefined> {
  const path = join(dir, `${name}.json`);
  let text: string;
  try {
    text = await readFile(path, "utf8");
  } catch (error) {
    if (isMissingFile(error)) {
      return undefined;
    }
    throw invalid(`Cannot read ${path}`, { path });
  }

  let value: unknown;
  try {
    value = JSON.parse(text);
  } catch {
    throw invalid(`${path} is not valid JSON`, { path });
  }
  if (!isJsonObject(value)) {
    throw invalid(`${path} must contain a JSON object`, { path });
  }
  return value;
}

function validate<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  value: unknown,
  source: string
): T {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw invalid(`Invalid configuration in ${source}`, {
      issues: result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
    });
  }
  return result.data;
}

/**
 * Copy set, non-empty environment values over the given keys.
 */
function overlay(
  base: JsonObject,
  env: Environment,
  mapping: Readonly<Record<string, (value: string) => unknown>>
): JsonObject {
  const merged: JsonObject = { ...base };
  for (const [variable, assign] of Object.entries(mapping)) {
    const value = env[variable]?.trim();
    if (value !== undefined && value !== "") {
      Object.assign(merged, assign(value));
    }
  }
  return merged;
}

function parseFlag(variable: string, value: string): boolean {
  const lower = value.toLowerCase();
  if (lower === "true" || lower === "false") {
    return lower === "true";
  }
  throw invalid(`${variable} must be "true" or "false", got "${value}"`);
}

// =============================================================================
// Loaders
// =============================================================================

export async function loadSuppliersConfig(configDir: string): Promise<SuppliersFile> {
  const file = await readConfigFile(configDir, "suppliers");
  if (file === undefined) {
    throw invalid(`Configuration file not found: ${join(configDir, "suppliers.json")}`);
  }
  return validate(SuppliersFileSchema, file, join(configDir, "suppliers.json"));
}

export async function loadShopifyConfig(configDir: string, env: Environment): Promise<ShopifyConfig> {
  const file = (await readConfigFile(configDir, "shopify")) ?? {};
  const merged = overlay(file, env, {
    SHOPIFY_SHOP_URL: (shopUrl) => ({ shopUrl }),
    SHOPIFY_ACCESS_TOKEN: (accessToken) => ({ accessToken }),
    SHOPIFY_API_VERSION: (apiVersion) => ({ apiVersion }),
    SHOPIFY_LOCATION_ID: (locationId) => ({ locationId }),
  });
  if (merged["shopUrl"] === undefined || merged["accessToken"] === undefined) {
    throw invalid(
      "Missing Shopify credentials: set SHOPIFY_SHOP_URL and SHOPIFY_ACCESS_TOKEN, or shopUrl and accessToken in shopify.json"
    );
  }
  return validate(ShopifyConfigSchema, merged, "Shopify configuration");
}

/**
 * Email settings. Without `email.json`, setting `EMAIL_SMTP_HOST` enables
 * email from the environment alone.
 */
export async function loadEmailConfig(
  configDir: string,
  env: Environment
): Promise<EmailConfig | null> {
  const file = await readConfigFile(configDir, "email");
  const envHost = env["EMAIL_SMTP_HOST"]?.trim();
  if (file === undefined && (envHost === undefined || envHost === "")) {
    return null;
  }
  const merged = overlay(file ?? { enabled: true }, env, {
    EMAIL_SMTP_HOST: (smtpHost) => ({ smtpHost }),
    // A non-numeric port fails validation as NaN
    EMAIL_SMTP_PORT: (port) => ({ smtpPort: Number(port) }),
    EMAIL_USERNAME: (username) => ({ username }),
    EMAIL_PASSWORD: (password) => ({ password }),
    EMAIL_FROM: (from) => ({ from }),
    EMAIL_TO: (to) => ({
      to: to
        .split(",")
        .map((address) => address.trim())
        .filter((address) => address !== ""),
    }),
    EMAIL_SEND_ON_SUCCESS: (value) => ({ sendOnSuccess: parseFlag("EMAIL_SEND_ON_SUCCESS", value) }),
    EMAIL_SEND_ON_WARNINGS: (value) => ({
      sendOnWarnings: parseFlag("EMAIL_SEND_ON_WARNINGS", value),
    }),
    EMAIL_SEND_ON_ERRORS: (value) => ({ sendOnErrors: parseFlag("EMAIL_SEND_ON_ERRORS", value) }),
  });
  return validate(EmailConfigSchema, merged, "email configuration");
}

export async function loadAppConfig(configDir: string, env: Environment): Promise<AppConfig> {
  const suppliers = await loadSuppliersConfig(configDir);
  const shopify = await loadShopifyConfig(configDir, env);
  const email = await loadEmailConfig(configDir, env);
  return { suppliers, shopify, email };
}
