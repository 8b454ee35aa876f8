/**
 * Supplier Credentials
 *
 * Secrets never live in `suppliers.json`; each supplier reads
 * `<PREFIX>_USERNAME`, `<PREFIX>_PASSWORD` and `<PREFIX>_API_KEY` from the
 * environment.
 *
 * @module suppliers/credentials
 */

import type { SupplierEntry } from "@stockrecon/sync-core";

export interface SupplierCredentials {
  readonly username?: string | undefined;
  readonly password?: string | undefined;
  readonly apiKey?: string | undefined;
}

export type Environment = Readonly<Record<string, string | undefined>>;

/**
 * `envPrefix`, else the supplier name upper-cased with every run of
 * non-alphanumerics turned into `_` ("Nordic Toys" → `NORDIC_TOYS`).
 */
export function credentialPrefix(entry: Pick<SupplierEntry, "name" | "envPrefix">): string {
  if (entry.envPrefix !== undefined) {
    return entry.envPrefix;
  }
  return entry.name
    .toUpperCase()
    .replace(/[^A-Z0-9]+/g, "_")
    .replace(/^_+|_+$/g, "");
}

function nonEmpty(value: string | undefined): string | undefined {
  return value === undefined || value === "" ? undefined : value;
}

export function credentialsFromEnv(
  entry: Pick<SupplierEntry, "name" | "envPrefix">,
  env: Environment
): SupplierCredentials {
  const prefix = credentialPrefix(entry);
  return {
    username: nonEmpty(env[`${prefix}_USERNAME`]),
    password: nonEmpty(env[`${prefix}_PASSWORD`]),
    apiKey: nonEmpty(env[`${prefix}_API_KEY`]),
  };
}
