/**
 * Supplier Session
 *
 * Authentication state and request headers for one HTTP supplier. Every
 * connector owns a session; the orchestrator calls `authenticate` once
 * before fetching.
 *
 * @module suppliers/SupplierSession
 */

import { SyncError, SyncErrorCodes } from "@stockrecon/sync-core";
import type { JsonApiConfig } from "@stockrecon/sync-core";
import { expectOk, readJson, type HttpClient } from "../http/HttpClient.js";
import type { SupplierCredentials } from "./credentials.js";
import { getPath } from "./fields.js";

export type HttpSourceConfig = Pick<
  JsonApiConfig,
  "auth" | "apiKeyHeader" | "tokenUrl" | "tokenField" | "headers"
>;

export class SupplierSession {
  private token: string | undefined;

  constructor(
    private readonly supplier: string,
    private readonly config: HttpSourceConfig,
    private readonly credentials: SupplierCredentials,
    private readonly http: HttpClient
  ) {}

  async authenticate(): Promise<void> {
    switch (this.config.auth) {
      case "none":
        return;
      case "basic":
        this.requireLogin();
        return;
      case "api_key":
        if (this.credentials.apiKey === undefined) {
          throw this.failure("API key authentication needs an API key");
        }
        return;
      case "token":
        this.token = await this.requestToken();
        return;
    }
  }

  /**
   * GET with the session's headers. Non-2xx responses are returned as is.
   */
  async get(url: string, signal: AbortSignal): Promise<Response> {
    return this.http.request(url, { method: "GET", headers: this.headers(), signal });
  }

  /**
   * GET that fails with FETCH_FAILED on any non-2xx response.
   */
  async getOk(url: string, signal: AbortSignal): Promise<Response> {
    return expectOk(await this.get(url, signal), url, SyncErrorCodes.FETCH_FAILED);
  }

  headers(): Record<string, string> {
    const headers: Record<string, string> = { ...this.config.headers };
    switch (this.config.auth) {
      case "none":
        break;
      case "basic": {
        const { username, password } = this.requireLogin();
        headers["Authorization"] =
          `Basic ${Buffer.from(`${username}:${password}`).toString("base64")}`;
        break;
      }
      case "api_key":
        if (this.credentials.apiKey !== undefined) {
          headers[this.config.apiKeyHeader] = this.credentials.apiKey;
        }
        break;
      case "token":
        if (this.token === undefined) {
          throw this.failure("Session has not authenticated");
        }
        headers["Authorization"] = `Bearer ${this.token}`;
        break;
    }
    return headers;
  }

  private requireLogin(): { username: string; password: string } {
    const { username, password } = this.credentials;
    if (username === undefined || password === undefined) {
      throw this.failure(`${this.config.auth} authentication needs a username and password`);
    }
    return { username, password };
  }

  private async requestToken(): Promise<string> {
    const { username, password } = this.requireLogin();
    const url = this.config.tokenUrl;
    if (url === undefined) {
      throw this.failure("tokenUrl is required for token authentication");
    }
    const response = await this.http.request(url, {
      method: "POST",
      headers: { ...this.config.headers, "Content-Type": "application/json" },
      body: JSON.stringify({ username, password }),
    });
    await expectOk(response, url, SyncErrorCodes.AUTHENTICATION_FAILED);
    const token = getPath(await readJson(response, url), this.config.tokenField);
    if (typeof token !== "string" || token === "") {
      throw this.failure(`Token response has no "${this.config.tokenField}"`);
    }
    return token;
  }

  private failure(message: string): SyncError {
    return new SyncError(SyncErrorCodes.AUTHENTICATION_FAILED, message, {
      supplier: this.supplier,
    });
  }
}
