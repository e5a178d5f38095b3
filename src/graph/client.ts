/**
 * Microsoft Graph HTTP client.
 *
 * An axios instance scoped to one user (`{baseUrl}/users/{userId}`) with a
 * request interceptor that attaches an app-only bearer token and a response
 * interceptor that turns every HTTP failure into a GraphRequestError.
 *
 * Operations depend on the GraphClient interface only; tests substitute an
 * in-memory implementation.
 */

import axios, { AxiosError, type AxiosInstance } from "axios";
import { ConfidentialClientApplication } from "@azure/msal-node";
import type { GraphCredentials } from "../config/index.js";
import type { Logger } from "../logging/index.js";
import { GraphRequestError } from "./errors.js";
import { GraphErrorBodySchema, PageSchema } from "./schemas.js";

export { GraphRequestError } from "./errors.js";

export const GRAPH_SCOPE = "https://graph.microsoft.com/.default";
export const DEFAULT_GRAPH_BASE_URL = "https://graph.microsoft.com/v1.0";

/** Tokens are refreshed when they have less than this left */
const TOKEN_MIN_VALIDITY_MS = 60_000;
const REQUEST_TIMEOUT_MS = 60_000;

// ============================================================
// Errors
// ============================================================

function toGraphRequestError(err: unknown): GraphRequestError {
  if (err instanceof GraphRequestError) {
    return err;
  }
  if (err instanceof AxiosError) {
    const status = err.response?.status;
    const body = GraphErrorBodySchema.safeParse(err.response?.data);
    if (body.success) {
      const { code, message } = body.data.error;
      return new GraphRequestError(`Graph request failed (${status ?? "no status"} ${code}): ${message}`, status, code);
    }
    const target = `${err.config?.method?.toUpperCase() ?? "GET"} ${err.config?.url ?? ""}`.trim();
    return new GraphRequestError(`Graph request failed: ${target}: ${err.message}`, status);
  }
  return new GraphRequestError(`Graph request failed: ${err instanceof Error ? err.message : String(err)}`);
}

// ============================================================
// Tokens
// ============================================================

export interface TokenProvider {
  getToken(): Promise<string>;
}

/**
 * Client-credentials flow through MSAL.
 */
export class MsalTokenProvider implements TokenProvider {
  private readonly app: ConfidentialClientApplication;
  private cached?: { token: string; expiresAt: number };

  constructor(credentials: GraphCredentials) {
    this.app = new ConfidentialClientApplication({
      auth: {
        clientId: credentials.clientId,
        clientSecret: credentials.clientSecret,
        authority: `https://login.microsoftonline.com/${credentials.tenantId}`,
      },
    });
  }

  async getToken(): Promise<string> {
    if (this.cached && this.cached.expiresAt - Date.now() > TOKEN_MIN_VALIDITY_MS) {
      return this.cached.token;
    }
    const result = await this.app.acquireTokenByClientCredential({ scopes: [GRAPH_SCOPE] });
    if (!result?.accessToken) {
      throw new GraphRequestError("Could not obtain a Graph access token");
    }
    this.cached = {
      token: result.accessToken,
      expiresAt: result.expiresOn?.getTime() ?? Date.now() + TOKEN_MIN_VALIDITY_MS,
    };
    return result.accessToken;
  }
}

// ============================================================
// Client
// ============================================================

export interface BinaryContent {
  readonly data: Uint8Array;
  readonly contentType?: string;
}

export type QueryParams = Readonly<Record<string, string | number>>;

/**
 * Paths are relative to the user root, e.g. `/messages` or `/drive/root`.
 */
export interface GraphClient {
  get(path: string, params?: QueryParams): Promise<unknown>;
  getBinary(path: string): Promise<BinaryContent>;
  post(path: string, body?: unknown): Promise<unknown>;
  put(path: string, data: Uint8Array, contentType?: string): Promise<unknown>;
  delete(path: string): Promise<void>;
  /** Collection values across `@odata.nextLink` pages, at most `limit` */
  listAll(path: string, params: QueryParams, limit: number): Promise<unknown[]>;
}

/**
 * Follow `@odata.nextLink` from `path` until `limit` items are collected.
 * The query is only sent with the first request; next links carry it.
 */
export async function collectPages(
  get: (path: string, params?: QueryParams) => Promise<unknown>,
  path: string,
  params: QueryParams,
  limit: number
): Promise<unknown[]> {
  const items: unknown[] = [];
  let next: string | undefined = path;
  let query: QueryParams | undefined = params;

  while (next !== undefined && items.length < limit) {
    const page = PageSchema.safeParse(await get(next, query));
    if (!page.success) {
      throw new GraphRequestError(`Unexpected collection response from ${next}`);
    }
    items.push(...page.data.value);
    next = page.data["@odata.nextLink"];
    query = undefined;
  }
  return items.slice(0, limit);
}

export interface HttpGraphClientOptions {
  baseUrl?: string;
  userId: string;
  tokens: TokenProvider;
  logger?: Logger;
}

export class HttpGraphClient implements GraphClient {
  private readonly http: AxiosInstance;
  private readonly logger?: Logger;

  constructor(options: HttpGraphClientOptions) {
    const base = (options.baseUrl ?? DEFAULT_GRAPH_BASE_URL).replace(/\/+$/, "");
    this.logger = options.logger;
    this.http = axios.create({
      baseURL: `${base}/users/${encodeURIComponent(options.userId)}`,
      timeout: REQUEST_TIMEOUT_MS,
    });

    this.http.interceptors.request.use(async (config) => {
      config.headers.set("Authorization", `Bearer ${await options.tokens.getToken()}`);
      this.logger?.debug("Graph request", { method: config.method, url: config.url });
      return config;
    });

    this.http.interceptors.response.use(
      (response) => response,
      (err: unknown) => Promise.reject(toGraphRequestError(err))
    );
  }

  async get(path: string, params?: QueryParams): Promise<unknown> {
    const response = await this.http.get<unknown>(path, { params });
    return response.data;
  }

  async getBinary(path: string): Promise<BinaryContent> {
    const response = await this.http.get<ArrayBuffer>(path, { responseType: "arraybuffer" });
    const contentType = response.headers["content-type"];
    return {
      data: new Uint8Array(response.data),
      contentType: typeof contentType === "string" ? contentType : undefined,
    };
  }

  async post(path: string, body?: unknown): Promise<unknown> {
    const response = await this.http.post<unknown>(path, body ?? {});
    return response.data;
  }

  async put(path: string, data: Uint8Array, contentType = "application/octet-stream"): Promise<unknown> {
    const response = await this.http.put<unknown>(path, data, {
      headers: { "Content-Type": contentType },
    });
    return response.data;
  }

  async delete(path: string): Promise<void> {
    await this.http.delete(path);
  }

  async listAll(path: string, params: QueryParams, limit: number): Promise<unknown[]> {
    return collectPages((next, query) => this.get(next, query), path, params, limit);
  }
}
