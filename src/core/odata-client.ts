import axios, { AxiosResponse } from "axios";

import { InvalidArgumentError, RateLimitExceededError, UpstreamHttpError, toTransportError } from "./errors.js";
import { SessionManager } from "./session.js";
import { HttpMethod, MonitorQueryClient, ODataPage, ODataQuery, ODataRecord, RequestOptions } from "./types.js";
import { isPlainObject, logInfo, logWarn, sleep } from "./utils.js";

const BACKOFF_STEP_MS = 5_000;

export type ODataClientOptions = {
  maxRetries?: number;
  sleep?: (ms: number) => Promise<void>;
};

export function buildQueryParams(spec: Omit<ODataQuery, "entity">): URLSearchParams {
  const params = new URLSearchParams();
  if (spec.filter) params.append("$filter", spec.filter);
  if (spec.select && spec.select.length > 0) params.append("$select", spec.select.join(","));
  if (spec.orderby) params.append("$orderby", spec.orderby);
  if (spec.top !== undefined) params.append("$top", spec.top.toString());
  if (spec.skip !== undefined) params.append("$skip", spec.skip.toString());
  if (spec.expand && spec.expand.length > 0) params.append("$expand", spec.expand.join(","));
  if (spec.count) params.append("$count", "true");
  return params;
}

function withQuery(url: string, params: URLSearchParams): string {
  const q = params.toString();
  return q ? `${url}?${q}` : url;
}

function pathOf(url: string): string {
  return url.split("?")[0];
}

// A body without a `value` array counts as an empty page.
function toPage(data: unknown): ODataPage {
  if (!isPlainObject(data)) return { value: [] };
  const value: unknown[] = Array.isArray(data.value) ? data.value : [];
  const next = data["@odata.nextLink"];
  return typeof next === "string" && next ? { value, nextLink: next } : { value };
}

function isSuccess(status: number): boolean {
  return status >= 200 && status < 300;
}

function requireEntity(entity: string): string {
  const trimmed = typeof entity === "string" ? entity.trim() : "";
  if (!trimmed) throw new InvalidArgumentError("entity must be a non-empty string.");
  return trimmed;
}

/**
 * Read-only OData client over the shared session. Collection queries follow
 * `@odata.nextLink` until the server stops sending one; 429 responses are
 * retried after 5s, 10s, 15s, ... up to the retry budget.
 */
export class ODataClient implements MonitorQueryClient {
  readonly session: SessionManager;

  private readonly maxRetries: number;

  private readonly sleep: (ms: number) => Promise<void>;

  constructor(session: SessionManager, options: ODataClientOptions = {}) {
    this.session = session;
    this.maxRetries = options.maxRetries ?? session.config.maxRetries;
    this.sleep = options.sleep ?? sleep;
  }

  /**
   * Performs one logical request. Every non-429 response comes back as-is,
   * whatever its status; callers decide what counts as failure.
   */
  async executeWithRetry(
    method: HttpMethod,
    url: string,
    options: RequestOptions = {},
    maxRetries: number = this.maxRetries,
  ): Promise<AxiosResponse<unknown>> {
    const http = await this.session.getSession();
    // At least one request is always sent.
    const attempts = Math.max(1, Math.trunc(maxRetries));

    for (let attempt = 0; attempt < attempts; attempt++) {
      await this.session.refreshIfNeeded();

      const startedAt = Date.now();
      let response: AxiosResponse<unknown>;
      try {
        response = await http.request<unknown>({
          method,
          url,
          headers: options.headers,
          responseType: options.responseType ?? "json",
        });
      } catch (error) {
        // Error statuses arrive as rejections; the NTLM handshake runs in that path.
        if (axios.isAxiosError(error) && error.response) {
          response = error.response;
        } else {
          throw toTransportError(error, pathOf(url));
        }
      }

      logInfo("odata.request", {
        method,
        path: pathOf(url),
        status: response.status,
        attempt: attempt + 1,
        durationMs: Date.now() - startedAt,
      });

      if (response.status !== 429) return response;

      const waitMs = BACKOFF_STEP_MS * (attempt + 1);
      logWarn("odata.rateLimited", { path: pathOf(url), attempt: attempt + 1, maxRetries: attempts, waitMs });
      await this.sleep(waitMs);
    }

    throw new RateLimitExceededError(attempts);
  }

  async query(spec: ODataQuery): Promise<unknown[]> {
    const entity = requireEntity(spec.entity);
    const baseUrl = this.session.getBaseUrl();
    const results: unknown[] = [];
    const seenLinks = new Set<string>();

    let url: string | null = withQuery(`${baseUrl}/${entity}`, buildQueryParams(spec));
    let pages = 0;

    while (url) {
      const response = await this.executeWithRetry("GET", url);
      this.ensureOk(response, url);
      pages++;

      const page = toPage(response.data);
      results.push(...page.value);

      const next = page.nextLink;
      url = null;
      if (next) {
        const resolved = /^https?:\/\//i.test(next) ? next : new URL(next, `${baseUrl}/`).toString();
        if (seenLinks.has(resolved)) {
          logWarn("odata.pagination.repeatNextLink", { entity, pages });
          break;
        }
        seenLinks.add(resolved);
        url = resolved;
      }
    }

    return results;
  }

  async querySingle(entity: string, key: string | number, expand?: string[]): Promise<ODataRecord | null> {
    const name = requireEntity(entity);
    const url = withQuery(`${this.session.getBaseUrl()}/${name}(${key})`, buildQueryParams({ expand }));
    const response = await this.executeWithRetry("GET", url);

    if (response.status === 404) return null;
    this.ensureOk(response, url);
    return isPlainObject(response.data) ? response.data : null;
  }

  async aggregate(entity: string, apply: string): Promise<unknown> {
    const name = requireEntity(entity);
    const params = new URLSearchParams({ $apply: apply });
    const url = withQuery(`${this.session.getBaseUrl()}/${name}`, params);
    const response = await this.executeWithRetry("GET", url);
    this.ensureOk(response, url);
    return response.data;
  }

  async count(entity: string, filter?: string): Promise<number> {
    const name = requireEntity(entity);
    const url = withQuery(`${this.session.getBaseUrl()}/${name}/$count`, buildQueryParams({ filter }));
    const response = await this.executeWithRetry("GET", url, {
      headers: { Accept: "text/plain" },
      responseType: "text",
    });
    this.ensureOk(response, url);

    const text = String(response.data).trim();
    if (!/^-?\d+$/.test(text)) {
      throw new UpstreamHttpError(502, pathOf(url), text, `Unexpected $count response for ${name}: '${text.slice(0, 50)}'.`);
    }
    return Number.parseInt(text, 10);
  }

  private ensureOk(response: AxiosResponse<unknown>, url: string): void {
    if (isSuccess(response.status)) return;
    throw new UpstreamHttpError(response.status, pathOf(url), response.data);
  }
}
