import { executeBatch, type BatchItem, type BatchResponse } from "./batch.js";
import { failureFromResponse, nonJsonFailure } from "./errors.js";
import { DEFAULT_RETRY_POLICY, withRetry, type RetryListener, type RetryPolicy } from "./retry.js";
import { UndiciTransport, type GraphTransport, type HttpMethod } from "./transport.js";
import type { GraphParams, JsonValue, MetaConfig } from "./types.js";
import { toGraphParams } from "./utils.js";

export type MetaApiOptions = {
  transport?: GraphTransport;
  /** Overrides for the policy derived from config (tests pass unitMs: 0). */
  retry?: Partial<RetryPolicy>;
  onRetry?: RetryListener;
};

const logRetry: RetryListener = ({ attempt, delayMs, error }) => {
  const label = error instanceof Error ? error.message : String(error);
  console.warn(`Graph API call failed (attempt ${attempt}), retrying in ${delayMs}ms: ${label}`);
};

function readPage(body: JsonValue): { data: JsonValue[]; next?: string } {
  if (typeof body !== "object" || body === null || Array.isArray(body)) return { data: [] };
  const data = Array.isArray(body.data) ? body.data : [];
  const paging = body.paging;
  if (typeof paging !== "object" || paging === null || Array.isArray(paging)) return { data };
  return { data, next: typeof paging.next === "string" ? paging.next : undefined };
}

export class MetaApi {
  private transport: GraphTransport;
  private policy: RetryPolicy;
  private onRetry: RetryListener;

  constructor(private cfg: MetaConfig, options: MetaApiOptions = {}) {
    this.transport = options.transport ?? new UndiciTransport(cfg.requestTimeoutMs);
    this.policy = {
      ...DEFAULT_RETRY_POLICY,
      maxAttempts: cfg.maxRetries,
      unitMs: cfg.retryUnitMs,
      ...options.retry,
    };
    this.onRetry = options.onRetry ?? logRetry;
  }

  baseUrl(): string {
    const v = this.cfg.apiVersion || "v22.0";
    return `${this.cfg.graphUrl.replace(/\/+$/, "")}/${v}`;
  }

  private resolve(path: string): URL {
    if (/^https?:\/\//.test(path)) return new URL(path);
    return new URL(this.baseUrl() + (path.startsWith("/") ? path : `/${path}`));
  }

  // The credential rides on every physical call and is never echoed back to tools.
  private withAuth(params: GraphParams): Record<string, string> {
    return { ...toGraphParams(params), access_token: this.cfg.accessToken };
  }

  async get(path: string, params: GraphParams = {}): Promise<JsonValue> {
    const url = this.resolve(path);
    for (const [k, v] of Object.entries(this.withAuth(params))) url.searchParams.set(k, v);
    return this.call("GET", url.toString());
  }

  async post(path: string, data: GraphParams = {}): Promise<JsonValue> {
    const body = new URLSearchParams(this.withAuth(data)).toString();
    return this.call("POST", this.resolve(path).toString(), body);
  }

  async getAllPages(path: string, params: GraphParams = {}): Promise<JsonValue[]> {
    const out: JsonValue[] = [];
    let page = readPage(await this.get(path, params));
    // paginate; `next` already carries the token and cursor
    while (true) {
      out.push(...page.data);
      if (!page.next) break;
      page = readPage(await this.call("GET", page.next));
    }
    return out;
  }

  /** Runs GET sub-requests through the batch endpoint, 50 per physical call. */
  async batch(items: BatchItem[]): Promise<(BatchResponse | null)[]> {
    return executeBatch(this, items);
  }

  private call(method: HttpMethod, url: string, body?: string): Promise<JsonValue> {
    const headers = body != null ? { "content-type": "application/x-www-form-urlencoded" } : undefined;

    return withRetry(
      this.policy,
      async () => {
        const res = await this.transport.send({ method, url, body, headers });

        let parsed: JsonValue;
        try {
          parsed = JSON.parse(res.text);
        } catch {
          throw nonJsonFailure(res.status, res.text);
        }

        if (res.status < 200 || res.status >= 300) {
          const failure = failureFromResponse(res.status, parsed, this.cfg.errorTable);
          if (failure) throw failure;
        }
        return parsed;
      },
      this.onRetry
    );
  }
}
