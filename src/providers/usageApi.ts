import {
  APP_VERSION,
  DEFAULT_REQUEST_TIMEOUT_MS,
  DEFAULT_USAGE_BASE_URL,
} from "../config.js";
import { errorMessage } from "../errors.js";
import { silentLogger, type Logger } from "../logger.js";
import { parseUsageResponse } from "../parsers/usageResponse.js";
import type { FetchOutcome, UsageFetcher } from "./provider.js";

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export type HttpUsageFetcherOptions = {
  baseUrl?: string;
  timeoutMs?: number;
  userAgent?: string;
  fetchImpl?: FetchLike;
  logger?: Logger;
};

export function usageUrl(baseUrl: string, organizationId: string): string {
  const base = baseUrl.replace(/\/+$/, "");
  return `${base}/api/organizations/${encodeURIComponent(organizationId)}/usage`;
}

export class HttpUsageFetcher implements UsageFetcher {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly userAgent: string;
  private readonly fetchImpl: FetchLike;
  private readonly log: Logger;

  constructor(opts: HttpUsageFetcherOptions = {}) {
    this.baseUrl = opts.baseUrl ?? DEFAULT_USAGE_BASE_URL;
    this.timeoutMs = opts.timeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
    this.userAgent = opts.userAgent ?? `meterwatch/${APP_VERSION}`;
    this.fetchImpl = opts.fetchImpl ?? ((input, init) => fetch(input, init));
    this.log = opts.logger ?? silentLogger;
  }

  async fetch(organizationId: string, sessionToken: string): Promise<FetchOutcome> {
    const url = usageUrl(this.baseUrl, organizationId);
    this.log.debug("requesting usage", { url, token: `…${sessionToken.slice(-4)}` });

    let res: Response;
    let body: string;
    try {
      res = await this.fetchImpl(url, {
        method: "GET",
        headers: {
          Accept: "application/json",
          Cookie: `sessionKey=${sessionToken}`,
          "User-Agent": this.userAgent,
        },
        signal: AbortSignal.timeout(this.timeoutMs),
      });
      body = await res.text();
    } catch (err) {
      return { ok: false, error: { kind: "network", message: errorMessage(err) } };
    }

    this.log.debug("usage response", { status: res.status, bytes: body.length });

    if (res.status === 401) return { ok: false, error: { kind: "unauthorized" } };
    if (res.status === 429) return { ok: false, error: { kind: "rate-limited" } };
    if (res.status < 200 || res.status >= 300) {
      return { ok: false, error: { kind: "server-error", status: res.status } };
    }

    const parsed = parseUsageResponse(body);
    if (!parsed.ok) {
      return { ok: false, error: { kind: "parse-error", message: parsed.message } };
    }
    return { ok: true, snapshot: parsed.snapshot };
  }
}
