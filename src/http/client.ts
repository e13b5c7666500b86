import type { Logger } from "../util/logger.js";
import { redactSecrets } from "../util/redact.js";

export type FetchFn = (input: URL, init: RequestInit) => Promise<Response>;

export interface HttpClientOptions {
  timeoutMs: number;
  logger: Logger;
  userAgent?: string;
  retryDelayMs?: number; // first backoff delay, doubled on each retry (default: 250)
  fetch?: FetchFn;
}

export class HttpError extends Error {
  constructor(public status: number, message: string, public body?: unknown) {
    super(message);
    this.name = "HttpError";
  }
}

export type UpstreamFailure = "timeout" | "network" | "malformed";

export class UpstreamError extends Error {
  constructor(public reason: UpstreamFailure, message: string) {
    super(message);
    this.name = "UpstreamError";
  }
}

const DEFAULT_USER_AGENT = "weather-lookup-service";
// Total attempts for 429/5xx responses
const MAX_ATTEMPTS = 3;

export class HttpClient {
  private readonly userAgent: string;
  private readonly fetchFn: FetchFn;

  constructor(private opts: HttpClientOptions) {
    this.userAgent = opts.userAgent ?? DEFAULT_USER_AGENT;
    this.fetchFn = opts.fetch ?? ((input, init) => fetch(input, init));
  }

  async getJson(url: URL): Promise<unknown> {
    const display = redactSecrets(url.toString());
    this.opts.logger.debug(`HTTP GET ${display}`);

    const attempt = async (): Promise<unknown> => {
      const controller = new AbortController();
      const timeout = setTimeout(() => controller.abort(), this.opts.timeoutMs);
      // The timeout covers the body as well as the headers
      const fail = (e: unknown): UpstreamError => {
        if (controller.signal.aborted) {
          const msg = `Request timeout after ${this.opts.timeoutMs}ms for GET ${display}`;
          this.opts.logger.error(msg);
          return new UpstreamError("timeout", msg);
        }
        const msg = `Network error for GET ${display}: ${describeError(e)}`;
        this.opts.logger.error(msg);
        return new UpstreamError("network", msg);
      };
      try {
        let res: Response;
        try {
          res = await this.fetchFn(url, {
            method: "GET",
            headers: {
              Accept: "application/json",
              "User-Agent": this.userAgent,
            },
            signal: controller.signal,
          });
        } catch (e: unknown) {
          throw fail(e);
        }

        this.opts.logger.debug(`HTTP GET ${display} -> ${res.status} ${res.statusText}`);

        if (!res.ok) {
          const text = await safeText(res);
          this.opts.logger.error(`HTTP ${res.status} ${res.statusText} for GET ${display}: ${text}`);
          throw new HttpError(res.status, `HTTP ${res.status} ${res.statusText}`.trim(), safeJson(text));
        }

        let text: string;
        try {
          text = await res.text();
        } catch (e: unknown) {
          throw fail(e);
        }
        try {
          const parsed: unknown = JSON.parse(text);
          return parsed;
        } catch {
          throw new UpstreamError("malformed", `Upstream returned a non-JSON body for GET ${display}`);
        }
      } finally {
        clearTimeout(timeout);
      }
    };

    return withRetries(attempt, this.opts.logger, display, "GET", this.opts.retryDelayMs);
  }
}

async function withRetries<T>(fn: () => Promise<T>, logger: Logger, url: string, method: string, initialDelayMs = 250): Promise<T> {
  let attempt = 0;
  let delay = initialDelayMs;
  // eslint-disable-next-line no-constant-condition
  while (true) {
    try {
      return await fn();
    } catch (e: unknown) {
      const status = e instanceof HttpError ? e.status : undefined;
      if (attempt < MAX_ATTEMPTS - 1 && status !== undefined && (status === 429 || status >= 500)) {
        attempt++;
        logger.info(`Retrying ${method} ${url} (attempt ${attempt}/${MAX_ATTEMPTS - 1}) after ${delay}ms due to ${status}`);
        await new Promise((r) => setTimeout(r, delay));
        delay *= 2;
        continue;
      }
      if (attempt > 0) {
        logger.error(`Request failed after ${attempt + 1} attempts: ${method} ${url}`);
      }
      throw e;
    }
  }
}

function describeError(e: unknown): string {
  if (e instanceof Error) {
    return e.cause ? `${e.message} (${String(e.cause)})` : e.message;
  }
  return String(e);
}

async function safeText(res: Response): Promise<string> {
  try {
    return await res.text();
  } catch {
    return "";
  }
}

function safeJson(text: string): unknown {
  try {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch {
    return text;
  }
}
