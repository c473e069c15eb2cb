import type {
  PingResult,
  StatementResponse,
  StatementResult,
  TimeSeriesClient,
  WriteBatchParams
} from "../../ports/TimeSeriesClient";

export type InfluxClientOptions = {
  url: string;
  username: string;
  password: string;
  apiVersion: string;
  timeoutMs: number;
};

export class InfluxRequestError extends Error {
  readonly status?: number;
  readonly isTimeout: boolean;
  readonly requestUrl: string;
  readonly cause?: unknown;

  constructor(args: { message: string; requestUrl: string; status?: number; isTimeout?: boolean; cause?: unknown }) {
    super(args.message);
    this.name = "InfluxRequestError";
    this.status = args.status;
    this.isTimeout = args.isTimeout ?? false;
    this.requestUrl = args.requestUrl;
    this.cause = args.cause;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null;

const parseJson = (text: string): unknown => {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
};

export const parseStatementResponse = (text: string): StatementResponse | undefined => {
  const json = parseJson(text);
  if (!isRecord(json) || Array.isArray(json)) return undefined;

  const results: StatementResult[] = Array.isArray(json.results)
    ? json.results.map((result) =>
        isRecord(result) && typeof result.error === "string" ? { error: result.error } : {}
      )
    : [];

  return typeof json.error === "string" ? { results, error: json.error } : { results };
};

const extractServerError = (text: string): string | undefined => {
  const json = parseJson(text);
  if (isRecord(json) && typeof json.error === "string") return json.error;
  const trimmed = text.trim();
  return trimmed === "" ? undefined : trimmed;
};

const toMessage = (err: unknown): string => (err instanceof Error ? err.message : String(err));

/**
 * HTTP adapter for the InfluxDB query/write API using native fetch (Node 20).
 * Requests are attempted once; callers decide what a failure means.
 */
export class InfluxHttpClient implements TimeSeriesClient {
  constructor(private readonly options: InfluxClientOptions) {}

  get endpoint(): string {
    const url = new URL(this.options.url);
    return `${url.origin}${url.pathname}`;
  }

  async ping(): Promise<PingResult> {
    const url = this.buildUrl("ping", {});
    const res = await this.send(url, { method: "GET" });
    await res.text().catch(() => "");

    if (!res.ok) {
      throw new InfluxRequestError({
        message: `Influx ping failed: ${res.status}`,
        status: res.status,
        requestUrl: this.safeUrl(url)
      });
    }

    const version = res.headers.get("x-influxdb-version");
    return version ? { version } : {};
  }

  async executeStatement(statement: string, database: string): Promise<StatementResponse> {
    const url = this.buildUrl("query", { q: statement, db: database });
    const res = await this.send(url, { method: "GET" });
    const text = await this.readBody(res, url);

    const response = parseStatementResponse(text);
    if (!response) {
      throw new InfluxRequestError({
        message: `Influx query returned a non-JSON body: ${res.status}`,
        status: res.status,
        requestUrl: this.safeUrl(url)
      });
    }
    if (!res.ok && response.error == null && response.results.every((result) => result.error == null)) {
      throw new InfluxRequestError({
        message: `Influx query failed: ${res.status}`,
        status: res.status,
        requestUrl: this.safeUrl(url)
      });
    }

    return response;
  }

  async writeBatch(params: WriteBatchParams): Promise<void> {
    const url = this.buildUrl("write", {
      db: params.database,
      rp: params.retentionPolicy,
      precision: params.precision,
      consistency: params.consistency
    });
    const res = await this.send(url, {
      method: "POST",
      headers: { "content-type": "text/plain; charset=utf-8" },
      body: params.lines
    });

    if (!res.ok) {
      const serverError = extractServerError(await res.text().catch(() => ""));
      throw new InfluxRequestError({
        message: serverError ? `Influx write failed: ${res.status}: ${serverError}` : `Influx write failed: ${res.status}`,
        status: res.status,
        requestUrl: this.safeUrl(url)
      });
    }
    await res.text().catch(() => "");
  }

  private buildUrl(path: string, params: Record<string, string>): URL {
    const url = new URL(this.options.url);
    url.pathname = url.pathname.endsWith("/") ? `${url.pathname}${path}` : `${url.pathname}/${path}`;
    for (const [key, value] of Object.entries(params)) {
      if (value !== "") url.searchParams.set(key, value);
    }
    return url;
  }

  // Statements may carry passwords, so logged URLs never include the query string.
  private safeUrl(url: URL): string {
    return `${url.origin}${url.pathname}`;
  }

  private headers(extra: Record<string, string> = {}): Record<string, string> {
    const headers: Record<string, string> = {
      "user-agent": `dump-importer/${this.options.apiVersion}`,
      ...extra
    };
    if (this.options.username !== "") {
      const token = Buffer.from(`${this.options.username}:${this.options.password}`).toString("base64");
      headers.authorization = `Basic ${token}`;
    }
    return headers;
  }

  private async send(url: URL, init: { method: string; headers?: Record<string, string>; body?: string }): Promise<Response> {
    const { timeoutMs } = this.options;
    const controller = new AbortController();
    const timeout = timeoutMs > 0 ? setTimeout(() => controller.abort(), timeoutMs) : undefined;

    try {
      return await fetch(url.toString(), {
        method: init.method,
        headers: this.headers(init.headers),
        body: init.body,
        signal: controller.signal
      });
    } catch (err) {
      if (controller.signal.aborted) {
        throw new InfluxRequestError({
          message: `Influx request timeout after ${timeoutMs}ms`,
          isTimeout: true,
          requestUrl: this.safeUrl(url)
        });
      }
      throw new InfluxRequestError({
        message: `Influx request failed: ${toMessage(err)}`,
        requestUrl: this.safeUrl(url),
        cause: err
      });
    } finally {
      clearTimeout(timeout);
    }
  }

  private async readBody(res: Response, url: URL): Promise<string> {
    try {
      return await res.text();
    } catch (err) {
      throw new InfluxRequestError({
        message: `Influx response could not be read: ${toMessage(err)}`,
        status: res.status,
        requestUrl: this.safeUrl(url),
        cause: err
      });
    }
  }
}
