import { Readable } from "node:stream";
import { Agent, Dispatcher, fetch } from "undici";
import { AppConfig, buildUserAgent } from "../config";

export interface HttpResponse {
  status: number;
  url: string;
  contentType: string;
  contentLength?: number;
  body: Readable;
}

export interface HttpRequestOptions {
  accept?: string;
}

/** Single GET with the run's user agent and timeouts. Redirects are followed. */
export type HttpGet = (url: string, options?: HttpRequestOptions) => Promise<HttpResponse>;

export type HttpClientConfig = Pick<AppConfig, "contactEmail" | "connectTimeoutMs" | "readTimeoutMs" | "ignoreHttpsErrors">;

export function createDispatcher(config: HttpClientConfig): Agent {
  return new Agent({
    connect: {
      timeout: config.connectTimeoutMs,
      rejectUnauthorized: !config.ignoreHttpsErrors,
    },
    headersTimeout: config.readTimeoutMs,
    bodyTimeout: config.readTimeoutMs,
  });
}

function parseContentLength(value: string | null): number | undefined {
  if (!value) {
    return undefined;
  }
  const parsed = Number.parseInt(value, 10);
  return Number.isFinite(parsed) ? parsed : undefined;
}

export function createHttpGet(config: HttpClientConfig, dispatcher: Dispatcher = createDispatcher(config)): HttpGet {
  const userAgent = buildUserAgent(config);

  return async (url, options) => {
    const response = await fetch(url, {
      method: "GET",
      headers: {
        "user-agent": userAgent,
        accept: options?.accept ?? "*/*",
      },
      dispatcher,
      redirect: "follow",
    });

    return {
      status: response.status,
      url: response.url || url,
      contentType: response.headers.get("content-type") ?? "",
      contentLength: parseContentLength(response.headers.get("content-length")),
      body: response.body ? Readable.fromWeb(response.body) : Readable.from([]),
    };
  };
}

export function isSuccessStatus(status: number): boolean {
  return status >= 200 && status < 300;
}

/** Releases the connection held by a response whose body will not be read. */
export function discardBody(response: HttpResponse): void {
  if (!response.body.destroyed) {
    response.body.destroy();
  }
}
