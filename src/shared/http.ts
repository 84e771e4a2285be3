import http from "node:http";
import https from "node:https";
import { URL } from "node:url";

export type HttpMethod = "GET" | "POST";

export interface JsonRequest {
  method?: HttpMethod;
  body?: unknown;
  headers?: Record<string, string>;
  timeoutMs?: number;
}

/** Transport used by every outbound client; swapped for a fake in tests. */
export type JsonRequester = (url: URL, request?: JsonRequest) => Promise<unknown>;

export class HttpError extends Error {
  constructor(
    readonly statusCode: number | undefined,
    readonly body: string,
    label = "HTTP"
  ) {
    super(`${label} error (${statusCode ?? "unknown"}): ${body || "<empty response>"}`);
    this.name = "HttpError";
  }
}

const DEFAULT_TIMEOUT_MS = 15_000;

export const requestJson: JsonRequester = (url, request = {}) => {
  const method = request.method ?? "GET";
  const body = request.body === undefined ? undefined : JSON.stringify(request.body);

  return new Promise((resolve, reject) => {
    const options: http.RequestOptions = {
      method,
      headers: {
        Accept: "application/json",
        ...(body !== undefined
          ? { "Content-Type": "application/json", "Content-Length": String(Buffer.byteLength(body)) }
          : {}),
        ...(request.headers ?? {})
      }
    };

    const onResponse = (res: http.IncomingMessage): void => {
      const chunks: Buffer[] = [];
      res.on("data", (chunk: Buffer | string) => {
        chunks.push(typeof chunk === "string" ? Buffer.from(chunk) : chunk);
      });
      res.on("end", () => {
        const text = Buffer.concat(chunks).toString("utf8");
        if (!res.statusCode || res.statusCode < 200 || res.statusCode >= 300) {
          reject(new HttpError(res.statusCode, text));
          return;
        }
        if (!text) {
          resolve({});
          return;
        }
        try {
          resolve(JSON.parse(text));
        } catch {
          // Webhooks answer with plain text at times; a 2xx is still a success.
          resolve({ raw: text });
        }
      });
    };

    const req =
      url.protocol === "http:"
        ? http.request(url, options, onResponse)
        : https.request(url, options, onResponse);

    req.setTimeout(request.timeoutMs ?? DEFAULT_TIMEOUT_MS, () => {
      req.destroy(new Error(`Request to ${url.host} timed out`));
    });
    req.on("error", reject);
    if (body !== undefined) {
      req.write(body);
    }
    req.end();
  });
};

export function joinUrl(base: string, path: string): URL {
  const url = new URL(base);
  const prefix = url.pathname.endsWith("/") ? url.pathname.slice(0, -1) : url.pathname;
  url.pathname = `${prefix}${path}`;
  return url;
}
