import { request as httpRequest } from "node:http";
import { request as httpsRequest } from "node:https";
import { URL } from "node:url";

export interface HttpRequestOptions {
  readonly headers?: Record<string, string | number | undefined>;
  readonly timeoutMs?: number;
}

export interface HttpResponse {
  readonly statusCode: number;
  readonly body: string;
  readonly headers: Record<string, string | string[] | undefined>;
}

export interface HttpClient {
  get(url: string, options?: HttpRequestOptions): Promise<HttpResponse>;
  post(url: string, body: string, options?: HttpRequestOptions): Promise<HttpResponse>;
}

const send = (
  method: "GET" | "POST",
  url: string,
  body: string | undefined,
  options: HttpRequestOptions,
): Promise<HttpResponse> => {
  const target = new URL(url);
  const requestFactory = target.protocol === "http:" ? httpRequest : httpsRequest;
  const headers: Record<string, string | number> = {};
  for (const [name, value] of Object.entries(options.headers ?? {})) {
    if (value !== undefined) {
      headers[name] = value;
    }
  }
  if (body !== undefined) {
    headers["Content-Length"] = Buffer.byteLength(body, "utf-8");
  }

  return new Promise<HttpResponse>((resolve, reject) => {
    const req = requestFactory(
      {
        method,
        hostname: target.hostname,
        path: `${target.pathname}${target.search}`,
        port: target.port || undefined,
        headers,
      },
      (res) => {
        const chunks: Buffer[] = [];
        res.on("data", (chunk: Buffer) => {
          chunks.push(chunk);
        });
        res.on("end", () => {
          resolve({
            statusCode: res.statusCode ?? 0,
            body: Buffer.concat(chunks).toString("utf-8"),
            headers: res.headers,
          });
        });
        res.on("error", (error) => reject(error));
      },
    );

    req.on("error", (error) => reject(error));

    if (options.timeoutMs) {
      req.setTimeout(options.timeoutMs, () => {
        req.destroy(new Error("request timed out"));
      });
    }

    if (body !== undefined) {
      req.write(body);
    }
    req.end();
  });
};

/**
 * Minimal HTTP client wrapper so sources and sinks can be tested without real network calls.
 */
export const createHttpClient = (): HttpClient => {
  return {
    get: (url, options = {}) => send("GET", url, undefined, options),
    post: (url, body, options = {}) => send("POST", url, body, options),
  };
};
