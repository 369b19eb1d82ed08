export const HTTP_METHODS = [
  "GET",
  "HEAD",
  "POST",
  "PUT",
  "DELETE",
  "TRACE",
  "OPTIONS",
  "CONNECT",
  "PATCH",
] as const;

export type HttpMethod = (typeof HTTP_METHODS)[number];

/** Ordered oldest to newest. */
export const HTTP_VERSIONS = ["0.9", "1.0", "1.1", "2.0"] as const;

export type HttpVersion = (typeof HTTP_VERSIONS)[number];

export type HeaderValue =
  | { kind: "absent" }
  | { kind: "single"; value: string }
  | { kind: "multi"; values: string[] };

/** Header name (case as received) to value, in arrival order. */
export type HeaderMap = Map<string, HeaderValue>;

export interface HttpRequest {
  method: HttpMethod;
  version: HttpVersion;
  resource: string;
  headers: HeaderMap;
  body?: Uint8Array;
}

export interface HttpResponse {
  version: HttpVersion;
  statusCode: number;
  reason: string;
  headers: HeaderMap;
  body?: Uint8Array;
}

export type OutgoingHeaders = Map<string, string> | Record<string, string>;

export interface HttpRequestOptions {
  method: HttpMethod;
  resource: string;
  /** Default: "1.1" */
  version?: HttpVersion;
  headers?: OutgoingHeaders;
  body?: Uint8Array;
}

export interface HttpResponseOptions {
  status: number;
  statusText: string;
  /** Default: "1.1" */
  version?: HttpVersion;
  headers?: OutgoingHeaders;
  body?: Uint8Array;
}

export const STATUS_TEXT: Record<number, string> = {
  100: "Continue",
  101: "Switching Protocols",
  200: "OK",
  204: "No Content",
  304: "Not Modified",
  400: "Bad Request",
  404: "Not Found",
  408: "Request Timeout",
  413: "Content Too Large",
  500: "Internal Server Error",
};
