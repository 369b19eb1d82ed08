import { decodeToString } from "../utils/buffer.js";
import type { HeaderMap, HttpRequest, HttpResponse } from "./types.js";

export type DescribedHeaderValue = string | string[] | null;

export interface RequestDescription {
  method: string;
  resource: string;
  version: string;
  headers: Record<string, DescribedHeaderValue>;
  body: string | null;
}

export interface ResponseDescription {
  version: string;
  statusCode: number;
  reason: string;
  headers: Record<string, DescribedHeaderValue>;
  body: string | null;
}

/**
 * Header names become own keys, including names such as "__proto__" that a
 * plain assignment would treat as the prototype.
 */
export function describeHeaders(
  headers: HeaderMap,
): Record<string, DescribedHeaderValue> {
  const entries: Array<[string, DescribedHeaderValue]> = [];
  for (const [name, value] of headers) {
    switch (value.kind) {
      case "absent":
        entries.push([name, null]);
        break;
      case "single":
        entries.push([name, value.value]);
        break;
      case "multi":
        entries.push([name, [...value.values]]);
        break;
    }
  }
  return Object.fromEntries(entries);
}

function describeBody(body: Uint8Array | undefined): string | null {
  return body ? decodeToString(body) : null;
}

export function describeRequest(request: HttpRequest): RequestDescription {
  return {
    method: request.method,
    resource: request.resource,
    version: request.version,
    headers: describeHeaders(request.headers),
    body: describeBody(request.body),
  };
}

export function describeResponse(response: HttpResponse): ResponseDescription {
  return {
    version: response.version,
    statusCode: response.statusCode,
    reason: response.reason,
    headers: describeHeaders(response.headers),
    body: describeBody(response.body),
  };
}
