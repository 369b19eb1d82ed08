import type { ITcpSocket } from "../interfaces/socket.js";
import { concat, fromString } from "../utils/buffer.js";
import type {
  HttpRequestOptions,
  HttpResponseOptions,
  OutgoingHeaders,
} from "./types.js";
import { formatVersion } from "./vocabulary.js";

/**
 * Wire bytes for a request. Adds Content-Length when there is a body and
 * Connection: close unless the caller set one.
 */
export function serializeRequest(request: HttpRequestOptions): Uint8Array {
  const headers = normalizeHeaders(request.headers);
  const body = request.body;

  if (body && !hasHeader(headers, "content-length")) {
    headers.set("Content-Length", String(body.length));
  }
  if (!hasHeader(headers, "connection")) {
    headers.set("Connection", "close");
  }

  const startLine = `${request.method} ${request.resource} ${formatVersion(request.version ?? "1.1")}`;
  const head = buildHeadBytes(startLine, headers);
  return body ? concat([head, body]) : head;
}

/**
 * Wire bytes for a response. Content-Length is always present (0 without a
 * body), as is Connection.
 */
export function serializeResponse(response: HttpResponseOptions): Uint8Array {
  const headers = normalizeHeaders(response.headers);
  const body = response.body ?? new Uint8Array(0);

  if (!hasHeader(headers, "content-length")) {
    headers.set("Content-Length", String(body.length));
  }
  if (!hasHeader(headers, "connection")) {
    headers.set("Connection", "close");
  }

  const startLine = `${formatVersion(response.version ?? "1.1")} ${response.status} ${response.statusText}`;
  return concat([buildHeadBytes(startLine, headers), body]);
}

export function sendRequest(
  socket: ITcpSocket,
  request: HttpRequestOptions,
): void {
  socket.send(serializeRequest(request));
}

/**
 * Send a complete HTTP response (headers + body) over a socket.
 */
export function sendResponse(
  socket: ITcpSocket,
  response: HttpResponseOptions,
): void {
  socket.send(serializeResponse(response));
}

function buildHeadBytes(
  startLine: string,
  headers: Map<string, string>,
): Uint8Array {
  const lines: string[] = [startLine];
  for (const [key, value] of headers) {
    lines.push(`${key}: ${value}`);
  }
  lines.push("", ""); // \r\n\r\n
  return fromString(lines.join("\r\n"));
}

function hasHeader(headers: Map<string, string>, lowerName: string): boolean {
  for (const key of headers.keys()) {
    if (key.toLowerCase() === lowerName) return true;
  }
  return false;
}

function normalizeHeaders(headers?: OutgoingHeaders): Map<string, string> {
  if (!headers) return new Map();
  if (headers instanceof Map) return new Map(headers);
  return new Map(Object.entries(headers));
}
