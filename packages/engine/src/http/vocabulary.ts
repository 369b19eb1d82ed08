import { bytesEqual, fromString } from "../utils/buffer.js";
import {
  HTTP_METHODS,
  HTTP_VERSIONS,
  type HttpMethod,
  type HttpVersion,
} from "./types.js";

const METHOD_LITERALS: Array<[Uint8Array, HttpMethod]> = HTTP_METHODS.map(
  (method) => [fromString(method), method],
);

// "Http/2.0" is the spelling older peers of this parser emitted; both are taken.
const VERSION_LITERALS: Array<[Uint8Array, HttpVersion]> = [
  [fromString("HTTP/0.9"), "0.9"],
  [fromString("HTTP/1.0"), "1.0"],
  [fromString("HTTP/1.1"), "1.1"],
  [fromString("HTTP/2.0"), "2.0"],
  [fromString("Http/2.0"), "2.0"],
];

/** Exact, case-sensitive match against the nine known methods. */
export function parseMethod(token: Uint8Array): HttpMethod | null {
  for (const [literal, method] of METHOD_LITERALS) {
    if (bytesEqual(token, literal)) return method;
  }
  return null;
}

export function parseVersion(token: Uint8Array): HttpVersion | null {
  for (const [literal, version] of VERSION_LITERALS) {
    if (bytesEqual(token, literal)) return version;
  }
  return null;
}

export function isHttpMethod(value: string): value is HttpMethod {
  return HTTP_METHODS.some((method) => method === value);
}

export function isHttpVersion(value: string): value is HttpVersion {
  return HTTP_VERSIONS.some((version) => version === value);
}

export function formatVersion(version: HttpVersion): string {
  return `HTTP/${version}`;
}

/** Negative, zero or positive as `a` is older than, equal to or newer than `b`. */
export function compareVersions(a: HttpVersion, b: HttpVersion): number {
  return HTTP_VERSIONS.indexOf(a) - HTTP_VERSIONS.indexOf(b);
}
