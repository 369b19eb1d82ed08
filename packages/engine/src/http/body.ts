import type { ByteSource } from "./byte-source.js";
import { HttpParseError, withProduction } from "./errors.js";
import { getHeader } from "./header-value.js";
import { FixedLengthReader } from "./token-readers.js";
import type { HeaderMap, HttpMethod } from "./types.js";

export type BodyFraming =
  | { kind: "none" }
  | { kind: "content-length"; length: number }
  | { kind: "transfer-encoding-window"; length: number };

export interface BodyLimits {
  maxBodySize: number;
  transferEncodingWindow: number;
}

const NO_BODY: BodyFraming = { kind: "none" };

/**
 * Non-negative decimal Content-Length. Anything else (a list, an empty
 * quoted value, signs, digits mixed with text) is not a length.
 */
export function parseContentLength(headers: HeaderMap): number | null {
  const value = getHeader(headers, "Content-Length");
  if (!value || value.kind !== "single") return null;
  if (!/^[0-9]+$/.test(value.value)) return null;
  const length = Number(value.value);
  return Number.isSafeInteger(length) ? length : null;
}

function framingFromHeaders(
  headers: HeaderMap,
  limits: BodyLimits,
): BodyFraming {
  if (getHeader(headers, "Content-Length")) {
    const length = parseContentLength(headers);
    if (length === null) return NO_BODY;
    if (length > limits.maxBodySize) {
      throw new HttpParseError(
        "BODY_PARSING_ERROR",
        `Content-Length ${length} exceeds limit of ${limits.maxBodySize} bytes`,
      );
    }
    return { kind: "content-length", length };
  }

  // Chunked framing is not decoded; a fixed window is read instead.
  if (getHeader(headers, "Transfer-Encoding")) {
    return {
      kind: "transfer-encoding-window",
      length: limits.transferEncodingWindow,
    };
  }

  return NO_BODY;
}

export function resolveRequestBodyFraming(
  method: HttpMethod,
  headers: HeaderMap,
  limits: BodyLimits,
): BodyFraming {
  if (method === "HEAD") return NO_BODY;
  return framingFromHeaders(headers, limits);
}

export function statusForbidsBody(statusCode: number): boolean {
  return (
    statusCode === 204 ||
    statusCode === 304 ||
    (statusCode >= 100 && statusCode < 200)
  );
}

export function resolveResponseBodyFraming(
  statusCode: number,
  headers: HeaderMap,
  limits: BodyLimits,
  requestMethod?: HttpMethod,
): BodyFraming {
  if (statusForbidsBody(statusCode) || requestMethod === "HEAD") {
    return NO_BODY;
  }
  return framingFromHeaders(headers, limits);
}

export async function readBody(
  source: ByteSource,
  framing: BodyFraming,
): Promise<Uint8Array | undefined> {
  if (framing.kind === "none") return undefined;
  return withProduction("BODY_PARSING_ERROR", "Failed to read body", () =>
    new FixedLengthReader(framing.length).read(source),
  );
}
