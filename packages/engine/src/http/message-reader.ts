import {
  type ParserConfig,
  resolveParserConfig,
} from "../config/parser-config.js";
import {
  readBody,
  resolveRequestBodyFraming,
  resolveResponseBodyFraming,
} from "./body.js";
import type { ByteSource } from "./byte-source.js";
import { readHeaders } from "./headers.js";
import { readRequestLine, readStatusLine } from "./start-line.js";
import type { HttpMethod, HttpRequest, HttpResponse } from "./types.js";

export type ReadRequestOptions = Partial<ParserConfig>;

export interface ReadResponseOptions extends Partial<ParserConfig> {
  /** Method of the request being answered; HEAD responses carry no body. */
  requestMethod?: HttpMethod;
}

/**
 * Read one request: request line, header block, then the body if the
 * headers give it a length. Fails with an HttpParseError on the first bad
 * production; the stream position is then undefined and the connection
 * should be dropped.
 */
export async function readRequest(
  source: ByteSource,
  options?: ReadRequestOptions,
): Promise<HttpRequest> {
  const config = resolveParserConfig(options);

  const { method, resource, version } = await readRequestLine(
    source,
    config.maxTokenLength,
  );
  const headers = await readHeaders(source, config);
  const framing = resolveRequestBodyFraming(method, headers, config);
  const body = await readBody(source, framing);

  const request: HttpRequest = { method, version, resource, headers };
  if (body) request.body = body;
  return request;
}

/** Response counterpart of {@link readRequest}. */
export async function readResponse(
  source: ByteSource,
  options?: ReadResponseOptions,
): Promise<HttpResponse> {
  const config = resolveParserConfig(options);

  const { version, statusCode, reason } = await readStatusLine(
    source,
    config.maxTokenLength,
  );
  const headers = await readHeaders(source, config);
  const framing = resolveResponseBodyFraming(
    statusCode,
    headers,
    config,
    options?.requestMethod,
  );
  const body = await readBody(source, framing);

  const response: HttpResponse = { version, statusCode, reason, headers };
  if (body) response.body = body;
  return response;
}
