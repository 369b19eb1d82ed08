import { decodeToString, decodeUtf8 } from "../utils/buffer.js";
import type { ByteSource } from "./byte-source.js";
import { HttpParseError, withProduction } from "./errors.js";
import {
  DEFAULT_MAX_TOKEN_LENGTH,
  LineReader,
  SpaceReader,
  type TokenReader,
} from "./token-readers.js";
import type { HttpMethod, HttpVersion } from "./types.js";
import { parseMethod, parseVersion } from "./vocabulary.js";

export interface RequestLine {
  method: HttpMethod;
  resource: string;
  version: HttpVersion;
}

export interface StatusLine {
  version: HttpVersion;
  statusCode: number;
  reason: string;
}

const DIGIT_0 = 0x30;
const DIGIT_9 = 0x39;

/**
 * Three ASCII digits forming a three-digit integer (100..999).
 * Returns null for anything else, including "099".
 */
export function parseStatusCode(token: Uint8Array): number | null {
  if (token.length !== 3 || token[0] === DIGIT_0) return null;
  let code = 0;
  for (const byte of token) {
    if (byte < DIGIT_0 || byte > DIGIT_9) return null;
    code = code * 10 + (byte - DIGIT_0);
  }
  return code;
}

function printable(token: Uint8Array): string {
  return JSON.stringify(decodeToString(token));
}

async function readVersion(
  source: ByteSource,
  reader: TokenReader<Uint8Array>,
): Promise<HttpVersion> {
  return withProduction("VERSION_PARSE_ERROR", "Invalid version", async () => {
    const token = await reader.read(source);
    const version = parseVersion(token);
    if (!version) {
      throw new HttpParseError(
        "VERSION_PARSE_ERROR",
        `Unknown version ${printable(token)}`,
      );
    }
    return version;
  });
}

/** METHOD SP RESOURCE SP VERSION CRLF */
export async function readRequestLine(
  source: ByteSource,
  maxTokenLength = DEFAULT_MAX_TOKEN_LENGTH,
): Promise<RequestLine> {
  const spaceReader = new SpaceReader(maxTokenLength);

  const method = await withProduction(
    "METHOD_PARSE_ERROR",
    "Invalid method",
    async () => {
      const token = await spaceReader.read(source);
      const parsed = parseMethod(token);
      if (!parsed) {
        throw new HttpParseError(
          "METHOD_PARSE_ERROR",
          `Unknown method ${printable(token)}`,
        );
      }
      return parsed;
    },
  );

  const resource = await withProduction(
    "RESOURCE_PARSE_ERROR",
    "Invalid resource",
    async () => {
      const text = decodeUtf8(await spaceReader.read(source));
      if (text === null) {
        throw new HttpParseError(
          "RESOURCE_PARSE_ERROR",
          "Resource is not valid UTF-8",
        );
      }
      return text;
    },
  );

  const version = await readVersion(source, new LineReader(maxTokenLength));

  return { method, resource, version };
}

/** VERSION SP 3DIGIT SP REASON CRLF */
export async function readStatusLine(
  source: ByteSource,
  maxTokenLength = DEFAULT_MAX_TOKEN_LENGTH,
): Promise<StatusLine> {
  const spaceReader = new SpaceReader(maxTokenLength);

  const version = await readVersion(source, spaceReader);

  const statusCode = await withProduction(
    "STATUS_CODE_PARSE_ERROR",
    "Invalid status code",
    async () => {
      const token = await spaceReader.read(source);
      const code = parseStatusCode(token);
      if (code === null) {
        throw new HttpParseError(
          "STATUS_CODE_PARSE_ERROR",
          `Status code must be three digits, got ${printable(token)}`,
        );
      }
      return code;
    },
  );

  const reason = await withProduction(
    "STATUS_REASON_PARSE_ERROR",
    "Invalid reason phrase",
    async () => {
      const text = decodeUtf8(await new LineReader(maxTokenLength).read(source));
      if (text === null) {
        throw new HttpParseError(
          "STATUS_REASON_PARSE_ERROR",
          "Reason phrase is not valid UTF-8",
        );
      }
      return text;
    },
  );

  return { version, statusCode, reason };
}
