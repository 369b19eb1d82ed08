import type { DuplicateHeaderPolicy } from "../config/parser-config.js";
import { decodeUtf8 } from "../utils/buffer.js";
import type { ByteSource } from "./byte-source.js";
import { HttpParseError, withProduction } from "./errors.js";
import { mergeHeaderValues } from "./header-value.js";
import {
  DEFAULT_MAX_TOKEN_LENGTH,
  HeaderKeyReader,
  HeaderValueReader,
} from "./token-readers.js";
import type { HeaderMap } from "./types.js";

export interface ReadHeadersOptions {
  maxTokenLength?: number;
  maxHeaderCount?: number;
  duplicateHeaders?: DuplicateHeaderPolicy;
}

/**
 * Reads `KEY ":" VALUE CRLF` lines up to and including the blank line.
 */
export async function readHeaders(
  source: ByteSource,
  options?: ReadHeadersOptions,
): Promise<HeaderMap> {
  const maxTokenLength = options?.maxTokenLength ?? DEFAULT_MAX_TOKEN_LENGTH;
  const maxHeaderCount = options?.maxHeaderCount ?? 256;
  const duplicateHeaders = options?.duplicateHeaders ?? "overwrite";

  const keyReader = new HeaderKeyReader(maxTokenLength);
  const valueReader = new HeaderValueReader(maxTokenLength);
  const headers: HeaderMap = new Map();
  let lineCount = 0;

  return withProduction(
    "MALFORMED_HEADER_LINE",
    "Malformed header line",
    async () => {
      while (true) {
        const keyBytes = await keyReader.read(source);
        if (keyBytes.length === 0) {
          return headers;
        }

        lineCount++;
        if (lineCount > maxHeaderCount) {
          throw new HttpParseError(
            "MALFORMED_HEADER_LINE",
            `More than ${maxHeaderCount} header lines`,
          );
        }

        const key = decodeUtf8(keyBytes);
        if (key === null) {
          throw new HttpParseError(
            "MALFORMED_HEADER_LINE",
            "Header name is not valid UTF-8",
          );
        }

        const value = await valueReader.read(source);
        const previous = headers.get(key);
        if (previous && duplicateHeaders === "combine") {
          headers.set(key, mergeHeaderValues(previous, value));
        } else {
          headers.set(key, value);
        }
      }
    },
  );
}
