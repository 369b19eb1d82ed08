/** One code per grammar production that can fail. */
export type HttpParseErrorCode =
  | "METHOD_PARSE_ERROR"
  | "RESOURCE_PARSE_ERROR"
  | "VERSION_PARSE_ERROR"
  | "MALFORMED_HEADER_LINE"
  | "BODY_PARSING_ERROR"
  | "STATUS_CODE_PARSE_ERROR"
  | "STATUS_REASON_PARSE_ERROR";

export class HttpParseError extends Error {
  constructor(
    readonly code: HttpParseErrorCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "HttpParseError";
  }
}

export type TokenReadErrorCode =
  | "TOKEN_TOO_LONG"
  | "UNEXPECTED_BYTE"
  | "INVALID_TEXT";

/**
 * Raised by token readers. Line and header readers attach it as the cause
 * of the HttpParseError for the production being read.
 */
export class TokenReadError extends Error {
  constructor(
    readonly code: TokenReadErrorCode,
    message: string,
  ) {
    super(message);
    this.name = "TokenReadError";
  }
}

export type ByteSourceErrorCode = "END_OF_STREAM" | "TIMEOUT" | "IO_ERROR";

export class ByteSourceError extends Error {
  constructor(
    readonly code: ByteSourceErrorCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "ByteSourceError";
  }
}

/**
 * Run one production step, converting any lower-level failure into an
 * HttpParseError carrying `code`. HttpParseErrors pass through untouched.
 */
export async function withProduction<T>(
  code: HttpParseErrorCode,
  message: string,
  step: () => Promise<T>,
): Promise<T> {
  try {
    return await step();
  } catch (err) {
    if (err instanceof HttpParseError) {
      throw err;
    }
    const detail = err instanceof Error ? `: ${err.message}` : "";
    throw new HttpParseError(code, `${message}${detail}`, { cause: err });
  }
}

/** The underlying byte source failure, if that is what ended the parse. */
export function sourceFailureOf(err: unknown): ByteSourceError | null {
  if (err instanceof ByteSourceError) return err;
  if (err instanceof HttpParseError && err.cause instanceof ByteSourceError) {
    return err.cause;
  }
  return null;
}
