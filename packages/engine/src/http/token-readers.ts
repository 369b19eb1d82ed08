import { decodeUtf8 } from "../utils/buffer.js";
import type { ByteSource } from "./byte-source.js";
import { TokenReadError } from "./errors.js";
import { ABSENT, appendHeaderToken } from "./header-value.js";
import type { HeaderValue } from "./types.js";

const CR = 0x0d;
const LF = 0x0a;
const SP = 0x20;
const HTAB = 0x09;
const COLON = 0x3a;
const COMMA = 0x2c;
const DQUOTE = 0x22;

export const DEFAULT_MAX_TOKEN_LENGTH = 4096;

/**
 * Consumes bytes until its delimiter grammar is satisfied and returns the
 * token. Every call starts from a clean state.
 */
export interface TokenReader<T> {
  read(source: ByteSource): Promise<T>;
}

/** Fixed-capacity scratch buffer; pushing past capacity fails. */
class TokenBuffer {
  private readonly bytes: Uint8Array;
  private length = 0;

  constructor(readonly capacity: number) {
    this.bytes = new Uint8Array(capacity);
  }

  get size(): number {
    return this.length;
  }

  reset(): void {
    this.length = 0;
  }

  push(byte: number): void {
    if (this.length >= this.capacity) {
      throw new TokenReadError(
        "TOKEN_TOO_LONG",
        `Token exceeds ${this.capacity} bytes`,
      );
    }
    this.bytes[this.length++] = byte;
  }

  toBytes(): Uint8Array {
    return this.bytes.slice(0, this.length);
  }
}

function unexpected(byte: number, context: string): TokenReadError {
  const hex = byte.toString(16).padStart(2, "0");
  return new TokenReadError("UNEXPECTED_BYTE", `Unexpected 0x${hex}: ${context}`);
}

/** Reads up to (not including) a single SP. */
export class SpaceReader implements TokenReader<Uint8Array> {
  private readonly buffer: TokenBuffer;

  constructor(maxTokenLength = DEFAULT_MAX_TOKEN_LENGTH) {
    this.buffer = new TokenBuffer(maxTokenLength);
  }

  async read(source: ByteSource): Promise<Uint8Array> {
    this.buffer.reset();
    while (true) {
      const byte = await source.readByte();
      if (byte === SP) {
        return this.buffer.toBytes();
      }
      this.buffer.push(byte);
    }
  }
}

/** Reads up to CRLF. A lone CR or LF is rejected. */
export class LineReader implements TokenReader<Uint8Array> {
  private readonly buffer: TokenBuffer;
  private sawCR = false;

  constructor(maxTokenLength = DEFAULT_MAX_TOKEN_LENGTH) {
    this.buffer = new TokenBuffer(maxTokenLength);
  }

  async read(source: ByteSource): Promise<Uint8Array> {
    this.buffer.reset();
    this.sawCR = false;

    while (true) {
      const byte = await source.readByte();
      if (this.sawCR) {
        if (byte !== LF) {
          throw unexpected(byte, "expected LF after CR");
        }
        return this.buffer.toBytes();
      }
      if (byte === CR) {
        this.sawCR = true;
      } else if (byte === LF) {
        throw unexpected(byte, "LF without preceding CR");
      } else {
        this.buffer.push(byte);
      }
    }
  }
}

/**
 * Reads a header name up to ':'. A CRLF before any name byte yields an empty
 * token, which marks the end of the header block.
 */
export class HeaderKeyReader implements TokenReader<Uint8Array> {
  private readonly buffer: TokenBuffer;

  constructor(maxTokenLength = DEFAULT_MAX_TOKEN_LENGTH) {
    this.buffer = new TokenBuffer(maxTokenLength);
  }

  async read(source: ByteSource): Promise<Uint8Array> {
    this.buffer.reset();

    while (true) {
      const byte = await source.readByte();
      switch (byte) {
        case COLON:
          if (this.buffer.size === 0) {
            throw unexpected(byte, "empty header name");
          }
          return this.buffer.toBytes();
        case CR: {
          const next = await source.readByte();
          if (next !== LF) {
            throw unexpected(next, "expected LF after CR");
          }
          if (this.buffer.size > 0) {
            throw unexpected(CR, "header line has no ':'");
          }
          return this.buffer.toBytes();
        }
        case LF:
          throw unexpected(byte, "LF without preceding CR");
        default:
          this.buffer.push(byte);
      }
    }
  }
}

export type HeaderValueState =
  | "optional-whitespace"
  | "token"
  | "token-delimiter"
  | "quoted-string"
  | "cr";

/**
 * Header value grammar: optional leading whitespace, comma-separated tokens,
 * double-quoted spans in which SP and ',' are literal, terminated by CRLF.
 * One token gives a single value, any comma gives a multi value.
 */
export class HeaderValueReader implements TokenReader<HeaderValue> {
  private readonly buffer: TokenBuffer;
  private state: HeaderValueState = "optional-whitespace";
  private value: HeaderValue = ABSENT;

  constructor(maxTokenLength = DEFAULT_MAX_TOKEN_LENGTH) {
    this.buffer = new TokenBuffer(maxTokenLength);
  }

  async read(source: ByteSource): Promise<HeaderValue> {
    this.buffer.reset();
    this.state = "optional-whitespace";
    this.value = ABSENT;

    while (true) {
      const byte = await source.readByte();

      if (this.state === "cr") {
        if (byte !== LF) {
          throw unexpected(byte, "expected LF after CR");
        }
        break;
      }

      if (this.state === "quoted-string") {
        if (byte === DQUOTE) {
          this.state = "token";
        } else if (byte === CR || byte === LF) {
          throw unexpected(byte, "unterminated quoted string");
        } else {
          this.buffer.push(byte);
        }
        continue;
      }

      switch (byte) {
        case CR:
          if (this.state !== "token") {
            throw unexpected(byte, "CR must directly follow a token");
          }
          this.state = "cr";
          break;
        case LF:
          throw unexpected(byte, "LF without preceding CR");
        case SP:
        case HTAB:
          if (this.state === "token") {
            this.state = "token-delimiter";
          }
          break;
        case COMMA:
          this.closeToken();
          this.state = "token-delimiter";
          break;
        case DQUOTE:
          this.state = "quoted-string";
          break;
        default:
          this.state = "token";
          this.buffer.push(byte);
      }
    }

    if (this.buffer.size > 0) {
      this.closeToken();
    }
    return this.value;
  }

  private closeToken(): void {
    const text = decodeUtf8(this.buffer.toBytes());
    if (text === null) {
      throw new TokenReadError("INVALID_TEXT", "Header value is not UTF-8");
    }
    this.buffer.reset();
    this.value = appendHeaderToken(this.value, text.trim());
  }
}

/** Reads exactly `length` bytes with no delimiter interpretation. */
export class FixedLengthReader implements TokenReader<Uint8Array> {
  constructor(readonly length: number) {}

  async read(source: ByteSource): Promise<Uint8Array> {
    const out = new Uint8Array(this.length);
    for (let i = 0; i < this.length; i++) {
      out[i] = await source.readByte();
    }
    return out;
  }
}
