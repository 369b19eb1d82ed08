import { fromString } from "../utils/buffer.js";
import { ByteSourceError } from "./errors.js";

/**
 * The only capability the tokenizer needs from a connection: the next byte,
 * or a rejection at end of stream / on transport failure.
 */
export interface ByteSource {
  readByte(): Promise<number>;
}

/** Serves bytes from a fixed in-memory payload. */
export class BufferByteSource implements ByteSource {
  private readonly data: Uint8Array;
  private position = 0;

  constructor(data: Uint8Array | string) {
    this.data = typeof data === "string" ? fromString(data) : data;
  }

  get remaining(): number {
    return this.data.length - this.position;
  }

  async readByte(): Promise<number> {
    if (this.position >= this.data.length) {
      throw new ByteSourceError("END_OF_STREAM", "End of input");
    }
    return this.data[this.position++];
  }
}
