import type { ITcpSocket } from "../interfaces/socket.js";
import type { ByteSource } from "./byte-source.js";
import { ByteSourceError } from "./errors.js";

export interface SocketByteSourceOptions {
  /**
   * Longest wait for the next byte, in milliseconds. Unset means wait until
   * the socket delivers data, closes or errors.
   */
  idleTimeoutMs?: number;
}

/**
 * Buffers socket data and hands it out one byte at a time.
 * Listeners are attached on construction, so create it before any data can
 * arrive (before sending a request on a client socket).
 */
export class SocketByteSource implements ByteSource {
  private chunks: Uint8Array[] = [];
  private headOffset = 0;
  private closed = false;
  private socketError: Error | null = null;
  private waiters: Array<() => void> = [];
  private readonly idleTimeoutMs?: number;

  constructor(socket: ITcpSocket, options?: SocketByteSourceOptions) {
    this.idleTimeoutMs = options?.idleTimeoutMs;

    socket.onData((data) => {
      if (data.length === 0) return;
      this.chunks.push(data);
      this.notifyWaiters();
    });

    socket.onClose(() => {
      this.closed = true;
      this.notifyWaiters();
    });

    socket.onError((err) => {
      this.socketError = err;
      this.closed = true;
      this.notifyWaiters();
    });
  }

  /** Bytes received but not yet read. */
  get buffered(): number {
    let total = -this.headOffset;
    for (const chunk of this.chunks) {
      total += chunk.length;
    }
    return total;
  }

  async readByte(): Promise<number> {
    const deadline =
      this.idleTimeoutMs === undefined
        ? undefined
        : Date.now() + this.idleTimeoutMs;

    while (true) {
      const byte = this.takeByte();
      if (byte !== undefined) {
        return byte;
      }

      if (this.socketError) {
        throw new ByteSourceError("IO_ERROR", this.socketError.message, {
          cause: this.socketError,
        });
      }

      if (this.closed) {
        throw new ByteSourceError("END_OF_STREAM", "Connection closed");
      }

      const remaining =
        deadline === undefined ? undefined : deadline - Date.now();
      const hadActivity = await this.waitForActivity(remaining);
      if (!hadActivity) {
        throw new ByteSourceError("TIMEOUT", "Timed out waiting for data");
      }
    }
  }

  private takeByte(): number | undefined {
    while (this.chunks.length > 0) {
      const head = this.chunks[0];
      if (this.headOffset < head.length) {
        const byte = head[this.headOffset++];
        if (this.headOffset === head.length) {
          this.chunks.shift();
          this.headOffset = 0;
        }
        return byte;
      }
      this.chunks.shift();
      this.headOffset = 0;
    }
    return undefined;
  }

  private waitForActivity(timeoutMs: number | undefined): Promise<boolean> {
    if (timeoutMs !== undefined && timeoutMs <= 0) {
      return Promise.resolve(false);
    }

    return new Promise((resolve) => {
      let settled = false;
      let timer: ReturnType<typeof setTimeout> | undefined;

      const onActivity = () => {
        if (settled) return;
        settled = true;
        if (timer !== undefined) clearTimeout(timer);
        resolve(true);
      };

      if (timeoutMs !== undefined) {
        timer = setTimeout(() => {
          if (settled) return;
          settled = true;
          this.waiters = this.waiters.filter((waiter) => waiter !== onActivity);
          resolve(false);
        }, timeoutMs);
      }

      this.waiters.push(onActivity);
    });
  }

  private notifyWaiters(): void {
    const waiters = this.waiters;
    this.waiters = [];
    for (const waiter of waiters) {
      waiter();
    }
  }
}
