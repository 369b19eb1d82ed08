import type { ITcpSocket } from "../interfaces/socket.js";
import { readResponse, type ReadResponseOptions } from "./message-reader.js";
import { sendRequest } from "./message-writer.js";
import { SocketByteSource } from "./socket-byte-source.js";
import type { HttpRequestOptions, HttpResponse } from "./types.js";

export interface ExchangeOptions extends Omit<ReadResponseOptions, "requestMethod"> {
  idleTimeoutMs?: number;
}

/**
 * Write one request on a connected socket and read the response to it.
 * The socket is left open; closing it is up to the caller.
 */
export function exchange(
  socket: ITcpSocket,
  request: HttpRequestOptions,
  options?: ExchangeOptions,
): Promise<HttpResponse> {
  const { idleTimeoutMs, ...parserOptions } = options ?? {};
  const source = new SocketByteSource(socket, { idleTimeoutMs });
  sendRequest(socket, request);
  return readResponse(source, {
    ...parserOptions,
    requestMethod: request.method,
  });
}
