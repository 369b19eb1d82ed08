import type { ServerConfig } from "../config/server-config.js";
import { describeRequest } from "../http/describe.js";
import { HttpParseError, sourceFailureOf } from "../http/errors.js";
import { readRequest } from "../http/message-reader.js";
import { sendResponse } from "../http/message-writer.js";
import { SocketByteSource } from "../http/socket-byte-source.js";
import { type HttpRequest, STATUS_TEXT } from "../http/types.js";
import type {
  ISocketFactory,
  ITcpServer,
  ITcpSocket,
} from "../interfaces/socket.js";
import type { Logger } from "../logging/logger.js";
import { basicLogger } from "../logging/logger.js";
import { fromString } from "../utils/buffer.js";
import { EventEmitter } from "../utils/event-emitter.js";

export type InspectServerEvents = {
  listening: [port: number];
  request: [request: HttpRequest];
  "parse-error": [error: HttpParseError];
  error: [error: Error];
  close: [];
};

export interface InspectServerOptions {
  socketFactory: ISocketFactory;
  config: ServerConfig;
  logger?: Logger;
}

/**
 * Accepts connections, parses exactly one request from each and answers
 * with a JSON description of what was parsed. Every connection is closed
 * after its response.
 */
export class InspectServer extends EventEmitter<InspectServerEvents> {
  private socketFactory: ISocketFactory;
  private config: ServerConfig;
  private logger: Logger;
  private tcpServer: ITcpServer | null = null;
  private activeConnections: Set<ITcpSocket> = new Set();

  constructor(options: InspectServerOptions) {
    super();
    this.socketFactory = options.socketFactory;
    this.config = options.config;
    this.logger = options.logger ?? basicLogger();
  }

  start(): Promise<number> {
    if (this.tcpServer) {
      return Promise.reject(new Error("Server is already started"));
    }

    return new Promise((resolve, reject) => {
      const server = this.socketFactory.createTcpServer();
      this.tcpServer = server;

      let settled = false;

      server.on("connection", (rawSocket) => {
        const socket = this.socketFactory.wrapTcpSocket(rawSocket);
        this.handleConnection(socket).catch((err: unknown) => {
          this.logger.error("Connection handler failed:", err);
        });
      });

      server.on("error", (err) => {
        if (!settled) {
          settled = true;
          this.tcpServer = null;
          reject(err);
          return;
        }

        this.logger.error("TCP server error:", err);
        this.emit("error", err);
      });

      server.listen(this.config.port, this.config.host, () => {
        if (settled) return;
        settled = true;
        const addr = server.address();
        const port = addr?.port ?? this.config.port;
        this.emit("listening", port);
        resolve(port);
      });
    });
  }

  stop(): Promise<void> {
    return new Promise((resolve) => {
      const server = this.tcpServer;
      this.tcpServer = null;

      for (const socket of this.activeConnections) {
        socket.close();
      }
      this.activeConnections.clear();

      if (!server) {
        this.emit("close");
        resolve();
        return;
      }

      server.close(() => {
        this.emit("close");
        resolve();
      });
    });
  }

  private async handleConnection(socket: ITcpSocket): Promise<void> {
    this.activeConnections.add(socket);

    socket.onClose(() => {
      this.activeConnections.delete(socket);
    });

    socket.onError(() => {
      this.activeConnections.delete(socket);
    });

    const source = new SocketByteSource(socket, {
      idleTimeoutMs: this.config.idleTimeoutMs,
    });

    try {
      const request = await readRequest(source, this.config.parser);

      if (!this.config.quiet) {
        const addr = socket.remoteAddress ?? "?";
        this.logger.info(`${request.method} ${request.resource} - ${addr}`);
      }
      this.emit("request", request);

      sendResponse(socket, {
        status: 200,
        statusText: STATUS_TEXT[200],
        headers: { "Content-Type": "application/json" },
        body: fromString(JSON.stringify(describeRequest(request))),
      });
    } catch (err) {
      if (!(err instanceof HttpParseError)) {
        throw err;
      }
      this.emit("parse-error", err);

      const failure = sourceFailureOf(err);
      if (failure?.code === "END_OF_STREAM" || failure?.code === "IO_ERROR") {
        this.logger.debug(`Connection ended mid-request: ${err.message}`);
        return;
      }

      this.logger.warn(`Rejected request (${err.code}): ${err.message}`);
      const status = failure?.code === "TIMEOUT" ? 408 : 400;
      sendResponse(socket, {
        status,
        statusText: STATUS_TEXT[status],
        headers: { "Content-Type": "text/plain" },
        body: fromString(`${err.code}\n`),
      });
    } finally {
      socket.close();
    }
  }
}
