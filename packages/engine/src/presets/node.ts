import { NodeSocketFactory } from "../adapters/node/node-socket.js";
import type { ServerConfig } from "../config/server-config.js";
import type { Logger } from "../logging/logger.js";
import { InspectServer } from "../server/inspect-server.js";

export interface NodeServerOptions {
  config: ServerConfig;
  logger?: Logger;
}

export function createNodeServer(options: NodeServerOptions): InspectServer {
  return new InspectServer({
    socketFactory: new NodeSocketFactory(),
    config: options.config,
    logger: options.logger,
  });
}
