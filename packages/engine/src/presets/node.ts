import { NodeSocketFactory } from "../adapters/node/node-socket.js";
import type { ServerConfig } from "../config/server-config.js";
import type { Logger } from "../logging/logger.js";
import type { Router } from "../server/router.js";
import { WebServer } from "../server/web-server.js";

export interface NodeServerOptions {
  config: ServerConfig;
  router: Router;
  logger?: Logger;
}

export function createNodeServer(options: NodeServerOptions): WebServer {
  return new WebServer({
    socketFactory: new NodeSocketFactory(),
    router: options.router,
    config: options.config,
    logger: options.logger,
  });
}
