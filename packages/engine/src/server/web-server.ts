import type { ServerConfig } from "../config/server-config.js";
import { validateConfig } from "../config/server-config.js";
import { errorResponse } from "../http/response.js";
import { sendResponse } from "../http/response-writer.js";
import type {
  ISocketFactory,
  ITcpServer,
  ITcpSocket,
} from "../interfaces/socket.js";
import type { Logger } from "../logging/logger.js";
import { basicLogger } from "../logging/logger.js";
import { raceWithTimeout } from "../utils/deadline.js";
import { EventEmitter } from "../utils/event-emitter.js";
import { Connection } from "./connection.js";
import type { Router } from "./router.js";

export interface WebServerOptions {
  socketFactory: ISocketFactory;
  router: Router;
  config: ServerConfig;
  logger?: Logger;
}

export type WebServerEvents = {
  listening: [port: number];
  close: [];
  error: [err: Error];
  "connection-rejected": [remoteAddress: string];
};

export class WebServer extends EventEmitter<WebServerEvents> {
  private socketFactory: ISocketFactory;
  private router: Router;
  private config: ServerConfig;
  private logger: Logger;
  private tcpServer: ITcpServer | null = null;
  private activeConnections: Set<Connection> = new Set();
  private drainWaiters: Array<() => void> = [];

  constructor(options: WebServerOptions) {
    super();
    validateConfig(options.config);
    this.socketFactory = options.socketFactory;
    this.router = options.router;
    this.config = options.config;
    this.logger = options.logger ?? basicLogger();
  }

  get activeConnectionCount(): number {
    return this.activeConnections.size;
  }

  /**
   * Bind and start accepting. Resolves with the bound port; a bind or
   * listen failure rejects, and nothing is left listening.
   */
  start(): Promise<number> {
    if (this.tcpServer) {
      return Promise.reject(new Error("Server is already started"));
    }

    this.router.seal();

    return new Promise((resolve, reject) => {
      const server = this.socketFactory.createTcpServer();
      this.tcpServer = server;

      let settled = false;

      server.on("connection", (rawSocket) => {
        this.acceptConnection(rawSocket);
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

  /**
   * Stop accepting, give in-flight connections `shutdownTimeoutMs` to
   * finish, then close whatever is left.
   */
  async stop(): Promise<void> {
    const server = this.tcpServer;
    this.tcpServer = null;

    const listenerClosed = server
      ? new Promise<void>((resolve) => server.close(() => resolve()))
      : Promise.resolve();

    if (this.activeConnections.size > 0) {
      const drained = new Promise<void>((resolve) => {
        this.drainWaiters.push(() => resolve());
      });
      const result = await raceWithTimeout(
        drained,
        this.config.shutdownTimeoutMs,
      );
      if (result.timedOut) {
        this.logger.warn(
          `Closing ${this.activeConnections.size} connection(s) still open after ${this.config.shutdownTimeoutMs}ms`,
        );
        for (const connection of this.activeConnections) {
          connection.abort();
        }
        this.activeConnections.clear();
        this.notifyDrained();
      }
    }

    await listenerClosed;
    this.emit("close");
  }

  private acceptConnection(rawSocket: unknown): void {
    let socket: ITcpSocket;
    try {
      socket = this.socketFactory.wrapTcpSocket(rawSocket);
    } catch (err) {
      this.logger.error("Could not accept connection:", err);
      return;
    }

    if (this.activeConnections.size >= this.config.maxConnections) {
      this.rejectConnection(socket).catch((err: unknown) => {
        this.logger.warn("Failed to reject connection:", err);
      });
      return;
    }

    const connection = new Connection(socket, {
      router: this.router,
      logger: this.logger,
      quiet: this.config.quiet,
      maxRequestSize: this.config.maxRequestSize,
      requestTimeoutMs: this.config.requestTimeoutMs,
      writeTimeoutMs: this.config.writeTimeoutMs,
    });
    this.activeConnections.add(connection);

    connection
      .process()
      .catch((err: unknown) => {
        this.logger.error("Unhandled connection error:", err);
      })
      .finally(() => {
        this.activeConnections.delete(connection);
        if (this.activeConnections.size === 0) {
          this.notifyDrained();
        }
      });
  }

  private async rejectConnection(socket: ITcpSocket): Promise<void> {
    const remoteAddress = socket.remoteAddress ?? "?";
    this.logger.warn(
      `Rejecting connection from ${remoteAddress}: ${this.config.maxConnections} connections already open`,
    );
    this.emit("connection-rejected", remoteAddress);
    socket.onError((err) => {
      this.logger.debug(`Error on rejected connection from ${remoteAddress}:`, err);
    });

    const response = errorResponse(503);
    response.setHeader("Connection", "close");
    try {
      await raceWithTimeout(
        sendResponse(socket, response),
        this.config.writeTimeoutMs,
      );
    } finally {
      socket.close();
    }
  }

  private notifyDrained(): void {
    const waiters = this.drainWaiters;
    this.drainWaiters = [];
    for (const waiter of waiters) {
      waiter();
    }
  }
}
