import { HttpRequestParseError } from "../http/request-parser.js";
import { HttpRequestReader } from "../http/request-reader.js";
import { errorResponse, HttpResponse } from "../http/response.js";
import { sendResponse } from "../http/response-writer.js";
import { findHeader, type HttpRequest } from "../http/types.js";
import type { ITcpSocket } from "../interfaces/socket.js";
import type { Logger } from "../logging/logger.js";
import { raceWithTimeout } from "../utils/deadline.js";
import type { Router } from "./router.js";

export type ConnectionState =
  | "accepted"
  | "reading"
  | "parsed"
  | "dispatched"
  | "responding"
  | "closed";

export interface ConnectionOptions {
  router: Router;
  logger: Logger;
  quiet: boolean;
  maxRequestSize: number;
  requestTimeoutMs: number;
  writeTimeoutMs: number;
  onStateChange?: (state: ConnectionState) => void;
}

type ReadOutcome =
  | { kind: "request"; request: HttpRequest }
  | { kind: "reject"; status: 400 | 408 | 413 }
  | { kind: "close" };

/**
 * One accepted socket, from first byte to close. `process()` never
 * rejects: every failure ends in a synthesized response or a logged,
 * abandoned connection, and the socket is always closed.
 */
export class Connection {
  private current: ConnectionState = "accepted";
  private readonly reader: HttpRequestReader;

  constructor(
    private readonly socket: ITcpSocket,
    private readonly options: ConnectionOptions,
  ) {
    // Attach before any await so no data event is missed.
    this.reader = new HttpRequestReader(socket);
  }

  get state(): ConnectionState {
    return this.current;
  }

  get remoteAddress(): string {
    return this.socket.remoteAddress ?? "?";
  }

  async process(): Promise<void> {
    try {
      this.transition("reading");
      const outcome = await this.read();
      if (outcome.kind === "close") {
        return;
      }

      let response: HttpResponse;
      if (outcome.kind === "reject") {
        response = errorResponse(outcome.status);
      } else {
        this.transition("parsed");
        response = await this.dispatch(outcome.request);
      }
      if (this.state === "closed") {
        // Aborted by shutdown while the handler ran.
        return;
      }
      this.transition("dispatched");

      this.transition("responding");
      await this.respond(response);
    } finally {
      this.abort();
    }
  }

  /** Close the socket now, wherever processing has got to. */
  abort(): void {
    try {
      this.socket.close();
    } catch (err) {
      this.options.logger.debug("Error closing socket:", err);
    }
    this.transition("closed");
  }

  private async read(): Promise<ReadOutcome> {
    try {
      const request = await this.reader.readRequest({
        maxRequestSize: this.options.maxRequestSize,
        timeoutMs: this.options.requestTimeoutMs,
      });
      return { kind: "request", request };
    } catch (err) {
      return this.classifyReadFailure(err);
    }
  }

  private classifyReadFailure(err: unknown): ReadOutcome {
    if (!(err instanceof HttpRequestParseError)) {
      this.options.logger.warn(
        `Connection from ${this.remoteAddress} failed while reading:`,
        err,
      );
      return { kind: "close" };
    }

    switch (err.code) {
      case "IDLE_TIMEOUT":
      case "CONNECTION_CLOSED":
      case "CONNECTION_CLOSED_INCOMPLETE":
        this.options.logger.debug(`${err.message} (${this.remoteAddress})`);
        return { kind: "close" };
      case "REQUEST_TIMEOUT":
        return { kind: "reject", status: 408 };
      case "REQUEST_TOO_LARGE":
        return { kind: "reject", status: 413 };
      default:
        this.options.logger.debug(
          `Malformed request from ${this.remoteAddress}: ${err.message}`,
        );
        return { kind: "reject", status: 400 };
    }
  }

  private async dispatch(request: HttpRequest): Promise<HttpResponse> {
    if (!this.options.quiet) {
      this.options.logger.info(
        `${request.method} ${request.path} - ${this.remoteAddress}`,
      );
    }

    const handler = this.options.router.dispatch(request.path);
    if (!handler) {
      return errorResponse(404);
    }

    const response = new HttpResponse();
    try {
      await handler.handle(request, response);
    } catch (err) {
      this.options.logger.error(`Handler for ${request.path} failed:`, err);
      return errorResponse(500);
    }
    return response;
  }

  private async respond(response: HttpResponse): Promise<void> {
    if (findHeader(response.headers, "connection") === undefined) {
      response.setHeader("Connection", "close");
    }

    try {
      const result = await raceWithTimeout(
        sendResponse(this.socket, response),
        this.options.writeTimeoutMs,
      );
      if (result.timedOut) {
        this.options.logger.warn(
          `Write to ${this.remoteAddress} timed out after ${this.options.writeTimeoutMs}ms`,
        );
      }
    } catch (err) {
      this.options.logger.warn(`Write to ${this.remoteAddress} failed:`, err);
    }
  }

  private transition(next: ConnectionState): void {
    if (this.current === next || this.current === "closed") return;
    this.current = next;
    this.options.onStateChange?.(next);
  }
}
