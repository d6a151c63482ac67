import type { ITcpSocket } from "../interfaces/socket.js";
import { concat } from "../utils/buffer.js";
import { HttpRequestParseError, scanRequest } from "./request-parser.js";
import type { HttpRequest } from "./types.js";

export const DEFAULT_MAX_REQUEST_SIZE = 8 * 1024; // 8KB
const DEFAULT_REQUEST_TIMEOUT_MS = 5000;

export interface ReadRequestOptions {
  /** Upper bound on head plus body, in bytes. */
  maxRequestSize?: number;
  timeoutMs?: number;
}

/**
 * Buffers one request from a socket. Data is rescanned on every chunk
 * until the head and the declared body have both arrived.
 *
 * Listeners are attached in the constructor, so create the reader before
 * anything on the connection can emit data.
 */
export class HttpRequestReader {
  private buffer: Uint8Array = new Uint8Array(0);
  private closed = false;
  private socketError: Error | null = null;
  private waiters: Array<() => void> = [];

  constructor(socket: ITcpSocket) {
    socket.onData((data) => {
      this.buffer = concat([this.buffer, data]);
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

  async readRequest(options?: ReadRequestOptions): Promise<HttpRequest> {
    const maxRequestSize = options?.maxRequestSize ?? DEFAULT_MAX_REQUEST_SIZE;
    const timeoutMs = options?.timeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
    const deadline = Date.now() + timeoutMs;

    while (true) {
      const scan = scanRequest(this.buffer);

      if (scan.status === "malformed") {
        throw scan.error;
      }

      if (scan.status === "complete") {
        if (scan.bytesConsumed > maxRequestSize) {
          throw tooLarge();
        }
        return scan.request;
      }

      if (
        this.buffer.length > maxRequestSize ||
        (scan.missing === "body" && scan.expectedLength > maxRequestSize)
      ) {
        throw tooLarge();
      }

      if (this.socketError) {
        throw this.socketError;
      }

      if (this.closed) {
        if (this.buffer.length === 0) {
          throw new HttpRequestParseError(
            "CONNECTION_CLOSED",
            "Connection closed",
          );
        }

        throw new HttpRequestParseError(
          "CONNECTION_CLOSED_INCOMPLETE",
          "Connection closed before request was complete",
        );
      }

      const hadActivity = await this.waitForActivity(deadline - Date.now());
      if (!hadActivity) {
        if (this.buffer.length === 0) {
          throw new HttpRequestParseError(
            "IDLE_TIMEOUT",
            "Connection idle timed out",
          );
        }

        throw new HttpRequestParseError(
          "REQUEST_TIMEOUT",
          "Request timed out before completion",
        );
      }
    }
  }

  private waitForActivity(timeoutMs: number): Promise<boolean> {
    if (timeoutMs <= 0) {
      return Promise.resolve(false);
    }

    return new Promise((resolve) => {
      let settled = false;

      const onActivity = () => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        resolve(true);
      };

      const timer = setTimeout(() => {
        if (settled) return;
        settled = true;
        this.waiters = this.waiters.filter((waiter) => waiter !== onActivity);
        resolve(false);
      }, timeoutMs);

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

function tooLarge(): HttpRequestParseError {
  return new HttpRequestParseError(
    "REQUEST_TOO_LARGE",
    "Request exceeds the maximum request size",
  );
}

/** Read a single request from a socket. */
export function readHttpRequest(
  socket: ITcpSocket,
  options?: ReadRequestOptions,
): Promise<HttpRequest> {
  return new HttpRequestReader(socket).readRequest(options);
}
