import type { HttpResponse } from "../http/response.js";
import type { HttpRequest } from "../http/types.js";

/** Application logic bound to one path. */
export interface RequestHandler {
  handle(request: HttpRequest, response: HttpResponse): void | Promise<void>;
}

export type HandlerFunction = RequestHandler["handle"];

/**
 * Exact-match route table. Paths are compared as raw strings: no
 * normalization of trailing slashes, no query-string stripping, no
 * wildcards.
 *
 * Routes are registered during setup; `seal()` (called by
 * `WebServer.start()`) makes the table read-only for the life of the
 * server.
 */
export class Router {
  private routes: Map<string, RequestHandler> = new Map();
  private sealed = false;

  register(path: string, handler: RequestHandler | HandlerFunction): this {
    if (this.sealed) {
      throw new Error(
        `Cannot register ${path}: routes are read-only once the server has started`,
      );
    }
    this.routes.set(
      path,
      typeof handler === "function" ? { handle: handler } : handler,
    );
    return this;
  }

  dispatch(path: string): RequestHandler | undefined {
    return this.routes.get(path);
  }

  seal(): this {
    this.sealed = true;
    return this;
  }

  get isSealed(): boolean {
    return this.sealed;
  }

  get size(): number {
    return this.routes.size;
  }

  paths(): string[] {
    return [...this.routes.keys()];
  }
}
