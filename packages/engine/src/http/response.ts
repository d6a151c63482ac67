import { fromString } from "../utils/buffer.js";
import { STATUS_TEXT } from "./types.js";

const CONTENT_TYPE = "Content-Type";
const CONTENT_LENGTH = "Content-Length";

/**
 * A response under construction. Handlers receive a default instance
 * (`HTTP/1.1 200 OK`, no headers, empty body) and mutate it in place.
 *
 * The status message is never derived from the code; callers keep the two
 * consistent themselves.
 */
export class HttpResponse {
  version = "HTTP/1.1";
  statusCode = 200;
  statusMessage = "OK";
  readonly headers: Map<string, string> = new Map();
  body: Uint8Array = new Uint8Array(0);

  setStatus(code: number, message: string): this {
    this.statusCode = code;
    this.statusMessage = message;
    return this;
  }

  setHeader(name: string, value: string): this {
    this.headers.set(name, value);
    return this;
  }

  /**
   * Replace the body and rewrite `Content-Type` and `Content-Length` to
   * describe it. Strings are stored as UTF-8.
   */
  setContent(content: string | Uint8Array, contentType = "text/html"): this {
    this.body = typeof content === "string" ? fromString(content) : content;
    this.dropVariants(CONTENT_TYPE);
    this.dropVariants(CONTENT_LENGTH);
    this.headers.set(CONTENT_TYPE, contentType);
    this.headers.set(CONTENT_LENGTH, String(this.body.length));
    return this;
  }

  // Removes differently-cased copies so only the canonical name survives.
  private dropVariants(canonical: string): void {
    const lower = canonical.toLowerCase();
    for (const key of [...this.headers.keys()]) {
      if (key !== canonical && key.toLowerCase() === lower) {
        this.headers.delete(key);
      }
    }
  }
}

function reasonPhrase(status: number): string {
  return STATUS_TEXT[status] ?? "Error";
}

/** HTML page for `status`, e.g. `<html><body><h1>404 Not Found</h1></body></html>`. */
export function errorPage(status: number): string {
  return `<html><body><h1>${status} ${reasonPhrase(status)}</h1></body></html>`;
}

/** Turn `response` into the error page for `status`. */
export function applyError(response: HttpResponse, status: number): HttpResponse {
  return response
    .setStatus(status, reasonPhrase(status))
    .setContent(errorPage(status));
}

export function errorResponse(status: number): HttpResponse {
  return applyError(new HttpResponse(), status);
}
