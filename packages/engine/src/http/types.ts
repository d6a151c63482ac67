export interface HttpRequest {
  readonly method: string;
  /** Request target exactly as sent, query string included. */
  readonly path: string;
  readonly version: string;
  readonly headers: ReadonlyMap<string, string>;
  readonly body: Uint8Array;
}

export const STATUS_TEXT: Record<number, string> = {
  200: "OK",
  201: "Created",
  204: "No Content",
  301: "Moved Permanently",
  302: "Found",
  304: "Not Modified",
  400: "Bad Request",
  403: "Forbidden",
  404: "Not Found",
  405: "Method Not Allowed",
  408: "Request Timeout",
  413: "Content Too Large",
  500: "Internal Server Error",
  503: "Service Unavailable",
};

/** Look up a header by name, ignoring case. The last matching entry wins. */
export function findHeader(
  headers: ReadonlyMap<string, string>,
  name: string,
): string | undefined {
  const wanted = name.toLowerCase();
  let found: string | undefined;
  for (const [key, value] of headers) {
    if (key.toLowerCase() === wanted) {
      found = value;
    }
  }
  return found;
}
