import { decodeUtf8Strict } from "../utils/buffer.js";
import type { HttpRequest } from "./types.js";

const LF = 0x0a;
const CR = 0x0d;
const DIGITS = /^\d+$/;
const LEADING_BLANKS = /^[ \t]+/;

export type HttpRequestParseErrorCode =
  | "MALFORMED_REQUEST_LINE"
  | "INVALID_ENCODING"
  | "INVALID_CONTENT_LENGTH"
  | "INCOMPLETE_BODY"
  | "IDLE_TIMEOUT"
  | "REQUEST_TIMEOUT"
  | "CONNECTION_CLOSED"
  | "CONNECTION_CLOSED_INCOMPLETE"
  | "REQUEST_TOO_LARGE";

export class HttpRequestParseError extends Error {
  constructor(
    readonly code: HttpRequestParseErrorCode,
    message: string,
  ) {
    super(message);
    this.name = "HttpRequestParseError";
  }
}

export type ParseResult =
  | { ok: true; request: HttpRequest }
  | { ok: false; error: HttpRequestParseError };

export type ScanResult =
  | { status: "complete"; request: HttpRequest; bytesConsumed: number }
  | { status: "incomplete"; missing: "head" }
  | { status: "incomplete"; missing: "body"; expectedLength: number }
  | { status: "malformed"; error: HttpRequestParseError };

interface RequestHead {
  method: string;
  path: string;
  version: string;
  headers: Map<string, string>;
  contentLength: number;
  bodyStart: number;
}

type HeadResult =
  | { status: "complete"; head: RequestHead }
  | { status: "incomplete" }
  | { status: "malformed"; error: HttpRequestParseError };

interface Line {
  text: string;
  next: number;
}

/**
 * Read one line starting at `start`. A trailing `\r` is dropped. When
 * `final` is set the input is known to be complete, so unterminated
 * trailing bytes count as a last line.
 */
function readLine(buffer: Uint8Array, start: number, final: boolean): Line | null {
  const lf = buffer.indexOf(LF, start);
  if (lf === -1) {
    if (!final || start >= buffer.length) return null;
    return { text: decodeLine(buffer, start, buffer.length), next: buffer.length };
  }
  return { text: decodeLine(buffer, start, lf), next: lf + 1 };
}

// Lines are cut at LF before decoding, so a valid line never ends mid-character.
function decodeLine(buffer: Uint8Array, start: number, end: number): string {
  const stop = end > start && buffer[end - 1] === CR ? end - 1 : end;
  const text = decodeUtf8Strict(buffer.subarray(start, stop));
  if (text === null) {
    throw new HttpRequestParseError(
      "INVALID_ENCODING",
      "Request head is not valid UTF-8",
    );
  }
  return text;
}

function malformed(
  code: HttpRequestParseErrorCode,
  message: string,
): { status: "malformed"; error: HttpRequestParseError } {
  return { status: "malformed", error: new HttpRequestParseError(code, message) };
}

function scanHead(buffer: Uint8Array, final: boolean): HeadResult {
  try {
    return readHead(buffer, final);
  } catch (err) {
    if (err instanceof HttpRequestParseError) {
      return { status: "malformed", error: err };
    }
    throw err;
  }
}

function readHead(buffer: Uint8Array, final: boolean): HeadResult {
  const requestLine = readLine(buffer, 0, final);
  if (!requestLine) {
    return final
      ? malformed("MALFORMED_REQUEST_LINE", "Malformed request line")
      : { status: "incomplete" };
  }

  const tokens = requestLine.text.trim().split(/\s+/);
  if (tokens.length < 3) {
    return malformed("MALFORMED_REQUEST_LINE", "Malformed request line");
  }
  const [method, path, version] = tokens;

  const headers = new Map<string, string>();
  let declaredLength: string | undefined;
  let position = requestLine.next;

  while (true) {
    const line = readLine(buffer, position, final);
    if (!line) {
      if (!final) return { status: "incomplete" };
      // Input ended without a blank line: everything read was headers.
      break;
    }
    position = line.next;
    if (line.text === "") break;

    const colon = line.text.indexOf(":");
    if (colon === -1) continue;

    const key = line.text.slice(0, colon);
    const value = line.text.slice(colon + 1).replace(LEADING_BLANKS, "");
    headers.set(key, value);
    if (key.toLowerCase() === "content-length") {
      declaredLength = value;
    }
  }

  let contentLength = 0;
  if (declaredLength !== undefined) {
    const digits = declaredLength.trimEnd();
    contentLength = Number(digits);
    if (!DIGITS.test(digits) || !Number.isSafeInteger(contentLength)) {
      return malformed("INVALID_CONTENT_LENGTH", "Invalid Content-Length");
    }
  }

  return {
    status: "complete",
    head: { method, path, version, headers, contentLength, bodyStart: position },
  };
}

function buildRequest(head: RequestHead, body: Uint8Array): HttpRequest {
  return Object.freeze({
    method: head.method,
    path: head.path,
    version: head.version,
    headers: head.headers,
    body,
  });
}

/**
 * Incremental parse of a buffer that may still be growing. Used by the
 * request reader to decide whether to wait for more bytes.
 */
export function scanRequest(buffer: Uint8Array): ScanResult {
  const result = scanHead(buffer, false);
  if (result.status === "incomplete") {
    return { status: "incomplete", missing: "head" };
  }
  if (result.status === "malformed") {
    return result;
  }

  const { head } = result;
  const end = head.bodyStart + head.contentLength;
  if (buffer.length < end) {
    return { status: "incomplete", missing: "body", expectedLength: end };
  }

  return {
    status: "complete",
    request: buildRequest(head, buffer.slice(head.bodyStart, end)),
    bytesConsumed: end,
  };
}

/**
 * Parse one complete request from `buffer`.
 *
 * A body shorter than its declared `Content-Length` is rejected with
 * `INCOMPLETE_BODY`; bytes past the declared length are ignored.
 */
export function parseRequest(buffer: Uint8Array): ParseResult {
  const result = scanHead(buffer, true);
  if (result.status === "malformed") {
    return { ok: false, error: result.error };
  }
  if (result.status === "incomplete") {
    return {
      ok: false,
      error: new HttpRequestParseError(
        "MALFORMED_REQUEST_LINE",
        "Malformed request line",
      ),
    };
  }

  const { head } = result;
  const end = head.bodyStart + head.contentLength;
  if (buffer.length < end) {
    return {
      ok: false,
      error: new HttpRequestParseError(
        "INCOMPLETE_BODY",
        "Request body shorter than Content-Length",
      ),
    };
  }

  return { ok: true, request: buildRequest(head, buffer.slice(head.bodyStart, end)) };
}
