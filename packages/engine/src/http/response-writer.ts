import type { ITcpSocket } from "../interfaces/socket.js";
import { concat, fromString } from "../utils/buffer.js";
import type { HttpResponse } from "./response.js";

/**
 * Serialize a response to the exact bytes sent on the wire: status line,
 * headers in insertion order, a blank line, then the body untouched.
 * `Content-Length` is not checked against the body.
 */
export function serializeResponse(response: HttpResponse): Uint8Array {
  const lines: string[] = [
    `${response.version} ${response.statusCode} ${response.statusMessage}`,
  ];
  for (const [key, value] of response.headers) {
    lines.push(`${key}: ${value}`);
  }
  lines.push("", ""); // \r\n\r\n
  return concat([fromString(lines.join("\r\n")), response.body]);
}

/**
 * Write a complete response in one call. Resolves once the socket has
 * accepted the bytes when it can report that.
 */
export async function sendResponse(
  socket: ITcpSocket,
  response: HttpResponse,
): Promise<void> {
  const bytes = serializeResponse(response);
  if (socket.sendAndWait) {
    await socket.sendAndWait(bytes);
    return;
  }
  socket.send(bytes);
}
