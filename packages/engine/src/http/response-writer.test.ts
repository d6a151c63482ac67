import { describe, expect, it, vi } from "vitest";
import type { ITcpSocket } from "../interfaces/socket.js";
import { concat, decodeToString, fromString } from "../utils/buffer.js";
import { parseRequest } from "./request-parser.js";
import { HttpResponse } from "./response.js";
import { sendResponse, serializeResponse } from "./response-writer.js";

describe("serializeResponse", () => {
  it("writes the status line, headers, blank line and body", () => {
    const res = new HttpResponse().setContent(
      '{"message": "This is JSON data"}',
      "application/json",
    );

    expect(decodeToString(serializeResponse(res))).toBe(
      "HTTP/1.1 200 OK\r\n" +
        "Content-Type: application/json\r\n" +
        "Content-Length: 32\r\n" +
        "\r\n" +
        '{"message": "This is JSON data"}',
    );
  });

  it("emits headers in insertion order", () => {
    const res = new HttpResponse()
      .setHeader("Z-Last", "1")
      .setHeader("A-First", "2")
      .setHeader("M-Middle", "3");

    expect(decodeToString(serializeResponse(res))).toBe(
      "HTTP/1.1 200 OK\r\nZ-Last: 1\r\nA-First: 2\r\nM-Middle: 3\r\n\r\n",
    );
  });

  it("uses the response's own version and status text", () => {
    const res = new HttpResponse();
    res.version = "HTTP/1.0";
    res.setStatus(302, "Elsewhere").setHeader("Location", "/next");

    expect(decodeToString(serializeResponse(res))).toBe(
      "HTTP/1.0 302 Elsewhere\r\nLocation: /next\r\n\r\n",
    );
  });

  it("does not check Content-Length against the body", () => {
    const res = new HttpResponse().setHeader("Content-Length", "100");
    res.body = fromString("tiny");

    expect(decodeToString(serializeResponse(res))).toBe(
      "HTTP/1.1 200 OK\r\nContent-Length: 100\r\n\r\ntiny",
    );
  });

  it("copies body bytes without re-encoding", () => {
    const body = new Uint8Array([0x00, 0xc3, 0x28, 0xff]);
    const res = new HttpResponse().setContent(body, "application/octet-stream");
    const bytes = serializeResponse(res);

    expect([...bytes.subarray(bytes.length - 4)]).toEqual([0x00, 0xc3, 0x28, 0xff]);
  });

  it("keeps headers and body intact when the bytes are parsed back", () => {
    const res = new HttpResponse()
      .setHeader("X-Request-Id", "abc:123")
      .setHeader("Cache-Control", "no-store")
      .setContent(new Uint8Array([104, 105, 0, 10, 13, 255]), "application/x-test");

    const parsed = parseRequest(serializeResponse(res));
    expect(parsed.ok).toBe(true);
    if (!parsed.ok) return;

    expect([...parsed.request.headers]).toEqual([...res.headers]);
    expect([...parsed.request.body]).toEqual([...res.body]);
  });

  it("round-trips a header name that starts with U+FEFF", () => {
    const res = new HttpResponse().setHeader("\uFEFFX-Key", "v");

    const parsed = parseRequest(serializeResponse(res));
    expect(parsed.ok).toBe(true);
    if (!parsed.ok) return;

    expect([...parsed.request.headers.keys()]).toEqual(["\uFEFFX-Key"]);
  });
});

describe("sendResponse", () => {
  it("waits for the socket when it supports backpressure", async () => {
    const written: Uint8Array[] = [];
    const socket: ITcpSocket = {
      send: vi.fn(),
      sendAndWait: vi.fn(async (data: Uint8Array) => {
        written.push(data.slice());
      }),
      onData() {},
      onClose() {},
      onError() {},
      close() {},
    };

    await sendResponse(socket, new HttpResponse().setContent("hi"));

    expect(socket.send).not.toHaveBeenCalled();
    expect(written).toHaveLength(1);
    expect(decodeToString(written[0])).toBe(
      "HTTP/1.1 200 OK\r\nContent-Type: text/html\r\nContent-Length: 2\r\n\r\nhi",
    );
  });

  it("falls back to plain send", async () => {
    const sent: Uint8Array[] = [];
    const socket: ITcpSocket = {
      send(data: Uint8Array) {
        sent.push(data.slice());
      },
      onData() {},
      onClose() {},
      onError() {},
      close() {},
    };

    const res = new HttpResponse().setContent("hi");
    await sendResponse(socket, res);

    expect(sent).toHaveLength(1);
    expect(concat(sent)).toEqual(serializeResponse(res));
  });

  it("propagates write failures", async () => {
    const socket: ITcpSocket = {
      send() {},
      sendAndWait: () => Promise.reject(new Error("Socket closed during write")),
      onData() {},
      onClose() {},
      onError() {},
      close() {},
    };

    await expect(sendResponse(socket, new HttpResponse())).rejects.toThrow(
      "Socket closed during write",
    );
  });
});
