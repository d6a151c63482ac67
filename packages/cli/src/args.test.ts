import { describe, expect, it } from "vitest";
import { CliUsageError, parseArgs } from "./args.js";

describe("parseArgs", () => {
  it("uses the defaults with no arguments", () => {
    expect(parseArgs([])).toEqual({
      kind: "serve",
      options: {
        port: 8080,
        host: "127.0.0.1",
        quiet: false,
        demo: true,
        statics: [],
      },
    });
  });

  it("reads long and short flags", () => {
    expect(
      parseArgs([
        "-p",
        "9000",
        "--host",
        "0.0.0.0",
        "-q",
        "--max-connections",
        "8",
        "--no-demo",
      ]),
    ).toEqual({
      kind: "serve",
      options: {
        port: 9000,
        host: "0.0.0.0",
        quiet: true,
        maxConnections: 8,
        demo: false,
        statics: [],
      },
    });
  });

  it("collects repeated --static routes", () => {
    const command = parseArgs([
      "--static",
      "/index.html=public/index.html",
      "--static",
      "/a=b=c.txt",
    ]);

    expect(command.kind).toBe("serve");
    if (command.kind !== "serve") return;
    expect(command.options.statics).toEqual([
      { urlPath: "/index.html", filePath: "public/index.html" },
      { urlPath: "/a", filePath: "b=c.txt" },
    ]);
  });

  it("returns help and version commands", () => {
    expect(parseArgs(["--help"])).toEqual({ kind: "help" });
    expect(parseArgs(["-p", "1", "-v"])).toEqual({ kind: "version" });
  });

  it.each([
    [["--port", "eighty"], "Invalid port number: eighty"],
    [["--port", "70000"], "Invalid port number: 70000"],
    [["--port"], "Missing value for --port"],
    [["--max-connections", "0"], "--max-connections expects a positive integer, got: 0"],
    [["--frobnicate"], "Unknown option: --frobnicate"],
    [["public"], "Unknown option: public"],
  ])("rejects %j", (args, message) => {
    expect(() => parseArgs(args)).toThrow(new CliUsageError(message));
  });

  it.each(["index.html=x", "/x=", "/x"])("rejects --static %s", (value) => {
    expect(() => parseArgs(["--static", value])).toThrow(CliUsageError);
  });
});
