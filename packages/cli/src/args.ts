export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CliUsageError";
  }
}

export interface StaticRoute {
  urlPath: string;
  filePath: string;
}

export interface ServeOptions {
  port: number;
  host: string;
  quiet: boolean;
  maxConnections?: number;
  demo: boolean;
  statics: StaticRoute[];
}

export type CliCommand =
  | { kind: "serve"; options: ServeOptions }
  | { kind: "help" }
  | { kind: "version" };

export const HELP_TEXT = `
minihttpd - a small HTTP/1.x server

Usage: minihttpd [options]

Options:
  --port, -p <port>          Port to listen on (default: 8080)
  --host, -H <host>          Host to bind (default: 127.0.0.1)
  --quiet, -q                Suppress request logging
  --max-connections <n>      Connections served at once (default: 64)
  --static <path>=<file>     Serve <file> at <path> (repeatable)
  --no-demo                  Do not register the demo routes
                             (/, /api/data, /index.html from ./public)
  --version, -v              Show version
  --help, -h                 Show this help
`;

function parsePort(value: string): number {
  const port = /^\d+$/.test(value) ? Number.parseInt(value, 10) : Number.NaN;
  if (Number.isNaN(port) || port > 65535) {
    throw new CliUsageError(`Invalid port number: ${value}`);
  }
  return port;
}

function parseCount(flag: string, value: string): number {
  const count = /^\d+$/.test(value) ? Number.parseInt(value, 10) : 0;
  if (count < 1) {
    throw new CliUsageError(`${flag} expects a positive integer, got: ${value}`);
  }
  return count;
}

function parseStatic(value: string): StaticRoute {
  const eq = value.indexOf("=");
  const urlPath = eq === -1 ? "" : value.slice(0, eq);
  const filePath = eq === -1 ? "" : value.slice(eq + 1);
  if (!urlPath.startsWith("/") || filePath === "") {
    throw new CliUsageError(
      `--static expects <urlPath>=<file> with urlPath starting with "/", got: ${value}`,
    );
  }
  return { urlPath, filePath };
}

/** Parse `argv` (without the node and script entries). */
export function parseArgs(args: string[]): CliCommand {
  const options: ServeOptions = {
    port: 8080,
    host: "127.0.0.1",
    quiet: false,
    demo: true,
    statics: [],
  };

  let i = 0;
  const next = (flag: string): string => {
    const value = args[++i];
    if (value === undefined) {
      throw new CliUsageError(`Missing value for ${flag}`);
    }
    return value;
  };

  while (i < args.length) {
    const arg = args[i];
    if (arg === "--port" || arg === "-p") {
      options.port = parsePort(next(arg));
    } else if (arg === "--host" || arg === "-H") {
      options.host = next(arg);
    } else if (arg === "--quiet" || arg === "-q") {
      options.quiet = true;
    } else if (arg === "--max-connections") {
      options.maxConnections = parseCount(arg, next(arg));
    } else if (arg === "--static") {
      options.statics.push(parseStatic(next(arg)));
    } else if (arg === "--no-demo") {
      options.demo = false;
    } else if (arg === "--version" || arg === "-v") {
      return { kind: "version" };
    } else if (arg === "--help" || arg === "-h") {
      return { kind: "help" };
    } else {
      throw new CliUsageError(`Unknown option: ${arg}`);
    }
    i++;
  }

  return { kind: "serve", options };
}
