export interface ServerConfig {
  /** Port to listen on. 0 picks a free port. Default: 8080 */
  port: number;
  /** Host/IP to bind. Default: '127.0.0.1' */
  host: string;
  /** Suppress request logging. Default: false */
  quiet: boolean;
  /** Max time allowed for receiving a full HTTP request. Default: 5000ms */
  requestTimeoutMs: number;
  /** Max time allowed for writing the response. Default: 5000ms */
  writeTimeoutMs: number;
  /** Max size of request head plus body; larger requests get 413. Default: 8KB */
  maxRequestSize: number;
  /** Connections processed at once; extra ones get 503. Default: 64 */
  maxConnections: number;
  /** How long stop() waits for in-flight connections. Default: 5000ms */
  shutdownTimeoutMs: number;
}

export class ConfigError extends Error {
  constructor(
    readonly key: keyof ServerConfig,
    message: string,
  ) {
    super(message);
    this.name = "ConfigError";
  }
}

export function defaultConfig(): ServerConfig {
  return {
    port: 8080,
    host: "127.0.0.1",
    quiet: false,
    requestTimeoutMs: 5000,
    writeTimeoutMs: 5000,
    maxRequestSize: 8 * 1024,
    maxConnections: 64,
    shutdownTimeoutMs: 5000,
  };
}

/** Throws a ConfigError for the first setting that cannot work. */
export function validateConfig(config: ServerConfig): void {
  if (!Number.isInteger(config.port) || config.port < 0 || config.port > 65535) {
    throw new ConfigError("port", `Invalid port: ${config.port}`);
  }
  if (config.host === "") {
    throw new ConfigError("host", "Host must not be empty");
  }

  const positive = ["maxRequestSize", "maxConnections"] as const;
  for (const key of positive) {
    if (!Number.isInteger(config[key]) || config[key] <= 0) {
      throw new ConfigError(key, `${key} must be a positive integer`);
    }
  }

  const durations = [
    "requestTimeoutMs",
    "writeTimeoutMs",
    "shutdownTimeoutMs",
  ] as const;
  for (const key of durations) {
    if (!Number.isFinite(config[key]) || config[key] < 0) {
      throw new ConfigError(key, `${key} must be zero or more milliseconds`);
    }
  }
}
