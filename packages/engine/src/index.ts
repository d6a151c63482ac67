// Node adapters
export { NodeFileSystem } from "./adapters/node/node-filesystem.js";
export {
  NodeSocketFactory,
  NodeTcpServer,
  NodeTcpSocket,
} from "./adapters/node/node-socket.js";
// Config
export type { ServerConfig } from "./config/server-config.js";
export {
  ConfigError,
  defaultConfig,
  validateConfig,
} from "./config/server-config.js";
// HTTP
export type {
  HttpRequestParseErrorCode,
  ParseResult,
  ScanResult,
} from "./http/request-parser.js";
export {
  HttpRequestParseError,
  parseRequest,
  scanRequest,
} from "./http/request-parser.js";
export type { ReadRequestOptions } from "./http/request-reader.js";
export {
  DEFAULT_MAX_REQUEST_SIZE,
  HttpRequestReader,
  readHttpRequest,
} from "./http/request-reader.js";
export {
  applyError,
  errorPage,
  errorResponse,
  HttpResponse,
} from "./http/response.js";
export { sendResponse, serializeResponse } from "./http/response-writer.js";
export type { HttpRequest } from "./http/types.js";
export { findHeader, STATUS_TEXT } from "./http/types.js";
// Interfaces
export type { IFileStat, IFileSystem } from "./interfaces/filesystem.js";
export type {
  ISocketFactory,
  ITcpServer,
  ITcpSocket,
} from "./interfaces/socket.js";
// Logging
export type { Logger, LogLevel } from "./logging/logger.js";
export {
  basicLogger,
  filteredLogger,
  prefixedLogger,
  silentLogger,
} from "./logging/logger.js";
// Presets
export type { NodeServerOptions } from "./presets/node.js";
export { createNodeServer } from "./presets/node.js";
// Server
export type {
  ConnectionOptions,
  ConnectionState,
} from "./server/connection.js";
export { Connection } from "./server/connection.js";
export { getMimeType } from "./server/mime-types.js";
export type { HandlerFunction, RequestHandler } from "./server/router.js";
export { Router } from "./server/router.js";
export type { StaticFileHandlerOptions } from "./server/static-file-handler.js";
export { StaticFileHandler } from "./server/static-file-handler.js";
export type { WebServerEvents, WebServerOptions } from "./server/web-server.js";
export { WebServer } from "./server/web-server.js";
// Testing
export { InMemoryFileSystem } from "./testing/in-memory-filesystem.js";
export type { InMemoryConnection } from "./testing/in-memory-socket-factory.js";
export {
  InMemorySocketFactory,
  InMemoryTcpSocket,
} from "./testing/in-memory-socket-factory.js";
// Utils
export {
  concat,
  decodeToString,
  decodeUtf8Strict,
  fromString,
} from "./utils/buffer.js";
export { EventEmitter } from "./utils/event-emitter.js";
