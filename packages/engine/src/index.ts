// Node adapters
export {
  NodeFileHandle,
  NodeFileSystem,
  NodeSocketFactory,
  NodeTcpServer,
  NodeTcpSocket,
} from "./adapters/node/index.js";
// Config
export type { ServerConfig } from "./config/server-config.js";
export { defaultConfig } from "./config/server-config.js";
// HTTP
export type { ContentEncoding } from "./http/content-negotiation.js";
export {
  negotiateContentEncoding,
  parseAcceptEncoding,
  selectEncoding,
  SUPPORTED_ENCODINGS,
} from "./http/content-negotiation.js";
export type { HeaderInit } from "./http/headers.js";
export { HeaderMap } from "./http/headers.js";
export type {
  HttpRequestHead,
  HttpRequestParseErrorCode,
  HttpRequestParseErrorKind,
  ParseHttpRequestOptions,
} from "./http/request-parser.js";
export {
  createHttpRequestParser,
  HttpRequestParseError,
  HttpRequestStreamParser,
  parseHttpRequest,
} from "./http/request-parser.js";
export {
  HttpResponseSerializeError,
  sendResponse,
  sendResponseAndWait,
  serializeResponse,
} from "./http/response-writer.js";
export type {
  RouteContext,
  RouteDefinition,
  RouteHandler,
  RoutePattern,
  RouteResolution,
} from "./http/router.js";
export { exact, HandlerError, prefix, Router } from "./http/router.js";
export type { HttpMethod, HttpRequest, HttpResponse } from "./http/types.js";
export { HTTP_METHODS, STATUS_TEXT, statusText } from "./http/types.js";
// Interfaces
export type {
  IFileHandle,
  IFileStat,
  IFileSystem,
} from "./interfaces/filesystem.js";
export { fileErrorCode } from "./interfaces/filesystem.js";
export type {
  ISocketFactory,
  ITcpServer,
  ITcpSocket,
} from "./interfaces/socket.js";
// Logging
export type { LogEntry, Logger, LogLevel } from "./logging/logger.js";
export {
  basicLogger,
  filteredLogger,
  isLogLevel,
  LOG_LEVELS,
  LogStore,
  prefixedLogger,
  storeLogger,
} from "./logging/logger.js";
// Presets
export type { NodeServerOptions } from "./presets/node.js";
export { createNodeServer } from "./presets/node.js";
// Server
export type {
  ConnectionState,
  HttpConnectionOptions,
} from "./server/http-connection.js";
export {
  classifyRequestParseFailure,
  HttpConnection,
  shouldKeepAlive,
} from "./server/http-connection.js";
export type { DefaultRoutesOptions } from "./server/routes.js";
export { createDefaultRoutes, WELCOME_MESSAGE } from "./server/routes.js";
export type { WebServerEvents, WebServerOptions } from "./server/web-server.js";
export { BindError, WebServer } from "./server/web-server.js";
// Testing
export { InMemoryFileSystem, InMemoryFsError } from "./testing/in-memory-filesystem.js";
export {
  InMemoryClient,
  InMemorySocketFactory,
} from "./testing/in-memory-socket-factory.js";
// Utils
export { concat, decodeToString, fromString } from "./utils/buffer.js";
export { EventEmitter } from "./utils/event-emitter.js";
