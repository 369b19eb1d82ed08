// Node adapters
export {
  NodeSocketFactory,
  NodeTcpServer,
  NodeTcpSocket,
} from "./adapters/node/node-socket.js";
// Config
export type {
  DuplicateHeaderPolicy,
  ParserConfig,
} from "./config/parser-config.js";
export {
  defaultParserConfig,
  resolveParserConfig,
} from "./config/parser-config.js";
export type { ServerConfig } from "./config/server-config.js";
export { defaultConfig } from "./config/server-config.js";
// HTTP
export type { BodyFraming, BodyLimits } from "./http/body.js";
export {
  parseContentLength,
  readBody,
  resolveRequestBodyFraming,
  resolveResponseBodyFraming,
  statusForbidsBody,
} from "./http/body.js";
export type { ByteSource } from "./http/byte-source.js";
export { BufferByteSource } from "./http/byte-source.js";
export type { ExchangeOptions } from "./http/client.js";
export { exchange } from "./http/client.js";
export type {
  DescribedHeaderValue,
  RequestDescription,
  ResponseDescription,
} from "./http/describe.js";
export {
  describeHeaders,
  describeRequest,
  describeResponse,
} from "./http/describe.js";
export type {
  ByteSourceErrorCode,
  HttpParseErrorCode,
  TokenReadErrorCode,
} from "./http/errors.js";
export {
  ByteSourceError,
  HttpParseError,
  sourceFailureOf,
  TokenReadError,
} from "./http/errors.js";
export {
  ABSENT,
  appendHeaderToken,
  formatHeaderValue,
  getHeader,
  headerValueList,
  mergeHeaderValues,
} from "./http/header-value.js";
export type { ReadHeadersOptions } from "./http/headers.js";
export { readHeaders } from "./http/headers.js";
export type {
  ReadRequestOptions,
  ReadResponseOptions,
} from "./http/message-reader.js";
export { readRequest, readResponse } from "./http/message-reader.js";
export {
  sendRequest,
  sendResponse,
  serializeRequest,
  serializeResponse,
} from "./http/message-writer.js";
export type { SocketByteSourceOptions } from "./http/socket-byte-source.js";
export { SocketByteSource } from "./http/socket-byte-source.js";
export type { RequestLine, StatusLine } from "./http/start-line.js";
export {
  parseStatusCode,
  readRequestLine,
  readStatusLine,
} from "./http/start-line.js";
export type { HeaderValueState, TokenReader } from "./http/token-readers.js";
export {
  DEFAULT_MAX_TOKEN_LENGTH,
  FixedLengthReader,
  HeaderKeyReader,
  HeaderValueReader,
  LineReader,
  SpaceReader,
} from "./http/token-readers.js";
export type {
  HeaderMap,
  HeaderValue,
  HttpMethod,
  HttpRequest,
  HttpRequestOptions,
  HttpResponse,
  HttpResponseOptions,
  HttpVersion,
  OutgoingHeaders,
} from "./http/types.js";
export { HTTP_METHODS, HTTP_VERSIONS, STATUS_TEXT } from "./http/types.js";
export {
  compareVersions,
  formatVersion,
  isHttpMethod,
  isHttpVersion,
  parseMethod,
  parseVersion,
} from "./http/vocabulary.js";
export type {
  ISocketFactory,
  ITcpServer,
  ITcpSocket,
  TcpSocketOptions,
} from "./interfaces/socket.js";
// Logging
export type { Logger, LogLevel } from "./logging/logger.js";
export {
  basicLogger,
  filteredLogger,
  isLogLevel,
  LOG_LEVELS,
  prefixedLogger,
} from "./logging/logger.js";
// Presets
export type { NodeServerOptions } from "./presets/node.js";
export { createNodeServer } from "./presets/node.js";
// Server
export type {
  InspectServerEvents,
  InspectServerOptions,
} from "./server/inspect-server.js";
export { InspectServer } from "./server/inspect-server.js";
export {
  InMemorySocketFactory,
  InMemoryTcpSocket,
} from "./testing/in-memory-socket-factory.js";
// Utils
export {
  bytesEqual,
  concat,
  decodeToString,
  decodeUtf8,
  fromString,
} from "./utils/buffer.js";
export type { EventMap, Listener } from "./utils/event-emitter.js";
export { EventEmitter } from "./utils/event-emitter.js";
