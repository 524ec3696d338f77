export type {
  ConnectionOptions,
  RequestLimits,
  ConnectionTimeouts,
} from '../config/types.js';
export {
  type ConnectionOptionsInput,
  resolveConnectionOptions,
} from '../config/schema.js';
export { HttpError, ConfigError, ResponseSerializationError } from '../errors.js';

export {
  type CloseReason,
  type ConnectionState,
  type ConnectionSummary,
  type HttpConnectionInit,
  HttpConnection,
  serveConnection,
} from './connection.js';
export { type HeaderField, HeaderList } from './headers.js';
export {
  type AfterHook,
  type BeforeHook,
  type BeforeOutcome,
  type DispatchContext,
  type Handler,
  type Middleware,
  type Pipeline,
  type PipelineOptions,
  createDispatchContext,
  createPipeline,
  proceed,
  shortCircuit,
} from './pipeline.js';
export { RawBuffer } from './raw-buffer.js';
export {
  type HttpVersion,
  ParsedRequest,
  type RequestBody,
} from './request.js';
export {
  type ParseOutcome,
  type ParseStage,
  parseRequest,
  RequestParser,
} from './request-parser.js';
export {
  createResponse,
  emptyResponse,
  errorResponse,
  getHeader,
  hasHeader,
  type HeaderEntry,
  type HeaderInit,
  jsonResponse,
  type ResponseBody,
  type ResponseChunk,
  type ResponseSpec,
  setHeader,
  streamResponse,
  textResponse,
  withHeader,
  withoutHeader,
} from './response.js';
export {
  encodeResponse,
  type SerializedResponse,
  type SerializeOptions,
  serializeResponse,
} from './response-builder.js';
export { type RouteMatch, type Router, RouteTable, routeHandler } from './router.js';
export {
  ConnectionRegistry,
  type HttpServerHandle,
  type HttpServerOptions,
  startHttpServer,
} from './server.js';
export { getReasonPhrase, statusForbidsBody } from './status.js';
