export { DocServe, DocServeBuilder } from "./client.js";
export type { DocServeApi, DocServeApiBuilder } from "./api.js";
export {
  ConfigurationError,
  DocServeError,
  ProtocolError,
  SerializationError,
  TransportError,
} from "./errors.js";
export type { DocServeErrorCode } from "./errors.js";
export { JsonCodec, JsonCodecBuilder } from "./codec.js";
export { Transport, TransportBuilder } from "./transport.js";
export type {
  DispatcherFactory,
  TransportRequest,
  TransportResponse,
} from "./transport.js";
export { createLogger, logger } from "./logger.js";
export {
  HealthCheckResponse,
  HealthCheckResponseBuilder,
} from "./health.js";
export {
  ConvertDocumentRequest,
  ConvertDocumentRequestBuilder,
} from "./convert/request.js";
export type { ConvertDocumentRequestWire } from "./convert/request.js";
export {
  ConvertDocumentOptions,
  ConvertDocumentOptionsBuilder,
  INPUT_FORMATS,
  OUTPUT_FORMATS,
} from "./convert/options.js";
export type {
  ImageRefMode,
  InputFormat,
  OcrEngine,
  OutputFormat,
  PageRange,
  PdfBackend,
  ProcessingPipeline,
  TableFormerMode,
} from "./convert/options.js";
export {
  FileSource,
  FileSourceBuilder,
  HttpSource,
  HttpSourceBuilder,
} from "./convert/sources.js";
export type { Source } from "./convert/sources.js";
export { Targets } from "./convert/target.js";
export type {
  InBodyTarget,
  PutTarget,
  Target,
  ZipTarget,
} from "./convert/target.js";
export {
  DocumentResponse,
  DocumentResponseBuilder,
} from "./convert/document-response.js";
export type { DocumentResponseWire } from "./convert/document-response.js";
export {
  CONVERSION_STATUSES,
  ConvertDocumentResponse,
  ConvertDocumentResponseBuilder,
  ErrorItem,
  ErrorItemBuilder,
} from "./convert/response.js";
export type { ConversionStatus } from "./convert/response.js";
export type {
  DocServeClientOptions,
  HttpMethod,
  HttpVersion,
  JsonObject,
} from "./types.js";
