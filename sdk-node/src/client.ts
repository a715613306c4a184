import type { Logger } from "pino";

import type { DocServeApi, DocServeApiBuilder } from "./api.js";
import { JsonCodecBuilder, type JsonCodec } from "./codec.js";
import type { ConvertDocumentRequest } from "./convert/request.js";
import {
  convertDocumentResponseSchema,
  type ConvertDocumentResponse,
} from "./convert/response.js";
import { ProtocolError } from "./errors.js";
import {
  healthCheckResponseSchema,
  type HealthCheckResponse,
} from "./health.js";
import { logger as defaultLogger } from "./logger.js";
import {
  TransportBuilder,
  type Transport,
  type TransportResponse,
} from "./transport.js";
import type { DocServeClientOptions, HttpMethod } from "./types.js";
import {
  describeFailure,
  ensureNotNull,
  getRequestId,
  parseBaseUrl,
  resolveEndpoint,
} from "./utils.js";

/* -------------------------------- Constants ------------------------------- */

const DEFAULT_BASE_URL = "http://localhost:5001";
const HEALTH_PATH = "/health";
const CONVERT_SOURCE_PATH = "/v1/convert/source";

/* ---------------------------------- Utils --------------------------------- */

function parseErrorBody(res: TransportResponse): unknown {
  const ct = res.headers.get("content-type") ?? "";
  if (!ct.includes("application/json")) return res.body || undefined;

  try {
    return JSON.parse(res.body);
  } catch {
    return res.body || undefined;
  }
}

/* --------------------------------- Client --------------------------------- */

/**
 * HTTP client for a DocServe document-conversion service.
 *
 * @example
 * ```typescript
 * const client = DocServe.builder().baseUrl("http://localhost:5001").build();
 *
 * const health = await client.health();
 *
 * const result = await client.convertSource(
 *   ConvertDocumentRequest.builder()
 *     .source(HttpSource.of("https://example.com/report.pdf"))
 *     .options(ConvertDocumentOptions.builder().toFormats(["md"]).build())
 *     .build()
 * );
 * console.log(result.document.markdownContent);
 * ```
 * Plain `http:` base URLs always use HTTP/1.1: the service does not fall
 * back from an HTTP/2 attempt on a cleartext connection.
 */
export class DocServe implements DocServeApi {
  readonly transport: Transport;
  private readonly url: URL;
  private readonly codec: JsonCodec;
  private readonly logger: Logger;
  private readonly transportBuilder: TransportBuilder;
  private readonly codecBuilder: JsonCodecBuilder;

  constructor(opts: DocServeClientOptions = {}) {
    this.url = parseBaseUrl(opts.baseUrl ?? DEFAULT_BASE_URL);
    this.transportBuilder = (opts.transport ?? new TransportBuilder()).copy();
    this.codecBuilder = (opts.codec ?? new JsonCodecBuilder()).copy();
    this.logger = opts.logger ?? defaultLogger;

    const effectiveTransport = this.transportBuilder.copy();
    if (this.url.protocol === "http:") {
      effectiveTransport.version("HTTP_1_1");
    }

    this.transport = effectiveTransport.build();
    this.codec = this.codecBuilder.build();
  }

  static builder(): DocServeBuilder {
    return new DocServeBuilder();
  }

  get baseUrl(): URL {
    return new URL(this.url.href);
  }

  async health(): Promise<HealthCheckResponse> {
    const res = await this.send("GET", HEALTH_PATH);
    return this.codec.decode(res.body, healthCheckResponseSchema);
  }

  async convertSource(
    request: ConvertDocumentRequest
  ): Promise<ConvertDocumentResponse> {
    const body = this.codec.encode(ensureNotNull(request, "request"));
    const res = await this.send("POST", CONVERT_SOURCE_PATH, body);
    return this.codec.decode(res.body, convertDocumentResponseSchema);
  }

  toBuilder(): DocServeBuilder {
    return new DocServeBuilder({
      baseUrl: this.url,
      transport: this.transportBuilder,
      codec: this.codecBuilder,
      logger: this.logger,
    });
  }

  /** Releases pooled connections held by the transport. */
  async close(): Promise<void> {
    await this.transport.close();
  }

  /* ------------------------------ Internals ------------------------------ */

  private async send(
    method: HttpMethod,
    path: string,
    body?: string
  ): Promise<TransportResponse> {
    const url = resolveEndpoint(this.url, path);
    const headers: Record<string, string> = { Accept: "application/json" };
    if (body !== undefined) {
      headers["Content-Type"] = "application/json";
    }

    this.logger.debug({ method, url: url.href }, "sending request");
    const startedAt = Date.now();

    const res = await this.transport.send({ method, url, headers, body });

    this.logger.debug(
      {
        method,
        url: url.href,
        status: res.status,
        durationMs: Date.now() - startedAt,
      },
      "received response"
    );

    if (!res.ok) {
      const details = parseErrorBody(res);
      throw new ProtocolError({
        message: describeFailure(res.status, details),
        status: res.status,
        requestId: getRequestId(res.headers),
        details,
      });
    }

    return res;
  }
}

/* --------------------------------- Builder -------------------------------- */

/**
 * Fluent configuration for {@link DocServe}. Obtain one from
 * {@link DocServe.builder} or {@link DocServe.toBuilder}.
 */
export class DocServeBuilder implements DocServeApiBuilder<DocServe> {
  private options: {
    baseUrl: URL;
    transport: TransportBuilder;
    codec: JsonCodecBuilder;
    logger?: Logger;
  };

  constructor(seed?: {
    baseUrl: URL;
    transport: TransportBuilder;
    codec: JsonCodecBuilder;
    logger?: Logger;
  }) {
    this.options = {
      baseUrl: seed?.baseUrl ?? parseBaseUrl(DEFAULT_BASE_URL),
      transport: seed?.transport.copy() ?? new TransportBuilder(),
      codec: seed?.codec.copy() ?? new JsonCodecBuilder(),
      logger: seed?.logger,
    };
  }

  /**
   * @throws {ConfigurationError} if the URL is blank, unparsable, or not
   * http/https
   */
  baseUrl(baseUrl: string | URL): this {
    this.options.baseUrl = parseBaseUrl(baseUrl);
    return this;
  }

  /** Timeouts, default headers, protocol version and dispatcher. */
  transport(transport: TransportBuilder): this {
    this.options.transport = ensureNotNull(transport, "transport");
    return this;
  }

  codec(codec: JsonCodecBuilder): this {
    this.options.codec = ensureNotNull(codec, "codec");
    return this;
  }

  logger(logger: Logger): this {
    this.options.logger = ensureNotNull(logger, "logger");
    return this;
  }

  build(): DocServe {
    return new DocServe({ ...this.options });
  }
}
