import type { Logger } from "pino";

import type { JsonCodecBuilder } from "./codec.js";
import type { TransportBuilder } from "./transport.js";

export type JsonObject = Record<string, unknown>;

export type HttpVersion = "HTTP_1_1" | "HTTP_2";

export type HttpMethod = "GET" | "POST";

export type DocServeClientOptions = {
  baseUrl?: string | URL; // default: http://localhost:5001
  transport?: TransportBuilder;
  codec?: JsonCodecBuilder;
  logger?: Logger; // default: pino, level from DOCSERVE_LOG_LEVEL or "silent"
};
