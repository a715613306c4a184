import { Agent, fetch, Headers, type Dispatcher } from "undici";

import { TransportError } from "./errors.js";
import type { HttpMethod, HttpVersion } from "./types.js";

/* -------------------------------- Constants ------------------------------- */

const DEFAULT_TIMEOUT_MS = 120_000;
const DEFAULT_USER_AGENT = "docserve-node";

/* ---------------------------------- Types --------------------------------- */

export type DispatcherFactory = (options: Agent.Options) => Dispatcher;

type TransportSettings = {
  version?: HttpVersion;
  timeoutMs: number;
  connectTimeoutMs?: number;
  userAgent: string;
  headers: Record<string, string>;
  dispatcherFactory: DispatcherFactory;
};

export type TransportRequest = {
  method: HttpMethod;
  url: URL;
  headers: Record<string, string>;
  body?: string;
};

export type TransportResponse = {
  status: number;
  ok: boolean;
  headers: { get(name: string): string | null };
  body: string;
};

const defaultDispatcher: DispatcherFactory = (options) => new Agent(options);

/* --------------------------------- Builder -------------------------------- */

/**
 * Configures the HTTP transport: protocol version, timeouts, default headers
 * and the undici dispatcher that carries the requests.
 */
export class TransportBuilder {
  private readonly settings: TransportSettings;

  constructor(settings?: Partial<TransportSettings>) {
    this.settings = {
      version: settings?.version,
      timeoutMs: settings?.timeoutMs ?? DEFAULT_TIMEOUT_MS,
      connectTimeoutMs: settings?.connectTimeoutMs,
      userAgent: settings?.userAgent ?? DEFAULT_USER_AGENT,
      headers: { ...settings?.headers },
      dispatcherFactory: settings?.dispatcherFactory ?? defaultDispatcher,
    };
  }

  /**
   * Pins the protocol version. Left unset, HTTP/2 is offered and the
   * connection settles on whatever the server negotiates.
   */
  version(version: HttpVersion): this {
    this.settings.version = version;
    return this;
  }

  timeoutMs(ms: number): this {
    this.settings.timeoutMs = ms;
    return this;
  }

  connectTimeoutMs(ms: number): this {
    this.settings.connectTimeoutMs = ms;
    return this;
  }

  userAgent(userAgent: string): this {
    this.settings.userAgent = userAgent;
    return this;
  }

  header(name: string, value: string): this {
    this.settings.headers[name] = value;
    return this;
  }

  dispatcher(factory: DispatcherFactory): this {
    this.settings.dispatcherFactory = factory;
    return this;
  }

  getVersion(): HttpVersion | undefined {
    return this.settings.version;
  }

  copy(): TransportBuilder {
    return new TransportBuilder(this.settings);
  }

  build(): Transport {
    return new Transport({
      ...this.settings,
      headers: { ...this.settings.headers },
    });
  }
}

/* -------------------------------- Transport ------------------------------- */

export class Transport {
  private readonly settings: Readonly<TransportSettings>;
  private readonly dispatcher: Dispatcher;

  constructor(settings: TransportSettings) {
    this.settings = Object.freeze(settings);

    const options: Agent.Options = {
      allowH2: settings.version !== "HTTP_1_1",
    };
    if (settings.connectTimeoutMs !== undefined) {
      options.connect = { timeout: settings.connectTimeoutMs };
    }
    this.dispatcher = settings.dispatcherFactory(options);
  }

  static builder(): TransportBuilder {
    return new TransportBuilder();
  }

  /** `undefined` means automatic negotiation. */
  get version(): HttpVersion | undefined {
    return this.settings.version;
  }

  toBuilder(): TransportBuilder {
    return new TransportBuilder(this.settings);
  }

  /**
   * Sends one request and reads the whole response body. Non-2xx statuses
   * are returned, not thrown; only transport failures reject.
   */
  async send(request: TransportRequest): Promise<TransportResponse> {
    const timeoutCtrl = new AbortController();
    const timeoutId = setTimeout(
      () => timeoutCtrl.abort(),
      this.settings.timeoutMs
    );

    // Names are case-insensitive; later entries replace earlier ones.
    const headers = new Headers({ "User-Agent": this.settings.userAgent });
    for (const [name, value] of [
      ...Object.entries(this.settings.headers),
      ...Object.entries(request.headers),
    ]) {
      headers.set(name, value);
    }

    try {
      const res = await fetch(request.url, {
        method: request.method,
        headers,
        body: request.body,
        dispatcher: this.dispatcher,
        signal: timeoutCtrl.signal,
      });

      return {
        status: res.status,
        ok: res.ok,
        headers: res.headers,
        body: await res.text(),
      };
    } catch (err) {
      throw this.normalizeError(err, request);
    } finally {
      clearTimeout(timeoutId);
    }
  }

  async close(): Promise<void> {
    await this.dispatcher.close();
  }

  /* ------------------------------ Internals ------------------------------ */

  private normalizeError(
    err: unknown,
    request: TransportRequest
  ): TransportError {
    if (err instanceof Error && err.name === "AbortError") {
      return new TransportError({
        message: `Request timed out after ${this.settings.timeoutMs}ms`,
        code: "TIMEOUT",
        details: { method: request.method, url: request.url.href },
        cause: err,
      });
    }

    return new TransportError({
      message: err instanceof Error ? err.message : "Unknown transport error",
      code: "NETWORK_ERROR",
      details: {
        method: request.method,
        url: request.url.href,
        name: err instanceof Error ? err.name : undefined,
      },
      cause: err,
    });
  }
}
