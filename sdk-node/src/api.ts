import type { ConvertDocumentRequest } from "./convert/request.js";
import type { ConvertDocumentResponse } from "./convert/response.js";
import type { HealthCheckResponse } from "./health.js";

/**
 * Operations every DocServe client offers, whatever transport it binds to.
 * Each call settles once: with the decoded response or with an error.
 */
export interface DocServeApi {
  /** Current health of the service. */
  health(): Promise<HealthCheckResponse>;

  /**
   * Converts the request's sources with its options and returns the
   * converted document along with processing details and errors.
   */
  convertSource(
    request: ConvertDocumentRequest
  ): Promise<ConvertDocumentResponse>;

  /**
   * A builder seeded with this client's configuration, for creating a
   * modified copy.
   */
  toBuilder(): DocServeApiBuilder<DocServeApi>;
}

export interface DocServeApiBuilder<T extends DocServeApi> {
  build(): T;
}
