import { z } from "zod";

import type { JsonObject } from "./types.js";
import { freezeCopy, sameWireForm } from "./utils.js";

export type HealthCheckResponseFields = {
  status?: string;
  properties?: Readonly<JsonObject>;
};

/**
 * Service health as reported by `GET /health`. The payload is kept as-is in
 * `properties`; `status` is lifted out for convenience.
 */
export class HealthCheckResponse {
  readonly status?: string;
  readonly properties: Readonly<JsonObject>;

  constructor(fields: HealthCheckResponseFields = {}) {
    this.status = fields.status;
    this.properties = freezeCopy(fields.properties);
    Object.freeze(this);
  }

  static builder(): HealthCheckResponseBuilder {
    return new HealthCheckResponseBuilder();
  }

  toBuilder(): HealthCheckResponseBuilder {
    return new HealthCheckResponseBuilder(this);
  }

  equals(other: HealthCheckResponse): boolean {
    return sameWireForm(this, other);
  }

  toJSON(): JsonObject {
    return {
      ...this.properties,
      ...(this.status !== undefined && { status: this.status }),
    };
  }
}

export class HealthCheckResponseBuilder {
  private readonly fields: { status?: string; properties: JsonObject };

  constructor(from?: HealthCheckResponse) {
    this.fields = {
      status: from?.status,
      properties: { ...from?.properties },
    };
  }

  status(status: string | undefined): this {
    this.fields.status = status;
    return this;
  }

  property(name: string, value: unknown): this {
    this.fields.properties[name] = value;
    return this;
  }

  properties(properties: Readonly<JsonObject>): this {
    this.fields.properties = { ...properties };
    return this;
  }

  build(): HealthCheckResponse {
    return new HealthCheckResponse({
      status: this.fields.status,
      properties: this.fields.properties,
    });
  }
}

export const healthCheckResponseSchema = z
  .object({ status: z.string().nullish() })
  .passthrough()
  .transform((wire) =>
    HealthCheckResponse.builder()
      .properties(wire)
      .status(wire.status ?? undefined)
      .build()
  );
