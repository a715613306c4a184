import { z } from "zod";

import { ConfigurationError } from "../errors.js";
import type { JsonObject } from "../types.js";
import { freezeCopy, freezeList, sameWireForm } from "../utils.js";
import {
  DocumentResponse,
  documentResponseSchema,
  type DocumentResponseWire,
} from "./document-response.js";

export const CONVERSION_STATUSES = [
  "pending",
  "started",
  "failure",
  "success",
  "partial_success",
  "skipped",
] as const;

export type ConversionStatus = (typeof CONVERSION_STATUSES)[number];

/* -------------------------------- ErrorItem ------------------------------- */

export type ErrorItemFields = {
  componentType: string;
  errorMessage: string;
  moduleName: string;
};

export type ErrorItemWire = {
  component_type: string;
  error_message: string;
  module_name: string;
};

/** One processing error reported by a conversion pipeline component. */
export class ErrorItem {
  readonly componentType: string;
  readonly errorMessage: string;
  readonly moduleName: string;

  constructor(fields: ErrorItemFields) {
    this.componentType = fields.componentType;
    this.errorMessage = fields.errorMessage;
    this.moduleName = fields.moduleName;
    Object.freeze(this);
  }

  static builder(): ErrorItemBuilder {
    return new ErrorItemBuilder();
  }

  toBuilder(): ErrorItemBuilder {
    return new ErrorItemBuilder(this);
  }

  equals(other: ErrorItem): boolean {
    return sameWireForm(this, other);
  }

  toJSON(): ErrorItemWire {
    return {
      component_type: this.componentType,
      error_message: this.errorMessage,
      module_name: this.moduleName,
    };
  }
}

export class ErrorItemBuilder {
  private readonly fields: Partial<ErrorItemFields>;

  constructor(from?: ErrorItem) {
    this.fields = from
      ? {
          componentType: from.componentType,
          errorMessage: from.errorMessage,
          moduleName: from.moduleName,
        }
      : {};
  }

  componentType(componentType: string): this {
    this.fields.componentType = componentType;
    return this;
  }

  errorMessage(errorMessage: string): this {
    this.fields.errorMessage = errorMessage;
    return this;
  }

  moduleName(moduleName: string): this {
    this.fields.moduleName = moduleName;
    return this;
  }

  build(): ErrorItem {
    const { componentType, errorMessage, moduleName } = this.fields;
    if (
      componentType === undefined ||
      errorMessage === undefined ||
      moduleName === undefined
    ) {
      throw new ConfigurationError(
        "ErrorItem: componentType, errorMessage and moduleName are required"
      );
    }
    return new ErrorItem({ componentType, errorMessage, moduleName });
  }
}

/* ------------------------- ConvertDocumentResponse ------------------------ */

export type ConvertDocumentResponseFields = {
  document: DocumentResponse;
  errors?: readonly ErrorItem[];
  processingTime?: number;
  status?: string;
  timings?: Readonly<JsonObject>;
};

export type ConvertDocumentResponseWire = {
  document: DocumentResponseWire;
  errors: ErrorItemWire[];
  processing_time?: number;
  status?: string;
  timings: JsonObject;
};

/**
 * Result of a conversion: the document plus processing metadata.
 *
 * `status` stays an open string so statuses added by newer service versions
 * still decode; `timings` is passed through untouched.
 */
export class ConvertDocumentResponse {
  readonly document: DocumentResponse;
  readonly errors: readonly ErrorItem[];
  readonly processingTime?: number;
  readonly status?: ConversionStatus | (string & {});
  readonly timings: Readonly<JsonObject>;

  constructor(fields: ConvertDocumentResponseFields) {
    this.document = fields.document;
    this.errors = freezeList(fields.errors);
    this.processingTime = fields.processingTime;
    this.status = fields.status;
    this.timings = freezeCopy(fields.timings);
    Object.freeze(this);
  }

  static builder(): ConvertDocumentResponseBuilder {
    return new ConvertDocumentResponseBuilder();
  }

  toBuilder(): ConvertDocumentResponseBuilder {
    return new ConvertDocumentResponseBuilder(this);
  }

  isSuccessful(): boolean {
    return this.status === "success" || this.status === "partial_success";
  }

  equals(other: ConvertDocumentResponse): boolean {
    return sameWireForm(this, other);
  }

  toJSON(): ConvertDocumentResponseWire {
    return {
      document: this.document.toJSON(),
      errors: this.errors.map((e) => e.toJSON()),
      ...(this.processingTime !== undefined && {
        processing_time: this.processingTime,
      }),
      ...(this.status !== undefined && { status: this.status }),
      timings: { ...this.timings },
    };
  }
}

export class ConvertDocumentResponseBuilder {
  private readonly fields: Partial<ConvertDocumentResponseFields>;

  constructor(from?: ConvertDocumentResponse) {
    this.fields = from
      ? {
          document: from.document,
          errors: from.errors,
          processingTime: from.processingTime,
          status: from.status,
          timings: from.timings,
        }
      : {};
  }

  document(document: DocumentResponse): this {
    this.fields.document = document;
    return this;
  }

  errors(errors: readonly ErrorItem[]): this {
    this.fields.errors = errors;
    return this;
  }

  error(error: ErrorItem): this {
    this.fields.errors = [...(this.fields.errors ?? []), error];
    return this;
  }

  processingTime(seconds: number | undefined): this {
    this.fields.processingTime = seconds;
    return this;
  }

  status(status: ConversionStatus | (string & {}) | undefined): this {
    this.fields.status = status;
    return this;
  }

  timings(timings: Readonly<JsonObject> | undefined): this {
    this.fields.timings = timings;
    return this;
  }

  build(): ConvertDocumentResponse {
    const { document } = this.fields;
    if (document === undefined) {
      throw new ConfigurationError(
        "ConvertDocumentResponse: document is required"
      );
    }
    return new ConvertDocumentResponse({ ...this.fields, document });
  }
}

/* --------------------------------- Schemas -------------------------------- */

export const errorItemSchema = z
  .object({
    component_type: z.string(),
    error_message: z.string(),
    module_name: z.string(),
  })
  .transform(
    (wire) =>
      new ErrorItem({
        componentType: wire.component_type,
        errorMessage: wire.error_message,
        moduleName: wire.module_name,
      })
  );

export const convertDocumentResponseSchema = z
  .object({
    document: documentResponseSchema,
    errors: z.array(errorItemSchema).nullish(),
    processing_time: z.number().nullish(),
    status: z.string().nullish(),
    timings: z.record(z.unknown()).nullish(),
  })
  .transform((wire) =>
    ConvertDocumentResponse.builder()
      .document(wire.document)
      .errors(wire.errors ?? [])
      .processingTime(wire.processing_time ?? undefined)
      .status(wire.status ?? undefined)
      .timings(wire.timings ?? undefined)
      .build()
  );
