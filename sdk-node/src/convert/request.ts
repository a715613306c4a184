import { ConfigurationError } from "../errors.js";
import { freezeList, sameWireForm } from "../utils.js";
import {
  ConvertDocumentOptions,
  type ConvertDocumentOptionsWire,
} from "./options.js";
import type { FileSourceWire, HttpSourceWire, Source } from "./sources.js";
import type { Target } from "./target.js";

export type ConvertDocumentRequestWire = {
  options: ConvertDocumentOptionsWire;
  sources: Array<HttpSourceWire | FileSourceWire>;
  target?: Target;
};

type RequestFields = {
  sources: readonly Source[];
  options: ConvertDocumentOptions;
  target?: Target;
};

/**
 * Body of `POST /v1/convert/source`: what to convert, how, and where the
 * result goes. Only {@link ConvertDocumentRequestBuilder} creates these.
 */
export class ConvertDocumentRequest {
  readonly sources: readonly Source[];
  readonly options: ConvertDocumentOptions;
  readonly target?: Target;

  private constructor(fields: RequestFields) {
    this.sources = freezeList(fields.sources);
    this.options = fields.options;
    this.target = fields.target;
    Object.freeze(this);
  }

  static builder(): ConvertDocumentRequestBuilder {
    return new ConvertDocumentRequestBuilder();
  }

  /** @internal used by the builder */
  static create(fields: RequestFields): ConvertDocumentRequest {
    return new ConvertDocumentRequest(fields);
  }

  toBuilder(): ConvertDocumentRequestBuilder {
    return new ConvertDocumentRequestBuilder(this);
  }

  equals(other: ConvertDocumentRequest): boolean {
    return sameWireForm(this, other);
  }

  toJSON(): ConvertDocumentRequestWire {
    return {
      options: this.options.toJSON(),
      sources: this.sources.map((s) => s.toJSON()),
      ...(this.target && { target: this.target }),
    };
  }
}

export class ConvertDocumentRequestBuilder {
  private sourceList: Source[];
  private conversionOptions?: ConvertDocumentOptions;
  private outputTarget?: Target;

  constructor(from?: ConvertDocumentRequest) {
    this.sourceList = from ? [...from.sources] : [];
    this.conversionOptions = from?.options;
    this.outputTarget = from?.target;
  }

  /** Replaces every source added so far. */
  sources(sources: readonly Source[]): this {
    this.sourceList = [...sources];
    return this;
  }

  source(source: Source): this {
    this.sourceList.push(source);
    return this;
  }

  options(options: ConvertDocumentOptions): this {
    this.conversionOptions = options;
    return this;
  }

  target(target: Target | undefined): this {
    this.outputTarget = target;
    return this;
  }

  build(): ConvertDocumentRequest {
    if (this.sourceList.length === 0) {
      throw new ConfigurationError(
        "ConvertDocumentRequest: at least one source is required"
      );
    }

    return ConvertDocumentRequest.create({
      sources: this.sourceList,
      options: this.conversionOptions ?? ConvertDocumentOptions.builder().build(),
      target: this.outputTarget,
    });
  }
}
