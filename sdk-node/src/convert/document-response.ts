import { z } from "zod";

import { ConfigurationError } from "../errors.js";
import type { JsonObject } from "../types.js";
import { freezeCopy, sameWireForm } from "../utils.js";

export type DocumentResponseFields = {
  doctagsContent?: string;
  filename: string;
  htmlContent?: string;
  jsonContent?: Readonly<JsonObject>;
  markdownContent?: string;
  textContent?: string;
};

export type DocumentResponseWire = {
  doctags_content?: string;
  filename: string;
  html_content?: string;
  json_content: JsonObject;
  md_content?: string;
  text_content?: string;
};

/**
 * A converted document in every representation the service produced.
 *
 * Formats that were not requested are absent, never empty strings.
 * `jsonContent` is always present and defaults to an empty object.
 */
export class DocumentResponse {
  readonly doctagsContent?: string;
  readonly filename: string;
  readonly htmlContent?: string;
  readonly jsonContent: Readonly<JsonObject>;
  readonly markdownContent?: string;
  readonly textContent?: string;

  constructor(fields: DocumentResponseFields) {
    this.doctagsContent = fields.doctagsContent;
    this.filename = fields.filename;
    this.htmlContent = fields.htmlContent;
    this.jsonContent = freezeCopy(fields.jsonContent);
    this.markdownContent = fields.markdownContent;
    this.textContent = fields.textContent;
    Object.freeze(this);
  }

  static builder(): DocumentResponseBuilder {
    return new DocumentResponseBuilder();
  }

  toBuilder(): DocumentResponseBuilder {
    return new DocumentResponseBuilder(this);
  }

  equals(other: DocumentResponse): boolean {
    return sameWireForm(this, other);
  }

  toJSON(): DocumentResponseWire {
    return {
      ...(this.doctagsContent !== undefined && {
        doctags_content: this.doctagsContent,
      }),
      filename: this.filename,
      ...(this.htmlContent !== undefined && { html_content: this.htmlContent }),
      json_content: { ...this.jsonContent },
      ...(this.markdownContent !== undefined && {
        md_content: this.markdownContent,
      }),
      ...(this.textContent !== undefined && { text_content: this.textContent }),
    };
  }
}

export class DocumentResponseBuilder {
  private readonly fields: Partial<DocumentResponseFields>;

  constructor(from?: DocumentResponse) {
    this.fields = from
      ? {
          doctagsContent: from.doctagsContent,
          filename: from.filename,
          htmlContent: from.htmlContent,
          jsonContent: from.jsonContent,
          markdownContent: from.markdownContent,
          textContent: from.textContent,
        }
      : {};
  }

  doctagsContent(doctagsContent: string | undefined): this {
    this.fields.doctagsContent = doctagsContent;
    return this;
  }

  filename(filename: string): this {
    this.fields.filename = filename;
    return this;
  }

  htmlContent(htmlContent: string | undefined): this {
    this.fields.htmlContent = htmlContent;
    return this;
  }

  /** Passing `undefined` resets to an empty object. */
  jsonContent(jsonContent: Readonly<JsonObject> | undefined): this {
    this.fields.jsonContent = jsonContent;
    return this;
  }

  markdownContent(markdownContent: string | undefined): this {
    this.fields.markdownContent = markdownContent;
    return this;
  }

  textContent(textContent: string | undefined): this {
    this.fields.textContent = textContent;
    return this;
  }

  build(): DocumentResponse {
    const { filename } = this.fields;
    if (filename === undefined) {
      throw new ConfigurationError("DocumentResponse: filename is required");
    }

    return new DocumentResponse({ ...this.fields, filename });
  }
}

export const documentResponseSchema = z
  .object({
    doctags_content: z.string().nullish(),
    filename: z.string(),
    html_content: z.string().nullish(),
    json_content: z.record(z.unknown()).nullish(),
    md_content: z.string().nullish(),
    text_content: z.string().nullish(),
  })
  .transform((wire) =>
    DocumentResponse.builder()
      .doctagsContent(wire.doctags_content ?? undefined)
      .filename(wire.filename)
      .htmlContent(wire.html_content ?? undefined)
      .jsonContent(wire.json_content ?? undefined)
      .markdownContent(wire.md_content ?? undefined)
      .textContent(wire.text_content ?? undefined)
      .build()
  );
