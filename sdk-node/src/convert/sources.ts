import { readFile } from "node:fs/promises";
import path from "node:path";

import { ConfigurationError } from "../errors.js";
import { ensureNotBlank, freezeCopy, sameWireForm } from "../utils.js";

/* ------------------------------- HttpSource ------------------------------- */

export type HttpSourceFields = {
  url: string;
  headers?: Readonly<Record<string, string>>;
};

export type HttpSourceWire = {
  kind: "http";
  url: string;
  headers: Record<string, string>;
};

/** A document the service downloads itself. */
export class HttpSource {
  readonly kind = "http";
  readonly url: string;
  readonly headers: Readonly<Record<string, string>>;

  constructor(fields: HttpSourceFields) {
    this.url = fields.url;
    this.headers = freezeCopy(fields.headers);
    Object.freeze(this);
  }

  static builder(): HttpSourceBuilder {
    return new HttpSourceBuilder();
  }

  static of(url: string): HttpSource {
    return HttpSource.builder().url(url).build();
  }

  toBuilder(): HttpSourceBuilder {
    return new HttpSourceBuilder(this);
  }

  equals(other: Source): boolean {
    return sameWireForm(this, other);
  }

  toJSON(): HttpSourceWire {
    return { kind: this.kind, url: this.url, headers: { ...this.headers } };
  }
}

export class HttpSourceBuilder {
  private readonly fields: Partial<HttpSourceFields>;

  constructor(from?: HttpSource) {
    this.fields = from ? { url: from.url, headers: { ...from.headers } } : {};
  }

  url(url: string): this {
    this.fields.url = url;
    return this;
  }

  headers(headers: Readonly<Record<string, string>>): this {
    this.fields.headers = { ...headers };
    return this;
  }

  header(name: string, value: string): this {
    this.fields.headers = { ...this.fields.headers, [name]: value };
    return this;
  }

  build(): HttpSource {
    return new HttpSource({
      url: ensureNotBlank(this.fields.url, "HttpSource.url"),
      headers: this.fields.headers,
    });
  }
}

/* ------------------------------- FileSource ------------------------------- */

export type FileSourceFields = {
  filename: string;
  base64String: string;
};

export type FileSourceWire = {
  kind: "file";
  filename: string;
  base64_string: string;
};

/** A document uploaded inline as base64. */
export class FileSource {
  readonly kind = "file";
  readonly filename: string;
  readonly base64String: string;

  constructor(fields: FileSourceFields) {
    this.filename = fields.filename;
    this.base64String = fields.base64String;
    Object.freeze(this);
  }

  static builder(): FileSourceBuilder {
    return new FileSourceBuilder();
  }

  static fromBuffer(filename: string, content: Uint8Array): FileSource {
    return FileSource.builder()
      .filename(filename)
      .base64String(Buffer.from(content).toString("base64"))
      .build();
  }

  /**
   * Reads a local file. `filename` defaults to the file's base name.
   */
  static async fromPath(
    filePath: string,
    filename?: string
  ): Promise<FileSource> {
    const resolved = ensureNotBlank(filePath, "filePath");
    let content: Buffer;
    try {
      content = await readFile(resolved);
    } catch {
      throw new ConfigurationError(
        `File not found or not readable: ${resolved}`
      );
    }
    return FileSource.fromBuffer(filename ?? path.basename(resolved), content);
  }

  toBuilder(): FileSourceBuilder {
    return new FileSourceBuilder(this);
  }

  equals(other: Source): boolean {
    return sameWireForm(this, other);
  }

  toJSON(): FileSourceWire {
    return {
      kind: this.kind,
      filename: this.filename,
      base64_string: this.base64String,
    };
  }
}

export class FileSourceBuilder {
  private readonly fields: Partial<FileSourceFields>;

  constructor(from?: FileSource) {
    this.fields = from
      ? { filename: from.filename, base64String: from.base64String }
      : {};
  }

  filename(filename: string): this {
    this.fields.filename = filename;
    return this;
  }

  base64String(base64String: string): this {
    this.fields.base64String = base64String;
    return this;
  }

  build(): FileSource {
    return new FileSource({
      filename: ensureNotBlank(this.fields.filename, "FileSource.filename"),
      base64String: ensureNotBlank(
        this.fields.base64String,
        "FileSource.base64String"
      ),
    });
  }
}

export type Source = HttpSource | FileSource;
