import { ZodError, type ZodType, type ZodTypeDef } from "zod";

import { SerializationError } from "./errors.js";

type CodecSettings = {
  indent: number;
  escapeNonAscii: boolean;
};

const NON_ASCII = /[\u007f-\uffff]/g;

function escapeChar(c: string): string {
  return `\\u${c.charCodeAt(0).toString(16).padStart(4, "0")}`;
}

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Mutable settings for a {@link JsonCodec}. Every setter returns the builder.
 */
export class JsonCodecBuilder {
  private settings: CodecSettings;

  constructor(settings?: Partial<CodecSettings>) {
    this.settings = {
      indent: settings?.indent ?? 0,
      escapeNonAscii: settings?.escapeNonAscii ?? false,
    };
  }

  /** Pretty-prints encoded bodies with `spaces` of indentation (0 = compact). */
  indent(spaces: number): this {
    this.settings.indent = Math.max(0, Math.floor(spaces));
    return this;
  }

  escapeNonAscii(enabled: boolean): this {
    this.settings.escapeNonAscii = enabled;
    return this;
  }

  copy(): JsonCodecBuilder {
    return new JsonCodecBuilder(this.settings);
  }

  build(): JsonCodec {
    return new JsonCodec({ ...this.settings });
  }
}

export class JsonCodec {
  private readonly settings: Readonly<CodecSettings>;

  constructor(settings: CodecSettings) {
    this.settings = Object.freeze(settings);
  }

  static builder(): JsonCodecBuilder {
    return new JsonCodecBuilder();
  }

  toBuilder(): JsonCodecBuilder {
    return new JsonCodecBuilder(this.settings);
  }

  encode(value: unknown): string {
    let json: string | undefined;
    try {
      json = JSON.stringify(value, null, this.settings.indent || undefined);
    } catch (err) {
      throw new SerializationError({
        message: `Cannot encode value: ${describe(err)}`,
        cause: err,
      });
    }

    if (json === undefined) {
      throw new SerializationError({ message: "Value has no JSON form" });
    }

    return this.settings.escapeNonAscii
      ? json.replace(NON_ASCII, escapeChar)
      : json;
  }

  /**
   * Parses `text` and validates it against `schema`, whose output is the
   * value object the caller expects.
   */
  decode<T>(text: string, schema: ZodType<T, ZodTypeDef, unknown>): T {
    let parsed: unknown;
    try {
      parsed = JSON.parse(text);
    } catch (err) {
      throw new SerializationError({
        message: `Invalid JSON: ${describe(err)}`,
        cause: err,
      });
    }

    try {
      return schema.parse(parsed);
    } catch (err) {
      if (err instanceof ZodError) {
        throw new SerializationError({
          message: `Response does not match the expected schema: ${err.message}`,
          issues: err.issues,
          cause: err,
        });
      }
      throw err;
    }
  }
}
