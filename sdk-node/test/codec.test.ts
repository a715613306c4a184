import { describe, expect, it } from "vitest";
import { z } from "zod";

import { JsonCodec, SerializationError } from "../src/index.js";

const pointSchema = z.object({ x: z.number(), y: z.number() });

describe("JsonCodec", () => {
  it("encodes compactly by default", () => {
    const codec = JsonCodec.builder().build();
    expect(codec.encode({ a: 1, b: [true] })).toBe('{"a":1,"b":[true]}');
  });

  it("pretty-prints when an indent is configured", () => {
    const codec = JsonCodec.builder().indent(2).build();
    expect(codec.encode({ a: 1 })).toBe('{\n  "a": 1\n}');
  });

  it("escapes characters outside ASCII when asked", () => {
    const codec = JsonCodec.builder().escapeNonAscii(true).build();
    expect(codec.encode({ name: "café" })).toBe('{"name":"caf\\u00e9"}');
  });

  it("keeps its settings through toBuilder", () => {
    const codec = JsonCodec.builder().indent(4).build();
    const copy = codec.toBuilder().escapeNonAscii(true).build();

    expect(copy.encode({ v: "é" })).toBe('{\n    "v": "\\u00e9"\n}');
    expect(codec.encode({ v: "é" })).toBe('{\n    "v": "é"\n}');
  });

  it("decodes through a schema", () => {
    const codec = JsonCodec.builder().build();
    expect(codec.decode('{"x":1,"y":2}', pointSchema)).toEqual({ x: 1, y: 2 });
  });

  it("raises SerializationError on malformed JSON", () => {
    const codec = JsonCodec.builder().build();
    expect(() => codec.decode("{not json", pointSchema)).toThrow(
      SerializationError
    );
  });

  it("raises SerializationError with issues on a schema mismatch", () => {
    const codec = JsonCodec.builder().build();

    try {
      codec.decode('{"x":"one","y":2}', pointSchema);
      throw new Error("Expected decode() to throw");
    } catch (e) {
      expect(e).toBeInstanceOf(SerializationError);
      if (e instanceof SerializationError) {
        expect(e.code).toBe("SERIALIZATION_ERROR");
        expect(e.issues).toHaveLength(1);
        expect(e.issues[0]?.path).toEqual(["x"]);
      }
    }
  });

  it("refuses values with no JSON form", () => {
    const codec = JsonCodec.builder().build();
    expect(() => codec.encode(undefined)).toThrow(SerializationError);
  });
});
