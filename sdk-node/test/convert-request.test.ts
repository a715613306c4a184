import { afterEach, describe, expect, it } from "vitest";
import fsp from "node:fs/promises";
import os from "node:os";
import path from "node:path";

import {
  ConfigurationError,
  ConvertDocumentOptions,
  ConvertDocumentRequest,
  ConvertDocumentResponse,
  DocumentResponse,
  ErrorItem,
  FileSource,
  HttpSource,
  Targets,
} from "../src/index.js";

describe("ConvertDocumentRequest", () => {
  it("serialises sources, options and target in snake_case", () => {
    const request = ConvertDocumentRequest.builder()
      .source(
        HttpSource.builder()
          .url("https://example.com/report.pdf")
          .header("Authorization", "Bearer test-token")
          .build()
      )
      .source(FileSource.fromBuffer("notes.md", Buffer.from("# Notes")))
      .options(
        ConvertDocumentOptions.builder()
          .toFormats(["md", "json"])
          .doOcr(false)
          .tableMode("accurate")
          .pageRange(1, 3)
          .build()
      )
      .target(Targets.inBody())
      .build();

    expect(request.toJSON()).toEqual({
      options: {
        to_formats: ["md", "json"],
        do_ocr: false,
        table_mode: "accurate",
        page_range: [1, 3],
      },
      sources: [
        {
          kind: "http",
          url: "https://example.com/report.pdf",
          headers: { Authorization: "Bearer test-token" },
        },
        {
          kind: "file",
          filename: "notes.md",
          base64_string: "IyBOb3Rlcw==",
        },
      ],
      target: { kind: "inbody" },
    });
  });

  it("defaults to empty options and leaves the target out", () => {
    const request = ConvertDocumentRequest.builder()
      .source(HttpSource.of("https://example.com/a.pdf"))
      .build();

    expect(JSON.stringify(request)).toBe(
      '{"options":{},"sources":[{"kind":"http","url":"https://example.com/a.pdf","headers":{}}]}'
    );
  });

  it("rejects a request without sources", () => {
    expect(() => ConvertDocumentRequest.builder().build()).toThrow(
      ConfigurationError
    );
  });

  it("rejects a blank source url", () => {
    expect(() => HttpSource.builder().url("  ").build()).toThrow(
      ConfigurationError
    );
  });

  it("round-trips through toBuilder and copies the source list", () => {
    const original = ConvertDocumentRequest.builder()
      .source(HttpSource.of("https://example.com/a.pdf"))
      .options(ConvertDocumentOptions.builder().fromFormats(["pdf"]).build())
      .target(Targets.zip())
      .build();

    const builder = original.toBuilder();
    expect(builder.build().equals(original)).toBe(true);

    const extended = builder
      .source(HttpSource.of("https://example.com/b.pdf"))
      .build();

    expect(original.sources).toHaveLength(1);
    expect(extended.sources).toHaveLength(2);
    expect(Object.isFrozen(original.sources)).toBe(true);
  });

  it("snapshots option lists on build", () => {
    const formats: Array<"md" | "html"> = ["md"];
    const options = ConvertDocumentOptions.builder().toFormats(formats).build();

    formats.push("html");

    expect(options.toFormats).toEqual(["md"]);
    expect(options.toBuilder().build().equals(options)).toBe(true);
  });

  it("builds a put target with its url", () => {
    expect(Targets.put("https://storage.example.com/out")).toEqual({
      kind: "put",
      url: "https://storage.example.com/out",
    });
    expect(() => Targets.put("")).toThrow(ConfigurationError);
  });
});

describe("toBuilder round trips", () => {
  it("copies an HttpSource with headers", () => {
    const original = HttpSource.builder()
      .url("https://example.com/a.pdf")
      .header("Authorization", "Bearer test-token")
      .build();

    const copy = original.toBuilder().build();

    expect(copy.equals(original)).toBe(true);
    expect(copy.headers).toEqual({ Authorization: "Bearer test-token" });
  });

  it("copies a FileSource", () => {
    const original = FileSource.fromBuffer("notes.md", Buffer.from("# Notes"));

    const copy = original.toBuilder().build();

    expect(copy.equals(original)).toBe(true);
    expect(copy.base64String).toBe("IyBOb3Rlcw==");
  });

  it("copies an ErrorItem", () => {
    const original = ErrorItem.builder()
      .componentType("pipeline")
      .errorMessage("OCR failed")
      .moduleName("ocr")
      .build();

    const copy = original.toBuilder().build();

    expect(copy.equals(original)).toBe(true);
    expect(copy.moduleName).toBe("ocr");
  });
});

describe("FileSource.fromPath", () => {
  const created: string[] = [];

  afterEach(async () => {
    await Promise.allSettled(created.map((p) => fsp.unlink(p)));
    created.length = 0;
  });

  it("reads and base64-encodes a local file", async () => {
    const filePath = path.join(
      os.tmpdir(),
      `docserve-sdk-${Date.now()}-sample.txt`
    );
    created.push(filePath);
    await fsp.writeFile(filePath, "hello");

    const source = await FileSource.fromPath(filePath);

    expect(source.filename).toBe(path.basename(filePath));
    expect(source.base64String).toBe("aGVsbG8=");
  });

  it("fails for a missing file", async () => {
    await expect(
      FileSource.fromPath(path.join(os.tmpdir(), "docserve-missing-file.pdf"))
    ).rejects.toBeInstanceOf(ConfigurationError);
  });
});

describe("ConvertDocumentResponse", () => {
  const document = DocumentResponse.builder()
    .filename("report.pdf")
    .markdownContent("# Report")
    .build();

  it("round-trips through toBuilder", () => {
    const original = ConvertDocumentResponse.builder()
      .document(document)
      .error(
        ErrorItem.builder()
          .componentType("document_backend")
          .errorMessage("page 2 unreadable")
          .moduleName("pdf")
          .build()
      )
      .processingTime(1.5)
      .status("partial_success")
      .timings({ pipeline_total: { count: 1 } })
      .build();

    const copy = original.toBuilder().build();

    expect(copy.equals(original)).toBe(true);
    expect(copy.isSuccessful()).toBe(true);
    expect(copy.errors[0]?.errorMessage).toBe("page 2 unreadable");
  });

  it("defaults errors and timings to empty", () => {
    const response = ConvertDocumentResponse.builder()
      .document(document)
      .build();

    expect(response.errors).toEqual([]);
    expect(response.timings).toEqual({});
    expect(response.status).toBeUndefined();
    expect(response.isSuccessful()).toBe(false);
  });

  it("requires a document", () => {
    expect(() => ConvertDocumentResponse.builder().build()).toThrow(
      ConfigurationError
    );
  });
});
