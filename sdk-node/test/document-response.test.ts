import { describe, expect, it } from "vitest";

import {
  ConfigurationError,
  DocumentResponse,
  JsonCodec,
} from "../src/index.js";
import { documentResponseSchema } from "../src/convert/document-response.js";

describe("DocumentResponse", () => {
  it("keeps every field when all are set", () => {
    const jsonContent = {
      title: "Test Document",
      author: "Test Author",
      pages: 5,
    };

    const response = DocumentResponse.builder()
      .doctagsContent("doctags content")
      .filename("test-document.pdf")
      .htmlContent("<html><body>Test content</body></html>")
      .jsonContent(jsonContent)
      .markdownContent("# Test Document\n\nThis is a test document.")
      .textContent("Test Document\n\nThis is a test document.")
      .build();

    expect(response.doctagsContent).toBe("doctags content");
    expect(response.filename).toBe("test-document.pdf");
    expect(response.htmlContent).toBe("<html><body>Test content</body></html>");
    expect(response.jsonContent).toEqual(jsonContent);
    expect(response.markdownContent).toBe(
      "# Test Document\n\nThis is a test document."
    );
    expect(response.textContent).toBe("Test Document\n\nThis is a test document.");
  });

  it("leaves unset formats absent and defaults jsonContent to {}", () => {
    const response = DocumentResponse.builder().filename("a.pdf").build();

    expect(response.doctagsContent).toBeUndefined();
    expect(response.htmlContent).toBeUndefined();
    expect(response.markdownContent).toBeUndefined();
    expect(response.textContent).toBeUndefined();
    expect(response.jsonContent).toEqual({});
  });

  it("keeps empty strings distinct from absent fields", () => {
    const response = DocumentResponse.builder()
      .filename("empty-document.txt")
      .jsonContent({})
      .markdownContent("")
      .textContent("")
      .build();

    expect(response.doctagsContent).toBeUndefined();
    expect(response.filename).toBe("empty-document.txt");
    expect(response.htmlContent).toBeUndefined();
    expect(response.jsonContent).toEqual({});
    expect(response.markdownContent).toBe("");
    expect(response.textContent).toBe("");
  });

  it("copies jsonContent so later changes to the input do not leak in", () => {
    const jsonContent: Record<string, unknown> = { original: "value", count: 1 };

    const response = DocumentResponse.builder()
      .filename("doc.pdf")
      .jsonContent(jsonContent)
      .build();

    jsonContent.modified = "new value";

    expect(Object.keys(response.jsonContent)).toHaveLength(2);
    expect(response.jsonContent.original).toBe("value");
    expect(response.jsonContent.count).toBe(1);
    expect(response.jsonContent).not.toHaveProperty("modified");
    expect(Object.isFrozen(response.jsonContent)).toBe(true);
  });

  it("is frozen", () => {
    const response = DocumentResponse.builder().filename("doc.pdf").build();
    expect(Object.isFrozen(response)).toBe(true);
  });

  it("normalises jsonContent when built through the constructor", () => {
    const response = new DocumentResponse({ filename: "doc.pdf" });
    expect(response.jsonContent).toEqual({});
  });

  it("round-trips through toBuilder", () => {
    const original = DocumentResponse.builder()
      .doctagsContent("<doctag/>")
      .filename("report.docx")
      .htmlContent("<p>hi</p>")
      .jsonContent({ schema_name: "DoclingDocument" })
      .markdownContent("hi")
      .textContent("hi")
      .build();

    const copy = original.toBuilder().build();

    expect(copy).not.toBe(original);
    expect(copy.equals(original)).toBe(true);
    expect(copy).toEqual(original);
  });

  it("builds independent instances from one builder", () => {
    const builder = DocumentResponse.builder().filename("one.pdf");
    const first = builder.build();
    const second = builder.filename("two.pdf").markdownContent("x").build();

    expect(first.filename).toBe("one.pdf");
    expect(first.markdownContent).toBeUndefined();
    expect(second.filename).toBe("two.pdf");
    expect(first.equals(second)).toBe(false);
  });

  it("requires a filename", () => {
    expect(() => DocumentResponse.builder().build()).toThrow(ConfigurationError);
  });

  it("omits absent fields from its wire form but always writes json_content", () => {
    const response = DocumentResponse.builder()
      .filename("doc.pdf")
      .markdownContent("# Title")
      .build();

    expect(JsonCodec.builder().build().encode(response)).toBe(
      '{"filename":"doc.pdf","json_content":{},"md_content":"# Title"}'
    );
  });

  it("decodes the snake_case wire form and treats null as absent", () => {
    const response = documentResponseSchema.parse({
      filename: "doc.pdf",
      html_content: null,
      md_content: "# Title",
      json_content: null,
    });

    expect(response).toBeInstanceOf(DocumentResponse);
    expect(response.filename).toBe("doc.pdf");
    expect(response.htmlContent).toBeUndefined();
    expect(response.markdownContent).toBe("# Title");
    expect(response.jsonContent).toEqual({});
  });
});
