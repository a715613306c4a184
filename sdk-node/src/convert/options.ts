import { freezeList, sameWireForm } from "../utils.js";

export const INPUT_FORMATS = [
  "docx",
  "pptx",
  "html",
  "image",
  "pdf",
  "asciidoc",
  "md",
  "csv",
  "xlsx",
  "xml_uspto",
  "xml_jats",
  "json_docling",
] as const;

export const OUTPUT_FORMATS = [
  "md",
  "json",
  "html",
  "html_split_page",
  "text",
  "doctags",
] as const;

export type InputFormat = (typeof INPUT_FORMATS)[number];
export type OutputFormat = (typeof OUTPUT_FORMATS)[number];
export type ImageRefMode = "placeholder" | "embedded" | "referenced";
export type OcrEngine =
  | "easyocr"
  | "ocrmac"
  | "rapidocr"
  | "tesserocr"
  | "tesseract";
export type PdfBackend =
  | "pypdfium2"
  | "dlparse_v1"
  | "dlparse_v2"
  | "dlparse_v4";
export type TableFormerMode = "fast" | "accurate";
export type ProcessingPipeline = "standard" | "vlm" | "asr";

/** Inclusive 1-based page range. */
export type PageRange = readonly [from: number, to: number];

export type ConvertDocumentOptionsFields = {
  fromFormats?: readonly InputFormat[];
  toFormats?: readonly OutputFormat[];
  imageExportMode?: ImageRefMode;
  doOcr?: boolean;
  forceOcr?: boolean;
  ocrEngine?: OcrEngine;
  ocrLang?: readonly string[];
  pdfBackend?: PdfBackend;
  tableMode?: TableFormerMode;
  pipeline?: ProcessingPipeline;
  pageRange?: PageRange;
  documentTimeout?: number;
  abortOnError?: boolean;
  doTableStructure?: boolean;
  includeImages?: boolean;
  imagesScale?: number;
  mdPageBreakPlaceholder?: string;
  doCodeEnrichment?: boolean;
  doFormulaEnrichment?: boolean;
  doPictureClassification?: boolean;
  doPictureDescription?: boolean;
};

export type ConvertDocumentOptionsWire = {
  from_formats?: InputFormat[];
  to_formats?: OutputFormat[];
  image_export_mode?: ImageRefMode;
  do_ocr?: boolean;
  force_ocr?: boolean;
  ocr_engine?: OcrEngine;
  ocr_lang?: string[];
  pdf_backend?: PdfBackend;
  table_mode?: TableFormerMode;
  pipeline?: ProcessingPipeline;
  page_range?: [number, number];
  document_timeout?: number;
  abort_on_error?: boolean;
  do_table_structure?: boolean;
  include_images?: boolean;
  images_scale?: number;
  md_page_break_placeholder?: string;
  do_code_enrichment?: boolean;
  do_formula_enrichment?: boolean;
  do_picture_classification?: boolean;
  do_picture_description?: boolean;
};

/**
 * Conversion options. Anything left unset is omitted from the request and
 * the service applies its own default.
 */
export class ConvertDocumentOptions {
  readonly fromFormats?: readonly InputFormat[];
  readonly toFormats?: readonly OutputFormat[];
  readonly imageExportMode?: ImageRefMode;
  readonly doOcr?: boolean;
  readonly forceOcr?: boolean;
  readonly ocrEngine?: OcrEngine;
  readonly ocrLang?: readonly string[];
  readonly pdfBackend?: PdfBackend;
  readonly tableMode?: TableFormerMode;
  readonly pipeline?: ProcessingPipeline;
  readonly pageRange?: PageRange;
  readonly documentTimeout?: number;
  readonly abortOnError?: boolean;
  readonly doTableStructure?: boolean;
  readonly includeImages?: boolean;
  readonly imagesScale?: number;
  readonly mdPageBreakPlaceholder?: string;
  readonly doCodeEnrichment?: boolean;
  readonly doFormulaEnrichment?: boolean;
  readonly doPictureClassification?: boolean;
  readonly doPictureDescription?: boolean;

  constructor(fields: ConvertDocumentOptionsFields = {}) {
    this.fromFormats = fields.fromFormats && freezeList(fields.fromFormats);
    this.toFormats = fields.toFormats && freezeList(fields.toFormats);
    this.imageExportMode = fields.imageExportMode;
    this.doOcr = fields.doOcr;
    this.forceOcr = fields.forceOcr;
    this.ocrEngine = fields.ocrEngine;
    this.ocrLang = fields.ocrLang && freezeList(fields.ocrLang);
    this.pdfBackend = fields.pdfBackend;
    this.tableMode = fields.tableMode;
    this.pipeline = fields.pipeline;
    this.pageRange =
      fields.pageRange &&
      Object.freeze([fields.pageRange[0], fields.pageRange[1]] as const);
    this.documentTimeout = fields.documentTimeout;
    this.abortOnError = fields.abortOnError;
    this.doTableStructure = fields.doTableStructure;
    this.includeImages = fields.includeImages;
    this.imagesScale = fields.imagesScale;
    this.mdPageBreakPlaceholder = fields.mdPageBreakPlaceholder;
    this.doCodeEnrichment = fields.doCodeEnrichment;
    this.doFormulaEnrichment = fields.doFormulaEnrichment;
    this.doPictureClassification = fields.doPictureClassification;
    this.doPictureDescription = fields.doPictureDescription;
    Object.freeze(this);
  }

  static builder(): ConvertDocumentOptionsBuilder {
    return new ConvertDocumentOptionsBuilder();
  }

  toBuilder(): ConvertDocumentOptionsBuilder {
    return new ConvertDocumentOptionsBuilder(this);
  }

  equals(other: ConvertDocumentOptions): boolean {
    return sameWireForm(this, other);
  }

  toJSON(): ConvertDocumentOptionsWire {
    const pageRange: [number, number] | undefined =
      this.pageRange && [this.pageRange[0], this.pageRange[1]];

    return {
      ...(this.fromFormats && { from_formats: [...this.fromFormats] }),
      ...(this.toFormats && { to_formats: [...this.toFormats] }),
      ...(this.imageExportMode && { image_export_mode: this.imageExportMode }),
      ...(this.doOcr !== undefined && { do_ocr: this.doOcr }),
      ...(this.forceOcr !== undefined && { force_ocr: this.forceOcr }),
      ...(this.ocrEngine && { ocr_engine: this.ocrEngine }),
      ...(this.ocrLang && { ocr_lang: [...this.ocrLang] }),
      ...(this.pdfBackend && { pdf_backend: this.pdfBackend }),
      ...(this.tableMode && { table_mode: this.tableMode }),
      ...(this.pipeline && { pipeline: this.pipeline }),
      ...(pageRange && { page_range: pageRange }),
      ...(this.documentTimeout !== undefined && {
        document_timeout: this.documentTimeout,
      }),
      ...(this.abortOnError !== undefined && {
        abort_on_error: this.abortOnError,
      }),
      ...(this.doTableStructure !== undefined && {
        do_table_structure: this.doTableStructure,
      }),
      ...(this.includeImages !== undefined && {
        include_images: this.includeImages,
      }),
      ...(this.imagesScale !== undefined && {
        images_scale: this.imagesScale,
      }),
      ...(this.mdPageBreakPlaceholder !== undefined && {
        md_page_break_placeholder: this.mdPageBreakPlaceholder,
      }),
      ...(this.doCodeEnrichment !== undefined && {
        do_code_enrichment: this.doCodeEnrichment,
      }),
      ...(this.doFormulaEnrichment !== undefined && {
        do_formula_enrichment: this.doFormulaEnrichment,
      }),
      ...(this.doPictureClassification !== undefined && {
        do_picture_classification: this.doPictureClassification,
      }),
      ...(this.doPictureDescription !== undefined && {
        do_picture_description: this.doPictureDescription,
      }),
    };
  }
}

export class ConvertDocumentOptionsBuilder {
  private readonly fields: ConvertDocumentOptionsFields;

  constructor(from?: ConvertDocumentOptions) {
    this.fields = from
      ? {
          fromFormats: from.fromFormats,
          toFormats: from.toFormats,
          imageExportMode: from.imageExportMode,
          doOcr: from.doOcr,
          forceOcr: from.forceOcr,
          ocrEngine: from.ocrEngine,
          ocrLang: from.ocrLang,
          pdfBackend: from.pdfBackend,
          tableMode: from.tableMode,
          pipeline: from.pipeline,
          pageRange: from.pageRange,
          documentTimeout: from.documentTimeout,
          abortOnError: from.abortOnError,
          doTableStructure: from.doTableStructure,
          includeImages: from.includeImages,
          imagesScale: from.imagesScale,
          mdPageBreakPlaceholder: from.mdPageBreakPlaceholder,
          doCodeEnrichment: from.doCodeEnrichment,
          doFormulaEnrichment: from.doFormulaEnrichment,
          doPictureClassification: from.doPictureClassification,
          doPictureDescription: from.doPictureDescription,
        }
      : {};
  }

  fromFormats(fromFormats: readonly InputFormat[]): this {
    this.fields.fromFormats = fromFormats;
    return this;
  }

  toFormats(toFormats: readonly OutputFormat[]): this {
    this.fields.toFormats = toFormats;
    return this;
  }

  imageExportMode(imageExportMode: ImageRefMode): this {
    this.fields.imageExportMode = imageExportMode;
    return this;
  }

  doOcr(doOcr: boolean): this {
    this.fields.doOcr = doOcr;
    return this;
  }

  forceOcr(forceOcr: boolean): this {
    this.fields.forceOcr = forceOcr;
    return this;
  }

  ocrEngine(ocrEngine: OcrEngine): this {
    this.fields.ocrEngine = ocrEngine;
    return this;
  }

  ocrLang(ocrLang: readonly string[]): this {
    this.fields.ocrLang = ocrLang;
    return this;
  }

  pdfBackend(pdfBackend: PdfBackend): this {
    this.fields.pdfBackend = pdfBackend;
    return this;
  }

  tableMode(tableMode: TableFormerMode): this {
    this.fields.tableMode = tableMode;
    return this;
  }

  pipeline(pipeline: ProcessingPipeline): this {
    this.fields.pipeline = pipeline;
    return this;
  }

  pageRange(from: number, to: number): this {
    this.fields.pageRange = [from, to];
    return this;
  }

  /** Per-document timeout in seconds, enforced by the service. */
  documentTimeout(seconds: number): this {
    this.fields.documentTimeout = seconds;
    return this;
  }

  abortOnError(abortOnError: boolean): this {
    this.fields.abortOnError = abortOnError;
    return this;
  }

  doTableStructure(doTableStructure: boolean): this {
    this.fields.doTableStructure = doTableStructure;
    return this;
  }

  includeImages(includeImages: boolean): this {
    this.fields.includeImages = includeImages;
    return this;
  }

  imagesScale(imagesScale: number): this {
    this.fields.imagesScale = imagesScale;
    return this;
  }

  mdPageBreakPlaceholder(placeholder: string): this {
    this.fields.mdPageBreakPlaceholder = placeholder;
    return this;
  }

  doCodeEnrichment(enabled: boolean): this {
    this.fields.doCodeEnrichment = enabled;
    return this;
  }

  doFormulaEnrichment(enabled: boolean): this {
    this.fields.doFormulaEnrichment = enabled;
    return this;
  }

  doPictureClassification(enabled: boolean): this {
    this.fields.doPictureClassification = enabled;
    return this;
  }

  doPictureDescription(enabled: boolean): this {
    this.fields.doPictureDescription = enabled;
    return this;
  }

  build(): ConvertDocumentOptions {
    return new ConvertDocumentOptions(this.fields);
  }
}
