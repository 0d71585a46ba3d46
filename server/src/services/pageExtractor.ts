import { AppError, DecodeError, UnsupportedFormatError, errorMessage } from "../errors.js";
import type { DocumentKind, PageImage, PageMimeType, PagePreview, UploadedDocument } from "../types.js";

export const DEFAULT_RENDER_DPI = 150;

export type ImageSize = {
  width: number;
  height: number;
};

export type RenderedPage = ImageSize & {
  png: Uint8Array;
};

export interface DocumentRasterizer {
  measureImage(bytes: Buffer): ImageSize;
  renderPdf(bytes: Buffer, dpi: number): RenderedPage[];
}

const MIME_TO_KIND = new Map<string, DocumentKind>([
  ["image/jpeg", "image"],
  ["image/jpg", "image"],
  ["image/png", "image"],
  ["application/pdf", "pdf"]
]);

export function resolveDocumentKind(mimeType: string): DocumentKind {
  const kind = MIME_TO_KIND.get(normalizeMimeType(mimeType));
  if (!kind) {
    throw new UnsupportedFormatError(mimeType);
  }

  return kind;
}

export function isSupportedMimeType(mimeType: string): boolean {
  return MIME_TO_KIND.has(normalizeMimeType(mimeType));
}

function normalizeMimeType(mimeType: string): string {
  return mimeType.split(";")[0].trim().toLowerCase();
}

export class PageExtractor {
  public constructor(
    private readonly rasterizer: DocumentRasterizer,
    private readonly dpi: number = DEFAULT_RENDER_DPI
  ) {}

  public extract(document: UploadedDocument): PageImage[] {
    const kind = resolveDocumentKind(document.mimeType);

    try {
      return kind === "pdf" ? this.extractPdf(document.bytes) : [this.extractImage(document)];
    } catch (error) {
      if (error instanceof AppError) {
        throw error;
      }

      throw new DecodeError(
        `Could not read ${describeDocument(document, kind)}: ${errorMessage(error)}`,
        { cause: error }
      );
    }
  }

  private extractImage(document: UploadedDocument): PageImage {
    const { width, height } = this.rasterizer.measureImage(document.bytes);
    const mimeType = detectImageMimeType(document.bytes);
    if (!mimeType) {
      throw new Error("content is not a PNG or JPEG file");
    }

    return {
      index: 0,
      width,
      height,
      mimeType,
      data: document.bytes
    };
  }

  private extractPdf(bytes: Buffer): PageImage[] {
    return this.rasterizer.renderPdf(bytes, this.dpi).map((page, index) => ({
      index,
      width: page.width,
      height: page.height,
      mimeType: "image/png",
      data: Buffer.from(page.png)
    }));
  }
}

export function toPreview(page: PageImage): PagePreview {
  return {
    width: page.width,
    height: page.height,
    dataUrl: toDataUrl(page)
  };
}

export function toDataUrl(page: PageImage): string {
  return `data:${page.mimeType};base64,${page.data.toString("base64")}`;
}

const PNG_SIGNATURE = Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]);
const JPEG_SIGNATURE = Buffer.from([0xff, 0xd8, 0xff]);

// The declared upload type is only a hint; the data URL sent to the model uses the real format.
export function detectImageMimeType(bytes: Buffer): PageMimeType | null {
  if (bytes.subarray(0, PNG_SIGNATURE.length).equals(PNG_SIGNATURE)) {
    return "image/png";
  }

  if (bytes.subarray(0, JPEG_SIGNATURE.length).equals(JPEG_SIGNATURE)) {
    return "image/jpeg";
  }

  return null;
}

function describeDocument(document: UploadedDocument, kind: DocumentKind): string {
  const label = kind === "pdf" ? "PDF" : "image";
  return document.fileName ? `${label} "${document.fileName}"` : label;
}
