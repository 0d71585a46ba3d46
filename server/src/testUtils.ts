import type { DocumentRasterizer, ImageSize, RenderedPage } from "./services/pageExtractor.js";
import type { GenerativeModel } from "./services/tutorClient.js";
import type { PageImage } from "./types.js";

/**
 * Stand-in for the MuPDF rasterizer. A "PDF" is the text `pdf:<pageCount>`,
 * an "image" is any bytes not starting with `bad`.
 */
export class FakeRasterizer implements DocumentRasterizer {
  public readonly renderedAt: number[] = [];

  public measureImage(bytes: Buffer): ImageSize {
    if (bytes.toString("utf8").startsWith("bad")) {
      throw new Error("unknown image file format");
    }

    return { width: 640, height: 480 };
  }

  public renderPdf(bytes: Buffer, dpi: number): RenderedPage[] {
    const match = /^pdf:(\d+)$/.exec(bytes.toString("utf8"));
    if (!match) {
      throw new Error("no objects found");
    }

    this.renderedAt.push(dpi);
    return Array.from({ length: Number(match[1]) }, (_, index) => ({
      width: 1000 + index,
      height: 1400,
      png: new Uint8Array(Buffer.from(`page-${index}`))
    }));
  }
}

export type ModelCall = {
  prompt: string;
  images: readonly PageImage[];
};

export class StubModel implements GenerativeModel {
  public readonly calls: ModelCall[] = [];

  public constructor(private readonly reply: (call: ModelCall) => Promise<string>) {}

  public static answering(text: string): StubModel {
    return new StubModel(async () => text);
  }

  public static failing(message: string): StubModel {
    return new StubModel(async () => {
      throw new Error(message);
    });
  }

  public async generate(prompt: string, images: readonly PageImage[]): Promise<string> {
    const call = { prompt, images };
    this.calls.push(call);
    return this.reply(call);
  }
}

export function pdfBytes(pageCount: number): Buffer {
  return Buffer.from(`pdf:${pageCount}`);
}

export function pngBytes(label = "img"): Buffer {
  return Buffer.concat([Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]), Buffer.from(label)]);
}

export function jpegBytes(label = "img"): Buffer {
  return Buffer.concat([Buffer.from([0xff, 0xd8, 0xff, 0xe0]), Buffer.from(label)]);
}
