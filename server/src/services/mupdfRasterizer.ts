import * as mupdf from "mupdf";

import type { DocumentRasterizer, ImageSize, RenderedPage } from "./pageExtractor.js";

// PDF user space is 72 units per inch.
const PDF_POINTS_PER_INCH = 72;

export class MupdfRasterizer implements DocumentRasterizer {
  public measureImage(bytes: Buffer): ImageSize {
    const image = new mupdf.Image(bytes);
    try {
      return {
        width: image.getWidth(),
        height: image.getHeight()
      };
    } finally {
      image.destroy();
    }
  }

  public renderPdf(bytes: Buffer, dpi: number): RenderedPage[] {
    const document = mupdf.Document.openDocument(bytes, "application/pdf");
    const scale = dpi / PDF_POINTS_PER_INCH;
    const matrix = mupdf.Matrix.scale(scale, scale);

    try {
      const pages: RenderedPage[] = [];
      const pageCount = document.countPages();

      for (let pageIndex = 0; pageIndex < pageCount; pageIndex += 1) {
        const page = document.loadPage(pageIndex);
        const pixmap = page.toPixmap(matrix, mupdf.ColorSpace.DeviceRGB, false, true);

        try {
          pages.push({
            width: pixmap.getWidth(),
            height: pixmap.getHeight(),
            png: pixmap.asPNG()
          });
        } finally {
          pixmap.destroy();
          page.destroy();
        }
      }

      return pages;
    } finally {
      document.destroy();
    }
  }
}
