import { fetchFile } from "../api";
import { DecodeError } from "../errors";
import type { Size } from "../types";
import type { ViewerDocument } from "./Document";
import { createPaginatedDocument, createRasterDocument, createVectorDocument, documentKindFromPath } from "./Document";
import type { DocumentDecoder } from "./DocumentLoader";
import type { PdfOpener } from "./PdfPages";
import { openWithPdfJs } from "./PdfPages";

const SVG_TAG = /<svg\b[^>]*>/i;
const LENGTH = /^\s*([0-9]*\.?[0-9]+)\s*(px)?\s*$/;

function attribute(tag: string, name: string): string | null {
  const match = new RegExp(`\\s${name}\\s*=\\s*["']([^"']*)["']`).exec(tag);
  return match ? match[1] : null;
}

function parseLength(value: string | null): number | null {
  if (value === null) {
    return null;
  }
  const match = LENGTH.exec(value);
  return match ? Number(match[1]) : null;
}

/**
 * Reads the intrinsic size of an SVG from its root element: explicit
 * width/height in user units first, then the viewBox.
 */
export function parseSvgSize(text: string): Size | null {
  const tag = SVG_TAG.exec(text)?.[0];
  if (!tag) {
    return null;
  }
  const width = parseLength(attribute(tag, "width"));
  const height = parseLength(attribute(tag, "height"));
  if (width !== null && height !== null && width > 0 && height > 0) {
    return { width, height };
  }
  const viewBox = attribute(tag, "viewBox");
  if (viewBox === null) {
    return null;
  }
  const parts = viewBox.trim().split(/[\s,]+/).map(Number);
  if (parts.length !== 4 || parts.some((part) => !Number.isFinite(part))) {
    return null;
  }
  return { width: parts[2], height: parts[3] };
}

export interface BrowserDecoderOptions {
  openPdf?: PdfOpener;
}

/** Builds a document and hands its cleanup to `dispose` if construction fails. */
function adopt<D extends ViewerDocument>(build: () => D, dispose: () => void): D {
  try {
    return build();
  } catch (error) {
    dispose();
    throw error;
  }
}

/**
 * Decodes raster images with createImageBitmap, sizes SVGs from their markup
 * and opens PDFs with pdf.js. Bitmaps and PDF handles are freed on release.
 */
export function createBrowserDecoder(apiBase: string, options: BrowserDecoderOptions = {}): DocumentDecoder {
  const openPdf = options.openPdf ?? openWithPdfJs;
  const disposers = new WeakMap<ViewerDocument, () => void>();

  return {
    async decode(path: string, signal: AbortSignal): Promise<ViewerDocument> {
      const kind = documentKindFromPath(path);
      if (kind === null) {
        throw new DecodeError(path, "unsupported file type");
      }
      const response = await fetchFile(apiBase, path, signal);
      const blob = await response.blob();

      if (kind === "vector") {
        const text = await blob.text();
        const viewBox = parseSvgSize(text);
        if (!viewBox) {
          throw new DecodeError(path, "SVG has no usable width, height or viewBox");
        }
        return createVectorDocument({ path, fileSize: blob.size, scene: text, viewBox });
      }

      if (kind === "paginated") {
        const pdf = await openPdf(await blob.arrayBuffer(), signal);
        const doc = adopt(
          () =>
            createPaginatedDocument({
              path,
              fileSize: blob.size,
              // only page 0 is drawn
              pages: pdf.pageSizes.map((size, index) => ({ size, content: index === 0 ? pdf.firstPage : null })),
            }),
          () => pdf.close()
        );
        disposers.set(doc, () => pdf.close());
        return doc;
      }

      const bitmap = await createImageBitmap(blob);
      const close = () => bitmap.close();
      const doc = adopt(
        () =>
          createRasterDocument({
            path,
            fileSize: blob.size,
            pixels: bitmap,
            width: bitmap.width,
            height: bitmap.height,
            colorDepth: { channels: "rgba", bitsPerChannel: 8 },
          }),
        close
      );
      disposers.set(doc, close);
      return doc;
    },

    release(document: ViewerDocument): void {
      const dispose = disposers.get(document);
      if (dispose) {
        disposers.delete(document);
        dispose();
      }
    },
  };
}
