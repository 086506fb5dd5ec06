import type { PDFDocumentProxy } from "pdfjs-dist";
import { describeError } from "../errors";
import { Logger } from "../logger";
import type { Size } from "../types";

const log = Logger.getLogger("pdf");

export interface OpenedPdf {
  /** Every page at scale 1, in PDF points. */
  pageSizes: Size[];
  /** Page 0 drawn at scale 1. */
  firstPage: unknown;
  close(): void;
}

export type PdfOpener = (data: ArrayBuffer, signal: AbortSignal) => Promise<OpenedPdf>;

async function loadPdfJs() {
  const pdfjs = await import("pdfjs-dist");
  if (!pdfjs.GlobalWorkerOptions.workerSrc) {
    const worker = await import("pdfjs-dist/build/pdf.worker.min.mjs?url");
    pdfjs.GlobalWorkerOptions.workerSrc = worker.default;
  }
  return pdfjs;
}

async function renderPage(pdf: PDFDocumentProxy, pageNumber: number): Promise<HTMLCanvasElement> {
  const page = await pdf.getPage(pageNumber);
  const viewport = page.getViewport({ scale: 1 });
  const canvas = document.createElement("canvas");
  canvas.width = Math.ceil(viewport.width);
  canvas.height = Math.ceil(viewport.height);
  const context = canvas.getContext("2d");
  if (!context) {
    throw new Error("Canvas context missing");
  }
  await page.render({ canvasContext: context, viewport }).promise;
  return canvas;
}

function destroy(pdf: PDFDocumentProxy): void {
  pdf.destroy().catch((error: unknown) => {
    log.warn(`cannot destroy document: ${describeError(error)}`);
  });
}

export const openWithPdfJs: PdfOpener = async (data, signal) => {
  const pdfjs = await loadPdfJs();
  const pdf = await pdfjs.getDocument({ data: new Uint8Array(data) }).promise;
  try {
    const pageSizes: Size[] = [];
    for (let pageNumber = 1; pageNumber <= pdf.numPages; pageNumber += 1) {
      signal.throwIfAborted();
      const viewport = (await pdf.getPage(pageNumber)).getViewport({ scale: 1 });
      pageSizes.push({ width: viewport.width, height: viewport.height });
    }
    const firstPage = pageSizes.length > 0 ? await renderPage(pdf, 1) : null;
    log.debug(`opened ${pageSizes.length} pages`);
    return { pageSizes, firstPage, close: () => destroy(pdf) };
  } catch (error) {
    destroy(pdf);
    throw error;
  }
};
