import type { FolderScanner } from "../../client/src/api";
import type { PaginatedDocument, RasterDocument, VectorDocument, ViewerDocument } from "../../client/src/document/Document";
import { createPaginatedDocument, createRasterDocument, createVectorDocument } from "../../client/src/document/Document";
import type { DocumentDecoder } from "../../client/src/document/DocumentLoader";
import { DecodeError } from "../../client/src/errors";

export const raster = (path: string, width: number, height: number): RasterDocument =>
  createRasterDocument({
    path,
    fileSize: 2048,
    pixels: null,
    width,
    height,
    colorDepth: { channels: "rgb", bitsPerChannel: 8 },
  });

export const vector = (path: string, width: number, height: number): VectorDocument =>
  createVectorDocument({ path, fileSize: 512, scene: "<svg/>", viewBox: { width, height } });

export const paginated = (path: string, pageCount: number): PaginatedDocument =>
  createPaginatedDocument({
    path,
    fileSize: 4096,
    pages: Array.from({ length: pageCount }, (_, index) => ({
      size: { width: 612, height: 792 },
      content: index,
    })),
  });

/** Resolves documents from a table; an Error entry makes that path fail. */
export function tableDecoder(
  table: Record<string, ViewerDocument | Error>
): DocumentDecoder & { calls: string[]; released: string[] } {
  const calls: string[] = [];
  const released: string[] = [];
  return {
    calls,
    released,
    release(document) {
      released.push(document.path);
    },
    async decode(path) {
      calls.push(path);
      const entry = table[path];
      if (entry === undefined) {
        throw new DecodeError(path, "file not found");
      }
      if (entry instanceof Error) {
        throw entry;
      }
      return entry;
    },
  };
}

interface PendingDecode {
  resolve: (document: ViewerDocument) => void;
  reject: (reason: unknown) => void;
  signal: AbortSignal;
}

/** Leaves every decode outstanding until the test settles it. */
export function deferredDecoder() {
  const pending = new Map<string, PendingDecode>();
  const released: string[] = [];
  const decoder: DocumentDecoder = {
    decode: (path, signal) =>
      new Promise<ViewerDocument>((resolve, reject) => {
        pending.set(path, { resolve, reject, signal });
      }),
    release: (document) => {
      released.push(document.path);
    },
  };
  const get = (path: string): PendingDecode => {
    const entry = pending.get(path);
    if (!entry) {
      throw new Error(`no decode pending for ${path}`);
    }
    return entry;
  };
  return { decoder, get, released };
}

export function tableScanner(listings: Record<string, string[]>): FolderScanner & { calls: string[] } {
  const calls: string[] = [];
  return {
    calls,
    async scan(directory) {
      calls.push(directory);
      return [...(listings[directory] ?? [])];
    },
  };
}

/** Holds each folder listing until the test releases it; `ready` listings answer at once. */
export function deferredScanner(ready: Record<string, string[]> = {}) {
  const pending = new Map<string, (paths: string[]) => void>();
  const scanner: FolderScanner = {
    scan: (directory) =>
      new Promise<string[]>((resolve) => {
        const listing = ready[directory];
        if (listing) {
          resolve([...listing]);
          return;
        }
        pending.set(directory, resolve);
      }),
  };
  const finish = (directory: string, paths: string[]): void => {
    const resolve = pending.get(directory);
    if (!resolve) {
      throw new Error(`no scan pending for ${directory}`);
    }
    resolve(paths);
  };
  return { scanner, finish };
}
