import { DecodeError } from "../errors";
import type { Matrix } from "../transform/TransformModel";
import { IDENTITY_TRANSFORM, effectiveSize, transformMatrix } from "../transform/TransformModel";
import type { Size, TransformState } from "../types";
import { isPositiveSize } from "../types";
import type { ExifFields, MetadataSnapshot } from "./metadata";

export type DocumentKind = "raster" | "vector" | "paginated";

export type ChannelLayout = "luma" | "luma-alpha" | "rgb" | "rgba";

export interface ColorDepth {
  channels: ChannelLayout;
  bitsPerChannel: 8 | 16 | 32;
}

interface DocumentBase {
  path: string;
  fileSize: number;
}

/**
 * Opaque handles are whatever the decoder produced (an ImageBitmap, a parsed
 * scene, a page renderer). The engine passes them through untouched.
 */
export interface RasterDocument extends DocumentBase {
  kind: "raster";
  pixels: unknown;
  width: number;
  height: number;
  colorDepth: ColorDepth;
  exif: ExifFields | null;
}

export interface VectorDocument extends DocumentBase {
  kind: "vector";
  scene: unknown;
  viewBox: Size;
}

export interface DocumentPage {
  size: Size;
  content: unknown;
}

export interface PaginatedDocument extends DocumentBase {
  kind: "paginated";
  pages: DocumentPage[];
}

export type ViewerDocument = RasterDocument | VectorDocument | PaginatedDocument;

export interface RenderableSurface {
  kind: DocumentKind;
  content: unknown;
  intrinsicSize: Size;
  effectiveSize: Size;
  transform: TransformState;
  /** Maps intrinsic coordinates into the effective box. */
  matrix: Matrix;
}

export interface DocumentCapabilities<D extends ViewerDocument> {
  supportsTransform: boolean;
  intrinsicSize(doc: D): Size;
  content(doc: D): unknown;
  metadata(doc: D): MetadataSnapshot;
}

type CapabilityTable = {
  [K in DocumentKind]: DocumentCapabilities<Extract<ViewerDocument, { kind: K }>>;
};

const CHANNEL_LABELS: Record<ChannelLayout, string> = {
  luma: "Grayscale",
  "luma-alpha": "Grayscale+Alpha",
  rgb: "RGB",
  rgba: "RGBA",
};

export function colorTypeLabel(depth: ColorDepth): string {
  const bits = depth.bitsPerChannel === 32 ? "32-bit float" : `${depth.bitsPerChannel}-bit`;
  return `${CHANNEL_LABELS[depth.channels]} ${bits}`;
}

export function fileNameOf(path: string): string {
  const segments = path.split(/[\\/]/);
  const last = segments[segments.length - 1];
  return last ? last : "unknown";
}

export function extensionOf(path: string): string | null {
  const name = fileNameOf(path);
  const dot = name.lastIndexOf(".");
  if (dot <= 0 || dot === name.length - 1) {
    return null;
  }
  return name.slice(dot + 1).toLowerCase();
}

export function parentDirectory(path: string): string {
  const cut = Math.max(path.lastIndexOf("/"), path.lastIndexOf("\\"));
  return cut <= 0 ? path.slice(0, cut + 1) : path.slice(0, cut);
}

function baseMetadata(doc: ViewerDocument, size: Size): Omit<MetadataSnapshot, "format" | "colorType" | "exif"> {
  return {
    fileName: fileNameOf(doc.path),
    filePath: doc.path,
    width: size.width,
    height: size.height,
    fileSize: doc.fileSize,
  };
}

function firstPage(doc: PaginatedDocument): DocumentPage {
  const page = doc.pages[0];
  if (!page) {
    throw new DecodeError(doc.path, "document has no pages");
  }
  return page;
}

const CAPABILITIES: CapabilityTable = {
  raster: {
    supportsTransform: true,
    intrinsicSize: (doc) => ({ width: doc.width, height: doc.height }),
    content: (doc) => doc.pixels,
    metadata: (doc) => ({
      ...baseMetadata(doc, { width: doc.width, height: doc.height }),
      format: extensionOf(doc.path)?.toUpperCase() ?? "Unknown",
      colorType: colorTypeLabel(doc.colorDepth),
      exif: doc.exif,
    }),
  },
  vector: {
    supportsTransform: false,
    intrinsicSize: (doc) => ({ ...doc.viewBox }),
    content: (doc) => doc.scene,
    metadata: (doc) => ({
      ...baseMetadata(doc, doc.viewBox),
      format: "SVG",
      colorType: "Vector",
      exif: null,
    }),
  },
  paginated: {
    supportsTransform: false,
    intrinsicSize: (doc) => ({ ...firstPage(doc).size }),
    content: (doc) => firstPage(doc).content,
    metadata: (doc) => ({
      ...baseMetadata(doc, firstPage(doc).size),
      format: `PDF (${doc.pages.length} pages)`,
      colorType: "Rendered",
      exif: null,
    }),
  },
};

function withCapabilities<R>(
  doc: ViewerDocument,
  use: <D extends ViewerDocument>(capabilities: DocumentCapabilities<D>, doc: D) => R
): R {
  switch (doc.kind) {
    case "raster":
      return use(CAPABILITIES.raster, doc);
    case "vector":
      return use(CAPABILITIES.vector, doc);
    case "paginated":
      return use(CAPABILITIES.paginated, doc);
  }
}

export function intrinsicSize(doc: ViewerDocument): Size {
  return withCapabilities(doc, (caps, d) => caps.intrinsicSize(d));
}

export function supportsTransform(doc: ViewerDocument): boolean {
  return withCapabilities(doc, (caps) => caps.supportsTransform);
}

export function documentMetadata(doc: ViewerDocument): MetadataSnapshot {
  return withCapabilities(doc, (caps, d) => caps.metadata(d));
}

export function renderDocument(doc: ViewerDocument, transform: TransformState): RenderableSurface {
  return withCapabilities(doc, (caps, d) => {
    const size = caps.intrinsicSize(d);
    const applied = caps.supportsTransform ? { ...transform } : { ...IDENTITY_TRANSFORM };
    return {
      kind: d.kind,
      content: caps.content(d),
      intrinsicSize: size,
      effectiveSize: effectiveSize(applied, size),
      transform: applied,
      matrix: transformMatrix(applied, size),
    };
  });
}

const RASTER_EXTENSIONS = new Set([
  "png", "jpg", "jpeg", "gif", "bmp", "ico", "tif", "tiff", "webp", "avif",
  "pnm", "pbm", "pgm", "ppm", "tga", "dds", "hdr", "exr", "qoi", "ff",
]);

export function documentKindFromPath(path: string): DocumentKind | null {
  const ext = extensionOf(path);
  if (!ext) {
    return null;
  }
  if (ext === "svg" || ext === "svgz") {
    return "vector";
  }
  if (ext === "pdf") {
    return "paginated";
  }
  return RASTER_EXTENSIONS.has(ext) ? "raster" : null;
}

function requireSize(path: string, size: Size, what: string): void {
  if (!isPositiveSize(size)) {
    throw new DecodeError(path, `${what} must be non-zero, got ${size.width}x${size.height}`);
  }
}

export function createRasterDocument(init: Omit<RasterDocument, "kind" | "exif"> & { exif?: ExifFields | null }): RasterDocument {
  requireSize(init.path, { width: init.width, height: init.height }, "image size");
  return { ...init, kind: "raster", exif: init.exif ?? null };
}

export function createVectorDocument(init: Omit<VectorDocument, "kind">): VectorDocument {
  requireSize(init.path, init.viewBox, "viewbox");
  return { ...init, kind: "vector" };
}

export function createPaginatedDocument(init: Omit<PaginatedDocument, "kind">): PaginatedDocument {
  if (init.pages.length === 0) {
    throw new DecodeError(init.path, "document has no pages");
  }
  init.pages.forEach((page, index) => requireSize(init.path, page.size, `page ${index + 1} size`));
  return { ...init, kind: "paginated" };
}
