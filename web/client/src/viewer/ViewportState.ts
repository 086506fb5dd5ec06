import { DEFAULT_VIEWER_OPTIONS } from "../config";
import { InvalidConfigurationError } from "../errors";
import { Logger } from "../logger";
import type { Point, Rect, Size, Vector, ViewMode } from "../types";
import { isPositiveSize } from "../types";

const log = Logger.getLogger("viewport");

export interface ViewportLimits {
  minZoom: number;
  maxZoom: number;
  zoomStep: number;
}

export interface ZoomOptions {
  /** With a factor of 1, marks the change as a return to actual size. */
  reset?: boolean;
  /** Screen point (viewport-relative) that keeps the same document point under it. */
  anchor?: Point;
}

/** Supplies the document's effective (rotated) size, or null when nothing is loaded. */
export type ContentSizeSource = () => Size | null;

export interface ViewportSnapshot {
  mode: ViewMode;
  zoomFactor: number;
  /** Document pixels between the document center and the point under the viewport center. */
  panOffset: Vector;
  viewportSize: Size | null;
  contentSize: Size | null;
  displaySize: Size | null;
}

interface Geometry {
  viewport: Size;
  content: Size;
}

const NO_CONTENT: ContentSizeSource = () => null;

export class ViewportState {
  private limits: ViewportLimits;
  private mode: ViewMode = { kind: "fit" };
  private zoom = 1;
  private offset: Vector = { x: 0, y: 0 };
  private viewport: Size | null = null;
  private contentSource: ContentSizeSource = NO_CONTENT;
  private cachedContent: Size | null | undefined;
  private modeBeforeFit: ViewMode | null = null;

  constructor(limits: Partial<ViewportLimits> = {}) {
    this.limits = {
      minZoom: limits.minZoom ?? DEFAULT_VIEWER_OPTIONS.minZoom,
      maxZoom: limits.maxZoom ?? DEFAULT_VIEWER_OPTIONS.maxZoom,
      zoomStep: limits.zoomStep ?? DEFAULT_VIEWER_OPTIONS.zoomStep,
    };
  }

  get viewMode(): ViewMode {
    return { ...this.mode };
  }

  get zoomFactor(): number {
    return this.zoom;
  }

  get panOffset(): Vector {
    return { ...this.offset };
  }

  get viewportSize(): Size | null {
    return this.viewport ? { ...this.viewport } : null;
  }

  get contentSize(): Size | null {
    if (this.cachedContent === undefined) {
      const size = this.contentSource();
      this.cachedContent = size && isPositiveSize(size) ? { ...size } : null;
    }
    return this.cachedContent ? { ...this.cachedContent } : null;
  }

  /** True once both a laid-out viewport and a document size are known. */
  isReady(): boolean {
    return this.geometry() !== null;
  }

  setContentSource(source: ContentSizeSource): void {
    this.contentSource = source;
    this.invalidateContentSize();
  }

  invalidateContentSize(): void {
    this.cachedContent = undefined;
    this.reconcile();
  }

  /** Switches to new content in one step: Fit mode, centered, no remembered zoom. */
  replaceContent(source: ContentSizeSource): void {
    this.mode = { kind: "fit" };
    this.modeBeforeFit = null;
    this.offset = { x: 0, y: 0 };
    this.contentSource = source;
    this.cachedContent = undefined;
    this.reconcile();
  }

  setViewportSize(size: Size): void {
    if (!isPositiveSize(size)) {
      log.warn(
        "deferring layout",
        new InvalidConfigurationError("viewport size", `${size.width}x${size.height}`)
      );
      this.viewport = null;
      return;
    }
    this.viewport = { width: size.width, height: size.height };
    this.reconcile();
  }

  setZoom(factor: number, options: ZoomOptions = {}): void {
    if (!Number.isFinite(factor) || factor <= 0) {
      log.warn("ignoring zoom", new InvalidConfigurationError("zoom factor", String(factor)));
      return;
    }
    const next = this.clampZoom(factor);
    this.mode = options.reset && next === 1 ? { kind: "actual" } : { kind: "custom", factor: next };
    this.applyZoom(next, options.anchor);
  }

  zoomIn(anchor?: Point): void {
    this.setZoom(this.zoom * this.limits.zoomStep, { anchor });
  }

  zoomOut(anchor?: Point): void {
    this.setZoom(this.zoom / this.limits.zoomStep, { anchor });
  }

  toggleFit(): void {
    if (this.mode.kind !== "fit") {
      this.modeBeforeFit = this.mode;
      this.mode = { kind: "fit" };
      this.offset = { x: 0, y: 0 };
      this.reconcile();
      return;
    }
    const restored: ViewMode = this.modeBeforeFit ?? { kind: "actual" };
    this.modeBeforeFit = null;
    if (restored.kind === "custom") {
      this.setZoom(restored.factor);
    } else {
      this.setZoom(1, { reset: true });
    }
  }

  /** Returns false when the pan had no effect (not laid out, or clamped in place). */
  pan(delta: Vector): boolean {
    const geometry = this.geometry();
    if (!geometry || !Number.isFinite(delta.x) || !Number.isFinite(delta.y)) {
      return false;
    }
    const before = this.offset;
    this.offset = this.clampPan({ x: before.x + delta.x, y: before.y + delta.y }, geometry);
    return this.offset.x !== before.x || this.offset.y !== before.y;
  }

  resetPan(): void {
    this.offset = { x: 0, y: 0 };
  }

  /** Screen point (relative to the viewport's top-left) to effective document pixels. */
  toDocument(screen: Point): Point | null {
    const geometry = this.geometry();
    if (!geometry) {
      return null;
    }
    const { viewport, content } = geometry;
    return {
      x: (screen.x - viewport.width / 2) / this.zoom + this.offset.x + content.width / 2,
      y: (screen.y - viewport.height / 2) / this.zoom + this.offset.y + content.height / 2,
    };
  }

  toScreen(point: Point): Point | null {
    const geometry = this.geometry();
    if (!geometry) {
      return null;
    }
    const { viewport, content } = geometry;
    return {
      x: (point.x - content.width / 2 - this.offset.x) * this.zoom + viewport.width / 2,
      y: (point.y - content.height / 2 - this.offset.y) * this.zoom + viewport.height / 2,
    };
  }

  /** Screen position of the document's top-left corner. */
  origin(): Point | null {
    return this.toScreen({ x: 0, y: 0 });
  }

  /** The viewport rectangle expressed in zoomed document pixels. */
  visibleRect(): Rect | null {
    const geometry = this.geometry();
    if (!geometry) {
      return null;
    }
    const { viewport, content } = geometry;
    return {
      x: (content.width / 2 + this.offset.x) * this.zoom - viewport.width / 2,
      y: (content.height / 2 + this.offset.y) * this.zoom - viewport.height / 2,
      width: viewport.width,
      height: viewport.height,
    };
  }

  snapshot(): ViewportSnapshot {
    const content = this.contentSize;
    return {
      mode: this.viewMode,
      zoomFactor: this.zoom,
      panOffset: this.panOffset,
      viewportSize: this.viewportSize,
      contentSize: content,
      displaySize: content
        ? { width: content.width * this.zoom, height: content.height * this.zoom }
        : null,
    };
  }

  private geometry(): Geometry | null {
    const content = this.contentSize;
    if (!this.viewport || !content) {
      return null;
    }
    return { viewport: this.viewport, content };
  }

  private reconcile(): void {
    const geometry = this.geometry();
    if (!geometry) {
      return;
    }
    if (this.mode.kind === "fit") {
      const { viewport, content } = geometry;
      this.zoom = this.clampZoom(
        Math.min(viewport.width / content.width, viewport.height / content.height)
      );
    }
    this.offset = this.clampPan(this.offset, geometry);
  }

  private applyZoom(next: number, anchor?: Point): void {
    const geometry = this.geometry();
    if (!geometry) {
      this.zoom = next;
      return;
    }
    const previous = this.zoom;
    let offset = this.offset;
    if (anchor) {
      const dx = anchor.x - geometry.viewport.width / 2;
      const dy = anchor.y - geometry.viewport.height / 2;
      offset = {
        x: offset.x + dx / previous - dx / next,
        y: offset.y + dy / previous - dy / next,
      };
    }
    this.zoom = next;
    this.offset = this.clampPan(offset, geometry);
  }

  private clampZoom(factor: number): number {
    return Math.max(this.limits.minZoom, Math.min(this.limits.maxZoom, factor));
  }

  private clampPan(offset: Vector, geometry: Geometry): Vector {
    return {
      x: clampAxis(offset.x, geometry.content.width * this.zoom, geometry.viewport.width, this.zoom),
      y: clampAxis(offset.y, geometry.content.height * this.zoom, geometry.viewport.height, this.zoom),
    };
  }
}

function clampAxis(value: number, displayed: number, available: number, zoom: number): number {
  if (displayed <= available) {
    return 0;
  }
  const limit = (displayed - available) / (2 * zoom);
  return Math.max(-limit, Math.min(limit, value)) + 0;
}
