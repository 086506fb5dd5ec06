import type { FolderScanner } from "../api";
import type { ViewerOptions } from "../config";
import { resolveViewerOptions } from "../config";
import type { DocumentKind, RenderableSurface, ViewerDocument } from "../document/Document";
import {
  documentMetadata,
  intrinsicSize,
  parentDirectory,
  renderDocument,
  supportsTransform,
} from "../document/Document";
import type { DocumentDecoder, LoadResult } from "../document/DocumentLoader";
import { DocumentLoader } from "../document/DocumentLoader";
import type { MetadataSnapshot } from "../document/metadata";
import { formatResolution } from "../document/metadata";
import type { Result, ViewerError } from "../errors";
import { UnsupportedOperationError, describeError, fail, ok } from "../errors";
import { Logger } from "../logger";
import type { NavigationResult } from "../navigation/NavigationIndex";
import { NavigationIndex, formatPositionLabel } from "../navigation/NavigationIndex";
import type { SettingsStore, ViewerSettings } from "../settings/SettingsStore";
import { parseSettings } from "../settings/SettingsStore";
import type { TransformOperation } from "../transform/TransformModel";
import { TransformModel } from "../transform/TransformModel";
import type { PanelId, Point, Size, ToolMode, TransformState, Vector, ViewMode } from "../types";
import type { ViewportSnapshot } from "./ViewportState";
import { ViewportState } from "./ViewportState";
import type { ViewerCommand } from "./commands";

const log = Logger.getLogger("viewer-session");

export interface MetadataExtractor {
  extract(document: ViewerDocument): MetadataSnapshot;
}

export const documentMetadataExtractor: MetadataExtractor = {
  extract: documentMetadata,
};

export type OpenOutcome =
  | LoadResult
  | { status: "at-boundary" }
  | { status: "empty"; directory: string };

export type CommandOutcome =
  | { kind: "applied" }
  | { kind: "rejected"; error: ViewerError }
  | { kind: "pending"; result: Promise<OpenOutcome> };

const APPLIED: CommandOutcome = { kind: "applied" };

function settle(result: { ok: true } | { ok: false; error: ViewerError }): CommandOutcome {
  return result.ok ? APPLIED : { kind: "rejected", error: result.error };
}

export type PanDirection = "left" | "right" | "up" | "down";

export interface ViewerStatus {
  zoomDisplay: string;
  positionLabel: string;
  dimensions: string;
}

export interface ViewerSnapshot {
  activePath: string | null;
  documentKind: DocumentKind | null;
  loading: boolean;
  viewport: ViewportSnapshot;
  transform: TransformState;
  toolMode: ToolMode;
  panels: Record<PanelId, boolean>;
  status: ViewerStatus;
  error: string | null;
}

export interface ViewerSessionOptions {
  decoder: DocumentDecoder;
  scanner: FolderScanner;
  metadataExtractor?: MetadataExtractor;
  settingsStore?: SettingsStore;
  options?: Partial<ViewerOptions>;
  onChange?: (snapshot: ViewerSnapshot) => void;
}

const PAN_DIRECTIONS: Record<PanDirection, Vector> = {
  left: { x: -1, y: 0 },
  right: { x: 1, y: 0 },
  up: { x: 0, y: -1 },
  down: { x: 0, y: 1 },
};

export function formatZoom(mode: ViewMode, zoomFactor: number): string {
  switch (mode.kind) {
    case "fit":
      return "Fit";
    case "actual":
      return "100%";
    case "custom":
      return `${Math.round(zoomFactor * 100)}%`;
  }
}

export class ViewerSession {
  readonly options: ViewerOptions;
  private viewport: ViewportState;
  private transformModel = new TransformModel();
  private navigation: NavigationIndex;
  private loader: DocumentLoader;
  private scanner: FolderScanner;
  private metadataExtractor: MetadataExtractor;
  private settingsStore: SettingsStore | null;
  private active: { path: string; document: ViewerDocument } | null = null;
  private cachedMetadata: MetadataSnapshot | null = null;
  private tool: ToolMode = "none";
  private settings: ViewerSettings = parseSettings(null);
  private lastError: ViewerError | null = null;
  private listeners = new Set<(snapshot: ViewerSnapshot) => void>();
  private cachedSnapshot: ViewerSnapshot | null = null;
  private pendingSave: Promise<void> = Promise.resolve();
  private onChange?: (snapshot: ViewerSnapshot) => void;

  constructor(config: ViewerSessionOptions) {
    this.options = resolveViewerOptions(config.options);
    this.viewport = new ViewportState(this.options);
    this.viewport.setContentSource(() => this.effectiveContentSize());
    this.navigation = new NavigationIndex({ wrap: this.options.wrapNavigation });
    this.loader = new DocumentLoader(config.decoder);
    this.scanner = config.scanner;
    this.metadataExtractor = config.metadataExtractor ?? documentMetadataExtractor;
    this.settingsStore = config.settingsStore ?? null;
    this.onChange = config.onChange;
  }

  get document(): ViewerDocument | null {
    return this.active?.document ?? null;
  }

  get currentPath(): string | null {
    return this.active?.path ?? null;
  }

  get transform(): TransformState {
    return this.transformModel.state;
  }

  get zoomFactor(): number {
    return this.viewport.zoomFactor;
  }

  get toolMode(): ToolMode {
    return this.tool;
  }

  get error(): ViewerError | null {
    return this.lastError;
  }

  get defaultDirectory(): string | null {
    return this.settings.defaultDirectory;
  }

  navigationEntries(): readonly string[] {
    return this.navigation.paths();
  }

  // ---- documents -----------------------------------------------------------

  async loadSettings(): Promise<ViewerSettings> {
    if (this.settingsStore) {
      try {
        this.settings = await this.settingsStore.load();
      } catch (error) {
        log.warn(`using default settings: ${describeError(error)}`);
      }
    }
    this.notify();
    return { ...this.settings, panels: { ...this.settings.panels } };
  }

  async openPath(path: string): Promise<OpenOutcome> {
    const directory = parentDirectory(path);
    const result = await this.load(path);
    if (result.status === "loaded" && this.navigation.directory !== directory) {
      await this.refreshFolder(directory, path, result.generation);
    }
    return result;
  }

  async openDirectory(directory: string): Promise<OpenOutcome> {
    this.loader.cancel();
    const generation = this.loader.currentGeneration;
    let paths: string[];
    try {
      paths = await this.scanner.scan(directory);
    } catch (error) {
      log.warn(`cannot scan ${directory}: ${describeError(error)}`);
      paths = [];
    }
    if (generation !== this.loader.currentGeneration) {
      log.debug(`discarding listing of ${directory}`);
      return { status: "stale", path: directory, generation };
    }
    this.navigation.rebuild(paths, null, directory);
    const first = this.navigation.current;
    if (first === null) {
      log.info(`no supported documents in ${directory}`);
      this.notify();
      return { status: "empty", directory };
    }
    this.settings.defaultDirectory = directory;
    this.persistSettings();
    return this.load(first);
  }

  async next(): Promise<OpenOutcome> {
    return this.navigate(this.navigation.next());
  }

  async previous(): Promise<OpenOutcome> {
    return this.navigate(this.navigation.previous());
  }

  /** Routes a discrete command to the matching operation. */
  execute(command: ViewerCommand): CommandOutcome {
    switch (command) {
      case "previous-document":
        return { kind: "pending", result: this.previous() };
      case "next-document":
        return { kind: "pending", result: this.next() };
      case "flip-horizontal":
        return settle(this.flipHorizontal());
      case "flip-vertical":
        return settle(this.flipVertical());
      case "rotate-cw":
        return settle(this.rotateClockwise());
      case "rotate-ccw":
        return settle(this.rotateCounterClockwise());
      case "zoom-in":
        this.zoomIn();
        return APPLIED;
      case "zoom-out":
        this.zoomOut();
        return APPLIED;
      case "zoom-reset":
        this.actualSize();
        return APPLIED;
      case "toggle-fit":
        this.toggleFit();
        return APPLIED;
      case "pan-left":
        this.panStep("left");
        return APPLIED;
      case "pan-right":
        this.panStep("right");
        return APPLIED;
      case "pan-up":
        this.panStep("up");
        return APPLIED;
      case "pan-down":
        this.panStep("down");
        return APPLIED;
      case "pan-reset":
        this.resetPan();
        return APPLIED;
      case "toggle-crop-mode":
        this.toggleToolMode("crop");
        return APPLIED;
      case "toggle-scale-mode":
        this.toggleToolMode("scale");
        return APPLIED;
      case "toggle-metadata-panel":
        this.togglePanel("metadata");
        return APPLIED;
      case "toggle-navigation-panel":
        this.togglePanel("navigation");
        return APPLIED;
    }
  }

  // ---- transforms ----------------------------------------------------------

  rotateClockwise(): Result<TransformState, UnsupportedOperationError> {
    return this.applyTransform("rotate-cw");
  }

  rotateCounterClockwise(): Result<TransformState, UnsupportedOperationError> {
    return this.applyTransform("rotate-ccw");
  }

  flipHorizontal(): Result<TransformState, UnsupportedOperationError> {
    return this.applyTransform("flip-horizontal");
  }

  flipVertical(): Result<TransformState, UnsupportedOperationError> {
    return this.applyTransform("flip-vertical");
  }

  // ---- viewport ------------------------------------------------------------

  setViewportSize(size: Size): void {
    this.viewport.setViewportSize(size);
    this.notify();
  }

  setZoom(factor: number): void {
    this.viewport.setZoom(factor);
    this.notify();
  }

  zoomIn(anchor?: Point): void {
    this.viewport.zoomIn(anchor);
    this.notify();
  }

  zoomOut(anchor?: Point): void {
    this.viewport.zoomOut(anchor);
    this.notify();
  }

  actualSize(): void {
    this.viewport.setZoom(1, { reset: true });
    this.viewport.resetPan();
    this.notify();
  }

  toggleFit(): void {
    this.viewport.toggleFit();
    this.notify();
  }

  pan(delta: Vector): boolean {
    const moved = this.viewport.pan(delta);
    if (moved) {
      this.notify();
    }
    return moved;
  }

  panStep(direction: PanDirection): boolean {
    const unit = PAN_DIRECTIONS[direction];
    return this.pan({ x: unit.x * this.options.panStep, y: unit.y * this.options.panStep });
  }

  resetPan(): void {
    this.viewport.resetPan();
    this.notify();
  }

  toDocument(screen: Point): Point | null {
    return this.viewport.toDocument(screen);
  }

  toScreen(point: Point): Point | null {
    return this.viewport.toScreen(point);
  }

  // ---- tools and panels ----------------------------------------------------

  toggleToolMode(mode: Exclude<ToolMode, "none">): ToolMode {
    this.tool = this.tool === mode ? "none" : mode;
    this.notify();
    return this.tool;
  }

  togglePanel(panel: PanelId): boolean {
    this.settings.panels[panel] = !this.settings.panels[panel];
    this.persistSettings();
    this.notify();
    return this.settings.panels[panel];
  }

  /** Resolves once every queued settings write has finished. */
  flushSettings(): Promise<void> {
    return this.pendingSave;
  }

  // ---- outputs -------------------------------------------------------------

  metadata(): MetadataSnapshot | null {
    const active = this.active;
    if (!active) {
      return null;
    }
    if (!this.cachedMetadata) {
      try {
        this.cachedMetadata = this.metadataExtractor.extract(active.document);
      } catch (error) {
        log.warn(`metadata unavailable for ${active.path}: ${describeError(error)}`);
        return null;
      }
    }
    return this.cachedMetadata;
  }

  surface(): RenderableSurface | null {
    return this.active ? renderDocument(this.active.document, this.transformModel.state) : null;
  }

  viewportSnapshot(): ViewportSnapshot {
    return this.viewport.snapshot();
  }

  status(): ViewerStatus {
    const size = this.effectiveContentSize();
    return {
      zoomDisplay: formatZoom(this.viewport.viewMode, this.viewport.zoomFactor),
      positionLabel: formatPositionLabel(this.navigation.positionLabel()),
      dimensions: size ? formatResolution(size.width, size.height) : "",
    };
  }

  getSnapshot(): ViewerSnapshot {
    if (!this.cachedSnapshot) {
      this.cachedSnapshot = {
        activePath: this.currentPath,
        documentKind: this.active?.document.kind ?? null,
        loading: this.loader.isPending(),
        viewport: this.viewport.snapshot(),
        transform: this.transformModel.state,
        toolMode: this.tool,
        panels: { ...this.settings.panels },
        status: this.status(),
        error: this.lastError?.message ?? null,
      };
    }
    return this.cachedSnapshot;
  }

  subscribe(listener: (snapshot: ViewerSnapshot) => void): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  dispose(): void {
    this.loader.cancel();
    if (this.active) {
      this.loader.release(this.active.document);
      this.active = null;
    }
    this.listeners.clear();
  }

  // ---- internals -----------------------------------------------------------

  private effectiveContentSize(): Size | null {
    return this.active ? this.transformModel.effectiveSize(intrinsicSize(this.active.document)) : null;
  }

  private async navigate(step: NavigationResult): Promise<OpenOutcome> {
    if (step.status === "at-boundary") {
      return { status: "at-boundary" };
    }
    return this.load(step.path);
  }

  private async load(path: string): Promise<LoadResult> {
    const pending = this.loader.load(path);
    this.notify();
    const result = await pending;
    switch (result.status) {
      case "loaded":
        this.commit(result.path, result.document);
        break;
      case "failed":
        this.lastError = result.error;
        this.notify();
        break;
      case "stale":
        break;
    }
    return result;
  }

  /** Swaps the resident document and resets every piece of view state in one step. */
  private commit(path: string, document: ViewerDocument): void {
    const previous = this.active?.document;
    this.active = { path, document };
    if (previous && previous !== document) {
      this.loader.release(previous);
    }
    this.transformModel.reset();
    this.cachedMetadata = null;
    this.lastError = null;
    this.viewport.replaceContent(() => this.effectiveContentSize());
    this.navigation.select(path);
    log.debug(`active document ${path}`);
    this.notify();
  }

  private async refreshFolder(directory: string, activePath: string, generation: number): Promise<void> {
    let paths: string[];
    try {
      paths = await this.scanner.scan(directory);
    } catch (error) {
      log.warn(`cannot scan ${directory}: ${describeError(error)}`);
      paths = [activePath];
    }
    if (generation !== this.loader.currentGeneration) {
      return;
    }
    this.navigation.rebuild(paths, activePath, directory);
    this.notify();
  }

  private applyTransform(operation: TransformOperation): Result<TransformState, UnsupportedOperationError> {
    const active = this.active;
    let error: UnsupportedOperationError | null = null;
    if (!active) {
      error = new UnsupportedOperationError(operation, "no document is open");
    } else if (!supportsTransform(active.document)) {
      error = new UnsupportedOperationError(operation, `${active.document.kind} documents do not accept transforms`);
    }
    if (error) {
      log.info(error.message);
      this.lastError = error;
      this.notify();
      return fail(error);
    }
    const state = this.transformModel.apply(operation);
    this.viewport.invalidateContentSize();
    this.notify();
    return ok(state);
  }

  private persistSettings(): void {
    const store = this.settingsStore;
    if (!store) {
      return;
    }
    const copy: ViewerSettings = { ...this.settings, panels: { ...this.settings.panels } };
    this.pendingSave = this.pendingSave
      .then(() => store.save(copy))
      .catch((error: unknown) => {
        log.warn(`settings not saved: ${describeError(error)}`);
      });
  }

  private notify(): void {
    this.cachedSnapshot = null;
    const snapshot = this.getSnapshot();
    this.onChange?.(snapshot);
    for (const listener of this.listeners) {
      listener(snapshot);
    }
  }
}
