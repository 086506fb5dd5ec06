import { InvalidConfigurationError } from "./errors";
import { isLogLevel, Logger } from "./logger";
import type { LogLevel } from "./logger";

const log = Logger.getLogger("config");

export interface ViewerOptions {
  minZoom: number;
  maxZoom: number;
  /** Multiplier applied per zoom-in step; zoom-out divides by it. */
  zoomStep: number;
  /** Keyboard pan distance, in document pixels. */
  panStep: number;
  wrapNavigation: boolean;
  logLevel: LogLevel;
  apiBase: string;
}

export const DEFAULT_VIEWER_OPTIONS: Readonly<ViewerOptions> = {
  minZoom: 0.1,
  maxZoom: 20,
  zoomStep: 1.1,
  panStep: 50,
  wrapNavigation: false,
  logLevel: "warn",
  apiBase: "",
};

function reject(setting: keyof ViewerOptions, message: string): void {
  log.warn(`ignoring ${setting}`, new InvalidConfigurationError(setting, message));
}

export function resolveViewerOptions(partial: Partial<ViewerOptions> = {}): ViewerOptions {
  const options: ViewerOptions = { ...DEFAULT_VIEWER_OPTIONS, ...partial };

  if (!Number.isFinite(options.minZoom) || options.minZoom <= 0) {
    reject("minZoom", `${options.minZoom} is not a positive number`);
    options.minZoom = DEFAULT_VIEWER_OPTIONS.minZoom;
  }
  if (!Number.isFinite(options.maxZoom) || options.maxZoom <= options.minZoom) {
    reject("maxZoom", `${options.maxZoom} must exceed minZoom ${options.minZoom}`);
    options.maxZoom = Math.max(DEFAULT_VIEWER_OPTIONS.maxZoom, options.minZoom * 2);
  }
  if (!Number.isFinite(options.zoomStep) || options.zoomStep <= 1) {
    reject("zoomStep", `${options.zoomStep} must be greater than 1`);
    options.zoomStep = DEFAULT_VIEWER_OPTIONS.zoomStep;
  }
  if (!Number.isFinite(options.panStep) || options.panStep <= 0) {
    reject("panStep", `${options.panStep} is not a positive number`);
    options.panStep = DEFAULT_VIEWER_OPTIONS.panStep;
  }
  if (!isLogLevel(options.logLevel)) {
    reject("logLevel", `unknown level ${String(options.logLevel)}`);
    options.logLevel = DEFAULT_VIEWER_OPTIONS.logLevel;
  }
  options.apiBase = options.apiBase.replace(/\/$/, "");

  return options;
}

function readNumber(value: unknown): number | undefined {
  if (typeof value !== "string" || value.trim() === "") {
    return undefined;
  }
  return Number(value);
}

function readBoolean(value: unknown): boolean | undefined {
  if (typeof value === "boolean") {
    return value;
  }
  if (value === "true" || value === "1") {
    return true;
  }
  if (value === "false" || value === "0") {
    return false;
  }
  return undefined;
}

export function viewerOptionsFromEnv(env: Readonly<Record<string, unknown>>): ViewerOptions {
  const partial: Partial<ViewerOptions> = {};
  const minZoom = readNumber(env.VITE_VIEWER_MIN_ZOOM);
  const maxZoom = readNumber(env.VITE_VIEWER_MAX_ZOOM);
  const zoomStep = readNumber(env.VITE_VIEWER_ZOOM_STEP);
  const panStep = readNumber(env.VITE_VIEWER_PAN_STEP);
  const wrapNavigation = readBoolean(env.VITE_VIEWER_WRAP_NAVIGATION);
  const logLevel = env.VITE_VIEWER_LOG_LEVEL;
  const apiBase = env.VITE_VIEWER_API_BASE;

  if (minZoom !== undefined) partial.minZoom = minZoom;
  if (maxZoom !== undefined) partial.maxZoom = maxZoom;
  if (zoomStep !== undefined) partial.zoomStep = zoomStep;
  if (panStep !== undefined) partial.panStep = panStep;
  if (wrapNavigation !== undefined) partial.wrapNavigation = wrapNavigation;
  if (isLogLevel(logLevel)) partial.logLevel = logLevel;
  if (typeof apiBase === "string") partial.apiBase = apiBase;

  return resolveViewerOptions(partial);
}
