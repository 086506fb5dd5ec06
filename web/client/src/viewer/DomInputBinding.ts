import { describeError } from "../errors";
import { Logger } from "../logger";
import type { Point } from "../types";
import type { CommandOutcome, InputReconciler } from "./InputReconciler";

const log = Logger.getLogger("dom-input");

export interface SurfaceRect {
  left: number;
  top: number;
  width: number;
  height: number;
}

/** The subset of an element the binding needs. */
export interface InputSurface extends EventTarget {
  getBoundingClientRect(): SurfaceRect;
  setPointerCapture?(pointerId: number): void;
}

export interface DomInputBindingOptions {
  /** Receives pointermove/pointerup while dragging; defaults to the surface. */
  pointerTarget?: EventTarget;
  /** Receives keydown; defaults to the surface. */
  keyTarget?: EventTarget;
  /** Fires "resize" when the surface may have changed size. */
  resizeTarget?: EventTarget;
  onOutcome?: (outcome: CommandOutcome) => void;
}

const EDITABLE_TAGS = new Set(["INPUT", "TEXTAREA", "SELECT"]);

/** Text fields keep their keystrokes. */
export function isEditableTarget(target: EventTarget | null): boolean {
  if (!target) {
    return false;
  }
  if ("isContentEditable" in target && target.isContentEditable === true) {
    return true;
  }
  return "tagName" in target && typeof target.tagName === "string" && EDITABLE_TAGS.has(target.tagName.toUpperCase());
}

function hasClientPosition(event: Event): event is MouseEvent {
  return (
    "clientX" in event &&
    typeof event.clientX === "number" &&
    "clientY" in event &&
    typeof event.clientY === "number"
  );
}

function isWheelEvent(event: Event): event is WheelEvent {
  return hasClientPosition(event) && "deltaY" in event && typeof event.deltaY === "number";
}

function isPointerEvent(event: Event): event is PointerEvent {
  return hasClientPosition(event) && "pointerId" in event && typeof event.pointerId === "number";
}

function isKeyboardEvent(event: Event): event is KeyboardEvent {
  return "key" in event && typeof event.key === "string";
}

export class DomInputBinding {
  private surface: InputSurface;
  private reconciler: InputReconciler;
  private pointerTarget: EventTarget;
  private keyTarget: EventTarget;
  private resizeTarget: EventTarget | null;
  private onOutcome?: (outcome: CommandOutcome) => void;
  private pointerId: number | null = null;

  constructor(surface: InputSurface, reconciler: InputReconciler, options: DomInputBindingOptions = {}) {
    this.surface = surface;
    this.reconciler = reconciler;
    this.pointerTarget = options.pointerTarget ?? surface;
    this.keyTarget = options.keyTarget ?? surface;
    this.resizeTarget = options.resizeTarget ?? null;
    this.onOutcome = options.onOutcome;
    this.attach();
    this.refreshSize();
  }

  refreshSize(): void {
    const rect = this.surface.getBoundingClientRect();
    this.reconciler.handleResize({ width: rect.width, height: rect.height });
  }

  dispose(): void {
    this.surface.removeEventListener("wheel", this.handleWheel);
    this.surface.removeEventListener("pointerdown", this.handlePointerDown);
    this.pointerTarget.removeEventListener("pointermove", this.handlePointerMove);
    this.pointerTarget.removeEventListener("pointerup", this.handlePointerUp);
    this.pointerTarget.removeEventListener("pointercancel", this.handlePointerUp);
    this.keyTarget.removeEventListener("keydown", this.handleKeyDown);
    this.resizeTarget?.removeEventListener("resize", this.handleResize);
    if (this.pointerId !== null) {
      this.pointerId = null;
      this.reconciler.handlePointer({ type: "drag-end" });
    }
  }

  private attach(): void {
    this.surface.addEventListener("wheel", this.handleWheel, { passive: false });
    this.surface.addEventListener("pointerdown", this.handlePointerDown);
    this.pointerTarget.addEventListener("pointermove", this.handlePointerMove);
    this.pointerTarget.addEventListener("pointerup", this.handlePointerUp);
    this.pointerTarget.addEventListener("pointercancel", this.handlePointerUp);
    this.keyTarget.addEventListener("keydown", this.handleKeyDown);
    this.resizeTarget?.addEventListener("resize", this.handleResize);
  }

  private localPosition(event: MouseEvent): Point {
    const rect = this.surface.getBoundingClientRect();
    return { x: event.clientX - rect.left, y: event.clientY - rect.top };
  }

  private handleWheel = (event: Event): void => {
    if (!isWheelEvent(event)) {
      return;
    }
    event.preventDefault();
    this.reconciler.handlePointer({ type: "wheel", position: this.localPosition(event), amount: -event.deltaY });
  };

  private handlePointerDown = (event: Event): void => {
    if (!isPointerEvent(event) || event.button !== 0) {
      return;
    }
    this.pointerId = event.pointerId;
    this.surface.setPointerCapture?.(event.pointerId);
    this.reconciler.handlePointer({ type: "drag-start", position: this.localPosition(event) });
  };

  private handlePointerMove = (event: Event): void => {
    if (this.pointerId === null || !isPointerEvent(event) || event.pointerId !== this.pointerId) {
      return;
    }
    this.reconciler.handlePointer({ type: "drag-move", position: this.localPosition(event) });
  };

  private handlePointerUp = (event: Event): void => {
    if (this.pointerId === null || !isPointerEvent(event) || event.pointerId !== this.pointerId) {
      return;
    }
    this.pointerId = null;
    this.reconciler.handlePointer({ type: "drag-end" });
  };

  private handleKeyDown = (event: Event): void => {
    if (!isKeyboardEvent(event) || isEditableTarget(event.target)) {
      return;
    }
    const outcome = this.reconciler.handleKey({
      key: event.key,
      ctrlKey: event.ctrlKey === true,
      shiftKey: event.shiftKey === true,
      altKey: event.altKey === true,
      metaKey: event.metaKey === true,
    });
    if (!outcome) {
      return;
    }
    event.preventDefault();
    if (outcome.kind === "pending") {
      outcome.result.catch((error: unknown) => {
        log.error(`navigation failed: ${describeError(error)}`);
      });
    }
    this.onOutcome?.(outcome);
  };

  private handleResize = (): void => {
    this.refreshSize();
  };
}
