import type { Point, Size } from "../types";
import type { KeyInput, PointerInput, ViewerCommand } from "./commands";
import { commandForKey } from "./commands";
import type { CommandOutcome, ViewerSession } from "./ViewerSession";

export type { CommandOutcome } from "./ViewerSession";

/**
 * Turns discrete commands and raw pointer input into session calls. Holds no
 * view state of its own apart from the last drag position.
 */
export class InputReconciler {
  private session: ViewerSession;
  private lastDrag: Point | null = null;

  constructor(session: ViewerSession) {
    this.session = session;
  }

  get dragging(): boolean {
    return this.lastDrag !== null;
  }

  handleCommand(command: ViewerCommand): CommandOutcome {
    return this.session.execute(command);
  }

  handleKey(input: KeyInput): CommandOutcome | null {
    const command = commandForKey(input);
    return command ? this.handleCommand(command) : null;
  }

  /** Returns whether the input was consumed. */
  handlePointer(input: PointerInput): boolean {
    switch (input.type) {
      case "wheel":
        if (!Number.isFinite(input.amount) || input.amount === 0) {
          return false;
        }
        if (input.amount > 0) {
          this.session.zoomIn(input.position);
        } else {
          this.session.zoomOut(input.position);
        }
        return true;
      case "drag-start":
        this.lastDrag = { x: input.position.x, y: input.position.y };
        return true;
      case "drag-move": {
        const last = this.lastDrag;
        if (!last) {
          return false;
        }
        const zoom = this.session.zoomFactor;
        this.lastDrag = { x: input.position.x, y: input.position.y };
        this.session.pan({
          x: -(input.position.x - last.x) / zoom,
          y: -(input.position.y - last.y) / zoom,
        });
        return true;
      }
      case "drag-end": {
        const wasDragging = this.lastDrag !== null;
        this.lastDrag = null;
        return wasDragging;
      }
    }
  }

  handleResize(size: Size): void {
    this.session.setViewportSize(size);
  }
}
