import type { Point } from "../types";

export type ViewerCommand =
  | "previous-document"
  | "next-document"
  | "flip-horizontal"
  | "flip-vertical"
  | "rotate-cw"
  | "rotate-ccw"
  | "zoom-in"
  | "zoom-out"
  | "zoom-reset"
  | "toggle-fit"
  | "pan-left"
  | "pan-right"
  | "pan-up"
  | "pan-down"
  | "pan-reset"
  | "toggle-crop-mode"
  | "toggle-scale-mode"
  | "toggle-metadata-panel"
  | "toggle-navigation-panel";

/** Positions are relative to the viewport's top-left corner, in screen pixels. */
export type PointerInput =
  | { type: "wheel"; position: Point; amount: number }
  | { type: "drag-start"; position: Point }
  | { type: "drag-move"; position: Point }
  | { type: "drag-end" };

export interface KeyInput {
  key: string;
  ctrlKey?: boolean;
  shiftKey?: boolean;
  altKey?: boolean;
  metaKey?: boolean;
}

export function commandForKey(input: KeyInput): ViewerCommand | null {
  const { ctrlKey = false, shiftKey = false, altKey = false, metaKey = false } = input;

  if (ctrlKey && !shiftKey && !altKey && !metaKey) {
    switch (input.key) {
      case "ArrowLeft":
        return "pan-left";
      case "ArrowRight":
        return "pan-right";
      case "ArrowUp":
        return "pan-up";
      case "ArrowDown":
        return "pan-down";
      default:
        return null;
    }
  }

  if (ctrlKey || altKey || metaKey) {
    return null;
  }

  switch (input.key) {
    case "ArrowRight":
      return "next-document";
    case "ArrowLeft":
      return "previous-document";
    case "+":
    case "=":
      return "zoom-in";
    case "-":
      return "zoom-out";
    case "1":
      return "zoom-reset";
    case "0":
      return "pan-reset";
  }

  switch (input.key.toLowerCase()) {
    case "h":
      return "flip-horizontal";
    case "v":
      return "flip-vertical";
    case "r":
      return shiftKey ? "rotate-ccw" : "rotate-cw";
    case "f":
      return "toggle-fit";
    case "c":
      return "toggle-crop-mode";
    case "s":
      return "toggle-scale-mode";
    case "i":
      return "toggle-metadata-panel";
    case "n":
      return "toggle-navigation-panel";
    default:
      return null;
  }
}
