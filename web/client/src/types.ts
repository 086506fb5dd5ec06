export interface Size {
  width: number;
  height: number;
}

export interface Point {
  x: number;
  y: number;
}

export type Vector = Point;

export type Rotation = 0 | 90 | 180 | 270;

export interface TransformState {
  rotation: Rotation;
  flipHorizontal: boolean;
  flipVertical: boolean;
}

export type ViewMode =
  | { kind: "fit" }
  | { kind: "actual" }
  | { kind: "custom"; factor: number };

export type ToolMode = "none" | "crop" | "scale";

export type PanelId = "navigation" | "metadata";

export interface Rect {
  x: number;
  y: number;
  width: number;
  height: number;
}

export function isPositiveSize(size: Size): boolean {
  return (
    Number.isFinite(size.width) &&
    Number.isFinite(size.height) &&
    size.width > 0 &&
    size.height > 0
  );
}
