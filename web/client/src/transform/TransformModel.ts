import type { Point, Rotation, Size, TransformState } from "../types";

/**
 * Affine matrix in CSS order: x' = a*x + c*y + e, y' = b*x + d*y + f.
 */
export type Matrix = readonly [number, number, number, number, number, number];

export type TransformOperation = "rotate-cw" | "rotate-ccw" | "flip-horizontal" | "flip-vertical";

export const IDENTITY_TRANSFORM: Readonly<TransformState> = {
  rotation: 0,
  flipHorizontal: false,
  flipVertical: false,
};

const CLOCKWISE: Record<Rotation, Rotation> = { 0: 90, 90: 180, 180: 270, 270: 0 };
const COUNTER_CLOCKWISE: Record<Rotation, Rotation> = { 0: 270, 270: 180, 180: 90, 90: 0 };

export function applyOperation(state: TransformState, operation: TransformOperation): TransformState {
  switch (operation) {
    case "rotate-cw":
      return { ...state, rotation: CLOCKWISE[state.rotation] };
    case "rotate-ccw":
      return { ...state, rotation: COUNTER_CLOCKWISE[state.rotation] };
    case "flip-horizontal":
      return { ...state, flipHorizontal: !state.flipHorizontal };
    case "flip-vertical":
      return { ...state, flipVertical: !state.flipVertical };
  }
}

export function isQuarterTurn(rotation: Rotation): boolean {
  return rotation === 90 || rotation === 270;
}

export function effectiveSize(state: TransformState, intrinsic: Size): Size {
  if (isQuarterTurn(state.rotation)) {
    return { width: intrinsic.height, height: intrinsic.width };
  }
  return { width: intrinsic.width, height: intrinsic.height };
}

export function transformEquals(a: TransformState, b: TransformState): boolean {
  return (
    a.rotation === b.rotation &&
    a.flipHorizontal === b.flipHorizontal &&
    a.flipVertical === b.flipVertical
  );
}

export function multiply(outer: Matrix, inner: Matrix): Matrix {
  const [a2, b2, c2, d2, e2, f2] = outer;
  const [a1, b1, c1, d1, e1, f1] = inner;
  return normalize([
    a2 * a1 + c2 * b1,
    b2 * a1 + d2 * b1,
    a2 * c1 + c2 * d1,
    b2 * c1 + d2 * d1,
    a2 * e1 + c2 * f1 + e2,
    b2 * e1 + d2 * f1 + f2,
  ]);
}

function normalize(matrix: Matrix): Matrix {
  // -0 would otherwise leak into CSS strings and equality checks.
  const [a, b, c, d, e, f] = matrix;
  return [a + 0, b + 0, c + 0, d + 0, e + 0, f + 0];
}

function rotationMatrix(rotation: Rotation, box: Size): Matrix {
  const { width: w, height: h } = box;
  switch (rotation) {
    case 0:
      return [1, 0, 0, 1, 0, 0];
    case 90:
      return [0, 1, -1, 0, h, 0];
    case 180:
      return [-1, 0, 0, -1, w, h];
    case 270:
      return [0, -1, 1, 0, 0, w];
  }
}

/**
 * Maps a point in the document's intrinsic frame to the effective (displayed)
 * frame. Flips are applied in the intrinsic axes, then the clockwise rotation.
 */
export function transformMatrix(state: TransformState, intrinsic: Size): Matrix {
  const flip: Matrix = [
    state.flipHorizontal ? -1 : 1,
    0,
    0,
    state.flipVertical ? -1 : 1,
    state.flipHorizontal ? intrinsic.width : 0,
    state.flipVertical ? intrinsic.height : 0,
  ];
  return multiply(rotationMatrix(state.rotation, intrinsic), flip);
}

export function mapPoint(matrix: Matrix, point: Point): Point {
  const [a, b, c, d, e, f] = matrix;
  return {
    x: a * point.x + c * point.y + e + 0,
    y: b * point.x + d * point.y + f + 0,
  };
}

export class TransformModel {
  private current: TransformState = { ...IDENTITY_TRANSFORM };

  get state(): TransformState {
    return { ...this.current };
  }

  apply(operation: TransformOperation): TransformState {
    this.current = applyOperation(this.current, operation);
    return this.state;
  }

  applyRotateClockwise(): TransformState {
    return this.apply("rotate-cw");
  }

  applyRotateCounterClockwise(): TransformState {
    return this.apply("rotate-ccw");
  }

  applyFlipHorizontal(): TransformState {
    return this.apply("flip-horizontal");
  }

  applyFlipVertical(): TransformState {
    return this.apply("flip-vertical");
  }

  reset(): void {
    this.current = { ...IDENTITY_TRANSFORM };
  }

  isIdentity(): boolean {
    return transformEquals(this.current, IDENTITY_TRANSFORM);
  }

  effectiveSize(intrinsic: Size): Size {
    return effectiveSize(this.current, intrinsic);
  }

  matrix(intrinsic: Size): Matrix {
    return transformMatrix(this.current, intrinsic);
  }
}
