/**
 * Axis-aligned 2D transforms applied to vertex positions at upload time
 */

export interface ViewTransform {
  scaleX: number;
  scaleY: number;
  offsetX: number;
  offsetY: number;
}

export const IDENTITY_TRANSFORM: Readonly<ViewTransform> = {
  scaleX: 1,
  scaleY: 1,
  offsetX: 0,
  offsetY: 0,
};

/**
 * Map surface pixels (origin top-left, y down) to normalized device
 * coordinates (origin center, y up).
 */
export function pixelsToNdc(width: number, height: number): ViewTransform {
  return {
    scaleX: 2 / width,
    scaleY: -2 / height,
    offsetX: -1,
    offsetY: 1,
  };
}

/** Whether the transform mirrors the plane, reversing triangle winding */
export function flipsWinding(transform: Readonly<ViewTransform>): boolean {
  return transform.scaleX * transform.scaleY < 0;
}

export function isIdentity(transform: Readonly<ViewTransform>): boolean {
  return transformEquals(transform, IDENTITY_TRANSFORM);
}

export function transformEquals(
  a: Readonly<ViewTransform>,
  b: Readonly<ViewTransform>
): boolean {
  return (
    a.scaleX === b.scaleX &&
    a.scaleY === b.scaleY &&
    a.offsetX === b.offsetX &&
    a.offsetY === b.offsetY
  );
}
