/**
 * Shape variants and their normalization into outlines.
 *
 * Every shape kind collapses into a single point ring plus a winding rule
 * before it reaches the tessellator, so the tessellator only ever sees one
 * kind of input.
 */

import type { Color, Point, ShapeDescriptor, ShapeStyle, WindingRule } from "./types";

/** Segments used for a full circle when none are given */
export const DEFAULT_CIRCLE_SEGMENTS = 32;

/** Upper bound on circle outline segments */
export const MAX_CIRCLE_SEGMENTS = 4096;

interface ShapeBase {
  /** Fill color */
  color: Color;
  /** Stable identity used for mesh caching (shapes without one are never cached) */
  id?: string;
  /** Geometry version; bump it whenever the outline changes (default: 0) */
  version?: number;
  /** Draw order, higher layers draw on top (default: 0) */
  layer?: number;
}

export interface PolygonShape extends ShapeBase {
  kind: "polygon";
  points: readonly Point[];
  /** Winding rule for self-intersecting outlines (default: nonzero) */
  winding?: WindingRule;
}

export interface RectangleShape extends ShapeBase {
  kind: "rectangle";
  x: number;
  y: number;
  width: number;
  height: number;
}

export interface CircleShape extends ShapeBase {
  kind: "circle";
  cx: number;
  cy: number;
  radius: number;
  /** Number of outline segments (default: 32, minimum: 3, maximum: 4096) */
  segments?: number;
}

export type Shape = PolygonShape | RectangleShape | CircleShape;

function clampChannel(value: number): number {
  if (Number.isNaN(value)) return 0;
  return Math.min(1, Math.max(0, value));
}

/** Copy a color, clamping every channel to [0, 1] */
export function normalizeColor(color: Readonly<Color>): Color {
  return [
    clampChannel(color[0]),
    clampChannel(color[1]),
    clampChannel(color[2]),
    clampChannel(color[3]),
  ];
}

function rectanglePoints(shape: RectangleShape): Point[] {
  const { x, y, width, height } = shape;
  return [
    [x, y],
    [x + width, y],
    [x + width, y + height],
    [x, y + height],
  ];
}

function circlePoints(shape: CircleShape): Point[] {
  const requested = shape.segments ?? DEFAULT_CIRCLE_SEGMENTS;
  const segments = Number.isFinite(requested)
    ? Math.min(MAX_CIRCLE_SEGMENTS, Math.max(3, Math.floor(requested)))
    : DEFAULT_CIRCLE_SEGMENTS;
  const points: Point[] = [];
  for (let i = 0; i < segments; i++) {
    const angle = (i / segments) * Math.PI * 2;
    points.push([
      shape.cx + Math.cos(angle) * shape.radius,
      shape.cy + Math.sin(angle) * shape.radius,
    ]);
  }
  return points;
}

/** Normalized fill color and winding rule of a shape */
export function shapeStyle(shape: Shape): ShapeStyle {
  return {
    color: normalizeColor(shape.color),
    winding: shape.kind === "polygon" ? shape.winding ?? "nonzero" : "nonzero",
  };
}

/**
 * Normalize a shape into a descriptor.
 * Points and color are copied; the descriptor shares no arrays with the input.
 */
export function toDescriptor(shape: Shape): ShapeDescriptor {
  return { points: shapePoints(shape), ...shapeStyle(shape) };
}

function shapePoints(shape: Shape): Point[] {
  switch (shape.kind) {
    case "polygon":
      return shape.points.map(([x, y]): Point => [x, y]);
    case "rectangle":
      return rectanglePoints(shape);
    case "circle":
      return circlePoints(shape);
  }
}

/**
 * Order shapes by layer, keeping submission order within a layer.
 */
export function sortByLayer<T extends Shape>(shapes: readonly T[]): T[] {
  return shapes
    .map((shape, index) => ({ shape, index }))
    .sort((a, b) => (a.shape.layer ?? 0) - (b.shape.layer ?? 0) || a.index - b.index)
    .map(({ shape }) => shape);
}
