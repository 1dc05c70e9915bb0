/**
 * Polygon tessellation using earcut, with clipper-lib resolving
 * self-intersecting outlines under the shape's winding rule.
 */

import earcut from "earcut";
import ClipperLib from "clipper-lib";
import { cross, isSimpleRing } from "../math/vec2";
import {
  FLOATS_PER_VERTEX,
  MAX_UINT16_VERTICES,
  emptyMesh,
  type Point,
  type ShapeDescriptor,
  type TriangleMesh,
  type WindingRule,
} from "./types";

/** Integer scale applied to coordinates before they go through clipper */
export const DEFAULT_CLIPPER_SCALE = 1_000_000;

/** Largest scaled coordinate clipper accepts, kept just under its range limit */
const CLIPPER_MAX_COORD = 4.5e15;

export interface TessellateOptions {
  /** Fixed-point scale for self-intersection resolution (default: 1e6) */
  clipperScale?: number;
}

/** Simple polygon: outer ring plus holes */
interface SimplePolygon {
  outer: Point[];
  holes: Point[][];
}

/**
 * Drop non-finite input, consecutive duplicates and a closing point
 * that repeats the first one.
 */
function cleanRing(points: readonly Point[]): Point[] | null {
  const ring: Point[] = [];
  for (const [x, y] of points) {
    if (!Number.isFinite(x) || !Number.isFinite(y)) return null;
    const last = ring[ring.length - 1];
    if (last && last[0] === x && last[1] === y) continue;
    ring.push([x, y]);
  }

  while (ring.length > 1) {
    const first = ring[0]!;
    const last = ring[ring.length - 1]!;
    if (first[0] !== last[0] || first[1] !== last[1]) break;
    ring.pop();
  }

  return ring;
}

/** The part of a clipper poly tree node read back here */
interface ContourNode {
  Childs(): ContourNode[];
  Contour(): Array<{ X: number; Y: number }>;
}

/** Collect outer contours and their holes from a clipper poly tree */
function collectPolygons(
  node: ContourNode,
  scale: number,
  out: SimplePolygon[]
): void {
  const toRing = (contour: Array<{ X: number; Y: number }>): Point[] =>
    contour.map((p): Point => [p.X / scale, p.Y / scale]);

  // Children of the root and of holes are always outer contours
  for (const outer of node.Childs()) {
    const holes = outer.Childs();
    out.push({
      outer: toRing(outer.Contour()),
      holes: holes.map((hole) => toRing(hole.Contour())),
    });
    for (const hole of holes) {
      collectPolygons(hole, scale, out);
    }
  }
}

/**
 * Split a self-intersecting ring into simple polygons covering exactly
 * the region the winding rule fills.
 */
function resolveWinding(
  ring: Point[],
  winding: WindingRule,
  requestedScale: number
): SimplePolygon[] {
  let extent = 0;
  for (const [x, y] of ring) {
    extent = Math.max(extent, Math.abs(x), Math.abs(y));
  }
  // Coarser fixed point for outlines that would overflow clipper's range
  const scale = Math.min(requestedScale, CLIPPER_MAX_COORD / extent);

  const path = ring.map(([x, y]) => ({
    X: Math.round(x * scale),
    Y: Math.round(y * scale),
  }));

  const clipper = new ClipperLib.Clipper();
  clipper.StrictlySimple = true;
  clipper.AddPath(path, ClipperLib.PolyType.ptSubject, true);

  const fillType =
    winding === "evenodd"
      ? ClipperLib.PolyFillType.pftEvenOdd
      : ClipperLib.PolyFillType.pftNonZero;
  const tree = new ClipperLib.PolyTree();
  clipper.Execute(ClipperLib.ClipType.ctUnion, tree, fillType, fillType);

  const polygons: SimplePolygon[] = [];
  collectPolygons(tree, scale, polygons);
  return polygons;
}

/**
 * Tessellate a shape descriptor into a counter-clockwise triangle mesh.
 *
 * Degenerate outlines (fewer than three distinct points, zero area,
 * non-finite coordinates) produce an empty mesh.
 */
export function tessellateShape(
  shape: ShapeDescriptor,
  options: TessellateOptions = {}
): TriangleMesh {
  const ring = cleanRing(shape.points);
  if (!ring || ring.length < 3) {
    return emptyMesh();
  }

  const polygons: SimplePolygon[] = isSimpleRing(ring)
    ? [{ outer: ring, holes: [] }]
    : resolveWinding(ring, shape.winding, options.clipperScale ?? DEFAULT_CLIPPER_SCALE);

  const coords: number[] = [];
  const allIndices: number[] = [];

  for (const polygon of polygons) {
    if (polygon.outer.length < 3) continue;

    // Flatten coordinates for earcut
    const flat: number[] = [];
    const holeIndices: number[] = [];
    for (const [x, y] of polygon.outer) {
      flat.push(x, y);
    }
    for (const hole of polygon.holes) {
      holeIndices.push(flat.length / 2);
      for (const [x, y] of hole) {
        flat.push(x, y);
      }
    }

    const indices = earcut(flat, holeIndices.length > 0 ? holeIndices : undefined, 2);
    if (indices.length === 0) continue;

    const base = coords.length / 2;
    for (let i = 0; i < flat.length; i++) {
      coords.push(flat[i]!);
    }

    for (let i = 0; i < indices.length; i += 3) {
      const a = indices[i]!;
      const b = indices[i + 1]!;
      const c = indices[i + 2]!;
      const pa: Point = [flat[a * 2]!, flat[a * 2 + 1]!];
      const pb: Point = [flat[b * 2]!, flat[b * 2 + 1]!];
      const pc: Point = [flat[c * 2]!, flat[c * 2 + 1]!];

      // Keep every triangle counter-clockwise
      if (cross(pa, pb, pc) < 0) {
        allIndices.push(base + a, base + c, base + b);
      } else {
        allIndices.push(base + a, base + b, base + c);
      }
    }
  }

  if (allIndices.length === 0) {
    return emptyMesh();
  }

  const count = coords.length / 2;
  const [red, green, blue, alpha] = shape.color;
  const vertices = new Float32Array(count * FLOATS_PER_VERTEX);
  for (let i = 0; i < count; i++) {
    const offset = i * FLOATS_PER_VERTEX;
    vertices[offset] = coords[i * 2]!;
    vertices[offset + 1] = coords[i * 2 + 1]!;
    vertices[offset + 2] = red;
    vertices[offset + 3] = green;
    vertices[offset + 4] = blue;
    vertices[offset + 5] = alpha;
  }

  const indices =
    count > MAX_UINT16_VERTICES
      ? new Uint32Array(allIndices)
      : new Uint16Array(allIndices);

  return { vertices, indices };
}
