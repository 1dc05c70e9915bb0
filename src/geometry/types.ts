/**
 * Geometry types
 */

/** Point as [x, y] */
export type Point = [number, number];

/** RGBA color, each channel in [0, 1] */
export type Color = [number, number, number, number];

/** Rule deciding which regions of a self-intersecting outline are filled */
export type WindingRule = "nonzero" | "evenodd";

/** Normalized outline handed to the tessellator */
export interface ShapeDescriptor {
  readonly points: readonly Point[];
  readonly color: Color;
  readonly winding: WindingRule;
}

/** The parts of a descriptor written into a mesh besides its outline */
export type ShapeStyle = Pick<ShapeDescriptor, "color" | "winding">;

/** Tessellated shape: interleaved vertices plus triangle indices */
export interface TriangleMesh {
  /** Interleaved vertex data [x, y, r, g, b, a, ...] */
  vertices: Float32Array;
  /** Triangle indices, counter-clockwise */
  indices: Uint16Array | Uint32Array;
}

/** Floats per vertex: position (2) + color (4) */
export const FLOATS_PER_VERTEX = 6;

/** Bytes per vertex */
export const VERTEX_STRIDE = FLOATS_PER_VERTEX * 4;

/** Largest vertex count addressable with 16-bit indices */
export const MAX_UINT16_VERTICES = 65535;

/** Number of vertices in a mesh */
export function vertexCount(mesh: TriangleMesh): number {
  return mesh.vertices.length / FLOATS_PER_VERTEX;
}

/** A mesh with no geometry */
export function emptyMesh(): TriangleMesh {
  return { vertices: new Float32Array(0), indices: new Uint16Array(0) };
}
