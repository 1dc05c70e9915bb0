/**
 * Shape normalization, tessellation and mesh caching
 */

export * from "./types";
export {
  DEFAULT_CIRCLE_SEGMENTS,
  MAX_CIRCLE_SEGMENTS,
  normalizeColor,
  shapeStyle,
  sortByLayer,
  toDescriptor,
  type CircleShape,
  type PolygonShape,
  type RectangleShape,
  type Shape,
} from "./shapes";
export { tessellateShape, DEFAULT_CLIPPER_SCALE, type TessellateOptions } from "./tessellate";
export { MeshCache, type MeshCacheStats, type Tessellator } from "./MeshCache";
