/**
 * Lamina - a draw-only 2D vector renderer on WebGPU
 */

export const VERSION = "0.1.0";

export { Lamina, type BatchHandle, type LaminaStats } from "./Lamina";
export {
  DEFAULT_OPTIONS,
  resolveOptions,
  type CoordinateSpace,
  type LaminaOptions,
  type ResolvedOptions,
} from "./config";
export {
  GraphicsContext,
  type GraphicsContextOptions,
  type RenderSurface,
} from "./GraphicsContext";
export {
  FrameRenderer,
  type FramePhase,
  type FramePhaseListener,
  type FrameResult,
} from "./FrameRenderer";
export {
  LaminaError,
  DeviceInitError,
  SurfaceAcquireError,
  ReconfigureError,
  describeError,
  type DeviceInitErrorCode,
  type SurfaceAcquireErrorCode,
  type ReconfigureErrorCode,
} from "./errors";
export { consoleLogger, silentLogger, type Logger } from "./log";
export { GpuBuffer, type GpuBufferKind } from "./GpuBuffer";

// Geometry
export * from "./geometry";

// Batching
export * from "./batch";

// Pipeline
export {
  FILL_VERTEX_LAYOUT,
  blendStateFor,
  createFillPipeline,
  createFillPipelineDescriptor,
  type BlendMode,
  type FillPipeline,
} from "./shaders/pipeline";
export { fillShaderSource } from "./shaders/fill";

// Math
export * as vec2 from "./math/vec2";
export {
  IDENTITY_TRANSFORM,
  pixelsToNdc,
  flipsWinding,
  type ViewTransform,
} from "./math/transform";
