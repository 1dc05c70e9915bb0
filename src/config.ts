/**
 * Renderer options and their defaults
 */

import type { Color } from "./geometry/types";
import { DEFAULT_CLIPPER_SCALE } from "./geometry/tessellate";
import type { RenderSurface } from "./GraphicsContext";
import { consoleLogger, type Logger } from "./log";
import type { BlendMode } from "./shaders/pipeline";

/**
 * Coordinate space of shape points.
 * - ndc: normalized device coordinates, (-1, -1) bottom-left to (1, 1) top-right
 * - pixels: surface pixels, origin top-left, y down
 */
export type CoordinateSpace = "ndc" | "pixels";

export interface LaminaOptions {
  /** Surface to render into (a GPUCanvasContext or compatible object) */
  surface: RenderSurface;
  /** Initial surface width in pixels */
  width: number;
  /** Initial surface height in pixels */
  height: number;
  coordinates?: CoordinateSpace;
  /** Clear color used when renderFrame() gets none */
  background?: Color;
  blend?: BlendMode;
  format?: GPUTextureFormat;
  alphaMode?: GPUCanvasAlphaMode;
  powerPreference?: GPUPowerPreference;
  adapterTimeoutMs?: number;
  /** Initial vertex arena size in vertices */
  initialVertexCapacity?: number;
  /** Initial index arena size in indices */
  initialIndexCapacity?: number;
  /** Fixed-point scale for self-intersection resolution */
  clipperScale?: number;
  logger?: Logger;
  /** WebGPU entry point (default: navigator.gpu) */
  gpu?: GPU;
}

type DefaultedOptions = Required<
  Omit<LaminaOptions, "surface" | "width" | "height" | "format" | "gpu">
>;

export type ResolvedOptions = DefaultedOptions &
  Pick<LaminaOptions, "surface" | "width" | "height" | "format" | "gpu">;

export const DEFAULT_OPTIONS: Readonly<DefaultedOptions> = {
  coordinates: "ndc",
  background: [0, 0, 0, 1],
  blend: "normal",
  alphaMode: "premultiplied",
  powerPreference: "high-performance",
  adapterTimeoutMs: 5000,
  initialVertexCapacity: 1024,
  initialIndexCapacity: 2048,
  clipperScale: DEFAULT_CLIPPER_SCALE,
  logger: consoleLogger,
};

/** Fill in defaults for every option left undefined */
export function resolveOptions(options: LaminaOptions): ResolvedOptions {
  return {
    surface: options.surface,
    width: options.width,
    height: options.height,
    format: options.format,
    gpu: options.gpu,
    coordinates: options.coordinates ?? DEFAULT_OPTIONS.coordinates,
    background: options.background ?? [...DEFAULT_OPTIONS.background],
    blend: options.blend ?? DEFAULT_OPTIONS.blend,
    alphaMode: options.alphaMode ?? DEFAULT_OPTIONS.alphaMode,
    powerPreference: options.powerPreference ?? DEFAULT_OPTIONS.powerPreference,
    adapterTimeoutMs: options.adapterTimeoutMs ?? DEFAULT_OPTIONS.adapterTimeoutMs,
    initialVertexCapacity: options.initialVertexCapacity ?? DEFAULT_OPTIONS.initialVertexCapacity,
    initialIndexCapacity: options.initialIndexCapacity ?? DEFAULT_OPTIONS.initialIndexCapacity,
    clipperScale: options.clipperScale ?? DEFAULT_OPTIONS.clipperScale,
    logger: options.logger ?? DEFAULT_OPTIONS.logger,
  };
}
