/**
 * Lamina - draw-only 2D renderer on WebGPU
 *
 * Shapes are tessellated on submission and kept in GPU buffers as
 * batches; renderFrame() draws every live batch in submission order.
 */

import { GraphicsContext } from "./GraphicsContext";
import { FrameRenderer, type FrameResult } from "./FrameRenderer";
import { GeometryBuffer } from "./batch/GeometryBuffer";
import { MeshCache } from "./geometry/MeshCache";
import { shapeStyle, sortByLayer, toDescriptor, type Shape } from "./geometry/shapes";
import { tessellateShape } from "./geometry/tessellate";
import type { Color, TriangleMesh } from "./geometry/types";
import { IDENTITY_TRANSFORM, pixelsToNdc } from "./math/transform";
import { resolveOptions, type LaminaOptions, type ResolvedOptions } from "./config";

/** Opaque reference to a submitted batch */
export interface BatchHandle {
  readonly id: number;
}

export interface LaminaStats {
  framesRendered: number;
  framesSkipped: number;
  /** Draw calls issued by the last rendered frame */
  lastDrawCalls: number;
  batches: number;
  cacheHits: number;
  cacheMisses: number;
  cachedMeshes: number;
  /** Vertex arena size in bytes */
  vertexCapacity: number;
  /** Index arena size in bytes */
  indexCapacity: number;
  indexFormat: GPUIndexFormat;
}

export class Lamina {
  readonly context: GraphicsContext;

  private options: ResolvedOptions;
  private geometry: GeometryBuffer;
  private cache: MeshCache;
  private frames: FrameRenderer;

  // Shapes of every live batch, for cache retention
  private batches = new Map<number, readonly Shape[]>();
  private nextBatchId = 1;
  private destroyed = false;

  private framesRendered = 0;
  private framesSkipped = 0;
  private lastDrawCalls = 0;

  private constructor(context: GraphicsContext, options: ResolvedOptions) {
    this.context = context;
    this.options = options;
    this.geometry = new GeometryBuffer(context.device, {
      initialVertexCapacity: options.initialVertexCapacity,
      initialIndexCapacity: options.initialIndexCapacity,
      logger: options.logger,
    });
    this.cache = new MeshCache({ clipperScale: options.clipperScale });
    this.frames = new FrameRenderer(context, this.geometry, options.logger);
    this.applyCoordinateSpace();
  }

  /**
   * Connect to the GPU and bind the surface.
   * Rejects with DeviceInitError when no usable device or surface exists.
   */
  static async create(options: LaminaOptions): Promise<Lamina> {
    const resolved = resolveOptions(options);
    const context = await GraphicsContext.create({
      surface: resolved.surface,
      width: resolved.width,
      height: resolved.height,
      gpu: resolved.gpu,
      format: resolved.format,
      alphaMode: resolved.alphaMode,
      powerPreference: resolved.powerPreference,
      adapterTimeoutMs: resolved.adapterTimeoutMs,
      blend: resolved.blend,
      logger: resolved.logger,
    });
    return new Lamina(context, resolved);
  }

  get width(): number {
    return this.context.width;
  }

  get height(): number {
    return this.context.height;
  }

  /**
   * Tessellate shapes into a new batch. Shapes draw in layer order, then
   * in the order given; batches draw in submission order.
   */
  submitShapes(shapes: readonly Shape[]): BatchHandle {
    this.assertAlive();
    const id = this.nextBatchId++;
    this.geometry.setBatch(id, this.tessellateAll(shapes));
    this.batches.set(id, shapes.slice());
    return { id };
  }

  /** Replace the shapes of a batch, keeping its place in draw order */
  updateBatch(handle: BatchHandle, shapes: readonly Shape[]): void {
    this.assertAlive();
    if (!this.batches.has(handle.id)) {
      throw new Error(`Unknown batch ${handle.id}`);
    }
    this.geometry.setBatch(handle.id, this.tessellateAll(shapes));
    this.batches.set(handle.id, shapes.slice());
    this.pruneCache();
  }

  /** Stop drawing a batch. Returns false if it was already released. */
  releaseBatch(handle: BatchHandle): boolean {
    this.assertAlive();
    if (!this.batches.delete(handle.id)) return false;
    this.geometry.removeBatch(handle.id);
    this.pruneCache();
    return true;
  }

  /** Release every batch */
  clear(): void {
    this.assertAlive();
    this.batches.clear();
    this.geometry.clear();
    this.cache.clear();
  }

  /**
   * Draw every live batch over a cleared surface.
   * A frame whose surface cannot be acquired is skipped, not thrown.
   */
  renderFrame(clearColor?: Color): FrameResult {
    this.assertAlive();
    const result = this.frames.render(clearColor ?? this.options.background);
    if (result.ok) {
      this.framesRendered++;
      this.lastDrawCalls = result.drawCalls;
    } else {
      this.framesSkipped++;
    }
    return result;
  }

  /**
   * Resize the surface. Throws ReconfigureError and keeps the previous
   * size if the new one is rejected.
   */
  resize(width: number, height: number): void {
    this.assertAlive();
    this.context.reconfigure(width, height);
    this.applyCoordinateSpace();
  }

  getStats(): LaminaStats {
    const cache = this.cache.stats;
    return {
      framesRendered: this.framesRendered,
      framesSkipped: this.framesSkipped,
      lastDrawCalls: this.lastDrawCalls,
      batches: this.batches.size,
      cacheHits: cache.hits,
      cacheMisses: cache.misses,
      cachedMeshes: cache.size,
      vertexCapacity: this.geometry.vertices.capacity,
      indexCapacity: this.geometry.indices.capacity,
      indexFormat: this.geometry.indexFormat,
    };
  }

  /** Release GPU buffers, the surface and the device */
  destroy(): void {
    if (this.destroyed) return;
    this.destroyed = true;
    this.batches.clear();
    this.cache.clear();
    this.geometry.destroy();
    this.context.destroy();
  }

  private tessellateAll(shapes: readonly Shape[]): TriangleMesh[] {
    const options = { clipperScale: this.options.clipperScale };
    return sortByLayer(shapes).map((shape) =>
      shape.id === undefined
        ? tessellateShape(toDescriptor(shape), options)
        : this.cache.getOrCreate(shape.id, shape.version ?? 0, shapeStyle(shape), () =>
            toDescriptor(shape)
          )
    );
  }

  private pruneCache(): void {
    const live = new Set<string>();
    for (const shapes of this.batches.values()) {
      for (const shape of shapes) {
        if (shape.id !== undefined) live.add(shape.id);
      }
    }
    this.cache.retain(live);
  }

  private applyCoordinateSpace(): void {
    this.geometry.setTransform(
      this.options.coordinates === "pixels"
        ? pixelsToNdc(this.context.width, this.context.height)
        : IDENTITY_TRANSFORM
    );
  }

  private assertAlive(): void {
    if (this.destroyed) {
      throw new Error("Cannot use destroyed renderer");
    }
  }
}
