/**
 * Graphics Context
 *
 * Owns the WebGPU device, its queue and the surface binding. The fill
 * pipeline is built once here; resizing only reconfigures the surface.
 */

import {
  DeviceInitError,
  ReconfigureError,
  describeError,
  type ReconfigureErrorCode,
} from "./errors";
import { consoleLogger, type Logger } from "./log";
import { createFillPipeline, type BlendMode, type FillPipeline } from "./shaders/pipeline";

// GPUTextureUsage.RENDER_ATTACHMENT (avoid referencing the global at module load time for testing)
const GPU_TEXTURE_USAGE_RENDER_ATTACHMENT = 0x10;

/** Surface the engine paints into: a GPUCanvasContext or anything shaped like one */
export interface RenderSurface {
  readonly canvas: { width: number; height: number };
  configure(configuration: GPUCanvasConfiguration): void;
  unconfigure(): void;
  getCurrentTexture(): GPUTexture;
  /** Native hosts that present explicitly; canvas contexts present on their own */
  present?(): void;
}

export interface GraphicsContextOptions {
  surface: RenderSurface;
  width: number;
  height: number;
  /** WebGPU entry point (default: navigator.gpu) */
  gpu?: GPU;
  /** Surface format (default: gpu.getPreferredCanvasFormat()) */
  format?: GPUTextureFormat;
  /** Surface alpha mode (default: premultiplied) */
  alphaMode?: GPUCanvasAlphaMode;
  /** Adapter power preference (default: high-performance) */
  powerPreference?: GPUPowerPreference;
  /** Give up on the adapter request after this many milliseconds (default: 5000) */
  adapterTimeoutMs?: number;
  /** Blend mode of the fill pipeline (default: normal) */
  blend?: BlendMode;
  logger?: Logger;
}

const DEFAULT_ADAPTER_TIMEOUT_MS = 5000;

function defaultGpu(): GPU | undefined {
  return typeof navigator === "undefined" ? undefined : navigator.gpu;
}

function isValidDimension(value: number): boolean {
  return Number.isInteger(value) && value > 0;
}

/** Request an adapter, resolving null if the request hangs */
async function requestAdapterWithTimeout(
  gpu: GPU,
  options: GPURequestAdapterOptions,
  timeoutMs: number
): Promise<GPUAdapter | null> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<null>((resolve) => {
    timer = setTimeout(() => resolve(null), timeoutMs);
  });

  try {
    return await Promise.race([gpu.requestAdapter(options), timeout]);
  } finally {
    clearTimeout(timer);
  }
}

export class GraphicsContext {
  readonly device: GPUDevice;
  readonly queue: GPUQueue;
  readonly surface: RenderSurface;
  readonly format: GPUTextureFormat;
  readonly alphaMode: GPUCanvasAlphaMode;
  readonly fill: FillPipeline;

  private _width: number;
  private _height: number;
  private _lost = false;
  private _destroyed = false;
  private logger: Logger;

  private constructor(
    device: GPUDevice,
    surface: RenderSurface,
    format: GPUTextureFormat,
    alphaMode: GPUCanvasAlphaMode,
    fill: FillPipeline,
    width: number,
    height: number,
    logger: Logger
  ) {
    this.device = device;
    this.queue = device.queue;
    this.surface = surface;
    this.format = format;
    this.alphaMode = alphaMode;
    this.fill = fill;
    this._width = width;
    this._height = height;
    this.logger = logger;

    // Handle device loss.
    void device.lost.then((info) => {
      if (this._destroyed) return;
      this._lost = true;
      this.logger.error(`WebGPU device lost (${info.reason}): ${info.message}`);
    });
  }

  /**
   * Connect to a GPU, configure the surface and build the fill pipeline.
   * Rejects with DeviceInitError; nothing is retried.
   */
  static async create(options: GraphicsContextOptions): Promise<GraphicsContext> {
    const logger = options.logger ?? consoleLogger;
    const { surface, width, height } = options;

    if (!isValidDimension(width) || !isValidDimension(height)) {
      throw new DeviceInitError(
        "invalid-dimensions",
        `Invalid surface dimensions ${width}x${height}`
      );
    }

    const gpu = options.gpu ?? defaultGpu();
    if (!gpu) {
      throw new DeviceInitError("no-webgpu", "WebGPU not supported: no GPU entry point");
    }

    const adapter = await requestAdapterWithTimeout(
      gpu,
      { powerPreference: options.powerPreference ?? "high-performance" },
      options.adapterTimeoutMs ?? DEFAULT_ADAPTER_TIMEOUT_MS
    );
    if (!adapter) {
      throw new DeviceInitError("no-adapter", "No compatible WebGPU adapter found");
    }

    let device: GPUDevice;
    try {
      device = await adapter.requestDevice({ label: "lamina" });
    } catch (err) {
      throw new DeviceInitError(
        "device-request",
        `WebGPU device request failed: ${describeError(err)}`,
        { cause: err }
      );
    }

    const maxDimension = device.limits.maxTextureDimension2D;
    if (width > maxDimension || height > maxDimension) {
      device.destroy();
      throw new DeviceInitError(
        "invalid-dimensions",
        `Surface dimensions ${width}x${height} exceed device limit ${maxDimension}`
      );
    }

    const format = options.format ?? gpu.getPreferredCanvasFormat();
    const alphaMode = options.alphaMode ?? "premultiplied";

    try {
      surface.canvas.width = width;
      surface.canvas.height = height;
      surface.configure(surfaceConfiguration(device, format, alphaMode));
    } catch (err) {
      device.destroy();
      throw new DeviceInitError(
        "surface-configuration",
        `Surface configuration failed: ${describeError(err)}`,
        { cause: err }
      );
    }

    device.pushErrorScope("validation");
    const fill = createFillPipeline(device, format, options.blend ?? "normal");
    const validationError = await device.popErrorScope();
    if (validationError) {
      surface.unconfigure();
      device.destroy();
      throw new DeviceInitError(
        "pipeline-creation",
        `Fill pipeline creation failed: ${validationError.message}`
      );
    }

    logger.info(`WebGPU context ready (format: ${format}, ${width}x${height})`);
    return new GraphicsContext(device, surface, format, alphaMode, fill, width, height, logger);
  }

  get width(): number {
    return this._width;
  }

  get height(): number {
    return this._height;
  }

  /** Whether the device has been lost */
  get lost(): boolean {
    return this._lost;
  }

  get destroyed(): boolean {
    return this._destroyed;
  }

  /**
   * Resize the surface and reconfigure it. The pipeline is kept.
   * On failure the previous size is restored and ReconfigureError is thrown.
   */
  reconfigure(width: number, height: number): void {
    if (this._destroyed) {
      throw new Error("Cannot reconfigure destroyed graphics context");
    }

    const maxDimension = this.device.limits.maxTextureDimension2D;
    if (!isValidDimension(width) || !isValidDimension(height)) {
      throw this.reconfigureError("invalid-dimensions", `Invalid surface dimensions ${width}x${height}`);
    }
    if (width > maxDimension || height > maxDimension) {
      throw this.reconfigureError(
        "invalid-dimensions",
        `Surface dimensions ${width}x${height} exceed device limit ${maxDimension}`
      );
    }

    const previousWidth = this._width;
    const previousHeight = this._height;
    try {
      this.applySize(width, height);
    } catch (err) {
      try {
        this.applySize(previousWidth, previousHeight);
      } catch (restoreErr) {
        this.logger.error(
          `Failed to restore surface ${previousWidth}x${previousHeight}: ${describeError(restoreErr)}`
        );
      }
      throw this.reconfigureError(
        "surface-configuration",
        `Surface reconfiguration failed: ${describeError(err)}`,
        err
      );
    }
  }

  /** Unconfigure the surface and release the device */
  destroy(): void {
    if (this._destroyed) return;
    this._destroyed = true;
    this.surface.unconfigure();
    this.device.destroy();
  }

  private applySize(width: number, height: number): void {
    this.surface.canvas.width = width;
    this.surface.canvas.height = height;
    this.surface.configure(surfaceConfiguration(this.device, this.format, this.alphaMode));
    this._width = width;
    this._height = height;
  }

  private reconfigureError(code: ReconfigureErrorCode, message: string, cause?: unknown): ReconfigureError {
    this.logger.warn(message);
    return new ReconfigureError(code, message, cause === undefined ? undefined : { cause });
  }
}

function surfaceConfiguration(
  device: GPUDevice,
  format: GPUTextureFormat,
  alphaMode: GPUCanvasAlphaMode
): GPUCanvasConfiguration {
  return {
    device,
    format,
    usage: GPU_TEXTURE_USAGE_RENDER_ATTACHMENT,
    viewFormats: [],
    colorSpace: "srgb",
    alphaMode,
  };
}
