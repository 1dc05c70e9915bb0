/**
 * Frame Renderer
 *
 * Runs one frame: acquire the surface texture, upload pending geometry,
 * clear, draw every batch with the fill pipeline, submit and present.
 */

import { SurfaceAcquireError, describeError } from "./errors";
import type { GraphicsContext } from "./GraphicsContext";
import type { GeometryBuffer } from "./batch/GeometryBuffer";
import type { Color } from "./geometry/types";
import { silentLogger, type Logger } from "./log";

export type FramePhase =
  | "acquire-target"
  | "upload"
  | "begin-pass"
  | "bind"
  | "draw"
  | "submit"
  | "present";

export type FrameResult =
  | { ok: true; drawCalls: number; width: number; height: number }
  | { ok: false; error: SurfaceAcquireError };

/** Receives each phase as it starts (for tracing) */
export type FramePhaseListener = (phase: FramePhase) => void;

export class FrameRenderer {
  private context: GraphicsContext;
  private geometry: GeometryBuffer;
  private logger: Logger;
  private onPhase: FramePhaseListener | undefined;

  constructor(
    context: GraphicsContext,
    geometry: GeometryBuffer,
    logger: Logger = silentLogger,
    onPhase?: FramePhaseListener
  ) {
    this.context = context;
    this.geometry = geometry;
    this.logger = logger;
    this.onPhase = onPhase;
  }

  /**
   * Render one frame cleared to `clearColor`.
   * A surface that cannot be acquired skips the frame and reports why;
   * nothing is uploaded or submitted in that case.
   */
  render(clearColor: Readonly<Color>): FrameResult {
    this.onPhase?.("acquire-target");
    const target = this.acquire();
    if (target instanceof SurfaceAcquireError) {
      this.logger.warn(`Frame skipped: ${target.message}`);
      return { ok: false, error: target };
    }

    const { device, queue, fill } = this.context;

    this.onPhase?.("upload");
    this.geometry.upload();

    this.onPhase?.("begin-pass");
    const encoder = device.createCommandEncoder({ label: "lamina-frame" });
    const pass = encoder.beginRenderPass({
      label: "lamina-fill",
      colorAttachments: [
        {
          view: target.view,
          clearValue: {
            r: clearColor[0],
            g: clearColor[1],
            b: clearColor[2],
            a: clearColor[3],
          },
          loadOp: "clear",
          storeOp: "store",
        },
      ],
    });

    this.onPhase?.("bind");
    pass.setViewport(0, 0, target.width, target.height, 0, 1);
    pass.setPipeline(fill.pipeline);

    const ranges = this.geometry.drawRanges();
    if (ranges.length > 0) {
      pass.setVertexBuffer(0, this.geometry.vertices.handle);
      pass.setIndexBuffer(this.geometry.indices.handle, this.geometry.indexFormat);
    }

    this.onPhase?.("draw");
    for (const range of ranges) {
      pass.drawIndexed(range.indexCount, 1, range.firstIndex, range.baseVertex, 0);
    }
    pass.end();

    this.onPhase?.("submit");
    queue.submit([encoder.finish()]);

    this.onPhase?.("present");
    this.context.surface.present?.();

    return { ok: true, drawCalls: ranges.length, width: target.width, height: target.height };
  }

  private acquire():
    | { view: GPUTextureView; width: number; height: number }
    | SurfaceAcquireError {
    if (this.context.lost) {
      return new SurfaceAcquireError("device-lost", "WebGPU device lost");
    }

    try {
      const texture = this.context.surface.getCurrentTexture();
      return { view: texture.createView(), width: texture.width, height: texture.height };
    } catch (err) {
      return new SurfaceAcquireError(
        "surface-unavailable",
        `Surface texture unavailable: ${describeError(err)}`,
        { cause: err }
      );
    }
  }
}
