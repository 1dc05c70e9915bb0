/**
 * Fill render pipeline
 *
 * Every descriptor field is set explicitly so that future pipeline
 * variants differ from this one only where they mean to.
 */

import { VERTEX_STRIDE } from "../geometry/types";
import { FILL_FRAGMENT_ENTRY, FILL_VERTEX_ENTRY, fillShaderSource } from "./fill";

/** Blend modes for compositing fills */
export type BlendMode = "normal" | "replace";

// GPUColorWrite.ALL (avoid referencing the GPUColorWrite global at module load time for testing)
const GPU_COLOR_WRITE_ALL = 0xf;

/** Vertex layout: location 0 = position (2 floats), location 1 = color (4 floats) */
export const FILL_VERTEX_LAYOUT: GPUVertexBufferLayout = {
  arrayStride: VERTEX_STRIDE,
  stepMode: "vertex",
  attributes: [
    { shaderLocation: 0, offset: 0, format: "float32x2" },
    { shaderLocation: 1, offset: 8, format: "float32x4" },
  ],
};

/** Blend state for a blend mode (undefined = overwrite) */
export function blendStateFor(mode: BlendMode): GPUBlendState | undefined {
  switch (mode) {
    case "normal":
      // Standard alpha blending: src * srcAlpha + dst * (1 - srcAlpha)
      return {
        color: { srcFactor: "src-alpha", dstFactor: "one-minus-src-alpha", operation: "add" },
        alpha: { srcFactor: "one", dstFactor: "one-minus-src-alpha", operation: "add" },
      };
    case "replace":
      return undefined;
  }
}

/** Build the fill pipeline descriptor */
export function createFillPipelineDescriptor(
  module: GPUShaderModule,
  layout: GPUPipelineLayout,
  format: GPUTextureFormat,
  blend: BlendMode
): GPURenderPipelineDescriptor {
  return {
    label: "lamina-fill",
    layout,
    vertex: {
      module,
      entryPoint: FILL_VERTEX_ENTRY,
      constants: {},
      buffers: [FILL_VERTEX_LAYOUT],
    },
    primitive: {
      topology: "triangle-list",
      stripIndexFormat: undefined,
      frontFace: "ccw",
      cullMode: "back",
      unclippedDepth: false,
    },
    depthStencil: undefined,
    multisample: {
      count: 1,
      mask: 0xffffffff,
      alphaToCoverageEnabled: false,
    },
    fragment: {
      module,
      entryPoint: FILL_FRAGMENT_ENTRY,
      constants: {},
      targets: [
        {
          format,
          blend: blendStateFor(blend),
          writeMask: GPU_COLOR_WRITE_ALL,
        },
      ],
    },
  };
}

export interface FillPipeline {
  module: GPUShaderModule;
  layout: GPUPipelineLayout;
  pipeline: GPURenderPipeline;
}

/** Compile the fill shader and create its pipeline */
export function createFillPipeline(
  device: GPUDevice,
  format: GPUTextureFormat,
  blend: BlendMode
): FillPipeline {
  const module = device.createShaderModule({ label: "lamina-fill", code: fillShaderSource });
  const layout = device.createPipelineLayout({ label: "lamina-fill", bindGroupLayouts: [] });
  const pipeline = device.createRenderPipeline(
    createFillPipelineDescriptor(module, layout, format, blend)
  );
  return { module, layout, pipeline };
}
