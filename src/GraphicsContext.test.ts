import { describe, it, expect, vi, afterEach } from "vitest";
import { GraphicsContext, type GraphicsContextOptions } from "./GraphicsContext";
import { DeviceInitError, ReconfigureError } from "./errors";
import type { Logger } from "./log";
import { createMockDevice, createMockGpu, createMockSurface, type MockGpuOptions } from "./testing/mockGpu";

function createLogger() {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() } satisfies Logger;
}

function setup(gpuOptions: MockGpuOptions = {}, options: Partial<GraphicsContextOptions> = {}) {
  const gpu = createMockGpu(gpuOptions);
  const surface = createMockSurface();
  const logger = createLogger();
  const create = () =>
    GraphicsContext.create({
      surface: surface.surface,
      width: 640,
      height: 480,
      gpu: gpu.gpu,
      logger,
      ...options,
    });
  return { gpu, surface, logger, create };
}

afterEach(() => {
  vi.unstubAllGlobals();
});

describe("GraphicsContext", () => {
  describe("create", () => {
    it("configures the surface and builds the pipeline", async () => {
      const { gpu, surface, logger, create } = setup();

      const context = await create();

      expect(gpu.mock.requestAdapter).toHaveBeenCalledWith({ powerPreference: "high-performance" });
      expect(surface.canvas).toEqual({ width: 640, height: 480 });
      expect(surface.mock.configure).toHaveBeenCalledWith({
        device: gpu.device.device,
        format: "bgra8unorm",
        usage: 0x10,
        viewFormats: [],
        colorSpace: "srgb",
        alphaMode: "premultiplied",
      });
      expect(gpu.device.mock.createRenderPipeline).toHaveBeenCalledTimes(1);
      expect(gpu.device.mock.pushErrorScope).toHaveBeenCalledWith("validation");
      expect(context.format).toBe("bgra8unorm");
      expect(context.width).toBe(640);
      expect(context.height).toBe(480);
      expect(context.device).toBe(gpu.device.device);
      expect(logger.info).toHaveBeenCalledWith("WebGPU context ready (format: bgra8unorm, 640x480)");
    });

    it("uses the given format, alpha mode and power preference", async () => {
      const { gpu, surface, create } = setup(
        {},
        { format: "rgba8unorm", alphaMode: "opaque", powerPreference: "low-power" }
      );

      const context = await create();

      expect(gpu.mock.getPreferredCanvasFormat).not.toHaveBeenCalled();
      expect(gpu.mock.requestAdapter).toHaveBeenCalledWith({ powerPreference: "low-power" });
      expect(surface.mock.configure.mock.calls[0]![0]).toMatchObject({
        format: "rgba8unorm",
        alphaMode: "opaque",
      });
      expect(context.alphaMode).toBe("opaque");
    });

    it("fails without a WebGPU entry point", async () => {
      vi.stubGlobal("navigator", {});
      const surface = createMockSurface();

      const result = GraphicsContext.create({ surface: surface.surface, width: 640, height: 480 });

      await expect(result).rejects.toBeInstanceOf(DeviceInitError);
      await expect(result).rejects.toMatchObject({ code: "no-webgpu" });
    });

    it("fails when no adapter is available", async () => {
      const { create } = setup({ adapter: "none" });

      await expect(create()).rejects.toMatchObject({
        name: "DeviceInitError",
        code: "no-adapter",
      });
    });

    it("gives up on an adapter request that never settles", async () => {
      const { create } = setup({ adapter: "hang" }, { adapterTimeoutMs: 10 });

      await expect(create()).rejects.toMatchObject({ code: "no-adapter" });
    });

    it("fails when the device request fails", async () => {
      const cause = new Error("out of memory");
      const { create } = setup({ requestDeviceError: cause });

      const error = await create().catch((err: unknown) => err);

      expect(error).toBeInstanceOf(DeviceInitError);
      expect(error).toMatchObject({
        code: "device-request",
        message: "WebGPU device request failed: out of memory",
        cause,
      });
    });

    it("rejects invalid dimensions before touching the GPU", async () => {
      const sizes: Array<[number, number]> = [[0, 480], [640, -1], [1.5, 480], [640, Number.NaN]];
      for (const [width, height] of sizes) {
        const { gpu, create } = setup({}, { width, height });

        await expect(create()).rejects.toMatchObject({ code: "invalid-dimensions" });
        expect(gpu.mock.requestAdapter).not.toHaveBeenCalled();
      }
    });

    it("rejects dimensions past the device limit", async () => {
      const device = createMockDevice({ maxTextureDimension2D: 1024 });
      const { create } = setup({ device }, { width: 2048 });

      await expect(create()).rejects.toMatchObject({ code: "invalid-dimensions" });
      expect(device.mock.destroy).toHaveBeenCalled();
    });

    it("fails when the surface cannot be configured", async () => {
      const { gpu, surface, create } = setup();
      surface.mock.configure.mockImplementation(() => {
        throw new Error("context lost");
      });

      await expect(create()).rejects.toMatchObject({
        code: "surface-configuration",
        message: "Surface configuration failed: context lost",
      });
      expect(gpu.device.mock.destroy).toHaveBeenCalled();
    });

    it("fails when the pipeline does not validate", async () => {
      const device = createMockDevice({ validationError: "bad shader" });
      const { surface, create } = setup({ device });

      await expect(create()).rejects.toMatchObject({
        code: "pipeline-creation",
        message: "Fill pipeline creation failed: bad shader",
      });
      expect(surface.mock.unconfigure).toHaveBeenCalled();
      expect(device.mock.destroy).toHaveBeenCalled();
    });
  });

  describe("reconfigure", () => {
    it("resizes and reconfigures the surface without rebuilding the pipeline", async () => {
      const { gpu, surface, create } = setup();
      const context = await create();

      context.reconfigure(800, 600);

      expect(surface.canvas).toEqual({ width: 800, height: 600 });
      expect(surface.mock.configure).toHaveBeenCalledTimes(2);
      expect(gpu.device.mock.createRenderPipeline).toHaveBeenCalledTimes(1);
      expect(context.width).toBe(800);
      expect(context.height).toBe(600);
    });

    it("rejects invalid dimensions and keeps the current size", async () => {
      const { surface, logger, create } = setup();
      const context = await create();

      expect(() => context.reconfigure(0, 600)).toThrow(ReconfigureError);
      expect(() => context.reconfigure(9000, 600)).toThrow(
        "Surface dimensions 9000x600 exceed device limit 8192"
      );

      expect(surface.mock.configure).toHaveBeenCalledTimes(1);
      expect(surface.canvas).toEqual({ width: 640, height: 480 });
      expect(context.width).toBe(640);
      expect(logger.warn).toHaveBeenCalledTimes(2);
    });

    it("restores the previous size when configuration fails", async () => {
      const { surface, create } = setup();
      const context = await create();
      surface.mock.configure.mockImplementationOnce(() => {
        throw new Error("surface busy");
      });

      let error: unknown;
      try {
        context.reconfigure(800, 600);
      } catch (err) {
        error = err;
      }

      expect(error).toBeInstanceOf(ReconfigureError);
      expect(error).toMatchObject({ code: "surface-configuration" });
      expect(surface.canvas).toEqual({ width: 640, height: 480 });
      expect(context.width).toBe(640);
      expect(context.height).toBe(480);
    });

    it("throws ReconfigureError when restoring the previous size also fails", async () => {
      const { surface, logger, create } = setup();
      const context = await create();
      surface.mock.configure
        .mockImplementationOnce(() => {
          throw new Error("surface busy");
        })
        .mockImplementationOnce(() => {
          throw new Error("surface gone");
        });

      expect(() => context.reconfigure(800, 600)).toThrow(
        new ReconfigureError("surface-configuration", "Surface reconfiguration failed: surface busy")
      );
      expect(logger.error).toHaveBeenCalledWith("Failed to restore surface 640x480: surface gone");
      expect(context.width).toBe(640);
      expect(context.height).toBe(480);
    });
  });

  it("records device loss", async () => {
    const { gpu, logger, create } = setup();
    const context = await create();

    gpu.device.lose("unknown", "driver reset");
    await new Promise((resolve) => setTimeout(resolve, 0));

    expect(context.lost).toBe(true);
    expect(logger.error).toHaveBeenCalledWith("WebGPU device lost (unknown): driver reset");
  });

  it("releases the surface and device once on destroy", async () => {
    const { gpu, surface, create } = setup();
    const context = await create();

    context.destroy();
    context.destroy();

    expect(surface.mock.unconfigure).toHaveBeenCalledTimes(1);
    expect(gpu.device.mock.destroy).toHaveBeenCalledTimes(1);
    expect(context.destroyed).toBe(true);
    expect(() => context.reconfigure(100, 100)).toThrow("Cannot reconfigure destroyed graphics context");
  });
});
