import { describe, it, expect } from "vitest";
import { GeometryBuffer, packMeshes } from "./GeometryBuffer";
import { FLOATS_PER_VERTEX, emptyMesh, type Point, type TriangleMesh } from "../geometry/types";
import { pixelsToNdc } from "../math/transform";
import { createMockDevice } from "../testing/mockGpu";

function mesh(points: Point[], indices: number[]): TriangleMesh {
  const vertices = new Float32Array(points.length * FLOATS_PER_VERTEX);
  points.forEach(([x, y], i) => {
    vertices.set([x, y, 1, 0, 0, 1], i * FLOATS_PER_VERTEX);
  });
  return { vertices, indices: new Uint16Array(indices) };
}

const triangle = (): TriangleMesh => mesh([[0, 0], [1, 0], [0, 1]], [0, 1, 2]);
const quad = (): TriangleMesh =>
  mesh([[0, 0], [1, 0], [1, 1], [0, 1]], [0, 1, 2, 0, 2, 3]);

function positions(vertices: Float32Array): Point[] {
  const result: Point[] = [];
  for (let i = 0; i < vertices.length; i += FLOATS_PER_VERTEX) {
    result.push([vertices[i]!, vertices[i + 1]!]);
  }
  return result;
}

describe("packMeshes", () => {
  it("concatenates vertices and offsets indices", () => {
    const packed = packMeshes([triangle(), quad()]);

    expect(packed.vertexCount).toBe(7);
    expect(packed.vertices).toHaveLength(7 * FLOATS_PER_VERTEX);
    expect(Array.from(packed.indices)).toEqual([0, 1, 2, 3, 4, 5, 3, 5, 6]);
  });

  it("transforms positions and restores winding when mirrored", () => {
    const packed = packMeshes(
      [mesh([[0, 0], [100, 0], [0, 50]], [0, 1, 2])],
      pixelsToNdc(100, 50)
    );

    expect(positions(packed.vertices)).toEqual([
      [-1, 1],
      [1, 1],
      [-1, -1],
    ]);
    expect(Array.from(packed.indices)).toEqual([0, 2, 1]);
    // Colors are left alone
    expect(Array.from(packed.vertices.subarray(2, 6))).toEqual([1, 0, 0, 1]);
  });

  it("does not modify the source meshes", () => {
    const source = mesh([[0, 0], [100, 0], [0, 50]], [0, 1, 2]);
    packMeshes([source], pixelsToNdc(100, 50));

    expect(positions(source.vertices)).toEqual([
      [0, 0],
      [100, 0],
      [0, 50],
    ]);
    expect(Array.from(source.indices)).toEqual([0, 1, 2]);
  });
});

describe("GeometryBuffer", () => {
  function setup(initialVertexCapacity = 16, initialIndexCapacity = 16) {
    const gpu = createMockDevice();
    const geometry = new GeometryBuffer(gpu.device, { initialVertexCapacity, initialIndexCapacity });
    return { gpu, geometry };
  }

  it("allocates both arenas up front", () => {
    const { gpu, geometry } = setup(16, 16);

    expect(geometry.vertices.capacity).toBe(16 * 24);
    expect(geometry.indices.capacity).toBe(16 * 4);
    expect(gpu.buffers).toHaveLength(2);
  });

  it("places batches back to back with batch-local indices", () => {
    const { gpu, geometry } = setup();
    geometry.setBatch(1, [triangle()]);
    geometry.setBatch(2, [quad()]);

    const stats = geometry.upload();

    expect(stats).toEqual({ uploadedBatches: 2, vertexBytes: 72 + 96, indexBytes: 8 + 12 });
    expect(geometry.indexFormat).toBe("uint16");
    expect(gpu.writes.map((w) => [w.buffer.label, w.offset])).toEqual([
      ["lamina-vertex", 0],
      ["lamina-index", 0],
      ["lamina-vertex", 72],
      ["lamina-index", 8],
    ]);
    // Odd index counts are padded to keep writes 4-byte aligned
    expect(Array.from(new Uint16Array(gpu.writes[1]!.bytes.buffer))).toEqual([0, 1, 2, 0]);
    expect(Array.from(new Uint16Array(gpu.writes[3]!.bytes.buffer))).toEqual([0, 1, 2, 0, 2, 3]);
    expect(geometry.drawRanges()).toEqual([
      { indexCount: 3, firstIndex: 0, baseVertex: 0 },
      { indexCount: 6, firstIndex: 4, baseVertex: 3 },
    ]);
  });

  it("skips the upload when nothing changed", () => {
    const { gpu, geometry } = setup();
    geometry.setBatch(1, [triangle()]);
    geometry.upload();

    expect(geometry.needsUpload).toBe(false);
    expect(geometry.upload()).toEqual({ uploadedBatches: 0, vertexBytes: 0, indexBytes: 0 });
    expect(gpu.mock.queue.writeBuffer).toHaveBeenCalledTimes(2);
  });

  it("rewrites only the batch that changed", () => {
    const { geometry } = setup();
    geometry.setBatch(1, [triangle()]);
    geometry.setBatch(2, [quad()]);
    geometry.upload();

    geometry.setBatch(2, [triangle()]);
    const stats = geometry.upload();

    expect(stats.uploadedBatches).toBe(1);
    expect(geometry.drawRanges()).toEqual([
      { indexCount: 3, firstIndex: 0, baseVertex: 0 },
      { indexCount: 3, firstIndex: 4, baseVertex: 3 },
    ]);
  });

  it("moves later batches down when one is removed", () => {
    const { gpu, geometry } = setup();
    geometry.setBatch(1, [triangle()]);
    geometry.setBatch(2, [quad()]);
    geometry.upload();

    expect(geometry.removeBatch(1)).toBe(true);
    expect(geometry.removeBatch(1)).toBe(false);
    const stats = geometry.upload();

    expect(stats.uploadedBatches).toBe(1);
    expect(gpu.writes[4]!.offset).toBe(0);
    expect(geometry.drawRanges()).toEqual([{ indexCount: 6, firstIndex: 0, baseVertex: 0 }]);
  });

  it("grows the arenas and keeps data already uploaded", () => {
    const { gpu, geometry } = setup(4, 4);
    geometry.setBatch(1, [triangle()]);
    geometry.upload();

    geometry.setBatch(2, [quad()]);
    const stats = geometry.upload();

    expect(geometry.vertices.capacity).toBe(192);
    expect(geometry.indices.capacity).toBe(32);
    expect(gpu.encoders[0]!.copyBufferToBuffer).toHaveBeenCalledWith(
      gpu.buffers[0],
      0,
      gpu.buffers[2],
      0,
      72
    );
    expect(gpu.encoders[1]!.copyBufferToBuffer).toHaveBeenCalledWith(
      gpu.buffers[1],
      0,
      gpu.buffers[3],
      0,
      8
    );
    // The first batch stays where it was and is not written again
    expect(stats.uploadedBatches).toBe(1);
    expect(geometry.drawRanges()).toEqual([
      { indexCount: 3, firstIndex: 0, baseVertex: 0 },
      { indexCount: 6, firstIndex: 4, baseVertex: 3 },
    ]);
  });

  it("switches to 32-bit indices for batches past 65535 vertices", () => {
    const { gpu, geometry } = setup();
    const big: TriangleMesh = {
      vertices: new Float32Array(65536 * FLOATS_PER_VERTEX),
      indices: new Uint32Array([0, 1, 2, 65533, 65534, 65535]),
    };
    geometry.setBatch(1, [big]);
    geometry.upload();

    expect(geometry.indexFormat).toBe("uint32");
    expect(gpu.writes[1]!.buffer.label).toBe("lamina-index");
    expect(Array.from(new Uint32Array(gpu.writes[1]!.bytes.buffer))).toEqual([
      0, 1, 2, 65533, 65534, 65535,
    ]);

    geometry.removeBatch(1);
    geometry.setBatch(2, [triangle()]);
    geometry.upload();

    expect(geometry.indexFormat).toBe("uint16");
    expect(geometry.drawRanges()).toEqual([{ indexCount: 3, firstIndex: 0, baseVertex: 0 }]);
  });

  it("repacks every batch when the transform changes", () => {
    const { gpu, geometry } = setup();
    geometry.setBatch(1, [mesh([[0, 0], [100, 0], [0, 50]], [0, 1, 2])]);
    geometry.upload();

    geometry.setTransform(pixelsToNdc(100, 50));
    expect(geometry.needsUpload).toBe(true);
    geometry.upload();

    expect(positions(new Float32Array(gpu.writes[2]!.bytes.buffer))).toEqual([
      [-1, 1],
      [1, 1],
      [-1, -1],
    ]);

    geometry.setTransform(pixelsToNdc(100, 50));
    expect(geometry.needsUpload).toBe(false);
  });

  it("draws nothing for empty batches", () => {
    const { geometry } = setup();
    geometry.setBatch(1, [emptyMesh()]);
    geometry.upload();

    expect(geometry.batchCount).toBe(1);
    expect(geometry.drawRanges()).toEqual([]);
  });

  it("removes every batch on clear", () => {
    const { geometry } = setup();
    geometry.setBatch(1, [triangle()]);
    geometry.setBatch(2, [quad()]);
    geometry.upload();

    geometry.clear();
    geometry.upload();

    expect(geometry.batchCount).toBe(0);
    expect(geometry.hasBatch(1)).toBe(false);
    expect(geometry.drawRanges()).toEqual([]);
  });

  it("releases both buffers on destroy", () => {
    const { gpu, geometry } = setup();

    geometry.destroy();
    geometry.destroy();

    expect(gpu.buffers[0]!.destroy).toHaveBeenCalledTimes(1);
    expect(gpu.buffers[1]!.destroy).toHaveBeenCalledTimes(1);
    expect(geometry.destroyed).toBe(true);
    expect(() => geometry.setBatch(1, [triangle()])).toThrow(
      "Cannot use destroyed geometry buffer"
    );
  });
});
