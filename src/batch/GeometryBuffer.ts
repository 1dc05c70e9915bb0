/**
 * Geometry Buffer
 *
 * Packs the meshes of every live batch into one vertex arena and one index
 * arena. Batches sit back to back; each one is drawn with its own
 * (indexCount, firstIndex, baseVertex) so indices stay batch-local.
 */

import { GpuBuffer, alignTo4 } from "../GpuBuffer";
import {
  FLOATS_PER_VERTEX,
  MAX_UINT16_VERTICES,
  VERTEX_STRIDE,
  vertexCount,
  type TriangleMesh,
} from "../geometry/types";
import {
  IDENTITY_TRANSFORM,
  flipsWinding,
  isIdentity,
  transformEquals,
  type ViewTransform,
} from "../math/transform";
import { silentLogger, type Logger } from "../log";
import type { DrawRange, PackedBatch, UploadStats } from "./types";

/**
 * Concatenate meshes into one batch. Vertices are copied in order
 * (transformed when a transform is given); each mesh's indices are offset
 * by the number of vertices of the meshes before it.
 */
export function packMeshes(
  meshes: readonly TriangleMesh[],
  transform: Readonly<ViewTransform> = IDENTITY_TRANSFORM
): PackedBatch {
  let totalVertices = 0;
  let totalIndices = 0;
  for (const mesh of meshes) {
    totalVertices += vertexCount(mesh);
    totalIndices += mesh.indices.length;
  }

  const vertices = new Float32Array(totalVertices * FLOATS_PER_VERTEX);
  const indices = new Uint32Array(totalIndices);
  const identity = isIdentity(transform);
  const flip = flipsWinding(transform);

  let vertexOffset = 0;
  let indexOffset = 0;

  for (const mesh of meshes) {
    const base = vertexOffset * FLOATS_PER_VERTEX;
    vertices.set(mesh.vertices, base);

    if (!identity) {
      for (let i = base; i < base + mesh.vertices.length; i += FLOATS_PER_VERTEX) {
        vertices[i] = vertices[i]! * transform.scaleX + transform.offsetX;
        vertices[i + 1] = vertices[i + 1]! * transform.scaleY + transform.offsetY;
      }
    }

    const source = mesh.indices;
    for (let i = 0; i < source.length; i += 3) {
      const a = source[i]! + vertexOffset;
      const b = source[i + 1]! + vertexOffset;
      const c = source[i + 2]! + vertexOffset;
      indices[indexOffset + i] = a;
      // Mirroring reverses winding; swap back to counter-clockwise
      indices[indexOffset + i + 1] = flip ? c : b;
      indices[indexOffset + i + 2] = flip ? b : c;
    }

    vertexOffset += vertexCount(mesh);
    indexOffset += source.length;
  }

  return { vertices, indices, vertexCount: totalVertices };
}

interface BatchRecord {
  meshes: readonly TriangleMesh[];
  /** null until packed with the current transform */
  packed: PackedBatch | null;
  /** Placement in the arenas (-1 before the first upload) */
  vertexOffset: number;
  indexOffset: number;
  indexSlots: number;
  uploaded: boolean;
}

export interface GeometryBufferOptions {
  /** Initial vertex arena size in vertices (default: 1024) */
  initialVertexCapacity?: number;
  /** Initial index arena size in indices (default: 2048) */
  initialIndexCapacity?: number;
  logger?: Logger;
}

export class GeometryBuffer {
  readonly vertices: GpuBuffer;
  readonly indices: GpuBuffer;

  private batches = new Map<number, BatchRecord>();
  private transform: Readonly<ViewTransform> = IDENTITY_TRANSFORM;
  private format: GPUIndexFormat = "uint16";
  private layoutDirty = false;
  private usedVertexBytes = 0;
  private usedIndexBytes = 0;
  private _destroyed = false;

  constructor(device: GPUDevice, options: GeometryBufferOptions = {}) {
    const logger = options.logger ?? silentLogger;
    this.vertices = new GpuBuffer(
      device,
      "vertex",
      (options.initialVertexCapacity ?? 1024) * VERTEX_STRIDE,
      logger
    );
    this.indices = new GpuBuffer(
      device,
      "index",
      (options.initialIndexCapacity ?? 2048) * 4,
      logger
    );
  }

  /** Index format of the index arena */
  get indexFormat(): GPUIndexFormat {
    return this.format;
  }

  get batchCount(): number {
    return this.batches.size;
  }

  get destroyed(): boolean {
    return this._destroyed;
  }

  /** Whether the next upload() has anything to write */
  get needsUpload(): boolean {
    if (this.layoutDirty) return true;
    for (const batch of this.batches.values()) {
      if (!batch.packed || !batch.uploaded) return true;
    }
    return false;
  }

  /** Add a batch, or replace the meshes of an existing one */
  setBatch(id: number, meshes: readonly TriangleMesh[]): void {
    this.assertAlive();
    const existing = this.batches.get(id);
    if (existing) {
      existing.meshes = meshes.slice();
      existing.packed = null;
      existing.uploaded = false;
    } else {
      this.batches.set(id, {
        meshes: meshes.slice(),
        packed: null,
        vertexOffset: -1,
        indexOffset: -1,
        indexSlots: 0,
        uploaded: false,
      });
    }
    this.layoutDirty = true;
  }

  hasBatch(id: number): boolean {
    return this.batches.has(id);
  }

  /** Remove a batch; later batches move down on the next upload */
  removeBatch(id: number): boolean {
    this.assertAlive();
    const removed = this.batches.delete(id);
    if (removed) {
      this.layoutDirty = true;
    }
    return removed;
  }

  /** Remove every batch (keeps the GPU allocations) */
  clear(): void {
    this.assertAlive();
    if (this.batches.size === 0) return;
    this.batches.clear();
    this.layoutDirty = true;
  }

  /** Change the position transform; every batch is repacked on the next upload */
  setTransform(transform: Readonly<ViewTransform>): void {
    if (transformEquals(transform, this.transform)) return;
    this.transform = { ...transform };
    for (const batch of this.batches.values()) {
      batch.packed = null;
      batch.uploaded = false;
    }
  }

  /**
   * Pack changed batches, lay batches out, grow the arenas if needed and
   * write every batch that is new, changed or moved.
   */
  upload(): UploadStats {
    this.assertAlive();
    const stats: UploadStats = { uploadedBatches: 0, vertexBytes: 0, indexBytes: 0 };
    if (!this.needsUpload) return stats;

    const entries = Array.from(this.batches.values(), (record) => {
      const packed = record.packed ?? packMeshes(record.meshes, this.transform);
      if (packed !== record.packed) {
        record.packed = packed;
        record.uploaded = false;
      }
      return { record, packed };
    });

    let largest = 0;
    for (const { packed } of entries) {
      largest = Math.max(largest, packed.vertexCount);
    }

    const format: GPUIndexFormat = largest > MAX_UINT16_VERTICES ? "uint32" : "uint16";
    const formatChanged = format !== this.format;
    this.format = format;
    const bytesPerIndex = format === "uint32" ? 4 : 2;

    let nextVertex = 0;
    let nextIndex = 0;
    for (const { record, packed } of entries) {
      // uint16 ranges start and end on even indices to keep writes 4-byte aligned
      const slots = format === "uint16" ? (packed.indices.length + 1) & ~1 : packed.indices.length;
      if (formatChanged || record.vertexOffset !== nextVertex || record.indexOffset !== nextIndex) {
        record.uploaded = false;
      }
      record.vertexOffset = nextVertex;
      record.indexOffset = nextIndex;
      record.indexSlots = slots;
      nextVertex += packed.vertexCount;
      nextIndex += slots;
    }

    const vertexBytes = nextVertex * VERTEX_STRIDE;
    const indexBytes = alignTo4(nextIndex * bytesPerIndex);
    this.vertices.ensureCapacity(vertexBytes, this.usedVertexBytes);
    this.indices.ensureCapacity(indexBytes, formatChanged ? 0 : this.usedIndexBytes);

    for (const { record, packed } of entries) {
      if (record.uploaded) continue;
      const indexData = encodeIndices(packed.indices, format, record.indexSlots);

      this.vertices.write(record.vertexOffset * VERTEX_STRIDE, packed.vertices);
      this.indices.write(record.indexOffset * bytesPerIndex, indexData);

      record.uploaded = true;
      stats.uploadedBatches++;
      stats.vertexBytes += packed.vertices.byteLength;
      stats.indexBytes += indexData.byteLength;
    }

    this.usedVertexBytes = vertexBytes;
    this.usedIndexBytes = indexBytes;
    this.layoutDirty = false;
    return stats;
  }

  /** One draw range per non-empty batch, in batch order. Valid after upload(). */
  drawRanges(): DrawRange[] {
    const ranges: DrawRange[] = [];
    for (const record of this.batches.values()) {
      if (!record.packed || !record.uploaded || record.packed.indices.length === 0) continue;
      ranges.push({
        indexCount: record.packed.indices.length,
        firstIndex: record.indexOffset,
        baseVertex: record.vertexOffset,
      });
    }
    return ranges;
  }

  /** Release both GPU allocations */
  destroy(): void {
    if (this._destroyed) return;
    this.vertices.destroy();
    this.indices.destroy();
    this.batches.clear();
    this._destroyed = true;
  }

  private assertAlive(): void {
    if (this._destroyed) {
      throw new Error("Cannot use destroyed geometry buffer");
    }
  }
}

function encodeIndices(
  indices: Uint32Array,
  format: GPUIndexFormat,
  slots: number
): Uint16Array | Uint32Array {
  if (format === "uint32") return indices;
  const data = new Uint16Array(slots);
  data.set(indices);
  return data;
}
