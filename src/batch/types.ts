/**
 * Geometry batching types
 */

/** Meshes of one batch concatenated into a single vertex/index run */
export interface PackedBatch {
  /** Interleaved vertex data [x, y, r, g, b, a, ...] */
  vertices: Float32Array;
  /** Batch-local triangle indices */
  indices: Uint32Array;
  vertexCount: number;
}

/** Parameters of one indexed draw call */
export interface DrawRange {
  indexCount: number;
  /** First index of the batch within the index buffer */
  firstIndex: number;
  /** Added to every index of the batch */
  baseVertex: number;
}

export interface UploadStats {
  /** Batches written to the GPU by this upload */
  uploadedBatches: number;
  vertexBytes: number;
  indexBytes: number;
}
