/**
 * Batch Module
 *
 * Packs tessellated meshes into shared GPU buffers, one draw per batch.
 */

export { GeometryBuffer, packMeshes, type GeometryBufferOptions } from "./GeometryBuffer";
export type { DrawRange, PackedBatch, UploadStats } from "./types";
