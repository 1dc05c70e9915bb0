/**
 * WebGPU buffer arena with explicit capacity and copy-on-growth
 */

import { silentLogger, type Logger } from "./log";

export type GpuBufferKind = "vertex" | "index";

// GPUBufferUsage flags (avoid referencing the GPUBufferUsage global at module load time for testing)
const GPU_BUFFER_USAGE_COPY_SRC = 0x0004;
const GPU_BUFFER_USAGE_COPY_DST = 0x0008;
const GPU_BUFFER_USAGE_INDEX = 0x0010;
const GPU_BUFFER_USAGE_VERTEX = 0x0020;

const KIND_USAGE: Record<GpuBufferKind, GPUBufferUsageFlags> = {
  vertex: GPU_BUFFER_USAGE_VERTEX,
  index: GPU_BUFFER_USAGE_INDEX,
};

/** Round a byte count up to the 4-byte alignment WebGPU copies require */
export function alignTo4(bytes: number): number {
  return (bytes + 3) & ~3;
}

export class GpuBuffer {
  readonly device: GPUDevice;
  readonly kind: GpuBufferKind;
  readonly usage: GPUBufferUsageFlags;

  private _handle: GPUBuffer;
  private _capacity: number;
  private _destroyed = false;
  private logger: Logger;

  constructor(
    device: GPUDevice,
    kind: GpuBufferKind,
    initialCapacity: number = 4096,
    logger: Logger = silentLogger
  ) {
    this.device = device;
    this.kind = kind;
    this.usage = KIND_USAGE[kind] | GPU_BUFFER_USAGE_COPY_DST | GPU_BUFFER_USAGE_COPY_SRC;
    this.logger = logger;
    this._capacity = alignTo4(Math.max(4, initialCapacity));
    this._handle = this.allocate(this._capacity);
  }

  /** Underlying GPU buffer (changes when the arena grows) */
  get handle(): GPUBuffer {
    if (this._destroyed) {
      throw new Error("Cannot use destroyed buffer");
    }
    return this._handle;
  }

  /** Allocated size in bytes */
  get capacity(): number {
    return this._capacity;
  }

  get destroyed(): boolean {
    return this._destroyed;
  }

  /**
   * Make room for `requiredBytes`. When the arena grows, the first
   * `preserveBytes` of the old allocation are copied into the new one
   * and the old allocation is released.
   *
   * @returns true if the buffer was reallocated
   */
  ensureCapacity(requiredBytes: number, preserveBytes: number = 0): boolean {
    if (this._destroyed) {
      throw new Error("Cannot grow destroyed buffer");
    }
    if (requiredBytes <= this._capacity) return false;

    const previous = this._handle;
    const previousCapacity = this._capacity;
    const capacity = alignTo4(Math.max(requiredBytes, previousCapacity * 2));
    const next = this.allocate(capacity);

    const copyBytes = alignTo4(Math.min(preserveBytes, previousCapacity));
    if (copyBytes > 0) {
      const encoder = this.device.createCommandEncoder({ label: `lamina-${this.kind}-grow` });
      encoder.copyBufferToBuffer(previous, 0, next, 0, copyBytes);
      this.device.queue.submit([encoder.finish()]);
    }
    previous.destroy();

    this._handle = next;
    this._capacity = capacity;
    this.logger.debug(`grew ${this.kind} buffer ${previousCapacity} -> ${capacity} bytes`);
    return true;
  }

  /** Write data at a byte offset; offset and length must be 4-byte aligned */
  write(byteOffset: number, data: Float32Array | Uint16Array | Uint32Array): void {
    if (this._destroyed) {
      throw new Error("Cannot write to destroyed buffer");
    }
    if (byteOffset % 4 !== 0 || data.byteLength % 4 !== 0) {
      throw new Error(
        `Unaligned ${this.kind} buffer write (offset=${byteOffset}, bytes=${data.byteLength})`
      );
    }
    if (byteOffset + data.byteLength > this._capacity) {
      throw new Error(
        `${this.kind} buffer write past capacity (end=${byteOffset + data.byteLength}, capacity=${this._capacity})`
      );
    }
    if (data.byteLength === 0) return;

    this.device.queue.writeBuffer(
      this._handle,
      byteOffset,
      data.buffer,
      data.byteOffset,
      data.byteLength
    );
  }

  /** Release the GPU allocation */
  destroy(): void {
    if (this._destroyed) return;
    this._handle.destroy();
    this._destroyed = true;
  }

  private allocate(size: number): GPUBuffer {
    return this.device.createBuffer({
      label: `lamina-${this.kind}`,
      size,
      usage: this.usage,
      mappedAtCreation: false,
    });
  }
}
