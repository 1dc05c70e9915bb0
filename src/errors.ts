/**
 * Error types surfaced by the renderer
 */

export class LaminaError<Code extends string = string> extends Error {
  readonly code: Code;

  constructor(code: Code, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export type DeviceInitErrorCode =
  | "no-webgpu"
  | "no-adapter"
  | "device-request"
  | "invalid-dimensions"
  | "surface-configuration"
  | "pipeline-creation";

/** Fatal failure while creating the graphics context. Never retried. */
export class DeviceInitError extends LaminaError<DeviceInitErrorCode> {}

export type SurfaceAcquireErrorCode = "device-lost" | "surface-unavailable";

/** The frame's target could not be acquired; only that frame is skipped. */
export class SurfaceAcquireError extends LaminaError<SurfaceAcquireErrorCode> {}

export type ReconfigureErrorCode = "invalid-dimensions" | "surface-configuration";

/** A resize was rejected; the previous configuration stays in place. */
export class ReconfigureError extends LaminaError<ReconfigureErrorCode> {}

/** Format an unknown thrown value for a log line or error message */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
