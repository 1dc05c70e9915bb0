/**
 * Solid fill shaders
 *
 * Positions arrive in normalized device coordinates; no transform is applied.
 */

export const FILL_VERTEX_ENTRY = "vs_fill";
export const FILL_FRAGMENT_ENTRY = "fs_fill";

export const fillShaderSource = /* wgsl */ `
struct VertexInput {
  @location(0) position: vec2<f32>,
  @location(1) color: vec4<f32>,
};

struct VertexOutput {
  @builtin(position) clip_position: vec4<f32>,
  @location(0) color: vec4<f32>,
};

@vertex
fn ${FILL_VERTEX_ENTRY}(in: VertexInput) -> VertexOutput {
  var out: VertexOutput;
  out.clip_position = vec4<f32>(in.position, 0.0, 1.0);
  out.color = in.color;
  return out;
}

@fragment
fn ${FILL_FRAGMENT_ENTRY}(in: VertexOutput) -> @location(0) vec4<f32> {
  return in.color;
}
`;
