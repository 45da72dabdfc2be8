// The subset of a WebGL 1/2 rendering context the bridge drives.
//
// Objects the context hands out are opaque to the bridge; it only stores them
// in handle registries and passes them back.

export type GLObject = object;

export interface ActiveInfo {
  name: string;
  size: number;
  type: number;
}

export type GLBufferSource = Uint8Array | Float32Array | Int32Array;

export interface GLContext {
  getExtension(name: string): unknown;
  getParameter(pname: number): unknown;
  getError(): number;

  // state
  enable(cap: number): void;
  disable(cap: number): void;
  viewport(x: number, y: number, width: number, height: number): void;
  scissor(x: number, y: number, width: number, height: number): void;
  clearColor(r: number, g: number, b: number, a: number): void;
  clearDepth(depth: number): void;
  clearStencil(s: number): void;
  clear(mask: number): void;
  colorMask(r: boolean, g: boolean, b: boolean, a: boolean): void;
  depthFunc(func: number): void;
  depthMask(flag: boolean): void;
  blendFunc(sfactor: number, dfactor: number): void;
  blendFuncSeparate(srcRGB: number, dstRGB: number, srcAlpha: number, dstAlpha: number): void;
  blendEquationSeparate(modeRGB: number, modeAlpha: number): void;
  blendColor(r: number, g: number, b: number, a: number): void;
  stencilFuncSeparate(face: number, func: number, ref: number, mask: number): void;
  stencilMaskSeparate(face: number, mask: number): void;
  stencilOpSeparate(face: number, fail: number, zfail: number, zpass: number): void;
  frontFace(mode: number): void;
  cullFace(mode: number): void;
  pixelStorei(pname: number, param: number): void;
  flush(): void;
  finish(): void;

  // textures
  createTexture(): GLObject | null;
  deleteTexture(texture: GLObject | null): void;
  bindTexture(target: number, texture: GLObject | null): void;
  activeTexture(unit: number): void;
  texParameteri(target: number, pname: number, param: number): void;
  texImage2D(
    target: number,
    level: number,
    internalformat: number,
    width: number,
    height: number,
    border: number,
    format: number,
    type: number,
    pixels: Uint8Array | null,
  ): void;
  texSubImage2D(
    target: number,
    level: number,
    xoffset: number,
    yoffset: number,
    width: number,
    height: number,
    format: number,
    type: number,
    pixels: Uint8Array | null,
  ): void;
  copyTexImage2D(
    target: number,
    level: number,
    internalformat: number,
    x: number,
    y: number,
    width: number,
    height: number,
    border: number,
  ): void;
  generateMipmap(target: number): void;
  readPixels(x: number, y: number, width: number, height: number, format: number, type: number, pixels: Uint8Array): void;

  // buffers
  createBuffer(): GLObject | null;
  deleteBuffer(buffer: GLObject | null): void;
  bindBuffer(target: number, buffer: GLObject | null): void;
  bufferData(target: number, sizeOrData: number | Uint8Array, usage: number): void;
  bufferSubData(target: number, offset: number, data: Uint8Array): void;

  // framebuffers
  createFramebuffer(): GLObject | null;
  deleteFramebuffer(framebuffer: GLObject | null): void;
  bindFramebuffer(target: number, framebuffer: GLObject | null): void;
  framebufferTexture2D(target: number, attachment: number, textarget: number, texture: GLObject | null, level: number): void;

  // shaders and programs
  createShader(type: number): GLObject | null;
  deleteShader(shader: GLObject | null): void;
  shaderSource(shader: GLObject, source: string): void;
  compileShader(shader: GLObject): void;
  getShaderParameter(shader: GLObject, pname: number): unknown;
  getShaderInfoLog(shader: GLObject): string | null;
  getShaderSource(shader: GLObject): string | null;
  createProgram(): GLObject | null;
  deleteProgram(program: GLObject | null): void;
  attachShader(program: GLObject, shader: GLObject): void;
  detachShader(program: GLObject, shader: GLObject): void;
  linkProgram(program: GLObject): void;
  useProgram(program: GLObject | null): void;
  getProgramParameter(program: GLObject, pname: number): unknown;
  getProgramInfoLog(program: GLObject): string | null;
  getActiveUniform(program: GLObject, index: number): ActiveInfo | null;
  getUniformLocation(program: GLObject, name: string): GLObject | null;
  getAttribLocation(program: GLObject, name: string): number;

  // uniforms
  uniform1f(location: GLObject, x: number): void;
  uniform1i(location: GLObject, x: number): void;
  uniform1fv(location: GLObject, data: Float32Array): void;
  uniform2fv(location: GLObject, data: Float32Array): void;
  uniform3fv(location: GLObject, data: Float32Array): void;
  uniform4fv(location: GLObject, data: Float32Array): void;
  uniform1iv(location: GLObject, data: Int32Array): void;
  uniform2iv(location: GLObject, data: Int32Array): void;
  uniform3iv(location: GLObject, data: Int32Array): void;
  uniform4iv(location: GLObject, data: Int32Array): void;
  uniformMatrix4fv(location: GLObject, transpose: boolean, data: Float32Array): void;

  // vertex input and drawing
  enableVertexAttribArray(index: number): void;
  disableVertexAttribArray(index: number): void;
  vertexAttribPointer(index: number, size: number, type: number, normalized: boolean, stride: number, offset: number): void;
  drawArrays(mode: number, first: number, count: number): void;
  drawElements(mode: number, count: number, type: number, offset: number): void;

  // version 2 only; reached through the normalization layer
  createVertexArray?(): GLObject | null;
  deleteVertexArray?(vao: GLObject | null): void;
  bindVertexArray?(vao: GLObject | null): void;
  vertexAttribDivisor?(index: number, divisor: number): void;
  vertexAttribIPointer?(index: number, size: number, type: number, stride: number, offset: number): void;
  drawArraysInstanced?(mode: number, first: number, count: number, instances: number): void;
  drawElementsInstanced?(mode: number, count: number, type: number, offset: number, instances: number): void;
  createQuery?(): GLObject | null;
  deleteQuery?(query: GLObject | null): void;
  beginQuery?(target: number, query: GLObject): void;
  endQuery?(target: number): void;
  getQueryParameter?(query: GLObject, pname: number): unknown;
  drawBuffers?(buffers: number[]): void;
}

export const GL = {
  NO_ERROR: 0,
  INVALID_ENUM: 0x0500,
  INVALID_VALUE: 0x0501,
  INVALID_OPERATION: 0x0502,

  ALPHA: 0x1906,
  RGB: 0x1907,
  RGBA: 0x1908,
  LUMINANCE: 0x1909,
  LUMINANCE_ALPHA: 0x190a,
  RED: 0x1903,
  RG: 0x8227,

  FRAGMENT_SHADER: 0x8b30,
  VERTEX_SHADER: 0x8b31,
  COMPILE_STATUS: 0x8b81,
  LINK_STATUS: 0x8b82,
  INFO_LOG_LENGTH: 0x8b84,
  SHADER_SOURCE_LENGTH: 0x8b88,
  ACTIVE_UNIFORMS: 0x8b86,
  ACTIVE_UNIFORM_MAX_LENGTH: 0x8b87,

  NUM_COMPRESSED_TEXTURE_FORMATS: 0x86a2,
  COMPRESSED_TEXTURE_FORMATS: 0x86a3,
  SHADER_COMPILER: 0x8dfa,
  NUM_SHADER_BINARY_FORMATS: 0x8df9,
} as const;

const BYTES_PER_PIXEL: Record<number, number> = {
  [GL.ALPHA]: 1,
  [GL.LUMINANCE]: 1,
  [GL.RED]: 1,
  [GL.LUMINANCE_ALPHA]: 2,
  [GL.RG]: 2,
  [GL.RGB]: 3,
  [GL.RGBA]: 4,
};

/** Byte size of a `width` x `height` image of 8-bit channels in `format`. */
export function textureByteSize(format: number, width: number, height: number): number {
  return width * height * (BYTES_PER_PIXEL[format] ?? 4);
}
