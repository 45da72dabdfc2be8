import { GL, type ActiveInfo, type GLContext, type GLObject } from "../../src/graphics/gl-context.js";

export interface FakeObject {
  kind: string;
  serial: number;
}

interface FakeShader extends FakeObject {
  type: number;
  source: string;
  compiled: boolean;
}

interface FakeProgram extends FakeObject {
  linked: boolean;
  uniforms: ActiveInfo[];
}

export interface FakeLocation extends FakeObject {
  name: string;
}

export interface GLCall {
  name: string;
  args: unknown[];
}

function isShader(value: GLObject): value is FakeShader {
  return "source" in value;
}

function isProgram(value: GLObject): value is FakeProgram {
  return "uniforms" in value;
}

/**
 * Version-1 rendering context that records every call. Shaders whose source
 * contains "FAIL" do not compile; programs link with `uniformsOnLink`.
 */
export class FakeGL implements GLContext {
  readonly calls: GLCall[] = [];
  readonly extensions = new Map<string, object>();
  readonly parameters = new Map<number, unknown>();
  /** Active uniforms a program reports after its next link. */
  uniformsOnLink: ActiveInfo[] = [];
  /** Every create call returns null, as a lost context does. */
  lost = false;
  private serial = 0;

  protected record(name: string, ...args: unknown[]): void {
    this.calls.push({ name, args });
  }

  callsTo(name: string): unknown[][] {
    return this.calls.filter((c) => c.name === name).map((c) => c.args);
  }

  protected make(kind: string): FakeObject | null {
    if (this.lost) return null;
    return { kind, serial: ++this.serial };
  }

  getExtension(name: string): unknown {
    return this.extensions.get(name) ?? null;
  }

  getParameter(pname: number): unknown {
    return this.parameters.get(pname) ?? null;
  }

  getError(): number {
    return GL.NO_ERROR;
  }

  enable(cap: number): void {
    this.record("enable", cap);
  }
  disable(cap: number): void {
    this.record("disable", cap);
  }
  viewport(x: number, y: number, width: number, height: number): void {
    this.record("viewport", x, y, width, height);
  }
  scissor(x: number, y: number, width: number, height: number): void {
    this.record("scissor", x, y, width, height);
  }
  clearColor(r: number, g: number, b: number, a: number): void {
    this.record("clearColor", r, g, b, a);
  }
  clearDepth(depth: number): void {
    this.record("clearDepth", depth);
  }
  clearStencil(s: number): void {
    this.record("clearStencil", s);
  }
  clear(mask: number): void {
    this.record("clear", mask);
  }
  colorMask(r: boolean, g: boolean, b: boolean, a: boolean): void {
    this.record("colorMask", r, g, b, a);
  }
  depthFunc(func: number): void {
    this.record("depthFunc", func);
  }
  depthMask(flag: boolean): void {
    this.record("depthMask", flag);
  }
  blendFunc(sfactor: number, dfactor: number): void {
    this.record("blendFunc", sfactor, dfactor);
  }
  blendFuncSeparate(srcRGB: number, dstRGB: number, srcAlpha: number, dstAlpha: number): void {
    this.record("blendFuncSeparate", srcRGB, dstRGB, srcAlpha, dstAlpha);
  }
  blendEquationSeparate(modeRGB: number, modeAlpha: number): void {
    this.record("blendEquationSeparate", modeRGB, modeAlpha);
  }
  blendColor(r: number, g: number, b: number, a: number): void {
    this.record("blendColor", r, g, b, a);
  }
  stencilFuncSeparate(face: number, func: number, ref: number, mask: number): void {
    this.record("stencilFuncSeparate", face, func, ref, mask);
  }
  stencilMaskSeparate(face: number, mask: number): void {
    this.record("stencilMaskSeparate", face, mask);
  }
  stencilOpSeparate(face: number, fail: number, zfail: number, zpass: number): void {
    this.record("stencilOpSeparate", face, fail, zfail, zpass);
  }
  frontFace(mode: number): void {
    this.record("frontFace", mode);
  }
  cullFace(mode: number): void {
    this.record("cullFace", mode);
  }
  pixelStorei(pname: number, param: number): void {
    this.record("pixelStorei", pname, param);
  }
  flush(): void {
    this.record("flush");
  }
  finish(): void {
    this.record("finish");
  }

  createTexture(): GLObject | null {
    return this.make("texture");
  }
  deleteTexture(texture: GLObject | null): void {
    this.record("deleteTexture", texture);
  }
  bindTexture(target: number, texture: GLObject | null): void {
    this.record("bindTexture", target, texture);
  }
  activeTexture(unit: number): void {
    this.record("activeTexture", unit);
  }
  texParameteri(target: number, pname: number, param: number): void {
    this.record("texParameteri", target, pname, param);
  }
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
  ): void {
    this.record("texImage2D", target, level, internalformat, width, height, border, format, type, pixels?.slice() ?? null);
  }
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
  ): void {
    this.record("texSubImage2D", target, level, xoffset, yoffset, width, height, format, type, pixels?.slice() ?? null);
  }
  copyTexImage2D(
    target: number,
    level: number,
    internalformat: number,
    x: number,
    y: number,
    width: number,
    height: number,
    border: number,
  ): void {
    this.record("copyTexImage2D", target, level, internalformat, x, y, width, height, border);
  }
  generateMipmap(target: number): void {
    this.record("generateMipmap", target);
  }
  readPixels(x: number, y: number, width: number, height: number, format: number, type: number, pixels: Uint8Array): void {
    pixels.fill(0x7f);
    this.record("readPixels", x, y, width, height, format, type);
  }

  createBuffer(): GLObject | null {
    return this.make("buffer");
  }
  deleteBuffer(buffer: GLObject | null): void {
    this.record("deleteBuffer", buffer);
  }
  bindBuffer(target: number, buffer: GLObject | null): void {
    this.record("bindBuffer", target, buffer);
  }
  bufferData(target: number, sizeOrData: number | Uint8Array, usage: number): void {
    this.record("bufferData", target, typeof sizeOrData === "number" ? sizeOrData : sizeOrData.slice(), usage);
  }
  bufferSubData(target: number, offset: number, data: Uint8Array): void {
    this.record("bufferSubData", target, offset, data.slice());
  }

  createFramebuffer(): GLObject | null {
    return this.make("framebuffer");
  }
  deleteFramebuffer(framebuffer: GLObject | null): void {
    this.record("deleteFramebuffer", framebuffer);
  }
  bindFramebuffer(target: number, framebuffer: GLObject | null): void {
    this.record("bindFramebuffer", target, framebuffer);
  }
  framebufferTexture2D(target: number, attachment: number, textarget: number, texture: GLObject | null, level: number): void {
    this.record("framebufferTexture2D", target, attachment, textarget, texture, level);
  }

  createShader(type: number): GLObject | null {
    if (type !== GL.VERTEX_SHADER && type !== GL.FRAGMENT_SHADER) return null;
    const base = this.make("shader");
    if (base === null) return null;
    const shader: FakeShader = { ...base, type, source: "", compiled: false };
    return shader;
  }
  deleteShader(shader: GLObject | null): void {
    this.record("deleteShader", shader);
  }
  shaderSource(shader: GLObject, source: string): void {
    if (isShader(shader)) shader.source = source;
    this.record("shaderSource", shader, source);
  }
  compileShader(shader: GLObject): void {
    if (isShader(shader)) shader.compiled = !shader.source.includes("FAIL");
    this.record("compileShader", shader);
  }
  getShaderParameter(shader: GLObject, pname: number): unknown {
    if (!isShader(shader)) return null;
    if (pname === GL.COMPILE_STATUS) return shader.compiled;
    if (pname === 0x8b4f) return shader.type; // SHADER_TYPE
    return null;
  }
  getShaderInfoLog(shader: GLObject): string | null {
    if (!isShader(shader)) return null;
    return shader.compiled ? "" : "ERROR: 0:1: 'FAIL' : syntax error\n";
  }
  getShaderSource(shader: GLObject): string | null {
    return isShader(shader) ? shader.source : null;
  }
  createProgram(): GLObject | null {
    const base = this.make("program");
    if (base === null) return null;
    const program: FakeProgram = { ...base, linked: false, uniforms: [] };
    return program;
  }
  deleteProgram(program: GLObject | null): void {
    this.record("deleteProgram", program);
  }
  attachShader(program: GLObject, shader: GLObject): void {
    this.record("attachShader", program, shader);
  }
  detachShader(program: GLObject, shader: GLObject): void {
    this.record("detachShader", program, shader);
  }
  linkProgram(program: GLObject): void {
    if (isProgram(program)) {
      program.linked = true;
      program.uniforms = [...this.uniformsOnLink];
    }
    this.record("linkProgram", program);
  }
  useProgram(program: GLObject | null): void {
    this.record("useProgram", program);
  }
  getProgramParameter(program: GLObject, pname: number): unknown {
    if (!isProgram(program)) return null;
    if (pname === GL.LINK_STATUS) return program.linked;
    if (pname === GL.ACTIVE_UNIFORMS) return program.uniforms.length;
    return null;
  }
  getProgramInfoLog(program: GLObject): string | null {
    return isProgram(program) && program.linked ? "" : "not linked";
  }
  getActiveUniform(program: GLObject, index: number): ActiveInfo | null {
    return isProgram(program) ? (program.uniforms[index] ?? null) : null;
  }
  getUniformLocation(program: GLObject, name: string): GLObject | null {
    if (!isProgram(program)) return null;
    const known = program.uniforms.some((u) => {
      const base = u.name.endsWith("]") ? u.name.slice(0, u.name.lastIndexOf("[")) : u.name;
      if (name === base) return true;
      const match = /^(.*)\[(\d+)\]$/.exec(name);
      return match !== null && match[1] === base && Number(match[2]) < u.size;
    });
    if (!known) return null;
    const location: FakeLocation = { kind: "location", serial: ++this.serial, name };
    return location;
  }
  getAttribLocation(program: GLObject, name: string): number {
    this.record("getAttribLocation", program, name);
    return name === "position" ? 0 : -1;
  }

  uniform1f(location: GLObject, x: number): void {
    this.record("uniform1f", location, x);
  }
  uniform1i(location: GLObject, x: number): void {
    this.record("uniform1i", location, x);
  }
  uniform1fv(location: GLObject, data: Float32Array): void {
    this.record("uniform1fv", location, Array.from(data));
  }
  uniform2fv(location: GLObject, data: Float32Array): void {
    this.record("uniform2fv", location, Array.from(data));
  }
  uniform3fv(location: GLObject, data: Float32Array): void {
    this.record("uniform3fv", location, Array.from(data));
  }
  uniform4fv(location: GLObject, data: Float32Array): void {
    this.record("uniform4fv", location, Array.from(data));
  }
  uniform1iv(location: GLObject, data: Int32Array): void {
    this.record("uniform1iv", location, Array.from(data));
  }
  uniform2iv(location: GLObject, data: Int32Array): void {
    this.record("uniform2iv", location, Array.from(data));
  }
  uniform3iv(location: GLObject, data: Int32Array): void {
    this.record("uniform3iv", location, Array.from(data));
  }
  uniform4iv(location: GLObject, data: Int32Array): void {
    this.record("uniform4iv", location, Array.from(data));
  }
  uniformMatrix4fv(location: GLObject, transpose: boolean, data: Float32Array): void {
    this.record("uniformMatrix4fv", location, transpose, Array.from(data));
  }

  enableVertexAttribArray(index: number): void {
    this.record("enableVertexAttribArray", index);
  }
  disableVertexAttribArray(index: number): void {
    this.record("disableVertexAttribArray", index);
  }
  vertexAttribPointer(index: number, size: number, type: number, normalized: boolean, stride: number, offset: number): void {
    this.record("vertexAttribPointer", index, size, type, normalized, stride, offset);
  }
  drawArrays(mode: number, first: number, count: number): void {
    this.record("drawArrays", mode, first, count);
  }
  drawElements(mode: number, count: number, type: number, offset: number): void {
    this.record("drawElements", mode, count, type, offset);
  }
}

/** A version-2 context: every capability is native. */
export class FakeGL2 extends FakeGL {
  createVertexArray(): GLObject | null {
    return this.make("vertex array");
  }
  deleteVertexArray(vao: GLObject | null): void {
    this.record("deleteVertexArray", vao);
  }
  bindVertexArray(vao: GLObject | null): void {
    this.record("bindVertexArray", vao);
  }
  vertexAttribDivisor(index: number, divisor: number): void {
    this.record("vertexAttribDivisor", index, divisor);
  }
  vertexAttribIPointer(index: number, size: number, type: number, stride: number, offset: number): void {
    this.record("vertexAttribIPointer", index, size, type, stride, offset);
  }
  drawArraysInstanced(mode: number, first: number, count: number, instances: number): void {
    this.record("drawArraysInstanced", mode, first, count, instances);
  }
  drawElementsInstanced(mode: number, count: number, type: number, offset: number, instances: number): void {
    this.record("drawElementsInstanced", mode, count, type, offset, instances);
  }
  createQuery(): GLObject | null {
    return this.make("query");
  }
  deleteQuery(query: GLObject | null): void {
    this.record("deleteQuery", query);
  }
  beginQuery(target: number, query: GLObject): void {
    this.record("beginQuery", target, query);
  }
  endQuery(target: number): void {
    this.record("endQuery", target);
  }
  getQueryParameter(_query: GLObject, _pname: number): unknown {
    return 5_000_000_123;
  }
  drawBuffers(buffers: number[]): void {
    this.record("drawBuffers", buffers);
  }
}

/** Extension objects a version-1 context can offer. */
export function vertexArrayExtension(gl: FakeGL): object {
  let serial = 0;
  return {
    createVertexArrayOES: () => ({ kind: "vertex array (OES)", serial: ++serial }),
    deleteVertexArrayOES: (vao: GLObject | null) => gl.calls.push({ name: "deleteVertexArrayOES", args: [vao] }),
    bindVertexArrayOES: (vao: GLObject | null) => gl.calls.push({ name: "bindVertexArrayOES", args: [vao] }),
  };
}

export function instancingExtension(gl: FakeGL): object {
  return {
    vertexAttribDivisorANGLE: (index: number, divisor: number) =>
      gl.calls.push({ name: "vertexAttribDivisorANGLE", args: [index, divisor] }),
    drawArraysInstancedANGLE: (mode: number, first: number, count: number, instances: number) =>
      gl.calls.push({ name: "drawArraysInstancedANGLE", args: [mode, first, count, instances] }),
    drawElementsInstancedANGLE: (mode: number, count: number, type: number, offset: number, instances: number) =>
      gl.calls.push({ name: "drawElementsInstancedANGLE", args: [mode, count, type, offset, instances] }),
  };
}

/** A version-1 context with the extensions a typical browser exposes. */
export function fullWebGL1(): FakeGL {
  const gl = new FakeGL();
  gl.extensions.set("OES_vertex_array_object", vertexArrayExtension(gl));
  gl.extensions.set("ANGLE_instanced_arrays", instancingExtension(gl));
  gl.extensions.set("WEBGL_depth_texture", {});
  gl.extensions.set("OES_standard_derivatives", {});
  gl.extensions.set("EXT_shader_texture_lod", {});
  return gl;
}
