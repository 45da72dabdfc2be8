import type { BridgeContext } from "../context.js";
import type { HandleRegistry } from "../handles/handle-registry.js";
import type { BridgePlugin, CallTable } from "../plugins/plugin.js";
import type { NormalizedGL } from "./capabilities.js";
import { GL, textureByteSize, type GLContext, type GLObject } from "./gl-context.js";
import { GraphicsState } from "./graphics-state.js";
import { dialectFromVersion, transpile } from "./shader-transpiler.js";

export const GL_PLUGIN_VERSION = 2;

export interface GraphicsPlugin extends BridgePlugin {
  readonly state: GraphicsState;
}

// Binding-point parameters that legitimately report null when nothing is bound.
const OBJECT_PARAMETERS = new Set([
  0x8894, // ARRAY_BUFFER_BINDING
  0x8b8d, // CURRENT_PROGRAM
  0x8895, // ELEMENT_ARRAY_BUFFER_BINDING
  0x8ca6, // FRAMEBUFFER_BINDING
  0x8ca7, // RENDERBUFFER_BINDING
  0x8069, // TEXTURE_BINDING_2D
  0x8514, // TEXTURE_BINDING_CUBE_MAP
  0x8919, // SAMPLER_BINDING
  0x8e25, // TRANSFORM_FEEDBACK_BINDING
  0x85b5, // VERTEX_ARRAY_BINDING
]);

export function createGraphicsPlugin(ctx: BridgeContext): GraphicsPlugin {
  const state = new GraphicsState(ctx);
  const { memory, log } = ctx;

  function gl(caller: string): GLContext | null {
    return state.require(caller)?.gl ?? null;
  }

  // -------------------------------------------------------------------------
  // Object tables
  // -------------------------------------------------------------------------

  function genObjects(
    count: number,
    ptr: number,
    registry: HandleRegistry<GLObject>,
    create: (normalized: NormalizedGL) => GLObject | null,
    caller: string,
    unsupportedIsError = true,
  ): void {
    const normalized = state.require(caller);
    if (normalized === null) return;
    for (let i = 0; i < count; i++) {
      const object = create(normalized);
      let id = 0;
      if (object !== null) {
        id = registry.allocate(object);
      } else if (unsupportedIsError) {
        state.recordError(
          GL.INVALID_OPERATION,
          `GL_INVALID_OPERATION in ${caller}: the context returned no object; it is most likely lost`,
        );
      }
      memory.writeI32(ptr + i * 4, id);
    }
  }

  function deleteObjects(
    count: number,
    ptr: number,
    registry: HandleRegistry<GLObject>,
    destroy: (normalized: NormalizedGL, object: GLObject) => void,
    caller: string,
  ): void {
    const normalized = state.require(caller);
    if (normalized === null) return;
    for (let i = 0; i < count; i++) {
      const id = memory.readI32(ptr + i * 4);
      if (id === 0) continue;
      const object = registry.free(id, caller);
      if (object !== null) destroy(normalized, object);
    }
  }

  /** Object for a bind call. Id 0 unbinds; null means the id was invalid and the call is skipped. */
  function resolve(
    registry: HandleRegistry<GLObject>,
    id: number,
    caller: string,
  ): { object: GLObject | null } | null {
    const object = registry.lookupOrNone(id, caller);
    if (id !== 0 && object === null) return null;
    return { object };
  }

  // -------------------------------------------------------------------------
  // Shaders and programs
  // -------------------------------------------------------------------------

  function readShaderSource(count: number, stringsPtr: number, lengthsPtr: number): string {
    let source = "";
    for (let i = 0; i < count; i++) {
      const strPtr = memory.readU32(stringsPtr + i * 4);
      const len = lengthsPtr === 0 ? -1 : memory.readI32(lengthsPtr + i * 4);
      source += memory.readUtf8(strPtr, len < 0 ? undefined : len, "glShaderSource");
    }
    return source;
  }

  /** Write `text` as a NUL-terminated log of at most `maxLength` bytes. */
  function writeInfoLog(text: string, maxLength: number, lengthPtr: number, bufPtr: number, caller: string): void {
    if (maxLength <= 0) {
      if (lengthPtr !== 0) memory.writeI32(lengthPtr, 0);
      return;
    }
    const written = memory.writeUtf8(text, bufPtr, maxLength - 1, caller);
    memory.writeU8(bufPtr + written, 0);
    if (lengthPtr !== 0) memory.writeI32(lengthPtr, written);
  }

  function logLength(text: string | null): number {
    return text === null || text.length === 0 ? 0 : new TextEncoder().encode(text).length + 1;
  }

  function toInt(value: unknown): number | null {
    if (typeof value === "number") return value;
    if (typeof value === "boolean") return value ? 1 : 0;
    return null;
  }

  // -------------------------------------------------------------------------
  // Uniforms
  // -------------------------------------------------------------------------

  // -1 is the "not found" location and is ignored, as GL does.
  function uniformLocation(id: number, caller: string): GLObject | null {
    if (id === -1) return null;
    return state.uniforms.lookup(id, caller);
  }

  function uploadFloats(
    caller: string,
    location: number,
    components: number,
    count: number,
    ptr: number,
    upload: (g: GLContext, loc: GLObject, data: Float32Array) => void,
  ): void {
    const g = gl(caller);
    const loc = uniformLocation(location, caller);
    if (g === null || loc === null) return;
    const data = memory.view(Float32Array, ptr, components * count, caller);
    if (data.length === components * count) upload(g, loc, data);
  }

  function uploadInts(
    caller: string,
    location: number,
    components: number,
    count: number,
    ptr: number,
    upload: (g: GLContext, loc: GLObject, data: Int32Array) => void,
  ): void {
    const g = gl(caller);
    const loc = uniformLocation(location, caller);
    if (g === null || loc === null) return;
    const data = memory.view(Int32Array, ptr, components * count, caller);
    if (data.length === components * count) upload(g, loc, data);
  }

  // -------------------------------------------------------------------------
  // Parameter queries
  // -------------------------------------------------------------------------

  function getIntegerv(pname: number, ptr: number): void {
    const caller = "glGetIntegerv";
    const g = gl(caller);
    if (g === null) return;
    if (ptr === 0) {
      state.recordError(GL.INVALID_VALUE, `GL_INVALID_VALUE in ${caller}(${pname}): null output pointer`);
      return;
    }
    switch (pname) {
      case GL.SHADER_COMPILER:
        memory.writeI32(ptr, 1);
        return;
      case GL.NUM_SHADER_BINARY_FORMATS:
        memory.writeI32(ptr, 0);
        return;
      case GL.NUM_COMPRESSED_TEXTURE_FORMATS: {
        const formats = g.getParameter(GL.COMPRESSED_TEXTURE_FORMATS);
        memory.writeI32(ptr, ArrayBuffer.isView(formats) && "length" in formats ? Number(formats.length) : 0);
        return;
      }
    }

    const value = g.getParameter(pname);
    const scalar = toInt(value);
    if (scalar !== null) {
      memory.writeI32(ptr, scalar);
      return;
    }
    if (value === null) {
      if (OBJECT_PARAMETERS.has(pname)) {
        memory.writeI32(ptr, 0);
      } else {
        state.recordError(GL.INVALID_ENUM, `GL_INVALID_ENUM in ${caller}(${pname}): the parameter is null`);
      }
      return;
    }
    if (value instanceof Int32Array || value instanceof Uint32Array || value instanceof Float32Array) {
      const out = memory.view(Int32Array, ptr, value.length, caller);
      for (let i = 0; i < out.length; i++) out[i] = Math.trunc(value[i] ?? 0);
      return;
    }
    if (typeof value === "object") {
      memory.writeI32(ptr, state.idOfObject(value));
      return;
    }
    state.recordError(GL.INVALID_ENUM, `GL_INVALID_ENUM in ${caller}(${pname}): the parameter is a ${typeof value}`);
  }

  function getString(name: number): number {
    const g = gl("glGetString");
    const guest = ctx.guest;
    if (g === null || guest === null) return 0;
    const text = String(g.getParameter(name) ?? "");
    const bytes = new TextEncoder().encode(text);
    const ptr = guest.allocate(bytes.length + 1);
    if (ptr === null) return 0;
    memory.copyIn(bytes, ptr, bytes.length, "glGetString");
    memory.writeU8(ptr + bytes.length, 0);
    return ptr;
  }

  // -------------------------------------------------------------------------
  // Call table
  // -------------------------------------------------------------------------

  function register(table: CallTable): void {
    table.defineAll({
      init_webgl(requested) {
        const version = requested === 1 ? 1 : requested === 2 ? 2 : null;
        if (version === null) {
          log.error("gl-error", `init_webgl: unsupported context version ${requested}`);
          return;
        }
        state.createContext(version);
      },
      gl_declare_shader_dialect(version) {
        const dialect = dialectFromVersion(version);
        if (dialect === null) {
          log.error("gl-error", `gl_declare_shader_dialect: unknown dialect ${version}`);
          return;
        }
        state.guestDialect = dialect;
      },

      // state
      glEnable: (cap) => gl("glEnable")?.enable(cap),
      glDisable: (cap) => gl("glDisable")?.disable(cap),
      glViewport: (x, y, w, h) => gl("glViewport")?.viewport(x, y, w, h),
      glScissor: (x, y, w, h) => gl("glScissor")?.scissor(x, y, w, h),
      glClearColor: (r, g, b, a) => gl("glClearColor")?.clearColor(r, g, b, a),
      glClearDepthf: (depth) => gl("glClearDepthf")?.clearDepth(depth),
      glClearStencil: (s) => gl("glClearStencil")?.clearStencil(s),
      glClear: (mask) => gl("glClear")?.clear(mask),
      glColorMask: (r, g, b, a) => gl("glColorMask")?.colorMask(!!r, !!g, !!b, !!a),
      glDepthFunc: (func) => gl("glDepthFunc")?.depthFunc(func),
      glDepthMask: (flag) => gl("glDepthMask")?.depthMask(!!flag),
      glBlendFunc: (s, d) => gl("glBlendFunc")?.blendFunc(s, d),
      glBlendFuncSeparate: (sRGB, dRGB, sA, dA) => gl("glBlendFuncSeparate")?.blendFuncSeparate(sRGB, dRGB, sA, dA),
      glBlendEquationSeparate: (rgb, alpha) => gl("glBlendEquationSeparate")?.blendEquationSeparate(rgb, alpha),
      glBlendColor: (r, g, b, a) => gl("glBlendColor")?.blendColor(r, g, b, a),
      glStencilFuncSeparate: (face, func, ref, mask) =>
        gl("glStencilFuncSeparate")?.stencilFuncSeparate(face, func, ref, mask),
      glStencilMaskSeparate: (face, mask) => gl("glStencilMaskSeparate")?.stencilMaskSeparate(face, mask),
      glStencilOpSeparate: (face, fail, zfail, zpass) =>
        gl("glStencilOpSeparate")?.stencilOpSeparate(face, fail, zfail, zpass),
      glFrontFace: (mode) => gl("glFrontFace")?.frontFace(mode),
      glCullFace: (mode) => gl("glCullFace")?.cullFace(mode),
      glPixelStorei: (pname, param) => gl("glPixelStorei")?.pixelStorei(pname, param),
      glFlush: () => gl("glFlush")?.flush(),
      glFinish: () => gl("glFinish")?.finish(),
      glGetError: () => state.takeError(),
      glGetIntegerv: getIntegerv,
      glGetString: getString,

      // textures
      glGenTextures: (n, ptr) => genObjects(n, ptr, state.textures, (g) => g.gl.createTexture(), "glGenTextures"),
      glDeleteTextures: (n, ptr) =>
        deleteObjects(n, ptr, state.textures, (g, tex) => g.gl.deleteTexture(tex), "glDeleteTextures"),
      glBindTexture(target, id) {
        const g = gl("glBindTexture");
        const tex = resolve(state.textures, id, "glBindTexture");
        if (g && tex) g.bindTexture(target, tex.object);
      },
      glActiveTexture: (unit) => gl("glActiveTexture")?.activeTexture(unit),
      glTexParameteri: (target, pname, param) => gl("glTexParameteri")?.texParameteri(target, pname, param),
      glTexImage2D(target, level, internalformat, width, height, border, format, type, ptr) {
        const g = gl("glTexImage2D");
        if (g === null) return;
        const pixels = ptr === 0 ? null : memory.bytes(ptr, textureByteSize(format, width, height), "glTexImage2D");
        g.texImage2D(target, level, internalformat, width, height, border, format, type, pixels);
      },
      glTexSubImage2D(target, level, xoffset, yoffset, width, height, format, type, ptr) {
        const g = gl("glTexSubImage2D");
        if (g === null) return;
        const pixels = ptr === 0 ? null : memory.bytes(ptr, textureByteSize(format, width, height), "glTexSubImage2D");
        g.texSubImage2D(target, level, xoffset, yoffset, width, height, format, type, pixels);
      },
      glCopyTexImage2D: (target, level, internalformat, x, y, width, height, border) =>
        gl("glCopyTexImage2D")?.copyTexImage2D(target, level, internalformat, x, y, width, height, border),
      glGenerateMipmap: (target) => gl("glGenerateMipmap")?.generateMipmap(target),
      glReadPixels(x, y, width, height, format, type, ptr) {
        const g = gl("glReadPixels");
        if (g === null) return;
        const pixels = memory.bytes(ptr, textureByteSize(format, width, height), "glReadPixels");
        if (pixels.length > 0) g.readPixels(x, y, width, height, format, type, pixels);
      },

      // buffers
      glGenBuffers: (n, ptr) => genObjects(n, ptr, state.buffers, (g) => g.gl.createBuffer(), "glGenBuffers"),
      glDeleteBuffers: (n, ptr) =>
        deleteObjects(n, ptr, state.buffers, (g, buf) => g.gl.deleteBuffer(buf), "glDeleteBuffers"),
      glBindBuffer(target, id) {
        const g = gl("glBindBuffer");
        const buf = resolve(state.buffers, id, "glBindBuffer");
        if (g && buf) g.bindBuffer(target, buf.object);
      },
      glBufferData(target, size, ptr, usage) {
        const g = gl("glBufferData");
        if (g === null) return;
        g.bufferData(target, ptr === 0 ? size : memory.bytes(ptr, size, "glBufferData"), usage);
      },
      glBufferSubData(target, offset, size, ptr) {
        const g = gl("glBufferSubData");
        if (g === null || ptr === 0) return;
        g.bufferSubData(target, offset, memory.bytes(ptr, size, "glBufferSubData"));
      },

      // framebuffers
      glGenFramebuffers: (n, ptr) =>
        genObjects(n, ptr, state.framebuffers, (g) => g.gl.createFramebuffer(), "glGenFramebuffers"),
      glDeleteFramebuffers: (n, ptr) =>
        deleteObjects(n, ptr, state.framebuffers, (g, fb) => g.gl.deleteFramebuffer(fb), "glDeleteFramebuffers"),
      glBindFramebuffer(target, id) {
        const g = gl("glBindFramebuffer");
        const fb = resolve(state.framebuffers, id, "glBindFramebuffer");
        if (g && fb) g.bindFramebuffer(target, fb.object);
      },
      glFramebufferTexture2D(target, attachment, textarget, id, level) {
        const g = gl("glFramebufferTexture2D");
        const tex = resolve(state.textures, id, "glFramebufferTexture2D");
        if (g && tex) g.framebufferTexture2D(target, attachment, textarget, tex.object, level);
      },
      glDrawBuffers(n, ptr) {
        const g = state.require("glDrawBuffers");
        if (g === null) return;
        g.drawBuffers(Array.from(memory.view(Int32Array, ptr, n, "glDrawBuffers")));
      },

      // vertex arrays
      glGenVertexArrays: (n, ptr) =>
        genObjects(n, ptr, state.vertexArrays, (g) => g.createVertexArray(), "glGenVertexArrays"),
      glDeleteVertexArrays: (n, ptr) =>
        deleteObjects(n, ptr, state.vertexArrays, (g, vao) => g.deleteVertexArray(vao), "glDeleteVertexArrays"),
      glBindVertexArray(id) {
        const g = state.require("glBindVertexArray");
        const vao = resolve(state.vertexArrays, id, "glBindVertexArray");
        if (g && vao) g.bindVertexArray(vao.object);
      },
      glEnableVertexAttribArray: (index) => gl("glEnableVertexAttribArray")?.enableVertexAttribArray(index),
      glDisableVertexAttribArray: (index) => gl("glDisableVertexAttribArray")?.disableVertexAttribArray(index),
      glVertexAttribPointer: (index, size, type, normalized, stride, offset) =>
        gl("glVertexAttribPointer")?.vertexAttribPointer(index, size, type, !!normalized, stride, offset),
      glVertexAttribIPointer(index, size, type, stride, offset) {
        const g = gl("glVertexAttribIPointer");
        if (g === null) return;
        if (g.vertexAttribIPointer) {
          g.vertexAttribIPointer(index, size, type, stride, offset);
        } else {
          log.warnOnce("vertexAttribIPointer", "missing-capability", "glVertexAttribIPointer needs a version 2 context");
        }
      },
      glVertexAttribDivisor: (index, divisor) => state.require("glVertexAttribDivisor")?.vertexAttribDivisor(index, divisor),

      // drawing
      glDrawArrays: (mode, first, count) => gl("glDrawArrays")?.drawArrays(mode, first, count),
      glDrawElements: (mode, count, type, offset) => gl("glDrawElements")?.drawElements(mode, count, type, offset),
      glDrawArraysInstanced: (mode, first, count, instances) =>
        state.require("glDrawArraysInstanced")?.drawArraysInstanced(mode, first, count, instances),
      glDrawElementsInstanced: (mode, count, type, offset, instances) =>
        state.require("glDrawElementsInstanced")?.drawElementsInstanced(mode, count, type, offset, instances),

      // shaders
      glCreateShader(type) {
        const g = gl("glCreateShader");
        if (g === null) return 0;
        const shader = g.createShader(type);
        if (shader === null) {
          state.recordError(GL.INVALID_ENUM, `GL_INVALID_ENUM in glCreateShader(${type})`);
          return 0;
        }
        return state.shaders.allocate(shader);
      },
      glDeleteShader(id) {
        const g = gl("glDeleteShader");
        if (g === null || id === 0) return;
        const shader = state.shaders.free(id, "glDeleteShader");
        if (shader !== null) g.deleteShader(shader);
      },
      glShaderSource(id, count, stringsPtr, lengthsPtr) {
        const g = gl("glShaderSource");
        const shader = state.shaders.lookup(id, "glShaderSource");
        if (g === null || shader === null) return;
        let source = readShaderSource(count, stringsPtr, lengthsPtr);
        if (state.needsTranspile) source = transpile(source, "glsl300es");
        g.shaderSource(shader, source);
      },
      glCompileShader(id) {
        const g = gl("glCompileShader");
        const shader = state.shaders.lookup(id, "glCompileShader");
        if (g === null || shader === null) return;
        g.compileShader(shader);
        if (!g.getShaderParameter(shader, GL.COMPILE_STATUS)) {
          log.error("shader-compile", `shader ${id} failed to compile: ${g.getShaderInfoLog(shader) ?? ""}`.trimEnd());
        }
      },
      glGetShaderiv(id, pname, ptr) {
        const g = gl("glGetShaderiv");
        const shader = state.shaders.lookup(id, "glGetShaderiv");
        if (g === null || shader === null) return;
        let value: number | null;
        if (pname === GL.INFO_LOG_LENGTH) value = logLength(g.getShaderInfoLog(shader));
        else if (pname === GL.SHADER_SOURCE_LENGTH) value = logLength(g.getShaderSource(shader));
        else value = toInt(g.getShaderParameter(shader, pname));
        if (value === null) {
          state.recordError(GL.INVALID_ENUM, `GL_INVALID_ENUM in glGetShaderiv(${pname})`);
          return;
        }
        memory.writeI32(ptr, value);
      },
      glGetShaderInfoLog(id, maxLength, lengthPtr, bufPtr) {
        const g = gl("glGetShaderInfoLog");
        const shader = state.shaders.lookup(id, "glGetShaderInfoLog");
        if (g === null || shader === null) return;
        writeInfoLog(g.getShaderInfoLog(shader) ?? "", maxLength, lengthPtr, bufPtr, "glGetShaderInfoLog");
      },

      // programs
      glCreateProgram() {
        const g = gl("glCreateProgram");
        if (g === null) return 0;
        const program = g.createProgram();
        if (program === null) {
          state.recordError(GL.INVALID_OPERATION, "GL_INVALID_OPERATION in glCreateProgram: the context is most likely lost");
          return 0;
        }
        return state.programs.allocate(program);
      },
      glDeleteProgram(id) {
        const g = gl("glDeleteProgram");
        if (g === null || id === 0) return;
        const program = state.programs.free(id, "glDeleteProgram");
        if (program === null) return;
        state.dropProgramInfo(id);
        g.deleteProgram(program);
      },
      glAttachShader(programId, shaderId) {
        const g = gl("glAttachShader");
        const program = state.programs.lookup(programId, "glAttachShader");
        const shader = state.shaders.lookup(shaderId, "glAttachShader");
        if (g && program && shader) g.attachShader(program, shader);
      },
      glDetachShader(programId, shaderId) {
        const g = gl("glDetachShader");
        const program = state.programs.lookup(programId, "glDetachShader");
        const shader = state.shaders.lookup(shaderId, "glDetachShader");
        if (g && program && shader) g.detachShader(program, shader);
      },
      glLinkProgram(id) {
        const g = gl("glLinkProgram");
        const program = state.programs.lookup(id, "glLinkProgram");
        if (g === null || program === null) return;
        g.linkProgram(program);
        if (!g.getProgramParameter(program, GL.LINK_STATUS)) {
          log.error("shader-compile", `program ${id} failed to link: ${g.getProgramInfoLog(program) ?? ""}`.trimEnd());
        }
        state.rebuildProgramInfo(id, program);
      },
      glUseProgram(id) {
        const g = gl("glUseProgram");
        const program = resolve(state.programs, id, "glUseProgram");
        if (g && program) g.useProgram(program.object);
      },
      glGetProgramiv(id, pname, ptr) {
        const g = gl("glGetProgramiv");
        const program = state.programs.lookup(id, "glGetProgramiv");
        if (g === null || program === null) return;
        let value: number | null;
        if (pname === GL.INFO_LOG_LENGTH) value = logLength(g.getProgramInfoLog(program));
        else if (pname === GL.ACTIVE_UNIFORM_MAX_LENGTH) value = state.programInfos.get(id)?.maxUniformLength ?? 0;
        else value = toInt(g.getProgramParameter(program, pname));
        if (value === null) {
          state.recordError(GL.INVALID_ENUM, `GL_INVALID_ENUM in glGetProgramiv(${pname})`);
          return;
        }
        memory.writeI32(ptr, value);
      },
      glGetProgramInfoLog(id, maxLength, lengthPtr, bufPtr) {
        const g = gl("glGetProgramInfoLog");
        const program = state.programs.lookup(id, "glGetProgramInfoLog");
        if (g === null || program === null) return;
        writeInfoLog(g.getProgramInfoLog(program) ?? "", maxLength, lengthPtr, bufPtr, "glGetProgramInfoLog");
      },
      glGetAttribLocation(id, namePtr) {
        const g = gl("glGetAttribLocation");
        const program = state.programs.lookup(id, "glGetAttribLocation");
        if (g === null || program === null) return -1;
        return g.getAttribLocation(program, memory.readUtf8(namePtr, undefined, "glGetAttribLocation"));
      },
      glGetUniformLocation(id, namePtr) {
        if (state.programs.lookup(id, "glGetUniformLocation") === null) return -1;
        const info = state.programInfos.get(id);
        if (info === undefined) return -1;
        return info.locationOf(memory.readUtf8(namePtr, undefined, "glGetUniformLocation"));
      },

      // uniforms
      glUniform1f(location, x) {
        const g = gl("glUniform1f");
        const loc = uniformLocation(location, "glUniform1f");
        if (g && loc) g.uniform1f(loc, x);
      },
      glUniform1i(location, x) {
        const g = gl("glUniform1i");
        const loc = uniformLocation(location, "glUniform1i");
        if (g && loc) g.uniform1i(loc, x);
      },
      glUniform1fv: (loc, count, ptr) => uploadFloats("glUniform1fv", loc, 1, count, ptr, (g, l, d) => g.uniform1fv(l, d)),
      glUniform2fv: (loc, count, ptr) => uploadFloats("glUniform2fv", loc, 2, count, ptr, (g, l, d) => g.uniform2fv(l, d)),
      glUniform3fv: (loc, count, ptr) => uploadFloats("glUniform3fv", loc, 3, count, ptr, (g, l, d) => g.uniform3fv(l, d)),
      glUniform4fv: (loc, count, ptr) => uploadFloats("glUniform4fv", loc, 4, count, ptr, (g, l, d) => g.uniform4fv(l, d)),
      glUniform1iv: (loc, count, ptr) => uploadInts("glUniform1iv", loc, 1, count, ptr, (g, l, d) => g.uniform1iv(l, d)),
      glUniform2iv: (loc, count, ptr) => uploadInts("glUniform2iv", loc, 2, count, ptr, (g, l, d) => g.uniform2iv(l, d)),
      glUniform3iv: (loc, count, ptr) => uploadInts("glUniform3iv", loc, 3, count, ptr, (g, l, d) => g.uniform3iv(l, d)),
      glUniform4iv: (loc, count, ptr) => uploadInts("glUniform4iv", loc, 4, count, ptr, (g, l, d) => g.uniform4iv(l, d)),
      glUniformMatrix4fv: (loc, count, transpose, ptr) =>
        uploadFloats("glUniformMatrix4fv", loc, 16, count, ptr, (g, l, d) => g.uniformMatrix4fv(l, !!transpose, d)),

      // queries
      glGenQueries: (n, ptr) => genObjects(n, ptr, state.queries, (g) => g.createQuery(), "glGenQueries", false),
      glDeleteQueries: (n, ptr) =>
        deleteObjects(n, ptr, state.queries, (g, query) => g.deleteQuery(query), "glDeleteQueries"),
      glBeginQuery(target, id) {
        const g = state.require("glBeginQuery");
        const query = state.queries.lookup(id, "glBeginQuery");
        if (g && query) g.beginQuery(target, query);
      },
      glEndQuery: (target) => state.require("glEndQuery")?.endQuery(target),
      glGetQueryObjectiv(id, pname, ptr) {
        const g = state.require("glGetQueryObjectiv");
        const query = state.queries.lookup(id, "glGetQueryObjectiv");
        if (g === null || query === null) return;
        memory.writeI32(ptr, toInt(g.getQueryParameter(query, pname)) ?? 0);
      },
      glGetQueryObjectui64v(id, pname, ptr) {
        const g = state.require("glGetQueryObjectui64v");
        const query = state.queries.lookup(id, "glGetQueryObjectui64v");
        if (g === null || query === null) return;
        const value = toInt(g.getQueryParameter(query, pname)) ?? 0;
        memory.writeU32(ptr, value % 0x1_0000_0000);
        memory.writeU32(ptr + 4, Math.floor(value / 0x1_0000_0000));
      },
    });
  }

  return {
    name: "gl",
    version: GL_PLUGIN_VERSION,
    state,
    register,
    prepare() {
      const version = ctx.config.glVersion;
      return version === null ? true : state.createContext(version);
    },
  };
}
