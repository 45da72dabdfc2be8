import type { DiagnosticLog } from "../errors/log.js";
import type { GLContext, GLObject } from "./gl-context.js";

export type GLVersion = 1 | 2;

export type CapabilityName =
  | "vertex-array-object"
  | "instanced-arrays"
  | "timer-query"
  | "draw-buffers"
  | "depth-texture"
  | "standard-derivatives"
  | "shader-texture-lod";

export type CapabilityResult =
  | { name: CapabilityName; status: "native" }
  | { name: CapabilityName; status: "extension"; extension: string }
  | { name: CapabilityName; status: "missing"; required: boolean };

// ---------------------------------------------------------------------------
// Extension shapes (version-1 contexts)
// ---------------------------------------------------------------------------

interface VertexArrayExtension {
  createVertexArrayOES(): GLObject | null;
  deleteVertexArrayOES(vao: GLObject | null): void;
  bindVertexArrayOES(vao: GLObject | null): void;
}

interface InstancedArraysExtension {
  vertexAttribDivisorANGLE(index: number, divisor: number): void;
  drawArraysInstancedANGLE(mode: number, first: number, count: number, instances: number): void;
  drawElementsInstancedANGLE(mode: number, count: number, type: number, offset: number, instances: number): void;
}

interface TimerQueryExtension {
  createQueryEXT(): GLObject | null;
  deleteQueryEXT(query: GLObject | null): void;
  beginQueryEXT(target: number, query: GLObject): void;
  endQueryEXT(target: number): void;
  getQueryObjectEXT(query: GLObject, pname: number): unknown;
}

interface DrawBuffersExtension {
  drawBuffersWEBGL(buffers: number[]): void;
}

function hasFunctions(value: unknown, names: readonly string[]): boolean {
  if (typeof value !== "object" || value === null) return false;
  return names.every((name) => typeof Reflect.get(value, name) === "function");
}

function isVertexArrayExtension(ext: unknown): ext is VertexArrayExtension {
  return hasFunctions(ext, ["createVertexArrayOES", "deleteVertexArrayOES", "bindVertexArrayOES"]);
}

function isInstancedArraysExtension(ext: unknown): ext is InstancedArraysExtension {
  return hasFunctions(ext, ["vertexAttribDivisorANGLE", "drawArraysInstancedANGLE", "drawElementsInstancedANGLE"]);
}

function isTimerQueryExtension(ext: unknown): ext is TimerQueryExtension {
  return hasFunctions(ext, ["createQueryEXT", "deleteQueryEXT", "beginQueryEXT", "endQueryEXT", "getQueryObjectEXT"]);
}

function isDrawBuffersExtension(ext: unknown): ext is DrawBuffersExtension {
  return hasFunctions(ext, ["drawBuffersWEBGL"]);
}

function present(ext: unknown): boolean {
  return ext !== null && ext !== undefined;
}

// ---------------------------------------------------------------------------
// Normalized surface
// ---------------------------------------------------------------------------

/** One function set over a context, whether the capability is native or polyfilled. */
export interface NormalizedGL {
  readonly gl: GLContext;
  readonly version: GLVersion;
  readonly capabilities: readonly CapabilityResult[];
  createVertexArray(): GLObject | null;
  deleteVertexArray(vao: GLObject | null): void;
  bindVertexArray(vao: GLObject | null): void;
  vertexAttribDivisor(index: number, divisor: number): void;
  drawArraysInstanced(mode: number, first: number, count: number, instances: number): void;
  drawElementsInstanced(mode: number, count: number, type: number, offset: number, instances: number): void;
  createQuery(): GLObject | null;
  deleteQuery(query: GLObject | null): void;
  beginQuery(target: number, query: GLObject): void;
  endQuery(target: number): void;
  getQueryParameter(query: GLObject, pname: number): unknown;
  drawBuffers(buffers: number[]): void;
}

type VertexArrayFns = Pick<NormalizedGL, "createVertexArray" | "deleteVertexArray" | "bindVertexArray">;
type InstancingFns = Pick<NormalizedGL, "vertexAttribDivisor" | "drawArraysInstanced" | "drawElementsInstanced">;
type QueryFns = Pick<NormalizedGL, "createQuery" | "deleteQuery" | "beginQuery" | "endQuery" | "getQueryParameter">;
type DrawBuffersFns = Pick<NormalizedGL, "drawBuffers">;

interface Probe<F> {
  result: CapabilityResult;
  fns: F | null;
}

function probeVertexArrays(gl: GLContext, version: GLVersion): Probe<VertexArrayFns> {
  const name = "vertex-array-object";
  const { createVertexArray, deleteVertexArray, bindVertexArray } = gl;
  if (version === 2 && createVertexArray && deleteVertexArray && bindVertexArray) {
    return {
      result: { name, status: "native" },
      fns: {
        createVertexArray: () => createVertexArray.call(gl),
        deleteVertexArray: (vao) => deleteVertexArray.call(gl, vao),
        bindVertexArray: (vao) => bindVertexArray.call(gl, vao),
      },
    };
  }
  const ext = version === 1 ? gl.getExtension("OES_vertex_array_object") : null;
  if (isVertexArrayExtension(ext)) {
    return {
      result: { name, status: "extension", extension: "OES_vertex_array_object" },
      fns: {
        createVertexArray: () => ext.createVertexArrayOES(),
        deleteVertexArray: (vao) => ext.deleteVertexArrayOES(vao),
        bindVertexArray: (vao) => ext.bindVertexArrayOES(vao),
      },
    };
  }
  return { result: { name, status: "missing", required: true }, fns: null };
}

function probeInstancing(gl: GLContext, version: GLVersion): Probe<InstancingFns> {
  const name = "instanced-arrays";
  const { vertexAttribDivisor, drawArraysInstanced, drawElementsInstanced } = gl;
  if (version === 2 && vertexAttribDivisor && drawArraysInstanced && drawElementsInstanced) {
    return {
      result: { name, status: "native" },
      fns: {
        vertexAttribDivisor: (index, divisor) => vertexAttribDivisor.call(gl, index, divisor),
        drawArraysInstanced: (mode, first, count, instances) =>
          drawArraysInstanced.call(gl, mode, first, count, instances),
        drawElementsInstanced: (mode, count, type, offset, instances) =>
          drawElementsInstanced.call(gl, mode, count, type, offset, instances),
      },
    };
  }
  const ext = version === 1 ? gl.getExtension("ANGLE_instanced_arrays") : null;
  if (isInstancedArraysExtension(ext)) {
    return {
      result: { name, status: "extension", extension: "ANGLE_instanced_arrays" },
      fns: {
        vertexAttribDivisor: (index, divisor) => ext.vertexAttribDivisorANGLE(index, divisor),
        drawArraysInstanced: (mode, first, count, instances) =>
          ext.drawArraysInstancedANGLE(mode, first, count, instances),
        drawElementsInstanced: (mode, count, type, offset, instances) =>
          ext.drawElementsInstancedANGLE(mode, count, type, offset, instances),
      },
    };
  }
  return { result: { name, status: "missing", required: false }, fns: null };
}

function probeQueries(gl: GLContext, version: GLVersion): Probe<QueryFns> {
  const name = "timer-query";
  const { createQuery, deleteQuery, beginQuery, endQuery, getQueryParameter } = gl;
  if (version === 2 && createQuery && deleteQuery && beginQuery && endQuery && getQueryParameter) {
    return {
      result: { name, status: "native" },
      fns: {
        createQuery: () => createQuery.call(gl),
        deleteQuery: (query) => deleteQuery.call(gl, query),
        beginQuery: (target, query) => beginQuery.call(gl, target, query),
        endQuery: (target) => endQuery.call(gl, target),
        getQueryParameter: (query, pname) => getQueryParameter.call(gl, query, pname),
      },
    };
  }
  const ext = version === 1 ? gl.getExtension("EXT_disjoint_timer_query") : null;
  if (isTimerQueryExtension(ext)) {
    return {
      result: { name, status: "extension", extension: "EXT_disjoint_timer_query" },
      fns: {
        createQuery: () => ext.createQueryEXT(),
        deleteQuery: (query) => ext.deleteQueryEXT(query),
        beginQuery: (target, query) => ext.beginQueryEXT(target, query),
        endQuery: (target) => ext.endQueryEXT(target),
        getQueryParameter: (query, pname) => ext.getQueryObjectEXT(query, pname),
      },
    };
  }
  return { result: { name, status: "missing", required: false }, fns: null };
}

function probeDrawBuffers(gl: GLContext, version: GLVersion): Probe<DrawBuffersFns> {
  const name = "draw-buffers";
  const { drawBuffers } = gl;
  if (version === 2 && drawBuffers) {
    return { result: { name, status: "native" }, fns: { drawBuffers: (buffers) => drawBuffers.call(gl, buffers) } };
  }
  const ext = version === 1 ? gl.getExtension("WEBGL_draw_buffers") : null;
  if (isDrawBuffersExtension(ext)) {
    return {
      result: { name, status: "extension", extension: "WEBGL_draw_buffers" },
      fns: { drawBuffers: (buffers) => ext.drawBuffersWEBGL(buffers) },
    };
  }
  return { result: { name, status: "missing", required: false }, fns: null };
}

// Capabilities with no functions of their own; enabling the extension is the whole job.
function probeFlag(
  gl: GLContext,
  version: GLVersion,
  name: CapabilityName,
  extension: string,
  required: boolean,
): CapabilityResult {
  if (version === 2) return { name, status: "native" };
  return present(gl.getExtension(extension))
    ? { name, status: "extension", extension }
    : { name, status: "missing", required };
}

// ---------------------------------------------------------------------------
// Entry points
// ---------------------------------------------------------------------------

const noop = (): void => {};

export type NormalizeResult =
  | { ok: true; gl: NormalizedGL }
  | { ok: false; missing: CapabilityName[]; capabilities: CapabilityResult[] };

/**
 * Probe `gl` and build the normalized function set. Missing optional
 * capabilities get no-op stand-ins and one warning each; a missing required
 * capability fails the whole context.
 */
export function normalizeContext(gl: GLContext, version: GLVersion, log: DiagnosticLog): NormalizeResult {
  const vao = probeVertexArrays(gl, version);
  const instancing = probeInstancing(gl, version);
  const queries = probeQueries(gl, version);
  const drawBuffers = probeDrawBuffers(gl, version);
  const capabilities: CapabilityResult[] = [
    vao.result,
    instancing.result,
    queries.result,
    drawBuffers.result,
    probeFlag(gl, version, "depth-texture", "WEBGL_depth_texture", true),
    probeFlag(gl, version, "standard-derivatives", "OES_standard_derivatives", false),
    probeFlag(gl, version, "shader-texture-lod", "EXT_shader_texture_lod", false),
  ];

  const missing: CapabilityName[] = [];
  for (const cap of capabilities) {
    if (cap.status !== "missing") continue;
    if (cap.required) {
      missing.push(cap.name);
    } else {
      log.warnOnce(`capability:${cap.name}`, "missing-capability", `graphics capability ${cap.name} is unavailable; its calls do nothing`);
    }
  }
  if (missing.length > 0 || vao.fns === null) {
    return { ok: false, missing, capabilities };
  }

  const normalized: NormalizedGL = {
    gl,
    version,
    capabilities,
    ...vao.fns,
    ...(instancing.fns ?? {
      vertexAttribDivisor: noop,
      drawArraysInstanced: noop,
      drawElementsInstanced: noop,
    }),
    ...(queries.fns ?? {
      createQuery: () => null,
      deleteQuery: noop,
      beginQuery: noop,
      endQuery: noop,
      getQueryParameter: () => null,
    }),
    ...(drawBuffers.fns ?? { drawBuffers: noop }),
  };
  return { ok: true, gl: normalized };
}
