import type { BridgeContext } from "../context.js";
import { HandleRegistry, IdCounter } from "../handles/handle-registry.js";
import { normalizeContext, type GLVersion, type NormalizedGL } from "./capabilities.js";
import { GL, type GLObject } from "./gl-context.js";
import { ProgramInfo } from "./program-info.js";
import type { ShaderDialect } from "./shader-transpiler.js";

/**
 * Per-context graphics tables. All object kinds draw ids from one counter,
 * so a graphics id names at most one object of any kind.
 */
export class GraphicsState {
  private readonly counter = new IdCounter(1);
  readonly textures: HandleRegistry<GLObject>;
  readonly buffers: HandleRegistry<GLObject>;
  readonly framebuffers: HandleRegistry<GLObject>;
  readonly vertexArrays: HandleRegistry<GLObject>;
  readonly queries: HandleRegistry<GLObject>;
  readonly programs: HandleRegistry<GLObject>;
  readonly shaders: HandleRegistry<GLObject>;
  readonly uniforms: HandleRegistry<GLObject>;
  readonly programInfos = new Map<number, ProgramInfo>();

  private normalized: NormalizedGL | null = null;
  private recordedError: number = GL.NO_ERROR;
  /** Dialect the guest writes its shaders in. */
  guestDialect: ShaderDialect = "glsl300es";

  constructor(private readonly ctx: BridgeContext) {
    const { log } = ctx;
    this.textures = new HandleRegistry("texture", log, this.counter);
    this.buffers = new HandleRegistry("buffer", log, this.counter);
    this.framebuffers = new HandleRegistry("framebuffer", log, this.counter);
    this.vertexArrays = new HandleRegistry("vertex array", log, this.counter);
    this.queries = new HandleRegistry("query", log, this.counter);
    this.programs = new HandleRegistry("program", log, this.counter);
    this.shaders = new HandleRegistry("shader", log, this.counter);
    this.uniforms = new HandleRegistry("uniform location", log, this.counter);
  }

  get context(): NormalizedGL | null {
    return this.normalized;
  }

  get version(): GLVersion | null {
    return this.normalized?.version ?? null;
  }

  /** Shader sources need rewriting before upload. */
  get needsTranspile(): boolean {
    return this.normalized?.version === 2 && this.guestDialect === "glsl100";
  }

  /**
   * Create and normalize the canvas context. Halts the bridge when the
   * context cannot be created or lacks a required capability.
   */
  createContext(version: GLVersion): boolean {
    if (this.normalized !== null) {
      if (this.normalized.version !== version) {
        this.ctx.log.warn(
          "info",
          `graphics context version ${this.normalized.version} already exists; request for version ${version} ignored`,
        );
      }
      return true;
    }
    const gl = this.ctx.host.canvas.getContext(version === 1 ? "webgl" : "webgl2");
    if (gl === null) {
      this.ctx.halt(
        "missing-required-capability",
        `Unable to initialize WebGL ${version}. Your browser or machine may not support it.`,
      );
      return false;
    }
    const result = normalizeContext(gl, version, this.ctx.log);
    if (!result.ok) {
      this.ctx.halt(
        "missing-required-capability",
        `Graphics context is missing required capabilities: ${result.missing.join(", ")}`,
      );
      return false;
    }
    this.normalized = result.gl;
    this.ctx.log.debug("info", `graphics context version ${version} ready`);
    return true;
  }

  /** The context, or null with a one-time diagnostic when none was created. */
  require(caller: string): NormalizedGL | null {
    if (this.normalized === null) {
      this.ctx.log.warnOnce("gl-before-init", "gl-error", `${caller} called before init_webgl`);
    }
    return this.normalized;
  }

  recordError(code: number, message: string): void {
    if (this.recordedError === GL.NO_ERROR) this.recordedError = code;
    this.ctx.log.error("gl-error", message);
  }

  /** Recorded bridge error first, then the context's own. */
  takeError(): number {
    const recorded = this.recordedError;
    this.recordedError = GL.NO_ERROR;
    if (recorded !== GL.NO_ERROR) return recorded;
    return this.normalized?.gl.getError() ?? GL.NO_ERROR;
  }

  /** Replace the uniform table of `programId`, freeing the old location ids. */
  rebuildProgramInfo(programId: number, program: GLObject): ProgramInfo | null {
    this.dropProgramInfo(programId);
    const gl = this.normalized?.gl;
    if (gl === undefined) return null;
    const info = ProgramInfo.build(gl, program, this.uniforms);
    this.programInfos.set(programId, info);
    return info;
  }

  dropProgramInfo(programId: number): void {
    const previous = this.programInfos.get(programId);
    if (previous === undefined) return;
    for (const id of previous.locationIds()) this.uniforms.free(id, "relink");
    this.programInfos.delete(programId);
  }

  /** Id of a bound object reported by the context, 0 when unknown. */
  idOfObject(object: GLObject): number {
    for (const registry of [
      this.textures,
      this.buffers,
      this.framebuffers,
      this.vertexArrays,
      this.programs,
      this.queries,
    ]) {
      const id = registry.idOf(object);
      if (id !== 0) return id;
    }
    return 0;
  }
}
