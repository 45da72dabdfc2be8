import type { HandleRegistry } from "../handles/handle-registry.js";
import { GL, type GLContext, type GLObject } from "./gl-context.js";

export interface UniformEntry {
  /** Array length; 1 for a plain uniform. */
  size: number;
  /** Location id of element 0. Element `i` has id `baseId + i`. */
  baseId: number;
}

/** Uniform table of one linked program. */
export class ProgramInfo {
  readonly uniforms = new Map<string, UniformEntry>();
  maxUniformLength = 0;

  /**
   * Query every active uniform of `program` and give each location (and each
   * array element's location) an id in `locations`.
   */
  static build(gl: GLContext, program: GLObject, locations: HandleRegistry<GLObject>): ProgramInfo {
    const info = new ProgramInfo();
    const count = Number(gl.getProgramParameter(program, GL.ACTIVE_UNIFORMS) ?? 0);
    for (let i = 0; i < count; i++) {
      const active = gl.getActiveUniform(program, i);
      if (active === null) continue;
      info.maxUniformLength = Math.max(info.maxUniformLength, active.name.length + 1);

      // Arrays are reported as "name[0]".
      const name = active.name.endsWith("]") ? active.name.slice(0, active.name.lastIndexOf("[")) : active.name;
      const location = gl.getUniformLocation(program, name);
      if (location === null) continue;

      const baseId = locations.allocate(location);
      for (let element = 1; element < active.size; element++) {
        locations.allocate(gl.getUniformLocation(program, `${name}[${element}]`));
      }
      info.uniforms.set(name, { size: active.size, baseId });
    }
    return info;
  }

  /**
   * Location id for `name`, which may carry an `[index]` suffix. -1 when the
   * uniform is unknown or the index is out of range.
   */
  locationOf(name: string): number {
    let base = name;
    let index = 0;
    if (name.endsWith("]")) {
      const open = name.lastIndexOf("[");
      if (open < 0) return -1;
      const digits = name.slice(open + 1, -1);
      index = digits === "" ? 0 : Number.parseInt(digits, 10);
      base = name.slice(0, open);
    }
    const entry = this.uniforms.get(base);
    if (entry === undefined || !Number.isInteger(index) || index < 0 || index >= entry.size) return -1;
    return entry.baseId + index;
  }

  /** Every location id this table handed out. */
  *locationIds(): IterableIterator<number> {
    for (const entry of this.uniforms.values()) {
      for (let i = 0; i < entry.size; i++) yield entry.baseId + i;
    }
  }
}
