import { describe, it, expect } from "vitest";
import { DiagnosticLog } from "../../src/errors/log.js";
import { normalizeContext } from "../../src/graphics/capabilities.js";
import { FakeGL, FakeGL2, fullWebGL1, vertexArrayExtension } from "../helpers/fake-gl.js";

function quietLog(): DiagnosticLog {
  return new DiagnosticLog({ sink: () => {}, minSeverity: "debug" });
}

describe("normalizeContext", () => {
  it("uses native functions on a version 2 context", () => {
    const log = quietLog();
    const result = normalizeContext(new FakeGL2(), 2, log);
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.gl.capabilities.every((c) => c.status === "native")).toBe(true);
    expect(log.entries).toHaveLength(0);
  });

  it("routes version 1 calls through the extensions", () => {
    const gl = fullWebGL1();
    const result = normalizeContext(gl, 1, quietLog());
    expect(result.ok).toBe(true);
    if (!result.ok) return;

    const vao = result.gl.createVertexArray();
    result.gl.bindVertexArray(vao);
    result.gl.drawArraysInstanced(4, 0, 6, 10);
    expect(gl.callsTo("bindVertexArrayOES")).toEqual([[vao]]);
    expect(gl.callsTo("drawArraysInstancedANGLE")).toEqual([[4, 0, 6, 10]]);
    expect(result.gl.capabilities.find((c) => c.name === "vertex-array-object")).toEqual({
      name: "vertex-array-object",
      status: "extension",
      extension: "OES_vertex_array_object",
    });
  });

  it("stubs missing optional capabilities and warns once for each", () => {
    const log = quietLog();
    const result = normalizeContext(fullWebGL1(), 1, log);
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.gl.createQuery()).toBeNull();
    result.gl.drawBuffers([0x8ce0]);

    normalizeContext(fullWebGL1(), 1, log);
    expect(log.ofKind("missing-capability").map((d) => d.message)).toEqual([
      "graphics capability timer-query is unavailable; its calls do nothing",
      "graphics capability draw-buffers is unavailable; its calls do nothing",
    ]);
  });

  it("gives instancing calls a no-op when the extension is absent", () => {
    const gl = new FakeGL();
    gl.extensions.set("OES_vertex_array_object", vertexArrayExtension(gl));
    gl.extensions.set("WEBGL_depth_texture", {});
    const result = normalizeContext(gl, 1, quietLog());
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    result.gl.vertexAttribDivisor(0, 1);
    expect(gl.calls).toHaveLength(0);
  });

  it("fails when a required capability is missing", () => {
    const gl = new FakeGL();
    gl.extensions.set("WEBGL_depth_texture", {});
    const result = normalizeContext(gl, 1, quietLog());
    expect(result).toMatchObject({ ok: false, missing: ["vertex-array-object"] });
  });

  it("lists every missing required capability", () => {
    const result = normalizeContext(new FakeGL(), 1, quietLog());
    expect(result).toMatchObject({ ok: false, missing: ["vertex-array-object", "depth-texture"] });
  });

  it("does not look for version 1 extensions on a version 2 context", () => {
    // A context claiming version 2 without the native functions.
    const result = normalizeContext(fullWebGL1(), 2, quietLog());
    expect(result).toMatchObject({ ok: false, missing: ["vertex-array-object"] });
  });
});
