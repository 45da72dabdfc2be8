import { describe, it, expect } from "vitest";
import binaryen from "binaryen";
import { DiagnosticLog } from "../../src/errors/log.js";
import { defaultValueOf, readImportResults } from "../../src/plugins/import-signatures.js";
import { planImports } from "../../src/plugins/missing-imports.js";
import { CallTable } from "../../src/plugins/plugin.js";
import { buildGuest, type GuestLayout } from "../helpers/guest-builder.js";

const layout: GuestLayout = {
  imports: [
    { name: "clock", result: binaryen.i64 },
    { name: "ratio", params: [binaryen.i32], result: binaryen.f64 },
    { name: "tick" },
    { name: "count", module: "extra", params: [binaryen.i64], result: binaryen.i32 },
  ],
};

describe("readImportResults", () => {
  it("reads the result types of every function import", () => {
    const results = readImportResults(buildGuest(layout));
    expect([...results.entries()]).toEqual([
      ["env.clock", ["i64"]],
      ["env.ratio", ["f64"]],
      ["env.tick", []],
      ["extra.count", ["i32"]],
    ]);
  });

  it("is empty for a module without imports", () => {
    expect(readImportResults(buildGuest()).size).toBe(0);
  });

  it("throws on a truncated module", () => {
    expect(() => readImportResults(buildGuest(layout).subarray(0, 11))).toThrow(/^unexpected end of module/);
  });
});

describe("defaultValueOf", () => {
  it("gives a BigInt zero for i64 and null for references", () => {
    expect(defaultValueOf("i64")).toBe(0n);
    expect(defaultValueOf("f64")).toBe(0);
    expect(defaultValueOf("i32")).toBe(0);
    expect(defaultValueOf("externref")).toBeNull();
  });
});

describe("planImports with module bytes", () => {
  async function plan(bytes: Uint8Array | null) {
    const log = new DiagnosticLog({ sink: () => {} });
    const guest = buildGuest(layout);
    const module = await WebAssembly.compile(new Uint8Array(guest));
    return { plan: planImports(module, new CallTable(log), log, bytes === null ? guest : bytes), log };
  }

  it("returns the zero value of each stub's result type", async () => {
    const { plan: result } = await plan(null);
    expect(result.imports.env?.clock?.()).toBe(0n);
    expect(result.imports.env?.ratio?.(1)).toBe(0);
    expect(result.imports.env?.tick?.()).toBeUndefined();
    expect(result.imports.extra?.count?.(0)).toBe(0);
  });

  it("falls back to 0 when the signatures cannot be read", async () => {
    const { plan: result, log } = await plan(new Uint8Array([0, 0x61, 0x73, 0x6d, 1, 0, 0, 0, 1]));
    expect(result.imports.env?.clock?.()).toBe(0);
    expect(log.entries[0]?.message).toMatch(/^could not read import signatures; stubs return 0: unexpected end of module/);
  });
});
