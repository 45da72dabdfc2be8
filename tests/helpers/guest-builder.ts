import binaryen from "binaryen";

export interface GuestImport {
  name: string;
  /** Import module; "env" when omitted. */
  module?: string;
  params?: binaryen.Type[];
  result?: binaryen.Type;
}

/** Body of the guest's `main` export. */
export type GuestMain =
  | { kind: "absent" }
  | { kind: "empty" }
  | { kind: "trap" }
  | { kind: "call"; name: string; args: number[] };

export interface GuestLayout {
  imports?: GuestImport[];
  /** Plugin name → version the guest declares through `<name>_version`. */
  versions?: Record<string, number>;
  main?: GuestMain;
  /** Bytes placed in memory at load time. */
  data?: { offset: number; text: string }[];
}

/** Assemble a small guest module with binaryen. */
export function buildGuest(layout: GuestLayout = {}): Uint8Array {
  const mod = new binaryen.Module();
  try {
    const segments = (layout.data ?? []).map((seg) => ({
      name: `data_${seg.offset}`,
      offset: mod.i32.const(seg.offset),
      data: new TextEncoder().encode(seg.text),
      passive: false,
    }));
    mod.setMemory(1, 16, "memory", segments);

    const imports = layout.imports ?? [];
    for (const imp of imports) {
      mod.addFunctionImport(
        imp.name,
        imp.module ?? "env",
        imp.name,
        binaryen.createType(imp.params ?? []),
        imp.result ?? binaryen.none,
      );
    }

    for (const [plugin, version] of Object.entries(layout.versions ?? {})) {
      const name = `${plugin}_version`;
      mod.addFunction(name, binaryen.none, binaryen.i32, [], mod.i32.const(version));
      mod.addFunctionExport(name, name);
    }

    const main = layout.main ?? { kind: "empty" };
    if (main.kind !== "absent") {
      let body: binaryen.ExpressionRef;
      if (main.kind === "trap") {
        body = mod.unreachable();
      } else if (main.kind === "call") {
        const target = imports.find((imp) => imp.name === main.name);
        const result = target?.result ?? binaryen.none;
        const call = mod.call(main.name, main.args.map((arg) => mod.i32.const(arg)), result);
        body = result === binaryen.none ? call : mod.drop(call);
      } else {
        body = mod.nop();
      }
      mod.addFunction("main", binaryen.none, binaryen.none, [], body);
      mod.addFunctionExport("main", "main");
    }

    if (!mod.validate()) throw new Error("guest module failed validation");
    return mod.emitBinary();
  } finally {
    mod.dispose();
  }
}

export async function compileGuest(layout: GuestLayout = {}): Promise<WebAssembly.Module> {
  return WebAssembly.compile(new Uint8Array(buildGuest(layout)));
}
