import { describeError } from "../errors/diagnostic.js";
import type { DiagnosticLog } from "../errors/log.js";
import { defaultValueOf, readImportResults, type DefaultValue, type ValueType } from "./import-signatures.js";
import type { BridgeFunction, CallTable } from "./plugin.js";

export const HOST_MODULE = "env";

/** A stub answers with the zero value of each declared result. */
export type StubFunction = (...args: number[]) => DefaultValue | DefaultValue[] | undefined;

export type ImportFunction = BridgeFunction | StubFunction;

export interface ImportPlan {
  imports: Record<string, Record<string, ImportFunction>>;
  /** `module.name` of every function import satisfied by a stub. */
  stubbed: string[];
}

function stubResult(results: ValueType[] | undefined): DefaultValue | DefaultValue[] | undefined {
  if (results === undefined) return 0;
  if (results.length === 0) return undefined;
  const values = results.map(defaultValueOf);
  return values.length === 1 ? values[0] : values;
}

function importResults(bytes: Uint8Array | null, log: DiagnosticLog): Map<string, ValueType[]> {
  if (bytes === null) return new Map();
  try {
    return readImportResults(bytes);
  } catch (e) {
    log.warn("missing-function", `could not read import signatures; stubs return 0: ${describeError(e)}`, e);
    return new Map();
  }
}

/**
 * Build the import object for `module`, filling each function import the
 * call table lacks with a stub that returns the zero value of its result
 * type. Result types come from `bytes`; without them every stub returns 0.
 */
export function planImports(
  module: WebAssembly.Module,
  table: CallTable,
  log: DiagnosticLog,
  bytes: Uint8Array | null = null,
): ImportPlan {
  const imports: Record<string, Record<string, ImportFunction>> = { [HOST_MODULE]: table.toImports() };
  const stubbed: string[] = [];
  let signatures: Map<string, ValueType[]> | null = null;

  for (const desc of WebAssembly.Module.imports(module)) {
    if (desc.kind !== "function") continue;
    const namespace = (imports[desc.module] ??= {});
    if (namespace[desc.name] !== undefined) continue;

    signatures ??= importResults(bytes, log);
    const qualified = `${desc.module}.${desc.name}`;
    const result = stubResult(signatures.get(qualified));
    log.warn("missing-function", `no host function ${qualified}; the guest gets a stub returning 0`);
    namespace[desc.name] = () => {
      log.warnOnce(`stub:${qualified}`, "missing-function", `missing function called: ${qualified}`);
      return result;
    };
    stubbed.push(qualified);
  }

  return { imports, stubbed };
}
