import { resolveConfig } from "../config.js";
import { BridgeContext } from "../context.js";
import { DiagnosticLog } from "../errors/log.js";
import { createHeadlessHost } from "../host/headless.js";
import { createDefaultPlugins, defaultPluginList } from "./defaults.js";
import { HOST_MODULE } from "./missing-imports.js";
import type { CallTable } from "./plugin.js";
import { PluginRegistry } from "./plugin-registry.js";

export interface PluginSummary {
  name: string;
  version: number;
  functions: string[];
}

export interface ModuleReport {
  /** Function imports the host provides, with the providing plugin. */
  provided: { name: string; plugin: string }[];
  /** Function imports that would be stubbed. */
  missing: string[];
  /** `<plugin>_version` exports the guest declares. */
  versionExports: string[];
  hasMain: boolean;
  hasFrame: boolean;
}

/** The default call table, built against a headless host without loading a guest. */
export function defaultCallTable(): { table: CallTable; plugins: PluginSummary[] } {
  const ctx = new BridgeContext(resolveConfig({}, {}), createHeadlessHost(), new DiagnosticLog({ sink: () => {} }));
  const registry = new PluginRegistry(ctx.log);
  for (const plugin of defaultPluginList(createDefaultPlugins(ctx))) registry.add(plugin);
  const table = registry.register();
  const plugins = registry.list.map((plugin) => ({
    name: plugin.name,
    version: plugin.version,
    functions: table.names().filter((name) => table.ownerOf(name) === plugin.name),
  }));
  return { table, plugins };
}

/** Compare a compiled module's imports and exports against the default call table. */
export function inspectModule(module: WebAssembly.Module): ModuleReport {
  const { table } = defaultCallTable();
  const report: ModuleReport = { provided: [], missing: [], versionExports: [], hasMain: false, hasFrame: false };

  for (const desc of WebAssembly.Module.imports(module)) {
    if (desc.kind !== "function") continue;
    const owner = desc.module === HOST_MODULE ? table.ownerOf(desc.name) : undefined;
    if (owner === undefined) report.missing.push(`${desc.module}.${desc.name}`);
    else report.provided.push({ name: desc.name, plugin: owner });
  }
  for (const desc of WebAssembly.Module.exports(module)) {
    if (desc.kind !== "function") continue;
    if (desc.name.endsWith("_version")) report.versionExports.push(desc.name);
    if (desc.name === "main") report.hasMain = true;
    if (desc.name === "frame") report.hasFrame = true;
  }
  return report;
}
