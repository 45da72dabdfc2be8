import { resolveConfig, type BridgeConfig } from "./config.js";
import { BridgeContext } from "./context.js";
import { describeError, error, type BridgeDiagnostic } from "./errors/diagnostic.js";
import { DiagnosticLog, type LogSink } from "./errors/log.js";
import { Guest } from "./guest.js";
import type { HostEnvironment } from "./host/host.js";
import { createDefaultPlugins, defaultPluginList, type DefaultPlugins } from "./plugins/defaults.js";
import { planImports } from "./plugins/missing-imports.js";
import type { BridgePlugin } from "./plugins/plugin.js";
import { PluginRegistry } from "./plugins/plugin-registry.js";

export interface LoadOptions {
  config?: Partial<BridgeConfig>;
  /** Extra plugins, registered after the defaults. */
  plugins?: (ctx: BridgeContext) => BridgePlugin[];
  sink?: LogSink;
  /** Environment consulted for configuration; defaults to `process.env`. */
  env?: NodeJS.ProcessEnv;
}

export interface Bridge {
  readonly ctx: BridgeContext;
  readonly guest: Guest;
  readonly plugins: DefaultPlugins;
  readonly registry: PluginRegistry;
  /** `module.name` of every import satisfied by a stub. */
  readonly stubbed: readonly string[];
  dispose(): void;
}

export type LoadResult =
  | { ok: true; bridge: Bridge; instance: WebAssembly.Instance }
  | { ok: false; errors: BridgeDiagnostic[]; log: DiagnosticLog };

function toBinary(source: Uint8Array | ArrayBuffer): BufferSource {
  return source instanceof ArrayBuffer ? source : new Uint8Array(source);
}

function toBytes(source: Uint8Array | ArrayBuffer): Uint8Array {
  return source instanceof ArrayBuffer ? new Uint8Array(source) : source;
}

function failure(log: DiagnosticLog, message: string): LoadResult {
  log.report(error("load-failure", message));
  return { ok: false, errors: log.errors(), log };
}

/**
 * Load a guest module against `host`: build the call table, instantiate,
 * run plugin initialisation and version checks, then call `main`.
 */
export async function loadGuest(
  source: Uint8Array | ArrayBuffer | WebAssembly.Module,
  host: HostEnvironment,
  options: LoadOptions = {},
): Promise<LoadResult> {
  const config = resolveConfig(options.config, options.env);
  const log = new DiagnosticLog({ sink: options.sink, minSeverity: config.logLevel, limit: config.diagnosticsLimit });
  const ctx = new BridgeContext(config, host, log);

  const plugins = createDefaultPlugins(ctx);
  const registry = new PluginRegistry(log);
  for (const plugin of defaultPluginList(plugins)) registry.add(plugin);
  for (const plugin of options.plugins?.(ctx) ?? []) registry.add(plugin);

  const table = registry.register();
  if (!registry.prepare() || ctx.halted) {
    registry.dispose();
    return failure(log, "a plugin refused to load the guest");
  }

  let module: WebAssembly.Module;
  let instance: WebAssembly.Instance;
  let stubbed: string[];
  try {
    const bytes = source instanceof WebAssembly.Module ? null : toBytes(source);
    module = source instanceof WebAssembly.Module ? source : await WebAssembly.compile(toBinary(source));
    const plan = planImports(module, table, log, bytes);
    stubbed = plan.stubbed;
    instance = await WebAssembly.instantiate(module, plan.imports);
  } catch (e) {
    registry.dispose();
    return failure(log, `could not instantiate the guest: ${describeError(e)}`);
  }

  const guest = new Guest(instance.exports, log);
  ctx.attach(guest);
  registry.init(guest);

  const bridge: Bridge = {
    ctx,
    guest,
    plugins,
    registry,
    stubbed,
    dispose() {
      registry.dispose();
      ctx.dispose();
    },
  };

  if (guest.has("main")) {
    guest.call("main");
    if (guest.faulted) {
      bridge.dispose();
      return failure(log, "guest trapped in main");
    }
  } else {
    log.warn("missing-function", "guest does not export main; nothing was started");
  }

  return { ok: true, bridge, instance };
}
