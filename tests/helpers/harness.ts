import { resolveConfig, type BridgeConfig } from "../../src/config.js";
import { BridgeContext } from "../../src/context.js";
import { DiagnosticLog } from "../../src/errors/log.js";
import { Guest } from "../../src/guest.js";
import type { HostEnvironment } from "../../src/host/host.js";
import { PluginRegistry } from "../../src/plugins/plugin-registry.js";
import type { BridgePlugin, CallTable } from "../../src/plugins/plugin.js";
import { createFakeHost } from "./fake-host.js";

export interface GuestCall {
  name: string;
  args: number[];
}

// Guest exports the bridge calls into. Each one is recorded.
const RECORDED_EXPORTS = [
  "frame",
  "resize",
  "mouse_move",
  "raw_mouse_move",
  "mouse_down",
  "mouse_up",
  "mouse_wheel",
  "key_down",
  "key_up",
  "key_press",
  "touch",
  "focus",
  "on_clipboard_paste",
  "on_files_dropped_start",
  "on_file_dropped",
  "on_files_dropped_finish",
  "file_loaded",
];

/** First byte the harness allocator hands out. */
export const HEAP_BASE = 1024;

export interface HarnessOptions<H extends HostEnvironment> {
  host?: H;
  config?: Partial<BridgeConfig>;
  /** Extra or replacement guest exports. */
  exports?: Record<string, Function>;
}

/**
 * A bridge over a stand-in guest: one page of real wasm memory, a bump
 * allocator and recording event exports. Bridge functions are called
 * through the same call table a real guest would import.
 */
export class Harness<P extends BridgePlugin[], H extends HostEnvironment> {
  readonly log = new DiagnosticLog({ sink: () => {}, minSeverity: "debug" });
  readonly ctx: BridgeContext;
  readonly memory = new WebAssembly.Memory({ initial: 1 });
  readonly calls: GuestCall[] = [];
  readonly registry: PluginRegistry;
  readonly table: CallTable;
  readonly plugins: P;
  readonly guest: Guest;
  private heap = HEAP_BASE;

  constructor(
    readonly host: H,
    createPlugins: (ctx: BridgeContext) => P,
    options: HarnessOptions<H> = {},
  ) {
    this.ctx = new BridgeContext(resolveConfig(options.config, {}), host, this.log);
    this.plugins = createPlugins(this.ctx);
    this.registry = new PluginRegistry(this.log);
    for (const plugin of this.plugins) this.registry.add(plugin);
    this.table = this.registry.register();
    this.registry.prepare();

    const exports: Record<string, Function | WebAssembly.Memory> = {
      memory: this.memory,
      allocate_vec_u8: (len: number) => this.alloc(len),
    };
    for (const name of RECORDED_EXPORTS) {
      exports[name] = (...args: number[]) => {
        this.calls.push({ name, args });
      };
    }
    Object.assign(exports, options.exports ?? {});
    this.guest = new Guest(exports, this.log);
    this.ctx.attach(this.guest);
    this.registry.init(this.guest);
  }

  /** Call bridge function `name` the way the guest would. */
  invoke(name: string, ...args: number[]): number | void {
    const fn = this.table.get(name);
    if (fn === undefined) throw new Error(`no bridge function ${name}`);
    return fn(...args);
  }

  callsTo(name: string): number[][] {
    return this.calls.filter((c) => c.name === name).map((c) => c.args);
  }

  alloc(len: number): number {
    const ptr = this.heap;
    this.heap += Math.ceil(Math.max(len, 1) / 8) * 8;
    return ptr;
  }

  bytes(ptr: number, len: number): Uint8Array {
    return new Uint8Array(this.memory.buffer, ptr, len).slice();
  }

  writeBytes(data: Uint8Array): number {
    const ptr = this.alloc(data.length);
    new Uint8Array(this.memory.buffer, ptr, data.length).set(data);
    return ptr;
  }

  /** Copy `text` into guest memory without a terminator. */
  writeString(text: string): { ptr: number; len: number } {
    const data = new TextEncoder().encode(text);
    return { ptr: this.writeBytes(data), len: data.length };
  }

  /** Copy `text` into guest memory followed by a NUL. */
  writeCString(text: string): number {
    const data = new TextEncoder().encode(`${text}\0`);
    return this.writeBytes(data);
  }

  readString(ptr: number, len: number): string {
    return new TextDecoder().decode(this.bytes(ptr, len));
  }

  writeI32s(values: number[]): number {
    const ptr = this.alloc(values.length * 4);
    const view = new DataView(this.memory.buffer);
    values.forEach((v, i) => view.setInt32(ptr + i * 4, v, true));
    return ptr;
  }

  writeF32s(values: number[]): number {
    const ptr = this.alloc(values.length * 4);
    const view = new DataView(this.memory.buffer);
    values.forEach((v, i) => view.setFloat32(ptr + i * 4, v, true));
    return ptr;
  }

  readI32(ptr: number): number {
    return new DataView(this.memory.buffer).getInt32(ptr, true);
  }

  readU32(ptr: number): number {
    return new DataView(this.memory.buffer).getUint32(ptr, true);
  }

  messages(kind?: string): string[] {
    return this.log.entries.filter((d) => kind === undefined || d.kind === kind).map((d) => d.message);
  }
}

export function createHarness<P extends BridgePlugin[]>(
  createPlugins: (ctx: BridgeContext) => P,
  options: HarnessOptions<ReturnType<typeof createFakeHost>> = {},
): Harness<P, ReturnType<typeof createFakeHost>> {
  return new Harness(options.host ?? createFakeHost(), createPlugins, options);
}
