import type { BridgeContext } from "../context.js";
import { describeError } from "../errors/diagnostic.js";
import { IdCounter } from "../handles/handle-registry.js";
import { PendingTable } from "../handles/pending-table.js";
import type { HostFetchResponse } from "../host/host.js";
import type { BridgePlugin, CallTable } from "../plugins/plugin.js";

export const FS_PLUGIN_VERSION = 1;

export interface FilePlugin extends BridgePlugin {
  /** Start loading `path`; the guest's `file_loaded(id)` runs when it settles. */
  load(path: string): number;
  /** Loads not yet handed out or discarded. */
  readonly outstanding: number;
}

/**
 * File fetch with a completion callback. Files settle to their bytes, or to
 * null on failure; either way `file_loaded` is called exactly once.
 */
export function createFilePlugin(ctx: BridgeContext): FilePlugin {
  const { log, memory } = ctx;
  const files = new PendingTable<Uint8Array | null>(new IdCounter(0));
  let disposed = false;

  function complete(id: number, data: Uint8Array | null): void {
    if (disposed || !files.settle(id, data)) return;
    ctx.guest?.call("file_loaded", id);
  }

  function load(path: string): number {
    const id = files.open();
    const fetch = ctx.host.fetch;
    if (fetch === undefined) {
      log.warnOnce("fs-unavailable", "missing-capability", "host cannot fetch files");
      queueMicrotask(() => complete(id, null));
      return id;
    }
    const fail = (message: string, detail?: unknown): void => {
      log.error("async-failure", `failed to load ${path} (file ${id}): ${message}`, detail);
      complete(id, null);
    };
    let pending: Promise<HostFetchResponse>;
    try {
      pending = fetch(path, { method: "GET", headers: {} });
    } catch (e) {
      // Never call back into the guest from inside fs_load_file.
      queueMicrotask(() => fail(describeError(e), e));
      return id;
    }
    pending
      .then(async (response) => {
        if (!response.ok) {
          fail(`HTTP ${response.status}`);
          return;
        }
        complete(id, new Uint8Array(await response.arrayBuffer()));
      })
      .catch((e: unknown) => fail(describeError(e), e));
    return id;
  }

  function register(table: CallTable): void {
    table.defineAll({
      fs_load_file: (ptr, len) => load(memory.readUtf8(ptr, len, "fs_load_file")),
      fs_get_buffer_size(id) {
        const data = files.peek(id);
        if (data === null) files.discard(id);
        return data?.length ?? -1;
      },
      fs_take_buffer(id, ptr, len) {
        const data = files.peek(id);
        if (data === undefined || data === null) {
          // A failed load is reported once; the entry goes with it.
          if (data === null) files.discard(id);
          log.error("invalid-handle", `fs_take_buffer: file ${id} has no loaded buffer`);
          return;
        }
        if (data.length > len) {
          log.error("invalid-pointer", `fs_take_buffer: file ${id} is ${data.length} bytes but the destination holds ${len}`);
        }
        memory.copyIn(data, ptr, len, "fs_take_buffer");
        files.take(id);
      },
    });
  }

  return {
    name: "fs",
    version: FS_PLUGIN_VERSION,
    load,
    register,
    get outstanding() {
      return files.size;
    },
    dispose() {
      disposed = true;
    },
  };
}
