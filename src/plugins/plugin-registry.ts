import { describeError } from "../errors/diagnostic.js";
import type { DiagnosticLog } from "../errors/log.js";
import type { Guest } from "../guest.js";
import { CallTable, type BridgePlugin } from "./plugin.js";

/**
 * Holds the plugin list for one load and runs the plugin lifecycle:
 * add → register → prepare → (instantiate) → init + version check → dispose.
 */
export class PluginRegistry {
  private readonly plugins: BridgePlugin[] = [];
  private sealed = false;

  constructor(private readonly log: DiagnosticLog) {}

  get list(): readonly BridgePlugin[] {
    return this.plugins;
  }

  add(plugin: BridgePlugin): boolean {
    if (this.sealed) {
      this.log.warn("info", `plugin "${plugin.name}" added after registration; ignored`);
      return false;
    }
    if (this.plugins.some((p) => p.name === plugin.name)) {
      this.log.warn("info", `plugin "${plugin.name}" is already registered; ignored`);
      return false;
    }
    this.plugins.push(plugin);
    return true;
  }

  /** Merge every plugin's functions into one table. Seals the list. */
  register(): CallTable {
    this.sealed = true;
    const table = new CallTable(this.log);
    for (const plugin of this.plugins) {
      table.withOwner(plugin.name, () => plugin.register(table));
    }
    return table;
  }

  /** False as soon as one plugin refuses the load. */
  prepare(): boolean {
    for (const plugin of this.plugins) {
      if (plugin.prepare && !plugin.prepare()) {
        this.log.error("load-failure", `plugin "${plugin.name}" refused to load`);
        return false;
      }
    }
    return true;
  }

  init(guest: Guest): void {
    for (const plugin of this.plugins) {
      try {
        plugin.init?.(guest);
      } catch (e) {
        this.log.error("load-failure", `plugin "${plugin.name}" failed to initialise: ${describeError(e)}`, e);
      }
      this.checkVersion(plugin, guest);
    }
  }

  dispose(): void {
    for (const plugin of [...this.plugins].reverse()) {
      try {
        plugin.dispose?.();
      } catch (e) {
        this.log.warn("info", `plugin "${plugin.name}" failed to dispose: ${describeError(e)}`, e);
      }
    }
  }

  private checkVersion(plugin: BridgePlugin, guest: Guest): void {
    const exportName = `${plugin.name}_version`;
    if (!guest.has(exportName)) {
      this.log.info("info", `plugin "${plugin.name}" is present on the host but the guest does not declare ${exportName}`);
      return;
    }
    const guestVersion = guest.call(exportName);
    if (guestVersion !== plugin.version) {
      this.log.warn(
        "version-mismatch",
        `plugin "${plugin.name}" version mismatch: host version ${plugin.version}, guest version ${guestVersion ?? "unknown"}`,
      );
    }
  }
}
