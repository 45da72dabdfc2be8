import type { BridgeConfig } from "./config.js";
import { describeError, type DiagnosticKind } from "./errors/diagnostic.js";
import { DiagnosticLog } from "./errors/log.js";
import type { Guest } from "./guest.js";
import { HostValues } from "./handles/host-values.js";
import type { HostEnvironment } from "./host/host.js";
import { GuestMemory } from "./memory/guest-memory.js";

/**
 * Everything one loaded guest shares across bridges. Each plugin receives
 * the context at construction; there is no module-level state.
 */
export class BridgeContext {
  readonly log: DiagnosticLog;
  readonly memory: GuestMemory;
  readonly hostValues: HostValues;

  private attached: Guest | null = null;
  private haltReason: string | null = null;
  private readonly gestureListeners: (() => void)[] = [];
  private readonly disposers: (() => void)[] = [];

  constructor(
    readonly config: BridgeConfig,
    readonly host: HostEnvironment,
    log?: DiagnosticLog,
  ) {
    this.log = log ?? new DiagnosticLog({ minSeverity: config.logLevel, limit: config.diagnosticsLimit });
    this.memory = new GuestMemory(this.log);
    this.hostValues = new HostValues(this.log);
  }

  get guest(): Guest | null {
    return this.attached;
  }

  attach(guest: Guest): void {
    this.attached = guest;
    const memory = guest.memory;
    if (memory) {
      this.memory.bind(memory);
    } else {
      this.log.warn("load-failure", "guest does not export its memory; pointer arguments cannot be read");
    }
  }

  get halted(): boolean {
    return this.haltReason !== null;
  }

  get haltMessage(): string | null {
    return this.haltReason;
  }

  /** Stop the bridge with a fatal diagnostic the user gets to see. */
  halt(kind: DiagnosticKind, message: string): void {
    if (this.haltReason !== null) return;
    this.haltReason = message;
    this.log.error(kind, message);
    try {
      this.host.window.alert(message);
    } catch (e) {
      this.log.error(kind, `could not show alert: ${describeError(e)}`, e);
    }
  }

  onUserGesture(listener: () => void): void {
    this.gestureListeners.push(listener);
  }

  notifyUserGesture(): void {
    for (const listener of this.gestureListeners) listener();
  }

  onDispose(disposer: () => void): void {
    this.disposers.push(disposer);
  }

  dispose(): void {
    while (this.disposers.length > 0) {
      const disposer = this.disposers.pop();
      if (disposer === undefined) break;
      try {
        disposer();
      } catch (e) {
        this.log.warn("info", `teardown step failed: ${describeError(e)}`, e);
      }
    }
    this.gestureListeners.length = 0;
    this.memory.unbind();
    this.attached = null;
  }
}
