import { describeError } from "./errors/diagnostic.js";
import type { DiagnosticLog } from "./errors/log.js";

/**
 * The instantiated guest as seen from the host: a set of optional exports.
 *
 * Calls to absent exports are skipped. A trap inside a guest call is logged,
 * marks the guest faulted and never propagates into the host code that made
 * the call.
 */
export class Guest {
  private fault: unknown = null;

  constructor(
    private readonly exports: WebAssembly.Exports,
    private readonly log: DiagnosticLog,
  ) {}

  get memory(): WebAssembly.Memory | null {
    const memory = this.exports.memory;
    return memory instanceof WebAssembly.Memory ? memory : null;
  }

  get faulted(): boolean {
    return this.fault !== null;
  }

  get lastFault(): unknown {
    return this.fault;
  }

  has(name: string): boolean {
    return typeof this.exports[name] === "function";
  }

  exportNames(): string[] {
    return Object.keys(this.exports);
  }

  /** Call export `name`; `undefined` when it is absent, trapped or returned nothing. */
  call(name: string, ...args: number[]): number | undefined {
    const fn = this.exports[name];
    if (typeof fn !== "function") return undefined;
    let result: unknown;
    try {
      result = Reflect.apply(fn, undefined, args);
    } catch (e) {
      this.fault = e;
      this.log.error("guest-trap", `guest trapped in ${name}: ${describeError(e)}`, e);
      return undefined;
    }
    if (typeof result === "number") return result;
    if (typeof result === "bigint") return Number(result);
    return undefined;
  }

  /**
   * Ask the guest for `length` bytes of its own memory. Returns the pointer,
   * or null when the guest has no allocator export.
   */
  allocate(length: number): number | null {
    if (!this.has("allocate_vec_u8")) {
      this.log.warnOnce("no-allocator", "missing-function", "guest does not export allocate_vec_u8");
      return null;
    }
    return this.call("allocate_vec_u8", length) ?? null;
  }
}
