import type { DiagnosticLog } from "../errors/log.js";
import type { Guest } from "../guest.js";

/** A function the guest imports. Arguments and results are wasm scalars. */
export type BridgeFunction = (...args: number[]) => number | void;

/**
 * A named, versioned group of bridge functions.
 *
 * `register` runs once before the guest is instantiated; `init` once after.
 * The version is compared against the guest's `<name>_version` export.
 */
export interface BridgePlugin {
  readonly name: string;
  readonly version: number;
  register(table: CallTable): void;
  /** Runs before instantiation. Returning false refuses the load. */
  prepare?(): boolean;
  init?(guest: Guest): void;
  dispose?(): void;
}

interface Entry {
  fn: BridgeFunction;
  owner: string;
}

/** The merged import table every plugin writes into. */
export class CallTable {
  private readonly entries = new Map<string, Entry>();
  private owner = "host";

  constructor(private readonly log: DiagnosticLog) {}

  /** Run `body` with definitions attributed to `owner`. */
  withOwner(owner: string, body: () => void): void {
    const previous = this.owner;
    this.owner = owner;
    try {
      body();
    } finally {
      this.owner = previous;
    }
  }

  define(name: string, fn: BridgeFunction): void {
    const existing = this.entries.get(name);
    if (existing && existing.owner !== this.owner) {
      this.log.info("info", `plugin "${this.owner}" overrides ${name} from "${existing.owner}"`);
    }
    this.entries.set(name, { fn, owner: this.owner });
  }

  defineAll(fns: Record<string, BridgeFunction>): void {
    for (const [name, fn] of Object.entries(fns)) this.define(name, fn);
  }

  has(name: string): boolean {
    return this.entries.has(name);
  }

  get(name: string): BridgeFunction | undefined {
    return this.entries.get(name)?.fn;
  }

  ownerOf(name: string): string | undefined {
    return this.entries.get(name)?.owner;
  }

  names(): string[] {
    return [...this.entries.keys()];
  }

  toImports(): Record<string, BridgeFunction> {
    const out: Record<string, BridgeFunction> = {};
    for (const [name, entry] of this.entries) out[name] = entry.fn;
    return out;
  }
}
