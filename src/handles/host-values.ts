import type { DiagnosticLog } from "../errors/log.js";
import { HandleRegistry, IdCounter } from "./handle-registry.js";

// Host values are the second handle table: arbitrary host data the guest
// moves around by id (request URLs, headers, received messages, ...).

export type HostValue =
  | { kind: "string"; value: string }
  | { kind: "bytes"; value: Uint8Array }
  | { kind: "number"; value: number }
  | { kind: "record"; fields: Map<string, RecordField> };

export type RecordField = number | HostValue;

export const NULL_HANDLE = -1;
export const UNDEFINED_HANDLE = -2;

export function stringValue(value: string): HostValue {
  return { kind: "string", value };
}

export function bytesValue(value: Uint8Array): HostValue {
  return { kind: "bytes", value };
}

export function numberValue(value: number): HostValue {
  return { kind: "number", value };
}

export function recordValue(fields: Record<string, RecordField> = {}): HostValue {
  return { kind: "record", fields: new Map(Object.entries(fields)) };
}

export class HostValues {
  private readonly table: HandleRegistry<HostValue>;

  constructor(private readonly log: DiagnosticLog) {
    this.table = new HandleRegistry<HostValue>("host value", log, new IdCounter(0));
  }

  get size(): number {
    return this.table.size;
  }

  /** Store `value` and return its handle; `null` and `undefined` map to the sentinels. */
  wrap(value: HostValue | null | undefined): number {
    if (value === null) return NULL_HANDLE;
    if (value === undefined) return UNDEFINED_HANDLE;
    return this.table.allocate(value);
  }

  /** `null` for a sentinel or an invalid handle; invalid handles are reported. */
  get(id: number, caller: string): HostValue | null {
    if (id === NULL_HANDLE || id === UNDEFINED_HANDLE) return null;
    return this.table.lookup(id, caller);
  }

  /** Fetch and release in one step. */
  consume(id: number, caller: string): HostValue | null {
    if (id === NULL_HANDLE || id === UNDEFINED_HANDLE) return null;
    return this.table.free(id, caller);
  }

  free(id: number, caller: string): void {
    if (id === NULL_HANDLE || id === UNDEFINED_HANDLE) return;
    this.table.free(id, caller);
  }

  getString(id: number, caller: string): string | null {
    return this.expectString(this.get(id, caller), id, caller);
  }

  getBytes(id: number, caller: string): Uint8Array | null {
    return this.expectBytes(this.get(id, caller), id, caller);
  }

  getRecord(id: number, caller: string): Map<string, RecordField> | null {
    const value = this.get(id, caller);
    if (value === null) return null;
    if (value.kind !== "record") {
      this.mismatch(id, "record", value.kind, caller);
      return null;
    }
    return value.fields;
  }

  consumeString(id: number, caller: string): string | null {
    return this.expectString(this.consume(id, caller), id, caller);
  }

  /** Record of string fields, as used for request headers. Non-string fields are skipped. */
  consumeStringRecord(id: number, caller: string): Record<string, string> {
    const value = this.consume(id, caller);
    const out: Record<string, string> = {};
    if (value === null) return out;
    if (value.kind !== "record") {
      this.mismatch(id, "record", value.kind, caller);
      return out;
    }
    for (const [name, field] of value.fields) {
      if (typeof field !== "number" && field.kind === "string") out[name] = field.value;
    }
    return out;
  }

  private expectString(value: HostValue | null, id: number, caller: string): string | null {
    if (value === null) return null;
    if (value.kind !== "string") {
      this.mismatch(id, "string", value.kind, caller);
      return null;
    }
    return value.value;
  }

  private expectBytes(value: HostValue | null, id: number, caller: string): Uint8Array | null {
    if (value === null) return null;
    if (value.kind !== "bytes") {
      this.mismatch(id, "bytes", value.kind, caller);
      return null;
    }
    return value.value;
  }

  private mismatch(id: number, expected: string, actual: string, caller: string): void {
    this.log.error("invalid-handle", `${caller}: host value ${id} is a ${actual}, expected a ${expected}`);
  }
}
