// Guest linear-memory access.
//
// The guest owns its memory and exports it; the bridge binds to it after
// instantiation. Views are always created fresh from `memory.buffer`, since a
// grown memory detaches the previous ArrayBuffer.

import type { DiagnosticLog } from "../errors/log.js";

export interface TypedArrayConstructor<T> {
  new (buffer: ArrayBuffer, byteOffset: number, length: number): T;
  readonly BYTES_PER_ELEMENT: number;
}

const encoder = new TextEncoder();
const decoder = new TextDecoder("utf-8");

export function utf8Length(str: string): number {
  return encoder.encode(str).length;
}

export function encodeUtf8(str: string): Uint8Array {
  return encoder.encode(str);
}

export class GuestMemory {
  private memory: WebAssembly.Memory | null = null;

  constructor(private readonly log: DiagnosticLog) {}

  bind(memory: WebAssembly.Memory): void {
    this.memory = memory;
  }

  unbind(): void {
    this.memory = null;
  }

  get bound(): boolean {
    return this.memory !== null;
  }

  get byteLength(): number {
    return this.memory ? this.memory.buffer.byteLength : 0;
  }

  /**
   * Typed view of `length` elements at `ptr`. An out-of-range or misaligned
   * pointer is reported and yields an empty view.
   */
  view<T>(ctor: TypedArrayConstructor<T>, ptr: number, length: number, caller = "view"): T {
    const buffer = this.buffer(caller);
    const byteSize = length * ctor.BYTES_PER_ELEMENT;
    if (buffer === null || ptr < 0 || length < 0 || ptr + byteSize > buffer.byteLength) {
      this.log.error(
        "invalid-pointer",
        `${caller}: pointer 0x${ptr.toString(16)} with ${byteSize} bytes is outside guest memory (${buffer?.byteLength ?? 0} bytes)`,
      );
      return new ctor(new ArrayBuffer(0), 0, 0);
    }
    if (ptr % ctor.BYTES_PER_ELEMENT !== 0) {
      this.log.error(
        "invalid-pointer",
        `${caller}: pointer 0x${ptr.toString(16)} must be aligned to ${ctor.BYTES_PER_ELEMENT} bytes`,
      );
      return new ctor(new ArrayBuffer(0), 0, 0);
    }
    return new ctor(buffer, ptr, length);
  }

  bytes(ptr: number, length: number, caller = "bytes"): Uint8Array {
    return this.view(Uint8Array, ptr, length, caller);
  }

  /** Copy of `length` bytes at `ptr`, detached from guest memory. */
  copyOut(ptr: number, length: number, caller = "copyOut"): Uint8Array {
    return this.bytes(ptr, length, caller).slice();
  }

  /** Copy `data` into guest memory at `ptr`, writing at most `capacity` bytes. */
  copyIn(data: Uint8Array, ptr: number, capacity: number, caller = "copyIn"): number {
    const count = Math.min(data.length, capacity);
    const dest = this.bytes(ptr, count, caller);
    if (dest.length !== count) return 0;
    dest.set(data.subarray(0, count));
    return count;
  }

  /**
   * Decode UTF-8 at `ptr`. Decoding stops at the first NUL byte or after
   * `maxBytes` bytes; without `maxBytes` the string must be NUL-terminated.
   */
  readUtf8(ptr: number, maxBytes?: number, caller = "readUtf8"): string {
    const buffer = this.buffer(caller);
    if (buffer === null) return "";
    if (ptr < 0 || ptr > buffer.byteLength) {
      this.log.error("invalid-pointer", `${caller}: string pointer 0x${ptr.toString(16)} is outside guest memory`);
      return "";
    }
    const limit = maxBytes === undefined ? buffer.byteLength - ptr : Math.min(maxBytes, buffer.byteLength - ptr);
    const bytes = new Uint8Array(buffer, ptr, Math.max(0, limit));
    const nul = bytes.indexOf(0);
    return decoder.decode(nul === -1 ? bytes : bytes.subarray(0, nul));
  }

  /**
   * Encode `str` as UTF-8 into `[ptr, ptr + maxBytes)`. A code point that does
   * not fit whole is not written. Returns the number of bytes written; no NUL
   * terminator is added.
   */
  writeUtf8(str: string, ptr: number, maxBytes: number, caller = "writeUtf8"): number {
    const dest = this.bytes(ptr, maxBytes, caller);
    if (dest.length === 0) return 0;
    return encoder.encodeInto(str, dest).written;
  }

  readU32(ptr: number): number {
    return this.dataView(ptr, 4, "readU32")?.getUint32(ptr, true) ?? 0;
  }

  readI32(ptr: number): number {
    return this.dataView(ptr, 4, "readI32")?.getInt32(ptr, true) ?? 0;
  }

  writeI32(ptr: number, value: number): void {
    this.dataView(ptr, 4, "writeI32")?.setInt32(ptr, value, true);
  }

  writeU32(ptr: number, value: number): void {
    this.dataView(ptr, 4, "writeU32")?.setUint32(ptr, value >>> 0, true);
  }

  writeF32(ptr: number, value: number): void {
    this.dataView(ptr, 4, "writeF32")?.setFloat32(ptr, value, true);
  }

  writeU8(ptr: number, value: number): void {
    this.dataView(ptr, 1, "writeU8")?.setUint8(ptr, value);
  }

  private dataView(ptr: number, size: number, caller: string): DataView | null {
    const buffer = this.buffer(caller);
    if (buffer === null) return null;
    if (ptr <= 0 || ptr + size > buffer.byteLength) {
      this.log.error("invalid-pointer", `${caller}: pointer 0x${ptr.toString(16)} is outside guest memory`);
      return null;
    }
    return new DataView(buffer);
  }

  private buffer(caller: string): ArrayBuffer | null {
    if (this.memory === null) {
      this.log.reportOnce("memory-unbound", {
        severity: "error",
        kind: "invalid-pointer",
        message: `${caller}: guest memory accessed before the guest exported it`,
      });
      return null;
    }
    return this.memory.buffer;
  }
}
