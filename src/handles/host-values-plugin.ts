import type { BridgeContext } from "../context.js";
import { encodeUtf8 } from "../memory/guest-memory.js";
import type { BridgePlugin, CallTable } from "../plugins/plugin.js";
import {
  bytesValue,
  numberValue,
  recordValue,
  stringValue,
  UNDEFINED_HANDLE,
  type HostValue,
  type RecordField,
} from "./host-values.js";

export const HOST_VALUES_PLUGIN_VERSION = 1;

/** Guest access to the host-value table: create, read fields, unwrap, free. */
export function createHostValuesPlugin(ctx: BridgeContext): BridgePlugin {
  const { memory, hostValues: values, log } = ctx;

  function fieldName(ptr: number, len: number): string {
    return memory.readUtf8(ptr, len, "field name");
  }

  function field(handle: number, ptr: number, len: number, caller: string): RecordField | undefined {
    return values.getRecord(handle, caller)?.get(fieldName(ptr, len));
  }

  function fieldNumber(handle: number, ptr: number, len: number, caller: string): number {
    const value = field(handle, ptr, len, caller);
    if (typeof value === "number") return value;
    if (value?.kind === "number") return value.value;
    log.error("invalid-handle", `${caller}: field "${fieldName(ptr, len)}" of host value ${handle} is not a number`);
    return 0;
  }

  function setField(handle: number, ptr: number, len: number, value: RecordField, caller: string): void {
    values.getRecord(handle, caller)?.set(fieldName(ptr, len), value);
  }

  // Bytes of a string or byte value; null for anything else.
  function payload(handle: number, caller: string): Uint8Array | null {
    const value = values.get(handle, caller);
    if (value === null) return null;
    if (value.kind === "string") return encodeUtf8(value.value);
    if (value.kind === "bytes") return value.value;
    log.error("invalid-handle", `${caller}: host value ${handle} is a ${value.kind}, which has no byte form`);
    return null;
  }

  function register(table: CallTable): void {
    table.defineAll({
      js_create_string(ptr, len) {
        return values.wrap(stringValue(memory.readUtf8(ptr, len, "js_create_string")));
      },
      js_create_buffer(ptr, len) {
        return values.wrap(bytesValue(memory.copyOut(ptr, len, "js_create_buffer")));
      },
      js_create_object() {
        return values.wrap(recordValue());
      },
      js_set_field_f32(handle, ptr, len, value) {
        setField(handle, ptr, len, value, "js_set_field_f32");
      },
      js_set_field_u32(handle, ptr, len, value) {
        setField(handle, ptr, len, value >>> 0, "js_set_field_u32");
      },
      js_set_field_string(handle, ptr, len, strPtr, strLen) {
        const str = memory.readUtf8(strPtr, strLen, "js_set_field_string");
        setField(handle, ptr, len, stringValue(str), "js_set_field_string");
      },
      js_have_field(handle, ptr, len) {
        return field(handle, ptr, len, "js_have_field") === undefined ? 0 : 1;
      },
      js_field(handle, ptr, len) {
        const value = field(handle, ptr, len, "js_field");
        if (value === undefined) return UNDEFINED_HANDLE;
        const wrapped: HostValue = typeof value === "number" ? numberValue(value) : value;
        return values.wrap(wrapped);
      },
      js_field_num(handle, ptr, len) {
        return fieldNumber(handle, ptr, len, "js_field_num");
      },
      js_field_f32(handle, ptr, len) {
        return fieldNumber(handle, ptr, len, "js_field_f32");
      },
      js_field_u32(handle, ptr, len) {
        return fieldNumber(handle, ptr, len, "js_field_u32") >>> 0;
      },
      js_string_length(handle) {
        const str = values.getString(handle, "js_string_length");
        return str === null ? 0 : encodeUtf8(str).length;
      },
      js_buf_length(handle) {
        return values.getBytes(handle, "js_buf_length")?.length ?? 0;
      },
      js_unwrap_to_str(handle, ptr, len) {
        const str = values.getString(handle, "js_unwrap_to_str");
        if (str !== null) memory.writeUtf8(str, ptr, len, "js_unwrap_to_str");
      },
      js_unwrap_to_buf(handle, ptr, len) {
        const data = payload(handle, "js_unwrap_to_buf");
        if (data !== null) memory.copyIn(data, ptr, len, "js_unwrap_to_buf");
      },
      js_free_object(handle) {
        values.free(handle, "js_free_object");
      },
    });
  }

  return { name: "hostvalues", version: HOST_VALUES_PLUGIN_VERSION, register };
}
