// Reads the result types of a module's function imports from its binary.
// Only the type and import sections are decoded.

export type ValueType = "i32" | "i64" | "f32" | "f64" | "v128" | "funcref" | "externref";

const VALUE_TYPES: Record<number, ValueType> = {
  0x7f: "i32",
  0x7e: "i64",
  0x7d: "f32",
  0x7c: "f64",
  0x7b: "v128",
  0x70: "funcref",
  0x6f: "externref",
};

const SECTION_TYPE = 1;
const SECTION_IMPORT = 2;
const FUNC_FORM = 0x60;

const IMPORT_FUNCTION = 0;
const IMPORT_TABLE = 1;
const IMPORT_MEMORY = 2;
const IMPORT_GLOBAL = 3;
const IMPORT_TAG = 4;

class BinaryReader {
  private pos = 0;
  private readonly decoder = new TextDecoder();

  constructor(private readonly bytes: Uint8Array) {}

  get done(): boolean {
    return this.pos >= this.bytes.length;
  }

  get offset(): number {
    return this.pos;
  }

  byte(): number {
    const b = this.bytes[this.pos];
    if (b === undefined) throw new Error(`unexpected end of module at byte ${this.pos}`);
    this.pos++;
    return b;
  }

  u32(): number {
    let result = 0;
    let shift = 0;
    for (;;) {
      const b = this.byte();
      result += (b & 0x7f) * 2 ** shift;
      if ((b & 0x80) === 0) return result;
      shift += 7;
      if (shift > 63) throw new Error(`LEB128 value too long at byte ${this.pos}`);
    }
  }

  name(): string {
    const len = this.u32();
    const end = this.pos + len;
    if (end > this.bytes.length) throw new Error(`name runs past the end of the module at byte ${this.pos}`);
    const text = this.decoder.decode(this.bytes.subarray(this.pos, end));
    this.pos = end;
    return text;
  }

  valueType(): ValueType {
    const code = this.byte();
    const type = VALUE_TYPES[code];
    if (type === undefined) throw new Error(`unsupported value type 0x${code.toString(16)}`);
    return type;
  }

  skip(count: number): void {
    this.pos += count;
  }

  limits(): void {
    const flags = this.byte();
    this.u32();
    if ((flags & 1) !== 0) this.u32();
  }
}

function readTypes(reader: BinaryReader): ValueType[][] {
  const results: ValueType[][] = [];
  const count = reader.u32();
  for (let i = 0; i < count; i++) {
    const form = reader.byte();
    if (form !== FUNC_FORM) throw new Error(`unsupported type form 0x${form.toString(16)}`);
    const params = reader.u32();
    for (let p = 0; p < params; p++) reader.valueType();
    const resultCount = reader.u32();
    const types: ValueType[] = [];
    for (let r = 0; r < resultCount; r++) types.push(reader.valueType());
    results.push(types);
  }
  return results;
}

/**
 * Map `module.name` of every function import to its result types.
 * Throws when the binary uses a type encoding this reader does not know.
 */
export function readImportResults(bytes: Uint8Array): Map<string, ValueType[]> {
  const reader = new BinaryReader(bytes);
  const out = new Map<string, ValueType[]>();
  reader.skip(8); // magic and version

  let types: ValueType[][] = [];
  while (!reader.done) {
    const id = reader.byte();
    const size = reader.u32();
    if (id === SECTION_TYPE) {
      types = readTypes(reader);
      continue;
    }
    if (id !== SECTION_IMPORT) {
      reader.skip(size);
      continue;
    }
    const count = reader.u32();
    for (let i = 0; i < count; i++) {
      const qualified = `${reader.name()}.${reader.name()}`;
      const kind = reader.byte();
      switch (kind) {
        case IMPORT_FUNCTION: {
          const index = reader.u32();
          const signature = types[index];
          if (signature === undefined) throw new Error(`import ${qualified} names missing type ${index}`);
          out.set(qualified, signature);
          break;
        }
        case IMPORT_TABLE:
          reader.byte();
          reader.limits();
          break;
        case IMPORT_MEMORY:
          reader.limits();
          break;
        case IMPORT_GLOBAL:
          reader.valueType();
          reader.byte();
          break;
        case IMPORT_TAG:
          reader.byte();
          reader.u32();
          break;
        default:
          throw new Error(`unknown import kind ${kind} at byte ${reader.offset}`);
      }
    }
    // Nothing after the import section is needed.
    break;
  }
  return out;
}

export type DefaultValue = number | bigint | null;

export function defaultValueOf(type: ValueType): DefaultValue {
  switch (type) {
    case "i64":
      return 0n;
    case "funcref":
    case "externref":
      return null;
    default:
      return 0;
  }
}
