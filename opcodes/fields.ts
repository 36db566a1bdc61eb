import type { ByteSource } from "../ByteReader";
import { DecodeError } from "./errors";
import { DataType, RefType } from "./types";

// Block type byte -> result type. 0x40 is the empty block type.
export const EMPTY_BLOCK_TYPE = 0x40;

export const DATA_TYPE_BYTES: ReadonlyMap<number, DataType> = new Map<number, DataType>([
  [0x7f, "i32"],
  [0x7e, "i64"],
  [0x7d, "f32"],
  [0x7c, "f64"],
  [0x7b, "v128"],
  [0x70, "funcref"],
  [0x6f, "externref"],
]);

/**
 * Read a LEB128 integer of at most `bits` bits. Signed values are sign-extended
 * from bit 6 of the final byte. In a full-length encoding the unused high bits
 * of the final byte must be zero, or copies of the sign bit when signed.
 */
function readLeb128(src: ByteSource, bits: 32 | 64, signed: boolean): bigint {
  const maxBytes = Math.ceil(bits / 7);
  let result = 0n;
  let shift = 0n;
  let count = 0;
  let byte: number;

  do {
    if (count === maxBytes) throw new DecodeError({ kind: "IntegerTooLong", bits });
    byte = src.readByte();
    count++;
    result |= BigInt(byte & 0x7f) << shift;
    shift += 7n;
  } while (byte & 0x80);

  if (count === maxBytes) checkFinalByte(byte, bits - 7 * (maxBytes - 1), bits, signed);

  if (signed) {
    if (byte & 0x40) result -= 1n << shift;
    return BigInt.asIntN(bits, result);
  }
  return BigInt.asUintN(bits, result);
}

// `used` is how many low bits of the final byte belong to the value
function checkFinalByte(byte: number, used: number, bits: 32 | 64, signed: boolean): void {
  const mask = signed ? 0x7f & ~((1 << (used - 1)) - 1) : 0x7f & ~((1 << used) - 1);
  const high = byte & mask;
  if (high !== 0 && !(signed && high === mask)) {
    throw new DecodeError({ kind: "IntegerOverflow", bits });
  }
}

export function readU32(src: ByteSource): number {
  return Number(readLeb128(src, 32, false));
}

export function readI32(src: ByteSource): number {
  return Number(readLeb128(src, 32, true));
}

export function readU64(src: ByteSource): bigint {
  return readLeb128(src, 64, false);
}

export function readI64(src: ByteSource): bigint {
  return readLeb128(src, 64, true);
}

function view(bytes: Uint8Array): DataView {
  return new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
}

export function readF32(src: ByteSource): number {
  return view(src.readBytes(4)).getFloat32(0, true);
}

export function readF64(src: ByteSource): number {
  return view(src.readBytes(8)).getFloat64(0, true);
}

// Indices are plain u32s; range checks belong to whoever resolves them
export const readIndex = readU32;

export function readBlockType(src: ByteSource): DataType | null {
  const byte = src.readByte();
  if (byte === EMPTY_BLOCK_TYPE) return null;
  const type = DATA_TYPE_BYTES.get(byte);
  if (!type) throw new DecodeError({ kind: "InvalidDataType", byte });
  return type;
}

export function readValType(src: ByteSource): DataType {
  const byte = src.readByte();
  const type = DATA_TYPE_BYTES.get(byte);
  if (!type) throw new DecodeError({ kind: "InvalidDataType", byte });
  return type;
}

export function readRefType(src: ByteSource): RefType {
  const byte = src.readByte();
  const type = DATA_TYPE_BYTES.get(byte);
  if (type !== "funcref" && type !== "externref") {
    throw new DecodeError({ kind: "InvalidDataType", byte });
  }
  return type;
}

// u32 count, then one value type per entry
export function readValTypes(src: ByteSource): DataType[] {
  const count = readU32(src);
  const types: DataType[] = [];
  for (let i = 0; i < count; i++) types.push(readValType(src));
  return types;
}
