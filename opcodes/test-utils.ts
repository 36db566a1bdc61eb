/**
 * Common test utilities for decoder testing
 */
import type { ByteSource } from "../ByteReader";
import { DecodeError } from "./errors";

export class MockSource implements ByteSource {
  public bytes: number[] = [];
  public pos = 0;
  public fetchByteLog: number[] = [];
  public readBytesLog: number[] = [];

  constructor(bytes: number[]) {
    this.bytes = bytes;
  }

  get offset(): number {
    return this.pos;
  }

  readByte(): number {
    if (this.pos >= this.bytes.length)
      throw new DecodeError({ kind: "UnexpectedEof", offset: this.pos, needed: 1 });
    const byte = this.bytes[this.pos++];
    this.fetchByteLog.push(byte);
    return byte;
  }

  readBytes(count: number): Uint8Array {
    this.readBytesLog.push(count);
    const available = this.bytes.length - this.pos;
    if (count > available)
      throw new DecodeError({
        kind: "UnexpectedEof",
        offset: this.pos,
        needed: count - available,
      });
    const out = Uint8Array.from(this.bytes.slice(this.pos, this.pos + count));
    this.pos += count;
    return out;
  }
}

// Minimal LEB128 and IEEE encoders for building fixtures
export function uleb(value: number | bigint): number[] {
  let v = BigInt(value);
  const out: number[] = [];
  do {
    let byte = Number(v & 0x7fn);
    v >>= 7n;
    if (v !== 0n) byte |= 0x80;
    out.push(byte);
  } while (v !== 0n);
  return out;
}

export function sleb(value: number | bigint): number[] {
  let v = BigInt(value);
  const out: number[] = [];
  for (;;) {
    const byte = Number(v & 0x7fn);
    v >>= 7n;
    const done = (v === 0n && (byte & 0x40) === 0) || (v === -1n && (byte & 0x40) !== 0);
    out.push(done ? byte : byte | 0x80);
    if (done) return out;
  }
}

export function f32le(value: number): number[] {
  const view = new DataView(new ArrayBuffer(4));
  view.setFloat32(0, value, true);
  return Array.from(new Uint8Array(view.buffer));
}

export function f64le(value: number): number[] {
  const view = new DataView(new ArrayBuffer(8));
  view.setFloat64(0, value, true);
  return Array.from(new Uint8Array(view.buffer));
}

// Run fn and hand back the DecodeError it throws
export function catchDecodeError(fn: () => unknown): DecodeError {
  try {
    fn();
  } catch (err) {
    if (err instanceof DecodeError) return err;
    throw err;
  }
  throw new Error("Expected a DecodeError, but nothing was thrown");
}
