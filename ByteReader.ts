import { DecodeError } from "./opcodes/errors";

/**
 * The only capability the decoder needs from its environment: synchronous
 * reads that fail fast instead of waiting for more data.
 */
interface ByteSource {
  readonly offset: number; // position of the next byte to be read
  readByte(): number;
  readBytes(count: number): Uint8Array;
}

class ByteReader implements ByteSource {
  private pos: number;

  constructor(
    private readonly bytes: Uint8Array,
    start = 0,
  ) {
    if (start < 0 || start > bytes.length)
      throw new RangeError(`Start offset ${start} outside 0..${bytes.length}`);
    this.pos = start;
  }

  get offset(): number {
    return this.pos;
  }

  remaining(): number {
    return this.bytes.length - this.pos;
  }

  isEof(): boolean {
    return this.pos >= this.bytes.length;
  }

  readByte(): number {
    if (this.pos >= this.bytes.length)
      throw new DecodeError({ kind: "UnexpectedEof", offset: this.pos, needed: 1 });
    return this.bytes[this.pos++];
  }

  readBytes(count: number): Uint8Array {
    const available = this.bytes.length - this.pos;
    if (count > available) {
      // Nothing is consumed on failure
      throw new DecodeError({
        kind: "UnexpectedEof",
        offset: this.pos,
        needed: count - available,
      });
    }
    const out = this.bytes.subarray(this.pos, this.pos + count);
    this.pos += count;
    return out;
  }
}

export { ByteReader };
export type { ByteSource };
