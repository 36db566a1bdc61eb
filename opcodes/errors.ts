// Errors raised while decoding an instruction stream or loading the opcode table

export type DecodeErrorInfo =
  | { kind: "UnsupportedOpcode"; byte: number; prefix?: number }
  | { kind: "UnexpectedEof"; offset: number; needed: number }
  | { kind: "NestingTooDeep"; limit: number }
  | { kind: "InvalidDataType"; byte: number }
  | { kind: "IntegerTooLong"; bits: 32 | 64 }
  | { kind: "IntegerOverflow"; bits: 32 | 64 }
  | { kind: "UnexpectedElse"; offset: number };

export type DecodeErrorKind = DecodeErrorInfo["kind"];

const hex = (n: number) => `0x${n.toString(16).padStart(2, "0")}`;

function messageFor(info: DecodeErrorInfo): string {
  switch (info.kind) {
    case "UnsupportedOpcode":
      return info.prefix === undefined
        ? `Unsupported opcode ${hex(info.byte)}`
        : `Unsupported opcode ${hex(info.prefix)} ${hex(info.byte)}`;
    case "UnexpectedEof":
      return `Unexpected end of input at offset ${info.offset} (needed ${info.needed} more byte${info.needed === 1 ? "" : "s"})`;
    case "NestingTooDeep":
      return `Block nesting exceeds limit of ${info.limit}`;
    case "InvalidDataType":
      return `Invalid type byte ${hex(info.byte)}`;
    case "IntegerTooLong":
      return `LEB128 encoding too long for a ${info.bits}-bit integer`;
    case "IntegerOverflow":
      return `LEB128 value does not fit a ${info.bits}-bit integer`;
    case "UnexpectedElse":
      return `Unexpected else at offset ${info.offset}`;
  }
}

/**
 * Thrown for any malformed input. A decode that throws has produced nothing:
 * the caller gets no partial instruction tree.
 */
export class DecodeError extends Error {
  readonly info: DecodeErrorInfo;

  constructor(info: DecodeErrorInfo) {
    super(messageFor(info));
    this.name = "DecodeError";
    this.info = info;
  }

  get kind(): DecodeErrorKind {
    return this.info.kind;
  }
}

/** Thrown while building the dispatch tables when the opcode data is inconsistent. */
export class OpcodeTableError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "OpcodeTableError";
  }
}
