export { ByteReader } from "./ByteReader";
export type { ByteSource } from "./ByteReader";
export { Decoder, formatInstruction, toJSON } from "./Decoder";
export { decodeBlock, decodeOne } from "./opcodes/decode";
export { DecodeError, OpcodeTableError } from "./opcodes/errors";
export type { DecodeErrorInfo, DecodeErrorKind } from "./opcodes/errors";
export { buildTables, findByName, lookupPrimary, lookupSecondary } from "./opcodes/tables";
export {
  DEFAULT_MAX_DEPTH,
  FIELD_KINDS,
  INDEX_KINDS,
} from "./opcodes/types";
export type {
  ControlKind,
  DataType,
  DecodeOptions,
  DecodedBlock,
  FieldKind,
  IndexKind,
  InstrDescriptor,
  Instruction,
  Operand,
  RefType,
} from "./opcodes/types";
