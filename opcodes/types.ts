// Strongly-typed, table-driven opcode metadata for the instruction decoder

export const INDEX_KINDS = [
  "typeidx",
  "funcidx",
  "tableidx",
  "memidx",
  "globalidx",
  "localidx",
  "labelidx",
  "dataidx",
  "elemidx",
] as const;

export type IndexKind = (typeof INDEX_KINDS)[number];

// Field kinds an opcode table row may declare, in decode order
export const FIELD_KINDS = [
  "u32",
  "i32",
  "u64",
  "i64",
  "f32",
  "f64",
  "blocktype",
  "reftype",
  "valtypes",
  "instrs",
  ...INDEX_KINDS,
] as const;

export type FieldKind = (typeof FIELD_KINDS)[number];

export type DataType =
  | "i32"
  | "i64"
  | "f32"
  | "f64"
  | "v128"
  | "funcref"
  | "externref";

export type RefType = Extract<DataType, "funcref" | "externref">;

// Opcodes whose operands are not a fixed field list
export type ControlKind = "if" | "br_table" | "else" | "end";

export interface InstrDescriptor {
  name: string; // variant tag, e.g. "i32.const", "memory.fill"
  opcode: number; // primary byte, or the secondary byte when prefix is set
  prefix?: number; // primary byte of a two-byte opcode
  fields: readonly FieldKind[];
  control?: ControlKind;
}

export type Operand =
  | {
      readonly kind: "u32" | "i32" | "f32" | "f64" | IndexKind;
      readonly value: number;
    }
  | { readonly kind: "u64" | "i64"; readonly value: bigint }
  | { readonly kind: "blocktype"; readonly value: DataType | null }
  | { readonly kind: "reftype"; readonly value: RefType }
  | { readonly kind: "valtypes"; readonly value: readonly DataType[] }
  | { readonly kind: "instrs"; readonly value: readonly Instruction[] }
  | { readonly kind: "labels"; readonly value: readonly number[] };

export interface Instruction {
  readonly name: string;
  readonly opcode: number;
  readonly prefix?: number;
  readonly operands: readonly Operand[];
}

export interface DecodedBlock {
  instrs: Instruction[];
  endedWithElse: boolean;
}

export const DEFAULT_MAX_DEPTH = 1024;

export interface DecodeOptions {
  // Deepest block nesting accepted before NestingTooDeep
  maxDepth?: number;
  // Called after each instruction (terminators included) is decoded
  onInstruction?: (instr: Instruction, offset: number, depth: number) => void;
}

export function isFieldKind(kind: string): kind is FieldKind {
  return (FIELD_KINDS as readonly string[]).includes(kind);
}

type DescriptorInit = Omit<InstrDescriptor, "opcode" | "prefix">;

function checkByte(what: string, value: number) {
  if (!Number.isInteger(value) || value < 0 || value > 0xff)
    throw new RangeError(`${what} out of range: ${value}`);
}

// Tiny helpers to build descriptors with range checks
export function op(opcode: number, init: DescriptorInit): InstrDescriptor {
  checkByte("opcode", opcode);
  return { opcode, ...init };
}

export function ext(
  prefix: number,
  opcode: number,
  init: DescriptorInit,
): InstrDescriptor {
  checkByte("prefix", prefix);
  checkByte("opcode", opcode);
  return { prefix, opcode, ...init };
}

export function instr(
  desc: InstrDescriptor,
  operands: readonly Operand[] = [],
): Instruction {
  return desc.prefix === undefined
    ? { name: desc.name, opcode: desc.opcode, operands }
    : { name: desc.name, opcode: desc.opcode, prefix: desc.prefix, operands };
}
