import type { ByteSource } from "../ByteReader";
import { DecodeError } from "./errors";
import {
  readBlockType,
  readF32,
  readF64,
  readI32,
  readI64,
  readIndex,
  readRefType,
  readU32,
  readU64,
  readValTypes,
} from "./fields";
import { OP_ELSE, OP_END, lookupPrimary } from "./tables";
import {
  DEFAULT_MAX_DEPTH,
  DecodeOptions,
  DecodedBlock,
  FieldKind,
  InstrDescriptor,
  Instruction,
  Operand,
  instr,
} from "./types";

interface DecodeState {
  maxDepth: number;
  onInstruction?: DecodeOptions["onInstruction"];
}

function stateFrom(options: DecodeOptions): DecodeState {
  const maxDepth = options.maxDepth ?? DEFAULT_MAX_DEPTH;
  if (!Number.isInteger(maxDepth) || maxDepth < 0)
    throw new RangeError(`maxDepth must be a non-negative integer, got ${maxDepth}`);
  return { maxDepth, onInstruction: options.onInstruction };
}

/** Decode the instruction at the cursor. Terminators (else/end) come back as ordinary instructions. */
export function decodeOne(src: ByteSource, options: DecodeOptions = {}): Instruction {
  return decodeInstr(src, stateFrom(options), 0);
}

/**
 * Decode instructions up to and including the next else or end. The
 * terminator is consumed but not returned; `endedWithElse` says which one it was.
 */
export function decodeBlock(src: ByteSource, options: DecodeOptions = {}): DecodedBlock {
  return decodeSeq(src, stateFrom(options), 1);
}

function decodeInstr(src: ByteSource, state: DecodeState, depth: number): Instruction {
  const start = src.offset;
  const first = src.readByte();
  const entry = lookupPrimary(first);
  if (!entry) throw new DecodeError({ kind: "UnsupportedOpcode", byte: first });

  let desc: InstrDescriptor;
  if (entry.kind === "prefix") {
    const second = src.readByte();
    const found = entry.table[second];
    if (!found)
      throw new DecodeError({ kind: "UnsupportedOpcode", byte: second, prefix: first });
    desc = found;
  } else {
    desc = entry.desc;
  }

  let out: Instruction;
  switch (desc.control) {
    case "if":
      out = decodeIf(desc, src, state, depth);
      break;
    case "br_table":
      out = instr(desc, [{ kind: "labels", value: readLabels(src) }]);
      break;
    default:
      out = instr(
        desc,
        desc.fields.map((kind) => readField(src, kind, state, depth)),
      );
  }

  state.onInstruction?.(out, start, depth);
  return out;
}

function decodeSeq(src: ByteSource, state: DecodeState, depth: number): DecodedBlock {
  if (depth > state.maxDepth)
    throw new DecodeError({ kind: "NestingTooDeep", limit: state.maxDepth });

  const instrs: Instruction[] = [];
  for (;;) {
    const next = decodeInstr(src, state, depth);
    if (next.prefix === undefined) {
      if (next.opcode === OP_ELSE) return { instrs, endedWithElse: true };
      if (next.opcode === OP_END) return { instrs, endedWithElse: false };
    }
    instrs.push(next);
  }
}

function readField(
  src: ByteSource,
  kind: FieldKind,
  state: DecodeState,
  depth: number,
): Operand {
  switch (kind) {
    case "u32":
      return { kind, value: readU32(src) };
    case "i32":
      return { kind, value: readI32(src) };
    case "u64":
      return { kind, value: readU64(src) };
    case "i64":
      return { kind, value: readI64(src) };
    case "f32":
      return { kind, value: readF32(src) };
    case "f64":
      return { kind, value: readF64(src) };
    case "blocktype":
      return { kind, value: readBlockType(src) };
    case "reftype":
      return { kind, value: readRefType(src) };
    case "valtypes":
      return { kind, value: readValTypes(src) };
    case "instrs":
      return { kind, value: decodeSeq(src, state, depth + 1).instrs };
    default:
      // every remaining kind is an index
      return { kind, value: readIndex(src) };
  }
}

// if <blocktype> <then...> [else <otherwise...>] end
function decodeIf(
  desc: InstrDescriptor,
  src: ByteSource,
  state: DecodeState,
  depth: number,
): Instruction {
  const type = readBlockType(src);
  const then = decodeSeq(src, state, depth + 1);
  const otherwise = then.endedWithElse ? decodeSeq(src, state, depth + 1).instrs : [];
  return instr(desc, [
    { kind: "blocktype", value: type },
    { kind: "instrs", value: then.instrs },
    { kind: "instrs", value: otherwise },
  ]);
}

// br_table <count> <label>{count} <default>
function readLabels(src: ByteSource): number[] {
  const count = readU32(src);
  const labels: number[] = [];
  for (let i = 0; i <= count; i++) labels.push(readIndex(src));
  return labels;
}
