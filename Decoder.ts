import { readFile } from "fs/promises";
import { ByteReader } from "./ByteReader";
import { decodeBlock, decodeOne } from "./opcodes/decode";
import { DecodeError } from "./opcodes/errors";
import {
  DEFAULT_MAX_DEPTH,
  DecodeOptions,
  Instruction,
  Operand,
} from "./opcodes/types";

function formatOperand(operand: Operand): string {
  switch (operand.kind) {
    case "blocktype":
      return `type=${operand.value ?? "none"}`;
    case "instrs":
      return `{${operand.value.length}}`;
    case "labels":
      return `[${operand.value.join(",")}]`;
    case "valtypes":
      return `(${operand.value.join(",")})`;
    default:
      return String(operand.value);
  }
}

/** One-line summary: name, then operands. Nested bodies show only their length. */
export function formatInstruction(instr: Instruction): string {
  return [instr.name, ...instr.operands.map(formatOperand)].join(" ");
}

// JSON has no bigint, NaN, Infinity or -0
function jsonValue(_key: string, value: unknown): unknown {
  if (typeof value === "bigint") return value.toString();
  if (typeof value === "number" && (!Number.isFinite(value) || Object.is(value, -0))) {
    return Object.is(value, -0) ? "-0" : String(value);
  }
  return value;
}

/**
 * Serialise a decoded tree. 64-bit values become decimal strings, and so do
 * float immediates JSON cannot hold: "NaN", "Infinity", "-Infinity" and "-0".
 */
export function toJSON(instrs: readonly Instruction[]): string {
  return JSON.stringify(instrs, jsonValue, 2);
}

/**
 * Owns the bytes of one instruction stream and a cursor into them. Loads from
 * a file path, or wraps bytes that are already in memory.
 */
class Decoder {
  private reader: ByteReader | null = null;
  private trace: boolean = false; // Enable debug logging
  private maxDepth: number = DEFAULT_MAX_DEPTH;

  constructor(
    private source: string | Uint8Array,
    private startOffset: number = 0,
  ) {
    if (typeof source !== "string") this.reader = new ByteReader(source, startOffset);
  }

  async load(): Promise<void> {
    if (typeof this.source !== "string") return;
    const data = await readFile(this.source);
    this.reader = new ByteReader(data, this.startOffset);
  }

  setTrace(enabled: boolean) {
    this.trace = enabled;
  }

  setMaxDepth(depth: number) {
    if (!Number.isInteger(depth) || depth < 0)
      throw new RangeError(`maxDepth must be a non-negative integer, got ${depth}`);
    this.maxDepth = depth;
  }

  getOffset(): number {
    return this.requireReader().offset;
  }

  isEof(): boolean {
    return this.requireReader().isEof();
  }

  decodeInstruction(): Instruction {
    return decodeOne(this.requireReader(), this.options());
  }

  /** Decode a body up to its closing end. A body closed by else is malformed. */
  decodeExpression(): Instruction[] {
    const reader = this.requireReader();
    const { instrs, endedWithElse } = decodeBlock(reader, this.options());
    if (endedWithElse)
      throw new DecodeError({ kind: "UnexpectedElse", offset: reader.offset - 1 });
    return instrs;
  }

  private options(): DecodeOptions {
    if (!this.trace) return { maxDepth: this.maxDepth };
    return {
      maxDepth: this.maxDepth,
      onInstruction: (instr, offset, depth) => {
        console.log(
          `${offset.toString(16).padStart(4, "0")}: ${"  ".repeat(depth)}[${formatInstruction(instr)}]`,
        );
      },
    };
  }

  private requireReader(): ByteReader {
    if (!this.reader) throw new Error("No data loaded.");
    return this.reader;
  }
}

export { Decoder };
