import opcodeData from "./opcodes.json";
import { OpcodeTableError } from "./errors";
import { ControlKind, FieldKind, InstrDescriptor, ext, isFieldKind, op } from "./types";

// Shape of opcodes.json. Bytes are hex strings so the file reads like the opcode charts.
export interface RawOpcodeEntry {
  opcode: string;
  name: string;
  fields: string[];
  control?: string;
}

export interface RawOpcodeTable {
  primary: RawOpcodeEntry[];
  prefixes: { prefix: string; entries: RawOpcodeEntry[] }[];
}

export type SecondaryTable = ReadonlyArray<InstrDescriptor | undefined>;

// A primary byte either decodes directly or introduces a second opcode byte
export type PrimaryEntry =
  | { kind: "instr"; desc: InstrDescriptor }
  | { kind: "prefix"; prefix: number; table: SecondaryTable };

export interface OpcodeTables {
  primary: ReadonlyArray<PrimaryEntry | undefined>;
  byName: ReadonlyMap<string, InstrDescriptor>;
  control: Readonly<Record<ControlKind, InstrDescriptor>>;
}

const CONTROL_KINDS: readonly ControlKind[] = ["if", "br_table", "else", "end"];

function isControlKind(kind: string): kind is ControlKind {
  return (CONTROL_KINDS as readonly string[]).includes(kind);
}

function parseByte(text: string, where: string): number {
  const value = /^0x[0-9a-f]{1,2}$/i.test(text) ? Number(text) : NaN;
  if (Number.isNaN(value))
    throw new OpcodeTableError(`${where}: "${text}" is not a byte like 0x1f`);
  return value;
}

function parseEntry(raw: RawOpcodeEntry, prefix?: number): InstrDescriptor {
  const where = `opcode ${raw.name}`;
  const fields: FieldKind[] = [];
  for (const f of raw.fields) {
    if (!isFieldKind(f)) throw new OpcodeTableError(`${where}: unknown field kind "${f}"`);
    fields.push(f);
  }
  let control: ControlKind | undefined;
  if (raw.control !== undefined) {
    if (!isControlKind(raw.control))
      throw new OpcodeTableError(`${where}: unknown control kind "${raw.control}"`);
    if (fields.length)
      throw new OpcodeTableError(`${where}: control opcodes take no declared fields`);
    control = raw.control;
  }
  const opcode = parseByte(raw.opcode, where);
  const init = control ? { name: raw.name, fields, control } : { name: raw.name, fields };
  return Object.freeze(prefix === undefined ? op(opcode, init) : ext(prefix, opcode, init));
}

/**
 * Validate the raw table and index it by byte. Throws OpcodeTableError on
 * duplicate bytes within a level, duplicate names, unknown field kinds, or
 * missing control opcodes.
 */
export function buildTables(raw: RawOpcodeTable): OpcodeTables {
  const primary: Array<PrimaryEntry | undefined> = [];
  const byName = new Map<string, InstrDescriptor>();
  const control: Partial<Record<ControlKind, InstrDescriptor>> = {};

  const register = (desc: InstrDescriptor) => {
    if (byName.has(desc.name))
      throw new OpcodeTableError(`Duplicate opcode name "${desc.name}"`);
    byName.set(desc.name, desc);
  };

  for (const entry of raw.primary) {
    const desc = parseEntry(entry);
    if (primary[desc.opcode])
      throw new OpcodeTableError(`Duplicate primary opcode ${entry.opcode} (${desc.name})`);
    register(desc);
    primary[desc.opcode] = { kind: "instr", desc };
    if (desc.control) {
      if (control[desc.control])
        throw new OpcodeTableError(`Control kind "${desc.control}" assigned twice`);
      control[desc.control] = desc;
    }
  }

  for (const group of raw.prefixes) {
    const prefix = parseByte(group.prefix, "prefix");
    if (primary[prefix])
      throw new OpcodeTableError(`Prefix ${group.prefix} collides with a primary opcode`);
    const table: Array<InstrDescriptor | undefined> = [];
    for (const entry of group.entries) {
      const desc = parseEntry(entry, prefix);
      if (desc.control)
        throw new OpcodeTableError(`opcode ${desc.name}: control opcodes must be primary`);
      if (table[desc.opcode])
        throw new OpcodeTableError(
          `Duplicate opcode ${entry.opcode} under prefix ${group.prefix} (${desc.name})`,
        );
      register(desc);
      table[desc.opcode] = desc;
    }
    primary[prefix] = { kind: "prefix", prefix, table: Object.freeze(table) };
  }

  const { if: ifDesc, br_table, else: elseDesc, end } = control;
  if (!ifDesc || !br_table || !elseDesc || !end) {
    const missing = CONTROL_KINDS.filter((k) => !control[k]);
    throw new OpcodeTableError(`Missing control opcodes: ${missing.join(", ")}`);
  }

  return {
    primary: Object.freeze(primary),
    byName,
    control: Object.freeze({ if: ifDesc, br_table, else: elseDesc, end }),
  };
}

// Built once at load; read-only afterwards and shared by every decode
export const TABLES: OpcodeTables = buildTables(opcodeData);

export const TABLE_PRIMARY = TABLES.primary;
export const OP_ELSE = TABLES.control.else.opcode;
export const OP_END = TABLES.control.end.opcode;

export function lookupPrimary(byte: number): PrimaryEntry | undefined {
  return TABLES.primary[byte];
}

export function lookupSecondary(
  prefix: number,
  byte: number,
): InstrDescriptor | undefined {
  const entry = TABLES.primary[prefix];
  return entry?.kind === "prefix" ? entry.table[byte] : undefined;
}

export function findByName(name: string): InstrDescriptor | undefined {
  return TABLES.byName.get(name);
}
