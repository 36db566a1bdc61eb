#!/usr/bin/env node
import { Decoder, toJSON } from "./Decoder";

export interface CliOptions {
  filePath: string;
  trace: boolean;
  maxDepth?: number;
  offset: number;
}

const USAGE =
  "Usage: wasmdec <code-file> [--trace] [--max-depth <n>] [--offset <n>]";

function parseCount(flag: string, text: string | undefined): number {
  // Accepts decimal or 0x-prefixed hex
  const value = text === undefined || text === "" ? NaN : Number(text);
  if (!Number.isInteger(value) || value < 0)
    throw new Error(`${flag} expects a non-negative integer, got ${text ?? "nothing"}`);
  return value;
}

export function parseArgs(args: string[]): CliOptions {
  let filePath: string | undefined;
  let trace = false;
  let maxDepth: number | undefined;
  let offset = 0;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === "--trace") {
      trace = true;
    } else if (arg === "--max-depth") {
      maxDepth = parseCount(arg, args[++i]);
    } else if (arg === "--offset") {
      offset = parseCount(arg, args[++i]);
    } else if (arg.startsWith("--")) {
      throw new Error(`Unknown option ${arg}`);
    } else if (filePath === undefined) {
      filePath = arg;
    } else {
      throw new Error(`Unexpected argument ${arg}`);
    }
  }

  if (!filePath) throw new Error("Code file path is required");
  return { filePath, trace, maxDepth, offset };
}

export async function main(args: string[]): Promise<number> {
  let options: CliOptions;
  try {
    options = parseArgs(args);
  } catch (err) {
    console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
    console.error(USAGE);
    return 2;
  }

  const decoder = new Decoder(options.filePath, options.offset);
  decoder.setTrace(options.trace);
  if (options.maxDepth !== undefined) decoder.setMaxDepth(options.maxDepth);

  try {
    await decoder.load();
    const body = decoder.decodeExpression();
    if (options.trace)
      console.log(`Decoded ${body.length} instructions, stopped at offset ${decoder.getOffset()}`);
    process.stdout.write(`${toJSON(body)}\n`);
    return 0;
  } catch (err) {
    console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
    return 1;
  }
}

if (require.main === module) {
  main(process.argv.slice(2))
    .then((code) => {
      process.exitCode = code;
    })
    .catch((err) => {
      console.error(err);
      process.exitCode = 1;
    });
}
