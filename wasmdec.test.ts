import { main, parseArgs } from "./wasmdec";
import { readFile } from "fs/promises";

jest.mock("fs/promises");
const mockedReadFile = readFile as jest.MockedFunction<typeof readFile>;

describe("parseArgs", () => {
  it("should take the file path and defaults", () => {
    expect(parseArgs(["body.bin"])).toEqual({
      filePath: "body.bin",
      trace: false,
      maxDepth: undefined,
      offset: 0,
    });
  });

  it("should read every option", () => {
    expect(parseArgs(["--trace", "--max-depth", "16", "body.bin", "--offset", "0x20"])).toEqual({
      filePath: "body.bin",
      trace: true,
      maxDepth: 16,
      offset: 32,
    });
  });

  it("should require a file path", () => {
    expect(() => parseArgs(["--trace"])).toThrow("Code file path is required");
  });

  it("should reject unknown options", () => {
    expect(() => parseArgs(["--verbose", "body.bin"])).toThrow("Unknown option --verbose");
  });

  it("should reject a missing or negative count", () => {
    expect(() => parseArgs(["body.bin", "--max-depth"])).toThrow(
      "--max-depth expects a non-negative integer, got nothing",
    );
    expect(() => parseArgs(["body.bin", "--offset", "-4"])).toThrow(
      "--offset expects a non-negative integer, got -4",
    );
  });

  it("should reject a second file path", () => {
    expect(() => parseArgs(["a.bin", "b.bin"])).toThrow("Unexpected argument b.bin");
  });
});

describe("main", () => {
  let writeSpy: jest.SpyInstance;
  let errorSpy: jest.SpyInstance;
  let logSpy: jest.SpyInstance;

  beforeEach(() => {
    jest.clearAllMocks();
    writeSpy = jest.spyOn(process.stdout, "write").mockImplementation(() => true);
    errorSpy = jest.spyOn(console, "error").mockImplementation(() => {});
    logSpy = jest.spyOn(console, "log").mockImplementation(() => {});
  });

  afterEach(() => {
    writeSpy.mockRestore();
    errorSpy.mockRestore();
    logSpy.mockRestore();
  });

  it("should print the decoded body as JSON", async () => {
    mockedReadFile.mockResolvedValue(Buffer.from([0x20, 0x01, 0x0b]));

    const code = await main(["body.bin"]);

    expect(code).toBe(0);
    expect(JSON.parse(String(writeSpy.mock.calls[0][0]))).toEqual([
      { name: "local.get", opcode: 32, operands: [{ kind: "localidx", value: 1 }] },
    ]);
  });

  it("should log a summary line when tracing", async () => {
    mockedReadFile.mockResolvedValue(Buffer.from([0x01, 0x0b]));

    await main(["body.bin", "--trace"]);

    expect(logSpy).toHaveBeenLastCalledWith("Decoded 1 instructions, stopped at offset 2");
  });

  it("should report decode errors and exit with 1", async () => {
    mockedReadFile.mockResolvedValue(Buffer.from([0x41]));

    const code = await main(["body.bin"]);

    expect(code).toBe(1);
    expect(errorSpy).toHaveBeenCalledWith(
      "Error: Unexpected end of input at offset 1 (needed 1 more byte)",
    );
    expect(writeSpy).not.toHaveBeenCalled();
  });

  it("should print usage and exit with 2 for bad arguments", async () => {
    const code = await main([]);

    expect(code).toBe(2);
    expect(errorSpy).toHaveBeenCalledWith("Error: Code file path is required");
    expect(mockedReadFile).not.toHaveBeenCalled();
  });
});
