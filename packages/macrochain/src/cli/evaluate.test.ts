import {
  afterEach,
  beforeEach,
  describe,
  expect,
  it,
  vi,
  type MockInstance,
} from "vitest";
import { promises as fs } from "fs";
import os from "os";
import path from "path";

import { handleEvaluateCommand } from "./evaluate";

describe("handleEvaluateCommand", () => {
  let log: MockInstance;
  let error: MockInstance;
  let dir: string;

  beforeEach(async () => {
    log = vi.spyOn(console, "log").mockImplementation(() => {});
    error = vi.spyOn(console, "error").mockImplementation(() => {});
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "macrochain-"));
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("evaluates an expression", async () => {
    const status = await handleEvaluateCommand([
      "-e",
      "Chain(Add(5, 6), Add(40, 80), Pop(2), Subtract($, $))",
    ]);
    expect(status).toBe(0);
    expect(log).toHaveBeenCalledWith("-109");
    expect(error).not.toHaveBeenCalled();
  });

  it("evaluates a file", async () => {
    const file = path.join(dir, "program.chain");
    await fs.writeFile(file, "total = Add(100, 28)\n");
    expect(await handleEvaluateCommand([file])).toBe(0);
    expect(log).toHaveBeenCalledWith("total = 128");
  });

  it("reports evaluation errors with an excerpt", async () => {
    expect(await handleEvaluateCommand(["-e", "Pop()"])).toBe(1);
    expect(error).toHaveBeenCalledWith(
      [
        "<expression>:1:1: error[CHAIN005]: Operation is only meaningful inside a chain: Pop",
        "1 | Pop()",
        "  | ^^^^^",
      ].join("\n"),
    );
    expect(log).not.toHaveBeenCalled();
  });

  it("prints the trace to stderr", async () => {
    const status = await handleEvaluateCommand([
      "--trace",
      "-e",
      "Chain(Push(1), Pop(), Negate($))",
    ]);
    expect(status).toBe(0);
    expect(error).toHaveBeenCalledWith(
      "[chain 0] 1. Push -> (1)\n[chain 0] 2. Pop -> <empty>\n[chain 0] 3. Negate -> (-1)",
    );
    expect(log).toHaveBeenCalledWith("-1");
  });

  it("writes JSON", async () => {
    expect(await handleEvaluateCommand(["-f", "json", "-e", "Add(5, 6)"])).toBe(0);
    const [[printed]] = log.mock.calls;
    expect(JSON.parse(String(printed))).toEqual({
      text: "11",
      items: [{ kind: "direct", operation: "Add", text: "11" }],
      warnings: [],
    });
  });

  it("writes to a file when asked", async () => {
    const target = path.join(dir, "out.txt");
    expect(await handleEvaluateCommand(["-e", "Negate(4)", "-o", target])).toBe(0);
    expect(await fs.readFile(target, "utf-8")).toBe("-4\n");
    expect(log).not.toHaveBeenCalled();
  });

  it("reports an output file it cannot write", async () => {
    const target = path.join(dir, "missing", "out.txt");
    expect(await handleEvaluateCommand(["-e", "Negate(4)", "-o", target])).toBe(1);
    expect(error).toHaveBeenCalledWith(
      expect.stringContaining(`Error: Cannot write ${target}: ENOENT`),
    );
    expect(log).not.toHaveBeenCalled();
  });

  it("applies the config file, with flags taking precedence", async () => {
    const config = path.join(dir, "macrochain.yaml");
    await fs.writeFile(config, "range: 1024\n");
    expect(await handleEvaluateCommand(["-c", config, "-e", "Add(600, 1)"])).toBe(0);
    expect(log).toHaveBeenCalledWith("601");

    expect(
      await handleEvaluateCommand(["-c", config, "-r", "256", "-e", "Add(600, 1)"]),
    ).toBe(1);
  });

  it("rejects bad option values", async () => {
    expect(await handleEvaluateCommand(["--range", "300", "-e", "x"])).toBe(1);
    expect(error).toHaveBeenCalledWith(
      "error[CONFIG001]: Invalid configuration value: range must be one of 256, 512, 1024, got 300",
    );
  });

  it("rejects a missing explicit config file", async () => {
    const missing = path.join(dir, "missing.yaml");
    expect(await handleEvaluateCommand(["-c", missing, "-e", "x"])).toBe(1);
  });

  it("rejects conflicting or missing input", async () => {
    expect(await handleEvaluateCommand(["-e", "x", "file.chain"])).toBe(1);
    expect(await handleEvaluateCommand([])).toBe(1);
    expect(await handleEvaluateCommand(["--bogus"])).toBe(1);
  });

  it("shows help", async () => {
    expect(await handleEvaluateCommand(["--help"])).toBe(0);
    expect(log).toHaveBeenCalledTimes(1);
  });
});
