/**
 * CLI command Tests
 * Runs the commander program in process against the mock provider
 */

import { createCli } from "../../src/cli";
import { parseProviderSelection, providerFactories } from "../../src/cli/utils/openHub";
import { printTable } from "../../src/cli/utils/printTable";

describe("modelhub CLI", () => {
  const savedEnv = { ...process.env };
  let log: jest.SpyInstance;
  let errorLog: jest.SpyInstance;
  let written: string[];

  async function run(...args: string[]): Promise<void> {
    await createCli().exitOverride().parseAsync(["node", "modelhub", ...args]);
  }

  function logged(): string[] {
    return log.mock.calls.map((call) => call.join(" "));
  }

  beforeEach(() => {
    process.env.LOG_LEVEL = "silent";
    process.env.MODELHUB_PROVIDER = "mock";
    written = [];
    log = jest.spyOn(console, "log").mockImplementation(() => undefined);
    errorLog = jest.spyOn(console, "error").mockImplementation(() => undefined);
    jest.spyOn(process.stdout, "write").mockImplementation((chunk: string | Uint8Array) => {
      written.push(String(chunk));
      return true;
    });
  });

  afterEach(() => {
    jest.restoreAllMocks();
    process.env = { ...savedEnv };
    process.exitCode = undefined;
  });

  test("models prints a table of available models", async () => {
    await run("models");

    expect(logged()).toEqual([
      "PROVIDER │ ID        │ NAME      │ CONTEXT",
      "─────────┼───────────┼───────────┼────────",
      "mock     │ mock-echo │ Mock Echo │ 4096",
    ]);
    expect(process.exitCode).toBeUndefined();
  });

  test("models --json prints machine-readable rows", async () => {
    await run("models", "--json");

    expect(JSON.parse(logged()[0])).toEqual([
      { provider: "mock", id: "mock-echo", name: "Mock Echo", contextWindow: 4096 },
    ]);
  });

  test("status shows each provider's state", async () => {
    await run("-p", "mock", "status");

    expect(logged()[2]).toBe("mock     │ Mock │ Mock provider │ 1      │");
  });

  test("complete streams the reply to stdout", async () => {
    await run("complete", "hello", "world");

    expect(written.join("")).toBe("hello world\n");
    expect(process.exitCode).toBeUndefined();
  });

  test("complete reports an unknown model", async () => {
    await run("complete", "-m", "missing", "hello");

    expect(errorLog).toHaveBeenCalledWith("complete failed:", "No provider offers model missing");
    expect(process.exitCode).toBe(1);
  });

  test("load warms up a model", async () => {
    await run("load", "mock-echo");

    expect(logged()).toEqual(["Loaded mock/mock-echo"]);
  });

  test("load fails for a model nobody offers", async () => {
    await run("load", "nope");

    expect(errorLog).toHaveBeenCalledWith("load failed:", "No provider offers model nope");
    expect(process.exitCode).toBe(1);
  });

  test("an unknown provider selection fails the command", async () => {
    await run("--provider", "cloud", "models");

    expect(errorLog).toHaveBeenCalledWith(
      "models failed:",
      'Unknown provider "cloud" (expected ollama, mock or all)'
    );
    expect(process.exitCode).toBe(1);
  });
});

describe("provider selection", () => {
  test("defaults to Ollama", () => {
    expect(parseProviderSelection(undefined)).toBe("ollama");
    expect(parseProviderSelection("")).toBe("ollama");
    expect(parseProviderSelection("all")).toBe("all");
    expect(providerFactories("all")).toHaveLength(2);
  });
});

describe("printTable", () => {
  test("prints a placeholder for empty tables", () => {
    const log = jest.spyOn(console, "log").mockImplementation(() => undefined);

    printTable(["A", "B"], []);

    expect(log.mock.calls).toEqual([["No data to display"]]);
    log.mockRestore();
  });

  test("measures cells without ANSI colour codes", () => {
    const log = jest.spyOn(console, "log").mockImplementation(() => undefined);

    printTable(["NAME", "X"], [["\u001b[32mok\u001b[0m", "1"]]);

    expect(log.mock.calls.map((call) => call[0])).toEqual(["NAME │ X", "─────┼──", "\u001b[32mok\u001b[0m │ 1"]);
    log.mockRestore();
  });
});
