import { afterEach, beforeEach, describe, expect, test, vi, type MockInstance } from "vitest";
import { registerCommand, routeCommand } from "../../src/cli";
import { RowLimitExceededError } from "../../src/errors";

describe("CLI router", () => {
  let consoleSpy: MockInstance<typeof console.log>;
  let errorSpy: MockInstance<typeof console.error>;

  beforeEach(() => {
    consoleSpy = vi.spyOn(console, "log").mockImplementation(() => {});
    errorSpy = vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    consoleSpy.mockRestore();
    errorSpy.mockRestore();
    process.exitCode = undefined;
  });

  test("shows help with no arguments", async () => {
    await routeCommand([]);
    expect(consoleSpy).toHaveBeenCalledTimes(1);
    expect(String(consoleSpy.mock.calls[0][0])).toContain("ledgerline");
  });

  test.each(["help", "--help", "-h"])("shows help with %s", async (flag) => {
    await routeCommand([flag]);
    expect(consoleSpy).toHaveBeenCalled();
  });

  test("routes to registered command", async () => {
    let receivedArgs: string[] = [];
    registerCommand("test-cmd", (args) => {
      receivedArgs = args;
    });

    await routeCommand(["test-cmd", "--flag", "value"]);
    expect(receivedArgs).toEqual(["--flag", "value"]);
  });

  test("shows error for unknown command", async () => {
    await routeCommand(["nonexistent"]);
    expect(errorSpy).toHaveBeenCalledWith("Unknown command: nonexistent");
    expect(process.exitCode).toBe(1);
  });

  test("reports ledger errors by code", async () => {
    registerCommand("too-big", () => {
      throw new RowLimitExceededError(12_000, 10_000);
    });

    await routeCommand(["too-big"]);
    expect(errorSpy).toHaveBeenCalledWith(
      "ROW_LIMIT_EXCEEDED: Statement has 12000 rows, which exceeds the limit of 10000",
    );
    expect(process.exitCode).toBe(1);
  });

  test("rethrows other errors", async () => {
    registerCommand("broken", async () => {
      throw new TypeError("bad state");
    });

    await expect(routeCommand(["broken"])).rejects.toThrow("bad state");
  });
});
