import { describe, it, expect, vi, afterEach } from "vitest";
import { runCommand } from "./command.js";
import { ToolUnavailableError } from "./errors.js";

// The current Node binary stands in for the PDF tools: it is always present
// wherever the tests run.
const NODE = process.execPath;

afterEach(() => {
  vi.restoreAllMocks();
});

describe("runCommand", () => {
  it("captures stdout and the exit code", async () => {
    const result = await runCommand(NODE, ["-e", "process.stdout.write('Pages: 3')"], { timeoutSeconds: 10 });

    expect(result).toEqual({ exitCode: 0, stdout: "Pages: 3", stderr: "", timedOut: false });
  });

  it("captures stderr and a non-zero exit code", async () => {
    const result = await runCommand(
      NODE,
      ["-e", "process.stderr.write('invalid password'); process.exit(2)"],
      { timeoutSeconds: 10 },
    );

    expect(result.exitCode).toBe(2);
    expect(result.stderr).toBe("invalid password");
    expect(result.timedOut).toBe(false);
  });

  it("writes input to the child's stdin", async () => {
    const script = "let s = ''; process.stdin.on('data', (c) => { s += c; }); process.stdin.on('end', () => process.stdout.write(s.toUpperCase()));";

    const result = await runCommand(NODE, ["-e", script], { timeoutSeconds: 10, input: "test-secret\n" });

    expect(result.stdout).toBe("TEST-SECRET\n");
  });

  it("kills the process when it runs past the timeout", async () => {
    const result = await runCommand(NODE, ["-e", "setTimeout(() => {}, 60000)"], { timeoutSeconds: 1 });

    expect(result.timedOut).toBe(true);
    expect(result.exitCode).toBeNull();
  });

  it("rejects with ToolUnavailableError when the binary does not exist", async () => {
    vi.spyOn(console, "error").mockImplementation(() => undefined);

    await expect(
      runCommand("/nonexistent/pdf-unlocker-tool", [], { timeoutSeconds: 5 }),
    ).rejects.toBeInstanceOf(ToolUnavailableError);
  });
});
