import { describe, expect, test, vi } from "vitest";
import { SpawnCommandRunner } from "@/lib/system-timezone/command-runner";

vi.mock("@/lib/logger", () => ({
  logger: {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  },
}));

describe("SpawnCommandRunner", () => {
  const runner = new SpawnCommandRunner();

  test("exit code 0 is ok", async () => {
    await expect(runner.run(process.execPath, ["-e", "process.exit(0)"])).resolves.toEqual({
      ok: true,
      exitCode: 0,
      stderr: "",
    });
  });

  test("non-zero exit is reported with stderr", async () => {
    const result = await runner.run(process.execPath, [
      "-e",
      "process.stderr.write('permission denied\\n'); process.exit(3)",
    ]);

    expect(result).toEqual({ ok: false, exitCode: 3, stderr: "permission denied" });
  });

  test("a missing binary resolves as a failure instead of rejecting", async () => {
    const result = await runner.run("definitely-not-a-real-binary-ip-tz-sync", []);

    expect(result.ok).toBe(false);
    expect(result.exitCode).toBeNull();
  });
});
