import { mkdtemp, readdir, rm } from "node:fs/promises";
import os from "node:os";
import path from "node:path";

import { register } from "prom-client";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

vi.mock("node:fs/promises", async (importOriginal) => {
  const actual = await importOriginal<typeof import("node:fs/promises")>();
  return { ...actual, rm: vi.fn(actual.rm) };
});

import { createLogger } from "../observability/logger.js";
import { resetMetrics, SANDBOX_TEARDOWN_FAILURES_NAME } from "../observability/metrics.js";
import { InMemorySandboxRuntime } from "../test/InMemorySandboxRuntime.js";
import { buildSandboxConfig } from "../test/utils.js";
import { SandboxManager } from "./SandboxManager.js";

describe("SandboxManager teardown failures", () => {
  let stagingRoot: string;
  let runtime: InMemorySandboxRuntime;
  let lines: Array<Record<string, unknown>>;
  let manager: SandboxManager;

  const files = [{ name: "a.py", content: "print(42)", executionMode: "interpreted" as const }];

  beforeEach(async () => {
    resetMetrics();
    stagingRoot = await mkdtemp(path.join(os.tmpdir(), "sandbox-teardown-test-"));
    runtime = new InMemorySandboxRuntime(() => ({ kind: "exit", output: "42\n", exitCode: 0 }));
    lines = [];
    manager = new SandboxManager({
      runtime,
      config: buildSandboxConfig({ stagingRoot }),
      logger: createLogger({
        level: "warn",
        destination: {
          write(chunk: string) {
            lines.push(JSON.parse(chunk));
          },
        },
      }),
      instanceId: "teardown-test",
    });
  });

  afterEach(async () => {
    await rm(stagingRoot, { recursive: true, force: true });
  });

  it("logs and counts a context that could not be removed", async () => {
    runtime.failRemove = () => new Error("daemon busy");

    const result = await manager.execute({ files });

    expect(result.status).toBe("succeeded");
    expect(result.combinedOutput).toBe("42\n");
    const warning = lines.find((line) => line.msg === "failed to remove sandbox context");
    expect(warning).toMatchObject({
      level: "warn",
      contextId: result.contextId,
      executionId: result.executionId,
      err: { message: `failed to remove sandbox ${result.contextId}: daemon busy` },
    });
    const failures = await register.getSingleMetricAsString(SANDBOX_TEARDOWN_FAILURES_NAME);
    expect(failures).toContain(`${SANDBOX_TEARDOWN_FAILURES_NAME}{resource="context"} 1`);
  });

  it("logs and counts a staging directory that could not be removed", async () => {
    vi.mocked(rm).mockRejectedValueOnce(new Error("EBUSY: resource busy"));

    const result = await manager.execute({ files });

    expect(result.status).toBe("succeeded");
    expect(runtime.liveIds()).toEqual([]);
    const warning = lines.find((line) => line.msg === "failed to remove staging directory");
    expect(warning).toMatchObject({
      level: "warn",
      executionId: result.executionId,
      err: { message: "EBUSY: resource busy" },
    });
    expect(await readdir(stagingRoot)).toHaveLength(1);
    const failures = await register.getSingleMetricAsString(SANDBOX_TEARDOWN_FAILURES_NAME);
    expect(failures).toContain(`${SANDBOX_TEARDOWN_FAILURES_NAME}{resource="staging"} 1`);
    expect(failures).not.toContain('resource="context"');
  });
});
