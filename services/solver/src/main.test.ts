import request from "supertest";
import { afterEach, describe, expect, it } from "vitest";

import { parseConfig } from "./config.js";
import { bootstrapSolver, type RunningSolver } from "./main.js";
import { InMemorySandboxRuntime } from "./test/InMemorySandboxRuntime.js";

describe("bootstrapSolver", () => {
  let running: RunningSolver | undefined;

  afterEach(async () => {
    await running?.close();
    running = undefined;
  });

  it("serves solve requests through the sandbox manager", async () => {
    const runtime = new InMemorySandboxRuntime((files) => ({
      kind: "exit",
      output: files.get("solution.py") === "print(2 + 2)" ? "4\n" : "",
      exitCode: 0,
    }));
    running = await bootstrapSolver({
      config: parseConfig({ server: { host: "127.0.0.1", port: 0 } }),
      runtime,
      generator: { generate: async () => ({ code: "print(2 + 2)", model: "test-model" }) },
    });

    const response = await request(running.server).post("/solve").send({ problem: "2 + 2" });

    expect(response.status).toBe(200);
    expect(response.body).toMatchObject({ success: true, solution: "4", output: "4\n", code: "print(2 + 2)" });
    expect(runtime.liveIds()).toEqual([]);
  });

  it("reclaims leftover contexts on startup when enabled", async () => {
    const runtime = new InMemorySandboxRuntime();
    runtime.seed("python:3.10-slim");
    runtime.seed("python:3.10-slim");

    running = await bootstrapSolver({
      config: parseConfig({ sandbox: { reclaimOnStartup: true }, server: { host: "127.0.0.1", port: 0 } }),
      runtime,
      generator: { generate: async () => ({ code: "print(1)", model: "test-model" }) },
    });

    expect(runtime.liveIds()).toEqual([]);
  });
});
