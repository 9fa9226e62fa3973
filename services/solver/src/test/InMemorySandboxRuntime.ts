import { readdir, readFile } from "node:fs/promises";
import path from "node:path";

import type {
  SandboxExit,
  SandboxHandle,
  SandboxRuntime,
  SandboxSpec,
  SandboxSummary,
} from "../sandbox/types.js";

export type ScriptedRun =
  | { kind: "exit"; output: string; exitCode: number }
  | { kind: "hang"; output?: string };

/** Decides what a started context "prints", given the files it sees in its workdir. */
export type RunHandler = (files: Map<string, string>, spec: SandboxSpec) => ScriptedRun | Promise<ScriptedRun>;

type FakeContext = {
  id: string;
  spec: SandboxSpec;
  state: "created" | "running" | "exited";
  output: string;
  exit?: SandboxExit;
  hang: boolean;
  waiters: Array<{ resolve: (exit: SandboxExit) => void; reject: (error: Error) => void }>;
};

async function readTree(root: string, prefix = ""): Promise<Map<string, string>> {
  const files = new Map<string, string>();
  const entries = await readdir(path.join(root, prefix), { withFileTypes: true });
  for (const entry of entries) {
    const relative = prefix ? `${prefix}/${entry.name}` : entry.name;
    if (entry.isDirectory()) {
      for (const [name, content] of await readTree(root, relative)) {
        files.set(name, content);
      }
    } else if (entry.isFile()) {
      files.set(relative, await readFile(path.join(root, relative), "utf-8"));
    }
  }
  return files;
}

const exitZero: RunHandler = () => ({ kind: "exit", output: "", exitCode: 0 });

/**
 * In-process stand-in for the container runtime. Contexts read the staged
 * files from their bind source when started and report whatever the
 * handler scripts. Hanging contexts only end when removed.
 */
export class InMemorySandboxRuntime implements SandboxRuntime {
  readonly contexts = new Map<string, FakeContext>();
  readonly created: SandboxSpec[] = [];
  readonly removed: string[] = [];
  readonly seenFiles: Array<Map<string, string>> = [];
  failCreate?: Error;
  failStart?: Error;
  failCollect?: Error;
  failRemove?: (id: string) => Error | undefined;
  private sequence = 0;

  constructor(private handler: RunHandler = exitZero) {}

  setHandler(handler: RunHandler): void {
    this.handler = handler;
  }

  /** Registers a context as if an earlier process had left it behind. */
  seed(image: string, labels: Record<string, string> = {}): string {
    const id = this.nextId();
    this.contexts.set(id, {
      id,
      spec: {
        image,
        command: ["true"],
        workdir: "/workspace",
        bindSource: "/nonexistent",
        labels,
        env: {},
        network: "none",
        limits: { memoryBytes: 0, cpuQuota: 1, pidsLimit: 1 },
      },
      state: "exited",
      output: "",
      exit: { exitCode: 0 },
      hang: false,
      waiters: [],
    });
    return id;
  }

  liveIds(): string[] {
    return [...this.contexts.keys()];
  }

  async create(spec: SandboxSpec): Promise<SandboxHandle> {
    if (this.failCreate) {
      throw this.failCreate;
    }
    const id = this.nextId();
    this.created.push(spec);
    this.contexts.set(id, { id, spec, state: "created", output: "", hang: false, waiters: [] });
    return { id };
  }

  async start(id: string): Promise<void> {
    const context = this.require(id);
    if (this.failStart) {
      throw this.failStart;
    }
    const files = await readTree(context.spec.bindSource);
    this.seenFiles.push(files);
    context.state = "running";
    const run = await this.handler(files, context.spec);
    if (run.kind === "hang") {
      context.hang = true;
      context.output = run.output ?? "";
      return;
    }
    context.output = run.output;
    this.exitContext(context, { exitCode: run.exitCode });
  }

  wait(id: string): Promise<SandboxExit> {
    const context = this.require(id);
    if (context.exit) {
      return Promise.resolve(context.exit);
    }
    return new Promise<SandboxExit>((resolve, reject) => {
      context.waiters.push({ resolve, reject });
    });
  }

  async collectOutput(id: string): Promise<string> {
    if (this.failCollect) {
      throw this.failCollect;
    }
    return this.require(id).output;
  }

  async remove(id: string): Promise<void> {
    const failure = this.failRemove?.(id);
    if (failure) {
      throw failure;
    }
    const context = this.contexts.get(id);
    if (!context) {
      return;
    }
    this.contexts.delete(id);
    this.removed.push(id);
    for (const waiter of context.waiters.splice(0)) {
      waiter.reject(new Error(`container ${id} removed`));
    }
  }

  async listByImage(image: string): Promise<SandboxSummary[]> {
    return [...this.contexts.values()]
      .filter((context) => context.spec.image === image)
      .map((context) => ({
        id: context.id,
        image: context.spec.image,
        state: context.state,
        labels: context.spec.labels,
      }));
  }

  private exitContext(context: FakeContext, exit: SandboxExit): void {
    context.state = "exited";
    context.exit = exit;
    for (const waiter of context.waiters.splice(0)) {
      waiter.resolve(exit);
    }
  }

  private require(id: string): FakeContext {
    const context = this.contexts.get(id);
    if (!context) {
      throw Object.assign(new Error(`no such container: ${id}`), { statusCode: 404 });
    }
    return context;
  }

  private nextId(): string {
    this.sequence += 1;
    return `fake-${this.sequence.toString().padStart(4, "0")}`;
  }
}
