import Docker from "dockerode";

import type { AppLogger } from "../observability/logger.js";
import type {
  SandboxExit,
  SandboxHandle,
  SandboxRuntime,
  SandboxSpec,
  SandboxSummary,
} from "./types.js";

/**
 * The slice of dockerode the runtime calls. A `Docker` instance satisfies
 * it; tests pass a stub.
 */
export interface DockerContainerApi {
  id: string;
  start(): Promise<unknown>;
  wait(): Promise<unknown>;
  logs(options: { stdout: boolean; stderr: boolean; follow: false }): Promise<Buffer>;
  remove(options: { force: boolean; v: boolean }): Promise<unknown>;
}

export interface DockerContainerListing {
  Id: string;
  Image: string;
  State: string;
  Labels: Record<string, string>;
}

export interface DockerApi {
  createContainer(options: Docker.ContainerCreateOptions): Promise<DockerContainerApi>;
  getContainer(id: string): DockerContainerApi;
  getImage(name: string): { inspect(): Promise<unknown> };
  pull(repoTag: string): Promise<NodeJS.ReadableStream>;
  listContainers(options: { all: boolean; filters: Record<string, string[]> }): Promise<DockerContainerListing[]>;
  modem: {
    followProgress(stream: NodeJS.ReadableStream, onFinished: (error: Error | null, output: unknown[]) => void): void;
  };
}

export interface DockerRuntimeOptions {
  logger: AppLogger;
  docker?: DockerApi;
  socketPath?: string;
  pullMissingImages?: boolean;
}

const STREAM_HEADER_BYTES = 8;

/**
 * Splits a multiplexed (non-TTY) log buffer into its frames and joins the
 * payloads in the order the daemon recorded them, so stdout and stderr stay
 * interleaved. Buffers that are not framed are decoded as they are.
 */
export function demuxLogBuffer(buffer: Buffer): string {
  const chunks: Buffer[] = [];
  let offset = 0;
  while (offset < buffer.length) {
    if (buffer.length - offset < STREAM_HEADER_BYTES) {
      return buffer.toString("utf-8");
    }
    const streamType = buffer[offset];
    const padding = buffer[offset + 1] | buffer[offset + 2] | buffer[offset + 3];
    if (streamType > 2 || padding !== 0) {
      return buffer.toString("utf-8");
    }
    const size = buffer.readUInt32BE(offset + 4);
    const start = offset + STREAM_HEADER_BYTES;
    const end = start + size;
    if (end > buffer.length) {
      return buffer.toString("utf-8");
    }
    chunks.push(buffer.subarray(start, end));
    offset = end;
  }
  return Buffer.concat(chunks).toString("utf-8");
}

export function statusCodeOf(error: unknown): number | undefined {
  if (typeof error === "object" && error !== null && "statusCode" in error) {
    const value = error.statusCode;
    return typeof value === "number" ? value : undefined;
  }
  return undefined;
}

function parseExit(result: unknown): SandboxExit {
  if (typeof result === "object" && result !== null && "StatusCode" in result) {
    const code = result.StatusCode;
    if (typeof code === "number") {
      return { exitCode: code };
    }
  }
  throw new Error("container wait returned no status code");
}

function defaultSocketPath(): string {
  return process.platform === "win32" ? "//./pipe/docker_engine" : "/var/run/docker.sock";
}

export class DockerRuntime implements SandboxRuntime {
  private readonly docker: DockerApi;
  private readonly logger: AppLogger;
  private readonly pullMissingImages: boolean;
  private readonly readyImages = new Set<string>();

  constructor(options: DockerRuntimeOptions) {
    this.logger = options.logger.child({ component: "DockerRuntime" });
    this.docker = options.docker ?? new Docker({ socketPath: options.socketPath ?? defaultSocketPath() });
    this.pullMissingImages = options.pullMissingImages ?? true;
  }

  buildCreateOptions(spec: SandboxSpec): Docker.ContainerCreateOptions {
    return {
      Image: spec.image,
      Cmd: spec.command,
      WorkingDir: spec.workdir,
      Env: Object.entries(spec.env).map(([key, value]) => `${key}=${value}`),
      Labels: spec.labels,
      User: spec.user,
      AttachStdout: false,
      AttachStderr: false,
      Tty: false,
      HostConfig: {
        Binds: [`${spec.bindSource}:${spec.workdir}:rw`],
        Memory: spec.limits.memoryBytes,
        MemorySwap: spec.limits.memoryBytes,
        NanoCpus: Math.round(spec.limits.cpuQuota * 1e9),
        PidsLimit: spec.limits.pidsLimit,
        NetworkMode: spec.network,
        SecurityOpt: ["no-new-privileges:true"],
        Privileged: false,
        CapDrop: ["ALL"],
        AutoRemove: false,
      },
    };
  }

  async create(spec: SandboxSpec): Promise<SandboxHandle> {
    await this.ensureImage(spec.image);
    const container = await this.docker.createContainer(this.buildCreateOptions(spec));
    this.logger.debug({ containerId: container.id, image: spec.image }, "container created");
    return { id: container.id };
  }

  async start(id: string): Promise<void> {
    await this.docker.getContainer(id).start();
  }

  async wait(id: string): Promise<SandboxExit> {
    return parseExit(await this.docker.getContainer(id).wait());
  }

  async collectOutput(id: string): Promise<string> {
    const buffer = await this.docker.getContainer(id).logs({ stdout: true, stderr: true, follow: false });
    return demuxLogBuffer(buffer);
  }

  async remove(id: string): Promise<void> {
    try {
      await this.docker.getContainer(id).remove({ force: true, v: true });
    } catch (error) {
      if (statusCodeOf(error) === 404) {
        this.logger.debug({ containerId: id }, "container already removed");
        return;
      }
      throw error;
    }
  }

  async listByImage(image: string): Promise<SandboxSummary[]> {
    const containers = await this.docker.listContainers({ all: true, filters: { ancestor: [image] } });
    return containers.map((info) => ({
      id: info.Id,
      image: info.Image,
      state: info.State,
      labels: info.Labels ?? {},
    }));
  }

  private async ensureImage(image: string): Promise<void> {
    if (this.readyImages.has(image)) {
      return;
    }
    try {
      await this.docker.getImage(image).inspect();
    } catch (error) {
      if (statusCodeOf(error) !== 404 || !this.pullMissingImages) {
        throw error;
      }
      this.logger.info({ image }, "pulling sandbox image");
      const stream = await this.docker.pull(image);
      await new Promise<void>((resolve, reject) => {
        this.docker.modem.followProgress(stream, (pullError) => {
          if (pullError) {
            reject(pullError);
            return;
          }
          resolve();
        });
      });
      this.logger.info({ image }, "sandbox image pulled");
    }
    this.readyImages.add(image);
  }
}
