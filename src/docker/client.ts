import type { Logger } from '../logger.js';

/**
 * Where and how a Docker call runs: the host working directory and the
 * logger that receives the command line and its output.
 */
export interface DockerCallContext {
  cwd: string;
  logger: Logger;
}

export interface BuildOptions {
  /** Build context directory, relative to `cwd`. */
  context: string;
  /** Dockerfile path, relative to `cwd`. */
  dockerfile: string;
  buildArgs?: Record<string, string>;
  labels?: Record<string, string>;
}

export interface LoginOptions {
  username: string;
  /** Sent on stdin, never on the command line. */
  password: string;
  /** Registry host. Docker Hub when omitted. */
  registry?: string;
}

export interface RunOptions {
  name: string;
  /** `host:container` mappings passed as `--publish`. */
  ports: string[];
  /**
   * Variables forwarded into the container. Only the names appear on the
   * command line; the values travel in the Docker CLI's environment.
   */
  env: Record<string, string>;
}

export type ContainerStatus =
  | 'created'
  | 'running'
  | 'paused'
  | 'restarting'
  | 'removing'
  | 'exited'
  | 'dead'
  | 'unknown';

/**
 * The runtime state of a named container as reported by `docker inspect`.
 */
export interface ContainerState {
  status: ContainerStatus;
  running: boolean;
  exitCode: number;
}

/**
 * A transport-agnostic client for the container toolchain. Every call
 * either resolves or rejects with a SemanticReleaseError carrying the
 * operation's stable code, so the pipeline can report failures without
 * knowing which backend produced them.
 */
export interface DockerClient {
  version(ctx: DockerCallContext): Promise<string>;

  setupBuilder(ctx: DockerCallContext): Promise<void>;

  login(opts: LoginOptions, ctx: DockerCallContext): Promise<void>;

  logout(registry: string | undefined, ctx: DockerCallContext): Promise<void>;

  build(
    image: string,
    opts: BuildOptions,
    ctx: DockerCallContext,
  ): Promise<void>;

  push(image: string, ctx: DockerCallContext): Promise<void>;

  /** Start a detached container and resolve its id. */
  run(image: string, opts: RunOptions, ctx: DockerCallContext): Promise<string>;

  /** Process listing of all containers, running or not. */
  ps(ctx: DockerCallContext): Promise<string>;

  inspect(name: string, ctx: DockerCallContext): Promise<ContainerState>;

  /** Combined stdout and stderr of the container, optionally tailed. */
  logs(
    name: string,
    tail: number | undefined,
    ctx: DockerCallContext,
  ): Promise<string>;

  stop(name: string, ctx: DockerCallContext): Promise<void>;

  remove(name: string, ctx: DockerCallContext): Promise<void>;
}
