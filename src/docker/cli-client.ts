import { execSync } from 'node:child_process';
import SemanticReleaseError from '@semantic-release/error';
import { logCommandFailure } from '../command-runner.js';
import type {
  BuildOptions,
  ContainerState,
  ContainerStatus,
  DockerCallContext,
  DockerClient,
  LoginOptions,
  RunOptions,
} from './client.js';

/**
 * Quote a shell argument for POSIX sh using single quotes. Embedded
 * single quotes are escaped by closing, inserting an escaped quote,
 * and reopening. The function performs no environment expansion.
 */
export function shQuote(input: string): string {
  return `'${input.replace(/'/g, `'\\''`)}'`;
}

/**
 * Quote an argument only when it contains characters the shell would
 * interpret. Plain paths, names and `key=value` pairs pass through so
 * logged commands stay readable.
 */
export function shArg(input: string): string {
  return /^[A-Za-z0-9_@%+=:,./-]+$/.test(input) ? input : shQuote(input);
}

const INSPECT_FORMAT = '{{.State.Status}} {{.State.ExitCode}}';

export function buildDockerVersion(): string {
  return `docker version --format ${shQuote('{{.Server.Version}}')}`;
}

export function buildDockerBuilderSetup(): string {
  return 'docker buildx inspect --bootstrap';
}

/**
 * Build a docker login command string. The password is never part of
 * the command; it is read from stdin through `--password-stdin`.
 */
export function buildDockerLogin(username: string, registry?: string): string {
  const parts = [
    'docker login',
    `--username=${shArg(username)}`,
    '--password-stdin',
  ];
  if (registry) parts.push(registry);
  return parts.join(' ');
}

export function buildDockerLogout(registry?: string): string {
  return registry ? `docker logout ${registry}` : 'docker logout';
}

/**
 * Build a docker build command string. Build arguments and labels are
 * emitted in key order so the command is deterministic for logging and
 * testing.
 */
export function buildDockerBuild(image: string, opts: BuildOptions): string {
  const parts: string[] = [
    'docker build',
    `--tag=${image}`,
    `--file=${shArg(opts.dockerfile)}`,
  ];
  const sorted = (rec: Record<string, string> | undefined) =>
    Object.entries(rec ?? {}).sort(([a], [b]) => a.localeCompare(b));
  for (const [k, v] of sorted(opts.buildArgs)) {
    parts.push(`--build-arg=${shArg(`${k}=${v}`)}`);
  }
  for (const [k, v] of sorted(opts.labels)) {
    parts.push(`--label=${shArg(`${k}=${v}`)}`);
  }
  parts.push(shArg(opts.context));
  return parts.join(' ');
}

export function buildDockerPush(image: string): string {
  return `docker push ${image}`;
}

/**
 * Build a detached docker run command string. Forwarded variables are
 * passed by name only (`--env=NAME`), so Docker copies each value from
 * its own environment and no value is ever part of the command line.
 */
export function buildDockerRun(
  image: string,
  opts: { name: string; ports: string[]; envNames: string[] },
): string {
  const parts: string[] = ['docker run', '--detach', `--name=${opts.name}`];
  for (const p of opts.ports) parts.push(`--publish=${p}`);
  for (const n of opts.envNames) parts.push(`--env=${n}`);
  parts.push(image);
  return parts.join(' ');
}

export function buildDockerPs(): string {
  return 'docker ps --all';
}

export function buildDockerInspect(name: string): string {
  return `docker inspect --format ${shQuote(INSPECT_FORMAT)} ${name}`;
}

/**
 * Build a docker logs command string. Containers write to both streams,
 * so stderr is folded into stdout to keep the order of the lines.
 */
export function buildDockerLogs(name: string, tail?: number): string {
  const tailFlag = typeof tail === 'number' ? ` --tail=${tail}` : '';
  return `docker logs${tailFlag} ${name} 2>&1`;
}

export function buildDockerStop(name: string): string {
  return `docker stop ${name}`;
}

export function buildDockerRemove(name: string): string {
  return `docker rm ${name}`;
}

const STATUSES: readonly ContainerStatus[] = [
  'created',
  'running',
  'paused',
  'restarting',
  'removing',
  'exited',
  'dead',
];

/**
 * Parse the `<status> <exitCode>` line printed by `buildDockerInspect`.
 * Unknown statuses are reported as `unknown` rather than rejected, since
 * newer engines may add states.
 */
export function parseContainerState(output: string): ContainerState {
  const [rawStatus = '', rawCode = ''] = output.trim().split(/\s+/);
  const status = STATUSES.find((s) => s === rawStatus) ?? 'unknown';
  const exitCode = Number.parseInt(rawCode, 10);
  return {
    status,
    running: status === 'running',
    exitCode: Number.isNaN(exitCode) ? -1 : exitCode,
  };
}

export interface RunnerOptions {
  cwd: string;
  input?: string;
  env?: Record<string, string>;
}

/**
 * A synchronous runner function that executes a shell command with a
 * specific working directory and returns trimmed UTF-8 standard out.
 */
export interface Runner {
  (cmd: string, opts: RunnerOptions): { stdout: string };
}

/**
 * Default runner that executes commands via execSync with UTF-8 text
 * decoding and returns the trimmed stdout for logging and callers.
 */
export const defaultRunner: Runner = (cmd, opts) => {
  const out = execSync(cmd, {
    cwd: opts.cwd,
    stdio: 'pipe',
    encoding: 'utf8',
    input: opts.input,
    env: opts.env ? { ...process.env, ...opts.env } : process.env,
  }).trim();
  return { stdout: out };
};

/**
 * A Docker client backed by the local Docker CLI. The implementation
 * composes deterministic command strings and delegates execution to a
 * configurable runner. The default runner uses execSync.
 */
export class DockerCliClient implements DockerClient {
  private readonly runFn: Runner;

  constructor(runFn: Runner = defaultRunner) {
    this.runFn = runFn;
  }

  async version(ctx: DockerCallContext): Promise<string> {
    return this.exec(buildDockerVersion(), ctx, {
      message: 'Docker not available.',
      code: 'ENODOCKER',
    });
  }

  async setupBuilder(ctx: DockerCallContext): Promise<void> {
    this.exec(buildDockerBuilderSetup(), ctx, {
      message: 'Failed to initialize the image builder.',
      code: 'EBUILDERFAILED',
    });
  }

  async login(opts: LoginOptions, ctx: DockerCallContext): Promise<void> {
    this.exec(
      buildDockerLogin(opts.username, opts.registry),
      ctx,
      {
        message: `Failed to log in to ${opts.registry ?? 'Docker Hub'}`,
        code: 'ELOGINFAILED',
      },
      { input: opts.password },
    );
  }

  async logout(
    registry: string | undefined,
    ctx: DockerCallContext,
  ): Promise<void> {
    this.exec(buildDockerLogout(registry), ctx, {
      message: `Failed to log out of ${registry ?? 'Docker Hub'}`,
      code: 'ECLEANUPFAILED',
    });
  }

  async build(
    image: string,
    opts: BuildOptions,
    ctx: DockerCallContext,
  ): Promise<void> {
    this.exec(buildDockerBuild(image, opts), ctx, {
      message: `Failed to build Docker image: ${image}`,
      code: 'EBUILDFAILED',
    });
  }

  async push(image: string, ctx: DockerCallContext): Promise<void> {
    this.exec(buildDockerPush(image), ctx, {
      message: `Failed to push Docker image: ${image}`,
      code: 'EPUSHFAILED',
    });
  }

  async run(
    image: string,
    opts: RunOptions,
    ctx: DockerCallContext,
  ): Promise<string> {
    const cmd = buildDockerRun(image, {
      name: opts.name,
      ports: opts.ports,
      envNames: Object.keys(opts.env),
    });
    return this.exec(
      cmd,
      ctx,
      {
        message: `Failed to start container ${opts.name} from ${image}`,
        code: 'ERUNFAILED',
      },
      { env: opts.env },
    );
  }

  async ps(ctx: DockerCallContext): Promise<string> {
    return this.exec(buildDockerPs(), ctx, {
      message: 'Failed to list containers.',
      code: 'EVERIFYFAILED',
    });
  }

  async inspect(
    name: string,
    ctx: DockerCallContext,
  ): Promise<ContainerState> {
    const out = this.exec(buildDockerInspect(name), ctx, {
      message: `Failed to inspect container ${name}`,
      code: 'EVERIFYFAILED',
    });
    return parseContainerState(out);
  }

  async logs(
    name: string,
    tail: number | undefined,
    ctx: DockerCallContext,
  ): Promise<string> {
    return this.exec(buildDockerLogs(name, tail), ctx, {
      message: `Failed to read logs of container ${name}`,
      code: 'EVERIFYFAILED',
    });
  }

  async stop(name: string, ctx: DockerCallContext): Promise<void> {
    this.exec(buildDockerStop(name), ctx, {
      message: `Failed to stop container ${name}`,
      code: 'ECLEANUPFAILED',
    });
  }

  async remove(name: string, ctx: DockerCallContext): Promise<void> {
    this.exec(buildDockerRemove(name), ctx, {
      message: `Failed to remove container ${name}`,
      code: 'ECLEANUPFAILED',
    });
  }

  /**
   * Log and run one command. A runner failure is logged with whatever
   * output the error captured and rethrown as a SemanticReleaseError
   * with the operation's code.
   */
  private exec(
    cmd: string,
    ctx: DockerCallContext,
    failure: { message: string; code: string },
    extra: { input?: string; env?: Record<string, string> } = {},
  ): string {
    ctx.logger.log(`$ ${cmd}`);
    try {
      const { stdout } = this.runFn(cmd, { cwd: ctx.cwd, ...extra });
      ctx.logger.log(stdout.length ? stdout : '(no output)');
      return stdout;
    } catch (e) {
      logCommandFailure(cmd, e, ctx.logger);
      const msg = e instanceof Error ? e.message : 'Unknown error';
      throw new SemanticReleaseError(failure.message, failure.code, msg);
    }
  }
}
