// noinspection JSUnusedGlobalSymbols
import * as path from 'path';
import SemanticReleaseError from '@semantic-release/error';
import { ImageReference } from './docker/image.js';

export const USERNAME_ENV = 'DOCKER_HUB_USERNAME';
export const TOKEN_ENV = 'DOCKER_HUB_ACCESS_TOKEN';

export interface DeployPluginConfig {
  /**
   * Full image reference. Example: `"octo/app:latest"`. When set, the
   * `imageName`, `imageNamespace`, `imageTag` and `registry` options are
   * ignored for the reference, and the registry for login is taken from
   * the reference.
   */
  image?: string;

  /**
   * Repository name of the image. Required unless `image` is set.
   * Example: `"project2-project"`.
   */
  imageName?: string;

  /**
   * Namespace of the image. When omitted, falls back to the registry
   * username, which is where Docker Hub expects personal images.
   */
  imageNamespace?: string;

  /**
   * Tag used for build, push and run. Default is `"latest"`.
   */
  imageTag?: string;

  /**
   * Registry host, e.g. `"ghcr.io"`. When omitted, Docker Hub is used.
   */
  registry?: string;

  /**
   * Build context relative to the working directory. Default is `"."`.
   */
  context?: string;

  /**
   * Dockerfile relative to the build context. Default is `"Dockerfile"`.
   */
  dockerfile?: string;

  /**
   * Values passed as `--build-arg`.
   */
  buildArgs?: Record<string, string>;

  /**
   * Registry username. When omitted, falls back to the
   * `DOCKER_HUB_USERNAME` environment variable if set.
   */
  registryUsername?: string;

  /**
   * Registry access token. When omitted, falls back to the
   * `DOCKER_HUB_ACCESS_TOKEN` environment variable if set.
   */
  registryToken?: string;

  /**
   * Name of the container started for verification. Default is
   * `"<imageName>-run"`.
   */
  containerName?: string;

  /**
   * Port mappings as `host:container`. Default is `["8000:8000"]`.
   */
  ports?: string[];

  /**
   * Names of environment variables forwarded into the container, e.g.
   * `["AIPROXY_TOKEN"]`. Values are read from the environment at run
   * time and never written to logs.
   */
  secretEnv?: string[];

  /**
   * Seconds to wait after starting the container before it is
   * inspected. Default is `10`.
   */
  startupDelay?: number;

  /**
   * Number of log lines retrieved during verification. All lines when
   * omitted.
   */
  logTail?: number;

  /**
   * Fail verification when the container is not running after the
   * startup delay. Default is `false`: verification only reports.
   */
  healthCheck?: boolean;

  /**
   * Log out of the registry during cleanup. Default is `true`.
   */
  logout?: boolean;

  /**
   * Branch whose pushes and pull requests trigger the pipeline from the
   * CLI. Default is `"main"`.
   */
  branch?: string;
}

const PORT_MAPPING = /^(?:(\d{1,5}):)?(\d{1,5})(?:\/(?:tcp|udp|sctp))?$/;
const CONTAINER_NAME = /^[a-zA-Z0-9][a-zA-Z0-9_.-]*$/;
const ENV_NAME = /^[A-Za-z_][A-Za-z0-9_]*$/;

function isPort(value: string | undefined): boolean {
  if (value === undefined) return true;
  const n = Number(value);
  return n >= 1 && n <= 65535;
}

/**
 * DeployConfig wraps the raw plugin config and exposes derived values
 * and defaults. Environment lookups go through the environment passed
 * in, which is the semantic-release context env inside the plugin.
 */
export class DeployConfig {
  private readonly cfg: DeployPluginConfig;
  private readonly env: Record<string, string | undefined>;

  constructor(
    cfg: DeployPluginConfig,
    env: Record<string, string | undefined> = process.env,
  ) {
    this.cfg = cfg;
    this.env = env;
  }

  /**
   * The image reference shared by build, push and run.
   *
   * @throws SemanticReleaseError `EINVALIDIMAGE` when the configured
   * reference or its parts do not form a valid reference.
   */
  getImage(): ImageReference {
    if (this.cfg.image) {
      return ImageReference.parse(this.cfg.image);
    }
    return ImageReference.of({
      registry: this.cfg.registry,
      namespace: this.cfg.imageNamespace ?? this.getRegistryUsername(),
      name: this.cfg.imageName ?? '',
      tag: this.getImageTag(),
    });
  }

  /**
   * Whether the image namespace is the registry username, i.e. neither
   * `image` nor `imageNamespace` is configured.
   */
  usesUsernameNamespace(): boolean {
    return !this.cfg.image && !this.cfg.imageNamespace;
  }

  getImageTag(): string {
    return this.cfg.imageTag ?? 'latest';
  }

  /**
   * Registry host used for login and logout; `undefined` means Docker
   * Hub.
   */
  getRegistry(): string | undefined {
    if (this.cfg.image) {
      return ImageReference.parse(this.cfg.image).registry;
    }
    return this.cfg.registry || undefined;
  }

  getContext(): string {
    return this.cfg.context ?? '.';
  }

  /**
   * Dockerfile path relative to the working directory, as passed to
   * `docker build --file`.
   */
  getDockerfilePath(): string {
    return path.posix.join(
      this.getContext(),
      this.cfg.dockerfile ?? 'Dockerfile',
    );
  }

  getBuildArgs(): Record<string, string> {
    return { ...(this.cfg.buildArgs ?? {}) };
  }

  getRegistryUsername(): string | undefined {
    return this.cfg.registryUsername ?? this.env[USERNAME_ENV];
  }

  getRegistryToken(): string | undefined {
    return this.cfg.registryToken ?? this.env[TOKEN_ENV];
  }

  hasRegistryUser(): boolean {
    return !!this.getRegistryUsername();
  }

  hasRegistryToken(): boolean {
    return !!this.getRegistryToken();
  }

  getContainerName(): string {
    if (this.cfg.containerName) return this.cfg.containerName;
    const last = this.cfg.image?.split('/').pop()?.split(':')[0];
    const name = last || this.cfg.imageName || 'app';
    return `${name}-run`;
  }

  getPorts(): string[] {
    return this.cfg.ports ?? ['8000:8000'];
  }

  getSecretEnvNames(): string[] {
    return this.cfg.secretEnv ?? [];
  }

  /**
   * Forwarded variables that are present in the environment, by name.
   */
  getSecretEnv(): Record<string, string> {
    const out: Record<string, string> = {};
    for (const name of this.getSecretEnvNames()) {
      const value = this.env[name];
      if (typeof value === 'string' && value.length > 0) {
        out[name] = value;
      }
    }
    return out;
  }

  /**
   * Forwarded variables that are declared but absent or empty.
   */
  getMissingSecretEnv(): string[] {
    const present = this.getSecretEnv();
    return this.getSecretEnvNames().filter((n) => !(n in present));
  }

  /**
   * Every secret value this configuration can expose: the registry
   * username and token, and the forwarded variables. Used to mask log
   * output, including image references namespaced by the username.
   */
  getSecretValues(): string[] {
    const username = this.getRegistryUsername();
    const token = this.getRegistryToken();
    return [
      ...(username ? [username] : []),
      ...(token ? [token] : []),
      ...Object.values(this.getSecretEnv()),
    ];
  }

  getStartupDelayMs(): number {
    return (this.cfg.startupDelay ?? 10) * 1000;
  }

  getLogTail(): number | undefined {
    return this.cfg.logTail;
  }

  isHealthCheckEnabled(): boolean {
    return this.cfg.healthCheck === true;
  }

  shouldLogout(): boolean {
    return this.cfg.logout !== false;
  }

  getBranch(): string {
    return this.cfg.branch ?? 'main';
  }

  /**
   * Check the configuration for problems that would make the pipeline
   * fail before any tool runs. Credentials and secrets are not checked
   * here; they may legitimately be supplied later through the
   * environment.
   *
   * @returns One message per problem; empty when the config is usable.
   */
  validate(): string[] {
    const problems: string[] = [];

    if (!this.cfg.image && !this.cfg.imageName) {
      problems.push('Either "image" or "imageName" must be set.');
    } else {
      try {
        this.getImage();
      } catch (err: unknown) {
        if (err instanceof SemanticReleaseError) {
          problems.push(`${err.message}. ${err.details ?? ''}`.trim());
        } else {
          problems.push('Invalid image reference.');
        }
      }
    }

    if (!CONTAINER_NAME.test(this.getContainerName())) {
      problems.push(
        `Invalid container name "${this.getContainerName()}".`,
      );
    }

    for (const mapping of this.getPorts()) {
      const m = PORT_MAPPING.exec(mapping);
      if (!m || !isPort(m[1]) || !isPort(m[2])) {
        problems.push(`Invalid port mapping "${mapping}".`);
      }
    }

    for (const name of this.getSecretEnvNames()) {
      if (!ENV_NAME.test(name)) {
        problems.push(`Invalid environment variable name "${name}".`);
      }
    }

    const delay = this.cfg.startupDelay;
    if (delay !== undefined && !(Number.isFinite(delay) && delay >= 0)) {
      problems.push('"startupDelay" must be a non-negative number.');
    }

    const tail = this.cfg.logTail;
    if (tail !== undefined && !(Number.isInteger(tail) && tail >= 0)) {
      problems.push('"logTail" must be a non-negative integer.');
    }

    return problems;
  }
}
