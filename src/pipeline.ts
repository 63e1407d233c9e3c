import * as fs from 'fs';
import * as path from 'path';
import { setTimeout as delay } from 'node:timers/promises';
import SemanticReleaseError from '@semantic-release/error';
import type { ContainerState, DockerClient } from './docker/client.js';
import { DockerCliClient } from './docker/cli-client.js';
import { DockerContainer } from './docker/container.js';
import { DockerImage } from './docker/image.js';
import type { Logger } from './logger.js';
import { redactingLogger } from './logger.js';
import type { DeployConfig } from './plugin-config.js';
import type { RevisionReader } from './source.js';
import { readRevision } from './source.js';

export type StepName =
  | 'checkout'
  | 'setup-builder'
  | 'login'
  | 'build'
  | 'push'
  | 'run'
  | 'verify'
  | 'cleanup';

export type StepStatus = 'success' | 'failure' | 'skipped';

export interface StepResult {
  step: StepName;
  status: StepStatus;
  code?: string;
  message?: string;
}

/**
 * Everything one pipeline execution produced. Fields after `container`
 * are filled in by the step that observes them and stay undefined when
 * that step did not run.
 */
export interface PipelineReport {
  status: 'success' | 'failure';
  image: string;
  container: string;
  revision?: string;
  containerId?: string;
  listing?: string;
  /** Whether the process listing contains the named container. */
  listed?: boolean;
  state?: ContainerState;
  logs?: string;
  steps: StepResult[];
  /** The error of the first failing step. */
  error?: SemanticReleaseError;
}

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

const defaultSleep: Sleep = async (ms, signal) => {
  await delay(ms, undefined, { signal });
};

export interface PipelineOptions {
  client?: DockerClient;
  revision?: RevisionReader;
  sleep?: Sleep;
  /** Aborting skips the remaining steps; cleanup still runs. */
  signal?: AbortSignal;
}

const STEP_CODES: Record<StepName, string> = {
  checkout: 'ENOSOURCE',
  'setup-builder': 'EBUILDERFAILED',
  login: 'ELOGINFAILED',
  build: 'EBUILDFAILED',
  push: 'EPUSHFAILED',
  run: 'ERUNFAILED',
  verify: 'EVERIFYFAILED',
  cleanup: 'ECLEANUPFAILED',
};

const REVISION_LABEL = 'org.opencontainers.image.revision';

/**
 * Mutable state shared between the steps of one execution.
 */
interface Execution {
  report: PipelineReport;
  loggedIn: boolean;
  runAttempted: boolean;
}

/**
 * Drives the container toolchain through checkout, builder setup, login,
 * build, push, run and verify, strictly in that order, then always runs
 * cleanup. The first failing step stops the sequence: every later step
 * except cleanup is recorded as skipped.
 *
 * The same image reference is used for build, push and run, so the
 * container always runs the artifact that was just published.
 */
export class DeploymentPipeline {
  private readonly cfg: DeployConfig;
  private readonly cwd: string;
  private readonly logger: Logger;
  private readonly client: DockerClient;
  private readonly revision: RevisionReader;
  private readonly sleep: Sleep;
  private readonly signal: AbortSignal | undefined;
  private readonly image: DockerImage;
  private readonly container: DockerContainer;

  /**
   * @throws SemanticReleaseError `EINVALIDCONFIG` when the configuration
   * does not validate.
   */
  constructor(
    cfg: DeployConfig,
    cwd: string,
    logger: Logger,
    opts: PipelineOptions = {},
  ) {
    const problems = cfg.validate();
    if (problems.length > 0) {
      throw new SemanticReleaseError(
        'Invalid docker-verify configuration.',
        'EINVALIDCONFIG',
        problems.join('\n'),
      );
    }

    this.cfg = cfg;
    this.cwd = cwd;
    this.logger = redactingLogger(logger, cfg.getSecretValues());
    this.client = opts.client ?? new DockerCliClient();
    this.revision = opts.revision ?? readRevision;
    this.sleep = opts.sleep ?? defaultSleep;
    this.signal = opts.signal;

    this.image = new DockerImage(
      cfg.getImage(),
      cwd,
      this.logger,
      this.client,
    );
    this.container = new DockerContainer(
      cfg.getContainerName(),
      cwd,
      this.logger,
      this.client,
    );
  }

  /**
   * Run every step and return the report. Step failures never reject
   * the promise; they are recorded in the report and its `error`.
   */
  async execute(): Promise<PipelineReport> {
    const exec: Execution = {
      report: {
        status: 'success',
        image: this.image.reference,
        container: this.container.name,
        steps: [],
      },
      loggedIn: false,
      runAttempted: false,
    };

    const steps: Array<[StepName, () => Promise<void>]> = [
      ['checkout', () => this.checkout(exec)],
      ['setup-builder', () => this.client.setupBuilder(this.ctx())],
      ['login', () => this.login(exec)],
      ['build', () => this.build(exec)],
      ['push', () => this.image.push()],
      ['run', () => this.run(exec)],
      ['verify', () => this.verify(exec)],
    ];

    for (const [step, fn] of steps) {
      if (exec.report.error) {
        exec.report.steps.push({ step, status: 'skipped' });
        continue;
      }

      try {
        this.throwIfCancelled(step);
        this.logger.log(`${step}: starting`);
        await fn();
        exec.report.steps.push({ step, status: 'success' });
        this.logger.log(`${step}: ok`);
      } catch (err: unknown) {
        const error = this.toStepError(step, err);
        exec.report.error = error;
        exec.report.status = 'failure';
        exec.report.steps.push({
          step,
          status: 'failure',
          code: error.code,
          message: error.message,
        });
        this.logger.error(`${step}: failed (${error.code}) ${error.message}`);
        if (error.details) this.logger.error(error.details);
      }
    }

    exec.report.steps.push(await this.cleanup(exec));

    this.logger.log(
      JSON.stringify({
        docker: {
          image: exec.report.image,
          container: exec.report.container,
          status: exec.report.status,
          steps: Object.fromEntries(
            exec.report.steps.map((s) => [s.step, s.status]),
          ),
        },
      }),
    );

    return exec.report;
  }

  /**
   * Run every step and reject with the first step error, after cleanup
   * has run.
   */
  async executeOrThrow(): Promise<PipelineReport> {
    const report = await this.execute();
    if (report.error) {
      throw report.error;
    }
    return report;
  }

  private async checkout(exec: Execution): Promise<void> {
    const contextDir = path.resolve(this.cwd, this.cfg.getContext());
    if (!fs.existsSync(contextDir) || !fs.statSync(contextDir).isDirectory()) {
      throw new SemanticReleaseError(
        'Build context not found.',
        'ENOSOURCE',
        `No directory at ${contextDir}.`,
      );
    }

    const dockerfile = path.resolve(this.cwd, this.cfg.getDockerfilePath());
    if (!fs.existsSync(dockerfile)) {
      throw new SemanticReleaseError(
        'Dockerfile not found.',
        'ENODOCKERFILE',
        `No Dockerfile at ${dockerfile}.`,
      );
    }

    exec.report.revision = this.revision(this.cwd, this.logger);
    this.logger.log(`checkout: revision ${exec.report.revision}`);
  }

  private async login(exec: Execution): Promise<void> {
    const username = this.cfg.getRegistryUsername();
    const password = this.cfg.getRegistryToken();
    if (!username || !password) {
      throw new SemanticReleaseError(
        'Missing registry credentials.',
        'EMISSINGCREDENTIALS',
        'Provide registryUsername and registryToken, or the ' +
          'DOCKER_HUB_USERNAME and DOCKER_HUB_ACCESS_TOKEN variables.',
      );
    }

    await this.client.login(
      { username, password, registry: this.cfg.getRegistry() },
      this.ctx(),
    );
    exec.loggedIn = true;
  }

  private async build(exec: Execution): Promise<void> {
    const labels: Record<string, string> = {};
    if (exec.report.revision) {
      labels[REVISION_LABEL] = exec.report.revision;
    }
    await this.image.build({
      context: this.cfg.getContext(),
      dockerfile: this.cfg.getDockerfilePath(),
      buildArgs: this.cfg.getBuildArgs(),
      labels,
    });
  }

  private async run(exec: Execution): Promise<void> {
    const missing = this.cfg.getMissingSecretEnv();
    if (missing.length > 0) {
      this.logger.error(
        `run: not forwarding unset variable(s): ${missing.join(', ')}`,
      );
    }

    exec.runAttempted = true;
    exec.report.containerId = await this.container.start(
      this.image.reference,
      { ports: this.cfg.getPorts(), env: this.cfg.getSecretEnv() },
    );

    const ms = this.cfg.getStartupDelayMs();
    if (ms > 0) {
      this.logger.log(`run: waiting ${ms / 1000}s for startup`);
      await this.sleep(ms, this.signal);
    }
  }

  private async verify(exec: Execution): Promise<void> {
    const name = this.container.name;

    const listing = await this.container.listing();
    exec.report.listing = listing;
    exec.report.listed = listing
      .split('\n')
      .some((line) => line.trim().split(/\s+/).includes(name));

    const state = await this.container.state();
    exec.report.state = state;
    exec.report.logs = await this.container.logs(this.cfg.getLogTail());

    this.logger.log(
      `verify: container ${name} is ${state.status}` +
        (state.running ? '' : ` (exit code ${state.exitCode})`),
    );

    if (this.cfg.isHealthCheckEnabled() && !state.running) {
      throw new SemanticReleaseError(
        `Container ${name} is not running.`,
        'EUNHEALTHY',
        `Status "${state.status}", exit code ${state.exitCode}. ` +
          'See the container logs above.',
      );
    }
  }

  /**
   * Stop and remove the container, then log out of the registry. Each
   * action is attempted even when an earlier one failed, and no failure
   * is rethrown. Nothing is stopped when no container was started.
   */
  private async cleanup(exec: Execution): Promise<StepResult> {
    this.logger.log('cleanup: starting');
    const failures: string[] = [];

    const attempt = async (what: string, fn: () => Promise<void>) => {
      try {
        await fn();
      } catch (err: unknown) {
        const msg = err instanceof Error ? err.message : String(err);
        failures.push(`${what}: ${msg}`);
        this.logger.error(`cleanup: ${what} failed: ${msg}`);
      }
    };

    if (exec.runAttempted) {
      await attempt('stop', () => this.container.stop());
      await attempt('remove', () => this.container.remove());
    } else {
      this.logger.log('cleanup: no container was started');
    }

    if (exec.loggedIn && this.cfg.shouldLogout()) {
      await attempt('logout', () =>
        this.client.logout(this.cfg.getRegistry(), this.ctx()),
      );
    }

    if (failures.length > 0) {
      return {
        step: 'cleanup',
        status: 'failure',
        code: STEP_CODES.cleanup,
        message: failures.join('; '),
      };
    }
    this.logger.log('cleanup: ok');
    return { step: 'cleanup', status: 'success' };
  }

  private throwIfCancelled(step: StepName): void {
    if (this.signal?.aborted) {
      throw new SemanticReleaseError(
        'Pipeline cancelled.',
        'ECANCELLED',
        `Cancelled before "${step}".`,
      );
    }
  }

  private toStepError(step: StepName, err: unknown): SemanticReleaseError {
    if (err instanceof SemanticReleaseError) {
      return err;
    }
    if (this.signal?.aborted) {
      return new SemanticReleaseError(
        'Pipeline cancelled.',
        'ECANCELLED',
        `Cancelled during "${step}".`,
      );
    }
    return new SemanticReleaseError(
      `Step "${step}" failed.`,
      STEP_CODES[step],
      err instanceof Error ? err.message : String(err),
    );
  }

  private ctx() {
    return { cwd: this.cwd, logger: this.logger };
  }
}
