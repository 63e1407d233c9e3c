#!/usr/bin/env node
import * as fs from 'fs';
import * as path from 'path';
import { Console } from 'node:console';
import { Command, CommanderError, InvalidArgumentError } from 'commander';
import SemanticReleaseError from '@semantic-release/error';
import { DEFAULT_CONFIG_FILE, loadConfigFile } from './config-file.js';
import type { DockerClient } from './docker/client.js';
import type { Logger } from './logger.js';
import type { PipelineOptions } from './pipeline.js';
import { DeploymentPipeline } from './pipeline.js';
import type { DeployPluginConfig } from './plugin-config.js';
import { DeployConfig } from './plugin-config.js';
import { describeEvent, isTriggered, readEvent } from './trigger.js';
import { renderWorkflow } from './workflow.js';

export interface CliDeps {
  client?: DockerClient;
  logger?: Logger;
  env?: Record<string, string | undefined>;
  revision?: PipelineOptions['revision'];
  sleep?: PipelineOptions['sleep'];
  signal?: AbortSignal;
  /** Destination of `workflow` output when no file is given. */
  write?: (text: string) => void;
}

type CommonFlags = {
  config?: string;
  cwd?: string;
};

type RunFlags = CommonFlags & {
  image?: string;
  containerName?: string;
  port?: string[];
  secretEnv?: string[];
  startupDelay?: number;
  healthCheck?: boolean;
  force?: boolean;
};

type WorkflowFlags = CommonFlags & {
  output?: string;
};

function parseSeconds(value: string): number {
  const n = Number(value);
  if (value.trim() === '' || !Number.isFinite(n) || n < 0) {
    throw new InvalidArgumentError('Expected a non-negative number.');
  }
  return n;
}

/**
 * Load the configuration file named by `--config`, or the default file
 * when it exists in the working directory. No file means an empty
 * configuration.
 */
function readConfig(flags: CommonFlags, cwd: string): DeployPluginConfig {
  if (flags.config) {
    return loadConfigFile(path.resolve(cwd, flags.config));
  }
  const fallback = path.join(cwd, DEFAULT_CONFIG_FILE);
  return fs.existsSync(fallback) ? loadConfigFile(fallback) : {};
}

function assertValid(cfg: DeployConfig): void {
  const problems = cfg.validate();
  if (problems.length > 0) {
    throw new SemanticReleaseError(
      'Invalid docker-verify configuration.',
      'EINVALIDCONFIG',
      problems.join('\n'),
    );
  }
}

/**
 * Build the `docker-verify` program. Commands reject instead of exiting
 * so callers decide the exit code.
 */
export function createProgram(deps: CliDeps = {}): Command {
  const logger: Logger =
    deps.logger ?? new Console(process.stdout, process.stderr);
  const env = deps.env ?? process.env;
  const write = deps.write ?? ((text: string) => process.stdout.write(text));

  const program = new Command();
  program
    .name('docker-verify')
    .description(
      'Build, publish, run and verify a Docker image, ' +
        'then remove the container.',
    )
    .exitOverride();

  const run = program
    .command('run')
    .description('execute the pipeline for the current repository event')
    .option('-c, --config <file>', `configuration file (${DEFAULT_CONFIG_FILE})`)
    .option('--cwd <dir>', 'repository working directory')
    .option('--image <ref>', 'image reference, e.g. octo/app:latest')
    .option('--container-name <name>', 'name of the verification container')
    .option('-p, --port <mapping...>', 'host:container port mapping')
    .option('-e, --secret-env <name...>', 'variable forwarded to the container')
    .option('--startup-delay <seconds>', 'pause after start', parseSeconds)
    .option('--health-check', 'fail when the container is not running')
    .option('--force', 'run regardless of the repository event');

  run.action(async () => {
    const flags = run.opts<RunFlags>();
    const cwd = path.resolve(flags.cwd ?? process.cwd());
    const raw: DeployPluginConfig = { ...readConfig(flags, cwd) };
    if (flags.image) raw.image = flags.image;
    if (flags.containerName) raw.containerName = flags.containerName;
    if (flags.port) raw.ports = flags.port;
    if (flags.secretEnv) raw.secretEnv = flags.secretEnv;
    if (flags.startupDelay !== undefined) raw.startupDelay = flags.startupDelay;
    if (flags.healthCheck) raw.healthCheck = true;

    const cfg = new DeployConfig(raw, env);
    assertValid(cfg);

    const event = readEvent(env);
    const branch = cfg.getBranch();
    if (!flags.force && !isTriggered(event, branch)) {
      logger.log(
        `run: skipped, ${describeEvent(event)} does not target "${branch}"`,
      );
      return;
    }
    logger.log(`run: triggered by ${describeEvent(event)}`);

    const pipeline = new DeploymentPipeline(cfg, cwd, logger, {
      client: deps.client,
      revision: deps.revision,
      sleep: deps.sleep,
      signal: deps.signal,
    });
    await pipeline.executeOrThrow();
  });

  const workflow = program
    .command('workflow')
    .description('print the equivalent CI workflow as YAML')
    .option('-c, --config <file>', `configuration file (${DEFAULT_CONFIG_FILE})`)
    .option('--cwd <dir>', 'repository working directory')
    .option('-o, --output <file>', 'write to a file instead of stdout');

  workflow.action(async () => {
    const flags = workflow.opts<WorkflowFlags>();
    const cwd = path.resolve(flags.cwd ?? process.cwd());
    const raw = readConfig(flags, cwd);
    assertValid(new DeployConfig(raw, {}));

    const text = renderWorkflow(raw);
    if (flags.output) {
      const out = path.resolve(cwd, flags.output);
      fs.mkdirSync(path.dirname(out), { recursive: true });
      fs.writeFileSync(out, text, 'utf8');
      logger.log(`workflow: wrote ${out}`);
    } else {
      write(text);
    }
  });

  return program;
}

/**
 * Run the CLI and resolve the process exit code. SIGINT and SIGTERM
 * cancel a running pipeline; its cleanup step still runs before exit.
 */
export async function main(
  argv: string[] = process.argv,
  deps: Omit<CliDeps, 'signal'> = {},
): Promise<number> {
  const logger = deps.logger ?? new Console(process.stdout, process.stderr);
  const controller = new AbortController();
  const cancel = () => controller.abort();
  process.once('SIGINT', cancel);
  process.once('SIGTERM', cancel);

  try {
    await createProgram({
      ...deps,
      logger,
      signal: controller.signal,
    }).parseAsync(argv);
    return 0;
  } catch (err: unknown) {
    if (err instanceof CommanderError) {
      return err.exitCode;
    }
    if (err instanceof SemanticReleaseError) {
      logger.error(`${err.code ?? 'ERROR'}: ${err.message}`);
      if (err.details) logger.error(err.details);
    } else {
      logger.error(err instanceof Error ? err.message : String(err));
    }
    return 1;
  } finally {
    process.off('SIGINT', cancel);
    process.off('SIGTERM', cancel);
  }
}

if (require.main === module) {
  void main().then((code) => {
    process.exitCode = code;
  });
}
