import SemanticReleaseError from '@semantic-release/error';
import type { DockerClient } from './docker/client.js';
import { DockerCliClient } from './docker/cli-client.js';
import type { Logger } from './logger.js';
import { redactingLogger } from './logger.js';
import type { PipelineOptions } from './pipeline.js';
import { DeploymentPipeline } from './pipeline.js';
import type { DeployPluginConfig } from './plugin-config.js';
import { DeployConfig } from './plugin-config.js';

export type { DeployPluginConfig } from './plugin-config.js';
export type { PipelineReport, StepResult } from './pipeline.js';
export { DeploymentPipeline } from './pipeline.js';
export { DeployConfig } from './plugin-config.js';
export { renderWorkflow } from './workflow.js';

/**
 * The part of the semantic-release context this plugin reads.
 */
export interface PluginContext {
  cwd?: string;
  env?: Record<string, string | undefined>;
  logger: Logger;
}

/**
 * Collaborators of the lifecycle steps. semantic-release calls the
 * default export, which uses the Docker CLI; tests supply their own.
 */
export interface PluginDeps {
  client?: DockerClient;
  revision?: PipelineOptions['revision'];
  sleep?: PipelineOptions['sleep'];
}

export interface DockerVerifyPlugin {
  verifyConditions(
    pluginConfig: DeployPluginConfig,
    context: PluginContext,
  ): Promise<void>;
  publish(
    pluginConfig: DeployPluginConfig,
    context: PluginContext,
  ): Promise<void>;
}

/**
 * Build the lifecycle steps around the given collaborators.
 */
export function createPlugin(deps: PluginDeps = {}): DockerVerifyPlugin {
  const client = deps.client ?? new DockerCliClient();

  /**
   * semantic-release `verifyConditions` step. Verifies that:
   * - Docker is available,
   * - the configuration is complete and well-formed,
   * - registry credentials are present,
   * - every forwarded variable is set.
   *
   * Only presence is checked; whether the credentials are accepted is
   * left to the login step of the pipeline.
   *
   * @throws SemanticReleaseError when a precondition is not satisfied.
   */
  async function verifyConditions(
    pluginConfig: DeployPluginConfig,
    context: PluginContext,
  ): Promise<void> {
    const cwd = context.cwd ?? process.cwd();
    const cfg = new DeployConfig(pluginConfig, context.env ?? process.env);
    const logger = redactingLogger(context.logger, cfg.getSecretValues());

    logger.log('verifyConditions: starting');

    try {
      await client.version({ cwd, logger });
    } catch (err: unknown) {
      if (err instanceof SemanticReleaseError) {
        throw err;
      }
      throw new SemanticReleaseError(
        'Docker not available.',
        'ENODOCKER',
        'Docker must be installed, on PATH, and its daemon reachable.',
      );
    }

    const problems = cfg.validate();
    if (problems.length > 0) {
      throw new SemanticReleaseError(
        'Invalid docker-verify configuration.',
        'EINVALIDCONFIG',
        problems.join('\n'),
      );
    }

    const haveUser = cfg.hasRegistryUser();
    const haveToken = cfg.hasRegistryToken();
    logger.log(
      `verifyConditions: image="${cfg.getImage().toString()}", ` +
        `container="${cfg.getContainerName()}", ` +
        `usernamePresent=${haveUser}, tokenPresent=${haveToken}`,
    );
    if (!haveUser || !haveToken) {
      throw new SemanticReleaseError(
        'Missing registry credentials.',
        'EMISSINGCREDENTIALS',
        'Provide registryUsername and registryToken, or the ' +
          'DOCKER_HUB_USERNAME and DOCKER_HUB_ACCESS_TOKEN variables.',
      );
    }

    const missing = cfg.getMissingSecretEnv();
    if (missing.length > 0) {
      throw new SemanticReleaseError(
        'Missing forwarded variables.',
        'EMISSINGSECRET',
        `Set ${missing.join(', ')} in the environment.`,
      );
    }

    logger.log('verifyConditions: ok');
  }

  /**
   * semantic-release `publish` step. Builds the image, pushes it, runs
   * it, verifies it and tears the container down. Teardown happens even
   * when an earlier step fails; the release then fails with the first
   * step's error.
   *
   * @throws SemanticReleaseError from the first failing step.
   */
  async function publish(
    pluginConfig: DeployPluginConfig,
    context: PluginContext,
  ): Promise<void> {
    const cwd = context.cwd ?? process.cwd();
    const cfg = new DeployConfig(pluginConfig, context.env ?? process.env);

    context.logger.log('publish: starting');
    const pipeline = new DeploymentPipeline(cfg, cwd, context.logger, {
      client,
      revision: deps.revision,
      sleep: deps.sleep,
    });
    await pipeline.executeOrThrow();
    context.logger.log('publish: done');
  }

  return { verifyConditions, publish };
}

const plugin = createPlugin();

export const verifyConditions = plugin.verifyConditions;
export const publish = plugin.publish;

// noinspection JSUnusedGlobalSymbols
export default { verifyConditions, publish };
