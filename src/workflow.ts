import * as yaml from 'yaml';
import {
  buildDockerBuild,
  buildDockerLogs,
  buildDockerPs,
  buildDockerPush,
  buildDockerRemove,
  buildDockerRun,
  buildDockerStop,
} from './docker/cli-client.js';
import type { DeployPluginConfig } from './plugin-config.js';
import { DeployConfig, TOKEN_ENV, USERNAME_ENV } from './plugin-config.js';

export interface WorkflowStep {
  name: string;
  if?: string;
  uses?: string;
  with?: Record<string, string>;
  env?: Record<string, string>;
  run?: string;
}

export interface Workflow {
  name: string;
  on: {
    push: { branches: string[] };
    pull_request: { branches: string[] };
  };
  jobs: Record<
    string,
    { 'runs-on': string; steps: WorkflowStep[] }
  >;
}

const secret = (name: string) => `\${{ secrets.${name} }}`;

/**
 * The image reference as it appears in the workflow. When the namespace
 * falls back to a registry username that is not configured, the
 * username is a repository secret, so the reference embeds the secret
 * expression.
 */
function workflowImage(cfg: DeployConfig): string {
  const ref = cfg.getImage();
  if (!cfg.usesUsernameNamespace() || cfg.hasRegistryUser()) {
    return ref.toString();
  }
  const registry = ref.registry ? `${ref.registry}/` : '';
  return `${registry}${secret(USERNAME_ENV)}/${ref.name}:${ref.tag}`;
}

/**
 * Describe the pipeline as a declarative CI workflow: the same steps in
 * the same order, with the teardown step set to run on every outcome.
 * Docker commands come from the builders the CLI client runs, so the
 * workflow and the plugin issue identical commands.
 *
 * The environment is not consulted: credentials and forwarded values
 * are referenced as repository secrets.
 */
export function buildWorkflow(raw: DeployPluginConfig): Workflow {
  const cfg = new DeployConfig(raw, {});
  const image = workflowImage(cfg);
  const name = cfg.getContainerName();
  const branch = cfg.getBranch();
  const registry = cfg.getRegistry();
  const envNames = cfg.getSecretEnvNames();

  const login: Record<string, string> = {};
  if (registry) login.registry = registry;
  login.username = cfg.getRegistryUsername() ?? secret(USERNAME_ENV);
  login.password = secret(TOKEN_ENV);

  const runStep: WorkflowStep = {
    name: 'Run Docker Container',
    run: [
      buildDockerRun(image, { name, ports: cfg.getPorts(), envNames }),
      `sleep ${cfg.getStartupDelayMs() / 1000}`,
    ].join('\n'),
  };
  if (envNames.length > 0) {
    runStep.env = Object.fromEntries(envNames.map((n) => [n, secret(n)]));
  }

  const verify = [buildDockerPs(), buildDockerLogs(name, cfg.getLogTail())];
  if (cfg.isHealthCheckEnabled()) {
    verify.push(
      `test "$(docker inspect --format '{{.State.Running}}' ${name})" = true`,
    );
  }

  const steps: WorkflowStep[] = [
    { name: 'Checkout Repository', uses: 'actions/checkout@v4' },
    { name: 'Set up Docker Buildx', uses: 'docker/setup-buildx-action@v3' },
    { name: 'Log in to Registry', uses: 'docker/login-action@v3', with: login },
    {
      name: 'Build Docker Image',
      run: buildDockerBuild(image, {
        context: cfg.getContext(),
        dockerfile: cfg.getDockerfilePath(),
        buildArgs: cfg.getBuildArgs(),
        labels: { 'org.opencontainers.image.revision': '${{ github.sha }}' },
      }),
    },
    { name: 'Push Docker Image', run: buildDockerPush(image) },
    runStep,
    { name: 'Verify Container', run: verify.join('\n') },
    {
      name: 'Stop & Remove Container',
      if: 'always()',
      run: [buildDockerStop(name), buildDockerRemove(name)].join('\n'),
    },
  ];

  return {
    name: 'Docker Build, Push & Run',
    on: {
      push: { branches: [branch] },
      pull_request: { branches: [branch] },
    },
    jobs: {
      'build-push-run': { 'runs-on': 'ubuntu-latest', steps },
    },
  };
}

/**
 * Render `buildWorkflow` as YAML.
 */
export function renderWorkflow(raw: DeployPluginConfig): string {
  return yaml.stringify(buildWorkflow(raw), { lineWidth: 0 });
}
