import { describe, expect, it } from '@jest/globals';
import * as yaml from 'yaml';
import { buildWorkflow, renderWorkflow } from '../src/workflow.js';

const USER = '${{ secrets.DOCKER_HUB_USERNAME }}';
const TOKEN = '${{ secrets.DOCKER_HUB_ACCESS_TOKEN }}';

describe('buildWorkflow', () => {
  it('lists the pipeline steps in order with teardown always run', () => {
    const wf = buildWorkflow({ imageName: 'app', secretEnv: ['AIPROXY_TOKEN'] });
    const steps = wf.jobs['build-push-run']?.steps ?? [];

    expect(wf.name).toBe('Docker Build, Push & Run');
    expect(wf.on).toEqual({
      push: { branches: ['main'] },
      pull_request: { branches: ['main'] },
    });
    expect(wf.jobs['build-push-run']?.['runs-on']).toBe('ubuntu-latest');
    expect(steps).toEqual([
      { name: 'Checkout Repository', uses: 'actions/checkout@v4' },
      { name: 'Set up Docker Buildx', uses: 'docker/setup-buildx-action@v3' },
      {
        name: 'Log in to Registry',
        uses: 'docker/login-action@v3',
        with: { username: USER, password: TOKEN },
      },
      {
        name: 'Build Docker Image',
        run:
          `docker build --tag=${USER}/app:latest --file=Dockerfile ` +
          "--label='org.opencontainers.image.revision=${{ github.sha }}' .",
      },
      { name: 'Push Docker Image', run: `docker push ${USER}/app:latest` },
      {
        name: 'Run Docker Container',
        run:
          'docker run --detach --name=app-run --publish=8000:8000 ' +
          `--env=AIPROXY_TOKEN ${USER}/app:latest\nsleep 10`,
        env: { AIPROXY_TOKEN: '${{ secrets.AIPROXY_TOKEN }}' },
      },
      {
        name: 'Verify Container',
        run: 'docker ps --all\ndocker logs app-run 2>&1',
      },
      {
        name: 'Stop & Remove Container',
        if: 'always()',
        run: 'docker stop app-run\ndocker rm app-run',
      },
    ]);
  });

  it('uses a configured reference, registry and health check', () => {
    const wf = buildWorkflow({
      image: 'ghcr.io/octo/web:2',
      startupDelay: 0.5,
      logTail: 20,
      healthCheck: true,
      branch: 'release',
    });
    const steps = wf.jobs['build-push-run']?.steps ?? [];
    const step = (name: string) => steps.find((s) => s.name === name);

    expect(wf.on.push.branches).toEqual(['release']);
    expect(step('Log in to Registry')?.with).toEqual({
      registry: 'ghcr.io',
      username: USER,
      password: TOKEN,
    });
    expect(step('Run Docker Container')).toEqual({
      name: 'Run Docker Container',
      run:
        'docker run --detach --name=web-run --publish=8000:8000 ' +
        'ghcr.io/octo/web:2\nsleep 0.5',
    });
    expect(step('Verify Container')?.run).toBe(
      'docker ps --all\n' +
        'docker logs --tail=20 web-run 2>&1\n' +
        `test "$(docker inspect --format '{{.State.Running}}' web-run)" = true`,
    );
  });

  it('uses a configured username instead of the secret', () => {
    const wf = buildWorkflow({ imageName: 'app', registryUsername: 'alice' });
    const steps = wf.jobs['build-push-run']?.steps ?? [];

    expect(steps.find((s) => s.name === 'Push Docker Image')?.run).toBe(
      'docker push alice/app:latest',
    );
    expect(steps.find((s) => s.name === 'Log in to Registry')?.with).toEqual({
      username: 'alice',
      password: TOKEN,
    });
  });
});

describe('renderWorkflow', () => {
  it('renders YAML that reads back as the same workflow', () => {
    const raw = { imageName: 'app', imageNamespace: 'octo' };

    expect(yaml.parse(renderWorkflow(raw))).toEqual(buildWorkflow(raw));
  });

  it('starts with the workflow name', () => {
    expect(renderWorkflow({ image: 'octo/app' }).split('\n')[0]).toBe(
      'name: Docker Build, Push & Run',
    );
  });
});
