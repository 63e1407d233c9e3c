import { expect, test } from '@jest/globals';
import { DockerContainer } from '../../src/docker/container.js';
import { FakeDockerClient, makeLogger } from '../utils/fake-docker.js';

test('DockerContainer addresses one name from start to removal', async () => {
  const client = new FakeDockerClient();
  const logger = makeLogger();
  const container = new DockerContainer('app-run', '/repo', logger, client);

  const id = await container.start('octo/app:latest', {
    ports: ['8000:8000'],
    env: {},
  });
  const state = await container.state();
  const logs = await container.logs(20);
  await container.stop();
  await container.remove();

  expect(id).toBe('c0ffee7');
  expect(state).toEqual({ status: 'running', running: true, exitCode: 0 });
  expect(logs).toBe('Application startup complete.');
  expect(client.calls).toEqual([
    { method: 'run', target: 'octo/app:latest' },
    { method: 'inspect', target: 'app-run' },
    { method: 'logs', target: 'app-run' },
    { method: 'stop', target: 'app-run' },
    { method: 'remove', target: 'app-run' },
  ]);
  expect(client.containers.size).toBe(0);
});

test('DockerContainer.listing includes the running container', async () => {
  const client = new FakeDockerClient();
  const container = new DockerContainer('web', '/repo', makeLogger(), client);

  await container.start('octo/web:2', { ports: [], env: {} });

  await expect(container.listing()).resolves.toBe(
    'CONTAINER ID   IMAGE   STATUS   NAMES\n' +
      'c0ffee   octo/web:2   running   web',
  );
});

test('DockerContainer.stop surfaces a missing container', async () => {
  const container = new DockerContainer(
    'ghost',
    '/repo',
    makeLogger(),
    new FakeDockerClient(),
  );

  await expect(container.stop()).rejects.toMatchObject({
    code: 'ECLEANUPFAILED',
    details: 'Error: No such container: ghost',
  });
});
