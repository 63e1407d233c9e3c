import { describe, it, expect } from '@jest/globals';
import * as fs from 'fs';
import * as path from 'path';

// noinspection ES6PreferShortImport
import plugin, { createPlugin } from '../src/index.js';
import type { DeployPluginConfig } from '../src/plugin-config.js';
import { FakeDockerClient, makeLogger } from './utils/fake-docker.js';
import { withTempDir } from './utils/tmpdir.js';

const ENV = {
  DOCKER_HUB_USERNAME: 'octo',
  DOCKER_HUB_ACCESS_TOKEN: 'test-token',
  AIPROXY_TOKEN: 'test-secret',
};

const CONFIG: DeployPluginConfig = {
  imageName: 'app',
  secretEnv: ['AIPROXY_TOKEN'],
};

function makePlugin(client = new FakeDockerClient()) {
  const sleeps: number[] = [];
  const p = createPlugin({
    client,
    revision: () => '0123456789abcdef0123456789abcdef01234567',
    sleep: async (ms) => {
      sleeps.push(ms);
    },
  });
  return { client, sleeps, plugin: p };
}

describe('verifyConditions', () => {
  it('passes with Docker, a valid config, credentials and secrets', async () => {
    const { plugin: p } = makePlugin();
    const logger = makeLogger();

    await p.verifyConditions(CONFIG, { cwd: '/repo', env: ENV, logger });

    expect(logger.out).toEqual([
      'verifyConditions: starting',
      'fake docker version',
      'verifyConditions: image="***/app:latest", container="app-run", ' +
        'usernamePresent=true, tokenPresent=true',
      'verifyConditions: ok',
    ]);
  });

  it('fails with ENODOCKER when the daemon is unreachable', async () => {
    const client = new FakeDockerClient();
    client.failOn.version = 'Cannot connect to the Docker daemon';
    const { plugin: p } = makePlugin(client);

    await expect(
      p.verifyConditions(CONFIG, { env: ENV, logger: makeLogger() }),
    ).rejects.toMatchObject({
      code: 'ENODOCKER',
      details: 'Cannot connect to the Docker daemon',
    });
  });

  it('fails with EINVALIDCONFIG listing the problems', async () => {
    const { plugin: p } = makePlugin();

    await expect(
      p.verifyConditions({}, { env: ENV, logger: makeLogger() }),
    ).rejects.toMatchObject({
      code: 'EINVALIDCONFIG',
      details: 'Either "image" or "imageName" must be set.',
    });
  });

  it('fails with EMISSINGCREDENTIALS without a token', async () => {
    const { plugin: p } = makePlugin();
    const logger = makeLogger();

    await expect(
      p.verifyConditions(CONFIG, {
        env: { DOCKER_HUB_USERNAME: 'octo', AIPROXY_TOKEN: 'test-secret' },
        logger,
      }),
    ).rejects.toMatchObject({ code: 'EMISSINGCREDENTIALS' });
    expect(logger.out).toContain(
      'verifyConditions: image="***/app:latest", container="app-run", ' +
        'usernamePresent=true, tokenPresent=false',
    );
  });

  it('fails with EMISSINGSECRET naming the unset variable', async () => {
    const { plugin: p } = makePlugin();

    await expect(
      p.verifyConditions(CONFIG, {
        env: {
          DOCKER_HUB_USERNAME: 'octo',
          DOCKER_HUB_ACCESS_TOKEN: 'test-token',
        },
        logger: makeLogger(),
      }),
    ).rejects.toMatchObject({
      code: 'EMISSINGSECRET',
      details: 'Set AIPROXY_TOKEN in the environment.',
    });
  });
});

describe('publish', () => {
  it(
    'runs the pipeline and leaves no container behind',
    withTempDir(async (cwd) => {
      fs.writeFileSync(path.join(cwd, 'Dockerfile'), 'FROM scratch\n');
      const { client, sleeps, plugin: p } = makePlugin();
      const logger = makeLogger();

      const result = await p.publish(CONFIG, { cwd, env: ENV, logger });

      expect(result).toBeUndefined();
      expect(logger.out[0]).toBe('publish: starting');
      expect(logger.out.at(-1)).toBe('publish: done');
      expect(client.pushed).toEqual(['octo/app:latest']);
      expect(client.containers.size).toBe(0);
      expect(sleeps).toEqual([10_000]);
    }),
  );

  it(
    'fails with the first step error after cleaning up',
    withTempDir(async (cwd) => {
      fs.writeFileSync(path.join(cwd, 'Dockerfile'), 'FROM scratch\n');
      const client = new FakeDockerClient();
      client.failOn.push = 'denied: requested access to the resource';
      const { plugin: p } = makePlugin(client);
      const logger = makeLogger();

      await expect(
        p.publish(CONFIG, { cwd, env: ENV, logger }),
      ).rejects.toMatchObject({ code: 'EPUSHFAILED' });
      expect(client.count('logout')).toBe(1);
      expect(logger.out).not.toContain('publish: done');
    }),
  );
});

describe('default export', () => {
  it('exposes the semantic-release lifecycle steps', () => {
    expect(typeof plugin.verifyConditions).toBe('function');
    expect(typeof plugin.publish).toBe('function');
  });
});
