import { describe, expect, it } from '@jest/globals';
import { describeEvent, isTriggered, readEvent } from '../src/trigger.js';

describe('readEvent', () => {
  it('is undefined outside CI', () => {
    expect(readEvent({})).toBeUndefined();
  });

  it('reads the pushed branch from GITHUB_REF_NAME', () => {
    expect(
      readEvent({ GITHUB_EVENT_NAME: 'push', GITHUB_REF_NAME: 'main' }),
    ).toEqual({ name: 'push', branch: 'main' });
  });

  it('falls back to GITHUB_REF for the pushed branch', () => {
    expect(
      readEvent({ GITHUB_EVENT_NAME: 'push', GITHUB_REF: 'refs/heads/dev' }),
    ).toEqual({ name: 'push', branch: 'dev' });
  });

  it('reads the base branch of a pull request', () => {
    expect(
      readEvent({
        GITHUB_EVENT_NAME: 'pull_request',
        GITHUB_REF_NAME: '42/merge',
        GITHUB_BASE_REF: 'main',
      }),
    ).toEqual({ name: 'pull_request', baseBranch: 'main' });
  });

  it('keeps other event names', () => {
    expect(readEvent({ GITHUB_EVENT_NAME: 'schedule' })).toEqual({
      name: 'other',
      eventName: 'schedule',
    });
  });
});

describe('isTriggered', () => {
  it.each([
    [undefined, true],
    [{ name: 'push', branch: 'main' }, true],
    [{ name: 'push', branch: 'feature/x' }, false],
    [{ name: 'pull_request', baseBranch: 'main' }, true],
    [{ name: 'pull_request', baseBranch: 'release' }, false],
    [{ name: 'other', eventName: 'schedule' }, false],
  ] as const)('%j on main -> %s', (event, expected) => {
    expect(isTriggered(event, 'main')).toBe(expected);
  });
});

describe('describeEvent', () => {
  it('names each kind of event', () => {
    expect(describeEvent(undefined)).toBe('local invocation');
    expect(describeEvent({ name: 'push', branch: 'main' })).toBe(
      'push to "main"',
    );
    expect(describeEvent({ name: 'pull_request', baseBranch: 'main' })).toBe(
      'pull request against "main"',
    );
    expect(describeEvent({ name: 'other', eventName: 'schedule' })).toBe(
      '"schedule" event',
    );
  });
});
