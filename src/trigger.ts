/**
 * The repository event a CI run was started for.
 */
export type RepositoryEvent =
  | { name: 'push'; branch: string }
  | { name: 'pull_request'; baseBranch: string }
  | { name: 'other'; eventName: string };

/**
 * Read the event from a GitHub Actions style environment. Returns
 * `undefined` outside CI, i.e. when `GITHUB_EVENT_NAME` is not set.
 */
export function readEvent(
  env: Record<string, string | undefined>,
): RepositoryEvent | undefined {
  const eventName = env.GITHUB_EVENT_NAME;
  if (!eventName) return undefined;

  switch (eventName) {
    case 'push':
      return {
        name: 'push',
        branch: env.GITHUB_REF_NAME ?? branchFromRef(env.GITHUB_REF),
      };
    case 'pull_request':
      return { name: 'pull_request', baseBranch: env.GITHUB_BASE_REF ?? '' };
    default:
      return { name: 'other', eventName };
  }
}

function branchFromRef(ref: string | undefined): string {
  const prefix = 'refs/heads/';
  return ref?.startsWith(prefix) ? ref.slice(prefix.length) : '';
}

/**
 * Whether the pipeline runs for an event: a push to `branch`, or a pull
 * request targeting it. A missing event is a local invocation and always
 * runs.
 */
export function isTriggered(
  event: RepositoryEvent | undefined,
  branch: string,
): boolean {
  if (event === undefined) return true;
  switch (event.name) {
    case 'push':
      return event.branch === branch;
    case 'pull_request':
      return event.baseBranch === branch;
    case 'other':
      return false;
  }
}

/**
 * Human-readable description of an event for log lines.
 */
export function describeEvent(event: RepositoryEvent | undefined): string {
  if (event === undefined) return 'local invocation';
  switch (event.name) {
    case 'push':
      return `push to "${event.branch}"`;
    case 'pull_request':
      return `pull request against "${event.baseBranch}"`;
    case 'other':
      return `"${event.eventName}" event`;
  }
}
