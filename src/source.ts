import SemanticReleaseError from '@semantic-release/error';
import { runHostCmd } from './command-runner.js';
import type { Logger } from './logger.js';

/**
 * Resolves the revision of the source snapshot in a working directory.
 */
export type RevisionReader = (cwd: string, logger: Logger) => string;

/**
 * Read the commit the working tree is checked out at. The revision is
 * stamped on the built image so a running container can be traced back
 * to its source.
 *
 * @param cwd Repository working directory.
 * @param logger Logger receiving the git invocation.
 * @param run Command runner, replaceable in tests.
 * @returns The full commit hash.
 * @throws SemanticReleaseError `ENOSOURCE` when no revision can be read.
 */
export function readRevision(
  cwd: string,
  logger: Logger,
  run: typeof runHostCmd = runHostCmd,
): string {
  let out: string;
  try {
    out = run('git rev-parse HEAD', cwd, logger);
  } catch (err: unknown) {
    throw new SemanticReleaseError(
      'Source snapshot not available.',
      'ENOSOURCE',
      err instanceof Error ? err.message : `${cwd} is not a git work tree.`,
    );
  }

  if (!/^[0-9a-f]{40}(?:[0-9a-f]{24})?$/.test(out)) {
    throw new SemanticReleaseError(
      'Source snapshot not available.',
      'ENOSOURCE',
      `git rev-parse HEAD returned "${out}" in ${cwd}.`,
    );
  }
  return out;
}
