// src/command-runner.ts
import { execSync } from 'node:child_process';
import type { Logger } from './logger.js';

const stringify = (v: unknown): string => {
  if (typeof v === 'string') {
    return v;
  } else {
    if (Buffer.isBuffer(v)) {
      return v.toString('utf8');
    } else {
      return '';
    }
  }
};

/**
 * Log the captured output of a failed command. The error thrown by
 * execSync carries `stdout`, `stderr` and `message`; each one that is
 * present is written to the error channel, trimmed where possible.
 */
export function logCommandFailure(
  cmd: string,
  err: unknown,
  logger: Logger,
): void {
  logger.error(`Command failed: ${cmd}`);

  if (typeof err === 'object' && err !== null) {
    const out = stringify('stdout' in err ? err.stdout : undefined);
    const errOut = stringify('stderr' in err ? err.stderr : undefined);
    const outTrimmed = out.trim();
    const errTrimmed = errOut.trim();

    if (outTrimmed.length > 0) {
      logger.error(outTrimmed);
    } else {
      if (out.length > 0) {
        logger.error(out);
      }
    }

    if (errTrimmed.length > 0) {
      logger.error(errTrimmed);
    } else {
      if (errOut.length > 0) {
        logger.error(errOut);
      }
    }

    if (err instanceof Error && err.message.length > 0) {
      logger.error(err.message);
    }
  }
}

/**
 * Execute a host command and return its trimmed stdout. The command is
 * echoed as `$ <cmd>` before it runs. If the command produces no stdout,
 * "(no output)" is logged for traceability.
 *
 * On failure, the function logs the failing command, the captured stdout
 * and stderr from the thrown error object, and rethrows the original
 * error to preserve the exit semantics. The command is executed with
 * stdio "pipe" and UTF-8 decoding so that stdout can be captured.
 *
 * @param cmd Shell command to execute.
 * @param cwd Working directory for the command.
 * @param logger Logger receiving the command and its output.
 * @returns Trimmed stdout of the command.
 * @throws Any error thrown by execSync is rethrown after being logged.
 */
export function runHostCmd(
  cmd: string,
  cwd: string,
  logger: Logger,
): string {
  logger.log(`$ ${cmd}`);

  try {
    const out = execSync(cmd, {
      cwd,
      stdio: 'pipe',
      encoding: 'utf8',
    });
    const trimmed = out.trim();

    if (trimmed.length > 0) {
      logger.log(trimmed);
    } else {
      logger.log('(no output)');
    }

    return trimmed;
  } catch (err: unknown) {
    logCommandFailure(cmd, err, logger);
    throw err;
  }
}

// noinspection JSUnusedGlobalSymbols
export default { runHostCmd };
