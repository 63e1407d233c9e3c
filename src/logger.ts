/**
 * The logging surface shared by the plugin, the pipeline and the Docker
 * client. It matches the subset of the semantic-release context logger
 * this package uses, so that logger can be passed through unchanged.
 */
export interface Logger {
  log: (m: string) => void;
  error: (m: string) => void;
}

/**
 * Replace every occurrence of every secret in `text` with `***`. Longer
 * secrets are replaced first so that a secret containing another one is
 * masked as a whole. Empty secrets are ignored.
 *
 * @param text Text that may contain secret values.
 * @param secrets Secret values to mask.
 * @returns The masked text.
 */
export function redact(text: string, secrets: readonly string[]): string {
  const ordered = secrets
    .filter((s) => s.length > 0)
    .sort((a, b) => b.length - a.length);

  let out = text;
  for (const secret of ordered) {
    out = out.split(secret).join('***');
  }
  return out;
}

/**
 * Wrap a logger so that both channels pass through `redact`. Container
 * logs and tool output are written through this wrapper, since either
 * may echo a value the pipeline forwarded.
 */
export function redactingLogger(
  logger: Logger,
  secrets: readonly string[],
): Logger {
  const masked = [...secrets];
  return {
    log: (m: string) => logger.log(redact(m, masked)),
    error: (m: string) => logger.error(redact(m, masked)),
  };
}
