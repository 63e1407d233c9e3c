import SemanticReleaseError from '@semantic-release/error';
import type { Logger } from '../logger.js';
import type { BuildOptions, DockerClient } from './client.js';
import { DockerCliClient } from './cli-client.js';

const COMPONENT = /^[a-z0-9]+(?:(?:[._]|__|-+)[a-z0-9]+)*$/;
const TAG = /^[A-Za-z0-9_][A-Za-z0-9_.-]{0,127}$/;
const REGISTRY = /^[A-Za-z0-9.-]+(?::[0-9]+)?$/;

export interface ImageReferenceParts {
  registry?: string;
  namespace?: string;
  name: string;
  tag?: string;
}

function invalid(ref: string, reason: string): SemanticReleaseError {
  return new SemanticReleaseError(
    `Invalid image reference: ${ref}`,
    'EINVALIDIMAGE',
    reason,
  );
}

/**
 * A registry image reference of the form
 * `[registry/][namespace/]name[:tag]`. One instance is shared by the
 * build, push and run steps so all three name the same artifact.
 */
export class ImageReference {
  readonly registry: string | undefined;
  readonly namespace: string | undefined;
  readonly name: string;
  readonly tag: string;

  private constructor(parts: ImageReferenceParts) {
    this.registry = parts.registry;
    this.namespace = parts.namespace;
    this.name = parts.name;
    this.tag = parts.tag ?? 'latest';
  }

  /**
   * Compose a reference from its parts, validating each one. Empty
   * strings count as absent.
   */
  static of(parts: ImageReferenceParts): ImageReference {
    const registry = parts.registry || undefined;
    const namespace = parts.namespace || undefined;
    const tag = parts.tag || undefined;
    const display = [registry, namespace, parts.name]
      .filter((p) => p !== undefined)
      .join('/');

    if (registry !== undefined && !REGISTRY.test(registry)) {
      throw invalid(display, `"${registry}" is not a registry host.`);
    }
    const path = [...(namespace?.split('/') ?? []), parts.name];
    for (const component of path) {
      if (!COMPONENT.test(component)) {
        throw invalid(
          display,
          `"${component}" must be lowercase letters, digits and separators.`,
        );
      }
    }
    if (tag !== undefined && !TAG.test(tag)) {
      throw invalid(`${display}:${tag}`, `"${tag}" is not a valid tag.`);
    }

    return new ImageReference({ registry, namespace, name: parts.name, tag });
  }

  /**
   * Parse a reference string. The first path component is a registry
   * host when it contains a dot or a port, or is `localhost`. Digest
   * references are rejected because the pipeline pushes by tag.
   */
  static parse(ref: string): ImageReference {
    const trimmed = ref.trim();
    if (trimmed.length === 0) {
      throw invalid(ref, 'The reference is empty.');
    }
    if (trimmed.includes('@')) {
      throw invalid(ref, 'Digest references are not supported.');
    }

    const segments = trimmed.split('/');
    let registry: string | undefined;
    const first = segments[0] ?? '';
    if (
      segments.length > 1 &&
      (first.includes('.') || first.includes(':') || first === 'localhost')
    ) {
      registry = first;
      segments.shift();
    }

    const last = segments.pop() ?? '';
    const colon = last.lastIndexOf(':');
    const name = colon === -1 ? last : last.slice(0, colon);
    const tag = colon === -1 ? undefined : last.slice(colon + 1);
    if (colon !== -1 && tag === '') {
      throw invalid(ref, 'The tag is empty.');
    }
    const namespace = segments.length > 0 ? segments.join('/') : undefined;

    return ImageReference.of({ registry, namespace, name, tag });
  }

  /** The repository part without the tag. */
  get repository(): string {
    return [this.registry, this.namespace, this.name]
      .filter((p) => p !== undefined)
      .join('/');
  }

  toString(): string {
    return `${this.repository}:${this.tag}`;
  }
}

/**
 * A high-level facade representing a concrete image reference. The
 * wrapper binds the reference to a working directory, logger and client
 * and exposes the two operations that produce the artifact.
 */
export class DockerImage {
  private readonly ref: ImageReference;
  private readonly cwd: string;
  private readonly logger: Logger;
  private readonly client: DockerClient;

  constructor(
    ref: ImageReference,
    cwd: string,
    logger: Logger,
    client: DockerClient = new DockerCliClient(),
  ) {
    this.ref = ref;
    this.cwd = cwd;
    this.logger = logger;
    this.client = client;
  }

  get reference(): string {
    return this.ref.toString();
  }

  /**
   * Build the image from the given context. On failure, the client is
   * expected to raise a SemanticReleaseError with code `EBUILDFAILED`.
   */
  async build(opts: BuildOptions): Promise<void> {
    await this.client.build(this.reference, opts, {
      cwd: this.cwd,
      logger: this.logger,
    });
  }

  /**
   * Push the image to its registry. The registry session must already
   * exist; see `DockerClient.login`.
   */
  async push(): Promise<void> {
    await this.client.push(this.reference, {
      cwd: this.cwd,
      logger: this.logger,
    });
  }
}
