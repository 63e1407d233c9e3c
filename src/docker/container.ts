import type { Logger } from '../logger.js';
import type { ContainerState, DockerClient } from './client.js';
import { DockerCliClient } from './cli-client.js';

/**
 * A named container instance. The name is fixed for the lifetime of the
 * wrapper, so start, inspection and teardown all address the same
 * instance.
 */
export class DockerContainer {
  readonly name: string;
  private readonly cwd: string;
  private readonly logger: Logger;
  private readonly client: DockerClient;

  constructor(
    name: string,
    cwd: string,
    logger: Logger,
    client: DockerClient = new DockerCliClient(),
  ) {
    this.name = name;
    this.cwd = cwd;
    this.logger = logger;
    this.client = client;
  }

  /**
   * Start the container detached from `image`. Resolves with the
   * container id printed by the runtime.
   */
  async start(
    image: string,
    opts: { ports: string[]; env: Record<string, string> },
  ): Promise<string> {
    return this.client.run(
      image,
      { name: this.name, ports: opts.ports, env: opts.env },
      this.ctx(),
    );
  }

  async state(): Promise<ContainerState> {
    return this.client.inspect(this.name, this.ctx());
  }

  /** The runtime's listing of all containers. */
  async listing(): Promise<string> {
    return this.client.ps(this.ctx());
  }

  async logs(tail?: number): Promise<string> {
    return this.client.logs(this.name, tail, this.ctx());
  }

  async stop(): Promise<void> {
    await this.client.stop(this.name, this.ctx());
  }

  async remove(): Promise<void> {
    await this.client.remove(this.name, this.ctx());
  }

  private ctx() {
    return { cwd: this.cwd, logger: this.logger };
  }
}
