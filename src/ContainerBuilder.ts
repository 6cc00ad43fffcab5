/**
 * Container build tool backed by the `docker` CLI.
 */

import { LoggerService } from "@backstage/backend-plugin-api";
import { CommandRunner, outputTail, runCommand } from "./commandRunner";

export interface BuildRequest {
  /** Local tag for the built image. */
  tag: string;
  context: string;
  dockerfile: string;
  target?: string;
}

export interface ContainerBuilder {
  build(request: BuildRequest): Promise<void>;
  tag(source: string, target: string): Promise<void>;
  login(registry: string, username: string, password: string): Promise<void>;
  push(reference: string): Promise<void>;
}

export interface DockerCliOptions {
  logger: LoggerService;
  runner?: CommandRunner;
  binary?: string;
}

export class DockerCli implements ContainerBuilder {
  private readonly logger: LoggerService;
  private readonly run: CommandRunner;
  private readonly binary: string;

  constructor(options: DockerCliOptions) {
    this.logger = options.logger;
    this.run = options.runner ?? runCommand;
    this.binary = options.binary ?? "docker";
  }

  async build(request: BuildRequest): Promise<void> {
    const args = ["build", "-f", request.dockerfile, "-t", request.tag];
    if (request.target) {
      args.push("--target", request.target);
    }
    args.push(request.context);

    this.logger.info(`Building ${request.tag}`);
    await this.exec(args, `build ${request.tag}`);
  }

  async tag(source: string, target: string): Promise<void> {
    await this.exec(["tag", source, target], `tag ${target}`);
  }

  async login(
    registry: string,
    username: string,
    password: string,
  ): Promise<void> {
    const result = await this.run(
      this.binary,
      ["login", registry, "--username", username, "--password-stdin"],
      { input: password },
    );
    if (!result.ok) {
      throw new Error(`docker login ${registry} failed: ${outputTail(result)}`);
    }
  }

  async push(reference: string): Promise<void> {
    this.logger.info(`Pushing ${reference}`);
    await this.exec(["push", reference], `push ${reference}`);
  }

  private async exec(args: string[], action: string): Promise<void> {
    const result = await this.run(this.binary, args);
    if (!result.ok) {
      throw new Error(`docker ${action} failed: ${outputTail(result)}`);
    }
  }
}
