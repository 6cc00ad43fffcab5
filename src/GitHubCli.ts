/**
 * Source-control host backed by the GitHub CLI (`gh`).
 */

import { LoggerService } from "@backstage/backend-plugin-api";
import { CommandRunner, outputTail, runCommand } from "./commandRunner";

export interface SourceControlStatus {
  authenticated: boolean;
  login?: string;
}

export interface CreateRepositoryOptions {
  visibility: "public" | "private";
  description?: string;
}

export interface SourceControlHost {
  status(): Promise<SourceControlStatus>;
  /** `repository` is `owner/name`. */
  repositoryExists(repository: string): Promise<boolean>;
  createRepository(
    repository: string,
    options: CreateRepositoryOptions,
  ): Promise<void>;
  /** The value is passed on stdin and never logged. */
  setSecret(repository: string, name: string, value: string): Promise<void>;
}

export interface GitHubCliOptions {
  logger: LoggerService;
  runner?: CommandRunner;
  binary?: string;
}

export class GitHubCli implements SourceControlHost {
  private readonly logger: LoggerService;
  private readonly run: CommandRunner;
  private readonly binary: string;

  constructor(options: GitHubCliOptions) {
    this.logger = options.logger;
    this.run = options.runner ?? runCommand;
    this.binary = options.binary ?? "gh";
  }

  async status(): Promise<SourceControlStatus> {
    const result = await this.run(this.binary, ["api", "user", "--jq", ".login"], {
      timeoutMs: 15_000,
    });
    if (!result.ok) {
      this.logger.debug(`gh is not authenticated: ${outputTail(result, 1)}`);
      return { authenticated: false };
    }
    const login = result.stdout.trim();
    return { authenticated: true, login: login || undefined };
  }

  async repositoryExists(repository: string): Promise<boolean> {
    const result = await this.run(this.binary, [
      "repo",
      "view",
      repository,
      "--json",
      "name",
    ]);
    return result.ok;
  }

  async createRepository(
    repository: string,
    options: CreateRepositoryOptions,
  ): Promise<void> {
    const args = ["repo", "create", repository, `--${options.visibility}`];
    if (options.description) {
      args.push("--description", options.description);
    }
    const result = await this.run(this.binary, args);
    if (!result.ok) {
      throw new Error(
        `gh repo create ${repository} failed: ${outputTail(result)}`,
      );
    }
    this.logger.info(`Created repository ${repository}`);
  }

  async setSecret(
    repository: string,
    name: string,
    value: string,
  ): Promise<void> {
    const result = await this.run(
      this.binary,
      ["secret", "set", name, "--repo", repository],
      { input: value },
    );
    if (!result.ok) {
      throw new Error(
        `gh secret set ${name} on ${repository} failed: ${outputTail(result)}`,
      );
    }
    this.logger.info(`Set secret ${name} on ${repository}`);
  }
}
