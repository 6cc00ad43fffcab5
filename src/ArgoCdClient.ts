/**
 * Argo CD REST client
 */

import https from "https";
import fetch, { RequestInit, Response } from "node-fetch";
import { LoggerService } from "@backstage/backend-plugin-api";
import { AuthenticationFailed } from "./errors";

export interface RepositoryRegistration {
  url: string;
  username?: string;
  password?: string;
}

export interface HistoryEntry {
  id: number;
  revision: string;
  deployedAt?: string;
  initiatedBy?: string;
}

/** The controller operations the bootstrap and the rollout commands use. */
export interface GitOpsControllerApi {
  /** Exchange username and password for a session token. */
  createSession(username: string, password: string): Promise<string>;
  withToken(token: string): GitOpsControllerApi;
  listRepositories(): Promise<string[]>;
  /** Upserts; registering an existing repository is a no-op. */
  registerRepository(repository: RepositoryRegistration): Promise<void>;
  /** Always issues a new token for the account. */
  generateToken(account: string, tokenId?: string): Promise<string>;
  getApplicationHistory(name: string): Promise<HistoryEntry[]>;
  syncApplication(name: string, revision?: string): Promise<void>;
  rollbackApplication(name: string, id: number): Promise<void>;
}

export type FetchFn = (url: string, init?: RequestInit) => Promise<Response>;

export interface ArgoCdClientOptions {
  /** `host:port` or a full URL; https is assumed when no scheme is given. */
  server: string;
  logger: LoggerService;
  insecure?: boolean;
  token?: string;
  fetchFn?: FetchFn;
}

export class ArgoCdApiError extends Error {
  constructor(
    readonly status: number,
    message: string,
  ) {
    super(message);
    this.name = "ArgoCdApiError";
  }
}

export class ArgoCdClient implements GitOpsControllerApi {
  private readonly baseUrl: string;
  private readonly agent?: https.Agent;
  private readonly fetchFn: FetchFn;

  constructor(private readonly options: ArgoCdClientOptions) {
    this.baseUrl = serverUrl(options.server);
    this.agent = this.baseUrl.startsWith("https:")
      ? new https.Agent({ rejectUnauthorized: !options.insecure })
      : undefined;
    this.fetchFn = options.fetchFn ?? fetch;
  }

  withToken(token: string): ArgoCdClient {
    return new ArgoCdClient({ ...this.options, token });
  }

  // ============================================================================
  // Session
  // ============================================================================

  async createSession(username: string, password: string): Promise<string> {
    const res = await this.send("POST", "/api/v1/session", {
      username,
      password,
    });

    if (res.status === 401 || res.status === 403) {
      throw new AuthenticationFailed(
        `Argo CD rejected the credentials for "${username}" (${res.status})`,
        {
          remediation:
            "Check the bootstrap secret, or reset the admin password and re-run `gitops-bootstrap provision --only authenticate`",
        },
      );
    }
    const data = await this.readJson<{ token?: string }>(res, "create session");
    if (!data.token) {
      throw new ArgoCdApiError(res.status, "Session response has no token");
    }
    return data.token;
  }

  // ============================================================================
  // Repositories
  // ============================================================================

  async listRepositories(): Promise<string[]> {
    const res = await this.send("GET", "/api/v1/repositories");
    const data = await this.readJson<{ items?: { repo?: string }[] | null }>(
      res,
      "list repositories",
    );
    return (data.items ?? [])
      .map((item) => item.repo)
      .filter((repo): repo is string => typeof repo === "string");
  }

  async registerRepository(repository: RepositoryRegistration): Promise<void> {
    const res = await this.send("POST", "/api/v1/repositories?upsert=true", {
      repo: repository.url,
      type: "git",
      username: repository.username,
      password: repository.password,
    });
    await this.readJson(res, `register repository ${repository.url}`);
  }

  // ============================================================================
  // Tokens
  // ============================================================================

  async generateToken(account: string, tokenId?: string): Promise<string> {
    const res = await this.send(
      "POST",
      `/api/v1/account/${encodeURIComponent(account)}/token`,
      { name: account, id: tokenId },
    );
    const data = await this.readJson<{ token?: string }>(
      res,
      `generate token for ${account}`,
    );
    if (!data.token) {
      throw new ArgoCdApiError(res.status, "Token response has no token");
    }
    return data.token;
  }

  // ============================================================================
  // Applications
  // ============================================================================

  async getApplicationHistory(name: string): Promise<HistoryEntry[]> {
    const res = await this.send(
      "GET",
      `/api/v1/applications/${encodeURIComponent(name)}`,
    );
    const data = await this.readJson<{
      status?: {
        history?: {
          id?: number;
          revision?: string;
          deployedAt?: string;
          initiatedBy?: { username?: string; automated?: boolean };
        }[];
      };
    }>(res, `read application ${name}`);

    return (data.status?.history ?? []).map((entry) => ({
      id: entry.id ?? 0,
      revision: entry.revision ?? "",
      deployedAt: entry.deployedAt,
      initiatedBy: entry.initiatedBy?.automated
        ? "automated"
        : entry.initiatedBy?.username,
    }));
  }

  async syncApplication(name: string, revision?: string): Promise<void> {
    const res = await this.send(
      "POST",
      `/api/v1/applications/${encodeURIComponent(name)}/sync`,
      { revision },
    );
    await this.readJson(res, `sync application ${name}`);
  }

  async rollbackApplication(name: string, id: number): Promise<void> {
    const res = await this.send(
      "POST",
      `/api/v1/applications/${encodeURIComponent(name)}/rollback`,
      { id },
    );
    await this.readJson(res, `roll back application ${name}`);
  }

  // ============================================================================
  // Transport
  // ============================================================================

  private async send(
    method: "GET" | "POST",
    path: string,
    body?: Record<string, unknown>,
  ): Promise<Response> {
    const url = `${this.baseUrl}${path}`;
    this.options.logger.debug(`Argo CD ${method} ${path}`);

    const init: RequestInit = {
      method,
      headers: {
        Accept: "application/json",
        ...(body ? { "Content-Type": "application/json" } : {}),
        ...(this.options.token
          ? { Authorization: `Bearer ${this.options.token}` }
          : {}),
      },
      body: body ? JSON.stringify(body) : undefined,
      agent: this.agent,
    };
    return this.fetchFn(url, init);
  }

  private async readJson<T = unknown>(res: Response, action: string): Promise<T> {
    if (!res.ok) {
      const text = await res.text();
      throw new ArgoCdApiError(
        res.status,
        `Failed to ${action}: ${res.status} ${res.statusText} ${text}`.trim(),
      );
    }
    const text = await res.text();
    return (text ? JSON.parse(text) : {}) as T;
  }
}

export function serverUrl(server: string): string {
  const trimmed = server.replace(/\/+$/, "");
  return /^https?:\/\//.test(trimmed) ? trimmed : `https://${trimmed}`;
}
