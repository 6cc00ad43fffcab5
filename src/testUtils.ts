/**
 * In-process stand-ins for the cluster, Argo CD, GitHub, docker and the
 * operator. Shared by the test suites.
 */

import { KubernetesObject } from "@kubernetes/client-node";
import { LoggerService } from "@backstage/backend-plugin-api";
import { GitOpsControllerApi, HistoryEntry, RepositoryRegistration } from "./ArgoCdClient";
import {
  AppliedObject,
  ClassInfo,
  ClusterClient,
  ExecResult,
  NodeInfo,
  PodInfo,
  PortForwardHandle,
  WorkloadStatus,
} from "./ClusterClient";
import { BuildRequest, ContainerBuilder } from "./ContainerBuilder";
import { AuthenticationFailed } from "./errors";
import type { ProbeResults } from "./environmentProber";
import {
  CreateRepositoryOptions,
  SourceControlHost,
  SourceControlStatus,
} from "./GitHubCli";
import { AskOptions, InputProvider } from "./inputProvider";
import { Clock } from "./readiness";

// ============================================================================
// Mock Logger
// ============================================================================

export function createMockLogger(): jest.Mocked<LoggerService> {
  const logger: jest.Mocked<LoggerService> = {
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    debug: jest.fn(),
    child: jest.fn(),
  };
  logger.child.mockReturnValue(logger);
  return logger;
}

/** Every message and meta value the mock logger received, as one string. */
export function loggedText(logger: jest.Mocked<LoggerService>): string {
  return [logger.info, logger.warn, logger.error, logger.debug]
    .flatMap((fn) => fn.mock.calls)
    .map((call) => JSON.stringify(call))
    .join("\n");
}

// ============================================================================
// Clock
// ============================================================================

/** Time only moves when something sleeps. */
export class ManualClock implements Clock {
  current = 0;
  readonly sleeps: number[] = [];

  now(): number {
    return this.current;
  }

  async sleep(ms: number): Promise<void> {
    this.sleeps.push(ms);
    this.current += ms;
  }
}

// ============================================================================
// Cluster
// ============================================================================

interface FakePod extends PodInfo {
  namespace: string;
  labels: Record<string, string>;
}

const NOT_FOUND: WorkloadStatus = {
  exists: false,
  ready: false,
  replicas: 0,
  readyReplicas: 0,
};

export function workloadStatus(ready: boolean, replicas = 1): WorkloadStatus {
  return {
    exists: true,
    ready,
    replicas,
    readyReplicas: ready ? replicas : 0,
  };
}

export class FakeClusterClient implements ClusterClient {
  context: string | undefined = "test-context";
  reachable = true;
  nodes: NodeInfo[] = [];
  storageClasses: ClassInfo[] = [];
  ingressClasses: ClassInfo[] = [];
  clusterIssuers: string[] = [];
  readonly namespaces = new Set<string>(["default"]);
  readonly deployments = new Map<string, WorkloadStatus>();
  readonly statefulSets = new Map<string, WorkloadStatus>();
  readonly secrets = new Map<string, Record<string, string>>();
  readonly objects = new Map<string, KubernetesObject>();
  readonly pods: FakePod[] = [];
  /** Every apply call, in order, with the objects it received. */
  readonly applyCalls: { namespace?: string; objects: KubernetesObject[] }[] = [];
  readonly execCalls: { pod: string; container: string; command: string[] }[] = [];
  readonly forwards: { pod: string; localPort: number; closed: boolean }[] = [];
  /** Workloads applied while true report ready at once. */
  readyOnApply = true;
  /** Pods created for applied workloads while true. */
  podsOnApply = true;
  execResults = new Map<string, ExecResult>();
  failApply?: (object: KubernetesObject) => Error | undefined;

  currentContext(): string | undefined {
    return this.context;
  }

  async ping(): Promise<string> {
    if (!this.reachable) {
      throw new Error("connect ECONNREFUSED 127.0.0.1:6443");
    }
    return "v1.29.0";
  }

  async listNodes(): Promise<NodeInfo[]> {
    return this.nodes;
  }

  async listStorageClasses(): Promise<ClassInfo[]> {
    return this.storageClasses;
  }

  async listIngressClasses(): Promise<ClassInfo[]> {
    return this.ingressClasses;
  }

  async listClusterIssuers(): Promise<string[]> {
    return this.clusterIssuers;
  }

  async namespaceExists(name: string): Promise<boolean> {
    return this.namespaces.has(name);
  }

  async ensureNamespace(name: string): Promise<boolean> {
    if (this.namespaces.has(name)) {
      return false;
    }
    this.namespaces.add(name);
    return true;
  }

  async getDeploymentStatus(namespace: string, name: string): Promise<WorkloadStatus> {
    return this.deployments.get(`${namespace}/${name}`) ?? NOT_FOUND;
  }

  async getStatefulSetStatus(namespace: string, name: string): Promise<WorkloadStatus> {
    return this.statefulSets.get(`${namespace}/${name}`) ?? NOT_FOUND;
  }

  async listPods(namespace: string, labelSelector: string): Promise<PodInfo[]> {
    const wanted = labelSelector
      .split(",")
      .filter(Boolean)
      .map((term) => term.split("="));
    return this.pods
      .filter(
        (pod) =>
          pod.namespace === namespace &&
          wanted.every(([key, value]) => pod.labels[key] === value),
      )
      .map(({ name, phase, ready, containers }) => ({ name, phase, ready, containers }));
  }

  async readSecretValue(
    namespace: string,
    name: string,
    key: string,
  ): Promise<string | undefined> {
    return this.secrets.get(`${namespace}/${name}`)?.[key];
  }

  async apply(
    objects: KubernetesObject[],
    defaultNamespace?: string,
  ): Promise<AppliedObject[]> {
    this.applyCalls.push({
      namespace: defaultNamespace,
      objects: structuredClone(objects),
    });

    const applied: AppliedObject[] = [];
    for (const object of objects) {
      const failure = this.failApply?.(object);
      if (failure) {
        throw failure;
      }

      const kind = object.kind ?? "Unknown";
      const name = object.metadata?.name ?? "";
      const namespace =
        kind === "Namespace"
          ? undefined
          : object.metadata?.namespace ?? defaultNamespace;
      const key = `${kind}/${namespace ?? ""}/${name}`;
      const action = this.objects.has(key) ? "configured" : "created";
      this.objects.set(key, structuredClone(object));
      applied.push({ kind, name, namespace, action });

      if (kind === "Namespace") {
        this.namespaces.add(name);
      }
      if (namespace && (kind === "Deployment" || kind === "StatefulSet")) {
        const workloads = kind === "Deployment" ? this.deployments : this.statefulSets;
        workloads.set(`${namespace}/${name}`, workloadStatus(this.readyOnApply));
        if (this.podsOnApply) {
          this.addPodsFor(object, namespace, name);
        }
      }
    }
    return applied;
  }

  async exec(
    _namespace: string,
    pod: string,
    container: string,
    command: string[],
  ): Promise<ExecResult> {
    this.execCalls.push({ pod, container, command });
    return (
      this.execResults.get(command.join(" ")) ?? {
        exitCode: 0,
        stdout: "ok\n",
        stderr: "",
      }
    );
  }

  async portForward(
    _namespace: string,
    pod: string,
    _remotePort: number,
    localPort: number,
  ): Promise<PortForwardHandle> {
    const record = { pod, localPort, closed: false };
    this.forwards.push(record);
    return {
      localPort,
      close: async () => {
        record.closed = true;
      },
    };
  }

  addPod(
    namespace: string,
    name: string,
    labels: Record<string, string>,
    ready = true,
    containers = ["main"],
  ): void {
    this.pods.push({
      namespace,
      name,
      labels,
      ready,
      phase: ready ? "Running" : "Pending",
      containers,
    });
  }

  /** Kinds and names of the objects applied so far, in apply order. */
  appliedNames(): string[] {
    return this.applyCalls.flatMap((call) =>
      call.objects.map((o) => `${o.kind}/${o.metadata?.name}`),
    );
  }

  private addPodsFor(object: KubernetesObject, namespace: string, name: string): void {
    if (this.pods.some((pod) => pod.namespace === namespace && pod.name === `${name}-0`)) {
      return;
    }
    const template = field(field(object, "spec"), "template");
    const podLabels: Record<string, string> = {};
    for (const [key, value] of Object.entries(field(field(template, "metadata"), "labels") ?? {})) {
      if (typeof value === "string") {
        podLabels[key] = value;
      }
    }
    const containers = field(template, "spec")?.containers;
    const containerNames = Array.isArray(containers)
      ? containers
          .map((c: unknown) => field(c)?.name)
          .filter((n): n is string => typeof n === "string")
      : [];
    this.addPod(namespace, `${name}-0`, podLabels, this.readyOnApply, containerNames);
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function field(value: unknown, key?: string): Record<string, unknown> | undefined {
  if (!isRecord(value)) {
    return undefined;
  }
  if (key === undefined) {
    return value;
  }
  const next = value[key];
  return isRecord(next) ? next : undefined;
}

// ============================================================================
// Argo CD
// ============================================================================

export class FakeGitOpsController implements GitOpsControllerApi {
  adminPassword = "test-admin-password";
  readonly repositories: RepositoryRegistration[] = [];
  readonly issuedTokens: { account: string; token: string }[] = [];
  readonly sessions: string[] = [];
  readonly history = new Map<string, HistoryEntry[]>();
  readonly syncs: { name: string; revision?: string }[] = [];
  readonly rollbacks: { name: string; id: number }[] = [];
  /** Tokens passed to {@link withToken}, in order. */
  readonly tokensUsed: string[] = [];

  async createSession(username: string, password: string): Promise<string> {
    if (username !== "admin" || password !== this.adminPassword) {
      throw new AuthenticationFailed("Argo CD rejected the credentials");
    }
    const token = `test-session-${this.sessions.length + 1}`;
    this.sessions.push(token);
    return token;
  }

  withToken(token: string): GitOpsControllerApi {
    this.tokensUsed.push(token);
    return this;
  }

  async listRepositories(): Promise<string[]> {
    return this.repositories.map((repo) => repo.url);
  }

  async registerRepository(repository: RepositoryRegistration): Promise<void> {
    const existing = this.repositories.findIndex((r) => r.url === repository.url);
    if (existing >= 0) {
      this.repositories[existing] = repository;
    } else {
      this.repositories.push(repository);
    }
  }

  async generateToken(account: string): Promise<string> {
    const token = `test-token-${this.issuedTokens.length + 1}`;
    this.issuedTokens.push({ account, token });
    return token;
  }

  async getApplicationHistory(name: string): Promise<HistoryEntry[]> {
    return this.history.get(name) ?? [];
  }

  async syncApplication(name: string, revision?: string): Promise<void> {
    this.syncs.push({ name, revision });
  }

  async rollbackApplication(name: string, id: number): Promise<void> {
    this.rollbacks.push({ name, id });
  }
}

// ============================================================================
// GitHub
// ============================================================================

export class FakeSourceControl implements SourceControlHost {
  state: SourceControlStatus = { authenticated: true, login: "test-user" };
  readonly repositories = new Set<string>();
  readonly created: string[] = [];
  readonly secrets = new Map<string, string>();

  async status(): Promise<SourceControlStatus> {
    return this.state;
  }

  async repositoryExists(repository: string): Promise<boolean> {
    return this.repositories.has(repository);
  }

  async createRepository(
    repository: string,
    _options: CreateRepositoryOptions,
  ): Promise<void> {
    this.repositories.add(repository);
    this.created.push(repository);
  }

  async setSecret(repository: string, name: string, value: string): Promise<void> {
    this.secrets.set(`${repository}:${name}`, value);
  }
}

// ============================================================================
// Docker
// ============================================================================

export class FakeContainerBuilder implements ContainerBuilder {
  /** Operations in the order they ran, e.g. `push registry.example/app:1.0`. */
  readonly operations: string[] = [];
  failBuild = false;

  async build(request: BuildRequest): Promise<void> {
    if (this.failBuild) {
      throw new Error("failed to solve: exit code 1");
    }
    this.operations.push(`build ${request.tag}${request.target ? ` --target ${request.target}` : ""}`);
  }

  async tag(source: string, target: string): Promise<void> {
    this.operations.push(`tag ${source} ${target}`);
  }

  async login(registry: string, username: string): Promise<void> {
    this.operations.push(`login ${registry} ${username}`);
  }

  async push(reference: string): Promise<void> {
    this.operations.push(`push ${reference}`);
  }
}

// ============================================================================
// Operator
// ============================================================================

/**
 * Answers by prompt message; anything unscripted takes the default.
 */
export class ScriptedInputProvider implements InputProvider {
  readonly interactive = true;
  readonly prompts: string[] = [];

  constructor(
    private readonly answers: Record<string, string> = {},
    private readonly confirmations: Record<string, boolean> = {},
  ) {}

  async confirm(message: string, defaultValue: boolean): Promise<boolean> {
    this.prompts.push(message);
    return this.confirmations[message] ?? defaultValue;
  }

  async ask(options: AskOptions): Promise<string | undefined> {
    this.prompts.push(options.message);
    return this.answers[options.message] ?? options.default;
  }
}

// ============================================================================
// Probe Results
// ============================================================================

export function probeResults(overrides: Partial<ProbeResults> = {}): ProbeResults {
  return {
    context: "test-context",
    serverVersion: "v1.29.0",
    gpu: { nodes: ["gpu-node-1"], labelKey: "nvidia.com/gpu.present" },
    defaultStorageClass: "standard",
    ingressClass: "nginx",
    controller: "absent",
    bootstrapCredential: false,
    certificateIssuers: ["letsencrypt-staging"],
    sourceControl: { authenticated: true, login: "test-user" },
    warnings: [],
    ...overrides,
  };
}
