/**
 * Cluster Client
 * Wrapper around @kubernetes/client-node for the calls the bootstrap needs
 */

import { createServer, Server, Socket } from "net";
import { Writable } from "stream";
import {
  AppsV1Api,
  CoreV1Api,
  CustomObjectsApi,
  Exec,
  HttpError,
  KubeConfig,
  KubernetesObject,
  KubernetesObjectApi,
  NetworkingV1Api,
  PortForward,
  StorageV1Api,
  V1Status,
  VersionApi,
} from "@kubernetes/client-node";
import { LoggerService } from "@backstage/backend-plugin-api";

const DEFAULT_STORAGE_CLASS_ANNOTATION =
  "storageclass.kubernetes.io/is-default-class";
const DEFAULT_INGRESS_CLASS_ANNOTATION =
  "ingressclass.kubernetes.io/is-default-class";

/** Kinds that never take a namespace. */
const CLUSTER_SCOPED_KINDS = new Set([
  "APIService",
  "ClusterIssuer",
  "ClusterRole",
  "ClusterRoleBinding",
  "CustomResourceDefinition",
  "IngressClass",
  "MutatingWebhookConfiguration",
  "Namespace",
  "Node",
  "PersistentVolume",
  "PriorityClass",
  "StorageClass",
  "ValidatingWebhookConfiguration",
]);

// ============================================================================
// Types
// ============================================================================

export interface NodeInfo {
  name: string;
  labels: Record<string, string>;
  allocatable: Record<string, string>;
}

export interface ClassInfo {
  name: string;
  isDefault: boolean;
}

export interface WorkloadStatus {
  exists: boolean;
  ready: boolean;
  replicas: number;
  readyReplicas: number;
}

export interface PodInfo {
  name: string;
  phase?: string;
  ready: boolean;
  containers: string[];
}

export interface AppliedObject {
  kind: string;
  name: string;
  namespace?: string;
  action: "created" | "configured";
}

export interface ExecResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

export interface PortForwardHandle {
  localPort: number;
  close(): Promise<void>;
}

/**
 * Everything the prober, orchestrator and pipeline ask of the cluster.
 * Methods throw on transport errors; absence is reported in the result.
 */
export interface ClusterClient {
  currentContext(): string | undefined;
  /** Returns the server version. */
  ping(): Promise<string>;
  listNodes(): Promise<NodeInfo[]>;
  listStorageClasses(): Promise<ClassInfo[]>;
  listIngressClasses(): Promise<ClassInfo[]>;
  listClusterIssuers(): Promise<string[]>;
  namespaceExists(name: string): Promise<boolean>;
  /** Returns true when the namespace was created. */
  ensureNamespace(name: string): Promise<boolean>;
  getDeploymentStatus(namespace: string, name: string): Promise<WorkloadStatus>;
  getStatefulSetStatus(namespace: string, name: string): Promise<WorkloadStatus>;
  listPods(namespace: string, labelSelector: string): Promise<PodInfo[]>;
  readSecretValue(
    namespace: string,
    name: string,
    key: string,
  ): Promise<string | undefined>;
  /** Create or replace each object, in order. */
  apply(
    objects: KubernetesObject[],
    defaultNamespace?: string,
  ): Promise<AppliedObject[]>;
  exec(
    namespace: string,
    pod: string,
    container: string,
    command: string[],
  ): Promise<ExecResult>;
  portForward(
    namespace: string,
    pod: string,
    remotePort: number,
    localPort: number,
  ): Promise<PortForwardHandle>;
}

export interface KubernetesClusterClientOptions {
  logger: LoggerService;
  /** kubeconfig context; the current context when omitted. */
  context?: string;
  kubeConfig?: KubeConfig;
}

// ============================================================================
// Implementation
// ============================================================================

export class KubernetesClusterClient implements ClusterClient {
  private readonly kc: KubeConfig;
  private readonly coreApi: CoreV1Api;
  private readonly appsApi: AppsV1Api;
  private readonly storageApi: StorageV1Api;
  private readonly networkingApi: NetworkingV1Api;
  private readonly customApi: CustomObjectsApi;
  private readonly versionApi: VersionApi;
  private readonly objectApi: KubernetesObjectApi;
  private readonly execApi: Exec;
  private readonly forwarder: PortForward;
  private readonly logger: LoggerService;

  constructor(options: KubernetesClusterClientOptions) {
    this.kc = options.kubeConfig ?? KubernetesClusterClient.loadKubeConfig();
    if (options.context) {
      this.kc.setCurrentContext(options.context);
    }

    this.coreApi = this.kc.makeApiClient(CoreV1Api);
    this.appsApi = this.kc.makeApiClient(AppsV1Api);
    this.storageApi = this.kc.makeApiClient(StorageV1Api);
    this.networkingApi = this.kc.makeApiClient(NetworkingV1Api);
    this.customApi = this.kc.makeApiClient(CustomObjectsApi);
    this.versionApi = this.kc.makeApiClient(VersionApi);
    this.objectApi = KubernetesObjectApi.makeApiClient(this.kc);
    this.execApi = new Exec(this.kc);
    this.forwarder = new PortForward(this.kc);
    this.logger = options.logger;
  }

  private static loadKubeConfig(): KubeConfig {
    const kc = new KubeConfig();
    kc.loadFromDefault();
    return kc;
  }

  currentContext(): string | undefined {
    return this.kc.getCurrentContext() || undefined;
  }

  // ============================================================================
  // Discovery
  // ============================================================================

  async ping(): Promise<string> {
    const res = await this.versionApi.getCode();
    return res.body.gitVersion;
  }

  async listNodes(): Promise<NodeInfo[]> {
    const res = await this.coreApi.listNode();
    return res.body.items.map((node) => ({
      name: node.metadata?.name ?? "",
      labels: node.metadata?.labels ?? {},
      allocatable: node.status?.allocatable ?? {},
    }));
  }

  async listStorageClasses(): Promise<ClassInfo[]> {
    const res = await this.storageApi.listStorageClass();
    return res.body.items.map((sc) => ({
      name: sc.metadata?.name ?? "",
      isDefault:
        sc.metadata?.annotations?.[DEFAULT_STORAGE_CLASS_ANNOTATION] === "true",
    }));
  }

  async listIngressClasses(): Promise<ClassInfo[]> {
    const res = await this.networkingApi.listIngressClass();
    return res.body.items.map((ic) => ({
      name: ic.metadata?.name ?? "",
      isDefault:
        ic.metadata?.annotations?.[DEFAULT_INGRESS_CLASS_ANNOTATION] === "true",
    }));
  }

  async listClusterIssuers(): Promise<string[]> {
    try {
      const res = await this.customApi.listClusterCustomObject(
        "cert-manager.io",
        "v1",
        "clusterissuers",
      );
      return itemNames(res.body);
    } catch (error) {
      // cert-manager not installed
      if (isNotFound(error)) {
        return [];
      }
      throw error;
    }
  }

  // ============================================================================
  // Namespaces & Workloads
  // ============================================================================

  async namespaceExists(name: string): Promise<boolean> {
    try {
      await this.coreApi.readNamespace(name);
      return true;
    } catch (error) {
      if (isNotFound(error)) {
        return false;
      }
      throw error;
    }
  }

  async ensureNamespace(name: string): Promise<boolean> {
    if (await this.namespaceExists(name)) {
      return false;
    }
    await this.coreApi.createNamespace({ metadata: { name } });
    this.logger.info(`Created namespace ${name}`);
    return true;
  }

  async getDeploymentStatus(
    namespace: string,
    name: string,
  ): Promise<WorkloadStatus> {
    try {
      const res = await this.appsApi.readNamespacedDeployment(name, namespace);
      const { spec, status } = res.body;
      const available = (status?.conditions ?? []).some(
        (c) => c.type === "Available" && c.status === "True",
      );
      return {
        exists: true,
        ready: available,
        replicas: spec?.replicas ?? 1,
        readyReplicas: status?.readyReplicas ?? 0,
      };
    } catch (error) {
      if (isNotFound(error)) {
        return MISSING_WORKLOAD;
      }
      throw error;
    }
  }

  async getStatefulSetStatus(
    namespace: string,
    name: string,
  ): Promise<WorkloadStatus> {
    try {
      const res = await this.appsApi.readNamespacedStatefulSet(name, namespace);
      const replicas = res.body.spec?.replicas ?? 1;
      const readyReplicas = res.body.status?.readyReplicas ?? 0;
      return {
        exists: true,
        ready: readyReplicas >= replicas,
        replicas,
        readyReplicas,
      };
    } catch (error) {
      if (isNotFound(error)) {
        return MISSING_WORKLOAD;
      }
      throw error;
    }
  }

  async listPods(namespace: string, labelSelector: string): Promise<PodInfo[]> {
    const res = await this.coreApi.listNamespacedPod(
      namespace,
      undefined, // pretty
      undefined, // allowWatchBookmarks
      undefined, // continue
      undefined, // fieldSelector
      labelSelector,
    );
    return res.body.items.map((pod) => ({
      name: pod.metadata?.name ?? "",
      phase: pod.status?.phase,
      ready: (pod.status?.conditions ?? []).some(
        (c) => c.type === "Ready" && c.status === "True",
      ),
      containers: (pod.spec?.containers ?? []).map((c) => c.name),
    }));
  }

  async readSecretValue(
    namespace: string,
    name: string,
    key: string,
  ): Promise<string | undefined> {
    try {
      const res = await this.coreApi.readNamespacedSecret(name, namespace);
      const encoded = res.body.data?.[key];
      return encoded === undefined
        ? undefined
        : Buffer.from(encoded, "base64").toString("utf8");
    } catch (error) {
      if (isNotFound(error)) {
        return undefined;
      }
      throw error;
    }
  }

  // ============================================================================
  // Apply
  // ============================================================================

  async apply(
    objects: KubernetesObject[],
    defaultNamespace?: string,
  ): Promise<AppliedObject[]> {
    const applied: AppliedObject[] = [];
    for (const object of objects) {
      applied.push(await this.applyOne(object, defaultNamespace));
    }
    return applied;
  }

  private async applyOne(
    input: KubernetesObject,
    defaultNamespace?: string,
  ): Promise<AppliedObject> {
    const kind = input.kind ?? "";
    const name = input.metadata?.name;
    if (!input.apiVersion || !kind || !name) {
      throw new Error("Manifest object is missing apiVersion, kind or name");
    }

    const namespace = CLUSTER_SCOPED_KINDS.has(kind)
      ? undefined
      : input.metadata?.namespace ?? defaultNamespace;
    const object: KubernetesObject = {
      ...input,
      metadata: { ...input.metadata, namespace },
    };
    const ref = `${kind}/${name}${namespace ? ` in ${namespace}` : ""}`;

    const existing = await this.readObject(object, name, namespace ?? "");
    if (!existing) {
      await this.objectApi.create(object);
      this.logger.debug(`Created ${ref}`);
      return { kind, name, namespace, action: "created" };
    }

    const replacement: KubernetesObject & { spec?: unknown } = {
      ...object,
      metadata: {
        ...object.metadata,
        resourceVersion: existing.metadata?.resourceVersion,
      },
    };
    if (kind === "Service") {
      // clusterIP is immutable once allocated
      const clusterIP = readPath(existing, ["spec", "clusterIP"]);
      if (typeof clusterIP === "string") {
        replacement.spec = { ...asRecord(readPath(object, ["spec"])), clusterIP };
      }
    }
    await this.objectApi.replace(replacement);
    this.logger.debug(`Configured ${ref}`);
    return { kind, name, namespace, action: "configured" };
  }

  private async readObject(
    object: KubernetesObject,
    name: string,
    namespace: string,
  ): Promise<KubernetesObject | undefined> {
    try {
      const res = await this.objectApi.read({
        apiVersion: object.apiVersion,
        kind: object.kind,
        metadata: { name, namespace },
      });
      return res.body;
    } catch (error) {
      if (isNotFound(error)) {
        return undefined;
      }
      throw error;
    }
  }

  // ============================================================================
  // Exec & Port-forward
  // ============================================================================

  exec(
    namespace: string,
    pod: string,
    container: string,
    command: string[],
  ): Promise<ExecResult> {
    const stdout = collector();
    const stderr = collector();

    return new Promise<ExecResult>((resolve, reject) => {
      this.execApi
        .exec(
          namespace,
          pod,
          container,
          command,
          stdout.stream,
          stderr.stream,
          null, // stdin
          false, // tty
          (status) =>
            resolve({
              exitCode: exitCodeFromStatus(status),
              stdout: stdout.text(),
              stderr: stderr.text(),
            }),
        )
        .catch(reject);
    });
  }

  async portForward(
    namespace: string,
    pod: string,
    remotePort: number,
    localPort: number,
  ): Promise<PortForwardHandle> {
    const sockets = new Set<Socket>();
    const server = createServer((socket) => {
      sockets.add(socket);
      socket.on("close", () => sockets.delete(socket));
      this.forwarder
        .portForward(namespace, pod, [remotePort], socket, null, socket)
        .catch((error: unknown) => {
          this.logger.warn(`Port-forward to ${pod}:${remotePort} failed: ${error}`);
          socket.destroy();
        });
    });

    await listen(server, localPort);
    const address = server.address();
    const boundPort =
      typeof address === "object" && address ? address.port : localPort;
    this.logger.debug(
      `Forwarding 127.0.0.1:${boundPort} to ${namespace}/${pod}:${remotePort}`,
    );

    return {
      localPort: boundPort,
      close: () =>
        new Promise<void>((resolve) => {
          for (const socket of sockets) {
            socket.destroy();
          }
          server.close(() => resolve());
        }),
    };
  }
}

// ============================================================================
// Helpers
// ============================================================================

const MISSING_WORKLOAD: WorkloadStatus = {
  exists: false,
  ready: false,
  replicas: 0,
  readyReplicas: 0,
};

export function isNotFound(error: unknown): boolean {
  return error instanceof HttpError && error.statusCode === 404;
}

function listen(server: Server, port: number): Promise<void> {
  return new Promise((resolve, reject) => {
    server.once("error", reject);
    server.listen(port, "127.0.0.1", () => {
      server.removeListener("error", reject);
      resolve();
    });
  });
}

function collector(): { stream: Writable; text: () => string } {
  const chunks: Buffer[] = [];
  const stream = new Writable({
    write(chunk: Buffer | string, _encoding, callback) {
      chunks.push(Buffer.from(chunk));
      callback();
    },
  });
  return { stream, text: () => Buffer.concat(chunks).toString("utf8") };
}

export function exitCodeFromStatus(status: V1Status): number {
  if (status.status === "Success") {
    return 0;
  }
  const cause = status.details?.causes?.find((c) => c.reason === "ExitCode");
  const code = Number(cause?.message);
  return Number.isInteger(code) ? code : 1;
}

function itemNames(body: unknown): string[] {
  const items = readPath(body, ["items"]);
  if (!Array.isArray(items)) {
    return [];
  }
  return items
    .map((item: unknown) => readPath(item, ["metadata", "name"]))
    .filter((name): name is string => typeof name === "string");
}

export function readPath(value: unknown, path: string[]): unknown {
  let current = value;
  for (const key of path) {
    if (typeof current !== "object" || current === null) {
      return undefined;
    }
    current = Reflect.get(current, key);
  }
  return current;
}

function asRecord(value: unknown): Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value)
    ? Object.fromEntries(Object.entries(value))
    : {};
}
