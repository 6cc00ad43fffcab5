/**
 * Environment Prober
 *
 * Read-only queries against the cluster, the Argo CD installation and the
 * GitHub CLI. Every probe is bounded by a timeout and degrades to an absent or
 * empty result with a warning; only an unreachable cluster stops the run.
 */

import { LoggerService } from "@backstage/backend-plugin-api";
import { ClusterClient } from "./ClusterClient";
import { UnreachableEnvironment } from "./errors";
import { SourceControlHost, SourceControlStatus } from "./GitHubCli";
import { DEFAULT_GPU_LABEL } from "./parameters";
import { withTimeout } from "./readiness";

export type ControllerState = "absent" | "installing" | "ready";

export interface GpuNodes {
  nodes: string[];
  /** Node label marking GPU capacity, when the nodes carry one. */
  labelKey?: string;
}

export interface ProbeResults {
  context?: string;
  serverVersion?: string;
  gpu: GpuNodes;
  defaultStorageClass?: string;
  ingressClass?: string;
  controller: ControllerState;
  /** Whether the bootstrap secret exists; the value itself is never kept. */
  bootstrapCredential: boolean;
  certificateIssuers: string[];
  sourceControl: SourceControlStatus;
  warnings: string[];
}

export interface ControllerProbeOptions {
  namespace: string;
  deploymentName: string;
  initialSecretName: string;
  initialSecretKey: string;
}

export interface EnvironmentProberOptions {
  cluster: ClusterClient;
  sourceControl?: SourceControlHost;
  logger: LoggerService;
  controller: ControllerProbeOptions;
  /** Allocatable resource advertised by GPU nodes. */
  gpuResource?: string;
  timeoutMs?: number;
}

export class EnvironmentProber {
  private readonly cluster: ClusterClient;
  private readonly sourceControl?: SourceControlHost;
  private readonly logger: LoggerService;
  private readonly controller: ControllerProbeOptions;
  private readonly gpuResource: string;
  private readonly timeoutMs: number;

  constructor(options: EnvironmentProberOptions) {
    this.cluster = options.cluster;
    this.sourceControl = options.sourceControl;
    this.logger = options.logger.child({ component: "prober" });
    this.controller = options.controller;
    this.gpuResource = options.gpuResource ?? DEFAULT_GPU_LABEL;
    this.timeoutMs = options.timeoutMs ?? 10_000;
  }

  // ============================================================================
  // Individual Probes
  // ============================================================================

  async probeClusterReachable(): Promise<boolean> {
    const version = await this.attempt("cluster version", () =>
      this.cluster.ping(),
    );
    return version !== undefined;
  }

  async probeGpuNodes(): Promise<GpuNodes> {
    const nodes = await this.attempt("nodes", () => this.cluster.listNodes());
    const gpuNodes = (nodes ?? []).filter((node) => {
      const capacity = node.allocatable[this.gpuResource];
      return capacity !== undefined && capacity !== "0";
    });

    const labelKey = gpuNodes
      .flatMap((node) => Object.entries(node.labels))
      .find(([key, value]) => value === "true" && key.includes("gpu"))?.[0];

    return { nodes: gpuNodes.map((node) => node.name), labelKey };
  }

  async probeDefaultStorageClass(): Promise<string | undefined> {
    const classes = await this.attempt("storage classes", () =>
      this.cluster.listStorageClasses(),
    );
    return classes?.find((sc) => sc.isDefault)?.name;
  }

  async probeIngressClass(): Promise<string | undefined> {
    const classes = await this.attempt("ingress classes", () =>
      this.cluster.listIngressClasses(),
    );
    if (!classes || classes.length === 0) {
      return undefined;
    }
    return (classes.find((ic) => ic.isDefault) ?? classes[0]).name;
  }

  async probeControllerInstalled(
    namespace = this.controller.namespace,
  ): Promise<ControllerState> {
    const state = await this.attempt(
      "controller",
      async (): Promise<ControllerState> => {
        if (!(await this.cluster.namespaceExists(namespace))) {
          return "absent";
        }
        const status = await this.cluster.getDeploymentStatus(
          namespace,
          this.controller.deploymentName,
        );
        if (!status.exists) {
          return "absent";
        }
        return status.ready ? "ready" : "installing";
      },
    );
    return state ?? "absent";
  }

  async probeBootstrapCredential(
    namespace = this.controller.namespace,
    secretName = this.controller.initialSecretName,
  ): Promise<string | undefined> {
    return this.attempt("bootstrap credential", () =>
      this.cluster.readSecretValue(
        namespace,
        secretName,
        this.controller.initialSecretKey,
      ),
    );
  }

  async probeCertificateIssuers(): Promise<string[]> {
    const issuers = await this.attempt("certificate issuers", () =>
      this.cluster.listClusterIssuers(),
    );
    return issuers ?? [];
  }

  async probeSourceControl(): Promise<SourceControlStatus> {
    const host = this.sourceControl;
    if (!host) {
      return { authenticated: false };
    }
    const status = await this.attempt("source control", () => host.status());
    return status ?? { authenticated: false };
  }

  // ============================================================================
  // All Probes
  // ============================================================================

  /**
   * Run every probe in sequence. Throws {@link UnreachableEnvironment} when
   * the cluster cannot be reached; everything else becomes a warning.
   */
  async probeAll(): Promise<ProbeResults> {
    const context = this.cluster.currentContext();
    const serverVersion = await this.attempt("cluster version", () =>
      this.cluster.ping(),
    );
    if (serverVersion === undefined) {
      throw new UnreachableEnvironment(
        `Cannot reach the Kubernetes cluster${context ? ` (context ${context})` : ""}`,
        {
          remediation:
            "Check `kubectl cluster-info`, or pass --context with a reachable kubeconfig context",
        },
      );
    }
    this.logger.info(
      `Cluster ${context ?? "(default)"} reachable, server ${serverVersion}`,
    );

    const warnings: string[] = [];
    const gpu = await this.probeGpuNodes();
    if (gpu.nodes.length === 0) {
      warnings.push(
        "No GPU nodes found; make sure the NVIDIA device plugin is installed",
      );
    }

    const defaultStorageClass = await this.probeDefaultStorageClass();
    if (!defaultStorageClass) {
      warnings.push("No default storage class found");
    }

    const ingressClass = await this.probeIngressClass();
    const controller = await this.probeControllerInstalled();
    if (controller === "absent") {
      warnings.push("Argo CD is not installed; `provision` will install it");
    } else if (controller === "installing") {
      warnings.push("Argo CD is installed but its server is not available yet");
    }

    const bootstrapCredential =
      controller === "absent"
        ? false
        : (await this.probeBootstrapCredential()) !== undefined;

    const certificateIssuers = await this.probeCertificateIssuers();
    if (certificateIssuers.length === 0) {
      warnings.push(
        "No cert-manager cluster issuers found; TLS certificates must be managed manually",
      );
    }

    const sourceControl = await this.probeSourceControl();
    if (!sourceControl.authenticated) {
      warnings.push(
        "GitHub CLI is not available or not authenticated; run `gh auth login`",
      );
    }

    for (const warning of warnings) {
      this.logger.warn(warning);
    }

    return {
      context,
      serverVersion,
      gpu,
      defaultStorageClass,
      ingressClass,
      controller,
      bootstrapCredential,
      certificateIssuers,
      sourceControl,
      warnings,
    };
  }

  private async attempt<T>(
    what: string,
    probe: () => Promise<T>,
  ): Promise<T | undefined> {
    try {
      return await withTimeout(probe(), this.timeoutMs, `probe of ${what}`);
    } catch (error) {
      this.logger.warn(`Probe of ${what} failed: ${error}`);
      return undefined;
    }
  }
}
