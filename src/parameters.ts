/**
 * Parameter catalog: every key the workflow reads from the configuration
 * store, and where a value for it may come from when the store has none.
 */

import { randomBytes } from "crypto";
import type { ProbeResults } from "./environmentProber";

export type ResolvedValues = Readonly<Record<string, string | undefined>>;

export interface ParameterDefinition {
  key: string;
  label: string;
  /** Never echoed to the summary, prompts or logs. */
  secret?: boolean;
  required?: boolean | ((values: ResolvedValues) => boolean);
  /** Only resolve the key when the environment makes it relevant. */
  when?: (probes: ProbeResults) => boolean;
  probe?: (probes: ProbeResults) => string | undefined;
  /** Suggestion computed from keys earlier in the catalog. */
  derive?: (values: ResolvedValues) => string | undefined;
  fallback?: string;
  generate?: () => string;
  /** Written by the provisioning workflow; never prompted. */
  produced?: boolean;
}

// ============================================================================
// Keys
// ============================================================================

export const KEYS = {
  githubUsername: "GITHUB_USERNAME",
  githubToken: "GITHUB_PAT",
  gpuNodeLabel: "K8S_GPU_NODE_LABEL",
  storageClass: "K8S_STORAGE_CLASS",
  ingressClass: "K8S_INGRESS_CLASS",
  controllerServer: "ARGOCD_SERVER",
  controllerToken: "ARGOCD_TOKEN",
  registry: "DOCKER_REGISTRY",
  registryUser: "DOCKER_REGISTRY_USER",
  registryPassword: "DOCKER_REGISTRY_PASSWORD",
  appDomain: "APP_DOMAIN",
  ingressDomain: "K8S_INGRESS_DOMAIN",
  redisPassword: "REDIS_PASSWORD",
  certIssuer: "CERT_ISSUER",
  appNamespace: "APP_NAMESPACE",
} as const;

export const GITHUB_REGISTRY = "ghcr.io";
export const DEFAULT_GPU_LABEL = "nvidia.com/gpu";

// ============================================================================
// Catalog
// ============================================================================

export interface CatalogOptions {
  appName: string;
  /** Registry value that marks a local registry where pushes are skipped. */
  localRegistry: string;
}

export function createParameterCatalog(
  options: CatalogOptions,
): ParameterDefinition[] {
  const isLocalRegistry = (values: ResolvedValues) => {
    const registry = values[KEYS.registry];
    return registry === "local" || registry === options.localRegistry;
  };

  return [
    {
      key: KEYS.githubUsername,
      label: "GitHub username",
      required: true,
      probe: (probes) => probes.sourceControl.login,
    },
    {
      key: KEYS.githubToken,
      label: "GitHub personal access token",
      secret: true,
      required: true,
    },
    {
      key: KEYS.gpuNodeLabel,
      label: "GPU node label",
      when: (probes) => probes.gpu.nodes.length > 0,
      probe: (probes) => probes.gpu.labelKey,
      fallback: DEFAULT_GPU_LABEL,
    },
    {
      key: KEYS.storageClass,
      label: "Storage class",
      probe: (probes) => probes.defaultStorageClass,
    },
    {
      key: KEYS.ingressClass,
      label: "Ingress class",
      required: true,
      probe: (probes) => probes.ingressClass,
      fallback: "nginx",
    },
    {
      key: KEYS.controllerServer,
      label: "Argo CD server",
      required: true,
      fallback: "localhost:8080",
    },
    {
      key: KEYS.controllerToken,
      label: "Argo CD API token",
      secret: true,
      produced: true,
    },
    {
      key: KEYS.registry,
      label: "Container registry",
      required: true,
      fallback: GITHUB_REGISTRY,
    },
    {
      key: KEYS.registryUser,
      label: "Registry username",
      required: (values) => !isLocalRegistry(values),
      derive: (values) =>
        values[KEYS.registry] === GITHUB_REGISTRY
          ? values[KEYS.githubUsername]
          : undefined,
    },
    {
      key: KEYS.registryPassword,
      label: "Registry password",
      secret: true,
      required: (values) => !isLocalRegistry(values),
      derive: (values) =>
        values[KEYS.registry] === GITHUB_REGISTRY
          ? values[KEYS.githubToken]
          : undefined,
    },
    {
      key: KEYS.appDomain,
      label: "Application domain",
      required: true,
      fallback: `${options.appName}.local`,
    },
    {
      key: KEYS.ingressDomain,
      label: "Ingress domain",
      derive: (values) => values[KEYS.appDomain],
    },
    {
      key: KEYS.redisPassword,
      label: "Redis password",
      secret: true,
      required: true,
      generate: () => randomBytes(32).toString("base64"),
    },
    {
      key: KEYS.certIssuer,
      label: "Certificate issuer",
      when: (probes) => probes.certificateIssuers.length > 0,
      probe: (probes) => probes.certificateIssuers[0],
      fallback: "letsencrypt-prod",
    },
    {
      key: KEYS.appNamespace,
      label: "Application namespace",
      required: true,
      fallback: options.appName,
    },
  ];
}

export function isRequired(
  parameter: ParameterDefinition,
  values: ResolvedValues,
): boolean {
  const { required } = parameter;
  return typeof required === "function" ? required(values) : required === true;
}

export function secretKeys(catalog: ParameterDefinition[]): Set<string> {
  return new Set(catalog.filter((p) => p.secret).map((p) => p.key));
}
