/**
 * Tool configuration
 *
 * Reads `bootstrap.yaml` (or the file given with `--config`) into a Backstage
 * `Config` and turns it into typed options with defaults for every key.
 *
 * @example
 * ```yaml
 * bootstrap:
 *   store: ~/.env.cicd
 *   probeTimeout: { seconds: 10 }
 * controller:
 *   namespace: argocd
 *   readiness:
 *     timeout: { seconds: 300 }
 *     interval: { seconds: 5 }
 * deploy:
 *   appName: my-service
 *   manifestsDir: k8s
 * ```
 */

import { existsSync, readFileSync } from "fs";
import { homedir } from "os";
import { join, resolve } from "path";
import * as yaml from "js-yaml";
import { Duration } from "luxon";
import { Config, ConfigReader } from "@backstage/config";
import type { JsonObject } from "@backstage/types";

export const DEFAULT_CONFIG_FILE = "bootstrap.yaml";

// ============================================================================
// Option Types
// ============================================================================

export interface ReadinessOptions {
  timeoutMs: number;
  intervalMs: number;
}

export interface ControllerOptions {
  namespace: string;
  deploymentName: string;
  /** Label selector of the API server pods, used for port-forwarding. */
  serverSelector: string;
  installManifestUrl: string;
  initialSecretName: string;
  initialSecretKey: string;
  adminUsername: string;
  tokenAccount: string;
  insecure: boolean;
  projectManifests: string[];
  applicationManifests: string[];
  readiness: ReadinessOptions;
}

export interface SourceControlOptions {
  appRepository: string;
  manifestsRepository: string;
  visibility: "public" | "private";
  secretNames: {
    token: string;
    server: string;
    repositoryToken: string;
  };
}

export interface ArtifactOptions {
  /** Identifier used in logs and reports. */
  id: string;
  /** Image name without registry, e.g. `my-service`. */
  image: string;
  /** Multi-stage build target, when the Dockerfile has several. */
  target?: string;
  tagPrefix: string;
  /** Image reference the manifests carry before rewriting. */
  placeholder: string;
}

export type UnitCategory =
  | "namespace"
  | "config"
  | "stateful"
  | "service"
  | "workload"
  | "ingress"
  | "autoscaling";

export const UNIT_CATEGORIES: readonly UnitCategory[] = [
  "namespace",
  "config",
  "stateful",
  "service",
  "workload",
  "ingress",
  "autoscaling",
];

export interface UnitOptions {
  name: string;
  category: UnitCategory;
  files: string[];
  /** Extra pod selector that must report Ready before dependants apply. */
  selector?: string;
}

export interface SmokeCheckOptions {
  name: string;
  command: string[];
}

export interface VerificationOptions {
  selector: string;
  container?: string;
  checks: SmokeCheckOptions[];
  /** Bound on each smoke check. */
  timeoutMs: number;
}

export interface DeployOptions {
  appName: string;
  manifestsDir: string;
  buildContext: string;
  dockerfile: string;
  localRegistry: string;
  artifacts: ArtifactOptions[];
  units: UnitOptions[];
  secretName: string;
  /** Secret data key -> configuration store key. */
  secretKeys: Record<string, string>;
  settingsConfigMap: string;
  /** Passthrough application settings (TTLs, thresholds). */
  settings: Record<string, string>;
  gpuResource: string;
  statefulReadiness: ReadinessOptions;
  workloadReadiness: ReadinessOptions;
  verification: VerificationOptions;
}

export interface BootstrapOptions {
  storePath: string;
  kubeContext?: string;
  probeTimeoutMs: number;
  controller: ControllerOptions;
  sourceControl: SourceControlOptions;
  deploy: DeployOptions;
}

// ============================================================================
// Loading
// ============================================================================

/**
 * Load the YAML configuration file. A missing default file is not an error:
 * every option has a default.
 */
export function loadConfigFile(path?: string): Config {
  const file = resolve(path ?? DEFAULT_CONFIG_FILE);
  if (!existsSync(file)) {
    if (path) {
      throw new Error(`Configuration file not found: ${file}`);
    }
    return new ConfigReader({});
  }

  const data = yaml.load(readFileSync(file, "utf8"));
  if (data === undefined || data === null) {
    return new ConfigReader({}, file);
  }
  if (!isJsonObject(data)) {
    throw new Error(`Configuration file ${file} must contain a mapping`);
  }
  return new ConfigReader(data, file);
}

function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

// ============================================================================
// Reading
// ============================================================================

export function readBootstrapOptions(config: Config): BootstrapOptions {
  const appName = config.getOptionalString("deploy.appName") ?? "app";

  return {
    storePath: expandHome(
      config.getOptionalString("bootstrap.store") ?? "~/.env.cicd",
    ),
    kubeContext: config.getOptionalString("bootstrap.kubeContext"),
    probeTimeoutMs: readDuration(
      config.getOptionalConfig("bootstrap.probeTimeout"),
      10_000,
    ),
    controller: readControllerOptions(config.getOptionalConfig("controller")),
    sourceControl: readSourceControlOptions(
      config.getOptionalConfig("sourceControl"),
      appName,
    ),
    deploy: readDeployOptions(config.getOptionalConfig("deploy"), appName),
  };
}

function readControllerOptions(config?: Config): ControllerOptions {
  return {
    namespace: config?.getOptionalString("namespace") ?? "argocd",
    deploymentName:
      config?.getOptionalString("deploymentName") ?? "argocd-server",
    serverSelector:
      config?.getOptionalString("serverSelector") ??
      "app.kubernetes.io/name=argocd-server",
    installManifestUrl:
      config?.getOptionalString("installManifestUrl") ??
      "https://raw.githubusercontent.com/argoproj/argo-cd/stable/manifests/install.yaml",
    initialSecretName:
      config?.getOptionalString("initialSecretName") ??
      "argocd-initial-admin-secret",
    initialSecretKey: config?.getOptionalString("initialSecretKey") ?? "password",
    adminUsername: config?.getOptionalString("adminUsername") ?? "admin",
    tokenAccount: config?.getOptionalString("tokenAccount") ?? "admin",
    insecure: config?.getOptionalBoolean("insecure") ?? true,
    projectManifests: config?.getOptionalStringArray("projectManifests") ?? [
      "argocd/appproject.yaml",
    ],
    applicationManifests: config?.getOptionalStringArray(
      "applicationManifests",
    ) ?? ["argocd/application.yaml"],
    readiness: readReadiness(config?.getOptionalConfig("readiness"), {
      timeoutMs: 300_000,
      intervalMs: 5_000,
    }),
  };
}

function readSourceControlOptions(
  config: Config | undefined,
  appName: string,
): SourceControlOptions {
  const visibility = config?.getOptionalString("visibility") ?? "public";
  if (visibility !== "public" && visibility !== "private") {
    throw new Error(
      `sourceControl.visibility must be "public" or "private", got "${visibility}"`,
    );
  }

  return {
    appRepository: config?.getOptionalString("appRepository") ?? appName,
    manifestsRepository:
      config?.getOptionalString("manifestsRepository") ?? "k8s-manifests",
    visibility,
    secretNames: {
      token: config?.getOptionalString("secretNames.token") ?? "ARGOCD_TOKEN",
      server:
        config?.getOptionalString("secretNames.server") ?? "ARGOCD_SERVER",
      repositoryToken:
        config?.getOptionalString("secretNames.repositoryToken") ??
        "ARGOCD_GITHUB_TOKEN",
    },
  };
}

function readDeployOptions(
  config: Config | undefined,
  appName: string,
): DeployOptions {
  const artifacts = config?.has("artifacts")
    ? config.getConfigArray("artifacts").map((a) => readArtifact(a, appName))
    : defaultArtifacts(appName);

  const units = config?.has("units")
    ? config.getConfigArray("units").map(readUnit)
    : defaultUnits(appName);

  return {
    appName,
    manifestsDir: config?.getOptionalString("manifestsDir") ?? "k8s",
    buildContext: config?.getOptionalString("buildContext") ?? ".",
    dockerfile: config?.getOptionalString("dockerfile") ?? "Dockerfile",
    localRegistry:
      config?.getOptionalString("localRegistry") ?? "localhost:5000",
    artifacts,
    units,
    secretName: config?.getOptionalString("secretName") ?? `${appName}-secrets`,
    secretKeys: readStringMap(config?.getOptionalConfig("secretKeys")) ?? {
      "redis-password": "REDIS_PASSWORD",
    },
    settingsConfigMap:
      config?.getOptionalString("settingsConfigMap") ?? `${appName}-settings`,
    settings: readStringMap(config?.getOptionalConfig("settings")) ?? {},
    gpuResource: config?.getOptionalString("gpuResource") ?? "nvidia.com/gpu",
    statefulReadiness: readReadiness(
      config?.getOptionalConfig("statefulReadiness"),
      { timeoutMs: 120_000, intervalMs: 2_000 },
    ),
    workloadReadiness: readReadiness(
      config?.getOptionalConfig("workloadReadiness"),
      { timeoutMs: 300_000, intervalMs: 2_000 },
    ),
    verification: readVerification(
      config?.getOptionalConfig("verification"),
      appName,
    ),
  };
}

function readArtifact(config: Config, appName: string): ArtifactOptions {
  const image = config.getOptionalString("image") ?? appName;
  const tagPrefix = config.getOptionalString("tagPrefix") ?? "";
  return {
    id: config.getOptionalString("id") ?? `${image}${tagPrefix ? `:${tagPrefix}` : ""}`,
    image,
    target: config.getOptionalString("target"),
    tagPrefix,
    placeholder: config.getOptionalString("placeholder") ?? `${image}:latest`,
  };
}

function defaultArtifacts(appName: string): ArtifactOptions[] {
  return [
    {
      id: "runtime",
      image: appName,
      tagPrefix: "",
      placeholder: `${appName}:latest`,
    },
    {
      id: "worker",
      image: appName,
      target: "worker",
      tagPrefix: "worker-",
      placeholder: `${appName}:worker`,
    },
  ];
}

function readUnit(config: Config): UnitOptions {
  const name = config.getString("name");
  const category = config.getString("category");
  if (!isUnitCategory(category)) {
    throw new Error(
      `deploy.units[${name}].category must be one of ${UNIT_CATEGORIES.join(", ")}`,
    );
  }
  return {
    name,
    category,
    files: config.getOptionalStringArray("files") ?? [],
    selector: config.getOptionalString("selector"),
  };
}

function defaultUnits(appName: string): UnitOptions[] {
  return [
    { name: "config", category: "config", files: ["configmap.yaml"] },
    {
      name: "redis",
      category: "stateful",
      files: ["redis.yaml"],
      selector: "app=redis",
    },
    { name: "services", category: "service", files: ["service.yaml"] },
    { name: appName, category: "workload", files: ["deployment.yaml"] },
    { name: "ingress", category: "ingress", files: ["ingress.yaml"] },
    { name: "autoscaler", category: "autoscaling", files: ["hpa.yaml"] },
  ];
}

function readVerification(
  config: Config | undefined,
  appName: string,
): VerificationOptions {
  const checks = config?.has("checks")
    ? config.getConfigArray("checks").map((check) => ({
        name: check.getString("name"),
        command: check.getStringArray("command"),
      }))
    : [
        { name: "accelerator", command: ["nvidia-smi", "-L"] },
        {
          name: "health",
          command: ["curl", "-sf", "http://localhost:8000/health"],
        },
      ];

  return {
    selector: config?.getOptionalString("selector") ?? `app=${appName}`,
    container: config?.getOptionalString("container"),
    checks,
    timeoutMs: readDuration(config?.getOptionalConfig("timeout"), 30_000),
  };
}

// ============================================================================
// Helpers
// ============================================================================

export function isUnitCategory(value: string): value is UnitCategory {
  return UNIT_CATEGORIES.some((category) => category === value);
}

function readReadiness(
  config: Config | undefined,
  defaults: ReadinessOptions,
): ReadinessOptions {
  return {
    timeoutMs: readDuration(
      config?.getOptionalConfig("timeout"),
      defaults.timeoutMs,
    ),
    intervalMs: readDuration(
      config?.getOptionalConfig("interval"),
      defaults.intervalMs,
    ),
  };
}

/** Reads `{ minutes, seconds, milliseconds }` into milliseconds. */
export function readDuration(
  config: Config | undefined,
  defaultMs: number,
): number {
  if (!config) {
    return defaultMs;
  }
  const duration = Duration.fromObject({
    hours: config.getOptionalNumber("hours") ?? 0,
    minutes: config.getOptionalNumber("minutes") ?? 0,
    seconds: config.getOptionalNumber("seconds") ?? 0,
    milliseconds: config.getOptionalNumber("milliseconds") ?? 0,
  });
  const ms = duration.toMillis();
  return ms > 0 ? ms : defaultMs;
}

function readStringMap(
  config: Config | undefined,
): Record<string, string> | undefined {
  if (!config) {
    return undefined;
  }
  const result: Record<string, string> = {};
  for (const key of config.keys()) {
    const value = config.get(key);
    result[key] = typeof value === "string" ? value : JSON.stringify(value);
  }
  return result;
}

export function expandHome(path: string): string {
  if (path === "~") {
    return homedir();
  }
  if (path.startsWith("~/")) {
    return join(homedir(), path.slice(2));
  }
  return path;
}
