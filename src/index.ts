/**
 * GitOps bootstrap for a Kubernetes cluster
 *
 * Probes the cluster, resolves the configuration the workflow needs into a
 * persistent store, bootstraps Argo CD through a DAG of idempotent steps and
 * deploys the service in dependency order.
 *
 * ## Usage
 *
 * ```bash
 * gitops-bootstrap check
 * gitops-bootstrap provision
 * gitops-bootstrap deploy --version 1.4.0 --ingress
 * ```
 *
 * ## Configuration
 *
 * Add a `bootstrap.yaml` next to the manifests:
 *
 * ```yaml
 * bootstrap:
 *   store: ~/.env.cicd
 *   probeTimeout:
 *     seconds: 10
 * controller:
 *   namespace: argocd
 *   readiness:
 *     timeout:
 *       minutes: 5
 * deploy:
 *   appName: my-service
 * ```
 *
 * @packageDocumentation
 */

// Command line
export { runCli, parseCliArgs, createRuntime, USAGE, UsageError } from "./cli";
export type { CliArgs, Command, Runtime, RuntimeFactory } from "./cli";

// Configuration
export {
  DEFAULT_CONFIG_FILE,
  UNIT_CATEGORIES,
  loadConfigFile,
  readBootstrapOptions,
  readDuration,
  isUnitCategory,
} from "./config";
export type {
  BootstrapOptions,
  ControllerOptions,
  SourceControlOptions,
  DeployOptions,
  ArtifactOptions,
  UnitOptions,
  UnitCategory,
  ReadinessOptions,
  VerificationOptions,
  SmokeCheckOptions,
} from "./config";

// Configuration store
export { FileConfigStore, MemoryConfigStore } from "./configStore";
export type { ConfigStore } from "./configStore";

// Environment probing
export { EnvironmentProber } from "./environmentProber";
export type {
  ProbeResults,
  ControllerState,
  GpuNodes,
  EnvironmentProberOptions,
} from "./environmentProber";

// Configuration resolution
export { KEYS, createParameterCatalog } from "./parameters";
export type { ParameterDefinition } from "./parameters";
export {
  planParameter,
  planResolution,
  resolveConfiguration,
  renderResolutionSummary,
  buildResolvedConfiguration,
} from "./configResolver";
export type {
  ResolvedConfiguration,
  PlannedValue,
  ValueSource,
} from "./configResolver";
export {
  InquirerInputProvider,
  NonInteractiveInputProvider,
} from "./inputProvider";
export type { InputProvider, AskOptions } from "./inputProvider";

// Provisioning
export {
  StepOrchestrator,
  topologicalOrder,
  renderReport,
} from "./orchestrator";
export type {
  ProvisioningStep,
  StepOutcome,
  StepState,
  OrchestrationReport,
} from "./orchestrator";
export { STEP_IDS, createProvisioningSteps } from "./provisioningSteps";
export type {
  ProvisioningContext,
  ProvisioningState,
} from "./provisioningSteps";

// Build and deploy
export { DeployPipeline, planUnits } from "./deployPipeline";
export type {
  DeployReport,
  DeployRequest,
  DeploymentUnit,
  UnitResult,
  VerificationResult,
} from "./deployPipeline";
export {
  parseManifests,
  renderManifests,
  rewriteImages,
  applyClusterSettings,
  assertArtifactsPushed,
} from "./manifests";
export type { ManifestObject, ArtifactReference } from "./manifests";

// Clients
export { KubernetesClusterClient } from "./ClusterClient";
export type { ClusterClient, KubernetesClusterClientOptions } from "./ClusterClient";
export { ArgoCdClient, ArgoCdApiError } from "./ArgoCdClient";
export type { GitOpsControllerApi, HistoryEntry } from "./ArgoCdClient";
export { GitHubCli } from "./GitHubCli";
export type { SourceControlHost } from "./GitHubCli";
export { DockerCli } from "./ContainerBuilder";
export type { ContainerBuilder, BuildRequest } from "./ContainerBuilder";

// Errors
export * from "./errors";
