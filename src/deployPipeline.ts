/**
 * Build-and-Deploy Pipeline
 *
 * build -> tag & push -> render manifests -> apply units in dependency order
 * -> smoke checks. Each stage runs only after the previous one fully
 * succeeded; smoke check failures are reported and never fail the deploy.
 */

import { LoggerService } from "@backstage/backend-plugin-api";
import { AppliedObject, ClusterClient, PodInfo } from "./ClusterClient";
import {
  DeployOptions,
  UnitCategory,
  UnitOptions,
  UNIT_CATEGORIES,
} from "./config";
import type { ResolvedConfiguration } from "./configResolver";
import { ContainerBuilder } from "./ContainerBuilder";
import {
  ApplyOrderViolation,
  BuildFailure,
  errorMessage,
  isBootstrapError,
  StepFailed,
  VerificationFailure,
} from "./errors";
import { InputProvider } from "./inputProvider";
import {
  applyClusterSettings,
  ArtifactReference,
  assertArtifactsPushed,
  formatReference,
  ImageRewrite,
  ManifestObject,
  readManifestFile,
  rewriteImages,
} from "./manifests";
import { topologicalOrder } from "./orchestrator";
import { Clock, systemClock, waitFor, withTimeout } from "./readiness";

// ============================================================================
// Deployment Units
// ============================================================================

export interface DeploymentUnit {
  name: string;
  category: UnitCategory;
  files: string[];
  selector?: string;
  /** Ingress and autoscaling units need an explicit opt-in. */
  optional: boolean;
  dependsOn: string[];
}

const CATEGORY_DEPENDENCIES: Record<UnitCategory, UnitCategory[]> = {
  namespace: [],
  config: ["namespace"],
  stateful: ["namespace", "config"],
  service: ["namespace", "stateful"],
  workload: ["config", "stateful", "service"],
  ingress: ["workload"],
  autoscaling: ["workload"],
};

const OPTIONAL_CATEGORIES: ReadonlySet<UnitCategory> = new Set([
  "ingress",
  "autoscaling",
]);

/**
 * Derive dependencies from categories and return the units in apply order.
 * A namespace unit and a config unit are added when the options have none:
 * the namespace is always ensured and the generated secret lives in config.
 */
export function planUnits(units: UnitOptions[]): DeploymentUnit[] {
  const names = new Set<string>();
  for (const unit of units) {
    if (names.has(unit.name)) {
      throw new Error(`Duplicate deployment unit "${unit.name}"`);
    }
    names.add(unit.name);
  }

  const all: UnitOptions[] = [...units];
  if (!all.some((u) => u.category === "namespace")) {
    all.unshift({ name: "namespace", category: "namespace", files: [] });
  }
  if (!all.some((u) => u.category === "config")) {
    all.push({ name: "config", category: "config", files: [] });
  }

  const rank = (category: UnitCategory) => UNIT_CATEGORIES.indexOf(category);
  const declared = all
    .map((unit, index) => ({ unit, index }))
    .sort((a, b) => rank(a.unit.category) - rank(b.unit.category) || a.index - b.index)
    .map(({ unit }) => unit);

  const planned = declared.map((unit) => ({
    name: unit.name,
    category: unit.category,
    files: unit.files,
    selector: unit.selector,
    optional: OPTIONAL_CATEGORIES.has(unit.category),
    dependsOn: declared
      .filter((other) =>
        CATEGORY_DEPENDENCIES[unit.category].includes(other.category),
      )
      .map((other) => other.name),
  }));

  return topologicalOrder(
    planned.map((unit) => ({ ...unit, id: unit.name })),
  ).map(({ id: _id, ...unit }) => unit);
}

// ============================================================================
// Types
// ============================================================================

export type UnitState = "applied" | "skipped" | "failed" | "not-started";

export interface UnitResult {
  name: string;
  category: UnitCategory;
  state: UnitState;
  objects: AppliedObject[];
  reason?: string;
}

export interface VerificationResult {
  check: string;
  passed: boolean;
  output?: string;
  failure?: VerificationFailure;
}

interface RenderedUnit {
  documents: ManifestObject[];
  /** Files an optional unit could not read; fatal once the unit is opted in. */
  unreadable: string[];
}

export interface DeployReport {
  artifacts: ArtifactReference[];
  pushed: boolean;
  units: UnitResult[];
  verification: VerificationResult[];
  /** The error that stopped the pipeline. */
  error?: Error;
}

export interface DeployRequest {
  version: string;
  config: ResolvedConfiguration;
  /** Opt-ins for optional units; the operator is asked when undefined. */
  ingress?: boolean;
  autoscaling?: boolean;
}

export interface DeployPipelineOptions {
  cluster: ClusterClient;
  builder: ContainerBuilder;
  input: InputProvider;
  logger: LoggerService;
  deploy: DeployOptions;
  clock?: Clock;
  readManifest?: (file: string) => Promise<ManifestObject[]>;
}

// ============================================================================
// Pipeline
// ============================================================================

export class DeployPipeline {
  private readonly cluster: ClusterClient;
  private readonly builder: ContainerBuilder;
  private readonly input: InputProvider;
  private readonly logger: LoggerService;
  private readonly options: DeployOptions;
  private readonly clock: Clock;
  private readonly readManifest: (file: string) => Promise<ManifestObject[]>;

  constructor(options: DeployPipelineOptions) {
    this.cluster = options.cluster;
    this.builder = options.builder;
    this.input = options.input;
    this.logger = options.logger.child({ component: "pipeline" });
    this.options = options.deploy;
    this.clock = options.clock ?? systemClock;
    this.readManifest =
      options.readManifest ??
      ((file) => readManifestFile(file, options.deploy.manifestsDir));
  }

  async run(request: DeployRequest): Promise<DeployReport> {
    const units = planUnits(this.options.units);
    const report: DeployReport = {
      artifacts: [],
      pushed: false,
      units: units.map((unit) => ({
        name: unit.name,
        category: unit.category,
        state: "not-started",
        objects: [],
      })),
      verification: [],
    };

    try {
      const rewrites = this.imageRewrites(request);
      report.artifacts = rewrites.map((r) => r.target);

      await this.build(request.version);
      report.pushed = await this.tagAndPush(request, rewrites);

      const rendered = await this.render(units, rewrites, request.config);
      await this.applyUnits(units, rendered, rewrites, request, report);
    } catch (error) {
      report.error = error instanceof Error ? error : new Error(String(error));
      return report;
    }

    report.verification = await this.verify(request.config);
    return report;
  }

  // ============================================================================
  // Build, Tag & Push
  // ============================================================================

  imageRewrites(request: DeployRequest): ImageRewrite[] {
    const { registry } = request.config;
    return this.options.artifacts.map((artifact) => ({
      placeholder: artifact.placeholder,
      tagPrefix: artifact.tagPrefix,
      target: {
        repository:
          registry.url === "local"
            ? artifact.image
            : `${registry.url}/${artifact.image}`,
        tag: `${artifact.tagPrefix}${request.version}`,
      },
    }));
  }

  private async build(version: string): Promise<void> {
    for (const artifact of this.options.artifacts) {
      const tag = `${artifact.image}:${artifact.tagPrefix}${version}`;
      try {
        await this.builder.build({
          tag,
          context: this.options.buildContext,
          dockerfile: this.options.dockerfile,
          target: artifact.target,
        });
      } catch (error) {
        throw new BuildFailure(
          `Building artifact ${artifact.id} failed: ${errorMessage(error)}`,
          {
            cause: error,
            remediation: `Fix the build, then re-run \`gitops-bootstrap deploy --version ${version}\``,
          },
        );
      }
    }
  }

  private async tagAndPush(
    request: DeployRequest,
    rewrites: ImageRewrite[],
  ): Promise<boolean> {
    const { registry } = request.config;
    try {
      for (const [index, artifact] of this.options.artifacts.entries()) {
        const local = `${artifact.image}:${artifact.tagPrefix}${request.version}`;
        await this.builder.tag(local, formatReference(rewrites[index].target));
      }

      if (registry.local) {
        this.logger.info(`Registry ${registry.url} is local; skipping push`);
        return false;
      }

      if (registry.user && registry.password) {
        await this.builder.login(registry.url, registry.user, registry.password);
      }
      for (const rewrite of rewrites) {
        await this.builder.push(formatReference(rewrite.target));
      }
      return true;
    } catch (error) {
      throw new StepFailed("push", errorMessage(error), { cause: error });
    }
  }

  // ============================================================================
  // Render
  // ============================================================================

  private async render(
    units: DeploymentUnit[],
    rewrites: ImageRewrite[],
    config: ResolvedConfiguration,
  ): Promise<Map<string, RenderedUnit>> {
    const rendered = new Map<string, RenderedUnit>();
    for (const unit of units) {
      const documents: ManifestObject[] = [];
      const unreadable: string[] = [];
      for (const file of unit.files) {
        try {
          documents.push(...(await this.readManifest(file)));
        } catch (error) {
          if (unit.optional) {
            // opted-in optional units fail later, at apply
            this.logger.debug(`Cannot read ${file}: ${error}`);
            unreadable.push(`${file} (${errorMessage(error)})`);
            continue;
          }
          throw new StepFailed("render", `Cannot read ${file}: ${errorMessage(error)}`, {
            cause: error,
          });
        }
      }
      if (unit.category === "config") {
        documents.push(...this.generatedConfig(config));
      }

      const withImages = rewriteImages(documents, rewrites);
      rendered.set(unit.name, {
        documents: applyClusterSettings(withImages, {
          ingressClass: config.cluster.ingressClass,
          certIssuer: config.application.certIssuer,
          storageClass: config.cluster.storageClass,
          gpuNodeLabel: config.cluster.gpuNodeLabel,
          gpuResource: this.options.gpuResource,
        }),
        unreadable,
      });
    }
    return rendered;
  }

  /** The application secret and the passthrough settings ConfigMap. */
  private generatedConfig(config: ResolvedConfiguration): ManifestObject[] {
    const documents: ManifestObject[] = [];
    const labels = { "app.kubernetes.io/part-of": this.options.appName };

    const secretData: Record<string, string> = {};
    for (const [dataKey, storeKey] of Object.entries(this.options.secretKeys)) {
      const value = config.values[storeKey];
      if (value) {
        secretData[dataKey] = value;
      }
    }
    if (Object.keys(secretData).length > 0) {
      documents.push({
        apiVersion: "v1",
        kind: "Secret",
        metadata: { name: this.options.secretName, labels },
        type: "Opaque",
        stringData: secretData,
      });
    }

    if (Object.keys(config.application.settings).length > 0) {
      documents.push({
        apiVersion: "v1",
        kind: "ConfigMap",
        metadata: { name: this.options.settingsConfigMap, labels },
        data: { ...config.application.settings },
      });
    }
    return documents;
  }

  // ============================================================================
  // Apply
  // ============================================================================

  private async applyUnits(
    units: DeploymentUnit[],
    rendered: Map<string, RenderedUnit>,
    rewrites: ImageRewrite[],
    request: DeployRequest,
    report: DeployReport,
  ): Promise<void> {
    const namespace = request.config.application.namespace;
    const results = new Map(report.units.map((r) => [r.name, r]));
    const ready = new Set<string>();

    for (const unit of units) {
      const result = results.get(unit.name);
      if (!result) {
        continue;
      }

      for (const dependency of unit.dependsOn) {
        if (!ready.has(dependency)) {
          throw new ApplyOrderViolation(
            `Unit ${unit.name} was about to be applied before ${dependency} was ready`,
          );
        }
      }

      if (unit.optional && !(await this.optedIn(unit, request))) {
        result.state = "skipped";
        result.reason = "not selected";
        this.logger.info(`Skipping optional unit ${unit.name}`);
        continue;
      }

      try {
        const { documents, unreadable } = rendered.get(unit.name) ?? {
          documents: [],
          unreadable: [],
        };
        if (unreadable.length > 0) {
          throw new Error(`Cannot read ${unreadable.join(", ")}`);
        }
        if (unit.optional && documents.length === 0) {
          throw new Error(`No manifests found in ${unit.files.join(", ")}`);
        }
        if (unit.category === "workload") {
          assertArtifactsPushed(documents, rewrites, unit.name);
        }

        this.logger.info(`Applying unit ${unit.name} (${unit.category})`);
        if (unit.category === "namespace") {
          await this.cluster.ensureNamespace(namespace);
        }
        result.objects = await this.cluster.apply(documents, namespace);
        await this.waitForUnit(unit, documents, namespace);

        result.state = "applied";
        ready.add(unit.name);
      } catch (error) {
        result.state = "failed";
        result.reason = errorMessage(error);
        if (isBootstrapError(error)) {
          throw error;
        }
        throw new StepFailed(`apply:${unit.name}`, errorMessage(error), {
          cause: error,
          remediation:
            "Fix the cause and re-run deploy; units that are already applied are replaced in place",
        });
      }
    }
  }

  private async optedIn(
    unit: DeploymentUnit,
    request: DeployRequest,
  ): Promise<boolean> {
    const flag =
      unit.category === "ingress" ? request.ingress : request.autoscaling;
    if (flag !== undefined) {
      return flag;
    }
    return this.input.confirm(`Deploy ${unit.name} (${unit.category})?`, false);
  }

  private async waitForUnit(
    unit: DeploymentUnit,
    documents: ManifestObject[],
    namespace: string,
  ): Promise<void> {
    const names = (kind: string) =>
      documents
        .filter((doc) => doc.kind === kind)
        .map((doc) => doc.metadata?.name)
        .filter((name): name is string => typeof name === "string");

    if (unit.category === "stateful") {
      const { timeoutMs, intervalMs } = this.options.statefulReadiness;
      for (const name of names("StatefulSet")) {
        await waitFor(
          async () => (await this.cluster.getStatefulSetStatus(namespace, name)).ready,
          { description: `statefulset/${name} ready`, timeoutMs, intervalMs, clock: this.clock },
        );
      }
      const selector = unit.selector;
      if (selector) {
        await waitFor(
          async () => {
            const pods = await this.cluster.listPods(namespace, selector);
            return pods.length > 0 && pods.every((pod) => pod.ready);
          },
          { description: `pods ${selector} ready`, timeoutMs, intervalMs, clock: this.clock },
        );
      }
    }

    if (unit.category === "workload") {
      const { timeoutMs, intervalMs } = this.options.workloadReadiness;
      for (const name of names("Deployment")) {
        await waitFor(
          async () => (await this.cluster.getDeploymentStatus(namespace, name)).ready,
          { description: `deployment/${name} available`, timeoutMs, intervalMs, clock: this.clock },
        );
      }
    }
  }

  // ============================================================================
  // Verification
  // ============================================================================

  private async verify(
    config: ResolvedConfiguration,
  ): Promise<VerificationResult[]> {
    const { selector, container, checks, timeoutMs } = this.options.verification;
    const namespace = config.application.namespace;
    const failed = (check: string, message: string): VerificationResult => {
      this.logger.warn(`Smoke check ${check} failed: ${message}`);
      return {
        check,
        passed: false,
        failure: { code: "VERIFICATION_FAILURE", check, message },
      };
    };

    let pod: PodInfo | undefined;
    try {
      pod = (await this.cluster.listPods(namespace, selector)).find((p) => p.ready);
    } catch (error) {
      return checks.map((c) => failed(c.name, `Cannot list pods: ${errorMessage(error)}`));
    }
    if (!pod) {
      return checks.map((c) => failed(c.name, `No ready pod matches ${selector}`));
    }

    const results: VerificationResult[] = [];
    for (const check of checks) {
      try {
        const result = await withTimeout(
          this.cluster.exec(
            namespace,
            pod.name,
            container ?? pod.containers[0],
            check.command,
          ),
          timeoutMs,
          `smoke check ${check.name}`,
        );
        const output = (result.stdout || result.stderr).trim();
        if (result.exitCode === 0) {
          this.logger.info(`Smoke check ${check.name} passed`);
          results.push({ check: check.name, passed: true, output });
        } else {
          results.push({
            ...failed(check.name, `exit code ${result.exitCode}: ${output}`),
            output,
          });
        }
      } catch (error) {
        results.push(failed(check.name, errorMessage(error)));
      }
    }
    return results;
  }
}
