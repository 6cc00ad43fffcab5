import fc from "fast-check";
import { ConfigReader } from "@backstage/config";
import { readBootstrapOptions, UNIT_CATEGORIES, UnitOptions } from "./config";
import { buildResolvedConfiguration } from "./configResolver";
import { DeployPipeline, planUnits } from "./deployPipeline";
import { BuildFailure, ProvisioningTimeout, StepFailed } from "./errors";
import { InputProvider, NonInteractiveInputProvider } from "./inputProvider";
import { ManifestObject, parseManifests } from "./manifests";
import { ProbeResults } from "./environmentProber";
import { ExecResult } from "./ClusterClient";
import {
  createMockLogger,
  FakeClusterClient,
  FakeContainerBuilder,
  ManualClock,
  probeResults,
  ScriptedInputProvider,
} from "./testUtils";

// ============================================================================
// Fixtures
// ============================================================================

const FILES: Record<string, string> = {
  "configmap.yaml": `
apiVersion: v1
kind: ConfigMap
metadata:
  name: app-config
data:
  LOG_LEVEL: info
`,
  "redis.yaml": `
apiVersion: apps/v1
kind: StatefulSet
metadata:
  name: redis
spec:
  template:
    metadata:
      labels:
        app: redis
    spec:
      containers:
        - name: redis
          image: redis:7
---
apiVersion: v1
kind: Service
metadata:
  name: redis
spec:
  ports:
    - port: 6379
`,
  "service.yaml": `
apiVersion: v1
kind: Service
metadata:
  name: app
spec:
  ports:
    - port: 8000
`,
  "deployment.yaml": `
apiVersion: apps/v1
kind: Deployment
metadata:
  name: app
spec:
  template:
    metadata:
      labels:
        app: app
    spec:
      containers:
        - name: api
          image: app:latest
          resources:
            limits:
              nvidia.com/gpu: 1
        - name: worker
          image: app:worker
`,
  "ingress.yaml": `
apiVersion: networking.k8s.io/v1
kind: Ingress
metadata:
  name: app
spec:
  rules: []
`,
  "hpa.yaml": `
apiVersion: autoscaling/v2
kind: HorizontalPodAutoscaler
metadata:
  name: app
spec:
  minReplicas: 1
  maxReplicas: 3
`,
};

const readManifest = async (file: string): Promise<ManifestObject[]> => {
  const text = FILES[file];
  if (text === undefined) {
    throw new Error(`ENOENT: no such file ${file}`);
  }
  return parseManifests(text, file);
};

const VALUES: Record<string, string> = {
  GITHUB_USERNAME: "test-user",
  GITHUB_PAT: "test-secret-pat",
  K8S_GPU_NODE_LABEL: "nvidia.com/gpu.present",
  K8S_STORAGE_CLASS: "standard",
  K8S_INGRESS_CLASS: "nginx",
  ARGOCD_SERVER: "argocd.example.test",
  DOCKER_REGISTRY: "registry.example.test",
  DOCKER_REGISTRY_USER: "test-user",
  DOCKER_REGISTRY_PASSWORD: "test-secret",
  APP_DOMAIN: "app.example.test",
  REDIS_PASSWORD: "test-secret-redis",
  CERT_ISSUER: "letsencrypt-staging",
  APP_NAMESPACE: "app",
};

const resolved = (
  overrides: Record<string, string> = {},
  probes: ProbeResults = probeResults(),
) =>
  buildResolvedConfiguration({ ...VALUES, ...overrides }, probes, {
    controllerNamespace: "argocd",
    appRepository: "app",
    manifestsRepository: "k8s-manifests",
    localRegistry: "localhost:5000",
    settings: {},
  });

const deployOptions = readBootstrapOptions(
  new ConfigReader({ deploy: { appName: "app" } }),
).deploy;

const setup = (input: InputProvider = new NonInteractiveInputProvider()) => {
  const cluster = new FakeClusterClient();
  const builder = new FakeContainerBuilder();
  const clock = new ManualClock();
  const pipeline = new DeployPipeline({
    cluster,
    builder,
    input,
    logger: createMockLogger(),
    deploy: deployOptions,
    clock,
    readManifest,
  });
  return { cluster, builder, clock, pipeline };
};

// ============================================================================
// planUnits Tests
// ============================================================================

describe("planUnits", () => {
  it("should order the default units and derive their dependencies", () => {
    const units = planUnits(deployOptions.units);

    expect(units.map((u) => [u.name, u.dependsOn])).toEqual([
      ["namespace", []],
      ["config", ["namespace"]],
      ["redis", ["namespace", "config"]],
      ["services", ["namespace", "redis"]],
      ["app", ["config", "redis", "services"]],
      ["ingress", ["app"]],
      ["autoscaler", ["app"]],
    ]);
    expect(units.filter((u) => u.optional).map((u) => u.name)).toEqual([
      "ingress",
      "autoscaler",
    ]);
  });

  it("should place every unit after its dependencies whatever the declared order", () => {
    const unitArbitrary = fc
      .uniqueArray(
        fc.record({
          name: fc.stringMatching(/^[a-z]{1,6}$/),
          category: fc.constantFrom(...UNIT_CATEGORIES),
        }),
        { selector: (u) => u.name, maxLength: 10 },
      )
      .map((units) =>
        units
          .filter((u) => u.name !== "namespace" && u.name !== "config")
          .map((u): UnitOptions => ({ ...u, files: [] })),
      );

    fc.assert(
      fc.property(unitArbitrary, (declared) => {
        const planned = planUnits(declared);
        const position = new Map(planned.map((u, i) => [u.name, i]));
        const rank = (i: number) => UNIT_CATEGORIES.indexOf(planned[i].category);

        expect(planned[0].category).toBe("namespace");
        for (const [index, unit] of planned.entries()) {
          if (index > 0) {
            expect(rank(index - 1)).toBeLessThanOrEqual(rank(index));
          }
          for (const dependency of unit.dependsOn) {
            expect(position.get(dependency)).toBeLessThan(index);
          }
        }
      }),
    );
  });

  it("should reject two units with the same name", () => {
    expect(() =>
      planUnits([
        { name: "web", category: "workload", files: [] },
        { name: "web", category: "service", files: [] },
      ]),
    ).toThrow('Duplicate deployment unit "web"');
  });
});

// ============================================================================
// DeployPipeline Tests
// ============================================================================

describe("DeployPipeline", () => {
  it("should build, push, apply in dependency order and verify", async () => {
    const { cluster, builder, pipeline } = setup();

    const report = await pipeline.run({
      version: "1.2.3",
      config: resolved(),
      ingress: true,
      autoscaling: true,
    });

    expect(report.error).toBeUndefined();
    expect(report.pushed).toBe(true);
    expect(builder.operations).toEqual([
      "build app:1.2.3",
      "build app:worker-1.2.3 --target worker",
      "tag app:1.2.3 registry.example.test/app:1.2.3",
      "tag app:worker-1.2.3 registry.example.test/app:worker-1.2.3",
      "login registry.example.test test-user",
      "push registry.example.test/app:1.2.3",
      "push registry.example.test/app:worker-1.2.3",
    ]);
    expect(cluster.appliedNames()).toEqual([
      "ConfigMap/app-config",
      "Secret/app-secrets",
      "StatefulSet/redis",
      "Service/redis",
      "Service/app",
      "Deployment/app",
      "Ingress/app",
      "HorizontalPodAutoscaler/app",
    ]);
    expect(report.units.map((u) => u.state)).toEqual(Array(7).fill("applied"));
    expect(report.verification.map((v) => [v.check, v.passed])).toEqual([
      ["accelerator", true],
      ["health", true],
    ]);
    expect(cluster.execCalls[0]).toEqual({
      pod: "app-0",
      container: "api",
      command: ["nvidia-smi", "-L"],
    });
  });

  it("should apply rewritten images and cluster settings", async () => {
    const { cluster, pipeline } = setup();

    await pipeline.run({ version: "1.2.3", config: resolved(), ingress: true, autoscaling: false });

    expect(cluster.objects.get("Deployment/app/app")).toMatchObject({
      spec: {
        template: {
          spec: {
            nodeSelector: { "nvidia.com/gpu.present": "true" },
            containers: [
              { name: "api", image: "registry.example.test/app:1.2.3" },
              { name: "worker", image: "registry.example.test/app:worker-1.2.3" },
            ],
          },
        },
      },
    });
    expect(cluster.objects.get("Ingress/app/app")).toMatchObject({
      metadata: { annotations: { "cert-manager.io/cluster-issuer": "letsencrypt-staging" } },
      spec: { ingressClassName: "nginx" },
    });
    expect(cluster.objects.get("Secret/app/app-secrets")).toMatchObject({
      stringData: { "redis-password": "test-secret-redis" },
    });
  });

  it("should deploy without a GPU selector on a cluster without GPU nodes", async () => {
    const { cluster, pipeline } = setup();

    const report = await pipeline.run({
      version: "1.2.3",
      config: resolved({}, probeResults({ gpu: { nodes: [] } })),
      ingress: false,
      autoscaling: false,
    });

    expect(report.error).toBeUndefined();
    expect(cluster.objects.get("Deployment/app/app")).not.toHaveProperty(
      "spec.template.spec.nodeSelector",
    );
  });

  it("should stop before pushing when a build fails", async () => {
    const { cluster, builder, pipeline } = setup();
    builder.failBuild = true;

    const report = await pipeline.run({ version: "1.2.3", config: resolved() });

    expect(report.error).toBeInstanceOf(BuildFailure);
    expect(report.error?.message).toBe(
      "Building artifact runtime failed: failed to solve: exit code 1",
    );
    expect(builder.operations).toEqual([]);
    expect(cluster.applyCalls).toEqual([]);
    expect(report.units.every((u) => u.state === "not-started")).toBe(true);
  });

  it("should skip the push for a local registry", async () => {
    const { cluster, builder, pipeline } = setup();

    const report = await pipeline.run({
      version: "1.2.3",
      config: resolved({ DOCKER_REGISTRY: "localhost:5000" }),
      ingress: false,
      autoscaling: false,
    });

    expect(report.error).toBeUndefined();
    expect(report.pushed).toBe(false);
    expect(builder.operations.filter((op) => /^(push|login)/.test(op))).toEqual([]);
    expect(report.artifacts).toEqual([
      { repository: "localhost:5000/app", tag: "1.2.3" },
      { repository: "localhost:5000/app", tag: "worker-1.2.3" },
    ]);
    expect(cluster.appliedNames()).not.toContain("Ingress/app");
  });

  it("should ask about optional units when no flag is given", async () => {
    const input = new ScriptedInputProvider({}, { "Deploy ingress (ingress)?": true });
    const { cluster, pipeline } = setup(input);

    const report = await pipeline.run({ version: "1.2.3", config: resolved() });

    expect(input.prompts).toEqual([
      "Deploy ingress (ingress)?",
      "Deploy autoscaler (autoscaling)?",
    ]);
    expect(cluster.appliedNames()).toContain("Ingress/app");
    expect(cluster.appliedNames()).not.toContain("HorizontalPodAutoscaler/app");
    expect(report.units.find((u) => u.name === "autoscaler")).toMatchObject({
      state: "skipped",
      reason: "not selected",
    });
  });

  it("should converge to the same objects when run twice", async () => {
    const { cluster, pipeline } = setup();
    const request = { version: "1.2.3", config: resolved(), ingress: true, autoscaling: true };

    await pipeline.run(request);
    const firstRun = cluster.applyCalls.length;
    const objectsAfterFirst = structuredClone([...cluster.objects]);
    const second = await pipeline.run(request);

    expect(second.error).toBeUndefined();
    expect(cluster.applyCalls.slice(firstRun)).toEqual(cluster.applyCalls.slice(0, firstRun));
    expect([...cluster.objects]).toEqual(objectsAfterFirst);
    expect(
      new Set(second.units.flatMap((u) => u.objects.map((o) => o.action))),
    ).toEqual(new Set(["configured"]));
  });

  it("should never apply workloads before stateful services are ready", async () => {
    const { cluster, clock, pipeline } = setup();
    cluster.readyOnApply = false;

    const report = await pipeline.run({ version: "1.2.3", config: resolved() });

    expect(report.error).toBeInstanceOf(ProvisioningTimeout);
    expect(report.error?.message).toBe(
      "Timed out after 120000ms waiting for statefulset/redis ready",
    );
    expect(clock.now()).toBe(120_000);
    expect(cluster.appliedNames()).not.toContain("Deployment/app");
    expect(report.units.map((u) => [u.name, u.state])).toEqual([
      ["namespace", "applied"],
      ["config", "applied"],
      ["redis", "failed"],
      ["services", "not-started"],
      ["app", "not-started"],
      ["ingress", "not-started"],
      ["autoscaler", "not-started"],
    ]);
  });

  it("should fail the render when a required manifest is missing", async () => {
    const options = {
      ...deployOptions,
      units: [...deployOptions.units, { name: "extra", category: "service" as const, files: ["extra.yaml"] }],
    };
    const failing = new DeployPipeline({
      cluster: new FakeClusterClient(),
      builder: new FakeContainerBuilder(),
      input: new NonInteractiveInputProvider(),
      logger: createMockLogger(),
      deploy: options,
      readManifest,
    });

    const report = await failing.run({ version: "1.2.3", config: resolved() });

    expect(report.error).toBeInstanceOf(StepFailed);
    expect(report.error?.message).toBe(
      "[render] Cannot read extra.yaml: ENOENT: no such file extra.yaml",
    );
  });

  it("should report failing smoke checks without failing the deploy", async () => {
    const { cluster, pipeline } = setup();
    cluster.execResults.set("nvidia-smi -L", {
      exitCode: 9,
      stdout: "",
      stderr: "NVIDIA-SMI has failed\n",
    });

    const report = await pipeline.run({
      version: "1.2.3",
      config: resolved(),
      ingress: false,
      autoscaling: false,
    });

    expect(report.error).toBeUndefined();
    expect(report.verification[0]).toEqual({
      check: "accelerator",
      passed: false,
      output: "NVIDIA-SMI has failed",
      failure: {
        code: "VERIFICATION_FAILURE",
        check: "accelerator",
        message: "exit code 9: NVIDIA-SMI has failed",
      },
    });
    expect(report.verification[1].passed).toBe(true);
  });

  it("should fail a smoke check that does not answer in time", async () => {
    class HangingExecCluster extends FakeClusterClient {
      async exec(): Promise<ExecResult> {
        return new Promise<ExecResult>(() => undefined);
      }
    }
    const pipeline = new DeployPipeline({
      cluster: new HangingExecCluster(),
      builder: new FakeContainerBuilder(),
      input: new NonInteractiveInputProvider(),
      logger: createMockLogger(),
      deploy: {
        ...deployOptions,
        verification: { ...deployOptions.verification, timeoutMs: 20 },
      },
      readManifest,
    });

    const report = await pipeline.run({
      version: "1.2.3",
      config: resolved(),
      ingress: false,
      autoscaling: false,
    });

    expect(report.error).toBeUndefined();
    expect(report.verification.map((v) => [v.check, v.passed, v.failure?.message])).toEqual([
      ["accelerator", false, "Timed out after 20ms waiting for smoke check accelerator"],
      ["health", false, "Timed out after 20ms waiting for smoke check health"],
    ]);
  });

  const withTlsIngress = () => {
    const cluster = new FakeClusterClient();
    const pipeline = new DeployPipeline({
      cluster,
      builder: new FakeContainerBuilder(),
      input: new NonInteractiveInputProvider(),
      logger: createMockLogger(),
      deploy: {
        ...deployOptions,
        units: deployOptions.units.map((unit) =>
          unit.name === "ingress"
            ? { ...unit, files: ["ingress.yaml", "ingress-tls.yaml"] }
            : unit,
        ),
      },
      readManifest,
    });
    return { cluster, pipeline };
  };

  it("should fail an opted-in optional unit when one of its files cannot be read", async () => {
    const { cluster, pipeline } = withTlsIngress();

    const report = await pipeline.run({
      version: "1.2.3",
      config: resolved(),
      ingress: true,
      autoscaling: false,
    });

    expect(report.error).toBeInstanceOf(StepFailed);
    expect(report.error?.message).toBe(
      "[apply:ingress] Cannot read ingress-tls.yaml (ENOENT: no such file ingress-tls.yaml)",
    );
    expect(report.units.find((u) => u.name === "ingress")?.state).toBe("failed");
    expect(cluster.appliedNames()).not.toContain("Ingress/app");
  });

  it("should skip an optional unit with an unreadable file when it is not selected", async () => {
    const { pipeline } = withTlsIngress();

    const report = await pipeline.run({
      version: "1.2.3",
      config: resolved(),
      ingress: false,
      autoscaling: false,
    });

    expect(report.error).toBeUndefined();
    expect(report.units.find((u) => u.name === "ingress")).toMatchObject({
      state: "skipped",
      reason: "not selected",
    });
  });
});
