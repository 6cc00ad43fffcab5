import { Response } from "node-fetch";
import { ArtifactMismatch } from "./errors";
import {
  applyClusterSettings,
  assertArtifactsPushed,
  CLUSTER_ISSUER_ANNOTATION,
  fetchManifests,
  ImageRewrite,
  imagesOf,
  ManifestObject,
  parseImage,
  parseManifests,
  renderManifests,
  rewriteImages,
} from "./manifests";

const DEPLOYMENT_YAML = `
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
      initContainers:
        - name: migrate
          image: app:worker
      containers:
        - name: api
          image: app:latest
          resources:
            limits:
              nvidia.com/gpu: 1
        - name: sidecar
          image: redis:7
---
apiVersion: v1
kind: Service
metadata:
  name: app
spec:
  ports:
    - port: 8000
`;

const rewritesFor = (version: string): ImageRewrite[] => [
  {
    placeholder: "app:latest",
    tagPrefix: "",
    target: { repository: "registry.example.test/app", tag: version },
  },
  {
    placeholder: "app:worker",
    tagPrefix: "worker-",
    target: { repository: "registry.example.test/app", tag: `worker-${version}` },
  },
];

// ============================================================================
// Parsing
// ============================================================================

describe("parseManifests", () => {
  it("should read every non-empty document", () => {
    const docs = parseManifests(`---\n${DEPLOYMENT_YAML}\n---\n`, "app.yaml");

    expect(docs.map((d) => `${d.kind}/${d.metadata?.name}`)).toEqual([
      "Deployment/app",
      "Service/app",
    ]);
  });

  it("should reject documents without a kind", () => {
    expect(() => parseManifests("apiVersion: v1\nmetadata: {}\n", "bad.yaml")).toThrow(
      "bad.yaml: every document must be a mapping with apiVersion and kind",
    );
  });
});

describe("parseImage", () => {
  it("should not mistake a registry port for a tag", () => {
    expect(parseImage("localhost:5000/app")).toEqual({ repository: "localhost:5000/app" });
    expect(parseImage("localhost:5000/app:1.0")).toEqual({
      repository: "localhost:5000/app",
      tag: "1.0",
    });
    expect(parseImage("app@sha256:abc")).toEqual({ repository: "app" });
  });
});

describe("fetchManifests", () => {
  it("should parse the fetched text", async () => {
    const fetchFn = jest.fn(async () => new Response("apiVersion: v1\nkind: Namespace\nmetadata:\n  name: argocd\n"));

    const docs = await fetchManifests("https://manifests.example.test/install.yaml", fetchFn);

    expect(fetchFn).toHaveBeenCalledWith("https://manifests.example.test/install.yaml");
    expect(docs).toEqual([
      { apiVersion: "v1", kind: "Namespace", metadata: { name: "argocd" } },
    ]);
  });

  it("should fail on an HTTP error", async () => {
    const fetchFn = async () =>
      new Response("missing", { status: 404, statusText: "Not Found" });

    await expect(
      fetchManifests("https://manifests.example.test/install.yaml", fetchFn),
    ).rejects.toThrow("Failed to fetch https://manifests.example.test/install.yaml: 404 Not Found");
  });
});

// ============================================================================
// Image Rewriting
// ============================================================================

describe("rewriteImages", () => {
  it("should point placeholders at the pushed artifacts", () => {
    const docs = parseManifests(DEPLOYMENT_YAML, "app.yaml");

    const rewritten = rewriteImages(docs, rewritesFor("1.2.3"));

    expect(imagesOf(rewritten)).toEqual([
      "registry.example.test/app:worker-1.2.3",
      "registry.example.test/app:1.2.3",
      "redis:7",
    ]);
    expect(imagesOf(docs)).toEqual(["app:worker", "app:latest", "redis:7"]);
  });

  it("should produce identical bytes when applied twice", () => {
    const docs = parseManifests(DEPLOYMENT_YAML, "app.yaml");
    const once = rewriteImages(docs, rewritesFor("1.2.3"));
    const twice = rewriteImages(once, rewritesFor("1.2.3"));

    expect(renderManifests(twice)).toBe(renderManifests(once));
  });

  it("should move manifests rendered for an earlier version", () => {
    const docs = rewriteImages(parseManifests(DEPLOYMENT_YAML, "app.yaml"), rewritesFor("1.2.3"));

    expect(imagesOf(rewriteImages(docs, rewritesFor("1.2.4")))).toEqual([
      "registry.example.test/app:worker-1.2.4",
      "registry.example.test/app:1.2.4",
      "redis:7",
    ]);
  });
});

describe("assertArtifactsPushed", () => {
  it("should accept manifests naming only pushed artifacts", () => {
    const docs = rewriteImages(parseManifests(DEPLOYMENT_YAML, "app.yaml"), rewritesFor("1.2.3"));

    expect(() => assertArtifactsPushed(docs, rewritesFor("1.2.3"), "app")).not.toThrow();
  });

  it("should reject a leftover placeholder", () => {
    const docs = parseManifests(DEPLOYMENT_YAML, "app.yaml");

    expect(() => assertArtifactsPushed(docs, rewritesFor("1.2.3"), "app")).toThrow(
      new ArtifactMismatch(
        "Deployment/app in unit app still references placeholder image app:worker",
      ),
    );
  });

  it("should reject an artifact tag that was not pushed", () => {
    const docs = rewriteImages(parseManifests(DEPLOYMENT_YAML, "app.yaml"), rewritesFor("1.2.3"));

    expect(() => assertArtifactsPushed(docs, rewritesFor("2.0.0"), "app")).toThrow(
      "Deployment/app in unit app references registry.example.test/app:worker-1.2.3, which was not pushed in this run",
    );
  });
});

// ============================================================================
// Cluster Settings
// ============================================================================

describe("applyClusterSettings", () => {
  const settings = {
    ingressClass: "nginx",
    certIssuer: "letsencrypt-staging",
    storageClass: "standard",
    gpuNodeLabel: "nvidia.com/gpu.present",
    gpuResource: "nvidia.com/gpu",
  };

  it("should set the ingress class and issuer", () => {
    const [ingress] = applyClusterSettings(
      [
        {
          apiVersion: "networking.k8s.io/v1",
          kind: "Ingress",
          metadata: { name: "app" },
          spec: { ingressClassName: "traefik", rules: [] },
        },
      ],
      settings,
    );

    expect(ingress).toEqual({
      apiVersion: "networking.k8s.io/v1",
      kind: "Ingress",
      metadata: {
        name: "app",
        annotations: { [CLUSTER_ISSUER_ANNOTATION]: "letsencrypt-staging" },
      },
      spec: { ingressClassName: "nginx", rules: [] },
    });
  });

  it("should fill in the storage class of claim templates that name none", () => {
    const statefulSet: ManifestObject = {
      apiVersion: "apps/v1",
      kind: "StatefulSet",
      metadata: { name: "redis" },
      spec: {
        volumeClaimTemplates: [
          { metadata: { name: "data" }, spec: {} },
          { metadata: { name: "logs" }, spec: { storageClassName: "fast" } },
        ],
      },
    };

    const [updated] = applyClusterSettings([statefulSet], settings);

    expect(updated.spec).toEqual({
      volumeClaimTemplates: [
        { metadata: { name: "data" }, spec: { storageClassName: "standard" } },
        { metadata: { name: "logs" }, spec: { storageClassName: "fast" } },
      ],
    });
  });

  it("should pin GPU workloads to GPU nodes", () => {
    const [deployment, service] = applyClusterSettings(
      parseManifests(DEPLOYMENT_YAML, "app.yaml"),
      settings,
    );

    expect(deployment.spec).toMatchObject({
      template: { spec: { nodeSelector: { "nvidia.com/gpu.present": "true" } } },
    });
    expect(service.spec).toEqual({ ports: [{ port: 8000 }] });
  });

  it("should leave workloads alone when the cluster has no GPU label", () => {
    const docs = parseManifests(DEPLOYMENT_YAML, "app.yaml");

    const updated = applyClusterSettings(docs, { gpuResource: "nvidia.com/gpu" });

    expect(updated).toEqual(docs);
  });

  it("should keep an existing node selector value", () => {
    const deployment: ManifestObject = {
      apiVersion: "apps/v1",
      kind: "Deployment",
      metadata: { name: "app" },
      spec: {
        template: {
          spec: {
            nodeSelector: { "nvidia.com/gpu.present": "false" },
            containers: [
              { name: "api", resources: { requests: { "nvidia.com/gpu": 1 } } },
            ],
          },
        },
      },
    };

    const [updated] = applyClusterSettings([deployment], settings);

    expect(updated).toEqual(deployment);
  });
});
