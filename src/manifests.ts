/**
 * Manifest documents: parsing, rendering and targeted field updates.
 *
 * Documents are edited as parsed objects, never as text, and every function
 * here returns new documents instead of mutating its input.
 */

import { promises as fs } from "fs";
import { resolve } from "path";
import * as yaml from "js-yaml";
import fetch from "node-fetch";
import type { KubernetesObject } from "@kubernetes/client-node";
import { ArtifactMismatch } from "./errors";
import type { FetchFn } from "./ArgoCdClient";

export type ManifestObject = KubernetesObject & Record<string, unknown>;

type JsonRecord = Record<string, unknown>;

export const CLUSTER_ISSUER_ANNOTATION = "cert-manager.io/cluster-issuer";

// ============================================================================
// Parsing & Rendering
// ============================================================================

export function parseManifests(text: string, source: string): ManifestObject[] {
  const documents: ManifestObject[] = [];
  yaml.loadAll(text, (doc) => {
    if (doc === null || doc === undefined) {
      return;
    }
    if (!isManifestObject(doc)) {
      throw new Error(
        `${source}: every document must be a mapping with apiVersion and kind`,
      );
    }
    documents.push(doc);
  });
  return documents;
}

export function isManifestObject(value: unknown): value is ManifestObject {
  return (
    isRecord(value) &&
    typeof value.apiVersion === "string" &&
    typeof value.kind === "string"
  );
}

/** Stable YAML: same documents, same bytes. */
export function renderManifests(documents: ManifestObject[]): string {
  return documents
    .map((doc) => yaml.dump(doc, { noRefs: true, lineWidth: -1 }))
    .join("---\n");
}

export async function readManifestFile(
  path: string,
  baseDir = ".",
): Promise<ManifestObject[]> {
  const file = resolve(baseDir, path);
  return parseManifests(await fs.readFile(file, "utf8"), file);
}

export async function fetchManifests(
  url: string,
  fetchFn: FetchFn = fetch,
): Promise<ManifestObject[]> {
  const res = await fetchFn(url);
  if (!res.ok) {
    throw new Error(`Failed to fetch ${url}: ${res.status} ${res.statusText}`);
  }
  return parseManifests(await res.text(), url);
}

// ============================================================================
// Artifact References
// ============================================================================

export interface ArtifactReference {
  /** `<registry>/<image>` */
  repository: string;
  tag: string;
}

export function formatReference(ref: ArtifactReference): string {
  return `${ref.repository}:${ref.tag}`;
}

/** Splits `repo[:tag][@digest]`; a port in the registry host is not a tag. */
export function parseImage(image: string): { repository: string; tag?: string } {
  const withoutDigest = image.split("@")[0];
  const lastSlash = withoutDigest.lastIndexOf("/");
  const lastColon = withoutDigest.lastIndexOf(":");
  if (lastColon > lastSlash) {
    return {
      repository: withoutDigest.slice(0, lastColon),
      tag: withoutDigest.slice(lastColon + 1),
    };
  }
  return { repository: withoutDigest };
}

export interface ImageRewrite {
  placeholder: string;
  target: ArtifactReference;
  tagPrefix: string;
}

/**
 * Point every container image at its pushed artifact. An image is rewritten
 * when it equals an artifact's placeholder, or when it already names the
 * artifact's repository with a tag carrying the artifact's prefix (a manifest
 * rendered for an earlier version). The longest matching prefix wins.
 */
export function rewriteImages(
  documents: ManifestObject[],
  rewrites: ImageRewrite[],
): ManifestObject[] {
  return documents.map((doc) => {
    const copy = structuredClone(doc);
    for (const container of containersOf(copy)) {
      const image = container.image;
      if (typeof image !== "string") {
        continue;
      }
      const rewrite = matchRewrite(image, rewrites);
      if (rewrite) {
        container.image = formatReference(rewrite.target);
      }
    }
    return copy;
  });
}

function matchRewrite(
  image: string,
  rewrites: ImageRewrite[],
): ImageRewrite | undefined {
  const exact = rewrites.find((r) => r.placeholder === image);
  if (exact) {
    return exact;
  }
  const { repository, tag } = parseImage(image);
  return rewrites
    .filter(
      (r) =>
        r.target.repository === repository &&
        tag !== undefined &&
        tag.startsWith(r.tagPrefix),
    )
    .sort((a, b) => b.tagPrefix.length - a.tagPrefix.length)[0];
}

/**
 * Throws {@link ArtifactMismatch} when a container still names a placeholder,
 * or names an artifact repository with a tag that was not pushed.
 */
export function assertArtifactsPushed(
  documents: ManifestObject[],
  rewrites: ImageRewrite[],
  unit: string,
): void {
  const placeholders = new Set(rewrites.map((r) => r.placeholder));
  const pushed = new Set(rewrites.map((r) => formatReference(r.target)));
  const repositories = new Set(rewrites.map((r) => r.target.repository));

  for (const doc of documents) {
    for (const container of containersOf(doc)) {
      const image = container.image;
      if (typeof image !== "string") {
        continue;
      }
      const name = `${doc.kind}/${doc.metadata?.name ?? "?"}`;
      if (placeholders.has(image) && !pushed.has(image)) {
        throw new ArtifactMismatch(
          `${name} in unit ${unit} still references placeholder image ${image}`,
        );
      }
      const { repository } = parseImage(image);
      if (repositories.has(repository) && !pushed.has(image)) {
        throw new ArtifactMismatch(
          `${name} in unit ${unit} references ${image}, which was not pushed in this run`,
          { remediation: "Check the image tags in the manifests, then re-run deploy" },
        );
      }
    }
  }
}

// ============================================================================
// Cluster Settings
// ============================================================================

export interface ClusterSettings {
  ingressClass?: string;
  certIssuer?: string;
  storageClass?: string;
  gpuNodeLabel?: string;
  /** Resource name that marks a container as requesting a GPU. */
  gpuResource: string;
}

/**
 * Targeted updates: ingress class and issuer annotation on Ingresses, the
 * storage class on StatefulSet claim templates that name none, and the GPU
 * node selector on workloads requesting GPUs.
 */
export function applyClusterSettings(
  documents: ManifestObject[],
  settings: ClusterSettings,
): ManifestObject[] {
  return documents.map((doc) => {
    const copy = structuredClone(doc);
    switch (copy.kind) {
      case "Ingress":
        updateIngress(copy, settings);
        break;
      case "StatefulSet":
        updateClaimTemplates(copy, settings.storageClass);
        break;
    }
    if (settings.gpuNodeLabel) {
      updateGpuSelector(copy, settings.gpuNodeLabel, settings.gpuResource);
    }
    return copy;
  });
}

function updateIngress(doc: ManifestObject, settings: ClusterSettings): void {
  if (settings.ingressClass) {
    const spec = ensureRecord(doc, "spec");
    spec.ingressClassName = settings.ingressClass;
  }
  if (settings.certIssuer) {
    const metadata = ensureRecord(doc, "metadata");
    const annotations = ensureRecord(metadata, "annotations");
    annotations[CLUSTER_ISSUER_ANNOTATION] = settings.certIssuer;
  }
}

function updateClaimTemplates(
  doc: ManifestObject,
  storageClass: string | undefined,
): void {
  if (!storageClass) {
    return;
  }
  const templates = path(doc, ["spec", "volumeClaimTemplates"]);
  if (!Array.isArray(templates)) {
    return;
  }
  for (const template of templates) {
    const spec = path(template, ["spec"]);
    if (isRecord(spec) && spec.storageClassName === undefined) {
      spec.storageClassName = storageClass;
    }
  }
}

function updateGpuSelector(
  doc: ManifestObject,
  label: string,
  gpuResource: string,
): void {
  const podSpec = podSpecOf(doc);
  if (!podSpec) {
    return;
  }
  const requestsGpu = containersOf(doc).some((container) => {
    const limits = path(container, ["resources", "limits"]);
    const requests = path(container, ["resources", "requests"]);
    return (
      (isRecord(limits) && limits[gpuResource] !== undefined) ||
      (isRecord(requests) && requests[gpuResource] !== undefined)
    );
  });
  if (!requestsGpu) {
    return;
  }
  const selector = ensureRecord(podSpec, "nodeSelector");
  if (selector[label] === undefined) {
    selector[label] = "true";
  }
}

// ============================================================================
// Document Walking
// ============================================================================

const POD_TEMPLATE_PATHS: Record<string, string[]> = {
  Deployment: ["spec", "template", "spec"],
  StatefulSet: ["spec", "template", "spec"],
  DaemonSet: ["spec", "template", "spec"],
  ReplicaSet: ["spec", "template", "spec"],
  Job: ["spec", "template", "spec"],
  CronJob: ["spec", "jobTemplate", "spec", "template", "spec"],
  Pod: ["spec"],
};

export function podSpecOf(doc: ManifestObject): JsonRecord | undefined {
  const specPath = doc.kind ? POD_TEMPLATE_PATHS[doc.kind] : undefined;
  if (!specPath) {
    return undefined;
  }
  const spec = path(doc, specPath);
  return isRecord(spec) ? spec : undefined;
}

export function containersOf(doc: ManifestObject): JsonRecord[] {
  const podSpec = podSpecOf(doc);
  if (!podSpec) {
    return [];
  }
  return [podSpec.initContainers, podSpec.containers]
    .flatMap((list) => (Array.isArray(list) ? list : []))
    .filter(isRecord);
}

/** Every container image in the documents, in document order. */
export function imagesOf(documents: ManifestObject[]): string[] {
  return documents
    .flatMap((doc) => containersOf(doc).map((c) => c.image))
    .filter((image): image is string => typeof image === "string");
}

function path(value: unknown, keys: string[]): unknown {
  let current = value;
  for (const key of keys) {
    if (!isRecord(current)) {
      return undefined;
    }
    current = current[key];
  }
  return current;
}

function ensureRecord(parent: JsonRecord, key: string): JsonRecord {
  const existing = parent[key];
  if (isRecord(existing)) {
    return existing;
  }
  const created: JsonRecord = {};
  parent[key] = created;
  return created;
}

function isRecord(value: unknown): value is JsonRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
