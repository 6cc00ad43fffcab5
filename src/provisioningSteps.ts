/**
 * The Argo CD bootstrap steps.
 *
 * Steps are stateless definitions; what one step learns (the bootstrap
 * credential, the authenticated API, the new token) is kept in the run's
 * {@link ProvisioningState}.
 */

import { LoggerService } from "@backstage/backend-plugin-api";
import { GitOpsControllerApi } from "./ArgoCdClient";
import { CleanupScope } from "./cleanup";
import { ClusterClient } from "./ClusterClient";
import {
  ControllerOptions,
  ReadinessOptions,
  SourceControlOptions,
} from "./config";
import type { ResolvedConfiguration } from "./configResolver";
import { ConfigStore } from "./configStore";
import { isLocalServer, openControllerChannel } from "./controllerAccess";
import { CredentialUnavailable, StepFailed } from "./errors";
import { SourceControlHost } from "./GitHubCli";
import { SecretSink } from "./logger";
import { ManifestObject } from "./manifests";
import { ProvisioningStep } from "./orchestrator";
import { KEYS } from "./parameters";

export const STEP_IDS = {
  installController: "install-controller",
  retrieveCredential: "retrieve-credential",
  authenticate: "authenticate",
  applyProject: "apply-project",
  registerRepository: "register-repository",
  createApplications: "create-applications",
  generateToken: "generate-token",
  ensureRepositories: "ensure-repositories",
  propagateSecrets: "propagate-secrets",
} as const;

export interface ProvisioningState {
  credential?: string;
  api?: GitOpsControllerApi;
  token?: string;
  /** Commands the operator must run because they could not be automated. */
  followUps: string[];
}

export interface ProvisioningContext {
  config: ResolvedConfiguration;
  controller: ControllerOptions;
  sourceControlOptions: SourceControlOptions;
  cluster: ClusterClient;
  /** Absent when the GitHub CLI is missing or unauthenticated. */
  sourceControl?: SourceControlHost;
  store: ConfigStore;
  scope: CleanupScope;
  logger: LoggerService;
  redact: SecretSink;
  connect: (server: string) => GitOpsControllerApi;
  loadRemoteManifests: (url: string) => Promise<ManifestObject[]>;
  loadManifests: (file: string) => Promise<ManifestObject[]>;
  state: ProvisioningState;
}

export function createProvisioningSteps(
  readiness: ReadinessOptions,
): ProvisioningStep<ProvisioningContext>[] {
  return [
    installController(readiness),
    retrieveCredential,
    authenticate,
    applyProject,
    registerRepository,
    createApplications,
    generateToken,
    ensureRepositories,
    propagateSecrets,
  ];
}

// ============================================================================
// Controller Installation
// ============================================================================

async function controllerReady(ctx: ProvisioningContext): Promise<boolean> {
  const status = await ctx.cluster.getDeploymentStatus(
    ctx.controller.namespace,
    ctx.controller.deploymentName,
  );
  return status.ready;
}

function installController(
  readiness: ReadinessOptions,
): ProvisioningStep<ProvisioningContext> {
  return {
    id: STEP_IDS.installController,
    title: "Install Argo CD",
    isSatisfied: controllerReady,
    action: async (ctx) => {
      const { namespace, deploymentName, installManifestUrl } = ctx.controller;
      const status = await ctx.cluster.getDeploymentStatus(
        namespace,
        deploymentName,
      );
      if (status.exists) {
        ctx.logger.info(
          `${deploymentName} exists; waiting for it to become available`,
        );
        return;
      }

      await ctx.cluster.ensureNamespace(namespace);
      const objects = await ctx.loadRemoteManifests(installManifestUrl);
      ctx.logger.info(
        `Applying ${objects.length} objects from ${installManifestUrl}`,
      );
      await ctx.cluster.apply(objects, namespace);
    },
    postcondition: {
      description: "the Argo CD server deployment to become available",
      check: controllerReady,
      timeoutMs: readiness.timeoutMs,
      intervalMs: readiness.intervalMs,
    },
  };
}

// ============================================================================
// Authentication
// ============================================================================

const retrieveCredential: ProvisioningStep<ProvisioningContext> = {
  id: STEP_IDS.retrieveCredential,
  title: "Read the Argo CD bootstrap credential",
  dependsOn: [STEP_IDS.installController],
  action: async (ctx) => {
    const { namespace, initialSecretName, initialSecretKey } = ctx.controller;
    const credential = await ctx.cluster.readSecretValue(
      namespace,
      initialSecretName,
      initialSecretKey,
    );
    if (!credential) {
      throw new CredentialUnavailable(
        `Argo CD is ready but secret ${namespace}/${initialSecretName} has no "${initialSecretKey}"`,
        {
          remediation: `The secret is removed once the admin password changes; recreate it with \`kubectl -n ${namespace} create secret generic ${initialSecretName} --from-literal=${initialSecretKey}=<admin password>\`, then re-run provision`,
        },
      );
    }
    ctx.redact(credential);
    ctx.state.credential = credential;
  },
};

const authenticate: ProvisioningStep<ProvisioningContext> = {
  id: STEP_IDS.authenticate,
  title: "Authenticate to Argo CD",
  dependsOn: [STEP_IDS.retrieveCredential],
  action: async (ctx) => {
    const credential = ctx.state.credential;
    if (!credential) {
      throw new StepFailed(STEP_IDS.authenticate, "No bootstrap credential");
    }

    const address = await openControllerChannel(ctx.config.controller.server, {
      cluster: ctx.cluster,
      scope: ctx.scope,
      logger: ctx.logger,
      namespace: ctx.controller.namespace,
      serverSelector: ctx.controller.serverSelector,
    });
    const client = ctx.connect(address);
    const token = await client.createSession(
      ctx.controller.adminUsername,
      credential,
    );
    ctx.redact(token);
    ctx.state.api = client.withToken(token);
    ctx.logger.info(`Authenticated to Argo CD as ${ctx.controller.adminUsername}`);
  },
};

function authenticatedApi(
  ctx: ProvisioningContext,
  stepId: string,
): GitOpsControllerApi {
  if (!ctx.state.api) {
    throw new StepFailed(stepId, "Not authenticated to Argo CD");
  }
  return ctx.state.api;
}

// ============================================================================
// Project, Repository & Applications
// ============================================================================

async function applyManifestFiles(
  ctx: ProvisioningContext,
  files: string[],
): Promise<void> {
  for (const file of files) {
    const objects = await ctx.loadManifests(file);
    const applied = await ctx.cluster.apply(objects, ctx.controller.namespace);
    for (const object of applied) {
      ctx.logger.info(`${object.kind}/${object.name} ${object.action}`);
    }
  }
}

const applyProject: ProvisioningStep<ProvisioningContext> = {
  id: STEP_IDS.applyProject,
  title: "Apply the Argo CD project",
  dependsOn: [STEP_IDS.installController],
  enabled: (ctx) => ctx.controller.projectManifests.length > 0,
  action: (ctx) => applyManifestFiles(ctx, ctx.controller.projectManifests),
};

export function sameRepository(a: string, b: string): boolean {
  const normalize = (url: string) =>
    url.trim().toLowerCase().replace(/\/+$/, "").replace(/\.git$/, "");
  return normalize(a) === normalize(b);
}

const registerRepository: ProvisioningStep<ProvisioningContext> = {
  id: STEP_IDS.registerRepository,
  title: "Register the manifests repository",
  dependsOn: [STEP_IDS.authenticate],
  isSatisfied: async (ctx) => {
    const api = authenticatedApi(ctx, STEP_IDS.registerRepository);
    const url = ctx.config.sourceControl.manifestsRepositoryUrl;
    const registered = await api.listRepositories();
    return registered.some((repo) => sameRepository(repo, url));
  },
  action: async (ctx) => {
    const api = authenticatedApi(ctx, STEP_IDS.registerRepository);
    const { manifestsRepositoryUrl, owner, token } = ctx.config.sourceControl;
    await api.registerRepository({
      url: manifestsRepositoryUrl,
      username: owner,
      password: token,
    });
    ctx.logger.info(`Registered ${manifestsRepositoryUrl}`);
  },
};

const createApplications: ProvisioningStep<ProvisioningContext> = {
  id: STEP_IDS.createApplications,
  title: "Create the Argo CD applications",
  dependsOn: [STEP_IDS.applyProject, STEP_IDS.registerRepository],
  enabled: (ctx) => ctx.controller.applicationManifests.length > 0,
  action: (ctx) => applyManifestFiles(ctx, ctx.controller.applicationManifests),
};

// ============================================================================
// Token & Secrets
// ============================================================================

const generateToken: ProvisioningStep<ProvisioningContext> = {
  id: STEP_IDS.generateToken,
  title: "Generate an Argo CD API token",
  dependsOn: [STEP_IDS.authenticate],
  action: async (ctx) => {
    const api = authenticatedApi(ctx, STEP_IDS.generateToken);
    const token = await api.generateToken(ctx.controller.tokenAccount);
    ctx.redact(token);
    await ctx.store.set(KEYS.controllerToken, token);
    ctx.state.token = token;
    ctx.logger.info(
      `Stored a new API token for ${ctx.controller.tokenAccount} as ${KEYS.controllerToken}; earlier tokens stay valid until revoked`,
    );
  },
};

const ensureRepositories: ProvisioningStep<ProvisioningContext> = {
  id: STEP_IDS.ensureRepositories,
  title: "Create the GitHub repositories",
  enabled: (ctx) => ctx.sourceControl !== undefined,
  isSatisfied: async (ctx) => {
    const host = sourceControlHost(ctx, STEP_IDS.ensureRepositories);
    const { appRepository, manifestsRepository } = ctx.config.sourceControl;
    return (
      (await host.repositoryExists(appRepository)) &&
      (await host.repositoryExists(manifestsRepository))
    );
  },
  action: async (ctx) => {
    const host = sourceControlHost(ctx, STEP_IDS.ensureRepositories);
    const { appRepository, manifestsRepository } = ctx.config.sourceControl;
    const { visibility } = ctx.sourceControlOptions;

    if (!(await host.repositoryExists(appRepository))) {
      await host.createRepository(appRepository, { visibility });
    }
    if (!(await host.repositoryExists(manifestsRepository))) {
      await host.createRepository(manifestsRepository, {
        visibility,
        description: "Kubernetes manifests for GitOps",
      });
    }
  },
};

function sourceControlHost(
  ctx: ProvisioningContext,
  stepId: string,
): SourceControlHost {
  if (!ctx.sourceControl) {
    throw new StepFailed(stepId, "The GitHub CLI is not available");
  }
  return ctx.sourceControl;
}

const propagateSecrets: ProvisioningStep<ProvisioningContext> = {
  id: STEP_IDS.propagateSecrets,
  title: "Propagate the token to the repository secrets",
  dependsOn: [STEP_IDS.generateToken],
  action: async (ctx) => {
    const token = ctx.state.token;
    if (!token) {
      throw new StepFailed(STEP_IDS.propagateSecrets, "No token was generated in this run");
    }

    const repository = ctx.config.sourceControl.appRepository;
    const names = ctx.sourceControlOptions.secretNames;
    const secrets: [string, string][] = [
      [names.token, token],
      [names.server, ctx.config.controller.server],
      [names.repositoryToken, ctx.config.sourceControl.token],
    ];

    if (isLocalServer(ctx.config.controller.server)) {
      ctx.logger.warn(
        `${KEYS.controllerServer} is ${ctx.config.controller.server}; CI runners cannot reach a local server`,
      );
    }

    if (!ctx.sourceControl) {
      for (const [name] of secrets) {
        ctx.state.followUps.push(`gh secret set ${name} --repo ${repository}`);
      }
      ctx.logger.warn(
        `GitHub CLI unavailable; set ${secrets.map(([name]) => name).join(", ")} on ${repository} manually (values are in the configuration store)`,
      );
      return;
    }

    for (const [name, value] of secrets) {
      await ctx.sourceControl.setSecret(repository, name, value);
    }
  },
};
