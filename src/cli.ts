#!/usr/bin/env node
/**
 * gitops-bootstrap command line
 *
 *   check                       probe, resolve and print the configuration
 *   provision [--only a,b]      install and configure Argo CD
 *   deploy --version v          build, push and apply the service
 *   history <app>               rollout history of an Argo CD application
 *   sync <app> [--revision r]   sync an application
 *   rollback <app> --id n       roll an application back to a history entry
 */

import { parseArgs } from "util";
import { LoggerService } from "@backstage/backend-plugin-api";
import { ArgoCdClient, GitOpsControllerApi } from "./ArgoCdClient";
import { closeOnSignals, withCleanup } from "./cleanup";
import { ClusterClient, KubernetesClusterClient } from "./ClusterClient";
import { BootstrapOptions, loadConfigFile, readBootstrapOptions } from "./config";
import {
  buildResolvedConfiguration,
  renderResolutionSummary,
  ResolvedConfiguration,
  resolveConfiguration,
} from "./configResolver";
import { ConfigStore, FileConfigStore } from "./configStore";
import { ContainerBuilder, DockerCli } from "./ContainerBuilder";
import { openControllerChannel } from "./controllerAccess";
import { DeployPipeline, DeployReport } from "./deployPipeline";
import { EnvironmentProber, ProbeResults } from "./environmentProber";
import {
  errorMessage,
  EXIT_SUCCESS,
  EXIT_UNEXPECTED,
  ExitCode,
  exitCodeFor,
  isBootstrapError,
  MissingRequiredConfig,
} from "./errors";
import { GitHubCli, SourceControlHost } from "./GitHubCli";
import {
  InputProvider,
  InquirerInputProvider,
  NonInteractiveInputProvider,
} from "./inputProvider";
import {
  createRootLogger,
  isLogLevel,
  LOG_LEVELS,
  LogLevel,
  SecretSink,
} from "./logger";
import { fetchManifests, ManifestObject, readManifestFile } from "./manifests";
import { renderReport, StepOrchestrator } from "./orchestrator";
import { createParameterCatalog, KEYS, ParameterDefinition } from "./parameters";
import { createProvisioningSteps, ProvisioningContext } from "./provisioningSteps";
import { Clock } from "./readiness";

export const USAGE = `Usage: gitops-bootstrap <command> [options]

Commands:
  check                        Probe the environment and resolve the configuration
  provision [--only a,b]       Install and configure Argo CD
  deploy --version <v>         Build, push and apply the service
         [--ingress] [--autoscaling]
  history <app>                Show the rollout history of an application
  sync <app> [--revision <r>]  Sync an application
  rollback <app> --id <n>      Roll an application back to a history entry

Options:
  --config <file>        Tool configuration (default: bootstrap.yaml)
  --store <file>         Configuration store (default: ~/.env.cicd)
  --context <name>       kubeconfig context
  --non-interactive      Fail instead of prompting
  --log-level <level>    ${LOG_LEVELS.join(" | ")} (default: info)
  --help                 Show this help
`;

export type Command =
  | "check"
  | "provision"
  | "deploy"
  | "history"
  | "sync"
  | "rollback";

const COMMANDS: readonly Command[] = [
  "check",
  "provision",
  "deploy",
  "history",
  "sync",
  "rollback",
];

export interface CliArgs {
  command: Command;
  application?: string;
  config?: string;
  store?: string;
  context?: string;
  interactive: boolean;
  logLevel: LogLevel;
  only?: string[];
  version?: string;
  ingress?: boolean;
  autoscaling?: boolean;
  revision?: string;
  historyId?: number;
}

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

// ============================================================================
// Argument Parsing
// ============================================================================

const OPTIONS = {
  help: { type: "boolean", default: false },
  config: { type: "string" },
  store: { type: "string" },
  context: { type: "string" },
  "non-interactive": { type: "boolean", default: false },
  "log-level": { type: "string" },
  only: { type: "string" },
  version: { type: "string" },
  ingress: { type: "boolean" },
  autoscaling: { type: "boolean" },
  revision: { type: "string" },
  id: { type: "string" },
} as const;

function parseOptions(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      options: OPTIONS,
      allowPositionals: true,
      strict: true,
    });
  } catch (error) {
    throw new UsageError(errorMessage(error));
  }
}

/** Returns undefined when help was requested. */
export function parseCliArgs(argv: string[]): CliArgs | undefined {
  const parsed = parseOptions(argv);
  const { values, positionals } = parsed;
  if (values.help) {
    return undefined;
  }

  const [commandName, application, ...rest] = positionals;
  const command = COMMANDS.find((c) => c === commandName);
  if (!command) {
    throw new UsageError(
      commandName ? `Unknown command "${commandName}"` : "Missing command",
    );
  }
  if (rest.length > 0) {
    throw new UsageError(`Unexpected arguments: ${rest.join(" ")}`);
  }

  const logLevel = values["log-level"] ?? "info";
  if (!isLogLevel(logLevel)) {
    throw new UsageError(`--log-level must be one of ${LOG_LEVELS.join(", ")}`);
  }

  const needsApplication =
    command === "history" || command === "sync" || command === "rollback";
  if (needsApplication && !application) {
    throw new UsageError(`${command} needs an application name`);
  }
  if (!needsApplication && application) {
    throw new UsageError(`Unexpected argument "${application}"`);
  }
  if (command === "deploy" && !values.version) {
    throw new UsageError("deploy needs --version");
  }

  let historyId: number | undefined;
  if (command === "rollback") {
    historyId = Number(values.id);
    if (!values.id || !Number.isInteger(historyId) || historyId < 0) {
      throw new UsageError("rollback needs --id <history id>");
    }
  }

  return {
    command,
    application,
    config: values.config,
    store: values.store,
    context: values.context,
    interactive: !values["non-interactive"],
    logLevel,
    only: values.only
      ?.split(",")
      .map((id) => id.trim())
      .filter(Boolean),
    version: values.version,
    ingress: values.ingress,
    autoscaling: values.autoscaling,
    revision: values.revision,
    historyId,
  };
}

// ============================================================================
// Runtime
// ============================================================================

export interface Runtime {
  logger: LoggerService;
  redact: SecretSink;
  options: BootstrapOptions;
  store: ConfigStore;
  cluster: ClusterClient;
  sourceControl: SourceControlHost;
  builder: ContainerBuilder;
  input: InputProvider;
  connect: (server: string) => GitOpsControllerApi;
  loadRemoteManifests: (url: string) => Promise<ManifestObject[]>;
  loadManifests: (file: string) => Promise<ManifestObject[]>;
  print: (line: string) => void;
  clock?: Clock;
}

export type RuntimeFactory = (args: CliArgs) => Runtime;

export const createRuntime: RuntimeFactory = (args) => {
  const { logger, redact } = createRootLogger(args.logLevel);
  const options = readBootstrapOptions(loadConfigFile(args.config));
  const storePath = args.store ?? options.storePath;

  return {
    logger,
    redact,
    options,
    store: new FileConfigStore(storePath),
    cluster: new KubernetesClusterClient({
      logger: logger.child({ component: "cluster" }),
      context: args.context ?? options.kubeContext,
    }),
    sourceControl: new GitHubCli({ logger: logger.child({ component: "gh" }) }),
    builder: new DockerCli({ logger: logger.child({ component: "docker" }) }),
    input: args.interactive
      ? new InquirerInputProvider()
      : new NonInteractiveInputProvider(),
    connect: (server) =>
      new ArgoCdClient({
        server,
        insecure: options.controller.insecure,
        logger: logger.child({ component: "argocd" }),
      }),
    loadRemoteManifests: (url) => fetchManifests(url),
    loadManifests: (file) => readManifestFile(file),
    print: (line) => process.stdout.write(`${line}\n`),
  };
};

// ============================================================================
// Commands
// ============================================================================

interface Resolution {
  catalog: ParameterDefinition[];
  probes: ProbeResults;
  values: Record<string, string>;
  config: ResolvedConfiguration;
}

async function resolve(runtime: Runtime): Promise<Resolution> {
  const { options } = runtime;
  const prober = new EnvironmentProber({
    cluster: runtime.cluster,
    sourceControl: runtime.sourceControl,
    logger: runtime.logger,
    controller: options.controller,
    gpuResource: options.deploy.gpuResource,
    timeoutMs: options.probeTimeoutMs,
  });
  const probes = await prober.probeAll();

  const catalog = createParameterCatalog({
    appName: options.deploy.appName,
    localRegistry: options.deploy.localRegistry,
  });
  const values = await resolveConfiguration({
    catalog,
    store: runtime.store,
    probes,
    input: runtime.input,
    logger: runtime.logger,
    onSecret: runtime.redact,
  });
  const config = buildResolvedConfiguration(values, probes, {
    controllerNamespace: options.controller.namespace,
    appRepository: options.sourceControl.appRepository,
    manifestsRepository: options.sourceControl.manifestsRepository,
    localRegistry: options.deploy.localRegistry,
    settings: options.deploy.settings,
  });
  return { catalog, probes, values, config };
}

async function check(runtime: Runtime): Promise<void> {
  const { catalog, probes, values } = await resolve(runtime);
  runtime.print("Configuration:");
  for (const line of renderResolutionSummary(catalog, values)) {
    runtime.print(`  ${line}`);
  }
  if (probes.warnings.length > 0) {
    runtime.print("Warnings:");
    for (const warning of probes.warnings) {
      runtime.print(`  - ${warning}`);
    }
  }
}

async function provision(runtime: Runtime, args: CliArgs): Promise<void> {
  const { config, probes } = await resolve(runtime);
  const { options } = runtime;
  const orchestrator = new StepOrchestrator(
    createProvisioningSteps(options.controller.readiness),
    { logger: runtime.logger, clock: runtime.clock },
  );

  const report = await withCleanup(runtime.logger, async (scope) => {
    const release = closeOnSignals(scope, runtime.logger);
    try {
      const context: ProvisioningContext = {
        config,
        controller: options.controller,
        sourceControlOptions: options.sourceControl,
        cluster: runtime.cluster,
        sourceControl: probes.sourceControl.authenticated
          ? runtime.sourceControl
          : undefined,
        store: runtime.store,
        scope,
        logger: runtime.logger.child({ component: "provision" }),
        redact: runtime.redact,
        connect: runtime.connect,
        loadRemoteManifests: runtime.loadRemoteManifests,
        loadManifests: runtime.loadManifests,
        state: { followUps: [] },
      };
      const result = await orchestrator.run(context, { only: args.only });
      return { ...result, followUps: context.state.followUps };
    } finally {
      release();
    }
  });

  runtime.print("Provisioning:");
  for (const line of renderReport(report)) {
    runtime.print(`  ${line}`);
  }
  if (report.followUps.length > 0) {
    runtime.print("Manual follow-up required:");
    for (const command of report.followUps) {
      runtime.print(`  ${command}`);
    }
  }
  if (report.error) {
    throw report.error;
  }
}

async function deploy(runtime: Runtime, args: CliArgs): Promise<void> {
  const version = args.version;
  if (!version) {
    throw new UsageError("deploy needs --version");
  }
  const { config } = await resolve(runtime);
  const pipeline = new DeployPipeline({
    cluster: runtime.cluster,
    builder: runtime.builder,
    input: runtime.input,
    logger: runtime.logger,
    deploy: runtime.options.deploy,
    clock: runtime.clock,
  });

  const report = await pipeline.run({
    version,
    config,
    ingress: args.ingress,
    autoscaling: args.autoscaling,
  });
  printDeployReport(runtime, report);
  if (report.error) {
    throw report.error;
  }
}

function printDeployReport(runtime: Runtime, report: DeployReport): void {
  runtime.print("Artifacts:");
  for (const artifact of report.artifacts) {
    runtime.print(
      `  ${artifact.repository}:${artifact.tag}${report.pushed ? "" : " (not pushed)"}`,
    );
  }
  runtime.print("Units:");
  for (const unit of report.units) {
    const reason = unit.reason ? ` (${unit.reason})` : "";
    runtime.print(`  ${unit.name.padEnd(16)} ${unit.state}${reason}`);
  }
  if (report.verification.length > 0) {
    runtime.print("Verification:");
    for (const result of report.verification) {
      const detail = result.failure ? `: ${result.failure.message}` : "";
      runtime.print(`  ${result.check.padEnd(16)} ${result.passed ? "passed" : "FAILED"}${detail}`);
    }
  }
}

async function controllerCommand(runtime: Runtime, args: CliArgs): Promise<void> {
  const application = args.application;
  if (!application) {
    throw new UsageError(`${args.command} needs an application name`);
  }

  const server = await runtime.store.get(KEYS.controllerServer);
  const token = await runtime.store.get(KEYS.controllerToken);
  const missing = [
    ...(server ? [] : [KEYS.controllerServer]),
    ...(token ? [] : [KEYS.controllerToken]),
  ];
  if (!server || !token) {
    throw new MissingRequiredConfig(missing, {
      remediation: "Run `gitops-bootstrap provision` to generate and store a token",
    });
  }
  runtime.redact(token);

  await withCleanup(runtime.logger, async (scope) => {
    const release = closeOnSignals(scope, runtime.logger);
    try {
      const address = await openControllerChannel(server, {
        cluster: runtime.cluster,
        scope,
        logger: runtime.logger,
        namespace: runtime.options.controller.namespace,
        serverSelector: runtime.options.controller.serverSelector,
      });
      const api = runtime.connect(address).withToken(token);

      switch (args.command) {
        case "history": {
          const entries = await api.getApplicationHistory(application);
          if (entries.length === 0) {
            runtime.print(`No history for ${application}`);
          }
          for (const entry of entries) {
            runtime.print(
              `${String(entry.id).padStart(4)}  ${entry.revision}  ${entry.deployedAt ?? "-"}  ${entry.initiatedBy ?? ""}`.trimEnd(),
            );
          }
          break;
        }
        case "sync":
          await api.syncApplication(application, args.revision);
          runtime.print(
            `Sync of ${application} started${args.revision ? ` at ${args.revision}` : ""}`,
          );
          break;
        case "rollback": {
          const id = args.historyId ?? 0;
          await api.rollbackApplication(application, id);
          runtime.print(`Rollback of ${application} to history entry ${id} started`);
          break;
        }
        default:
          throw new UsageError(`Unexpected command ${args.command}`);
      }
    } finally {
      release();
    }
  });
}

// ============================================================================
// Entry Point
// ============================================================================

export async function runCli(
  argv: string[],
  factory: RuntimeFactory = createRuntime,
  printError: (line: string) => void = (line) => process.stderr.write(`${line}\n`),
  printUsage: (text: string) => void = (text) => process.stdout.write(text),
): Promise<ExitCode> {
  let args: CliArgs | undefined;
  try {
    args = parseCliArgs(argv);
  } catch (error) {
    printError(errorMessage(error));
    printError(USAGE);
    return EXIT_UNEXPECTED;
  }
  if (!args) {
    printUsage(USAGE);
    return EXIT_SUCCESS;
  }

  let runtime: Runtime;
  try {
    runtime = factory(args);
  } catch (error) {
    printError(`Cannot start: ${errorMessage(error)}`);
    return EXIT_UNEXPECTED;
  }

  try {
    switch (args.command) {
      case "check":
        await check(runtime);
        break;
      case "provision":
        await provision(runtime, args);
        break;
      case "deploy":
        await deploy(runtime, args);
        break;
      default:
        await controllerCommand(runtime, args);
    }
    return EXIT_SUCCESS;
  } catch (error) {
    runtime.logger.error(errorMessage(error));
    if (isBootstrapError(error) && error.remediation) {
      printError(`Remediation: ${error.remediation}`);
    }
    return exitCodeFor(error);
  }
}

if (require.main === module) {
  runCli(process.argv.slice(2)).then(
    (code) => {
      process.exitCode = code;
    },
    (error: unknown) => {
      process.stderr.write(`${errorMessage(error)}\n`);
      process.exitCode = EXIT_UNEXPECTED;
    },
  );
}
