/**
 * Configuration Resolver
 *
 * Deciding where each value comes from ({@link planParameter}) is pure;
 * obtaining it from the operator goes through an {@link InputProvider}.
 */

import { LoggerService } from "@backstage/backend-plugin-api";
import { ConfigStore } from "./configStore";
import { MissingRequiredConfig } from "./errors";
import type { ProbeResults } from "./environmentProber";
import { InputProvider } from "./inputProvider";
import { SecretSink } from "./logger";
import {
  isRequired,
  KEYS,
  ParameterDefinition,
  ResolvedValues,
} from "./parameters";

export type ValueSource =
  | "store"
  | "probe"
  | "derived"
  | "fallback"
  | "generated"
  | "none";

export interface PlannedValue {
  parameter: ParameterDefinition;
  source: ValueSource;
  value?: string;
}

// ============================================================================
// Planning
// ============================================================================

export function planParameter(
  parameter: ParameterDefinition,
  storeValue: string | undefined,
  probes: ProbeResults,
  values: ResolvedValues,
): PlannedValue {
  if (storeValue) {
    return { parameter, source: "store", value: storeValue };
  }
  if (parameter.produced) {
    return { parameter, source: "none" };
  }

  const probed = parameter.probe?.(probes);
  if (probed) {
    return { parameter, source: "probe", value: probed };
  }
  const derived = parameter.derive?.(values);
  if (derived) {
    return { parameter, source: "derived", value: derived };
  }
  if (parameter.fallback) {
    return { parameter, source: "fallback", value: parameter.fallback };
  }
  if (parameter.generate) {
    return { parameter, source: "generated", value: parameter.generate() };
  }
  return { parameter, source: "none" };
}

/**
 * Plan every relevant parameter in catalog order, assuming each suggestion is
 * accepted. Parameters whose `when` does not hold are left out.
 */
export function planResolution(
  catalog: ParameterDefinition[],
  storeValues: Readonly<Record<string, string>>,
  probes: ProbeResults,
): PlannedValue[] {
  const values: Record<string, string | undefined> = {};
  const plan: PlannedValue[] = [];

  for (const parameter of catalog) {
    if (parameter.when && !parameter.when(probes)) {
      continue;
    }
    const entry = planParameter(
      parameter,
      storeValues[parameter.key],
      probes,
      values,
    );
    values[parameter.key] = entry.value;
    plan.push(entry);
  }
  return plan;
}

// ============================================================================
// Resolution
// ============================================================================

export interface ResolveOptions {
  catalog: ParameterDefinition[];
  store: ConfigStore;
  probes: ProbeResults;
  input: InputProvider;
  logger: LoggerService;
  /** Receives every secret value before it can reach a log line. */
  onSecret?: SecretSink;
}

/**
 * Resolve every parameter and write each value back to the store as soon as
 * it is known. Throws {@link MissingRequiredConfig} listing every required
 * key left without a value.
 */
export async function resolveConfiguration(
  options: ResolveOptions,
): Promise<Record<string, string>> {
  const { catalog, store, probes, input } = options;
  const logger = options.logger.child({ component: "resolver" });
  const onSecret = options.onSecret ?? (() => undefined);

  const stored = await store.all();
  for (const parameter of catalog) {
    const value = stored[parameter.key];
    if (parameter.secret && value) {
      onSecret(value);
    }
  }

  const values: Record<string, string | undefined> = {};
  const missing: string[] = [];

  for (const parameter of catalog) {
    const storeValue = stored[parameter.key];

    if (parameter.when && !parameter.when(probes)) {
      values[parameter.key] = storeValue;
      continue;
    }
    if (parameter.produced) {
      values[parameter.key] = storeValue;
      if (!storeValue) {
        logger.warn(
          `${parameter.key} is not set yet; it is written by \`gitops-bootstrap provision\``,
        );
      }
      continue;
    }

    const planned = planParameter(parameter, storeValue, probes, values);
    const value = await obtain(planned, input);
    if (value && parameter.secret) {
      onSecret(value);
    }
    if (value && value !== storeValue) {
      await store.set(parameter.key, value);
      logger.debug(`Stored ${parameter.key} (${planned.source})`);
    }

    values[parameter.key] = value;
    if (!value && isRequired(parameter, values)) {
      missing.push(parameter.key);
    }
  }

  if (missing.length > 0) {
    throw new MissingRequiredConfig(missing);
  }

  return Object.fromEntries(
    Object.entries(values).filter(
      (entry): entry is [string, string] => entry[1] !== undefined,
    ),
  );
}

async function obtain(
  planned: PlannedValue,
  input: InputProvider,
): Promise<string | undefined> {
  const { parameter, source, value } = planned;
  const secret = parameter.secret === true;

  switch (source) {
    case "store": {
      const shown = secret ? "" : ` (${value})`;
      const keep = await input.confirm(
        `${parameter.label} is already set${shown}. Keep it?`,
        true,
      );
      if (keep) {
        return value;
      }
      const override = await input.ask({ message: parameter.label, secret });
      return override || value;
    }
    case "generated":
      return value;
    case "probe":
    case "derived":
    case "fallback":
      return input.ask({ message: parameter.label, default: value, secret });
    case "none":
      return input.ask({ message: parameter.label, secret });
  }
}

// ============================================================================
// Summary
// ============================================================================

/**
 * One line per parameter. Secrets render as `SET`, absent values as
 * `NOT SET`.
 */
export function renderResolutionSummary(
  catalog: ParameterDefinition[],
  values: ResolvedValues,
): string[] {
  const width = Math.max(...catalog.map((p) => p.key.length));
  return catalog.map((parameter) => {
    const value = values[parameter.key];
    let shown: string;
    if (!value) {
      shown = "NOT SET";
    } else if (parameter.secret) {
      shown = "SET";
    } else {
      shown = value;
    }
    return `${parameter.key.padEnd(width)}  ${shown}`;
  });
}

// ============================================================================
// Resolved Configuration
// ============================================================================

export interface ResolvedConfiguration {
  readonly cluster: {
    readonly context?: string;
    readonly gpuNodes: readonly string[];
    readonly gpuNodeLabel?: string;
    readonly storageClass?: string;
    readonly ingressClass: string;
  };
  readonly controller: {
    readonly namespace: string;
    readonly server: string;
    readonly token?: string;
  };
  readonly sourceControl: {
    readonly owner: string;
    readonly token: string;
    /** `owner/name` of the application repository. */
    readonly appRepository: string;
    readonly manifestsRepository: string;
    readonly manifestsRepositoryUrl: string;
  };
  readonly registry: {
    readonly url: string;
    readonly user?: string;
    readonly password?: string;
    /** Pushes are skipped for a local registry. */
    readonly local: boolean;
  };
  readonly application: {
    readonly namespace: string;
    readonly domain: string;
    readonly ingressDomain: string;
    readonly certIssuer?: string;
    readonly redisPassword: string;
    readonly settings: Readonly<Record<string, string>>;
  };
  readonly values: Readonly<Record<string, string>>;
}

export interface ResolvedConfigurationOptions {
  controllerNamespace: string;
  appRepository: string;
  manifestsRepository: string;
  localRegistry: string;
  settings: Record<string, string>;
}

/**
 * Build the immutable snapshot a run works from. Throws
 * {@link MissingRequiredConfig} when a key the workflow cannot run without is
 * absent.
 */
export function buildResolvedConfiguration(
  values: Readonly<Record<string, string>>,
  probes: ProbeResults,
  options: ResolvedConfigurationOptions,
): ResolvedConfiguration {
  const missing: string[] = [];
  const need = (key: string): string => {
    const value = values[key];
    if (!value) {
      missing.push(key);
      return "";
    }
    return value;
  };

  const owner = need(KEYS.githubUsername);
  const registryUrl = need(KEYS.registry);
  const local =
    registryUrl === "local" || registryUrl === options.localRegistry;
  const domain = need(KEYS.appDomain);

  const configuration: ResolvedConfiguration = {
    cluster: {
      context: probes.context,
      gpuNodes: [...probes.gpu.nodes],
      gpuNodeLabel: probes.gpu.nodes.length > 0 ? values[KEYS.gpuNodeLabel] : undefined,
      storageClass: values[KEYS.storageClass],
      ingressClass: need(KEYS.ingressClass),
    },
    controller: {
      namespace: options.controllerNamespace,
      server: need(KEYS.controllerServer),
      token: values[KEYS.controllerToken],
    },
    sourceControl: {
      owner,
      token: need(KEYS.githubToken),
      appRepository: `${owner}/${options.appRepository}`,
      manifestsRepository: `${owner}/${options.manifestsRepository}`,
      manifestsRepositoryUrl: `https://github.com/${owner}/${options.manifestsRepository}`,
    },
    registry: {
      url: registryUrl,
      user: values[KEYS.registryUser],
      password: values[KEYS.registryPassword],
      local,
    },
    application: {
      namespace: need(KEYS.appNamespace),
      domain,
      ingressDomain: values[KEYS.ingressDomain] ?? domain,
      certIssuer:
        probes.certificateIssuers.length > 0 ? values[KEYS.certIssuer] : undefined,
      redisPassword: need(KEYS.redisPassword),
      settings: { ...options.settings },
    },
    values: { ...values },
  };

  if (missing.length > 0) {
    throw new MissingRequiredConfig(missing);
  }
  return deepFreeze(configuration);
}

function deepFreeze<T>(value: T): T {
  if (typeof value === "object" && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
  }
  return value;
}
