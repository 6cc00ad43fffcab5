/**
 * Provisioning Orchestrator
 *
 * Runs a DAG of idempotent steps one at a time. Each step moves through
 * `NotStarted -> Running -> Satisfied | Failed`; the first failure stops the
 * run and the report says what was and was not done.
 */

import { LoggerService } from "@backstage/backend-plugin-api";
import {
  ApplyOrderViolation,
  errorMessage,
  isBootstrapError,
  StepFailed,
} from "./errors";
import { Clock, systemClock, waitFor } from "./readiness";

export type StepState = "NotStarted" | "Running" | "Satisfied" | "Failed";

const TRANSITIONS: Record<StepState, readonly StepState[]> = {
  NotStarted: ["Running"],
  Running: ["Satisfied", "Failed"],
  Satisfied: [],
  Failed: [],
};

export interface Postcondition<C> {
  description: string;
  check: (context: C) => Promise<boolean>;
  timeoutMs: number;
  intervalMs: number;
}

export interface ProvisioningStep<C> {
  id: string;
  title: string;
  dependsOn?: string[];
  /** A disabled step is reported as skipped and satisfies its dependants. */
  enabled?: (context: C) => boolean;
  /** True when the step's effect already holds; the action is skipped. */
  isSatisfied?: (context: C) => Promise<boolean>;
  action: (context: C) => Promise<void>;
  postcondition?: Postcondition<C>;
}

export interface StepOutcome {
  id: string;
  title: string;
  state: StepState;
  skipped: boolean;
  reason?: string;
  error?: Error;
  durationMs?: number;
}

export interface OrchestrationReport {
  outcomes: StepOutcome[];
  /** The error that stopped the run. */
  error?: Error;
}

export interface RunOptions {
  /** Run only these steps and whatever they depend on. */
  only?: string[];
}

export interface StepOrchestratorOptions {
  logger: LoggerService;
  clock?: Clock;
}

export class StepOrchestrator<C> {
  private readonly steps: Map<string, ProvisioningStep<C>>;
  private readonly order: ProvisioningStep<C>[];
  private readonly logger: LoggerService;
  private readonly clock: Clock;

  constructor(
    steps: ProvisioningStep<C>[],
    options: StepOrchestratorOptions,
  ) {
    this.steps = new Map();
    for (const step of steps) {
      if (this.steps.has(step.id)) {
        throw new Error(`Duplicate step id "${step.id}"`);
      }
      this.steps.set(step.id, step);
    }
    this.order = topologicalOrder(steps);
    this.logger = options.logger.child({ component: "orchestrator" });
    this.clock = options.clock ?? systemClock;
  }

  /** Step ids in execution order. */
  get executionOrder(): string[] {
    return this.order.map((step) => step.id);
  }

  async run(context: C, options: RunOptions = {}): Promise<OrchestrationReport> {
    const selected = options.only
      ? this.dependencyClosure(options.only)
      : new Set(this.steps.keys());

    const outcomes = new Map<string, StepOutcome>();
    for (const step of this.order) {
      if (selected.has(step.id)) {
        outcomes.set(step.id, {
          id: step.id,
          title: step.title,
          state: "NotStarted",
          skipped: false,
        });
      }
    }

    let error: Error | undefined;
    for (const step of this.order) {
      const outcome = outcomes.get(step.id);
      if (!outcome) {
        continue;
      }
      try {
        this.assertDependenciesSatisfied(step, outcomes);
      } catch (violation) {
        error = toError(violation);
        break;
      }

      error = await this.runStep(step, outcome, context);
      if (error) {
        break;
      }
    }

    return { outcomes: [...outcomes.values()], error };
  }

  private async runStep(
    step: ProvisioningStep<C>,
    outcome: StepOutcome,
    context: C,
  ): Promise<Error | undefined> {
    const started = this.clock.now();
    transition(outcome, "Running");
    this.logger.info(`${step.title}`, { step: step.id });

    try {
      if (step.enabled && !step.enabled(context)) {
        outcome.skipped = true;
        outcome.reason = "disabled";
      } else if (step.isSatisfied && (await step.isSatisfied(context))) {
        outcome.skipped = true;
        outcome.reason = "already satisfied";
      } else {
        await step.action(context);
        if (step.postcondition) {
          const { check, ...wait } = step.postcondition;
          await waitFor(() => check(context), { ...wait, clock: this.clock });
        }
      }
      transition(outcome, "Satisfied");
      outcome.durationMs = this.clock.now() - started;
      if (outcome.skipped) {
        this.logger.info(`Skipped ${step.id}: ${outcome.reason}`, {
          step: step.id,
        });
      }
      return undefined;
    } catch (cause) {
      const error = isBootstrapError(cause)
        ? cause
        : new StepFailed(step.id, errorMessage(cause), {
            cause,
            remediation: `Fix the cause, then re-run with \`--only ${step.id}\`; satisfied steps are skipped`,
          });
      transition(outcome, "Failed");
      outcome.error = error;
      outcome.durationMs = this.clock.now() - started;
      this.logger.error(`Step ${step.id} failed: ${error.message}`, {
        step: step.id,
      });
      return error;
    }
  }

  private assertDependenciesSatisfied(
    step: ProvisioningStep<C>,
    outcomes: Map<string, StepOutcome>,
  ): void {
    for (const dependency of step.dependsOn ?? []) {
      const state = outcomes.get(dependency)?.state;
      if (state !== "Satisfied") {
        throw new ApplyOrderViolation(
          `Step "${step.id}" was about to start while "${dependency}" is ${state ?? "not scheduled"}`,
        );
      }
    }
  }

  private dependencyClosure(ids: string[]): Set<string> {
    const closure = new Set<string>();
    const visit = (id: string) => {
      if (closure.has(id)) {
        return;
      }
      const step = this.steps.get(id);
      if (!step) {
        throw new Error(
          `Unknown step "${id}"; known steps: ${[...this.steps.keys()].join(", ")}`,
        );
      }
      closure.add(id);
      for (const dependency of step.dependsOn ?? []) {
        visit(dependency);
      }
    };
    ids.forEach(visit);
    return closure;
  }
}

// ============================================================================
// Ordering
// ============================================================================

/**
 * Repeatedly takes the first declared step whose dependencies are placed.
 * Throws on unknown dependencies and cycles.
 */
export function topologicalOrder<S extends { id: string; dependsOn?: string[] }>(
  steps: S[],
): S[] {
  const ids = new Set(steps.map((step) => step.id));
  for (const step of steps) {
    for (const dependency of step.dependsOn ?? []) {
      if (!ids.has(dependency)) {
        throw new Error(
          `Step "${step.id}" depends on unknown step "${dependency}"`,
        );
      }
    }
  }

  const placed = new Set<string>();
  const ordered: S[] = [];
  while (ordered.length < steps.length) {
    const next = steps.find(
      (step) =>
        !placed.has(step.id) &&
        (step.dependsOn ?? []).every((dependency) => placed.has(dependency)),
    );
    if (!next) {
      const remaining = steps
        .filter((step) => !placed.has(step.id))
        .map((step) => step.id);
      throw new Error(`Step dependency cycle among: ${remaining.join(", ")}`);
    }
    placed.add(next.id);
    ordered.push(next);
  }
  return ordered;
}

// ============================================================================
// Helpers
// ============================================================================

function transition(outcome: StepOutcome, next: StepState): void {
  if (!TRANSITIONS[outcome.state].includes(next)) {
    throw new Error(
      `Illegal transition for step "${outcome.id}": ${outcome.state} -> ${next}`,
    );
  }
  outcome.state = next;
}

function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}

/** Human-readable report lines. */
export function renderReport(report: OrchestrationReport): string[] {
  return report.outcomes.map((outcome) => {
    let status: string;
    switch (outcome.state) {
      case "Satisfied":
        status = outcome.skipped ? `skipped (${outcome.reason})` : "done";
        break;
      case "Failed":
        status = `FAILED: ${outcome.error?.message ?? "unknown error"}`;
        break;
      default:
        status = "not started";
    }
    return `${outcome.id.padEnd(22)} ${status}`;
  });
}
