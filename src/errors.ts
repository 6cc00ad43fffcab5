/**
 * Error taxonomy for the bootstrap workflow.
 *
 * Every fatal condition is a subclass of {@link BootstrapError}; the CLI maps
 * the `exitCode` of the error to the process exit code and prints the
 * `remediation` hint when one exists.
 */

// ============================================================================
// Exit Codes
// ============================================================================

export const EXIT_SUCCESS = 0;
export const EXIT_UNEXPECTED = 1;
export const EXIT_MISSING_PREREQUISITE = 2;
export const EXIT_STEP_FAILURE = 3;
export const EXIT_TIMEOUT = 4;

export type ExitCode =
  | typeof EXIT_SUCCESS
  | typeof EXIT_UNEXPECTED
  | typeof EXIT_MISSING_PREREQUISITE
  | typeof EXIT_STEP_FAILURE
  | typeof EXIT_TIMEOUT;

// ============================================================================
// Base Error
// ============================================================================

export interface BootstrapErrorOptions {
  remediation?: string;
  cause?: unknown;
}

export abstract class BootstrapError extends Error {
  abstract readonly code: string;
  abstract readonly exitCode: ExitCode;
  readonly remediation?: string;

  constructor(message: string, options: BootstrapErrorOptions = {}) {
    super(message, { cause: options.cause });
    this.name = this.constructor.name;
    this.remediation = options.remediation;
  }
}

// ============================================================================
// Prerequisite Errors
// ============================================================================

/** The cluster (or another hard prerequisite) cannot be reached at all. */
export class UnreachableEnvironment extends BootstrapError {
  readonly code = "UNREACHABLE_ENVIRONMENT";
  readonly exitCode = EXIT_MISSING_PREREQUISITE;
}

export class MissingRequiredConfig extends BootstrapError {
  readonly code = "MISSING_REQUIRED_CONFIG";
  readonly exitCode = EXIT_MISSING_PREREQUISITE;
  readonly missingKeys: string[];

  constructor(missingKeys: string[], options: BootstrapErrorOptions = {}) {
    super(`Missing required configuration: ${missingKeys.join(", ")}`, {
      remediation:
        options.remediation ??
        "Re-run `gitops-bootstrap check` interactively, or add the keys to the configuration store",
      cause: options.cause,
    });
    this.missingKeys = [...missingKeys];
  }
}

// ============================================================================
// Execution Errors
// ============================================================================

export class ProvisioningTimeout extends BootstrapError {
  readonly code = "PROVISIONING_TIMEOUT";
  readonly exitCode = EXIT_TIMEOUT;
  readonly timeoutMs: number;

  constructor(
    description: string,
    timeoutMs: number,
    options: BootstrapErrorOptions = {},
  ) {
    super(`Timed out after ${timeoutMs}ms waiting for ${description}`, {
      remediation:
        options.remediation ??
        "Inspect the resource, then re-run the same command; completed steps are skipped",
      cause: options.cause,
    });
    this.timeoutMs = timeoutMs;
  }
}

/** The controller is ready but its bootstrap credential cannot be read. */
export class CredentialUnavailable extends BootstrapError {
  readonly code = "CREDENTIAL_UNAVAILABLE";
  readonly exitCode = EXIT_STEP_FAILURE;
}

export class AuthenticationFailed extends BootstrapError {
  readonly code = "AUTHENTICATION_FAILED";
  readonly exitCode = EXIT_STEP_FAILURE;
}

export class BuildFailure extends BootstrapError {
  readonly code = "BUILD_FAILURE";
  readonly exitCode = EXIT_STEP_FAILURE;
}

/**
 * A unit or step was about to run before one of its dependencies was
 * satisfied. Indicates a defect in the ordering logic.
 */
export class ApplyOrderViolation extends BootstrapError {
  readonly code = "APPLY_ORDER_VIOLATION";
  readonly exitCode = EXIT_STEP_FAILURE;
}

/** A workload references an image tag that was not pushed in this run. */
export class ArtifactMismatch extends BootstrapError {
  readonly code = "ARTIFACT_MISMATCH";
  readonly exitCode = EXIT_STEP_FAILURE;
}

/** An external call made by a step or stage failed. */
export class StepFailed extends BootstrapError {
  readonly code = "STEP_FAILED";
  readonly exitCode = EXIT_STEP_FAILURE;
  readonly stepId: string;

  constructor(
    stepId: string,
    message: string,
    options: BootstrapErrorOptions = {},
  ) {
    super(`[${stepId}] ${message}`, options);
    this.stepId = stepId;
  }
}

// ============================================================================
// Non-fatal Reports
// ============================================================================

/** Outcome of a post-deploy smoke check; reported, never thrown. */
export interface VerificationFailure {
  code: "VERIFICATION_FAILURE";
  check: string;
  message: string;
}

// ============================================================================
// Helpers
// ============================================================================

export function isBootstrapError(error: unknown): error is BootstrapError {
  return error instanceof BootstrapError;
}

export function exitCodeFor(error: unknown): ExitCode {
  return isBootstrapError(error) ? error.exitCode : EXIT_UNEXPECTED;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
