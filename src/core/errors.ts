import type { ZodIssue } from "zod";

/** Base class for every failure the provisioner reports on purpose. */
export class ProvisionerError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ProvisionerError";
  }
}

/** Bad arguments or settings. Raised before any hypervisor call. */
export class ValidationError extends ProvisionerError {
  constructor(
    message: string,
    public readonly issues: readonly ZodIssue[] = [],
  ) {
    super(message);
    this.name = "ValidationError";
  }

  static fromIssues(subject: string, issues: readonly ZodIssue[]): ValidationError {
    const details = issues
      .map((issue) => `${issue.path.length > 0 ? issue.path.join(".") : subject}: ${issue.message}`)
      .join("; ");
    return new ValidationError(`Invalid ${subject}: ${details}`, issues);
  }
}

/** A batch would run past the last usable host octet. */
export class AllocationError extends ProvisionerError {
  constructor(
    public readonly index: number,
    public readonly octet: number,
  ) {
    super(`IP range exceeded for node ${index}: host octet ${octet} is above 254`);
    this.name = "AllocationError";
  }
}

/** A hypervisor command exited non-zero. */
export class CommandError extends ProvisionerError {
  constructor(
    public readonly command: string,
    public readonly exitCode: number,
    public readonly stderr: string,
  ) {
    const detail = stderr.trim();
    super(`Command "${command}" exited with code ${exitCode}${detail ? `: ${detail}` : ""}`);
    this.name = "CommandError";
  }
}

/** The hypervisor reports a state a lifecycle step cannot start from. */
export class UnexpectedStateError extends ProvisionerError {
  constructor(
    public readonly nodeId: number,
    public readonly expected: string,
    public readonly observed: string,
  ) {
    super(`Node ${nodeId} is ${observed}, expected ${expected}`);
    this.name = "UnexpectedStateError";
  }
}

/** One lifecycle step of one node failed. */
export class StepFailure extends ProvisionerError {
  constructor(
    public readonly step: string,
    public readonly nodeId: number,
    cause: unknown,
  ) {
    super(`Step ${step} failed for node ${nodeId}: ${cause instanceof Error ? cause.message : String(cause)}`, { cause });
    this.name = "StepFailure";
  }
}

/** The node never reported "running" within the polling bound. */
export class StartupTimeoutError extends ProvisionerError {
  readonly step = "await-ready";

  constructor(
    public readonly nodeId: number,
    public readonly attempts: number,
    public readonly intervalMs: number,
  ) {
    super(`Node ${nodeId} was not running after ${attempts} checks at ${intervalMs}ms intervals`);
    this.name = "StartupTimeoutError";
  }
}

export type NodeFailure = StepFailure | StartupTimeoutError;

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
