import type { ExecutionStatus, OrchestratorState } from "@conductor/sdk";

export enum ErrorCode {
  ORACLE_UNAVAILABLE = "ORACLE_UNAVAILABLE",
  NO_AGENT_AVAILABLE = "NO_AGENT_AVAILABLE",
  ALL_AGENTS_FAILED = "ALL_AGENTS_FAILED",
  DEADLINE_EXCEEDED = "DEADLINE_EXCEEDED",
  CANCELLED = "CANCELLED",
  INVALID_TRANSITION = "INVALID_TRANSITION",
  INVALID_REGISTRATION = "INVALID_REGISTRATION",
  CONFIG_ERROR = "CONFIG_ERROR",
}

/** Per-agent diagnostics attached to whole-pipeline failures. */
export interface AgentFailure {
  agentName: string;
  status: ExecutionStatus;
  message: string;
}

export interface ConductorErrorOptions {
  cause?: unknown;
  failures?: AgentFailure[];
}

export class ConductorError extends Error {
  public readonly code: ErrorCode;
  public readonly failures: AgentFailure[];

  constructor(code: ErrorCode, message: string, options: ConductorErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = "ConductorError";
    this.code = code;
    this.failures = options.failures ?? [];

    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class OracleUnavailableError extends ConductorError {
  constructor(message: string, cause?: unknown) {
    super(ErrorCode.ORACLE_UNAVAILABLE, message, { cause });
    this.name = "OracleUnavailableError";
  }
}

export class NoAgentAvailableError extends ConductorError {
  constructor(message = "No agent can handle this query") {
    super(ErrorCode.NO_AGENT_AVAILABLE, message);
    this.name = "NoAgentAvailableError";
  }
}

export class AllAgentsFailedError extends ConductorError {
  constructor(failures: AgentFailure[]) {
    const names = failures.map((f) => f.agentName).join(", ");
    super(ErrorCode.ALL_AGENTS_FAILED, `All selected agents failed: ${names}`, { failures });
    this.name = "AllAgentsFailedError";
  }
}

export class DeadlineExceededError extends ConductorError {
  constructor(deadlineMs: number, failures: AgentFailure[] = []) {
    super(ErrorCode.DEADLINE_EXCEEDED, `Run exceeded its ${deadlineMs}ms deadline`, { failures });
    this.name = "DeadlineExceededError";
  }
}

export class CancelledError extends ConductorError {
  constructor(failures: AgentFailure[] = [], cause?: unknown) {
    super(ErrorCode.CANCELLED, "Run was cancelled", { failures, cause });
    this.name = "CancelledError";
  }
}

export class InvalidTransitionError extends ConductorError {
  public readonly from: OrchestratorState;
  public readonly to: OrchestratorState;

  constructor(from: OrchestratorState, to: OrchestratorState) {
    super(ErrorCode.INVALID_TRANSITION, `Invalid transition: ${from} -> ${to}`);
    this.name = "InvalidTransitionError";
    this.from = from;
    this.to = to;
  }
}

export class InvalidRegistrationError extends ConductorError {
  constructor(message: string) {
    super(ErrorCode.INVALID_REGISTRATION, message);
    this.name = "InvalidRegistrationError";
  }
}

export class ConfigError extends ConductorError {
  public readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(ErrorCode.CONFIG_ERROR, issues.length > 0 ? `${message}: ${issues.join("; ")}` : message);
    this.name = "ConfigError";
    this.issues = issues;
  }
}

export function isConductorError(err: unknown, code?: ErrorCode): err is ConductorError {
  return err instanceof ConductorError && (code === undefined || err.code === code);
}
