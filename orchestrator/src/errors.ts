export type BenchErrorCode =
  | "connection_error"
  | "agent_error"
  | "vision_service_error"
  | "action_execution_error"
  | "process_launch_error"
  | "config_validation_error"
  | "sut_busy"
  | "unknown_sut";

export class BenchError extends Error {
  readonly code: BenchErrorCode;

  constructor(code: BenchErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Agent unreachable, or the call timed out. */
export class ConnectionError extends BenchError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("connection_error", message, options);
  }
}

/** Agent reachable but rejected the request. */
export class AgentError extends BenchError {
  readonly status: number;
  readonly reason: string;

  constructor(status: number, reason: string) {
    super("agent_error", `Agent responded ${status}: ${reason}`);
    this.status = status;
    this.reason = reason;
  }
}

export class VisionServiceError extends BenchError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("vision_service_error", message, options);
  }
}

export class ActionExecutionError extends BenchError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("action_execution_error", message, options);
  }
}

export class ProcessLaunchError extends BenchError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("process_launch_error", message, options);
  }
}

export interface ConfigIssue {
  path: string;
  message: string;
}

export class ConfigValidationError extends BenchError {
  readonly source: string;
  readonly issues: ConfigIssue[];

  constructor(source: string, issues: ConfigIssue[]) {
    const summary = issues
      .map((issue) => (issue.path ? `${issue.path}: ${issue.message}` : issue.message))
      .join("; ");
    super("config_validation_error", `Invalid config ${source}: ${summary}`);
    this.source = source;
    this.issues = issues;
  }
}

export class SutBusyError extends BenchError {
  readonly sutId: string;

  constructor(sutId: string, detail = "already has an active session") {
    super("sut_busy", `SUT ${sutId} ${detail}`);
    this.sutId = sutId;
  }
}

export class UnknownSutError extends BenchError {
  readonly sutId: string;

  constructor(sutId: string) {
    super("unknown_sut", `SUT ${sutId} is not registered`);
    this.sutId = sutId;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
