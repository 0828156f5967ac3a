/**
 * Domain errors. Each carries the HTTP status the routes answer with.
 */
export abstract class ScanFleetError extends Error {
  abstract readonly status: number;
}

export class UnknownResultError extends ScanFleetError {
  readonly status = 404;
  constructor(resultId: string) {
    super(`Scan result ${resultId} not found`);
    this.name = "UnknownResultError";
  }
}

export class UnknownTaskError extends ScanFleetError {
  readonly status = 404;
  constructor(taskId: string, resultId: string) {
    super(`Task ${taskId} does not belong to result ${resultId}`);
    this.name = "UnknownTaskError";
  }
}

export class TaskOwnershipError extends ScanFleetError {
  readonly status = 409;
  constructor(taskId: string, agentId: string) {
    super(`Task ${taskId} is not assigned to agent ${agentId}`);
    this.name = "TaskOwnershipError";
  }
}

export class ResultFinalizedError extends ScanFleetError {
  readonly status = 409;
  constructor(resultId: string) {
    super(`Scan result ${resultId} is finalized and no longer accepts submissions`);
    this.name = "ResultFinalizedError";
  }
}

export class UnknownAgentError extends ScanFleetError {
  readonly status = 404;
  constructor(agentId: string) {
    super(`Agent ${agentId} not found`);
    this.name = "UnknownAgentError";
  }
}

export class UnknownScanConfigError extends ScanFleetError {
  readonly status = 404;
  constructor(scanConfigId: string) {
    super(`Scan configuration ${scanConfigId} not found`);
    this.name = "UnknownScanConfigError";
  }
}

export class UnknownDeltaReportError extends ScanFleetError {
  readonly status = 404;
  constructor(reportId: string) {
    super(`Delta report ${reportId} not found`);
    this.name = "UnknownDeltaReportError";
  }
}

export class IllegalTransitionError extends ScanFleetError {
  readonly status = 409;
  constructor(entity: string, id: string, from: string, to: string) {
    super(`${entity} ${id} cannot move from ${from} to ${to}`);
    this.name = "IllegalTransitionError";
  }
}

export class SubmissionTimeoutError extends ScanFleetError {
  readonly status = 503;
  constructor(resultId: string, timeoutMs: number) {
    super(`Merging submission for result ${resultId} exceeded ${timeoutMs}ms`);
    this.name = "SubmissionTimeoutError";
  }
}

export class InvalidTargetError extends ScanFleetError {
  readonly status = 400;
  constructor(spec: string, reason: string) {
    super(`Invalid target specification "${spec}": ${reason}`);
    this.name = "InvalidTargetError";
  }
}

export class AgentUnreachableError extends Error {
  constructor(agentId: string, reason: string) {
    super(`Agent ${agentId} unreachable: ${reason}`);
    this.name = "AgentUnreachableError";
  }
}
