export class CollaboratorError extends Error {
  public readonly retryable = true;
  public readonly details: {
    collaborator: "detector" | "language_model" | "query_executor" | "record_store";
    cause?: string;
  };

  constructor(message: string, details: CollaboratorError["details"]) {
    super(message);
    this.name = "CollaboratorError";
    this.details = details;
  }
}

export class DetectionError extends CollaboratorError {
  constructor(message: string, cause?: unknown) {
    super(message, { collaborator: "detector", ...describeCause(cause) });
    this.name = "DetectionError";
  }
}

export class GenerationError extends CollaboratorError {
  constructor(message: string, cause?: unknown) {
    super(message, { collaborator: "language_model", ...describeCause(cause) });
    this.name = "GenerationError";
  }
}

export class QueryError extends CollaboratorError {
  constructor(message: string, cause?: unknown) {
    super(message, { collaborator: "query_executor", ...describeCause(cause) });
    this.name = "QueryError";
  }
}

export class RecordStoreError extends CollaboratorError {
  constructor(message: string, cause?: unknown) {
    super(message, { collaborator: "record_store", ...describeCause(cause) });
    this.name = "RecordStoreError";
  }
}

export type ValidationIssue = {
  path: string;
  message: string;
};

export class ValidationError extends Error {
  public readonly details: {
    subject: "detection" | "query" | "request";
    issues: ValidationIssue[];
  };

  constructor(message: string, details: ValidationError["details"]) {
    super(message);
    this.name = "ValidationError";
    this.details = details;
  }
}

export class WorkflowLoopError extends Error {
  public readonly details: {
    maxSteps: number;
    visited: string[];
  };

  constructor(details: WorkflowLoopError["details"]) {
    super(`Workflow exceeded ${details.maxSteps} steps without reaching END`);
    this.name = "WorkflowLoopError";
    this.details = details;
  }
}

export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

export class StageTimeoutError extends Error {
  public readonly details: { stage: string; timeoutMs: number };

  constructor(details: StageTimeoutError["details"]) {
    super(`Stage ${details.stage} timed out after ${details.timeoutMs}ms`);
    this.name = "StageTimeoutError";
    this.details = details;
  }
}

export class WorkflowCancelledError extends Error {
  public readonly details: { stage: string };

  constructor(details: WorkflowCancelledError["details"]) {
    super(`Workflow cancelled during stage ${details.stage}`);
    this.name = "WorkflowCancelledError";
    this.details = details;
  }
}

export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : "Unknown failure";

function describeCause(cause: unknown): { cause?: string } {
  if (cause === undefined) {
    return {};
  }
  return { cause: errorMessage(cause) };
}
