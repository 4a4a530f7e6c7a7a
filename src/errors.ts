export type TaskHubErrorCode =
  | "task_not_found"
  | "collaboration_not_found"
  | "missing_field"
  | "validation_failed"
  | "persistence_failure"
  | "notification_failure";

export class TaskHubError extends Error {
  readonly code: TaskHubErrorCode;
  readonly statusCode: number;

  constructor(code: TaskHubErrorCode, statusCode: number, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
    this.statusCode = statusCode;
  }
}

export class NotFoundError extends TaskHubError {
  constructor(readonly taskId: number) {
    super("task_not_found", 404, `task id=${taskId} not found`);
  }
}

export class CollaborationNotFoundError extends TaskHubError {
  constructor(readonly collaborationId: number) {
    super("collaboration_not_found", 404, `collaboration id=${collaborationId} not found`);
  }
}

export class MissingFieldError extends TaskHubError {
  constructor(readonly field: string) {
    super("missing_field", 400, `JSON should contain '${field}'`);
  }
}

export class InvalidFieldError extends TaskHubError {
  constructor(
    readonly field: string,
    expected: string
  ) {
    super("validation_failed", 400, `'${field}' must be ${expected}`);
  }
}

export class PersistenceError extends TaskHubError {
  constructor(message: string, options?: ErrorOptions) {
    super("persistence_failure", 500, message, options);
  }
}

/** Post-commit failure to notify; logged, never returned to callers. */
export class NotificationError extends TaskHubError {
  constructor(
    readonly scope: string,
    options?: ErrorOptions
  ) {
    super("notification_failure", 502, `notification to ${scope} failed`, options);
  }
}
