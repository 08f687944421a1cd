export type TransientCause = "navigation" | "timeout" | "challenge";

/** Retryable fetch failure; the task state machine decides what happens next. */
export class TransientFetchError extends Error {
  readonly reason: TransientCause;

  constructor(reason: TransientCause, message: string) {
    super(message);
    this.name = "TransientFetchError";
    this.reason = reason;
  }
}

/** The slider could not be passed, even after an operator resume. */
export class ChallengeUnresolvedError extends TransientFetchError {
  constructor(message = "Challenge still present after operator resume") {
    super("challenge", message);
    this.name = "ChallengeUnresolvedError";
  }
}

export class RecordValidationError extends Error {
  readonly issues: string[];

  constructor(subject: string, issues: string[]) {
    super(`${subject}: ${issues.join("; ")}`);
    this.name = "RecordValidationError";
    this.issues = issues;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** A task transition that the state machine does not allow. */
export class TaskStateError extends Error {
  constructor(taskId: string, from: string, action: string) {
    super(`Task ${taskId} cannot ${action} from ${from}`);
    this.name = "TaskStateError";
  }
}
