export type ScalingErrorCode =
  | "backend_unavailable"
  | "malformed_response"
  | "invalid_input"
  | "invalid_task_request";

export type ScalingErrorContext = Partial<{
  source: "queue_metadata" | "task_backlog" | "task_submit";
  queueName: string;
  requestUrl: string;
  value: number;
}>;

export class ScalingError extends Error {
  readonly code: ScalingErrorCode;
  readonly context: ScalingErrorContext;

  constructor(args: { code: ScalingErrorCode; message: string; context?: ScalingErrorContext; cause?: unknown }) {
    super(args.message, { cause: args.cause });
    this.name = "ScalingError";
    this.code = args.code;
    this.context = args.context ?? {};
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Transport failure reaching the queue backend (network error, timeout, non-2xx).
 */
export class BackendUnavailableError extends ScalingError {
  readonly status?: number;

  constructor(message: string, context: ScalingErrorContext = {}, options: { status?: number; cause?: unknown } = {}) {
    super({ code: "backend_unavailable", message, context, cause: options.cause });
    this.name = "BackendUnavailableError";
    this.status = options.status;
  }
}

/**
 * The backend answered, but the payload does not have the expected shape.
 */
export class MalformedResponseError extends ScalingError {
  constructor(message: string, context: ScalingErrorContext = {}, cause?: unknown) {
    super({ code: "malformed_response", message, context, cause });
    this.name = "MalformedResponseError";
  }
}

export class InvalidInputError extends ScalingError {
  constructor(message: string, context: ScalingErrorContext = {}) {
    super({ code: "invalid_input", message, context });
    this.name = "InvalidInputError";
  }
}

export class InvalidTaskRequestError extends ScalingError {
  constructor(message: string, context: ScalingErrorContext = {}) {
    super({ code: "invalid_task_request", message, context });
    this.name = "InvalidTaskRequestError";
  }
}
