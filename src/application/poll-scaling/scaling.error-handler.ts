import { BackendUnavailableError, ScalingError, type ScalingErrorCode } from "../../core/scaling/scaling.errors";

export type ErrorLog = {
  name: string;
  message: string;
  code?: ScalingErrorCode;
  status?: number;
};

export type HttpErrorResponse = {
  status: number;
  body: {
    error: string;
    code: ScalingErrorCode | "internal_error";
  };
};

const httpStatusByCode: Record<ScalingErrorCode, number> = {
  backend_unavailable: 503,
  malformed_response: 502,
  invalid_input: 500,
  invalid_task_request: 400
};

const toError = (err: unknown): Error => (err instanceof Error ? err : new Error(String(err)));

/**
 * Log-safe view of an error: no cause, no stack, no payloads.
 */
export const toErrorLog = (err: unknown): ErrorLog => {
  const error = toError(err);
  const log: ErrorLog = { name: error.name || "Error", message: error.message };
  if (err instanceof ScalingError) log.code = err.code;
  if (err instanceof BackendUnavailableError && err.status != null) log.status = err.status;
  return log;
};

export const toHttpErrorResponse = (err: unknown, messagePrefix: string): HttpErrorResponse => {
  const error = toError(err);
  if (err instanceof ScalingError) {
    return {
      status: httpStatusByCode[err.code],
      body: { error: `${messagePrefix}: ${error.message}`, code: err.code }
    };
  }

  return {
    status: 500,
    body: { error: `${messagePrefix}: ${error.message}`, code: "internal_error" }
  };
};
