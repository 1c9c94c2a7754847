/**
 * Application error types. Each carries the HTTP status and OpenAI error
 * `type`/`code` it maps to in errorResponseHandler.
 */

export class ApplicationError extends Error {
  readonly status: number;
  readonly type: string;
  readonly code: string | null;
  readonly param: string | null;

  constructor(message: string, status: number, type: string, code: string | null = null, param: string | null = null) {
    super(message);
    this.name = new.target.name;
    this.status = status;
    this.type = type;
    this.code = code;
    this.param = param;
  }
}

export class RequestValidationError extends ApplicationError {
  constructor(message: string, param: string | null = null) {
    super(message, 400, "invalid_request_error", "invalid_value", param);
  }
}

export class TemplateRenderError extends ApplicationError {
  constructor(message: string) {
    super(message, 400, "invalid_request_error", "template_error");
  }
}

export class ModelNotFoundError extends ApplicationError {
  constructor(model: string) {
    super(`The model '${model}' does not exist or is not served here`, 404, "invalid_request_error", "model_not_found", "model");
  }
}

/** A backend call that failed at the transport or HTTP level. */
export class BackendRequestError extends ApplicationError {
  readonly backendId: string;

  constructor(backendId: string, message: string, status = 502) {
    super(`Backend '${backendId}' failed: ${message}`, status, "backend_error", null);
    this.backendId = backendId;
  }
}

export function isApplicationError(error: unknown): error is ApplicationError {
  return error instanceof ApplicationError;
}
