export class AppError extends Error {
  constructor(
    readonly statusCode: number,
    readonly code: string,
    message: string,
  ) {
    super(message);
    this.name = "AppError";
  }
}

export class ValidationError extends AppError {
  constructor(message: string, code = "invalid_transaction", statusCode = 422) {
    super(statusCode, code, message);
    this.name = "ValidationError";
  }
}

export class ModelUnavailableError extends AppError {
  constructor(message: string) {
    super(503, "model_unavailable", message);
    this.name = "ModelUnavailableError";
  }
}

export class HistoryStoreError extends AppError {
  constructor(message: string) {
    super(503, "history_store_unavailable", message);
    this.name = "HistoryStoreError";
  }
}

export class RequestAbortedError extends AppError {
  constructor(message = "Scoring request was abandoned before scoring started.") {
    super(499, "request_aborted", message);
    this.name = "RequestAbortedError";
  }
}
