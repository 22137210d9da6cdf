export type ErrorDetails = Record<string, unknown>;

export class AppError extends Error {
  code: string;
  details: ErrorDetails;

  constructor(message: string, code: string = 'APP_ERROR', details: ErrorDetails = {}) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.details = details;
    Error.captureStackTrace(this, this.constructor);
  }
}
