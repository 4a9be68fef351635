export interface AppErrorOptions {
  message: string;
  statusCode: number;
  code: string;
  isOperational?: boolean;
  details?: Record<string, unknown>;
  cause?: unknown;
}

export class AppError extends Error {
  public readonly statusCode: number;
  public readonly code: string;
  public readonly isOperational: boolean;
  public readonly details?: Record<string, unknown>;

  constructor({ message, statusCode, code, isOperational = true, details, cause }: AppErrorOptions) {
    super(message, cause !== undefined ? { cause } : undefined);
    this.name = this.constructor.name;
    this.statusCode = statusCode;
    this.code = code;
    this.isOperational = isOperational;
    this.details = details;

    // Restore prototype chain (necessary when extending built-ins in TS)
    Object.setPrototypeOf(this, new.target.prototype);

    Error.captureStackTrace(this, this.constructor);
  }

  static isAppError(err: unknown): err is AppError {
    return err instanceof AppError;
  }
}
