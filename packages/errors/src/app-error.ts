export interface AppErrorOptions {
  message: string;
  statusCode: number;
  code: string;
  isOperational?: boolean;
  details?: Record<string, unknown>;
  cause?: unknown;
}

export interface SerializedAppError {
  name: string;
  code: string;
  statusCode: number;
  message: string;
  details?: Record<string, unknown>;
}

export class AppError extends Error {
  public readonly statusCode: number;
  public readonly code: string;
  public readonly isOperational: boolean;
  public readonly details?: Record<string, unknown>;

  constructor({
    message,
    statusCode,
    code,
    isOperational = true,
    details,
    cause,
  }: AppErrorOptions) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = this.constructor.name;
    this.statusCode = statusCode;
    this.code = code;
    this.isOperational = isOperational;
    this.details = details;

    // Restore prototype chain (necessary when extending built-ins in TS)
    Object.setPrototypeOf(this, new.target.prototype);

    Error.captureStackTrace(this, this.constructor);
  }

  /** 4xx errors describe the request, so retrying them cannot help. */
  get isClientError(): boolean {
    return this.statusCode >= 400 && this.statusCode < 500;
  }

  toJSON(): SerializedAppError {
    return {
      name: this.name,
      code: this.code,
      statusCode: this.statusCode,
      message: this.message,
      ...(this.details ? { details: this.details } : {}),
    };
  }

  static isAppError(err: unknown): err is AppError {
    return err instanceof AppError;
  }
}
