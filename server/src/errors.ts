import type { Request, Response, NextFunction } from "express";

export type ErrorCode =
  | "Unauthenticated"
  | "InvalidArgument"
  | "PermissionDenied"
  | "NotFound"
  | "AlreadyExists"
  | "FailedPrecondition"
  | "Canceled"
  | "Internal";

const HTTP_STATUS: Record<ErrorCode, number> = {
  Unauthenticated: 401,
  InvalidArgument: 400,
  PermissionDenied: 403,
  NotFound: 404,
  AlreadyExists: 409,
  FailedPrecondition: 412,
  // Client closed the request or the request deadline passed
  Canceled: 499,
  Internal: 500,
};

/**
 * Error raised by every service operation. `message` is safe to show to the
 * caller; `cause` (when present) is for logs only.
 */
export class ServiceError extends Error {
  readonly code: ErrorCode;
  readonly details?: Record<string, string[] | undefined>;

  constructor(
    code: ErrorCode,
    message: string,
    options?: { cause?: unknown; details?: Record<string, string[] | undefined> }
  ) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = "ServiceError";
    this.code = code;
    this.details = options?.details;
  }

  get httpStatus(): number {
    return HTTP_STATUS[this.code];
  }
}

export function unauthenticated(message = "authentication required"): ServiceError {
  return new ServiceError("Unauthenticated", message);
}

export function invalidArgument(
  message: string,
  details?: Record<string, string[] | undefined>
): ServiceError {
  return new ServiceError("InvalidArgument", message, { details });
}

export function permissionDenied(message: string): ServiceError {
  return new ServiceError("PermissionDenied", message);
}

export function notFound(message: string): ServiceError {
  return new ServiceError("NotFound", message);
}

export function alreadyExists(message: string): ServiceError {
  return new ServiceError("AlreadyExists", message);
}

export function failedPrecondition(message: string): ServiceError {
  return new ServiceError("FailedPrecondition", message);
}

export function internal(message: string, cause?: unknown): ServiceError {
  return new ServiceError("Internal", message, { cause });
}

/**
 * Runs `fn`, rethrowing ServiceErrors unchanged and wrapping anything else
 * (sql.js errors, I/O errors) as Internal with the given message.
 */
export async function wrapInternal<T>(message: string, fn: () => T | Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (err) {
    if (err instanceof ServiceError) throw err;
    throw internal(message, err);
  }
}

/**
 * Throws Canceled if the caller has gone away. Called before a transaction is
 * opened, never inside one.
 */
export function checkSignal(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw new ServiceError("Canceled", "request canceled", { cause: signal.reason });
  }
}

/**
 * Maps errors raised by express.json (malformed or oversized bodies) to
 * InvalidArgument. Anything else is left to the caller.
 */
function fromBodyParser(err: unknown): ServiceError | undefined {
  if (!(err instanceof Error) || !("type" in err) || typeof err.type !== "string") {
    return undefined;
  }
  const type = err.type;
  if (type === "entity.parse.failed") return invalidArgument("invalid JSON body");
  if (type === "entity.too.large") return invalidArgument("request body too large");
  if ("expose" in err && err.expose === true && type.startsWith("entity.")) {
    return invalidArgument(err.message);
  }
  return undefined;
}

/**
 * Express error middleware. Renders `{ error, code }` (plus `details` for
 * validation failures) and logs anything that is not a client error.
 */
export function errorHandler(
  err: unknown,
  req: Request,
  res: Response,
  // Express identifies error middleware by arity
  // eslint-disable-next-line @typescript-eslint/no-unused-vars
  _next: NextFunction
): void {
  const serviceErr =
    err instanceof ServiceError
      ? err
      : fromBodyParser(err) ?? internal("internal server error", err);

  if (serviceErr.code === "Internal") {
    console.error(
      `[server] ${req.method} ${req.path} failed: ${serviceErr.message}`,
      serviceErr.cause ?? ""
    );
  }

  if (res.headersSent) return;

  res.status(serviceErr.httpStatus).json({
    error: serviceErr.message,
    code: serviceErr.code,
    ...(serviceErr.details && { details: serviceErr.details }),
  });
}
