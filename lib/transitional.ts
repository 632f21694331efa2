//
// Copyright (c) Microsoft.
// Licensed under the MIT license. See LICENSE file in the project root for full license information.
//

export type StatusError = Error & {
  status?: number;
  innerError?: Error;
};

export function assertUnreachable(nothing: never): never {
  throw new Error(`This is never expected: ${String(nothing)}`);
}

export class CreateError {
  static CreateStatusCodeError(code: number, message?: string, cause?: unknown): StatusError {
    const error: StatusError = cause ? new Error(message, { cause }) : new Error(message);
    error.status = code;
    return error;
  }

  static NotFound(message?: string, innerError?: Error): StatusError {
    return ErrorHelper.SetInnerError(CreateError.CreateStatusCodeError(404, message), innerError);
  }

  static Conflict(message: string, innerError?: Error): StatusError {
    return ErrorHelper.SetInnerError(CreateError.CreateStatusCodeError(409, message), innerError);
  }

  static ParameterRequired(parameterName: string, optionalDetails?: string): StatusError {
    const msg = `${parameterName} required`;
    return CreateError.CreateStatusCodeError(400, optionalDetails ? `${msg}: ${optionalDetails}` : msg);
  }

  static InvalidParameters(message: string, innerError?: Error): StatusError {
    return ErrorHelper.SetInnerError(CreateError.CreateStatusCodeError(400, message), innerError);
  }

  static NotAuthenticated(message: string, cause?: unknown): StatusError {
    return CreateError.CreateStatusCodeError(401, message, cause);
  }

  static NotAuthorized(message: string, cause?: unknown): StatusError {
    return CreateError.CreateStatusCodeError(403, message, cause);
  }

  static ServerError(message: string, cause?: unknown): StatusError {
    return CreateError.CreateStatusCodeError(500, message, cause);
  }
}

export class ErrorHelper {
  public static SetInnerError(error: StatusError, innerError?: Error): StatusError {
    if (error && innerError) {
      error.innerError = innerError;
    }
    return error;
  }

  public static IsNotFound(error: unknown): boolean {
    return ErrorHelper.GetStatus(error) === 404;
  }

  public static IsInvalidParameters(error: unknown): boolean {
    return ErrorHelper.GetStatus(error) === 400;
  }

  public static IsNotAuthenticated(error: unknown): boolean {
    return ErrorHelper.GetStatus(error) === 401;
  }

  public static IsNotAuthorized(error: unknown): boolean {
    return ErrorHelper.GetStatus(error) === 403;
  }

  public static IsConflict(error: unknown): boolean {
    return ErrorHelper.GetStatus(error) === 409;
  }

  // Credentials that GitHub rejects will be rejected on every later call too.
  public static IsFatalRemote(error: unknown): boolean {
    return ErrorHelper.IsNotAuthenticated(error) || ErrorHelper.IsNotAuthorized(error);
  }

  public static GetStatus(error: unknown): number | undefined {
    if (!error || typeof error !== 'object') {
      return undefined;
    }
    if ('status' in error) {
      const status = error.status;
      if (typeof status === 'number') {
        return status;
      } else if (typeof status === 'string' && !isNaN(Number(status))) {
        return Number(status);
      }
    }
    if ('statusCode' in error && typeof error.statusCode === 'number') {
      return error.statusCode;
    }
    return undefined;
  }

  public static GetMessage(error: unknown): string {
    if (error instanceof Error) {
      return error.message;
    }
    return String(error);
  }
}
