/**
 * AMEE Error Classes
 *
 * Error classes with cause chaining so transport failures keep their origin.
 * Every error raised on a request carries the method and path of the
 * descriptor that produced it in `context`.
 */

/**
 * Where a request-scoped error came from
 */
export interface RequestOrigin {
  method?: string
  path?: string
}

/**
 * Base error class for all AMEE client errors.
 */
export class AmeeError extends Error {
  /** Error code for programmatic handling */
  readonly code: string

  /** Additional context about the error */
  readonly context?: Record<string, unknown>

  constructor(
    message: string,
    options?: {
      code?: string
      cause?: unknown
      context?: Record<string, unknown>
    }
  ) {
    super(message, { cause: options?.cause })
    this.name = 'AmeeError'
    this.code = options?.code ?? 'AMEE_ERROR'
    this.context = options?.context

    Error.captureStackTrace?.(this, this.constructor)
  }

  /**
   * Get the full error chain as an array
   */
  getErrorChain(): Error[] {
    const chain: Error[] = [this]
    let current: unknown = this.cause

    while (current instanceof Error) {
      chain.push(current)
      current = current.cause
    }

    return chain
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
      cause: this.cause instanceof Error ? this.cause.message : this.cause,
      stack: this.stack,
    }
  }
}

/**
 * Credentials rejected, no token returned, or a fresh token rejected.
 */
export class AuthError extends AmeeError {
  /** HTTP status of the failing call, when there was one */
  readonly statusCode?: number

  constructor(
    message: string,
    options?: RequestOrigin & {
      cause?: unknown
      statusCode?: number
    }
  ) {
    super(message, {
      code: 'AUTH_ERROR',
      cause: options?.cause,
      context: {
        method: options?.method,
        path: options?.path,
        statusCode: options?.statusCode,
      },
    })
    this.name = 'AuthError'
    this.statusCode = options?.statusCode
  }
}

/**
 * Non-2xx answer from any endpoint other than authentication.
 */
export class ApiError extends AmeeError {
  readonly statusCode: number

  /** Raw response body, useful because AMEE explains failures in it */
  readonly body: string

  constructor(
    message: string,
    options: RequestOrigin & {
      statusCode: number
      body?: string
      cause?: unknown
    }
  ) {
    super(message, {
      code: 'API_ERROR',
      cause: options.cause,
      context: {
        method: options.method,
        path: options.path,
        statusCode: options.statusCode,
      },
    })
    this.name = 'ApiError'
    this.statusCode = options.statusCode
    this.body = options.body ?? ''
  }

  isNotFoundError(): boolean {
    return this.statusCode === 404
  }

  /**
   * Check if this is a server error (5xx)
   */
  isServerError(): boolean {
    return this.statusCode >= 500
  }
}

/**
 * Response body is not a JSON object.
 */
export class DecodeError extends AmeeError {
  constructor(
    message: string,
    options?: RequestOrigin & {
      cause?: unknown
      body?: string
    }
  ) {
    super(message, {
      code: 'DECODE_ERROR',
      cause: options?.cause,
      context: {
        method: options?.method,
        path: options?.path,
        body: options?.body,
      },
    })
    this.name = 'DecodeError'
  }
}

/**
 * Network-related errors (fetch failures, timeouts)
 */
export class NetworkError extends AmeeError {
  constructor(
    message: string,
    options?: RequestOrigin & {
      cause?: unknown
      url?: string
    }
  ) {
    super(message, {
      code: 'NETWORK_ERROR',
      cause: options?.cause,
      context: {
        method: options?.method,
        path: options?.path,
        url: options?.url,
      },
    })
    this.name = 'NetworkError'
  }
}

/**
 * Cache backend failure. Never reaches callers of the request pipeline.
 */
export class CacheUnavailableError extends AmeeError {
  constructor(
    message: string,
    options?: {
      cause?: unknown
      key?: string
      operation?: 'get' | 'set' | 'delete'
    }
  ) {
    super(message, {
      code: 'CACHE_UNAVAILABLE',
      cause: options?.cause,
      context: {
        key: options?.key,
        operation: options?.operation,
      },
    })
    this.name = 'CacheUnavailableError'
  }
}

/**
 * Validation errors (bad paths, deleted facades, incomplete drills, bad config)
 */
export class ValidationError extends AmeeError {
  /** Field that failed validation */
  readonly field?: string

  constructor(
    message: string,
    options?: {
      cause?: unknown
      field?: string
      context?: Record<string, unknown>
    }
  ) {
    super(message, {
      code: 'VALIDATION_ERROR',
      cause: options?.cause,
      context: {
        ...options?.context,
        field: options?.field,
      },
    })
    this.name = 'ValidationError'
    this.field = options?.field
  }
}

/**
 * A decoded response lacks the field a facade reads, or carries it in an
 * unexpected shape or unit.
 */
export class UnexpectedResponseError extends AmeeError {
  constructor(
    message: string,
    options?: RequestOrigin & {
      cause?: unknown
      field?: string
    }
  ) {
    super(message, {
      code: 'UNEXPECTED_RESPONSE',
      cause: options?.cause,
      context: {
        method: options?.method,
        path: options?.path,
        field: options?.field,
      },
    })
    this.name = 'UnexpectedResponseError'
  }
}

/**
 * Extract error message from unknown error
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message
  }
  if (typeof error === 'string') {
    return error
  }
  return 'Unknown error'
}

export function isAmeeError(error: unknown): error is AmeeError {
  return error instanceof AmeeError
}
