/**
 * Error types raised by the SDK.
 *
 * Every error extends AgentSdkError so callers can tell SDK failures apart from
 * faults thrown by their own tools and hooks, which are propagated untouched.
 */

/**
 * Base class for all errors raised by the SDK.
 */
export class AgentSdkError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options)
    this.name = 'AgentSdkError'
  }
}

/**
 * Raised when a function argument is rejected before any work starts,
 * for example an empty prompt.
 */
export class InvalidArgumentError extends AgentSdkError {
  /**
   * Name of the offending argument.
   */
  readonly argument: string

  constructor(argument: string, message: string, options?: ErrorOptions) {
    super(message, options)
    this.name = 'InvalidArgumentError'
    this.argument = argument
  }
}

/**
 * Data for an API call error.
 */
export interface APICallErrorData {
  message: string
  url?: string
  statusCode?: number
  responseHeaders?: Record<string, string>
  responseBody?: string
  /**
   * Overrides the retryability derived from the status code.
   */
  isRetryable?: boolean
  cause?: unknown
}

/**
 * Raised by model implementations when a provider call fails.
 *
 * Retryability defaults to true for request timeouts (408), conflicts (409),
 * rate limits (429) and server errors (5xx).
 */
export class APICallError extends AgentSdkError {
  readonly url?: string
  readonly statusCode?: number
  readonly responseHeaders?: Record<string, string>
  readonly responseBody?: string
  readonly isRetryable: boolean

  constructor(data: APICallErrorData) {
    super(data.message, data.cause !== undefined ? { cause: data.cause } : undefined)
    this.name = 'APICallError'
    if (data.url !== undefined) {
      this.url = data.url
    }
    if (data.statusCode !== undefined) {
      this.statusCode = data.statusCode
    }
    if (data.responseHeaders !== undefined) {
      this.responseHeaders = data.responseHeaders
    }
    if (data.responseBody !== undefined) {
      this.responseBody = data.responseBody
    }
    this.isRetryable = data.isRetryable ?? isRetryableStatus(data.statusCode)
  }
}

/**
 * Why a retried computation gave up.
 */
export type RetryErrorReason = 'maxRetriesExceeded' | 'errorNotRetryable'

/**
 * Raised when a retried computation fails for good.
 * Carries every error seen, in attempt order.
 */
export class RetryError extends AgentSdkError {
  readonly reason: RetryErrorReason
  readonly errors: Error[]

  constructor(message: string, reason: RetryErrorReason, errors: Error[]) {
    super(message, { cause: errors[errors.length - 1] })
    this.name = 'RetryError'
    this.reason = reason
    this.errors = errors
  }

  /**
   * The error of the final attempt.
   */
  get lastError(): Error | undefined {
    return this.errors[this.errors.length - 1]
  }
}

/**
 * Which check a tool call failed.
 */
export type ToolValidationErrorKind = 'toolNotFound' | 'invalidJson' | 'missingParameter'

/**
 * Describes why a model-emitted tool call was rejected.
 * Never thrown by the loops: it is attached to the invalid call and its text
 * is returned to the model as an error tool result.
 */
export class ToolValidationError extends AgentSdkError {
  readonly kind: ToolValidationErrorKind
  readonly toolName: string

  constructor(kind: ToolValidationErrorKind, toolName: string, message: string, options?: ErrorOptions) {
    super(message, options)
    this.name = 'ToolValidationError'
    this.kind = kind
    this.toolName = toolName
  }
}

/**
 * Normalizes an unknown thrown value into an Error.
 *
 * @param error - The value that was thrown
 * @returns The value itself when it is an Error, otherwise a wrapping Error
 */
export function normalizeError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error))
}

/**
 * Whether an error came from an aborted signal. Such errors are never retried.
 *
 * @param error - Error to inspect
 */
export function isAbortError(error: unknown): boolean {
  return error instanceof Error && (error.name === 'AbortError' || error.name === 'TimeoutError')
}

function isRetryableStatus(statusCode: number | undefined): boolean {
  if (statusCode === undefined) {
    return false
  }
  return statusCode === 408 || statusCode === 409 || statusCode === 429 || statusCode >= 500
}
