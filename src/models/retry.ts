import { setTimeout as sleep } from 'node:timers/promises'
import { APICallError, RetryError, isAbortError, normalizeError } from '../errors.js'
import { getLogger } from '../logging/logger.js'

const logger = getLogger('retry')

/**
 * Longest delay a retry header may request before it is only honoured when shorter than the backoff.
 */
const MAX_HEADER_DELAY_MS = 60_000

/**
 * Configures how failed model calls are retried.
 */
export interface RetryOptions {
  /**
   * Retries after the first attempt. Zero disables retrying, and errors then
   * propagate unwrapped.
   */
  maxRetries: number

  /**
   * Delay before the first retry, in milliseconds.
   */
  initialDelayMs: number

  /**
   * Multiplier applied to the delay after every retry.
   */
  backoffFactor: number

  /**
   * Observes every retry before its delay starts.
   */
  onRetry?: (error: APICallError, delayMs: number) => void

  /**
   * Errors for which this returns true are rethrown unchanged, without retrying.
   */
  propagate?: (error: unknown) => boolean
}

/**
 * Default retry policy: two retries, starting at two seconds and doubling.
 */
export const DEFAULT_RETRY_OPTIONS: Readonly<RetryOptions> = {
  maxRetries: 2,
  initialDelayMs: 2000,
  backoffFactor: 2,
}

/**
 * Works out how long to wait before the next attempt.
 *
 * `retry-after-ms` wins over `retry-after`, which may hold seconds or an HTTP date.
 * A header delay is used when it is positive and either under a minute or shorter
 * than the exponential backoff; otherwise the backoff applies.
 *
 * @param error - The failed attempt's error
 * @param backoffDelayMs - Current exponential backoff delay
 * @returns Delay in milliseconds
 */
export function getRetryDelayMs(error: Error, backoffDelayMs: number): number {
  if (!(error instanceof APICallError) || error.responseHeaders === undefined) {
    return backoffDelayMs
  }

  const headers = lowerCaseKeys(error.responseHeaders)
  let ms = 0

  const retryAfterMs = headers['retry-after-ms']
  if (retryAfterMs !== undefined) {
    const parsed = Number.parseFloat(retryAfterMs)
    if (!Number.isNaN(parsed)) {
      ms = parsed
    }
  }

  const retryAfter = headers['retry-after']
  if (retryAfter !== undefined && ms === 0) {
    const seconds = Number(retryAfter)
    if (retryAfter.trim() !== '' && !Number.isNaN(seconds)) {
      ms = seconds * 1000
    } else {
      const date = Date.parse(retryAfter)
      if (!Number.isNaN(date)) {
        ms = date - Date.now()
      }
    }
  }

  if (ms > 0 && (ms < MAX_HEADER_DELAY_MS || ms < backoffDelayMs)) {
    return ms
  }
  return backoffDelayMs
}

/**
 * Tracks the attempts of one retried computation and decides what happens after each failure.
 */
class RetryController {
  private readonly _options: RetryOptions
  private readonly _signal: AbortSignal | undefined
  private readonly _errors: Error[] = []
  private _delayMs: number

  constructor(options: RetryOptions, signal: AbortSignal | undefined) {
    this._options = options
    this._signal = signal
    this._delayMs = options.initialDelayMs
  }

  /**
   * Waits out the backoff when the failure is retryable; throws the final error otherwise.
   */
  async handleFailure(thrown: unknown): Promise<void> {
    if (this._options.propagate?.(thrown) === true) {
      throw thrown
    }

    const error = normalizeError(thrown)
    if (isAbortError(error) || this._signal?.aborted === true || this._options.maxRetries === 0) {
      throw thrown
    }

    this._errors.push(error)
    const tryNumber = this._errors.length

    if (tryNumber > this._options.maxRetries) {
      throw new RetryError(
        `Failed after ${tryNumber} attempts. Last error: ${error.message}`,
        'maxRetriesExceeded',
        [...this._errors]
      )
    }

    if (error instanceof APICallError && error.isRetryable) {
      const delayMs = getRetryDelayMs(error, this._delayMs)
      logger.warn({ attempt: tryNumber, delayMs, statusCode: error.statusCode }, `retrying model call: ${error.message}`)
      this._options.onRetry?.(error, delayMs)

      await sleep(delayMs, undefined, this._signal !== undefined ? { signal: this._signal } : undefined)
      this._delayMs *= this._options.backoffFactor
      return
    }

    if (tryNumber === 1) {
      throw thrown
    }

    throw new RetryError(
      `Failed after ${tryNumber} attempts with non-retryable error: ${error.message}`,
      'errorNotRetryable',
      [...this._errors]
    )
  }
}

/**
 * Runs a computation, retrying retryable {@link APICallError}s with exponential backoff
 * that respects `retry-after-ms` and `retry-after` headers.
 *
 * @param fn - The computation. Called once per attempt.
 * @param options - Retry policy, merged over {@link DEFAULT_RETRY_OPTIONS}
 * @param signal - Aborts waiting between attempts; abort errors are never retried
 * @returns The first successful result
 *
 * @example
 * ```typescript
 * const response = await retryWithExponentialBackoff(() => model.generate(call), { maxRetries: 3 })
 * ```
 */
export async function retryWithExponentialBackoff<T>(
  fn: () => Promise<T>,
  options: Partial<RetryOptions> = {},
  signal?: AbortSignal
): Promise<T> {
  const controller = new RetryController({ ...DEFAULT_RETRY_OPTIONS, ...options }, signal)
  while (true) {
    try {
      return await fn()
    } catch (error) {
      await controller.handleFailure(error)
    }
  }
}

/**
 * Generator form of {@link retryWithExponentialBackoff}.
 *
 * Each attempt delegates to a fresh generator from `fn`. Items an attempt yielded
 * before it failed have already reached the consumer; the next attempt starts over.
 *
 * @param fn - Creates the generator for one attempt
 * @param options - Retry policy, merged over {@link DEFAULT_RETRY_OPTIONS}
 * @param signal - Aborts waiting between attempts
 * @returns The return value of the first attempt that completes
 */
export async function* retryGeneratorWithExponentialBackoff<Y, R>(
  fn: () => AsyncGenerator<Y, R, undefined>,
  options: Partial<RetryOptions> = {},
  signal?: AbortSignal
): AsyncGenerator<Y, R, undefined> {
  const controller = new RetryController({ ...DEFAULT_RETRY_OPTIONS, ...options }, signal)
  while (true) {
    try {
      return yield* fn()
    } catch (error) {
      await controller.handleFailure(error)
    }
  }
}

function lowerCaseKeys(headers: Record<string, string>): Record<string, string> {
  const result: Record<string, string> = {}
  for (const [key, value] of Object.entries(headers)) {
    result[key.toLowerCase()] = value
  }
  return result
}
