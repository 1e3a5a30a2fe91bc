/**
 * Error taxonomy and classification for the sync engine.
 *
 * Thrown errors are classified into categories that map to operational
 * responses: retry next attempt, skip the record, abort the cycle.
 * Ambiguous matches are a MatchResult, never an error.
 */

import { ZodError } from 'zod'

export type ExternalService = 'retailer' | 'beerdb'

export type SyncStage = 'pulling' | 'diffing' | 'matching' | 'persisting'

// ═══════════════════════════════════════════════════════════════════════════════
// Error classes
// ═══════════════════════════════════════════════════════════════════════════════

interface ExternalErrorOptions {
  status?: number
  code?: string
  cause?: unknown
}

/**
 * Network failure, timeout, 5xx or 429 from an upstream. Retried with backoff;
 * never interpreted as a negative match.
 */
export class TransientExternalError extends Error {
  readonly service: ExternalService
  readonly status?: number
  readonly code?: string

  constructor(service: ExternalService, message: string, options: ExternalErrorOptions = {}) {
    super(message, { cause: options.cause })
    this.name = 'TransientExternalError'
    this.service = service
    this.status = options.status
    this.code = options.code
  }
}

/**
 * Per-call timeout. Retryable like any other transient failure.
 */
export class CallTimeoutError extends TransientExternalError {
  readonly timeoutMs: number

  constructor(service: ExternalService, timeoutMs: number) {
    super(service, `${service} call timed out after ${timeoutMs}ms`, { code: 'ETIMEDOUT' })
    this.name = 'CallTimeoutError'
    this.timeoutMs = timeoutMs
  }
}

/**
 * Upstream refused the request (4xx other than 404/429). Not retried.
 */
export class ExternalRequestError extends Error {
  readonly service: ExternalService
  readonly status: number

  constructor(service: ExternalService, status: number, message: string) {
    super(message)
    this.name = 'ExternalRequestError'
    this.service = service
    this.status = status
  }
}

/**
 * Malformed upstream record. The record is skipped and the cycle continues.
 */
export class DataShapeError extends Error {
  readonly service: ExternalService
  readonly recordId?: string
  readonly issues: string[]

  constructor(service: ExternalService, message: string, issues: string[] = [], recordId?: string) {
    super(message)
    this.name = 'DataShapeError'
    this.service = service
    this.issues = issues
    this.recordId = recordId
  }
}

/**
 * Invariant breach (e.g. two writes for one product in a cycle batch).
 * Fatal to the cycle: nothing is committed and an alert is logged.
 */
export class ConsistencyViolation extends Error {
  readonly details: Record<string, unknown>

  constructor(message: string, details: Record<string, unknown> = {}) {
    super(message)
    this.name = 'ConsistencyViolation'
    this.details = details
  }
}

export class CycleCancelledError extends Error {
  readonly cycleId: string
  readonly stage: SyncStage

  constructor(cycleId: string, stage: SyncStage) {
    super(`Cycle ${cycleId} cancelled before ${stage}`)
    this.name = 'CycleCancelledError'
    this.cycleId = cycleId
    this.stage = stage
  }
}

export class StageFailedError extends Error {
  readonly cycleId: string
  readonly stage: SyncStage

  constructor(cycleId: string, stage: SyncStage, cause: unknown) {
    super(`Cycle ${cycleId} failed in ${stage}: ${errorMessage(cause)}`, { cause })
    this.name = 'StageFailedError'
    this.cycleId = cycleId
    this.stage = stage
  }
}

/**
 * Read API lookup of an unknown product, correction or cycle.
 */
export class NotFoundError extends Error {
  readonly resource: string
  readonly id: string

  constructor(resource: string, id: string) {
    super(`${resource} ${id} not found`)
    this.name = 'NotFoundError'
    this.resource = resource
    this.id = id
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// Classification
// ═══════════════════════════════════════════════════════════════════════════════

export type ErrorCategory =
  | 'external' // Upstream unavailable or failing
  | 'timeout'
  | 'rate_limit'
  | 'rejected' // Upstream refused the request
  | 'data_shape' // Upstream record failed validation
  | 'validation' // Local input or configuration failed validation
  | 'consistency'
  | 'cancelled'
  | 'not_found'
  | 'internal'

export interface ClassifiedError {
  category: ErrorCategory
  code: string
  message: string
  isRetryable: boolean
  details?: Record<string, unknown>
  originalError?: Error
}

export const ERROR_CODES = {
  EXTERNAL_SERVICE_ERROR: 'EXTERNAL_SERVICE_ERROR',
  EXTERNAL_REJECTED: 'EXTERNAL_REJECTED',
  EXTERNAL_TIMEOUT: 'EXTERNAL_TIMEOUT',
  NETWORK_ERROR: 'NETWORK_ERROR',
  RATE_LIMIT_EXCEEDED: 'RATE_LIMIT_EXCEEDED',
  MALFORMED_RECORD: 'MALFORMED_RECORD',
  VALIDATION_FAILED: 'VALIDATION_FAILED',
  CONSISTENCY_VIOLATION: 'CONSISTENCY_VIOLATION',
  CYCLE_CANCELLED: 'CYCLE_CANCELLED',
  STAGE_FAILED: 'STAGE_FAILED',
  NOT_FOUND: 'NOT_FOUND',
  OPERATION_TIMEOUT: 'OPERATION_TIMEOUT',
  UNEXPECTED_ERROR: 'UNEXPECTED_ERROR',
} as const

const NETWORK_ERROR_CODES = [
  'ECONNREFUSED',
  'ECONNRESET',
  'ENOTFOUND',
  'ETIMEDOUT',
  'EPIPE',
  'EHOSTUNREACH',
  'ENETUNREACH',
  'EAI_AGAIN',
  'UND_ERR_CONNECT_TIMEOUT',
  'UND_ERR_SOCKET',
]

export function classifyError(error: unknown): ClassifiedError {
  if (error instanceof ZodError) {
    return {
      category: 'validation',
      code: ERROR_CODES.VALIDATION_FAILED,
      message: 'Validation failed',
      isRetryable: false,
      details: {
        issues: error.issues.map((issue) => ({
          path: issue.path.join('.'),
          message: issue.message,
          code: issue.code,
        })),
      },
      originalError: error,
    }
  }

  if (error instanceof StageFailedError) {
    const inner = classifyError(error.cause)
    return {
      ...inner,
      code: ERROR_CODES.STAGE_FAILED,
      message: error.message,
      details: { ...inner.details, stage: error.stage, cycleId: error.cycleId, causeCode: inner.code },
      originalError: error,
    }
  }

  if (error instanceof CallTimeoutError) {
    return {
      category: 'timeout',
      code: ERROR_CODES.EXTERNAL_TIMEOUT,
      message: error.message,
      isRetryable: true,
      details: { service: error.service, timeoutMs: error.timeoutMs },
      originalError: error,
    }
  }

  if (error instanceof TransientExternalError) {
    const rateLimited = error.status === 429
    return {
      category: rateLimited ? 'rate_limit' : 'external',
      code: rateLimited ? ERROR_CODES.RATE_LIMIT_EXCEEDED : ERROR_CODES.EXTERNAL_SERVICE_ERROR,
      message: error.message,
      isRetryable: true,
      details: compactDetails({ service: error.service, status: error.status, errorCode: error.code }),
      originalError: error,
    }
  }

  if (error instanceof ExternalRequestError) {
    return {
      category: 'rejected',
      code: ERROR_CODES.EXTERNAL_REJECTED,
      message: error.message,
      isRetryable: false,
      details: { service: error.service, status: error.status },
      originalError: error,
    }
  }

  if (error instanceof DataShapeError) {
    return {
      category: 'data_shape',
      code: ERROR_CODES.MALFORMED_RECORD,
      message: error.message,
      isRetryable: false,
      details: compactDetails({ service: error.service, recordId: error.recordId, issues: error.issues }),
      originalError: error,
    }
  }

  if (error instanceof ConsistencyViolation) {
    return {
      category: 'consistency',
      code: ERROR_CODES.CONSISTENCY_VIOLATION,
      message: error.message,
      isRetryable: false,
      details: error.details,
      originalError: error,
    }
  }

  if (error instanceof CycleCancelledError) {
    return {
      category: 'cancelled',
      code: ERROR_CODES.CYCLE_CANCELLED,
      message: error.message,
      isRetryable: false,
      details: { cycleId: error.cycleId, stage: error.stage },
      originalError: error,
    }
  }

  if (error instanceof NotFoundError) {
    return {
      category: 'not_found',
      code: ERROR_CODES.NOT_FOUND,
      message: error.message,
      isRetryable: false,
      details: { resource: error.resource, id: error.id },
      originalError: error,
    }
  }

  if (error instanceof Error) {
    return classifyNetworkError(error) ?? {
      category: 'internal',
      code: ERROR_CODES.UNEXPECTED_ERROR,
      message: error.message || 'An unexpected error occurred',
      isRetryable: false,
      originalError: error,
    }
  }

  return {
    category: 'internal',
    code: ERROR_CODES.UNEXPECTED_ERROR,
    message: String(error),
    isRetryable: false,
  }
}

/**
 * Node network error codes and timeout wording in plain Errors
 * (fetch failures surface as TypeError with a coded cause).
 */
function classifyNetworkError(error: Error): ClassifiedError | null {
  const code = errorCode(error) ?? errorCode(error.cause)

  if (code && NETWORK_ERROR_CODES.includes(code)) {
    const isTimeout = code === 'ETIMEDOUT' || code === 'UND_ERR_CONNECT_TIMEOUT'
    return {
      category: isTimeout ? 'timeout' : 'external',
      code: isTimeout ? ERROR_CODES.EXTERNAL_TIMEOUT : ERROR_CODES.NETWORK_ERROR,
      message: `Network error: ${code}`,
      isRetryable: true,
      details: { errorCode: code },
      originalError: error,
    }
  }

  const message = error.message.toLowerCase()
  if (error.name === 'AbortError' || message.includes('timeout') || message.includes('timed out')) {
    return {
      category: 'timeout',
      code: ERROR_CODES.OPERATION_TIMEOUT,
      message: error.message,
      isRetryable: true,
      originalError: error,
    }
  }

  if (error.name === 'TypeError' && message === 'fetch failed') {
    return {
      category: 'external',
      code: ERROR_CODES.NETWORK_ERROR,
      message: error.message,
      isRetryable: true,
      originalError: error,
    }
  }

  return null
}

function errorCode(value: unknown): string | undefined {
  if (typeof value === 'object' && value !== null && 'code' in value && typeof value.code === 'string') {
    return value.code
  }
  return undefined
}

function compactDetails(details: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(Object.entries(details).filter(([, v]) => v !== undefined))
}

export function isRetryableError(error: unknown): boolean {
  return classifyError(error).isRetryable
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}

/**
 * Flatten a classified error into log fields.
 */
export function formatErrorForLog(classified: ClassifiedError): Record<string, unknown> {
  return {
    error_category: classified.category,
    error_code: classified.code,
    error_message: classified.message,
    error_is_retryable: classified.isRetryable,
    ...(classified.details && { error_details: classified.details }),
    ...(classified.originalError && {
      error_name: classified.originalError.name,
    }),
  }
}
