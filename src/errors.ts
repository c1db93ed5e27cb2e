/**
 * Structured Error Utilities
 * All API errors use a consistent { error: { code, message, details? } } shape.
 */
import type { PipelineStage } from './types.js'

export interface ErrorBody {
  error: {
    code: string
    message: string
    details?: Record<string, unknown>
  }
}

export function errorResponse(
  code: string,
  message: string,
  details?: Record<string, unknown>,
): ErrorBody {
  const body: ErrorBody = { error: { code, message } }
  if (details) body.error.details = details
  return body
}

export class AppError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    public readonly statusCode: 400 | 404 | 409 | 500 = 400,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message)
    this.name = 'AppError'
  }

  toJSON(): ErrorBody {
    return errorResponse(this.code, this.message, this.details)
  }
}

/**
 * A condition that aborts a whole pipeline run. Carries the stage so the
 * operator can tell where it happened.
 */
export class PipelineError extends AppError {
  constructor(
    public readonly stage: PipelineStage,
    code: string,
    message: string,
  ) {
    super(code, message, 500, { stage })
    this.name = 'PipelineError'
  }
}

/** Discoverable error codes for API consumers and run reports */
export const ErrorCodes = {
  // Generic
  NOT_FOUND: 'not_found',
  INTERNAL_ERROR: 'internal_error',
  BODY_TOO_LARGE: 'body_too_large',
  INVALID_QUERY: 'invalid_query',

  // Wallet lookups
  INVALID_WALLET: 'invalid_wallet',
  WALLET_NOT_FOUND: 'wallet_not_found',
  NO_SCORES: 'no_scores',

  // Runs
  INVALID_RUN_ID: 'invalid_run_id',
  RUN_NOT_FOUND: 'run_not_found',
  RUN_IN_PROGRESS: 'run_in_progress',

  // Pipeline taxonomy
  MALFORMED_RECORD: 'malformed_record',
  UNREADABLE_INPUT: 'unreadable_input',
  DEGENERATE_POPULATION: 'degenerate_population',
  MISSING_FEATURE_VECTOR: 'missing_feature_vector',
  NON_FINITE_SCORE: 'non_finite_score',
} as const
