/**
 * Error taxonomy for the job pipeline.
 *
 * ConfigurationError is raised at submission and never reaches a job.
 * EncodeError stays inside the transcode stage. The rest end a job.
 */

export type ErrorCode =
  | 'CONFIGURATION_ERROR'
  | 'ACQUISITION_ERROR'
  | 'ENCODE_ERROR'
  | 'ALL_ENCODES_FAILED'
  | 'PACKAGING_ERROR'
  | 'JOB_STATE_ERROR'
  | 'INTERNAL_ERROR'

export class AppError extends Error {
  readonly code: ErrorCode
  readonly httpStatus: number

  constructor(code: ErrorCode, message: string, httpStatus = 500, options?: { cause?: unknown }) {
    super(message, options)
    this.name = new.target.name
    this.code = code
    this.httpStatus = httpStatus
  }
}

export class ConfigurationError extends AppError {
  constructor(message: string) {
    super('CONFIGURATION_ERROR', message, 400)
  }
}

export class AcquisitionError extends AppError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('ACQUISITION_ERROR', message, 502, options)
  }
}

export class EncodeError extends AppError {
  readonly profileName: string
  readonly stderr: string

  constructor(profileName: string, stderr: string, options?: { cause?: unknown }) {
    super('ENCODE_ERROR', `Failed to create ${profileName}: ${stderr}`, 500, options)
    this.profileName = profileName
    this.stderr = stderr
  }
}

export class AllEncodesFailedError extends AppError {
  readonly attempted: string[]

  constructor(attempted: string[]) {
    super('ALL_ENCODES_FAILED', `All ${attempted.length} selected profile(s) failed to encode`, 500)
    this.attempted = attempted
  }
}

export class PackagingError extends AppError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('PACKAGING_ERROR', message, 500, options)
  }
}

export class JobStateError extends AppError {
  constructor(message: string) {
    super('JOB_STATE_ERROR', message, 500)
  }
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message
  return typeof err === 'string' ? err : 'Unknown error'
}

/** Normalise anything thrown inside a job into an AppError (unknown errors become INTERNAL_ERROR). */
export function toAppError(err: unknown): AppError {
  if (err instanceof AppError) return err
  return new AppError('INTERNAL_ERROR', errorMessage(err), 500, { cause: err })
}
