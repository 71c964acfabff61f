/**
 * Sector Search Errors
 *
 * Every validation failure surfaces synchronously as a SectorSearchError,
 * before any processing starts.
 */

import type { ZodError } from 'zod'
import { sectorKeywords } from './keywords'
import type { SectorSearchErrorCode } from './keywords'

export class SectorSearchError extends Error {
  readonly code: SectorSearchErrorCode
  readonly issues: Array<string>

  constructor(
    code: SectorSearchErrorCode,
    message: string,
    issues: Array<string> = [],
  ) {
    super(message)
    this.name = 'SectorSearchError'
    this.code = code
    this.issues = issues
  }
}

/**
 * Format zod issues as `path: message` (path omitted at the root)
 */
export function formatIssues(error: ZodError): Array<string> {
  return error.issues.map((issue) =>
    issue.path.length > 0
      ? `${issue.path.join('.')}: ${issue.message}`
      : issue.message,
  )
}

/**
 * Wrap a failed schema parse as an invalid-argument error
 */
export function invalidArgument(
  subject: string,
  error: ZodError,
): SectorSearchError {
  const issues = formatIssues(error)
  return new SectorSearchError(
    sectorKeywords.errorCodes.invalidArgument,
    `Invalid ${subject}: ${issues.join(', ')}`,
    issues,
  )
}

export function isSectorSearchError(error: unknown): error is SectorSearchError {
  return error instanceof SectorSearchError
}
