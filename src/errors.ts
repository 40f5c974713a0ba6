/**
 * Error taxonomy for the reading pipeline.
 *
 * Structural archive problems (ArchiveError, ManifestError, SpineError) abort
 * opening a book. ContentError is contained to one chapter, BoundaryError is an
 * expected navigation signal and StateError never blocks reading.
 */
export abstract class ReaderError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = new.target.name
  }
}

/**
 * The container could not be opened or read (missing file, not a zip,
 * unsupported format, parse timeout)
 */
export class ArchiveError extends ReaderError {}

/**
 * The package document is missing or malformed
 */
export class ManifestError extends ReaderError {}

/**
 * The spine references an item absent from the manifest
 */
export class SpineError extends ReaderError {
  constructor(
    public readonly idref: string,
    message = `Spine references unknown manifest item "${idref}"`
  ) {
    super(message)
  }
}

/**
 * One chapter's markup could not be turned into paragraphs
 */
export class ContentError extends ReaderError {
  constructor(
    message: string,
    public readonly href?: string,
    options?: { cause?: unknown }
  ) {
    super(message, options)
  }
}

export type Boundary = 'start' | 'end'

/**
 * Navigation cannot proceed past the first or last page of the book
 */
export class BoundaryError extends ReaderError {
  constructor(public readonly boundary: Boundary, message?: string) {
    super(message ?? (boundary === 'start' ? 'Already at the beginning of the book' : 'Already at the end of the book'))
  }
}

/**
 * Reading state could not be read from or written to storage
 */
export class StateError extends ReaderError {}

/**
 * Format an unknown thrown value for a wrapping error message
 */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}
