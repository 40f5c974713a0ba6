import type { Book, ParseOptions } from './types'

/**
 * Interface for e-book format parsers
 * Allows further formats to be registered beside EPUB
 */
export interface IFormatParser {
  /**
   * Parse a book from a file on disk
   * @param path - Path to the book file
   * @param options - Progress callback and optional timeout
   * @returns Book with metadata and chapters in reading order
   */
  parse(path: string, options?: ParseOptions): Promise<Book>

  /**
   * Parse a book already held in memory
   * @param data - Raw book file contents
   * @param options - Progress callback and optional timeout
   */
  parseBuffer(data: Uint8Array, options?: ParseOptions): Promise<Book>

  /**
   * Get file extensions supported by this parser
   * @returns Array of extensions (e.g., ['.epub'])
   */
  getSupportedExtensions(): string[]

  /**
   * Get human-readable format name
   * @returns Format name (e.g., 'EPUB')
   */
  getFormatName(): string
}
