import { extname } from 'node:path'
import type { IFormatParser } from './IFormatParser'

/**
 * Registry and detection system for book format parsers
 */
export class FormatDetector {
  private parsers: IFormatParser[] = []

  /**
   * Register a parser for use
   */
  registerParser(parser: IFormatParser): void {
    this.parsers.push(parser)
  }

  /**
   * Detect format from a file path and return the matching parser
   * @param path - Book file path
   * @returns Parser instance or null if no parser handles the extension
   */
  detectParser(path: string): IFormatParser | null {
    const extension = extname(path).toLowerCase()
    if (!extension) {
      return null
    }

    for (const parser of this.parsers) {
      const extensions = parser.getSupportedExtensions()
      if (extensions.some((ext) => ext.toLowerCase() === extension)) {
        return parser
      }
    }

    return null
  }

  /**
   * Get all supported file extensions
   */
  getSupportedExtensions(): string[] {
    return this.parsers.flatMap((p) => p.getSupportedExtensions())
  }

  /**
   * Get list of registered format names
   */
  getSupportedFormats(): string[] {
    return this.parsers.map((p) => p.getFormatName())
  }
}
