import { describe, expect, it } from 'vitest'
import { FormatDetector } from './FormatDetector'
import { EpubParser } from './EpubParser'
import { formatDetector } from './index'

describe('FormatDetector', () => {
  it('should pick a parser by file extension, ignoring case', () => {
    const detector = new FormatDetector()
    const epub = new EpubParser()
    detector.registerParser(epub)

    expect(detector.detectParser('/books/Novel.EPUB')).toBe(epub)
    expect(detector.detectParser('/books/notes.pdf')).toBeNull()
    expect(detector.detectParser('/books/README')).toBeNull()
  })

  it('should list registered formats', () => {
    expect(formatDetector.getSupportedExtensions()).toEqual(['.epub'])
    expect(formatDetector.getSupportedFormats()).toEqual(['EPUB'])
  })
})
