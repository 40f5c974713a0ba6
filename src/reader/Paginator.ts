import type { DisplayLine } from '@/layout/types'
import { comparePositions } from './positions'
import type { ReadingPosition } from './positions'

export interface Page {
  chapterIndex: number
  index: number         // 0-based within the chapter
  lines: DisplayLine[]
}

export interface PaginateOptions {
  chapterIndex: number
  fillToNextChapter?: boolean  // pad the final page up to the full height
}

export interface PageLocation {
  pageIndex: number
  lineOffset: number
}

/**
 * Paginator - Slice a chapter's display lines into viewport-sized pages
 */
export class Paginator {
  /**
   * Slice lines into pages of `height` lines. Only the final page may be
   * shorter, unless `fillToNextChapter` pads it with blank padding lines.
   * A chapter with no lines still has one (empty) page.
   *
   * Paragraph spacing that falls at the top of a page is dropped, so every
   * page opens on a line whose position locates back to that page.
   */
  paginate(lines: DisplayLine[], height: number, options: PaginateOptions): Page[] {
    const pageHeight = Math.max(1, Math.floor(height))
    const pages: Page[] = []
    let current: DisplayLine[] = []

    const flush = () => {
      pages.push({ chapterIndex: options.chapterIndex, index: pages.length, lines: current })
      current = []
    }

    for (const line of lines) {
      if (current.length === 0 && line.kind === 'spacing') continue
      current.push(line)
      if (current.length === pageHeight) flush()
    }
    if (current.length > 0) flush()

    if (pages.length === 0) {
      pages.push({ chapterIndex: options.chapterIndex, index: 0, lines: [] })
    }

    const last = pages[pages.length - 1]
    if (options.fillToNextChapter && last && last.lines.length < pageHeight) {
      last.lines = [...last.lines, ...this.padding(last.lines, pageHeight - last.lines.length, options.chapterIndex)]
    }

    return pages
  }

  /**
   * Find the page and line holding a position: the last real line that
   * starts at or before it, else the very first line.
   */
  locate(position: ReadingPosition, pages: Page[]): PageLocation {
    let found: PageLocation = { pageIndex: 0, lineOffset: 0 }

    for (const page of pages) {
      for (const [lineOffset, line] of page.lines.entries()) {
        if (line.kind === 'padding') continue
        if (comparePositions(line.position, position) > 0) {
          return found
        }
        found = { pageIndex: page.index, lineOffset }
      }
    }

    return found
  }

  private padding(lines: DisplayLine[], count: number, chapterIndex: number): DisplayLine[] {
    const anchor = lines[lines.length - 1]?.position ?? { chapterIndex, paragraphIndex: 0, wordOffset: 0 }

    return Array.from({ length: count }, (): DisplayLine => ({
      chapterIndex,
      text: '',
      kind: 'padding',
      position: { ...anchor },
      runs: [],
    }))
  }
}

// Singleton instance
export const paginator = new Paginator()
