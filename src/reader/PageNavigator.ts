import { BoundaryError } from '@/errors'
import type { StyleConfig } from '@/config/types'
import { LineWrapper, lineWrapper } from '@/layout/LineWrapper'
import type { Book } from '@/parser/types'
import { Paginator, paginator } from './Paginator'
import type { Page } from './Paginator'
import { clampPosition } from './positions'
import type { ReadingPosition } from './positions'

export interface PageCursor {
  chapterIndex: number
  pageIndex: number
  lineOffset: number   // landing line within the page
}

export interface NavigatorLayout {
  style: StyleConfig
  pageHeight: number
  fillToNextChapter: boolean
}

export type NavigationResult =
  | { moved: true; cursor: PageCursor; position: ReadingPosition }
  | { moved: false; error: BoundaryError }

/**
 * PageNavigator - Page-level movement through a book under one layout
 *
 * Pages are derived per chapter on first use and cached until the next
 * reflow. Every move reports the landing cursor and the landing line's
 * back-mapped position; moving past either end of the book reports a
 * BoundaryError instead of throwing.
 */
export class PageNavigator {
  private cache = new Map<number, Page[]>()

  constructor(
    private book: Book,
    private layout: NavigatorLayout,
    private wrapper: LineWrapper = lineWrapper,
    private pager: Paginator = paginator
  ) {}

  /**
   * Number of chapters to navigate; a book without chapters still has one empty page
   */
  get chapterCount(): number {
    return Math.max(1, this.book.chapters.length)
  }

  get currentLayout(): NavigatorLayout {
    return this.layout
  }

  /**
   * Replace the layout and discard every derived page
   */
  reflow(layout: NavigatorLayout): void {
    this.layout = layout
    this.cache.clear()
  }

  /**
   * Pages of a chapter under the current layout
   */
  pages(chapterIndex: number): Page[] {
    const cached = this.cache.get(chapterIndex)
    if (cached) return cached

    const chapter = this.book.chapters[chapterIndex]
    const lines = chapter ? this.wrapper.wrap(chapter, this.layout.style) : []
    const pages = this.pager.paginate(lines, this.layout.pageHeight, {
      chapterIndex,
      fillToNextChapter: this.layout.fillToNextChapter,
    })

    this.cache.set(chapterIndex, pages)
    return pages
  }

  page(cursor: PageCursor): Page {
    const pages = this.pages(cursor.chapterIndex)
    return pages[cursor.pageIndex] ?? pages[pages.length - 1] ?? { chapterIndex: cursor.chapterIndex, index: 0, lines: [] }
  }

  /**
   * Back-mapped position of the cursor's landing line
   */
  positionAt(cursor: PageCursor): ReadingPosition {
    const page = this.page(cursor)
    const line = page.lines[cursor.lineOffset] ?? page.lines[0]
    return line ? { ...line.position } : { chapterIndex: cursor.chapterIndex, paragraphIndex: 0, wordOffset: 0 }
  }

  /**
   * Cursor for the page and line holding a position
   */
  locate(position: ReadingPosition): PageCursor {
    const target = clampPosition(position, this.book.chapters)
    const { pageIndex, lineOffset } = this.pager.locate(target, this.pages(target.chapterIndex))
    return { chapterIndex: target.chapterIndex, pageIndex, lineOffset }
  }

  nextPage(cursor: PageCursor): NavigationResult {
    if (cursor.pageIndex + 1 < this.pages(cursor.chapterIndex).length) {
      return this.land({ chapterIndex: cursor.chapterIndex, pageIndex: cursor.pageIndex + 1, lineOffset: 0 })
    }
    if (cursor.chapterIndex + 1 < this.chapterCount) {
      return this.land({ chapterIndex: cursor.chapterIndex + 1, pageIndex: 0, lineOffset: 0 })
    }
    return { moved: false, error: new BoundaryError('end') }
  }

  prevPage(cursor: PageCursor): NavigationResult {
    if (cursor.pageIndex > 0) {
      return this.land({ chapterIndex: cursor.chapterIndex, pageIndex: cursor.pageIndex - 1, lineOffset: 0 })
    }
    if (cursor.chapterIndex > 0) {
      return this.land(this.lastPageOf(cursor.chapterIndex - 1))
    }
    return { moved: false, error: new BoundaryError('start') }
  }

  nextChapter(cursor: PageCursor): NavigationResult {
    return this.chapter(cursor.chapterIndex + 1)
  }

  prevChapter(cursor: PageCursor): NavigationResult {
    return this.chapter(cursor.chapterIndex - 1)
  }

  /**
   * First page of a chapter
   */
  chapter(chapterIndex: number): NavigationResult {
    if (!Number.isInteger(chapterIndex) || chapterIndex < 0) {
      return { moved: false, error: new BoundaryError('start') }
    }
    if (chapterIndex >= this.chapterCount) {
      return { moved: false, error: new BoundaryError('end') }
    }
    return this.land({ chapterIndex, pageIndex: 0, lineOffset: 0 })
  }

  first(): NavigationResult {
    return this.land({ chapterIndex: 0, pageIndex: 0, lineOffset: 0 })
  }

  last(): NavigationResult {
    return this.land(this.lastPageOf(this.chapterCount - 1))
  }

  /**
   * Land on the line holding a position, deriving the chapter's pages if needed
   */
  jumpTo(position: ReadingPosition): NavigationResult {
    return this.land(this.locate(position))
  }

  private lastPageOf(chapterIndex: number): PageCursor {
    return { chapterIndex, pageIndex: this.pages(chapterIndex).length - 1, lineOffset: 0 }
  }

  private land(cursor: PageCursor): NavigationResult {
    return { moved: true, cursor, position: this.positionAt(cursor) }
  }
}
