import { extname } from 'node:path'
import { ArchiveError, BoundaryError, StateError } from '@/errors'
import { computeViewportLayout, resolveReaderConfig } from '@/config/ReaderConfig'
import type { ReaderConfig, StyleOptions, ViewportConfig } from '@/config/types'
import { StateStore } from '@/db/StateStore'
import type { IStateStore } from '@/db/IStateStore'
import type { Bookmark, ReaderState } from '@/db/types'
import { formatDetector } from '@/parser'
import type { IFormatParser } from '@/parser/IFormatParser'
import type { Book, ParseProgress } from '@/parser/types'
import { PageNavigator } from './PageNavigator'
import type { NavigationResult, NavigatorLayout, PageCursor } from './PageNavigator'
import type { Page } from './Paginator'
import { START_POSITION, clampPosition } from './positions'
import type { ReadingPosition } from './positions'
import { progressHelper } from './ProgressHelper'

export interface SessionOptions {
  config?: ReaderConfig
  store?: IStateStore
  parser?: IFormatParser
  onProgress?: (progress: ParseProgress) => void
  now?: () => number
}

export interface ReaderStatus {
  bookTitle: string
  author: string
  chapterIndex: number
  chapterCount: number
  chapterTitle: string
  pageNumber: number        // 1-based within the chapter
  pageCount: number
  chapterProgress: number   // whole percent, page based
  bookProgress: number      // whole percent, word based
  position: ReadingPosition
}

/**
 * ReaderSession - One open book: layout, position, history and bookmarks
 *
 * The reading position is the only durable coordinate. Navigation moves it
 * to the landing line's back-mapping; a resize or style change re-derives the
 * pages and re-locates the position without rewriting it. State is written
 * only by save() and close().
 */
export class ReaderSession {
  private cursor: PageCursor
  private history: ReadingPosition[]
  private marks: Bookmark[]
  private viewport: ViewportConfig

  private constructor(
    readonly book: Book,
    private config: ReaderConfig,
    private store: IStateStore,
    private navigator: PageNavigator,
    private current: ReadingPosition,
    viewport: ViewportConfig,
    saved: ReaderState | undefined,
    private now: () => number
  ) {
    this.viewport = viewport
    this.history = (saved?.history ?? []).map((position) => clampPosition(position, book.chapters))
    this.marks = (saved?.bookmarks ?? []).map((bookmark) => ({
      ...bookmark,
      position: clampPosition(bookmark.position, book.chapters),
    }))
    this.trimHistory()
    this.cursor = navigator.locate(current)
  }

  /**
   * Parse a book file and restore its saved position
   * @throws ArchiveError | ManifestError | SpineError when the book cannot be opened
   */
  static async open(path: string, viewport: ViewportConfig, options: SessionOptions = {}): Promise<ReaderSession> {
    const config = options.config ?? resolveReaderConfig()
    const parser = options.parser ?? formatDetector.detectParser(path)
    if (!parser) {
      throw new ArchiveError(`Unsupported book format "${extname(path) || path}"`)
    }

    const book = await parser.parse(path, { onProgress: options.onProgress, timeoutMs: config.parseTimeoutMs })
    return ReaderSession.fromBook(book, viewport, { ...options, config })
  }

  /**
   * Open a session over an already-parsed book
   */
  static async fromBook(book: Book, viewport: ViewportConfig, options: SessionOptions = {}): Promise<ReaderSession> {
    const config = options.config ?? resolveReaderConfig()
    const store = options.store ?? new StateStore(config.statePath)
    const saved = await loadState(store, book.id)
    const position = clampPosition(saved?.position ?? START_POSITION, book.chapters)
    const navigator = new PageNavigator(book, navigatorLayout(viewport, config))

    return new ReaderSession(book, config, store, navigator, position, viewport, saved, options.now ?? Date.now)
  }

  get position(): ReadingPosition {
    return { ...this.current }
  }

  get bookmarks(): Bookmark[] {
    return this.marks.map((bookmark) => ({ ...bookmark, position: { ...bookmark.position } }))
  }

  get canGoBack(): boolean {
    return this.history.length > 0
  }

  get layout(): NavigatorLayout {
    return this.navigator.currentLayout
  }

  currentPage(): Page {
    return this.navigator.page(this.cursor)
  }

  status(): ReaderStatus {
    const { chapterIndex, pageIndex } = this.cursor
    const pageCount = this.navigator.pages(chapterIndex).length

    return {
      bookTitle: this.book.metadata.title,
      author: this.book.metadata.author,
      chapterIndex,
      chapterCount: this.book.chapters.length,
      chapterTitle: this.book.chapters[chapterIndex]?.title ?? '',
      pageNumber: pageIndex + 1,
      pageCount,
      chapterProgress: progressHelper.calculateChapterProgress(pageIndex, pageCount),
      bookProgress: Math.floor(progressHelper.calculateProgress(this.book.chapters, this.current)),
      position: this.position,
    }
  }

  nextPage(): NavigationResult {
    return this.commit(this.navigator.nextPage(this.cursor), false)
  }

  prevPage(): NavigationResult {
    return this.commit(this.navigator.prevPage(this.cursor), false)
  }

  nextChapter(): NavigationResult {
    return this.commit(this.navigator.nextChapter(this.cursor), true)
  }

  prevChapter(): NavigationResult {
    return this.commit(this.navigator.prevChapter(this.cursor), true)
  }

  goToChapter(chapterIndex: number): NavigationResult {
    return this.commit(this.navigator.chapter(chapterIndex), true)
  }

  goToStart(): NavigationResult {
    return this.commit(this.navigator.first(), true)
  }

  goToEnd(): NavigationResult {
    return this.commit(this.navigator.last(), true)
  }

  /**
   * Jump to the position a percentage of the way through the book's words
   */
  goToPercent(percent: number): NavigationResult {
    const target = progressHelper.findPositionFromProgress(this.book.chapters, percent)
    return this.commit(this.navigator.jumpTo(target), true)
  }

  jumpTo(position: ReadingPosition): NavigationResult {
    return this.commit(this.navigator.jumpTo(position), true)
  }

  /**
   * Return to the position held before the most recent jump
   */
  back(): NavigationResult {
    const previous = this.history.pop()
    if (!previous) {
      return { moved: false, error: new BoundaryError('start', 'No earlier position to go back to') }
    }
    return this.commit(this.navigator.jumpTo(previous), false)
  }

  goToBookmark(index: number): NavigationResult {
    const bookmark = this.marks[index]
    if (!bookmark) {
      return { moved: false, error: new BoundaryError(index < 0 ? 'start' : 'end', `No bookmark at index ${index}`) }
    }
    return this.commit(this.navigator.jumpTo(bookmark.position), true)
  }

  /**
   * Bookmark the current position
   * @param label - Defaults to the chapter title and page
   */
  addBookmark(label?: string): Bookmark {
    const { chapterTitle, pageNumber } = this.status()
    const bookmark: Bookmark = {
      position: this.position,
      label: label ?? `${chapterTitle || `Chapter ${this.cursor.chapterIndex + 1}`}, page ${pageNumber}`,
      createdAt: this.now(),
    }
    this.marks.push(bookmark)
    return { ...bookmark, position: { ...bookmark.position } }
  }

  removeBookmark(index: number): boolean {
    if (index < 0 || index >= this.marks.length) return false
    this.marks.splice(index, 1)
    return true
  }

  /**
   * Re-derive pages for a new terminal size. The position is re-located, not changed.
   */
  resize(viewport: ViewportConfig): void {
    this.viewport = viewport
    this.relayout()
  }

  /**
   * Re-derive pages for a new style. Invalid values keep their defaults.
   */
  updateStyle(style: Partial<StyleOptions>): void {
    const resolved = resolveReaderConfig({ style: { ...this.config.style, ...style } })
    this.config = { ...this.config, style: resolved.style }
    this.relayout()
  }

  /**
   * Persist position, history and bookmarks
   * @returns false when the store failed; the failure is logged, not thrown
   */
  async save(): Promise<boolean> {
    const state: ReaderState = {
      bookId: this.book.id,
      position: this.position,
      history: this.history.map((position) => ({ ...position })),
      bookmarks: this.bookmarks,
      lastOpened: this.now(),
    }

    try {
      await this.store.save(state)
      return true
    } catch (error) {
      if (!(error instanceof StateError)) {
        throw error
      }
      console.warn(`Failed to save reading state for "${this.book.metadata.title}"`, error)
      return false
    }
  }

  async close(): Promise<boolean> {
    return this.save()
  }

  private relayout(): void {
    this.navigator.reflow(navigatorLayout(this.viewport, this.config))
    this.cursor = this.navigator.locate(this.current)
  }

  private commit(result: NavigationResult, recordHistory: boolean): NavigationResult {
    if (!result.moved) {
      return result
    }

    if (recordHistory) {
      this.history.push(this.position)
      this.trimHistory()
    }
    this.cursor = result.cursor
    this.current = result.position
    return result
  }

  private trimHistory(): void {
    const overflow = this.history.length - this.config.historyLimit
    if (overflow > 0) {
      this.history.splice(0, overflow)
    }
  }
}

function navigatorLayout(viewport: ViewportConfig, config: ReaderConfig): NavigatorLayout {
  const { style, pageHeight } = computeViewportLayout(viewport, config)
  return { style, pageHeight, fillToNextChapter: config.fillToNextChapter }
}

async function loadState(store: IStateStore, bookId: string): Promise<ReaderState | undefined> {
  try {
    return await store.load(bookId)
  } catch (error) {
    if (!(error instanceof StateError)) {
      throw error
    }
    console.warn('Could not load reading state; starting from the beginning', error)
    return undefined
  }
}
