import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { ReaderSession } from './ReaderSession'
import { resolveReaderConfig } from '@/config/ReaderConfig'
import type { ReaderConfigOverrides } from '@/config/types'
import { StateStoreMock } from '@/db/StateStoreMock'
import { ArchiveError, BoundaryError } from '@/errors'
import { createTestEpub, makeBook, makeChapter, numberedChapter, para, writeTempEpub } from '@/parser/test-helpers'

// Padding off and no reserved rows: the viewport is the text area
const configFor = (overrides: ReaderConfigOverrides = {}) =>
  resolveReaderConfig({
    statePath: '/unused/state.json',
    layout: { responsivePadding: false, fallbackPaddingX: 0, reservedRows: 0, minTextWidth: 1 },
    ...overrides,
    style: { paragraphSpacing: 0, headingSpacing: 0, ...overrides.style },
  })

const viewport = { columns: 40, rows: 20 }

describe('ReaderSession', () => {
  // Chapter pages at 20 rows: [20, 10], [20, 20, 10], [5]
  const book = makeBook([numberedChapter(0, 30), numberedChapter(1, 50), numberedChapter(2, 5)])
  let store: StateStoreMock

  beforeEach(() => {
    store = new StateStoreMock()
  })

  afterEach(() => {
    vi.restoreAllMocks()
  })

  const open = (overrides: ReaderConfigOverrides = {}) =>
    ReaderSession.fromBook(book, viewport, { config: configFor(overrides), store, now: () => 1234 })

  describe('opening', () => {
    it('should start at the beginning of a book never read', async () => {
      const session = await open()

      expect(session.position).toEqual({ chapterIndex: 0, paragraphIndex: 0, wordOffset: 0 })
      expect(session.currentPage().lines).toHaveLength(20)
      expect(session.currentPage().lines[0]?.text).toBe('Line 1')
      expect(session.status()).toEqual({
        bookTitle: 'Test Book',
        author: 'Test Author',
        chapterIndex: 0,
        chapterCount: 3,
        chapterTitle: 'Chapter 1',
        pageNumber: 1,
        pageCount: 2,
        chapterProgress: 0,
        bookProgress: 0,
        position: { chapterIndex: 0, paragraphIndex: 0, wordOffset: 0 },
      })
    })

    it('should restore the saved position', async () => {
      await store.save({
        bookId: 'test-book',
        position: { chapterIndex: 1, paragraphIndex: 45, wordOffset: 0 },
        history: [],
        bookmarks: [],
        lastOpened: 1,
      })

      const session = await open()

      expect(session.position).toEqual({ chapterIndex: 1, paragraphIndex: 45, wordOffset: 0 })
      expect(session.status().pageNumber).toBe(3)
      expect(session.currentPage().lines[5]?.text).toBe('Line 46')
    })

    it('should clamp a saved position that no longer fits the book', async () => {
      await store.save({
        bookId: 'test-book',
        position: { chapterIndex: 7, paragraphIndex: 100, wordOffset: 100 },
        history: [],
        bookmarks: [],
        lastOpened: 1,
      })

      const session = await open()

      expect(session.position).toEqual({ chapterIndex: 2, paragraphIndex: 4, wordOffset: 1 })
    })

    it('should start from the beginning with a warning when state cannot be loaded', async () => {
      const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined)
      store.fail('load')

      const session = await open()

      expect(session.position).toEqual({ chapterIndex: 0, paragraphIndex: 0, wordOffset: 0 })
      expect(warn).toHaveBeenCalledTimes(1)
    })
  })

  describe('page navigation', () => {
    it('should move the position to the first line of the new page', async () => {
      const session = await open()
      const result = session.nextPage()

      expect(result.moved).toBe(true)
      expect(session.position).toEqual({ chapterIndex: 0, paragraphIndex: 20, wordOffset: 0 })
      expect(session.currentPage().lines[0]?.text).toBe('Line 21')
    })

    it('should turn through every page and stop at the end', async () => {
      const session = await open()
      let moves = 0
      while (session.nextPage().moved) moves++

      expect(moves).toBe(5)
      expect(session.position).toEqual({ chapterIndex: 2, paragraphIndex: 0, wordOffset: 0 })

      const result = session.nextPage()
      expect(result.moved).toBe(false)
      if (!result.moved) {
        expect(result.error).toBeInstanceOf(BoundaryError)
        expect(result.error.boundary).toBe('end')
      }
    })

    it('should leave the position alone at the start boundary', async () => {
      const session = await open()
      const result = session.prevPage()

      expect(result.moved).toBe(false)
      expect(session.position).toEqual({ chapterIndex: 0, paragraphIndex: 0, wordOffset: 0 })
    })

    it('should jump between chapters, to the ends and by percentage', async () => {
      const session = await open()

      expect(session.goToChapter(5).moved).toBe(false)
      session.goToChapter(1)
      expect(session.position).toEqual({ chapterIndex: 1, paragraphIndex: 0, wordOffset: 0 })

      session.nextChapter()
      expect(session.status().chapterIndex).toBe(2)
      session.prevChapter()
      expect(session.status().chapterIndex).toBe(1)

      session.goToEnd()
      expect(session.position).toEqual({ chapterIndex: 2, paragraphIndex: 0, wordOffset: 0 })
      session.goToStart()
      expect(session.position).toEqual({ chapterIndex: 0, paragraphIndex: 0, wordOffset: 0 })

      // 170 words in all, so 50% is word 85: the "13" of "Line 13" in the second chapter
      session.goToPercent(50)
      expect(session.position).toEqual({ chapterIndex: 1, paragraphIndex: 12, wordOffset: 0 })
      expect(session.status().bookProgress).toBe(49)
    })
  })

  describe('history', () => {
    it('should go back from jumps but not from page turns', async () => {
      const session = await open()

      session.jumpTo({ chapterIndex: 1, paragraphIndex: 10, wordOffset: 0 })
      session.nextPage()
      expect(session.position).toEqual({ chapterIndex: 1, paragraphIndex: 20, wordOffset: 0 })

      expect(session.back().moved).toBe(true)
      expect(session.position).toEqual({ chapterIndex: 0, paragraphIndex: 0, wordOffset: 0 })

      const result = session.back()
      expect(result.moved).toBe(false)
      expect(session.canGoBack).toBe(false)
    })

    it('should keep only the most recent entries', async () => {
      const session = await open({ historyLimit: 2 })

      session.goToChapter(1)
      session.goToChapter(2)
      session.goToStart()

      expect(session.back().moved).toBe(true)
      expect(session.position).toEqual({ chapterIndex: 2, paragraphIndex: 0, wordOffset: 0 })
      expect(session.back().moved).toBe(true)
      expect(session.position).toEqual({ chapterIndex: 1, paragraphIndex: 0, wordOffset: 0 })
      expect(session.back().moved).toBe(false)
    })
  })

  describe('bookmarks', () => {
    it('should add, visit and remove bookmarks', async () => {
      const session = await open()
      session.jumpTo({ chapterIndex: 1, paragraphIndex: 20, wordOffset: 0 })

      const bookmark = session.addBookmark()
      expect(bookmark).toEqual({
        position: { chapterIndex: 1, paragraphIndex: 20, wordOffset: 0 },
        label: 'Chapter 2, page 2',
        createdAt: 1234,
      })

      session.goToStart()
      expect(session.goToBookmark(0).moved).toBe(true)
      expect(session.position).toEqual({ chapterIndex: 1, paragraphIndex: 20, wordOffset: 0 })

      expect(session.removeBookmark(0)).toBe(true)
      expect(session.removeBookmark(0)).toBe(false)
      expect(session.bookmarks).toEqual([])
      expect(session.goToBookmark(0).moved).toBe(false)
    })
  })

  describe('reflow', () => {
    const prose = makeBook(
      [
        makeChapter(
          0,
          Array.from({ length: 10 }, (_, i) =>
            para(`Paragraph ${i + 1} has a handful of words that wrap across several narrow lines`)
          )
        ),
      ],
      'prose-book'
    )

    it('should come back to the same page and line after a resize round trip', async () => {
      const session = await ReaderSession.fromBook(prose, { columns: 20, rows: 5 }, { config: configFor(), store })
      session.jumpTo({ chapterIndex: 0, paragraphIndex: 5, wordOffset: 6 })
      const position = session.position
      const page = session.currentPage()
      const pageNumber = session.status().pageNumber

      session.resize({ columns: 60, rows: 12 })
      expect(session.position).toEqual(position)
      expect(session.layout.style.width).toBe(60)

      session.resize({ columns: 20, rows: 5 })
      expect(session.position).toEqual(position)
      expect(session.currentPage()).toEqual(page)
      expect(session.status().pageNumber).toBe(pageNumber)
    })

    it('should apply style changes without moving the position', async () => {
      const session = await ReaderSession.fromBook(prose, { columns: 30, rows: 10 }, { config: configFor(), store })
      session.jumpTo({ chapterIndex: 0, paragraphIndex: 3, wordOffset: 0 })

      session.updateStyle({ indent: 2 })

      expect(session.layout.style.indent).toBe(2)
      expect(session.position).toEqual({ chapterIndex: 0, paragraphIndex: 3, wordOffset: 0 })
      expect(session.currentPage().lines.find((l) => l.position.paragraphIndex === 3)?.text).toBe(
        '  Paragraph 4 has a handful of'
      )
    })

    it('should keep the page after a round trip when heading spacing fills a page', async () => {
      const spaced = makeBook(
        [makeChapter(0, [para('Title', { kind: 'heading', level: 1 }), para('Opening line of the story')])],
        'spaced-book'
      )
      const config = configFor({ style: { headingSpacing: 3 } })
      const session = await ReaderSession.fromBook(spaced, { columns: 40, rows: 2 }, { config, store })

      session.nextPage()
      expect(session.status().pageNumber).toBe(2)
      expect(session.position).toEqual({ chapterIndex: 0, paragraphIndex: 1, wordOffset: 0 })

      session.resize({ columns: 20, rows: 2 })
      session.resize({ columns: 40, rows: 2 })
      expect(session.status().pageNumber).toBe(2)
      expect(session.currentPage().lines.map((l) => l.text)).toEqual(['Opening line of the story'])

      await session.close()
      const reopened = await ReaderSession.fromBook(spaced, { columns: 40, rows: 2 }, { config, store })
      expect(reopened.status().pageNumber).toBe(2)
    })

    it('should pad short final pages when filling to the next chapter', async () => {
      const session = await open({ fillToNextChapter: true })
      session.goToEnd()

      const lines = session.currentPage().lines
      expect(lines).toHaveLength(20)
      expect(lines.filter((l) => l.kind === 'padding')).toHaveLength(15)
    })
  })

  describe('saving', () => {
    it('should save position, history and bookmarks', async () => {
      const session = await open()
      session.goToChapter(1)
      session.addBookmark('Here')

      expect(await session.close()).toBe(true)
      expect(await store.load('test-book')).toEqual({
        bookId: 'test-book',
        position: { chapterIndex: 1, paragraphIndex: 0, wordOffset: 0 },
        history: [{ chapterIndex: 0, paragraphIndex: 0, wordOffset: 0 }],
        bookmarks: [{ position: { chapterIndex: 1, paragraphIndex: 0, wordOffset: 0 }, label: 'Here', createdAt: 1234 }],
        lastOpened: 1234,
      })
    })

    it('should not write state while navigating', async () => {
      const session = await open()
      session.nextPage()
      session.goToEnd()

      expect(store.saveCount).toBe(0)
    })

    it('should report a failed save without throwing', async () => {
      const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined)
      const session = await open()
      store.fail('save')

      expect(await session.save()).toBe(false)
      expect(warn).toHaveBeenCalledTimes(1)
    })
  })

  describe('open', () => {
    it('should parse the file and open at the start', async () => {
      const epub = await createTestEpub([
        { title: 'Arrival', content: '<p>The ship came in at dawn.</p>' },
        { title: 'Departure', content: '<p>It left again at dusk.</p>' },
      ])
      const path = await writeTempEpub(epub)

      const session = await ReaderSession.open(path, viewport, { config: configFor(), store })

      expect(session.book.path).toBe(path)
      expect(session.currentPage().lines.map((l) => l.text)).toEqual(['Arrival', 'The ship came in at dawn.'])
      expect(session.status().chapterTitle).toBe('Arrival')
    })

    it('should reject unsupported formats', async () => {
      await expect(ReaderSession.open('/books/notes.txt', viewport, { config: configFor(), store })).rejects.toBeInstanceOf(
        ArchiveError
      )
    })
  })
})
