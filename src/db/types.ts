// Type definitions for persisted reading state

import type { ReadingPosition } from '@/reader/positions'

export interface Bookmark {
  position: ReadingPosition
  label: string
  createdAt: number
}

export interface ReaderState {
  bookId: string
  position: ReadingPosition
  history: ReadingPosition[]  // most recent last
  bookmarks: Bookmark[]
  lastOpened: number          // epoch milliseconds
}

/**
 * One book's entry in the state file. Position fields sit at the top level;
 * anything else found in an entry is carried through untouched.
 */
export interface StoredEntry {
  chapterIndex: number
  paragraphIndex: number
  wordOffset: number
  lastOpened: number
  history?: ReadingPosition[]
  bookmarks?: Array<ReadingPosition & { label: string; createdAt: number }>
  [extra: string]: unknown
}

export interface StateFile {
  version: number
  books: Record<string, unknown>  // entries are validated on load
}

export const STATE_FILE_VERSION = 1
