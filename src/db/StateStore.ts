import { mkdir, readFile, rename, rm, writeFile } from 'node:fs/promises'
import { dirname } from 'node:path'
import { StateError, describeError } from '@/errors'
import { START_POSITION } from '@/reader/positions'
import type { ReadingPosition } from '@/reader/positions'
import type { IStateStore } from './IStateStore'
import { STATE_FILE_VERSION } from './types'
import type { Bookmark, ReaderState, StateFile, StoredEntry } from './types'

type StateFileRead =
  | { kind: 'missing' }
  | { kind: 'corrupt'; reason: string }
  | { kind: 'ok'; file: StateFile; raw: Record<string, unknown> }

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT'
}

function count(value: unknown): number {
  return typeof value === 'number' && Number.isInteger(value) && value >= 0 ? value : 0
}

function timestamp(value: unknown): number {
  return typeof value === 'number' && Number.isFinite(value) && value >= 0 ? value : 0
}

export function defaultState(bookId: string): ReaderState {
  return { bookId, position: { ...START_POSITION }, history: [], bookmarks: [], lastOpened: 0 }
}

function decodePosition(raw: Record<string, unknown>): ReadingPosition {
  return {
    chapterIndex: count(raw.chapterIndex),
    paragraphIndex: count(raw.paragraphIndex),
    wordOffset: count(raw.wordOffset),
  }
}

/**
 * Decode a stored entry. Missing or invalid fields default to 0, malformed
 * history and bookmark items are dropped, unknown fields are ignored.
 */
export function decodeEntry(bookId: string, raw: unknown): ReaderState {
  if (!isRecord(raw)) {
    console.warn(`Reading state for book ${bookId} is corrupt; starting from the beginning`)
    return defaultState(bookId)
  }

  const history = (Array.isArray(raw.history) ? raw.history : []).filter(isRecord).map(decodePosition)
  const bookmarks: Bookmark[] = (Array.isArray(raw.bookmarks) ? raw.bookmarks : [])
    .filter(isRecord)
    .map((bookmark) => ({
      position: decodePosition(bookmark),
      label: typeof bookmark.label === 'string' ? bookmark.label : '',
      createdAt: timestamp(bookmark.createdAt),
    }))

  return {
    bookId,
    position: decodePosition(raw),
    history,
    bookmarks,
    lastOpened: timestamp(raw.lastOpened),
  }
}

/**
 * Encode state over the previous entry so fields this version does not know
 * about survive the write
 */
export function encodeEntry(state: ReaderState, previous: unknown): StoredEntry {
  return {
    ...(isRecord(previous) ? previous : {}),
    ...state.position,
    lastOpened: state.lastOpened,
    history: state.history.map((position) => ({ ...position })),
    bookmarks: state.bookmarks.map((bookmark) => ({
      ...bookmark.position,
      label: bookmark.label,
      createdAt: bookmark.createdAt,
    })),
  }
}

/**
 * StateStore - Reading state kept in one JSON file, keyed by book id
 *
 * {
 *   "version": 1,
 *   "books": {
 *     "<sha256>": { "chapterIndex": 3, "paragraphIndex": 12, "wordOffset": 40, "lastOpened": 1718000000000 }
 *   }
 * }
 *
 * Writes go to a temporary file that is renamed over the original.
 */
export class StateStore implements IStateStore {
  constructor(private path: string) {}

  get filePath(): string {
    return this.path
  }

  async load(bookId: string): Promise<ReaderState | undefined> {
    const read = await this.readStateFile()

    switch (read.kind) {
      case 'missing':
        return undefined
      case 'corrupt':
        console.warn(`Reading state file ${this.path} is corrupt (${read.reason}); starting from the beginning`)
        return defaultState(bookId)
      case 'ok': {
        const entry = read.file.books[bookId]
        return entry === undefined ? undefined : decodeEntry(bookId, entry)
      }
    }
  }

  async save(state: ReaderState): Promise<void> {
    const { raw, books } = await this.readForUpdate()
    books[state.bookId] = encodeEntry(state, books[state.bookId])
    await this.writeStateFile({ ...raw, version: STATE_FILE_VERSION, books })
  }

  async remove(bookId: string): Promise<void> {
    const { raw, books } = await this.readForUpdate()
    if (!(bookId in books)) return

    delete books[bookId]
    await this.writeStateFile({ ...raw, version: STATE_FILE_VERSION, books })
  }

  private async readForUpdate(): Promise<{ raw: Record<string, unknown>; books: Record<string, unknown> }> {
    const read = await this.readStateFile()

    if (read.kind === 'ok') {
      return { raw: read.raw, books: { ...read.file.books } }
    }
    if (read.kind === 'corrupt') {
      console.warn(`Replacing corrupt reading state file ${this.path} (${read.reason})`)
    }
    return { raw: {}, books: {} }
  }

  private async readStateFile(): Promise<StateFileRead> {
    let text: string
    try {
      text = await readFile(this.path, 'utf8')
    } catch (error) {
      if (isMissingFile(error)) {
        return { kind: 'missing' }
      }
      throw new StateError(`Failed to read reading state from ${this.path}: ${describeError(error)}`, { cause: error })
    }

    let parsed: unknown
    try {
      parsed = JSON.parse(text)
    } catch (error) {
      return { kind: 'corrupt', reason: describeError(error) }
    }

    if (!isRecord(parsed) || !isRecord(parsed.books)) {
      return { kind: 'corrupt', reason: 'expected an object with a "books" map' }
    }

    return {
      kind: 'ok',
      raw: parsed,
      file: { version: count(parsed.version) || STATE_FILE_VERSION, books: parsed.books },
    }
  }

  private async writeStateFile(file: Record<string, unknown>): Promise<void> {
    const tmp = `${this.path}.${process.pid}.tmp`

    try {
      await mkdir(dirname(this.path), { recursive: true })
      await writeFile(tmp, `${JSON.stringify(file, null, 2)}\n`, 'utf8')
      await rename(tmp, this.path)
    } catch (error) {
      await rm(tmp, { force: true }).catch((cleanup: unknown) => {
        console.warn(`Could not remove temporary state file ${tmp}`, cleanup)
      })
      throw new StateError(`Failed to write reading state to ${this.path}: ${describeError(error)}`, { cause: error })
    }
  }
}
