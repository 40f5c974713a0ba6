import type { ReaderState } from './types'

/**
 * Persistence for per-book reading state
 */
export interface IStateStore {
  /**
   * Load a book's state
   * @returns undefined when the book has never been saved; a default state
   * (with a warning) when the saved copy is corrupt
   * @throws StateError when the underlying storage fails
   */
  load(bookId: string): Promise<ReaderState | undefined>

  /**
   * @throws StateError when the underlying storage fails
   */
  save(state: ReaderState): Promise<void>

  remove(bookId: string): Promise<void>
}
