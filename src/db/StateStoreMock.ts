import { StateError } from '@/errors'
import type { IStateStore } from './IStateStore'
import type { ReaderState } from './types'

function cloneState(state: ReaderState): ReaderState {
  return {
    ...state,
    position: { ...state.position },
    history: state.history.map((position) => ({ ...position })),
    bookmarks: state.bookmarks.map((bookmark) => ({ ...bookmark, position: { ...bookmark.position } })),
  }
}

/**
 * Mock state store for unit tests
 * Implements the same interface as StateStore but uses in-memory storage
 */
export class StateStoreMock implements IStateStore {
  private states: Map<string, ReaderState> = new Map()
  private failing = new Set<'load' | 'save'>()
  saveCount = 0

  async load(bookId: string): Promise<ReaderState | undefined> {
    if (this.failing.has('load')) {
      throw new StateError('Simulated read failure')
    }
    const state = this.states.get(bookId)
    return state ? cloneState(state) : undefined
  }

  async save(state: ReaderState): Promise<void> {
    if (this.failing.has('save')) {
      throw new StateError('Simulated write failure')
    }
    this.saveCount++
    this.states.set(state.bookId, cloneState(state))
  }

  async remove(bookId: string): Promise<void> {
    this.states.delete(bookId)
  }

  /**
   * Make load or save throw StateError until cleared
   */
  fail(operation: 'load' | 'save', enabled = true): void {
    if (enabled) {
      this.failing.add(operation)
    } else {
      this.failing.delete(operation)
    }
  }

  clear(): void {
    this.states.clear()
    this.failing.clear()
    this.saveCount = 0
  }
}
