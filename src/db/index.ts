// Main exports for reading state persistence
export { StateStore, decodeEntry, encodeEntry, defaultState } from './StateStore'
export { StateStoreMock } from './StateStoreMock'
export type { IStateStore } from './IStateStore'
export { STATE_FILE_VERSION } from './types'
export type { Bookmark, ReaderState, StateFile, StoredEntry } from './types'
