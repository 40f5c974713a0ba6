/**
 * EPUB ingestion, line wrapping, pagination and reading state for terminal readers
 */

export * from './errors'

// Configuration
export {
  DEFAULT_BREAKPOINTS,
  DEFAULT_HISTORY_LIMIT,
  DEFAULT_LAYOUT_CONFIG,
  DEFAULT_STYLE_CONFIG,
  DEFAULT_STYLE_OPTIONS,
  computeViewportLayout,
  defaultReaderConfig,
  defaultStatePath,
  normalizeStyle,
  resolveReaderConfig,
  responsivePadding,
} from './config/ReaderConfig'
export type {
  Breakpoint,
  LayoutConfig,
  ReaderConfig,
  ReaderConfigOverrides,
  StyleConfig,
  StyleOptions,
  ViewportConfig,
  ViewportLayout,
} from './config/types'

// Parsing
export * from './parser'

// Layout
export { LineWrapper, columnWidth, lineWrapper } from './layout/LineWrapper'
export type { DisplayLine, LineKind, StyleRun } from './layout/types'

// Pagination and reading
export { Paginator, paginator } from './reader/Paginator'
export type { Page, PageLocation, PaginateOptions } from './reader/Paginator'
export { PageNavigator } from './reader/PageNavigator'
export type { NavigationResult, NavigatorLayout, PageCursor } from './reader/PageNavigator'
export { ProgressHelper, progressHelper } from './reader/ProgressHelper'
export { ReaderSession } from './reader/ReaderSession'
export type { ReaderStatus, SessionOptions } from './reader/ReaderSession'
export { START_POSITION, clampPosition, comparePositions, positionsEqual } from './reader/positions'
export type { ReadingPosition } from './reader/positions'

// Reading state
export * from './db'
