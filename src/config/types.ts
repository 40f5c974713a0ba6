/**
 * Line wrapper style. `width` is in terminal columns.
 */
export interface StyleConfig {
  width: number
  indent: number            // leading spaces on a body paragraph's first line
  paragraphSpacing: number  // blank lines between paragraphs
  headingSpacing: number    // blank lines around headings
  quoteIndent: number       // leading spaces on every line of a quoted paragraph
}

/**
 * Style options independent of the viewport; the width comes from the terminal
 */
export interface StyleOptions {
  indent: number
  paragraphSpacing: number
  headingSpacing: number
  quoteIndent: number
  maxWidth?: number
}

export interface ViewportConfig {
  columns: number
  rows: number
}

export interface Breakpoint {
  maxWidth: number
  paddingX: number
}

export interface LayoutConfig {
  responsivePadding: boolean
  breakpoints: Breakpoint[]
  fallbackPaddingX: number
  reservedRows: number   // rows taken by the status line and border
  minTextWidth: number
}

export interface ReaderConfig {
  style: StyleOptions
  fillToNextChapter: boolean
  historyLimit: number
  layout: LayoutConfig
  statePath: string
  parseTimeoutMs?: number
}

export type ReaderConfigOverrides = {
  style?: Partial<StyleOptions>
  fillToNextChapter?: boolean
  historyLimit?: number
  layout?: Partial<LayoutConfig>
  statePath?: string
  parseTimeoutMs?: number
}

/**
 * Concrete layout for one viewport: the wrap style and the page height
 */
export interface ViewportLayout {
  style: StyleConfig
  pageHeight: number
}
