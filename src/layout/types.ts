import type { InlineStyle, ParagraphKind } from '@/parser/types'
import type { ReadingPosition } from '@/reader/positions'

// spacing: gap between paragraphs; blank: a separator or wordless paragraph
export type LineKind = 'text' | 'blank' | 'spacing' | 'padding'

/**
 * A styled column range on a display line, [start, end)
 */
export interface StyleRun {
  style: InlineStyle
  start: number
  end: number
}

export interface DisplayLine {
  chapterIndex: number
  text: string
  kind: LineKind
  position: ReadingPosition  // where in the logical text this line begins
  paragraphKind?: ParagraphKind
  level?: number             // heading level, heading lines only
  runs: StyleRun[]
}
