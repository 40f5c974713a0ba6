import { normalizeStyle } from '@/config/ReaderConfig'
import type { StyleConfig } from '@/config/types'
import { INLINE_STYLES } from '@/parser/types'
import type { Chapter, Paragraph } from '@/parser/types'
import type { DisplayLine, StyleRun } from './types'

interface LineDraft {
  prefix: number       // leading spaces
  wordIndices: number[]
}

/**
 * Terminal columns taken by a word, counted in code points
 */
export function columnWidth(text: string): number {
  return Array.from(text).length
}

/**
 * LineWrapper - Greedy word wrap of chapter paragraphs into display lines
 *
 * Rules:
 * - Words join with one space while the line stays within `width`
 * - `indent` applies to the first line of body paragraphs only, headings are
 *   never indented, quoted paragraphs carry `quoteIndent` on every line
 * - A word that does not fit beside its prefix starts at column 0; a word
 *   longer than `width` sits alone on its own line, the one line that may
 *   exceed `width`
 * - `headingSpacing` blank lines separate a heading from its neighbours,
 *   `paragraphSpacing` separates other paragraphs; a separator is one blank line
 *
 * Every line records the (paragraph, word) where it begins. Spacing lines
 * record the paragraph that follows them, so positions never decrease.
 */
export class LineWrapper {
  /**
   * Wrap a chapter under a style
   * @returns Display lines in reading order; an empty chapter has none
   */
  wrap(chapter: Chapter, style: StyleConfig): DisplayLine[] {
    const normalized = normalizeStyle(style)
    const lines: DisplayLine[] = []

    chapter.paragraphs.forEach((paragraph, paragraphIndex) => {
      const previous = chapter.paragraphs[paragraphIndex - 1]
      if (previous) {
        const spacing =
          previous.kind === 'heading' || paragraph.kind === 'heading'
            ? normalized.headingSpacing
            : normalized.paragraphSpacing
        for (let i = 0; i < spacing; i++) {
          lines.push({ ...this.blankLine(chapter.index, paragraphIndex), kind: 'spacing' })
        }
      }

      lines.push(...this.wrapParagraph(chapter.index, paragraphIndex, paragraph, normalized))
    })

    return lines
  }

  /**
   * Wrap one paragraph. Separators and word-less paragraphs render as a
   * single blank line.
   */
  wrapParagraph(chapterIndex: number, paragraphIndex: number, paragraph: Paragraph, style: StyleConfig): DisplayLine[] {
    if (paragraph.kind === 'separator' || paragraph.words.length === 0) {
      return [{ ...this.blankLine(chapterIndex, paragraphIndex), paragraphKind: paragraph.kind }]
    }

    const quotePrefix = paragraph.quoted ? style.quoteIndent : 0
    const firstPrefix = quotePrefix + (paragraph.kind === 'body' ? style.indent : 0)

    return this.breakLines(paragraph.words, style.width, firstPrefix, quotePrefix).map((draft) => {
      const line: DisplayLine = {
        chapterIndex,
        text: ' '.repeat(draft.prefix) + draft.wordIndices.map((i) => paragraph.words[i] ?? '').join(' '),
        kind: 'text',
        position: { chapterIndex, paragraphIndex, wordOffset: draft.wordIndices[0] ?? 0 },
        paragraphKind: paragraph.kind,
        runs: this.styleRuns(paragraph, draft),
      }
      if (paragraph.level !== undefined) line.level = paragraph.level
      return line
    })
  }

  private breakLines(words: string[], width: number, firstPrefix: number, restPrefix: number): LineDraft[] {
    const drafts: LineDraft[] = []
    let current: LineDraft | undefined
    let length = 0

    const open = (wordIndex: number, wordWidth: number) => {
      const wanted = drafts.length === 0 ? firstPrefix : restPrefix
      const prefix = wanted + wordWidth <= width ? wanted : 0
      current = { prefix, wordIndices: [wordIndex] }
      length = prefix + wordWidth
      drafts.push(current)

      // Over-long word: nothing may join it
      if (wordWidth >= width) {
        current = undefined
      }
    }

    words.forEach((word, wordIndex) => {
      const wordWidth = columnWidth(word)
      if (current && length + 1 + wordWidth <= width) {
        current.wordIndices.push(wordIndex)
        length += 1 + wordWidth
      } else {
        open(wordIndex, wordWidth)
      }
    })

    return drafts
  }

  /**
   * Map word-range style spans onto column runs for one line. Adjacent styled
   * words share a run that covers the space between them.
   */
  private styleRuns(paragraph: Paragraph, draft: LineDraft): StyleRun[] {
    const runs: StyleRun[] = []

    for (const style of INLINE_STYLES) {
      const spans = paragraph.spans.filter((span) => span.style === style)
      if (spans.length === 0) continue

      let column = draft.prefix
      let open: StyleRun | undefined
      for (const wordIndex of draft.wordIndices) {
        const length = columnWidth(paragraph.words[wordIndex] ?? '')
        const styled = spans.some((span) => wordIndex >= span.start && wordIndex < span.end)

        if (styled && open) {
          open.end = column + length
        } else if (styled) {
          open = { style, start: column, end: column + length }
          runs.push(open)
        } else {
          open = undefined
        }
        column += length + 1
      }
    }

    return runs.sort((a, b) => a.start - b.start || a.style.localeCompare(b.style))
  }

  private blankLine(chapterIndex: number, paragraphIndex: number): DisplayLine {
    return {
      chapterIndex,
      text: '',
      kind: 'blank',
      position: { chapterIndex, paragraphIndex, wordOffset: 0 },
      runs: [],
    }
  }
}

// Singleton instance
export const lineWrapper = new LineWrapper()
