import type { Chapter } from '@/parser/types'
import { START_POSITION, clampPosition } from './positions'
import type { ReadingPosition } from './positions'

/**
 * Helper for word-based book progress and page-based chapter progress
 */
export class ProgressHelper {
  /**
   * Count words in one chapter
   */
  getChapterWords(chapter: Chapter): number {
    return chapter.paragraphs.reduce((sum, p) => sum + p.words.length, 0)
  }

  /**
   * Calculate total words in all chapters
   */
  getTotalWords(chapters: Chapter[]): number {
    return chapters.reduce((sum, ch) => sum + this.getChapterWords(ch), 0)
  }

  /**
   * Calculate total words before a given chapter
   */
  getWordsBeforeChapter(chapters: Chapter[], chapterIndex: number): number {
    return this.getTotalWords(chapters.slice(0, chapterIndex))
  }

  /**
   * Words that precede a position in the whole book
   */
  getWordsBeforePosition(chapters: Chapter[], position: ReadingPosition): number {
    const { chapterIndex, paragraphIndex, wordOffset } = clampPosition(position, chapters)
    const paragraphs = chapters[chapterIndex]?.paragraphs ?? []

    return (
      this.getWordsBeforeChapter(chapters, chapterIndex) +
      paragraphs.slice(0, paragraphIndex).reduce((sum, p) => sum + p.words.length, 0) +
      wordOffset
    )
  }

  /**
   * Calculate progress percentage based on word position
   */
  calculateProgress(chapters: Chapter[], position: ReadingPosition): number {
    const totalWords = this.getTotalWords(chapters)
    if (totalWords === 0) return 0

    return (this.getWordsBeforePosition(chapters, position) / totalWords) * 100
  }

  /**
   * Percentage through a chapter from the page being shown
   */
  calculateChapterProgress(pageIndex: number, pageCount: number): number {
    if (pageCount <= 0) return 0
    return Math.floor((pageIndex / pageCount) * 100)
  }

  /**
   * Find the position that lies a percentage of the way through the book's words
   */
  findPositionFromProgress(chapters: Chapter[], progressPercent: number): ReadingPosition {
    const percent = Number.isFinite(progressPercent) ? Math.min(100, Math.max(0, progressPercent)) : 0
    const totalWords = this.getTotalWords(chapters)
    if (totalWords === 0) {
      return clampPosition(START_POSITION, chapters)
    }
    let remainingWords = Math.floor((percent / 100) * totalWords)

    for (const [chapterIndex, chapter] of chapters.entries()) {
      const chapterWords = this.getChapterWords(chapter)
      if (remainingWords >= chapterWords) {
        remainingWords -= chapterWords
        continue
      }

      for (const [paragraphIndex, paragraph] of chapter.paragraphs.entries()) {
        if (remainingWords < paragraph.words.length) {
          return { chapterIndex, paragraphIndex, wordOffset: remainingWords }
        }
        remainingWords -= paragraph.words.length
      }
    }

    // Fallback to the last word of the book
    return clampPosition(
      { chapterIndex: chapters.length - 1, paragraphIndex: Number.MAX_SAFE_INTEGER, wordOffset: Number.MAX_SAFE_INTEGER },
      chapters
    )
  }
}

// Singleton instance
export const progressHelper = new ProgressHelper()
