import type { Chapter } from '@/parser/types'

/**
 * The durable reading coordinate. Line and page numbers are derived from it
 * for the current layout and never stored.
 */
export interface ReadingPosition {
  chapterIndex: number
  paragraphIndex: number
  wordOffset: number
}

export const START_POSITION: ReadingPosition = { chapterIndex: 0, paragraphIndex: 0, wordOffset: 0 }

/**
 * Order positions by chapter, then paragraph, then word
 * @returns negative when a comes first, 0 when equal, positive otherwise
 */
export function comparePositions(a: ReadingPosition, b: ReadingPosition): number {
  return a.chapterIndex - b.chapterIndex || a.paragraphIndex - b.paragraphIndex || a.wordOffset - b.wordOffset
}

export function positionsEqual(a: ReadingPosition, b: ReadingPosition): boolean {
  return comparePositions(a, b) === 0
}

function clampIndex(value: number, length: number): number {
  if (!Number.isFinite(value) || length <= 0) return 0
  return Math.min(Math.max(0, Math.floor(value)), length - 1)
}

/**
 * Pull a position inside the book: a valid chapter, paragraph and word.
 * Empty chapters and word-less paragraphs only admit offset 0.
 */
export function clampPosition(position: ReadingPosition, chapters: Chapter[]): ReadingPosition {
  const chapterIndex = clampIndex(position.chapterIndex, chapters.length)
  const paragraphs = chapters[chapterIndex]?.paragraphs ?? []
  const paragraphIndex = clampIndex(position.paragraphIndex, paragraphs.length)
  const words = paragraphs[paragraphIndex]?.words.length ?? 0

  return { chapterIndex, paragraphIndex, wordOffset: clampIndex(position.wordOffset, words) }
}
