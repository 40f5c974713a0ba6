import { describe, expect, it } from 'vitest'
import { ProgressHelper } from './ProgressHelper'
import { makeChapter, para } from '@/parser/test-helpers'

describe('ProgressHelper', () => {
  const helper = new ProgressHelper()

  // 4 + 6 words, then an empty chapter, then 10 words
  const chapters = [
    makeChapter(0, [para('one two three four'), para('five six seven eight nine ten')]),
    makeChapter(1, []),
    makeChapter(2, [para('a b c d e f g h i j')]),
  ]

  it('should count words per chapter and in total', () => {
    expect(helper.getTotalWords(chapters)).toBe(20)
    expect(helper.getWordsBeforeChapter(chapters, 2)).toBe(10)
  })

  it('should count the words before a position', () => {
    expect(helper.getWordsBeforePosition(chapters, { chapterIndex: 0, paragraphIndex: 1, wordOffset: 2 })).toBe(6)
    expect(helper.getWordsBeforePosition(chapters, { chapterIndex: 2, paragraphIndex: 0, wordOffset: 5 })).toBe(15)
  })

  it('should calculate book progress from words read', () => {
    expect(helper.calculateProgress(chapters, { chapterIndex: 0, paragraphIndex: 0, wordOffset: 0 })).toBe(0)
    expect(helper.calculateProgress(chapters, { chapterIndex: 2, paragraphIndex: 0, wordOffset: 0 })).toBe(50)
    expect(helper.calculateProgress([makeChapter(0, [])], { chapterIndex: 0, paragraphIndex: 0, wordOffset: 0 })).toBe(0)
  })

  it('should calculate chapter progress from the page shown', () => {
    expect(helper.calculateChapterProgress(0, 3)).toBe(0)
    expect(helper.calculateChapterProgress(2, 3)).toBe(66)
    expect(helper.calculateChapterProgress(0, 0)).toBe(0)
  })

  it('should find the position a percentage through the book', () => {
    expect(helper.findPositionFromProgress(chapters, 0)).toEqual({ chapterIndex: 0, paragraphIndex: 0, wordOffset: 0 })
    expect(helper.findPositionFromProgress(chapters, 25)).toEqual({ chapterIndex: 0, paragraphIndex: 1, wordOffset: 1 })
    expect(helper.findPositionFromProgress(chapters, 50)).toEqual({ chapterIndex: 2, paragraphIndex: 0, wordOffset: 0 })
    expect(helper.findPositionFromProgress(chapters, 100)).toEqual({ chapterIndex: 2, paragraphIndex: 0, wordOffset: 9 })
    expect(helper.findPositionFromProgress(chapters, 250)).toEqual({ chapterIndex: 2, paragraphIndex: 0, wordOffset: 9 })
  })

  it('should return the start for a book without words', () => {
    expect(helper.findPositionFromProgress([makeChapter(0, [])], 40)).toEqual({
      chapterIndex: 0,
      paragraphIndex: 0,
      wordOffset: 0,
    })
  })
})
