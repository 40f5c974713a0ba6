import { describe, expect, it } from 'vitest'
import { LineWrapper, columnWidth } from './LineWrapper'
import { comparePositions } from '@/reader/positions'
import { makeChapter, para } from '@/parser/test-helpers'
import type { StyleConfig } from '@/config/types'

const style = (overrides: Partial<StyleConfig> = {}): StyleConfig => ({
  width: 20,
  indent: 0,
  paragraphSpacing: 1,
  headingSpacing: 1,
  quoteIndent: 4,
  ...overrides,
})

describe('LineWrapper', () => {
  const wrapper = new LineWrapper()
  const fox = para('The quick brown fox jumps over the lazy dog')

  describe('greedy wrapping', () => {
    it('should fill each line up to the width', () => {
      const lines = wrapper.wrap(makeChapter(0, [fox]), style())

      expect(lines.map((l) => l.text)).toEqual(['The quick brown fox', 'jumps over the lazy', 'dog'])
      expect(lines.map((l) => l.position.wordOffset)).toEqual([0, 4, 8])
      expect(lines.every((l) => l.kind === 'text' && l.paragraphKind === 'body')).toBe(true)
    })

    it('should indent only the first line of a body paragraph', () => {
      const lines = wrapper.wrap(makeChapter(0, [fox]), style({ indent: 2 }))

      expect(lines.map((l) => l.text)).toEqual(['  The quick brown', 'fox jumps over the', 'lazy dog'])
      expect(lines.map((l) => l.position.wordOffset)).toEqual([0, 3, 7])
    })

    it('should never indent headings and keep their level', () => {
      const lines = wrapper.wrap(makeChapter(0, [para('Title', { kind: 'heading', level: 2 })]), style({ indent: 2 }))

      expect(lines).toEqual([
        {
          chapterIndex: 0,
          text: 'Title',
          kind: 'text',
          position: { chapterIndex: 0, paragraphIndex: 0, wordOffset: 0 },
          paragraphKind: 'heading',
          level: 2,
          runs: [],
        },
      ])
    })

    it('should indent every line of a quoted paragraph', () => {
      const lines = wrapper.wrap(makeChapter(0, [para('one two three four', { quoted: true })]), style({ width: 12 }))

      expect(lines.map((l) => l.text)).toEqual(['    one two', '    three', '    four'])
      expect(lines.map((l) => l.position.wordOffset)).toEqual([0, 2, 3])
    })

    it('should put an over-long word alone on an unindented line', () => {
      const lines = wrapper.wrap(makeChapter(0, [para('a extraordinarily b')]), style({ width: 10, indent: 3 }))

      expect(lines.map((l) => l.text)).toEqual(['   a', 'extraordinarily', 'b'])
    })

    it('should start a word at column 0 when it does not fit beside the indent', () => {
      const lines = wrapper.wrap(makeChapter(0, [para('abcdefgh ij')]), style({ width: 10, indent: 4 }))

      expect(lines.map((l) => l.text)).toEqual(['abcdefgh', 'ij'])
    })

    it('should keep every line within width except lone over-long words', () => {
      const words = Array.from({ length: 200 }, (_, i) => 'x'.repeat((i * 7) % 13 + 1))
      const chapter = makeChapter(0, [para(words.join(' ')), para(words.slice(50).join(' '), { quoted: true })])

      for (let width = 1; width <= 60; width++) {
        for (const line of wrapper.wrap(chapter, style({ width, indent: 2 }))) {
          if (line.text.length > width) {
            expect(line.text.trim().split(' ')).toHaveLength(1)
            expect(line.text.startsWith(' ')).toBe(false)
          }
        }
      }
    })
  })

  describe('spacing', () => {
    it('should use heading spacing around headings and paragraph spacing elsewhere', () => {
      const chapter = makeChapter(0, [
        para('Title', { kind: 'heading', level: 1 }),
        para('First para'),
        para('Second para'),
      ])

      const lines = wrapper.wrap(chapter, style({ width: 40, headingSpacing: 2 }))

      expect(lines.map((l) => [l.kind, l.text, l.position.paragraphIndex])).toEqual([
        ['text', 'Title', 0],
        ['spacing', '', 1],
        ['spacing', '', 1],
        ['text', 'First para', 1],
        ['spacing', '', 2],
        ['text', 'Second para', 2],
      ])
    })

    it('should render a separator as one blank line', () => {
      const chapter = makeChapter(0, [para('A'), para('', { kind: 'separator' }), para('B')])

      expect(wrapper.wrap(chapter, style({ paragraphSpacing: 0 })).map((l) => [l.kind, l.paragraphKind])).toEqual([
        ['text', 'body'],
        ['blank', 'separator'],
        ['text', 'body'],
      ])
      expect(wrapper.wrap(chapter, style({ paragraphSpacing: 1 }))).toHaveLength(5)
    })

    it('should produce no lines for an empty chapter', () => {
      expect(wrapper.wrap(makeChapter(3, []), style())).toEqual([])
    })
  })

  describe('style runs', () => {
    const claim = para('very bold claim here', { spans: [{ style: 'strong', start: 1, end: 3 }] })

    it('should merge adjacent styled words into one column run', () => {
      const [line] = wrapper.wrap(makeChapter(0, [claim]), style({ width: 40, indent: 2 }))

      expect(line?.runs).toEqual([{ style: 'strong', start: 7, end: 17 }])
    })

    it('should split runs at line breaks', () => {
      const lines = wrapper.wrap(makeChapter(0, [claim]), style({ width: 10 }))

      expect(lines.map((l) => l.text)).toEqual(['very bold', 'claim here'])
      expect(lines.map((l) => l.runs)).toEqual([
        [{ style: 'strong', start: 5, end: 9 }],
        [{ style: 'strong', start: 0, end: 5 }],
      ])
    })
  })

  describe('wide characters', () => {
    const smiles = '\u{1F642}\u{1F642}\u{1F642}'

    it('should count code points, not UTF-16 units', () => {
      expect(columnWidth(smiles)).toBe(3)
      expect(columnWidth('caf\u00E9')).toBe(4)
    })

    it('should fit astral-plane words by their column count', () => {
      const chapter = makeChapter(0, [
        para(`${smiles} abcdef`, { spans: [{ style: 'underline', start: 1, end: 2 }] }),
      ])

      const lines = wrapper.wrap(chapter, style({ width: 10 }))

      expect(lines.map((l) => l.text)).toEqual([`${smiles} abcdef`])
      expect(lines[0]?.runs).toEqual([{ style: 'underline', start: 4, end: 10 }])
    })
  })

  describe('back-mapping', () => {
    const chapter = makeChapter(2, [
      para('Opening', { kind: 'heading', level: 1 }),
      fox,
      para('', { kind: 'separator' }),
      para('Short one'),
      fox,
    ])

    it('should map lines to non-decreasing positions in their chapter', () => {
      const lines = wrapper.wrap(chapter, style({ width: 12 }))

      expect(lines.every((l) => l.chapterIndex === 2 && l.position.chapterIndex === 2)).toBe(true)
      for (let i = 1; i < lines.length; i++) {
        const previous = lines[i - 1]
        const line = lines[i]
        if (previous && line) {
          expect(comparePositions(previous.position, line.position)).toBeLessThanOrEqual(0)
        }
      }
    })

    it('should produce identical output for identical input', () => {
      expect(wrapper.wrap(chapter, style({ width: 17 }))).toEqual(wrapper.wrap(chapter, style({ width: 17 })))
    })
  })
})
