import { JSDOM } from 'jsdom'
import createDOMPurify from 'dompurify'
import { ContentError, describeError } from '@/errors'
import { INLINE_STYLES } from './types'
import type { InlineStyle, Paragraph, ParagraphKind, StyleSpan } from './types'

/**
 * The closed set of markup node kinds the extractor understands
 */
export type MarkupNode =
  | { kind: 'heading'; element: Element; level: number }
  | { kind: 'paragraph'; element: Element }
  | { kind: 'container'; element: Element; quoted: boolean }
  | { kind: 'separator' }
  | { kind: 'break' }
  | { kind: 'emphasis'; element: Element; style: InlineStyle }
  | { kind: 'inline'; element: Element }
  | { kind: 'text'; text: string }
  | { kind: 'ignored' }

export interface ExtractedChapter {
  title?: string
  paragraphs: Paragraph[]
}

const HEADING_TAGS = ['h1', 'h2', 'h3', 'h4', 'h5', 'h6']

const BLOCK_TAGS = [
  'p', 'div', 'section', 'article', 'aside', 'header', 'footer', 'main', 'nav',
  'blockquote', 'ul', 'ol', 'li', 'dl', 'dt', 'dd', 'pre', 'figure', 'figcaption',
  'table', 'thead', 'tbody', 'tfoot', 'tr', 'td', 'th', 'caption', 'center', 'address',
]

const STYLE_TAGS: Record<string, InlineStyle> = {
  em: 'emphasis',
  i: 'emphasis',
  cite: 'emphasis',
  strong: 'strong',
  b: 'strong',
  u: 'underline',
  code: 'code',
  tt: 'code',
  kbd: 'code',
  samp: 'code',
}

const INLINE_TAGS = ['a', 'span', 'sub', 'sup', 'small', 'abbr', 'q', ...Object.keys(STYLE_TAGS)]

const ALLOWED_TAGS = [...HEADING_TAGS, ...BLOCK_TAGS, ...INLINE_TAGS, 'br', 'hr']

const HTML_MEDIA_TYPES = ['text/html', 'application/html']

const XML_ENTITIES = ['amp', 'lt', 'gt', 'quot', 'apos']

const ELEMENT_NODE = 1
const TEXT_NODE = 3

function isElement(node: Node): node is Element {
  return node.nodeType === ELEMENT_NODE
}

export interface TextRun {
  text: string
  styles: InlineStyle[]
}

/**
 * MarkupExtractor - Turn chapter (X)HTML into ordered paragraphs
 *
 * XHTML is parsed strictly so malformed markup surfaces as a ContentError.
 * The body is sanitised with DOMPurify (bound to a jsdom window) down to the
 * text-bearing tags, then walked: block elements become paragraphs, headings
 * keep their level and emphasis becomes word-range style spans.
 */
export class MarkupExtractor {
  private window = new JSDOM('').window
  private purify = createDOMPurify(this.window)
  private entities = new Map<string, string | undefined>()

  /**
   * Extract paragraphs from chapter markup
   * @param markup - Raw chapter document
   * @param mediaType - Manifest media type; text/html is parsed leniently
   * @throws ContentError when the markup cannot be parsed
   */
  extract(markup: string, mediaType = 'application/xhtml+xml'): Paragraph[] {
    return this.extractChapter(markup, mediaType).paragraphs
  }

  /**
   * Extract paragraphs plus the chapter title (first heading, else <title>)
   */
  extractChapter(markup: string, mediaType = 'application/xhtml+xml'): ExtractedChapter {
    const doc = this.parseDocument(markup, mediaType)

    const body = doc.querySelector('body')
    if (!body) {
      throw new ContentError('Chapter markup has no <body> element')
    }

    const fragment = this.purify.sanitize(body.innerHTML, {
      ALLOWED_TAGS,
      ALLOWED_ATTR: [],
      KEEP_CONTENT: true,
      RETURN_DOM_FRAGMENT: true,
    })

    const paragraphs: Paragraph[] = []
    this.walkContainer(fragment, false, paragraphs)

    const heading = paragraphs.find((p) => p.kind === 'heading')
    const title = heading ? heading.words.join(' ') : this.documentTitle(doc)

    return { title, paragraphs }
  }

  /**
   * Map a DOM node onto the closed set of markup node kinds
   */
  classify(node: Node): MarkupNode {
    if (node.nodeType === TEXT_NODE) {
      return { kind: 'text', text: node.textContent ?? '' }
    }
    if (!isElement(node)) {
      return { kind: 'ignored' }
    }

    const tag = node.localName.toLowerCase()

    if (HEADING_TAGS.includes(tag)) {
      return { kind: 'heading', element: node, level: Number(tag.slice(1)) }
    }
    if (tag === 'hr') {
      return { kind: 'separator' }
    }
    if (tag === 'br') {
      return { kind: 'break' }
    }
    if (BLOCK_TAGS.includes(tag)) {
      if (tag === 'blockquote' || this.hasBreakingChild(node)) {
        return { kind: 'container', element: node, quoted: tag === 'blockquote' }
      }
      return { kind: 'paragraph', element: node }
    }
    const style = STYLE_TAGS[tag]
    if (style) {
      return { kind: 'emphasis', element: node, style }
    }
    if (INLINE_TAGS.includes(tag)) {
      return { kind: 'inline', element: node }
    }
    return { kind: 'ignored' }
  }

  private parseDocument(markup: string, mediaType: string): Document {
    const parser = new this.window.DOMParser()

    if (HTML_MEDIA_TYPES.includes(mediaType)) {
      return parser.parseFromString(markup, 'text/html')
    }

    let doc: Document
    try {
      doc = parser.parseFromString(this.resolveNamedEntities(markup), 'application/xhtml+xml')
    } catch (error) {
      throw new ContentError(`Unparseable chapter markup: ${describeError(error)}`, undefined, { cause: error })
    }

    const parseError = doc.getElementsByTagName('parsererror')[0]
    if (parseError) {
      throw new ContentError(`Unparseable chapter markup: ${parseError.textContent?.trim() ?? 'not well-formed'}`)
    }
    return doc
  }

  /**
   * Rewrite HTML named entities (&nbsp;, &mdash;, ...) as numeric references.
   * EPUB 2 chapters use them under the XHTML DTD, which an XML parser does not
   * load. Names HTML does not define are left for the XML parser to reject.
   */
  private resolveNamedEntities(markup: string): string {
    return markup.replace(/&([A-Za-z][A-Za-z0-9]*);/g, (reference: string, name: string) => {
      if (XML_ENTITIES.includes(name)) return reference

      const decoded = this.decodeEntity(reference)
      if (decoded === undefined) return reference
      return Array.from(decoded, (char) => `&#x${(char.codePointAt(0) ?? 0).toString(16)};`).join('')
    })
  }

  private decodeEntity(reference: string): string | undefined {
    if (this.entities.has(reference)) {
      return this.entities.get(reference)
    }

    const scratch = this.window.document.createElement('span')
    scratch.innerHTML = reference
    const text = scratch.textContent ?? reference
    // A named reference decodes to one or two code points; anything longer is a
    // legacy prefix match such as "&notareal;"
    const decoded = text !== reference && Array.from(text).length <= 2 ? text : undefined

    this.entities.set(reference, decoded)
    return decoded
  }

  private documentTitle(doc: Document): string | undefined {
    const title = doc.querySelector('title')?.textContent
    const collapsed = title ? title.replace(/\s+/g, ' ').trim() : ''
    return collapsed.length > 0 ? collapsed : undefined
  }

  private isBlockLevel(node: MarkupNode): boolean {
    switch (node.kind) {
      case 'heading':
      case 'paragraph':
      case 'container':
      case 'separator':
        return true
      case 'break':
      case 'emphasis':
      case 'inline':
      case 'text':
      case 'ignored':
        return false
    }
  }

  /**
   * A block holding other blocks or line breaks is walked as a container
   */
  private hasBreakingChild(element: Element): boolean {
    return Array.from(element.childNodes).some((child) => {
      const node = this.classify(child)
      return node.kind === 'break' || this.isBlockLevel(node)
    })
  }

  /**
   * Walk a node list that may mix block and inline content. Inline runs that
   * sit between blocks (or are split by <br>) become their own body paragraphs.
   */
  private walkContainer(parent: Node, quoted: boolean, out: Paragraph[]): void {
    let pending: TextRun[] = []

    const flush = () => {
      this.pushParagraph(out, 'body', pending, { quoted })
      pending = []
    }

    for (const child of Array.from(parent.childNodes)) {
      const node = this.classify(child)

      switch (node.kind) {
        case 'heading':
          flush()
          this.pushParagraph(out, 'heading', this.collectChildRuns(node.element, []), { level: node.level })
          break
        case 'paragraph':
          flush()
          this.pushParagraph(out, 'body', this.collectChildRuns(node.element, []), { quoted })
          break
        case 'container':
          flush()
          this.walkContainer(node.element, quoted || node.quoted, out)
          break
        case 'separator':
          flush()
          out.push({ kind: 'separator', words: [], spans: [] })
          break
        case 'break':
          flush()
          break
        case 'emphasis':
        case 'inline':
        case 'text':
          pending.push(...this.collectRuns(child, []))
          break
        case 'ignored':
          break
      }
    }

    flush()
  }

  /**
   * Collect the text under a node as runs tagged with the inline styles in effect
   */
  private collectRuns(node: Node, styles: InlineStyle[]): TextRun[] {
    const classified = this.classify(node)

    switch (classified.kind) {
      case 'text':
        return [{ text: classified.text, styles }]
      case 'break':
      case 'separator':
        return [{ text: ' ', styles }]
      case 'emphasis': {
        const nested = styles.includes(classified.style) ? styles : [...styles, classified.style]
        return this.collectChildRuns(classified.element, nested)
      }
      case 'heading':
      case 'paragraph':
      case 'container':
        // Block content nested inside an inline context reads as a word break
        return [{ text: ' ', styles }, ...this.collectChildRuns(classified.element, styles), { text: ' ', styles }]
      case 'inline':
        return this.collectChildRuns(classified.element, styles)
      case 'ignored':
        return []
    }
  }

  private collectChildRuns(element: Element, styles: InlineStyle[]): TextRun[] {
    return Array.from(element.childNodes).flatMap((child) => this.collectRuns(child, styles))
  }

  private pushParagraph(
    out: Paragraph[],
    kind: ParagraphKind,
    runs: TextRun[],
    extra: { level?: number; quoted?: boolean }
  ): void {
    const paragraph = buildParagraph(kind, runs)
    if (!paragraph) return

    if (extra.level !== undefined) paragraph.level = extra.level
    if (extra.quoted) paragraph.quoted = true
    out.push(paragraph)
  }
}

/**
 * Tokenise styled runs into words and word-range style spans. Returns
 * undefined when the runs hold no visible text.
 */
export function buildParagraph(kind: ParagraphKind, runs: TextRun[]): Paragraph | undefined {
  let text = ''
  const styledRanges: Array<{ style: InlineStyle; start: number; end: number }> = []

  for (const run of runs) {
    const clean = run.text.replace(/[\u200B-\u200D\uFEFF\u00AD]/g, '')
    const start = text.length
    text += clean
    for (const style of run.styles) {
      styledRanges.push({ style, start, end: text.length })
    }
  }

  const words: string[] = []
  const wordRanges: Array<{ start: number; end: number }> = []
  for (const match of text.matchAll(/\S+/g)) {
    const start = match.index ?? 0
    words.push(match[0])
    wordRanges.push({ start, end: start + match[0].length })
  }

  if (words.length === 0) {
    return undefined
  }

  return { kind, words, spans: toWordSpans(styledRanges, wordRanges) }
}

function toWordSpans(
  styledRanges: Array<{ style: InlineStyle; start: number; end: number }>,
  wordRanges: Array<{ start: number; end: number }>
): StyleSpan[] {
  const spans: StyleSpan[] = []

  for (const style of INLINE_STYLES) {
    const ranges = styledRanges.filter((r) => r.style === style && r.end > r.start)
    let open: StyleSpan | undefined

    wordRanges.forEach((word, index) => {
      const styled = ranges.some((r) => r.start < word.end && r.end > word.start)
      if (styled && open) {
        open.end = index + 1
      } else if (styled) {
        open = { style, start: index, end: index + 1 }
        spans.push(open)
      } else {
        open = undefined
      }
    })
  }

  return spans.sort((a, b) => a.start - b.start || a.style.localeCompare(b.style))
}

// Singleton instance
export const markupExtractor = new MarkupExtractor()
