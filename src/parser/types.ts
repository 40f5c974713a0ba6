export type ParagraphKind = 'heading' | 'body' | 'separator'

export type InlineStyle = 'emphasis' | 'strong' | 'underline' | 'code'

export const INLINE_STYLES: readonly InlineStyle[] = ['emphasis', 'strong', 'underline', 'code']

/**
 * A styled range of words within a paragraph, [start, end) in word indices
 */
export interface StyleSpan {
  style: InlineStyle
  start: number
  end: number
}

export interface Paragraph {
  kind: ParagraphKind
  words: string[]
  spans: StyleSpan[]
  level?: number    // 1-6, headings only
  quoted?: boolean  // inside a blockquote
}

export interface Chapter {
  index: number     // 0-based spine position
  id: string        // manifest item id
  href: string      // resource path inside the container
  title: string
  linear: boolean
  paragraphs: Paragraph[]
  skipped?: string  // reason, set when the chapter was replaced by a placeholder
}

export interface BookMetadata {
  title: string
  author: string
  language?: string
  publisher?: string
  identifier?: string
}

export interface Book {
  id: string        // SHA-256 of the container bytes
  path?: string
  metadata: BookMetadata
  chapters: Chapter[]
  totalWords: number
}

export interface ManifestItem {
  id: string
  href: string       // resolved against the package document directory
  mediaType: string
  properties: string[]
}

export interface SpineItem {
  idref: string
  linear: boolean
}

export interface PackageDocument {
  path: string
  metadata: BookMetadata
  manifest: Map<string, ManifestItem>
  spine: SpineItem[]
}

export interface ParseProgress {
  stage: 'loading' | 'extracting' | 'complete'
  current: number
  total: number
  message: string
}

export interface ParseOptions {
  onProgress?: (progress: ParseProgress) => void
  timeoutMs?: number
}
