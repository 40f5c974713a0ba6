export { EpubParser, epubParser } from './EpubParser'
export { MarkupExtractor, markupExtractor, buildParagraph } from './MarkupExtractor'
export type { MarkupNode, ExtractedChapter, TextRun } from './MarkupExtractor'
export { parseContainer, parsePackageDocument, resolveHref } from './PackageDocument'
export { FormatDetector } from './FormatDetector'
export type { IFormatParser } from './IFormatParser'

export { INLINE_STYLES } from './types'

// Types
export type {
  Book,
  BookMetadata,
  Chapter,
  InlineStyle,
  ManifestItem,
  PackageDocument,
  Paragraph,
  ParagraphKind,
  ParseOptions,
  ParseProgress,
  SpineItem,
  StyleSpan,
} from './types'

// Initialize and export formatDetector with parsers registered
import { epubParser } from './EpubParser'
import { FormatDetector } from './FormatDetector'

const formatDetector = new FormatDetector()
formatDetector.registerParser(epubParser)

export { formatDetector }
