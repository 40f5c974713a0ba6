import { createHash } from 'node:crypto'
import { readFile } from 'node:fs/promises'
import JSZip from 'jszip'
import { ArchiveError, ContentError, ManifestError, ReaderError, SpineError, describeError } from '@/errors'
import { CONTAINER_PATH, parseContainer, parsePackageDocument } from './PackageDocument'
import { MarkupExtractor, markupExtractor } from './MarkupExtractor'
import type { IFormatParser } from './IFormatParser'
import type { Book, Chapter, ManifestItem, PackageDocument, ParseOptions, ParseProgress } from './types'

const MARKUP_MEDIA_TYPES = ['application/xhtml+xml', 'text/html', 'application/html']

interface ResolvedSpineItem {
  item: ManifestItem
  linear: boolean
}

/**
 * EpubParser - Open an EPUB container and realise its chapters
 *
 * Uses JSZip for the OCF container and fast-xml-parser for the package
 * document. Chapters come from the spine alone, in spine order, one per
 * manifest item; navigation documents (nav, NCX) never add chapters.
 */
export class EpubParser implements IFormatParser {
  constructor(private extractor: MarkupExtractor = markupExtractor) {}

  getSupportedExtensions(): string[] {
    return ['.epub']
  }

  getFormatName(): string {
    return 'EPUB'
  }

  /**
   * Parse an EPUB file from disk
   *
   * @param path - EPUB file path
   * @param options - Optional progress callback and timeout
   * @throws ArchiveError | ManifestError | SpineError
   */
  async parse(path: string, options: ParseOptions = {}): Promise<Book> {
    let data: Uint8Array
    try {
      data = await readFile(path)
    } catch (error) {
      throw new ArchiveError(`Cannot read EPUB ${path}: ${describeError(error)}`, { cause: error })
    }

    const book = await this.parseBuffer(data, options)
    return { ...book, path }
  }

  /**
   * Parse an EPUB held in memory
   */
  async parseBuffer(data: Uint8Array, options: ParseOptions = {}): Promise<Book> {
    try {
      const work = this.parseContainer(data, options.onProgress)
      return options.timeoutMs !== undefined ? await withTimeout(work, options.timeoutMs) : await work
    } catch (error) {
      if (error instanceof ReaderError) {
        throw error
      }
      throw new ArchiveError(`Failed to parse EPUB: ${describeError(error)}`, { cause: error })
    }
  }

  private async parseContainer(
    data: Uint8Array,
    onProgress?: (progress: ParseProgress) => void
  ): Promise<Book> {
    // Stage 1: Open the container
    onProgress?.({ stage: 'loading', current: 0, total: 1, message: 'Opening EPUB container...' })

    const zip = await this.openZip(data)
    const pkg = await this.readPackage(zip)
    const spine = this.resolveSpine(pkg)

    // Stage 2: Extract chapters in spine order
    const chapters: Chapter[] = []
    for (const [index, entry] of spine.entries()) {
      onProgress?.({
        stage: 'extracting',
        current: index + 1,
        total: spine.length,
        message: `Extracting chapter ${index + 1} of ${spine.length}...`,
      })
      chapters.push(await this.extractChapter(zip, entry, index))
    }

    const totalWords = chapters.reduce(
      (sum, chapter) => sum + chapter.paragraphs.reduce((n, p) => n + p.words.length, 0),
      0
    )

    onProgress?.({ stage: 'complete', current: 1, total: 1, message: 'Parsing complete' })

    return {
      id: hashBook(data),
      metadata: pkg.metadata,
      chapters,
      totalWords,
    }
  }

  private async openZip(data: Uint8Array): Promise<JSZip> {
    try {
      return await JSZip.loadAsync(data)
    } catch (error) {
      throw new ArchiveError(`Not a readable EPUB container: ${describeError(error)}`, { cause: error })
    }
  }

  private async readPackage(zip: JSZip): Promise<PackageDocument> {
    const container = await readEntry(zip, CONTAINER_PATH)
    if (container === undefined) {
      throw new ManifestError('Invalid EPUB: No container.xml found')
    }

    const packagePath = parseContainer(container)
    const packageXml = await readEntry(zip, packagePath)
    if (packageXml === undefined) {
      throw new ManifestError(`Invalid EPUB: package document ${packagePath} not found`)
    }

    return parsePackageDocument(packageXml, packagePath)
  }

  /**
   * Resolve each spine itemref to its manifest item, exactly once
   */
  private resolveSpine(pkg: PackageDocument): ResolvedSpineItem[] {
    const seen = new Set<string>()
    const resolved: ResolvedSpineItem[] = []

    for (const itemref of pkg.spine) {
      const item = pkg.manifest.get(itemref.idref)
      if (!item) {
        throw new SpineError(itemref.idref)
      }
      if (seen.has(item.href)) {
        console.warn(`Spine lists ${item.href} (item "${item.id}") more than once; keeping the first occurrence`)
        continue
      }
      seen.add(item.href)
      resolved.push({ item, linear: itemref.linear })
    }

    return resolved
  }

  private async extractChapter(zip: JSZip, entry: ResolvedSpineItem, index: number): Promise<Chapter> {
    const { item, linear } = entry
    const fallbackTitle = `Chapter ${index + 1}`
    const base = { index, id: item.id, href: item.href, linear }

    try {
      if (!isMarkup(item)) {
        throw new ContentError(`Unsupported media type "${item.mediaType}"`, item.href)
      }

      const markup = await readEntry(zip, item.href)
      if (markup === undefined) {
        throw new ContentError(`Chapter resource ${item.href} is missing from the container`, item.href)
      }

      const extracted = this.extractor.extractChapter(markup, item.mediaType || 'application/xhtml+xml')
      return { ...base, title: extracted.title ?? fallbackTitle, paragraphs: extracted.paragraphs }
    } catch (error) {
      const reason = describeError(error)
      console.warn(`Skipping chapter ${index + 1} (${item.href}): ${reason}`, error)

      return {
        ...base,
        title: fallbackTitle,
        skipped: reason,
        paragraphs: [
          {
            kind: 'body',
            words: `[Chapter ${index + 1} was skipped because its content could not be read.]`.split(' '),
            spans: [],
          },
        ],
      }
    }
  }
}

function isMarkup(item: ManifestItem): boolean {
  if (item.mediaType === '') {
    return /\.x?html?$/i.test(item.href)
  }
  return MARKUP_MEDIA_TYPES.includes(item.mediaType)
}

/**
 * Read a text entry from the container. Falls back to a case-insensitive
 * match, since hrefs and entry names disagree on case in some archives.
 */
async function readEntry(zip: JSZip, name: string): Promise<string | undefined> {
  const exact = zip.file(name)
  if (exact) {
    return exact.async('string')
  }

  const lower = name.toLowerCase()
  const match = Object.values(zip.files).find((file) => !file.dir && file.name.toLowerCase() === lower)
  return match ? match.async('string') : undefined
}

function hashBook(data: Uint8Array): string {
  return createHash('sha256').update(data).digest('hex')
}

export async function withTimeout<T>(work: Promise<T>, timeoutMs: number): Promise<T> {
  let timer: NodeJS.Timeout | undefined
  const expiry = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new ArchiveError(`EPUB parse timed out after ${timeoutMs}ms`)), timeoutMs)
  })

  try {
    return await Promise.race([work, expiry])
  } finally {
    clearTimeout(timer)
  }
}

// Singleton instance
export const epubParser = new EpubParser()
