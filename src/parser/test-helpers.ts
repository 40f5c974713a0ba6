import { mkdtemp, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import JSZip from 'jszip'
import type { Book, Chapter, Paragraph } from './types'

export interface TestChapter {
  title: string
  content: string
  id?: string
  mediaType?: string
  document?: string   // full document source, replaces the generated XHTML
}

export interface TestEpubOptions {
  title?: string
  author?: string
  spine?: string[]          // itemref idrefs, defaults to every chapter in order
  includeNav?: boolean      // EPUB 3 nav document linking every chapter (not in the spine)
  includeNcx?: boolean      // EPUB 2 NCX table of contents
  omitFiles?: string[]      // chapter files left out of the archive
  packageDocument?: string  // replaces the generated content.opf
  container?: string | null // replaces container.xml, null leaves it out
}

function chapterId(chapter: TestChapter, idx: number): string {
  return chapter.id ?? `chapter${idx + 1}`
}

function chapterDocument(chapter: TestChapter): string {
  if (chapter.document !== undefined) {
    return chapter.document
  }
  return `<?xml version="1.0" encoding="utf-8"?>
<!DOCTYPE html>
<html xmlns="http://www.w3.org/1999/xhtml">
<head>
  <title>${chapter.title}</title>
</head>
<body>
  <h1>${chapter.title}</h1>
  ${chapter.content}
</body>
</html>`
}

/**
 * Create a minimal valid EPUB for testing
 */
export async function createTestEpub(
  chapters: TestChapter[],
  options: TestEpubOptions = {}
): Promise<Uint8Array> {
  const zip = new JSZip()

  // mimetype must be first and uncompressed
  zip.file('mimetype', 'application/epub+zip', { compression: 'STORE' })

  if (options.container !== null) {
    zip.file(
      'META-INF/container.xml',
      options.container ??
        `<?xml version="1.0"?>
<container version="1.0" xmlns="urn:oasis:names:tc:opendocument:xmlns:container">
  <rootfiles>
    <rootfile full-path="OEBPS/content.opf" media-type="application/oebps-package+xml"/>
  </rootfiles>
</container>`
    )
  }

  const spineIds = options.spine ?? chapters.map(chapterId)
  const spineItems = spineIds.map((id) => `<itemref idref="${id}"/>`).join('\n    ')

  const manifestItems = chapters
    .map(
      (chapter, idx) =>
        `<item id="${chapterId(chapter, idx)}" href="chapter${idx + 1}.xhtml" media-type="${chapter.mediaType ?? 'application/xhtml+xml'}"/>`
    )
  if (options.includeNav) {
    manifestItems.push('<item id="nav" href="nav.xhtml" media-type="application/xhtml+xml" properties="nav"/>')
  }
  if (options.includeNcx) {
    manifestItems.push('<item id="ncx" href="toc.ncx" media-type="application/x-dtbncx+xml"/>')
  }

  zip.file(
    'OEBPS/content.opf',
    options.packageDocument ??
      `<?xml version="1.0"?>
<package xmlns="http://www.idpf.org/2007/opf" unique-identifier="bookid" version="3.0">
  <metadata xmlns:dc="http://purl.org/dc/elements/1.1/">
    <dc:title>${options.title ?? 'Test Book'}</dc:title>
    <dc:creator>${options.author ?? 'Test Author'}</dc:creator>
    <dc:identifier id="bookid">test-book-001</dc:identifier>
    <dc:language>en</dc:language>
  </metadata>
  <manifest>
    ${manifestItems.join('\n    ')}
  </manifest>
  <spine${options.includeNcx ? ' toc="ncx"' : ''}>
    ${spineItems}
  </spine>
</package>`
  )

  // The table of contents repeats every chapter title
  if (options.includeNav) {
    const links = chapters
      .map((chapter, idx) => `<li><a href="chapter${idx + 1}.xhtml">${chapter.title}</a></li>`)
      .join('\n      ')
    zip.file(
      'OEBPS/nav.xhtml',
      `<?xml version="1.0" encoding="utf-8"?>
<html xmlns="http://www.w3.org/1999/xhtml" xmlns:epub="http://www.idpf.org/2007/ops">
<head><title>Contents</title></head>
<body>
  <nav epub:type="toc">
    <ol>
      ${links}
    </ol>
  </nav>
</body>
</html>`
    )
  }
  if (options.includeNcx) {
    const points = chapters
      .map(
        (chapter, idx) =>
          `<navPoint id="np${idx + 1}" playOrder="${idx + 1}"><navLabel><text>${chapter.title}</text></navLabel><content src="chapter${idx + 1}.xhtml"/></navPoint>`
      )
      .join('\n    ')
    zip.file(
      'OEBPS/toc.ncx',
      `<?xml version="1.0" encoding="utf-8"?>
<ncx xmlns="http://www.daisy.org/z3986/2005/ncx/" version="2005-1">
  <navMap>
    ${points}
  </navMap>
</ncx>`
    )
  }

  chapters.forEach((chapter, idx) => {
    const name = `chapter${idx + 1}.xhtml`
    if (options.omitFiles?.includes(name)) return
    zip.file(`OEBPS/${name}`, chapterDocument(chapter))
  })

  return zip.generateAsync({ type: 'uint8array' })
}

/**
 * Write EPUB bytes to a fresh temp directory and return the file path
 */
export async function writeTempEpub(data: Uint8Array, name = 'book.epub'): Promise<string> {
  const dir = await mkdtemp(join(tmpdir(), 'termpage-epub-'))
  const path = join(dir, name)
  await writeFile(path, data)
  return path
}

/**
 * Build a paragraph from a plain string
 */
export function para(text: string, overrides: Partial<Paragraph> = {}): Paragraph {
  return {
    kind: 'body',
    words: text.split(/\s+/).filter((w) => w.length > 0),
    spans: [],
    ...overrides,
  }
}

/**
 * Build a chapter directly, bypassing archive parsing
 */
export function makeChapter(index: number, paragraphs: Paragraph[], title = `Chapter ${index + 1}`): Chapter {
  return {
    index,
    id: `chapter${index + 1}`,
    href: `OEBPS/chapter${index + 1}.xhtml`,
    title,
    linear: true,
    paragraphs,
  }
}

/**
 * Build a book from chapters, bypassing archive parsing
 */
export function makeBook(chapters: Chapter[], id = 'test-book'): Book {
  return {
    id,
    metadata: { title: 'Test Book', author: 'Test Author' },
    chapters,
    totalWords: chapters.reduce(
      (sum, chapter) => sum + chapter.paragraphs.reduce((n, p) => n + p.words.length, 0),
      0
    ),
  }
}

/**
 * A chapter of `count` single-line paragraphs ("Line 1", "Line 2", ...)
 */
export function numberedChapter(index: number, count: number): Chapter {
  return makeChapter(
    index,
    Array.from({ length: count }, (_, i) => para(`Line ${i + 1}`))
  )
}
