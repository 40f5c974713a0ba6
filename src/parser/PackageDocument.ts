/**
 * OCF container and OPF package document parsing.
 *
 * META-INF/container.xml names the package document:
 *
 * <container version="1.0" xmlns="urn:oasis:names:tc:opendocument:xmlns:container">
 *   <rootfiles>
 *     <rootfile full-path="OEBPS/content.opf" media-type="application/oebps-package+xml"/>
 *   </rootfiles>
 * </container>
 *
 * The package document carries the metadata, the manifest (id -> resource)
 * and the spine (ordered itemrefs into the manifest).
 */

import { posix } from 'node:path'
import { XMLParser, XMLValidator } from 'fast-xml-parser'
import { ManifestError } from '@/errors'
import type { BookMetadata, ManifestItem, PackageDocument, SpineItem } from './types'

export const CONTAINER_PATH = 'META-INF/container.xml'

const UNKNOWN_TITLE = 'Unknown Title'
const UNKNOWN_AUTHOR = 'Unknown Author'

/**
 * Parser options for fast-xml-parser. Namespace prefixes are dropped so that
 * `dc:title` and `opf:package` read the same as their unprefixed forms.
 */
const PARSER_OPTIONS = {
  ignoreAttributes: false,
  attributeNamePrefix: '@_',
  textNodeName: '#text',
  removeNSPrefix: true,
  parseTagValue: false,
  parseAttributeValue: false,
  trimValues: true,
  isArray: (name: string) => {
    return ['rootfile', 'item', 'itemref', 'title', 'creator', 'language', 'publisher', 'identifier'].includes(name)
  },
}

type XmlRecord = Record<string, unknown>

function isRecord(value: unknown): value is XmlRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function asArray(value: unknown): unknown[] {
  if (value === undefined || value === null) return []
  return Array.isArray(value) ? value : [value]
}

function textOf(value: unknown): string | undefined {
  if (typeof value === 'string') {
    const text = value.trim()
    return text.length > 0 ? text : undefined
  }
  if (isRecord(value)) {
    return textOf(value['#text'])
  }
  return undefined
}

function attribute(node: unknown, name: string): string | undefined {
  if (!isRecord(node)) return undefined
  const value = node[`@_${name}`]
  return typeof value === 'string' ? value : undefined
}

function child(node: unknown, name: string): unknown {
  return isRecord(node) ? node[name] : undefined
}

function parseXml(xml: string, label: string): XmlRecord {
  const validation = XMLValidator.validate(xml)
  if (validation !== true) {
    const { msg, line } = validation.err
    throw new ManifestError(`Malformed ${label} (line ${line}): ${msg}`)
  }

  const parsed: unknown = new XMLParser(PARSER_OPTIONS).parse(xml)
  if (!isRecord(parsed)) {
    throw new ManifestError(`Malformed ${label}: no root element`)
  }
  return parsed
}

/**
 * Read the package document path out of container.xml
 */
export function parseContainer(xml: string): string {
  const doc = parseXml(xml, CONTAINER_PATH)
  const rootfiles = asArray(child(child(doc.container, 'rootfiles'), 'rootfile'))

  const packageRoot =
    rootfiles.find((rootfile) => attribute(rootfile, 'media-type') === 'application/oebps-package+xml') ??
    rootfiles[0]
  const fullPath = attribute(packageRoot, 'full-path')

  if (!fullPath) {
    throw new ManifestError('Invalid EPUB: container.xml does not name a package document')
  }
  return fullPath
}

function decodeHref(href: string): string {
  try {
    return decodeURIComponent(href)
  } catch {
    return href
  }
}

/**
 * Resolve a manifest href against the package document's directory
 */
export function resolveHref(packagePath: string, href: string): string {
  const decoded = decodeHref(href.split('#')[0] ?? '')
  const baseDir = posix.dirname(packagePath)
  const joined = baseDir === '.' ? decoded : posix.join(baseDir, decoded)
  return posix.normalize(joined).replace(/^\/+/, '')
}

function parseMetadata(metadata: unknown): BookMetadata {
  const creators = asArray(child(metadata, 'creator'))
    .map(textOf)
    .filter((name): name is string => name !== undefined)

  return {
    title: textOf(asArray(child(metadata, 'title'))[0]) ?? UNKNOWN_TITLE,
    author: creators.length > 0 ? creators.join(', ') : UNKNOWN_AUTHOR,
    language: textOf(asArray(child(metadata, 'language'))[0]),
    publisher: textOf(asArray(child(metadata, 'publisher'))[0]),
    identifier: textOf(asArray(child(metadata, 'identifier'))[0]),
  }
}

function parseManifest(manifest: unknown, packagePath: string): Map<string, ManifestItem> {
  const items = new Map<string, ManifestItem>()

  for (const item of asArray(child(manifest, 'item'))) {
    const id = attribute(item, 'id')
    const href = attribute(item, 'href')
    if (!id || !href) {
      throw new ManifestError('Manifest item is missing its id or href')
    }
    if (items.has(id)) {
      throw new ManifestError(`Manifest declares item "${id}" more than once`)
    }

    items.set(id, {
      id,
      href: resolveHref(packagePath, href),
      mediaType: attribute(item, 'media-type') ?? '',
      properties: (attribute(item, 'properties') ?? '').split(/\s+/).filter((p) => p.length > 0),
    })
  }

  return items
}

function parseSpine(spine: unknown): SpineItem[] {
  return asArray(child(spine, 'itemref')).map((itemref) => {
    const idref = attribute(itemref, 'idref')
    if (!idref) {
      throw new ManifestError('Spine itemref is missing its idref')
    }
    return { idref, linear: attribute(itemref, 'linear') !== 'no' }
  })
}

/**
 * Parse the OPF package document
 * @param xml - Package document source
 * @param packagePath - Path of the package document inside the container
 */
export function parsePackageDocument(xml: string, packagePath: string): PackageDocument {
  const doc = parseXml(xml, packagePath)
  const pkg = doc.package

  if (!isRecord(pkg)) {
    throw new ManifestError(`Invalid package document ${packagePath}: no <package> element`)
  }
  if (pkg.manifest === undefined) {
    throw new ManifestError(`Invalid package document ${packagePath}: no <manifest>`)
  }
  if (pkg.spine === undefined) {
    throw new ManifestError(`Invalid package document ${packagePath}: no <spine>`)
  }

  return {
    path: packagePath,
    metadata: parseMetadata(pkg.metadata),
    manifest: parseManifest(pkg.manifest, packagePath),
    spine: parseSpine(pkg.spine),
  }
}
