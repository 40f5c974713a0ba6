import { homedir } from 'node:os'
import { join } from 'node:path'
import type {
  Breakpoint,
  LayoutConfig,
  ReaderConfig,
  ReaderConfigOverrides,
  StyleConfig,
  StyleOptions,
  ViewportConfig,
  ViewportLayout,
} from './types'

export const DEFAULT_STYLE_OPTIONS: StyleOptions = {
  indent: 0,
  paragraphSpacing: 1,
  headingSpacing: 1,
  quoteIndent: 4,
}

export const DEFAULT_STYLE_CONFIG: StyleConfig = {
  width: 80,
  indent: 0,
  paragraphSpacing: 1,
  headingSpacing: 1,
  quoteIndent: 4,
}

export const DEFAULT_BREAKPOINTS: Breakpoint[] = [
  { maxWidth: 80, paddingX: 2 },    // small terminals
  { maxWidth: 120, paddingX: 8 },   // medium
  { maxWidth: 160, paddingX: 20 },  // large
  { maxWidth: 9999, paddingX: 35 }, // extra large
]

export const DEFAULT_LAYOUT_CONFIG: LayoutConfig = {
  responsivePadding: true,
  breakpoints: DEFAULT_BREAKPOINTS,
  fallbackPaddingX: 30,
  reservedRows: 2,
  minTextWidth: 20,
}

export const DEFAULT_HISTORY_LIMIT = 50

/**
 * Where reading state is kept unless configured otherwise
 */
export function defaultStatePath(env: NodeJS.ProcessEnv = process.env, home: string = homedir()): string {
  if (env.TERMPAGE_STATE_FILE) {
    return env.TERMPAGE_STATE_FILE
  }
  const stateHome = env.XDG_STATE_HOME || join(home, '.local', 'state')
  return join(stateHome, 'termpage', 'state.json')
}

export function defaultReaderConfig(): ReaderConfig {
  return {
    style: { ...DEFAULT_STYLE_OPTIONS },
    fillToNextChapter: false,
    historyLimit: DEFAULT_HISTORY_LIMIT,
    layout: { ...DEFAULT_LAYOUT_CONFIG, breakpoints: [...DEFAULT_BREAKPOINTS] },
    statePath: defaultStatePath(),
  }
}

function warnInvalid(name: string, value: unknown, fallback: unknown): void {
  console.warn(`Invalid configuration value for ${name}: ${JSON.stringify(value)}; using ${JSON.stringify(fallback)}`)
}

function integerOption(name: string, value: unknown, fallback: number, min = 0): number {
  if (value === undefined) return fallback
  if (typeof value === 'number' && Number.isInteger(value) && value >= min) return value
  warnInvalid(name, value, fallback)
  return fallback
}

function booleanOption(name: string, value: unknown, fallback: boolean): boolean {
  if (value === undefined) return fallback
  if (typeof value === 'boolean') return value
  warnInvalid(name, value, fallback)
  return fallback
}

function breakpointsOption(value: unknown, fallback: Breakpoint[]): Breakpoint[] {
  if (value === undefined) return [...fallback]

  const valid =
    Array.isArray(value) &&
    value.length > 0 &&
    value.every(
      (bp: unknown) =>
        typeof bp === 'object' &&
        bp !== null &&
        'maxWidth' in bp &&
        'paddingX' in bp &&
        Number.isInteger(bp.maxWidth) &&
        Number.isInteger(bp.paddingX) &&
        Number(bp.maxWidth) >= 1 &&
        Number(bp.paddingX) >= 0
    )
  if (!valid) {
    warnInvalid('layout.breakpoints', value, fallback)
    return [...fallback]
  }

  return value
    .map((bp: Breakpoint) => ({ maxWidth: bp.maxWidth, paddingX: bp.paddingX }))
    .sort((a, b) => a.maxWidth - b.maxWidth)
}

/**
 * Merge overrides onto the defaults. Invalid values fall back to the
 * default with a warning rather than failing.
 */
export function resolveReaderConfig(overrides: ReaderConfigOverrides = {}): ReaderConfig {
  const defaults = defaultReaderConfig()
  const style = overrides.style ?? {}
  const layout = overrides.layout ?? {}

  const resolved: ReaderConfig = {
    style: {
      indent: integerOption('style.indent', style.indent, defaults.style.indent),
      paragraphSpacing: integerOption('style.paragraphSpacing', style.paragraphSpacing, defaults.style.paragraphSpacing),
      headingSpacing: integerOption('style.headingSpacing', style.headingSpacing, defaults.style.headingSpacing),
      quoteIndent: integerOption('style.quoteIndent', style.quoteIndent, defaults.style.quoteIndent),
    },
    fillToNextChapter: booleanOption('fillToNextChapter', overrides.fillToNextChapter, defaults.fillToNextChapter),
    historyLimit: integerOption('historyLimit', overrides.historyLimit, defaults.historyLimit),
    layout: {
      responsivePadding: booleanOption('layout.responsivePadding', layout.responsivePadding, defaults.layout.responsivePadding),
      breakpoints: breakpointsOption(layout.breakpoints, defaults.layout.breakpoints),
      fallbackPaddingX: integerOption('layout.fallbackPaddingX', layout.fallbackPaddingX, defaults.layout.fallbackPaddingX),
      reservedRows: integerOption('layout.reservedRows', layout.reservedRows, defaults.layout.reservedRows),
      minTextWidth: integerOption('layout.minTextWidth', layout.minTextWidth, defaults.layout.minTextWidth, 1),
    },
    statePath: overrides.statePath ?? defaults.statePath,
  }

  if (style.maxWidth !== undefined) {
    const maxWidth = integerOption('style.maxWidth', style.maxWidth, 0, 1)
    if (maxWidth > 0) resolved.style.maxWidth = maxWidth
  }
  if (overrides.parseTimeoutMs !== undefined) {
    const timeout = integerOption('parseTimeoutMs', overrides.parseTimeoutMs, 0, 1)
    if (timeout > 0) resolved.parseTimeoutMs = timeout
  }

  return resolved
}

/**
 * Clamp a style to values the wrapper can honour: integer widths, at least one
 * column, indents that leave room for at least one character.
 */
export function normalizeStyle(style: StyleConfig): StyleConfig {
  const width = Math.max(1, Math.floor(style.width))
  const clamp = (value: number, max: number) => Math.min(Math.max(0, Math.floor(value)), max)

  return {
    width,
    indent: clamp(style.indent, width - 1),
    paragraphSpacing: clamp(style.paragraphSpacing, Number.MAX_SAFE_INTEGER),
    headingSpacing: clamp(style.headingSpacing, Number.MAX_SAFE_INTEGER),
    quoteIndent: clamp(style.quoteIndent, width - 1),
  }
}

/**
 * Horizontal padding for a terminal width, from the breakpoint table
 */
export function responsivePadding(columns: number, layout: LayoutConfig): number {
  if (!layout.responsivePadding) {
    return layout.fallbackPaddingX
  }

  const breakpoint = layout.breakpoints.find((bp) => columns <= bp.maxWidth)
  return breakpoint ? breakpoint.paddingX : layout.fallbackPaddingX
}

/**
 * Turn terminal dimensions into the wrap style and page height
 */
export function computeViewportLayout(viewport: ViewportConfig, config: ReaderConfig): ViewportLayout {
  const columns = Math.max(1, Math.floor(viewport.columns))
  const rows = Math.max(1, Math.floor(viewport.rows))
  const { layout, style } = config

  let width = columns - 2 * responsivePadding(columns, layout)
  if (style.maxWidth !== undefined) {
    width = Math.min(width, style.maxWidth)
  }
  width = Math.max(width, Math.min(layout.minTextWidth, columns), 1)

  return {
    style: normalizeStyle({
      width,
      indent: style.indent,
      paragraphSpacing: style.paragraphSpacing,
      headingSpacing: style.headingSpacing,
      quoteIndent: style.quoteIndent,
    }),
    pageHeight: Math.max(1, rows - layout.reservedRows),
  }
}
