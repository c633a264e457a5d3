import DOMPurify from 'isomorphic-dompurify'
import type { SanitizerConfig } from '../config/pipeline.js'
import type { Logger } from './logger.js'

/**
 * Bidirectional override and mark characters to strip from all text.
 * Prevents text reordering attacks (bidi override) and invisible direction marks.
 */
const BIDI_REGEX = /[\u202A-\u202E\u2066-\u2069\u200E\u200F]/g

// Matched as whole blocks before the generic strip: the element *and* its body go.
const SCRIPT_BLOCK_REGEX = /<script\b[^>]*>[\s\S]*?<\/script\s*>/gi
const STYLE_BLOCK_REGEX = /<style\b[^>]*>[\s\S]*?<\/style\s*>/gi

/** An http(s) token runs until whitespace, a quote or an angle bracket. */
const URL_REGEX = /https?:\/\/[^\s<>"']+/gi

export const LINK_PLACEHOLDER = '[link removed]'

export interface StripUrlsResult<T extends string | null> {
  text: T
  removedUrls: string[]
}

/**
 * Apply Unicode NFC normalization and strip bidirectional override characters.
 */
function normalizeText(input: string): string {
  return input.normalize('NFC').replace(BIDI_REGEX, '')
}

function stripOnce(input: string): string {
  const withoutBlocks = normalizeText(input)
    .replace(SCRIPT_BLOCK_REGEX, '')
    .replace(STYLE_BLOCK_REGEX, '')

  const fragment = DOMPurify.sanitize(withoutBlocks, {
    ALLOWED_TAGS: [],
    ALLOWED_ATTR: [],
    RETURN_DOM_FRAGMENT: true,
  })

  return (fragment.textContent ?? '').trim()
}

/**
 * Every intermediate result of the markup strip, ending with the fixed point.
 * A pass can decode `&lt;https://x&gt;` into something the next pass parses as
 * a tag, so URLs have to be read from each pass, not only from the last.
 */
function stripPasses(input: string): string[] {
  const passes: string[] = []
  let current = input
  for (;;) {
    const next = stripOnce(current)
    passes.push(next)
    if (next === current || next === '') return passes
    current = next
  }
}

/**
 * Strip all markup from plain text, keeping the text content.
 *
 * Entities are decoded, so a pass can surface new markup (`&lt;b&gt;` becomes
 * `<b>`); passes repeat until the output stops changing.
 */
export function stripHtml(input: string): string
export function stripHtml(input: string | null): string | null
export function stripHtml(input: string | null): string | null {
  if (input === null || input === '') return input
  return stripPasses(input).at(-1) ?? ''
}

/**
 * Replace every http(s) URL with {@link LINK_PLACEHOLDER}.
 * Returns the rewritten text and the URLs that were removed, in order.
 */
export function stripUrls(input: string): StripUrlsResult<string>
export function stripUrls(input: string | null): StripUrlsResult<string | null>
export function stripUrls(input: string | null): StripUrlsResult<string | null> {
  if (input === null || input === '') return { text: input, removedUrls: [] }

  const removedUrls = input.match(URL_REGEX) ?? []
  if (removedUrls.length === 0) return { text: input, removedUrls }

  return { text: input.replace(URL_REGEX, LINK_PLACEHOLDER), removedUrls }
}

/**
 * Full pipeline for free-text fields: strip markup, then URLs.
 */
export function sanitizeText(input: string): string
export function sanitizeText(input: string | null): string | null
export function sanitizeText(input: string | null): string | null {
  return stripUrls(stripHtml(input)).text
}

// ---------------------------------------------------------------------------
// Configured sanitizer
// ---------------------------------------------------------------------------

export interface SanitizeFieldOptions {
  /** Overrides the configured strip-urls toggle for this call site. */
  stripUrls?: boolean
}

export interface Sanitizer {
  sanitizeField(input: string, options?: SanitizeFieldOptions): string
  sanitizeField(input: string | null, options?: SanitizeFieldOptions): string | null
  isEnabled(): boolean
}

export function createSanitizer(config: SanitizerConfig, logger?: Logger): Sanitizer {
  function sanitizeField(input: string, options?: SanitizeFieldOptions): string
  function sanitizeField(input: string | null, options?: SanitizeFieldOptions): string | null
  function sanitizeField(input: string | null, options: SanitizeFieldOptions = {}): string | null {
    if (!config.enabled || input === null || input === '') return input

    const passes = stripPasses(input)
    const stripped = passes.at(-1) ?? ''
    if (!(options.stripUrls ?? config.stripUrls)) return stripped

    const removedUrls = [...new Set(passes.flatMap((pass) => pass.match(URL_REGEX) ?? []))]
    if (removedUrls.length > 0) {
      logger?.debug({ removedUrls }, 'Removed URLs from submitted text')
    }
    return stripUrls(stripped).text
  }

  return {
    sanitizeField,
    isEnabled: () => config.enabled,
  }
}
