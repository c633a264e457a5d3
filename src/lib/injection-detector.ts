import type { InjectionAction, InjectionDetectorConfig } from '../config/pipeline.js'
import type { Logger } from './logger.js'

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type InjectionCategory =
  | 'instruction_override'
  | 'output_manipulation'
  | 'role_manipulation'
  | 'extraction'

export interface InjectionPattern {
  pattern: RegExp
  category: InjectionCategory
  label: string
}

export type InjectionScanResult =
  | { status: 'clean' }
  | { status: 'suspicious'; reasons: string[]; categories: InjectionCategory[] }

export type ScannedField = 'title' | 'summary' | 'source'

export interface ScannableContent {
  title: string | null
  summary: string | null
  source: string | null
}

// ---------------------------------------------------------------------------
// Pattern table
// ---------------------------------------------------------------------------

const OVERRIDE = 'instruction override attempt'
const OUTPUT = 'output format manipulation'
const ROLE = 'role manipulation attempt'
const EXTRACTION = 'prompt extraction attempt'

export const INJECTION_PATTERNS: readonly InjectionPattern[] = [
  // Attempts to override the governing instructions
  { pattern: /ignore\s+(all\s+)?previous\s+instructions?/i, category: 'instruction_override', label: OVERRIDE },
  { pattern: /disregard\s+(the\s+)?(above|previous)/i, category: 'instruction_override', label: OVERRIDE },
  {
    pattern: /forget\s+(everything|all)\s+(above|previous|your\s+instructions|instructions)/i,
    category: 'instruction_override',
    label: OVERRIDE,
  },
  { pattern: /forget\s+your\s+instructions/i, category: 'instruction_override', label: OVERRIDE },
  { pattern: /do\s+not\s+follow\s+(the\s+)?(above|previous|system)/i, category: 'instruction_override', label: OVERRIDE },
  { pattern: /new\s+instructions?\s*:/i, category: 'instruction_override', label: 'new instructions injection' },
  { pattern: /override\s+(the\s+)?system/i, category: 'instruction_override', label: 'system override attempt' },

  // Attempts to dictate the moderator's output
  { pattern: /output\s+(only\s+)?json/i, category: 'output_manipulation', label: OUTPUT },
  { pattern: /respond\s+with\s+(only\s+)?[{[]/i, category: 'output_manipulation', label: OUTPUT },
  { pattern: /return\s+(this\s+)?json\s*:/i, category: 'output_manipulation', label: OUTPUT },
  { pattern: /your\s+response\s+(should|must)\s+be\s*:/i, category: 'output_manipulation', label: 'response format manipulation' },
  {
    pattern: /\{\s*"decision"\s*:\s*"approve"/i,
    category: 'output_manipulation',
    label: 'direct moderation response injection',
  },

  // Attempts to change the model's role
  { pattern: /you\s+are\s+now\s+(a|an|the)\b/i, category: 'role_manipulation', label: ROLE },
  { pattern: /act\s+as\s+(if\s+you\s+(are|were)|a|an)\b/i, category: 'role_manipulation', label: ROLE },
  { pattern: /pretend\s+(to\s+be|you\s+are)/i, category: 'role_manipulation', label: ROLE },
  { pattern: /from\s+now\s+on,?\s+you/i, category: 'role_manipulation', label: ROLE },
  { pattern: /assume\s+the\s+role\s+of/i, category: 'role_manipulation', label: ROLE },

  // Attempts to extract the governing prompt
  { pattern: /reveal\s+your\s+(system\s+)?prompt/i, category: 'extraction', label: EXTRACTION },
  {
    pattern: /show\s+(me\s+)?(your\s+)?system\s+(message|prompt|instructions)/i,
    category: 'extraction',
    label: EXTRACTION,
  },
  { pattern: /what\s+are\s+your\s+instructions/i, category: 'extraction', label: EXTRACTION },
  { pattern: /print\s+your\s+(initial\s+)?instructions/i, category: 'extraction', label: EXTRACTION },
  {
    pattern: /repeat\s+(the\s+)?(above|your)\s+(text|prompt|instructions)/i,
    category: 'extraction',
    label: EXTRACTION,
  },
]

const PREVIEW_LENGTH = 100

const SCANNED_FIELDS: readonly ScannedField[] = ['title', 'summary', 'source']

// ---------------------------------------------------------------------------
// Matching (pure)
// ---------------------------------------------------------------------------

/**
 * Match `text` against the pattern table. Reasons are unique by label and keep
 * table order; a text may trip several categories at once.
 */
export function matchInjectionPatterns(
  text: string,
  patterns: readonly InjectionPattern[] = INJECTION_PATTERNS
): InjectionScanResult {
  const reasons: string[] = []
  const categories: InjectionCategory[] = []

  for (const { pattern, category, label } of patterns) {
    if (!pattern.test(text)) continue
    if (!reasons.includes(label)) reasons.push(label)
    if (!categories.includes(category)) categories.push(category)
  }

  return reasons.length === 0 ? { status: 'clean' } : { status: 'suspicious', reasons, categories }
}

// ---------------------------------------------------------------------------
// Detector
// ---------------------------------------------------------------------------

export interface InjectionDetector {
  /** Scan a single text. `null` and empty strings are clean. */
  scan(text: string | null): InjectionScanResult
  /**
   * Scan title, summary and source independently. Reasons are annotated with
   * the field they came from: `"<reason> (in <field>)"`.
   */
  scanContent(content: ScannableContent, contentId?: string): InjectionScanResult
  /** What the caller should do with a suspicious verdict. */
  action(): InjectionAction
  isEnabled(): boolean
  /** Pattern count per category. */
  patternCategories(): Record<InjectionCategory, number>
}

export function createInjectionDetector(
  config: InjectionDetectorConfig,
  logger: Logger
): InjectionDetector {
  function scan(text: string | null): InjectionScanResult {
    if (!config.enabled || text === null || text === '') return { status: 'clean' }

    const result = matchInjectionPatterns(text)
    if (result.status === 'suspicious') {
      logger.warn(
        { patterns: result.reasons, textPreview: text.slice(0, PREVIEW_LENGTH) },
        'Prompt injection patterns detected'
      )
    }
    return result
  }

  function scanContent(content: ScannableContent, contentId?: string): InjectionScanResult {
    const reasons: string[] = []
    const categories: InjectionCategory[] = []
    const suspiciousFields: ScannedField[] = []

    for (const field of SCANNED_FIELDS) {
      const result = scan(content[field])
      if (result.status === 'clean') continue

      suspiciousFields.push(field)
      for (const reason of result.reasons) {
        const annotated = `${reason} (in ${field})`
        if (!reasons.includes(annotated)) reasons.push(annotated)
      }
      for (const category of result.categories) {
        if (!categories.includes(category)) categories.push(category)
      }
    }

    if (suspiciousFields.length === 0) return { status: 'clean' }

    logger.warn({ contentId, suspiciousFields }, 'Prompt injection detected in submitted content')
    return { status: 'suspicious', reasons, categories }
  }

  function patternCategories(): Record<InjectionCategory, number> {
    const counts: Record<InjectionCategory, number> = {
      instruction_override: 0,
      output_manipulation: 0,
      role_manipulation: 0,
      extraction: 0,
    }
    for (const { category } of INJECTION_PATTERNS) {
      counts[category] += 1
    }
    return counts
  }

  return {
    scan,
    scanContent,
    action: () => config.action,
    isEnabled: () => config.enabled,
    patternCategories,
  }
}
