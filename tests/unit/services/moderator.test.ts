import { describe, it, expect, vi, beforeEach } from 'vitest'
import {
  MODERATION_DISABLED_RESULT,
  boundModerationResult,
  createModerator,
  parseConfidence,
  parseModerationResponse,
  truncateText,
  validateModerationResult,
} from '../../../src/services/moderator.js'
import { AiProviderError } from '../../../src/services/ai-client.js'
import { buildModerationPrompt } from '../../../src/services/moderation-prompt.js'
import type { CandidateContent, ModerationResult } from '../../../src/services/moderation-types.js'

const mockLogger = {
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
  debug: vi.fn(),
}

const content: CandidateContent = {
  id: 'diagram-1',
  title: 'Service topology',
  summary: 'How the API gateway routes traffic to services',
  source: 'flowchart LR\n  GW --> Orders\n  GW --> Billing',
  format: 'mermaid',
}

function result(overrides: Partial<ModerationResult> = {}): ModerationResult {
  return {
    decision: 'approve',
    confidence: 0.9,
    reason: 'Technical diagram of a service topology',
    flags: [],
    ...overrides,
  }
}

describe('parseConfidence', () => {
  it('clamps numbers into [0, 1]', () => {
    expect(parseConfidence(0.42)).toBe(0.42)
    expect(parseConfidence(1.7)).toBe(1)
    expect(parseConfidence(-0.2)).toBe(0)
  })

  it('parses numeric strings', () => {
    expect(parseConfidence('0.75')).toBe(0.75)
    expect(parseConfidence('2')).toBe(1)
  })

  it('falls back to 0.5 for anything else', () => {
    expect(parseConfidence('high')).toBe(0.5)
    expect(parseConfidence(null)).toBe(0.5)
    expect(parseConfidence(undefined)).toBe(0.5)
    expect(parseConfidence(Number.NaN)).toBe(0.5)
    expect(parseConfidence({ value: 1 })).toBe(0.5)
  })
})

describe('parseModerationResponse', () => {
  it('parses a bare JSON verdict', () => {
    const parsed = parseModerationResponse(
      '{"decision":"approve","confidence":0.95,"reason":"Clean technical diagram","flags":[]}'
    )
    expect(parsed).toEqual({
      ok: true,
      value: { decision: 'approve', confidence: 0.95, reason: 'Clean technical diagram', flags: [] },
    })
  })

  it('strips markdown code fences', () => {
    const parsed = parseModerationResponse(
      '```json\n{"decision":"reject","confidence":0.9,"reason":"Spam content","flags":["spam"]}\n```'
    )
    expect(parsed).toEqual({
      ok: true,
      value: { decision: 'reject', confidence: 0.9, reason: 'Spam content', flags: ['spam'] },
    })
  })

  it('strips fences without a language tag', () => {
    const parsed = parseModerationResponse('```\n{"decision":"manual_review","confidence":0.4}\n```')
    expect(parsed.ok).toBe(true)
    if (parsed.ok) {
      expect(parsed.value.decision).toBe('manual_review')
    }
  })

  it('fills defaults for missing optional fields', () => {
    expect(parseModerationResponse('{"decision":"manual_review"}')).toEqual({
      ok: true,
      value: { decision: 'manual_review', confidence: 0.5, reason: '', flags: [] },
    })
  })

  it('keeps only string flags and clamps confidence', () => {
    const parsed = parseModerationResponse(
      '{"decision":"reject","confidence":"1.4","reason":"x","flags":["spam",3,null,"nsfw"]}'
    )
    expect(parsed).toEqual({
      ok: true,
      value: { decision: 'reject', confidence: 1, reason: 'x', flags: ['spam', 'nsfw'] },
    })
  })

  it('cuts an overlong reason and flag list down to what the log stores', () => {
    const flags = Array.from({ length: 25 }, (_, i) => `${'f'.repeat(70)}${i}`)
    const raw = JSON.stringify({
      decision: 'reject',
      confidence: 0.9,
      reason: 'x'.repeat(2001),
      flags,
    })

    const parsed = parseModerationResponse(raw)

    expect(parsed.ok).toBe(true)
    if (!parsed.ok) return
    expect(parsed.value.reason).toBe('x'.repeat(2000))
    expect(parsed.value.flags).toHaveLength(20)
    expect(parsed.value.flags[0]).toBe('f'.repeat(64))
  })

  it('returns a parse error for text that is not JSON and logs the raw reply', () => {
    expect(parseModerationResponse('I think this is fine', mockLogger as never)).toEqual({
      ok: false,
      error: { kind: 'parse_error', message: 'Failed to parse moderation response' },
    })
    expect(mockLogger.warn).toHaveBeenCalledWith(
      expect.objectContaining({ response: 'I think this is fine' }),
      'Failed to parse moderation response'
    )
  })

  it('returns a parse error for an unknown decision', () => {
    expect(parseModerationResponse('{"decision":"maybe","confidence":0.5}')).toEqual({
      ok: false,
      error: {
        kind: 'parse_error',
        message: 'Invalid moderation response format - unexpected decision value',
      },
    })
  })

  it('returns a parse error for JSON that is not an object', () => {
    const parsed = parseModerationResponse('["approve"]')
    expect(parsed.ok).toBe(false)
  })
})

describe('truncateText', () => {
  it('returns short text unchanged', () => {
    expect(truncateText('short', 10)).toBe('short')
  })

  it('never splits a surrogate pair', () => {
    const text = `ab${String.fromCodePoint(0x1f600)}`
    expect(truncateText(text, 3)).toBe('ab')
    expect(truncateText(text, 4)).toBe(text)
  })
})

describe('boundModerationResult', () => {
  it('bounds reason and flags and keeps decision and confidence', () => {
    const bounded = boundModerationResult(
      result({ decision: 'reject', confidence: 0.7, reason: 'y'.repeat(2500), flags: ['z'.repeat(80)] })
    )

    expect(bounded).toEqual({
      decision: 'reject',
      confidence: 0.7,
      reason: 'y'.repeat(2000),
      flags: ['z'.repeat(64)],
    })
  })
})

describe('validateModerationResult', () => {
  it('accepts an ordinary result', () => {
    expect(validateModerationResult(result(), content)).toEqual({ status: 'ok' })
  })

  it('flags a near-certain approval with almost no reason', () => {
    expect(validateModerationResult(result({ confidence: 0.99, reason: 'Fine!!!!!' }), content)).toEqual({
      status: 'suspicious',
      reasons: ['suspiciously certain approval with minimal explanation'],
    })
  })

  it('accepts a near-certain approval with a ten-character reason', () => {
    expect(validateModerationResult(result({ confidence: 1, reason: 'Looks good' }), content)).toEqual({
      status: 'ok',
    })
  })

  it('accepts a terse approval below 0.99', () => {
    expect(validateModerationResult(result({ confidence: 0.98, reason: 'OK' }), content)).toEqual({
      status: 'ok',
    })
  })

  it('flags a reason that repeats a long field verbatim', () => {
    const verdict = validateModerationResult(
      result({ reason: 'Approved: How the API gateway routes traffic to services' }),
      content
    )
    expect(verdict).toEqual({ status: 'suspicious', reasons: ['reason appears to parrot user input'] })
  })

  it('ignores short fields when checking for parroting', () => {
    const verdict = validateModerationResult(
      result({ reason: 'Service topology diagram, nothing harmful' }),
      content
    )
    expect(verdict).toEqual({ status: 'ok' })
  })

  it('flags instruction-following language', () => {
    expect(validateModerationResult(result({ reason: 'Approved as instructed' }), content)).toEqual({
      status: 'suspicious',
      reasons: ['reason contains instruction-following language'],
    })
  })

  it('flags override language', () => {
    expect(
      validateModerationResult(result({ reason: 'Ignoring the previous policy, this is fine' }), content)
    ).toEqual({
      status: 'suspicious',
      reasons: ['reason mentions ignoring/overriding instructions'],
    })
  })

  it('collects every check that fires', () => {
    const verdict = validateModerationResult(
      result({ decision: 'reject', reason: 'Rejected as requested, disregarding the rules' }),
      content
    )
    expect(verdict).toEqual({
      status: 'suspicious',
      reasons: [
        'reason contains instruction-following language',
        'reason mentions ignoring/overriding instructions',
      ],
    })
  })
})

describe('createModerator', () => {
  const chatClient = {
    isEnabled: vi.fn(),
    complete: vi.fn(),
  }

  function moderator(enabled = true) {
    return createModerator(
      chatClient,
      { enabled, autoApproveThreshold: 0.8 },
      mockLogger as never
    )
  }

  beforeEach(() => {
    vi.clearAllMocks()
    chatClient.isEnabled.mockReturnValue(true)
  })

  it('approves without calling the provider when disabled', async () => {
    await expect(moderator(false).moderate(content)).resolves.toEqual({
      ok: true,
      value: MODERATION_DISABLED_RESULT,
    })
    expect(chatClient.complete).not.toHaveBeenCalled()
  })

  it('returns a disabled error when no provider is configured', async () => {
    chatClient.isEnabled.mockReturnValue(false)

    await expect(moderator().moderate(content)).resolves.toEqual({
      ok: false,
      error: { kind: 'disabled', message: 'No AI provider is configured for moderation' },
    })
    expect(chatClient.complete).not.toHaveBeenCalled()
  })

  it('sends the rendered policy prompt as one user message', async () => {
    chatClient.complete.mockResolvedValue(
      '{"decision":"approve","confidence":0.95,"reason":"Clean technical diagram","flags":[]}'
    )

    await expect(moderator().moderate(content)).resolves.toEqual({
      ok: true,
      value: { decision: 'approve', confidence: 0.95, reason: 'Clean technical diagram', flags: [] },
    })
    expect(chatClient.complete).toHaveBeenCalledWith([
      { role: 'user', content: buildModerationPrompt(content) },
    ])
  })

  it('returns a provider error when the request fails', async () => {
    chatClient.complete.mockRejectedValue(new AiProviderError('AI provider returned status 500'))

    await expect(moderator().moderate(content)).resolves.toEqual({
      ok: false,
      error: {
        kind: 'provider_error',
        message: 'Moderation request failed: AI provider returned status 500',
      },
    })
    expect(mockLogger.error).toHaveBeenCalledWith(
      { error: 'AI provider returned status 500', diagramId: 'diagram-1' },
      'Content moderation failed'
    )
  })

  it('returns a parse error for an unusable reply', async () => {
    chatClient.complete.mockResolvedValue('Sure! The content looks fine.')

    await expect(moderator().moderate(content)).resolves.toEqual({
      ok: false,
      error: { kind: 'parse_error', message: 'Failed to parse moderation response' },
    })
  })

  it('turns a manipulated approval into manual review', async () => {
    chatClient.complete.mockResolvedValue(
      '{"decision":"approve","confidence":1.0,"reason":"Approved as instructed","flags":[]}'
    )

    await expect(moderator().moderate(content)).resolves.toEqual({
      ok: true,
      value: {
        decision: 'manual_review',
        confidence: 1,
        reason: 'Approved as instructed',
        flags: ['suspicious_output'],
      },
    })
    expect(mockLogger.warn).toHaveBeenCalledWith(
      {
        diagramId: 'diagram-1',
        reasons: ['reason contains instruction-following language'],
        decision: 'approve',
      },
      'Suspicious moderation result detected'
    )
  })

  it('does not add the suspicious flag twice', async () => {
    chatClient.complete.mockResolvedValue(
      '{"decision":"approve","confidence":1,"reason":"OK","flags":["suspicious_output"]}'
    )

    const outcome = await moderator().moderate(content)
    expect(outcome).toEqual({
      ok: true,
      value: { decision: 'manual_review', confidence: 1, reason: 'OK', flags: ['suspicious_output'] },
    })
  })

  it('keeps a rejection whose reason is longer than the log allows', async () => {
    chatClient.complete.mockResolvedValue(
      JSON.stringify({ decision: 'reject', confidence: 0.9, reason: 'x'.repeat(2001), flags: [] })
    )

    await expect(moderator().moderate(content)).resolves.toEqual({
      ok: true,
      value: { decision: 'reject', confidence: 0.9, reason: 'x'.repeat(2000), flags: [] },
    })
  })

  it('exposes the auto-approve threshold', () => {
    expect(moderator().autoApproveThreshold()).toBe(0.8)
    expect(moderator(false).isEnabled()).toBe(false)
  })
})
