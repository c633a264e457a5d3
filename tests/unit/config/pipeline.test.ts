import { describe, it, expect } from 'vitest'
import { parseEnv } from '../../../src/config/env.js'
import { DEFAULT_PIPELINE_CONFIG, buildPipelineConfig } from '../../../src/config/pipeline.js'

const baseEnv = {
  DATABASE_URL: 'postgresql://localhost:5432/diagrams',
  VALKEY_URL: 'redis://localhost:6379',
  MODERATION_API_TOKEN: 'test-secret-token-that-is-at-least-32-chars',
}

describe('buildPipelineConfig', () => {
  it('matches the defaults when only required variables are set', () => {
    expect(buildPipelineConfig(parseEnv(baseEnv))).toEqual(DEFAULT_PIPELINE_CONFIG)
  })

  it('maps overrides onto each component', () => {
    const config = buildPipelineConfig(
      parseEnv({
        ...baseEnv,
        SANITIZER_STRIP_URLS: 'false',
        INJECTION_DETECTION_ACTION: 'reject',
        MODERATION_AUTO_APPROVE_THRESHOLD: '0.9',
        RATE_LIMIT_CONTENT_PER_DAY: '20',
        AI_API_URL: 'http://localhost:11434/v1',
        AI_API_KEY: 'test-key',
      })
    )

    expect(config.sanitizer).toEqual({ enabled: true, stripUrls: false })
    expect(config.injectionDetector).toEqual({ enabled: true, action: 'reject' })
    expect(config.moderator.autoApproveThreshold).toBe(0.9)
    expect(config.rateLimits.contentPerDay).toEqual({ limit: 20, windowMs: 86_400_000 })
    expect(config.ai.baseUrl).toBe('http://localhost:11434/v1')
    expect(config.ai.apiKey).toBe('test-key')
  })
})
