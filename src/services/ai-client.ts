import { z } from 'zod/v4'
import type { AiClientConfig } from '../config/pipeline.js'
import type { Logger } from '../lib/logger.js'

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface ChatMessage {
  role: 'system' | 'user' | 'assistant'
  content: string
}

export interface ChatClient {
  /** Whether a provider is configured. */
  isEnabled(): boolean
  /**
   * Send one chat-completion request and return the first choice's content.
   * Throws {@link AiProviderError} on any transport, HTTP or payload failure.
   */
  complete(messages: ChatMessage[]): Promise<string>
}

export class AiProviderError extends Error {
  readonly status: number | undefined

  constructor(message: string, options: { status?: number; cause?: unknown } = {}) {
    super(message, { cause: options.cause })
    this.name = 'AiProviderError'
    this.status = options.status
  }
}

/** OpenAI-compatible chat completion response (the parts we read). */
const chatCompletionResponseSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string().nullable(),
        }),
      })
    )
    .min(1),
})

// ---------------------------------------------------------------------------
// Implementation
// ---------------------------------------------------------------------------

/**
 * Create a client for an OpenAI-compatible chat completions API.
 *
 * Without an API key the client is disabled: `isEnabled()` returns false and
 * `complete()` rejects. Requests are single-shot; each one is bounded by the
 * configured timeout, and a timeout surfaces as an {@link AiProviderError}.
 */
export function createChatClient(config: AiClientConfig, logger: Logger): ChatClient {
  const endpoint = `${config.baseUrl.replace(/\/+$/, '')}/chat/completions`

  return {
    isEnabled(): boolean {
      return typeof config.apiKey === 'string' && config.apiKey.length > 0
    },

    async complete(messages: ChatMessage[]): Promise<string> {
      if (!config.apiKey) {
        throw new AiProviderError('AI provider is not configured')
      }

      let response: Response
      try {
        response = await fetch(endpoint, {
          method: 'POST',
          headers: {
            'Content-Type': 'application/json',
            Authorization: `Bearer ${config.apiKey}`,
          },
          body: JSON.stringify({
            model: config.model,
            messages,
            temperature: 0,
          }),
          signal: AbortSignal.timeout(config.timeoutMs),
        })
      } catch (err: unknown) {
        const message = err instanceof Error ? err.message : String(err)
        throw new AiProviderError(`AI provider request failed: ${message}`, { cause: err })
      }

      if (!response.ok) {
        logger.warn(
          { status: response.status, model: config.model },
          'AI provider returned non-OK status'
        )
        throw new AiProviderError(`AI provider returned status ${response.status}`, {
          status: response.status,
        })
      }

      let body: unknown
      try {
        body = await response.json()
      } catch (err: unknown) {
        throw new AiProviderError('AI provider returned a non-JSON body', { cause: err })
      }

      const parsed = chatCompletionResponseSchema.safeParse(body)
      const content = parsed.success ? parsed.data.choices[0]?.message.content : undefined
      if (typeof content !== 'string') {
        throw new AiProviderError('AI provider returned no completion content')
      }

      return content
    },
  }
}
