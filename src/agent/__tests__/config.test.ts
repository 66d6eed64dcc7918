import { describe, it, expect } from 'vitest'
import { resolveSettings, toCallSettings, validateSettings } from '../config.js'
import { stepCountIs } from '../stop-conditions.js'
import { InvalidArgumentError } from '../../errors.js'

describe('validateSettings', () => {
  it('accepts settings in range', () => {
    expect(() => validateSettings({ temperature: 0.7, topP: 1, maxOutputTokens: 512, maxRetries: 0 })).not.toThrow()
  })

  it('names the offending setting', () => {
    expect(() => validateSettings({ topP: 1.5 })).toThrow(InvalidArgumentError)
    expect(() => validateSettings({ topP: 1.5 })).toThrow(expect.objectContaining({ argument: 'topP' }))
  })

  it('names nested retry settings with a dotted path', () => {
    expect(() => validateSettings({ retry: { backoffFactor: 0.5 } })).toThrow(
      expect.objectContaining({ argument: 'retry.backoffFactor' })
    )
  })

  it('rejects a negative retry count', () => {
    expect(() => validateSettings({ maxRetries: -1 })).toThrow(expect.objectContaining({ argument: 'maxRetries' }))
  })
})

describe('resolveSettings', () => {
  it('applies defaults', () => {
    const resolved = resolveSettings({}, {})

    expect(resolved.toolChoice).toBe('auto')
    expect(resolved.stopWhen).toEqual([])
    expect(resolved.retryOptions).toEqual({ maxRetries: 2, initialDelayMs: 2000, backoffFactor: 2 })
  })

  it('lets defined call values win and ignores undefined ones', () => {
    const stop = stepCountIs(3)

    const resolved = resolveSettings(
      { temperature: 0.5, topK: 40, toolChoice: 'required', stopWhen: [stop] },
      { temperature: 0.1, topK: undefined }
    )

    expect(resolved.temperature).toBe(0.1)
    expect(resolved.topK).toBe(40)
    expect(resolved.toolChoice).toBe('required')
    expect(resolved.stopWhen).toEqual([stop])
  })

  it('merges provider options per key', () => {
    const resolved = resolveSettings(
      { providerOptions: { openai: { user: 'agent' }, anthropic: { cache: false } } },
      { providerOptions: { anthropic: { cache: true } } }
    )

    expect(resolved.providerOptions).toEqual({ openai: { user: 'agent' }, anthropic: { cache: true } })
  })

  it('builds retry options from the merged settings', () => {
    const onRetry = (): void => {}

    const resolved = resolveSettings({ maxRetries: 5, retry: { initialDelayMs: 10 } }, { onRetry })

    expect(resolved.retryOptions).toEqual({ maxRetries: 5, initialDelayMs: 10, backoffFactor: 2, onRetry })
  })

  it('validates the call settings', () => {
    expect(() => resolveSettings({}, { temperature: -0.1 })).toThrow(InvalidArgumentError)
  })
})

describe('toCallSettings', () => {
  it('keeps only the sampling parameters', () => {
    expect(
      toCallSettings({ temperature: 0.3, stopSequences: ['END'], maxOutputTokens: 64 })
    ).toEqual({ temperature: 0.3, stopSequences: ['END'], maxOutputTokens: 64 })
  })
})
