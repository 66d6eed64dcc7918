import { describe, it, expect } from 'vitest'
import { AgentResult, type StepResult } from '../agent.js'
import { TextBlock } from '../messages.js'
import type { Usage } from '../../models/streaming.js'
import { usage } from '../../__fixtures__/model-test-helpers.js'

function step(text: string, stepUsage: Usage): StepResult {
  return { content: [new TextBlock(text)], finishReason: 'stop', usage: stepUsage, warnings: [], messages: [] }
}

describe('AgentResult', () => {
  it('exposes the last step and its text', () => {
    const result = new AgentResult([step('first', usage(1, 1)), step('second', usage(1, 1))])

    expect(result.response).toBe(result.steps[1])
    expect(result.text).toBe('second')
    expect(String(result)).toBe('second')
  })

  it('sums usage across steps, including optional counters either side reports', () => {
    const result = new AgentResult([
      step('a', { ...usage(10, 5), reasoningTokens: 3 }),
      step('b', { ...usage(20, 7), cacheReadInputTokens: 8 }),
    ])

    expect(result.totalUsage).toEqual({
      inputTokens: 30,
      outputTokens: 12,
      totalTokens: 42,
      reasoningTokens: 3,
      cacheReadInputTokens: 8,
    })
  })

  it('requires at least one step', () => {
    expect(() => new AgentResult([])).toThrow('Expected first step to be defined')
  })
})
