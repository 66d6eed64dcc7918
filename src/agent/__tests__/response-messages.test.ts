import { describe, it, expect } from 'vitest'
import { toResponseMessages } from '../response-messages.js'
import {
  ReasoningBlock,
  SourceBlock,
  TextBlock,
  ToolCallBlock,
  ToolResultBlock,
} from '../../types/messages.js'

describe('toResponseMessages', () => {
  it('splits content into an assistant message and a tool message', () => {
    const reasoning = new ReasoningBlock({ text: 'plan' })
    const text = new TextBlock('checking')
    const toolCall = new ToolCallBlock({ toolCallId: 'c1', toolName: 'search', input: '{}' })
    const toolResult = new ToolResultBlock({ toolCallId: 'c1', toolName: 'search', result: { type: 'text', text: 'hit' } })

    const messages = toResponseMessages([reasoning, text, toolCall, toolResult])

    expect(messages).toHaveLength(2)
    expect(messages[0]).toMatchObject({ role: 'assistant', content: [reasoning, text, toolCall] })
    expect(messages[1]).toMatchObject({ role: 'tool', content: [toolResult] })
  })

  it('leaves sources out of the messages', () => {
    const source = new SourceBlock({ sourceType: 'url', id: 's1', url: 'https://example.com' })

    const messages = toResponseMessages([source, new TextBlock('answer')])

    expect(messages).toHaveLength(1)
    expect(messages[0]?.content).toEqual([{ type: 'textBlock', text: 'answer' }])
  })

  it('returns nothing for empty content', () => {
    expect(toResponseMessages([])).toEqual([])
  })
})
