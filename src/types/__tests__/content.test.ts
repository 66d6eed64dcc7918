import { describe, it, expect } from 'vitest'
import {
  getFiles,
  getReasoning,
  getReasoningText,
  getSources,
  getText,
  getToolCalls,
  getToolResults,
} from '../content.js'
import {
  FileBlock,
  ReasoningBlock,
  SourceBlock,
  TextBlock,
  ToolCallBlock,
  ToolResultBlock,
  asContentType,
  isContentType,
  type ContentBlock,
} from '../messages.js'

const file = new FileBlock({ data: new Uint8Array([0]), mediaType: 'image/png', filename: 'chart.png' })
const source = new SourceBlock({ sourceType: 'document', id: 'doc-1', title: 'Report', mediaType: 'application/pdf' })
const toolCall = new ToolCallBlock({ toolCallId: 'c1', toolName: 'search', input: '{}' })
const toolResult = new ToolResultBlock({ toolCallId: 'c1', toolName: 'search', result: { type: 'text', text: 'found' } })

const content: ContentBlock[] = [
  new ReasoningBlock({ text: 'first, ' }),
  new TextBlock('Hello, '),
  file,
  new ReasoningBlock({ text: 'then' }),
  source,
  toolCall,
  new TextBlock('world'),
  toolResult,
]

describe('content accessors', () => {
  it('concatenates text and reasoning in order', () => {
    expect(getText(content)).toBe('Hello, world')
    expect(getReasoningText(content)).toBe('first, then')
    expect(getReasoning(content)).toHaveLength(2)
  })

  it('filters each block type', () => {
    expect(getFiles(content)).toEqual([file])
    expect(getSources(content)).toEqual([source])
    expect(getToolCalls(content)).toEqual([toolCall])
    expect(getToolResults(content)).toEqual([toolResult])
  })

  it('returns empty values for empty content', () => {
    expect(getText([])).toBe('')
    expect(getToolCalls([])).toEqual([])
  })
})

describe('isContentType', () => {
  it('narrows by discriminator', () => {
    expect(isContentType(toolCall, 'toolCallBlock')).toBe(true)
    expect(isContentType(toolCall, 'textBlock')).toBe(false)
  })

  it('downcasts or returns undefined', () => {
    expect(asContentType(file, 'fileBlock')?.filename).toBe('chart.png')
    expect(asContentType(file, 'sourceBlock')).toBeUndefined()
  })
})
