import {
  isContentType,
  type ContentBlock,
  type FileBlock,
  type ReasoningBlock,
  type SourceBlock,
  type ToolCallBlock,
  type ToolResultBlock,
} from './messages.js'

/**
 * Accessors over a content sequence.
 */

/**
 * Concatenates every text block, in order.
 */
export function getText(content: readonly ContentBlock[]): string {
  let text = ''
  for (const block of content) {
    if (isContentType(block, 'textBlock')) {
      text += block.text
    }
  }
  return text
}

export function getReasoning(content: readonly ContentBlock[]): ReasoningBlock[] {
  return content.filter((block): block is ReasoningBlock => isContentType(block, 'reasoningBlock'))
}

/**
 * Concatenates every reasoning block, in order.
 */
export function getReasoningText(content: readonly ContentBlock[]): string {
  return getReasoning(content)
    .map((block) => block.text)
    .join('')
}

export function getFiles(content: readonly ContentBlock[]): FileBlock[] {
  return content.filter((block): block is FileBlock => isContentType(block, 'fileBlock'))
}

export function getSources(content: readonly ContentBlock[]): SourceBlock[] {
  return content.filter((block): block is SourceBlock => isContentType(block, 'sourceBlock'))
}

export function getToolCalls(content: readonly ContentBlock[]): ToolCallBlock[] {
  return content.filter((block): block is ToolCallBlock => isContentType(block, 'toolCallBlock'))
}

export function getToolResults(content: readonly ContentBlock[]): ToolResultBlock[] {
  return content.filter((block): block is ToolResultBlock => isContentType(block, 'toolResultBlock'))
}
