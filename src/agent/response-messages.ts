import { Message, type ContentBlock, type MessagePart, type ToolResultBlock } from '../types/messages.js'

/**
 * Derives the messages a step adds to the conversation.
 *
 * Text, reasoning, file and tool call blocks form the assistant message; tool results
 * form the tool message. Sources are not sent back to the model. Either message is
 * omitted when it would be empty.
 *
 * @param content - Step content
 * @returns Zero, one or two messages
 */
export function toResponseMessages(content: readonly ContentBlock[]): Message[] {
  const assistantParts: MessagePart[] = []
  const toolParts: ToolResultBlock[] = []

  for (const block of content) {
    switch (block.type) {
      case 'textBlock':
      case 'reasoningBlock':
      case 'fileBlock':
      case 'toolCallBlock':
        assistantParts.push(block)
        break
      case 'toolResultBlock':
        toolParts.push(block)
        break
      case 'sourceBlock':
        break
    }
  }

  const messages: Message[] = []
  if (assistantParts.length > 0) {
    messages.push(new Message({ role: 'assistant', content: assistantParts }))
  }
  if (toolParts.length > 0) {
    messages.push(new Message({ role: 'tool', content: toolParts }))
  }
  return messages
}
