import type { JSONValue } from './json.js'
import type { ToolValidationError } from '../errors.js'

/**
 * Message and content types for conversations with a model.
 *
 * This module follows a pattern where <name>Data interfaces define the structure
 * for objects, while corresponding classes extend those interfaces with type
 * discrimination. Content classes carry data only, so plain objects of the same
 * shape are interchangeable with instances.
 */

/**
 * Role of a message's author.
 */
export type Role = 'system' | 'user' | 'assistant' | 'tool'

/**
 * Provider-specific metadata attached to model output, keyed by provider id.
 */
export type ProviderMetadata = Record<string, JSONValue>

/**
 * Provider-specific request options, keyed by provider id. Opaque to the engine.
 */
export type ProviderOptions = Record<string, JSONValue>

/**
 * Data for a text block.
 */
export interface TextBlockData {
  type: 'textBlock'
  text: string
  providerMetadata?: ProviderMetadata
}

/**
 * Plain text produced by the model or supplied by the user.
 */
export class TextBlock implements TextBlockData {
  readonly type = 'textBlock' as const
  readonly text: string
  readonly providerMetadata?: ProviderMetadata

  constructor(text: string, providerMetadata?: ProviderMetadata) {
    this.text = text
    if (providerMetadata !== undefined) {
      this.providerMetadata = providerMetadata
    }
  }
}

/**
 * Data for a reasoning block.
 */
export interface ReasoningBlockData {
  type: 'reasoningBlock'
  text: string
  /**
   * Signatures, redacted content and the like live here, keyed by provider.
   */
  providerMetadata?: ProviderMetadata
}

/**
 * The model's visible reasoning.
 */
export class ReasoningBlock implements ReasoningBlockData {
  readonly type = 'reasoningBlock' as const
  readonly text: string
  readonly providerMetadata?: ProviderMetadata

  constructor(data: Omit<ReasoningBlockData, 'type'>) {
    this.text = data.text
    if (data.providerMetadata !== undefined) {
      this.providerMetadata = data.providerMetadata
    }
  }
}

/**
 * Data for a file block.
 */
export interface FileBlockData {
  type: 'fileBlock'
  /**
   * Raw bytes of the file.
   */
  data: Uint8Array
  /**
   * IANA media type, e.g. `image/png`.
   */
  mediaType: string
  filename?: string
  providerMetadata?: ProviderMetadata
}

/**
 * A file, either attached to a prompt or generated by the model.
 */
export class FileBlock implements FileBlockData {
  readonly type = 'fileBlock' as const
  readonly data: Uint8Array
  readonly mediaType: string
  readonly filename?: string
  readonly providerMetadata?: ProviderMetadata

  constructor(data: Omit<FileBlockData, 'type'>) {
    this.data = data.data
    this.mediaType = data.mediaType
    if (data.filename !== undefined) {
      this.filename = data.filename
    }
    if (data.providerMetadata !== undefined) {
      this.providerMetadata = data.providerMetadata
    }
  }
}

/**
 * Data for a source block.
 */
export interface SourceBlockData {
  type: 'sourceBlock'
  sourceType: 'url' | 'document'
  id: string
  url?: string
  title?: string
  mediaType?: string
  filename?: string
  providerMetadata?: ProviderMetadata
}

/**
 * A source the model cited. Sources are kept in step content but never sent back
 * to the model.
 */
export class SourceBlock implements SourceBlockData {
  readonly type = 'sourceBlock' as const
  readonly sourceType: 'url' | 'document'
  readonly id: string
  readonly url?: string
  readonly title?: string
  readonly mediaType?: string
  readonly filename?: string
  readonly providerMetadata?: ProviderMetadata

  constructor(data: Omit<SourceBlockData, 'type'>) {
    this.sourceType = data.sourceType
    this.id = data.id
    if (data.url !== undefined) {
      this.url = data.url
    }
    if (data.title !== undefined) {
      this.title = data.title
    }
    if (data.mediaType !== undefined) {
      this.mediaType = data.mediaType
    }
    if (data.filename !== undefined) {
      this.filename = data.filename
    }
    if (data.providerMetadata !== undefined) {
      this.providerMetadata = data.providerMetadata
    }
  }
}

/**
 * Data for a tool call block.
 */
export interface ToolCallBlockData {
  type: 'toolCallBlock'
  toolCallId: string
  toolName: string
  /**
   * Tool input as the model produced it: a JSON string, not yet parsed.
   */
  input: string
  /**
   * Set when the call failed validation and could not be repaired.
   * Invalid calls are never run.
   */
  invalid: boolean
  validationError?: ToolValidationError
  /**
   * True when the provider already ran the tool on its side.
   */
  providerExecuted?: boolean
  providerMetadata?: ProviderMetadata
}

/**
 * A request from the model to run a tool.
 */
export class ToolCallBlock implements ToolCallBlockData {
  readonly type = 'toolCallBlock' as const
  readonly toolCallId: string
  readonly toolName: string
  readonly input: string
  readonly invalid: boolean
  readonly validationError?: ToolValidationError
  readonly providerExecuted?: boolean
  readonly providerMetadata?: ProviderMetadata

  constructor(data: Omit<ToolCallBlockData, 'type' | 'invalid'> & { invalid?: boolean }) {
    this.toolCallId = data.toolCallId
    this.toolName = data.toolName
    this.input = data.input
    this.invalid = data.invalid ?? false
    if (data.validationError !== undefined) {
      this.validationError = data.validationError
    }
    if (data.providerExecuted !== undefined) {
      this.providerExecuted = data.providerExecuted
    }
    if (data.providerMetadata !== undefined) {
      this.providerMetadata = data.providerMetadata
    }
  }
}

/**
 * Output of a tool run as it is reported back to the model.
 */
export type ToolResultOutput =
  | { type: 'text'; text: string }
  | { type: 'error'; error: Error }
  | {
      type: 'media'
      /**
       * Base64-encoded bytes.
       */
      data: string
      mediaType: string
      text?: string
    }

/**
 * Data for a tool result block.
 */
export interface ToolResultBlockData {
  type: 'toolResultBlock'
  toolCallId: string
  toolName: string
  result: ToolResultOutput
  /**
   * Metadata the tool attached for the caller. Never sent to the model.
   */
  clientMetadata?: string
  providerExecuted?: boolean
  providerMetadata?: ProviderMetadata
}

/**
 * The outcome of one tool call. Exactly one exists per tool call, invalid calls included.
 */
export class ToolResultBlock implements ToolResultBlockData {
  readonly type = 'toolResultBlock' as const
  readonly toolCallId: string
  readonly toolName: string
  readonly result: ToolResultOutput
  readonly clientMetadata?: string
  readonly providerExecuted?: boolean
  readonly providerMetadata?: ProviderMetadata

  constructor(data: Omit<ToolResultBlockData, 'type'>) {
    this.toolCallId = data.toolCallId
    this.toolName = data.toolName
    this.result = data.result
    if (data.clientMetadata !== undefined) {
      this.clientMetadata = data.clientMetadata
    }
    if (data.providerExecuted !== undefined) {
      this.providerExecuted = data.providerExecuted
    }
    if (data.providerMetadata !== undefined) {
      this.providerMetadata = data.providerMetadata
    }
  }
}

/**
 * Any piece of model output. Discriminated by `type`.
 */
export type ContentBlock = TextBlock | ReasoningBlock | FileBlock | SourceBlock | ToolCallBlock | ToolResultBlock

/**
 * Discriminator values of {@link ContentBlock}.
 */
export type ContentType = ContentBlock['type']

/**
 * The content block variant carrying the given discriminator.
 */
export type ContentBlockOf<T extends ContentType> = Extract<ContentBlock, { type: T }>

/**
 * Content that may appear inside a message. Sources stay out of messages.
 */
export type MessagePart = Exclude<ContentBlock, SourceBlock>

/**
 * Checks whether a content block is of the given variant.
 *
 * @param block - Block to test
 * @param type - Expected discriminator
 * @returns True when the block carries the discriminator
 *
 * @example
 * ```typescript
 * const texts = content.filter((block) => isContentType(block, 'textBlock'))
 * ```
 */
export function isContentType<T extends ContentType>(block: ContentBlock, type: T): block is ContentBlockOf<T> {
  return block.type === type
}

/**
 * Downcasts a content block to a variant.
 *
 * @param block - Block to downcast
 * @param type - Expected discriminator
 * @returns The block as the requested variant, or undefined when it is another variant
 */
export function asContentType<T extends ContentType>(block: ContentBlock, type: T): ContentBlockOf<T> | undefined {
  return isContentType(block, type) ? block : undefined
}

/**
 * Data for a message.
 */
export interface MessageData {
  role: Role
  content: MessagePart[]
  providerOptions?: ProviderOptions
}

/**
 * A single message in a conversation.
 */
export class Message {
  /**
   * Discriminator for message objects.
   */
  readonly type = 'message' as const
  readonly role: Role
  readonly content: MessagePart[]
  readonly providerOptions?: ProviderOptions

  constructor(data: MessageData) {
    this.role = data.role
    this.content = data.content
    if (data.providerOptions !== undefined) {
      this.providerOptions = data.providerOptions
    }
  }

  /**
   * Creates a Message instance from MessageData.
   */
  static fromMessageData(data: MessageData): Message {
    return new Message(data)
  }

  /**
   * Creates a system message holding one text block.
   *
   * @param text - System prompt
   */
  static system(text: string): Message {
    return new Message({ role: 'system', content: [new TextBlock(text)] })
  }

  /**
   * Creates a user message holding the text followed by any attached files.
   *
   * @param text - User prompt
   * @param files - Files to attach
   */
  static user(text: string, files: FileBlock[] = []): Message {
    return new Message({ role: 'user', content: [new TextBlock(text), ...files] })
  }
}
