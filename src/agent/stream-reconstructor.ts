import { normalizeError } from '../errors.js'
import { emptyUsage } from '../models/streaming.js'
import type { CallWarning, FinishReason, ModelStreamEvent, Usage } from '../models/streaming.js'
import {
  ReasoningBlock,
  SourceBlock,
  TextBlock,
  ToolCallBlock,
  type ContentBlock,
  type ProviderMetadata,
} from '../types/messages.js'
import type { StreamCallbacks } from './streaming.js'

/**
 * Validates and repairs a tool call as soon as it is complete.
 */
export type ToolCallValidator = (toolCall: ToolCallBlock) => Promise<ToolCallBlock>

/**
 * What one model stream produced.
 */
export interface ReconstructedStep {
  /**
   * Finalized blocks in completion order. Tool calls are already validated.
   */
  content: ContentBlock[]
  toolCalls: ToolCallBlock[]
  finishReason: FinishReason
  usage: Usage
  warnings: CallWarning[]
  providerMetadata?: ProviderMetadata
}

interface OpenBlock {
  text: string
  providerMetadata?: ProviderMetadata | undefined
}

interface OpenToolInput {
  toolName: string
  input: string
}

/**
 * Turns a sequence of model stream events into content blocks.
 *
 * Text, reasoning and tool input are accumulated per block id between their start and
 * end events. Deltas for ids that were never opened reach the callbacks but are not
 * accumulated. A tool call event is authoritative: it is validated on arrival and
 * replaces any tool input accumulated under its id. An error event throws.
 *
 * One instance handles exactly one stream attempt.
 *
 * @example
 * ```typescript
 * const reconstructor = new StreamReconstructor(validate, callbacks)
 * for await (const event of model.stream(call)) {
 *   const block = await reconstructor.process(event)
 *   if (block !== undefined) console.log(block.type)
 * }
 * const step = reconstructor.finish()
 * ```
 */
export class StreamReconstructor {
  private readonly _validate: ToolCallValidator
  private readonly _callbacks: StreamCallbacks
  private readonly _content: ContentBlock[] = []
  private readonly _toolCalls: ToolCallBlock[] = []
  private readonly _text = new Map<string, OpenBlock>()
  private readonly _reasoning = new Map<string, OpenBlock>()
  private readonly _toolInputs = new Map<string, OpenToolInput>()
  private _warnings: CallWarning[] = []
  private _usage: Usage = emptyUsage()
  private _finishReason: FinishReason = 'unknown'
  private _providerMetadata: ProviderMetadata | undefined
  private _providerError: Error | undefined

  constructor(validate: ToolCallValidator, callbacks: StreamCallbacks = {}) {
    this._validate = validate
    this._callbacks = callbacks
  }

  /**
   * The error thrown for a `modelErrorEvent`, once one has been processed.
   * Anything else {@link process} throws came from a callback or the validator.
   */
  get providerError(): Error | undefined {
    return this._providerError
  }

  /**
   * Applies one event.
   *
   * @param event - Next model event
   * @returns The block the event completed, if any
   */
  async process(event: ModelStreamEvent): Promise<ContentBlock | undefined> {
    await this._callbacks.onChunk?.(event)

    switch (event.type) {
      case 'modelWarningsEvent':
        this._warnings = event.warnings
        await this._callbacks.onWarnings?.(event.warnings)
        return undefined

      case 'modelTextStartEvent':
        this._text.set(event.id, { text: '', providerMetadata: event.providerMetadata })
        await this._callbacks.onTextStart?.(event.id)
        return undefined

      case 'modelTextDeltaEvent': {
        const open = this._text.get(event.id)
        if (open !== undefined) {
          open.text += event.delta
        }
        await this._callbacks.onTextDelta?.(event.id, event.delta)
        return undefined
      }

      case 'modelTextEndEvent': {
        const open = this._text.get(event.id)
        let block: TextBlock | undefined
        if (open !== undefined) {
          block = new TextBlock(open.text, event.providerMetadata ?? open.providerMetadata)
          this._content.push(block)
          this._text.delete(event.id)
        }
        await this._callbacks.onTextEnd?.(event.id)
        return block
      }

      case 'modelReasoningStartEvent': {
        const open: OpenBlock = { text: event.text ?? '', providerMetadata: event.providerMetadata }
        this._reasoning.set(event.id, open)
        await this._callbacks.onReasoningStart?.(event.id, toReasoningBlock(open))
        return undefined
      }

      case 'modelReasoningDeltaEvent': {
        const open = this._reasoning.get(event.id)
        if (open !== undefined) {
          open.text += event.delta
          if (event.providerMetadata !== undefined) {
            open.providerMetadata = event.providerMetadata
          }
        }
        await this._callbacks.onReasoningDelta?.(event.id, event.delta)
        return undefined
      }

      case 'modelReasoningEndEvent': {
        const open = this._reasoning.get(event.id)
        if (open === undefined) {
          return undefined
        }
        if (event.providerMetadata !== undefined) {
          open.providerMetadata = event.providerMetadata
        }
        const block = toReasoningBlock(open)
        this._content.push(block)
        this._reasoning.delete(event.id)
        await this._callbacks.onReasoningEnd?.(event.id, block)
        return block
      }

      case 'modelToolInputStartEvent':
        this._toolInputs.set(event.id, { toolName: event.toolName, input: '' })
        await this._callbacks.onToolInputStart?.(event.id, event.toolName)
        return undefined

      case 'modelToolInputDeltaEvent': {
        const open = this._toolInputs.get(event.id)
        if (open !== undefined) {
          open.input += event.delta
        }
        await this._callbacks.onToolInputDelta?.(event.id, event.delta)
        return undefined
      }

      case 'modelToolInputEndEvent':
        await this._callbacks.onToolInputEnd?.(event.id)
        return undefined

      case 'modelToolCallEvent': {
        const emitted = new ToolCallBlock({
          toolCallId: event.toolCallId,
          toolName: event.toolName,
          input: event.input,
          ...(event.providerExecuted !== undefined ? { providerExecuted: event.providerExecuted } : {}),
          ...(event.providerMetadata !== undefined ? { providerMetadata: event.providerMetadata } : {}),
        })
        const toolCall = await this._validate(emitted)
        this._toolCalls.push(toolCall)
        this._content.push(toolCall)
        this._toolInputs.delete(event.toolCallId)
        await this._callbacks.onToolCall?.(toolCall)
        return toolCall
      }

      case 'modelSourceEvent': {
        const source = new SourceBlock(event.source)
        this._content.push(source)
        await this._callbacks.onSource?.(source)
        return source
      }

      case 'modelFinishEvent':
        this._usage = event.usage
        this._finishReason = event.finishReason
        this._providerMetadata = event.providerMetadata
        await this._callbacks.onStreamFinish?.(event.usage, event.finishReason, event.providerMetadata)
        return undefined

      case 'modelErrorEvent':
        this._providerError = normalizeError(event.error)
        throw this._providerError
    }
  }

  /**
   * Input accumulated so far for a tool call that has not completed.
   *
   * @param id - Tool call id
   */
  pendingToolInput(id: string): string | undefined {
    return this._toolInputs.get(id)?.input
  }

  /**
   * Returns everything the stream produced. Blocks still open are dropped.
   */
  finish(): ReconstructedStep {
    const step: ReconstructedStep = {
      content: [...this._content],
      toolCalls: [...this._toolCalls],
      finishReason: this._finishReason,
      usage: this._usage,
      warnings: this._warnings,
    }
    if (this._providerMetadata !== undefined) {
      step.providerMetadata = this._providerMetadata
    }
    return step
  }
}

function toReasoningBlock(open: OpenBlock): ReasoningBlock {
  return new ReasoningBlock(
    open.providerMetadata !== undefined ? { text: open.text, providerMetadata: open.providerMetadata } : { text: open.text }
  )
}
