import type { JSONValue } from '../types/json.js'
import type { ToolCall, ToolSpec } from './types.js'

/**
 * Context passed to a tool for one call.
 */
export interface ToolContext {
  /**
   * The call being executed. Its input is the validated JSON string the model produced.
   */
  toolCall: ToolCall

  /**
   * Aborted when the caller cancels the run. Long-running tools should honour it.
   */
  signal?: AbortSignal
}

/**
 * A capability the model can invoke.
 *
 * @example
 * ```typescript
 * const clock: Tool = {
 *   name: 'clock',
 *   description: 'Returns the current time',
 *   toolSpec: { name: 'clock', description: 'Returns the current time', inputSchema: { type: 'object' } },
 *   async run() {
 *     return ToolResponse.text(new Date().toISOString())
 *   },
 * }
 * ```
 */
export interface Tool {
  /**
   * The unique name of the tool.
   */
  name: string

  /**
   * Human-readable description of what the tool does.
   */
  description: string

  /**
   * Specification sent to the model.
   */
  toolSpec: ToolSpec

  /**
   * Executes the tool.
   *
   * Return {@link ToolResponse.error} for failures the model should see and react to.
   * Throwing is reserved for faults: it aborts the whole run.
   *
   * @param context - The call and cancellation signal
   * @returns The tool's response
   */
  run(context: ToolContext): Promise<ToolResponse>
}

/**
 * A tool that can also be called directly with typed input, outside of any agent.
 *
 * @typeParam TInput - Input type
 * @typeParam TReturn - Callback return type
 */
export interface InvokableTool<TInput, TReturn> extends Tool {
  invoke(input: TInput, context?: ToolContext): Promise<TReturn>
}

/**
 * Kind of payload a tool response carries.
 */
export type ToolResponseType = 'text' | 'image' | 'media'

/**
 * Data for a tool response.
 */
export interface ToolResponseData {
  type: ToolResponseType
  /**
   * Text content. For image and media responses, an optional caption.
   */
  content: string
  data?: Uint8Array
  mediaType?: string
  /**
   * JSON-encoded metadata for the caller. Never sent to the model.
   */
  metadata?: string
  /**
   * Marks a failure the model should see. Does not abort the run.
   */
  isError?: boolean
}

/**
 * What a tool returns from a run.
 */
export class ToolResponse implements ToolResponseData {
  readonly type: ToolResponseType
  readonly content: string
  readonly data?: Uint8Array
  readonly mediaType?: string
  readonly metadata?: string
  readonly isError: boolean

  constructor(data: ToolResponseData) {
    this.type = data.type
    this.content = data.content
    if (data.data !== undefined) {
      this.data = data.data
    }
    if (data.mediaType !== undefined) {
      this.mediaType = data.mediaType
    }
    if (data.metadata !== undefined) {
      this.metadata = data.metadata
    }
    this.isError = data.isError ?? false
  }

  static text(content: string): ToolResponse {
    return new ToolResponse({ type: 'text', content })
  }

  /**
   * A failure reported to the model as an error result.
   */
  static error(content: string): ToolResponse {
    return new ToolResponse({ type: 'text', content, isError: true })
  }

  static image(data: Uint8Array, mediaType: string, caption = ''): ToolResponse {
    return new ToolResponse({ type: 'image', content: caption, data, mediaType })
  }

  static media(data: Uint8Array, mediaType: string, caption = ''): ToolResponse {
    return new ToolResponse({ type: 'media', content: caption, data, mediaType })
  }

  /**
   * Returns a copy carrying the metadata, JSON-encoded.
   *
   * @param metadata - Any JSON value
   */
  withMetadata(metadata: JSONValue): ToolResponse {
    return new ToolResponse({ ...this.toData(), metadata: JSON.stringify(metadata) })
  }

  private toData(): ToolResponseData {
    const data: ToolResponseData = { type: this.type, content: this.content, isError: this.isError }
    if (this.data !== undefined) {
      data.data = this.data
    }
    if (this.mediaType !== undefined) {
      data.mediaType = this.mediaType
    }
    if (this.metadata !== undefined) {
      data.metadata = this.metadata
    }
    return data
  }
}
