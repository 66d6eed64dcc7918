import type { ContentBlock, Message, ProviderMetadata, ProviderOptions } from '../types/messages.js'
import type { ToolChoice, ToolSpec } from '../tools/types.js'
import type { CallWarning, FinishReason, ModelStreamEvent, Usage } from './streaming.js'

/**
 * Base configuration shared by every model implementation.
 */
export interface BaseModelConfig {
  /**
   * Model identifier at the provider.
   */
  modelId?: string
}

/**
 * Sampling parameters forwarded to the model unchanged.
 */
export interface CallSettings {
  maxOutputTokens?: number
  temperature?: number
  topP?: number
  topK?: number
  presencePenalty?: number
  frequencyPenalty?: number
  stopSequences?: string[]
}

/**
 * A single request to a model.
 */
export interface ModelCall extends CallSettings {
  messages: Message[]
  tools: ToolSpec[]
  toolChoice: ToolChoice
  providerOptions?: ProviderOptions
  /**
   * Aborting it fails the call.
   */
  signal?: AbortSignal
}

/**
 * The result of a non-streaming model call.
 */
export interface ModelResponse {
  /**
   * Output in generation order. Tool calls arrive as unvalidated tool call blocks.
   */
  content: ContentBlock[]
  finishReason: FinishReason
  usage: Usage
  warnings?: CallWarning[]
  providerMetadata?: ProviderMetadata
}

/**
 * Base class for language model implementations.
 *
 * Implementations translate a {@link ModelCall} into their provider's API and map the
 * reply back, either as one {@link ModelResponse} or as a sequence of
 * {@link ModelStreamEvent}s. Failed calls should throw an `APICallError` so the
 * retry policy can tell transient failures apart.
 *
 * @typeParam T - Configuration type of the implementation
 */
export abstract class Model<T extends BaseModelConfig = BaseModelConfig> {
  /**
   * Provider identifier, e.g. `openai`.
   */
  abstract readonly provider: string

  /**
   * Updates the model configuration.
   * Merges the provided configuration with existing settings.
   *
   * @param modelConfig - Configuration object with model-specific settings to update
   */
  abstract updateConfig(modelConfig: T): void

  /**
   * Retrieves the current model configuration.
   */
  abstract getConfig(): T

  /**
   * Sends the call and waits for the complete response.
   */
  abstract generate(call: ModelCall): Promise<ModelResponse>

  /**
   * Sends the call and yields events as the provider produces them.
   */
  abstract stream(call: ModelCall): AsyncIterable<ModelStreamEvent>

  /**
   * Model identifier from the configuration.
   */
  get modelId(): string {
    return this.getConfig().modelId ?? 'unknown'
  }
}
