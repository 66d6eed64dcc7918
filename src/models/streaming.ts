import type { ProviderMetadata, SourceBlockData } from '../types/messages.js'

/**
 * ModelStreamEvent types for Model interactions.
 *
 * A streaming model yields these events in order. Text, reasoning and tool input
 * arrive as start/delta/end triples keyed by a block id; tool calls, sources and
 * the finish marker arrive whole.
 */

/**
 * Union type representing all possible streaming events from a model provider.
 * This is a discriminated union where each event has a unique type field.
 *
 * This allows for type-safe event handling using switch statements.
 */
export type ModelStreamEvent =
  | ModelWarningsEvent
  | ModelTextStartEvent
  | ModelTextDeltaEvent
  | ModelTextEndEvent
  | ModelReasoningStartEvent
  | ModelReasoningDeltaEvent
  | ModelReasoningEndEvent
  | ModelToolInputStartEvent
  | ModelToolInputDeltaEvent
  | ModelToolInputEndEvent
  | ModelToolCallEvent
  | ModelSourceEvent
  | ModelFinishEvent
  | ModelErrorEvent

/**
 * Reason a model stopped generating.
 */
export type FinishReason = 'stop' | 'length' | 'content-filter' | 'tool-calls' | 'error' | 'other' | 'unknown'

/**
 * A non-fatal problem the provider reported for a call, such as an unsupported setting.
 */
export interface CallWarning {
  type: 'unsupported-setting' | 'unsupported-tool' | 'other'
  setting?: string
  toolName?: string
  details?: string
  message?: string
}

/**
 * Warnings for the call, emitted before any content.
 */
export interface ModelWarningsEvent {
  type: 'modelWarningsEvent'
  warnings: CallWarning[]
}

/**
 * Opens a text block.
 */
export interface ModelTextStartEvent {
  type: 'modelTextStartEvent'
  id: string
  providerMetadata?: ProviderMetadata
}

/**
 * A chunk of text for an open text block.
 */
export interface ModelTextDeltaEvent {
  type: 'modelTextDeltaEvent'
  id: string
  delta: string
  providerMetadata?: ProviderMetadata
}

/**
 * Closes a text block.
 */
export interface ModelTextEndEvent {
  type: 'modelTextEndEvent'
  id: string
  providerMetadata?: ProviderMetadata
}

/**
 * Opens a reasoning block. Some providers send initial text with it.
 */
export interface ModelReasoningStartEvent {
  type: 'modelReasoningStartEvent'
  id: string
  text?: string
  providerMetadata?: ProviderMetadata
}

/**
 * A chunk of reasoning for an open reasoning block.
 */
export interface ModelReasoningDeltaEvent {
  type: 'modelReasoningDeltaEvent'
  id: string
  delta: string
  providerMetadata?: ProviderMetadata
}

/**
 * Closes a reasoning block. Metadata given here replaces what start or delta carried.
 */
export interface ModelReasoningEndEvent {
  type: 'modelReasoningEndEvent'
  id: string
  providerMetadata?: ProviderMetadata
}

/**
 * The model started writing input for a tool call.
 */
export interface ModelToolInputStartEvent {
  type: 'modelToolInputStartEvent'
  id: string
  toolName: string
  providerExecuted?: boolean
  providerMetadata?: ProviderMetadata
}

/**
 * Partial JSON input for an open tool call.
 */
export interface ModelToolInputDeltaEvent {
  type: 'modelToolInputDeltaEvent'
  id: string
  delta: string
}

/**
 * Marks the end of a tool call's input. Structural only.
 */
export interface ModelToolInputEndEvent {
  type: 'modelToolInputEndEvent'
  id: string
}

/**
 * A complete tool call. Authoritative over any input deltas seen for the same id.
 */
export interface ModelToolCallEvent {
  type: 'modelToolCallEvent'
  toolCallId: string
  toolName: string
  /**
   * Complete tool input as a JSON string.
   */
  input: string
  providerExecuted?: boolean
  providerMetadata?: ProviderMetadata
}

/**
 * A cited source.
 */
export interface ModelSourceEvent {
  type: 'modelSourceEvent'
  source: Omit<SourceBlockData, 'type'>
}

/**
 * Ends the stream with usage and finish reason.
 */
export interface ModelFinishEvent {
  type: 'modelFinishEvent'
  finishReason: FinishReason
  usage: Usage
  providerMetadata?: ProviderMetadata
}

/**
 * The provider failed mid-stream. Aborts the step.
 */
export interface ModelErrorEvent {
  type: 'modelErrorEvent'
  error: unknown
}

/**
 * Token usage statistics for a model invocation.
 * Tracks input, output, and total tokens, plus reasoning and cache-related metrics.
 */
export interface Usage {
  /**
   * Number of tokens in the input (prompt).
   */
  inputTokens: number

  /**
   * Number of tokens in the output (completion).
   */
  outputTokens: number

  /**
   * Total number of tokens (input + output).
   */
  totalTokens: number

  /**
   * Number of output tokens spent on reasoning.
   */
  reasoningTokens?: number

  /**
   * Number of input tokens read from cache.
   * This can reduce latency and cost.
   */
  cacheReadInputTokens?: number

  /**
   * Number of input tokens written to cache.
   * These tokens can be reused in future requests.
   */
  cacheWriteInputTokens?: number
}

/**
 * Usage with every counter at zero.
 */
export function emptyUsage(): Usage {
  return { inputTokens: 0, outputTokens: 0, totalTokens: 0 }
}

/**
 * Adds two usages field by field.
 * Optional counters appear in the sum when either side carries them.
 *
 * @param a - First usage
 * @param b - Second usage
 * @returns The field-wise sum
 */
export function addUsage(a: Usage, b: Usage): Usage {
  const sum: Usage = {
    inputTokens: a.inputTokens + b.inputTokens,
    outputTokens: a.outputTokens + b.outputTokens,
    totalTokens: a.totalTokens + b.totalTokens,
  }
  if (a.reasoningTokens !== undefined || b.reasoningTokens !== undefined) {
    sum.reasoningTokens = (a.reasoningTokens ?? 0) + (b.reasoningTokens ?? 0)
  }
  if (a.cacheReadInputTokens !== undefined || b.cacheReadInputTokens !== undefined) {
    sum.cacheReadInputTokens = (a.cacheReadInputTokens ?? 0) + (b.cacheReadInputTokens ?? 0)
  }
  if (a.cacheWriteInputTokens !== undefined || b.cacheWriteInputTokens !== undefined) {
    sum.cacheWriteInputTokens = (a.cacheWriteInputTokens ?? 0) + (b.cacheWriteInputTokens ?? 0)
  }
  return sum
}
