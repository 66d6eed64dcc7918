import type { CallWarning, FinishReason, ModelStreamEvent, Usage } from '../models/streaming.js'
import type { AgentResult, StepResult } from '../types/agent.js'
import type {
  ContentBlock,
  Message,
  ProviderMetadata,
  ReasoningBlock,
  SourceBlock,
  ToolCallBlock,
  ToolResultBlock,
} from '../types/messages.js'

/**
 * Union type representing all events yielded by the agent's stream.
 *
 * Includes every raw model event, each content block as soon as it is complete
 * (text, reasoning, validated tool calls, sources and tool results), and lifecycle
 * events marking the run and its steps.
 */
export type AgentStreamEvent = ModelStreamEvent | ContentBlock | AgentLifecycleEvent

/**
 * Lifecycle events of a streamed run.
 */
export type AgentLifecycleEvent = AgentStartEvent | StepStartEvent | StepFinishEvent | AgentFinishEvent

/**
 * Event triggered before the first step.
 */
export interface AgentStartEvent {
  type: 'agentStartEvent'
}

/**
 * Event triggered before a step calls the model.
 */
export interface StepStartEvent {
  type: 'stepStartEvent'
  /**
   * Zero-based step number.
   */
  stepNumber: number
  /**
   * Messages sent to the model for this step.
   */
  messages: Message[]
}

/**
 * Event triggered once a step, including its tool executions, is recorded.
 */
export interface StepFinishEvent {
  type: 'stepFinishEvent'
  stepNumber: number
  step: StepResult
}

/**
 * Event triggered after the last step.
 */
export interface AgentFinishEvent {
  type: 'agentFinishEvent'
  result: AgentResult
}

/**
 * Observers of the model event stream, one per event category.
 *
 * Every callback is awaited. A callback that throws aborts the run and its error
 * propagates unchanged.
 */
export interface StreamCallbacks {
  /**
   * Receives every model event before it is processed.
   */
  onChunk?: (event: ModelStreamEvent) => Promise<void> | void
  /**
   * Receives the provider's warnings for the call.
   */
  onWarnings?: (warnings: CallWarning[]) => Promise<void> | void
  /**
   * A text block opened.
   */
  onTextStart?: (id: string) => Promise<void> | void
  /**
   * A chunk of text arrived, whether or not its block was opened.
   */
  onTextDelta?: (id: string, delta: string) => Promise<void> | void
  /**
   * A text block closed.
   */
  onTextEnd?: (id: string) => Promise<void> | void
  /**
   * Receives the reasoning as it stands when the block opens.
   */
  onReasoningStart?: (id: string, reasoning: ReasoningBlock) => Promise<void> | void
  /**
   * A chunk of reasoning arrived.
   */
  onReasoningDelta?: (id: string, delta: string) => Promise<void> | void
  /**
   * Receives the finished reasoning block. Not called for ids that were never opened.
   */
  onReasoningEnd?: (id: string, reasoning: ReasoningBlock) => Promise<void> | void
  /**
   * The model started writing input for a call to the named tool.
   */
  onToolInputStart?: (id: string, toolName: string) => Promise<void> | void
  /**
   * Partial JSON input for a tool call.
   */
  onToolInputDelta?: (id: string, delta: string) => Promise<void> | void
  /**
   * The tool call's input is complete.
   */
  onToolInputEnd?: (id: string) => Promise<void> | void
  /**
   * Receives each tool call after validation and repair.
   */
  onToolCall?: (toolCall: ToolCallBlock) => Promise<void> | void
  /**
   * Receives each cited source.
   */
  onSource?: (source: SourceBlock) => Promise<void> | void
  /**
   * The model stream of a step ended.
   */
  onStreamFinish?: (
    usage: Usage,
    finishReason: FinishReason,
    providerMetadata: ProviderMetadata | undefined
  ) => Promise<void> | void
  /**
   * Receives each tool result, error results included.
   */
  onToolResult?: (result: ToolResultBlock) => Promise<void> | void
}

/**
 * Observers of a streamed run's lifecycle.
 */
export interface AgentCallbacks {
  /**
   * Called once, before the first step.
   */
  onAgentStart?: () => Promise<void> | void
  /**
   * Called with the zero-based step number before the step calls the model.
   */
  onStepStart?: (stepNumber: number) => Promise<void> | void
  /**
   * Called when the whole run completes, before {@link AgentCallbacks.onAgentFinish}.
   */
  onFinish?: (result: AgentResult) => Promise<void> | void
  /**
   * Called last on a successful run.
   */
  onAgentFinish?: (result: AgentResult) => Promise<void> | void
  /**
   * Called with the error that ends a run. The error is rethrown afterwards.
   */
  onError?: (error: Error) => Promise<void> | void
}
