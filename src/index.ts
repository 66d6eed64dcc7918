/**
 * Main entry point for the agent-steps SDK.
 *
 * This is the primary export module for the SDK, providing access to all
 * public APIs and functionality.
 */

// Agent class
export { Agent } from './agent/agent.js'

// Agent configuration
export type { AgentCall, AgentConfig, AgentSettings, AgentStreamCall } from './agent/config.js'

// Agent result types
export { AgentResult } from './types/agent.js'
export type { StepResult } from './types/agent.js'

// Error types
export {
  AgentSdkError,
  APICallError,
  InvalidArgumentError,
  RetryError,
  ToolValidationError,
  normalizeError,
  isAbortError,
} from './errors.js'
export type { APICallErrorData, RetryErrorReason, ToolValidationErrorKind } from './errors.js'

// Logging
export { configureLogging, createNoopLogger, getLogger } from './logging/logger.js'
export type { Logger } from './logging/logger.js'

// JSON types
export type { JSONObject, JSONSchema, JSONValue } from './types/json.js'

// Message types
export type {
  Role,
  ProviderMetadata,
  ProviderOptions,
  TextBlockData,
  ReasoningBlockData,
  FileBlockData,
  SourceBlockData,
  ToolCallBlockData,
  ToolResultBlockData,
  ToolResultOutput,
  ContentBlock,
  ContentBlockOf,
  ContentType,
  MessagePart,
  MessageData,
} from './types/messages.js'

// Message classes
export {
  TextBlock,
  ReasoningBlock,
  FileBlock,
  SourceBlock,
  ToolCallBlock,
  ToolResultBlock,
  Message,
  isContentType,
  asContentType,
} from './types/messages.js'

// Content accessors
export {
  getText,
  getReasoning,
  getReasoningText,
  getFiles,
  getSources,
  getToolCalls,
  getToolResults,
} from './types/content.js'

// Tool types
export type { ToolSpec, ToolCall, ToolChoice } from './tools/types.js'

// Tool interface and related types
export type { Tool, InvokableTool, ToolContext, ToolResponseData, ToolResponseType } from './tools/tool.js'
export { ToolResponse } from './tools/tool.js'

// FunctionTool implementation
export { FunctionTool } from './tools/function-tool.js'
export type { FunctionToolConfig, FunctionToolCallback, ToolCallbackResult } from './tools/function-tool.js'

// Tool factory function
export { tool, ZodTool } from './tools/zod-tool.js'
export type { ZodToolConfig } from './tools/zod-tool.js'

// Tool registry
export { ToolRegistry } from './registry/tool-registry.js'

// Streaming event types
export type {
  Usage,
  FinishReason,
  CallWarning,
  ModelStreamEvent,
  ModelWarningsEvent,
  ModelTextStartEvent,
  ModelTextDeltaEvent,
  ModelTextEndEvent,
  ModelReasoningStartEvent,
  ModelReasoningDeltaEvent,
  ModelReasoningEndEvent,
  ModelToolInputStartEvent,
  ModelToolInputDeltaEvent,
  ModelToolInputEndEvent,
  ModelToolCallEvent,
  ModelSourceEvent,
  ModelFinishEvent,
  ModelErrorEvent,
} from './models/streaming.js'
export { addUsage, emptyUsage } from './models/streaming.js'

// Model provider types
export { Model } from './models/model.js'
export type { BaseModelConfig, CallSettings, ModelCall, ModelResponse } from './models/model.js'

// Retry
export {
  DEFAULT_RETRY_OPTIONS,
  getRetryDelayMs,
  retryWithExponentialBackoff,
  retryGeneratorWithExponentialBackoff,
} from './models/retry.js'
export type { RetryOptions } from './models/retry.js'

// Stop conditions
export {
  stepCountIs,
  hasToolCall,
  hasContent,
  finishReasonIs,
  maxTokensUsed,
  isStopConditionMet,
  shouldContinue,
} from './agent/stop-conditions.js'
export type { StopCondition } from './agent/stop-conditions.js'

// Tool call validation and execution
export { validateToolCall, validateAndRepairToolCall } from './agent/tool-call-validation.js'
export type {
  RepairToolCallFunction,
  ToolCallRepairOptions,
  ValidateAndRepairOptions,
} from './agent/tool-call-validation.js'
export { executeTools, streamToolResults } from './agent/tool-executor.js'
export type { ExecuteToolsOptions, ToolResultCallback } from './agent/tool-executor.js'

// Step preparation
export { prepareStep, replaceSystemMessage } from './agent/step-preparation.js'
export { toResponseMessages } from './agent/response-messages.js'
export type { PrepareStepFunction, PrepareStepOptions, PrepareStepResult } from './agent/step-preparation.js'

// Stream reconstruction
export { StreamReconstructor } from './agent/stream-reconstructor.js'
export type { ReconstructedStep, ToolCallValidator } from './agent/stream-reconstructor.js'

// Agent streaming event types
export type {
  AgentStreamEvent,
  AgentLifecycleEvent,
  AgentStartEvent,
  StepStartEvent,
  StepFinishEvent,
  AgentFinishEvent,
  StreamCallbacks,
  AgentCallbacks,
} from './agent/streaming.js'
