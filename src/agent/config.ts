import { z } from 'zod'
import { InvalidArgumentError } from '../errors.js'
import type { CallSettings, Model } from '../models/model.js'
import { DEFAULT_RETRY_OPTIONS, type RetryOptions } from '../models/retry.js'
import type { Tool } from '../tools/tool.js'
import type { ToolChoice } from '../tools/types.js'
import type { StepResult } from '../types/agent.js'
import type { FileBlock, Message, ProviderOptions } from '../types/messages.js'
import type { PrepareStepFunction } from './step-preparation.js'
import type { StopCondition } from './stop-conditions.js'
import type { AgentCallbacks, StreamCallbacks } from './streaming.js'
import type { RepairToolCallFunction } from './tool-call-validation.js'

/**
 * Settings accepted both by the agent and by each call. Call values win.
 */
export interface AgentSettings extends CallSettings {
  /**
   * Tool choice for every step unless a step hook overrides it. Defaults to `auto`.
   */
  toolChoice?: ToolChoice
  /**
   * Names of the tools eligible for each step. Empty or unset means every tool.
   */
  activeTools?: string[]
  /**
   * Merged per provider key, call over agent.
   */
  providerOptions?: ProviderOptions
  /**
   * Conditions that end the run after a step; any one suffices.
   */
  stopWhen?: StopCondition[]
  prepareStep?: PrepareStepFunction
  repairToolCall?: RepairToolCallFunction
  /**
   * Called after every recorded step. Throwing aborts the run.
   */
  onStepFinish?: (step: StepResult) => Promise<void> | void
  /**
   * Retries of a failed model call. Defaults to 2; 0 disables retrying.
   */
  maxRetries?: number
  /**
   * Backoff timing. Defaults to 2000 ms, doubling after each retry.
   */
  retry?: Partial<Pick<RetryOptions, 'initialDelayMs' | 'backoffFactor'>>
  onRetry?: RetryOptions['onRetry']
}

/**
 * Configuration object for creating a new Agent.
 */
export interface AgentConfig extends AgentSettings {
  /**
   * The model the agent calls.
   */
  model: Model
  /**
   * Tools the model may call. Names must be unique.
   */
  tools?: Tool[]
  /**
   * A system prompt which guides model behavior.
   */
  systemPrompt?: string
}

/**
 * Arguments for one generate call.
 */
export interface AgentCall extends AgentSettings {
  /**
   * User prompt for this run. Must not be empty.
   */
  prompt: string
  /**
   * Files attached to the user prompt.
   */
  files?: FileBlock[]
  /**
   * Prior conversation, placed between the system prompt and the user prompt.
   */
  messages?: Message[]
  /**
   * Cancels the run. Passed to every model call, tool and hook.
   */
  signal?: AbortSignal
}

/**
 * Arguments for one streamed call.
 */
export interface AgentStreamCall extends AgentCall, StreamCallbacks, AgentCallbacks {}

/**
 * Settings after merging the call over the agent.
 */
export interface ResolvedSettings extends Omit<AgentSettings, 'toolChoice' | 'stopWhen'> {
  toolChoice: ToolChoice
  stopWhen: StopCondition[]
  retryOptions: RetryOptions
}

const settingsSchema = z.object({
  maxOutputTokens: z.number().int().positive().optional(),
  temperature: z.number().min(0).optional(),
  topP: z.number().min(0).max(1).optional(),
  topK: z.number().int().positive().optional(),
  presencePenalty: z.number().optional(),
  frequencyPenalty: z.number().optional(),
  stopSequences: z.array(z.string()).optional(),
  maxRetries: z.number().int().min(0).optional(),
  retry: z
    .object({
      initialDelayMs: z.number().min(0).optional(),
      backoffFactor: z.number().min(1).optional(),
    })
    .optional(),
})

/**
 * Checks the numeric settings.
 *
 * @param settings - Agent or call settings
 * @throws \{InvalidArgumentError\} Naming the first offending setting
 */
export function validateSettings(settings: AgentSettings): void {
  const parsed = settingsSchema.safeParse(settings)
  if (!parsed.success) {
    const issue = parsed.error.issues[0]
    const argument = issue !== undefined && issue.path.length > 0 ? issue.path.map(String).join('.') : 'settings'
    throw new InvalidArgumentError(argument, z.prettifyError(parsed.error), { cause: parsed.error })
  }
}

/**
 * Merges call settings over agent settings.
 *
 * Scalars and hooks from the call replace the agent's; provider options merge per key.
 *
 * @param agent - Settings the agent was created with
 * @param call - Settings of the current call
 * @returns Settings for the run, defaults applied
 */
export function resolveSettings(agent: AgentSettings, call: AgentSettings): ResolvedSettings {
  validateSettings(call)
  const merged: AgentSettings = { ...definedOnly(agent), ...definedOnly(call) }
  if (agent.providerOptions !== undefined || call.providerOptions !== undefined) {
    merged.providerOptions = { ...agent.providerOptions, ...call.providerOptions }
  }

  const retryOptions: RetryOptions = {
    maxRetries: merged.maxRetries ?? DEFAULT_RETRY_OPTIONS.maxRetries,
    initialDelayMs: merged.retry?.initialDelayMs ?? DEFAULT_RETRY_OPTIONS.initialDelayMs,
    backoffFactor: merged.retry?.backoffFactor ?? DEFAULT_RETRY_OPTIONS.backoffFactor,
  }
  if (merged.onRetry !== undefined) {
    retryOptions.onRetry = merged.onRetry
  }

  const { toolChoice, stopWhen, ...rest } = merged
  return { ...rest, toolChoice: toolChoice ?? 'auto', stopWhen: stopWhen ?? [], retryOptions }
}

/**
 * Picks the sampling parameters forwarded to the model.
 */
export function toCallSettings(settings: CallSettings): CallSettings {
  const callSettings: CallSettings = {}
  if (settings.maxOutputTokens !== undefined) callSettings.maxOutputTokens = settings.maxOutputTokens
  if (settings.temperature !== undefined) callSettings.temperature = settings.temperature
  if (settings.topP !== undefined) callSettings.topP = settings.topP
  if (settings.topK !== undefined) callSettings.topK = settings.topK
  if (settings.presencePenalty !== undefined) callSettings.presencePenalty = settings.presencePenalty
  if (settings.frequencyPenalty !== undefined) callSettings.frequencyPenalty = settings.frequencyPenalty
  if (settings.stopSequences !== undefined) callSettings.stopSequences = settings.stopSequences
  return callSettings
}

function definedOnly(settings: AgentSettings): AgentSettings {
  return Object.fromEntries(Object.entries(settings).filter(([, value]) => value !== undefined))
}
