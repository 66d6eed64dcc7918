import type { Model } from '../models/model.js'
import type { ToolRegistry } from '../registry/tool-registry.js'
import type { Tool } from '../tools/tool.js'
import type { ToolChoice } from '../tools/types.js'
import type { StepResult } from '../types/agent.js'
import { Message } from '../types/messages.js'

/**
 * Input to a {@link PrepareStepFunction}.
 */
export interface PrepareStepOptions {
  model: Model
  /**
   * Steps completed so far.
   */
  steps: readonly StepResult[]
  /**
   * Zero-based number of the step about to run.
   */
  stepNumber: number
  /**
   * Messages the step would send.
   */
  messages: Message[]
  signal?: AbortSignal
}

/**
 * Overrides for one step. Unset fields keep the run's configuration.
 */
export interface PrepareStepResult {
  model?: Model
  messages?: Message[]
  /**
   * Replaces the system prompt for this step. An empty string removes it.
   */
  system?: string
  toolChoice?: ToolChoice
  /**
   * Tools eligible for this step. An empty list enables every tool.
   */
  activeTools?: string[]
  disableAllTools?: boolean
}

/**
 * Hook called before every step. Throwing aborts the run.
 */
export type PrepareStepFunction = (
  options: PrepareStepOptions
) => Promise<PrepareStepResult | undefined> | PrepareStepResult | undefined

/**
 * The run's configuration for a step before any hook applies.
 */
export interface StepDefaults {
  model: Model
  systemPrompt: string | undefined
  toolChoice: ToolChoice
  activeTools: string[] | undefined
  registry: ToolRegistry
}

/**
 * Everything a step needs to call the model.
 */
export interface PreparedStep {
  model: Model
  messages: Message[]
  systemPrompt: string | undefined
  toolChoice: ToolChoice
  tools: Tool[]
}

/**
 * Resolves the configuration of one step, applying the hook's overrides.
 *
 * @param defaults - Run configuration
 * @param context - Step history, step number, input messages and signal
 * @param prepareStep - Optional hook
 * @returns The resolved step
 */
export async function prepareStep(
  defaults: StepDefaults,
  context: Omit<PrepareStepOptions, 'model'>,
  prepareStep?: PrepareStepFunction
): Promise<PreparedStep> {
  const options: PrepareStepOptions = { ...context, model: defaults.model }
  const overrides: PrepareStepResult = (await prepareStep?.(options)) ?? {}

  let messages = overrides.messages ?? context.messages
  let systemPrompt = defaults.systemPrompt
  if (overrides.system !== undefined && overrides.system !== defaults.systemPrompt) {
    systemPrompt = overrides.system === '' ? undefined : overrides.system
    messages = replaceSystemMessage(messages, systemPrompt)
  }

  return {
    model: overrides.model ?? defaults.model,
    messages,
    systemPrompt,
    toolChoice: overrides.toolChoice ?? defaults.toolChoice,
    tools: defaults.registry.select(overrides.activeTools ?? defaults.activeTools, overrides.disableAllTools ?? false),
  }
}

/**
 * Swaps the leading system message for the given prompt, inserting or removing it as needed.
 */
export function replaceSystemMessage(messages: readonly Message[], systemPrompt: string | undefined): Message[] {
  const rest = messages[0]?.role === 'system' ? messages.slice(1) : [...messages]
  return systemPrompt === undefined ? rest : [Message.system(systemPrompt), ...rest]
}
