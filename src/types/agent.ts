import type { CallWarning, FinishReason, Usage } from '../models/streaming.js'
import { addUsage, emptyUsage } from '../models/streaming.js'
import { getText } from './content.js'
import type { ContentBlock, Message, ProviderMetadata } from './messages.js'
import { ensureDefined } from './validation.js'

/**
 * One round trip to the model plus the tool executions it triggered.
 */
export interface StepResult {
  /**
   * Model output in generation order with validated tool calls in place,
   * followed by the tool results.
   */
  content: ContentBlock[]
  finishReason: FinishReason
  usage: Usage
  warnings: CallWarning[]
  providerMetadata?: ProviderMetadata
  /**
   * Messages this step adds to the conversation: the assistant message and,
   * when tools ran, the tool message.
   */
  messages: Message[]
}

/**
 * Result returned by the agent loop.
 */
export class AgentResult {
  /**
   * Every step, in execution order. Never empty.
   */
  readonly steps: readonly StepResult[]

  /**
   * Field-wise sum of the usage of every step.
   */
  readonly totalUsage: Usage

  constructor(steps: readonly StepResult[]) {
    ensureDefined(steps[0], 'first step')
    this.steps = steps
    this.totalUsage = steps.reduce((total, step) => addUsage(total, step.usage), emptyUsage())
  }

  /**
   * The last step.
   */
  get response(): StepResult {
    return ensureDefined(this.steps[this.steps.length - 1], 'last step')
  }

  /**
   * Text of the last step.
   */
  get text(): string {
    return getText(this.response.content)
  }

  toString(): string {
    return this.text
  }
}
