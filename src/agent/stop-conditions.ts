import type { FinishReason } from '../models/streaming.js'
import { getToolCalls } from '../types/content.js'
import type { StepResult } from '../types/agent.js'
import type { ContentType } from '../types/messages.js'

/**
 * Decides, after a step completes, whether the run should end.
 * Receives the full step history and must not modify it.
 */
export type StopCondition = (steps: readonly StepResult[]) => boolean

/**
 * Stops once at least `count` steps have run.
 *
 * @example
 * ```typescript
 * const agent = new Agent({ model, tools, stopWhen: [stepCountIs(5)] })
 * ```
 */
export function stepCountIs(count: number): StopCondition {
  return (steps) => steps.length >= count
}

/**
 * Stops when the last step called the named tool.
 */
export function hasToolCall(toolName: string): StopCondition {
  return (steps) => {
    const last = steps[steps.length - 1]
    return last !== undefined && getToolCalls(last.content).some((call) => call.toolName === toolName)
  }
}

/**
 * Stops when the last step holds a content block of the given type.
 */
export function hasContent(type: ContentType): StopCondition {
  return (steps) => {
    const last = steps[steps.length - 1]
    return last !== undefined && last.content.some((block) => block.type === type)
  }
}

/**
 * Stops when the last step finished for the given reason.
 */
export function finishReasonIs(reason: FinishReason): StopCondition {
  return (steps) => steps[steps.length - 1]?.finishReason === reason
}

/**
 * Stops once the total tokens of all steps reach the limit.
 */
export function maxTokensUsed(limit: number): StopCondition {
  return (steps) => steps.reduce((sum, step) => sum + step.usage.totalTokens, 0) >= limit
}

/**
 * Combines conditions with logical OR.
 *
 * @returns True when any condition holds; false when there are none
 */
export function isStopConditionMet(conditions: readonly StopCondition[], steps: readonly StepResult[]): boolean {
  return conditions.some((condition) => condition(steps))
}

/**
 * Whether the loop needs another step: the step called at least one tool and the model
 * stopped in order to have the tool results. Both loops use this predicate.
 */
export function shouldContinue(step: StepResult): boolean {
  return step.finishReason === 'tool-calls' && getToolCalls(step.content).length > 0
}
