import { ToolValidationError } from '../errors.js'
import { getLogger } from '../logging/logger.js'
import type { Tool } from '../tools/tool.js'
import { isJSONObject } from '../types/json.js'
import { ToolCallBlock, type Message } from '../types/messages.js'

const logger = getLogger('tool-call-validation')

/**
 * Input to a {@link RepairToolCallFunction}.
 */
export interface ToolCallRepairOptions {
  /**
   * The call as the model emitted it.
   */
  originalToolCall: ToolCallBlock
  /**
   * Why the original call failed validation.
   */
  validationError: ToolValidationError
  /**
   * Every configured tool, whether or not it is active for the step.
   */
  availableTools: Tool[]
  /**
   * System prompt of the step, after any step hook override.
   */
  systemPrompt: string | undefined
  /**
   * Messages sent to the model for the step that produced the call.
   */
  messages: Message[]
  /**
   * Cancels the run.
   */
  signal?: AbortSignal
}

/**
 * Attempts to fix a tool call that failed validation, for example by asking a model to
 * rewrite the input. Return undefined to give up. Throwing aborts the run.
 */
export type RepairToolCallFunction = (
  options: ToolCallRepairOptions
) => Promise<ToolCallBlock | undefined> | ToolCallBlock | undefined

/**
 * Checks a tool call against the configured tools.
 *
 * The checks run in order: the tool exists, the input parses as a JSON object, and the
 * object holds every field the tool's input schema lists as required.
 *
 * @param toolCall - Call to check
 * @param tools - Tools to look the call up in
 * @returns The first failure, or undefined when the call is valid
 */
export function validateToolCall(toolCall: ToolCallBlock, tools: readonly Tool[]): ToolValidationError | undefined {
  const tool = tools.find((candidate) => candidate.name === toolCall.toolName)
  if (tool === undefined) {
    return new ToolValidationError('toolNotFound', toolCall.toolName, `tool not found: ${toolCall.toolName}`)
  }

  let input: unknown
  try {
    input = JSON.parse(toolCall.input)
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error)
    return new ToolValidationError('invalidJson', toolCall.toolName, `invalid JSON input: ${detail}`, { cause: error })
  }
  if (!isJSONObject(input)) {
    return new ToolValidationError('invalidJson', toolCall.toolName, 'invalid JSON input: expected a JSON object')
  }

  for (const required of requiredFields(tool)) {
    if (!Object.hasOwn(input, required)) {
      return new ToolValidationError('missingParameter', toolCall.toolName, `missing required parameter: ${required}`)
    }
  }
  return undefined
}

/**
 * Options for {@link validateAndRepairToolCall}.
 */
export interface ValidateAndRepairOptions {
  /**
   * Tools to validate against.
   */
  tools: readonly Tool[]
  /**
   * Gets one chance to fix a call that fails validation.
   */
  repairToolCall?: RepairToolCallFunction | undefined
  /**
   * Passed through to the repair hook.
   */
  systemPrompt: string | undefined
  /**
   * Messages of the step that produced the call, passed through to the repair hook.
   */
  messages: Message[]
  signal?: AbortSignal | undefined
}

/**
 * Validates a tool call and, when it fails, gives the repair hook one chance to fix it.
 *
 * A repaired call is used only if it passes validation itself. Otherwise the original
 * call comes back marked invalid with the validation error attached.
 *
 * @param toolCall - Call emitted by the model
 * @param options - Tools, repair hook and the step's prompt context
 * @returns The call to place in the step content
 */
export async function validateAndRepairToolCall(
  toolCall: ToolCallBlock,
  options: ValidateAndRepairOptions
): Promise<ToolCallBlock> {
  const validationError = validateToolCall(toolCall, options.tools)
  if (validationError === undefined) {
    return toolCall
  }

  if (options.repairToolCall !== undefined) {
    const repairOptions: ToolCallRepairOptions = {
      originalToolCall: toolCall,
      validationError,
      availableTools: [...options.tools],
      systemPrompt: options.systemPrompt,
      messages: options.messages,
    }
    if (options.signal !== undefined) {
      repairOptions.signal = options.signal
    }

    const repaired = await options.repairToolCall(repairOptions)
    if (repaired !== undefined && validateToolCall(repaired, options.tools) === undefined) {
      logger.debug({ toolCallId: toolCall.toolCallId, toolName: repaired.toolName }, 'tool call repaired')
      return new ToolCallBlock({ ...withoutValidation(repaired), invalid: false })
    }
  }

  logger.warn(
    { toolCallId: toolCall.toolCallId, toolName: toolCall.toolName, kind: validationError.kind },
    `invalid tool call: ${validationError.message}`
  )
  return new ToolCallBlock({ ...withoutValidation(toolCall), invalid: true, validationError })
}

function requiredFields(tool: Tool): string[] {
  const required = tool.toolSpec.inputSchema.required
  return Array.isArray(required) ? required.filter((name): name is string => typeof name === 'string') : []
}

function withoutValidation(toolCall: ToolCallBlock): Omit<ToolCallBlock, 'type' | 'invalid' | 'validationError'> {
  const { type: _type, invalid: _invalid, validationError: _validationError, ...rest } = toolCall
  return rest
}
