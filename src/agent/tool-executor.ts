import { normalizeError } from '../errors.js'
import { getLogger } from '../logging/logger.js'
import type { Tool, ToolContext, ToolResponse } from '../tools/tool.js'
import { ToolResultBlock, type ToolCallBlock, type ToolResultOutput } from '../types/messages.js'

const logger = getLogger('tool-executor')

/**
 * Observes each tool result as it is produced. Throwing aborts the run.
 */
export type ToolResultCallback = (result: ToolResultBlock) => Promise<void> | void

/**
 * Options for {@link executeTools}.
 */
export interface ExecuteToolsOptions {
  /**
   * Passed to every tool run.
   */
  signal?: AbortSignal | undefined
  /**
   * Observes each result. Throwing stops execution before the next call.
   */
  onToolResult?: ToolResultCallback | undefined
}

/**
 * Runs tool calls one after another, in order, and returns one result per call.
 *
 * Invalid calls produce an error result carrying their validation error and are never run.
 * A tool responding with `isError` produces an error result. A tool that throws aborts
 * execution: the callback still sees the error result, then the error propagates.
 *
 * @param tools - Tools to look calls up in
 * @param toolCalls - Validated calls, in content order
 * @param options - Cancellation signal and result observer
 * @returns Results in call order
 */
export async function executeTools(
  tools: readonly Tool[],
  toolCalls: readonly ToolCallBlock[],
  options: ExecuteToolsOptions = {}
): Promise<ToolResultBlock[]> {
  const generator = streamToolResults(tools, toolCalls, options)
  let next = await generator.next()
  while (!next.done) {
    next = await generator.next()
  }
  return next.value
}

/**
 * Generator form of {@link executeTools}: yields each result as soon as its callback returns.
 */
export async function* streamToolResults(
  tools: readonly Tool[],
  toolCalls: readonly ToolCallBlock[],
  options: ExecuteToolsOptions = {}
): AsyncGenerator<ToolResultBlock, ToolResultBlock[], undefined> {
  const toolMap = new Map(tools.map((tool) => [tool.name, tool]))
  const results: ToolResultBlock[] = []

  for (const toolCall of toolCalls) {
    const result = await executeTool(toolMap.get(toolCall.toolName), toolCall, options)
    results.push(result)
    await options.onToolResult?.(result)
    yield result
  }

  return results
}

async function executeTool(
  tool: Tool | undefined,
  toolCall: ToolCallBlock,
  options: ExecuteToolsOptions
): Promise<ToolResultBlock> {
  if (toolCall.invalid) {
    const error = toolCall.validationError ?? new Error(`invalid tool call: ${toolCall.toolName}`)
    return errorResult(toolCall, error)
  }

  if (tool === undefined) {
    return errorResult(toolCall, new Error(`Tool not found: ${toolCall.toolName}`))
  }

  const context: ToolContext = {
    toolCall: { id: toolCall.toolCallId, name: toolCall.toolName, input: toolCall.input },
  }
  if (options.signal !== undefined) {
    context.signal = options.signal
  }

  let response: ToolResponse
  try {
    logger.debug({ toolCallId: toolCall.toolCallId, toolName: toolCall.toolName }, 'running tool')
    response = await tool.run(context)
  } catch (thrown) {
    const error = normalizeError(thrown)
    logger.error({ toolCallId: toolCall.toolCallId, toolName: toolCall.toolName }, `tool failed: ${error.message}`)
    await options.onToolResult?.(errorResult(toolCall, error))
    throw thrown
  }

  return new ToolResultBlock({
    toolCallId: toolCall.toolCallId,
    toolName: toolCall.toolName,
    result: toResultOutput(response),
    ...(response.metadata !== undefined ? { clientMetadata: response.metadata } : {}),
  })
}

function toResultOutput(response: ToolResponse): ToolResultOutput {
  if (response.isError) {
    return { type: 'error', error: new Error(response.content) }
  }
  if ((response.type === 'image' || response.type === 'media') && response.data !== undefined) {
    const output: Extract<ToolResultOutput, { type: 'media' }> = {
      type: 'media',
      data: Buffer.from(response.data).toString('base64'),
      mediaType: response.mediaType ?? 'application/octet-stream',
    }
    if (response.content !== '') {
      output.text = response.content
    }
    return output
  }
  return { type: 'text', text: response.content }
}

function errorResult(toolCall: ToolCallBlock, error: Error): ToolResultBlock {
  return new ToolResultBlock({
    toolCallId: toolCall.toolCallId,
    toolName: toolCall.toolName,
    result: { type: 'error', error },
  })
}
