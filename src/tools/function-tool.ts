import { isJSONObject, type JSONObject, type JSONSchema, type JSONValue } from '../types/json.js'
import type { InvokableTool, ToolContext } from './tool.js'
import { ToolResponse } from './tool.js'
import type { ToolSpec } from './types.js'

/**
 * What a tool callback may return: a ready response, a string (sent as text),
 * or any other JSON value (sent JSON-encoded).
 */
export type ToolCallbackResult = ToolResponse | JSONValue

/**
 * Callback invoked with a tool call's parsed input.
 */
export type FunctionToolCallback<TInput, TReturn extends ToolCallbackResult> = (
  input: TInput,
  context: ToolContext
) => TReturn | Promise<TReturn>

/**
 * Configuration for a {@link FunctionTool}.
 */
export interface FunctionToolConfig<TReturn extends ToolCallbackResult> {
  name: string
  description: string
  /**
   * JSON Schema of the input. List mandatory fields under `required`.
   */
  inputSchema: JSONSchema
  callback: FunctionToolCallback<JSONObject, TReturn>
}

/**
 * A tool backed by a plain function and a hand-written JSON schema.
 *
 * Input that is not a JSON object yields an `invalid parameters` error response
 * instead of reaching the callback. A callback that throws aborts the run.
 *
 * @example
 * ```typescript
 * const add = new FunctionTool({
 *   name: 'add',
 *   description: 'Adds two numbers',
 *   inputSchema: {
 *     type: 'object',
 *     properties: { a: { type: 'number' }, b: { type: 'number' } },
 *     required: ['a', 'b'],
 *   },
 *   callback: (input) => Number(input.a) + Number(input.b),
 * })
 * ```
 */
export class FunctionTool<TReturn extends ToolCallbackResult = ToolCallbackResult>
  implements InvokableTool<JSONObject, TReturn>
{
  readonly name: string
  readonly description: string
  readonly toolSpec: ToolSpec
  private readonly _callback: FunctionToolCallback<JSONObject, TReturn>

  constructor(config: FunctionToolConfig<TReturn>) {
    this.name = config.name
    this.description = config.description
    this.toolSpec = { name: config.name, description: config.description, inputSchema: config.inputSchema }
    this._callback = config.callback
  }

  async run(context: ToolContext): Promise<ToolResponse> {
    let input: unknown
    try {
      input = JSON.parse(context.toolCall.input)
    } catch (error) {
      return ToolResponse.error(`invalid parameters: ${error instanceof Error ? error.message : String(error)}`)
    }
    if (!isJSONObject(input)) {
      return ToolResponse.error('invalid parameters: input must be a JSON object')
    }
    return toToolResponse(await this._callback(input, context))
  }

  async invoke(input: JSONObject, context?: ToolContext): Promise<TReturn> {
    return this._callback(input, context ?? directContext(this.name, input))
  }
}

/**
 * Converts a callback result into a tool response.
 *
 * @param value - Callback result
 * @returns The response itself, a text response for strings, or JSON-encoded text otherwise
 */
export function toToolResponse(value: ToolCallbackResult): ToolResponse {
  if (value instanceof ToolResponse) {
    return value
  }
  if (typeof value === 'string') {
    return ToolResponse.text(value)
  }
  return ToolResponse.text(JSON.stringify(value))
}

/**
 * Builds the context for a call made outside the agent loop.
 */
export function directContext(name: string, input: unknown): ToolContext {
  return { toolCall: { id: `direct-${name}`, name, input: JSON.stringify(input) ?? '' } }
}
