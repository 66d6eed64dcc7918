import { z } from 'zod'
import type { JSONSchema } from '../types/json.js'
import { directContext, toToolResponse, type FunctionToolCallback, type ToolCallbackResult } from './function-tool.js'
import type { InvokableTool, ToolContext } from './tool.js'
import { ToolResponse } from './tool.js'
import type { ToolSpec } from './types.js'

/**
 * Configuration for a zod-backed tool.
 */
export interface ZodToolConfig<TSchema extends z.ZodType, TReturn extends ToolCallbackResult> {
  name: string
  description: string
  /**
   * Zod schema of the input. Its JSON Schema form is sent to the model, and its
   * required keys drive tool call validation.
   */
  inputSchema: TSchema
  callback: FunctionToolCallback<z.infer<TSchema>, TReturn>
}

/**
 * A tool whose input is described and parsed by a zod schema.
 */
export class ZodTool<TSchema extends z.ZodType, TReturn extends ToolCallbackResult>
  implements InvokableTool<z.infer<TSchema>, TReturn>
{
  readonly name: string
  readonly description: string
  readonly toolSpec: ToolSpec
  private readonly _schema: TSchema
  private readonly _callback: FunctionToolCallback<z.infer<TSchema>, TReturn>

  constructor(config: ZodToolConfig<TSchema, TReturn>) {
    this.name = config.name
    this.description = config.description
    this._schema = config.inputSchema
    this._callback = config.callback

    const inputSchema: JSONSchema = { ...z.toJSONSchema(config.inputSchema) }
    delete inputSchema['$schema']
    this.toolSpec = { name: config.name, description: config.description, inputSchema }
  }

  async run(context: ToolContext): Promise<ToolResponse> {
    let raw: unknown
    try {
      raw = JSON.parse(context.toolCall.input)
    } catch (error) {
      return ToolResponse.error(`invalid parameters: ${error instanceof Error ? error.message : String(error)}`)
    }

    const parsed = this._schema.safeParse(raw)
    if (!parsed.success) {
      return ToolResponse.error(`invalid parameters: ${z.prettifyError(parsed.error)}`)
    }
    return toToolResponse(await this._callback(parsed.data, context))
  }

  /**
   * Calls the tool directly. Input is parsed with the schema first, so invalid input throws.
   *
   * @param input - Tool input
   * @param context - Optional context, synthesized when omitted
   * @returns Whatever the callback returned
   */
  async invoke(input: z.infer<TSchema>, context?: ToolContext): Promise<TReturn> {
    const data = this._schema.parse(input)
    return this._callback(data, context ?? directContext(this.name, data))
  }
}

/**
 * Creates a tool from a zod schema and a callback.
 *
 * @param config - Tool name, description, input schema and callback
 * @returns A tool usable by an agent and callable directly through `invoke`
 *
 * @example
 * ```typescript
 * const weather = tool({
 *   name: 'get_weather',
 *   description: 'Returns the weather for a city',
 *   inputSchema: z.object({ city: z.string().describe('City name') }),
 *   callback: async ({ city }) => `Sunny in ${city}`,
 * })
 * ```
 */
export function tool<TSchema extends z.ZodType, TReturn extends ToolCallbackResult>(
  config: ZodToolConfig<TSchema, TReturn>
): ZodTool<TSchema, TReturn> {
  return new ZodTool(config)
}
