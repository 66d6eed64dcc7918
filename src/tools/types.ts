import type { JSONSchema } from '../types/json.js'

/**
 * Wire description of a tool, as sent to the model.
 */
export interface ToolSpec {
  /**
   * The unique name of the tool.
   */
  name: string

  /**
   * A description of what the tool does. The model reads this to decide when to call it.
   */
  description: string

  /**
   * JSON Schema of the tool's input. Its `required` list drives tool call validation.
   */
  inputSchema: JSONSchema
}

/**
 * A tool call handed to a tool's run method.
 */
export interface ToolCall {
  /**
   * Unique identifier of this call, as assigned by the model.
   */
  id: string

  name: string

  /**
   * Input as a JSON string.
   */
  input: string
}

/**
 * Controls whether and which tools the model may call in a step.
 *
 * - `auto`: the model decides
 * - `none`: no tool calls
 * - `required`: at least one tool call
 * - `{ tool }`: exactly the named tool
 */
export type ToolChoice = 'auto' | 'none' | 'required' | { tool: string }
