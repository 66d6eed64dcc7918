/**
 * Tool doubles for agent and executor tests.
 */

import { randomUUID } from 'node:crypto'
import type { Tool, ToolContext } from '../tools/tool.js'
import { ToolResponse } from '../tools/tool.js'

/**
 * Builds the context a tool receives for one call.
 *
 * @param name - Tool name
 * @param input - Tool input as a JSON string
 * @param id - Tool call id
 */
export function createMockContext(name: string, input: string, id = 'call-1'): ToolContext {
  return { toolCall: { id, name, input } }
}

/**
 * Creates a tool whose schema lists the given required fields.
 *
 * @param name - Tool name
 * @param run - Run implementation; defaults to a text response naming the tool
 * @param required - Required input fields declared in the schema
 */
export function createMockTool(
  name: string,
  run: (context: ToolContext) => ToolResponse | Promise<ToolResponse> = () => ToolResponse.text(`${name} done`),
  required: string[] = []
): Tool {
  return {
    name,
    description: `Mock tool ${name}`,
    toolSpec: {
      name,
      description: `Mock tool ${name}`,
      inputSchema: { type: 'object', properties: {}, required },
    },
    async run(context) {
      return run(context)
    },
  }
}

/**
 * A tool with default behavior, for tests that only need one to exist.
 *
 * @param name - Defaults to a random UUID
 */
export function createRandomTool(name?: string): Tool {
  return createMockTool(name ?? randomUUID())
}
