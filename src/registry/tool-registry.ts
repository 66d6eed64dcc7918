import { InvalidArgumentError } from '../errors.js'
import type { Tool } from '../tools/tool.js'
import type { ToolSpec } from '../tools/types.js'

/**
 * The set of tools configured for an agent. Names are unique.
 */
export class ToolRegistry {
  private readonly _tools = new Map<string, Tool>()

  /**
   * @param tools - Initial tools
   */
  constructor(tools: Tool[] = []) {
    this.addAll(tools)
  }

  /**
   * Registers a tool.
   *
   * @throws \{InvalidArgumentError\} When a tool with the same name is already registered
   */
  add(tool: Tool): void {
    if (this._tools.has(tool.name)) {
      throw new InvalidArgumentError('tools', `Tool "${tool.name}" is already registered`)
    }
    this._tools.set(tool.name, tool)
  }

  addAll(tools: Tool[]): void {
    for (const tool of tools) {
      this.add(tool)
    }
  }

  get(name: string): Tool | undefined {
    return this._tools.get(name)
  }

  has(name: string): boolean {
    return this._tools.has(name)
  }

  /**
   * All tools, in registration order.
   */
  values(): Tool[] {
    return Array.from(this._tools.values())
  }

  get size(): number {
    return this._tools.size
  }

  /**
   * Selects the tools eligible for a step.
   *
   * An empty or missing active list means every tool. Unknown names are ignored.
   *
   * @param activeTools - Names of the tools to keep
   * @param disableAllTools - When true, no tool is eligible
   * @returns The selected tools, in registration order
   */
  select(activeTools?: readonly string[], disableAllTools = false): Tool[] {
    if (disableAllTools) {
      return []
    }
    if (activeTools === undefined || activeTools.length === 0) {
      return this.values()
    }
    const active = new Set(activeTools)
    return this.values().filter((tool) => active.has(tool.name))
  }

  /**
   * Wire specifications of the given tools.
   */
  static toSpecs(tools: readonly Tool[]): ToolSpec[] {
    return tools.map((tool) => tool.toolSpec)
  }
}
